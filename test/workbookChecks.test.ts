import { describe, expect, it } from 'vitest';

import { cell, formula } from '../engine/cellBuilder';
import { ErrorCodes, TemplateGenerationError } from '../engine/errorCodes';
import { buildScorecardWorkbookSpec } from '../engine/scorecardSheets';
import { assembleWorkbook } from '../engine/scorecardWorkbook';
import { SheetBuilder } from '../engine/sheetBuilder';
import {
  extractSheetReferences,
  findDanglingReferences,
  findTableMismatches,
  inspectWorkbookSpec
} from '../engine/workbookChecks';
import type { SheetSpec, TableSpec, WorkbookSpec } from '../engine/excelTypes';

function withExtraSheet(expression: string): WorkbookSpec {
  const spec = buildScorecardWorkbookSpec();
  const extra = new SheetBuilder('Extra').put(formula('A1', expression)).build();
  return { ...spec, sheets: [...spec.sheets, extra] };
}

function withTable(name: string, patch: Partial<TableSpec>): WorkbookSpec {
  const spec = buildScorecardWorkbookSpec();
  const sheets = spec.sheets.map((sheet): SheetSpec =>
    sheet.name === name && sheet.table ? { ...sheet, table: { ...sheet.table, ...patch } } : sheet
  );
  return { ...spec, sheets };
}

describe('extractSheetReferences', () => {
  it('finds unquoted sheet references', () => {
    expect(extractSheetReferences('IFERROR(C4/Daily_Inputs!N2,0)')).toEqual([
      { sheet: 'Daily_Inputs', target: 'N2' }
    ]);
    expect(extractSheetReferences('(Scorecard!E4+Scorecard!E5)/4')).toEqual([
      { sheet: 'Scorecard', target: 'E4' },
      { sheet: 'Scorecard', target: 'E5' }
    ]);
  });

  it('unquotes sheet names and drops absolute markers', () => {
    expect(extractSheetReferences("SUM('Cash Flow'!$B$4:B7)")).toEqual([
      { sheet: 'Cash Flow', target: 'B4:B7' }
    ]);
    expect(extractSheetReferences("'Owner''s View'!A1")).toEqual([
      { sheet: "Owner's View", target: 'A1' }
    ]);
  });

  it('ignores text inside string literals and same-sheet references', () => {
    expect(extractSheetReferences('IF(A1="Forecast!B4",1,0)')).toEqual([]);
    expect(extractSheetReferences('B6*B5*B7')).toEqual([]);
  });
});

describe('findDanglingReferences', () => {
  it('reports a formula naming a sheet that does not exist', () => {
    expect(findDanglingReferences(withExtraSheet('Forcast!B4*2'))).toEqual([
      {
        code: ErrorCodes.DANGLING_SHEET_REFERENCE,
        sheet: 'Extra',
        ref: 'A1',
        message: 'Extra!A1 references unknown sheet "Forcast".'
      }
    ]);
  });

  it('reports a single-cell reference the target sheet never defines', () => {
    const issues = findDanglingReferences(withExtraSheet('Forecast!Z99'));
    expect(issues.map(i => i.code)).toEqual([ErrorCodes.DANGLING_CELL_REFERENCE]);
    expect(issues[0].message).toBe('Extra!A1 references Forecast!Z99, which is never defined.');
  });

  it('accepts ranges and defined blank input cells', () => {
    expect(findDanglingReferences(withExtraSheet('SUM(Forecast!Z1:Z9)'))).toEqual([]);
    expect(findDanglingReferences(withExtraSheet('Assumptions!B13'))).toEqual([]);
  });
});

describe('findTableMismatches', () => {
  it('reports data rows declared beyond the populated rows', () => {
    const issues = findTableMismatches(withTable('Daily_Inputs', { rowCount: 33 }));
    expect(issues).toEqual([
      {
        code: ErrorCodes.TABLE_ROW_MISMATCH,
        sheet: 'Daily_Inputs',
        ref: 'A36',
        message: 'tblDailyInputs: row 36 is inside the table range but has no cells.'
      }
    ]);
  });

  it('reports a populated row left just outside the table range', () => {
    const issues = findTableMismatches(withTable('Cashflow', { rowCount: 3 }));
    expect(issues.map(i => [i.code, i.ref])).toEqual([[ErrorCodes.TABLE_ROW_MISMATCH, 'A7']]);
  });

  it('reports header cells that differ from the declared columns', () => {
    const spec = buildScorecardWorkbookSpec();
    const forecast = spec.sheets[1];
    const table = forecast.table;
    if (!table) throw new Error('Forecast table missing');

    const issues = findTableMismatches(
      withTable('Forecast', { columns: ['Segment', ...table.columns.slice(1)] })
    );
    expect(issues.map(i => [i.code, i.ref])).toEqual([[ErrorCodes.TABLE_HEADER_MISMATCH, 'A3']]);
  });

  it('ignores sheets without a table', () => {
    const sheet = new SheetBuilder('Loose').put(cell('A1', 'x')).build();
    expect(findTableMismatches({ creator: 'test', documentDate: '2025-03-01', sheets: [sheet] })).toEqual([]);
  });
});

describe('assembleWorkbook', () => {
  it('refuses to assemble a workbook with dangling references', () => {
    const spec = withExtraSheet('Forcast!B4');
    expect(inspectWorkbookSpec(spec)).toHaveLength(1);

    let caught: unknown;
    try {
      assembleWorkbook(spec);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TemplateGenerationError);
    expect(caught).toMatchObject({ code: ErrorCodes.DANGLING_SHEET_REFERENCE });
  });
});
