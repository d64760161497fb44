// engine/excelExport.ts
// Sheet assembler: applies one SheetSpec to an exceljs worksheet.

import type { CellValue, ConditionalFormattingRule, Workbook, Worksheet } from 'exceljs';
import { HIGHLIGHT_STYLE, STYLE_REGISTRY } from './excelStyles';
import { TABLE_THEME } from './constants';
import { cellRef, parseCellRef } from './cellBuilder';
import { findCell } from './sheetBuilder';
import type {
  CellContent,
  ConditionalFormatSpec,
  SheetSpec,
  TableSpec
} from './excelTypes';

// exceljs escapes text for the sheet XML; formulas go in without a leading '='.
export function toCellValue(content: CellContent): CellValue {
  switch (content.kind) {
    case 'number':
      return content.value;
    case 'text':
      return content.value;
    case 'blank':
      return null;
    case 'formula':
      return { formula: content.formula };
  }
}

function toConditionalRule(spec: ConditionalFormatSpec, priority: number): ConditionalFormattingRule {
  const { rule } = spec;
  if (rule.type === 'cellIs') {
    return {
      type: 'cellIs',
      operator: rule.operator,
      formulae: [rule.value],
      priority,
      style: HIGHLIGHT_STYLE
    };
  }
  return {
    type: 'expression',
    formulae: [rule.formula],
    priority,
    style: HIGHLIGHT_STYLE
  };
}

// Table rows are read back from the sheet's own cells so the table range and
// the populated cells cannot drift apart.
function tableRows(sheet: SheetSpec, table: TableSpec): CellValue[][] {
  const { column, row } = parseCellRef(table.topLeft);
  const rows: CellValue[][] = [];
  for (let r = row + 1; r <= row + table.rowCount; r++) {
    rows.push(
      table.columns.map((_, i) => {
        const spec = findCell(sheet, cellRef(column + i, r));
        return spec ? toCellValue(spec.content) : null;
      })
    );
  }
  return rows;
}

// exceljs writes the defined name as `$<start>:$<end>`, prefixing only the
// column; anchoring the rows here yields `$A$1:$F$14`.
export function absolutePrintArea(range: string): string {
  return range
    .split(':')
    .map(corner => corner.replace(/^([A-Z]+)(\d+)$/, '$1$$$2'))
    .join(':');
}

export function assembleSheet(workbook: Workbook, sheet: SheetSpec): Worksheet {
  const { freeze, print } = sheet;

  const worksheet = workbook.addWorksheet(sheet.name, {
    views: freeze ? [{ state: 'frozen', ...freeze }] : [],
    pageSetup: print
      ? {
          orientation: print.orientation,
          fitToPage: true,
          fitToWidth: print.fitToWidth,
          fitToHeight: print.fitToHeight,
          horizontalCentered: false,
          verticalCentered: false,
          margins: print.margins,
          printArea: absolutePrintArea(print.printArea),
          printTitlesRow: print.printTitlesRow
        }
      : undefined
  });

  for (const col of sheet.columns) {
    for (let c = col.min; c <= col.max; c++) {
      const column = worksheet.getColumn(c);
      column.width = col.width;
      if (col.hidden) column.hidden = true;
    }
  }

  for (const row of sheet.rows) {
    for (const spec of row.cells) {
      const target = worksheet.getCell(spec.ref);
      target.value = toCellValue(spec.content);
      target.style = { ...STYLE_REGISTRY[spec.style] };
    }
  }

  sheet.conditionalFormats.forEach((spec, i) => {
    worksheet.addConditionalFormatting({
      ref: spec.ref,
      rules: [toConditionalRule(spec, i + 1)]
    });
  });

  if (sheet.table) {
    // addTable rewrites the same values into the range; cell styles stay.
    worksheet.addTable({
      name: sheet.table.name,
      displayName: sheet.table.name,
      ref: sheet.table.topLeft,
      headerRow: true,
      totalsRow: false,
      style: {
        theme: TABLE_THEME,
        showFirstColumn: false,
        showLastColumn: false,
        showRowStripes: true,
        showColumnStripes: false
      },
      columns: sheet.table.columns.map(name => ({ name, filterButton: true })),
      rows: tableRows(sheet, sheet.table)
    });
  }

  return worksheet;
}
