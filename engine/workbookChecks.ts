// engine/workbookChecks.ts
// Structural inspection of a WorkbookSpec before it is serialized.
//
// Spreadsheet applications accept a formula naming a missing sheet or cell and
// only show the breakage once the file is opened, and a table whose range
// disagrees with its sheet is rejected or repaired on open. Both are caught
// here instead.
//
// IMPORTANT:
//  - This layer only reports issues; the package assembler decides to abort.
//  - Issues come back in sheet order, then cell order.

import { ErrorCodes, type ErrorCode } from './errorCodes';
import { cellRef, parseCellRef } from './cellBuilder';
import { findCell } from './sheetBuilder';
import type { SheetSpec, WorkbookSpec } from './excelTypes';

export interface WorkbookIssue {
  code: ErrorCode;
  sheet: string;
  ref: string;
  message: string;
}

export interface SheetReference {
  sheet: string;
  /** Cell or range on the referenced sheet, `$` markers removed. */
  target: string;
}

const STRING_LITERAL = /"(?:[^"]|"")*"/g;
const SHEET_REFERENCE =
  /(?:'((?:[^']|'')+)'|([A-Za-z_][A-Za-z0-9_.]*))!(\$?[A-Z]{1,3}\$?\d+(?::\$?[A-Z]{1,3}\$?\d+)?)/g;

export function extractSheetReferences(expression: string): SheetReference[] {
  const code = expression.replace(STRING_LITERAL, '""');
  const refs: SheetReference[] = [];
  for (const match of code.matchAll(SHEET_REFERENCE)) {
    const sheet = match[1] !== undefined ? match[1].replace(/''/g, "'") : match[2];
    refs.push({ sheet, target: match[3].replace(/\$/g, '') });
  }
  return refs;
}

export function findDanglingReferences(spec: WorkbookSpec): WorkbookIssue[] {
  const sheets = new Map(spec.sheets.map(s => [s.name, s]));
  const issues: WorkbookIssue[] = [];

  for (const sheet of spec.sheets) {
    for (const row of sheet.rows) {
      for (const c of row.cells) {
        if (c.content.kind !== 'formula') continue;

        for (const ref of extractSheetReferences(c.content.formula)) {
          const target = sheets.get(ref.sheet);
          if (!target) {
            issues.push({
              code: ErrorCodes.DANGLING_SHEET_REFERENCE,
              sheet: sheet.name,
              ref: c.ref,
              message: `${sheet.name}!${c.ref} references unknown sheet "${ref.sheet}".`
            });
            continue;
          }
          if (!ref.target.includes(':') && !findCell(target, ref.target)) {
            issues.push({
              code: ErrorCodes.DANGLING_CELL_REFERENCE,
              sheet: sheet.name,
              ref: c.ref,
              message: `${sheet.name}!${c.ref} references ${ref.sheet}!${ref.target}, which is never defined.`
            });
          }
        }
      }
    }
  }

  return issues;
}

function rowHasCellsWithin(sheet: SheetSpec, row: number, minColumn: number, maxColumn: number): boolean {
  const found = sheet.rows.find(r => r.row === row);
  return !!found && found.cells.some(c => c.column >= minColumn && c.column <= maxColumn);
}

export function findTableMismatches(spec: WorkbookSpec): WorkbookIssue[] {
  const issues: WorkbookIssue[] = [];

  for (const sheet of spec.sheets) {
    const table = sheet.table;
    if (!table) continue;

    const { column: firstCol, row: headerRow } = parseCellRef(table.topLeft);
    const lastCol = firstCol + table.columns.length - 1;

    table.columns.forEach((name, i) => {
      const ref = cellRef(firstCol + i, headerRow);
      const header = findCell(sheet, ref);
      if (!header || header.content.kind !== 'text' || header.content.value !== name) {
        issues.push({
          code: ErrorCodes.TABLE_HEADER_MISMATCH,
          sheet: sheet.name,
          ref,
          message: `${table.name}: header ${ref} should read "${name}".`
        });
      }
    });

    for (let r = headerRow + 1; r <= headerRow + table.rowCount; r++) {
      if (!rowHasCellsWithin(sheet, r, firstCol, lastCol)) {
        issues.push({
          code: ErrorCodes.TABLE_ROW_MISMATCH,
          sheet: sheet.name,
          ref: cellRef(firstCol, r),
          message: `${table.name}: row ${r} is inside the table range but has no cells.`
        });
      }
    }

    const after = headerRow + table.rowCount + 1;
    if (rowHasCellsWithin(sheet, after, firstCol, lastCol)) {
      issues.push({
        code: ErrorCodes.TABLE_ROW_MISMATCH,
        sheet: sheet.name,
        ref: cellRef(firstCol, after),
        message: `${table.name}: row ${after} is populated directly below the table range.`
      });
    }
  }

  return issues;
}

export function inspectWorkbookSpec(spec: WorkbookSpec): WorkbookIssue[] {
  return [...findDanglingReferences(spec), ...findTableMismatches(spec)];
}
