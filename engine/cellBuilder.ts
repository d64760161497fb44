// engine/cellBuilder.ts
// A1 reference helpers and cell constructors.

import type { CellLiteral, CellSpec } from './excelTypes';
import type { StyleId } from './excelStyles';

const CELL_REF = /^\$?([A-Z]{1,3})\$?(\d+)$/;

export interface CellAddress {
  column: number;
  row: number;
}

export function columnLetter(index: number): string {
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`Column index must be a positive integer, got ${index}`);
  }
  let n = index;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function columnIndex(letters: string): number {
  let index = 0;
  for (const ch of letters.toUpperCase()) {
    index = index * 26 + (ch.charCodeAt(0) - 64);
  }
  return index;
}

export function parseCellRef(ref: string): CellAddress {
  const match = CELL_REF.exec(ref.trim().toUpperCase());
  if (!match) {
    throw new RangeError(`Not an A1 cell reference: "${ref}"`);
  }
  return { column: columnIndex(match[1]), row: Number(match[2]) };
}

export function cellRef(column: number, row: number): string {
  return `${columnLetter(column)}${row}`;
}

/** `rangeRef('A3', 11, 33)` → `A3:K35` */
export function rangeRef(topLeft: string, width: number, height: number): string {
  const { column, row } = parseCellRef(topLeft);
  return `${cellRef(column, row)}:${cellRef(column + width - 1, row + height - 1)}`;
}

// Literal cell: numbers stay numeric, '' and null become a styled blank.
export function cell(ref: string, value: CellLiteral, style: StyleId = 'default'): CellSpec {
  const { column, row } = parseCellRef(ref);
  if (typeof value === 'number') {
    return { ref, row, column, style, content: { kind: 'number', value } };
  }
  if (value === null || value === '') {
    return { ref, row, column, style, content: { kind: 'blank' } };
  }
  return { ref, row, column, style, content: { kind: 'text', value } };
}

export function formula(ref: string, expression: string, style: StyleId = 'default'): CellSpec {
  const { column, row } = parseCellRef(ref);
  return { ref, row, column, style, content: { kind: 'formula', formula: expression } };
}
