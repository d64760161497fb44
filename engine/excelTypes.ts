// engine/excelTypes.ts
// Structural description of the scorecard workbook. Built once per generation
// pass and handed to the sheet assembler; nothing here touches exceljs.

import type { StyleId } from './excelStyles';

export type CellLiteral = number | string | null;

// A cell holds exactly one kind of content.
export type CellContent =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'blank' }
  | { kind: 'formula'; formula: string };

export interface CellSpec {
  ref: string;
  row: number;
  column: number;
  content: CellContent;
  style: StyleId;
}

export interface RowSpec {
  row: number;
  cells: CellSpec[];
}

// Inclusive 1-based column span sharing one width.
export interface ColumnSpec {
  min: number;
  max: number;
  width: number;
  hidden?: boolean;
}

export interface FreezeSpec {
  xSplit: number;
  ySplit: number;
  topLeftCell: string;
}

export type ConditionalRuleSpec =
  | { type: 'cellIs'; operator: 'lessThan' | 'greaterThan'; value: number }
  | { type: 'expression'; formula: string };

export interface ConditionalFormatSpec {
  /** Space-separated ranges, e.g. `F4:F11 F13:F14`. */
  ref: string;
  rule: ConditionalRuleSpec;
}

export interface TableSpec {
  name: string;
  /** Header cell of the first column. */
  topLeft: string;
  columns: readonly string[];
  /** Data rows directly below the header. */
  rowCount: number;
}

export interface PrintSpec {
  orientation: 'portrait' | 'landscape';
  fitToWidth: number;
  fitToHeight: number;
  margins: {
    left: number;
    right: number;
    top: number;
    bottom: number;
    header: number;
    footer: number;
  };
  printArea: string;
  printTitlesRow: string;
}

export interface SheetSpec {
  name: string;
  rows: RowSpec[];
  columns: ColumnSpec[];
  freeze?: FreezeSpec;
  conditionalFormats: ConditionalFormatSpec[];
  table?: TableSpec;
  print?: PrintSpec;
}

export interface WorkbookSpec {
  creator: string;
  documentDate: string;
  sheets: SheetSpec[];
}
