// engine/sheetBuilder.ts
// Collects cells and sheet metadata; build() hands back rows in row order
// and cells in column order, whatever order they were put in.

import { cell, parseCellRef, cellRef } from './cellBuilder';
import type {
  CellSpec,
  ColumnSpec,
  ConditionalFormatSpec,
  FreezeSpec,
  PrintSpec,
  SheetSpec,
  TableSpec
} from './excelTypes';

export class SheetBuilder {
  private readonly rows = new Map<number, Map<number, CellSpec>>();
  private columns: ColumnSpec[] = [];
  private freezeSpec?: FreezeSpec;
  private readonly conditionalFormats: ConditionalFormatSpec[] = [];
  private tableSpec?: TableSpec;
  private printSpec?: PrintSpec;

  constructor(readonly name: string) {}

  /** Adds cells; a cell put again at the same reference replaces the earlier one. */
  put(...cells: CellSpec[]): this {
    for (const spec of cells) {
      let row = this.rows.get(spec.row);
      if (!row) {
        row = new Map();
        this.rows.set(spec.row, row);
      }
      row.set(spec.column, spec);
    }
    return this;
  }

  /** Writes header labels left to right starting at `topLeft`. */
  headers(topLeft: string, labels: readonly string[]): this {
    const { column, row } = parseCellRef(topLeft);
    return this.put(...labels.map((label, i) => cell(cellRef(column + i, row), label, 'header')));
  }

  cols(...specs: ColumnSpec[]): this {
    this.columns = specs;
    return this;
  }

  freeze(spec: FreezeSpec): this {
    this.freezeSpec = spec;
    return this;
  }

  highlight(spec: ConditionalFormatSpec): this {
    this.conditionalFormats.push(spec);
    return this;
  }

  table(spec: TableSpec): this {
    this.tableSpec = spec;
    return this;
  }

  print(spec: PrintSpec): this {
    this.printSpec = spec;
    return this;
  }

  build(): SheetSpec {
    const rows = [...this.rows.entries()]
      .sort(([a], [b]) => a - b)
      .map(([row, cells]) => ({
        row,
        cells: [...cells.values()].sort((a, b) => a.column - b.column)
      }));

    return {
      name: this.name,
      rows,
      columns: this.columns,
      freeze: this.freezeSpec,
      conditionalFormats: [...this.conditionalFormats],
      table: this.tableSpec,
      print: this.printSpec
    };
  }
}

/** Looks up a cell of a built sheet. */
export function findCell(sheet: SheetSpec, ref: string): CellSpec | undefined {
  const { column, row } = parseCellRef(ref);
  return sheet.rows.find(r => r.row === row)?.cells.find(c => c.column === column);
}
