// engine/excelStyles.ts
// Style registry shared by every sheet. Cells refer to styles by id only.

import type { Alignment, Borders, Style } from 'exceljs';

export type StyleId =
  | 'default'
  | 'title'
  | 'header'
  | 'label'
  | 'input'
  | 'text'
  | 'int'
  | 'currency'
  | 'percent'
  | 'date'
  | 'wrap'
  | 'total';

const FONT = { name: 'Calibri', family: 2, size: 11 };

const THIN_BORDER: Partial<Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' }
};

const RIGHT: Partial<Alignment> = { horizontal: 'right', vertical: 'middle' };
const LEFT: Partial<Alignment> = { horizontal: 'left', vertical: 'middle' };

export const NUMBER_FORMATS = {
  int: '#,##0',
  currency: '$#,##0',
  percent: '0.0%',
  date: 'mm-dd-yy'
} as const;

export const STYLE_REGISTRY: Record<StyleId, Partial<Style>> = {
  default: {},
  title: {
    font: { ...FONT, size: 12, bold: true },
    alignment: LEFT
  },
  header: {
    font: { ...FONT, bold: true },
    fill: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFDCE6F1' } },
    border: THIN_BORDER,
    alignment: { horizontal: 'center', vertical: 'middle', wrapText: true }
  },
  label: {
    font: { ...FONT, bold: true },
    border: THIN_BORDER,
    alignment: LEFT
  },
  input: {
    font: FONT,
    fill: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFF2F2F2' } },
    border: THIN_BORDER,
    alignment: RIGHT
  },
  text: {
    font: FONT,
    border: THIN_BORDER,
    alignment: LEFT
  },
  int: {
    font: FONT,
    numFmt: NUMBER_FORMATS.int,
    border: THIN_BORDER,
    alignment: RIGHT
  },
  currency: {
    font: FONT,
    numFmt: NUMBER_FORMATS.currency,
    border: THIN_BORDER,
    alignment: RIGHT
  },
  percent: {
    font: FONT,
    numFmt: NUMBER_FORMATS.percent,
    border: THIN_BORDER,
    alignment: RIGHT
  },
  date: {
    font: FONT,
    numFmt: NUMBER_FORMATS.date,
    border: THIN_BORDER,
    alignment: RIGHT
  },
  wrap: {
    font: FONT,
    border: THIN_BORDER,
    alignment: { horizontal: 'left', vertical: 'middle', wrapText: true }
  },
  total: {
    font: { ...FONT, bold: true },
    border: THIN_BORDER,
    alignment: RIGHT
  }
};

// Differential style used by every conditional-formatting rule.
export const HIGHLIGHT_STYLE: Partial<Style> = {
  fill: { type: 'pattern', pattern: 'solid', bgColor: { argb: 'FFFFC7CE' } },
  font: { color: { argb: 'FF9C0006' } }
};
