// engine/constants.ts
// Canonical constants for the scorecard workbook and CSV templates.
// Sheet names and header lists are shared by every formula that reads them.

// ------------------------------------------------------------
// Sheet names (workbook order)
// ------------------------------------------------------------

export const SHEET_NAMES = {
  assumptions: 'Assumptions',
  forecast: 'Forecast',
  dailyInputs: 'Daily_Inputs',
  scorecard: 'Scorecard',
  capacity: 'Capacity',
  cashflow: 'Cashflow'
} as const;

export type SheetName = (typeof SHEET_NAMES)[keyof typeof SHEET_NAMES];

export const SHEET_ORDER: readonly SheetName[] = [
  SHEET_NAMES.assumptions,
  SHEET_NAMES.forecast,
  SHEET_NAMES.dailyInputs,
  SHEET_NAMES.scorecard,
  SHEET_NAMES.capacity,
  SHEET_NAMES.cashflow
];

// ------------------------------------------------------------
// Table names
// ------------------------------------------------------------

export const TABLE_NAMES = {
  forecast: 'tblForecast',
  dailyInputs: 'tblDailyInputs',
  cashflow: 'tblCashflow'
} as const;

// All tables share one style.
export const TABLE_THEME = 'TableStyleLight9';

// ------------------------------------------------------------
// Header lists (also the CSV entry templates)
// ------------------------------------------------------------

export const DAILY_INPUT_HEADERS = [
  'Date',
  'Revenue_Production',
  'Revenue_LD',
  'Revenue_UMB_D_B',
  'CM_Production',
  'CM_LD',
  'CM_UMB_D_B',
  'Headcount_Field',
  'Hours_Worked',
  'Warranty_Unbillable_Material',
  'Warranty_Unbillable_Labor_Hours'
] as const;

export const AR_DETAIL_HEADERS = [
  'Invoice_Number',
  'Customer',
  'Invoice_Date',
  'Due_Date',
  'Amount',
  'Amount_Collected',
  'Balance_Remaining',
  'Days_Outstanding',
  'Status',
  'Notes'
] as const;

export type DailyInputHeader = (typeof DAILY_INPUT_HEADERS)[number];

// Daily_Inputs layout: header on row 3, data from row 4.
export const DAILY_HEADER_ROW = 3;
export const DAILY_FIRST_DATA_ROW = 4;

// Hidden helper cells on Daily_Inputs
export const DAILY_DISTINCT_FLAG_COLUMN = 'M';
export const DAILY_DAYS_REPORTED_CELL = 'N2';

// ------------------------------------------------------------
// Content types
// ------------------------------------------------------------

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';
