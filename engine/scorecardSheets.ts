// engine/scorecardSheets.ts
// The six scorecard sheets. Layout and formulas are fixed; the reporting month,
// assumption defaults, daily row count and week count come from config.
//
// Sheets read each other through the cell maps below (ASSUMPTION_CELLS,
// FORECAST_ROWS, ...). Moving a cell means updating its map entry, never a
// formula string by hand.

import { DEFAULT_SCORECARD_CONFIG, type ScorecardConfig } from './config';
import {
  DAILY_DAYS_REPORTED_CELL,
  DAILY_DISTINCT_FLAG_COLUMN,
  DAILY_FIRST_DATA_ROW,
  DAILY_HEADER_ROW,
  DAILY_INPUT_HEADERS,
  SHEET_NAMES,
  TABLE_NAMES,
  type DailyInputHeader
} from './constants';
import { cell, columnLetter, formula } from './cellBuilder';
import { SheetBuilder } from './sheetBuilder';
import type { StyleId } from './excelStyles';
import type { SheetSpec, WorkbookSpec } from './excelTypes';

// ------------------------------------------------------------
// Cross-sheet anchors
// ------------------------------------------------------------

export const ASSUMPTION_CELLS = {
  overhead: 'B3',
  cmTarget: 'B4',
  workingDays: 'B5',
  fieldHeadcount: 'B6',
  hoursPerDay: 'B7',
  capacityHours: 'B8',
  umbRevenueMinimum: 'B9',
  umbCmPercent: 'B10',
  sodConsumption: 'B11',
  sodMarginDelta: 'B12',
  arDaysPlan: 'B13',
  warrantyMaterialTarget: 'B14',
  warrantyLaborTarget: 'B15'
} as const;

export const FORECAST_ROWS = {
  production: 4,
  ld: 5,
  umb: 6,
  totals: 8
} as const;

export const SCORECARD_ROWS = {
  revenueUmb: 4,
  revenueLd: 5,
  revenueProduction: 6,
  cmUmb: 7,
  cmLd: 8,
  cmProduction: 9,
  headcount: 10,
  laborUtilization: 11,
  arDays: 12,
  warrantyMaterial: 13,
  warrantyLabor: 14
} as const;

const SIMPLE_SHEET_NAME = /^[A-Za-z_][A-Za-z0-9_.]*$/;

/** `Sheet!A1`, quoting the sheet name when it needs it. */
export function sheetRef(sheet: string, ref: string): string {
  const name = SIMPLE_SHEET_NAME.test(sheet) ? sheet : `'${sheet.replace(/'/g, "''")}'`;
  return `${name}!${ref}`;
}

const assumption = (key: keyof typeof ASSUMPTION_CELLS) =>
  sheetRef(SHEET_NAMES.assumptions, ASSUMPTION_CELLS[key]);

// A plain link to an empty input evaluates to 0; this one stays "" until the
// input is filled in, so `IF(B="",...)` guards downstream keep working.
const optionalAssumption = (key: keyof typeof ASSUMPTION_CELLS) => {
  const ref = assumption(key);
  return `IF(${ref}="","",${ref})`;
};

function dailyLastRow(config: ScorecardConfig): number {
  return DAILY_FIRST_DATA_ROW + config.dailyInputRows - 1;
}

function dailyColumn(header: DailyInputHeader): string {
  return columnLetter(DAILY_INPUT_HEADERS.indexOf(header) + 1);
}

/** Data range of one Daily_Inputs column, e.g. `Daily_Inputs!D4:D35`. */
export function dailyRange(header: DailyInputHeader, config: ScorecardConfig): string {
  const col = dailyColumn(header);
  return sheetRef(SHEET_NAMES.dailyInputs, `${col}${DAILY_FIRST_DATA_ROW}:${col}${dailyLastRow(config)}`);
}

const DAYS_REPORTED = sheetRef(SHEET_NAMES.dailyInputs, DAILY_DAYS_REPORTED_CELL);

const PRINT_MARGINS = { left: 0.3, right: 0.3, top: 0.5, bottom: 0.5, header: 0.3, footer: 0.3 };

// ------------------------------------------------------------
// Assumptions
// ------------------------------------------------------------

export function buildAssumptionsSheet(config: ScorecardConfig): SheetSpec {
  const { month, assumptions: a } = config;
  const sheet = new SheetBuilder(SHEET_NAMES.assumptions)
    .put(cell('A1', `${month} Scorecard – Assumptions`, 'title'));

  const items: Array<[keyof typeof ASSUMPTION_CELLS, string, number | null, StyleId]> = [
    ['overhead', `${month} Overhead`, a.overhead, 'currency'],
    ['cmTarget', `${month} CM Target`, a.cmTarget, 'currency'],
    ['workingDays', `Working Days in ${month}`, a.workingDays, 'int'],
    ['fieldHeadcount', 'Field Headcount', a.fieldHeadcount, 'int'],
    ['hoursPerDay', 'Hours per Day', a.hoursPerDay, 'int'],
    ['capacityHours', 'Capacity Hours', null, 'input'],
    ['umbRevenueMinimum', 'UMB/D&B Revenue Minimum', a.umbRevenueMinimum, 'currency'],
    ['umbCmPercent', 'UMB/D&B CM %', a.umbCmPercent, 'percent'],
    ['sodConsumption', 'Sod Consumption Forecast (sq ft)', a.sodConsumptionSqFt, 'int'],
    ['sodMarginDelta', 'Sod Margin Delta', a.sodMarginDelta, 'percent'],
    // Left blank for the month owner to fill in.
    ['arDaysPlan', 'AR Days Plan', null, 'input'],
    ['warrantyMaterialTarget', 'Warranty Unbillable Material Target', null, 'input'],
    ['warrantyLaborTarget', 'Warranty Unbillable Labor Hours Target', null, 'input']
  ];

  for (const [key, label, value, style] of items) {
    const ref = ASSUMPTION_CELLS[key];
    sheet.put(cell(`A${ref.slice(1)}`, label, 'label'), cell(ref, value, style));
  }

  const { fieldHeadcount, workingDays, hoursPerDay } = ASSUMPTION_CELLS;
  sheet.put(formula(ASSUMPTION_CELLS.capacityHours, `${fieldHeadcount}*${workingDays}*${hoursPerDay}`, 'input'));

  sheet.put(
    cell('A17', 'Notes', 'label'),
    cell('A18', 'Sod Margin Delta allowed examples: 0.00, 0.05, 0.20', 'wrap'),
    cell('A19', 'Headcount variance = projected average headcount - forecast headcount', 'wrap')
  );

  return sheet.cols({ min: 1, max: 1, width: 48 }, { min: 2, max: 2, width: 22 }).build();
}

// ------------------------------------------------------------
// Forecast
// ------------------------------------------------------------

export function forecastHeaders(month: string): string[] {
  return ['Category', `${month} Revenue Forecast`, 'CM %', 'CM $ (calculated)', 'Required Labor Hours', 'Notes'];
}

export function buildForecastSheet(config: ScorecardConfig): SheetSpec {
  const headers = forecastHeaders(config.month);
  const sheet = new SheetBuilder(SHEET_NAMES.forecast)
    .put(cell('A1', `${config.month} Forecast`, 'title'))
    .headers('A3', headers);

  const categories: Array<[number, string]> = [
    [FORECAST_ROWS.production, 'Production'],
    [FORECAST_ROWS.ld, 'LD'],
    [FORECAST_ROWS.umb, 'UMB/D&B']
  ];

  for (const [r, name] of categories) {
    sheet.put(
      cell(`A${r}`, name, 'text'),
      cell(`B${r}`, 0, 'currency'),
      cell(`C${r}`, 0, 'percent'),
      formula(`D${r}`, `B${r}*C${r}`, 'currency'),
      cell(`E${r}`, 0, 'int'),
      cell(`F${r}`, '', 'wrap')
    );
  }

  // UMB/D&B is driven by the contractual minimum, not typed in.
  const umb = FORECAST_ROWS.umb;
  sheet.put(
    formula(`B${umb}`, assumption('umbRevenueMinimum'), 'currency'),
    formula(`C${umb}`, assumption('umbCmPercent'), 'percent')
  );

  const first = FORECAST_ROWS.production;
  const last = FORECAST_ROWS.umb;
  const t = FORECAST_ROWS.totals;
  sheet.put(
    cell(`A${t}`, 'Totals', 'total'),
    formula(`B${t}`, `SUM(B${first}:B${last})`, 'total'),
    formula(`D${t}`, `SUM(D${first}:D${last})`, 'total'),
    formula(`E${t}`, `SUM(E${first}:E${last})`, 'total')
  );

  return sheet
    .cols(
      { min: 1, max: 1, width: 18 },
      { min: 2, max: 2, width: 20 },
      { min: 3, max: 3, width: 10 },
      { min: 4, max: 4, width: 16 },
      { min: 5, max: 5, width: 20 },
      { min: 6, max: 6, width: 26 }
    )
    .freeze({ xSplit: 0, ySplit: 3, topLeftCell: 'A4' })
    .table({ name: TABLE_NAMES.forecast, topLeft: 'A3', columns: headers, rowCount: last - first + 1 })
    .build();
}

// ------------------------------------------------------------
// Daily_Inputs
// ------------------------------------------------------------

const DAILY_COLUMN_STYLES: Record<DailyInputHeader, StyleId> = {
  Date: 'date',
  Revenue_Production: 'currency',
  Revenue_LD: 'currency',
  Revenue_UMB_D_B: 'currency',
  CM_Production: 'currency',
  CM_LD: 'currency',
  CM_UMB_D_B: 'currency',
  Headcount_Field: 'int',
  Hours_Worked: 'int',
  Warranty_Unbillable_Material: 'currency',
  Warranty_Unbillable_Labor_Hours: 'int'
};

export function buildDailyInputsSheet(config: ScorecardConfig): SheetSpec {
  const first = DAILY_FIRST_DATA_ROW;
  const last = dailyLastRow(config);
  const flag = DAILY_DISTINCT_FLAG_COLUMN;

  const sheet = new SheetBuilder(SHEET_NAMES.dailyInputs)
    .put(cell('A1', 'Daily Inputs (enter daily results)', 'title'))
    .headers(`A${DAILY_HEADER_ROW}`, DAILY_INPUT_HEADERS);

  for (let r = first; r <= last; r++) {
    DAILY_INPUT_HEADERS.forEach((header, i) => {
      sheet.put(cell(`${columnLetter(i + 1)}${r}`, null, DAILY_COLUMN_STYLES[header]));
    });
    // 1 on the first row carrying a given date, so repeated dates count once.
    sheet.put(formula(`${flag}${r}`, `IF(A${r}="","",IF(COUNTIF($A$${first}:A${r},A${r})=1,1,0))`, 'int'));
  }

  sheet.put(formula(DAILY_DAYS_REPORTED_CELL, `SUM(${flag}${first}:${flag}${last})`, 'int'));

  return sheet
    .cols(
      { min: 1, max: 1, width: 12 },
      { min: 2, max: 4, width: 16 },
      { min: 5, max: 7, width: 14 },
      { min: 8, max: 9, width: 12 },
      { min: 10, max: 11, width: 24 },
      { min: 13, max: 14, width: 12, hidden: true }
    )
    .freeze({ xSplit: 1, ySplit: 3, topLeftCell: 'B4' })
    .table({
      name: TABLE_NAMES.dailyInputs,
      topLeft: `A${DAILY_HEADER_ROW}`,
      columns: DAILY_INPUT_HEADERS,
      rowCount: config.dailyInputRows
    })
    .build();
}

// ------------------------------------------------------------
// Scorecard
// ------------------------------------------------------------

interface RunRateMetric {
  row: number;
  label: string;
  forecast: string;
  daily: DailyInputHeader;
  style: StyleId;
  /** Variance stays blank until the Assumptions target is filled in. */
  targetOptional: boolean;
}

export function buildScorecardSheet(config: ScorecardConfig): SheetSpec {
  const { month } = config;
  const R = SCORECARD_ROWS;
  const forecast = (ref: string) => sheetRef(SHEET_NAMES.forecast, ref);
  const workingDays = assumption('workingDays');

  const sheet = new SheetBuilder(SHEET_NAMES.scorecard)
    .put(
      cell('A1', `${month} Scorecard (Executive View)`, 'title'),
      cell('A2', 'Revenue = Completed and Billed Only', 'label')
    )
    .headers('A3', ['Metric', `${month} Forecast`, 'MTD Actual', 'Avg per Day', 'Projected Month', 'Variance vs Forecast']);

  const runRate: RunRateMetric[] = [
    { row: R.revenueUmb, label: 'Revenue D&B/UMB', forecast: forecast(`B${FORECAST_ROWS.umb}`), daily: 'Revenue_UMB_D_B', style: 'currency', targetOptional: false },
    { row: R.revenueLd, label: 'Revenue LD', forecast: forecast(`B${FORECAST_ROWS.ld}`), daily: 'Revenue_LD', style: 'currency', targetOptional: false },
    { row: R.revenueProduction, label: 'Revenue Production', forecast: forecast(`B${FORECAST_ROWS.production}`), daily: 'Revenue_Production', style: 'currency', targetOptional: false },
    { row: R.cmUmb, label: 'CM D&B/UMB', forecast: forecast(`D${FORECAST_ROWS.umb}`), daily: 'CM_UMB_D_B', style: 'currency', targetOptional: false },
    { row: R.cmLd, label: 'CM LD', forecast: forecast(`D${FORECAST_ROWS.ld}`), daily: 'CM_LD', style: 'currency', targetOptional: false },
    { row: R.cmProduction, label: 'CM Production', forecast: forecast(`D${FORECAST_ROWS.production}`), daily: 'CM_Production', style: 'currency', targetOptional: false },
    { row: R.warrantyMaterial, label: 'Warranty Unbillable Material', forecast: optionalAssumption('warrantyMaterialTarget'), daily: 'Warranty_Unbillable_Material', style: 'currency', targetOptional: true },
    { row: R.warrantyLabor, label: 'Warranty Unbillable Labor', forecast: optionalAssumption('warrantyLaborTarget'), daily: 'Warranty_Unbillable_Labor_Hours', style: 'int', targetOptional: true }
  ];

  for (const m of runRate) {
    const r = m.row;
    sheet.put(
      cell(`A${r}`, m.label, 'label'),
      formula(`B${r}`, m.forecast, m.style),
      formula(`C${r}`, `SUM(${dailyRange(m.daily, config)})`, m.style),
      formula(`D${r}`, `IFERROR(C${r}/${DAYS_REPORTED},0)`, m.style),
      formula(`E${r}`, `D${r}*${workingDays}`, m.style),
      formula(`F${r}`, m.targetOptional ? `IF(B${r}="","",E${r}-B${r})` : `E${r}-B${r}`, m.style)
    );
  }

  const hc = R.headcount;
  sheet.put(
    cell(`A${hc}`, 'Headcount', 'label'),
    formula(`B${hc}`, assumption('fieldHeadcount'), 'int'),
    formula(
      `C${hc}`,
      `IFERROR(AVERAGEIFS(${dailyRange('Headcount_Field', config)},${dailyRange('Date', config)},"<>"),0)`,
      'int'
    ),
    formula(`D${hc}`, `C${hc}`, 'int'),
    formula(`E${hc}`, `C${hc}`, 'int'),
    formula(`F${hc}`, `E${hc}-B${hc}`, 'int')
  );

  const lu = R.laborUtilization;
  sheet.put(
    cell(`A${lu}`, 'Labor Utilization %', 'label'),
    formula(`B${lu}`, `IFERROR(${forecast(`E${FORECAST_ROWS.totals}`)}/${assumption('capacityHours')},0)`, 'percent'),
    formula(
      `C${lu}`,
      `IFERROR(SUM(${dailyRange('Hours_Worked', config)})/(C${hc}*${assumption('hoursPerDay')}*${DAYS_REPORTED}),0)`,
      'percent'
    ),
    formula(`D${lu}`, `C${lu}`, 'percent'),
    formula(`E${lu}`, `C${lu}`, 'percent'),
    formula(`F${lu}`, `E${lu}-B${lu}`, 'percent')
  );

  // AR days actual is typed in from the AR detail export.
  const ar = R.arDays;
  sheet.put(
    cell(`A${ar}`, 'AR Days to Pay (Plan vs Actual)', 'label'),
    formula(`B${ar}`, optionalAssumption('arDaysPlan'), 'int'),
    cell(`C${ar}`, null, 'input'),
    cell(`D${ar}`, null, 'text'),
    cell(`E${ar}`, null, 'text'),
    formula(`F${ar}`, `IF(B${ar}="","",IF(C${ar}="","",C${ar}-B${ar}))`, 'int')
  );

  const wm = R.warrantyMaterial;
  const wl = R.warrantyLabor;

  return sheet
    .highlight({
      ref: `F${R.revenueUmb}:F${lu} F${wm}:F${wl}`,
      rule: { type: 'cellIs', operator: 'lessThan', value: 0 }
    })
    .highlight({
      ref: `C${ar}`,
      rule: { type: 'expression', formula: `AND($B${ar}<>"",$C${ar}<>"",$C${ar}>$B${ar})` }
    })
    .highlight({
      ref: `E${wm}:E${wl}`,
      rule: { type: 'expression', formula: `AND($B${wm}<>"",$E${wm}>$B${wm})` }
    })
    .cols({ min: 1, max: 1, width: 38 }, { min: 2, max: 6, width: 18 })
    .freeze({ xSplit: 1, ySplit: 3, topLeftCell: 'B4' })
    .print({
      orientation: 'landscape',
      fitToWidth: 1,
      fitToHeight: 0,
      margins: PRINT_MARGINS,
      printArea: `A1:F${wl}`,
      printTitlesRow: '3:3'
    })
    .build();
}

// ------------------------------------------------------------
// Capacity
// ------------------------------------------------------------

export function buildCapacitySheet(config: ScorecardConfig): SheetSpec {
  return new SheetBuilder(SHEET_NAMES.capacity)
    .put(
      cell('A1', 'Capacity Overview', 'title'),
      cell('A3', 'Available Capacity Hours', 'label'),
      formula('B3', assumption('capacityHours'), 'int'),
      cell('A4', 'Required Hours', 'label'),
      formula('B4', sheetRef(SHEET_NAMES.forecast, `E${FORECAST_ROWS.totals}`), 'int'),
      cell('A5', 'Actual Hours Worked', 'label'),
      formula('B5', `SUM(${dailyRange('Hours_Worked', config)})`, 'int'),
      cell('A6', 'Remaining Capacity', 'label'),
      formula('B6', 'B3-B5', 'int'),
      cell('A7', 'Utilization %', 'label'),
      formula('B7', 'IFERROR(B5/B3,0)', 'percent')
    )
    .highlight({ ref: 'B7', rule: { type: 'cellIs', operator: 'greaterThan', value: 0.95 } })
    .cols({ min: 1, max: 1, width: 32 }, { min: 2, max: 2, width: 20 })
    .build();
}

// ------------------------------------------------------------
// Cashflow
// ------------------------------------------------------------

export const CASHFLOW_HEADERS = [
  'Week',
  'Beginning Cash',
  'Revenue Collected',
  'Overhead Allocation',
  'Payroll Placeholder',
  'Equipment Proceeds',
  'Bowman Cash',
  'Ending Cash'
] as const;

export function buildCashflowSheet(config: ScorecardConfig): SheetSpec {
  const weeks = config.cashflowWeeks;
  const scorecard = (row: number) => sheetRef(SHEET_NAMES.scorecard, `E${row}`);
  const projectedRevenue = [
    SCORECARD_ROWS.revenueUmb,
    SCORECARD_ROWS.revenueLd,
    SCORECARD_ROWS.revenueProduction
  ].map(scorecard).join('+');

  const sheet = new SheetBuilder(SHEET_NAMES.cashflow)
    .put(cell('A1', `Weekly Cashflow - ${config.month}`, 'title'))
    .headers('A3', CASHFLOW_HEADERS);

  const firstWeekRow = 4;
  for (let week = 1; week <= weeks; week++) {
    const r = firstWeekRow + week - 1;
    sheet.put(
      cell(`A${r}`, `Week ${week}`, 'text'),
      week === 1 ? cell(`B${r}`, 0, 'currency') : formula(`B${r}`, `H${r - 1}`, 'currency'),
      formula(`C${r}`, `(${projectedRevenue})/${weeks}`, 'currency'),
      formula(`D${r}`, `${assumption('overhead')}/${weeks}`, 'currency'),
      cell(`E${r}`, 0, 'currency'),
      cell(`F${r}`, 0, 'currency'),
      cell(`G${r}`, 0, 'currency'),
      formula(`H${r}`, `B${r}+C${r}-D${r}-E${r}+F${r}+G${r}`, 'currency')
    );
  }

  const scenarioRow = firstWeekRow + weeks + 2;
  ['Scenario Placeholders', 'Base Case', 'Conservative Case', 'Stress Case'].forEach((label, i) => {
    sheet.put(cell(`A${scenarioRow + i}`, label, 'label'));
  });

  return sheet
    .cols({ min: 1, max: 1, width: 14 }, { min: 2, max: 8, width: 18 })
    .table({ name: TABLE_NAMES.cashflow, topLeft: 'A3', columns: CASHFLOW_HEADERS, rowCount: weeks })
    .build();
}

// ------------------------------------------------------------
// Workbook
// ------------------------------------------------------------

export function buildScorecardWorkbookSpec(
  config: ScorecardConfig = DEFAULT_SCORECARD_CONFIG
): WorkbookSpec {
  return {
    creator: config.creator,
    documentDate: config.documentDate,
    sheets: [
      buildAssumptionsSheet(config),
      buildForecastSheet(config),
      buildDailyInputsSheet(config),
      buildScorecardSheet(config),
      buildCapacitySheet(config),
      buildCashflowSheet(config)
    ]
  };
}
