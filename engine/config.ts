// engine/config.ts
// Canonical config for the monthly scorecard templates.

export interface OutputFileNames {
  workbook: string;
  dailyInputsCsv: string;
  arDetailCsv: string;
}

export interface AssumptionDefaults {
  overhead: number;
  cmTarget: number;
  workingDays: number;
  fieldHeadcount: number;
  hoursPerDay: number;
  umbRevenueMinimum: number;
  umbCmPercent: number;
  sodConsumptionSqFt: number;
  sodMarginDelta: number;
}

export interface ScorecardConfig {
  month: string;
  files: OutputFileNames;
  creator: string;
  documentDate: string;      // yyyy-mm-dd, stamped as created/modified
  dailyInputRows: number;    // pre-formatted blank rows on Daily_Inputs
  cashflowWeeks: number;
  assumptions: AssumptionDefaults;
}

export const DEFAULT_SCORECARD_CONFIG: ScorecardConfig = {
  month: 'March',
  files: {
    workbook: 'March_Scorecard_Template.xlsx',
    dailyInputsCsv: 'Daily_Inputs_Template.csv',
    arDetailCsv: 'AR_Detail_Template.csv'
  },
  creator: 'Scorecard Template Generator',
  documentDate: '2025-03-01',
  dailyInputRows: 32,
  cashflowWeeks: 4,
  assumptions: {
    overhead: 560000,
    cmTarget: 296000,
    workingDays: 22,
    fieldHeadcount: 38,
    hoursPerDay: 10,
    umbRevenueMinimum: 165000,
    umbCmPercent: 0.65,
    sodConsumptionSqFt: 921000,
    sodMarginDelta: 0
  }
};
