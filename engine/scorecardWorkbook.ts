// engine/scorecardWorkbook.ts
// Package assembler: single source of truth for the scorecard .xlsx.
// exceljs derives the manifest, relationship parts and table parts from the
// one workbook model, so they always match the sheets written.

import ExcelJS from 'exceljs';
import { DEFAULT_SCORECARD_CONFIG, type ScorecardConfig } from './config';
import { ErrorCodes, TemplateGenerationError } from './errorCodes';
import { assembleSheet } from './excelExport';
import { buildScorecardWorkbookSpec } from './scorecardSheets';
import { inspectWorkbookSpec } from './workbookChecks';
import type { WorkbookSpec } from './excelTypes';

export function assembleWorkbook(spec: WorkbookSpec): ExcelJS.Workbook {
  const issues = inspectWorkbookSpec(spec);
  if (issues.length > 0) {
    throw new TemplateGenerationError(
      issues[0].code,
      `Workbook structure check failed:\n${issues.map(i => `[${i.code}] ${i.message}`).join('\n')}`
    );
  }

  const workbook = new ExcelJS.Workbook();
  workbook.creator = spec.creator;
  workbook.lastModifiedBy = spec.creator;

  // Fixed stamp keeps regenerated packages identical.
  const stamp = new Date(`${spec.documentDate}T00:00:00.000Z`);
  if (!Number.isNaN(stamp.getTime())) {
    workbook.created = stamp;
    workbook.modified = stamp;
  }

  // Formula cells are written without cached results.
  workbook.calcProperties.fullCalcOnLoad = true;

  for (const sheet of spec.sheets) {
    assembleSheet(workbook, sheet);
  }

  return workbook;
}

export function buildScorecardWorkbook(
  config: ScorecardConfig = DEFAULT_SCORECARD_CONFIG
): ExcelJS.Workbook {
  return assembleWorkbook(buildScorecardWorkbookSpec(config));
}

export async function buildScorecardWorkbookBuffer(
  config: ScorecardConfig = DEFAULT_SCORECARD_CONFIG
): Promise<Buffer> {
  const workbook = buildScorecardWorkbook(config);
  try {
    const buffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  } catch (err) {
    throw new TemplateGenerationError(
      ErrorCodes.ARTIFACT_RENDER_FAILED,
      `Failed to serialize ${config.files.workbook}.`,
      { cause: err }
    );
  }
}
