// engine/templateArtifacts.ts
// Renders the three template artifacts in memory. Used by the CLI (writes to
// disk) and by the download endpoint (streams one artifact).

import { DEFAULT_SCORECARD_CONFIG, type ScorecardConfig } from './config';
import { CSV_CONTENT_TYPE, XLSX_CONTENT_TYPE } from './constants';
import { buildArDetailCsv, buildDailyInputsCsv } from './csvTemplates';
import { buildScorecardWorkbookBuffer } from './scorecardWorkbook';

export const TEMPLATE_ARTIFACT_KINDS = ['workbook', 'daily_inputs', 'ar_detail'] as const;

export type TemplateArtifactKind = (typeof TEMPLATE_ARTIFACT_KINDS)[number];

export interface TemplateArtifact {
  kind: TemplateArtifactKind;
  filename: string;
  contentType: string;
  body: Buffer;
}

export function isTemplateArtifactKind(value: unknown): value is TemplateArtifactKind {
  return typeof value === 'string' && (TEMPLATE_ARTIFACT_KINDS as readonly string[]).includes(value);
}

export async function renderTemplateArtifact(
  kind: TemplateArtifactKind,
  config: ScorecardConfig = DEFAULT_SCORECARD_CONFIG
): Promise<TemplateArtifact> {
  switch (kind) {
    case 'workbook':
      return {
        kind,
        filename: config.files.workbook,
        contentType: XLSX_CONTENT_TYPE,
        body: await buildScorecardWorkbookBuffer(config)
      };
    case 'daily_inputs':
      return {
        kind,
        filename: config.files.dailyInputsCsv,
        contentType: CSV_CONTENT_TYPE,
        body: Buffer.from(buildDailyInputsCsv(), 'utf-8')
      };
    case 'ar_detail':
      return {
        kind,
        filename: config.files.arDetailCsv,
        contentType: CSV_CONTENT_TYPE,
        body: Buffer.from(buildArDetailCsv(), 'utf-8')
      };
  }
}

export async function renderAllTemplateArtifacts(
  config: ScorecardConfig = DEFAULT_SCORECARD_CONFIG
): Promise<TemplateArtifact[]> {
  const artifacts: TemplateArtifact[] = [];
  for (const kind of TEMPLATE_ARTIFACT_KINDS) {
    artifacts.push(await renderTemplateArtifact(kind, config));
  }
  return artifacts;
}
