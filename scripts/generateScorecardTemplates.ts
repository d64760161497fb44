#!/usr/bin/env node
// scripts/generateScorecardTemplates.ts
// Writes the scorecard workbook and both CSV entry templates into the
// current working directory.

import path from 'node:path';
import { DEFAULT_SCORECARD_CONFIG } from '../engine/config';
import { isTemplateGenerationError } from '../engine/errorCodes';
import { writeTemplateArtifacts } from '../engine/writeTemplateArtifacts';

function logInfo(event: string, ctx: Record<string, unknown>) {
  console.info(JSON.stringify({ level: 'info', service: 'scorecard-templates', event, ...ctx }));
}
function logError(event: string, ctx: Record<string, unknown>) {
  console.error(JSON.stringify({ level: 'error', service: 'scorecard-templates', event, ...ctx }));
}

async function main(): Promise<void> {
  const outDir = process.cwd();
  const config = DEFAULT_SCORECARD_CONFIG;
  logInfo('generation_started', { out_dir: outDir, month: config.month });

  const written = await writeTemplateArtifacts(outDir, config);
  for (const artifact of written) {
    logInfo('artifact_written', { kind: artifact.kind, path: artifact.path, bytes: artifact.bytes });
  }

  logInfo('generation_completed', { files: written.length });
  console.log(`Generated ${written.map(a => path.basename(a.path)).join(', ')}`);
}

main().catch((err: unknown) => {
  logError('generation_failed', {
    code: isTemplateGenerationError(err) ? err.code : undefined,
    message: err instanceof Error ? err.message : String(err),
    cause: isTemplateGenerationError(err) && err.cause instanceof Error ? err.cause.message : undefined
  });
  process.exitCode = 1;
});
