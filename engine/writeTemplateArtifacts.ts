// engine/writeTemplateArtifacts.ts
// Writes every template artifact into one directory under its fixed name.

import fs from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_SCORECARD_CONFIG, type ScorecardConfig } from './config';
import { ErrorCodes, TemplateGenerationError } from './errorCodes';
import { renderAllTemplateArtifacts, type TemplateArtifactKind } from './templateArtifacts';

export interface WrittenArtifact {
  kind: TemplateArtifactKind;
  path: string;
  bytes: number;
}

export async function writeTemplateArtifacts(
  outDir: string,
  config: ScorecardConfig = DEFAULT_SCORECARD_CONFIG
): Promise<WrittenArtifact[]> {
  // Render everything first: a structure error leaves no file behind.
  const artifacts = await renderAllTemplateArtifacts(config);

  const written: WrittenArtifact[] = [];
  for (const artifact of artifacts) {
    const target = path.join(outDir, artifact.filename);
    try {
      await fs.writeFile(target, artifact.body);
    } catch (err) {
      throw new TemplateGenerationError(
        ErrorCodes.OUTPUT_WRITE_FAILED,
        `Could not write ${target}.`,
        { cause: err }
      );
    }
    written.push({ kind: artifact.kind, path: target, bytes: artifact.body.length });
  }
  return written;
}
