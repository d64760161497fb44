import type { VercelRequest, VercelResponse } from '@vercel/node';
import {
  ErrorCodeDescriptions,
  ErrorCodes,
  isTemplateGenerationError
} from '../engine/errorCodes';
import { isTemplateArtifactKind, renderTemplateArtifact } from '../engine/templateArtifacts';

// Renders one scorecard template on demand and returns it as an attachment.
// GET /api/runScorecardTemplateDownload?file=workbook|daily_inputs|ar_detail

function logInfo(event: string, ctx: Record<string, unknown>) {
  console.info(JSON.stringify({ level: 'info', service: 'scorecard-templates', event, ...ctx }));
}
function logWarn(event: string, ctx: Record<string, unknown>) {
  console.warn(JSON.stringify({ level: 'warn', service: 'scorecard-templates', event, ...ctx }));
}
function logError(event: string, ctx: Record<string, unknown>) {
  console.error(JSON.stringify({ level: 'error', service: 'scorecard-templates', event, ...ctx }));
}

function firstQueryValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    res.setHeader('Allow', 'GET, HEAD');
    logWarn('method_not_allowed', { method: req.method });
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  const file = (firstQueryValue(req.query.file) ?? '').trim().toLowerCase() || 'workbook';

  if (!isTemplateArtifactKind(file)) {
    logWarn('unknown_template', { file });
    return res.status(400).json({
      error: ErrorCodeDescriptions[ErrorCodes.UNKNOWN_TEMPLATE_ARTIFACT],
      error_code: ErrorCodes.UNKNOWN_TEMPLATE_ARTIFACT,
      hint: 'Use file=workbook, file=daily_inputs or file=ar_detail.'
    });
  }

  try {
    const artifact = await renderTemplateArtifact(file);

    res.setHeader('Content-Type', artifact.contentType);
    res.setHeader('Content-Disposition', `attachment; filename="${artifact.filename}"`);
    res.setHeader('Content-Length', artifact.body.length);

    logInfo('template_download', { file, bytes: artifact.body.length, method: req.method });

    // HEAD request: headers only
    if (req.method === 'HEAD') {
      return res.status(200).end();
    }

    return res.status(200).send(artifact.body);
  } catch (err) {
    const code = isTemplateGenerationError(err) ? err.code : ErrorCodes.ARTIFACT_RENDER_FAILED;
    logError('template_download_failed', {
      file,
      code,
      message: err instanceof Error ? err.message : String(err)
    });
    return res.status(500).json({ error: 'Failed to generate scorecard template.', error_code: code });
  }
}
