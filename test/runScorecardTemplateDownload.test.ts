import type { VercelRequest, VercelResponse } from '@vercel/node';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../engine/templateArtifacts', async importOriginal => {
  const actual = await importOriginal<typeof import('../engine/templateArtifacts')>();
  return {
    ...actual,
    renderTemplateArtifact: vi.fn(actual.renderTemplateArtifact)
  };
});

import handler from '../api/runScorecardTemplateDownload';
import { ErrorCodes, TemplateGenerationError } from '../engine/errorCodes';
import { renderTemplateArtifact } from '../engine/templateArtifacts';

class ResponseRecorder {
  statusCode = 200;
  headers: Record<string, string | number> = {};
  body: unknown = undefined;
  ended = false;

  setHeader(name: string, value: string | number): this {
    this.headers[name.toLowerCase()] = value;
    return this;
  }

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    this.ended = true;
    return this;
  }

  send(body: unknown): this {
    this.body = body;
    this.ended = true;
    return this;
  }

  end(): this {
    this.ended = true;
    return this;
  }
}

async function call(method: string, query: Record<string, string | string[]> = {}): Promise<ResponseRecorder> {
  const req = { method, query } as unknown as VercelRequest;
  const res = new ResponseRecorder();
  await handler(req, res as unknown as VercelResponse);
  return res;
}

describe('runScorecardTemplateDownload', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rejects other methods with 405 and an Allow header', async () => {
    const res = await call('POST', { file: 'workbook' });
    expect(res.statusCode).toBe(405);
    expect(res.headers['allow']).toBe('GET, HEAD');
    expect(res.body).toEqual({ error: 'Method Not Allowed' });
  });

  it('rejects an unknown file with 400 and E601', async () => {
    const res = await call('GET', { file: 'pdf' });
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ error_code: 'E601' });
  });

  it('serves the daily inputs CSV as an attachment', async () => {
    const res = await call('GET', { file: 'daily_inputs' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="Daily_Inputs_Template.csv"');
    expect(Buffer.isBuffer(res.body)).toBe(true);
    expect(res.headers['content-length']).toBe(Buffer.byteLength(String(res.body)));
  });

  it('takes the first value of a repeated file parameter', async () => {
    const res = await call('GET', { file: ['ar_detail', 'workbook'] });
    expect(res.headers['content-disposition']).toBe('attachment; filename="AR_Detail_Template.csv"');
  });

  it('falls back to the workbook when file is missing or empty', async () => {
    const missing = await call('GET');
    expect(missing.headers['content-disposition']).toBe('attachment; filename="March_Scorecard_Template.xlsx"');

    const empty = await call('GET', { file: '  ' });
    expect(empty.statusCode).toBe(200);
    expect(empty.headers['content-disposition']).toBe('attachment; filename="March_Scorecard_Template.xlsx"');
  });

  it('answers HEAD with headers only', async () => {
    const res = await call('HEAD', { file: 'ar_detail' });
    expect(res.statusCode).toBe(200);
    expect(res.ended).toBe(true);
    expect(res.body).toBeUndefined();
    expect(res.headers['content-disposition']).toBe('attachment; filename="AR_Detail_Template.csv"');
    expect(res.headers['content-length']).toBeGreaterThan(0);
  });

  it('reports a render failure as 500 with E502', async () => {
    vi.mocked(renderTemplateArtifact).mockRejectedValueOnce(new Error('write failed'));
    const res = await call('GET', { file: 'workbook' });
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: 'Failed to generate scorecard template.', error_code: ErrorCodes.ARTIFACT_RENDER_FAILED });
  });

  it('passes the code of a generation error through', async () => {
    vi.mocked(renderTemplateArtifact).mockRejectedValueOnce(
      new TemplateGenerationError(ErrorCodes.DANGLING_SHEET_REFERENCE, 'Scorecard!B4 references unknown sheet "Plan".')
    );
    const res = await call('GET', { file: 'workbook' });
    expect(res.statusCode).toBe(500);
    expect(res.body).toMatchObject({ error_code: 'E301' });
  });
});
