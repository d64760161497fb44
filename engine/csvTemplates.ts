// engine/csvTemplates.ts
// Header-only CSV entry templates. One header row, CRLF, no data rows.

import { stringify } from 'csv-stringify/sync';
import { AR_DETAIL_HEADERS, DAILY_INPUT_HEADERS } from './constants';

export function buildHeaderOnlyCsv(headers: readonly string[]): string {
  return stringify([[...headers]], { record_delimiter: 'windows' });
}

export function buildDailyInputsCsv(): string {
  return buildHeaderOnlyCsv(DAILY_INPUT_HEADERS);
}

export function buildArDetailCsv(): string {
  return buildHeaderOnlyCsv(AR_DETAIL_HEADERS);
}
