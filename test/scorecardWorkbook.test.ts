import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';

import { absolutePrintArea } from '../engine/excelExport';
import { buildScorecardWorkbook, buildScorecardWorkbookBuffer } from '../engine/scorecardWorkbook';
import type { Workbook, Worksheet } from 'exceljs';

async function readParts(buffer: Buffer): Promise<Map<string, string>> {
  const zip = await JSZip.loadAsync(buffer);
  const parts = new Map<string, string>();
  for (const name of Object.keys(zip.files).sort()) {
    const entry = zip.file(name);
    if (entry) parts.set(name, await entry.async('string'));
  }
  return parts;
}

function worksheetOf(workbook: Workbook, name: string): Worksheet {
  const worksheet = workbook.getWorksheet(name);
  if (!worksheet) throw new Error(`missing worksheet ${name}`);
  return worksheet;
}

describe('scorecard workbook package', () => {
  it('contains six worksheet parts', async () => {
    const parts = await readParts(await buildScorecardWorkbookBuffer());
    const worksheets = [...parts.keys()].filter(name => /^xl\/worksheets\/sheet\d+\.xml$/.test(name));
    expect(worksheets).toHaveLength(6);
  });

  it('lists only parts that exist and every worksheet and table part it writes', async () => {
    const parts = await readParts(await buildScorecardWorkbookBuffer());
    const manifest = parts.get('[Content_Types].xml') ?? '';
    const overrides = [...manifest.matchAll(/PartName="\/([^"]+)"/g)].map(m => m[1]);

    expect(overrides.length).toBeGreaterThan(0);
    for (const part of overrides) {
      expect(parts.has(part), part).toBe(true);
    }

    const bound = [...parts.keys()].filter(name => /^xl\/(worksheets\/sheet|tables\/table)\d+\.xml$/.test(name));
    expect(bound).toHaveLength(9);
    for (const part of bound) {
      expect(overrides, part).toContain(part);
    }
  });

  it('declares each table over its header and populated rows', async () => {
    const parts = await readParts(await buildScorecardWorkbookBuffer());
    const tables: Record<string, string> = {};
    for (const [name, xml] of parts) {
      if (!name.startsWith('xl/tables/')) continue;
      const tableName = / name="([^"]+)"/.exec(xml)?.[1];
      const ref = / ref="([^"]+)"/.exec(xml)?.[1];
      if (tableName && ref) tables[tableName] = ref;
    }

    expect(tables).toEqual({
      tblForecast: 'A3:F6',
      tblDailyInputs: 'A3:K35',
      tblCashflow: 'A3:H7'
    });
  });

  it('escapes text and formulas for the XML parts', async () => {
    const parts = await readParts(await buildScorecardWorkbookBuffer());
    const all = [...parts.values()].join('\n');

    expect(all).toContain('UMB/D&amp;B Revenue Minimum');

    const scorecardXml = [...parts.values()].find(xml => xml.includes('AVERAGEIFS'));
    expect(scorecardXml).toContain('&lt;&gt;');
    expect(scorecardXml).toContain('sqref="F4:F11 F13:F14"');
  });

  it('writes formulas without a leading equals sign', async () => {
    const parts = await readParts(await buildScorecardWorkbookBuffer());
    const forecastXml = [...parts.values()].find(xml => xml.includes('<f>SUM(B4:B6)</f>'));
    expect(forecastXml).toBeDefined();
  });

  it('defines the Scorecard print area with absolute rows and columns', async () => {
    const parts = await readParts(await buildScorecardWorkbookBuffer());
    const workbookXml = parts.get('xl/workbook.xml');
    expect(workbookXml).toContain('_xlnm.Print_Area');
    expect(workbookXml).toContain("'Scorecard'!$A$1:$F$14");
  });

  it('links optional Scorecard targets through an empty-text guard', async () => {
    const parts = await readParts(await buildScorecardWorkbookBuffer());
    const scorecardXml = [...parts.values()].find(xml => xml.includes('AVERAGEIFS'));
    expect(scorecardXml).toContain('<f>IF(Assumptions!B14=&quot;&quot;,&quot;&quot;,Assumptions!B14)</f>');
    expect(scorecardXml).toContain('<f>IF(Assumptions!B13=&quot;&quot;,&quot;&quot;,Assumptions!B13)</f>');
  });

  it('gives every highlight rule the same differential format', async () => {
    const parts = await readParts(await buildScorecardWorkbookBuffer());
    const dxfs = (parts.get('xl/styles.xml') ?? '').match(/<dxf>[\s\S]*?<\/dxf>/g) ?? [];
    expect(dxfs).toHaveLength(4);
    expect(new Set(dxfs).size).toBe(1);
    expect(dxfs[0]).toContain('FFFFC7CE');
    expect(dxfs[0]).toContain('FF9C0006');
  });

  it('produces identical part contents when regenerated', async () => {
    const first = await readParts(await buildScorecardWorkbookBuffer());
    const second = await readParts(await buildScorecardWorkbookBuffer());

    expect([...second.keys()]).toEqual([...first.keys()]);
    for (const [name, xml] of first) {
      expect(second.get(name), name).toBe(xml);
    }
  });
});

describe('assembled worksheets', () => {
  const workbook = buildScorecardWorkbook();

  it('orders worksheets as the workbook lists them', () => {
    expect(workbook.worksheets.map(ws => ws.name)).toEqual([
      'Assumptions',
      'Forecast',
      'Daily_Inputs',
      'Scorecard',
      'Capacity',
      'Cashflow'
    ]);
  });

  it('stamps document metadata from config', () => {
    expect(workbook.creator).toBe('Scorecard Template Generator');
    expect(workbook.created.toISOString()).toBe('2025-03-01T00:00:00.000Z');
  });

  it('keeps cell formats on table-bound cells', () => {
    const forecast = worksheetOf(workbook, 'Forecast');
    expect(forecast.getCell('D4').formula).toBe('B4*C4');
    expect(forecast.getCell('D4').numFmt).toBe('$#,##0');
    expect(forecast.getCell('C4').numFmt).toBe('0.0%');
    expect(forecast.getCell('B8').formula).toBe('SUM(B4:B6)');
  });

  it('leaves daily input rows blank but formatted', () => {
    const daily = worksheetOf(workbook, 'Daily_Inputs');
    expect(daily.getCell('A4').value).toBeNull();
    expect(daily.getCell('A4').numFmt).toBe('mm-dd-yy');
    expect(daily.getCell('B35').numFmt).toBe('$#,##0');
    expect(daily.getCell('N2').formula).toBe('SUM(M4:M35)');
  });

  it('hides the helper columns and sets widths', () => {
    const daily = worksheetOf(workbook, 'Daily_Inputs');
    expect(daily.getColumn(13).hidden).toBe(true);
    expect(daily.getColumn(14).hidden).toBe(true);
    expect(daily.getColumn(1).width).toBe(12);
    expect(daily.getColumn(11).width).toBe(24);
  });

  it('freezes header rows', () => {
    expect(worksheetOf(workbook, 'Daily_Inputs').views[0]).toMatchObject({
      state: 'frozen',
      xSplit: 1,
      ySplit: 3,
      topLeftCell: 'B4'
    });
    expect(worksheetOf(workbook, 'Capacity').views).toEqual([]);
  });

  it('prints the Scorecard landscape on one page width', () => {
    expect(worksheetOf(workbook, 'Scorecard').pageSetup).toMatchObject({
      orientation: 'landscape',
      fitToPage: true,
      fitToWidth: 1,
      fitToHeight: 0,
      printArea: 'A$1:F$14',
      printTitlesRow: '3:3'
    });
  });

  it('anchors print area rows for the defined name', () => {
    expect(absolutePrintArea('A1:F14')).toBe('A$1:F$14');
    expect(absolutePrintArea('B2')).toBe('B$2');
  });
});
