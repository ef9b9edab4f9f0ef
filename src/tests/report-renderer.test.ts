import fs from 'fs';
import path from 'path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ReportNotSavedError } from '../errors';
import { ReportRenderer } from '../report-renderer';
import type { PatientRecord } from '../types';
import { makeRecord, makeTempDir, solidPng } from './helpers/fixtures';

function recordWithMatches(): PatientRecord {
  return {
    ...makeRecord('Jane Doe', 4),
    matches: [
      { systemId: 'vita-classical', systemName: 'Vita', shade: 'A1', deltaE: 0 },
      { systemId: 'ivoclar-chromascop', systemName: 'Ivoclar Chromascop', shade: '100', deltaE: 5.1 }
    ],
    sampledColor: { r: 255, g: 240, b: 220 },
    sampledHex: '#FFF0DC',
    pdfPath: ''
  };
}

describe('ReportRenderer.renderSummary', () => {
  it('lists patient, colour and one line per system', () => {
    expect(ReportRenderer.renderSummary(recordWithMatches())).toEqual([
      'Patient: Jane Doe (34, Other)',
      'Date: 2026-01-01T09:00:04.000Z',
      'Sampled colour: rgb(255, 240, 220) #FFF0DC [average]',
      'Auto detected shades:',
      '- Vita: A1 (ΔE 0.00)',
      '- Ivoclar Chromascop: 100 (ΔE 5.10)',
      'Manual override: Not used'
    ]);
  });

  it('names the system of a manual override', () => {
    const lines = ReportRenderer.renderSummary({
      ...recordWithMatches(),
      manualOverride: { systemId: 'vita-classical', shade: 'A2' },
      pdfPath: 'reports/jane.pdf'
    });
    expect(lines.slice(-2)).toEqual(['Manual override: A2 (Vita)', 'Report: reports/jane.pdf']);
  });

  it('shows a free-text override as written', () => {
    const lines = ReportRenderer.renderSummary({ ...recordWithMatches(), manualOverride: { shade: 'between A2 and A3' } });
    expect(lines[lines.length - 1]).toBe('Manual override: between A2 and A3');
  });
});

describe('ReportRenderer PDF output', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = makeTempDir();
  });

  it('renders a PDF document', async () => {
    const buffer = await ReportRenderer.renderPdf(recordWithMatches());
    expect(buffer.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('embeds the saved photo when it exists', async () => {
    const imagePath = path.join(dir, 'tooth.png');
    fs.writeFileSync(imagePath, await solidPng(20, 20, { r: 255, g: 240, b: 220 }));

    const withoutImage = await ReportRenderer.renderPdf(recordWithMatches());
    const withImage = await ReportRenderer.renderPdf({ ...recordWithMatches(), imagePath });
    expect(withImage.length).toBeGreaterThan(withoutImage.length);
  });

  it('writes the report to disk', async () => {
    const outputPath = path.join(dir, 'reports', 'jane_shade_report.pdf');
    await expect(ReportRenderer.writePdf(recordWithMatches(), outputPath)).resolves.toBe(outputPath);
    expect(fs.readFileSync(outputPath).subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('raises report not saved when the file cannot be written', async () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'file');
    await expect(ReportRenderer.writePdf(recordWithMatches(), path.join(blocker, 'report.pdf'))).rejects.toThrow(
      ReportNotSavedError
    );
  });
});
