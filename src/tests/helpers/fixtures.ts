import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import type { PatientRecord, Rgb } from '../../types';

export function makeTempDir(prefix: string = 'shade-matcher-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function solidPng(width: number, height: number, color: Rgb): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: color } }).png().toBuffer();
}

/**
 * PNG from row-major pixels
 */
export function pngFromPixels(width: number, height: number, pixels: Rgb[]): Promise<Buffer> {
  const data = Buffer.alloc(width * height * 3);
  pixels.forEach((pixel, index) => {
    data[index * 3] = pixel.r;
    data[index * 3 + 1] = pixel.g;
    data[index * 3 + 2] = pixel.b;
  });
  return sharp(data, { raw: { width, height, channels: 3 } }).png().toBuffer();
}

export function makeRecord(name: string, index: number = 0): PatientRecord {
  return {
    id: `record-${index}`,
    patient: { name, age: 30 + index, sex: 'Other' },
    sampledColor: { r: 230, g: 210, b: 190 },
    sampledHex: '#E6D2BE',
    samplingMode: 'average',
    matches: [{ systemId: 'vita-classical', systemName: 'Vita', shade: 'A3', deltaE: 1.79 }],
    manualOverride: null,
    imagePath: `images/saved_${index}.jpg`,
    pdfPath: `reports/${index}_shade_report.pdf`,
    createdAt: new Date(Date.UTC(2026, 0, 1, 9, 0, index)).toISOString()
  };
}
