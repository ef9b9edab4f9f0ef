import fs from 'fs';
import path from 'path';
import PDFDocument from 'pdfkit';
import { formatRgb } from './color-space';
import { ReportNotSavedError } from './errors';
import type { PatientRecord } from './types';

const REPORT_TITLE = 'Tooth Shade Report';

function describeOverride(record: PatientRecord): string {
  const override = record.manualOverride;
  if (!override) {
    return 'Not used';
  }
  if (!override.systemId) {
    return override.shade;
  }
  const systemName = record.matches.find(match => match.systemId === override.systemId)?.systemName ?? override.systemId;
  return `${override.shade} (${systemName})`;
}

export class ReportRenderer {
  /**
   * Plain-text summary shown after an analysis or a history lookup
   */
  static renderSummary(record: PatientRecord): string[] {
    const { patient } = record;
    const lines = [
      `Patient: ${patient.name} (${patient.age}, ${patient.sex})`,
      `Date: ${record.createdAt}`,
      `Sampled colour: ${formatRgb(record.sampledColor)} ${record.sampledHex} [${record.samplingMode}]`,
      'Auto detected shades:',
      ...record.matches.map(match => `- ${match.systemName}: ${match.shade} (ΔE ${match.deltaE.toFixed(2)})`),
      `Manual override: ${describeOverride(record)}`
    ];
    if (record.pdfPath) {
      lines.push(`Report: ${record.pdfPath}`);
    }
    return lines;
  }

  /**
   * Lay out the report with pdfkit and collect it into a buffer
   */
  static renderPdf(record: PatientRecord): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const doc = new PDFDocument({
        size: 'A4',
        margin: 50,
        info: { Title: `${REPORT_TITLE} - ${record.patient.name}` }
      });
      const chunks: Buffer[] = [];
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      doc.font('Helvetica-Bold').fontSize(16).text(REPORT_TITLE, { align: 'center' });
      doc.moveDown(1.5);

      doc.font('Helvetica').fontSize(12);
      doc.text(`Name: ${record.patient.name}`);
      doc.text(`Age: ${record.patient.age}`);
      doc.text(`Sex: ${record.patient.sex}`);
      doc.text(`Date: ${record.createdAt}`);
      doc.text(`Sampling: ${record.samplingMode}`);

      const swatchY = doc.y;
      doc.text(`Detected colour: ${formatRgb(record.sampledColor)} ${record.sampledHex}`);
      doc.rect(420, swatchY - 2, 60, 16).fill(record.sampledHex);
      doc.fillColor('black');
      doc.moveDown();

      doc.font('Helvetica-Bold').text('Auto detected shades');
      doc.font('Helvetica');
      for (const match of record.matches) {
        doc.text(`${match.systemName}: ${match.shade}   (Delta E ${match.deltaE.toFixed(2)})`);
      }
      doc.moveDown();
      doc.text(`Manual override: ${describeOverride(record)}`);

      if (record.imagePath && fs.existsSync(record.imagePath)) {
        doc.moveDown();
        doc.image(record.imagePath, 150, doc.y + 10, { fit: [300, 300] });
      }

      doc.end();
    });
  }

  /**
   * Render and write the PDF, creating the target directory when needed
   */
  static async writePdf(record: PatientRecord, outputPath: string): Promise<string> {
    try {
      const buffer = await ReportRenderer.renderPdf(record);
      await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.promises.writeFile(outputPath, buffer);
    } catch (error) {
      throw new ReportNotSavedError(outputPath, error);
    }
    console.log(`📄 PDF report saved to: ${outputPath}`);
    return outputPath;
  }
}
