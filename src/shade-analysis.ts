import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import sharp from 'sharp';
import { ColorSampler } from './color-sampler';
import { rgbToHex } from './color-space';
import { InvalidOverrideError, InvalidSubmissionError, ReportNotSavedError } from './errors';
import type { PatientHistoryStore } from './history-store';
import { ReportRenderer } from './report-renderer';
import { describeIssues, type ShadeSubmission, submissionSchema } from './schemas';
import { getShadeTable, loadShadeGuides } from './shade-guides';
import { ShadeMatcher } from './shade-matcher';
import type { ManualOverride, PatientRecord, ShadeGuideSet, ShadeSystemId, ShadeTable } from './types';

export interface ShadeAnalysisOptions {
  outputDir: string;
  store: PatientHistoryStore;
  guides?: ShadeGuideSet;
  debugMode?: boolean;
  now?: () => Date;
}

export interface AnalysisResult {
  record: PatientRecord;
  summary: string[];
}

/**
 * File-name safe version of a patient name
 */
export function slugifyName(name: string): string {
  const slug = name
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_-]/g, '');
  return slug.length > 0 ? slug : 'patient';
}

export function fileStamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

/**
 * A system-bound override must name a compared system and one of its labels; otherwise it is free text
 */
export function validateOverride(override: ManualOverride | undefined, tables: ShadeTable[]): ManualOverride | null {
  if (!override) {
    return null;
  }
  const shade = override.shade.trim();
  if (!override.systemId) {
    return { shade };
  }

  const table = tables.find(candidate => candidate.id === override.systemId);
  if (!table) {
    throw new InvalidOverrideError(`system "${override.systemId}" was not among the compared shade systems`);
  }
  if (!table.shades.some(entry => entry.label === shade)) {
    throw new InvalidOverrideError(`shade "${shade}" is not part of ${table.name}`);
  }
  return { systemId: table.id, shade };
}

export class ShadeAnalysisService {
  private outputDir: string;
  private store: PatientHistoryStore;
  private guides: ShadeGuideSet;
  private sampler: ColorSampler;
  private debugMode: boolean;
  private now: () => Date;

  constructor(options: ShadeAnalysisOptions) {
    this.outputDir = options.outputDir;
    this.store = options.store;
    this.guides = options.guides ?? loadShadeGuides();
    this.debugMode = options.debugMode ?? false;
    this.sampler = new ColorSampler(this.debugMode);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Sample, match, save the photo and PDF, then record the visit in the history
   */
  async analyze(input: unknown): Promise<AnalysisResult> {
    const submission = this.parseSubmission(input);
    console.log(`🦷 Analysing shade for ${submission.patient.name}`);

    const systemIds = [...new Set<ShadeSystemId>(submission.systems)];
    const tables = systemIds.map(id => getShadeTable(id, this.guides));
    const manualOverride = validateOverride(submission.manualOverride, tables);

    const sampledColor = await this.sampler.sample(submission.imagePath, submission.samplingMode, submission.region);

    const matcher = new ShadeMatcher(tables);
    const matches = matcher.match(sampledColor);
    if (this.debugMode) {
      matcher.printMatchingResults(sampledColor, matches);
    }

    const createdAt = this.now();
    const baseName = `${slugifyName(submission.patient.name)}_${fileStamp(createdAt)}`;
    const imagePath = path.join(this.outputDir, 'images', `saved_${baseName}.jpg`);
    const pdfPath = path.join(this.outputDir, 'reports', `${baseName}_shade_report.pdf`);

    await this.saveImage(submission.imagePath, imagePath);

    const record: PatientRecord = {
      id: randomUUID(),
      patient: submission.patient,
      sampledColor,
      sampledHex: rgbToHex(sampledColor),
      samplingMode: submission.samplingMode,
      matches,
      manualOverride,
      imagePath,
      pdfPath,
      createdAt: createdAt.toISOString()
    };

    await ReportRenderer.writePdf(record, pdfPath);
    await this.store.append(record);

    console.log('✅ Analysis complete');
    return { record, summary: ReportRenderer.renderSummary(record) };
  }

  private parseSubmission(input: unknown): ShadeSubmission {
    const result = submissionSchema.safeParse(input);
    if (!result.success) {
      throw new InvalidSubmissionError(describeIssues(result.error));
    }
    return result.data;
  }

  /**
   * Keep a JPEG copy of the uploaded photo next to the reports
   */
  private async saveImage(sourcePath: string, targetPath: string): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
      await sharp(sourcePath).flatten({ background: '#ffffff' }).jpeg({ quality: 92 }).toFile(targetPath);
    } catch (error) {
      throw new ReportNotSavedError(targetPath, error);
    }
    console.log(`💾 Photo saved to: ${targetPath}`);
  }
}
