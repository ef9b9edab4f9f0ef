import fs from 'fs';
import path from 'path';
import { HistoryFormatError, ReportNotSavedError } from './errors';
import { describeIssues, patientHistorySchema } from './schemas';
import type { PatientRecord } from './types';

export const DEFAULT_HISTORY_LIMIT = 10;

/**
 * Bounded, most-recent-first store of patient reports.
 *
 * Evicting a record does not delete the image or PDF it points to.
 */
export interface PatientHistoryStore {
  append(record: PatientRecord): Promise<void>;
  queryByName(query: string): Promise<PatientRecord[]>;
  list(): Promise<PatientRecord[]>;
}

export function insertBounded(records: PatientRecord[], record: PatientRecord, limit: number): PatientRecord[] {
  return [record, ...records].slice(0, limit);
}

/**
 * Case-insensitive substring match on the patient name; a blank query matches nothing
 */
export function filterByName(records: PatientRecord[], query: string): PatientRecord[] {
  const needle = query.trim().toLowerCase();
  if (needle.length === 0) {
    return [];
  }
  return records.filter(record => record.patient.name.toLowerCase().includes(needle));
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`History limit must be a positive integer, got ${limit}`);
  }
}

export class InMemoryHistoryStore implements PatientHistoryStore {
  private records: PatientRecord[] = [];
  private limit: number;

  constructor(limit: number = DEFAULT_HISTORY_LIMIT) {
    assertLimit(limit);
    this.limit = limit;
  }

  async append(record: PatientRecord): Promise<void> {
    this.records = insertBounded(this.records, record, this.limit);
  }

  async queryByName(query: string): Promise<PatientRecord[]> {
    return filterByName(this.records, query);
  }

  async list(): Promise<PatientRecord[]> {
    return [...this.records];
  }
}

export class JsonFileHistoryStore implements PatientHistoryStore {
  private filePath: string;
  private limit: number;

  constructor(filePath: string, limit: number = DEFAULT_HISTORY_LIMIT) {
    assertLimit(limit);
    this.filePath = filePath;
    this.limit = limit;
  }

  get historyFile(): string {
    return this.filePath;
  }

  async append(record: PatientRecord): Promise<void> {
    const records = insertBounded(await this.load(), record, this.limit);

    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, JSON.stringify(records, null, 2), 'utf-8');
    } catch (error) {
      throw new ReportNotSavedError(this.filePath, error);
    }
    console.log(`💾 History saved to: ${this.filePath} (${records.length}/${this.limit} records)`);
  }

  async queryByName(query: string): Promise<PatientRecord[]> {
    return filterByName(await this.load(), query);
  }

  async list(): Promise<PatientRecord[]> {
    return this.load();
  }

  /**
   * Read and validate the history file; a missing file is an empty history
   */
  private async load(): Promise<PatientRecord[]> {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    const text = await fs.promises.readFile(this.filePath, 'utf-8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new HistoryFormatError(this.filePath, reason);
    }

    const result = patientHistorySchema.safeParse(raw);
    if (!result.success) {
      throw new HistoryFormatError(this.filePath, describeIssues(result.error).join('; '));
    }
    return result.data;
  }
}
