export type ShadeMatcherErrorCode =
  | 'INVALID_COLOR'
  | 'NO_REFERENCE_DATA'
  | 'UNKNOWN_SHADE_SYSTEM'
  | 'INVALID_REGION'
  | 'IMAGE_DECODE_FAILED'
  | 'INVALID_SUBMISSION'
  | 'INVALID_OVERRIDE'
  | 'HISTORY_FORMAT'
  | 'REPORT_NOT_SAVED'
  | 'CONFIG'
  | 'USAGE';

/**
 * Base class for every failure the tool reports to the user.
 */
export class ShadeMatcherError extends Error {
  readonly code: ShadeMatcherErrorCode;

  constructor(code: ShadeMatcherErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidColorError extends ShadeMatcherError {
  constructor(message: string) {
    super('INVALID_COLOR', message);
  }
}

export class EmptyReferenceTableError extends ShadeMatcherError {
  constructor(systemName: string) {
    super('NO_REFERENCE_DATA', `No reference data: shade table "${systemName}" is empty, no matches possible`);
  }
}

export class UnknownShadeSystemError extends ShadeMatcherError {
  constructor(system: string) {
    super('UNKNOWN_SHADE_SYSTEM', `Unknown shade system: ${system}`);
  }
}

export class InvalidRegionError extends ShadeMatcherError {
  constructor(message: string) {
    super('INVALID_REGION', `Invalid region: ${message}`);
  }
}

export class ImageDecodeError extends ShadeMatcherError {
  constructor(message: string, cause?: unknown) {
    super('IMAGE_DECODE_FAILED', message, { cause });
  }
}

export class InvalidSubmissionError extends ShadeMatcherError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_SUBMISSION', `Invalid submission: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class InvalidOverrideError extends ShadeMatcherError {
  constructor(message: string) {
    super('INVALID_OVERRIDE', `Invalid manual override: ${message}`);
  }
}

export class HistoryFormatError extends ShadeMatcherError {
  constructor(filePath: string, detail: string) {
    super('HISTORY_FORMAT', `History file ${filePath} is not valid: ${detail}`);
  }
}

export class ReportNotSavedError extends ShadeMatcherError {
  constructor(target: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super('REPORT_NOT_SAVED', `Report not saved (${target})${reason}`, { cause });
  }
}

export class ConfigError extends ShadeMatcherError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export class UsageError extends ShadeMatcherError {
  constructor(message: string) {
    super('USAGE', message);
  }
}
