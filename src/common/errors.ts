/**
 * Error taxonomy
 *
 * Every error the service raises on purpose is an AppError. The global
 * error handler in app.ts maps `statusCode` and `code` onto the wire.
 */

export type ErrorKind =
  | 'MalformedInput'
  | 'UnknownDatasetType'
  | 'FeatureMismatch'
  | 'ArtifactLoadError'
  | 'InternalInvariantViolation'
  | 'PredictionTimeout';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorKind,
    statusCode: number,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = code;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  /** 4xx: the caller should fix the request. */
  get isClientError(): boolean {
    return this.statusCode < 500;
  }
}

export class MalformedInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MalformedInput', 400, message, details);
  }
}

export class UnknownDatasetTypeError extends AppError {
  readonly datasetType: string;

  constructor(datasetType: string, available: readonly string[]) {
    super(
      'UnknownDatasetType',
      400,
      `Unknown dataset type: ${datasetType}. Available types: ${available.join(', ')}`,
      { datasetType, available: [...available] }
    );
    this.datasetType = datasetType;
  }
}

export interface FeatureMismatchDetails {
  row: number;
  missing: string[];
  unexpected: string[];
}

export class FeatureMismatchError extends AppError {
  constructor(datasetType: string, mismatch: FeatureMismatchDetails) {
    const parts: string[] = [];
    if (mismatch.missing.length) parts.push(`missing [${mismatch.missing.join(', ')}]`);
    if (mismatch.unexpected.length) parts.push(`unexpected [${mismatch.unexpected.join(', ')}]`);
    super(
      'FeatureMismatch',
      400,
      `Row ${mismatch.row} does not match the ${datasetType} feature schema: ${parts.join('; ')}`,
      { ...mismatch }
    );
  }
}

export class ArtifactLoadError extends AppError {
  constructor(datasetType: string, path: string, reason: string, cause?: unknown) {
    super(
      'ArtifactLoadError',
      500,
      `Failed to load artifact for ${datasetType} (${path}): ${reason}`,
      { datasetType, path },
      { cause }
    );
  }
}

export class InternalInvariantViolation extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('InternalInvariantViolation', 500, message, details);
  }
}

export class PredictionTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super('PredictionTimeout', 503, `Prediction did not complete within ${timeoutMs}ms`, {
      timeoutMs,
    });
  }
}
