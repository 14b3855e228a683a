export type ErrorCode =
  | 'SUBJECT_NOT_FOUND'
  | 'PROCESSING_CONFLICT'
  | 'NOT_ACCEPTING_WORK'
  | 'DATASET_PARSE_ERROR'
  | 'CORRUPT_RECORD';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class SubjectNotFoundError extends AppError {
  constructor(public readonly subjectId: string) {
    super('SUBJECT_NOT_FOUND', `Subject not found: ${subjectId}`, 404);
    this.name = 'SubjectNotFoundError';
  }
}

export class ProcessingConflictError extends AppError {
  constructor(public readonly subjectId: string) {
    super('PROCESSING_CONFLICT', `Subject is already being processed: ${subjectId}`, 409);
    this.name = 'ProcessingConflictError';
  }
}

export class NotAcceptingWorkError extends AppError {
  constructor() {
    super('NOT_ACCEPTING_WORK', 'Processing is shutting down; no new runs are accepted', 503);
    this.name = 'NotAcceptingWorkError';
  }
}

export class DatasetParseError extends AppError {
  constructor(message: string) {
    super('DATASET_PARSE_ERROR', message, 422);
    this.name = 'DatasetParseError';
  }
}

/** A persisted row whose JSON columns no longer match the expected shape. */
export class CorruptRecordError extends AppError {
  constructor(subjectId: string, detail: string) {
    super('CORRUPT_RECORD', `Stored record ${subjectId} is corrupt: ${detail}`, 500);
    this.name = 'CorruptRecordError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
