import path from 'path';
import { validate as isUuid } from 'uuid';
import { ALLOWED_EXTENSIONS, AllowedExtension } from './config';
import type { Insight, InsightCategory, PreviewCell, ProcessingStatus } from '../types/insights';

export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function validateFilename(filename: unknown): string {
  if (typeof filename !== 'string' || filename.trim().length === 0) {
    throw new ValidationError('filename', 'Filename is required');
  }
  const base = path.basename(filename.trim());
  if (base.length > 255) {
    throw new ValidationError('filename', 'Filename is too long');
  }
  return base;
}

export function validateFileExtension(
  filename: string,
  allowed: readonly string[] = ALLOWED_EXTENSIONS,
): AllowedExtension {
  const ext = path.extname(filename).toLowerCase();
  const match = ALLOWED_EXTENSIONS.find((candidate) => candidate === ext);
  if (!match || !allowed.includes(match)) {
    throw new ValidationError(
      'filename',
      `Unsupported file type. Allowed: ${allowed.join(', ')}`,
    );
  }
  return match;
}

export function validateFileSize(size: number, maxSize: number): number {
  if (!Number.isInteger(size) || size < 0) {
    throw new ValidationError('content', 'File size must be a non-negative integer');
  }
  if (size === 0) {
    throw new ValidationError('content', 'File is empty');
  }
  if (size > maxSize) {
    throw new ValidationError('content', `File too large. Max size: ${maxSize} bytes`);
  }
  return size;
}

export function validateSubjectId(id: unknown): string {
  if (typeof id !== 'string' || !isUuid(id)) {
    throw new ValidationError('subjectId', 'Subject id must be a UUID');
  }
  return id.toLowerCase();
}

// ─── Stored shape guards ──────────────────────────────────────────────────────

const PROCESSING_STATUSES: readonly ProcessingStatus[] = ['uploaded', 'processing', 'completed', 'failed'];

const INSIGHT_CATEGORIES: readonly InsightCategory[] = [
  'overview',
  'statistical',
  'pattern',
  'anomaly',
  'data_quality',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isProcessingStatus(value: unknown): value is ProcessingStatus {
  return PROCESSING_STATUSES.some((status) => status === value);
}

export function isInsightCategory(value: unknown): value is InsightCategory {
  return INSIGHT_CATEGORIES.some((category) => category === value);
}

export function isInsight(value: unknown): value is Insight {
  if (!isRecord(value)) return false;
  return (
    typeof value.title === 'string' &&
    typeof value.description === 'string' &&
    typeof value.confidence === 'number' &&
    value.confidence >= 0 &&
    value.confidence <= 1 &&
    isInsightCategory(value.category) &&
    Array.isArray(value.affectedColumns) &&
    value.affectedColumns.every((c: unknown) => typeof c === 'string') &&
    Array.isArray(value.affectedRows) &&
    value.affectedRows.every((r: unknown) => Number.isInteger(r))
  );
}

export function isPreviewRows(value: unknown): value is PreviewCell[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row: unknown) =>
        Array.isArray(row) &&
        row.every((cell: unknown) => cell === null || typeof cell === 'string' || typeof cell === 'number'),
    )
  );
}
