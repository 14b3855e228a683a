import type { LogLevel } from './logger';

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readFloat(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') return raw;
  return 'info';
}

/** Parse, validate, and four analytical stages. */
export const ANALYSIS_TOTAL_STEPS = 6;

export const ALLOWED_EXTENSIONS = ['.csv', '.tsv', '.xls', '.xlsx'] as const;

export type AllowedExtension = (typeof ALLOWED_EXTENSIONS)[number];

export const APP_CONFIG = {
  uploadDir: process.env.UPLOAD_DIR || './tmp/uploads',
  maxFileSize: readInt('MAX_FILE_SIZE', 10 * 1024 * 1024),
  maxPreviewRows: readInt('MAX_PREVIEW_ROWS', 5),
  databasePath: process.env.DATABASE_PATH || './data/insights.db',
  maxInsights: readInt('MAX_INSIGHTS', 5),
  minConfidenceScore: readFloat('MIN_CONFIDENCE_SCORE', 0.1),
  stageDelayMs: readInt('STAGE_DELAY_MS', 0),
  taskQueueConcurrency: readInt('TASK_QUEUE_CONCURRENCY', 2),
  maxAffectedRows: 10,
  logLevel: readLogLevel(),
} as const;
