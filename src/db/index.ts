import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { APP_CONFIG } from '../lib/config';
import { logger } from '../lib/logger';

export type Db = Database.Database;

const log = logger.child({ module: 'Database' });

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS subjects (
    id TEXT PRIMARY KEY,
    filename TEXT NOT NULL,
    filepath TEXT NOT NULL,
    fileSize INTEGER NOT NULL,
    uploadTime TEXT NOT NULL,
    previewData TEXT NOT NULL DEFAULT '[]',
    insights TEXT,
    processingStatus TEXT NOT NULL DEFAULT 'uploaded'
      CHECK (processingStatus IN ('uploaded', 'processing', 'completed', 'failed'))
  );
  CREATE INDEX IF NOT EXISTS idx_subjects_status ON subjects (processingStatus);
`;

export function openDatabase(filename: string = APP_CONFIG.databasePath): Db {
  if (filename !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }
  const db = new Database(filename);
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);
  log.info('Database opened', { filename });
  return db;
}

const GLOBAL_DB_KEY = '__datasetInsightsDb__';

export default function getDb(): Db {
  const g = globalThis as unknown as Record<string, Db | undefined>;
  const existing = g[GLOBAL_DB_KEY];
  if (existing && existing.open) return existing;
  const db = openDatabase();
  g[GLOBAL_DB_KEY] = db;
  return db;
}

export function closeDb(): void {
  const g = globalThis as unknown as Record<string, Db | undefined>;
  const existing = g[GLOBAL_DB_KEY];
  if (existing?.open) {
    existing.close();
    log.info('Database closed');
  }
  g[GLOBAL_DB_KEY] = undefined;
}
