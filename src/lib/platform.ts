import { Db, openDatabase } from '../db/index';
import { ALLOWED_EXTENSIONS, APP_CONFIG } from './config';
import { logger as rootLogger, LoggerLike } from './logger';
import { MetricsCollector } from './metrics';
import { ProgressHub } from './progressHub';
import { ProcessingOrchestrator } from '../services/processingOrchestrator';
import { SqliteSubjectStore } from '../services/sqliteSubjectStore';
import { SubjectService } from '../services/subjectService';
import type { SubjectStore } from '../services/subjectStore';
import { TaskQueue } from '../workers/taskQueue';

export interface PlatformOptions {
  databasePath?: string;
  uploadDir?: string;
  maxFileSize?: number;
  maxPreviewRows?: number;
  maxInsights?: number;
  minConfidenceScore?: number;
  stageDelayMs?: number;
  concurrency?: number;
  store?: SubjectStore;
  logger?: LoggerLike;
}

export interface Platform {
  db: Db;
  hub: ProgressHub;
  queue: TaskQueue;
  orchestrator: ProcessingOrchestrator;
  subjects: SubjectService;
  metrics: MetricsCollector;
  shutdown(): Promise<void>;
}

/**
 * Wires one database handle, hub, task queue and orchestrator together.
 * `shutdown` drains in-flight runs before releasing subscribers and the
 * database.
 */
export function createPlatform(options: PlatformOptions = {}): Platform {
  const log = (options.logger ?? rootLogger).child({ module: 'Platform' });
  const db = openDatabase(options.databasePath ?? APP_CONFIG.databasePath);
  const metrics = new MetricsCollector();
  const hub = new ProgressHub({ logger: options.logger });
  const concurrency = options.concurrency ?? APP_CONFIG.taskQueueConcurrency;
  const queue = new TaskQueue({ concurrency, logger: options.logger });
  const orchestrator = new ProcessingOrchestrator(
    { store: options.store ?? new SqliteSubjectStore(db), hub, queue },
    {
      minConfidenceScore: options.minConfidenceScore,
      maxInsights: options.maxInsights,
      stageDelayMs: options.stageDelayMs,
      logger: options.logger,
      metrics,
    },
  );
  const subjects = new SubjectService(
    db,
    hub,
    orchestrator,
    {
      uploadDir: options.uploadDir ?? APP_CONFIG.uploadDir,
      maxFileSize: options.maxFileSize ?? APP_CONFIG.maxFileSize,
      maxPreviewRows: options.maxPreviewRows ?? APP_CONFIG.maxPreviewRows,
      allowedExtensions: ALLOWED_EXTENSIONS,
    },
    options.logger,
  );

  let closed = false;
  log.info('Platform ready', { concurrency });

  return {
    db,
    hub,
    queue,
    orchestrator,
    subjects,
    metrics,
    async shutdown(): Promise<void> {
      if (closed) return;
      closed = true;
      await queue.stop();
      hub.close();
      if (db.open) db.close();
      log.info('Platform shut down', { runs: metrics.getSnapshot() });
    },
  };
}
