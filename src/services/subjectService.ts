import { mkdir, rm, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { Db } from '../db/index';
import { createSubject, getSubjectById, saveInsights, updateProcessingStatus } from '../db/subjects';
import { buildPreview, readDatasetFile } from '../lib/datasetParser';
import { DatasetParseError, NotAcceptingWorkError, ProcessingConflictError, SubjectNotFoundError } from '../lib/errors';
import { logger as rootLogger, LoggerLike } from '../lib/logger';
import { ProgressHub } from '../lib/progressHub';
import {
  validateFileExtension,
  validateFilename,
  validateFileSize,
  validateSubjectId,
  ValidationError,
} from '../lib/validation';
import { ProcessingOrchestrator } from './processingOrchestrator';
import type { Insight, PreviewCell, ProcessingStatus, SubjectRecord, Subscriber } from '../types/insights';

export interface SubjectServiceConfig {
  uploadDir: string;
  maxFileSize: number;
  maxPreviewRows: number;
  allowedExtensions: readonly string[];
}

export interface UploadResult {
  subjectId: string;
  filename: string;
  preview: PreviewCell[][];
  message: string;
}

export interface StartResult {
  subjectId: string;
  status: 'processing';
  message: string;
}

export interface SubjectStatusView {
  subjectId: string;
  status: ProcessingStatus;
  uploadTime: string;
  filename: string;
}

export type InsightsView =
  | { status: 'uploaded' | 'processing' | 'failed'; message: string }
  | { status: 'completed'; message: string; subjectId: string; insights: Insight[]; totalInsights: number };

const PENDING_MESSAGES: Record<Exclude<ProcessingStatus, 'completed'>, string> = {
  uploaded: 'File not yet processed',
  processing: 'Processing in progress',
  failed: 'Processing failed',
};

/**
 * Entry layer around the core: intake of uploaded files, start requests,
 * result queries and subscription management.
 */
export class SubjectService {
  private readonly log: LoggerLike;

  constructor(
    private readonly db: Db,
    private readonly hub: ProgressHub,
    private readonly orchestrator: ProcessingOrchestrator,
    private readonly config: SubjectServiceConfig,
    logger: LoggerLike = rootLogger,
  ) {
    this.log = logger.child({ module: 'SubjectService' });
  }

  async uploadDataset(params: { filename: string; content: Buffer }): Promise<UploadResult> {
    const filename = validateFilename(params.filename);
    const ext = validateFileExtension(filename, this.config.allowedExtensions);
    validateFileSize(params.content.length, this.config.maxFileSize);

    const subjectId = uuidv4();
    const filepath = path.join(this.config.uploadDir, `${subjectId}${ext}`);
    await mkdir(this.config.uploadDir, { recursive: true });

    try {
      await writeFile(filepath, params.content);
      const dataset = await readDatasetFile(filepath);
      const preview = buildPreview(dataset, this.config.maxPreviewRows);
      createSubject(
        { id: subjectId, filename, filepath, fileSize: params.content.length, previewData: preview },
        this.db,
      );
      this.log.info('File uploaded', { subjectId, filename, size: params.content.length });
      return { subjectId, filename, preview, message: 'File uploaded successfully' };
    } catch (error) {
      await rm(filepath, { force: true });
      if (error instanceof DatasetParseError) {
        throw new ValidationError('content', `File parsing error: ${error.message}`);
      }
      this.log.error('Error saving file', error, { subjectId, filename });
      throw error;
    }
  }

  /**
   * Marks the subject `processing` and schedules its run. The caller gets
   * control back before any analysis happens.
   */
  startProcessing(subjectId: string): StartResult {
    const record = this.requireSubject(subjectId);
    const id = record.id;
    if (this.orchestrator.isRunning(id)) {
      throw new ProcessingConflictError(id);
    }
    if (!this.orchestrator.isAcceptingRuns()) {
      throw new NotAcceptingWorkError();
    }

    updateProcessingStatus(id, 'processing', this.db);
    if (!this.orchestrator.start(id)) {
      // Restore the previous status and insights.
      saveInsights(id, record.processingStatus, record.insights ?? [], this.db);
      this.log.warn('Run refused after status change; status restored', { subjectId: id });
      throw this.orchestrator.isAcceptingRuns() ? new ProcessingConflictError(id) : new NotAcceptingWorkError();
    }

    this.log.info('Processing started', { subjectId: id });
    return { subjectId: id, status: 'processing', message: 'Processing started with real-time updates' };
  }

  getStatus(subjectId: string): SubjectStatusView {
    const record = this.requireSubject(subjectId);
    return {
      subjectId: record.id,
      status: record.processingStatus,
      uploadTime: record.uploadTime,
      filename: record.filename,
    };
  }

  getInsights(subjectId: string): InsightsView {
    const record = this.requireSubject(subjectId);
    if (record.processingStatus !== 'completed') {
      return { status: record.processingStatus, message: PENDING_MESSAGES[record.processingStatus] };
    }
    const insights = record.insights ?? [];
    return {
      status: 'completed',
      message: insights.length > 0 ? 'Insights available' : 'No insights generated',
      subjectId: record.id,
      insights,
      totalInsights: insights.length,
    };
  }

  async openSubscription(subjectId: string, subscriber: Subscriber): Promise<boolean> {
    const record = this.requireSubject(subjectId);
    return this.hub.subscribe(record.id, subscriber);
  }

  closeSubscription(subjectId: string, subscriber: Subscriber): void {
    this.hub.unsubscribe(subjectId, subscriber);
  }

  /** Inbound client frames. Only `{"type":"ping"}` gets a reply. */
  async handleClientMessage(subjectId: string, subscriber: Subscriber, raw: string): Promise<void> {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      this.log.debug('Ignoring malformed client message', { subjectId, subscriberId: subscriber.id });
      return;
    }
    if (typeof message === 'object' && message !== null && 'type' in message && message.type === 'ping') {
      await this.hub.sendTo(subscriber, { type: 'pong' }, subjectId);
    }
  }

  private requireSubject(subjectId: string): SubjectRecord {
    const id = validateSubjectId(subjectId);
    const record = getSubjectById(id, this.db);
    if (!record) throw new SubjectNotFoundError(id);
    return record;
  }
}
