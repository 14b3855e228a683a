import { logger as rootLogger, LoggerLike } from '../lib/logger';

type TaskHandler = () => Promise<void>;

interface QueuedTask {
  key: string;
  handler: TaskHandler;
  enqueuedAt: number;
}

export interface TaskQueueStatus {
  running: boolean;
  queued: number;
  active: number;
  processedCount: number;
  failedCount: number;
}

export interface TaskQueueOptions {
  concurrency?: number;
  logger?: LoggerLike;
}

/**
 * In-process fire-and-forget runner. Work is keyed: a key that is already
 * queued or running is refused, so at most one task per key is in flight.
 * Submitters never wait on the work itself.
 */
export class TaskQueue {
  private pending: QueuedTask[] = [];
  private active: Map<string, Promise<void>> = new Map();
  private idleWaiters: Array<() => void> = [];
  private running = true;
  private processedCount = 0;
  private failedCount = 0;
  private readonly concurrency: number;
  private readonly log: LoggerLike;

  constructor(options?: TaskQueueOptions) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
    this.log = (options?.logger ?? rootLogger).child({ module: 'TaskQueue' });
  }

  submit(key: string, handler: TaskHandler): boolean {
    if (!this.running) {
      this.log.warn('Task rejected; queue stopped', { key });
      return false;
    }
    if (this.isActive(key)) {
      this.log.warn('Task rejected; key already in flight', { key });
      return false;
    }

    this.pending.push({ key, handler, enqueuedAt: Date.now() });
    this.log.debug('Task queued', { key, queued: this.pending.length });
    this.pump();
    return true;
  }

  /** False once `stop` has been called. */
  isAccepting(): boolean {
    return this.running;
  }

  isActive(key: string): boolean {
    return this.active.has(key) || this.pending.some((t) => t.key === key);
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stops accepting work and waits for everything already accepted. */
  async stop(): Promise<void> {
    if (this.running) {
      this.running = false;
      this.log.info('Task queue stopping', { queued: this.pending.length, active: this.active.size });
    }
    await this.onIdle();
    this.log.info('Task queue stopped', {
      processedCount: this.processedCount,
      failedCount: this.failedCount,
    });
  }

  getStatus(): TaskQueueStatus {
    return {
      running: this.running,
      queued: this.pending.length,
      active: this.active.size,
      processedCount: this.processedCount,
      failedCount: this.failedCount,
    };
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.active.size === 0;
  }

  private pump(): void {
    while (this.active.size < this.concurrency) {
      const task = this.pending.shift();
      if (!task) break;

      const execution = this.execute(task).finally(() => {
        this.active.delete(task.key);
        this.pump();
        this.notifyIdle();
      });
      this.active.set(task.key, execution);
    }
  }

  private async execute(task: QueuedTask): Promise<void> {
    // Yield first so the submitter's synchronous flow finishes before the work starts.
    await new Promise<void>((resolve) => setImmediate(resolve));
    const startedAt = Date.now();
    this.log.info('Processing task', { key: task.key, waitedMs: startedAt - task.enqueuedAt });

    try {
      await task.handler();
      this.processedCount++;
      this.log.info('Task completed', { key: task.key, durationMs: Date.now() - startedAt });
    } catch (error) {
      this.failedCount++;
      this.log.error('Task failed', error, { key: task.key });
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
