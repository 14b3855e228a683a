/**
 * Progress Broadcast Hub
 *
 * Routes analysis events to live subscribers keyed by subject id. The hub is
 * transport-agnostic: a WebSocket or SSE adapter supplies a `Subscriber`
 * whose `deliver` writes to its connection and throws once the connection is
 * gone.
 */

import { logger as rootLogger, LoggerLike } from './logger';
import type {
  HubEvent,
  HubMessage,
  InsightProgressEvent,
  ProcessingStatus,
  Subscriber,
} from '../types/insights';

interface HubMetrics {
  eventsSent: number;
  deliveries: number;
  deliveryFailures: number;
  subscribersDropped: number;
}

export interface ProgressHubOptions {
  logger?: LoggerLike;
  now?: () => Date;
}

export class ProgressHub {
  private subjects: Map<string, Set<Subscriber>> = new Map();
  private deliveryChains: Map<string, Promise<void>> = new Map();
  private metrics: HubMetrics = {
    eventsSent: 0,
    deliveries: 0,
    deliveryFailures: 0,
    subscribersDropped: 0,
  };
  private readonly log: LoggerLike;
  private readonly now: () => Date;

  constructor(options?: ProgressHubOptions) {
    this.log = (options?.logger ?? rootLogger).child({ module: 'ProgressHub' });
    this.now = options?.now ?? (() => new Date());
  }

  async subscribe(subjectId: string, subscriber: Subscriber): Promise<boolean> {
    let set = this.subjects.get(subjectId);
    if (!set) {
      set = new Set();
      this.subjects.set(subjectId, set);
    }
    set.add(subscriber);
    this.log.info('Subscriber connected', { subjectId, subscriberId: subscriber.id, subscribers: set.size });

    await this.sendTo(
      subscriber,
      { type: 'connection_established', message: 'Connected to real-time updates' },
      subjectId,
    );
    return true;
  }

  unsubscribe(subjectId: string, subscriber: Subscriber): void {
    const set = this.subjects.get(subjectId);
    if (!set) return;

    if (set.delete(subscriber)) {
      this.log.info('Subscriber disconnected', { subjectId, subscriberId: subscriber.id });
    }
    if (set.size === 0) {
      this.subjects.delete(subjectId);
    }
  }

  /**
   * Delivers to every subscriber of the subject. Deliveries for one subject
   * run one event at a time, in call order.
   */
  async send(subjectId: string, event: HubEvent): Promise<void> {
    if (!this.subjects.has(subjectId)) return;

    const message = this.stamp(event, subjectId);
    this.metrics.eventsSent++;
    await this.withSubjectLock(subjectId, () => this.deliverAll(subjectId, message));
  }

  async sendTo(subscriber: Subscriber, event: HubEvent, subjectId?: string): Promise<boolean> {
    const message = this.stamp(event, subjectId);
    try {
      await subscriber.deliver(message);
      this.metrics.deliveries++;
      return true;
    } catch (error) {
      this.metrics.deliveryFailures++;
      this.log.error('Direct delivery failed', error, { subjectId, subscriberId: subscriber.id, type: event.type });
      return false;
    }
  }

  // ── Typed senders ──────────────────────────────────────────────────────────

  sendStatusUpdate(
    subjectId: string,
    status: ProcessingStatus,
    message = '',
    progress = 0,
    details: Record<string, unknown> = {},
  ): Promise<void> {
    return this.send(subjectId, { type: 'status_update', status, message, progress, details });
  }

  sendInsightProgress(
    subjectId: string,
    currentStep: string,
    totalSteps: number,
    currentStepNum: number,
    insightsFound = 0,
  ): Promise<void> {
    const event: InsightProgressEvent = {
      type: 'insight_progress',
      currentStep,
      totalSteps,
      currentStepNum,
      progressPercent: (currentStepNum / totalSteps) * 100,
      insightsFound,
      message: `Step ${currentStepNum}/${totalSteps}: ${currentStep}`,
    };
    return this.send(subjectId, event);
  }

  sendInsightsComplete(subjectId: string, insightsCount: number, processingTime: number): Promise<void> {
    return this.send(subjectId, {
      type: 'insights_complete',
      status: 'completed',
      insightsCount,
      processingTime,
      progress: 100,
      message: `Analysis complete! Found ${insightsCount} insights in ${processingTime.toFixed(1)}s`,
    });
  }

  // ── Introspection & teardown ───────────────────────────────────────────────

  getSubscriberCount(subjectId?: string): number {
    if (subjectId !== undefined) {
      return this.subjects.get(subjectId)?.size ?? 0;
    }
    let total = 0;
    for (const set of this.subjects.values()) total += set.size;
    return total;
  }

  getSubjects(): string[] {
    return Array.from(this.subjects.keys());
  }

  getMetrics(): HubMetrics {
    return { ...this.metrics };
  }

  close(): void {
    const count = this.getSubscriberCount();
    this.subjects.clear();
    this.log.info('Hub closed', { subscribersReleased: count });
  }

  // ── Private ────────────────────────────────────────────────────────────────

  private stamp(event: HubEvent, subjectId?: string): HubMessage {
    const message: HubMessage = { ...event, subjectId, timestamp: this.now().toISOString() };
    if (subjectId === undefined) delete message.subjectId;
    return Object.freeze(message);
  }

  private async deliverAll(subjectId: string, message: HubMessage): Promise<void> {
    const set = this.subjects.get(subjectId);
    if (!set) return;

    for (const subscriber of Array.from(set)) {
      try {
        await subscriber.deliver(message);
        this.metrics.deliveries++;
      } catch (error) {
        this.metrics.deliveryFailures++;
        this.metrics.subscribersDropped++;
        this.log.error('Broadcast delivery failed; dropping subscriber', error, {
          subjectId,
          subscriberId: subscriber.id,
          type: message.type,
        });
        this.unsubscribe(subjectId, subscriber);
      }
    }
  }

  private async withSubjectLock(subjectId: string, task: () => Promise<void>): Promise<void> {
    const previous = this.deliveryChains.get(subjectId) ?? Promise.resolve();
    const current = previous.then(task);
    // The chain only orders work; failures surface through `current`.
    const tail = current.catch(() => undefined);
    this.deliveryChains.set(subjectId, tail);
    try {
      await current;
    } finally {
      if (this.deliveryChains.get(subjectId) === tail) {
        this.deliveryChains.delete(subjectId);
      }
    }
  }
}
