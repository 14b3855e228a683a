/**
 * @module processingOrchestrator
 * @description Runs the analysis pipeline for one subject in the background:
 * loads its dataset, executes the four insight stages in order while
 * reporting progress to the hub, selects the final insights and records the
 * terminal status (`completed` or `failed`).
 */

import { ANALYSIS_TOTAL_STEPS, APP_CONFIG } from '../lib/config';
import { errorMessage } from '../lib/errors';
import { ANALYSIS_STAGES, selectInsights } from '../lib/insightEngine';
import { logger as rootLogger, LoggerLike } from '../lib/logger';
import { MetricsCollector } from '../lib/metrics';
import { ProgressHub } from '../lib/progressHub';
import { TaskQueue } from '../workers/taskQueue';
import type { SubjectStore } from './subjectStore';
import type { Insight } from '../types/insights';

export interface OrchestratorOptions {
  minConfidenceScore?: number;
  maxInsights?: number;
  /** Pause between stages so observers can follow progress. */
  stageDelayMs?: number;
  now?: () => number;
  logger?: LoggerLike;
  metrics?: MetricsCollector;
}

export interface OrchestratorDeps {
  store: SubjectStore;
  hub: ProgressHub;
  queue: TaskQueue;
}

const PREPARATION_STEPS = ['Parsing dataset', 'Validating data structure'] as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ProcessingOrchestrator {
  private readonly store: SubjectStore;
  private readonly hub: ProgressHub;
  private readonly queue: TaskQueue;
  private readonly minConfidenceScore: number;
  private readonly maxInsights: number;
  private readonly stageDelayMs: number;
  private readonly now: () => number;
  private readonly log: LoggerLike;
  private readonly metrics: MetricsCollector;

  constructor(deps: OrchestratorDeps, options?: OrchestratorOptions) {
    this.store = deps.store;
    this.hub = deps.hub;
    this.queue = deps.queue;
    this.minConfidenceScore = options?.minConfidenceScore ?? APP_CONFIG.minConfidenceScore;
    this.maxInsights = options?.maxInsights ?? APP_CONFIG.maxInsights;
    this.stageDelayMs = options?.stageDelayMs ?? APP_CONFIG.stageDelayMs;
    this.now = options?.now ?? Date.now;
    this.log = (options?.logger ?? rootLogger).child({ module: 'ProcessingOrchestrator' });
    this.metrics = options?.metrics ?? new MetricsCollector();
  }

  /**
   * Schedules a run and returns without waiting for it. Returns false when a
   * run for the subject is already queued or in progress.
   */
  start(subjectId: string): boolean {
    const accepted = this.queue.submit(subjectId, async () => {
      await this.run(subjectId);
    });
    if (accepted) {
      this.metrics.increment('runs.started');
    } else {
      this.metrics.increment('runs.rejected');
    }
    return accepted;
  }

  isAcceptingRuns(): boolean {
    return this.queue.isAccepting();
  }

  isRunning(subjectId: string): boolean {
    return this.queue.isActive(subjectId);
  }

  getMetrics(): MetricsCollector {
    return this.metrics;
  }

  /** Executes the pipeline once. Never rejects; failures end in `failed`. */
  async run(subjectId: string): Promise<Insight[]> {
    const startedAt = this.now();
    const log = this.log.child({ subjectId });
    let step = 0;

    const progress = (label: string, insightsFound: number): Promise<void> => {
      step++;
      return this.hub.sendInsightProgress(subjectId, label, ANALYSIS_TOTAL_STEPS, step, insightsFound);
    };

    try {
      const dataset = await this.store.loadDataset(subjectId);
      if (!dataset) {
        log.error('No dataset for subject; aborting insights');
        await this.hub.sendStatusUpdate(subjectId, 'failed', 'Dataset not found; aborting insights', 0);
        this.metrics.record('runs', this.now() - startedAt, true);
        return [];
      }

      await this.hub.sendStatusUpdate(subjectId, 'processing', 'Starting analysis...', 0);
      await progress(PREPARATION_STEPS[0], 0);
      await progress(PREPARATION_STEPS[1], 0);
      await this.pause();

      let collected: Insight[] = [];
      for (const stage of ANALYSIS_STAGES) {
        await progress(stage.label, collected.length);
        collected = collected.concat(stage.analyze(dataset));
        log.debug('Stage finished', { stage: stage.key, insightsFound: collected.length });
        await this.pause();
      }

      const insights = selectInsights(collected, {
        minConfidence: this.minConfidenceScore,
        maxInsights: this.maxInsights,
      });

      await this.store.persistResult(subjectId, 'completed', insights);

      const processingTime = (this.now() - startedAt) / 1000;
      await this.hub.sendInsightsComplete(subjectId, insights.length, processingTime);

      this.metrics.record('runs', this.now() - startedAt, false);
      log.info('Insights generated', {
        insightsCount: insights.length,
        candidates: collected.length,
        processingTime: Number(processingTime.toFixed(2)),
      });
      return insights;
    } catch (error) {
      log.error('Insight generation failed', error);
      await this.markFailed(subjectId, log);
      await this.hub.sendStatusUpdate(subjectId, 'failed', `Analysis failed: ${errorMessage(error)}`, 0);
      this.metrics.record('runs', this.now() - startedAt, true);
      return [];
    }
  }

  /** Attempted once; a failure here is logged and the run still ends. */
  private async markFailed(subjectId: string, log: LoggerLike): Promise<void> {
    try {
      await this.store.persistStatus(subjectId, 'failed');
    } catch (error) {
      this.metrics.increment('runs.failurePersistErrors');
      log.error('Could not persist failed status', error);
    }
  }

  private async pause(): Promise<void> {
    if (this.stageDelayMs > 0) await sleep(this.stageDelayMs);
  }
}
