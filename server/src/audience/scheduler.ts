import type { ConcurrencyLimiter } from '../lib/concurrency.js';
import { errorMessage } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { runBatchIngestion, type BatchIngestionEntry, type IngestionDeps } from './ingestion.js';

export interface IngestionSchedulerOptions {
  deps: IngestionDeps;
  limit: ConcurrencyLimiter;
  intervalMs: number;
  enabled: boolean;
}

export interface SchedulerStatus {
  running: boolean;
  enabled: boolean;
  interval_minutes: number;
  cycle_in_progress: boolean;
  last_run_at: string | null;
  last_run_failures: number | null;
}

/**
 * Periodic sweep that re-ingests every client. A tick that arrives while the
 * previous sweep is still running is skipped.
 */
export class IngestionScheduler {
  private readonly options: IngestionSchedulerOptions;
  private timer: ReturnType<typeof setInterval> | null = null;
  private cycleInProgress = false;
  private lastRunAt: string | null = null;
  private lastRunFailures: number | null = null;

  constructor(options: IngestionSchedulerOptions) {
    this.options = options;
  }

  start(): void {
    if (this.timer) {
      logger.info('Ingestion scheduler already running');
      return;
    }
    if (!this.options.enabled) {
      logger.info('Ingestion scheduler disabled via INGESTION_SCHEDULER_ENABLED');
      return;
    }

    logger.info({ interval_minutes: this.options.intervalMs / 60_000 }, 'Ingestion scheduler starting');
    this.timer = setInterval(() => {
      void this.runCycle();
    }, this.options.intervalMs);
    this.timer.unref?.();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info('Ingestion scheduler stopped');
  }

  /** One sweep; returns null when a sweep is already in progress. */
  async runCycle(): Promise<BatchIngestionEntry[] | null> {
    if (this.cycleInProgress) {
      logger.info('Previous ingestion sweep still running, skipping');
      return null;
    }

    this.cycleInProgress = true;
    try {
      const entries = await runBatchIngestion(this.options.deps, this.options.limit);
      this.lastRunFailures = entries.filter((entry) => !entry.ok).length;
      return entries;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Ingestion sweep failed');
      return null;
    } finally {
      this.lastRunAt = new Date().toISOString();
      this.cycleInProgress = false;
    }
  }

  status(): SchedulerStatus {
    return {
      running: this.timer !== null,
      enabled: this.options.enabled,
      interval_minutes: this.options.intervalMs / 60_000,
      cycle_in_progress: this.cycleInProgress,
      last_run_at: this.lastRunAt,
      last_run_failures: this.lastRunFailures,
    };
  }
}
