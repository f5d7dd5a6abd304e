import cron, { type ScheduledTask } from 'node-cron';
import { SchemaError } from '../core/errors.js';
import { moduleLogger } from '../core/logger.js';
import type { RunLedger } from '../db/runLedger.js';
import type { DailyOrchestrator, DaySummary } from '../etl/orchestrator.js';

const log = moduleLogger('scheduler');

export interface SchedulerOptions {
  cron: string;
  staleRunMinutes: number;
  ledger: RunLedger;
  orchestrator: DailyOrchestrator;
  /** Called with contract violations; the caller decides how to shut down. */
  onFatal?: (error: SchemaError) => void;
}

export interface ScheduleInfo {
  name: string;
  cron: string;
  running: boolean;
  lastRun: { day: string; finishedAt: string; haltedByQuota: boolean } | null;
  lastError: string | null;
}

/**
 * Daily trigger. Each tick recovers stale runs first, then runs the day.
 * A tick that fires while the previous one is still going is skipped.
 */
export class DailyScheduler {
  private task: ScheduledTask | null = null;
  private running = false;
  private lastRun: DaySummary | null = null;
  private lastError: string | null = null;

  constructor(private readonly options: SchedulerOptions) {}

  start(): void {
    if (!cron.validate(this.options.cron)) {
      throw new Error(`Invalid cron expression: ${this.options.cron}`);
    }

    this.task = cron.schedule(this.options.cron, () => {
      void this.tick();
    }, { timezone: 'UTC' });

    log.info(`Scheduled daily ingestion (${this.options.cron} UTC)`);
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
    log.info('Scheduler stopped');
  }

  /** Returns null when skipped because a previous tick is still active. */
  async tick(): Promise<DaySummary | null> {
    if (this.running) {
      log.warn('Skipping daily ingestion (previous run still active)');
      return null;
    }

    this.running = true;
    log.info('Running daily ingestion');
    try {
      this.options.ledger.recoverStaleRuns(this.options.staleRunMinutes);
      const summary = await this.options.orchestrator.runDay();
      this.lastRun = summary;
      this.lastError = null;
      log.info(`Completed daily ingestion for ${summary.day}`);
      return summary;
    } catch (error) {
      this.lastError = error instanceof Error ? error.message : String(error);
      log.error('Daily ingestion failed', { error });
      if (error instanceof SchemaError) {
        this.stop();
        this.options.onFatal?.(error);
      }
      return null;
    } finally {
      this.running = false;
    }
  }

  info(): ScheduleInfo {
    return {
      name: 'Daily ingestion',
      cron: this.options.cron,
      running: this.running,
      lastRun: this.lastRun
        ? { day: this.lastRun.day, finishedAt: this.lastRun.finishedAt, haltedByQuota: this.lastRun.haltedByQuota }
        : null,
      lastError: this.lastError,
    };
  }
}
