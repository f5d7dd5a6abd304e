import type { Channel } from '../config.js';
import { QUOTA_FAILURE_PREFIX, type EtlRun, type RunLedger, type RunStatus, type QualityStatus, type RunOutcome } from '../db/runLedger.js';
import { ChannelRunFailed, QuotaExceededError, SchemaError, errorMessage } from '../core/errors.js';
import { systemClock, utcDay, type Clock } from '../core/dates.js';
import { moduleLogger } from '../core/logger.js';
import { DATA_KINDS, type DataKind } from '../youtube/types.js';
import type { ChannelIngestor, IngestOutcome } from './channelIngestor.js';

const log = moduleLogger('orchestrator');

export interface RunReport {
  channelId: string;
  kind: DataKind;
  runId: number | null;
  /** `pending` means not reached today; `already_attempted` means admission was refused */
  status: RunStatus | 'already_attempted';
  reason: string | null;
  itemsProcessed: number;
  itemsFailed: number;
  quality: QualityStatus | null;
  qualityReasons: string[];
}

export interface DaySummary {
  day: string;
  startedAt: string;
  finishedAt: string;
  runs: RunReport[];
  haltedByQuota: boolean;
  quotaReason: string | null;
  totals: Record<RunReport['status'], number> & { flagged: number };
}

export interface OrchestratorDeps {
  channels: readonly Channel[];
  ledger: RunLedger;
  ingestor: ChannelIngestor;
  clock?: Clock;
  /** Channels processed at once. Each still goes through ledger admission. */
  concurrency?: number;
}

const report = (channel: Channel, kind: DataKind, fields: Partial<RunReport>): RunReport => ({
  channelId: channel.id,
  kind,
  runId: null,
  status: 'pending',
  reason: null,
  itemsProcessed: 0,
  itemsFailed: 0,
  quality: null,
  qualityReasons: [],
  ...fields,
});

function describeFailure(outcome: Extract<IngestOutcome, { status: 'failed' }>): string {
  const { error } = outcome;
  if (error instanceof QuotaExceededError) {
    return `${QUOTA_FAILURE_PREFIX}${error.reason}`;
  }
  return `${error.code}: ${error.message}`;
}

const refused = (channel: Channel, kind: DataKind, run: EtlRun, day: string): RunReport => report(channel, kind, {
  runId: run.id,
  status: 'already_attempted',
  reason: `already ${run.status} on ${day}`,
  itemsProcessed: run.items_processed,
  itemsFailed: run.items_failed,
  quality: run.quality_status,
  qualityReasons: run.quality_reasons,
});

function toRunOutcome(outcome: IngestOutcome): RunOutcome {
  switch (outcome.status) {
    case 'succeeded':
      return {
        status: 'succeeded',
        quality: outcome.quality.status === 'flagged'
          ? { status: 'flagged', reasons: outcome.quality.reasons }
          : { status: 'pass', reasons: [] },
      };
    case 'skipped':
      return { status: 'skipped', errorSummary: outcome.reason };
    case 'failed':
      return { status: 'failed', errorSummary: describeFailure(outcome) };
  }
}

/**
 * Runs one day's worth of ingestion for a fixed channel list.
 *
 * Channel-level failures are finalized and skipped past. Quota exhaustion
 * stops all further admissions for the day and leaves the rest `pending`.
 * A schema violation finalizes the current run and is rethrown.
 */
export class DailyOrchestrator {
  private readonly channels: readonly Channel[];
  private readonly clock: Clock;
  private readonly concurrency: number;

  private halted = false;
  private quotaReason: string | null = null;

  constructor(private readonly deps: OrchestratorDeps) {
    this.channels = Object.freeze([...deps.channels]);
    this.clock = deps.clock ?? systemClock;
    this.concurrency = Math.max(1, deps.concurrency ?? 1);
  }

  async runDay(kinds: readonly DataKind[] = DATA_KINDS): Promise<DaySummary> {
    const startedAt = this.clock();
    const day = utcDay(startedAt);
    this.quotaReason = this.deps.ledger.quotaHalt(day);
    this.halted = this.quotaReason !== null;
    if (this.halted) {
      log.warn(`Quota already exhausted on ${day} (${this.quotaReason ?? ''}); no runs will be admitted`);
    }

    log.info(`Starting ${kinds.join(', ')} ingestion for ${this.channels.length} channel(s) on ${day}`);
    this.deps.ingestor.syncChannels(this.channels);

    // Every (channel, kind) gets its pending row before anything is fetched
    for (const channel of this.channels) {
      for (const kind of kinds) {
        this.deps.ledger.plan(channel.id, kind, day);
      }
    }

    const reports = new Map<string, RunReport[]>();
    const queue = [...this.channels];
    const fatal: unknown[] = [];

    const worker = async (): Promise<void> => {
      for (let channel = queue.shift(); channel; channel = queue.shift()) {
        const channelReports: RunReport[] = [];
        reports.set(channel.id, channelReports);
        for (const kind of kinds) {
          if (this.halted) {
            channelReports.push(this.notAttempted(channel, kind, day));
            continue;
          }
          channelReports.push(await this.runOne(channel, kind, day));
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, Math.max(1, this.channels.length)) }, () =>
      worker().catch((error: unknown) => {
        this.halted = true;
        fatal.push(error);
      }));
    await Promise.all(workers);

    if (fatal.length > 0) {
      log.error(`Ingestion for ${day} aborted: ${errorMessage(fatal[0])}`);
      throw fatal[0];
    }

    const runs = this.channels.flatMap(channel =>
      reports.get(channel.id) ?? kinds.map(kind => this.notAttempted(channel, kind, day)));

    const totals = { pending: 0, running: 0, succeeded: 0, failed: 0, skipped: 0, already_attempted: 0, flagged: 0 };
    for (const run of runs) {
      totals[run.status]++;
      if (run.quality === 'flagged') totals.flagged++;
    }

    const summary: DaySummary = {
      day,
      startedAt: startedAt.toISOString(),
      finishedAt: this.clock().toISOString(),
      runs,
      haltedByQuota: this.quotaReason !== null,
      quotaReason: this.quotaReason,
      totals,
    };

    log.info(`Finished ${day}: ${totals.succeeded} succeeded, ${totals.failed} failed, ${totals.skipped} skipped, `
      + `${totals.pending} pending, ${totals.already_attempted} already attempted, ${totals.flagged} flagged`);
    return summary;
  }

  private notAttempted(channel: Channel, kind: DataKind, day: string): RunReport {
    const run = this.deps.ledger.find(channel.id, kind, day);
    if (run && run.status !== 'pending') {
      return refused(channel, kind, run, day);
    }
    return report(channel, kind, {
      runId: run?.id ?? null,
      reason: this.quotaReason ? 'not attempted: quota exhausted' : 'not attempted: run aborted',
    });
  }

  private async runOne(channel: Channel, kind: DataKind, day: string): Promise<RunReport> {
    const { ledger, ingestor } = this.deps;

    const admission = ledger.admit(channel.id, kind, day);
    if (admission.status === 'already_attempted') {
      return refused(channel, kind, admission.run, day);
    }

    const { runId } = admission;
    const outcome = await ingestor.run(channel, kind, day);
    const run = ledger.finalize(runId, toRunOutcome(outcome), outcome.counts);

    if (outcome.status === 'failed') {
      if (outcome.error instanceof QuotaExceededError) {
        this.halted = true;
        this.quotaReason = outcome.error.reason;
        log.error(`Quota exhausted on ${channel.id} ${kind}; no further runs will be admitted on ${day}`);
      } else if (outcome.error instanceof SchemaError) {
        throw outcome.error;
      } else {
        const failure = new ChannelRunFailed(`${channel.id} ${kind} run failed: ${outcome.error.message}`,
          { ...outcome.error.context, runId, day }, { cause: outcome.error });
        log.warn(failure.toString(), failure.context);
      }
    }

    return report(channel, kind, {
      runId,
      status: run.status,
      reason: run.error_summary,
      itemsProcessed: run.items_processed,
      itemsFailed: run.items_failed,
      quality: run.quality_status,
      qualityReasons: run.quality_reasons,
    });
  }
}
