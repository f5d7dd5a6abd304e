import type { DB } from './schema.js';
import type { DataKind } from '../youtube/types.js';
import { LedgerError } from '../core/errors.js';
import { minutesBetween } from '../core/dates.js';
import { moduleLogger } from '../core/logger.js';

const log = moduleLogger('run-ledger');

export type RunStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';
export type FinalStatus = Extract<RunStatus, 'succeeded' | 'failed' | 'skipped'>;
export type QualityStatus = 'pass' | 'flagged';

export const QUOTA_FAILURE_PREFIX = 'quota exceeded: ';
export const STALE_RUN_REASON = 'stale run recovered at startup';

export interface EtlRun {
  id: number;
  channel_id: string;
  data_kind: DataKind;
  run_date: string;
  status: RunStatus;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  duration_ms: number | null;
  pages_fetched: number;
  api_requests: number;
  items_processed: number;
  items_failed: number;
  quality_status: QualityStatus | null;
  quality_reasons: string[];
  error_summary: string | null;
}

interface EtlRunRow extends Omit<EtlRun, 'quality_reasons'> {
  quality_reasons: string | null;
}

export type Admission =
  | { status: 'admitted'; runId: number }
  | { status: 'already_attempted'; run: EtlRun };

export interface RunOutcome {
  status: FinalStatus;
  errorSummary?: string | null;
  quality?: { status: QualityStatus; reasons: readonly string[] } | null;
}

export interface RunCounts {
  itemsProcessed: number;
  itemsFailed: number;
  pagesFetched: number;
  apiRequests: number;
}

export const EMPTY_COUNTS: Readonly<RunCounts> = Object.freeze({
  itemsProcessed: 0,
  itemsFailed: 0,
  pagesFetched: 0,
  apiRequests: 0,
});

function toRun(row: EtlRunRow): EtlRun {
  let reasons: string[] = [];
  if (row.quality_reasons) {
    const parsed: unknown = JSON.parse(row.quality_reasons);
    if (Array.isArray(parsed)) {
      reasons = parsed.filter((reason): reason is string => typeof reason === 'string');
    }
  }
  return { ...row, quality_reasons: reasons };
}

/**
 * Durable record of one attempt per (channel, data kind, day).
 *
 * The unique key on etl_runs is the only lock: admission flips a row from
 * `pending` to `running` with a conditional UPDATE, so two callers (or two
 * processes) racing for the same key see exactly one `changes === 1`.
 */
export class RunLedger {
  constructor(private readonly db: DB, private readonly now: () => Date = () => new Date()) {}

  /** Creates the pending row if the day has none yet. Returns its id. */
  plan(channelId: string, kind: DataKind, day: string): number {
    this.db.prepare(`
      INSERT OR IGNORE INTO etl_runs (channel_id, data_kind, run_date, status, created_at)
      VALUES (?, ?, ?, 'pending', ?)
    `).run(channelId, kind, day, this.now().toISOString());

    const row = this.db.prepare<[string, DataKind, string], { id: number }>(
      'SELECT id FROM etl_runs WHERE channel_id = ? AND data_kind = ? AND run_date = ?',
    ).get(channelId, kind, day);

    if (!row) {
      throw new LedgerError('Pending run row missing after insert', { channelId, kind, day });
    }
    return row.id;
  }

  admit(channelId: string, kind: DataKind, day: string): Admission {
    const claim = this.db.transaction((): Admission => {
      const runId = this.plan(channelId, kind, day);
      const changes = this.db.prepare(`
        UPDATE etl_runs SET status = 'running', started_at = ?
        WHERE id = ? AND status = 'pending'
      `).run(this.now().toISOString(), runId).changes;

      if (changes === 1) {
        return { status: 'admitted', runId };
      }
      return { status: 'already_attempted', run: this.require(runId) };
    });

    const admission = claim.immediate();
    if (admission.status === 'admitted') {
      log.info(`Admitted ${kind} run for ${channelId} on ${day}`, { runId: admission.runId });
    } else {
      log.info(`${kind} run for ${channelId} on ${day} already attempted (${admission.run.status})`);
    }
    return admission;
  }

  /** The only way a run leaves `running`. A second call for the same run throws. */
  finalize(runId: number, outcome: RunOutcome, counts: RunCounts = EMPTY_COUNTS): EtlRun {
    const run = this.require(runId);
    if (run.status !== 'running') {
      throw new LedgerError(`Run ${runId} is ${run.status}, not running`, { runId, status: run.status });
    }

    const finishedAt = this.now();
    const startedAt = run.started_at ? new Date(run.started_at) : finishedAt;
    const durationMs = Math.max(0, finishedAt.getTime() - startedAt.getTime());

    const changes = this.db.prepare(`
      UPDATE etl_runs SET
        status = @status,
        finished_at = @finished_at,
        duration_ms = @duration_ms,
        pages_fetched = @pages_fetched,
        api_requests = @api_requests,
        items_processed = @items_processed,
        items_failed = @items_failed,
        quality_status = @quality_status,
        quality_reasons = @quality_reasons,
        error_summary = @error_summary
      WHERE id = @id AND status = 'running'
    `).run({
      id: runId,
      status: outcome.status,
      finished_at: finishedAt.toISOString(),
      duration_ms: durationMs,
      pages_fetched: counts.pagesFetched,
      api_requests: counts.apiRequests,
      items_processed: counts.itemsProcessed,
      items_failed: counts.itemsFailed,
      quality_status: outcome.quality?.status ?? null,
      quality_reasons: outcome.quality ? JSON.stringify(outcome.quality.reasons) : null,
      error_summary: outcome.errorSummary ?? null,
    }).changes;

    if (changes !== 1) {
      throw new LedgerError(`Run ${runId} was finalized concurrently`, { runId });
    }

    const finalized = this.require(runId);
    const summary = `Finalized ${finalized.data_kind} run ${runId} for ${finalized.channel_id} on ${finalized.run_date}: ${finalized.status}`;
    if (finalized.status === 'failed') {
      log.warn(`${summary} (${finalized.error_summary ?? 'no reason'})`);
    } else {
      log.info(summary, { items: counts.itemsProcessed, failed: counts.itemsFailed, quality: finalized.quality_status });
    }
    return finalized;
  }

  /** Runs stuck in `running` past the threshold are failed, never resumed. */
  recoverStaleRuns(thresholdMinutes: number): EtlRun[] {
    const now = this.now();
    const running = this.db.prepare<[], EtlRunRow>(
      "SELECT * FROM etl_runs WHERE status = 'running' ORDER BY id",
    ).all();

    const recovered: EtlRun[] = [];
    for (const row of running) {
      const startedAt = row.started_at ? new Date(row.started_at) : new Date(row.created_at);
      if (minutesBetween(startedAt, now) < thresholdMinutes) continue;
      recovered.push(this.finalize(row.id, { status: 'failed', errorSummary: STALE_RUN_REASON }));
    }

    if (recovered.length > 0) {
      log.warn(`Recovered ${recovered.length} stale run(s)`);
    }
    return recovered;
  }

  getRun(runId: number): EtlRun | null {
    const row = this.db.prepare<[number], EtlRunRow>('SELECT * FROM etl_runs WHERE id = ?').get(runId);
    return row ? toRun(row) : null;
  }

  find(channelId: string, kind: DataKind, day: string): EtlRun | null {
    const row = this.db.prepare<[string, DataKind, string], EtlRunRow>(
      'SELECT * FROM etl_runs WHERE channel_id = ? AND data_kind = ? AND run_date = ?',
    ).get(channelId, kind, day);
    return row ? toRun(row) : null;
  }

  /** Reason of the first quota-failed run on `day`, if any. Admissions stay closed until the next day. */
  quotaHalt(day: string): string | null {
    const row = this.db.prepare<[string, string], { error_summary: string }>(`
      SELECT error_summary FROM etl_runs
      WHERE run_date = ? AND status = 'failed' AND error_summary LIKE ?
      ORDER BY finished_at, id LIMIT 1
    `).get(day, `${QUOTA_FAILURE_PREFIX}%`);
    return row ? row.error_summary.slice(QUOTA_FAILURE_PREFIX.length) : null;
  }

  listRuns(day: string): EtlRun[] {
    const rows = this.db.prepare<[string], EtlRunRow>(
      'SELECT * FROM etl_runs WHERE run_date = ? ORDER BY id',
    ).all(day);
    return rows.map(toRun);
  }

  private require(runId: number): EtlRun {
    const run = this.getRun(runId);
    if (!run) {
      throw new LedgerError(`Unknown run ${runId}`, { runId });
    }
    return run;
  }
}
