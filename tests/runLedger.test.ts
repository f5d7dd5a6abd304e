import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase } from '../src/db/schema.js';
import { RunLedger, STALE_RUN_REASON } from '../src/db/runLedger.js';
import { LedgerError } from '../src/core/errors.js';

describe('RunLedger', () => {
  let now: Date;
  let ledger: RunLedger;

  beforeEach(() => {
    now = new Date('2024-05-01T10:00:00.000Z');
    ledger = new RunLedger(openDatabase(':memory:'), () => now);
  });

  it('admits a (channel, kind, day) at most once', () => {
    const first = ledger.admit('UC1', 'videos', '2024-05-01');
    const second = ledger.admit('UC1', 'videos', '2024-05-01');

    expect(first.status).toBe('admitted');
    expect(second.status).toBe('already_attempted');
    if (second.status === 'already_attempted') {
      expect(second.run.status).toBe('running');
    }
  });

  it('keys admission on channel, data kind and day independently', () => {
    expect(ledger.admit('UC1', 'videos', '2024-05-01').status).toBe('admitted');
    expect(ledger.admit('UC1', 'comments', '2024-05-01').status).toBe('admitted');
    expect(ledger.admit('UC2', 'videos', '2024-05-01').status).toBe('admitted');
    expect(ledger.admit('UC1', 'videos', '2024-05-02').status).toBe('admitted');
  });

  it('admits a planned pending run exactly once', () => {
    const planned = ledger.plan('UC1', 'metrics', '2024-05-01');
    expect(ledger.getRun(planned)?.status).toBe('pending');

    const admission = ledger.admit('UC1', 'metrics', '2024-05-01');
    expect(admission).toEqual({ status: 'admitted', runId: planned });
    expect(ledger.plan('UC1', 'metrics', '2024-05-01')).toBe(planned);
  });

  it('rejects a finalized run instead of retrying it', () => {
    const admission = ledger.admit('UC1', 'videos', '2024-05-01');
    if (admission.status !== 'admitted') throw new Error('expected admission');
    ledger.finalize(admission.runId, { status: 'succeeded' });

    const again = ledger.admit('UC1', 'videos', '2024-05-01');
    expect(again.status).toBe('already_attempted');
    if (again.status === 'already_attempted') {
      expect(again.run.status).toBe('succeeded');
    }
  });

  it('records counts, duration and quality on finalize', () => {
    const admission = ledger.admit('UC1', 'videos', '2024-05-01');
    if (admission.status !== 'admitted') throw new Error('expected admission');

    now = new Date('2024-05-01T10:00:05.000Z');
    const run = ledger.finalize(
      admission.runId,
      { status: 'succeeded', quality: { status: 'flagged', reasons: ['1 row(s) missing a critical field (tolerance 0)'] } },
      { itemsProcessed: 19, itemsFailed: 1, pagesFetched: 1, apiRequests: 3 },
    );

    expect(run.status).toBe('succeeded');
    expect(run.duration_ms).toBe(5000);
    expect(run.items_processed).toBe(19);
    expect(run.items_failed).toBe(1);
    expect(run.api_requests).toBe(3);
    expect(run.quality_status).toBe('flagged');
    expect(run.quality_reasons).toEqual(['1 row(s) missing a critical field (tolerance 0)']);
    expect(run.finished_at).toBe('2024-05-01T10:00:05.000Z');
  });

  it('refuses to finalize twice or to finalize a run that never started', () => {
    const admission = ledger.admit('UC1', 'videos', '2024-05-01');
    if (admission.status !== 'admitted') throw new Error('expected admission');
    ledger.finalize(admission.runId, { status: 'failed', errorSummary: 'boom' });

    expect(() => ledger.finalize(admission.runId, { status: 'succeeded' })).toThrow(LedgerError);
    expect(ledger.getRun(admission.runId)?.status).toBe('failed');

    const pending = ledger.plan('UC2', 'videos', '2024-05-01');
    expect(() => ledger.finalize(pending, { status: 'succeeded' })).toThrow(LedgerError);
    expect(() => ledger.finalize(9999, { status: 'succeeded' })).toThrow(LedgerError);
  });

  it('fails runs left running past the stale threshold', () => {
    const stale = ledger.admit('UC1', 'videos', '2024-05-01');
    now = new Date('2024-05-01T11:00:00.000Z');
    const recent = ledger.admit('UC2', 'videos', '2024-05-01');
    if (stale.status !== 'admitted' || recent.status !== 'admitted') throw new Error('expected admissions');

    now = new Date('2024-05-01T12:30:00.000Z');
    const recovered = ledger.recoverStaleRuns(120);

    expect(recovered.map(run => run.id)).toEqual([stale.runId]);
    expect(ledger.getRun(stale.runId)?.status).toBe('failed');
    expect(ledger.getRun(stale.runId)?.error_summary).toBe(STALE_RUN_REASON);
    expect(ledger.getRun(recent.runId)?.status).toBe('running');

    // Recovery never reopens the day
    expect(ledger.admit('UC1', 'videos', '2024-05-01').status).toBe('already_attempted');
  });

  it('lists a day in admission order', () => {
    ledger.admit('UC1', 'videos', '2024-05-01');
    ledger.plan('UC2', 'videos', '2024-05-01');
    ledger.admit('UC1', 'videos', '2024-05-02');

    const runs = ledger.listRuns('2024-05-01');
    expect(runs.map(run => [run.channel_id, run.status])).toEqual([['UC1', 'running'], ['UC2', 'pending']]);
    expect(ledger.find('UC2', 'videos', '2024-05-01')?.status).toBe('pending');
    expect(ledger.find('UC3', 'videos', '2024-05-01')).toBeNull();
  });

  it('reports the quota halt recorded for a day', () => {
    const admission = ledger.admit('UC1', 'comments', '2024-05-01');
    if (admission.status !== 'admitted') throw new Error('expected admission');
    expect(ledger.quotaHalt('2024-05-01')).toBeNull();

    ledger.finalize(admission.runId, { status: 'failed', errorSummary: 'quota exceeded: dailyLimitExceeded' });

    expect(ledger.quotaHalt('2024-05-01')).toBe('dailyLimitExceeded');
    expect(ledger.quotaHalt('2024-05-02')).toBeNull();
  });
});
