import type { DB } from '../db/schema.js';
import { CRITICAL_FIELDS, type WriteSummary } from '../db/ingestionWriter.js';
import type { DataKind, FetchedItem } from '../youtube/types.js';
import { parseTimestamp } from '../core/dates.js';
import { moduleLogger } from '../core/logger.js';

const log = moduleLogger('quality-gate');

export interface QualityPolicy {
  nullCriticalTolerance: number;
  maxOutlierRatio: number;
  outlierZScore: number;
}

export interface BatchSummary {
  kind: DataKind;
  totalItems: number;
  written: number;
  failed: number;
  nullCritical: number;
  orphanedMetrics: number;
  duplicateMetricPairs: number;
  outliers: number;
  /** Rows the outlier checks looked at */
  outlierBase: number;
}

export type QualityVerdict =
  | { status: 'pass' }
  | { status: 'flagged'; reasons: string[] };

export interface MetricValues {
  viewCount: number;
  likeCount: number;
  commentCount: number;
}

/** Negative counters, or more likes than views. */
export function isImpossible(values: MetricValues): boolean {
  return values.viewCount < 0
    || values.likeCount < 0
    || values.commentCount < 0
    || values.likeCount > values.viewCount;
}

export function zScores(values: readonly number[]): number[] {
  if (values.length < 2) return values.map(() => 0);
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  const std = Math.sqrt(variance);
  if (std === 0) return values.map(() => 0);
  return values.map(v => (v - mean) / std);
}

/** Rows that are impossible or whose view count sits beyond the z cutoff. */
export function countOutliers(rows: readonly MetricValues[], zCutoff: number): number {
  const z = zScores(rows.map(row => row.viewCount));
  return rows.filter((row, index) => isImpossible(row) || Math.abs(z[index] ?? 0) > zCutoff).length;
}

export function validate(summary: BatchSummary, policy: QualityPolicy): QualityVerdict {
  const reasons: string[] = [];

  if (summary.nullCritical > policy.nullCriticalTolerance) {
    reasons.push(`${summary.nullCritical} row(s) missing a critical field (tolerance ${policy.nullCriticalTolerance})`);
  }
  if (summary.orphanedMetrics > 0) {
    reasons.push(`${summary.orphanedMetrics} metric row(s) without a matching video`);
  }
  if (summary.duplicateMetricPairs > 0) {
    reasons.push(`${summary.duplicateMetricPairs} duplicate (video_id, date) metric pair(s)`);
  }
  if (summary.outlierBase > 0) {
    const ratio = summary.outliers / summary.outlierBase;
    if (ratio > policy.maxOutlierRatio) {
      reasons.push(`${summary.outliers} of ${summary.outlierBase} row(s) are outliers (${(ratio * 100).toFixed(1)}% > ${(policy.maxOutlierRatio * 100).toFixed(1)}%)`);
    }
  }

  return reasons.length === 0 ? { status: 'pass' } : { status: 'flagged', reasons };
}

export interface BatchInput {
  kind: DataKind;
  day: string;
  items: readonly FetchedItem[];
  write: WriteSummary;
  now: Date;
}

/**
 * Post-batch checks over what one run wrote. Flagging never rolls anything
 * back; the verdict only annotates the run.
 */
export class QualityGate {
  constructor(private readonly db: DB, private readonly policy: QualityPolicy) {}

  inspect(batch: BatchInput): BatchSummary {
    const failed = batch.write.outcomes.filter(outcome => outcome.status === 'failed');
    const summary: BatchSummary = {
      kind: batch.kind,
      totalItems: batch.items.length,
      written: batch.write.outcomes.length - failed.length,
      failed: failed.length,
      nullCritical: failed.filter(outcome =>
        outcome.status === 'failed' && outcome.field !== null && CRITICAL_FIELDS.has(outcome.field)).length,
      orphanedMetrics: 0,
      duplicateMetricPairs: 0,
      outliers: 0,
      outlierBase: 0,
    };

    if (batch.kind === 'metrics') {
      this.inspectMetrics(batch, summary);
    } else if (batch.kind === 'videos') {
      // A publish date in the future is impossible
      const nowMs = batch.now.getTime();
      const dated = batch.items.flatMap(item => item.kind === 'videos' ? [parseTimestamp(item.publishedAt)] : [])
        .filter((date): date is Date => date !== null);
      summary.outlierBase = dated.length;
      summary.outliers = dated.filter(date => date.getTime() > nowMs).length;
    }

    return summary;
  }

  validate(summary: BatchSummary): QualityVerdict {
    const verdict = validate(summary, this.policy);
    if (verdict.status === 'flagged') {
      log.warn(`${summary.kind} batch flagged: ${verdict.reasons.join('; ')}`);
    }
    return verdict;
  }

  private inspectMetrics(batch: BatchInput, summary: BatchSummary): void {
    const ids = batch.items.flatMap(item => item.kind === 'metrics' && item.externalId ? [item.externalId] : []);
    const unique = [...new Set(ids)];

    // Same video delivered twice in one batch
    summary.duplicateMetricPairs = ids.length - unique.length;

    const stored = this.db.prepare<[string], { c: number }>(`
      SELECT COUNT(*) AS c FROM (
        SELECT video_id FROM video_metrics WHERE metrics_date = ?
        GROUP BY video_id HAVING COUNT(*) > 1
      )
    `).get(batch.day);
    summary.duplicateMetricPairs += stored?.c ?? 0;

    const videoExists = this.db.prepare<[string], { one: number }>('SELECT 1 AS one FROM videos WHERE video_id = ?');
    const metricRow = this.db.prepare<[string, string], { view_count: number; like_count: number; comment_count: number }>(
      'SELECT view_count, like_count, comment_count FROM video_metrics WHERE video_id = ? AND metrics_date = ?',
    );

    const rows: MetricValues[] = [];
    for (const videoId of unique) {
      const row = metricRow.get(videoId, batch.day);
      if (!row) continue;
      if (!videoExists.get(videoId)) summary.orphanedMetrics++;
      rows.push({ viewCount: row.view_count, likeCount: row.like_count, commentCount: row.comment_count });
    }

    summary.outlierBase = rows.length;
    summary.outliers = countOutliers(rows, this.policy.outlierZScore);
  }
}
