import type { DB } from './schema.js';
import type { RunStatus } from './runLedger.js';
import type { SentimentLabel } from '../pipeline/sentiment.js';

// Read side for monitoring and reporting. Nothing here writes.

export interface DayStatus {
  run_date: string;
  total: number;
  pending: number;
  running: number;
  succeeded: number;
  failed: number;
  skipped: number;
  flagged: number;
  items_processed: number;
  items_failed: number;
}

export function getDayStatus(db: DB, day: string): DayStatus {
  const row = db.prepare<[string], Omit<DayStatus, 'run_date'>>(`
    SELECT
      COUNT(*) AS total,
      COALESCE(SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END), 0) AS pending,
      COALESCE(SUM(CASE WHEN status = 'running' THEN 1 ELSE 0 END), 0) AS running,
      COALESCE(SUM(CASE WHEN status = 'succeeded' THEN 1 ELSE 0 END), 0) AS succeeded,
      COALESCE(SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END), 0) AS failed,
      COALESCE(SUM(CASE WHEN status = 'skipped' THEN 1 ELSE 0 END), 0) AS skipped,
      COALESCE(SUM(CASE WHEN quality_status = 'flagged' THEN 1 ELSE 0 END), 0) AS flagged,
      COALESCE(SUM(items_processed), 0) AS items_processed,
      COALESCE(SUM(items_failed), 0) AS items_failed
    FROM etl_runs WHERE run_date = ?
  `).get(day);

  return {
    run_date: day,
    total: row?.total ?? 0,
    pending: row?.pending ?? 0,
    running: row?.running ?? 0,
    succeeded: row?.succeeded ?? 0,
    failed: row?.failed ?? 0,
    skipped: row?.skipped ?? 0,
    flagged: row?.flagged ?? 0,
    items_processed: row?.items_processed ?? 0,
    items_failed: row?.items_failed ?? 0,
  };
}

export function getRecentRunDays(db: DB, limit = 7): string[] {
  return db.prepare<[number], { run_date: string }>(
    'SELECT DISTINCT run_date FROM etl_runs ORDER BY run_date DESC LIMIT ?',
  ).all(limit).map(row => row.run_date);
}

export interface FailedRun {
  id: number;
  channel_id: string;
  data_kind: string;
  run_date: string;
  status: RunStatus;
  error_summary: string | null;
}

export function getRecentFailures(db: DB, limit = 20): FailedRun[] {
  return db.prepare<[number], FailedRun>(`
    SELECT id, channel_id, data_kind, run_date, status, error_summary
    FROM etl_runs WHERE status = 'failed'
    ORDER BY finished_at DESC LIMIT ?
  `).all(limit);
}

export interface SuspiciousComment {
  comment_id: string;
  channel_id: string;
  video_id: string | null;
  author_id: string;
  text: string;
  posted_at: string;
  suspicion_score: number;
  risk_level: string;
  features: string;
}

export interface SuspiciousFilters {
  minScore: number;
  channelId?: string;
  limit?: number;
}

export function getSuspiciousComments(db: DB, filters: SuspiciousFilters): SuspiciousComment[] {
  let query = `
    SELECT c.comment_id, c.channel_id, c.video_id, c.author_id, c.text, c.posted_at,
      a.suspicion_score, a.risk_level, a.features
    FROM comment_authenticity a
    JOIN comments c ON c.comment_id = a.comment_id
    WHERE a.suspicion_score >= ?`;
  const params: (string | number)[] = [filters.minScore];

  if (filters.channelId) {
    query += ' AND c.channel_id = ?';
    params.push(filters.channelId);
  }

  query += ' ORDER BY a.suspicion_score DESC, c.posted_at DESC LIMIT ?';
  params.push(filters.limit ?? 50);

  return db.prepare<(string | number)[], SuspiciousComment>(query).all(...params);
}

export interface SentimentBreakdown {
  channel_id: string;
  label: SentimentLabel;
  count: number;
  avg_confidence: number;
}

export function getSentimentDistribution(db: DB, channelId?: string): SentimentBreakdown[] {
  let query = `
    SELECT c.channel_id, s.label, COUNT(*) AS count, ROUND(AVG(s.confidence), 4) AS avg_confidence
    FROM comment_sentiment s
    JOIN comments c ON c.comment_id = s.comment_id`;
  const params: string[] = [];

  if (channelId) {
    query += ' WHERE c.channel_id = ?';
    params.push(channelId);
  }
  query += ' GROUP BY c.channel_id, s.label ORDER BY c.channel_id, s.label';

  return db.prepare<string[], SentimentBreakdown>(query).all(...params);
}

export interface TableCounts {
  channels: number;
  videos: number;
  video_metrics: number;
  comments: number;
  raw_payloads: number;
}

export function getTableCounts(db: DB): TableCounts {
  const count = (table: keyof TableCounts) =>
    db.prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${table}`).get()?.c ?? 0;

  return {
    channels: count('channels'),
    videos: count('videos'),
    video_metrics: count('video_metrics'),
    comments: count('comments'),
    raw_payloads: count('raw_payloads'),
  };
}
