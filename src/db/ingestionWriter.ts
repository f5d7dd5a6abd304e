import { z } from 'zod';
import type { DB } from './schema.js';
import type { Channel } from '../config.js';
import type { DataKind, FetchedComment, FetchedItem, FetchedMetric, FetchedVideo } from '../youtube/types.js';
import { SchemaError, ValidationError, asStorageError, errorMessage } from '../core/errors.js';
import { addDays, parseTimestamp, utcDay } from '../core/dates.js';
import { moduleLogger } from '../core/logger.js';

const log = moduleLogger('ingestion-writer');

export type WriteStatus = 'inserted' | 'updated' | 'unchanged';

export type ItemOutcome =
  | { externalId: string | null; status: WriteStatus }
  | { externalId: string | null; status: 'failed'; reason: string; field: string | null };

export interface WriteSummary {
  outcomes: ItemOutcome[];
  inserted: number;
  updated: number;
  unchanged: number;
  failed: number;
  /** Written normally, just older than the retention window. */
  outsideRetention: number;
}

/** Fields whose absence the quality gate counts separately from other row failures. */
export const CRITICAL_FIELDS: ReadonlySet<string> = new Set(['video_id', 'channel_id', 'comment_id', 'date']);

// ============================================================================
// ROW VALIDATION
// ============================================================================

const id = (label: string) => z.string({ invalid_type_error: `${label} missing`, required_error: `${label} missing` })
  .min(1, `${label} missing`);

const timestamp = (label: string) => z.string({ invalid_type_error: `${label} missing`, required_error: `${label} missing` })
  .refine(value => parseTimestamp(value) !== null, `${label} is not a timestamp`)
  .transform(value => parseTimestamp(value)?.toISOString() ?? value);

const counter = (label: string) => z.number({ invalid_type_error: `${label} missing`, required_error: `${label} missing` })
  .int(`${label} is not an integer`);

const videoRowSchema = z.object({
  video_id: id('video id'),
  channel_id: id('channel id'),
  date: timestamp('published date'),
  title: z.string().nullable(),
  duration: z.string().nullable(),
});

const metricRowSchema = z.object({
  video_id: id('video id'),
  view_count: counter('view count'),
  like_count: counter('like count'),
  comment_count: counter('comment count'),
});

const commentRowSchema = z.object({
  comment_id: id('comment id'),
  channel_id: id('channel id'),
  author_id: id('author id'),
  text: z.string({ invalid_type_error: 'text missing', required_error: 'text missing' }),
  date: timestamp('posted date'),
  video_id: z.string().nullable(),
  author_name: z.string().nullable(),
  like_count: z.number().int().nonnegative(),
});

function validateRow<S extends z.ZodTypeAny>(schema: S, row: unknown, externalId: string | null): z.output<S> {
  const parsed = schema.safeParse(row);
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  const field = issue && typeof issue.path[0] === 'string' ? issue.path[0] : null;
  throw new ValidationError(issue?.message ?? 'invalid row', field, { externalId });
}

// ============================================================================
// WRITER
// ============================================================================

export interface IngestionWriterOptions {
  retentionDays: number;
  now?: () => Date;
}

/**
 * Idempotent persistence of fetched items. Each item gets its own outcome;
 * one bad row never aborts the batch. Storage errors that reveal a schema
 * mismatch are rethrown as SchemaError.
 */
export class IngestionWriter {
  private readonly now: () => Date;

  constructor(private readonly db: DB, private readonly options: IngestionWriterOptions) {
    this.now = options.now ?? (() => new Date());
  }

  syncChannels(channels: readonly Channel[]): void {
    const upsert = this.db.prepare(`
      INSERT INTO channels (channel_id, name, content_type, updated_at)
      VALUES (@id, @name, @contentType, @updatedAt)
      ON CONFLICT(channel_id) DO UPDATE SET
        name = excluded.name,
        content_type = excluded.content_type,
        updated_at = excluded.updated_at
    `);
    const updatedAt = this.now().toISOString();
    this.db.transaction(() => {
      for (const channel of channels) {
        upsert.run({ ...channel, updatedAt });
      }
    })();
  }

  /** Raw payloads are write-once per item and fetch day; re-delivery is a no-op. */
  writeRaw(
    channelId: string,
    kind: DataKind,
    items: readonly FetchedItem[],
    fetchedAt: Date = this.now(),
    fetchDate: string = utcDay(fetchedAt),
  ): WriteSummary {
    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO raw_payloads (channel_id, data_kind, external_id, fetch_date, fetched_at, payload)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    return this.eachItem(items, item => {
      if (!item.externalId) {
        throw new ValidationError(`${kind} payload without an id`, kind === 'comments' ? 'comment_id' : 'video_id');
      }
      const changes = insert.run(
        channelId, kind, item.externalId, fetchDate, fetchedAt.toISOString(), JSON.stringify(item.payload),
      ).changes;
      return changes === 1 ? 'inserted' : 'unchanged';
    });
  }

  /**
   * Normalized rows. Videos are upserted in place, metrics append one row per
   * video per day (same-day re-delivery keeps the larger counters), comments
   * are insert-once. `snapshotDate` is the day metric rows are filed under.
   */
  writeProcessed(
    items: readonly FetchedItem[],
    fetchedAt: Date = this.now(),
    snapshotDate: string = utcDay(fetchedAt),
  ): WriteSummary {
    const summary = this.eachItem(items, item => {
      switch (item.kind) {
        case 'videos':
          return this.upsertVideo(item, fetchedAt);
        case 'metrics':
          return this.appendMetric(item, fetchedAt, snapshotDate);
        case 'comments':
          return this.insertComment(item, fetchedAt);
      }
    });

    const cutoff = addDays(snapshotDate, -this.options.retentionDays);
    summary.outsideRetention = items.filter(item => {
      const when = item.kind === 'videos' ? item.publishedAt : item.kind === 'comments' ? item.postedAt : null;
      const parsed = parseTimestamp(when);
      return parsed !== null && utcDay(parsed) < cutoff;
    }).length;
    if (summary.outsideRetention > 0) {
      log.debug(`${summary.outsideRetention} item(s) older than ${this.options.retentionDays} days`);
    }
    return summary;
  }

  private eachItem(items: readonly FetchedItem[], write: (item: FetchedItem) => WriteStatus): WriteSummary {
    const summary: WriteSummary = { outcomes: [], inserted: 0, updated: 0, unchanged: 0, failed: 0, outsideRetention: 0 };

    const run = this.db.transaction(() => {
      for (const item of items) {
        try {
          const status = write(item);
          summary.outcomes.push({ externalId: item.externalId, status });
          summary[status]++;
        } catch (error) {
          const promoted = asStorageError(error, { externalId: item.externalId, kind: item.kind });
          if (promoted instanceof SchemaError) {
            throw promoted;
          }
          const field = promoted instanceof ValidationError ? promoted.field : null;
          const reason = errorMessage(promoted);
          log.warn(`Skipped ${item.kind} item ${item.externalId ?? '(no id)'}: ${reason}`);
          summary.outcomes.push({ externalId: item.externalId, status: 'failed', reason, field });
          summary.failed++;
        }
      }
    });
    run();

    return summary;
  }

  private upsertVideo(item: FetchedVideo, fetchedAt: Date): WriteStatus {
    const row = validateRow(videoRowSchema, {
      video_id: item.externalId,
      channel_id: item.channelId,
      date: item.publishedAt,
      title: item.title,
      duration: item.duration,
    }, item.externalId);

    const existing = this.db.prepare<[string], { title: string | null; duration: string | null; channel_id: string }>(
      'SELECT title, duration, channel_id FROM videos WHERE video_id = ?',
    ).get(row.video_id);
    const seenAt = fetchedAt.toISOString();

    if (!existing) {
      this.db.prepare(`
        INSERT INTO videos (video_id, channel_id, title, published_at, duration, first_seen_at, updated_at)
        VALUES (@video_id, @channel_id, @title, @date, @duration, @seen_at, @seen_at)
      `).run({ ...row, seen_at: seenAt });
      return 'inserted';
    }

    if (existing.title === row.title && existing.duration === row.duration && existing.channel_id === row.channel_id) {
      return 'unchanged';
    }

    this.db.prepare(`
      UPDATE videos SET channel_id = @channel_id, title = @title, duration = @duration, updated_at = @seen_at
      WHERE video_id = @video_id
    `).run({ ...row, seen_at: seenAt });
    return 'updated';
  }

  private appendMetric(item: FetchedMetric, fetchedAt: Date, metricsDate: string): WriteStatus {
    const row = validateRow(metricRowSchema, {
      video_id: item.externalId,
      view_count: item.viewCount,
      like_count: item.likeCount,
      comment_count: item.commentCount,
    }, item.externalId);

    const existing = this.db.prepare<[string, string], { view_count: number; like_count: number; comment_count: number }>(
      'SELECT view_count, like_count, comment_count FROM video_metrics WHERE video_id = ? AND metrics_date = ?',
    ).get(row.video_id, metricsDate);

    // Counters never move backwards within a day
    this.db.prepare(`
      INSERT INTO video_metrics (video_id, metrics_date, view_count, like_count, comment_count, fetched_at)
      VALUES (@video_id, @metrics_date, @view_count, @like_count, @comment_count, @fetched_at)
      ON CONFLICT(video_id, metrics_date) DO UPDATE SET
        view_count = MAX(view_count, excluded.view_count),
        like_count = MAX(like_count, excluded.like_count),
        comment_count = MAX(comment_count, excluded.comment_count),
        fetched_at = excluded.fetched_at
    `).run({ ...row, metrics_date: metricsDate, fetched_at: fetchedAt.toISOString() });

    if (!existing) return 'inserted';
    const grew = row.view_count > existing.view_count
      || row.like_count > existing.like_count
      || row.comment_count > existing.comment_count;
    return grew ? 'updated' : 'unchanged';
  }

  private insertComment(item: FetchedComment, fetchedAt: Date): WriteStatus {
    const row = validateRow(commentRowSchema, {
      comment_id: item.externalId,
      channel_id: item.channelId,
      author_id: item.authorId,
      text: item.text,
      date: item.postedAt,
      video_id: item.videoId,
      author_name: item.authorName,
      like_count: item.likeCount,
    }, item.externalId);

    const changes = this.db.prepare(`
      INSERT INTO comments (comment_id, video_id, channel_id, author_id, author_name, text, posted_at, like_count, ingested_at)
      VALUES (@comment_id, @video_id, @channel_id, @author_id, @author_name, @text, @date, @like_count, @ingested_at)
      ON CONFLICT(comment_id) DO NOTHING
    `).run({ ...row, ingested_at: fetchedAt.toISOString() }).changes;

    return changes === 1 ? 'inserted' : 'unchanged';
  }
}
