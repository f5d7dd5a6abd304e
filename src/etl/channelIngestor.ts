import type { Channel } from '../config.js';
import type { DB } from '../db/schema.js';
import type { IngestionWriter, WriteSummary } from '../db/ingestionWriter.js';
import type { RunCounts } from '../db/runLedger.js';
import type { CommentAnnotator } from '../pipeline/annotator.js';
import type { QualityGate, QualityVerdict } from '../pipeline/qualityGate.js';
import { ChannelRunFailed, SchemaError, asStorageError, errorMessage, type FetchError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import type { Clock } from '../core/dates.js';
import { moduleLogger } from '../core/logger.js';
import type { AnyPage, Cursor, DataKind, FetchedItem } from '../youtube/types.js';

const log = moduleLogger('ingestor');

/** Anything that can hand out pages the way the quota-aware fetcher does. */
export interface PageSource {
  fetch(channel: Channel, kind: DataKind, cursor: Cursor | null): Promise<Result<AnyPage, FetchError>>;
}

export type IngestOutcome =
  | { status: 'succeeded'; counts: RunCounts; quality: QualityVerdict }
  | { status: 'skipped'; counts: RunCounts; reason: string }
  | { status: 'failed'; counts: RunCounts; error: FetchError | ChannelRunFailed };

export interface IngestorOptions {
  maxPagesPerRun: number;
  clock: Clock;
}

function mergeWrites(into: WriteSummary, from: WriteSummary): void {
  into.outcomes.push(...from.outcomes);
  into.inserted += from.inserted;
  into.updated += from.updated;
  into.unchanged += from.unchanged;
  into.failed += from.failed;
  into.outsideRetention += from.outsideRetention;
}

/**
 * One admitted run: page through the stream, persist each page as it arrives,
 * annotate new comments, then put the whole batch through the quality gate.
 * Pages written before a fetch failure stay written.
 */
export class ChannelIngestor {
  constructor(
    private readonly db: DB,
    private readonly source: PageSource,
    private readonly writer: IngestionWriter,
    private readonly annotator: CommentAnnotator,
    private readonly gate: QualityGate,
    private readonly options: IngestorOptions,
  ) {}

  syncChannels(channels: readonly Channel[]): void {
    this.writer.syncChannels(channels);
  }

  /** Never throws. A crash mid-run comes back as `failed` with the counts reached so far. */
  async run(channel: Channel, kind: DataKind, day: string): Promise<IngestOutcome> {
    const counts: RunCounts = { itemsProcessed: 0, itemsFailed: 0, pagesFetched: 0, apiRequests: 0 };
    try {
      return await this.ingest(channel, kind, day, counts);
    } catch (error) {
      const context = { channelId: channel.id, kind, day };
      const promoted = asStorageError(error, context);
      const failure = promoted instanceof SchemaError
        ? promoted
        : new ChannelRunFailed(errorMessage(promoted), context, { cause: promoted });
      log.error(`${channel.id} ${kind} run crashed after ${counts.pagesFetched} page(s): ${failure.message}`);
      return { status: 'failed', counts, error: failure };
    }
  }

  private async ingest(channel: Channel, kind: DataKind, day: string, counts: RunCounts): Promise<IngestOutcome> {
    let cursor: Cursor | null = null;
    if (kind === 'metrics') {
      const videoIds = this.knownVideoIds(channel.id);
      if (videoIds.length === 0) {
        return { status: 'skipped', counts, reason: 'no known videos for channel' };
      }
      cursor = { kind: 'metrics', videoIds, offset: 0 };
    }

    const items: FetchedItem[] = [];
    const written: WriteSummary = { outcomes: [], inserted: 0, updated: 0, unchanged: 0, failed: 0, outsideRetention: 0 };
    let fetchError: FetchError | null = null;

    for (let page = 1; page <= this.options.maxPagesPerRun; page++) {
      const result = await this.source.fetch(channel, kind, cursor);
      if (!result.ok) {
        fetchError = result.error;
        break;
      }

      const fetchedAt = this.options.clock();
      counts.pagesFetched++;
      counts.apiRequests += result.value.requestCount;

      const pageItems: FetchedItem[] = result.value.items;
      const raw = this.writer.writeRaw(channel.id, kind, pageItems, fetchedAt, day);
      const processed = this.writer.writeProcessed(pageItems, fetchedAt, day);
      mergeWrites(written, processed);
      items.push(...pageItems);

      if (raw.failed > 0) {
        log.warn(`${channel.id} ${kind} page ${page}: ${raw.failed} raw payload(s) not archived`);
      }
      // Both writers report one outcome per item, in order
      const failed = pageItems.filter((_, i) =>
        raw.outcomes[i]?.status === 'failed' || processed.outcomes[i]?.status === 'failed').length;
      counts.itemsFailed += failed;
      counts.itemsProcessed += pageItems.length - failed;
      log.debug(`${channel.id} ${kind} page ${page}: ${result.value.itemCount} item(s)`);

      cursor = result.value.next;
      if (!cursor) break;
      if (page === this.options.maxPagesPerRun) {
        log.info(`${channel.id} ${kind}: stopped at the ${this.options.maxPagesPerRun}-page cap`);
      }
    }

    // Comments already written are annotated even when a later page failed
    if (kind === 'comments') {
      const ids = written.outcomes.flatMap(outcome =>
        outcome.status !== 'failed' && outcome.externalId ? [outcome.externalId] : []);
      this.annotator.annotate(channel.id, ids);
    }

    if (fetchError) {
      return { status: 'failed', counts, error: fetchError };
    }

    const summary = this.gate.inspect({ kind, day, items, write: written, now: this.options.clock() });
    const quality = this.gate.validate(summary);
    return { status: 'succeeded', counts, quality };
  }

  private knownVideoIds(channelId: string): string[] {
    return this.db.prepare<[string], { video_id: string }>(
      'SELECT video_id FROM videos WHERE channel_id = ? ORDER BY published_at DESC',
    ).all(channelId).map(row => row.video_id);
  }
}
