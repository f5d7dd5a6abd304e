import { openDatabase, type DB } from '../src/db/schema.js';
import { RunLedger } from '../src/db/runLedger.js';
import { IngestionWriter } from '../src/db/ingestionWriter.js';
import { CommentAnnotator } from '../src/pipeline/annotator.js';
import { DEFAULT_POLICY } from '../src/pipeline/authenticity.js';
import { QualityGate } from '../src/pipeline/qualityGate.js';
import { ChannelIngestor, type PageSource } from '../src/etl/channelIngestor.js';
import { DailyOrchestrator } from '../src/etl/orchestrator.js';
import { ok, type Result } from '../src/core/result.js';
import type { FetchError } from '../src/core/errors.js';
import type { Channel } from '../src/config.js';
import type {
  AnyPage,
  CommentsCursor,
  CommentsPage,
  Cursor,
  DataKind,
  FetchedComment,
  FetchedMetric,
  FetchedVideo,
  MetricsCursor,
  MetricsPage,
  VideosCursor,
  VideosPage,
} from '../src/youtube/types.js';

export const NOW = new Date('2024-05-01T12:00:00.000Z');
export const TODAY = '2024-05-01';

export function channel(id: string): Channel {
  return { id, name: `Channel ${id}`, contentType: 'music' };
}

export function video(id: string, channelId: string | null, overrides: Partial<FetchedVideo> = {}): FetchedVideo {
  return {
    kind: 'videos',
    externalId: id,
    channelId,
    title: `Video ${id}`,
    publishedAt: '2024-04-30T10:00:00Z',
    duration: 'PT3M30S',
    payload: { id },
    ...overrides,
  };
}

export function metric(id: string, views: number | null, likes: number | null = 10, comments: number | null = 2): FetchedMetric {
  return {
    kind: 'metrics',
    externalId: id,
    viewCount: views,
    likeCount: likes,
    commentCount: comments,
    payload: { id, statistics: { viewCount: views } },
  };
}

export function comment(id: string, channelId: string, overrides: Partial<FetchedComment> = {}): FetchedComment {
  return {
    kind: 'comments',
    externalId: id,
    videoId: 'v1',
    channelId,
    authorId: `author-${id}`,
    authorName: `Author ${id}`,
    text: 'Nice upload',
    postedAt: '2024-05-01T09:00:00Z',
    likeCount: 0,
    payload: { id },
    ...overrides,
  };
}

export function videosPage(items: FetchedVideo[], next: VideosCursor | null = null, requestCount = 1): VideosPage {
  return { items, itemCount: items.length, next, requestCount };
}

export function metricsPage(items: FetchedMetric[], next: MetricsCursor | null = null): MetricsPage {
  return { items, itemCount: items.length, next, requestCount: 1 };
}

export function commentsPage(items: FetchedComment[], next: CommentsCursor | null = null): CommentsPage {
  return { items, itemCount: items.length, next, requestCount: 1 };
}

export interface SourceCall {
  channelId: string;
  kind: DataKind;
  cursor: Cursor | null;
}

/** Scripted page source: each (channel, kind) hands out its queued results in order. */
export class FakeSource implements PageSource {
  readonly calls: SourceCall[] = [];
  private readonly scripts = new Map<string, Result<AnyPage, FetchError>[]>();

  script(channelId: string, kind: DataKind, ...results: Result<AnyPage, FetchError>[]): this {
    this.scripts.set(`${channelId}:${kind}`, results);
    return this;
  }

  async fetch(target: Channel, kind: DataKind, cursor: Cursor | null): Promise<Result<AnyPage, FetchError>> {
    this.calls.push({ channelId: target.id, kind, cursor });
    const queue = this.scripts.get(`${target.id}:${kind}`);
    const next = queue?.shift();
    return next ?? ok(videosPage([]));
  }
}

export interface Harness {
  db: DB;
  ledger: RunLedger;
  writer: IngestionWriter;
  orchestrator: DailyOrchestrator;
}

export function harness(source: PageSource, channels: readonly Channel[], concurrency = 1): Harness {
  const clock = () => NOW;
  const db = openDatabase(':memory:');
  const ledger = new RunLedger(db, clock);
  const writer = new IngestionWriter(db, { retentionDays: 30, now: clock });
  const annotator = new CommentAnnotator(db, { policy: DEFAULT_POLICY, peerWindowDays: 30, now: clock });
  const gate = new QualityGate(db, { nullCriticalTolerance: 0, maxOutlierRatio: 0.05, outlierZScore: 3 });
  const ingestor = new ChannelIngestor(db, source, writer, annotator, gate, { maxPagesPerRun: 5, clock });
  const orchestrator = new DailyOrchestrator({ channels, ledger, ingestor, clock, concurrency });
  return { db, ledger, writer, orchestrator };
}

export function count(db: DB, table: string): number {
  return db.prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${table}`).get()?.c ?? 0;
}
