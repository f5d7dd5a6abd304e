import { config, loadChannels, type AppConfig, type Channel } from '../config.js';
import { openDatabase, type DB } from '../db/schema.js';
import { RunLedger } from '../db/runLedger.js';
import { IngestionWriter } from '../db/ingestionWriter.js';
import { CommentAnnotator } from '../pipeline/annotator.js';
import { QualityGate } from '../pipeline/qualityGate.js';
import { RequestPacer } from '../core/rateLimit.js';
import { systemClock, type Clock } from '../core/dates.js';
import { YouTubeClient, type FetchImpl } from '../youtube/client.js';
import { QuotaAwareFetcher } from '../youtube/fetcher.js';
import { ChannelIngestor, type PageSource } from './channelIngestor.js';
import { DailyOrchestrator } from './orchestrator.js';

export interface EtlContext {
  db: DB;
  channels: readonly Channel[];
  ledger: RunLedger;
  orchestrator: DailyOrchestrator;
}

export interface EtlContextOptions {
  db?: DB;
  channels?: readonly Channel[];
  /** Replaces the YouTube fetcher entirely */
  source?: PageSource;
  fetchImpl?: FetchImpl;
  clock?: Clock;
  settings?: Readonly<AppConfig>;
}

function buildFetcher(settings: Readonly<AppConfig>, fetchImpl?: FetchImpl): QuotaAwareFetcher {
  const apiKey = settings.youtube.apiKey;
  if (!apiKey) {
    throw new Error('YOUTUBE_API_KEY is not set. Copy .env.example to .env and add a key.');
  }
  const client = new YouTubeClient({
    apiKey,
    baseUrl: settings.youtube.baseUrl,
    timeoutMs: settings.youtube.timeoutMs,
    fetchImpl,
    pacer: new RequestPacer({ requestsPerMinute: settings.youtube.requestsPerMinute }),
  });
  return new QuotaAwareFetcher(client, {
    pageSize: settings.youtube.pageSize,
    commentPageSize: settings.youtube.commentPageSize,
    retry: settings.retry,
  });
}

/** Wires the ETL graph once; every collaborator gets the same clock and database. */
export function createEtlContext(options: EtlContextOptions = {}): EtlContext {
  const settings = options.settings ?? config;
  const clock = options.clock ?? systemClock;
  const db = options.db ?? openDatabase(settings.paths.database);
  const channels = options.channels ?? loadChannels(settings.paths.channels);
  const source = options.source ?? buildFetcher(settings, options.fetchImpl);

  const ledger = new RunLedger(db, clock);
  const writer = new IngestionWriter(db, { retentionDays: settings.retentionDays, now: clock });
  const annotator = new CommentAnnotator(db, {
    policy: settings.authenticity,
    peerWindowDays: settings.authenticity.peerWindowDays,
    now: clock,
  });
  const gate = new QualityGate(db, settings.quality);
  const ingestor = new ChannelIngestor(db, source, writer, annotator, gate, {
    maxPagesPerRun: settings.youtube.maxPagesPerRun,
    clock,
  });

  const orchestrator = new DailyOrchestrator({
    channels,
    ledger,
    ingestor,
    clock,
    concurrency: settings.concurrency,
  });

  return { db, channels, ledger, orchestrator };
}
