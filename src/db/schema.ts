import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { moduleLogger } from '../core/logger.js';

const log = moduleLogger('db');

export type DB = Database.Database;

export const schema = `
-- Channels come from configuration; the core never deletes them
CREATE TABLE IF NOT EXISTS channels (
  channel_id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  content_type TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- Run ledger: one row per (channel, data kind, UTC day)
CREATE TABLE IF NOT EXISTS etl_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  channel_id TEXT NOT NULL,
  data_kind TEXT NOT NULL CHECK (data_kind IN ('videos', 'metrics', 'comments')),
  run_date TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('pending', 'running', 'succeeded', 'failed', 'skipped')),
  created_at TEXT NOT NULL,
  started_at TEXT,
  finished_at TEXT,
  duration_ms INTEGER,
  pages_fetched INTEGER NOT NULL DEFAULT 0,
  api_requests INTEGER NOT NULL DEFAULT 0,
  items_processed INTEGER NOT NULL DEFAULT 0,
  items_failed INTEGER NOT NULL DEFAULT 0,
  quality_status TEXT CHECK (quality_status IN ('pass', 'flagged')),
  quality_reasons TEXT,
  error_summary TEXT,
  UNIQUE(channel_id, data_kind, run_date)
);

-- Raw API payloads: write-once per item per fetch day
CREATE TABLE IF NOT EXISTS raw_payloads (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  channel_id TEXT NOT NULL,
  data_kind TEXT NOT NULL,
  external_id TEXT NOT NULL,
  fetch_date TEXT NOT NULL,
  fetched_at TEXT NOT NULL,
  payload TEXT NOT NULL,
  UNIQUE(data_kind, external_id, fetch_date)
);

CREATE TABLE IF NOT EXISTS videos (
  video_id TEXT PRIMARY KEY,
  channel_id TEXT NOT NULL,
  title TEXT,
  published_at TEXT NOT NULL,
  duration TEXT,
  first_seen_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- Metric history: one row per video per day
CREATE TABLE IF NOT EXISTS video_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  video_id TEXT NOT NULL,
  metrics_date TEXT NOT NULL,
  view_count INTEGER NOT NULL,
  like_count INTEGER NOT NULL,
  comment_count INTEGER NOT NULL,
  fetched_at TEXT NOT NULL,
  UNIQUE(video_id, metrics_date)
);

CREATE TABLE IF NOT EXISTS comments (
  comment_id TEXT PRIMARY KEY,
  video_id TEXT,
  channel_id TEXT NOT NULL,
  author_id TEXT NOT NULL,
  author_name TEXT,
  text TEXT NOT NULL,
  posted_at TEXT NOT NULL,
  like_count INTEGER NOT NULL DEFAULT 0,
  ingested_at TEXT NOT NULL
);

-- Derived annotations: overwritten on every scoring pass
CREATE TABLE IF NOT EXISTS comment_authenticity (
  comment_id TEXT PRIMARY KEY REFERENCES comments(comment_id),
  suspicion_score REAL NOT NULL CHECK (suspicion_score BETWEEN 0 AND 100),
  risk_level TEXT NOT NULL,
  suspicious INTEGER NOT NULL,
  features TEXT NOT NULL,
  scored_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS comment_sentiment (
  comment_id TEXT PRIMARY KEY REFERENCES comments(comment_id),
  label TEXT NOT NULL CHECK (label IN ('positive', 'neutral', 'negative')),
  confidence REAL NOT NULL CHECK (confidence BETWEEN 0 AND 1),
  raw_score REAL NOT NULL,
  votes TEXT NOT NULL,
  scored_at TEXT NOT NULL
);

-- Indexes
CREATE INDEX IF NOT EXISTS idx_etl_runs_date ON etl_runs(run_date);
CREATE INDEX IF NOT EXISTS idx_etl_runs_status ON etl_runs(status);
CREATE INDEX IF NOT EXISTS idx_videos_channel ON videos(channel_id);
CREATE INDEX IF NOT EXISTS idx_metrics_date ON video_metrics(metrics_date);
CREATE INDEX IF NOT EXISTS idx_comments_channel_posted ON comments(channel_id, posted_at);
CREATE INDEX IF NOT EXISTS idx_comments_author ON comments(author_id, posted_at);
CREATE INDEX IF NOT EXISTS idx_authenticity_score ON comment_authenticity(suspicion_score);
`;

export function initializeDatabase(db: DB): DB {
  db.exec(schema);
  return db;
}

/** Opens (creating if needed) the database file, or `:memory:` for tests. */
export function openDatabase(file: string): DB {
  if (file !== ':memory:') {
    const dir = path.dirname(file);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(file);
  // Enable WAL mode for better concurrent access
  if (file !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  initializeDatabase(db);
  log.info(`Database ready at ${file}`);
  return db;
}
