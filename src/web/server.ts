import express from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { systemClock, utcDay, type Clock } from '../core/dates.js';
import type { DB } from '../db/schema.js';
import { RunLedger } from '../db/runLedger.js';
import {
  getDayStatus,
  getRecentFailures,
  getRecentRunDays,
  getSentimentDistribution,
  getSuspiciousComments,
  getTableCounts,
} from '../db/queries.js';
import type { ScheduleInfo } from '../scheduler/jobs.js';

export interface ServerDeps {
  db: DB;
  suspicionThreshold: number;
  schedule?: () => ScheduleInfo;
  clock?: Clock;
}

const dayParam = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD').optional();
const limitParam = z.coerce.number().int().min(1).max(500).optional();

const runsQuery = z.object({ date: dayParam });
const suspiciousQuery = z.object({
  channel: z.string().min(1).optional(),
  minScore: z.coerce.number().min(0).max(100).optional(),
  limit: limitParam,
});
const sentimentQuery = z.object({ channel: z.string().min(1).optional() });

/** Read-only JSON view over the ledger and annotation tables. */
export function createApp(deps: ServerDeps): express.Express {
  const app = express();
  const clock = deps.clock ?? systemClock;
  const ledger = new RunLedger(deps.db, clock);

  app.use(express.json());

  // Runs for one day (default: today, UTC)
  app.get('/api/runs', (req, res) => {
    const query = runsQuery.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: query.error.issues[0]?.message ?? 'invalid query' });
      return;
    }
    const day = query.data.date ?? utcDay(clock());
    res.json({ day, runs: ledger.listRuns(day) });
  });

  // System status / health
  app.get('/api/status', (req, res) => {
    const today = utcDay(clock());
    res.json({
      uptimeSeconds: Math.round(process.uptime()),
      today: getDayStatus(deps.db, today),
      recentDays: getRecentRunDays(deps.db).map(day => getDayStatus(deps.db, day)),
      recentFailures: getRecentFailures(deps.db, 10),
      tables: getTableCounts(deps.db),
      schedule: deps.schedule?.() ?? null,
    });
  });

  app.get('/api/comments/suspicious', (req, res) => {
    const query = suspiciousQuery.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: query.error.issues[0]?.message ?? 'invalid query' });
      return;
    }
    const comments = getSuspiciousComments(deps.db, {
      minScore: query.data.minScore ?? deps.suspicionThreshold,
      channelId: query.data.channel,
      limit: query.data.limit,
    });
    res.json(comments.map(comment => {
      const features: unknown = JSON.parse(comment.features);
      return { ...comment, features };
    }));
  });

  app.get('/api/sentiment', (req, res) => {
    const query = sentimentQuery.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: query.error.issues[0]?.message ?? 'invalid query' });
      return;
    }
    res.json(getSentimentDistribution(deps.db, query.data.channel));
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Request failed', { error });
    res.status(500).json({ error: 'Internal error. Check server logs.' });
  });

  return app;
}

export function startServer(deps: ServerDeps, port: number = config.port): Server {
  const app = createApp(deps);
  return app.listen(port, () => {
    logger.info(`Status API running at http://localhost:${port}`);
  });
}
