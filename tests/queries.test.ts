import { describe, it, expect } from 'vitest';
import { err, ok } from '../src/core/result.js';
import { TransientFetchError } from '../src/core/errors.js';
import {
  getDayStatus,
  getRecentFailures,
  getRecentRunDays,
  getSentimentDistribution,
  getSuspiciousComments,
  getTableCounts,
} from '../src/db/queries.js';
import { FakeSource, TODAY, channel, comment, commentsPage, harness } from './helpers.js';

const spam = 'Check my channel for free gift cards';

async function seeded() {
  const source = new FakeSource()
    .script('ch1', 'comments', ok(commentsPage([
      comment('c1', 'ch1', { authorId: 'spam-bot', text: spam, postedAt: '2024-05-01T09:00:00Z' }),
      comment('c2', 'ch1', { authorId: 'spam-bot', text: spam, postedAt: '2024-05-01T09:00:30Z' }),
      comment('c3', 'ch1', { text: 'what song is this?' }),
    ])))
    .script('ch2', 'comments', err(new TransientFetchError('HTTP 503: down (after 4 attempts)', 503)));
  const { db, orchestrator } = harness(source, [channel('ch1'), channel('ch2')]);
  await orchestrator.runDay(['comments']);
  return db;
}

describe('queries', () => {
  it('summarizes a day of runs', async () => {
    const db = await seeded();

    expect(getDayStatus(db, TODAY)).toMatchObject({ total: 2, succeeded: 1, failed: 1, pending: 0, items_processed: 3 });
    expect(getDayStatus(db, '2024-04-30')).toMatchObject({ total: 0, succeeded: 0 });
    expect(getRecentRunDays(db)).toEqual([TODAY]);
    expect(getRecentFailures(db).map(run => [run.channel_id, run.error_summary])).toEqual([
      ['ch2', 'TRANSIENT_FETCH: HTTP 503: down (after 4 attempts)'],
    ]);
  });

  it('lists comments at or above a suspicion score, highest and newest first', async () => {
    const db = await seeded();

    const suspicious = getSuspiciousComments(db, { minScore: 50 });
    expect(suspicious.map(row => row.comment_id)).toEqual(['c2', 'c1']);
    expect(suspicious[0]?.suspicion_score).toBeCloseTo(53.33, 2);

    expect(getSuspiciousComments(db, { minScore: 50, channelId: 'ch2' })).toEqual([]);
    expect(getSuspiciousComments(db, { minScore: 50, limit: 1 })).toHaveLength(1);
  });

  it('breaks sentiment down per channel', async () => {
    const db = await seeded();

    const breakdown = getSentimentDistribution(db, 'ch1');
    expect(breakdown.reduce((sum, row) => sum + row.count, 0)).toBe(3);
    expect(breakdown.find(row => row.label === 'neutral')?.count).toBeGreaterThanOrEqual(1);
    expect(getSentimentDistribution(db, 'ch2')).toEqual([]);
    expect(getTableCounts(db)).toEqual({ channels: 2, videos: 0, video_metrics: 0, comments: 3, raw_payloads: 3 });
  });
});
