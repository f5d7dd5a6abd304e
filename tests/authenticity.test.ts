import { describe, it, expect } from 'vitest';
import {
  DEFAULT_POLICY,
  PeerWindow,
  cosineSimilarity,
  isWhitelisted,
  ngramVector,
  riskLevel,
  scoreComment,
  type ScorableComment,
} from '../src/pipeline/authenticity.js';

function scorable(commentId: string, overrides: Partial<ScorableComment> = {}): ScorableComment {
  return {
    commentId,
    authorId: `author-${commentId}`,
    text: 'Great video thanks for sharing',
    postedAt: '2024-05-01T09:00:00.000Z',
    likeCount: 0,
    ...overrides,
  };
}

describe('scoreComment', () => {
  it('scores a copy-pasted burst from a brand-new author', () => {
    const spam = 'Check my channel for free gift cards';
    const first = scorable('c1', { authorId: 'spam-bot', text: spam, postedAt: '2024-05-01T09:00:00.000Z' });
    const second = scorable('c2', { authorId: 'spam-bot', text: spam, postedAt: '2024-05-01T09:00:30.000Z' });
    const peers = new PeerWindow([first, second], () => 0);

    const result = scoreComment(first, peers, { ...DEFAULT_POLICY, suspicionThreshold: 50 });

    // 100 * (0.45 * 1/3 + 0.25 * 1/3 + 0.2 + 0.1)
    expect(result.score).toBeCloseTo(53.33, 2);
    expect(result.riskLevel).toBe('medium');
    expect(result.suspicious).toBe(true);
    expect(result.features.duplicateCount).toBe(1);
    expect(result.features.burstCount).toBe(1);
    expect(result.features.authorSparsity).toBe(1);

    expect(scoreComment(first, peers, DEFAULT_POLICY).suspicious).toBe(false);
  });

  it('scores an established, liked, original comment near zero', () => {
    const genuine = scorable('c1', {
      authorId: 'regular',
      text: 'The bridge at 2:10 reminds me of their first album',
      likeCount: 12,
    });
    const result = scoreComment(genuine, new PeerWindow([genuine], () => 60));

    expect(result.score).toBeCloseTo(0.96, 2);
    expect(result.riskLevel).toBe('low');
    expect(result.features.duplicateCount).toBe(0);
    expect(result.features.authorPriorComments).toBe(60);
  });

  it('looks up author history up to the start of the burst window', () => {
    const lookups: Array<[string, string]> = [];
    const candidate = scorable('c1', { authorId: 'regular', postedAt: '2024-05-01T09:00:00.000Z' });
    const peers = new PeerWindow([candidate], (authorId, beforeMs) => {
      lookups.push([authorId, new Date(beforeMs).toISOString()]);
      return 40;
    });

    const result = scoreComment(candidate, peers);

    expect(lookups).toEqual([['regular', '2024-05-01T08:59:00.000Z']]);
    expect(result.features.authorPriorComments).toBe(40);
    expect(scoreComment(scorable('c2', { postedAt: 'sometime' }), peers).features.authorPriorComments).toBe(0);
  });

  it('never lowers the score as exact duplicates are added, saturating at three', () => {
    const candidate = scorable('c0');
    const scores = [0, 1, 2, 3, 4, 5].map(k => {
      const copies = Array.from({ length: k }, (_, i) => scorable(`dup${i}`, {
        postedAt: `2024-05-01T${String(10 + i).padStart(2, '0')}:00:00.000Z`,
      }));
      return scoreComment(candidate, new PeerWindow([candidate, ...copies])).score;
    });

    const expected = [30, 45, 60, 75, 75, 75];
    scores.forEach((score, i) => expect(score).toBeCloseTo(expected[i] ?? Number.NaN, 1));
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i] ?? 0).toBeGreaterThanOrEqual((scores[i - 1] ?? 0) - 0.01);
    }
  });

  it('ignores bursts from other authors', () => {
    const candidate = scorable('c1', { text: 'first listen and already hooked' });
    const other = scorable('c2', { text: 'what microphone was used here', postedAt: '2024-05-01T09:00:10.000Z' });

    const result = scoreComment(candidate, new PeerWindow([candidate, other]));
    expect(result.features.burstCount).toBe(0);
    expect(result.features.duplicateCount).toBe(0);
  });

  it('lowers the score of fan expressions by the whitelist adjustment', () => {
    const fan = scorable('c1', { text: 'goosebumps every single time' });
    const peers = new PeerWindow([fan]);

    expect(scoreComment(fan, peers).score).toBe(15);
    expect(scoreComment(fan, peers).features.whitelisted).toBe(true);
    expect(scoreComment(fan, peers, { ...DEFAULT_POLICY, whitelistAdjustment: 0 }).score).toBe(30);
  });

  it('keeps the score within 0 and 100', () => {
    const fan = scorable('c1', { text: 'Legend', likeCount: 500 });
    const result = scoreComment(fan, new PeerWindow([fan], () => 3000));
    expect(result.score).toBe(0);
  });
});

describe('riskLevel', () => {
  it('buckets at 30 and 70', () => {
    expect(riskLevel(29.99)).toBe('low');
    expect(riskLevel(30)).toBe('medium');
    expect(riskLevel(69.99)).toBe('medium');
    expect(riskLevel(70)).toBe('high');
  });
});

describe('text similarity', () => {
  it('treats case and punctuation as noise', () => {
    const a = ngramVector('FREE gift cards!!!');
    const b = ngramVector('free gift cards');
    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 6);
  });

  it('is zero for texts with no shared grams', () => {
    expect(cosineSimilarity(ngramVector('abcdef'), ngramVector('uvwxyz'))).toBe(0);
    expect(cosineSimilarity(ngramVector(''), ngramVector('abc'))).toBe(0);
  });

  it('matches whitelist phrases on word boundaries only', () => {
    expect(isWhitelisted('Who is here in 2024?')).toBe(true);
    expect(isWhitelisted('kingdom hearts vibes')).toBe(false);
  });
});
