import type { DB } from '../db/schema.js';
import { addDays, utcDay } from '../core/dates.js';
import { moduleLogger } from '../core/logger.js';
import { PeerWindow, scoreComment, type AuthenticityPolicy, type ScorableComment } from './authenticity.js';
import { analyzeSentiment, type SentimentLabel } from './sentiment.js';

const log = moduleLogger('annotator');

export interface AnnotatorOptions {
  policy: AuthenticityPolicy;
  peerWindowDays: number;
  now?: () => Date;
}

export interface AnnotationSummary {
  scored: number;
  suspicious: number;
  sentiment: Record<SentimentLabel, number>;
}

interface CommentRow {
  comment_id: string;
  author_id: string;
  text: string;
  posted_at: string;
  like_count: number;
}

const toScorable = (row: CommentRow): ScorableComment => ({
  commentId: row.comment_id,
  authorId: row.author_id,
  text: row.text,
  postedAt: row.posted_at,
  likeCount: row.like_count,
});

/**
 * Scores authenticity and sentiment for stored comments and overwrites both
 * annotation rows. Safe to run any number of times over the same comments.
 */
export class CommentAnnotator {
  private readonly now: () => Date;

  constructor(private readonly db: DB, private readonly options: AnnotatorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Peers are the channel's comments posted inside the window, the targets included.
   * Author history counts everything the author posted earlier, on any channel.
   */
  loadPeerWindow(channelId: string): PeerWindow {
    const windowStart = `${addDays(utcDay(this.now()), -this.options.peerWindowDays)}T00:00:00.000Z`;

    const peers = this.db.prepare<[string, string], CommentRow>(`
      SELECT comment_id, author_id, text, posted_at, like_count
      FROM comments WHERE channel_id = ? AND posted_at >= ?
      ORDER BY posted_at
    `).all(channelId, windowStart);

    const history = this.db.prepare<[string, string], { c: number }>(
      'SELECT COUNT(*) AS c FROM comments WHERE author_id = ? AND posted_at < ?',
    );

    return new PeerWindow(peers.map(toScorable), (authorId, beforeMs) =>
      history.get(authorId, new Date(beforeMs).toISOString())?.c ?? 0);
  }

  annotate(channelId: string, commentIds: readonly string[]): AnnotationSummary {
    const summary: AnnotationSummary = { scored: 0, suspicious: 0, sentiment: { positive: 0, neutral: 0, negative: 0 } };
    if (commentIds.length === 0) return summary;

    const peerWindow = this.loadPeerWindow(channelId);
    const scoredAt = this.now().toISOString();

    const selectComment = this.db.prepare<[string], CommentRow>(
      'SELECT comment_id, author_id, text, posted_at, like_count FROM comments WHERE comment_id = ?',
    );
    const upsertAuthenticity = this.db.prepare(`
      INSERT INTO comment_authenticity (comment_id, suspicion_score, risk_level, suspicious, features, scored_at)
      VALUES (@comment_id, @score, @risk_level, @suspicious, @features, @scored_at)
      ON CONFLICT(comment_id) DO UPDATE SET
        suspicion_score = excluded.suspicion_score,
        risk_level = excluded.risk_level,
        suspicious = excluded.suspicious,
        features = excluded.features,
        scored_at = excluded.scored_at
    `);
    const upsertSentiment = this.db.prepare(`
      INSERT INTO comment_sentiment (comment_id, label, confidence, raw_score, votes, scored_at)
      VALUES (@comment_id, @label, @confidence, @raw_score, @votes, @scored_at)
      ON CONFLICT(comment_id) DO UPDATE SET
        label = excluded.label,
        confidence = excluded.confidence,
        raw_score = excluded.raw_score,
        votes = excluded.votes,
        scored_at = excluded.scored_at
    `);

    this.db.transaction(() => {
      for (const commentId of commentIds) {
        const row = selectComment.get(commentId);
        if (!row) continue;

        const authenticity = scoreComment(toScorable(row), peerWindow, this.options.policy);
        upsertAuthenticity.run({
          comment_id: row.comment_id,
          score: authenticity.score,
          risk_level: authenticity.riskLevel,
          suspicious: authenticity.suspicious ? 1 : 0,
          features: JSON.stringify(authenticity.features),
          scored_at: scoredAt,
        });

        const sentiment = analyzeSentiment(row.text);
        upsertSentiment.run({
          comment_id: row.comment_id,
          label: sentiment.label,
          confidence: sentiment.confidence,
          raw_score: sentiment.rawScore,
          votes: JSON.stringify(sentiment.votes),
          scored_at: scoredAt,
        });

        summary.scored++;
        if (authenticity.suspicious) summary.suspicious++;
        summary.sentiment[sentiment.label]++;
      }
    })();

    log.info(`Annotated ${summary.scored} comment(s) for ${channelId}`, {
      suspicious: summary.suspicious,
      ...summary.sentiment,
    });
    return summary;
  }
}
