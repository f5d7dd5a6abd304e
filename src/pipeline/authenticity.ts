import { parseTimestamp } from '../core/dates.js';

export interface ScorableComment {
  commentId: string;
  authorId: string;
  text: string;
  postedAt: string;
  likeCount: number;
}

export interface AuthenticityPolicy {
  suspicionThreshold: number;
  burstWindowSeconds: number;
  nearDuplicateThreshold: number;
  whitelistAdjustment: number;
}

export const DEFAULT_POLICY: Readonly<AuthenticityPolicy> = Object.freeze({
  suspicionThreshold: 70,
  burstWindowSeconds: 60,
  nearDuplicateThreshold: 0.9,
  whitelistAdjustment: 15,
});

export type RiskLevel = 'low' | 'medium' | 'high';

export interface FeatureBreakdown {
  duplicateCount: number;
  duplicateSimilarity: number; // 0-1, saturating
  burstCount: number;
  burstDensity: number;        // 0-1, saturating
  authorPriorComments: number;
  authorSparsity: number;      // 0-1, 1 = never seen before
  lowEngagement: number;       // 0-1, 1 = no likes
  whitelisted: boolean;
}

export interface AuthenticityScore {
  score: number; // 0-100
  riskLevel: RiskLevel;
  suspicious: boolean;
  features: FeatureBreakdown;
}

const WEIGHTS = {
  duplicate: 0.45,
  burst: 0.25,
  sparsity: 0.2,
  engagement: 0.1,
} as const;

// Duplicate strength and burst counts saturate here
const SATURATION = 3;

/** Genuine-excitement expressions that bots rarely bother with. Matched on normalized text. */
export const fanWhitelist: readonly string[] = [
  'goosebumps',
  'chills',
  'legend',
  'masterpiece',
  'on repeat',
  'still listening',
  'who is here',
  'whos here',
  'love from',
  'cant stop listening',
  'childhood',
  'queen',
  'king',
  'goat',
  'iconic',
];

// ============================================================================
// TEXT SIMILARITY
// ============================================================================

type NgramVector = Map<string, number>;

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Term-frequency vector of character 3- to 5-grams. */
export function ngramVector(text: string, minN = 3, maxN = 5): NgramVector {
  const normalized = normalizeText(text);
  const vector: NgramVector = new Map();
  if (normalized.length === 0) return vector;

  if (normalized.length < minN) {
    vector.set(normalized, 1);
    return vector;
  }
  for (let n = minN; n <= maxN; n++) {
    for (let i = 0; i + n <= normalized.length; i++) {
      const gram = normalized.slice(i, i + n);
      vector.set(gram, (vector.get(gram) ?? 0) + 1);
    }
  }
  return vector;
}

export function cosineSimilarity(a: NgramVector, b: NgramVector): number {
  if (a.size === 0 || b.size === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (const [gram, count] of a) {
    normA += count * count;
    const other = b.get(gram);
    if (other !== undefined) dot += count * other;
  }
  for (const count of b.values()) {
    normB += count * count;
  }
  return Math.min(1, dot / (Math.sqrt(normA) * Math.sqrt(normB)));
}

// ============================================================================
// PEER WINDOW
// ============================================================================

interface IndexedPeer {
  comment: ScorableComment;
  vector: NgramVector;
  postedMs: number | null;
}

/** How many comments an author posted strictly before `beforeMs`, on any channel. */
export type AuthorHistory = (authorId: string, beforeMs: number) => number;

/**
 * Recent comments a candidate is compared against, plus a lookup of each
 * author's earlier activity. Built once per scoring pass and only read.
 */
export class PeerWindow {
  private readonly peers: IndexedPeer[];

  constructor(comments: readonly ScorableComment[], private readonly authorHistory: AuthorHistory = () => 0) {
    this.peers = comments.map(comment => ({
      comment,
      vector: ngramVector(comment.text),
      postedMs: parseTimestamp(comment.postedAt)?.getTime() ?? null,
    }));
  }

  get size(): number {
    return this.peers.length;
  }

  /** Unknown post times have no history to speak of. */
  priorComments(authorId: string, beforeMs: number | null): number {
    return beforeMs === null ? 0 : this.authorHistory(authorId, beforeMs);
  }

  /** Every peer except the comment itself. */
  others(commentId: string): readonly IndexedPeer[] {
    return this.peers.filter(peer => peer.comment.commentId !== commentId);
  }
}

// ============================================================================
// SCORER
// ============================================================================

export function riskLevel(score: number): RiskLevel {
  if (score >= 70) return 'high';
  if (score >= 30) return 'medium';
  return 'low';
}

export function isWhitelisted(text: string): boolean {
  const normalized = ` ${normalizeText(text)} `;
  return fanWhitelist.some(phrase => normalized.includes(` ${phrase} `));
}

const round2 = (value: number) => Math.round(value * 100) / 100;
const round4 = (value: number) => Math.round(value * 10000) / 10000;

export function scoreComment(
  comment: ScorableComment,
  peerWindow: PeerWindow,
  policy: AuthenticityPolicy = DEFAULT_POLICY,
): AuthenticityScore {
  const vector = ngramVector(comment.text);
  const postedMs = parseTimestamp(comment.postedAt)?.getTime() ?? null;
  const others = peerWindow.others(comment.commentId);

  let duplicateCount = 0;
  let duplicateStrength = 0;
  let burstCount = 0;

  for (const peer of others) {
    const similarity = cosineSimilarity(vector, peer.vector);
    if (similarity >= policy.nearDuplicateThreshold) {
      duplicateCount++;
      duplicateStrength += similarity;
    }
    if (
      peer.comment.authorId === comment.authorId
      && postedMs !== null
      && peer.postedMs !== null
      && Math.abs(peer.postedMs - postedMs) <= policy.burstWindowSeconds * 1000
    ) {
      burstCount++;
    }
  }

  // The burst window is already counted as bursts, so history stops where it opens
  const prior = peerWindow.priorComments(
    comment.authorId,
    postedMs === null ? null : postedMs - policy.burstWindowSeconds * 1000,
  );
  const features: FeatureBreakdown = {
    duplicateCount,
    duplicateSimilarity: round4(Math.min(1, duplicateStrength / SATURATION)),
    burstCount,
    burstDensity: round4(Math.min(1, burstCount / SATURATION)),
    authorPriorComments: prior,
    authorSparsity: round4((1 / (1 + prior / SATURATION))),
    lowEngagement: round4((1 - Math.tanh(Math.max(0, comment.likeCount) / 3))),
    whitelisted: isWhitelisted(comment.text),
  };

  const base = 100 * (
    WEIGHTS.duplicate * Math.min(1, duplicateStrength / SATURATION)
    + WEIGHTS.burst * Math.min(1, burstCount / SATURATION)
    + WEIGHTS.sparsity * (1 / (1 + prior / SATURATION))
    + WEIGHTS.engagement * (1 - Math.tanh(Math.max(0, comment.likeCount) / 3))
  );
  const adjusted = features.whitelisted ? base - policy.whitelistAdjustment : base;
  const score = round2(Math.min(100, Math.max(0, adjusted)));

  return {
    score,
    riskLevel: riskLevel(score),
    suspicious: score >= policy.suspicionThreshold,
    features,
  };
}
