import Sentiment from 'sentiment';
import { moduleLogger } from '../core/logger.js';
import {
  confidenceFor,
  fitCalibration,
  loadLabelledComments,
  type Calibration,
  type ConfidenceBasis,
  type LabelledComment,
} from './calibration.js';
import {
  misreadSlang,
  negativeEmoji,
  negativePhrases,
  negators,
  positiveEmoji,
  positivePhrases,
  questionStarters,
  socialLexicon,
} from './lexicon.js';

const analyzer = new Sentiment();
const log = moduleLogger('sentiment');

export type SentimentLabel = 'positive' | 'neutral' | 'negative';
export type Polarity = -1 | 0 | 1;

export interface Vote {
  source: string;
  polarity: Polarity;
  weight: number;
}

export interface SentimentResult {
  label: SentimentLabel;
  confidence: number; // 0 to 1
  rawScore: number;   // positive weight minus negative weight
  votes: Vote[];
}

export const MIN_CONFIDENCE = 0.33;

// Below this margin the votes are treated as a tie
const NEUTRAL_BAND = 0.15;

export const CALIBRATION_FILE = new URL('../../config/sentiment-calibration.json', import.meta.url);

const sign = (value: number): Polarity => (value > 0 ? 1 : value < 0 ? -1 : 0);
const round = (value: number, digits = 4) => Number(value.toFixed(digits));
const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function termPattern(term: string): RegExp {
  return new RegExp(`(^|[^a-z0-9'])${escapeRegex(term)}(?=$|[^a-z0-9'])`, 'g');
}

const phrasePatterns = {
  positive: positivePhrases.map(phrase => ({ phrase, pattern: termPattern(phrase) })),
  negative: negativePhrases.map(phrase => ({ phrase, pattern: termPattern(phrase) })),
};
const misreadPatterns = misreadSlang.map(term => ({ phrase: term, pattern: termPattern(term) }));

function isNegated(text: string, matchIndex: number): boolean {
  const before = text.slice(0, matchIndex).trim().split(/\s+/).slice(-2);
  return before.some(word => negators.has(word.replace(/[^a-z']/g, '')));
}

/** Counts plain and negated hits of each pattern in lowercase text. */
function matchTerms(text: string, patterns: { phrase: string; pattern: RegExp }[]): { plain: number; negated: number } {
  let plain = 0;
  let negated = 0;
  for (const { pattern } of patterns) {
    for (const match of text.matchAll(pattern)) {
      const start = (match.index ?? 0) + (match[1]?.length ?? 0);
      if (isNegated(text, start)) negated++;
      else plain++;
    }
  }
  return { plain, negated };
}

function countEmoji(text: string, set: readonly string[]): number {
  return set.reduce((total, emoji) => total + text.split(emoji).length - 1, 0);
}

// ============================================================================
// LABELING FUNCTIONS
// ============================================================================

type LabelingFunction = (text: string, lower: string, prior: number) => Vote | null;

const lexiconVote: LabelingFunction = text => {
  const result = analyzer.analyze(text, { extras: socialLexicon });
  if (result.score === 0) return null;
  return { source: 'lexicon', polarity: sign(result.score), weight: round(Math.min(1.2, Math.abs(result.score) * 0.2)) };
};

const phraseVote: LabelingFunction = (_text, lower) => {
  const positive = matchTerms(lower, phrasePatterns.positive).plain;
  const negative = matchTerms(lower, phrasePatterns.negative).plain;
  const diff = positive - negative;
  if (diff === 0) return null;
  return { source: 'phrases', polarity: sign(diff), weight: round(Math.min(1, Math.abs(diff) * 0.5)) };
};

const negationVote: LabelingFunction = (_text, lower) => {
  const positive = matchTerms(lower, [...phrasePatterns.positive, ...misreadPatterns]).negated;
  const negative = matchTerms(lower, phrasePatterns.negative).negated;
  // A negated positive reads negative and vice versa
  const diff = negative - positive;
  if (diff === 0) return null;
  return { source: 'negation', polarity: sign(diff), weight: round(Math.min(1, Math.abs(diff) * 0.5)) };
};

const emojiVote: LabelingFunction = text => {
  const positive = Math.min(3, countEmoji(text, positiveEmoji));
  const negative = Math.min(3, countEmoji(text, negativeEmoji));
  const diff = positive - negative;
  if (diff === 0) return null;
  return { source: 'emoji', polarity: sign(diff), weight: round(Math.abs(diff) * 0.3) };
};

const slangOverrideVote: LabelingFunction = (_text, lower) => {
  const present = misreadPatterns.filter(({ phrase, pattern }) =>
    matchTerms(lower, [{ phrase, pattern }]).plain > 0).length;
  if (present === 0) return null;
  return { source: 'slang', polarity: 1, weight: round(Math.min(1.2, present * 0.6)) };
};

const emphasisVote: LabelingFunction = (text, lower, prior) => {
  if (prior === 0) return null;
  const elongated = /([a-z])\1{2,}/.test(lower);
  const exclaimed = /!{2,}/.test(text);
  const shouted = /\b[A-Z]{3,}\b/.test(text);
  if (!elongated && !exclaimed && !shouted) return null;
  return { source: 'emphasis', polarity: sign(prior), weight: 0.25 };
};

const questionVote: LabelingFunction = (_text, lower) => {
  const trimmed = lower.trim();
  const firstWord = trimmed.split(/\s+/)[0] ?? '';
  if (!trimmed.endsWith('?') && !questionStarters.includes(firstWord)) return null;
  return { source: 'question', polarity: 0, weight: 0.5 };
};

// Emphasis reads the running score, so it runs after the polar functions
const labelingFunctions: LabelingFunction[] = [
  lexiconVote,
  phraseVote,
  negationVote,
  emojiVote,
  slangOverrideVote,
  questionVote,
  emphasisVote,
];

// ============================================================================
// LABELER
// ============================================================================

export interface VoteTally {
  label: SentimentLabel;
  rawScore: number;
  votes: Vote[];
  basis: ConfidenceBasis;
}

/** Runs every labeling function and settles the label, before any calibration. */
export function tallyVotes(text: string): VoteTally {
  const lower = text.toLowerCase();
  const votes: Vote[] = [];
  let raw = 0;
  for (const fn of labelingFunctions) {
    const vote = fn(text, lower, raw);
    if (vote) {
      votes.push(vote);
      raw += vote.polarity * vote.weight;
    }
  }

  const rawScore = round(raw);
  const margin = Math.abs(rawScore);
  const polarWeight = votes.filter(v => v.polarity !== 0).reduce((sum, v) => sum + v.weight, 0);
  const neutralWeight = votes.filter(v => v.polarity === 0).reduce((sum, v) => sum + v.weight, 0);

  if (polarWeight === 0) {
    const reason = neutralWeight > 0 ? 'question' : 'silent';
    return { label: 'neutral', rawScore, votes, basis: { kind: 'neutral', reason } };
  }
  if (margin < NEUTRAL_BAND || neutralWeight > margin) {
    return { label: 'neutral', rawScore, votes, basis: { kind: 'neutral', reason: 'balanced' } };
  }
  return {
    label: rawScore > 0 ? 'positive' : 'negative',
    rawScore,
    votes,
    basis: { kind: 'polar', margin },
  };
}

export function calibrationFrom(labelled: readonly LabelledComment[]): Calibration {
  return fitCalibration(labelled.map(item => {
    const tally = tallyVotes(item.text);
    return { basis: tally.basis, predicted: tally.label, actual: item.label };
  }));
}

let fitted: Calibration | null = null;

/** Fitted from the bundled labelled comments on first use, then reused. */
export function defaultCalibration(): Calibration {
  if (!fitted) {
    const labelled = loadLabelledComments(CALIBRATION_FILE);
    fitted = calibrationFrom(labelled);
    log.info(`Fitted sentiment calibration on ${labelled.length} labelled comments`, {
      steps: fitted.polar.length,
      ...fitted.neutral,
    });
  }
  return fitted;
}

export function analyzeSentiment(text: unknown, calibration: Calibration = defaultCalibration()): SentimentResult {
  if (typeof text !== 'string' || text.trim().length === 0) {
    return { label: 'neutral', confidence: MIN_CONFIDENCE, rawScore: 0, votes: [] };
  }

  const { label, rawScore, votes, basis } = tallyVotes(text);
  return { label, confidence: confidenceFor(calibration, basis), rawScore, votes };
}

// Batch analyze
export function analyzeSentimentBatch(texts: unknown[], calibration: Calibration = defaultCalibration()): SentimentResult[] {
  return texts.map(text => analyzeSentiment(text, calibration));
}
