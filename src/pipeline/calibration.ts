import fs from 'fs';
import { z } from 'zod';
import type { SentimentLabel } from './sentiment.js';

/** Why the labeler settled on `neutral`. Each reason gets its own fitted confidence. */
export type NeutralReason = 'silent' | 'question' | 'balanced';

export type ConfidenceBasis =
  | { kind: 'polar'; margin: number }
  | { kind: 'neutral'; reason: NeutralReason };

export interface CalibrationStep {
  /** Smallest margin this step covers */
  from: number;
  confidence: number;
}

/**
 * Margin -> confidence as a non-decreasing step function, plus one
 * confidence per neutral reason. Each value is the observed agreement rate
 * with human labels for that slice of the labelled set.
 */
export interface Calibration {
  polar: CalibrationStep[];
  neutral: Record<NeutralReason, number>;
}

export interface CalibrationSample {
  basis: ConfidenceBasis;
  predicted: SentimentLabel;
  actual: SentimentLabel;
}

const FLOOR = 0.05;
const CEILING = 0.99;
const UNFITTED = 0.5;

const labelledSchema = z.array(z.object({
  text: z.string(),
  label: z.enum(['positive', 'neutral', 'negative']),
})).min(1);

export type LabelledComment = z.infer<typeof labelledSchema>[number];

export function loadLabelledComments(file: string | URL): LabelledComment[] {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return labelledSchema.parse(raw);
}

interface Tally {
  hits: number;
  total: number;
}

const rate = ({ hits, total }: Tally) => (total === 0 ? UNFITTED : hits / total);
const bounded = (value: number) => Number(Math.min(CEILING, Math.max(FLOOR, value)).toFixed(4));

/**
 * Isotonic fit by pool-adjacent-violators: samples are grouped by margin,
 * and neighbouring groups whose agreement drops as the margin grows are
 * merged until the rates are non-decreasing.
 */
export function fitCalibration(samples: readonly CalibrationSample[]): Calibration {
  const byMargin = new Map<number, Tally>();
  const neutral: Record<NeutralReason, Tally> = {
    silent: { hits: 0, total: 0 },
    question: { hits: 0, total: 0 },
    balanced: { hits: 0, total: 0 },
  };

  for (const sample of samples) {
    const hit = sample.predicted === sample.actual ? 1 : 0;
    const tally = sample.basis.kind === 'polar'
      ? byMargin.get(sample.basis.margin) ?? { hits: 0, total: 0 }
      : neutral[sample.basis.reason];
    tally.hits += hit;
    tally.total++;
    if (sample.basis.kind === 'polar') byMargin.set(sample.basis.margin, tally);
  }

  const blocks: Array<Tally & { from: number }> = [];
  for (const [margin, tally] of [...byMargin].sort(([a], [b]) => a - b)) {
    blocks.push({ from: margin, ...tally });
    for (;;) {
      const last = blocks.at(-1);
      const previous = blocks.at(-2);
      if (!last || !previous || rate(previous) <= rate(last)) break;
      blocks.splice(-2, 2, {
        from: previous.from,
        hits: previous.hits + last.hits,
        total: previous.total + last.total,
      });
    }
  }

  return {
    polar: blocks.map(block => ({ from: block.from, confidence: bounded(rate(block)) })),
    neutral: {
      silent: bounded(rate(neutral.silent)),
      question: bounded(rate(neutral.question)),
      balanced: bounded(rate(neutral.balanced)),
    },
  };
}

export function confidenceFor(calibration: Calibration, basis: ConfidenceBasis): number {
  if (basis.kind === 'neutral') {
    return calibration.neutral[basis.reason];
  }

  // Below the first fitted margin the first step still applies
  let confidence = calibration.polar[0]?.confidence ?? UNFITTED;
  for (const step of calibration.polar) {
    if (step.from > basis.margin) break;
    confidence = step.confidence;
  }
  return confidence;
}
