// api/_lib/utils/distribution.ts
// Distribution helpers over the fixed emotion taxonomy
import { EMOTION_LABELS, type EmotionLabel } from '../services/taxonomy';

export type EmotionDistribution = Readonly<Record<EmotionLabel, number>>;

export const DISTRIBUTION_TOLERANCE = 1e-9;

export function zeroScores(): Record<EmotionLabel, number> {
  return {
    admiration: 0, amusement: 0, anger: 0, annoyance: 0, approval: 0, caring: 0, confusion: 0, curiosity: 0,
    desire: 0, disappointment: 0, disapproval: 0, disgust: 0, embarrassment: 0, excitement: 0, fear: 0,
    gratitude: 0, grief: 0, joy: 0, love: 0, nervousness: 0, optimism: 0, pride: 0, realization: 0,
    relief: 0, remorse: 0, sadness: 0, surprise: 0, neutral: 0,
  };
}

/** neutral = 1.0, every other label 0. */
export function degenerateDistribution(): EmotionDistribution {
  const out = zeroScores();
  out.neutral = 1;
  return Object.freeze(out);
}

export function sumScores(scores: Readonly<Record<EmotionLabel, number>>): number {
  let total = 0;
  for (const label of EMOTION_LABELS) total += scores[label];
  return total;
}

/**
 * Divide every score by the total. Returns null when the total is not a
 * positive finite number so callers pick their own fallback.
 */
export function normalizeByTotal(scores: Readonly<Record<EmotionLabel, number>>): EmotionDistribution | null {
  let source = scores;
  let total = sumScores(source);

  // Finite scores whose sum overflows: divide by the peak first
  if (total === Infinity) {
    const peak = maxScore(scores);
    if (!Number.isFinite(peak)) return null;
    const scaled = zeroScores();
    for (const label of EMOTION_LABELS) scaled[label] = scores[label] / peak;
    source = scaled;
    total = sumScores(source);
  }
  if (!(total > 0) || !Number.isFinite(total)) return null;

  const out = zeroScores();
  for (const label of EMOTION_LABELS) out[label] = source[label] / total;
  return Object.freeze(out);
}

export function isComplete(dist: Readonly<Record<EmotionLabel, number>>): boolean {
  return Math.abs(sumScores(dist) - 1) <= DISTRIBUTION_TOLERANCE;
}

function maxScore(scores: Readonly<Record<EmotionLabel, number>>): number {
  let peak = 0;
  for (const label of EMOTION_LABELS) {
    if (scores[label] > peak) peak = scores[label];
  }
  return peak;
}

export function peakScore(dist: EmotionDistribution): number {
  return maxScore(dist);
}

/** Argmax over the taxonomy; the first label in declaration order wins ties. */
export function primaryOf(dist: EmotionDistribution): EmotionLabel {
  let best: EmotionLabel = 'neutral';
  let bestScore = -Infinity;
  for (const label of EMOTION_LABELS) {
    if (dist[label] > bestScore) {
      best = label;
      bestScore = dist[label];
    }
  }
  return best;
}

export const clamp01 = (x: number) => Math.max(0, Math.min(1, x));
