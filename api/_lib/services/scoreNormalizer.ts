// api/_lib/services/scoreNormalizer.ts
import { EMOTION_LABELS, isEmotionLabel } from './taxonomy';
import {
  zeroScores,
  normalizeByTotal,
  degenerateDistribution,
  type EmotionDistribution,
} from '../utils/distribution';

/** Score given to neutral when the input names no recognized label. */
export const UNKNOWN_SIGNAL_NEUTRAL = 0.5;

export type RawScores = Readonly<Record<string, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function readScore(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Turns a sparse label→score map into a complete distribution over the taxonomy.
 * Unrecognized labels are ignored; negative, NaN or non-numeric scores count as 0.
 * A fresh object is returned on every call.
 */
export function normalizeScores(raw: unknown): EmotionDistribution {
  const scores = zeroScores();
  let recognized = false;

  if (isRecord(raw)) {
    for (const [label, value] of Object.entries(raw)) {
      if (!isEmotionLabel(label)) continue;
      recognized = true;
      scores[label] = readScore(value);
    }
  }

  if (!recognized) scores.neutral = UNKNOWN_SIGNAL_NEUTRAL;

  return normalizeByTotal(scores) ?? degenerateDistribution();
}

/** True when at least one recognized label carries a positive score. */
export function hasUsableSignal(raw: unknown): boolean {
  if (!isRecord(raw)) return false;
  return EMOTION_LABELS.some(label => readScore(raw[label]) > 0);
}
