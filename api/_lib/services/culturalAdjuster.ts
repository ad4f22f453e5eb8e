// api/_lib/services/culturalAdjuster.ts
import { withModule } from '../logger';
import { recoverWith } from '../errors';
import { EMOTION_LABELS, isNeutralClass } from './taxonomy';
import { zeroScores, normalizeByTotal, type EmotionDistribution } from '../utils/distribution';
import type { CulturalProfile } from './culturalProfiles';

const log = withModule('culturalAdjuster');

/**
 * Expression style → multiplier on every label outside the neutral class.
 * Styles not listed (adaptive, balanced, free-form) leave the distribution as is.
 *
 * `reserved` leaves neutral-class labels untouched; it does not boost them.
 */
export const EXPRESSION_MULTIPLIERS: Readonly<Record<string, number>> = Object.freeze({
  reserved: 0.8,
  expressive: 1.2,
});

export function multiplierFor(style: string): number | null {
  return Object.prototype.hasOwnProperty.call(EXPRESSION_MULTIPLIERS, style)
    ? EXPRESSION_MULTIPLIERS[style]
    : null;
}

function adjust(dist: EmotionDistribution, profile: CulturalProfile): EmotionDistribution {
  const factor = multiplierFor(profile.emotionalExpression.trim().toLowerCase());
  if (factor === null) return dist;

  const scaled = zeroScores();
  for (const label of EMOTION_LABELS) {
    const score = dist[label];
    if (typeof score !== 'number' || !Number.isFinite(score)) {
      throw new TypeError(`Non-finite score for ${label}`);
    }
    scaled[label] = isNeutralClass(label) ? score : score * factor;
  }

  return normalizeByTotal(scaled) ?? dist;
}

/**
 * Scale a complete distribution by the profile's expression style and
 * re-normalize. Failures return the input unchanged.
 */
export function applyCulturalContext(dist: EmotionDistribution, profile: CulturalProfile): EmotionDistribution {
  return recoverWith(
    log,
    'Cultural adjustment',
    () => adjust(dist, profile),
    () => dist
  );
}
