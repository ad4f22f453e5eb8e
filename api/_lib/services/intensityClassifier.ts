// api/_lib/services/intensityClassifier.ts
import { withModule } from '../logger';
import { recoverWith } from '../errors';
import { dataLoader } from './dataLoader';
import { peakScore, type EmotionDistribution } from '../utils/distribution';
import { PhraseMatcher } from '../utils/phraseMatcher';
import type { IntensityModifiersFile } from '../types/dataTypes';

const log = withModule('intensityClassifier');

export type IntensityLevel = 'low' | 'medium' | 'high';

export const INTENSITY_WEIGHTS: Readonly<Record<IntensityLevel, number>> = Object.freeze({
  low: 1,
  medium: 2,
  high: 3,
});

export function isIntensityLevel(value: unknown): value is IntensityLevel {
  return value === 'low' || value === 'medium' || value === 'high';
}

// ============================
// Modifier lexicon
// ============================

export class IntensityLexicon {
  private readonly high = new PhraseMatcher<true>();
  private readonly medium = new PhraseMatcher<true>();
  private readonly low = new PhraseMatcher<true>();

  constructor(source: Pick<IntensityModifiersFile, 'high' | 'medium' | 'low'>) {
    // Phrases are lower-cased so they compare against lower-cased text
    for (const phrase of source.high) this.high.addPattern(phrase.toLowerCase(), true);
    for (const phrase of source.medium) this.medium.addPattern(phrase.toLowerCase(), true);
    for (const phrase of source.low) this.low.addPattern(phrase.toLowerCase(), true);
  }

  match(lowerText: string): { high: boolean; medium: boolean; low: boolean } {
    return {
      high: this.high.matchesAny(lowerText),
      medium: this.medium.matchesAny(lowerText),
      low: this.low.matchesAny(lowerText),
    };
  }
}

let sharedLexicon: IntensityLexicon | null = null;

export function getIntensityLexicon(): IntensityLexicon {
  if (!sharedLexicon) sharedLexicon = new IntensityLexicon(dataLoader.getIntensityModifiers());
  return sharedLexicon;
}

// ============================
// Surface signals
// ============================

export interface SurfaceSignals {
  exclam: number;
  capsRatio: number;
  highMatch: boolean;
  mediumMatch: boolean;
  lowMatch: boolean;
}

const UPPERCASE_RE = /\p{Lu}/u;

/**
 * `!` count and uppercase ratio come from the raw text; modifier matches
 * come from `lexicalText` when given (e.g. cleaned text), else the raw text.
 */
export function measureSurfaceSignals(
  text: string,
  lexicalText?: string,
  lexicon: IntensityLexicon = getIntensityLexicon()
): SurfaceSignals {
  const chars = Array.from(text);
  let exclam = 0;
  let upper = 0;
  for (const ch of chars) {
    if (ch === '!') exclam++;
    else if (UPPERCASE_RE.test(ch)) upper++;
  }

  const matches = lexicon.match((lexicalText ?? text).toLowerCase());
  return {
    exclam,
    capsRatio: chars.length > 0 ? upper / chars.length : 0,
    highMatch: matches.high,
    mediumMatch: matches.medium,
    lowMatch: matches.low,
  };
}

// ============================
// Decision table
// ============================

interface IntensityRule {
  when: (s: SurfaceSignals) => boolean;
  result: IntensityLevel;
}

interface IntensityTier {
  minPeak: number;
  rules: readonly IntensityRule[];
  otherwise: IntensityLevel;
}

const strongEmphasis: IntensityRule = {
  when: s => s.exclam >= 3 || s.capsRatio >= 0.3 || s.highMatch,
  result: 'high',
};
const someEmphasis: IntensityRule = {
  when: s => s.exclam >= 1 || s.capsRatio >= 0.1 || s.mediumMatch,
  result: 'medium',
};
const softened: IntensityRule = { when: s => s.lowMatch, result: 'low' };

/** Checked top to bottom; the first tier whose minPeak the peak reaches decides. */
export const INTENSITY_TABLE: readonly IntensityTier[] = [
  {
    minPeak: 0.75,
    rules: [
      { when: s => s.exclam > 2 || s.capsRatio > 0.3 || s.highMatch, result: 'high' },
      someEmphasis,
      softened,
    ],
    otherwise: 'high',
  },
  { minPeak: 0.45, rules: [strongEmphasis, someEmphasis, softened], otherwise: 'medium' },
  { minPeak: -Infinity, rules: [strongEmphasis, someEmphasis, softened], otherwise: 'low' },
];

export function decideIntensity(peak: number, signals: SurfaceSignals): IntensityLevel {
  const tier = INTENSITY_TABLE.find(t => peak >= t.minPeak);
  if (!tier) return 'low';
  const rule = tier.rules.find(r => r.when(signals));
  return rule ? rule.result : tier.otherwise;
}

export interface IntensityOptions {
  /** Cleaned text used only for modifier matching */
  lexicalText?: string;
  lexicon?: IntensityLexicon;
}

/** Pure over (distribution, text, lexicon). Any failure yields 'low'. */
export function classifyIntensity(
  dist: EmotionDistribution,
  text: string,
  options: IntensityOptions = {}
): IntensityLevel {
  return recoverWith<IntensityLevel>(
    log,
    'Intensity classification',
    () => {
      if (typeof text !== 'string') throw new TypeError('text must be a string');
      const signals = measureSurfaceSignals(text, options.lexicalText, options.lexicon);
      return decideIntensity(peakScore(dist), signals);
    },
    () => 'low'
  );
}
