// api/_lib/services/keywordClassifier.ts
// Built-in keyword classifier used when no model-backed classifier is supplied
import { withModule } from '../logger';
import { dataLoader } from './dataLoader';
import { EMOTION_LABELS, type EmotionLabel } from './taxonomy';
import { PhraseMatcher } from '../utils/phraseMatcher';
import type { EmotionKeywordsFile } from '../types/dataTypes';

const log = withModule('keywordClassifier');

export type KeywordLexicon = EmotionKeywordsFile['emotions'];

export type KeywordScores = Partial<Record<EmotionLabel, number>>;

/**
 * Counts keyword occurrences per emotion in the lower-cased text.
 * Only emotions with at least one hit appear in the result; a keyword listed
 * under several emotions counts for each of them.
 */
export function createKeywordClassifier(lexicon: KeywordLexicon = dataLoader.getEmotionKeywords().emotions) {
  const matcher = new PhraseMatcher<EmotionLabel>();
  for (const label of EMOTION_LABELS) {
    for (const keyword of lexicon[label] ?? []) {
      matcher.addPattern(keyword.toLowerCase(), label);
    }
  }
  log.debug('Keyword classifier ready', matcher.getStats());

  return function classify(text: string): KeywordScores {
    const scores: KeywordScores = {};
    if (typeof text !== 'string' || !text) return scores;

    for (const match of matcher.search(text.toLowerCase())) {
      scores[match.data] = (scores[match.data] ?? 0) + 1;
    }
    return scores;
  };
}

let shared: ((text: string) => KeywordScores) | null = null;

// Lazily built so the lexicon is read once, on first use
export function defaultKeywordClassifier(text: string): KeywordScores {
  if (!shared) shared = createKeywordClassifier();
  return shared(text);
}
