// api/_lib/services/conversationProfile.ts
import { withModule } from '../logger';
import { dataLoader } from './dataLoader';
import { isEmotionLabel, type EmotionLabel } from './taxonomy';
import { PhraseMatcher } from '../utils/phraseMatcher';
import type { ConversationTheme, ConversationThemesFile, RecommendationsFile } from '../types/dataTypes';

const log = withModule('conversationProfile');

export const MAX_THEMES = 3;
export const MAX_RECOMMENDATIONS = 4;

/** The fields profiling reads from a record. */
export interface ProfileInput {
  primaryEmotion?: unknown;
  sourceText?: unknown;
}

export type QualityLevel = 'good' | 'basic' | 'unknown';
export type DepthLevel = 'deep' | 'moderate' | 'shallow';

export interface ConversationQuality {
  quality: QualityLevel;
  depth: DepthLevel;
  messageCount: number;
  avgMessageLength: number;
  emotionVariety: number;
  engagementScore: number;
  emotionalOpenness: number;
}

export interface ConversationProfile {
  themes: string[];
  quality: ConversationQuality;
  recommendations: string[];
}

// ============================
// Themes
// ============================

export class ThemeCatalog {
  private readonly themes: readonly ConversationTheme[];
  private readonly matcher = new PhraseMatcher<number>();
  readonly maxThemes: number;

  constructor(source: ConversationThemesFile) {
    this.themes = source.themes.map(t => Object.freeze({ ...t, keywords: [...t.keywords] }));
    this.maxThemes = Math.min(source.maxThemes, MAX_THEMES);
    this.themes.forEach((theme, index) => {
      for (const keyword of theme.keywords) this.matcher.addPattern(keyword.toLowerCase(), index);
    });
  }

  /** Matched theme ids in declared order, capped at maxThemes. */
  match(lowerText: string): string[] {
    const hit = new Set<number>();
    for (const m of this.matcher.search(lowerText)) hit.add(m.data);
    return this.themes
      .filter((_, index) => hit.has(index))
      .slice(0, this.maxThemes)
      .map(t => t.id);
  }

  /** Theme recommendations in declared order, for the given theme ids. */
  recommendationsFor(themeIds: readonly string[]): string[] {
    const wanted = new Set(themeIds);
    const out: string[] = [];
    for (const theme of this.themes) {
      if (wanted.has(theme.id) && theme.recommendation) out.push(theme.recommendation);
    }
    return out;
  }

  ids(): string[] {
    return this.themes.map(t => t.id);
  }
}

let sharedCatalog: ThemeCatalog | null = null;

export function getThemeCatalog(): ThemeCatalog {
  if (!sharedCatalog) sharedCatalog = new ThemeCatalog(dataLoader.getConversationThemes());
  return sharedCatalog;
}

const textOf = (value: unknown): string => (typeof value === 'string' ? value : '');

function emotionOf(record: ProfileInput): EmotionLabel {
  const emotion = record.primaryEmotion;
  return isEmotionLabel(emotion) ? emotion : 'neutral';
}

/** Keyword themes over the lower-cased, space-joined texts. */
export function identifyThemes(texts: readonly unknown[], catalog: ThemeCatalog = getThemeCatalog()): string[] {
  if (texts.length === 0) return [];
  const joined = texts.map(t => textOf(t).toLowerCase()).join(' ');
  return catalog.match(joined);
}

// ============================
// Quality
// ============================

export function assessConversationQuality(records: readonly ProfileInput[]): ConversationQuality {
  const messageCount = records.length;
  if (messageCount === 0) {
    return {
      quality: 'unknown',
      depth: 'shallow',
      messageCount: 0,
      avgMessageLength: 0,
      emotionVariety: 0,
      engagementScore: 0,
      emotionalOpenness: 0,
    };
  }

  let totalLength = 0;
  const emotions = new Set<EmotionLabel>();
  for (const record of records) {
    totalLength += Array.from(textOf(record.sourceText)).length;
    emotions.add(emotionOf(record));
  }

  const avgMessageLength = totalLength / messageCount;
  const emotionVariety = emotions.size;

  return {
    quality: avgMessageLength > 30 && emotionVariety > 4 ? 'good' : 'basic',
    depth: messageCount > 5 && emotionVariety > 6 ? 'deep' : 'moderate',
    messageCount,
    avgMessageLength,
    emotionVariety,
    engagementScore: Math.min(10, messageCount + emotionVariety),
    emotionalOpenness: emotionVariety,
  };
}

// ============================
// Recommendations
// ============================

export interface RecommendationSources {
  config?: RecommendationsFile['session'];
  catalog?: ThemeCatalog;
}

/**
 * Valence-based advice first, then one item per matched theme that carries
 * a recommendation; never more than four.
 */
export function generateRecommendations(
  records: readonly ProfileInput[],
  themes: readonly string[],
  sources: RecommendationSources = {}
): string[] {
  const config = sources.config ?? dataLoader.getRecommendations().session;
  const catalog = sources.catalog ?? getThemeCatalog();
  const limit = Math.min(config.maxItems, MAX_RECOMMENDATIONS);

  if (records.length === 0) return config.empty.slice(0, limit);

  const negativeSet = new Set<EmotionLabel>(config.negativeEmotions);
  const negative = records.filter(r => negativeSet.has(emotionOf(r))).length;
  const ratio = negative / records.length;

  const out: string[] = [];
  if (ratio > config.highNegativeRatio) out.push(...config.highNegative);
  else if (ratio < config.lowNegativeRatio) out.push(...config.lowNegative);

  out.push(...catalog.recommendationsFor(themes));
  return out.slice(0, limit);
}

export function buildConversationProfile(
  records: readonly ProfileInput[],
  sources: RecommendationSources = {}
): ConversationProfile {
  const catalog = sources.catalog ?? getThemeCatalog();
  const themes = identifyThemes(records.map(r => r.sourceText), catalog);
  const quality = assessConversationQuality(records);
  const recommendations = generateRecommendations(records, themes, { ...sources, catalog });

  log.debug('Conversation profile built', {
    messages: records.length,
    themes,
    quality: quality.quality,
    depth: quality.depth,
  });
  return { themes, quality, recommendations };
}
