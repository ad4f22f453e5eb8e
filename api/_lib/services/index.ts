// api/_lib/services/index.ts
export { dataLoader, DataLoaderService } from './dataLoader';
export { logger, withModule } from '../logger';
export { env, loadEnv } from '../env';
export { AppError, AppValidationError, ClassifierError, DataFileError, serializeError } from '../errors';

export { EMOTION_LABELS, VALENCE_BY_LABEL, isEmotionLabel, valenceOf, labelsInClass } from './taxonomy';
export type { EmotionLabel, ValenceClass } from './taxonomy';

export { normalizeScores, hasUsableSignal, UNKNOWN_SIGNAL_NEUTRAL } from './scoreNormalizer';
export type { RawScores } from './scoreNormalizer';
export { peakScore, primaryOf, degenerateDistribution, isComplete } from '../utils/distribution';
export type { EmotionDistribution } from '../utils/distribution';

export { CulturalProfileRegistry, getCulturalProfiles, DEFAULT_PROFILE_NAME } from './culturalProfiles';
export type { CulturalProfile } from './culturalProfiles';
export { applyCulturalContext } from './culturalAdjuster';

export { classifyIntensity, measureSurfaceSignals, IntensityLexicon } from './intensityClassifier';
export type { IntensityLevel, SurfaceSignals } from './intensityClassifier';

export { buildEmotionRecord, createDegradedRecord, EmotionPipeline } from './emotionRecord';
export type { EmotionRecord, EmotionClassifier, TextNormalizer } from './emotionRecord';

export { analyzeTrends, calculateWindowTrend, TrendTracker } from './trendAnalysis';
export type { TrendReport, WindowTrend } from './trendAnalysis';

export {
  identifyThemes,
  assessConversationQuality,
  generateRecommendations,
  buildConversationProfile,
  ThemeCatalog,
} from './conversationProfile';
export type { ConversationProfile, ConversationQuality } from './conversationProfile';

export { createKeywordClassifier, defaultKeywordClassifier } from './keywordClassifier';
export { buildResponseDirective } from './responseDirective';
export type { ResponseDirective } from './responseDirective';
export { ConversationSession } from './conversationSession';
export type { ResponseSynthesizer, SessionResponse, ConversationSummary, EmotionTrendsView } from './conversationSession';
export { SessionStore } from './sessionStore';

export { cleanText } from '../utils/textCleaning';
export { emotionRecordSchema, rawScoresSchema, isRawScoreMap } from '../schemas/emotionRecord';
