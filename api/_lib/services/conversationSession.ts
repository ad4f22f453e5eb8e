// api/_lib/services/conversationSession.ts
import { env } from '../env';
import { withModule, genId, type Logger } from '../logger';
import { serializeError } from '../errors';
import { dataLoader } from './dataLoader';
import type { EmotionLabel } from './taxonomy';
import {
  EmotionPipeline,
  type EmotionRecord,
  type EmotionClassifier,
  type TextNormalizer,
} from './emotionRecord';
import { TrendTracker, type TrendReport } from './trendAnalysis';
import {
  buildConversationProfile,
  identifyThemes,
  assessConversationQuality,
  generateRecommendations,
  type ConversationProfile,
  type ConversationQuality,
} from './conversationProfile';
import {
  buildResponseDirective,
  ERROR_RESPONSE_TYPE,
  RESPONSE_MEMORY,
  type ResponseDirective,
} from './responseDirective';
import type { RecommendationsFile, ResponseGuidanceFile } from '../types/dataTypes';

/** Opaque prose generator; its return value is passed through untouched. */
export type ResponseSynthesizer = (
  record: EmotionRecord,
  recent: readonly EmotionRecord[],
  directive: ResponseDirective
) => string | Promise<string>;

export interface ConversationSessionOptions {
  id?: string;
  /** Default cultural context for messages that name none */
  culturalContext?: string;
  pipeline?: EmotionPipeline;
  /** Used only when no pipeline is given */
  classifier?: EmotionClassifier;
  normalizeText?: TextNormalizer;
  synthesizer?: ResponseSynthesizer;
  trendCapacity?: number;
  recommendations?: RecommendationsFile;
  responseGuidance?: ResponseGuidanceFile;
}

export interface SessionResponse {
  sessionId: string;
  record: EmotionRecord;
  directive: ResponseDirective;
  /** null when the session has no synthesizer */
  botResponse: string | null;
  responseType: string;
  followUpSuggestions: string[];
  messageCount: number;
  timestamp: string;
  error?: string;
}

export interface EmotionTrendsView {
  status: 'Analysis complete' | 'No conversation data available';
  trends: TrendReport | null;
  recentPattern: EmotionLabel[];
  recommendations: string[];
  sessionSummary: {
    durationMessages: number;
    primaryThemes: string[];
    emotionalRange: EmotionLabel[];
  };
}

export interface ConversationSummary {
  status: 'Summary complete' | 'No conversation to summarize';
  session: {
    sessionId: string;
    startTime: string;
    endTime: string;
    totalMessages: number;
    culturalContext: string;
  };
  emotionalAnalysis: {
    dominantEmotion: EmotionLabel;
    emotionDistribution: Partial<Record<EmotionLabel, number>>;
    emotionalRange: number;
    trends: TrendReport | null;
  };
  conversationPatterns: {
    responseTypesUsed: Record<string, number>;
    identifiedThemes: string[];
    conversationQuality: ConversationQuality;
  };
  recommendations: string[];
}

/** How many of the latest primary emotions make up the "recent pattern" */
const RECENT_PATTERN = 3;

/**
 * One conversation. Owns its history; every call that appends runs on a
 * per-session queue so records land in arrival order.
 */
export class ConversationSession {
  readonly id: string;
  readonly startedAt: string;

  private readonly pipeline: EmotionPipeline;
  private readonly synthesizer?: ResponseSynthesizer;
  private readonly tracker: TrendTracker;
  private readonly recommendations: RecommendationsFile;
  private readonly guidance: ResponseGuidanceFile;
  private readonly log: Logger;

  private records: EmotionRecord[] = [];
  private responseTypes = new Map<string, number>();
  private context: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: ConversationSessionOptions = {}) {
    this.id = options.id ?? genId('session');
    this.startedAt = new Date().toISOString();
    this.pipeline = options.pipeline ?? new EmotionPipeline({
      classifier: options.classifier,
      normalizeText: options.normalizeText,
    });
    this.synthesizer = options.synthesizer;
    this.tracker = new TrendTracker(options.trendCapacity ?? env.TREND_WINDOW_SIZE);
    this.recommendations = options.recommendations ?? dataLoader.getRecommendations();
    this.guidance = options.responseGuidance ?? dataLoader.getResponseGuidance();
    this.log = withModule('conversationSession', { sessionId: this.id });
    this.context = this.pipeline.getRegistry().resolveName(
      options.culturalContext ?? env.DEFAULT_CULTURAL_CONTEXT
    );
  }

  get culturalContext(): string {
    return this.context;
  }

  /** Switch the default context; unregistered names are rejected and the current one kept. */
  setCulturalContext(name: string): boolean {
    const registry = this.pipeline.getRegistry();
    if (!registry.has(name)) {
      this.log.warn('Unregistered cultural context ignored', { requested: name, current: this.context });
      return false;
    }
    this.context = registry.resolveName(name);
    return true;
  }

  get messageCount(): number {
    return this.records.length;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private append(record: EmotionRecord): void {
    this.records.push(record);
    this.tracker.push(record);
  }

  /** Analyze one message and append its record. */
  process(text: unknown, culturalContext?: string): Promise<EmotionRecord> {
    return this.enqueue(async () => {
      const record = await this.pipeline.analyze(text, culturalContext ?? this.context);
      this.append(record);
      this.log.debug('Message processed', {
        primaryEmotion: record.primaryEmotion,
        intensity: record.intensity,
        degraded: record.degraded,
        messageCount: this.records.length,
      });
      return record;
    });
  }

  /**
   * process() plus a response directive handed to the synthesizer.
   * A failing synthesizer yields the fixed apology and response type `error`;
   * the record is kept either way.
   */
  respond(text: unknown, culturalContext?: string): Promise<SessionResponse> {
    return this.enqueue(async () => {
      const previous = this.records.slice(-RESPONSE_MEMORY);
      const record = await this.pipeline.analyze(text, culturalContext ?? this.context);
      this.append(record);

      const profile = this.pipeline.getRegistry().get(record.culturalContext);
      const directive = buildResponseDirective(record, previous, profile, this.guidance);

      let botResponse: string | null = null;
      let responseType = directive.responseType;
      let followUpSuggestions = directive.followUpSuggestions;
      let error: string | undefined;

      if (this.synthesizer) {
        try {
          botResponse = await this.synthesizer(record, previous, directive);
        } catch (e) {
          const serialized = serializeError(e);
          this.log.error('Response synthesis failed', { error: serialized });
          botResponse = this.guidance.fallbackMessage;
          responseType = ERROR_RESPONSE_TYPE;
          followUpSuggestions = [...this.guidance.fallbackFollowUps];
          error = serialized.message;
        }
      }

      this.responseTypes.set(responseType, (this.responseTypes.get(responseType) ?? 0) + 1);

      return {
        sessionId: this.id,
        record,
        directive,
        botResponse,
        responseType,
        followUpSuggestions,
        messageCount: this.records.length,
        timestamp: new Date().toISOString(),
        ...(error !== undefined ? { error } : {}),
      };
    });
  }

  /** Resolves once every queued call has finished. */
  async idle(): Promise<void> {
    await this.queue;
  }

  getHistory(): readonly EmotionRecord[] {
    return Object.freeze([...this.records]);
  }

  getTrend(): TrendReport {
    return this.tracker.report();
  }

  getProfile(): ConversationProfile {
    return buildConversationProfile(this.records, { config: this.recommendations.session });
  }

  /** Recommendations keyed on the dominant emotion (first matching group). */
  dominantRecommendations(dominant: EmotionLabel): string[] {
    const group = this.recommendations.dominant.find(g => g.emotions.includes(dominant));
    return group ? [...group.recommendations] : [];
  }

  getEmotionTrends(): EmotionTrendsView {
    if (this.records.length === 0) {
      return {
        status: 'No conversation data available',
        trends: null,
        recentPattern: [],
        recommendations: [],
        sessionSummary: { durationMessages: 0, primaryThemes: [], emotionalRange: [] },
      };
    }

    const trends = this.tracker.report();
    const recentPattern = this.records.slice(-RECENT_PATTERN).map(r => r.primaryEmotion);

    return {
      status: 'Analysis complete',
      trends,
      recentPattern,
      recommendations: this.dominantRecommendations(trends.dominantEmotion),
      sessionSummary: {
        durationMessages: this.records.length,
        primaryThemes: identifyThemes(this.records.map(r => r.sourceText)),
        emotionalRange: [...new Set(recentPattern)],
      },
    };
  }

  getConversationSummary(): ConversationSummary {
    const trends = this.records.length > 0 ? this.tracker.report() : null;
    const themes = identifyThemes(this.records.map(r => r.sourceText));
    const distribution = trends ? trends.emotionDistribution : {};

    return {
      status: this.records.length > 0 ? 'Summary complete' : 'No conversation to summarize',
      session: {
        sessionId: this.id,
        startTime: this.startedAt,
        endTime: new Date().toISOString(),
        totalMessages: this.records.length,
        culturalContext: this.context,
      },
      emotionalAnalysis: {
        dominantEmotion: trends ? trends.dominantEmotion : 'neutral',
        emotionDistribution: distribution,
        emotionalRange: Object.keys(distribution).length,
        trends,
      },
      conversationPatterns: {
        responseTypesUsed: Object.fromEntries(this.responseTypes),
        identifiedThemes: themes,
        conversationQuality: assessConversationQuality(this.records),
      },
      recommendations: generateRecommendations(this.records, themes, { config: this.recommendations.session }),
    };
  }
}
