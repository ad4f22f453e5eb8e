// api/_lib/services/emotionRecord.ts
import { env } from '../env';
import { withModule, timeOperation, type Logger } from '../logger';
import { ClassifierError, recoverWith } from '../errors';
import type { EmotionLabel } from './taxonomy';
import { normalizeScores, hasUsableSignal, type RawScores } from './scoreNormalizer';
import { applyCulturalContext } from './culturalAdjuster';
import { getCulturalProfiles, type CulturalProfileRegistry } from './culturalProfiles';
import { classifyIntensity, type IntensityLevel, type IntensityLexicon } from './intensityClassifier';
import { defaultKeywordClassifier } from './keywordClassifier';
import {
  degenerateDistribution,
  primaryOf,
  clamp01,
  type EmotionDistribution,
} from '../utils/distribution';
import { isBlank } from '../utils/textCleaning';
import { isRawScoreMap } from '../schemas/emotionRecord';

const log = withModule('emotionRecord');

export const DEGRADED_CONFIDENCE = 0.5;

export interface EmotionRecord {
  readonly primaryEmotion: EmotionLabel;
  readonly confidence: number;
  readonly distribution: EmotionDistribution;
  readonly intensity: IntensityLevel;
  readonly culturalContext: string;
  readonly sourceText: string;
  /** True for the canonical neutral record substituted on failure */
  readonly degraded: boolean;
  readonly timestamp: string;
}

/** Opaque upstream classifier; may return an empty map, unknown labels, or throw. */
export type EmotionClassifier = (text: string) => RawScores | Promise<RawScores>;

/** Opaque text cleaner; its output is used only for lexical modifier matching. */
export type TextNormalizer = (text: string) => string;

export function createDegradedRecord(text?: unknown, culturalContext: string = 'default'): EmotionRecord {
  const record: EmotionRecord = {
    primaryEmotion: 'neutral',
    confidence: DEGRADED_CONFIDENCE,
    distribution: degenerateDistribution(),
    intensity: 'low',
    culturalContext,
    sourceText: typeof text === 'string' ? text : '',
    degraded: true,
    timestamp: new Date().toISOString(),
  };
  return Object.freeze(record);
}

export interface BuildRecordInput {
  scores: unknown;
  text: unknown;
  culturalContext?: unknown;
  /** Cleaned text for modifier matching; punctuation and casing come from `text` */
  lexicalText?: string;
  registry?: CulturalProfileRegistry;
  lexicon?: IntensityLexicon;
}

/**
 * Raw scores + raw text + culture tag → one frozen record.
 * Never throws: blank text, scores without a usable signal and any
 * internal failure all produce the degraded record.
 */
export function buildEmotionRecord(input: BuildRecordInput): EmotionRecord {
  const registry = input.registry ?? getCulturalProfiles();
  const profile = registry.get(input.culturalContext);
  const { text } = input;

  if (typeof text !== 'string' || isBlank(text)) {
    log.debug('Blank or non-text input, using degraded record');
    return createDegradedRecord(text, profile.name);
  }
  if (!hasUsableSignal(input.scores)) {
    log.debug('No usable classifier signal, using degraded record');
    return createDegradedRecord(text, profile.name);
  }

  return recoverWith(
    log,
    'Emotion record construction',
    () => {
      const adjusted = applyCulturalContext(normalizeScores(input.scores), profile);
      const primaryEmotion = primaryOf(adjusted);
      const record: EmotionRecord = {
        primaryEmotion,
        confidence: clamp01(adjusted[primaryEmotion]),
        distribution: adjusted,
        intensity: classifyIntensity(adjusted, text, { lexicalText: input.lexicalText, lexicon: input.lexicon }),
        culturalContext: profile.name,
        sourceText: text,
        degraded: false,
        timestamp: new Date().toISOString(),
      };
      log.debug('Emotion record built', {
        primaryEmotion: record.primaryEmotion,
        confidence: record.confidence,
        intensity: record.intensity,
        culturalContext: record.culturalContext,
      });
      return Object.freeze(record);
    },
    () => createDegradedRecord(text, profile.name)
  );
}

// Race a promise against a timer; the timer is always cleared
export async function callWithTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new ClassifierError(`Classifier timed out after ${timeoutMs}ms`)),
          timeoutMs
        );
      }),
    ]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}

export interface EmotionPipelineOptions {
  classifier?: EmotionClassifier;
  normalizeText?: TextNormalizer;
  registry?: CulturalProfileRegistry;
  lexicon?: IntensityLexicon;
  /** 0 disables the timeout */
  classifierTimeoutMs?: number;
  logger?: Logger;
}

/**
 * text → classifier → record. The classifier is the only awaited step;
 * its failures and timeouts become "no scores".
 */
export class EmotionPipeline {
  private readonly classifier: EmotionClassifier;
  private readonly normalizeText?: TextNormalizer;
  private readonly registry: CulturalProfileRegistry;
  private readonly lexicon?: IntensityLexicon;
  private readonly classifierTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: EmotionPipelineOptions = {}) {
    this.classifier = options.classifier ?? defaultKeywordClassifier;
    this.normalizeText = options.normalizeText;
    this.registry = options.registry ?? getCulturalProfiles();
    this.lexicon = options.lexicon;
    this.classifierTimeoutMs = options.classifierTimeoutMs ?? env.CLASSIFIER_TIMEOUT_MS;
    this.log = options.logger ?? log;
  }

  getRegistry(): CulturalProfileRegistry {
    return this.registry;
  }

  /** Raw scores, or null when the classifier threw or timed out. */
  async classify(text: string): Promise<RawScores | null> {
    try {
      const scores = await timeOperation(this.log, 'classifier', () => {
        const pending = Promise.resolve().then(() => this.classifier(text));
        return this.classifierTimeoutMs > 0 ? callWithTimeout(pending, this.classifierTimeoutMs) : pending;
      });
      if (!isRawScoreMap(scores)) this.log.warn('Classifier returned a malformed score map');
      return scores;
    } catch {
      // timeOperation has already logged the failure at error
      return null;
    }
  }

  private lexicalTextFor(text: string): string | undefined {
    const normalize = this.normalizeText;
    if (!normalize) return undefined;
    return recoverWith<string | undefined>(this.log, 'Text normalization', () => normalize(text), () => undefined);
  }

  async analyze(text: unknown, culturalContext?: unknown): Promise<EmotionRecord> {
    if (typeof text !== 'string' || isBlank(text)) {
      return createDegradedRecord(text, this.registry.resolveName(culturalContext));
    }

    const scores = await this.classify(text);
    return buildEmotionRecord({
      scores,
      text,
      culturalContext,
      lexicalText: this.lexicalTextFor(text),
      registry: this.registry,
      lexicon: this.lexicon,
    });
  }

  /** One record per text, in input order. */
  async analyzeBatch(texts: readonly unknown[], culturalContext?: unknown): Promise<EmotionRecord[]> {
    const records: EmotionRecord[] = [];
    for (const text of texts) {
      records.push(await this.analyze(text, culturalContext));
    }
    return records;
  }
}
