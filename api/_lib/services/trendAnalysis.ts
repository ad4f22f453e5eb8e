// api/_lib/services/trendAnalysis.ts
import { env } from '../env';
import { withModule } from '../logger';
import { isEmotionLabel, valenceOf, type EmotionLabel } from './taxonomy';
import { INTENSITY_WEIGHTS, isIntensityLevel } from './intensityClassifier';
import { RingBuffer } from '../utils/ringBuffer';

const log = withModule('trendAnalysis');

export const SHORT_WINDOW = 3;
export const MEDIUM_WINDOW = 7;
export const DEFAULT_TREND_CAPACITY = 10;

export type WindowTrend = 'stable' | 'improving' | 'declining' | 'mixed' | 'insufficient_data';

/** The only fields trend analysis reads; anything else on a record is ignored. */
export interface TrendInput {
  primaryEmotion?: unknown;
  intensity?: unknown;
}

export interface TrendReport {
  dominantEmotion: EmotionLabel;
  /** Counts per primary emotion, keyed in first-encountered order */
  emotionDistribution: Partial<Record<EmotionLabel, number>>;
  averageIntensity: number;
  shortTerm: WindowTrend;
  mediumTerm: WindowTrend;
  overall: WindowTrend;
  trend: string;
  totalMessages: number;
  analysis: string;
}

// Malformed entries count as neutral / low
function emotionOf(entry: TrendInput | null | undefined): EmotionLabel {
  const emotion = entry?.primaryEmotion;
  return isEmotionLabel(emotion) ? emotion : 'neutral';
}

function intensityWeightOf(entry: TrendInput | null | undefined): number {
  const intensity = entry?.intensity;
  return isIntensityLevel(intensity) ? INTENSITY_WEIGHTS[intensity] : INTENSITY_WEIGHTS.low;
}

/**
 * Direction of one window: identical → stable, then the valence majority;
 * a tie is mixed and an empty window has no trend.
 */
export function calculateWindowTrend(window: readonly string[]): WindowTrend {
  if (!Array.isArray(window) || window.length === 0) return 'insufficient_data';
  if (new Set(window).size === 1) return 'stable';

  let positive = 0;
  let negative = 0;
  for (const emotion of window) {
    const valence = valenceOf(emotion);
    if (valence === 'positive') positive++;
    else if (valence === 'negative') negative++;
  }

  if (positive > negative) return 'improving';
  if (negative > positive) return 'declining';
  return 'mixed';
}

export const formatTrend = (short: WindowTrend, medium: WindowTrend, overall: WindowTrend) =>
  `short-term: ${short}, mid-term: ${medium} and overall: ${overall}`;

/**
 * Incremental trend state for one conversation. push() is O(1); the
 * bounded buffer keeps only the most recent `capacity` primary emotions.
 */
export class TrendTracker {
  private readonly buffer: RingBuffer<EmotionLabel>;
  private counts = new Map<EmotionLabel, number>();
  private intensityTotal = 0;
  private total = 0;

  constructor(capacity: number = env.TREND_WINDOW_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      log.warn('Invalid trend capacity, using default', { capacity, fallback: DEFAULT_TREND_CAPACITY });
      capacity = DEFAULT_TREND_CAPACITY;
    }
    this.buffer = new RingBuffer<EmotionLabel>(capacity);
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  get size(): number {
    return this.total;
  }

  push(entry: TrendInput | null | undefined): void {
    const emotion = emotionOf(entry);
    this.counts.set(emotion, (this.counts.get(emotion) ?? 0) + 1);
    this.intensityTotal += intensityWeightOf(entry);
    this.total++;
    this.buffer.push(emotion);
  }

  /** Primary emotions currently in the buffer, oldest first. */
  recent(n: number = this.buffer.capacity): EmotionLabel[] {
    return this.buffer.last(n);
  }

  report(): TrendReport {
    const shortTerm = calculateWindowTrend(this.buffer.last(SHORT_WINDOW));
    const mediumTerm = calculateWindowTrend(this.buffer.last(MEDIUM_WINDOW));
    const overall: WindowTrend = shortTerm === mediumTerm ? shortTerm : 'mixed';
    const trend = formatTrend(shortTerm, mediumTerm, overall);

    let dominantEmotion: EmotionLabel = 'neutral';
    let best = 0;
    const emotionDistribution: Partial<Record<EmotionLabel, number>> = {};
    for (const [emotion, count] of this.counts) {
      emotionDistribution[emotion] = count;
      if (count > best) {
        best = count;
        dominantEmotion = emotion;
      }
    }

    return {
      dominantEmotion,
      emotionDistribution,
      averageIntensity: this.total > 0 ? this.intensityTotal / this.total : 0,
      shortTerm,
      mediumTerm,
      overall,
      trend,
      totalMessages: this.total,
      analysis: this.total > 0
        ? `Primary emotion: ${dominantEmotion.toUpperCase()} with ${trend} trend`
        : 'No data available',
    };
  }

  reset(): void {
    this.buffer.clear();
    this.counts = new Map();
    this.intensityTotal = 0;
    this.total = 0;
  }
}

/** Pure over its input: a fresh tracker fed every record in order. */
export function analyzeTrends(
  records: readonly (TrendInput | null | undefined)[],
  capacity: number = env.TREND_WINDOW_SIZE
): TrendReport {
  const tracker = new TrendTracker(capacity);
  for (const record of Array.isArray(records) ? records : []) {
    tracker.push(record);
  }
  const report = tracker.report();
  log.debug('Trend report computed', {
    totalMessages: report.totalMessages,
    dominantEmotion: report.dominantEmotion,
    overall: report.overall,
  });
  return report;
}
