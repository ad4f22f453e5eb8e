// api/_lib/schemas/emotionRecord.ts
import { z } from 'zod';
import { emotionLabelSchema } from './dataFiles';

/**
 * Schemas for the values that cross the core's boundary: the classifier's
 * score map coming in and the record going out. Message text is never
 * validated here; blank or odd input degrades instead of failing.
 */

// Classifier output: label → score; unknown labels are tolerated
export const rawScoresSchema = z.record(z.string(), z.number().finite().nonnegative());

export const intensityLevelSchema = z.enum(['low', 'medium', 'high']);

export const emotionRecordSchema = z.object({
  primaryEmotion: emotionLabelSchema,
  confidence: z.number().min(0).max(1),
  distribution: z.record(emotionLabelSchema, z.number().min(0).max(1)),
  intensity: intensityLevelSchema,
  culturalContext: z.string(),
  sourceText: z.string(),
  degraded: z.boolean(),
  timestamp: z.string().datetime(),
});

/** True when a classifier result is a well-formed score map. */
export const isRawScoreMap = (value: unknown): boolean => rawScoresSchema.safeParse(value).success;
