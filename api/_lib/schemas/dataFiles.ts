// api/_lib/schemas/dataFiles.ts
import { z } from 'zod';
import { EMOTION_LABELS } from '../services/taxonomy';

/**
 * Schemas for the JSON files under data/.
 * Every file is validated on load; an invalid file is replaced by its fallback.
 */

export const emotionLabelSchema = z.enum(EMOTION_LABELS);

const phraseList = z.array(z.string().min(1));

export const intensityModifiersFileSchema = z.object({
  version: z.string().default('0'),
  high: phraseList,
  medium: phraseList,
  low: phraseList,
});

export const culturalProfileEntrySchema = z.object({
  communicationStyle: z.string().default('balanced'),
  emotionalExpression: z.string().min(1).describe('expressive | reserved | adaptive | free-form'),
  tonePreference: z.string().default('neutral'),
  selfExpression: z.string().default('flexible'),
  conflictResponse: z.string().default('contextual'),
  feedbackStyle: z.string().default('constructive'),
  supportPreferences: z.array(z.string()).default([]),
  values: z.array(z.string()).default([]),
});

export const culturalProfilesFileSchema = z.object({
  version: z.string().default('0'),
  profiles: z.record(culturalProfileEntrySchema),
});

export const conversationThemeSchema = z.object({
  id: z.string().min(1),
  keywords: phraseList,
  recommendation: z.string().optional(),
});

export const conversationThemesFileSchema = z.object({
  version: z.string().default('0'),
  maxThemes: z.number().int().positive().default(3),
  themes: z.array(conversationThemeSchema),
});

export const emotionKeywordsFileSchema = z.object({
  version: z.string().default('0'),
  emotions: z.record(emotionLabelSchema, phraseList),
});

export const recommendationsFileSchema = z.object({
  version: z.string().default('0'),
  session: z.object({
    negativeEmotions: z.array(emotionLabelSchema),
    highNegativeRatio: z.number().min(0).max(1),
    lowNegativeRatio: z.number().min(0).max(1),
    highNegative: z.array(z.string()),
    lowNegative: z.array(z.string()),
    empty: z.array(z.string()),
    maxItems: z.number().int().positive(),
  }),
  dominant: z.array(z.object({
    emotions: z.array(emotionLabelSchema),
    recommendations: z.array(z.string()),
  })),
});

export const responseGuidanceFileSchema = z.object({
  version: z.string().default('0'),
  defaultResponseType: z.string().min(1),
  responseTypes: z.record(emotionLabelSchema, z.string()),
  followUps: z.record(emotionLabelSchema, z.array(z.string())),
  continuityCues: z.record(emotionLabelSchema, z.string()),
  fallbackMessage: z.string().min(1),
  fallbackFollowUps: z.array(z.string()),
});
