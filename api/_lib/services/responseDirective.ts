// api/_lib/services/responseDirective.ts
// Structured hand-off to the external response synthesizer
import { dataLoader } from './dataLoader';
import { isEmotionLabel } from './taxonomy';
import type { EmotionLabel } from './taxonomy';
import type { EmotionRecord } from './emotionRecord';
import type { IntensityLevel } from './intensityClassifier';
import type { CulturalProfile } from './culturalProfiles';
import type { ResponseGuidanceFile } from '../types/dataTypes';

export const CONTINUITY_RESPONSE_TYPE = 'continuity_aware';
export const ERROR_RESPONSE_TYPE = 'error';

/** How many previous records the synthesizer sees */
export const RESPONSE_MEMORY = 5;

export interface ResponseDirective {
  emotion: EmotionLabel;
  intensity: IntensityLevel;
  confidence: number;
  responseType: string;
  followUpSuggestions: string[];
  /** Set when the same emotion has now held for three messages in a row */
  continuityCue?: string;
  culturalContext: string;
  communicationStyle: string;
  tonePreference: string;
  supportPreferences: string[];
  degraded: boolean;
}

export function responseTypeFor(emotion: EmotionLabel, guidance: ResponseGuidanceFile): string {
  return guidance.responseTypes[emotion] ?? guidance.defaultResponseType;
}

export function followUpsFor(emotion: EmotionLabel, guidance: ResponseGuidanceFile): string[] {
  return [...(guidance.followUps[emotion] ?? guidance.followUps.neutral ?? [])];
}

/**
 * The cue for `emotion` when the two most recent previous records carry it
 * too; undefined otherwise or when no cue is configured for it.
 */
export function continuityCueFor(
  emotion: EmotionLabel,
  previous: readonly { primaryEmotion?: unknown }[],
  guidance: ResponseGuidanceFile
): string | undefined {
  if (previous.length < 2) return undefined;
  const lastTwo = previous.slice(-2).map(r => r.primaryEmotion);
  const continuing = lastTwo.every(e => isEmotionLabel(e) && e === emotion);
  return continuing ? guidance.continuityCues[emotion] : undefined;
}

export function buildResponseDirective(
  record: EmotionRecord,
  previous: readonly { primaryEmotion?: unknown }[],
  profile: CulturalProfile,
  guidance: ResponseGuidanceFile = dataLoader.getResponseGuidance()
): ResponseDirective {
  const emotion = record.primaryEmotion;
  const continuityCue = continuityCueFor(emotion, previous, guidance);

  return {
    emotion,
    intensity: record.intensity,
    confidence: record.confidence,
    responseType: continuityCue ? CONTINUITY_RESPONSE_TYPE : responseTypeFor(emotion, guidance),
    followUpSuggestions: followUpsFor(emotion, guidance),
    ...(continuityCue ? { continuityCue } : {}),
    culturalContext: profile.name,
    communicationStyle: profile.communicationStyle,
    tonePreference: profile.tonePreference,
    supportPreferences: [...profile.supportPreferences],
    degraded: record.degraded,
  };
}
