// api/_lib/types/dataTypes.ts
// TypeScript types for all JSON data structures (inferred from their schemas)
import type { z } from 'zod';
import type {
  intensityModifiersFileSchema,
  culturalProfileEntrySchema,
  culturalProfilesFileSchema,
  conversationThemeSchema,
  conversationThemesFileSchema,
  emotionKeywordsFileSchema,
  recommendationsFileSchema,
  responseGuidanceFileSchema,
} from '../schemas/dataFiles';

export type IntensityModifiersFile = z.infer<typeof intensityModifiersFileSchema>;
export type CulturalProfileEntry = z.infer<typeof culturalProfileEntrySchema>;
export type CulturalProfilesFile = z.infer<typeof culturalProfilesFileSchema>;
export type ConversationTheme = z.infer<typeof conversationThemeSchema>;
export type ConversationThemesFile = z.infer<typeof conversationThemesFileSchema>;
export type EmotionKeywordsFile = z.infer<typeof emotionKeywordsFileSchema>;
export type RecommendationsFile = z.infer<typeof recommendationsFileSchema>;
export type ResponseGuidanceFile = z.infer<typeof responseGuidanceFileSchema>;

// === Data Cache Type ===
export interface DataCache {
  intensityModifiers: IntensityModifiersFile;
  culturalProfiles: CulturalProfilesFile;
  conversationThemes: ConversationThemesFile;
  emotionKeywords: EmotionKeywordsFile;
  recommendations: RecommendationsFile;
  responseGuidance: ResponseGuidanceFile;
}

export type DataKey = keyof DataCache;

export interface ValidationResult {
  file: string;
  valid: boolean;
  errors: string[];
  recordCount: number;
}

export interface DataValidationReport {
  timestamp: string;
  dataPath: string;
  totalFiles: number;
  validFiles: number;
  invalidFiles: number;
  results: ValidationResult[];
  overallStatus: 'healthy' | 'warning' | 'error';
}
