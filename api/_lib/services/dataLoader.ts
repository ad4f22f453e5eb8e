// api/_lib/services/dataLoader.ts
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { env } from '../env';
import { withModule } from '../logger';
import { DataFileError, serializeError } from '../errors';
import {
  intensityModifiersFileSchema,
  culturalProfilesFileSchema,
  conversationThemesFileSchema,
  emotionKeywordsFileSchema,
  recommendationsFileSchema,
  responseGuidanceFileSchema,
} from '../schemas/dataFiles';
import type {
  DataCache,
  DataKey,
  IntensityModifiersFile,
  CulturalProfilesFile,
  ConversationThemesFile,
  EmotionKeywordsFile,
  RecommendationsFile,
  ResponseGuidanceFile,
  ValidationResult,
  DataValidationReport,
} from '../types/dataTypes';

const log = withModule('dataLoader');

export const DATA_FILES: Readonly<Record<DataKey, string>> = Object.freeze({
  intensityModifiers: 'intensity_modifiers.json',
  culturalProfiles: 'cultural_profiles.json',
  conversationThemes: 'conversation_themes.json',
  emotionKeywords: 'emotion_keywords.json',
  recommendations: 'recommendations.json',
  responseGuidance: 'response_guidance.json',
});

// Fallbacks keep every consumer working when a file is missing or invalid
const FALLBACK_APOLOGY = "I apologize, but I'm having trouble processing your message right now. Could you please try again?";

function fallbackData(): DataCache {
  return {
    intensityModifiers: { version: '0', high: [], medium: [], low: [] },
    culturalProfiles: { version: '0', profiles: {} },
    conversationThemes: { version: '0', maxThemes: 3, themes: [] },
    emotionKeywords: { version: '0', emotions: {} },
    recommendations: {
      version: '0',
      session: {
        negativeEmotions: ['sadness', 'anger', 'fear'],
        highNegativeRatio: 0.6,
        lowNegativeRatio: 0.2,
        highNegative: [],
        lowNegative: [],
        empty: [],
        maxItems: 4,
      },
      dominant: [],
    },
    responseGuidance: {
      version: '0',
      defaultResponseType: 'supportive',
      responseTypes: {},
      followUps: {},
      continuityCues: {},
      fallbackMessage: FALLBACK_APOLOGY,
      fallbackFollowUps: [],
    },
  };
}

function resolveDataPath(explicit?: string): string {
  const possiblePaths = [
    explicit,
    env.EMOTION_DATA_PATH,
    fileURLToPath(new URL('../../../data', import.meta.url)), // api/_lib/services/ -> data/
    path.resolve(process.cwd(), 'data'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  const found = possiblePaths.find(p => {
    try {
      return fs.existsSync(p);
    } catch {
      return false;
    }
  });
  return path.resolve(found ?? possiblePaths[0]);
}

export interface DataLoaderOptions {
  /** Directory holding the JSON files; defaults to EMOTION_DATA_PATH, then ./data */
  dataPath?: string;
}

export class DataLoaderService {
  private cache: DataCache = fallbackData();
  private status = new Map<string, ValidationResult>();
  private readonly dataPath: string;
  private initialized = false;

  constructor(options: DataLoaderOptions = {}) {
    this.dataPath = resolveDataPath(options.dataPath);
    log.debug('DataLoader initialized', { dataPath: this.dataPath });

    // Pre-initialize synchronously so the first lookup never waits
    this.initializeSync();
  }

  private readJsonSafe<T>(
    filename: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fallback: T,
    countRecords: (data: T) => number
  ): T {
    const filepath = path.join(this.dataPath, filename);
    const errors: string[] = [];
    let value = fallback;

    try {
      if (!fs.existsSync(filepath)) {
        throw new DataFileError(filename, 'file not found');
      }
      const content = fs.readFileSync(filepath, 'utf-8');
      const parsed = schema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        throw new DataFileError(
          filename,
          parsed.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ')
        );
      }
      value = parsed.data;
      log.debug(`Loaded ${filename}`, { chars: content.length });
    } catch (error) {
      const message = error instanceof DataFileError
        ? error.message
        : `${filename}: ${serializeError(error).message}`;
      errors.push(message);
      log.warn(`Using fallback for ${filename}`, { error: message });
    }

    this.status.set(filename, {
      file: filename,
      valid: errors.length === 0,
      errors,
      recordCount: errors.length === 0 ? countRecords(value) : 0,
    });
    return value;
  }

  private loadAllIntoCache(): void {
    const fallback = fallbackData();
    this.status.clear();

    this.cache = {
      intensityModifiers: this.readJsonSafe<IntensityModifiersFile>(
        DATA_FILES.intensityModifiers,
        intensityModifiersFileSchema,
        fallback.intensityModifiers,
        d => d.high.length + d.medium.length + d.low.length
      ),
      culturalProfiles: this.readJsonSafe<CulturalProfilesFile>(
        DATA_FILES.culturalProfiles,
        culturalProfilesFileSchema,
        fallback.culturalProfiles,
        d => Object.keys(d.profiles).length
      ),
      conversationThemes: this.readJsonSafe<ConversationThemesFile>(
        DATA_FILES.conversationThemes,
        conversationThemesFileSchema,
        fallback.conversationThemes,
        d => d.themes.length
      ),
      emotionKeywords: this.readJsonSafe<EmotionKeywordsFile>(
        DATA_FILES.emotionKeywords,
        emotionKeywordsFileSchema,
        fallback.emotionKeywords,
        d => Object.values(d.emotions).reduce((n, words) => n + (words?.length ?? 0), 0)
      ),
      recommendations: this.readJsonSafe<RecommendationsFile>(
        DATA_FILES.recommendations,
        recommendationsFileSchema,
        fallback.recommendations,
        d => d.dominant.length + 1
      ),
      responseGuidance: this.readJsonSafe<ResponseGuidanceFile>(
        DATA_FILES.responseGuidance,
        responseGuidanceFileSchema,
        fallback.responseGuidance,
        d => Object.keys(d.responseTypes).length
      ),
    };
  }

  public initializeSync(): void {
    if (this.initialized) return;
    this.loadAllIntoCache();
    this.initialized = true;
    const report = this.getValidationReport();
    log.info('Data cache initialized', {
      dataPath: this.dataPath,
      validFiles: report.validFiles,
      totalFiles: report.totalFiles,
    });
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  public getDataPath(): string {
    return this.dataPath;
  }

  public getIntensityModifiers(): IntensityModifiersFile {
    return this.cache.intensityModifiers;
  }

  public getCulturalProfiles(): CulturalProfilesFile {
    return this.cache.culturalProfiles;
  }

  public getConversationThemes(): ConversationThemesFile {
    return this.cache.conversationThemes;
  }

  public getEmotionKeywords(): EmotionKeywordsFile {
    return this.cache.emotionKeywords;
  }

  public getRecommendations(): RecommendationsFile {
    return this.cache.recommendations;
  }

  public getResponseGuidance(): ResponseGuidanceFile {
    return this.cache.responseGuidance;
  }

  public get<K extends DataKey>(key: K): DataCache[K] {
    return this.cache[key];
  }

  // Re-read every file from disk
  public refresh(): void {
    this.initialized = false;
    this.initializeSync();
  }

  // Per-file validation status (for health checks)
  public getValidationReport(): DataValidationReport {
    const results = Object.values(DATA_FILES).map(file =>
      this.status.get(file) ?? { file, valid: false, errors: ['not loaded'], recordCount: 0 }
    );
    const validFiles = results.filter(r => r.valid).length;
    const invalidFiles = results.length - validFiles;

    let overallStatus: DataValidationReport['overallStatus'] = 'healthy';
    if (invalidFiles === results.length) overallStatus = 'error';
    else if (invalidFiles > 0) overallStatus = 'warning';

    return {
      timestamp: new Date().toISOString(),
      dataPath: this.dataPath,
      totalFiles: results.length,
      validFiles,
      invalidFiles,
      results,
      overallStatus,
    };
  }
}

// Export singleton instance
export const dataLoader = new DataLoaderService();
