// api/_lib/services/culturalProfiles.ts
import { withModule } from '../logger';
import { dataLoader } from './dataLoader';
import type { CulturalProfileEntry, CulturalProfilesFile } from '../types/dataTypes';

const log = withModule('culturalProfiles');

export const DEFAULT_PROFILE_NAME = 'default';

export type ExpressionStyle = 'expressive' | 'reserved' | 'adaptive' | (string & {});

export interface CulturalProfile {
  readonly name: string;
  readonly communicationStyle: string;
  readonly emotionalExpression: ExpressionStyle;
  readonly tonePreference: string;
  readonly selfExpression: string;
  readonly conflictResponse: string;
  readonly feedbackStyle: string;
  readonly supportPreferences: readonly string[];
  readonly values: readonly string[];
}

const BUILT_IN_DEFAULT: CulturalProfileEntry = {
  communicationStyle: 'balanced',
  emotionalExpression: 'adaptive',
  tonePreference: 'neutral',
  selfExpression: 'flexible',
  conflictResponse: 'contextual',
  feedbackStyle: 'constructive',
  supportPreferences: [],
  values: [],
};

export function normalizeProfileName(name: unknown): string {
  return typeof name === 'string' ? name.trim().toLowerCase() : '';
}

function freezeProfile(name: string, entry: CulturalProfileEntry): CulturalProfile {
  return Object.freeze({
    name,
    communicationStyle: entry.communicationStyle,
    emotionalExpression: entry.emotionalExpression.trim().toLowerCase(),
    tonePreference: entry.tonePreference,
    selfExpression: entry.selfExpression,
    conflictResponse: entry.conflictResponse,
    feedbackStyle: entry.feedbackStyle,
    supportPreferences: Object.freeze([...entry.supportPreferences]),
    values: Object.freeze([...entry.values]),
  });
}

/**
 * Read-only set of named profiles. Lookups never fail: unregistered names
 * resolve to `default`, which is always present.
 */
export class CulturalProfileRegistry {
  private readonly profiles: ReadonlyMap<string, CulturalProfile>;

  constructor(source: CulturalProfilesFile) {
    const profiles = new Map<string, CulturalProfile>();
    for (const [rawName, entry] of Object.entries(source.profiles)) {
      const name = normalizeProfileName(rawName);
      if (!name) continue;
      profiles.set(name, freezeProfile(name, entry));
    }
    if (!profiles.has(DEFAULT_PROFILE_NAME)) {
      log.warn('No default cultural profile registered, using built-in');
      profiles.set(DEFAULT_PROFILE_NAME, freezeProfile(DEFAULT_PROFILE_NAME, BUILT_IN_DEFAULT));
    }
    this.profiles = profiles;
  }

  static fromDataLoader(): CulturalProfileRegistry {
    return new CulturalProfileRegistry(dataLoader.getCulturalProfiles());
  }

  has(name: unknown): boolean {
    return this.profiles.has(normalizeProfileName(name));
  }

  /** The registered name a lookup would land on. */
  resolveName(name: unknown): string {
    const key = normalizeProfileName(name);
    return this.profiles.has(key) ? key : DEFAULT_PROFILE_NAME;
  }

  get(name: unknown): CulturalProfile {
    const key = normalizeProfileName(name);
    const profile = this.profiles.get(key);
    if (profile) return profile;

    if (key) log.debug('Unregistered cultural context, falling back to default', { requested: key });
    return this.getDefault();
  }

  getDefault(): CulturalProfile {
    const profile = this.profiles.get(DEFAULT_PROFILE_NAME);
    return profile ?? freezeProfile(DEFAULT_PROFILE_NAME, BUILT_IN_DEFAULT);
  }

  names(): string[] {
    return [...this.profiles.keys()];
  }
}

let shared: CulturalProfileRegistry | null = null;

// Process-wide registry built from data/cultural_profiles.json
export function getCulturalProfiles(): CulturalProfileRegistry {
  if (!shared) shared = CulturalProfileRegistry.fromDataLoader();
  return shared;
}
