import { describe, it, expect } from 'vitest';
import {
  ThemeCatalog,
  identifyThemes,
  assessConversationQuality,
  generateRecommendations,
  buildConversationProfile,
} from '../../api/_lib/services/conversationProfile';

const LOW_NEGATIVE = ['Keep maintaining your positive mindset!', 'Share your positive energy with others'];
const HIGH_NEGATIVE = [
  'Consider seeking additional emotional support',
  'Practice mindfulness or stress-reduction techniques',
];
const WORK = 'Consider work-life balance strategies';
const RELATIONSHIPS = 'Focus on healthy communication patterns';

describe('identifyThemes', () => {
  it('finds themes across messages in declared order', () => {
    expect(identifyThemes(['I had a meeting with my boss', 'My friend called'])).toEqual(['work', 'relationships']);
  });

  it('matches keywords as substrings', () => {
    expect(identifyThemes(['Finished my homework'])).toEqual(['work', 'daily_life']);
  });

  it('returns at most three themes', () => {
    expect(identifyThemes(['work with family, feeling sick, new goal, every morning'])).toEqual([
      'work',
      'relationships',
      'health',
    ]);
  });

  it('is case-insensitive and skips non-text entries', () => {
    expect(identifyThemes(['DOCTOR appointment', 42, null])).toEqual(['health']);
    expect(identifyThemes([])).toEqual([]);
  });

  it('caps a catalog at three themes even when it allows more', () => {
    const catalog = new ThemeCatalog({
      version: '1',
      maxThemes: 5,
      themes: ['a', 'b', 'c', 'd'].map(id => ({ id, keywords: [`key${id}`] })),
    });
    expect(catalog.maxThemes).toBe(3);
    expect(catalog.match('keyd keyc keyb keya')).toEqual(['a', 'b', 'c']);
  });
});

describe('assessConversationQuality', () => {
  it('reports unknown quality for an empty conversation', () => {
    expect(assessConversationQuality([])).toEqual({
      quality: 'unknown',
      depth: 'shallow',
      messageCount: 0,
      avgMessageLength: 0,
      emotionVariety: 0,
      engagementScore: 0,
      emotionalOpenness: 0,
    });
  });

  it('rates a short single-emotion conversation as basic', () => {
    const quality = assessConversationQuality([
      { primaryEmotion: 'joy', sourceText: 'Great day at work' },
      { primaryEmotion: 'joy', sourceText: 'Lunch with a friend' },
    ]);
    expect(quality).toEqual({
      quality: 'basic',
      depth: 'moderate',
      messageCount: 2,
      avgMessageLength: 18,
      emotionVariety: 1,
      engagementScore: 3,
      emotionalOpenness: 1,
    });
  });

  it('rates a long and varied conversation as good and deep', () => {
    const emotions = ['joy', 'sadness', 'anger', 'fear', 'surprise', 'love', 'pride'];
    const quality = assessConversationQuality(
      emotions.map(primaryEmotion => ({ primaryEmotion, sourceText: 'x'.repeat(40) }))
    );
    expect(quality.quality).toBe('good');
    expect(quality.depth).toBe('deep');
    expect(quality.engagementScore).toBe(10);
    expect(quality.emotionVariety).toBe(7);
  });
});

describe('generateRecommendations', () => {
  it('suggests starting a conversation when there are no records', () => {
    expect(generateRecommendations([], [])).toEqual(['Start a conversation to get personalized recommendations']);
  });

  it('adds support advice for a mostly negative conversation', () => {
    const records = ['sadness', 'anger', 'fear', 'joy'].map(primaryEmotion => ({ primaryEmotion }));
    expect(generateRecommendations(records, ['work'])).toEqual([...HIGH_NEGATIVE, WORK]);
  });

  it('adds only theme advice between the ratio thresholds', () => {
    const records = ['sadness', 'joy'].map(primaryEmotion => ({ primaryEmotion }));
    expect(generateRecommendations(records, ['relationships', 'health'])).toEqual([RELATIONSHIPS]);
  });

  it('honours a smaller configured limit', () => {
    const records = [{ primaryEmotion: 'joy' }];
    const config = {
      negativeEmotions: [],
      highNegativeRatio: 0.6,
      lowNegativeRatio: 0.2,
      highNegative: [],
      lowNegative: ['one', 'two'],
      empty: [],
      maxItems: 1,
    };
    expect(generateRecommendations(records, ['work'], { config })).toEqual(['one']);
  });
});

describe('buildConversationProfile', () => {
  it('combines themes, quality and recommendations', () => {
    const profile = buildConversationProfile([
      { primaryEmotion: 'joy', sourceText: 'Great day at work' },
      { primaryEmotion: 'joy', sourceText: 'Lunch with a friend' },
    ]);
    expect(profile.themes).toEqual(['work', 'relationships', 'daily_life']);
    expect(profile.recommendations).toEqual([...LOW_NEGATIVE, WORK, RELATIONSHIPS]);
    expect(profile.quality.quality).toBe('basic');
  });
});
