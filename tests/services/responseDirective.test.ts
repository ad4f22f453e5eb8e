import { describe, it, expect } from 'vitest';
import {
  buildResponseDirective,
  continuityCueFor,
  responseTypeFor,
  followUpsFor,
  CONTINUITY_RESPONSE_TYPE,
} from '../../api/_lib/services/responseDirective';
import { buildEmotionRecord, createDegradedRecord } from '../../api/_lib/services/emotionRecord';
import { getCulturalProfiles } from '../../api/_lib/services/culturalProfiles';
import { dataLoader } from '../../api/_lib/services/dataLoader';

const guidance = dataLoader.getResponseGuidance();
const profiles = getCulturalProfiles();
const sad = buildEmotionRecord({ scores: { sadness: 1 }, text: 'I miss them' });
const previous = (...emotions: string[]) => emotions.map(primaryEmotion => ({ primaryEmotion }));

describe('continuityCueFor', () => {
  it('needs the two previous records to share the emotion', () => {
    expect(continuityCueFor('sadness', previous('sadness', 'sadness'), guidance)).toBe(
      "I notice you're still feeling down."
    );
    expect(continuityCueFor('sadness', previous('sadness', 'joy'), guidance)).toBeUndefined();
    expect(continuityCueFor('sadness', previous('sadness'), guidance)).toBeUndefined();
  });

  it('only looks at the two most recent records', () => {
    expect(continuityCueFor('anger', previous('joy', 'anger', 'anger'), guidance)).toBe(
      'I can see this situation is still bothering you.'
    );
  });

  it('has no cue for emotions without one configured', () => {
    expect(continuityCueFor('grief', previous('grief', 'grief'), guidance)).toBeUndefined();
  });
});

describe('buildResponseDirective', () => {
  it('describes a first sad message for the default profile', () => {
    const directive = buildResponseDirective(sad, [], profiles.get('default'), guidance);
    expect(directive).toEqual({
      emotion: 'sadness',
      intensity: 'high',
      confidence: 1,
      responseType: 'supportive',
      followUpSuggestions: [
        "Would you like to share more about what's troubling you?",
        'Is there anything specific that might help you feel better?',
        'How can I best support you right now?',
      ],
      culturalContext: 'default',
      communicationStyle: 'balanced',
      tonePreference: 'neutral',
      supportPreferences: ['empathetic_listening', 'gentle_guidance'],
      degraded: false,
    });
  });

  it('switches to a continuity-aware response on the third message in a row', () => {
    const directive = buildResponseDirective(sad, previous('sadness', 'sadness'), profiles.get('eastern'), guidance);
    expect(directive.responseType).toBe(CONTINUITY_RESPONSE_TYPE);
    expect(directive.continuityCue).toBe("I notice you're still feeling down.");
    expect(directive.tonePreference).toBe('formal');
    expect(directive.culturalContext).toBe('eastern');
  });

  it('marks degraded records and uses the neutral guidance', () => {
    const directive = buildResponseDirective(createDegradedRecord(''), [], profiles.get('default'), guidance);
    expect(directive.degraded).toBe(true);
    expect(directive.emotion).toBe('neutral');
    expect(directive.responseType).toBe('engaging');
    expect(directive.followUpSuggestions[0]).toBe("What's been on your mind lately?");
  });
});

describe('guidance lookups', () => {
  it('falls back to neutral follow-ups and the default response type', () => {
    expect(followUpsFor('grief', guidance)).toEqual(guidance.followUps.neutral);
    expect(responseTypeFor('grief', guidance)).toBe('compassionate');
    expect(responseTypeFor('grief', { ...guidance, responseTypes: {} })).toBe('supportive');
  });

  it('returns a copy of the follow-up list', () => {
    const list = followUpsFor('joy', guidance);
    list.push('extra');
    expect(followUpsFor('joy', guidance)).toHaveLength(3);
  });
});
