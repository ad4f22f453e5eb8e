import { describe, it, expect, vi } from 'vitest';
import { ConversationSession } from '../../api/_lib/services/conversationSession';
import type { EmotionRecord } from '../../api/_lib/services/emotionRecord';
import type { ResponseDirective } from '../../api/_lib/services/responseDirective';

// The message text names the emotion the stand-in classifier reports
const echoClassifier = (text: string) => ({ [text]: 1 });

const FALLBACK = "I apologize, but I'm having trouble processing your message right now. Could you please try again?";

describe('ConversationSession', () => {
  it('assigns ids and resolves the default context', () => {
    expect(new ConversationSession().id).toMatch(/^session_/);
    const session = new ConversationSession({ id: 'abc', culturalContext: 'martian', classifier: echoClassifier });
    expect(session.id).toBe('abc');
    expect(session.culturalContext).toBe('default');
  });

  it('appends one record per processed message', async () => {
    const session = new ConversationSession({ classifier: echoClassifier });
    const record = await session.process('joy');
    expect(record.primaryEmotion).toBe('joy');
    expect(session.messageCount).toBe(1);
    expect(session.getHistory()).toEqual([record]);
  });

  it('keeps records in call order even when the classifier finishes out of order', async () => {
    const delays: Record<string, number> = { joy: 30, anger: 10, fear: 0 };
    const session = new ConversationSession({
      classifier: text =>
        new Promise<Record<string, number>>(resolve => setTimeout(() => resolve({ [text]: 1 }), delays[text] ?? 0)),
    });
    await Promise.all([session.process('joy'), session.process('anger'), session.process('fear')]);
    expect(session.getHistory().map(r => r.primaryEmotion)).toEqual(['joy', 'anger', 'fear']);
  });

  it('appends a degraded record when the classifier fails', async () => {
    const session = new ConversationSession({
      classifier: () => {
        throw new Error('model unavailable');
      },
    });
    const record = await session.process('anything');
    expect(record.degraded).toBe(true);
    expect(session.messageCount).toBe(1);
    expect(session.getTrend().dominantEmotion).toBe('neutral');
  });

  it('returns a frozen copy of the history', async () => {
    const session = new ConversationSession({ classifier: echoClassifier });
    await session.process('fear');
    const history = session.getHistory();
    expect(Object.isFrozen(history)).toBe(true);
    await session.process('joy');
    expect(history).toHaveLength(1);
  });

  it('uses the session context unless a message names one', async () => {
    const session = new ConversationSession({ classifier: echoClassifier });
    expect(session.setCulturalContext('martian')).toBe(false);
    expect(session.culturalContext).toBe('default');
    expect(session.setCulturalContext(' Eastern ')).toBe(true);
    expect(session.culturalContext).toBe('eastern');

    expect((await session.process('joy')).culturalContext).toBe('eastern');
    expect((await session.process('joy', 'western')).culturalContext).toBe('western');
  });

  describe('respond', () => {
    it('hands the record, recent history and directive to the synthesizer', async () => {
      const synthesizer = vi.fn(
        async (_record: EmotionRecord, _recent: readonly EmotionRecord[], directive: ResponseDirective) =>
          `(${directive.responseType})`
      );
      const session = new ConversationSession({ classifier: echoClassifier, synthesizer });

      const first = await session.respond('sadness');
      const second = await session.respond('sadness');
      const third = await session.respond('sadness');

      expect(first.botResponse).toBe('(supportive)');
      expect(second.responseType).toBe('supportive');
      expect(third.responseType).toBe('continuity_aware');
      expect(third.directive.continuityCue).toBe("I notice you're still feeling down.");
      expect(third.messageCount).toBe(3);

      const [record, recent] = synthesizer.mock.calls[2];
      expect(record).toBe(third.record);
      expect(recent.map(r => r.primaryEmotion)).toEqual(['sadness', 'sadness']);
    });

    it('passes at most five previous records', async () => {
      const synthesizer = vi.fn(
        (_record: EmotionRecord, recent: readonly EmotionRecord[], _directive: ResponseDirective) =>
          String(recent.length)
      );
      const session = new ConversationSession({ classifier: echoClassifier, synthesizer });
      for (let i = 0; i < 6; i++) await session.process('joy');
      const response = await session.respond('joy');
      expect(response.botResponse).toBe('5');
    });

    it('returns no bot response without a synthesizer', async () => {
      const session = new ConversationSession({ classifier: echoClassifier });
      const response = await session.respond('joy');
      expect(response.botResponse).toBeNull();
      expect(response.responseType).toBe('celebratory');
      expect(response.error).toBeUndefined();
    });

    it('falls back to the apology when the synthesizer fails and keeps the record', async () => {
      const session = new ConversationSession({
        classifier: echoClassifier,
        synthesizer: () => {
          throw new Error('generator down');
        },
      });
      const response = await session.respond('fear');
      expect(response.botResponse).toBe(FALLBACK);
      expect(response.responseType).toBe('error');
      expect(response.followUpSuggestions).toEqual([
        'Could you rephrase your message?',
        'Is there something specific I can help with?',
      ]);
      expect(response.error).toBe('generator down');
      expect(response.record.primaryEmotion).toBe('fear');
      expect(session.messageCount).toBe(1);
    });

    it('keeps later calls running after a failed one', async () => {
      let calls = 0;
      const session = new ConversationSession({
        classifier: echoClassifier,
        synthesizer: () => {
          calls++;
          if (calls === 1) throw new Error('first call fails');
          return 'ok';
        },
      });
      const [a, b] = await Promise.all([session.respond('joy'), session.respond('joy')]);
      expect(a.responseType).toBe('error');
      expect(b.botResponse).toBe('ok');
      await session.idle();
      expect(session.messageCount).toBe(2);
    });
  });

  describe('views', () => {
    it('reports empty views before any message', () => {
      const session = new ConversationSession({ classifier: echoClassifier });
      expect(session.getEmotionTrends()).toEqual({
        status: 'No conversation data available',
        trends: null,
        recentPattern: [],
        recommendations: [],
        sessionSummary: { durationMessages: 0, primaryThemes: [], emotionalRange: [] },
      });

      const summary = session.getConversationSummary();
      expect(summary.status).toBe('No conversation to summarize');
      expect(summary.emotionalAnalysis.dominantEmotion).toBe('neutral');
      expect(summary.emotionalAnalysis.emotionalRange).toBe(0);
      expect(summary.conversationPatterns.conversationQuality.quality).toBe('unknown');
      expect(summary.recommendations).toEqual(['Start a conversation to get personalized recommendations']);
    });

    it('summarizes a conversation', async () => {
      const session = new ConversationSession({ classifier: echoClassifier });
      await session.respond('sadness');
      await session.respond('sadness');
      await session.process('joy');

      const trends = session.getEmotionTrends();
      expect(trends.status).toBe('Analysis complete');
      expect(trends.recentPattern).toEqual(['sadness', 'sadness', 'joy']);
      expect(trends.recommendations).toEqual([
        'Consider focusing on positive coping strategies',
        'Professional support might be beneficial if these feelings persist',
      ]);
      expect(trends.sessionSummary).toEqual({
        durationMessages: 3,
        primaryThemes: [],
        emotionalRange: ['sadness', 'joy'],
      });

      const summary = session.getConversationSummary();
      expect(summary.status).toBe('Summary complete');
      expect(summary.session.totalMessages).toBe(3);
      expect(summary.emotionalAnalysis.emotionDistribution).toEqual({ sadness: 2, joy: 1 });
      expect(summary.emotionalAnalysis.emotionalRange).toBe(2);
      expect(summary.conversationPatterns.responseTypesUsed).toEqual({ supportive: 2 });
      expect(summary.recommendations).toEqual([
        'Consider seeking additional emotional support',
        'Practice mindfulness or stress-reduction techniques',
      ]);
    });

    it('profiles themes from the message text', async () => {
      const session = new ConversationSession({ classifier: () => ({ joy: 1 }) });
      await session.process('Great day at work');
      await session.process('Lunch with a friend');
      expect(session.getProfile().themes).toEqual(['work', 'relationships', 'daily_life']);
    });

    it('has no dominant recommendations for emotions outside every group', () => {
      const session = new ConversationSession({ classifier: echoClassifier });
      expect(session.dominantRecommendations('fear')).toEqual([]);
      expect(session.dominantRecommendations('love')).toEqual([
        "Great to see positive emotions! Keep building on what's working",
      ]);
    });
  });
});
