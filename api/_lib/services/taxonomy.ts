// api/_lib/services/taxonomy.ts
// Static emotion taxonomy: 27 named emotions plus neutral, each in exactly one valence class.

export const EMOTION_LABELS = [
  'admiration', 'amusement', 'anger', 'annoyance', 'approval', 'caring', 'confusion', 'curiosity',
  'desire', 'disappointment', 'disapproval', 'disgust', 'embarrassment', 'excitement', 'fear',
  'gratitude', 'grief', 'joy', 'love', 'nervousness', 'optimism', 'pride', 'realization',
  'relief', 'remorse', 'sadness', 'surprise', 'neutral',
] as const;

export type EmotionLabel = typeof EMOTION_LABELS[number];

export type ValenceClass = 'positive' | 'negative' | 'neutral_or_ambiguous';

export const VALENCE_BY_LABEL: Readonly<Record<EmotionLabel, ValenceClass>> = Object.freeze({
  admiration: 'positive',
  amusement: 'positive',
  approval: 'positive',
  caring: 'positive',
  curiosity: 'positive',
  desire: 'positive',
  excitement: 'positive',
  gratitude: 'positive',
  joy: 'positive',
  love: 'positive',
  optimism: 'positive',
  pride: 'positive',
  realization: 'positive',
  relief: 'positive',

  anger: 'negative',
  annoyance: 'negative',
  disappointment: 'negative',
  disapproval: 'negative',
  disgust: 'negative',
  embarrassment: 'negative',
  fear: 'negative',
  grief: 'negative',
  nervousness: 'negative',
  remorse: 'negative',
  sadness: 'negative',

  surprise: 'neutral_or_ambiguous',
  neutral: 'neutral_or_ambiguous',
  confusion: 'neutral_or_ambiguous',
});

const LABEL_SET: ReadonlySet<string> = new Set<string>(EMOTION_LABELS);

export function isEmotionLabel(value: unknown): value is EmotionLabel {
  return typeof value === 'string' && LABEL_SET.has(value);
}

/** Unknown labels fall into the neutral/ambiguous class. */
export function valenceOf(label: string): ValenceClass {
  return isEmotionLabel(label) ? VALENCE_BY_LABEL[label] : 'neutral_or_ambiguous';
}

export function labelsInClass(valence: ValenceClass): EmotionLabel[] {
  return EMOTION_LABELS.filter(label => VALENCE_BY_LABEL[label] === valence);
}

export const isNeutralClass = (label: EmotionLabel) => VALENCE_BY_LABEL[label] === 'neutral_or_ambiguous';
