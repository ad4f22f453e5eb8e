import { describe, it, expect } from 'vitest';
import { cleanText, isBlank } from '../../api/_lib/utils/textCleaning';

describe('cleanText', () => {
  it('strips urls, e-mail addresses and punctuation', () => {
    expect(cleanText('Check https://x.io NOW!!! mail me@x.com :)')).toBe('check now mail');
  });

  it('keeps non-latin letters', () => {
    expect(cleanText('Ça va?  Très bien')).toBe('ça va très bien');
  });

  it('applies NFKC before matching', () => {
    expect(cleanText('ﬁne')).toBe('fine');
  });

  it('returns an empty string for empty input', () => {
    expect(cleanText('')).toBe('');
    expect(cleanText('!!! ???')).toBe('');
  });
});

describe('isBlank', () => {
  it('treats whitespace and non-strings as blank', () => {
    expect(isBlank('   \n')).toBe(true);
    expect(isBlank(undefined)).toBe(true);
    expect(isBlank(12)).toBe(true);
    expect(isBlank(' hi ')).toBe(false);
  });
});
