// api/_lib/utils/textCleaning.ts
// Lexical cleanup used only for modifier and keyword matching.
// Punctuation and casing signals are always read from the raw text.

const URL_RE = /https?:\/\/\S+/gi;
const EMAIL_RE = /\S+@\S+/g;
const NON_LETTER_RE = /[^\p{L}\s]+/gu;
const WHITESPACE_RE = /\s+/g;

/**
 * NFKC-normalize and lower-case, strip URLs and e-mail addresses, drop
 * everything but letters and whitespace, then collapse whitespace.
 */
export function cleanText(text: string): string {
  if (typeof text !== 'string' || !text) return '';
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(URL_RE, ' ')
    .replace(EMAIL_RE, ' ')
    .replace(NON_LETTER_RE, '')
    .replace(WHITESPACE_RE, ' ')
    .trim();
}

export const isBlank = (text: unknown): boolean =>
  typeof text !== 'string' || text.trim().length === 0;
