/**
 * Query keywords and the lexical boost.
 *
 * A chunk's cosine score is multiplied by (1 + 0.5 × fraction of query
 * keywords present among the chunk's own tokens).
 */

import stopWords from './stop-words.json' with { type: 'json' };

export const LEXICAL_BOOST_WEIGHT = 0.5;

const STOP_WORDS: ReadonlySet<string> = new Set([...stopWords.en, ...stopWords.ru]);

const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u;

function tokenize(text: string): string[] {
  return text.toLowerCase().split(TOKEN_SEPARATOR).filter(Boolean);
}

/**
 * Lowercased, de-duplicated query terms longer than two characters,
 * minus English and Russian stop-words.
 */
export function extractKeywords(query: string): string[] {
  const keywords = tokenize(query).filter((token) => token.length > 2 && !STOP_WORDS.has(token));
  return [...new Set(keywords)];
}

export function keywordMatchFraction(keywords: readonly string[], text: string): number {
  if (keywords.length === 0) {
    return 0;
  }
  const tokens = new Set(tokenize(text));
  const matched = keywords.filter((keyword) => tokens.has(keyword)).length;
  return matched / keywords.length;
}

export function applyLexicalBoost(score: number, matchFraction: number): number {
  return score * (1 + LEXICAL_BOOST_WEIGHT * matchFraction);
}
