/**
 * Text helpers for similarity and keyword extraction.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { CorpusItem } from '@forgeloop/shared-types';

const STOPWORDS_PATH = fileURLToPath(new URL('../../data/stopwords.json', import.meta.url));

let stopwords: ReadonlySet<string> | undefined;

export function loadStopwords(): ReadonlySet<string> {
  if (!stopwords) {
    const parsed: unknown = JSON.parse(readFileSync(STOPWORDS_PATH, 'utf-8'));
    if (!Array.isArray(parsed) || !parsed.every((word): word is string => typeof word === 'string')) {
      throw new Error(`Stopword list at ${STOPWORDS_PATH} must be an array of strings`);
    }
    stopwords = new Set(parsed);
  }
  return stopwords;
}

/** Lowercased word tokens, apostrophe contractions kept whole. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+(?:'[a-z]+)?/g) ?? [];
}

/** Tokens worth comparing: no stopwords, no bare numbers, at least 2 chars. */
export function contentTokens(text: string): string[] {
  const stop = loadStopwords();
  return tokenize(text).filter(token => token.length >= 2 && !stop.has(token) && !/^\d+$/.test(token));
}

export function itemText(item: CorpusItem): string {
  return item.title ? `${item.title}\n${item.content}` : item.content;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
