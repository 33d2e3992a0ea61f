// src/receipts/textCleaner.ts
// Display/export cleanup: normalization, then dictionary-driven spelling correction.
// Not used for field extraction.

import type { Lexicon, LexiconProvider } from "./lexicon";
import { normalizeText } from "./textNormalizer";

export const DEFAULT_MAX_EDIT_DISTANCE = 2;

const WORD_RE = /[A-Za-z]{3,}/g;
const MIN_CORRECTABLE_LENGTH = 4;

export function isAllUpper(word: string): boolean {
  return word === word.toUpperCase() && word !== word.toLowerCase();
}

export function preserveCase(original: string, corrected: string): string {
  if (!corrected) return original;
  if (isAllUpper(original)) return corrected.toUpperCase();
  if (original[0] === original[0].toUpperCase() && original[0] !== original[0].toLowerCase()) {
    return corrected[0].toUpperCase() + corrected.slice(1).toLowerCase();
  }
  return corrected.toLowerCase();
}

/** Whether a token should be left alone regardless of the dictionary. */
export function isProtectedToken(word: string): boolean {
  if (/\d/.test(word)) return true;
  // CROSS, SDN, BHD: acronyms and registration codes
  if (isAllUpper(word)) return true;
  return word.length < MIN_CORRECTABLE_LENGTH;
}

export function correctWithLexicon(text: string, lexicon: Lexicon, maxEditDistance = DEFAULT_MAX_EDIT_DISTANCE): string {
  return text.replace(WORD_RE, (word) => {
    if (isProtectedToken(word)) return word;
    const match = lexicon.lookup(word, maxEditDistance);
    return match ? preserveCase(word, match.term) : word;
  });
}

export type CleanOptions = {
  lexicon: LexiconProvider;
  maxEditDistance?: number;
};

/** Normalize, then lexicon-correct when a dictionary is available. Never throws on text input. */
export async function cleanOcrText(text: unknown, opts: CleanOptions): Promise<string> {
  const normalized = normalizeText(text);
  if (!normalized) return normalized;

  const lexicon = await opts.lexicon.get();
  if (!lexicon) return normalized;

  return correctWithLexicon(normalized, lexicon, opts.maxEditDistance ?? DEFAULT_MAX_EDIT_DISTANCE);
}
