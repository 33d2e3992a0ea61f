// src/receipts/lexiconBuilder.ts
// Offline: mine a `term frequency` dictionary from labeled annotation files.

import type { DictionaryEntry } from "./types";

const LEXICON_WORD_RE = /[A-Za-z]{3,}/g;
const BOX_COORDINATE_FIELDS = 8;

export type LexiconBuildOptions = {
  minFrequency?: number;
  maxWords?: number;
};

/**
 * Annotation line format: `x1,y1,x2,y2,x3,y3,x4,y4,transcription`.
 * The transcription may itself contain commas.
 */
export function readAnnotationText(content: string): string {
  const texts: string[] = [];
  for (const raw of String(content ?? "").split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    const parts = line.split(",");
    if (parts.length < BOX_COORDINATE_FIELDS + 1) continue;
    const transcription = parts.slice(BOX_COORDINATE_FIELDS).join(",").trim();
    if (transcription) texts.push(transcription);
  }
  return texts.join("\n");
}

export function tokenizeLexiconWords(text: string): string[] {
  return (String(text ?? "").match(LEXICON_WORD_RE) ?? []).map((w) => w.toLowerCase());
}

export function countWords(texts: Iterable<string>, counts = new Map<string, number>()): Map<string, number> {
  for (const text of texts) {
    for (const word of tokenizeLexiconWords(text)) {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  return counts;
}

/** Frequency filter, most frequent first (ties keep first-seen order), capped. */
export function buildLexiconEntries(counts: ReadonlyMap<string, number>, opts: LexiconBuildOptions = {}): DictionaryEntry[] {
  const minFrequency = opts.minFrequency ?? 2;
  const maxWords = opts.maxWords ?? 50000;

  return [...counts.entries()]
    .filter(([, frequency]) => frequency >= minFrequency)
    .map(([term, frequency]) => ({ term, frequency }))
    .sort((a, b) => b.frequency - a.frequency)
    .slice(0, Math.max(0, maxWords));
}

export function formatLexicon(entries: readonly DictionaryEntry[]): string {
  return entries.map((e) => `${e.term} ${e.frequency}\n`).join("");
}
