// src/receipts/lexicon.ts
// Frequency-ranked word list + bounded fuzzy lookup, and the provider that loads it once.

import fs from "fs/promises";
import type { DictionaryEntry } from "./types";

const ENTRY_RE = /^([a-z]+) ([1-9]\d*)$/;

/**
 * Parses `term frequency` lines. Blank or malformed lines are skipped;
 * returns null when nothing usable is left.
 */
export function parseLexiconDictionary(content: string): Lexicon | null {
  const entries: DictionaryEntry[] = [];
  const seen = new Set<string>();

  for (const rawLine of String(content ?? "").split(/\r?\n/)) {
    const m = rawLine.trim().match(ENTRY_RE);
    if (!m) continue;
    const term = m[1];
    const frequency = Number(m[2]);
    if (!Number.isSafeInteger(frequency) || seen.has(term)) continue;
    seen.add(term);
    entries.push({ term, frequency });
  }

  return entries.length ? new Lexicon(entries) : null;
}

/**
 * Optimal-string-alignment distance (adjacent transpositions count as one edit).
 * Returns `maxDistance + 1` as soon as the bound is certainly exceeded.
 */
export function boundedEditDistance(a: string, b: string, maxDistance: number): number {
  const over = maxDistance + 1;
  if (Math.abs(a.length - b.length) > maxDistance) return over;
  if (a === b) return 0;

  let prevPrev: number[] = [];
  let prev: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const row: number[] = [i];
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      let d = Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost);
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        d = Math.min(d, prevPrev[j - 2] + 1);
      }
      row.push(d);
      if (d < rowMin) rowMin = d;
    }
    if (rowMin > maxDistance) return over;
    prevPrev = prev;
    prev = row;
  }

  const result = prev[b.length];
  return result > maxDistance ? over : result;
}

export type LexiconMatch = {
  term: string;
  distance: number;
  frequency: number;
};

type RankedEntry = DictionaryEntry & { rank: number };

export class Lexicon {
  private readonly entries: readonly RankedEntry[];
  private readonly byLength = new Map<number, RankedEntry[]>();

  constructor(entries: readonly DictionaryEntry[]) {
    this.entries = entries.map((e, rank) => Object.freeze({ term: e.term, frequency: e.frequency, rank }));
    for (const entry of this.entries) {
      const bucket = this.byLength.get(entry.term.length);
      if (bucket) bucket.push(entry);
      else this.byLength.set(entry.term.length, [entry]);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  has(term: string): boolean {
    return this.byLength.get(term.length)?.some((e) => e.term === term) ?? false;
  }

  /**
   * Single best term within `maxDistance`: smallest distance, then highest
   * frequency, then dictionary order.
   */
  lookup(word: string, maxDistance = 2): LexiconMatch | null {
    const query = word.toLowerCase();
    let best: (LexiconMatch & { rank: number }) | null = null;

    for (let len = query.length - maxDistance; len <= query.length + maxDistance; len++) {
      const bucket = this.byLength.get(len);
      if (!bucket) continue;

      for (const entry of bucket) {
        const limit = best ? Math.min(maxDistance, best.distance) : maxDistance;
        const distance = boundedEditDistance(query, entry.term, limit);
        if (distance > limit) continue;
        if (!best || isBetter(distance, entry, best)) {
          best = { term: entry.term, distance, frequency: entry.frequency, rank: entry.rank };
        }
      }
    }

    return best ? { term: best.term, distance: best.distance, frequency: best.frequency } : null;
  }
}

function isBetter(distance: number, entry: RankedEntry, best: LexiconMatch & { rank: number }): boolean {
  if (distance !== best.distance) return distance < best.distance;
  if (entry.frequency !== best.frequency) return entry.frequency > best.frequency;
  return entry.rank < best.rank;
}

export type LexiconLoader = () => Promise<Lexicon | null>;

export function fileLexiconLoader(path: string): LexiconLoader {
  return async () => parseLexiconDictionary(await fs.readFile(path, "utf8"));
}

/**
 * Loads the lexicon at most once per provider. Concurrent first callers share the
 * same in-flight load; afterwards the lexicon is read-only and freely shared.
 * A missing or unusable dictionary resolves to null (correction becomes a no-op).
 */
export class LexiconProvider {
  private readonly loader: LexiconLoader;
  private pending: Promise<Lexicon | null> | null = null;

  constructor(loader: LexiconLoader) {
    this.loader = loader;
  }

  static fromFile(path: string): LexiconProvider {
    return new LexiconProvider(fileLexiconLoader(path));
  }

  get(): Promise<Lexicon | null> {
    if (!this.pending) {
      this.pending = this.load();
    }
    return this.pending;
  }

  private async load(): Promise<Lexicon | null> {
    try {
      const lexicon = await this.loader();
      if (!lexicon) console.warn("[lexicon] dictionary empty or malformed; lexicon correction disabled");
      else console.log(`[lexicon] loaded ${lexicon.size} terms`);
      return lexicon;
    } catch (e) {
      console.warn("[lexicon] dictionary unavailable; lexicon correction disabled:", e instanceof Error ? e.message : e);
      return null;
    }
  }
}
