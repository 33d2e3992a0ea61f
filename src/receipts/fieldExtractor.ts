// src/receipts/fieldExtractor.ts
// Receipt field heuristics (date / total candidates / merchant).
// Always fed the RAW recognizer text: lexicon correction can damage digits and punctuation.
// Every function here is total: bad input gives null / [] and never throws.

import type { ExtractionResult } from "./types";

export type RankedHint = {
  hint: string;
  priority: number; // lower = checked first
};

// Dates like 09/02/2018 or 2018-02-09. Day-first shape is tried first.
export const DATE_PATTERNS: readonly RegExp[] = [
  /\b(\d{2}[/-]\d{2}[/-]\d{2,4})\b/,
  /\b(\d{4}[/-]\d{2}[/-]\d{2})\b/,
];

// 56.80 / 56,80; bare integers are ignored so quantities don't leak in.
const MONEY_RE = /\b(\d{1,6}[.,]\d{2})\b/g;

// 09.21 / 9:21 is a clock stamp, not a price.
const TIME_SHAPE_RE = /^([01]?\d|2[0-3])[:.][0-5]\d$/;

/** Lines that usually carry the payable amount, most specific first. */
export const TOTAL_LINE_HINTS: readonly RankedHint[] = [
  { hint: "ROUNDED TOTAL", priority: 0 },
  { hint: "TOTAL AMT PAYABLE", priority: 1 },
  { hint: "AMT PAYABLE", priority: 2 },
  { hint: "AMOUNT PAYABLE", priority: 3 },
  { hint: "TOTAL PAYABLE", priority: 4 },
  { hint: "TOTAL:", priority: 5 },
  { hint: "TOTAL", priority: 6 },
  { hint: "SUB TOTAL", priority: 7 },
  { hint: "SUBTOTAL", priority: 8 },
  { hint: "CASH", priority: 9 },
  { hint: "CHANGE", priority: 10 },
];

export const MERCHANT_BLACKLIST: readonly string[] = [
  "TOTAL",
  "SUBTOTAL",
  "SUB TOTAL",
  "INVOICE",
  "TAX",
  "GST",
  "THANK",
  "CHANGE",
  "CASH",
  "AMOUNT",
  "PAYABLE",
  "DATE",
  "TEL",
  "FAX",
  "EMAIL",
];

const MERCHANT_SCAN_LINES = 12;
const MERCHANT_MAX_LENGTH = 60;
const MERCHANT_MIN_LETTERS = 3;

function safeText(text: unknown): string {
  return typeof text === "string" ? text : "";
}

function splitLines(text: string): string[] {
  return text
    .split(/\r\n|\r|\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

function countLetters(s: string): number {
  return (s.match(/\p{L}/gu) ?? []).length;
}

export function dedupPreserveOrder<T>(items: readonly T[]): T[] {
  return [...new Set(items)];
}

export function isTimeShaped(value: string): boolean {
  return TIME_SHAPE_RE.test(value);
}

function commaToDot(s: string): string {
  return s.replace(/,/g, ".");
}

function moneyTokens(text: string): string[] {
  const out: string[] = [];
  for (const m of commaToDot(text).matchAll(MONEY_RE)) {
    const value = m[1];
    if (isTimeShaped(value)) continue;
    out.push(value);
  }
  return out;
}

function hintsByPriority(hints: readonly RankedHint[]): RankedHint[] {
  return [...hints].sort((a, b) => a.priority - b.priority);
}

export function extractDate(text: unknown): string | null {
  const t = safeText(text).toUpperCase();
  if (!t) return null;

  for (const re of DATE_PATTERNS) {
    const m = t.match(re);
    if (m) return m[1];
  }
  return null;
}

/**
 * Total candidates, best first.
 * 1) money tokens from hint lines, ordered by hint priority, then line, then position;
 * 2) only when (1) is empty: every money token in the text.
 * Time-shaped values are dropped in both phases.
 */
export function extractTotals(text: unknown, hints: readonly RankedHint[] = TOTAL_LINE_HINTS): string[] {
  const raw = safeText(text);
  if (!raw.trim()) return [];

  const lines = splitLines(raw).map((line) => ({ line, upper: line.toUpperCase() }));

  const hinted: string[] = [];
  for (const { hint } of hintsByPriority(hints)) {
    for (const { line, upper } of lines) {
      if (!upper.includes(hint)) continue;
      hinted.push(...moneyTokens(line));
    }
  }

  const candidates = dedupPreserveOrder(hinted);
  if (candidates.length) return candidates;

  return dedupPreserveOrder(moneyTokens(raw));
}

export function guessMerchant(text: unknown): string | null {
  const t = safeText(text);
  const trimmed = t.trim();
  if (!trimmed) return null;

  // Single-line text carries no layout to reason about.
  if (!/[\r\n]/.test(trimmed)) {
    return countLetters(trimmed) > 0 ? trimmed.slice(0, MERCHANT_MAX_LENGTH) : null;
  }

  for (const line of splitLines(t).slice(0, MERCHANT_SCAN_LINES)) {
    const upper = line.toUpperCase();
    if (MERCHANT_BLACKLIST.some((bad) => upper.includes(bad))) continue;
    if (countLetters(line) >= MERCHANT_MIN_LETTERS) return line.slice(0, MERCHANT_MAX_LENGTH);
  }

  return null;
}

export function extractFields(text: unknown): ExtractionResult {
  return {
    merchant: guessMerchant(text),
    date: extractDate(text),
    totals: extractTotals(text),
  };
}
