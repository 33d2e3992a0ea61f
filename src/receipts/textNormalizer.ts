// src/receipts/textNormalizer.ts
// Line-preserving cleanup of recognizer output. Never merges or splits lines.

import { LINE_SEPARATOR } from "./types";

type LineRewrite = {
  id: string;
  re: RegExp;
  replacement: string;
};

// Applied in order to each line. Horizontal whitespace only: `\s` would reach across lines.
export const LINE_REWRITES: readonly LineRewrite[] = [
  // 17:09;21 -> 17:09:21
  { id: "time-semicolon", re: /(\d{1,2}):(\d{2});(\d{2})/g, replacement: "$1:$2:$3" },
  // 38,90 -> 38.90
  { id: "comma-decimal", re: /(\d)[ \t]*,[ \t]*(\d{2})\b/g, replacement: "$1.$2" },
  // 11,.10 -> 11.10
  { id: "comma-dot-decimal", re: /(\d)[ \t]*,\.[ \t]*(\d{2})\b/g, replacement: "$1.$2" },
  // McDonald ' s -> McDonald's
  { id: "possessive", re: /\b([A-Za-z]+)[ \t]*'[ \t]*s\b/g, replacement: "$1's" },
  { id: "space-before-punct", re: /[ \t]+([,.;:])/g, replacement: "$1" },
  { id: "collapse-spaces", re: /[ \t]{2,}/g, replacement: " " },
];

function rewriteOnce(line: string): string {
  let out = line;
  for (const { re, replacement } of LINE_REWRITES) out = out.replace(re, replacement);
  return out.trim();
}

// Later rewrites can expose earlier patterns ("1, .23" -> "1,.23"), so run to a fixpoint.
// Every rewrite either shortens the line or removes a ';', so this terminates.
export function normalizeLine(line: string): string {
  let current = line.trim();
  for (;;) {
    const next = rewriteOnce(current);
    if (next === current) return current;
    current = next;
  }
}

/** Idempotent: normalizeText(normalizeText(s)) === normalizeText(s). */
export function normalizeText(text: unknown): string {
  if (typeof text !== "string" || !text) return "";

  return text
    .split(/\r\n|\r|\n/)
    .map(normalizeLine)
    .filter((l) => l.length > 0)
    .join(LINE_SEPARATOR)
    .trim();
}
