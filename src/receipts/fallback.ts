// src/receipts/fallback.ts

/** First candidate with visible content, in the given precedence; null when none has any. */
export function firstPresent(...candidates: ReadonlyArray<string | null | undefined>): string | null {
  for (const c of candidates) {
    if (typeof c === "string" && c.trim().length > 0) return c;
  }
  return null;
}
