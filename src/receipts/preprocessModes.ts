// src/receipts/preprocessModes.ts

export const PREPROCESS_MODES = ["none", "denoise", "contrast_boost", "otsu", "adaptive"] as const;

export type PreprocessMode = (typeof PREPROCESS_MODES)[number];

export type ScanMode = PreprocessMode | "auto";

// otsu/adaptive are left out: on receipts they tend to wipe faint thermal print.
export const AUTO_CANDIDATE_MODES: readonly PreprocessMode[] = ["none", "contrast_boost", "denoise"];

export const BASELINE_MODE: PreprocessMode = "none";

export class UnknownPreprocessModeError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Unknown preprocess mode "${value}". Allowed: ${PREPROCESS_MODES.join(", ")} (alias: clahe)`);
    this.name = "UnknownPreprocessModeError";
    this.value = value;
  }
}

function isPreprocessMode(value: string): value is PreprocessMode {
  return PREPROCESS_MODES.some((m) => m === value);
}

export function parsePreprocessMode(value: string): PreprocessMode {
  const s = String(value ?? "").trim().toLowerCase();
  if (s === "clahe" || s === "contrast-boost") return "contrast_boost";
  if (isPreprocessMode(s)) return s;
  throw new UnknownPreprocessModeError(String(value));
}

export function parseScanMode(value: string): ScanMode {
  const s = String(value ?? "").trim().toLowerCase();
  if (s === "auto") return "auto";
  return parsePreprocessMode(s);
}
