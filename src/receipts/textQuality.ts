// src/receipts/textQuality.ts
// Ground-truth-free text sanity signals used to rank preprocessing modes.

const QUALITY_LENGTH_CAP = 80;
const CONFIDENCE_WEIGHT = 0.6;
const QUALITY_WEIGHT = 0.4;

/**
 * Uppercase, collapse all whitespace, keep only `[A-Z0-9 ]`.
 * Also the comparison form for {@link charAccuracy}.
 */
export function normalizeForScoring(text: string): string {
  return String(text ?? "")
    .toUpperCase()
    .trim()
    .replace(/\s+/g, " ")
    .replace(/[^A-Z0-9 ]/g, "");
}

/**
 * Alphanumeric density plus a capped length bonus, so long garbage cannot dominate.
 * Ranges over [0, 2].
 */
export function textQualityScore(text: string): number {
  const t = normalizeForScoring(text);
  if (!t) return 0;

  const alnum = (t.match(/[A-Z0-9]/g) ?? []).length;
  return alnum / t.length + Math.min(t.length, QUALITY_LENGTH_CAP) / QUALITY_LENGTH_CAP;
}

export function blendedScore(meanConfidence: number, qualityScore: number): number {
  return CONFIDENCE_WEIGHT * meanConfidence + QUALITY_WEIGHT * qualityScore;
}

export function meanConfidence(confidences: readonly number[]): number {
  if (!confidences.length) return 0;
  const sum = confidences.reduce((total, c) => total + (Number.isFinite(c) ? c : 0), 0);
  return Math.max(0, sum / confidences.length);
}

// Position-wise agreement, penalised by the length difference.
export function charAccuracy(predicted: string, truth: string): number {
  const pred = normalizeForScoring(predicted);
  const gt = normalizeForScoring(truth);

  if (gt.length === 0) return pred.length === 0 ? 1 : 0;

  const overlap = Math.min(pred.length, gt.length);
  let correct = 0;
  for (let i = 0; i < overlap; i++) {
    if (pred[i] === gt[i]) correct++;
  }
  correct -= Math.abs(pred.length - gt.length);

  return Math.max(correct, 0) / gt.length;
}
