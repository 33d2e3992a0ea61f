// src/receipts/autoMode.ts
// Adaptive preprocessing-mode selection.
//
// Baseline ("none") is always evaluated first and must succeed. Every other
// candidate only wins when it beats the current best by MORE than `margin`, so
// ties and noise-level differences keep the earlier result. With `parallel`
// the candidates run concurrently but are reduced in the same fixed order.

import { AUTO_CANDIDATE_MODES, BASELINE_MODE } from "./preprocessModes";
import type { PreprocessMode } from "./preprocessModes";
import { buildRecognitionOutcome } from "./recognitionOutcome";
import type { RecognitionOutcome, RecognitionPipeline } from "./types";

export const DEFAULT_AUTO_MARGIN = 0.01;

export type AutoSelectOptions = {
  margin?: number;
  candidates?: readonly PreprocessMode[];
  parallel?: boolean;
};

export type ModeScore =
  | { mode: PreprocessMode; ok: true; blendedScore: number; meanConfidence: number }
  | { mode: PreprocessMode; ok: false; error: string };

export type AutoSelection = {
  outcome: RecognitionOutcome;
  scores: ModeScore[];
};

type Evaluated =
  | { mode: PreprocessMode; outcome: RecognitionOutcome }
  | { mode: PreprocessMode; error: unknown };

function resolveMargin(margin: number | undefined): number {
  const m = margin ?? DEFAULT_AUTO_MARGIN;
  if (!Number.isFinite(m) || m < 0) {
    throw new RangeError(`[autoMode] margin must be a finite number >= 0, got ${m}`);
  }
  return m;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function candidateOrder(candidates: readonly PreprocessMode[]): PreprocessMode[] {
  const seen = new Set<PreprocessMode>([BASELINE_MODE]);
  const out: PreprocessMode[] = [];
  for (const mode of candidates) {
    if (seen.has(mode)) continue;
    seen.add(mode);
    out.push(mode);
  }
  return out;
}

async function evaluate(image: Buffer, mode: PreprocessMode, pipeline: RecognitionPipeline): Promise<Evaluated> {
  try {
    return { mode, outcome: await buildRecognitionOutcome(image, mode, pipeline) };
  } catch (error) {
    return { mode, error };
  }
}

/** Strictly-greater-than-margin rule; `current` wins every tie. */
export function beatsByMargin(candidate: RecognitionOutcome, current: RecognitionOutcome, margin: number): boolean {
  return candidate.blendedScore > current.blendedScore + margin;
}

export async function selectBestOutcome(
  image: Buffer,
  pipeline: RecognitionPipeline,
  opts: AutoSelectOptions = {}
): Promise<AutoSelection> {
  const margin = resolveMargin(opts.margin);
  const order = candidateOrder(opts.candidates ?? AUTO_CANDIDATE_MODES);

  // Baseline failures propagate: there is nothing to fall back to.
  const baseline = await buildRecognitionOutcome(image, BASELINE_MODE, pipeline);

  let evaluated: Evaluated[];
  if (opts.parallel) {
    evaluated = await Promise.all(order.map((mode) => evaluate(image, mode, pipeline)));
  } else {
    evaluated = [];
    for (const mode of order) evaluated.push(await evaluate(image, mode, pipeline));
  }

  let best = baseline;
  const scores: ModeScore[] = [
    { mode: baseline.mode, ok: true, blendedScore: baseline.blendedScore, meanConfidence: baseline.meanConfidence },
  ];

  for (const ev of evaluated) {
    if ("error" in ev) {
      console.warn(`[autoMode] candidate "${ev.mode}" failed; keeping "${best.mode}":`, errorMessage(ev.error));
      scores.push({ mode: ev.mode, ok: false, error: errorMessage(ev.error) });
      continue;
    }

    const { outcome } = ev;
    scores.push({ mode: outcome.mode, ok: true, blendedScore: outcome.blendedScore, meanConfidence: outcome.meanConfidence });
    if (beatsByMargin(outcome, best, margin)) best = outcome;
  }

  console.log("[autoMode] pick", best.mode, { margin, scores: scores.map((s) => (s.ok ? `${s.mode}=${s.blendedScore.toFixed(3)}` : `${s.mode}=error`)) });

  return { outcome: best, scores };
}

export type ModeComparisonRow = {
  mode: PreprocessMode;
  meanConfidence: number;
  blendedScore: number;
  preview: string;
};

const PREVIEW_LENGTH = 80;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/** Side-by-side table of modes, best score first (stable for equal scores). */
export async function compareModes(
  image: Buffer,
  pipeline: RecognitionPipeline,
  modes: readonly PreprocessMode[] = AUTO_CANDIDATE_MODES
): Promise<ModeComparisonRow[]> {
  const rows: ModeComparisonRow[] = [];
  for (const mode of modes) {
    const o = await buildRecognitionOutcome(image, mode, pipeline);
    rows.push({ mode, meanConfidence: o.meanConfidence, blendedScore: o.blendedScore, preview: preview(o.assembledText) });
  }
  return rows.sort((a, b) => b.blendedScore - a.blendedScore);
}
