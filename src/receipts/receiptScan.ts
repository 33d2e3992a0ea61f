// src/receipts/receiptScan.ts
// One receipt image end to end: recognize (fixed mode or auto), extract fields, clean text.
//
// Fields come from the RAW text (line structure + exact decimals);
// the cleaned text is only for display/export.

import { DEFAULT_AUTO_MARGIN, selectBestOutcome } from "./autoMode";
import type { ModeScore } from "./autoMode";
import { firstPresent } from "./fallback";
import { extractFields } from "./fieldExtractor";
import type { LexiconProvider } from "./lexicon";
import type { PreprocessMode, ScanMode } from "./preprocessModes";
import { buildRecognitionOutcome } from "./recognitionOutcome";
import { cleanOcrText } from "./textCleaner";
import type { ExtractionResult, RecognitionOutcome, RecognitionPipeline } from "./types";

export type ReceiptScanDeps = {
  pipeline: RecognitionPipeline;
  lexicon: LexiconProvider;
};

export type ReceiptScanOptions = {
  mode?: ScanMode;
  margin?: number;
  parallel?: boolean;
  candidates?: readonly PreprocessMode[];
  maxEditDistance?: number;
};

export type ReceiptScanResult = {
  requestedMode: ScanMode;
  chosenMode: PreprocessMode;
  autoMargin: number | null;
  meanConfidence: number;
  blendedScore: number;
  scores: ModeScore[];
  rawText: string;
  cleanedText: string;
  displayText: string;
  fields: ExtractionResult;
  outcome: RecognitionOutcome;
};

export async function scanReceipt(
  image: Buffer,
  deps: ReceiptScanDeps,
  opts: ReceiptScanOptions = {}
): Promise<ReceiptScanResult> {
  const requestedMode = opts.mode ?? "auto";
  let outcome: RecognitionOutcome;
  let scores: ModeScore[];
  let autoMargin: number | null = null;

  if (requestedMode === "auto") {
    autoMargin = opts.margin ?? DEFAULT_AUTO_MARGIN;
    const picked = await selectBestOutcome(image, deps.pipeline, {
      margin: autoMargin,
      parallel: opts.parallel,
      candidates: opts.candidates,
    });
    outcome = picked.outcome;
    scores = picked.scores;
  } else {
    outcome = await buildRecognitionOutcome(image, requestedMode, deps.pipeline);
    scores = [{ mode: outcome.mode, ok: true, blendedScore: outcome.blendedScore, meanConfidence: outcome.meanConfidence }];
  }

  const rawText = outcome.assembledText;
  const fields = extractFields(rawText);
  const cleanedText = await cleanOcrText(rawText, { lexicon: deps.lexicon, maxEditDistance: opts.maxEditDistance });

  console.log("[receiptScan] done", {
    requestedMode,
    chosenMode: outcome.mode,
    tokens: outcome.tokens.length,
    hasMerchant: fields.merchant !== null,
    hasDate: fields.date !== null,
    totals: fields.totals.length,
  });

  return {
    requestedMode,
    chosenMode: outcome.mode,
    autoMargin,
    meanConfidence: outcome.meanConfidence,
    blendedScore: outcome.blendedScore,
    scores,
    rawText,
    cleanedText,
    displayText: firstPresent(cleanedText, rawText) ?? "",
    fields,
    outcome,
  };
}
