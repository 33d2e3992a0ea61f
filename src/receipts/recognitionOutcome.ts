// src/receipts/recognitionOutcome.ts
// One preprocessing pass: transform -> recognize -> score.
// Collaborator errors are not caught here; the selector / caller owns fallback policy.

import type { PreprocessMode } from "./preprocessModes";
import { LINE_SEPARATOR } from "./types";
import type { RecognitionOutcome, RecognitionPipeline, RecognizedToken } from "./types";
import { blendedScore, meanConfidence, textQualityScore } from "./textQuality";

export function assembleText(tokens: readonly RecognizedToken[]): string {
  return tokens
    .map((t) => t.text)
    .filter((text) => typeof text === "string" && text.length > 0)
    .join(LINE_SEPARATOR)
    .trim();
}

export function scoreTokens(tokens: readonly RecognizedToken[]) {
  const assembledText = assembleText(tokens);
  const conf = meanConfidence(tokens.map((t) => t.confidence));
  const quality = textQualityScore(assembledText);
  return {
    assembledText,
    meanConfidence: conf,
    qualityScore: quality,
    blendedScore: blendedScore(conf, quality),
  };
}

export async function buildRecognitionOutcome(
  image: Buffer,
  mode: PreprocessMode,
  pipeline: RecognitionPipeline
): Promise<RecognitionOutcome> {
  const processedImage = await pipeline.transform(image, mode);
  const tokens = Object.freeze([...(await pipeline.recognizer.recognize(processedImage))]);
  const scored = scoreTokens(tokens);

  return Object.freeze({
    mode,
    processedImage,
    tokens,
    ...scored,
  });
}
