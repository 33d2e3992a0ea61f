// src/receipts/types.ts
// Shared receipt-scan records. Everything here is plain data: built once, never mutated.

import type { PreprocessMode } from "./preprocessModes";

export type PolygonPoint = {
  x: number;
  y: number;
};

/** One line-level fragment as returned by the recognizer. */
export type RecognizedToken = {
  readonly text: string;
  readonly confidence: number; // 0..1
  readonly region: readonly PolygonPoint[];
};

export type RecognitionOutcome = {
  readonly mode: PreprocessMode;
  readonly processedImage: Buffer;
  readonly tokens: readonly RecognizedToken[];
  readonly assembledText: string;
  readonly meanConfidence: number;
  readonly qualityScore: number;
  readonly blendedScore: number;
};

export type ExtractionResult = {
  merchant: string | null;
  date: string | null;
  totals: string[];
};

export type DictionaryEntry = {
  term: string;
  frequency: number;
};

/** Collaborator: pixel-level preprocessing. Pure for a given (image, mode). */
export type ImageTransformer = (image: Buffer, mode: PreprocessMode) => Promise<Buffer>;

/** Collaborator: turns an image into ordered line-level tokens. May be slow, may throw. */
export interface TextRecognizer {
  recognize(image: Buffer): Promise<RecognizedToken[]>;
}

export type RecognitionPipeline = {
  transform: ImageTransformer;
  recognizer: TextRecognizer;
};

export const LINE_SEPARATOR = "\n";
