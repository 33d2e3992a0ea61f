// src/receipts/visionRecognizer.ts
// Google Vision (SDK + ADC) as the text recognizer.

import vision from "@google-cloud/vision";
import type { protos } from "@google-cloud/vision";
import { buildGeoLineTokens, extractGeoWords } from "./geoLines";
import type { GeoLinesOptions } from "./geoLines";
import type { RecognizedToken, TextRecognizer } from "./types";

type TextAnnotation = protos.google.cloud.vision.v1.ITextAnnotation;

/** Returns the document annotation for an image (null/undefined when nothing was found). */
export type DocumentAnnotator = (image: Buffer) => Promise<TextAnnotation | null | undefined>;

export function googleVisionAnnotator(client = new vision.ImageAnnotatorClient()): DocumentAnnotator {
  return async (image) => {
    const [result] = await client.documentTextDetection({ image: { content: image } });
    if (result.error?.message) {
      throw new Error(`Vision documentTextDetection failed: ${result.error.message}`);
    }
    return result.fullTextAnnotation;
  };
}

export class VisionTextRecognizer implements TextRecognizer {
  private readonly annotate: DocumentAnnotator;
  private readonly geo: GeoLinesOptions;

  constructor(annotate: DocumentAnnotator, geo: GeoLinesOptions = {}) {
    this.annotate = annotate;
    this.geo = geo;
  }

  async recognize(image: Buffer): Promise<RecognizedToken[]> {
    const annotation = await this.annotate(image);
    return buildGeoLineTokens(extractGeoWords(annotation), this.geo);
  }
}
