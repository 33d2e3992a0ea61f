// src/receipts/geoLines.ts
// Vendor-agnostic "geometry -> rows" builder for Google Vision DocumentTextDetection.
// Receipts come back as blocks/paragraphs that cut across printed rows; regrouping
// words by vertical position gives one fragment per printed line.

import type { protos } from "@google-cloud/vision";
import type { PolygonPoint, RecognizedToken } from "./types";

type TextAnnotation = protos.google.cloud.vision.v1.ITextAnnotation;
type BoundingPoly = protos.google.cloud.vision.v1.IBoundingPoly;

export type GeoWord = {
  text: string;
  box: WordBox;
  confidence: number | null;
};

export type WordBox = {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
};

export type GeoLinesOptions = {
  /** How aggressively to merge words into the same row (multiplier on median word height). */
  yMergeMultiplier?: number; // default 0.65
  /** Drop "words" shorter than this (OCR specks). */
  minWordLen?: number; // default 1
};

type Row = {
  y: number; // running average of centerY
  words: GeoWord[];
};

function finiteOr(n: number | null | undefined, fallback: number): number {
  return typeof n === "number" && Number.isFinite(n) ? n : fallback;
}

export function boxFromPoly(poly: BoundingPoly | null | undefined): WordBox {
  const verts = poly?.vertices ?? [];
  const xs = verts.map((v) => finiteOr(v?.x, 0));
  const ys = verts.map((v) => finiteOr(v?.y, 0));
  if (!xs.length || !ys.length) return { minX: 0, maxX: 0, minY: 0, maxY: 0 };
  return { minX: Math.min(...xs), maxX: Math.max(...xs), minY: Math.min(...ys), maxY: Math.max(...ys) };
}

function centerY(box: WordBox): number {
  return (box.minY + box.maxY) / 2;
}

function median(nums: number[]): number {
  const arr = nums.filter((n) => Number.isFinite(n)).sort((a, b) => a - b);
  if (!arr.length) return 0;
  const mid = Math.floor(arr.length / 2);
  return arr.length % 2 ? arr[mid] : (arr[mid - 1] + arr[mid]) / 2;
}

/** Flattens pages/blocks/paragraphs/words into GeoWords in annotation order. */
export function extractGeoWords(annotation: TextAnnotation | null | undefined): GeoWord[] {
  const out: GeoWord[] = [];
  for (const page of annotation?.pages ?? []) {
    for (const block of page.blocks ?? []) {
      for (const para of block.paragraphs ?? []) {
        for (const word of para.words ?? []) {
          const text = (word.symbols ?? []).map((s) => s.text ?? "").join("").trim();
          const confidence = word.confidence;
          out.push({
            text,
            box: boxFromPoly(word.boundingBox),
            confidence: typeof confidence === "number" && Number.isFinite(confidence) ? confidence : null,
          });
        }
      }
    }
  }
  return out;
}

function rowRegion(words: GeoWord[]): PolygonPoint[] {
  const minX = Math.min(...words.map((w) => w.box.minX));
  const maxX = Math.max(...words.map((w) => w.box.maxX));
  const minY = Math.min(...words.map((w) => w.box.minY));
  const maxY = Math.max(...words.map((w) => w.box.maxY));
  return [
    { x: minX, y: minY },
    { x: maxX, y: minY },
    { x: maxX, y: maxY },
    { x: minX, y: maxY },
  ];
}

function rowConfidence(words: GeoWord[]): number {
  const known = words.map((w) => w.confidence).filter((c): c is number => c !== null);
  if (!known.length) return 0;
  const avg = known.reduce((t, c) => t + c, 0) / known.length;
  return Math.max(0, Math.min(1, avg));
}

/** Groups words into printed rows, top to bottom, each row read left to right. */
export function buildGeoLineTokens(words: GeoWord[], opts: GeoLinesOptions = {}): RecognizedToken[] {
  const yMergeMultiplier = opts.yMergeMultiplier ?? 0.65;
  const minWordLen = opts.minWordLen ?? 1;

  const filtered = words.filter((w) => w.text.length >= minWordLen);
  const medH = median(filtered.map((w) => w.box.maxY - w.box.minY).filter((h) => h > 0)) || 10;
  const yThresh = Math.max(3, medH * yMergeMultiplier);

  const sorted = [...filtered].sort((a, b) => centerY(a.box) - centerY(b.box) || a.box.minX - b.box.minX);
  const rows: Row[] = [];

  for (const w of sorted) {
    const cy = centerY(w.box);
    let bestIdx = -1;
    let bestDist = Infinity;
    for (let i = rows.length - 1; i >= 0; i--) {
      const dist = Math.abs(rows[i].y - cy);
      if (dist < bestDist) {
        bestDist = dist;
        bestIdx = i;
      }
      if (rows[i].y < cy - yThresh * 2) break;
    }

    if (bestIdx >= 0 && bestDist <= yThresh) {
      const row = rows[bestIdx];
      row.y = (row.y + cy) / 2;
      row.words.push(w);
    } else {
      rows.push({ y: cy, words: [w] });
    }
  }

  return rows
    .map((row) => {
      const ordered = [...row.words].sort((a, b) => a.box.minX - b.box.minX);
      return {
        text: ordered.map((w) => w.text).join(" ").replace(/\s{2,}/g, " ").trim(),
        confidence: rowConfidence(ordered),
        region: rowRegion(ordered),
      };
    })
    .filter((t) => t.text.length > 0);
}
