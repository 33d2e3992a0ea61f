// src/receipts/imageTransform.ts
// Pixel preprocessing per mode, on sharp. Every mode starts from grayscale and emits PNG.

import sharp from "sharp";
import type { PreprocessMode } from "./preprocessModes";
import type { ImageTransformer } from "./types";

const CLAHE_GRID = 8;
const CLAHE_MAX_SLOPE = 3;
const ADAPTIVE_BLUR_SIGMA = 5;
const ADAPTIVE_OFFSET = 10;

type GrayRaw = {
  data: Buffer;
  width: number;
  height: number;
};

function grayscale(image: Buffer) {
  return sharp(image).rotate().grayscale();
}

// Keeps the first channel only; grayscale output may still carry alpha.
export async function toGrayRaw(pipeline: sharp.Sharp): Promise<GrayRaw> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  if (info.channels === 1) return { data, width: info.width, height: info.height };

  const pixels = info.width * info.height;
  const gray = Buffer.alloc(pixels);
  for (let i = 0; i < pixels; i++) gray[i] = data[i * info.channels];
  return { data: gray, width: info.width, height: info.height };
}

function rawToPng(raw: GrayRaw): Promise<Buffer> {
  return sharp(raw.data, { raw: { width: raw.width, height: raw.height, channels: 1 } }).png().toBuffer();
}

export function computeHistogram(pixels: Uint8Array): number[] {
  const histogram = new Array<number>(256).fill(0);
  for (let i = 0; i < pixels.length; i++) histogram[pixels[i]] += 1;
  return histogram;
}

/** Otsu's method: the split maximising between-class variance. */
export function computeOtsuThreshold(histogram: readonly number[]): number {
  const total = histogram.reduce((t, c) => t + c, 0);
  let sum = 0;
  for (let i = 0; i < histogram.length; i++) sum += i * histogram[i];

  let sumBackground = 0;
  let weightBackground = 0;
  let maxVariance = 0;
  let threshold = 127;

  for (let i = 0; i < histogram.length; i++) {
    weightBackground += histogram[i];
    if (weightBackground === 0) continue;

    const weightForeground = total - weightBackground;
    if (weightForeground === 0) break;

    sumBackground += i * histogram[i];
    const meanBackground = sumBackground / weightBackground;
    const meanForeground = (sum - sumBackground) / weightForeground;
    const variance = weightBackground * weightForeground * (meanBackground - meanForeground) ** 2;

    if (variance > maxVariance) {
      maxVariance = variance;
      threshold = i;
    }
  }

  return threshold;
}

async function contrastBoost(image: Buffer): Promise<Buffer> {
  const meta = await sharp(image).metadata();
  const tileW = Math.max(1, Math.ceil((meta.width ?? CLAHE_GRID) / CLAHE_GRID));
  const tileH = Math.max(1, Math.ceil((meta.height ?? CLAHE_GRID) / CLAHE_GRID));
  return grayscale(image).clahe({ width: tileW, height: tileH, maxSlope: CLAHE_MAX_SLOPE }).png().toBuffer();
}

async function otsu(image: Buffer): Promise<Buffer> {
  const blurred = await toGrayRaw(grayscale(image).blur(1.1));
  const t = computeOtsuThreshold(computeHistogram(blurred.data));
  const out = Buffer.alloc(blurred.data.length);
  for (let i = 0; i < out.length; i++) out[i] = blurred.data[i] > t ? 255 : 0;
  return rawToPng({ ...blurred, data: out });
}

async function adaptive(image: Buffer): Promise<Buffer> {
  const denoised = await toGrayRaw(grayscale(image).median(3));
  const localMean = await toGrayRaw(
    sharp(denoised.data, { raw: { width: denoised.width, height: denoised.height, channels: 1 } }).blur(ADAPTIVE_BLUR_SIGMA)
  );
  const out = Buffer.alloc(denoised.data.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = denoised.data[i] >= localMean.data[i] - ADAPTIVE_OFFSET ? 255 : 0;
  }
  return rawToPng({ ...denoised, data: out });
}

export const transformImage: ImageTransformer = async (image: Buffer, mode: PreprocessMode) => {
  switch (mode) {
    case "none":
      return grayscale(image).png().toBuffer();
    case "denoise":
      return grayscale(image).median(3).png().toBuffer();
    case "contrast_boost":
      return contrastBoost(image);
    case "otsu":
      return otsu(image);
    case "adaptive":
      return adaptive(image);
    default: {
      const unreachable: never = mode;
      throw new Error(`Unhandled preprocess mode: ${String(unreachable)}`);
    }
  }
};
