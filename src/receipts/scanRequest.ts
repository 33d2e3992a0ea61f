// src/receipts/scanRequest.ts
// HTTP-facing scan: validate the multipart request, run the scan, shape the JSON reply.

import type { Request, Response } from "express";
import { z } from "zod";
import { compareModes } from "./autoMode";
import type { ModeComparisonRow } from "./autoMode";
import { parseScanMode, UnknownPreprocessModeError } from "./preprocessModes";
import type { ScanMode } from "./preprocessModes";
import { scanReceipt } from "./receiptScan";
import type { ReceiptScanDeps, ReceiptScanResult } from "./receiptScan";
import { charAccuracy } from "./textQuality";

export const SUPPORTED_IMAGE_TYPES: readonly string[] = ["image/jpeg", "image/png", "image/webp"];

const MAX_AUTO_MARGIN = 1;

// Multipart fields arrive as strings; an empty field means "not sent".
function blankAsAbsent(v: unknown): unknown {
  return typeof v === "string" && v.trim() === "" ? undefined : v;
}

const formFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no", "on", "off"]))
  .transform((v) => v === "true" || v === "1" || v === "yes" || v === "on");

const scanBodySchema = z.object({
  mode: z.preprocess(blankAsAbsent, z.string().trim().min(1).optional()),
  margin: z.preprocess(blankAsAbsent, z.coerce.number().min(0).max(MAX_AUTO_MARGIN).optional()),
  // side-by-side scores for every auto candidate (one extra recognition per mode)
  compare: z.preprocess(blankAsAbsent, formFlag.optional()),
  // reference transcription; scores the raw text with charAccuracy
  groundTruth: z.preprocess(blankAsAbsent, z.string().optional()),
});

export type ScanFile = {
  buffer: Buffer;
  mimetype: string;
  originalname?: string;
};

export type ScanDefaults = {
  margin: number;
  parallel: boolean;
  maxEditDistance: number;
};

export type ScanResponseBody = {
  file: string | null;
  modeSelected: ScanMode;
  chosenMode: string;
  autoMargin: number | null;
  meanConfidence: number;
  blendedScore: number;
  scores: ReceiptScanResult["scores"];
  merchant: string | null;
  date: string | null;
  totals: string[];
  text: string;
  rawText: string;
  comparison: ModeComparisonRow[] | null;
  charAccuracy: number | null;
};

export type ScanExtras = {
  comparison?: ModeComparisonRow[] | null;
  charAccuracy?: number | null;
};

export type ErrorBody = { error: string; detail?: string };

export type ScanReply = { status: number; body: ScanResponseBody | ErrorBody };

export function isSupportedImageType(mime: string): boolean {
  return SUPPORTED_IMAGE_TYPES.includes(mime.toLowerCase());
}

export function toScanResponse(file: ScanFile, result: ReceiptScanResult, extras: ScanExtras = {}): ScanResponseBody {
  return {
    file: file.originalname ?? null,
    modeSelected: result.requestedMode,
    chosenMode: result.chosenMode,
    autoMargin: result.autoMargin,
    meanConfidence: result.meanConfidence,
    blendedScore: result.blendedScore,
    scores: result.scores,
    merchant: result.fields.merchant,
    date: result.fields.date,
    totals: result.fields.totals,
    text: result.displayText,
    rawText: result.rawText,
    comparison: extras.comparison ?? null,
    charAccuracy: extras.charAccuracy ?? null,
  };
}

export async function runScanRequest(
  input: { file: ScanFile | undefined; body: unknown },
  deps: ReceiptScanDeps,
  defaults: ScanDefaults
): Promise<ScanReply> {
  const { file } = input;
  if (!file?.buffer?.length || !file.mimetype) {
    return { status: 400, body: { error: "MISSING_FILE", detail: "multipart field name: file" } };
  }
  if (!isSupportedImageType(file.mimetype)) {
    return {
      status: 415,
      body: { error: "UNSUPPORTED_MEDIA_TYPE", detail: `${file.mimetype}; supported: ${SUPPORTED_IMAGE_TYPES.join(", ")}` },
    };
  }

  const parsed = scanBodySchema.safeParse(input.body ?? {});
  if (!parsed.success) {
    return { status: 400, body: { error: "INVALID_REQUEST", detail: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") } };
  }

  let mode: ScanMode;
  try {
    mode = parseScanMode(parsed.data.mode ?? "auto");
  } catch (e) {
    if (e instanceof UnknownPreprocessModeError) {
      return { status: 400, body: { error: "INVALID_MODE", detail: e.message } };
    }
    throw e;
  }

  const result = await scanReceipt(file.buffer, deps, {
    mode,
    margin: parsed.data.margin ?? defaults.margin,
    parallel: defaults.parallel,
    maxEditDistance: defaults.maxEditDistance,
  });

  const comparison = parsed.data.compare ? await compareModes(file.buffer, deps.pipeline) : null;
  const accuracy = parsed.data.groundTruth === undefined ? null : charAccuracy(result.rawText, parsed.data.groundTruth);

  return { status: 200, body: toScanResponse(file, result, { comparison, charAccuracy: accuracy }) };
}

export const scanReceiptHandler =
  (deps: ReceiptScanDeps, defaults: ScanDefaults) =>
  async (req: Request, res: Response) => {
    try {
      const reply = await runScanRequest({ file: req.file, body: req.body }, deps, defaults);
      res.status(reply.status).json(reply.body);
    } catch (e) {
      // recognizer / transform failures: log server-side, don't leak internals
      console.error("[scanRequest] scan failed", e);
      res.status(500).json({ error: "INTERNAL_ERROR" });
    }
  };
