import dotenv from "dotenv";
dotenv.config(); // must happen before anything reads env

import express from "express";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import path from "path";
import { loadConfig } from "./config";
import type { ServiceConfig } from "./config";
import { jwtGuardOptionsFromSettings, requireJwt } from "./middleware/auth";
import type { JwtGuardOptions } from "./middleware/auth";
import { transformImage } from "./receipts/imageTransform";
import { LexiconProvider } from "./receipts/lexicon";
import type { ReceiptScanDeps } from "./receipts/receiptScan";
import { isSupportedImageType, scanReceiptHandler } from "./receipts/scanRequest";
import { googleVisionAnnotator, VisionTextRecognizer } from "./receipts/visionRecognizer";

export type AppOptions = {
  config: ServiceConfig;
  deps: ReceiptScanDeps;
  jwt?: JwtGuardOptions | null;
};

class UnsupportedUploadError extends Error {
  constructor(mime: string) {
    super(`Unsupported file type: ${mime}`);
    this.name = "UnsupportedUploadError";
  }
}

export function createApp({ config, deps, jwt }: AppOptions) {
  const app = express();

  // multipart upload for receipt images
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.uploadMaxBytes },
    fileFilter: (_req, file, cb) => {
      if (!isSupportedImageType(file.mimetype)) return cb(new UnsupportedUploadError(file.mimetype));
      cb(null, true);
    },
  });

  const guard: RequestHandler[] = jwt ? [requireJwt(jwt)] : [];

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "receipt-ocr" });
  });

  // Multipart field name: "file"; optional fields: mode, margin
  app.post(
    "/v1/receipts/scan",
    ...guard,
    upload.single("file"),
    scanReceiptHandler(deps, {
      margin: config.autoMargin,
      parallel: config.autoParallel,
      maxEditDistance: config.maxEditDistance,
    })
  );

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof UnsupportedUploadError) {
      return res.status(415).json({ error: "UNSUPPORTED_MEDIA_TYPE", detail: err.message });
    }
    if (err instanceof multer.MulterError) {
      const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      return res.status(status).json({ error: err.code, detail: err.message });
    }
    console.error("[server] unhandled error", err);
    return res.status(500).json({ error: "INTERNAL_ERROR" });
  });

  return app;
}

function main() {
  const config = loadConfig();
  const lexiconPath = path.resolve(config.lexiconPath);

  const deps: ReceiptScanDeps = {
    pipeline: {
      transform: transformImage,
      recognizer: new VisionTextRecognizer(googleVisionAnnotator()),
    },
    lexicon: LexiconProvider.fromFile(lexiconPath),
  };

  if (!config.jwt) console.warn("[server] JWT settings absent; /v1 routes are unauthenticated");

  const app = createApp({
    config,
    deps,
    jwt: config.jwt ? jwtGuardOptionsFromSettings(config.jwt) : null,
  });

  // warm the lexicon so the first request doesn't pay for the load
  void deps.lexicon.get();

  app.listen(config.port, () => console.log(`[server] receipt-ocr running on port ${config.port}`));
}

if (require.main === module) {
  main();
}
