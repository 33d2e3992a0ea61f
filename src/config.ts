// src/config.ts
// Typed service configuration, validated once at start-up.

import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8790),
    RECEIPT_LEXICON_PATH: z.string().trim().min(1).default("assets/lexicon_dictionary.txt"),
    RECEIPT_MAX_EDIT_DISTANCE: z.coerce.number().int().min(0).max(3).default(2),
    RECEIPT_AUTO_MARGIN: z.coerce.number().min(0).default(0.01),
    RECEIPT_AUTO_PARALLEL: booleanFlag.default("false"),
    RECEIPT_UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(12 * 1024 * 1024),
    JWT_ISSUER: z.string().trim().min(1).optional(),
    JWT_AUDIENCE: z.string().trim().min(1).optional(),
    JWKS_URI: z.string().trim().url().optional(),
  })
  .refine(
    (env) => {
      const set = [env.JWT_ISSUER, env.JWT_AUDIENCE, env.JWKS_URI].filter((v) => v !== undefined).length;
      return set === 0 || set === 3;
    },
    { message: "JWT_ISSUER, JWT_AUDIENCE and JWKS_URI must be set together", path: ["JWKS_URI"] }
  );

export type JwtSettings = {
  issuer: string;
  audience: string;
  jwksUri: string;
};

export type ServiceConfig = {
  port: number;
  lexiconPath: string;
  maxEditDistance: number;
  autoMargin: number;
  autoParallel: boolean;
  uploadMaxBytes: number;
  jwt: JwtSettings | null;
};

// Empty strings in .env mean "unset".
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (typeof v === "string" && v.trim().length > 0) out[k] = v;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`).join("; ");
    throw new Error(`[config] Invalid environment: ${detail}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    lexiconPath: e.RECEIPT_LEXICON_PATH,
    maxEditDistance: e.RECEIPT_MAX_EDIT_DISTANCE,
    autoMargin: e.RECEIPT_AUTO_MARGIN,
    autoParallel: e.RECEIPT_AUTO_PARALLEL,
    uploadMaxBytes: e.RECEIPT_UPLOAD_MAX_BYTES,
    jwt:
      e.JWT_ISSUER && e.JWT_AUDIENCE && e.JWKS_URI
        ? { issuer: e.JWT_ISSUER, audience: e.JWT_AUDIENCE, jwksUri: e.JWKS_URI }
        : null,
  };
}
