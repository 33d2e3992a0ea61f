// src/middleware/auth.ts
import type { NextFunction, Request, Response } from "express";
import { createRemoteJWKSet, jwtVerify } from "jose";
import type { JWTVerifyGetKey } from "jose";
import type { JwtSettings } from "../config";

export type JwtGuardOptions = {
  issuer: string;
  audience: string;
  keys: JWTVerifyGetKey;
};

export function jwtGuardOptionsFromSettings(settings: JwtSettings): JwtGuardOptions {
  return {
    issuer: settings.issuer,
    audience: settings.audience,
    keys: createRemoteJWKSet(new URL(settings.jwksUri)),
  };
}

function bearerToken(req: Request): string {
  const header = req.header("authorization") || "";
  return header.startsWith("Bearer ") ? header.slice(7).trim() : "";
}

export function requireJwt(opts: JwtGuardOptions) {
  return async function requireJwtMiddleware(req: Request, res: Response, next: NextFunction) {
    const token = bearerToken(req);
    if (!token) {
      res.status(401).json({ error: "UNAUTHENTICATED", message: "Missing bearer token" });
      return;
    }

    try {
      const { payload } = await jwtVerify(token, opts.keys, {
        issuer: opts.issuer,
        audience: opts.audience,
      });

      if (!payload.sub) {
        res.status(401).json({ error: "UNAUTHENTICATED", message: "Token missing sub" });
        return;
      }

      req.auth = {
        subject: payload.sub,
        issuer: String(payload.iss ?? opts.issuer),
        audience: Array.isArray(payload.aud) ? String(payload.aud[0]) : String(payload.aud ?? opts.audience),
      };
    } catch (err) {
      const detail =
        err && typeof err === "object" && "code" in err && typeof err.code === "string"
          ? err.code
          : err instanceof Error
            ? err.message
            : "unknown";
      res.status(401).json({ error: "UNAUTHENTICATED", message: "Invalid token", detail });
      return;
    }

    next();
  };
}
