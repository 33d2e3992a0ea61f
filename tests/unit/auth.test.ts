import { beforeAll, describe, expect, it, vi } from "vitest";
import type { Request, Response } from "express";
import { generateKeyPair, SignJWT } from "jose";
import type { KeyLike } from "jose";
import { requireJwt } from "../../src/middleware/auth";
import type { JwtGuardOptions } from "../../src/middleware/auth";

const ISSUER = "https://issuer.test";
const AUDIENCE = "receipt-ocr";

type FakeRes = {
  statusCode: number | null;
  body: unknown;
  status(code: number): FakeRes;
  json(body: unknown): FakeRes;
};

function fakeRes(): FakeRes {
  return {
    statusCode: null,
    body: undefined,
    status(code) {
      this.statusCode = code;
      return this;
    },
    json(body) {
      this.body = body;
      return this;
    },
  };
}

function fakeReq(authorization?: string) {
  return {
    header: (name: string) => (name.toLowerCase() === "authorization" ? authorization : undefined),
  } as unknown as Request;
}

let privateKey: KeyLike;
let otherKey: KeyLike;
let opts: JwtGuardOptions;

beforeAll(async () => {
  const pair = await generateKeyPair("ES256");
  privateKey = pair.privateKey;
  otherKey = (await generateKeyPair("ES256")).privateKey;
  opts = { issuer: ISSUER, audience: AUDIENCE, keys: async () => pair.publicKey };
});

function sign(key: KeyLike, claims: { sub?: string; aud?: string } = {}) {
  const jwt = new SignJWT({})
    .setProtectedHeader({ alg: "ES256" })
    .setIssuer(ISSUER)
    .setAudience(claims.aud ?? AUDIENCE)
    .setIssuedAt()
    .setExpirationTime("5m");
  if (claims.sub) jwt.setSubject(claims.sub);
  return jwt.sign(key);
}

async function run(authorization?: string) {
  const req = fakeReq(authorization);
  const res = fakeRes();
  const next = vi.fn();
  await requireJwt(opts)(req, res as unknown as Response, next);
  return { req, res, next };
}

describe("requireJwt", () => {
  it("rejects a request without a bearer token", async () => {
    const { res, next } = await run();
    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ error: "UNAUTHENTICATED", message: "Missing bearer token" });
    expect(next).not.toHaveBeenCalled();
  });

  it("attaches the auth context for a valid token", async () => {
    const token = await sign(privateKey, { sub: "user-1" });
    const { req, res, next } = await run(`Bearer ${token}`);
    expect(next).toHaveBeenCalledTimes(1);
    expect(res.statusCode).toBeNull();
    expect(req.auth).toEqual({ subject: "user-1", issuer: ISSUER, audience: AUDIENCE });
  });

  it("rejects a token without a subject", async () => {
    const token = await sign(privateKey);
    const { res, next } = await run(`Bearer ${token}`);
    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ error: "UNAUTHENTICATED", message: "Token missing sub" });
    expect(next).not.toHaveBeenCalled();
  });

  it("rejects a token for another audience", async () => {
    const token = await sign(privateKey, { sub: "user-1", aud: "someone-else" });
    const { res } = await run(`Bearer ${token}`);
    expect(res.statusCode).toBe(401);
    expect(res.body).toMatchObject({ message: "Invalid token", detail: "ERR_JWT_CLAIM_VALIDATION_FAILED" });
  });

  it("rejects a token signed with another key", async () => {
    const token = await sign(otherKey, { sub: "user-1" });
    const { res } = await run(`Bearer ${token}`);
    expect(res.statusCode).toBe(401);
    expect(res.body).toMatchObject({ message: "Invalid token", detail: "ERR_JWS_SIGNATURE_VERIFICATION_FAILED" });
  });
});
