// src/types.d.ts
import "express-serve-static-core";

export type AuthContext = {
  subject: string; // JWT sub
  issuer: string; // JWT iss
  audience: string; // JWT aud
};

declare module "express-serve-static-core" {
  interface Request {
    auth?: AuthContext;
  }
}

export {};
