import jwt from "jsonwebtoken";
import { createHash, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { SessionContext } from "./types.js";

const SCOPE = "habits";

const ClaimsSchema = z.object({
  scope: z.literal(SCOPE),
  iat: z.number(),
  exp: z.number(),
});

export type IssuedToken = {
  token: string;
  expiresAt: string;
};

export type PasswordGate = {
  checkPassword(password: string): boolean;
  issueToken(): IssuedToken;
  verifyToken(token: string): SessionContext;
};

function readBearerToken(req: Request): string | null {
  const raw = req.headers.authorization;
  if (typeof raw !== "string") return null;

  const m = raw.trim().match(/^Bearer\s+(.+)$/i);
  if (!m) return null;

  const token = m[1].trim();
  return token || null;
}

function digest(s: string) {
  return createHash("sha256").update(s, "utf8").digest();
}

/**
 * Single shared password, compared in full and in constant time
 * (equal-length digests of both sides).
 */
export function createPasswordGate(opts: {
  password: string;
  sessionSecret: string;
  sessionTtlSeconds: number;
}): PasswordGate {
  const expected = digest(opts.password);
  const secret = opts.sessionSecret;

  return {
    checkPassword(password) {
      return timingSafeEqual(digest(password), expected);
    },

    issueToken() {
      const token = jwt.sign({ scope: SCOPE }, secret, { expiresIn: opts.sessionTtlSeconds });
      const expiresAt = new Date(Date.now() + opts.sessionTtlSeconds * 1000).toISOString();
      return { token, expiresAt };
    },

    verifyToken(token) {
      // clockTolerance keeps small clock skew from causing random 401s
      const decoded = jwt.verify(token, secret, { clockTolerance: 10 });
      const claims = ClaimsSchema.safeParse(decoded);
      if (!claims.success) throw new Error("Invalid token payload");

      return {
        authenticated: true,
        issuedAt: new Date(claims.data.iat * 1000).toISOString(),
        expiresAt: new Date(claims.data.exp * 1000).toISOString(),
      };
    },
  };
}

/** Middleware */
export function requireAuth(gate: PasswordGate): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = readBearerToken(req);
    if (!token) {
      res.status(401).json({ error: "Missing token" });
      return;
    }

    try {
      req.auth = gate.verifyToken(token);
    } catch {
      res.status(401).json({ error: "Invalid token" });
      return;
    }
    next();
  };
}
