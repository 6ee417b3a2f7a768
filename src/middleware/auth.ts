// src/middleware/auth.ts
// Bearer-token authentication for the single dashboard user

import { Request, Response, NextFunction } from "express";
import crypto from "crypto";
import { v4 as uuid } from "uuid";
import { sendError } from "./responseHelper";
import { UnauthorizedError } from "../utils/errors";

/**
 * HMAC-SHA256 signed tokens (JWT layout, no external dependency).
 *
 * Token format: base64url(header).base64url(payload).base64url(signature)
 */

export interface SessionPayload {
  sub: string; // username
  sid: string; // login session id, owns the pending meal
  iat: number; // issued at (unix seconds)
  exp: number; // expires at (unix seconds)
}

export interface AuthConfig {
  username: string;
  passwordHash: string;
  tokenSecret: string;
  tokenTtl: string;
}

declare global {
  namespace Express {
    interface Request {
      auth?: SessionPayload;
    }
  }
}

function base64urlEncode(data: string): string {
  return Buffer.from(data).toString("base64url");
}

function base64urlDecode(data: string): string {
  return Buffer.from(data, "base64url").toString();
}

function sign(payload: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(payload).digest("base64url");
}

function isSessionPayload(value: unknown): value is SessionPayload {
  return (
    typeof value === "object" &&
    value !== null &&
    "sub" in value && typeof value.sub === "string" &&
    "sid" in value && typeof value.sid === "string" &&
    "iat" in value && typeof value.iat === "number" &&
    "exp" in value && typeof value.exp === "number"
  );
}

/**
 * Parse a duration like "30d", "24h", "60m" or "45s" into seconds.
 * Falls back to 30 days for anything else.
 */
export function parseDuration(expiresIn: string): number {
  const match = expiresIn.match(/^(\d+)(d|h|m|s)$/);
  if (!match) return 30 * 24 * 60 * 60;

  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case "d": return value * 24 * 60 * 60;
    case "h": return value * 60 * 60;
    case "m": return value * 60;
    default: return value;
  }
}

/**
 * Create a token for a new login session.
 */
export function createToken(
  username: string,
  secret: string,
  expiresIn: string = "30d",
  nowMs: number = Date.now()
): { token: string; payload: SessionPayload } {
  const now = Math.floor(nowMs / 1000);
  const payload: SessionPayload = {
    sub: username,
    sid: uuid(),
    iat: now,
    exp: now + parseDuration(expiresIn),
  };

  const headerB64 = base64urlEncode(JSON.stringify({ alg: "HS256", typ: "JWT" }));
  const payloadB64 = base64urlEncode(JSON.stringify(payload));
  const signature = sign(`${headerB64}.${payloadB64}`, secret);

  return { token: `${headerB64}.${payloadB64}.${signature}`, payload };
}

/**
 * Verify and decode a token. Null when malformed, tampered with, or expired.
 */
export function verifyToken(
  token: string,
  secret: string,
  nowMs: number = Date.now()
): SessionPayload | null {
  const parts = token.split(".");
  if (parts.length !== 3) return null;

  const [headerB64, payloadB64, signature] = parts;

  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(base64urlDecode(payloadB64));
  } catch {
    return null;
  }
  if (!isSessionPayload(payload)) return null;

  if (payload.exp < Math.floor(nowMs / 1000)) return null;

  return payload;
}

export interface RevocationList {
  has(sid: string): boolean;
}

/**
 * Sessions ended by logout. An entry is only needed until its token would
 * have expired anyway, so expired entries are dropped on each revoke.
 */
export class SessionRevocations implements RevocationList {
  private revoked = new Map<string, number>(); // sid -> exp (unix seconds)

  constructor(private readonly clock: () => number = Date.now) {}

  revoke(session: SessionPayload): void {
    this.prune();
    this.revoked.set(session.sid, session.exp);
  }

  has(sid: string): boolean {
    return this.revoked.has(sid);
  }

  get size(): number {
    return this.revoked.size;
  }

  private prune(): void {
    const now = Math.floor(this.clock() / 1000);
    for (const [sid, exp] of this.revoked) {
      if (exp < now) this.revoked.delete(sid);
    }
  }
}

export type AuthOutcome =
  | { ok: true; session: SessionPayload }
  | { ok: false; status: 401 | 503; error: string };

/**
 * Checks an Authorization header against the configured credential.
 */
export function authenticate(
  authHeader: string | undefined,
  config: AuthConfig | null,
  revokedSessions: RevocationList = new Set<string>(),
  nowMs: number = Date.now()
): AuthOutcome {
  if (!config) {
    return { ok: false, status: 503, error: "Authentication not configured" };
  }

  if (!authHeader?.startsWith("Bearer ")) {
    return { ok: false, status: 401, error: "Authentication required" };
  }

  const payload = verifyToken(authHeader.slice(7), config.tokenSecret, nowMs);
  if (!payload || payload.sub !== config.username || revokedSessions.has(payload.sid)) {
    return { ok: false, status: 401, error: "Invalid or expired token" };
  }

  return { ok: true, session: payload };
}

/**
 * Authentication middleware.
 * Requires `Authorization: Bearer <token>` issued by POST /api/v1/auth/login.
 */
export function authMiddleware(
  config: AuthConfig | null,
  revokedSessions: RevocationList = new Set<string>()
) {
  return (req: Request, res: Response, next: NextFunction) => {
    const outcome = authenticate(req.headers.authorization, config, revokedSessions);

    if (!outcome.ok) {
      if (outcome.status === 503) {
        console.error("[auth] Credential not configured");
      } else if (req.headers.authorization) {
        console.warn(`[auth] Rejected token for ${req.method} ${req.originalUrl}`);
      }
      return sendError(res, outcome.error, outcome.status);
    }

    req.auth = outcome.session;
    next();
  };
}

/**
 * The session of an authenticated request. Throws when used on a route
 * that is not behind authMiddleware.
 */
export function requireSession(req: Request): SessionPayload {
  if (!req.auth) {
    throw new UnauthorizedError();
  }
  return req.auth;
}

export default authMiddleware;
