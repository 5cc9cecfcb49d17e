/**
 * Session token middleware.
 *
 * - `requireSession` : resolves the Bearer token to a live session; 401 otherwise.
 * - `requireLogin`   : additionally requires the session to be logged in.
 * - `requireAdminKey`: guards admin endpoints with the X-Admin-Key header.
 */

import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { env } from "../config/env";
import { sessionStore, type SessionState } from "../services/sessionStore";
import { ServiceError } from "../types/errors";

/**
 * Extract Bearer token from the Authorization header.
 * Returns null when the header is missing or malformed.
 */
function extractToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith("Bearer ")) {
    return null;
  }
  return header.slice(7); // strip "Bearer "
}

/** Sign a token that names one in-memory session. */
function signSessionToken(sessionId: string): string {
  return jwt.sign({ sessionId }, env.JWT_SECRET, { expiresIn: "1d" });
}

/**
 * Verify a JWT string and return the session id it carries.
 * Returns null when the token is invalid or expired.
 */
function verifySessionToken(token: string): string | null {
  try {
    const decoded = jwt.verify(token, env.JWT_SECRET);
    if (typeof decoded === "object" && typeof decoded.sessionId === "string") {
      return decoded.sessionId;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Middleware that **requires** a valid session token.
 * Attaches `req.session` on success; responds with 401 on failure.
 */
function requireSession(req: Request, res: Response, next: NextFunction): void {
  const token = extractToken(req);

  if (!token) {
    res.status(401).json({
      error: { message: "Unauthorized", code: "AUTH_REQUIRED" },
    });
    return;
  }

  const sessionId = verifySessionToken(token);

  if (!sessionId) {
    res.status(401).json({
      error: { message: "Unauthorized", code: "INVALID_TOKEN" },
    });
    return;
  }

  const session = sessionStore.get(sessionId);

  if (!session) {
    res.status(401).json({
      error: { message: "Session has expired, start a new one", code: "SESSION_EXPIRED" },
    });
    return;
  }

  req.session = session;
  next();
}

/**
 * Middleware that requires the session to be logged in.
 * Mount after requireSession.
 */
function requireLogin(req: Request, res: Response, next: NextFunction): void {
  if (!req.session?.auth.authenticated) {
    res.status(401).json({
      error: { message: "Log in to generate images", code: "LOGIN_REQUIRED" },
    });
    return;
  }

  next();
}

/**
 * The session attached by requireSession.
 * Throws if a route forgot to mount the middleware.
 */
function currentSession(req: Request): SessionState {
  if (!req.session) {
    throw new ServiceError("Unauthorized", 401, "AUTH_REQUIRED");
  }
  return req.session;
}

/**
 * Middleware that requires a valid admin API key via the X-Admin-Key header.
 * If ADMIN_API_KEY is not configured, all admin requests are rejected.
 */
function requireAdminKey(req: Request, res: Response, next: NextFunction): void {
  const key = req.get("x-admin-key");

  if (!env.ADMIN_API_KEY) {
    res.status(403).json({
      error: { message: "Admin access is not configured", code: "ADMIN_NOT_CONFIGURED" },
    });
    return;
  }

  if (!key || key !== env.ADMIN_API_KEY) {
    res.status(401).json({
      error: { message: "Invalid admin key", code: "INVALID_ADMIN_KEY" },
    });
    return;
  }

  next();
}

export {
  requireSession,
  requireLogin,
  requireAdminKey,
  currentSession,
  signSessionToken,
};
