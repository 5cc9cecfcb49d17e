/**
 * Rate limiting middleware using express-rate-limit.
 *
 * Three tiers:
 *   - generalLimiter      : configurable via RATE_LIMIT_MAX / RATE_LIMIT_WINDOW_MS
 *   - sessionLimiter      : 10 new sessions per minute per IP
 *   - transcriptionLimiter: 20 transcriptions per minute per IP
 *
 * Generation is bounded by the per-session daily quota, not by these.
 * All limiters use the default in-memory store, which matches the
 * single-process session store.
 */

import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import { Request } from "express";
import { env } from "../config/env";

const isTest = process.env.NODE_ENV === "test";

/** In test mode, set limits high enough to avoid interfering with test suites. */
const testMax = 10000;

/**
 * General API rate limiter, applied to all /api routes.
 * Keyed by req.ip; with TRUST_PROXY=true that comes from X-Forwarded-For.
 * ipKeyGenerator collapses IPv6 addresses to /56 subnets to prevent bypass.
 */
export const generalLimiter = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  limit: isTest ? testMax : env.RATE_LIMIT_MAX,
  standardHeaders: true, // Return rate limit info in RateLimit-* headers
  legacyHeaders: false, // Disable X-RateLimit-* headers
  keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
  message: {
    error: {
      message: "Too many requests, please try again later.",
      code: "RATE_LIMIT_EXCEEDED",
    },
  },
});

/**
 * Session creation limiter. Without it a client could dodge the daily
 * quota by opening a fresh session for every request.
 */
export const sessionLimiter = rateLimit({
  windowMs: 1 * 60 * 1000,
  limit: isTest ? testMax : 10,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    error: {
      message: "Too many new sessions, please try again later.",
      code: "SESSION_RATE_LIMIT_EXCEEDED",
    },
  },
});

/**
 * Transcription limiter. 20 requests per minute per IP.
 */
export const transcriptionLimiter = rateLimit({
  windowMs: 1 * 60 * 1000,
  limit: isTest ? testMax : 20,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    error: {
      message: "Too many transcription requests, please try again later.",
      code: "TRANSCRIPTION_RATE_LIMIT_EXCEEDED",
    },
  },
});
