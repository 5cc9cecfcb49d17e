/**
 * Input sanitization middleware.
 *
 * - Trims whitespace from all string fields in `req.body`.
 * - Strips HTML tags from all other string fields.
 * - Enforces maximum field lengths for known fields.
 *
 * The `audio` field carries base64 data and is left untouched. Prompts are
 * only trimmed: `<` and `>` are ordinary prompt text, and their length
 * limits are validated by the generate route.
 * Apply after body parsing and before route handlers.
 */

import { Request, Response, NextFunction } from "express";

// ---------------------------------------------------------------------------
// Known field length limits
// ---------------------------------------------------------------------------

const FIELD_MAX_LENGTHS: Record<string, number> = {
  username: 30,
  language: 8,
  model: 100,
};

const RAW_FIELDS = new Set(["audio"]);
const TRIM_ONLY_FIELDS = new Set(["prompt", "negativePrompt"]);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Strip all HTML/XML tags from a string using a simple regex. */
function stripHtmlTags(value: string): string {
  return value.replace(/<[^>]*>/g, "");
}

function sanitizeValue(key: string, value: unknown): unknown {
  if (typeof value === "string") {
    if (RAW_FIELDS.has(key)) {
      return value;
    }
    if (TRIM_ONLY_FIELDS.has(key)) {
      return value.trim();
    }

    let sanitized = stripHtmlTags(value.trim());

    const maxLen = FIELD_MAX_LENGTHS[key];
    if (maxLen && sanitized.length > maxLen) {
      sanitized = sanitized.slice(0, maxLen);
    }

    return sanitized;
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => sanitizeValue(String(index), item));
  }

  if (value !== null && typeof value === "object") {
    return sanitizeObject(value);
  }

  return value;
}

function sanitizeObject(obj: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    result[key] = sanitizeValue(key, val);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/**
 * Express middleware that sanitizes `req.body` in place.
 * Should be mounted after `express.json()` / `express.urlencoded()`.
 */
export function sanitizeBody(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  if (req.body && typeof req.body === "object") {
    req.body = sanitizeObject(req.body);
  }
  next();
}
