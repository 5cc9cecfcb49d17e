import crypto from "crypto";
import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";

/**
 * Request logging middleware with request ID correlation.
 *
 * Assigns a UUID to each request (req.requestId and the X-Request-Id
 * response header), then logs one line when the response finishes, at
 * warn for 4xx and error for 5xx. Once the session middleware has run the
 * line carries the session id.
 */
function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID();
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);

  res.on("finish", () => {
    const durationMs = Date.now() - start;

    monitoringService.recordRequest(durationMs);

    const level = res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "info";
    logger[level]("http", `${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs,
      ...(req.session && { sessionId: req.session.id }),
    });
  });

  next();
}

export { requestLogger };
