import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";

interface AppError extends Error {
  statusCode?: number;
  /** Set by body-parser on malformed JSON and oversized bodies */
  status?: number;
  /** body-parser error type, e.g. "entity.too.large" */
  type?: string;
  code?: string;
}

/** Codes for the body-parser failures a client can cause. */
const BODY_ERROR_CODES: Record<string, { code: string; message: string }> = {
  "entity.parse.failed": { code: "INVALID_JSON", message: "Request body is not valid JSON" },
  "entity.too.large": { code: "PAYLOAD_TOO_LARGE", message: "Request body is too large" },
};

function classify(err: AppError, statusCode: number): { code: string; message: string } {
  if (statusCode === 500) {
    return { code: "INTERNAL_ERROR", message: "Internal server error" };
  }
  const bodyError = err.type ? BODY_ERROR_CODES[err.type] : undefined;
  if (bodyError) {
    return bodyError;
  }
  return { code: err.code || "REQUEST_ERROR", message: err.message };
}

function errorHandler(
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = err.statusCode || err.status || 500;
  const { code, message } = classify(err, statusCode);
  const requestId = req.requestId;

  monitoringService.recordError();

  if (statusCode === 500) {
    logger.error("server", "Unhandled error", {
      requestId,
      path: req.originalUrl,
      error: err.message,
      ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    });
  } else {
    logger.warn("server", `${statusCode} ${code}`, {
      requestId,
      path: req.originalUrl,
      error: err.message,
    });
  }

  res.status(statusCode).json({
    error: {
      message,
      code,
      requestId,
      ...(process.env.NODE_ENV === "development" && {
        stack: err.stack,
      }),
    },
  });
}

export { errorHandler };
export type { AppError };
