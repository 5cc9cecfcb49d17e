import "express-async-errors"; // Must be imported before any route handlers
import express, { Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import { router as apiRouter } from "./routes/index";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import { generalLimiter } from "./middleware/rateLimiter";
import { sanitizeBody } from "./middleware/sanitize";
import { env } from "./config/env";

const app = express();

// Trust proxy headers (X-Forwarded-For, etc.) when running behind nginx/load balancer.
// Required for accurate IP detection in rate limiting and request logging.
if (env.TRUST_PROXY) {
  app.set("trust proxy", 1);
}

// Security headers
app.use(helmet());

// CORS configuration - allow frontend dev server
app.use(
  cors({
    origin: env.CORS_ORIGIN,
    credentials: true,
  })
);

// Body parsing. Voice recordings arrive as base64 JSON, so only the
// transcription route takes large bodies; the general parser then skips
// requests that are already parsed.
app.use("/api/transcriptions", express.json({ limit: "10mb" }));
app.use(express.json({ limit: "100kb" }));

// Input sanitization (trim, strip HTML, enforce field length limits)
app.use(sanitizeBody);

// Request logging
app.use(requestLogger);

app.use(generalLimiter);

// API routes
app.use("/api", apiRouter);

// Catch-all 404 for any /api route that was not matched above
app.use("/api", (_req: Request, res: Response) => {
  res.status(404).json({
    error: {
      message: "Not found",
      code: "NOT_FOUND",
    },
  });
});

// Error handling middleware (must be last)
app.use(errorHandler);

export { app };
