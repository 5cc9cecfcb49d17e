import dotenv from "dotenv";

// Load environment variables before anything else
dotenv.config();

// Import env config (validates required vars immediately)
import { env, hasHuggingFaceToken } from "./config/env";
import { logger } from "./config/logger";
import { app } from "./app";
import { validateProviderConfig } from "./services/imageGeneration";

function start(): void {
  validateProviderConfig();

  logger.info("server", "Image providers configured", {
    defaultOrder: env.IMAGE_PROVIDERS,
    modelOverrides: Object.keys(env.MODEL_PROVIDER_ORDER).length,
    credentialConfigured: hasHuggingFaceToken(),
    dailyLimit: env.DAILY_LIMIT,
    galleryCapacity: env.GALLERY_CAPACITY,
  });

  if (env.IMAGE_PROVIDERS.includes("huggingface") && !hasHuggingFaceToken()) {
    logger.warn("server", "HF_TOKEN is not set; the authenticated client will be skipped and gated models are unavailable.");
  }

  const server = app.listen(env.PORT, () => {
    logger.info("server", `Server is running on http://localhost:${env.PORT}`, {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
    });
    logger.info("server", `Health check: http://localhost:${env.PORT}/api/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info("server", `${signal} received. Shutting down gracefully...`);
    server.close(() => {
      logger.info("server", "Server shut down.");
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  start();
} catch (err) {
  logger.error("server", "Failed to start", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
}
