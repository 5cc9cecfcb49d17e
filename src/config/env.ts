/**
 * Centralized environment configuration.
 * Validates required environment variables at startup and exports typed config.
 * Import this module early to fail fast on missing configuration.
 */

import dotenv from "dotenv";
import * as path from "path";

// Auto-load .env from the project root directory
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

interface EnvConfig {
  /** Secret key for signing session tokens */
  JWT_SECRET: string;
  /** Server port (default: 3001) */
  PORT: number;
  /** Node environment (default: development) */
  NODE_ENV: string;
  /** CORS origin for frontend (default: http://localhost:5173) */
  CORS_ORIGIN: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: string;
  /** Whether to trust proxy headers (e.g. X-Forwarded-For) when behind nginx/load balancer (default: false) */
  TRUST_PROXY: boolean;
  /** Rate limit window duration in milliseconds (default: 900000 = 15 minutes) */
  RATE_LIMIT_WINDOW_MS: number;
  /** Maximum number of requests per window per IP (default: 300) */
  RATE_LIMIT_MAX: number;
  /** Idle sessions older than this are evicted, in minutes (default: 120) */
  SESSION_TTL_MINUTES: number;
  /** Generations allowed per session per UTC day (default: 10) */
  DAILY_LIMIT: number;
  /** Number of recent results kept in a session gallery (default: 5) */
  GALLERY_CAPACITY: number;
  /** Hugging Face access token. Required for gated models and the authenticated client. */
  HF_TOKEN: string;
  /** Base URL for hosted inference model endpoints */
  HF_API_BASE_URL: string;
  /** Default ordered list of image providers tried for every model (default: mock) */
  IMAGE_PROVIDERS: string[];
  /** JSON mapping of model id to its own ordered provider list (default: {}) */
  MODEL_PROVIDER_ORDER: Record<string, string[]>;
  /** Per-attempt provider timeout in milliseconds (default: 30000) */
  PROVIDER_TIMEOUT_MS: number;
  /** Speech-to-text provider (default: mock) */
  TRANSCRIPTION_PROVIDER: string;
  /** OpenAI API key for the openai transcription provider */
  OPENAI_API_KEY: string;
  /** Login provider (default: mock) */
  LOGIN_PROVIDER: string;
  /** Secret key for admin API access. If set, admin routes require X-Admin-Key header. */
  ADMIN_API_KEY: string;
}

/**
 * Required environment variables that must be set for the server to start.
 * Missing any of these will cause a clear error message at startup.
 */
const REQUIRED_VARS = ["JWT_SECRET"] as const;

/**
 * Validates that all required environment variables are present.
 * Throws a descriptive error listing all missing variables.
 */
function validateEnv(): void {
  const missing: string[] = [];

  for (const varName of REQUIRED_VARS) {
    const value = process.env[varName];
    if (!value || value.trim() === "") {
      missing.push(varName);
    }
  }

  if (missing.length > 0) {
    const message = [
      "",
      "=== Missing Required Environment Variables ===",
      "",
      ...missing.map((v) => `  - ${v}`),
      "",
      "Please set these variables in your .env file or environment.",
      "See .env.example for reference.",
      "",
    ].join("\n");

    throw new Error(message);
  }
}

/**
 * Parse a numeric setting that must be positive. Unset or blank falls back
 * to the default; any other value must be a positive integer (or a positive
 * number when `integer` is false), otherwise startup stops.
 */
function parsePositiveNumber(
  name: string,
  raw: string | undefined,
  fallback: number,
  integer = true
): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw.trim());
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    const message = [
      "",
      "=== Invalid Environment Variable ===",
      "",
      `  - ${name}=${raw} (expected a positive ${integer ? "integer" : "number"})`,
      "",
      "Please fix this variable in your .env file or environment.",
      "See .env.example for reference.",
      "",
    ].join("\n");

    throw new Error(message);
  }
  return value;
}

/** Split a comma-separated provider list, dropping blanks. */
function parseList(raw: string): string[] {
  return raw
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Parse MODEL_PROVIDER_ORDER, e.g. {"stabilityai/stable-diffusion-2":["huggingface","http"]}.
 * Values may be arrays or comma-separated strings.
 */
function parseProviderOrder(raw: string): Record<string, string[]> {
  const parsed: unknown = JSON.parse(raw);

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("MODEL_PROVIDER_ORDER must be a JSON object of model id to provider list.");
  }

  const result: Record<string, string[]> = {};
  for (const [modelId, value] of Object.entries(parsed)) {
    if (typeof value === "string") {
      result[modelId] = parseList(value);
    } else if (Array.isArray(value) && value.every((v) => typeof v === "string")) {
      result[modelId] = parseList(value.join(","));
    } else {
      throw new Error(`MODEL_PROVIDER_ORDER entry for "${modelId}" must be a list of provider names.`);
    }
  }
  return result;
}

/**
 * Load and validate environment configuration.
 * Call this after dotenv.config() has been invoked.
 */
function loadEnvConfig(): EnvConfig {
  validateEnv();

  return {
    JWT_SECRET: process.env.JWT_SECRET || "",
    PORT: parsePositiveNumber("PORT", process.env.PORT, 3001),
    NODE_ENV: process.env.NODE_ENV || "development",
    CORS_ORIGIN: process.env.CORS_ORIGIN || "http://localhost:5173",
    LOG_LEVEL: (process.env.LOG_LEVEL || "info").toLowerCase(),
    TRUST_PROXY:
      process.env.TRUST_PROXY === "true" || process.env.TRUST_PROXY === "1",
    RATE_LIMIT_WINDOW_MS: parsePositiveNumber(
      "RATE_LIMIT_WINDOW_MS",
      process.env.RATE_LIMIT_WINDOW_MS,
      900000
    ),
    RATE_LIMIT_MAX: parsePositiveNumber("RATE_LIMIT_MAX", process.env.RATE_LIMIT_MAX, 300),
    SESSION_TTL_MINUTES: parsePositiveNumber(
      "SESSION_TTL_MINUTES",
      process.env.SESSION_TTL_MINUTES,
      120,
      false
    ),
    DAILY_LIMIT: parsePositiveNumber("DAILY_LIMIT", process.env.DAILY_LIMIT, 10),
    GALLERY_CAPACITY: parsePositiveNumber("GALLERY_CAPACITY", process.env.GALLERY_CAPACITY, 5),
    HF_TOKEN: process.env.HF_TOKEN || "",
    HF_API_BASE_URL:
      process.env.HF_API_BASE_URL ||
      "https://api-inference.huggingface.co/models",
    IMAGE_PROVIDERS: parseList(process.env.IMAGE_PROVIDERS || "mock"),
    MODEL_PROVIDER_ORDER: parseProviderOrder(
      process.env.MODEL_PROVIDER_ORDER || "{}"
    ),
    PROVIDER_TIMEOUT_MS: parsePositiveNumber(
      "PROVIDER_TIMEOUT_MS",
      process.env.PROVIDER_TIMEOUT_MS,
      30000
    ),
    TRANSCRIPTION_PROVIDER: process.env.TRANSCRIPTION_PROVIDER || "mock",
    OPENAI_API_KEY: process.env.OPENAI_API_KEY || "",
    LOGIN_PROVIDER: process.env.LOGIN_PROVIDER || "mock",
    ADMIN_API_KEY: process.env.ADMIN_API_KEY || "",
  };
}

// Validate and export config as a singleton
const env = loadEnvConfig();

/**
 * Returns true when a Hugging Face token is configured, which unlocks
 * gated models and the authenticated inference client.
 */
function hasHuggingFaceToken(): boolean {
  return env.HF_TOKEN.trim().length > 0;
}

export { env, hasHuggingFaceToken, parseProviderOrder, parsePositiveNumber };
export type { EnvConfig };
