/**
 * Image generation route.
 *
 * POST /api/generate: run one generation for the logged-in session.
 *
 * Body:
 *   { prompt, negativePrompt?, model?, width?, height?, guidanceScale?, steps?, seed? }
 *
 * Responses:
 *   200 { image, elapsedMs, quota }
 *   400 EMPTY_PROMPT | VALIDATION_ERROR | UNKNOWN_MODEL
 *   403 ACCESS_REQUIRED (with remediation steps)
 *   409 GENERATION_IN_PROGRESS
 *   429 QUOTA_EXCEEDED
 *   502 GENERATION_FAILED
 */

import { Router, Request, Response, NextFunction } from "express";
import { env, hasHuggingFaceToken } from "../config/env";
import { requireLogin, requireSession, currentSession } from "../middleware/auth";
import { toPublicGalleryEntry, toPublicQuota } from "../models/session";
import {
  DEFAULT_MODEL_ID,
  ProviderChain,
  buildCandidates,
  findModel,
  type ImageModel,
} from "../services/imageGeneration";
import { PARAMETER_LIMITS } from "../services/imageGeneration/models";
import { submit, type SubmitInput, type SubmitOutcome } from "../services/orchestrator";
import { toWindowDate } from "../services/quota/quotaTracker";
import { sessionStore } from "../services/sessionStore";

const generateRouter = Router();

const providerChain = new ProviderChain(env.PROVIDER_TIMEOUT_MS);

const MAX_PROMPT_LENGTH = 1000;
const MAX_NEGATIVE_PROMPT_LENGTH = 500;

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

interface ValidationError {
  field: string;
  message: string;
}

interface GenerateBody {
  prompt?: unknown;
  negativePrompt?: unknown;
  width?: unknown;
  height?: unknown;
  guidanceScale?: unknown;
  steps?: unknown;
  seed?: unknown;
}

function checkSize(
  field: string,
  value: unknown,
  model: ImageModel,
  errors: ValidationError[]
): number {
  if (value === undefined) {
    return model.defaultSize;
  }
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < model.minSize ||
    value > model.maxSize ||
    value % PARAMETER_LIMITS.sizeStep !== 0
  ) {
    errors.push({
      field,
      message: `${field} must be a multiple of ${PARAMETER_LIMITS.sizeStep} between ${model.minSize} and ${model.maxSize}`,
    });
  }
  return typeof value === "number" ? value : model.defaultSize;
}

/**
 * Validate the prompts and tuning parameters against the selected model.
 * An empty prompt passes here; emptiness is the orchestrator's call.
 */
function validateGenerationInput(
  body: GenerateBody,
  model: ImageModel
): { errors: ValidationError[]; input: SubmitInput } {
  const errors: ValidationError[] = [];

  if (body.prompt !== undefined && typeof body.prompt !== "string") {
    errors.push({ field: "prompt", message: "Prompt must be a string" });
  } else if (typeof body.prompt === "string" && body.prompt.length > MAX_PROMPT_LENGTH) {
    errors.push({
      field: "prompt",
      message: `Prompt must be at most ${MAX_PROMPT_LENGTH} characters`,
    });
  }

  if (body.negativePrompt !== undefined && typeof body.negativePrompt !== "string") {
    errors.push({ field: "negativePrompt", message: "Negative prompt must be a string" });
  } else if (
    typeof body.negativePrompt === "string" &&
    body.negativePrompt.length > MAX_NEGATIVE_PROMPT_LENGTH
  ) {
    errors.push({
      field: "negativePrompt",
      message: `Negative prompt must be at most ${MAX_NEGATIVE_PROMPT_LENGTH} characters`,
    });
  }

  const width = checkSize("width", body.width, model, errors);
  const height = checkSize("height", body.height, model, errors);

  const { guidanceScale: guidance, steps: stepLimits } = PARAMETER_LIMITS;

  if (
    body.guidanceScale !== undefined &&
    (typeof body.guidanceScale !== "number" ||
      !Number.isFinite(body.guidanceScale) ||
      body.guidanceScale < guidance.min ||
      body.guidanceScale > guidance.max)
  ) {
    errors.push({
      field: "guidanceScale",
      message: `Guidance scale must be between ${guidance.min} and ${guidance.max}`,
    });
  }

  if (
    body.steps !== undefined &&
    (typeof body.steps !== "number" ||
      !Number.isInteger(body.steps) ||
      body.steps < stepLimits.min ||
      body.steps > stepLimits.max)
  ) {
    errors.push({
      field: "steps",
      message: `Steps must be an integer between ${stepLimits.min} and ${stepLimits.max}`,
    });
  }

  if (
    body.seed !== undefined &&
    (typeof body.seed !== "number" ||
      !Number.isSafeInteger(body.seed) ||
      body.seed < PARAMETER_LIMITS.randomSeed)
  ) {
    errors.push({
      field: "seed",
      message: `Seed must be an integer, or ${PARAMETER_LIMITS.randomSeed} for random`,
    });
  }

  const input: SubmitInput = {
    prompt: typeof body.prompt === "string" ? body.prompt : "",
    modelId: model.id,
    width,
    height,
    ...(typeof body.negativePrompt === "string" &&
      body.negativePrompt !== "" && { negativePrompt: body.negativePrompt }),
    ...(typeof body.guidanceScale === "number" && { guidanceScale: body.guidanceScale }),
    ...(typeof body.steps === "number" && { steps: body.steps }),
    ...(typeof body.seed === "number" && { seed: body.seed }),
  };

  return { errors, input };
}

// ---------------------------------------------------------------------------
// POST /: Generate an image
// ---------------------------------------------------------------------------

generateRouter.post(
  "/",
  requireSession,
  requireLogin,
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const session = currentSession(req);
      const body: GenerateBody & { model?: unknown } = req.body ?? {};

      // 1. Resolve the model
      const modelId = body.model === undefined ? DEFAULT_MODEL_ID : body.model;
      const model = typeof modelId === "string" ? findModel(modelId) : undefined;
      if (!model) {
        res.status(400).json({
          error: {
            message: `Unknown model: ${String(modelId)}`,
            code: "UNKNOWN_MODEL",
          },
        });
        return;
      }

      // 2. Validate parameters against the model
      const { errors, input } = validateGenerationInput(body, model);
      if (errors.length > 0) {
        res.status(400).json({
          error: {
            message: "Validation failed",
            code: "VALIDATION_ERROR",
            details: errors,
          },
        });
        return;
      }

      // 3. One pipeline per session at a time
      if (!sessionStore.tryAcquire(session)) {
        res.status(409).json({
          error: {
            message: "A generation is already running for this session",
            code: "GENERATION_IN_PROGRESS",
          },
        });
        return;
      }

      let outcome: SubmitOutcome;
      try {
        outcome = await submit(input, session, {
          chain: providerChain,
          candidates: buildCandidates(model.id),
          access: { requiresAccess: model.requiresAccess, hasCredential: hasHuggingFaceToken() },
        });
      } finally {
        sessionStore.release(session);
      }

      const today = toWindowDate(new Date());

      switch (outcome.status) {
        case "rejected_empty":
          res.status(400).json({
            error: { message: "Please enter a prompt.", code: "EMPTY_PROMPT" },
          });
          return;

        case "rejected_quota":
          res.status(429).json({
            error: {
              message: "Daily generation limit reached. Try again tomorrow.",
              code: "QUOTA_EXCEEDED",
              quota: toPublicQuota(outcome.quota, today),
            },
          });
          return;

        case "failed":
          if (outcome.error === "access_required") {
            res.status(403).json({
              error: {
                message: outcome.reason,
                code: "ACCESS_REQUIRED",
                remediation: outcome.remediation,
              },
            });
            return;
          }
          res.status(502).json({
            error: {
              message: outcome.reason,
              code: "GENERATION_FAILED",
              attempts: outcome.failures.map((f) => ({ provider: f.provider, kind: f.kind })),
            },
          });
          return;

        case "generated":
          res.status(200).json({
            image: toPublicGalleryEntry(outcome.entry, 0),
            elapsedMs: outcome.elapsedMs,
            quota: toPublicQuota(session.quota, today),
          });
          return;
      }
    } catch (err: unknown) {
      next(err);
    }
  }
);

export { generateRouter };
