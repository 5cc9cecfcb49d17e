/**
 * GET /api/models: selectable models with their size bounds and capabilities.
 */

import { Router, Request, Response } from "express";
import { hasHuggingFaceToken } from "../config/env";
import { toPublicModel } from "../models/session";
import { DEFAULT_MODEL_ID, IMAGE_MODELS } from "../services/imageGeneration";
import { PARAMETER_LIMITS } from "../services/imageGeneration/models";

const modelsRouter = Router();

modelsRouter.get("/", (_req: Request, res: Response) => {
  const hasCredential = hasHuggingFaceToken();

  res.status(200).json({
    models: IMAGE_MODELS.map((model) => toPublicModel(model, hasCredential)),
    defaultModel: DEFAULT_MODEL_ID,
    limits: {
      guidanceScale: PARAMETER_LIMITS.guidanceScale,
      steps: PARAMETER_LIMITS.steps,
      sizeStep: PARAMETER_LIMITS.sizeStep,
      randomSeed: PARAMETER_LIMITS.randomSeed,
    },
  });
});

export { modelsRouter };
