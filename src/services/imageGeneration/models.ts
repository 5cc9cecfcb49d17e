/**
 * Selectable text-to-image models.
 *
 * Each entry declares the size range its endpoint accepts, which optional
 * parameters it honours, and whether the model is gated behind an access
 * request on its provider page.
 */

export interface ImageModel {
  id: string;
  label: string;
  /** Gated model: needs an approved access request and a configured token */
  requiresAccess: boolean;
  minSize: number;
  maxSize: number;
  defaultSize: number;
  supportsNegativePrompt: boolean;
  supportsGuidance: boolean;
  supportsSteps: boolean;
}

export const DEFAULT_MODEL_ID = "stabilityai/stable-diffusion-2";

/** Bounds shared by every model for the optional tuning parameters. */
export const PARAMETER_LIMITS = {
  guidanceScale: { min: 1.0, max: 20.0 },
  steps: { min: 20, max: 100 },
  /** Width and height must be a multiple of this */
  sizeStep: 8,
  /** Sentinel for "provider picks the seed" */
  randomSeed: -1,
} as const;

export const IMAGE_MODELS: readonly ImageModel[] = [
  {
    id: "stabilityai/stable-diffusion-2",
    label: "Stable Diffusion 2",
    requiresAccess: false,
    minSize: 256,
    maxSize: 1024,
    defaultSize: 768,
    supportsNegativePrompt: true,
    supportsGuidance: true,
    supportsSteps: true,
  },
  {
    id: "stabilityai/stable-diffusion-xl-base-1.0",
    label: "Stable Diffusion XL",
    requiresAccess: false,
    minSize: 512,
    maxSize: 1024,
    defaultSize: 1024,
    supportsNegativePrompt: true,
    supportsGuidance: true,
    supportsSteps: true,
  },
  {
    id: "black-forest-labs/FLUX.1-schnell",
    label: "FLUX.1 [schnell]",
    requiresAccess: false,
    minSize: 256,
    maxSize: 1440,
    defaultSize: 1024,
    supportsNegativePrompt: false,
    supportsGuidance: false,
    supportsSteps: false,
  },
  {
    id: "black-forest-labs/FLUX.1-dev",
    label: "FLUX.1 [dev]",
    requiresAccess: true,
    minSize: 256,
    maxSize: 1440,
    defaultSize: 1024,
    supportsNegativePrompt: false,
    supportsGuidance: true,
    supportsSteps: true,
  },
  {
    id: "stabilityai/stable-diffusion-3.5-large",
    label: "Stable Diffusion 3.5 Large",
    requiresAccess: true,
    minSize: 512,
    maxSize: 1440,
    defaultSize: 1024,
    supportsNegativePrompt: true,
    supportsGuidance: true,
    supportsSteps: true,
  },
];

export function findModel(modelId: string): ImageModel | undefined {
  return IMAGE_MODELS.find((model) => model.id === modelId);
}
