/**
 * Image generation service: factory and re-exports.
 *
 * Providers are created by name. The candidate list for a model comes from
 * MODEL_PROVIDER_ORDER when it has an entry for that model, otherwise from
 * IMAGE_PROVIDERS. The authenticated client is left out of the list when no
 * token is configured.
 */

import { env, hasHuggingFaceToken } from "../../config/env";
import { createComponentLogger } from "../../config/logger";
import { HttpImageProvider } from "./httpProvider";
import { HuggingFaceImageProvider } from "./huggingFaceProvider";
import { MockImageProvider } from "./mockProvider";
import type { ImageGenerationProvider, ImageGenerationResult, GenerationRequest } from "./types";

export type { ImageGenerationProvider, ImageGenerationResult, GenerationRequest };
export { ProviderError } from "./types";
export { ProviderChain } from "./providerChain";
export type { ChainResult, ChainFailureKind, AttemptFailure, ModelAccess } from "./providerChain";
export { IMAGE_MODELS, DEFAULT_MODEL_ID, findModel } from "./models";
export type { ImageModel } from "./models";

const log = createComponentLogger("imageGeneration");

export const SUPPORTED_PROVIDERS = ["huggingface", "http", "mock"] as const;

export interface CandidateConfig {
  /** Default order for every model */
  defaultOrder: string[];
  /** Per-model overrides */
  modelOrder: Record<string, string[]>;
  token: string;
  baseUrl: string;
}

function configFromEnv(): CandidateConfig {
  return {
    defaultOrder: env.IMAGE_PROVIDERS,
    modelOrder: env.MODEL_PROVIDER_ORDER,
    token: hasHuggingFaceToken() ? env.HF_TOKEN : "",
    baseUrl: env.HF_API_BASE_URL,
  };
}

/**
 * Create an image generation provider by name.
 *
 * @throws Error if the provider name is not recognized
 */
export function createImageProvider(
  providerName: string,
  config: CandidateConfig = configFromEnv()
): ImageGenerationProvider {
  switch (providerName.toLowerCase()) {
    case "mock":
      return new MockImageProvider();

    case "huggingface":
      return new HuggingFaceImageProvider({ token: config.token, baseUrl: config.baseUrl });

    case "http":
      return new HttpImageProvider(config.baseUrl);

    default:
      throw new Error(
        `Unknown image provider: "${providerName}". ` +
          `Supported providers: ${SUPPORTED_PROVIDERS.join(", ")}. ` +
          `Set IMAGE_PROVIDERS in your environment or .env file.`
      );
  }
}

/**
 * Ordered candidates for one model.
 */
export function buildCandidates(
  modelId: string,
  config: CandidateConfig = configFromEnv()
): ImageGenerationProvider[] {
  const order = config.modelOrder[modelId] ?? config.defaultOrder;
  const candidates: ImageGenerationProvider[] = [];

  for (const name of order) {
    if (name === "huggingface" && config.token === "") {
      log.debug("Skipping authenticated client: no HF_TOKEN configured", { model: modelId });
      continue;
    }
    candidates.push(createImageProvider(name, config));
  }

  return candidates;
}

/**
 * Fail at startup on a misspelled provider name rather than on the first
 * generation request.
 */
export function validateProviderConfig(config: CandidateConfig = configFromEnv()): void {
  const names = [config.defaultOrder, ...Object.values(config.modelOrder)].flat();
  const known: readonly string[] = SUPPORTED_PROVIDERS;

  for (const name of names) {
    if (!known.includes(name)) {
      throw new Error(
        `Unknown image provider: "${name}". Supported providers: ${SUPPORTED_PROVIDERS.join(", ")}.`
      );
    }
  }
}
