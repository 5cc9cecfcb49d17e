/**
 * Authenticated hosted-inference client.
 *
 * Calls the model endpoint with the configured HF_TOKEN as a bearer token and
 * the full parameter set. Asks the endpoint to wait for a cold model instead
 * of failing fast, and bypasses the response cache so repeated prompts yield
 * new images.
 */

import { env } from "../../config/env";
import { buildPayload, modelUrl, postInference } from "./inferenceRequest";
import type { GenerationRequest, ImageGenerationProvider, ImageGenerationResult } from "./types";

export interface HuggingFaceProviderOptions {
  token?: string;
  baseUrl?: string;
}

export class HuggingFaceImageProvider implements ImageGenerationProvider {
  readonly name = "huggingface";
  private readonly token: string;
  private readonly baseUrl: string;

  constructor(options: HuggingFaceProviderOptions = {}) {
    const token = options.token ?? env.HF_TOKEN;

    if (!token || token.trim() === "") {
      throw new Error(
        "HF_TOKEN is required for the huggingface image provider. " +
          "Set HF_TOKEN in your .env file or environment, " +
          "or list only the http or mock providers in IMAGE_PROVIDERS."
      );
    }

    this.token = token;
    this.baseUrl = options.baseUrl ?? env.HF_API_BASE_URL;
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<ImageGenerationResult> {
    return postInference(
      this.name,
      modelUrl(this.baseUrl, request.modelId),
      {
        Authorization: `Bearer ${this.token}`,
        Accept: "image/png",
        "x-wait-for-model": "true",
        "x-use-cache": "false",
      },
      buildPayload(request),
      signal
    );
  }
}
