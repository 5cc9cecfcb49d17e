/**
 * Raw HTTP fallback.
 *
 * A plain unauthenticated POST to the same model endpoint. Public models
 * answer it under the anonymous rate limit; gated models refuse it.
 */

import { env } from "../../config/env";
import { buildPayload, modelUrl, postInference } from "./inferenceRequest";
import type { GenerationRequest, ImageGenerationProvider, ImageGenerationResult } from "./types";

export class HttpImageProvider implements ImageGenerationProvider {
  readonly name = "http";
  private readonly baseUrl: string;

  constructor(baseUrl: string = env.HF_API_BASE_URL) {
    this.baseUrl = baseUrl;
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<ImageGenerationResult> {
    return postInference(
      this.name,
      modelUrl(this.baseUrl, request.modelId),
      {},
      buildPayload(request),
      signal
    );
  }
}
