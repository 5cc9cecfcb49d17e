/**
 * Provider-agnostic image generation interface.
 *
 * Each provider is one candidate strategy in the fallback chain: given a
 * generation request it either resolves with image bytes or rejects with a
 * ProviderError describing why. The chain decides what happens next.
 */

export interface GenerationRequest {
  /** Trimmed, non-empty prompt */
  prompt: string;
  negativePrompt?: string;
  /** Model id from the catalog, e.g. "stabilityai/stable-diffusion-2" */
  modelId: string;
  width: number;
  height: number;
  guidanceScale?: number;
  steps?: number;
  /** -1 or absent lets the provider pick */
  seed?: number;
}

export interface ImageGenerationResult {
  image: Buffer;
  /** Content type reported by the provider, e.g. "image/png" */
  mimeType: string;
  /** Name of the provider that produced this image */
  provider: string;
}

export interface ImageGenerationProvider {
  /** Human-readable name of this provider (e.g. "mock", "huggingface") */
  readonly name: string;

  /**
   * Generate an image for the request.
   *
   * @param signal - Aborted when the chain gives up on this attempt
   */
  generate(request: GenerationRequest, signal: AbortSignal): Promise<ImageGenerationResult>;
}

/**
 * Why a single attempt failed.
 *
 * - network:    the request never got a response
 * - http:       non-2xx response
 * - access:     the provider refused the credentials (401/403)
 * - capability: the provider cannot serve this model or returned no image
 * - timeout:    the attempt exceeded the per-attempt ceiling
 */
export type ProviderFailureKind = "network" | "http" | "access" | "capability" | "timeout";

export class ProviderError extends Error {
  readonly kind: ProviderFailureKind;
  readonly provider: string;
  readonly status?: number;

  constructor(message: string, kind: ProviderFailureKind, provider: string, status?: number) {
    super(message);
    this.name = "ProviderError";
    this.kind = kind;
    this.provider = provider;
    this.status = status;
  }
}
