/**
 * Shared request/response handling for hosted inference model endpoints.
 *
 * Endpoint: POST {baseUrl}/{modelId}
 * Body:     { inputs: prompt, parameters: { width, height, ... } }
 * Success:  raw image bytes with an image/* content type
 * Failure:  JSON { error: string } with a non-2xx status
 */

import { findModel } from "./models";
import { ProviderError, type GenerationRequest, type ImageGenerationResult } from "./types";

/** Shape of the inference API error response */
interface InferenceErrorResponse {
  error?: string | string[];
}

export interface InferencePayload {
  inputs: string;
  parameters: Record<string, number | string>;
}

/**
 * Build the JSON payload. Parameters the model does not declare are left
 * out, and so is the seed when it is -1 or absent.
 */
export function buildPayload(request: GenerationRequest): InferencePayload {
  const model = findModel(request.modelId);
  const parameters: Record<string, number | string> = {
    width: request.width,
    height: request.height,
  };

  if (request.negativePrompt && (model?.supportsNegativePrompt ?? true)) {
    parameters.negative_prompt = request.negativePrompt;
  }
  if (request.guidanceScale !== undefined && (model?.supportsGuidance ?? true)) {
    parameters.guidance_scale = request.guidanceScale;
  }
  if (request.steps !== undefined && (model?.supportsSteps ?? true)) {
    parameters.num_inference_steps = request.steps;
  }
  if (request.seed !== undefined && request.seed !== -1) {
    parameters.seed = request.seed;
  }

  return { inputs: request.prompt, parameters };
}

export function modelUrl(baseUrl: string, modelId: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${modelId}`;
}

function isInferenceError(value: unknown): value is InferenceErrorResponse {
  return typeof value === "object" && value !== null && "error" in value;
}

async function readErrorMessage(response: Response): Promise<string> {
  const fallback = `HTTP ${response.status} ${response.statusText}`;

  try {
    const json: unknown = await response.json();
    if (!isInferenceError(json)) {
      return fallback;
    }
    if (Array.isArray(json.error)) {
      return json.error.join("; ");
    }
    return json.error || fallback;
  } catch {
    return fallback;
  }
}

/**
 * POST the payload and return the image, or throw a classified ProviderError.
 */
export async function postInference(
  provider: string,
  url: string,
  headers: Record<string, string>,
  payload: InferencePayload,
  signal: AbortSignal
): Promise<ImageGenerationResult> {
  let response: Response;

  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(payload),
      signal,
    });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown network error";
    throw new ProviderError(`${provider} request failed (network error): ${message}`, "network", provider);
  }

  if (!response.ok) {
    const message = await readErrorMessage(response);

    switch (response.status) {
      case 401:
      case 403:
        throw new ProviderError(
          `${provider} was refused access to this model: ${message}`,
          "access",
          provider,
          response.status
        );
      case 404:
        throw new ProviderError(
          `${provider} does not serve this model: ${message}`,
          "capability",
          provider,
          response.status
        );
      default:
        throw new ProviderError(
          `${provider} error (HTTP ${response.status}): ${message}`,
          "http",
          provider,
          response.status
        );
    }
  }

  const mimeType = (response.headers.get("content-type") || "").split(";")[0].trim();
  if (!mimeType.startsWith("image/")) {
    throw new ProviderError(
      `${provider} returned an unexpected response: expected an image, got "${mimeType || "unknown"}".`,
      "capability",
      provider,
      response.status
    );
  }

  const image = Buffer.from(await response.arrayBuffer());
  if (image.length === 0) {
    throw new ProviderError(`${provider} returned an empty image.`, "capability", provider, response.status);
  }

  return { image, mimeType, provider };
}
