/**
 * Generation orchestrator.
 *
 * One submit is one user action:
 *   1. Reject an empty (after trimming) prompt. No quota is consumed.
 *   2. Consume exactly one unit of quota. Denied → no provider call.
 *   3. Run the provider chain, timing it with a wall clock.
 *   4. On success, record the image in the gallery.
 *
 * Quota is charged once per submitted action regardless of how many
 * candidates the chain tries and regardless of the final outcome.
 */

import { randomUUID } from "crypto";
import { createComponentLogger } from "../config/logger";
import type { GalleryEntry } from "./gallery/galleryStore";
import {
  ProviderChain,
  type AttemptFailure,
  type ChainFailureKind,
  type GenerationRequest,
  type ImageGenerationProvider,
  type ModelAccess,
} from "./imageGeneration";
import { monitoringService } from "./monitoringService";
import { toWindowDate, tryConsume, type Quota } from "./quota/quotaTracker";
import type { GenerationState } from "./sessionStore";

const log = createComponentLogger("orchestrator");

export type SubmitInput = Omit<GenerationRequest, "prompt"> & {
  /** Untrimmed prompt as typed or transcribed */
  prompt: string;
};

export interface OrchestratorDeps {
  chain: ProviderChain;
  candidates: readonly ImageGenerationProvider[];
  access: ModelAccess;
  now?: () => Date;
}

export type SubmitOutcome =
  | {
      status: "generated";
      image: Buffer;
      mimeType: string;
      provider: string;
      elapsedMs: number;
      entry: GalleryEntry;
    }
  | { status: "rejected_empty" }
  | { status: "rejected_quota"; quota: Quota }
  | {
      status: "failed";
      error: ChainFailureKind;
      reason: string;
      /** Present for access_required: what the user can do about it */
      remediation?: string[];
      failures: AttemptFailure[];
    };

/** The two steps a user can take when a gated model refuses them. */
export function accessRemediation(modelId: string): string[] {
  return [
    `Request access to ${modelId} on its model page: https://huggingface.co/${modelId}`,
    "Set HF_TOKEN in your .env file or environment to a token from an account that has been granted access, then restart the server.",
  ];
}

export async function submit(
  input: SubmitInput,
  state: GenerationState,
  deps: OrchestratorDeps
): Promise<SubmitOutcome> {
  const prompt = input.prompt.trim();
  if (prompt === "") {
    return { status: "rejected_empty" };
  }

  const now = deps.now ?? (() => new Date());
  const consumed = tryConsume(state.quota, toWindowDate(now()));
  state.quota = consumed.quota;

  if (!consumed.allowed) {
    monitoringService.recordQuotaRejection();
    log.info("Daily quota exhausted", { limit: consumed.quota.limit });
    return { status: "rejected_quota", quota: consumed.quota };
  }

  const request: GenerationRequest = { ...input, prompt };
  const started = Date.now();
  const result = await deps.chain.generate(request, deps.candidates, deps.access);
  const elapsedMs = Date.now() - started;

  monitoringService.recordGeneration(result.ok);

  if (!result.ok) {
    log.warn("Generation failed", {
      model: request.modelId,
      error: result.error,
      attempts: result.failures.length,
      elapsedMs,
    });
    return {
      status: "failed",
      error: result.error,
      reason: result.reason,
      ...(result.error === "access_required" && {
        remediation: accessRemediation(request.modelId),
      }),
      failures: result.failures,
    };
  }

  const entry: GalleryEntry = {
    id: randomUUID(),
    prompt,
    modelId: request.modelId,
    provider: result.provider,
    image: result.image,
    mimeType: result.mimeType,
    createdAt: now(),
  };
  state.gallery.record(entry);

  return {
    status: "generated",
    image: result.image,
    mimeType: result.mimeType,
    provider: result.provider,
    elapsedMs,
    entry,
  };
}
