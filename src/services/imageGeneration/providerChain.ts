/**
 * Ordered provider fallback chain.
 *
 * Candidates are tried strictly in the order given. The first success wins
 * and later candidates are never touched; a failed candidate is recorded and
 * never retried. Each attempt runs under its own timeout.
 *
 * Gated models short-circuit before any candidate runs when no credential is
 * configured, so no network time is spent on a request that cannot succeed.
 */

import { createComponentLogger, errorMessage } from "../../config/logger";
import { monitoringService } from "../monitoringService";
import {
  ProviderError,
  type GenerationRequest,
  type ImageGenerationProvider,
  type ImageGenerationResult,
  type ProviderFailureKind,
} from "./types";

const log = createComponentLogger("providerChain");

export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;

export interface AttemptFailure {
  provider: string;
  kind: ProviderFailureKind;
  reason: string;
  status?: number;
}

export interface ModelAccess {
  /** The selected model is gated */
  requiresAccess: boolean;
  /** A provider credential is configured */
  hasCredential: boolean;
}

export type ChainFailureKind = "access_required" | "exhausted";

export type ChainResult =
  | (ImageGenerationResult & { ok: true; failures: AttemptFailure[] })
  | { ok: false; error: ChainFailureKind; reason: string; failures: AttemptFailure[] };

function toFailure(provider: string, err: unknown): AttemptFailure {
  if (err instanceof ProviderError) {
    return { provider, kind: err.kind, reason: err.message, status: err.status };
  }
  return { provider, kind: "network", reason: errorMessage(err) };
}

export class ProviderChain {
  private readonly timeoutMs: number;

  constructor(timeoutMs: number = DEFAULT_PROVIDER_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  async generate(
    request: GenerationRequest,
    candidates: readonly ImageGenerationProvider[],
    access: ModelAccess
  ): Promise<ChainResult> {
    if (access.requiresAccess && !access.hasCredential) {
      log.info("Gated model requested without a credential", { model: request.modelId });
      return {
        ok: false,
        error: "access_required",
        reason: `Model "${request.modelId}" requires approved access and no HF_TOKEN is configured.`,
        failures: [],
      };
    }

    if (candidates.length === 0) {
      return {
        ok: false,
        error: "exhausted",
        reason: "No image providers are configured for this model.",
        failures: [],
      };
    }

    const failures: AttemptFailure[] = [];

    for (const candidate of candidates) {
      try {
        const result = await this.attempt(candidate, request);
        log.info("Image generated", {
          provider: candidate.name,
          model: request.modelId,
          failedBefore: failures.length,
        });
        return { ...result, ok: true, failures };
      } catch (err) {
        const failure = toFailure(candidate.name, err);
        failures.push(failure);
        monitoringService.recordProviderFailure(candidate.name);
        log.warn("Candidate failed, moving on", {
          provider: candidate.name,
          model: request.modelId,
          kind: failure.kind,
          status: failure.status,
          error: failure.reason.substring(0, 200),
        });
      }
    }

    // A refusal from a gated endpoint is more useful to the user than
    // whatever the later candidates reported.
    const accessFailure = failures.find((f) => f.kind === "access");
    if (accessFailure) {
      return { ok: false, error: "access_required", reason: accessFailure.reason, failures };
    }

    return {
      ok: false,
      error: "exhausted",
      reason: failures[failures.length - 1].reason,
      failures,
    };
  }

  private async attempt(
    candidate: ImageGenerationProvider,
    request: GenerationRequest
  ): Promise<ImageGenerationResult> {
    const controller = new AbortController();
    const timedOut = () =>
      new ProviderError(
        `${candidate.name} timed out after ${this.timeoutMs}ms`,
        "timeout",
        candidate.name
      );
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(timedOut());
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([candidate.generate(request, controller.signal), timeout]);
    } catch (err) {
      // A provider that rejects on abort reports its own error; the cause is still the timeout
      if (controller.signal.aborted) {
        throw timedOut();
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
