import { describe, it, expect, vi } from "vitest";
import { GalleryStore } from "../services/gallery/galleryStore";
import { ProviderChain } from "../services/imageGeneration/providerChain";
import {
  ProviderError,
  type GenerationRequest,
  type ImageGenerationProvider,
} from "../services/imageGeneration/types";
import { accessRemediation, submit, type SubmitInput } from "../services/orchestrator";
import type { GenerationState } from "../services/sessionStore";

const NOW = new Date("2026-10-19T10:00:00.000Z");
const TODAY = "2026-10-19";

function state(count: number, limit = 3): GenerationState {
  return {
    quota: { count, windowDate: TODAY, limit },
    gallery: new GalleryStore(5),
  };
}

function input(prompt: string, modelId = "stabilityai/stable-diffusion-2"): SubmitInput {
  return { prompt, modelId, width: 768, height: 768 };
}

function succeeding(name: string, bytes: Buffer) {
  const generate = vi.fn(async (_req: GenerationRequest, _signal: AbortSignal) => ({
    image: bytes,
    mimeType: "image/png",
    provider: name,
  }));
  const candidate: ImageGenerationProvider = { name, generate };
  return { candidate, generate };
}

function failing(name: string, error: ProviderError) {
  const generate = vi.fn(async (_req: GenerationRequest, _signal: AbortSignal) => {
    throw error;
  });
  const candidate: ImageGenerationProvider = { name, generate };
  return { candidate, generate };
}

const OPEN = { requiresAccess: false, hasCredential: false };

describe("orchestrator.submit", () => {
  it("rejects an empty prompt without consuming quota or touching the gallery", async () => {
    const s = state(1);
    const provider = succeeding("mock", Buffer.from("X"));

    const outcome = await submit(input(""), s, {
      chain: new ProviderChain(),
      candidates: [provider.candidate],
      access: OPEN,
      now: () => NOW,
    });

    expect(outcome).toEqual({ status: "rejected_empty" });
    expect(s.quota.count).toBe(1);
    expect(s.gallery.size).toBe(0);
    expect(provider.generate).not.toHaveBeenCalled();
  });

  it("treats a whitespace-only prompt as empty", async () => {
    const s = state(0);
    const outcome = await submit(input("   \n\t "), s, {
      chain: new ProviderChain(),
      candidates: [],
      access: OPEN,
      now: () => NOW,
    });

    expect(outcome.status).toBe("rejected_empty");
    expect(s.quota.count).toBe(0);
  });

  it("rejects when the quota is at its limit without calling any provider", async () => {
    const s = state(3, 3);
    const provider = succeeding("mock", Buffer.from("X"));

    const outcome = await submit(input("a red fox"), s, {
      chain: new ProviderChain(),
      candidates: [provider.candidate],
      access: OPEN,
      now: () => NOW,
    });

    expect(outcome).toEqual({
      status: "rejected_quota",
      quota: { count: 3, windowDate: TODAY, limit: 3 },
    });
    expect(provider.generate).not.toHaveBeenCalled();
    expect(s.gallery.size).toBe(0);
  });

  it("falls back to the HTTP candidate and records the result", async () => {
    const s = state(1);
    const bytes = Buffer.from("whale-bytes");
    const client = failing("huggingface", new ProviderError("huggingface error (HTTP 503): loading", "http", "huggingface", 503));
    const http = succeeding("http", bytes);

    const outcome = await submit(input("a blue whale"), s, {
      chain: new ProviderChain(),
      candidates: [client.candidate, http.candidate],
      access: OPEN,
      now: () => NOW,
    });

    expect(outcome.status).toBe("generated");
    if (outcome.status === "generated") {
      expect(outcome.image).toBe(bytes);
      expect(outcome.provider).toBe("http");
      expect(outcome.elapsedMs).toBeGreaterThanOrEqual(0);
    }
    expect(s.quota.count).toBe(2);
    expect(s.gallery.size).toBe(1);

    const head = s.gallery.get(0);
    expect(head?.prompt).toBe("a blue whale");
    expect(head?.image).toBe(bytes);
    expect(head?.provider).toBe("http");
    expect(head?.createdAt).toEqual(NOW);
  });

  it("stores the trimmed prompt", async () => {
    const s = state(0);
    const provider = succeeding("mock", Buffer.from("X"));

    await submit(input("  a lighthouse  "), s, {
      chain: new ProviderChain(),
      candidates: [provider.candidate],
      access: OPEN,
      now: () => NOW,
    });

    expect(provider.generate.mock.calls[0][0].prompt).toBe("a lighthouse");
    expect(s.gallery.get(0)?.prompt).toBe("a lighthouse");
  });

  it("charges the quota once no matter how many candidates are tried", async () => {
    const s = state(0);
    const a = failing("a", new ProviderError("a down", "network", "a"));
    const b = failing("b", new ProviderError("b down", "network", "b"));
    const c = succeeding("c", Buffer.from("C"));

    await submit(input("three candidates"), s, {
      chain: new ProviderChain(),
      candidates: [a.candidate, b.candidate, c.candidate],
      access: OPEN,
      now: () => NOW,
    });

    expect(s.quota.count).toBe(1);
  });

  it("charges the quota even when every candidate fails, and leaves the gallery alone", async () => {
    const s = state(0);
    const a = failing("http", new ProviderError("http error (HTTP 500): Internal error", "http", "http", 500));

    const outcome = await submit(input("doomed"), s, {
      chain: new ProviderChain(),
      candidates: [a.candidate],
      access: OPEN,
      now: () => NOW,
    });

    expect(outcome).toEqual({
      status: "failed",
      error: "exhausted",
      reason: "http error (HTTP 500): Internal error",
      failures: [
        { provider: "http", kind: "http", reason: "http error (HTTP 500): Internal error", status: 500 },
      ],
    });
    expect(s.quota.count).toBe(1);
    expect(s.gallery.size).toBe(0);
  });

  it("returns access_required with remediation for a gated model without a credential", async () => {
    const s = state(0);
    const client = succeeding("huggingface", Buffer.from("X"));

    const outcome = await submit(input("a gated request", "black-forest-labs/FLUX.1-dev"), s, {
      chain: new ProviderChain(),
      candidates: [client.candidate],
      access: { requiresAccess: true, hasCredential: false },
      now: () => NOW,
    });

    expect(client.generate).not.toHaveBeenCalled();
    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.error).toBe("access_required");
      expect(outcome.remediation).toEqual(accessRemediation("black-forest-labs/FLUX.1-dev"));
      expect(outcome.remediation).toHaveLength(2);
    }
    expect(s.quota.count).toBe(1);
  });

  it("omits remediation for generic failures", async () => {
    const s = state(0);
    const a = failing("http", new ProviderError("timeout-ish", "network", "http"));

    const outcome = await submit(input("generic"), s, {
      chain: new ProviderChain(),
      candidates: [a.candidate],
      access: OPEN,
      now: () => NOW,
    });

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.remediation).toBeUndefined();
    }
  });

  it("grants a fresh allowance when yesterday's quota was exhausted", async () => {
    const s: GenerationState = {
      quota: { count: 3, windowDate: "2026-10-18", limit: 3 },
      gallery: new GalleryStore(5),
    };
    const provider = succeeding("mock", Buffer.from("X"));

    const outcome = await submit(input("new day"), s, {
      chain: new ProviderChain(),
      candidates: [provider.candidate],
      access: OPEN,
      now: () => NOW,
    });

    expect(outcome.status).toBe("generated");
    expect(s.quota).toEqual({ count: 1, windowDate: TODAY, limit: 3 });
  });
});

describe("accessRemediation", () => {
  it("names the model page and the credential to configure", () => {
    expect(accessRemediation("black-forest-labs/FLUX.1-dev")).toEqual([
      "Request access to black-forest-labs/FLUX.1-dev on its model page: https://huggingface.co/black-forest-labs/FLUX.1-dev",
      "Set HF_TOKEN in your .env file or environment to a token from an account that has been granted access, then restart the server.",
    ]);
  });
});
