/**
 * Image provider strategies and the candidate factory.
 * fetch is stubbed; nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  buildCandidates,
  createImageProvider,
  validateProviderConfig,
  type CandidateConfig,
} from "../services/imageGeneration";
import { HttpImageProvider } from "../services/imageGeneration/httpProvider";
import { HuggingFaceImageProvider } from "../services/imageGeneration/huggingFaceProvider";
import { buildPayload, modelUrl } from "../services/imageGeneration/inferenceRequest";
import { MockImageProvider, hashPrompt } from "../services/imageGeneration/mockProvider";
import { ProviderError, type GenerationRequest } from "../services/imageGeneration/types";

const BASE_URL = "https://inference.test/models";

const request: GenerationRequest = {
  prompt: "a red fox",
  modelId: "stabilityai/stable-diffusion-2",
  width: 512,
  height: 768,
};

function imageResponse(bytes: string, type = "image/png"): Response {
  return new Response(bytes, { status: 200, headers: { "content-type": type } });
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

// ===========================================================================
// Payload building
// ===========================================================================

describe("buildPayload", () => {
  it("sends only the prompt and size when nothing else is set", () => {
    expect(buildPayload(request)).toEqual({
      inputs: "a red fox",
      parameters: { width: 512, height: 768 },
    });
  });

  it("maps every optional parameter the model supports", () => {
    expect(
      buildPayload({
        ...request,
        negativePrompt: "blurry",
        guidanceScale: 7.5,
        steps: 30,
        seed: 1234,
      })
    ).toEqual({
      inputs: "a red fox",
      parameters: {
        width: 512,
        height: 768,
        negative_prompt: "blurry",
        guidance_scale: 7.5,
        num_inference_steps: 30,
        seed: 1234,
      },
    });
  });

  it("omits the seed entirely for the random sentinel", () => {
    const payload = buildPayload({ ...request, seed: -1 });
    expect(payload.parameters).not.toHaveProperty("seed");
  });

  it("keeps a seed of zero", () => {
    expect(buildPayload({ ...request, seed: 0 }).parameters.seed).toBe(0);
  });

  it("drops parameters the model does not declare", () => {
    const payload = buildPayload({
      ...request,
      modelId: "black-forest-labs/FLUX.1-schnell",
      negativePrompt: "blurry",
      guidanceScale: 7.5,
      steps: 30,
    });
    expect(payload.parameters).toEqual({ width: 512, height: 768 });
  });
});

describe("modelUrl", () => {
  it("joins without doubling slashes", () => {
    expect(modelUrl("https://inference.test/models/", "a/b")).toBe("https://inference.test/models/a/b");
  });
});

// ===========================================================================
// Authenticated client
// ===========================================================================

describe("HuggingFaceImageProvider", () => {
  it("requires a token", () => {
    expect(() => new HuggingFaceImageProvider({ token: "", baseUrl: BASE_URL })).toThrow(/HF_TOKEN is required/);
  });

  it("posts to the model endpoint with a bearer token and returns the bytes", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => imageResponse("PNGDATA"));
    vi.stubGlobal("fetch", fetchMock);

    const provider = new HuggingFaceImageProvider({ token: "test-token", baseUrl: BASE_URL });
    const result = await provider.generate(request, new AbortController().signal);

    expect(result.image.toString()).toBe("PNGDATA");
    expect(result.mimeType).toBe("image/png");
    expect(result.provider).toBe("huggingface");

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://inference.test/models/stabilityai/stable-diffusion-2");
    expect(init.method).toBe("POST");
    expect(init.headers).toMatchObject({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json",
      "x-wait-for-model": "true",
    });
    expect(JSON.parse(String(init.body))).toEqual({
      inputs: "a red fox",
      parameters: { width: 512, height: 768 },
    });
  });

  it("classifies 401 and 403 as access failures", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(403, { error: "gated model" })));

    const provider = new HuggingFaceImageProvider({ token: "test-token", baseUrl: BASE_URL });
    const err = await provider.generate(request, new AbortController().signal).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (err instanceof ProviderError) {
      expect(err.kind).toBe("access");
      expect(err.status).toBe(403);
      expect(err.message).toBe("huggingface was refused access to this model: gated model");
    }
  });
});

// ===========================================================================
// Raw HTTP fallback
// ===========================================================================

describe("HttpImageProvider", () => {
  it("posts without an Authorization header", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => imageResponse("JPEG", "image/jpeg"));
    vi.stubGlobal("fetch", fetchMock);

    const result = await new HttpImageProvider(BASE_URL).generate(request, new AbortController().signal);

    expect(result.mimeType).toBe("image/jpeg");
    expect(result.provider).toBe("http");
    expect(fetchMock.mock.calls[0][1].headers).toEqual({ "Content-Type": "application/json" });
  });

  it("reports non-2xx responses as http failures with the provider's message", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(503, { error: "Model is currently loading" })));

    const err = await new HttpImageProvider(BASE_URL)
      .generate(request, new AbortController().signal)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (err instanceof ProviderError) {
      expect(err.kind).toBe("http");
      expect(err.status).toBe(503);
      expect(err.message).toBe("http error (HTTP 503): Model is currently loading");
    }
  });

  it("reports a missing model as a capability failure", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(404, { error: ["Model not found"] })));

    const err = await new HttpImageProvider(BASE_URL)
      .generate(request, new AbortController().signal)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (err instanceof ProviderError) {
      expect(err.kind).toBe("capability");
      expect(err.message).toBe("http does not serve this model: Model not found");
    }
  });

  it("rejects a 200 response that is not an image", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(200, { generated_text: "hello" })));

    const err = await new HttpImageProvider(BASE_URL)
      .generate(request, new AbortController().signal)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (err instanceof ProviderError) {
      expect(err.kind).toBe("capability");
      expect(err.message).toBe('http returned an unexpected response: expected an image, got "application/json".');
    }
  });

  it("wraps fetch rejections as network failures", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));

    const err = await new HttpImageProvider(BASE_URL)
      .generate(request, new AbortController().signal)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (err instanceof ProviderError) {
      expect(err.kind).toBe("network");
      expect(err.message).toBe("http request failed (network error): fetch failed");
    }
  });
});

// ===========================================================================
// Mock provider
// ===========================================================================

describe("MockImageProvider", () => {
  it("returns a deterministic SVG sized to the request", async () => {
    const provider = new MockImageProvider();
    const first = await provider.generate(request, new AbortController().signal);
    const second = await provider.generate(request, new AbortController().signal);

    expect(first.mimeType).toBe("image/svg+xml");
    expect(first.image.equals(second.image)).toBe(true);
    expect(first.image.toString()).toContain('width="512" height="768"');
    const fill = (hashPrompt("a red fox") % 0xffffff).toString(16).padStart(6, "0");
    expect(first.image.toString()).toContain(`<rect width="100%" height="100%" fill="#${fill}"/>`);
  });

  it("escapes markup in the prompt", async () => {
    const result = await new MockImageProvider().generate(
      { ...request, prompt: "fish & <chips>" },
      new AbortController().signal
    );
    expect(result.image.toString()).toContain(">fish &amp; &lt;chips&gt;</text>");
  });
});

// ===========================================================================
// Factory
// ===========================================================================

describe("createImageProvider / buildCandidates", () => {
  const withToken: CandidateConfig = {
    defaultOrder: ["huggingface", "http"],
    modelOrder: { "black-forest-labs/FLUX.1-schnell": ["http", "mock"] },
    token: "test-token",
    baseUrl: BASE_URL,
  };

  it("creates providers by name, case-insensitively", () => {
    expect(createImageProvider("MOCK", withToken).name).toBe("mock");
    expect(createImageProvider("http", withToken).name).toBe("http");
    expect(createImageProvider("huggingface", withToken).name).toBe("huggingface");
  });

  it("throws for an unknown provider", () => {
    expect(() => createImageProvider("dalle", withToken)).toThrow(/Unknown image provider: "dalle"/);
  });

  it("uses the default order for models without an override", () => {
    const names = buildCandidates("stabilityai/stable-diffusion-2", withToken).map((p) => p.name);
    expect(names).toEqual(["huggingface", "http"]);
  });

  it("uses the per-model order when one is configured", () => {
    const names = buildCandidates("black-forest-labs/FLUX.1-schnell", withToken).map((p) => p.name);
    expect(names).toEqual(["http", "mock"]);
  });

  it("leaves out the authenticated client when no token is configured", () => {
    const names = buildCandidates("stabilityai/stable-diffusion-2", { ...withToken, token: "" }).map(
      (p) => p.name
    );
    expect(names).toEqual(["http"]);
  });

  it("validates configured provider names", () => {
    expect(() => validateProviderConfig(withToken)).not.toThrow();
    expect(() =>
      validateProviderConfig({ ...withToken, modelOrder: { x: ["stability"] } })
    ).toThrow(/Unknown image provider: "stability"/);
  });
});
