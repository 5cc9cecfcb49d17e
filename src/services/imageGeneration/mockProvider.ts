/**
 * Mock image generation provider.
 *
 * Returns a placeholder SVG for development and testing without network
 * access. The fill colour is derived from the prompt so the same prompt
 * always yields the same placeholder.
 */

import type { GenerationRequest, ImageGenerationProvider, ImageGenerationResult } from "./types";

/**
 * Simple string hash function that produces a positive integer.
 */
export function hashPrompt(prompt: string): number {
  let hash = 0;
  for (let i = 0; i < prompt.length; i++) {
    const char = prompt.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash |= 0; // Convert to 32-bit integer
  }
  return Math.abs(hash);
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export class MockImageProvider implements ImageGenerationProvider {
  readonly name = "mock";

  async generate(request: GenerationRequest, _signal: AbortSignal): Promise<ImageGenerationResult> {
    const seed = hashPrompt(request.prompt);
    const fill = `#${(seed % 0xffffff).toString(16).padStart(6, "0")}`;
    const { width, height } = request;

    const svg =
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
      `<rect width="100%" height="100%" fill="${fill}"/>` +
      `<text x="50%" y="50%" text-anchor="middle" fill="#ffffff">${escapeXml(request.prompt)}</text>` +
      `</svg>`;

    return {
      image: Buffer.from(svg, "utf8"),
      mimeType: "image/svg+xml",
      provider: this.name,
    };
  }
}
