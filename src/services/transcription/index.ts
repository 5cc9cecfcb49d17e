/**
 * Transcription service: factory and re-exports.
 *
 * Usage:
 *   const provider = getTranscriptionProvider();
 *   const { text } = await provider.transcribe(audio, "en");
 */

import { env } from "../../config/env";
import { MockTranscriptionProvider } from "./mockProvider";
import { OpenAITranscriptionProvider } from "./openaiProvider";
import type { TranscriptionProvider } from "./types";

export type { TranscriptionProvider, TranscriptionResult } from "./types";

/**
 * Create a transcription provider by name.
 *
 * @throws Error if the provider name is not recognized
 */
export function createTranscriptionProvider(providerName: string): TranscriptionProvider {
  switch (providerName.toLowerCase()) {
    case "mock":
      return new MockTranscriptionProvider();

    case "openai":
      return new OpenAITranscriptionProvider();

    default:
      throw new Error(
        `Unknown transcription provider: "${providerName}". Supported providers: mock, openai`
      );
  }
}

let cached: TranscriptionProvider | null = null;

/**
 * Get the transcription provider based on TRANSCRIPTION_PROVIDER.
 * Created on first use so a missing key only matters once voice input is used.
 */
export function getTranscriptionProvider(): TranscriptionProvider {
  if (!cached) {
    cached = createTranscriptionProvider(env.TRANSCRIPTION_PROVIDER);
  }
  return cached;
}
