/**
 * Mock transcription provider.
 *
 * Picks one of a few fixed prompts based on the audio length, so the same
 * recording always yields the same text.
 */

import { ServiceError } from "../../types/errors";
import type { TranscriptionProvider, TranscriptionResult } from "./types";

export const PLACEHOLDER_TRANSCRIPTS = [
  "a lighthouse on a rocky coast at sunset",
  "a cat wearing a tiny astronaut helmet",
  "a watercolor painting of a quiet mountain village",
  "a neon-lit street market in the rain",
] as const;

export class MockTranscriptionProvider implements TranscriptionProvider {
  readonly name = "mock";

  async transcribe(audio: Buffer, language: string): Promise<TranscriptionResult> {
    if (audio.length === 0) {
      throw new ServiceError("No audio was recorded.", 400, "TRANSCRIPTION_FAILED");
    }

    return {
      text: PLACEHOLDER_TRANSCRIPTS[audio.length % PLACEHOLDER_TRANSCRIPTS.length],
      language,
      provider: this.name,
    };
  }
}
