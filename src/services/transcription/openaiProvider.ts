/**
 * OpenAI transcription provider.
 *
 * Calls the OpenAI audio transcription API directly via fetch (no SDK
 * dependency). Requires OPENAI_API_KEY when TRANSCRIPTION_PROVIDER=openai.
 */

import { env } from "../../config/env";
import { ServiceError } from "../../types/errors";
import type { TranscriptionProvider, TranscriptionResult } from "./types";

/** OpenAI audio transcription endpoint */
const OPENAI_TRANSCRIPTIONS_URL = "https://api.openai.com/v1/audio/transcriptions";

const MODEL = "whisper-1";

function readText(json: unknown): string | null {
  if (typeof json === "object" && json !== null && "text" in json && typeof json.text === "string") {
    return json.text;
  }
  return null;
}

export class OpenAITranscriptionProvider implements TranscriptionProvider {
  readonly name = "openai";
  private readonly apiKey: string;

  constructor(apiKey: string = env.OPENAI_API_KEY) {
    if (!apiKey || apiKey.trim() === "") {
      throw new Error(
        "OPENAI_API_KEY is required when TRANSCRIPTION_PROVIDER=openai. " +
          "Set OPENAI_API_KEY in your .env file or environment, " +
          "or use TRANSCRIPTION_PROVIDER=mock for development."
      );
    }

    this.apiKey = apiKey;
  }

  async transcribe(audio: Buffer, language: string): Promise<TranscriptionResult> {
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(audio)]), "recording.webm");
    form.append("model", MODEL);
    form.append("language", language);

    let response: Response;

    try {
      response = await fetch(OPENAI_TRANSCRIPTIONS_URL, {
        method: "POST",
        headers: { Authorization: `Bearer ${this.apiKey}` },
        body: form,
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : "Unknown network error";
      throw new ServiceError(
        `OpenAI transcription request failed (network error): ${message}`,
        502,
        "TRANSCRIPTION_FAILED"
      );
    }

    if (!response.ok) {
      throw new ServiceError(
        `OpenAI transcription error (HTTP ${response.status} ${response.statusText})`,
        502,
        "TRANSCRIPTION_FAILED"
      );
    }

    const text = readText(await response.json());
    if (text === null) {
      throw new ServiceError(
        "OpenAI transcription returned an unexpected response: no text in response.",
        502,
        "TRANSCRIPTION_FAILED"
      );
    }

    return { text: text.trim(), language, provider: this.name };
  }
}
