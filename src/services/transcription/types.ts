/**
 * Speech-to-text collaborator.
 *
 * Turns recorded audio into prompt text. Providers throw a ServiceError with
 * code TRANSCRIPTION_FAILED when they cannot produce text.
 */

export interface TranscriptionProvider {
  /** Human-readable name of this provider (e.g. "mock", "openai") */
  readonly name: string;

  /**
   * @param audio - Encoded audio (webm, wav, mp3, ...)
   * @param language - ISO-639-1 code, e.g. "en"
   */
  transcribe(audio: Buffer, language: string): Promise<TranscriptionResult>;
}

export interface TranscriptionResult {
  text: string;
  language: string;
  /** Name of the provider that produced this transcript */
  provider: string;
}
