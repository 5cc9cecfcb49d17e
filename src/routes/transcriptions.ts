/**
 * POST /api/transcriptions: turn a voice recording into prompt text.
 *
 * Body: { audio: base64 string, language?: ISO-639-1 code (default "en") }
 * The transcript is returned for the user to review; it is not submitted
 * for generation automatically.
 */

import { Router, Request, Response, NextFunction } from "express";
import { requireSession } from "../middleware/auth";
import { transcriptionLimiter } from "../middleware/rateLimiter";
import { getTranscriptionProvider } from "../services/transcription";

const transcriptionsRouter = Router();

const LANGUAGE_RE = /^[a-z]{2}$/;
const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

transcriptionsRouter.post(
  "/",
  transcriptionLimiter,
  requireSession,
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: { audio?: unknown; language?: unknown } = req.body ?? {};
      const errors: { field: string; message: string }[] = [];

      if (typeof body.audio !== "string" || body.audio === "" || !BASE64_RE.test(body.audio)) {
        errors.push({ field: "audio", message: "Audio must be a non-empty base64 string" });
      }

      const language = body.language === undefined ? "en" : body.language;
      if (typeof language !== "string" || !LANGUAGE_RE.test(language)) {
        errors.push({ field: "language", message: "Language must be a two-letter code" });
      }

      if (errors.length > 0 || typeof body.audio !== "string" || typeof language !== "string") {
        res.status(400).json({
          error: {
            message: "Validation failed",
            code: "VALIDATION_ERROR",
            details: errors,
          },
        });
        return;
      }

      const audio = Buffer.from(body.audio, "base64");
      const result = await getTranscriptionProvider().transcribe(audio, language);

      res.status(200).json({
        text: result.text,
        language: result.language,
        provider: result.provider,
      });
    } catch (err: unknown) {
      next(err);
    }
  }
);

export { transcriptionsRouter };
