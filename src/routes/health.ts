/**
 * Health check endpoint.
 *
 * Response shape:
 *   {
 *     status: "ok",
 *     timestamp: string,
 *     uptime: number,
 *     providers: { image: string[], credentialConfigured: boolean, transcription: string },
 *     sessions: { active: number },
 *     memory: { rss, heapUsed, heapTotal, external } (all in MB)
 *   }
 */

import { Router, Request, Response } from "express";
import { env, hasHuggingFaceToken } from "../config/env";
import { sessionStore } from "../services/sessionStore";

const healthRouter = Router();

healthRouter.get("/", (_req: Request, res: Response) => {
  const mem = process.memoryUsage();
  const toMB = (bytes: number) => Math.round((bytes / 1024 / 1024) * 100) / 100;

  res.status(200).json({
    status: "ok",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    providers: {
      image: env.IMAGE_PROVIDERS,
      credentialConfigured: hasHuggingFaceToken(),
      transcription: env.TRANSCRIPTION_PROVIDER,
    },
    sessions: {
      active: sessionStore.size,
    },
    memory: {
      rss: toMB(mem.rss),
      heapUsed: toMB(mem.heapUsed),
      heapTotal: toMB(mem.heapTotal),
      external: toMB(mem.external),
    },
  });
});

export { healthRouter };
