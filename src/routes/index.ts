/**
 * API Route Index
 *
 * All routes are mounted under the /api prefix (set in app.ts).
 *
 * ┌─────────────────────────────────┬────────┬───────────────────────────────────────────┐
 * │ Endpoint                        │ Method │ Description                               │
 * ├─────────────────────────────────┼────────┼───────────────────────────────────────────┤
 * │ /api/health                     │ GET    │ Health check, provider config, memory     │
 * │ /api/models                     │ GET    │ Selectable models and parameter bounds    │
 * ├─────────────────────────────────┼────────┼───────────────────────────────────────────┤
 * │ /api/sessions                   │ POST   │ Start a session; returns session token    │
 * │ /api/sessions/me                │ GET    │ Session auth, quota, gallery size         │
 * │ /api/sessions/login             │ POST   │ Log the session in                        │
 * │ /api/sessions/logout            │ POST   │ Log out and clear the gallery             │
 * ├─────────────────────────────────┼────────┼───────────────────────────────────────────┤
 * │ /api/quota                      │ GET    │ Today's allowance (session)               │
 * │ /api/generate                   │ POST   │ Generate an image (session + login)       │
 * │ /api/gallery                    │ GET    │ Recent images, newest first (session)     │
 * │ /api/gallery/:index/image       │ GET    │ Image bytes; ?download=1 (session)        │
 * │ /api/transcriptions             │ POST   │ Voice recording to prompt text (session)  │
 * ├─────────────────────────────────┼────────┼───────────────────────────────────────────┤
 * │ /api/admin/metrics              │ GET    │ In-memory metrics (X-Admin-Key)           │
 * │ /api/admin/sessions/prune       │ POST   │ Evict idle sessions (X-Admin-Key)         │
 * └─────────────────────────────────┴────────┴───────────────────────────────────────────┘
 *
 * Session routes expect an Authorization: Bearer <session token> header.
 * Error responses follow the shape: { error: { message, code, details? } }
 */

import { Router } from "express";
import { healthRouter } from "./health";
import { modelsRouter } from "./models";
import { sessionsRouter } from "./sessions";
import { quotaRouter } from "./quota";
import { generateRouter } from "./generate";
import { galleryRouter } from "./gallery";
import { transcriptionsRouter } from "./transcriptions";
import { adminRouter } from "./admin";

const router = Router();

router.use("/health", healthRouter);
router.use("/models", modelsRouter);
router.use("/sessions", sessionsRouter);
router.use("/quota", quotaRouter);
router.use("/generate", generateRouter);
router.use("/gallery", galleryRouter);
router.use("/transcriptions", transcriptionsRouter);
router.use("/admin", adminRouter);

export { router };
