/**
 * Admin routes. All require the X-Admin-Key header.
 *
 * Endpoints:
 *   GET  /api/admin/metrics         -- In-memory application metrics
 *   POST /api/admin/sessions/prune  -- Evict idle sessions now
 */

import { Router, Request, Response } from "express";
import { logger } from "../config/logger";
import { requireAdminKey } from "../middleware/auth";
import { monitoringService } from "../services/monitoringService";
import { sessionStore } from "../services/sessionStore";

const adminRouter = Router();

adminRouter.use(requireAdminKey);

/**
 * GET /api/admin/metrics
 */
adminRouter.get("/metrics", (_req: Request, res: Response) => {
  res.json({
    ...monitoringService.getMetrics(),
    activeSessions: sessionStore.size,
  });
});

/**
 * POST /api/admin/sessions/prune
 *
 * Sessions are also pruned whenever a new one is created; this forces a
 * sweep without waiting for that.
 */
adminRouter.post("/sessions/prune", (_req: Request, res: Response) => {
  const evicted = sessionStore.pruneIdle();
  logger.info("admin", "Manual session prune", { evicted });

  res.json({ evicted, activeSessions: sessionStore.size });
});

export { adminRouter };
