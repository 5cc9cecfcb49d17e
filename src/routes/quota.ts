/**
 * GET /api/quota: today's generation allowance for the session.
 */

import { Router, Request, Response } from "express";
import { currentSession, requireSession } from "../middleware/auth";
import { toPublicQuota } from "../models/session";
import { toWindowDate } from "../services/quota/quotaTracker";

const quotaRouter = Router();

quotaRouter.get("/", requireSession, (req: Request, res: Response) => {
  const session = currentSession(req);
  res.status(200).json(toPublicQuota(session.quota, toWindowDate(new Date())));
});

export { quotaRouter };
