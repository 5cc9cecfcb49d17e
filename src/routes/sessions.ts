/**
 * Session routes.
 *
 * POST /api/sessions        : start a session; returns a session token
 * GET  /api/sessions/me     : session auth, quota and gallery size
 * POST /api/sessions/login  : log the session in through the login provider
 * POST /api/sessions/logout : log out; also clears the session gallery
 */

import { Router, Request, Response, NextFunction } from "express";
import { createComponentLogger } from "../config/logger";
import { currentSession, requireSession, signSessionToken } from "../middleware/auth";
import { sessionLimiter } from "../middleware/rateLimiter";
import { toPublicSession } from "../models/session";
import { getLoginProvider } from "../services/login";
import { toWindowDate } from "../services/quota/quotaTracker";
import { sessionStore } from "../services/sessionStore";

const sessionsRouter = Router();
const log = createComponentLogger("sessions");

function today(): string {
  return toWindowDate(new Date());
}

// ---------------------------------------------------------------------------
// POST /: Start a session
// ---------------------------------------------------------------------------

sessionsRouter.post("/", sessionLimiter, (_req: Request, res: Response) => {
  const session = sessionStore.create();

  res.status(201).json({
    ...toPublicSession(session, today()),
    token: signSessionToken(session.id),
  });
});

// ---------------------------------------------------------------------------
// GET /me: Current session
// ---------------------------------------------------------------------------

sessionsRouter.get("/me", requireSession, (req: Request, res: Response) => {
  res.status(200).json(toPublicSession(currentSession(req), today()));
});

// ---------------------------------------------------------------------------
// POST /login
// ---------------------------------------------------------------------------

sessionsRouter.post(
  "/login",
  requireSession,
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const session = currentSession(req);
      const body: { username?: unknown } = req.body ?? {};
      const username = body.username;

      const result = await getLoginProvider().login({
        username: typeof username === "string" ? username : undefined,
      });

      session.auth = { authenticated: true, identity: result.identity };
      log.info("Session logged in", {
        sessionId: session.id,
        identity: result.identity,
        provider: result.provider,
      });

      res.status(200).json({ auth: session.auth });
    } catch (err: unknown) {
      next(err);
    }
  }
);

// ---------------------------------------------------------------------------
// POST /logout
// ---------------------------------------------------------------------------

sessionsRouter.post("/logout", requireSession, (req: Request, res: Response) => {
  const session = currentSession(req);

  session.auth = { authenticated: false };
  session.gallery.clear();

  res.status(200).json({ auth: session.auth });
});

export { sessionsRouter };
