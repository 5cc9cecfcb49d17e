/**
 * Type augmentation for Express Request.
 * Adds the properties attached by the request logger and the session
 * middleware.
 */

import type { SessionState } from "../services/sessionStore";

declare global {
  namespace Express {
    interface Request {
      /** Set by requestLogger for log correlation. */
      requestId?: string;
      /** Populated by requireSession after token verification. */
      session?: SessionState;
    }
  }
}
