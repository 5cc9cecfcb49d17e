/**
 * In-memory session state.
 *
 * Each session owns its quota, gallery and login state. Nothing is shared
 * between sessions and nothing survives a restart. Sessions idle for longer
 * than SESSION_TTL_MINUTES are evicted when new sessions are created.
 *
 * Only one generation pipeline may run per session at a time; routes call
 * tryAcquire/release around a submit.
 */

import { randomUUID } from "crypto";
import { env } from "../config/env";
import { createComponentLogger } from "../config/logger";
import { GalleryStore } from "./gallery/galleryStore";
import { createQuota, toWindowDate, type Quota } from "./quota/quotaTracker";

const log = createComponentLogger("sessionStore");

export interface SessionAuth {
  authenticated: boolean;
  identity?: string;
}

/** The state the orchestrator reads and updates for one submit. */
export interface GenerationState {
  quota: Quota;
  gallery: GalleryStore;
}

export interface SessionState extends GenerationState {
  id: string;
  auth: SessionAuth;
  busy: boolean;
  createdAt: Date;
  lastSeenAt: Date;
}

export interface SessionStoreOptions {
  dailyLimit: number;
  galleryCapacity: number;
  ttlMs: number;
  now?: () => Date;
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly options: SessionStoreOptions;
  private readonly now: () => Date;

  constructor(options: SessionStoreOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  create(): SessionState {
    this.pruneIdle();

    const now = this.now();
    const session: SessionState = {
      id: randomUUID(),
      quota: createQuota(this.options.dailyLimit, toWindowDate(now)),
      gallery: new GalleryStore(this.options.galleryCapacity),
      auth: { authenticated: false },
      busy: false,
      createdAt: now,
      lastSeenAt: now,
    };

    this.sessions.set(session.id, session);
    log.debug("Session created", { sessionId: session.id, active: this.sessions.size });
    return session;
  }

  /** Look up a session and mark it as seen. */
  get(id: string): SessionState | undefined {
    const session = this.sessions.get(id);
    if (session) {
      session.lastSeenAt = this.now();
    }
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  /** Claim the session for one pipeline run. False when one is already running. */
  tryAcquire(session: SessionState): boolean {
    if (session.busy) {
      return false;
    }
    session.busy = true;
    return true;
  }

  release(session: SessionState): void {
    session.busy = false;
  }

  /**
   * Drop sessions idle past the TTL. Busy sessions are kept.
   *
   * @returns number of sessions evicted
   */
  pruneIdle(): number {
    const cutoff = this.now().getTime() - this.options.ttlMs;
    let evicted = 0;

    for (const [id, session] of this.sessions) {
      if (!session.busy && session.lastSeenAt.getTime() < cutoff) {
        this.sessions.delete(id);
        evicted++;
      }
    }

    if (evicted > 0) {
      log.info(`Evicted ${evicted} idle session(s)`, { evicted, active: this.sessions.size });
    }
    return evicted;
  }

  get size(): number {
    return this.sessions.size;
  }
}

export const sessionStore = new SessionStore({
  dailyLimit: env.DAILY_LIMIT,
  galleryCapacity: env.GALLERY_CAPACITY,
  ttlMs: env.SESSION_TTL_MINUTES * 60 * 1000,
});
