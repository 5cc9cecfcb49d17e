import { describe, it, expect } from "vitest";
import { SessionStore } from "../services/sessionStore";

function clock(start: string) {
  let current = new Date(start);
  return {
    now: () => current,
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
  };
}

const MINUTE = 60 * 1000;

describe("SessionStore", () => {
  it("creates logged-out sessions with their own quota and gallery", () => {
    const c = clock("2026-10-19T08:00:00.000Z");
    const store = new SessionStore({ dailyLimit: 10, galleryCapacity: 5, ttlMs: 30 * MINUTE, now: c.now });

    const a = store.create();
    const b = store.create();

    expect(a.id).not.toBe(b.id);
    expect(a.auth).toEqual({ authenticated: false });
    expect(a.quota).toEqual({ count: 0, windowDate: "2026-10-19", limit: 10 });
    expect(a.gallery).not.toBe(b.gallery);
    expect(a.gallery.capacity).toBe(5);
    expect(store.size).toBe(2);
  });

  it("allows one pipeline at a time per session", () => {
    const store = new SessionStore({ dailyLimit: 10, galleryCapacity: 5, ttlMs: 30 * MINUTE });
    const session = store.create();

    expect(store.tryAcquire(session)).toBe(true);
    expect(store.tryAcquire(session)).toBe(false);

    store.release(session);
    expect(store.tryAcquire(session)).toBe(true);
  });

  it("evicts sessions idle past the TTL but keeps busy and recently seen ones", () => {
    const c = clock("2026-10-19T08:00:00.000Z");
    const store = new SessionStore({ dailyLimit: 10, galleryCapacity: 5, ttlMs: 30 * MINUTE, now: c.now });

    const idle = store.create();
    const busy = store.create();
    const seen = store.create();
    store.tryAcquire(busy);

    c.advance(20 * MINUTE);
    store.get(seen.id);
    c.advance(20 * MINUTE);

    expect(store.pruneIdle()).toBe(1);
    expect(store.get(idle.id)).toBeUndefined();
    expect(store.get(busy.id)).toBe(busy);
    expect(store.get(seen.id)).toBe(seen);
  });

  it("prunes before creating a new session", () => {
    const c = clock("2026-10-19T08:00:00.000Z");
    const store = new SessionStore({ dailyLimit: 10, galleryCapacity: 5, ttlMs: 30 * MINUTE, now: c.now });

    store.create();
    c.advance(31 * MINUTE);
    store.create();

    expect(store.size).toBe(1);
  });

  it("deletes a session by id", () => {
    const store = new SessionStore({ dailyLimit: 10, galleryCapacity: 5, ttlMs: 30 * MINUTE });
    const session = store.create();

    expect(store.delete(session.id)).toBe(true);
    expect(store.get(session.id)).toBeUndefined();
    expect(store.delete(session.id)).toBe(false);
  });
});
