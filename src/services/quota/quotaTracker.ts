/**
 * Daily generation quota.
 *
 * A quota counts generation requests within one UTC calendar day. The window
 * resets lazily: any operation that sees a windowDate other than today treats
 * the count as zero before checking the limit.
 *
 * Quota values are immutable; tryConsume returns the next state and the
 * caller stores it on the session.
 */

export interface Quota {
  /** Requests consumed in the current window */
  count: number;
  /** UTC calendar day the count applies to, "YYYY-MM-DD" */
  windowDate: string;
  /** Ceiling for the window; a value ≤ 0 denies every request */
  limit: number;
}

export type ConsumeResult =
  | { allowed: true; quota: Quota }
  | { allowed: false; quota: Quota; remaining: 0 };

/** UTC calendar day for an instant, e.g. "2026-10-19". */
export function toWindowDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

export function createQuota(limit: number, today: string): Quota {
  return { count: 0, windowDate: today, limit };
}

/** Reset the count when the window has rolled over. */
export function normalize(quota: Quota, today: string): Quota {
  if (quota.windowDate === today) {
    return quota;
  }
  return { count: 0, windowDate: today, limit: quota.limit };
}

/** Only a positive integer limit grants anything. */
function hasUsableLimit(quota: Quota): boolean {
  return Number.isInteger(quota.limit) && quota.limit > 0;
}

/**
 * Consume one unit of quota.
 *
 * Normalization happens before the limit check so a new day always grants a
 * fresh allowance. A denied call never consumes.
 */
export function tryConsume(quota: Quota, today: string): ConsumeResult {
  const current = normalize(quota, today);

  if (!hasUsableLimit(current) || !(current.count < current.limit)) {
    return { allowed: false, quota: current, remaining: 0 };
  }

  return {
    allowed: true,
    quota: { ...current, count: current.count + 1 },
  };
}

export function remaining(quota: Quota, today: string): number {
  const current = normalize(quota, today);
  if (!hasUsableLimit(current)) {
    return 0;
  }
  return Math.max(0, current.limit - current.count);
}
