/**
 * In-memory monitoring service.
 *
 * Counters accumulate in memory and reset on restart. Called from request
 * middleware, the error handler, the provider chain and the orchestrator.
 */

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

let requestCount = 0;
let errorCount = 0;
let totalResponseTimeMs = 0;
let generationCount = 0;
let generationFailureCount = 0;
let quotaRejectionCount = 0;
let lastGenerationTime: Date | null = null;
const providerFailures: Record<string, number> = {};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

function recordRequest(durationMs: number): void {
  requestCount++;
  totalResponseTimeMs += durationMs;
}

function recordError(): void {
  errorCount++;
}

function recordGeneration(succeeded: boolean): void {
  if (succeeded) {
    generationCount++;
    lastGenerationTime = new Date();
  } else {
    generationFailureCount++;
  }
}

function recordQuotaRejection(): void {
  quotaRejectionCount++;
}

/**
 * Record one failed candidate attempt, keyed by provider name.
 */
function recordProviderFailure(provider: string): void {
  providerFailures[provider] = (providerFailures[provider] ?? 0) + 1;
}

/**
 * Get a snapshot of all current metrics.
 */
function getMetrics(): {
  requestCount: number;
  errorCount: number;
  avgResponseTimeMs: number;
  uptime: number;
  generationCount: number;
  generationFailureCount: number;
  quotaRejectionCount: number;
  providerFailures: Record<string, number>;
  lastGenerationTime: string | null;
} {
  const avgResponseTimeMs =
    requestCount > 0
      ? Math.round((totalResponseTimeMs / requestCount) * 100) / 100
      : 0;

  return {
    requestCount,
    errorCount,
    avgResponseTimeMs,
    uptime: process.uptime(),
    generationCount,
    generationFailureCount,
    quotaRejectionCount,
    providerFailures: { ...providerFailures },
    lastGenerationTime: lastGenerationTime?.toISOString() ?? null,
  };
}

/**
 * Reset all metrics to initial values (useful for testing).
 */
function resetMetrics(): void {
  requestCount = 0;
  errorCount = 0;
  totalResponseTimeMs = 0;
  generationCount = 0;
  generationFailureCount = 0;
  quotaRejectionCount = 0;
  lastGenerationTime = null;
  for (const key of Object.keys(providerFailures)) {
    delete providerFailures[key];
  }
}

export const monitoringService = {
  recordRequest,
  recordError,
  recordGeneration,
  recordQuotaRejection,
  recordProviderFailure,
  getMetrics,
  resetMetrics,
};
