import { Registry, collectDefaultMetrics, Counter, Histogram } from "prom-client";

/**
 * Prometheus Metrics Registry
 *
 * Metrics are only collected when METRICS_ENABLED=true, so self-hosters who
 * don't scrape pay nothing for them.
 */

export const metricsEnabled = process.env.METRICS_ENABLED === "true";

/**
 * Shared Prometheus registry for all metrics.
 */
export const registry = new Registry();

if (metricsEnabled) {
  collectDefaultMetrics({ register: registry });
}

// ============================================================================
// HTTP Metrics
// ============================================================================

/**
 * Counter for total API requests.
 * Labels: method, path (tRPC procedure path), status (HTTP status code)
 */
export const httpRequestsTotal = metricsEnabled
  ? new Counter({
      name: "http_requests_total",
      help: "Total HTTP requests",
      labelNames: ["method", "path", "status"] as const,
      registers: [registry],
    })
  : null;

// ============================================================================
// Bucket Metrics
// ============================================================================

/**
 * Histogram for bucketed view duration in seconds, including every count and
 * fetch round-trip. Failed views are observed too.
 * Labels: scheme, selection ("all" or a bucket name)
 */
export const bucketViewDurationSeconds = metricsEnabled
  ? new Histogram({
      name: "bucket_view_duration_seconds",
      help: "Time to build a bucketed unread view",
      labelNames: ["scheme", "selection"] as const,
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
      registers: [registry],
    })
  : null;

/**
 * Counter for bucket mark-read operations.
 * Labels: scope ("all" or a bucket name)
 */
export const bucketMarkReadTotal = metricsEnabled
  ? new Counter({
      name: "bucket_mark_read_total",
      help: "Bucket mark-read operations",
      labelNames: ["scope"] as const,
      registers: [registry],
    })
  : null;

/**
 * Counter for entries flipped from unread to read by bucket mark-read.
 */
export const bucketEntriesMarkedReadTotal = metricsEnabled
  ? new Counter({
      name: "bucket_entries_marked_read_total",
      help: "Entries marked read through bucket mark-read",
      labelNames: ["scope"] as const,
      registers: [registry],
    })
  : null;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Track an API request.
 *
 * @param path - tRPC procedure path (e.g. buckets.view)
 */
export function trackHttpRequest(method: string, path: string, status: number): void {
  if (!metricsEnabled) return;

  httpRequestsTotal?.inc({ method, path, status: String(status) });
}

/**
 * Creates a timer for a bucketed view.
 * Returns a no-op function when metrics are disabled.
 */
export function startBucketViewTimer(scheme: string, selection: string): () => void {
  if (!metricsEnabled) {
    return () => {};
  }

  const startTime = performance.now();

  return () => {
    const durationSeconds = (performance.now() - startTime) / 1000;
    bucketViewDurationSeconds?.observe({ scheme, selection }, durationSeconds);
  };
}

/**
 * Track a completed bucket mark-read.
 */
export function trackBucketMarkRead(scope: string, entriesMarked: number): void {
  if (!metricsEnabled) return;

  bucketMarkReadTotal?.inc({ scope });
  bucketEntriesMarkedReadTotal?.inc({ scope }, entriesMarked);
}
