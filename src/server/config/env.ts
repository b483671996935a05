/**
 * Environment Configuration
 *
 * Centralized access to environment variables with type safety.
 */

import { BUCKET_SCHEMES, type BucketScheme } from "@/server/buckets/boundaries";

/**
 * Parses a positive integer, falling back to the default for missing or
 * invalid values.
 */
export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Resolves the deployment's bucket scheme.
 * The same scheme drives both the bucketed view and bucket mark-read, so an
 * unknown value is a startup error rather than a silent default.
 */
export function parseBucketScheme(value: string | undefined): BucketScheme {
  if (value === undefined || value === "") {
    return "rolling";
  }
  const scheme = BUCKET_SCHEMES.find((candidate) => candidate === value);
  if (!scheme) {
    throw new Error(
      `Invalid BUCKET_SCHEME "${value}" (expected one of: ${BUCKET_SCHEMES.join(", ")})`
    );
  }
  return scheme;
}

/**
 * Bucket configuration.
 * BUCKET_SCHEME=calendar snaps buckets to local midnight/week/month;
 * the default "rolling" uses fixed offsets from the current instant.
 */
export const bucketConfig = {
  scheme: parseBucketScheme(process.env.BUCKET_SCHEME),
};

/**
 * HTTP server configuration.
 */
export const serverConfig = {
  /** Bind address (default: 0.0.0.0) */
  hostname: process.env.HOSTNAME || "0.0.0.0",

  /** API port (default: 3000) */
  port: parsePositiveInt(process.env.PORT, 3000),

  /** Internal Prometheus port (default: 9091) */
  metricsPort: parsePositiveInt(process.env.METRICS_PORT, 9091),
};
