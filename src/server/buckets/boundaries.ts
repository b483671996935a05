/**
 * Bucket Boundaries
 *
 * Turns a reference instant into the ordered set of half-open intervals used
 * to group unread entries by age. Each scheme is described by its bucket names
 * and the lower bound of every bucket except the oldest; intervals are derived
 * from that list, so counting, listing and marking read all share the same
 * arithmetic.
 *
 * Buckets are ordered newest first. The newest bucket has no upper bound and
 * the oldest has no lower bound, so every instant falls in exactly one bucket.
 * Lower bounds are inclusive and upper bounds exclusive: an entry published
 * exactly on a boundary belongs to the newer bucket.
 */

import type { TZDate } from "@date-fns/tz";
import { startOfDay, startOfMonth, startOfWeek, subDays, subHours } from "date-fns";

// ============================================================================
// Types
// ============================================================================

export const BUCKET_SCHEMES = ["rolling", "calendar"] as const;

/**
 * How boundaries are derived from the reference instant.
 * - rolling: fixed offsets (24h, 48h, 7d, 30d) from the instant itself
 * - calendar: local midnight, local week start (Sunday) and local month start
 */
export type BucketScheme = (typeof BUCKET_SCHEMES)[number];

export const ROLLING_BUCKETS = ["today", "last2d", "last7d", "last30d", "earlier"] as const;
export const CALENDAR_BUCKETS = ["today", "yesterday", "week", "month", "earlier"] as const;

export type RollingBucketName = (typeof ROLLING_BUCKETS)[number];
export type CalendarBucketName = (typeof CALENDAR_BUCKETS)[number];
export type BucketName = RollingBucketName | CalendarBucketName;

/**
 * Selector value meaning "every bucket".
 */
export const ALL_BUCKETS = "all";

export type BucketSelection = BucketName | typeof ALL_BUCKETS;

/**
 * A named half-open interval `[after, before)`.
 * A null bound is unbounded on that side.
 */
export interface BucketInterval {
  name: BucketName;
  after: Date | null;
  before: Date | null;
}

interface SchemeDefinition {
  names: readonly BucketName[];
  /** Lower bound of each bucket except the oldest, newest first. */
  boundaries: (reference: TZDate) => Date[];
}

// ============================================================================
// Schemes
// ============================================================================

const HOURS_PER_DAY = 24;

const SCHEMES: Record<BucketScheme, SchemeDefinition> = {
  rolling: {
    names: ROLLING_BUCKETS,
    boundaries: (reference) => [
      subHours(reference, HOURS_PER_DAY),
      subHours(reference, 2 * HOURS_PER_DAY),
      subHours(reference, 7 * HOURS_PER_DAY),
      subHours(reference, 30 * HOURS_PER_DAY),
    ],
  },
  calendar: {
    names: CALENDAR_BUCKETS,
    boundaries: (reference) => {
      const todayStart = startOfDay(reference);
      return [
        todayStart,
        subDays(todayStart, 1),
        startOfWeek(todayStart, { weekStartsOn: 0 }),
        startOfMonth(todayStart),
      ];
    },
  },
};

/**
 * Makes boundaries non-increasing.
 *
 * Calendar boundaries can cross: on a Sunday the week starts after yesterday's
 * midnight, and early in a month the month starts after the week does. An
 * older boundary is clamped to the newer one, which leaves that bucket empty
 * instead of overlapping its neighbour.
 */
function clampBoundaries(boundaries: Date[]): Date[] {
  const clamped: Date[] = [];
  for (const boundary of boundaries) {
    const newer = clamped.at(-1);
    const time =
      newer !== undefined && newer.getTime() < boundary.getTime()
        ? newer.getTime()
        : boundary.getTime();
    clamped.push(new Date(time));
  }
  return clamped;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Computes the bucket set for a reference instant.
 *
 * The reference must already carry the user's timezone; calendar boundaries
 * are taken in that zone.
 */
export function computeBuckets(reference: TZDate, scheme: BucketScheme): BucketInterval[] {
  const definition = SCHEMES[scheme];
  const bounds = clampBoundaries(definition.boundaries(reference));

  return definition.names.map((name, index) => ({
    name,
    after: index < bounds.length ? bounds[index] : null,
    before: index === 0 ? null : bounds[index - 1],
  }));
}

export function bucketNames(scheme: BucketScheme): readonly BucketName[] {
  return SCHEMES[scheme].names;
}

/**
 * The bucket shown when the caller does not pick one.
 */
export function defaultBucket(scheme: BucketScheme): BucketName {
  return SCHEMES[scheme].names[0];
}

export function isBucketName(scheme: BucketScheme, value: string): value is BucketName {
  return SCHEMES[scheme].names.some((name) => name === value);
}

/**
 * Maps a raw selector onto the scheme's vocabulary.
 * Anything that is not one of the scheme's bucket names selects every bucket.
 */
export function resolveSelection(scheme: BucketScheme, selector: string): BucketSelection {
  return isBucketName(scheme, selector) ? selector : ALL_BUCKETS;
}

export function findBucket(
  buckets: readonly BucketInterval[],
  name: BucketName
): BucketInterval | undefined {
  return buckets.find((bucket) => bucket.name === name);
}

/**
 * True if `instant` lies in `[after, before)`.
 */
export function intervalContains(interval: BucketInterval, instant: Date): boolean {
  const time = instant.getTime();
  if (interval.after !== null && time < interval.after.getTime()) {
    return false;
  }
  if (interval.before !== null && time >= interval.before.getTime()) {
    return false;
  }
  return true;
}

/**
 * Returns the bucket whose interval contains `instant`.
 */
export function bucketContaining(buckets: readonly BucketInterval[], instant: Date): BucketInterval {
  const bucket = buckets.find((candidate) => intervalContains(candidate, instant));
  if (!bucket) {
    throw new Error(`Bucket set does not cover ${instant.toISOString()}`);
  }
  return bucket;
}
