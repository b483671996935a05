/**
 * Bucket Mark-Read Service
 *
 * Marks one bucket's unread entries as read, or every globally visible entry.
 * "all" goes to the store's global primitive rather than an unbounded range:
 * it also covers entries no bucket reaches, and it doesn't rely on every
 * backend treating empty bounds as "everything".
 */

import type { TZDate } from "@date-fns/tz";
import { logger } from "@/lib/logger";
import {
  ALL_BUCKETS,
  computeBuckets,
  findBucket,
  resolveSelection,
  type BucketScheme,
  type BucketSelection,
} from "@/server/buckets/boundaries";
import type { ReaderStore } from "@/server/entries/query";
import { trackBucketMarkRead } from "@/server/metrics/metrics";

export interface MarkBucketReadParams {
  userId: string;
  /** Bucket name or "all". Unrecognized values mark everything read. */
  selector: string;
  /** Must be the scheme the bucketed view uses */
  scheme: BucketScheme;
  reference: TZDate;
}

export interface MarkBucketReadResult {
  scope: BucketSelection;
  after: Date | null;
  before: Date | null;
  /** Entries that changed from unread to read */
  count: number;
}

export async function markBucketRead(
  store: ReaderStore,
  params: MarkBucketReadParams
): Promise<MarkBucketReadResult> {
  const { userId, selector, scheme, reference } = params;
  const selection = resolveSelection(scheme, selector);

  if (selection === ALL_BUCKETS && selector !== ALL_BUCKETS) {
    logger.info("Unrecognized bucket selector, marking everything read", {
      userId,
      selector,
      scheme,
    });
  }

  const bucket =
    selection === ALL_BUCKETS ? undefined : findBucket(computeBuckets(reference, scheme), selection);

  if (!bucket) {
    const count = await store.markAllGloballyVisibleFeedsRead(userId);
    trackBucketMarkRead(ALL_BUCKETS, count);
    logger.info("Marked all entries read", { userId, count });
    return { scope: ALL_BUCKETS, after: null, before: null, count };
  }

  const count = await store.markEntriesReadInRange(userId, bucket.after, bucket.before);
  trackBucketMarkRead(bucket.name, count);
  logger.info("Marked bucket read", {
    userId,
    bucket: bucket.name,
    after: bucket.after?.toISOString() ?? null,
    before: bucket.before?.toISOString() ?? null,
    count,
  });

  return { scope: bucket.name, after: bucket.after, before: bucket.before, count };
}
