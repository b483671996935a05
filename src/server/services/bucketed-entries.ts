/**
 * Bucketed Entries Service
 *
 * Builds the unread view grouped by age. Every bucket is counted (navigation
 * shows all the counts) while entries are fetched only for the selected
 * bucket, or for every bucket when the selection is "all".
 *
 * Store calls are made one after another. The first failure aborts the view
 * and is rethrown as-is; callers never see partial results.
 */

import type { TZDate } from "@date-fns/tz";
import { logger } from "@/lib/logger";
import {
  ALL_BUCKETS,
  computeBuckets,
  defaultBucket,
  resolveSelection,
  type BucketInterval,
  type BucketScheme,
  type BucketSelection,
} from "@/server/buckets/boundaries";
import type { EntryListItem, EntryQuery, ReaderStore, ReaderUser } from "@/server/entries/query";
import { startBucketViewTimer } from "@/server/metrics/metrics";

// ============================================================================
// Types
// ============================================================================

export interface BucketedViewParams {
  user: ReaderUser;
  scheme: BucketScheme;
  /** Current instant in the user's timezone */
  reference: TZDate;
  /** Bucket name or "all"; defaults to the scheme's default bucket */
  selector?: string;
}

export interface BucketSummary extends BucketInterval {
  count: number;
  /** Null when the bucket was not selected */
  entries: EntryListItem[] | null;
}

export interface BucketedView {
  scheme: BucketScheme;
  referenceInstant: Date;
  selection: BucketSelection;
  buckets: BucketSummary[];
  totalUnread: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Unread, globally visible entries inside a bucket's interval.
 */
function unreadInBucket(store: ReaderStore, userId: string, bucket: BucketInterval): EntryQuery {
  const query = store.newQuery(userId).withUnreadStatus().withGloballyVisible();
  if (bucket.after !== null) {
    query.after(bucket.after);
  }
  if (bucket.before !== null) {
    query.before(bucket.before);
  }
  return query;
}

// ============================================================================
// Service Functions
// ============================================================================

/**
 * Counts every bucket and fetches the selected bucket's entries.
 *
 * Entries are sorted by the user's preferred column, then by id in the same
 * direction so equal sort keys keep a stable order.
 */
export async function getBucketedView(
  store: ReaderStore,
  params: BucketedViewParams
): Promise<BucketedView> {
  const { user, scheme, reference } = params;
  const selection = resolveSelection(scheme, params.selector ?? defaultBucket(scheme));
  const stopTimer = startBucketViewTimer(scheme, selection);

  const summaries: BucketSummary[] = [];
  try {
    for (const bucket of computeBuckets(reference, scheme)) {
      const count = await unreadInBucket(store, user.id, bucket).count();
      summaries.push({ ...bucket, count, entries: null });
    }

    for (const summary of summaries) {
      if (selection !== ALL_BUCKETS && summary.name !== selection) {
        continue;
      }
      summary.entries = await unreadInBucket(store, user.id, summary)
        .withSort(user.entryOrder, user.entryDirection)
        .withSort("id", user.entryDirection)
        .fetch();
    }
  } finally {
    stopTimer();
  }

  const totalUnread = summaries.reduce((sum, summary) => sum + summary.count, 0);

  logger.debug("Built bucketed view", {
    userId: user.id,
    scheme,
    selection,
    totalUnread,
  });

  return {
    scheme,
    referenceInstant: new Date(reference.getTime()),
    selection,
    buckets: summaries,
    totalUnread,
  };
}

/**
 * Counts unread, globally visible entries with no date filter.
 * Equals the sum of the bucket counts for any reference instant.
 */
export async function countUnread(store: ReaderStore, userId: string): Promise<number> {
  return store.newQuery(userId).withUnreadStatus().withGloballyVisible().count();
}
