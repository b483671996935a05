/**
 * Entry Store Contracts
 *
 * The bucket services never talk to Postgres directly. They build queries
 * through these interfaces so the same code runs against the drizzle store in
 * production and an in-memory store in tests.
 */

// ============================================================================
// Types
// ============================================================================

export type SortColumn = "publishedAt" | "fetchedAt" | "title" | "id";

export type SortDirection = "asc" | "desc";

/**
 * Columns a user may pick as their primary entry sort.
 */
export const USER_SORT_COLUMNS = ["publishedAt", "fetchedAt", "title"] as const;

export type UserSortColumn = (typeof USER_SORT_COLUMNS)[number];

/**
 * The preferences every bucket operation depends on, passed explicitly.
 */
export interface ReaderUser {
  id: string;
  /** IANA timezone name */
  timezone: string;
  entryOrder: UserSortColumn;
  entryDirection: SortDirection;
}

export interface EntryListItem {
  id: string;
  feedId: string;
  subscriptionId: string;
  url: string | null;
  title: string | null;
  author: string | null;
  summary: string | null;
  publishedAt: Date | null;
  fetchedAt: Date;
  read: boolean;
  feedTitle: string | null;
}

export interface StoredSession {
  id: string;
  userId: string;
  expiresAt: Date;
  revokedAt: Date | null;
}

/**
 * Chainable entry query, scoped to one user.
 *
 * Time bounds apply to the entry's publication timestamp (falling back to
 * when it was fetched): `after` is inclusive, `before` exclusive. Sort
 * clauses apply in call order.
 */
export interface EntryQuery {
  withUnreadStatus(): this;
  withGloballyVisible(): this;
  withSort(column: SortColumn, direction: SortDirection): this;
  after(timestamp: Date): this;
  before(timestamp: Date): this;
  count(): Promise<number>;
  fetch(): Promise<EntryListItem[]>;
}

/**
 * Storage collaborator used by the bucket services and the API context.
 */
export interface ReaderStore {
  newQuery(userId: string): EntryQuery;

  findUser(userId: string): Promise<ReaderUser | null>;

  findSession(tokenHash: string): Promise<StoredSession | null>;

  /**
   * Marks unread, globally visible entries published in `[after, before)` as
   * read. A null bound is unbounded. Resolves to the number of entries changed.
   */
  markEntriesReadInRange(userId: string, after: Date | null, before: Date | null): Promise<number>;

  /**
   * Marks every unread entry of every globally visible subscription as read.
   * Resolves to the number of entries changed.
   */
  markAllGloballyVisibleFeedsRead(userId: string): Promise<number>;
}

/**
 * Timestamp used for bucketing: published date, or fetch time when the feed
 * gave none.
 */
export function entryTimestamp(entry: Pick<EntryListItem, "publishedAt" | "fetchedAt">): Date {
  return entry.publishedAt ?? entry.fetchedAt;
}
