/**
 * Drizzle Entry Store
 *
 * Postgres implementation of the entry store contracts. Every query is scoped
 * to one user through user_entries and the user's active subscriptions.
 */

import { and, asc, desc, eq, gte, inArray, isNull, lt, sql, type SQL } from "drizzle-orm";
import type { Database } from "@/server/db";
import { entries, feeds, sessions, subscriptions, userEntries, users } from "@/server/db/schema";
import type {
  EntryListItem,
  EntryQuery,
  ReaderStore,
  ReaderUser,
  SortColumn,
  SortDirection,
  StoredSession,
} from "./query";

// ============================================================================
// Shared SQL fragments
// ============================================================================

/**
 * Publication timestamp used for bucketing.
 */
const entryTimestampSql = sql`COALESCE(${entries.publishedAt}, ${entries.fetchedAt})`;

function sortExpression(column: SortColumn) {
  switch (column) {
    case "publishedAt":
      return entryTimestampSql;
    case "fetchedAt":
      return entries.fetchedAt;
    case "title":
      return entries.title;
    case "id":
      return entries.id;
  }
}

function timeRangeConditions(after: Date | null, before: Date | null): SQL[] {
  const conditions: SQL[] = [];
  if (after !== null) {
    conditions.push(gte(entryTimestampSql, after));
  }
  if (before !== null) {
    conditions.push(lt(entryTimestampSql, before));
  }
  return conditions;
}

/**
 * Join condition for the user's active subscription to an entry's feed.
 */
function activeSubscriptionJoin(userId: string) {
  return and(
    eq(subscriptions.feedId, entries.feedId),
    eq(subscriptions.userId, userId),
    isNull(subscriptions.unsubscribedAt)
  );
}

// ============================================================================
// Query builder
// ============================================================================

interface SortClause {
  column: SortColumn;
  direction: SortDirection;
}

export class DrizzleEntryQuery implements EntryQuery {
  private unreadOnly = false;
  private globallyVisibleOnly = false;
  private readonly sorts: SortClause[] = [];
  private afterDate: Date | null = null;
  private beforeDate: Date | null = null;

  constructor(
    private readonly db: Database,
    private readonly userId: string
  ) {}

  withUnreadStatus(): this {
    this.unreadOnly = true;
    return this;
  }

  withGloballyVisible(): this {
    this.globallyVisibleOnly = true;
    return this;
  }

  withSort(column: SortColumn, direction: SortDirection): this {
    this.sorts.push({ column, direction });
    return this;
  }

  after(timestamp: Date): this {
    this.afterDate = timestamp;
    return this;
  }

  before(timestamp: Date): this {
    this.beforeDate = timestamp;
    return this;
  }

  private conditions(): SQL[] {
    const conditions: SQL[] = [eq(userEntries.userId, this.userId)];

    if (this.unreadOnly) {
      conditions.push(eq(userEntries.read, false));
    }
    if (this.globallyVisibleOnly) {
      conditions.push(eq(subscriptions.hideGlobally, false));
    }
    conditions.push(...timeRangeConditions(this.afterDate, this.beforeDate));

    return conditions;
  }

  private orderBy(): SQL[] {
    return this.sorts.map(({ column, direction }) => {
      const expression = sortExpression(column);
      return direction === "asc" ? asc(expression) : desc(expression);
    });
  }

  /**
   * The count statement, exposed for inspection.
   */
  countStatement() {
    return this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(userEntries)
      .innerJoin(entries, eq(entries.id, userEntries.entryId))
      .innerJoin(subscriptions, activeSubscriptionJoin(this.userId))
      .where(and(...this.conditions()));
  }

  /**
   * The list statement, exposed for inspection.
   */
  fetchStatement() {
    return this.db
      .select({
        id: entries.id,
        feedId: entries.feedId,
        subscriptionId: subscriptions.id,
        url: entries.url,
        title: entries.title,
        author: entries.author,
        summary: entries.summary,
        publishedAt: entries.publishedAt,
        fetchedAt: entries.fetchedAt,
        read: userEntries.read,
        feedTitle: sql<string | null>`COALESCE(${subscriptions.customTitle}, ${feeds.title})`,
      })
      .from(userEntries)
      .innerJoin(entries, eq(entries.id, userEntries.entryId))
      .innerJoin(subscriptions, activeSubscriptionJoin(this.userId))
      .innerJoin(feeds, eq(feeds.id, entries.feedId))
      .where(and(...this.conditions()))
      .orderBy(...this.orderBy());
  }

  async count(): Promise<number> {
    const result = await this.countStatement();
    return result[0]?.count ?? 0;
  }

  async fetch(): Promise<EntryListItem[]> {
    const rows = await this.fetchStatement();
    return rows;
  }
}

// ============================================================================
// Store
// ============================================================================

export class DrizzleReaderStore implements ReaderStore {
  constructor(private readonly db: Database) {}

  newQuery(userId: string): DrizzleEntryQuery {
    return new DrizzleEntryQuery(this.db, userId);
  }

  async findUser(userId: string): Promise<ReaderUser | null> {
    const result = await this.db
      .select({
        id: users.id,
        timezone: users.timezone,
        entryOrder: users.entryOrder,
        entryDirection: users.entryDirection,
      })
      .from(users)
      .where(eq(users.id, userId))
      .limit(1);

    return result[0] ?? null;
  }

  async findSession(tokenHash: string): Promise<StoredSession | null> {
    const result = await this.db
      .select({
        id: sessions.id,
        userId: sessions.userId,
        expiresAt: sessions.expiresAt,
        revokedAt: sessions.revokedAt,
      })
      .from(sessions)
      .where(eq(sessions.tokenHash, tokenHash))
      .limit(1);

    return result[0] ?? null;
  }

  /**
   * The range mark-read statement, exposed for inspection.
   */
  markRangeStatement(userId: string, after: Date | null, before: Date | null, now: Date) {
    return this.markReadStatement(userId, timeRangeConditions(after, before), now);
  }

  /**
   * The global mark-read statement, exposed for inspection.
   */
  markAllStatement(userId: string, now: Date) {
    return this.markReadStatement(userId, [], now);
  }

  private markReadStatement(userId: string, entryConditions: SQL[], now: Date) {
    const visibleEntryIds = this.db
      .select({ id: entries.id })
      .from(entries)
      .innerJoin(subscriptions, activeSubscriptionJoin(userId))
      .where(and(eq(subscriptions.hideGlobally, false), ...entryConditions));

    return this.db
      .update(userEntries)
      .set({ read: true, readChangedAt: now, updatedAt: now })
      .where(
        and(
          eq(userEntries.userId, userId),
          eq(userEntries.read, false),
          inArray(userEntries.entryId, visibleEntryIds)
        )
      );
  }

  async markEntriesReadInRange(
    userId: string,
    after: Date | null,
    before: Date | null
  ): Promise<number> {
    const result = await this.markRangeStatement(userId, after, before, new Date());
    return result.rowCount ?? 0;
  }

  async markAllGloballyVisibleFeedsRead(userId: string): Promise<number> {
    const result = await this.markAllStatement(userId, new Date());
    return result.rowCount ?? 0;
  }
}
