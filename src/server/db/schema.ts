import {
  boolean,
  index,
  pgEnum,
  pgTable,
  primaryKey,
  text,
  timestamp,
  unique,
  uuid,
} from "drizzle-orm/pg-core";
import { USER_SORT_COLUMNS } from "@/server/entries/query";

// ============================================================================
// ENUMS
// ============================================================================

export const entryOrderEnum = pgEnum("entry_order", USER_SORT_COLUMNS);

export const sortDirectionEnum = pgEnum("sort_direction", ["asc", "desc"]);

// ============================================================================
// USERS
// ============================================================================

/**
 * Users table - account plus the reading preferences bucket views depend on.
 */
export const users = pgTable("users", {
  id: uuid("id").primaryKey(),
  email: text("email").unique().notNull(),

  timezone: text("timezone").notNull().default("UTC"), // IANA name
  entryOrder: entryOrderEnum("entry_order").notNull().default("publishedAt"),
  entryDirection: sortDirectionEnum("entry_direction").notNull().default("desc"),

  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

/**
 * Sessions table - token is stored as SHA-256 hash (never raw).
 */
export const sessions = pgTable(
  "sessions",
  {
    id: uuid("id").primaryKey(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    tokenHash: text("token_hash").unique().notNull(),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    revokedAt: timestamp("revoked_at", { withTimezone: true }),
  },
  (table) => [index("idx_sessions_user").on(table.userId)]
);

// ============================================================================
// FEEDS & ENTRIES
// ============================================================================

export const feeds = pgTable("feeds", {
  id: uuid("id").primaryKey(),
  url: text("url").unique(),
  title: text("title"),

  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const entries = pgTable(
  "entries",
  {
    id: uuid("id").primaryKey(),
    feedId: uuid("feed_id")
      .notNull()
      .references(() => feeds.id, { onDelete: "cascade" }),
    guid: text("guid").notNull(),

    url: text("url"),
    title: text("title"),
    author: text("author"),
    summary: text("summary"),

    publishedAt: timestamp("published_at", { withTimezone: true }), // from feed, may be null
    fetchedAt: timestamp("fetched_at", { withTimezone: true }).notNull(),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique("uq_entries_feed_guid").on(table.feedId, table.guid),
    index("idx_entries_feed_published").on(table.feedId, table.publishedAt),
  ]
);

// ============================================================================
// SUBSCRIPTIONS
// ============================================================================

/**
 * Subscriptions - a user's link to a feed.
 * hideGlobally keeps the feed out of aggregate views (and bucket views).
 */
export const subscriptions = pgTable(
  "subscriptions",
  {
    id: uuid("id").primaryKey(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    feedId: uuid("feed_id")
      .notNull()
      .references(() => feeds.id, { onDelete: "cascade" }),

    customTitle: text("custom_title"),
    hideGlobally: boolean("hide_globally").notNull().default(false),

    subscribedAt: timestamp("subscribed_at", { withTimezone: true }).notNull().defaultNow(),
    unsubscribedAt: timestamp("unsubscribed_at", { withTimezone: true }), // soft delete

    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique("uq_subscriptions_user_feed").on(table.userId, table.feedId),
    index("idx_subscriptions_user").on(table.userId),
  ]
);

// ============================================================================
// USER ENTRY STATE
// ============================================================================

/**
 * Per-user read state. A row exists for every entry visible to the user.
 */
export const userEntries = pgTable(
  "user_entries",
  {
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    entryId: uuid("entry_id")
      .notNull()
      .references(() => entries.id, { onDelete: "cascade" }),

    read: boolean("read").notNull().default(false),
    readChangedAt: timestamp("read_changed_at", { withTimezone: true }).notNull().defaultNow(),

    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.userId, table.entryId] }),
    index("idx_user_entries_unread").on(table.userId, table.read),
  ]
);
