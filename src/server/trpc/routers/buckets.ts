/**
 * Buckets Router
 *
 * Unread entries grouped by age, and mark-read scoped to one group.
 * Both procedures use the deployment's bucket scheme and the caller's
 * timezone, so "today" means the same interval when listed and when marked.
 */

import { z } from "zod";

import { createTRPCRouter, userProcedure } from "../trpc";
import { BUCKET_SCHEMES } from "@/server/buckets/boundaries";
import { nowInTimezone } from "@/server/buckets/clock";
import { countUnread, getBucketedView } from "@/server/services/bucketed-entries";
import { markBucketRead } from "@/server/services/mark-bucket-read";

// ============================================================================
// Validation Schemas
// ============================================================================

/**
 * Bucket selector: a bucket name or "all". Anything else, including padded
 * names, is accepted as-is and falls back to every bucket.
 */
const selectorSchema = z.string();

// ============================================================================
// Output Schemas
// ============================================================================

const entryListItemSchema = z.object({
  id: z.string(),
  feedId: z.string(),
  subscriptionId: z.string(),
  url: z.string().nullable(),
  title: z.string().nullable(),
  author: z.string().nullable(),
  summary: z.string().nullable(),
  publishedAt: z.date().nullable(),
  fetchedAt: z.date(),
  read: z.boolean(),
  feedTitle: z.string().nullable(),
});

const bucketSummarySchema = z.object({
  name: z.string(),
  after: z.date().nullable(),
  before: z.date().nullable(),
  count: z.number().int(),
  entries: z.array(entryListItemSchema).nullable(),
});

const bucketedViewSchema = z.object({
  scheme: z.enum(BUCKET_SCHEMES),
  referenceInstant: z.date(),
  selection: z.string(),
  buckets: z.array(bucketSummarySchema),
  totalUnread: z.number().int(),
});

// ============================================================================
// Router
// ============================================================================

export const bucketsRouter = createTRPCRouter({
  /**
   * Unread counts for every bucket, plus the entries of the selected bucket.
   *
   * @param selector - Bucket name, or "all" for every bucket's entries.
   *                   Defaults to the newest bucket.
   */
  view: userProcedure
    .input(z.object({ selector: selectorSchema.optional() }).default({}))
    .output(bucketedViewSchema)
    .query(async ({ ctx, input }) => {
      return getBucketedView(ctx.store, {
        user: ctx.user,
        scheme: ctx.scheme,
        reference: nowInTimezone(ctx.user.timezone, ctx.clock()),
        selector: input.selector,
      });
    }),

  /**
   * Marks one bucket's unread entries as read.
   *
   * @param selector - Bucket name, or "all". Unrecognized values mark every
   *                   globally visible entry read.
   * @returns The scope applied and how many entries changed
   */
  markRead: userProcedure
    .input(z.object({ selector: selectorSchema }))
    .output(z.object({ scope: z.string(), count: z.number().int() }))
    .mutation(async ({ ctx, input }) => {
      const result = await markBucketRead(ctx.store, {
        userId: ctx.user.id,
        selector: input.selector,
        scheme: ctx.scheme,
        reference: nowInTimezone(ctx.user.timezone, ctx.clock()),
      });
      return { scope: result.scope, count: result.count };
    }),

  /**
   * Total unread, globally visible entries.
   */
  unreadCount: userProcedure.output(z.object({ count: z.number().int() })).query(async ({ ctx }) => {
    return { count: await countUnread(ctx.store, ctx.user.id) };
  }),
});
