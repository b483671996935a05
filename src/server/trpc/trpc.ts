/**
 * tRPC Server Setup
 *
 * Initializes the tRPC instance and defines base procedures: request timing
 * and error reporting, the session guard, and user resolution.
 */

import { initTRPC, TRPCError } from "@trpc/server";
import { getHTTPStatusCodeFromError } from "@trpc/server/http";
import superjson from "superjson";
import { ZodError } from "zod";
import * as Sentry from "@sentry/node";
import type { Context } from "./context";
import { errors, getErrorCode } from "./errors";
import type { ReaderUser } from "@/server/entries/query";
import { errorMessage, logger } from "@/lib/logger";
import { trackHttpRequest } from "@/server/metrics/metrics";

/**
 * Initialize tRPC with our context type and superjson transformer.
 * SuperJSON keeps Date values intact on the wire.
 */
const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        zodError: error.cause instanceof ZodError ? error.cause.flatten() : null,
      },
    };
  },
});

export const createTRPCRouter = t.router;
export const createCallerFactory = t.createCallerFactory;

const CLIENT_ERROR_CODES: ReadonlyArray<TRPCError["code"]> = [
  "UNAUTHORIZED",
  "NOT_FOUND",
  "BAD_REQUEST",
  "FORBIDDEN",
];

/**
 * Middleware that logs request timing and captures errors
 */
const timingMiddleware = t.middleware(async ({ path, type, next, ctx }) => {
  const start = Date.now();
  const userId = ctx.session?.userId;

  const result = await next();
  const duration = Date.now() - start;

  if (result.ok) {
    trackHttpRequest(type, path, 200);
    if (duration > 1000) {
      logger.warn("Slow tRPC request", { path, type, durationMs: duration, userId });
    }
    return result;
  }

  const { error } = result;
  trackHttpRequest(type, path, getHTTPStatusCodeFromError(error));

  // Client errors (UNAUTHORIZED, BAD_REQUEST, ...) are expected; everything
  // else is logged and reported.
  if (!CLIENT_ERROR_CODES.includes(error.code)) {
    logger.error("tRPC request failed", {
      path,
      type,
      durationMs: duration,
      code: getErrorCode(error) ?? error.code,
      error: error.message,
      userId,
    });

    Sentry.captureException(error.cause ?? error, {
      tags: { trpcPath: path, trpcType: type },
      extra: { durationMs: duration, userId },
    });
  }

  return result;
});

/**
 * Public procedure - no authentication required.
 */
export const publicProcedure = t.procedure.use(timingMiddleware);

/**
 * Middleware that enforces authentication.
 */
const authMiddleware = t.middleware(({ ctx, next }) => {
  if (!ctx.session) {
    throw errors.unauthorized("You must be logged in to access this resource");
  }

  return next({
    ctx: {
      ...ctx,
      session: ctx.session,
    },
  });
});

/**
 * Protected procedure - the session is guaranteed to be non-null.
 */
export const protectedProcedure = publicProcedure.use(authMiddleware);

/**
 * Middleware that loads the caller's reading preferences.
 * Runs before any bucket work; a missing user or a failed lookup is a
 * server error.
 */
const userMiddleware = t.middleware(async ({ ctx, next }) => {
  if (!ctx.session) {
    throw errors.unauthorized();
  }

  let user: ReaderUser | null;
  try {
    user = await ctx.store.findUser(ctx.session.userId);
  } catch (error) {
    throw errors.userResolutionFailed(errorMessage(error));
  }

  if (!user) {
    throw errors.userResolutionFailed("user not found");
  }

  return next({
    ctx: {
      ...ctx,
      session: ctx.session,
      user,
    },
  });
});

/**
 * Procedure for per-user reads and writes; `ctx.user` holds the caller's
 * timezone and sort preferences.
 */
export const userProcedure = protectedProcedure.use(userMiddleware);
