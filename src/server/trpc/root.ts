/**
 * Root tRPC Router
 *
 * Combines all sub-routers. Used by the HTTP server and exported for type
 * inference.
 */

import { createTRPCRouter, createCallerFactory } from "./trpc";
import { bucketsRouter } from "./routers";

export const appRouter = createTRPCRouter({
  buckets: bucketsRouter,
});

export type AppRouter = typeof appRouter;

/**
 * Create a server-side caller for the router.
 */
export const createCaller = createCallerFactory(appRouter);
