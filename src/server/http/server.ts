/**
 * API HTTP server
 *
 * Serves the tRPC router over plain Node.js HTTP, plus a health check.
 */

import { createServer, type Server } from "node:http";
import { createHTTPHandler } from "@trpc/server/adapters/standalone";
import { appRouter } from "@/server/trpc/root";
import { createContextFactory, type ContextDependencies } from "@/server/trpc/context";
import { createRequestLogger } from "@/lib/logger";

const TRPC_PREFIX = "/trpc/";

/**
 * Creates the API server. The caller decides when to listen.
 *
 * Procedures are served under /trpc, e.g. `GET /trpc/buckets.view` and
 * `POST /trpc/buckets.markRead`.
 */
export function createApiServer(deps: ContextDependencies): Server {
  const handler = createHTTPHandler({
    router: appRouter,
    createContext: createContextFactory(deps),
    onError({ error, path, req }) {
      if (error.code === "INTERNAL_SERVER_ERROR") {
        createRequestLogger({ path, method: req.method }).error("Unhandled API error", {
          error: error.message,
        });
      }
    },
  });

  return createServer((req, res) => {
    if (req.method === "GET" && req.url === "/health") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "healthy" }));
      return;
    }

    if (req.url?.startsWith(TRPC_PREFIX)) {
      req.url = req.url.slice(TRPC_PREFIX.length - 1);
      handler(req, res);
      return;
    }

    res.writeHead(404, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ error: "Not found" }));
  });
}
