/**
 * Internal metrics HTTP server
 *
 * Serves Prometheus metrics on a separate port so they stay off the public
 * API listener.
 */

import { createServer, type Server } from "node:http";
import { metricsEnabled, registry } from "./metrics";
import { errorMessage, logger } from "@/lib/logger";

let server: Server | null = null;

/**
 * Starts the internal metrics HTTP server.
 *
 * GET /metrics returns Prometheus-formatted metrics; everything else is 404.
 *
 * @returns The server instance, or null if metrics are disabled
 */
export function startMetricsServer(port: number): Server | null {
  if (!metricsEnabled) {
    logger.info("Metrics disabled, skipping internal metrics server");
    return null;
  }

  if (server) {
    logger.warn("Metrics server already running");
    return server;
  }

  server = createServer((req, res) => {
    if (req.method !== "GET" || req.url !== "/metrics") {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not Found");
      return;
    }

    registry
      .metrics()
      .then((metrics) => {
        res.writeHead(200, { "Content-Type": registry.contentType });
        res.end(metrics);
      })
      .catch((error: unknown) => {
        logger.error("Failed to collect metrics", { error: errorMessage(error) });
        res.writeHead(500, { "Content-Type": "text/plain" });
        res.end("Internal Server Error");
      });
  });

  server.listen(port, () => {
    logger.info("Internal metrics server started", { port });
  });

  return server;
}

/**
 * Stops the internal metrics HTTP server.
 */
export function stopMetricsServer(): Promise<void> {
  return new Promise((resolve) => {
    if (!server) {
      resolve();
      return;
    }

    server.close(() => {
      logger.info("Internal metrics server stopped");
      server = null;
      resolve();
    });
  });
}
