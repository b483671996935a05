/**
 * API server entry point.
 *
 * Usage:
 *   npm start
 *
 * Environment variables:
 *   DATABASE_URL - Postgres connection string (required)
 *   PORT - HTTP port (default: 3000)
 *   HOSTNAME - Bind address (default: 0.0.0.0)
 *   BUCKET_SCHEME - "rolling" (default) or "calendar"
 *   METRICS_ENABLED / METRICS_PORT - internal Prometheus endpoint
 *   SENTRY_DSN - error reporting (optional)
 */

import { initSentry } from "../src/server/sentry";
import { connectFromEnv } from "../src/server/db";
import { DrizzleReaderStore } from "../src/server/entries/drizzle-store";
import { createApiServer } from "../src/server/http/server";
import { startMetricsServer, stopMetricsServer } from "../src/server/metrics/server";
import { bucketConfig, serverConfig } from "../src/server/config/env";
import { errorMessage, logger } from "../src/lib/logger";

initSentry();

const { db, pool } = connectFromEnv();
const server = createApiServer({
  store: new DrizzleReaderStore(db),
  scheme: bucketConfig.scheme,
});

server.listen(serverConfig.port, serverConfig.hostname, () => {
  logger.info("API server started", {
    hostname: serverConfig.hostname,
    port: serverConfig.port,
    bucketScheme: bucketConfig.scheme,
  });
});

startMetricsServer(serverConfig.metricsPort);

async function shutdown(signal: string): Promise<void> {
  logger.info("Shutting down", { signal });

  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await stopMetricsServer();
  await pool.end();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", { error: errorMessage(error) });
        process.exit(1);
      });
  });
}
