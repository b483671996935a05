import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import * as Sentry from "@sentry/node";

import { logger } from "@/lib/logger";
import { parsePositiveInt } from "@/server/config/env";
import * as schema from "./schema";

/**
 * Creates a drizzle instance over a pg pool.
 * The pool connects lazily, on the first query.
 */
export function createDatabase(connectionString: string) {
  const pool = new Pool({
    connectionString,
    max: parsePositiveInt(process.env.PG_POOL_MAX, 20),
    // Close idle connections before common proxy idle timeouts
    idleTimeoutMillis: 30000,
  });

  // Without this handler, an error on an idle client is an uncaughtException.
  // The pool drops the failed client and opens a new one when needed.
  pool.on("error", (err) => {
    logger.error("Unexpected error on idle database client", {
      code: "code" in err ? err.code : undefined,
      message: err.message,
    });
    Sentry.captureException(err, {
      tags: { source: "pg-pool" },
    });
  });

  const db = drizzle(pool, { schema });
  return { db, pool };
}

export type Database = ReturnType<typeof createDatabase>["db"];

/**
 * Opens the application database from DATABASE_URL.
 */
export function connectFromEnv() {
  const connectionString = process.env.DATABASE_URL;

  if (!connectionString) {
    throw new Error("DATABASE_URL environment variable is not set");
  }

  return createDatabase(connectionString);
}
