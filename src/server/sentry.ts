/**
 * Sentry Server Configuration
 *
 * Initializes error reporting when SENTRY_DSN is set.
 */

import * as Sentry from "@sentry/node";

export function initSentry(): void {
  if (!process.env.SENTRY_DSN) {
    return;
  }

  Sentry.init({
    dsn: process.env.SENTRY_DSN,

    tracesSampleRate: process.env.NODE_ENV === "production" ? 0.1 : 1.0,

    environment: process.env.NODE_ENV,

    // Only send errors from production
    enabled: process.env.NODE_ENV === "production",

    beforeSend(event, hint) {
      const error = hint.originalException;

      // 4xx client errors are expected
      if (error instanceof Error) {
        const errorMessage = error.message.toLowerCase();
        if (errorMessage.includes("unauthorized") || errorMessage.includes("must be logged in")) {
          return null;
        }
      }

      return event;
    },

    // Pool errors while the database restarts
    ignoreErrors: ["ECONNREFUSED"],
  });
}
