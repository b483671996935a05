/**
 * tRPC Context
 *
 * Created for every request: the entry store, the deployment's bucket scheme,
 * a clock and the caller's session.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { CreateHTTPContextOptions } from "@trpc/server/adapters/standalone";
import type { BucketScheme } from "@/server/buckets/boundaries";
import type { ReaderStore } from "@/server/entries/query";
import { validateSession, type SessionData } from "@/server/auth/session";

export type { SessionData };

/**
 * Context available to all tRPC procedures
 */
export interface Context {
  store: ReaderStore;
  /** One scheme per deployment, shared by bucket views and bucket mark-read */
  scheme: BucketScheme;
  /** Source of the current instant */
  clock: () => Date;
  session: SessionData | null;
  headers: Headers;
}

export interface ContextDependencies {
  store: ReaderStore;
  scheme: BucketScheme;
  clock?: () => Date;
}

/**
 * Extracts session token from request headers.
 * Supports both the Authorization header and the session cookie.
 */
export function getSessionToken(headers: Headers): string | null {
  const authHeader = headers.get("authorization");
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice(7);
  }

  const cookieHeader = headers.get("cookie");
  if (cookieHeader) {
    const cookies = Object.fromEntries(
      cookieHeader.split("; ").map((c) => {
        const [key, ...value] = c.split("=");
        return [key, value.join("=")];
      })
    );
    if (cookies.session) {
      return cookies.session;
    }
  }

  return null;
}

/**
 * Converts Node's header object into a fetch Headers instance.
 */
export function toHeaders(incoming: IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(name, item);
      }
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }
  return headers;
}

/**
 * Builds the per-request context factory for the HTTP adapter.
 */
export function createContextFactory(deps: ContextDependencies) {
  const clock = deps.clock ?? (() => new Date());

  return async function createContext({ req }: CreateHTTPContextOptions): Promise<Context> {
    const headers = toHeaders(req.headers);
    const token = getSessionToken(headers);
    const session = token ? await validateSession(deps.store, token, clock()) : null;

    return {
      store: deps.store,
      scheme: deps.scheme,
      clock,
      session,
      headers,
    };
  };
}
