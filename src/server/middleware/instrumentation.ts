/**
 * Request instrumentation middleware.
 *
 * Gives every request a buffered `Logger`, records timing, status and user
 * for the request once the response is ready, then flushes the buffer (to
 * the console, or to New Relic's Log API when a license key is configured).
 * Errors that escape a handler are logged by the app's error handler with
 * the same logger.
 */

import { createMiddleware } from "hono/factory";
import type { Env } from "../types";
import { Logger } from "../lib/logger";
import type { AppSession } from "./session";

// Extend Hono's context so `c.get("logger")` is typed across all routes
declare module "hono" {
  interface ContextVariableMap {
    logger: Logger;
  }
}

/**
 * Must be registered BEFORE other middleware (session, csrf) so it wraps the
 * entire request lifecycle and captures the full duration.
 */
export function instrumentation() {
  return createMiddleware<{ Bindings: Env }>(async (c, next) => {
    const start = Date.now();
    const log = new Logger({ environment: c.env.ENVIRONMENT });
    c.set("logger", log);

    await next();

    const duration = Date.now() - start;

    // Unset for static assets and requests rejected before the session
    // middleware ran.
    const session: AppSession | undefined = c.get("session");
    const userId = session?.get("userId") ?? undefined;

    log.info("request", {
      "http.method": c.req.method,
      "http.url": new URL(c.req.url).pathname,
      "http.status_code": c.res.status,
      duration_ms: duration,
      user_agent: c.req.header("user-agent") ?? "",
      ...(userId ? { user_id: userId } : {}),
    });

    await log.flush(c.env.NEW_RELIC_LICENSE_KEY);
  });
}
