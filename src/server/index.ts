/**
 * Hono app for Customify.
 *
 * Wires middleware and route modules together. `src/server/node.ts` serves
 * it on Node.js; tests call `app.request()` directly with env bindings.
 */

import { Hono } from "hono";
import { csrf } from "hono/csrf";
import { logger } from "hono/logger";
import { serveStatic } from "@hono/node-server/serve-static";
import type { Env } from "./types";
import { instrumentation } from "./middleware/instrumentation";
import { handleError, handleNotFound } from "./middleware/error-handler";
import { createSessionMiddleware } from "./middleware/session";
import pages from "./routes/pages";
import auth from "./routes/auth";
import spotify from "./routes/spotify";
import api from "./routes/api";

const app = new Hono<{ Bindings: Env }>()
  // Instrumentation wraps everything so durations and errors are complete
  .use("*", instrumentation())
  .use("*", logger())
  // Browser bundle and stylesheet, built by `vite build`
  .use("/static/*", serveStatic({ root: "./dist/public" }))
  // Rejects form posts whose Origin differs from the app's own
  .use("*", csrf())
  .use("*", createSessionMiddleware());

// Liveness probe, no auth
app.get("/api/health", (c) => c.json({ status: "ok" }));

app.route("/", pages);
app.route("/", auth);
app.route("/spotify", spotify);
app.route("/api", api);

app.onError(handleError);
app.notFound(handleNotFound);

export default app;
