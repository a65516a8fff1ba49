/**
 * Node.js entry point: validates the environment, then serves the Hono app
 * with the validated values as its env bindings.
 */

import "dotenv/config";
import { serve } from "@hono/node-server";
import { ZodError } from "zod";
import app from "./index";
import { toBindings, validateEnv } from "./lib/env";

function loadConfig() {
  try {
    return toBindings(validateEnv(process.env));
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    for (const issue of err.issues) {
      console.error(`[config] ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }
}

const { bindings, port } = loadConfig();

serve({ fetch: (request) => app.fetch(request, bindings), port }, (info) => {
  console.log(`Customify listening on http://localhost:${info.port} (${bindings.ENVIRONMENT})`);
});
