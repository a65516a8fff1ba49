/**
 * Environment bindings passed to every request.
 *
 * The Node entry (`src/server/node.ts`) validates `process.env` once at
 * startup and hands the result to `app.fetch(request, env)`, so handlers read
 * configuration from `c.env` exactly as they would on an edge runtime. Tests
 * pass a fixture object the same way via `app.request(path, init, env)`.
 */
export interface Env {
  DATABASE_URL: string;
  SPOTIFY_CLIENT_ID: string;
  SPOTIFY_CLIENT_SECRET: string;
  // Overrides the callback URL derived from the request origin
  SPOTIFY_REDIRECT_URI?: string;
  // Must be at least 32 characters; used by hono-sessions CookieStore for
  // AES encryption of the session cookie payload.
  SESSION_ENCRYPTION_KEY: string;
  ENVIRONMENT: "development" | "production" | "test";
  NEW_RELIC_LICENSE_KEY?: string;
}
