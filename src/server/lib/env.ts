/**
 * Zod-based environment variable validation.
 *
 * `validateEnv()` runs once when the Node server boots. A missing or malformed
 * variable aborts startup with field-level messages instead of failing deep
 * inside a request.
 */

import { z } from "zod";
import type { Env } from "../types";

export const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  SPOTIFY_CLIENT_ID: z.string().min(1),
  SPOTIFY_CLIENT_SECRET: z.string().min(1),
  SPOTIFY_REDIRECT_URI: z.string().url().optional(),
  // Minimum 32 chars required for AES-256 encryption used by CookieStore
  SESSION_ENCRYPTION_KEY: z.string().min(32),
  ENVIRONMENT: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  // New Relic: optional, omitted in local dev
  NEW_RELIC_LICENSE_KEY: z.string().min(1).optional(),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

/**
 * Parse and validate a raw env object. Throws a ZodError with detailed
 * field-level messages if validation fails.
 */
export function validateEnv(env: Record<string, unknown>): ValidatedEnv {
  return envSchema.parse(env);
}

/** Split the validated config into request bindings and the listen port. */
export function toBindings(env: ValidatedEnv): { bindings: Env; port: number } {
  const { PORT, ...bindings } = env;
  return { bindings, port: PORT };
}
