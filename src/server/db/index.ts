/**
 * Database connection factory for Neon serverless PostgreSQL.
 *
 * Uses the HTTP-based neon driver (`@neondatabase/serverless`): every query
 * is a single HTTPS round-trip, so there is no pool to manage and nothing to
 * close between requests. `createDb` is called per request with the URL from
 * the env bindings.
 */

import { neon } from "@neondatabase/serverless";
import { drizzle } from "drizzle-orm/neon-http";
import * as schema from "./schema";

export function createDb(databaseUrl: string) {
  const sql = neon(databaseUrl);
  // Pass the full schema so Drizzle's relational query API (e.g. `db.query.*`)
  // can resolve column types at runtime.
  return drizzle({ client: sql, schema });
}

// Convenience type used in route handlers and query functions
export type Database = ReturnType<typeof createDb>;
