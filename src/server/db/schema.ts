/**
 * Drizzle ORM schema definitions, the single source of truth for the DB
 * structure. Run `npm run db:generate` after changes to produce migration
 * files, or `npm run db:push` to apply directly during development.
 */

import { pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

/**
 * Application accounts. Rows are written once at registration and only read
 * afterwards; emails are stored lower-cased.
 */
export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),
  email: text("email").notNull().unique(),
  // bcrypt hash, cost 12
  passwordHash: text("password_hash").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

/**
 * The Spotify account linked to a user. At most one per user.
 *
 * The refresh token lives here rather than in the session cookie so that
 * the cookie stays small and logout can revoke it server-side. The access
 * token and its expiry stay in the session.
 */
export const spotifyConnections = pgTable("spotify_connections", {
  userId: uuid("user_id")
    .primaryKey()
    .references(() => users.id, { onDelete: "cascade" }),
  spotifyId: text("spotify_id").notNull(),
  displayName: text("display_name"),
  refreshToken: text("refresh_token").notNull(),
  scope: text("scope"),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export type UserRow = typeof users.$inferSelect;
export type SpotifyConnectionRow = typeof spotifyConnections.$inferSelect;
