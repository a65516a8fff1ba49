/**
 * Query functions shared by the auth, OAuth and API routes.
 */

import { eq } from "drizzle-orm";
import type { Database } from "./index";
import { spotifyConnections, users, type SpotifyConnectionRow, type UserRow } from "./schema";

export async function findUserByEmail(db: Database, email: string): Promise<UserRow | undefined> {
  return db.query.users.findFirst({ where: eq(users.email, email) });
}

/**
 * Insert a new account. Returns null when the email is already taken so the
 * caller can answer without revealing which part of the input collided.
 */
export async function createUser(
  db: Database,
  email: string,
  passwordHash: string,
): Promise<{ id: string } | null> {
  const [row] = await db
    .insert(users)
    .values({ email, passwordHash })
    .onConflictDoNothing({ target: users.email })
    .returning({ id: users.id });
  return row ?? null;
}

export async function findSpotifyConnection(
  db: Database,
  userId: string,
): Promise<SpotifyConnectionRow | undefined> {
  return db.query.spotifyConnections.findFirst({
    where: eq(spotifyConnections.userId, userId),
  });
}

/** Link (or re-link) a Spotify account. */
export async function upsertSpotifyConnection(
  db: Database,
  values: {
    userId: string;
    spotifyId: string;
    displayName: string | null;
    refreshToken: string;
    scope: string | null;
  },
): Promise<void> {
  await db
    .insert(spotifyConnections)
    .values({ ...values, updatedAt: new Date() })
    .onConflictDoUpdate({
      target: spotifyConnections.userId,
      set: {
        spotifyId: values.spotifyId,
        displayName: values.displayName,
        refreshToken: values.refreshToken,
        scope: values.scope,
        updatedAt: new Date(),
      },
    });
}

/** Persist a rotated refresh token. */
export async function updateRefreshToken(
  db: Database,
  userId: string,
  refreshToken: string,
): Promise<void> {
  await db
    .update(spotifyConnections)
    .set({ refreshToken, updatedAt: new Date() })
    .where(eq(spotifyConnections.userId, userId));
}

export async function deleteSpotifyConnection(db: Database, userId: string): Promise<void> {
  await db.delete(spotifyConnections).where(eq(spotifyConnections.userId, userId));
}
