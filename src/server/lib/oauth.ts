/**
 * Spotify OAuth helpers: the Arctic client used for the authorization code
 * flow and the access-token lifecycle.
 *
 * The access token and its expiry live in the session cookie; the refresh
 * token lives in `spotify_connections`. `ensureAccessToken` is the single
 * entry point routes use before any Web API call.
 */

import { Spotify } from "arctic";
import { z } from "zod";
import type { Env } from "../types";
import { createDb } from "../db";
import { findSpotifyConnection, updateRefreshToken } from "../db/queries";
import { clearSpotifySession, currentUserId, type AppSession } from "../middleware/session";
import { AuthenticationError, SpotifyApiError, SpotifyAuthError, errorAttributes } from "./errors";
import type { Logger } from "./logger";

export const SPOTIFY_SCOPES = [
  "user-read-private",
  "user-read-email",
  "user-top-read",
  "playlist-modify-public",
  "playlist-modify-private",
  "user-modify-playback-state",
];

/** Where a user goes to link Spotify again once the token is unusable. */
export const REAUTHENTICATE_PATH = "/spotify/login";

export const SPOTIFY_TOKEN_URL = "https://accounts.spotify.com/api/token";

// Consider a token expired this long before Spotify does
const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

/** SPOTIFY_REDIRECT_URI when set, otherwise `<request origin>/spotify/callback`. */
export function spotifyRedirectUri(c: { env: Env; req: { url: string } }): string {
  return c.env.SPOTIFY_REDIRECT_URI ?? `${new URL(c.req.url).origin}/spotify/callback`;
}

/**
 * Build a Spotify OAuth client per-request so the redirect URI matches the
 * request origin (works across localhost / production).
 */
export function createSpotifyOAuth(c: { env: Env; req: { url: string } }): Spotify {
  return new Spotify(c.env.SPOTIFY_CLIENT_ID, c.env.SPOTIFY_CLIENT_SECRET, spotifyRedirectUri(c));
}

/**
 * The session's access token if it is still usable for at least five more
 * minutes, otherwise undefined.
 */
export function getValidAccessToken(session: AppSession): string | undefined {
  const accessToken = session.get("accessToken");
  const expiresAt = session.get("accessTokenExpiresAt");

  if (!accessToken || !expiresAt) return undefined;
  return Date.now() + EXPIRY_BUFFER_MS < expiresAt ? accessToken : undefined;
}

/** Store a freshly issued access token in the session. */
export function storeAccessToken(session: AppSession, accessToken: string, expiresAt: number): void {
  session.set("accessToken", accessToken);
  session.set("accessTokenExpiresAt", expiresAt);
}

const tokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  expires_in: z.number(), // seconds
  refresh_token: z.string().optional(), // present when Spotify rotates it
  scope: z.string().optional(),
});

export interface RefreshedToken {
  accessToken: string;
  expiresAt: number;
  /** Set only when Spotify rotated the refresh token. */
  refreshToken?: string;
}

/**
 * Exchange a refresh token at Spotify's token endpoint. Called directly
 * rather than through Arctic so the request gets a timeout.
 */
export async function refreshAccessToken(env: Env, refreshToken: string): Promise<RefreshedToken> {
  const credentials = btoa(`${env.SPOTIFY_CLIENT_ID}:${env.SPOTIFY_CLIENT_SECRET}`);

  let res: Response;
  try {
    res = await fetch(SPOTIFY_TOKEN_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Basic ${credentials}`,
      },
      body: new URLSearchParams({ grant_type: "refresh_token", refresh_token: refreshToken }),
      signal: AbortSignal.timeout(10_000),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SpotifyApiError(`Network error refreshing token: ${message}`, { endpoint: "/api/token" });
  }

  if (!res.ok) {
    throw new SpotifyApiError(`Token refresh failed: ${res.status}`, {
      status: res.status,
      endpoint: "/api/token",
    });
  }

  const parsed = tokenResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new SpotifyApiError("Token refresh returned an unexpected body", {
      status: res.status,
      endpoint: "/api/token",
    });
  }

  return {
    accessToken: parsed.data.access_token,
    expiresAt: Date.now() + parsed.data.expires_in * 1000,
    refreshToken: parsed.data.refresh_token,
  };
}

/**
 * A usable Spotify access token for the signed-in user, refreshing it with
 * the stored refresh token when needed.
 *
 * Throws `AuthenticationError` for anonymous sessions and `SpotifyAuthError`
 * when there is no linked account or the refresh was refused; in the latter
 * case the session's token fields are cleared first.
 */
export async function ensureAccessToken(env: Env, session: AppSession, log: Logger): Promise<string> {
  const userId = currentUserId(session);
  if (!userId) throw new AuthenticationError("Not logged in");

  const current = getValidAccessToken(session);
  if (current) return current;

  const db = createDb(env.DATABASE_URL);
  const connection = await findSpotifyConnection(db, userId);
  if (!connection) {
    clearSpotifySession(session);
    throw new SpotifyAuthError("not_connected", { userId });
  }

  let refreshed: RefreshedToken;
  try {
    refreshed = await refreshAccessToken(env, connection.refreshToken);
  } catch (err) {
    log.warn("Spotify token refresh failed", { user_id: userId, ...errorAttributes(err) });
    clearSpotifySession(session);
    throw new SpotifyAuthError("refresh_failed", { userId });
  }

  storeAccessToken(session, refreshed.accessToken, refreshed.expiresAt);
  if (refreshed.refreshToken && refreshed.refreshToken !== connection.refreshToken) {
    await updateRefreshToken(db, userId, refreshed.refreshToken);
  }
  log.info("Spotify access token refreshed", { user_id: userId });

  return refreshed.accessToken;
}
