/**
 * Spotify OAuth routes
 *
 *   GET /spotify/login    - Redirect to Spotify's authorize page
 *   GET /spotify/callback - Verify state, exchange the code, link the account
 *
 * Uses Arctic v3 in "confidential client" mode (server-side with client
 * secret), so PKCE is not needed and the code verifier is passed as `null`.
 * Both routes require a signed-in app user: the Spotify account is linked to
 * that user's row in `spotify_connections`.
 */
import { Hono } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";
import type { Env } from "../types";
import { createDb } from "../db";
import { findSpotifyConnection, upsertSpotifyConnection } from "../db/queries";
import { errorAttributes } from "../lib/errors";
import { SPOTIFY_SCOPES, createSpotifyOAuth, storeAccessToken } from "../lib/oauth";
import { getCurrentUser } from "../lib/spotify";
import { currentUserId, pageGuard, setFlash } from "../middleware/session";
import type { SpotifyUserProfile } from "../../shared/validators/spotify";

export const OAUTH_STATE_COOKIE = "spotify_oauth_state";

const spotify = new Hono<{ Bindings: Env }>();

spotify.use("*", pageGuard());

spotify.get("/login", (c) => {
  const oauth = createSpotifyOAuth(c);

  // Random state for CSRF protection during the OAuth round-trip
  const state = crypto.randomUUID();
  const url = oauth.createAuthorizationURL(state, null, SPOTIFY_SCOPES);

  // 10 minutes is generous enough for the user to complete Spotify login
  setCookie(c, OAUTH_STATE_COOKIE, state, {
    path: "/",
    httpOnly: true,
    secure: c.env.ENVIRONMENT === "production",
    sameSite: "Lax",
    maxAge: 60 * 10,
  });

  return c.redirect(url.toString());
});

spotify.get("/callback", async (c) => {
  const session = c.get("session");
  const log = c.get("logger");
  const userId = currentUserId(session);
  if (!userId) return c.redirect("/login");

  const error = c.req.query("error");
  const code = c.req.query("code");
  const state = c.req.query("state");
  const storedState = getCookie(c, OAUTH_STATE_COOKIE);

  // State is single-use
  deleteCookie(c, OAUTH_STATE_COOKIE, { path: "/" });

  if (error) {
    log.warn("Spotify authorization denied", { user_id: userId, "oauth.error": error });
    setFlash(session, "error", `Spotify authorization failed: ${error}`);
    return c.redirect("/profile");
  }

  if (!code || !state || !storedState || state !== storedState) {
    log.warn("OAuth state verification failed", { user_id: userId });
    setFlash(session, "error", "State verification failed");
    return c.redirect("/profile");
  }

  let accessToken: string;
  let accessTokenExpiresAt: number;
  let refreshToken: string | undefined;
  let scope: string | null;
  try {
    const tokens = await createSpotifyOAuth(c).validateAuthorizationCode(code, null);
    accessToken = tokens.accessToken();
    accessTokenExpiresAt = tokens.accessTokenExpiresAt().getTime();
    refreshToken = tokens.hasRefreshToken() ? tokens.refreshToken() : undefined;
    scope = tokens.hasScopes() ? tokens.scopes().join(" ") : null;
  } catch (err) {
    log.error("Spotify code exchange failed", { user_id: userId, ...errorAttributes(err) });
    setFlash(session, "error", "Could not complete Spotify authorization. Please try again.");
    return c.redirect("/profile");
  }

  let profile: SpotifyUserProfile;
  try {
    profile = await getCurrentUser(accessToken);
  } catch (err) {
    log.error("Failed to fetch Spotify profile", { user_id: userId, ...errorAttributes(err) });
    setFlash(session, "error", "Could not load your Spotify profile. Please try again.");
    return c.redirect("/profile");
  }

  const db = createDb(c.env.DATABASE_URL);
  // Spotify may skip issuing a refresh token on re-authorization; keep the stored one
  const storedRefreshToken = refreshToken ?? (await findSpotifyConnection(db, userId))?.refreshToken;
  if (!storedRefreshToken) {
    log.error("Spotify issued no refresh token", { user_id: userId });
    setFlash(session, "error", "Could not complete Spotify authorization. Please try again.");
    return c.redirect("/profile");
  }

  const displayName = profile.display_name ?? profile.id;
  await upsertSpotifyConnection(db, {
    userId,
    spotifyId: profile.id,
    displayName: profile.display_name ?? null,
    refreshToken: storedRefreshToken,
    scope,
  });

  storeAccessToken(session, accessToken, accessTokenExpiresAt);
  session.set("spotifyDisplayName", displayName);
  setFlash(session, "success", `Connected to Spotify as ${displayName}`);
  log.info("Spotify account connected", { user_id: userId, spotify_id: profile.id });

  return c.redirect("/profile");
});

export default spotify;
