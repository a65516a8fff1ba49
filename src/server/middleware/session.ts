/**
 * Session middleware, guards and flash helpers.
 *
 * Sessions live entirely in an AES-encrypted cookie (hono-sessions
 * CookieStore), so there is no server-side session store. The cookie holds
 * the user id, the short-lived Spotify access token and its expiry, the
 * recommendation settings and the pending flash message. The Spotify
 * refresh token is persisted in the DB, not in the cookie.
 */

import { createMiddleware } from "hono/factory";
import { CookieStore, sessionMiddleware, type Session } from "hono-sessions";
import type { FlashMessage, FlashType } from "../../shared/types";
import {
  defaultRecommendationSettings,
  type RecommendationSettings,
} from "../../shared/validators/recommendations";
import type { Env } from "../types";

export interface SessionData {
  userId: string;
  email: string;
  accessToken: string;
  // Unix-ms timestamp when the Spotify access token expires
  accessTokenExpiresAt: number;
  spotifyDisplayName: string;
  recommendationSettings: RecommendationSettings;
  flash: FlashMessage;
}

export type AppSession = Session<SessionData>;

// Extend Hono's context so `c.get("session")` is typed across all routes
declare module "hono" {
  interface ContextVariableMap {
    session: Session<SessionData>;
  }
}

export const SESSION_COOKIE_NAME = "customify_session";
export const SESSION_TTL_SECONDS = 60 * 60 * 24 * 7; // 7 days

/**
 * Creates the session middleware.
 *
 * Wrapped in a factory because the encryption key comes from the env
 * bindings (`c.env`), which are only available at request time.
 */
export function createSessionMiddleware() {
  return createMiddleware<{ Bindings: Env }>(async (c, next) => {
    const store = new CookieStore();
    const middleware = sessionMiddleware({
      store,
      encryptionKey: c.env.SESSION_ENCRYPTION_KEY,
      expireAfterSeconds: SESSION_TTL_SECONDS,
      cookieOptions: {
        path: "/",
        httpOnly: true,
        secure: c.env.ENVIRONMENT === "production",
        // "Lax" allows the cookie on top-level navigations (e.g. the OAuth
        // callback redirect) while still blocking cross-site POST.
        sameSite: "Lax",
      },
      sessionCookieName: SESSION_COOKIE_NAME,
    });
    return middleware(c, next);
  });
}

/** The signed-in user's id, or undefined for anonymous sessions. */
export function currentUserId(session: AppSession): string | undefined {
  return session.get("userId") ?? undefined;
}

/** The user's saved recommendation settings, or the defaults. */
export function currentSettings(session: AppSession): RecommendationSettings {
  return session.get("recommendationSettings") ?? defaultRecommendationSettings();
}

/**
 * Route-level guard for JSON endpoints: rejects unauthenticated requests
 * with 401.
 */
export function authGuard() {
  return createMiddleware(async (c, next) => {
    const session = c.get("session");
    if (!currentUserId(session)) {
      return c.json({ error: "Unauthorized" }, 401);
    }
    await next();
  });
}

/**
 * Route-level guard for pages: sends anonymous visitors to the login form
 * with an explanatory flash message.
 */
export function pageGuard() {
  return createMiddleware(async (c, next) => {
    const session = c.get("session");
    if (!currentUserId(session)) {
      setFlash(session, "info", "Please log in to continue.");
      return c.redirect("/login");
    }
    await next();
  });
}

export function setFlash(session: AppSession, type: FlashType, message: string): void {
  session.flash("flash", { type, message });
}

/** Read and consume the pending flash message. */
export function takeFlash(session: AppSession): FlashMessage | undefined {
  return session.get("flash") ?? undefined;
}

/** Drop the Spotify access token from the session (the DB connection is untouched). */
export function clearSpotifySession(session: AppSession): void {
  session.forget("accessToken");
  session.forget("accessTokenExpiresAt");
  session.forget("spotifyDisplayName");
}
