/**
 * Page routes
 *
 *   GET  /          - Landing page
 *   GET  /profile   - Spotify profile, top tracks and the recommendation panel
 *   GET  /customize - Recommendation settings form
 *   POST /customize - Save (or reset) the settings
 */
import { Hono } from "hono";
import type { Env } from "../types";
import { SPOTIFY_SESSION_EXPIRED, SpotifyApiError, SpotifyAuthError, errorAttributes } from "../lib/errors";
import { firstIssue, readForm } from "../lib/form";
import { REAUTHENTICATE_PATH, ensureAccessToken } from "../lib/oauth";
import { renderPage } from "../lib/render";
import { getCurrentUser, getTopTracks, isPremium, toTrackSummary } from "../lib/spotify";
import {
  clearSpotifySession,
  currentSettings,
  currentUserId,
  pageGuard,
  setFlash,
  takeFlash,
  type AppSession,
} from "../middleware/session";
import {
  defaultRecommendationSettings,
  recommendationSettingsSchema,
  settingsFromForm,
} from "../../shared/validators/recommendations";
import type { FlashMessage } from "../../shared/types";
import HomePage from "../../views/pages/HomePage";
import ProfilePage from "../../views/pages/ProfilePage";
import CustomizePage from "../../views/pages/CustomizePage";

export const PROFILE_TOP_TRACKS = 5;
export const LOGGED_OUT_MESSAGE = "You have been logged out.";
export const PROFILE_LOAD_FAILED = "Could not load your Spotify profile. Please try again.";

function userEmail(session: AppSession): string | null {
  return session.get("email") ?? null;
}

const pages = new Hono<{ Bindings: Env }>();

pages.get("/", (c) => {
  const session = c.get("session");
  const signedIn = currentUserId(session) !== undefined;
  const flash: FlashMessage | undefined =
    takeFlash(session) ??
    (!signedIn && c.req.query("logged_out") === "1" ? { type: "info", message: LOGGED_OUT_MESSAGE } : undefined);

  return renderPage(
    c,
    <HomePage
      userEmail={signedIn ? userEmail(session) : null}
      spotifyName={session.get("spotifyDisplayName") ?? undefined}
      flash={flash}
    />,
  );
});

pages.get("/profile", async (c) => {
  const session = c.get("session");
  const log = c.get("logger");
  const userId = currentUserId(session);

  if (!userId) {
    return renderPage(c, <ProfilePage userEmail={null} flash={takeFlash(session)} state={{ kind: "anonymous" }} />);
  }

  let accessToken: string;
  try {
    accessToken = await ensureAccessToken(c.env, session, log);
  } catch (err) {
    if (!(err instanceof SpotifyAuthError)) throw err;
    if (err.reason === "not_connected") {
      return renderPage(
        c,
        <ProfilePage userEmail={userEmail(session)} flash={takeFlash(session)} state={{ kind: "not_connected" }} />,
      );
    }
    setFlash(session, "error", err.message);
    return c.redirect(REAUTHENTICATE_PATH);
  }

  try {
    const [profile, topTracks] = await Promise.all([
      getCurrentUser(accessToken),
      getTopTracks(accessToken, { limit: PROFILE_TOP_TRACKS, timeRange: currentSettings(session).timeRange }),
    ]);

    return renderPage(
      c,
      <ProfilePage
        userEmail={userEmail(session)}
        flash={takeFlash(session)}
        state={{
          kind: "connected",
          account: {
            spotifyId: profile.id,
            displayName: profile.display_name ?? profile.id,
            isPremium: isPremium(profile),
          },
          topTracks: topTracks.map(toTrackSummary),
        }}
      />,
    );
  } catch (err) {
    if (err instanceof SpotifyApiError && err.isUnauthorized) {
      // Token revoked on Spotify's side
      clearSpotifySession(session);
      setFlash(session, "error", SPOTIFY_SESSION_EXPIRED);
      return c.redirect(REAUTHENTICATE_PATH);
    }
    log.error("Failed to load Spotify profile", { user_id: userId, ...errorAttributes(err) });
    return renderPage(
      c,
      <ProfilePage
        userEmail={userEmail(session)}
        flash={{ type: "error", message: PROFILE_LOAD_FAILED }}
        state={{ kind: "not_connected" }}
      />,
    );
  }
});

pages.get("/customize", pageGuard(), (c) => {
  const session = c.get("session");
  return renderPage(
    c,
    <CustomizePage userEmail={userEmail(session)} flash={takeFlash(session)} settings={currentSettings(session)} />,
  );
});

pages.post("/customize", pageGuard(), async (c) => {
  const session = c.get("session");
  const form = await readForm(c);

  if (form.reset) {
    session.set("recommendationSettings", defaultRecommendationSettings());
    setFlash(session, "info", "Settings reset to defaults.");
    return c.redirect("/customize");
  }

  const parsed = recommendationSettingsSchema.safeParse(settingsFromForm(form));
  if (!parsed.success) {
    return renderPage(
      c,
      <CustomizePage
        userEmail={userEmail(session)}
        settings={currentSettings(session)}
        error={firstIssue(parsed.error)}
      />,
      400,
    );
  }

  session.set("recommendationSettings", parsed.data);
  setFlash(session, "success", "Recommendation settings saved.");
  return c.redirect("/profile");
});

export default pages;
