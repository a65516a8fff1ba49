/**
 * JSON endpoints used by the browser script
 *
 *   GET  /api/recommendations - Recommended tracks for the current settings
 *   POST /api/playlist        - Create a playlist from track URIs
 *   POST /api/queue           - Add track URIs to the playback queue (Premium)
 *
 * All three require a signed-in user with a usable Spotify token. When the
 * token cannot be obtained the answer is 401 with `reauthenticate` pointing
 * at the OAuth entry.
 */
import { Hono, type Context } from "hono";
import { createMiddleware } from "hono/factory";
import type { z } from "zod";
import type { Env } from "../types";
import {
  DataProcessingError,
  SPOTIFY_SESSION_EXPIRED,
  SpotifyApiError,
  SpotifyAuthError,
  ValidationError,
  errorAttributes,
} from "../lib/errors";
import { firstIssue } from "../lib/form";
import { REAUTHENTICATE_PATH, ensureAccessToken } from "../lib/oauth";
import { assembleRecommendations } from "../lib/recommendations";
import {
  addToQueue,
  addTracksToPlaylist,
  createPlaylist,
  getCurrentUser,
  isPremium,
} from "../lib/spotify";
import { authGuard, clearSpotifySession, currentSettings } from "../middleware/session";
import type {
  ApiError,
  ApiResponse,
  PlaylistResult,
  QueueResult,
  RecommendationsResponse,
} from "../../shared/types";
import { playlistRequestSchema, queueRequestSchema } from "../../shared/validators/recommendations";

type ApiEnv = { Bindings: Env; Variables: { accessToken: string } };

export const PLAYLIST_DESCRIPTION = "Created with Customify - Your personalized music recommendations";
export const PREMIUM_REQUIRED = "You need Spotify Premium to add tracks to your queue";
export const NO_ACTIVE_DEVICE = "No active Spotify device. Start playback on a device and try again.";

/** Resolve the Spotify token once per request, or answer 401 with the OAuth entry. */
function spotifyTokenGuard() {
  return createMiddleware<ApiEnv>(async (c, next) => {
    try {
      c.set("accessToken", await ensureAccessToken(c.env, c.get("session"), c.get("logger")));
    } catch (err) {
      if (!(err instanceof SpotifyAuthError)) throw err;
      return c.json<ApiError>({ error: err.message, reauthenticate: REAUTHENTICATE_PATH }, 401);
    }
    await next();
  });
}

/** A failed or unreadable Web API call. */
function isSpotifyFailure(err: unknown): err is SpotifyApiError | DataProcessingError {
  return err instanceof SpotifyApiError || err instanceof DataProcessingError;
}

/** Spotify refused the token mid-request: drop it and send the user back through OAuth. */
function tokenRejected(c: Context<ApiEnv>, err: SpotifyApiError) {
  clearSpotifySession(c.get("session"));
  c.get("logger").warn("Spotify rejected the access token", errorAttributes(err));
  return c.json<ApiError>({ error: SPOTIFY_SESSION_EXPIRED, reauthenticate: REAUTHENTICATE_PATH }, 401);
}

/** Parse a JSON body against `schema`; a failure carries the message for a 400. */
async function parseJson<S extends z.ZodTypeAny>(
  req: Request,
  schema: S,
): Promise<{ ok: true; data: z.infer<S> } | { ok: false; error: ValidationError }> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return { ok: false, error: new ValidationError("Request body must be JSON", { endpoint: new URL(req.url).pathname }) };
  }
  const parsed = schema.safeParse(body);
  if (parsed.success) return { ok: true, data: parsed.data };
  return {
    ok: false,
    error: new ValidationError(firstIssue(parsed.error), {
      endpoint: new URL(req.url).pathname,
      issue_count: parsed.error.issues.length,
    }),
  };
}

const api = new Hono<ApiEnv>();

api.use("/recommendations", authGuard(), spotifyTokenGuard());
api.use("/playlist", authGuard(), spotifyTokenGuard());
api.use("/queue", authGuard(), spotifyTokenGuard());

api.get("/recommendations", async (c) => {
  const session = c.get("session");
  const result = await assembleRecommendations(c.get("accessToken"), currentSettings(session), c.get("logger"));
  if (result.reauthenticate) clearSpotifySession(session);
  return c.json<RecommendationsResponse>(result);
});

api.post("/playlist", async (c) => {
  const log = c.get("logger");
  const input = await parseJson(c.req.raw, playlistRequestSchema);
  if (!input.ok) {
    log.warn("Rejected request body", errorAttributes(input.error));
    return c.json<ApiError>({ error: input.error.message }, 400);
  }

  const accessToken = c.get("accessToken");
  try {
    const profile = await getCurrentUser(accessToken);
    const playlist = await createPlaylist(accessToken, profile.id, {
      name: input.data.name,
      description: PLAYLIST_DESCRIPTION,
    });
    await addTracksToPlaylist(accessToken, playlist.id, input.data.trackUris);

    log.info("Playlist created", { playlist_id: playlist.id, track_count: input.data.trackUris.length });
    return c.json<ApiResponse<PlaylistResult>>({
      data: { id: playlist.id, name: playlist.name, url: playlist.external_urls.spotify ?? null },
    });
  } catch (err) {
    if (!isSpotifyFailure(err)) throw err;
    if (err instanceof SpotifyApiError && err.isUnauthorized) return tokenRejected(c, err);
    log.error("Playlist creation failed", errorAttributes(err));
    return c.json<ApiError>({ error: `Could not create playlist: ${err.message}`, errorId: err.errorId }, 502);
  }
});

api.post("/queue", async (c) => {
  const log = c.get("logger");
  const input = await parseJson(c.req.raw, queueRequestSchema);
  if (!input.ok) {
    log.warn("Rejected request body", errorAttributes(input.error));
    return c.json<ApiError>({ error: input.error.message }, 400);
  }

  const accessToken = c.get("accessToken");
  let queued = 0;
  try {
    const profile = await getCurrentUser(accessToken);
    if (!isPremium(profile)) {
      log.warn("Queue add rejected for non-Premium account", { spotify_id: profile.id });
      return c.json<ApiError>({ error: PREMIUM_REQUIRED }, 403);
    }

    // Sequential so the queue keeps the list order
    for (const uri of input.data.trackUris) {
      await addToQueue(accessToken, uri);
      queued++;
    }
  } catch (err) {
    if (!isSpotifyFailure(err)) throw err;
    if (err instanceof SpotifyApiError && err.isUnauthorized) return tokenRejected(c, err);
    log.error("Queue add failed", { ...errorAttributes(err), queued });
    const noDevice = err instanceof SpotifyApiError && err.status === 404;
    const error = noDevice ? NO_ACTIVE_DEVICE : `Could not add tracks to the queue: ${err.message}`;
    return c.json<ApiError>({ error, errorId: err.errorId }, 502);
  }

  log.info("Tracks queued", { track_count: queued });
  return c.json<ApiResponse<QueueResult>>({ data: { queued } });
});

export default api;
