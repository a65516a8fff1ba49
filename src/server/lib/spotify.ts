/**
 * Spotify Web API client.
 *
 * Thin wrappers over the handful of endpoints the app uses. Every call goes
 * through `spotifyRequest`, which adds the bearer token and a timeout,
 * retries short 429 rate limits, validates the JSON body with zod and turns
 * every failure into a `SpotifyApiError`.
 */

import type { z } from "zod";
import type { TrackSummary } from "../../shared/types";
import type { TimeRange } from "../../shared/validators/recommendations";
import {
  spotifyErrorBodySchema,
  spotifyPlaylistSchema,
  spotifyRecommendationsSchema,
  spotifySnapshotSchema,
  spotifyTopTracksSchema,
  spotifyUserProfileSchema,
  type SpotifyPlaylist,
  type SpotifyTrack,
  type SpotifyUserProfile,
} from "../../shared/validators/spotify";
import { DataProcessingError, SpotifyApiError } from "./errors";

export const SPOTIFY_API_BASE_URL = "https://api.spotify.com/v1";

const REQUEST_TIMEOUT_MS = 10_000;
const MAX_RETRIES = 2;
// Longer Retry-After values fail the request instead of holding it open
const MAX_RETRY_AFTER_SECONDS = 30;

type QueryValue = string | number | undefined;

interface RequestOptions {
  method?: "GET" | "POST" | "PUT" | "DELETE";
  query?: Record<string, QueryValue>;
  body?: unknown;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function buildUrl(path: string, query?: Record<string, QueryValue>): string {
  const url = new URL(`${SPOTIFY_API_BASE_URL}${path}`);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function readErrorMessage(res: Response): Promise<string> {
  try {
    const parsed = spotifyErrorBodySchema.safeParse(await res.json());
    if (parsed.success && parsed.data.error.message) {
      return parsed.data.error.message;
    }
  } catch {
    // Non-JSON error body (e.g. an HTML gateway page); fall through.
  }
  return `HTTP ${res.status}`;
}

/**
 * Issue a request, retrying 429 responses up to MAX_RETRIES times. Resolves
 * with the first non-429 response that is ok; everything else throws.
 */
async function send(accessToken: string, path: string, options: RequestOptions): Promise<Response> {
  const url = buildUrl(path, options.query);
  const headers: Record<string, string> = { Authorization: `Bearer ${accessToken}` };
  if (options.body !== undefined) headers["Content-Type"] = "application/json";

  for (let attempt = 0; ; attempt++) {
    let res: Response;
    try {
      res = await fetch(url, {
        method: options.method ?? "GET",
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SpotifyApiError(`Network error calling Spotify: ${message}`, { endpoint: path });
    }

    if (res.status === 429) {
      const header = res.headers.get("Retry-After");
      const retryAfter = header === null ? 2 ** attempt : Number(header);

      if (attempt >= MAX_RETRIES || !(retryAfter <= MAX_RETRY_AFTER_SECONDS)) {
        throw new SpotifyApiError("Spotify rate limit exceeded. Try again later.", {
          status: 429,
          endpoint: path,
          context: { retryAfter },
        });
      }
      await sleep(retryAfter * 1000);
      continue;
    }

    if (!res.ok) {
      const message = await readErrorMessage(res);
      throw new SpotifyApiError(message, { status: res.status, endpoint: path });
    }

    return res;
  }
}

/** Request an endpoint that answers with JSON and validate the body. */
export async function spotifyRequest<S extends z.ZodTypeAny>(
  accessToken: string,
  path: string,
  schema: S,
  options: RequestOptions = {},
): Promise<z.infer<S>> {
  const res = await send(accessToken, path, options);
  let json: unknown;
  try {
    json = await res.json();
  } catch {
    throw new DataProcessingError("Spotify returned a malformed response", path);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new DataProcessingError("Unexpected response from Spotify", path, {
      issues: parsed.error.issues.slice(0, 5).map((issue) => issue.message),
    });
  }
  return parsed.data;
}

/** Request an endpoint whose response body is irrelevant (204 / 200 with no useful payload). */
export async function spotifyCommand(
  accessToken: string,
  path: string,
  options: RequestOptions,
): Promise<void> {
  await send(accessToken, path, options);
}

// ---------------------------------------------------------------------------
// Endpoints
// ---------------------------------------------------------------------------

export function getCurrentUser(accessToken: string): Promise<SpotifyUserProfile> {
  return spotifyRequest(accessToken, "/me", spotifyUserProfileSchema);
}

export function isPremium(profile: SpotifyUserProfile): boolean {
  return profile.product === "premium";
}

export async function getTopTracks(
  accessToken: string,
  options: { limit?: number; timeRange?: TimeRange } = {},
): Promise<SpotifyTrack[]> {
  const limit = Math.min(Math.max(options.limit ?? 10, 1), 50);
  const data = await spotifyRequest(accessToken, "/me/top/tracks", spotifyTopTracksSchema, {
    query: { limit, time_range: options.timeRange ?? "short_term" },
  });
  return data.items;
}

/**
 * GET /recommendations. At most five seeds are accepted by Spotify; extra
 * ones are dropped here. `targets` are passed through as query parameters
 * (`target_energy`, `target_tempo`, ...).
 */
export async function getRecommendations(
  accessToken: string,
  options: { seedTrackIds: string[]; targets?: Record<string, number>; limit?: number },
): Promise<SpotifyTrack[]> {
  const seeds = options.seedTrackIds.slice(0, 5);
  if (seeds.length === 0) return [];

  const data = await spotifyRequest(accessToken, "/recommendations", spotifyRecommendationsSchema, {
    query: {
      seed_tracks: seeds.join(","),
      limit: Math.min(Math.max(options.limit ?? 20, 1), 100),
      market: "from_token",
      ...options.targets,
    },
  });
  return data.tracks.filter((track): track is SpotifyTrack => track !== null);
}

export function createPlaylist(
  accessToken: string,
  spotifyUserId: string,
  options: { name: string; description: string; isPublic?: boolean },
): Promise<SpotifyPlaylist> {
  return spotifyRequest(
    accessToken,
    `/users/${encodeURIComponent(spotifyUserId)}/playlists`,
    spotifyPlaylistSchema,
    {
      method: "POST",
      body: {
        name: options.name,
        description: options.description,
        public: options.isPublic ?? true,
      },
    },
  );
}

export async function addTracksToPlaylist(
  accessToken: string,
  playlistId: string,
  trackUris: string[],
): Promise<string> {
  const data = await spotifyRequest(
    accessToken,
    `/playlists/${encodeURIComponent(playlistId)}/tracks`,
    spotifySnapshotSchema,
    { method: "POST", body: { uris: trackUris } },
  );
  return data.snapshot_id;
}

/** Add one item to the end of the user's playback queue. Premium only. */
export function addToQueue(accessToken: string, trackUri: string): Promise<void> {
  return spotifyCommand(accessToken, "/me/player/queue", {
    method: "POST",
    query: { uri: trackUri },
  });
}

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

/** Map a Spotify track to the tile the views render. Prefers the 300px cover. */
export function toTrackSummary(track: SpotifyTrack): TrackSummary {
  const images = track.album.images;
  const imageUrl = images.find((img) => img.width === 300)?.url ?? images[0]?.url ?? null;

  return {
    id: track.id,
    uri: track.uri,
    name: track.name,
    artists: track.artists.map((artist) => artist.name).join(", ") || "Unknown artist",
    albumName: track.album.name,
    imageUrl,
    externalUrl: track.external_urls.spotify ?? null,
    previewUrl: track.preview_url ?? null,
    popularity: track.popularity ?? null,
  };
}
