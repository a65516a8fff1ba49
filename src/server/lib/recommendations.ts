/**
 * Recommendation assembler.
 *
 * Seeds Spotify's recommendations endpoint with the user's top tracks and
 * the enabled audio-feature targets, then trims the answer to a short list
 * of tracks the user does not already have in their top tracks.
 */

import type { RecommendationsResponse, TrackSummary } from "../../shared/types";
import {
  AUDIO_FEATURES,
  FEATURE_RANGES,
  type RecommendationSettings,
} from "../../shared/validators/recommendations";
import { AppError, SPOTIFY_SESSION_EXPIRED, SpotifyApiError } from "./errors";
import type { Logger } from "./logger";
import { REAUTHENTICATE_PATH } from "./oauth";
import { getRecommendations, getTopTracks, toTrackSummary } from "./spotify";

export const TOP_TRACK_LIMIT = 10;
export const SEED_COUNT = 5;
export const REQUEST_LIMIT = 20;
export const RESULT_LIMIT = 10;

const FAILURE_MESSAGE = "Could not load recommendations from Spotify.";

/** `target_<feature>` query parameters for every enabled feature. */
export function toRecommendationTargets(settings: RecommendationSettings): Record<string, number> {
  const targets: Record<string, number> = {};
  for (const feature of AUDIO_FEATURES) {
    const { enabled, target } = settings.features[feature];
    if (!enabled) continue;
    targets[`target_${feature}`] = FEATURE_RANGES[feature].integer ? Math.round(target) : target;
  }
  return targets;
}

/**
 * Build the recommendation list for the profile page. Never throws: a
 * failed provider call yields an empty list and a message for the panel.
 * A rejected token additionally sets `reauthenticate`; the caller owns the
 * session and drops the token.
 */
export async function assembleRecommendations(
  accessToken: string,
  settings: RecommendationSettings,
  log?: Logger,
): Promise<RecommendationsResponse> {
  try {
    const topTracks = await getTopTracks(accessToken, {
      limit: TOP_TRACK_LIMIT,
      timeRange: settings.timeRange,
    });
    if (topTracks.length === 0) return { data: [] };

    const recommended = await getRecommendations(accessToken, {
      seedTrackIds: topTracks.slice(0, SEED_COUNT).map((track) => track.id),
      targets: toRecommendationTargets(settings),
      limit: REQUEST_LIMIT,
    });

    // Seeds are a subset of the top tracks, so this excludes both
    const seen = new Set(topTracks.map((track) => track.id));
    const data: TrackSummary[] = [];
    for (const track of recommended) {
      if (seen.has(track.id)) continue;
      seen.add(track.id);
      data.push(toTrackSummary(track));
      if (data.length === RESULT_LIMIT) break;
    }
    return { data };
  } catch (err) {
    log?.warn("Recommendations unavailable", {
      "error.message": err instanceof Error ? err.message : String(err),
      ...(err instanceof AppError ? err.context : {}),
    });
    if (err instanceof SpotifyApiError && err.isUnauthorized) {
      return { data: [], error: SPOTIFY_SESSION_EXPIRED, reauthenticate: REAUTHENTICATE_PATH };
    }
    return { data: [], error: FAILURE_MESSAGE };
  }
}
