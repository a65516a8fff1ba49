/**
 * Shared types used by the server, the rendered views and the browser script.
 *
 * These types define the JSON contract of the `/api/*` endpoints the browser
 * script consumes, so both sides agree on the shape without duplicating it.
 */

/** The Spotify account linked to a user, as shown on the profile page. */
export interface SpotifyAccount {
  spotifyId: string;
  displayName: string;
  isPremium: boolean;
}

/**
 * A track tile. Mapped from Spotify's track object and trimmed to what the
 * profile page and the recommendation panel render.
 */
export interface TrackSummary {
  id: string;
  uri: string;
  name: string;
  artists: string;
  albumName: string;
  imageUrl: string | null;
  externalUrl: string | null;
  previewUrl: string | null;
  popularity: number | null;
}

/** Envelope for successful API responses, the shape the client fetch wrapper expects. */
export interface ApiResponse<T> {
  data: T;
}

/** Envelope for error API responses. `reauthenticate` points at the OAuth entry when the Spotify token is gone. */
export interface ApiError {
  error: string;
  errorId?: string;
  reauthenticate?: string;
}

/**
 * GET /api/recommendations. A provider failure yields an empty list plus a
 * message rather than an error status, so the panel can always render.
 * `reauthenticate` is set when Spotify rejected the access token.
 */
export interface RecommendationsResponse {
  data: TrackSummary[];
  error?: string;
  reauthenticate?: string;
}

/** POST /api/playlist */
export interface PlaylistResult {
  id: string;
  name: string;
  url: string | null;
}

/** POST /api/queue */
export interface QueueResult {
  queued: number;
}

export type FlashType = "success" | "error" | "info" | "warning";

/** One-shot message stored in the session and shown on the next rendered page. */
export interface FlashMessage {
  type: FlashType;
  message: string;
}
