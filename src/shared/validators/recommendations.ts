/**
 * Recommendation settings and the request bodies of the playlist and queue
 * endpoints.
 *
 * Settings come from the customisation form: a time range for the seed
 * query and, per audio feature, an on/off switch with a target value. Only
 * enabled features are forwarded to Spotify as `target_<feature>`.
 */

import { z } from "zod";

export const TIME_RANGES = ["short_term", "medium_term", "long_term"] as const;
export type TimeRange = (typeof TIME_RANGES)[number];

export const TIME_RANGE_LABELS: Record<TimeRange, string> = {
  short_term: "Last 4 weeks",
  medium_term: "Last 6 months",
  long_term: "All time",
};

export const AUDIO_FEATURES = [
  "acousticness",
  "danceability",
  "energy",
  "instrumentalness",
  "liveness",
  "speechiness",
  "valence",
  "tempo",
  "popularity",
] as const;
export type AudioFeature = (typeof AUDIO_FEATURES)[number];

export interface FeatureRange {
  label: string;
  min: number;
  max: number;
  step: number;
  defaultTarget: number;
  /** Spotify expects whole numbers for this feature. */
  integer: boolean;
}

const unitRange = (label: string): FeatureRange => ({
  label,
  min: 0,
  max: 1,
  step: 0.05,
  defaultTarget: 0.5,
  integer: false,
});

export const FEATURE_RANGES: Record<AudioFeature, FeatureRange> = {
  acousticness: unitRange("Acousticness"),
  danceability: unitRange("Danceability"),
  energy: unitRange("Energy"),
  instrumentalness: unitRange("Instrumentalness"),
  liveness: unitRange("Liveness"),
  speechiness: unitRange("Speechiness"),
  valence: unitRange("Mood (valence)"),
  tempo: { label: "Tempo (BPM)", min: 40, max: 220, step: 1, defaultTarget: 120, integer: true },
  popularity: { label: "Popularity", min: 0, max: 100, step: 1, defaultTarget: 50, integer: true },
};

function featureSchema(feature: AudioFeature) {
  const range = FEATURE_RANGES[feature];
  const message = `${range.label} must be between ${range.min} and ${range.max}`;
  return z.object({
    enabled: z.boolean(),
    target: z.number({ invalid_type_error: message }).min(range.min, message).max(range.max, message),
  });
}

export const recommendationSettingsSchema = z.object({
  timeRange: z.enum(TIME_RANGES),
  features: z.object({
    acousticness: featureSchema("acousticness"),
    danceability: featureSchema("danceability"),
    energy: featureSchema("energy"),
    instrumentalness: featureSchema("instrumentalness"),
    liveness: featureSchema("liveness"),
    speechiness: featureSchema("speechiness"),
    valence: featureSchema("valence"),
    tempo: featureSchema("tempo"),
    popularity: featureSchema("popularity"),
  }),
});

export type RecommendationSettings = z.infer<typeof recommendationSettingsSchema>;
export type FeatureSetting = RecommendationSettings["features"][AudioFeature];

export function defaultRecommendationSettings(): RecommendationSettings {
  const feature = (name: AudioFeature): FeatureSetting => ({
    enabled: false,
    target: FEATURE_RANGES[name].defaultTarget,
  });
  return {
    timeRange: "short_term",
    features: {
      acousticness: feature("acousticness"),
      danceability: feature("danceability"),
      energy: feature("energy"),
      instrumentalness: feature("instrumentalness"),
      liveness: feature("liveness"),
      speechiness: feature("speechiness"),
      valence: feature("valence"),
      tempo: feature("tempo"),
      popularity: feature("popularity"),
    },
  };
}

/**
 * Turn the flat customisation form (`energy_enabled=on`, `energy=0.8`, ...)
 * into the nested settings shape. Missing values fall back to the feature's
 * default target; unparsable ones become NaN and fail validation.
 */
export function settingsFromForm(form: Record<string, unknown>): unknown {
  const text = (key: string): string | undefined => {
    const value = form[key];
    return typeof value === "string" ? value : undefined;
  };

  const features: Record<string, { enabled: boolean; target: number }> = {};
  for (const name of AUDIO_FEATURES) {
    const raw = text(name);
    features[name] = {
      enabled: text(`${name}_enabled`) === "on",
      target: raw === undefined || raw.trim() === "" ? FEATURE_RANGES[name].defaultTarget : Number(raw),
    };
  }

  return { timeRange: text("timeRange") ?? "short_term", features };
}

// ---------------------------------------------------------------------------
// Playlist / queue request bodies
// ---------------------------------------------------------------------------

export const TRACK_URI_PATTERN = /^spotify:track:[A-Za-z0-9]+$/;

const trackUri = z.string().regex(TRACK_URI_PATTERN, "Invalid Spotify track URI");

export const DEFAULT_PLAYLIST_NAME = "Customify Recommendations";

export const playlistRequestSchema = z.object({
  trackUris: z
    .array(trackUri)
    .min(1, "No tracks to add")
    .max(100, "A playlist can be created with at most 100 tracks"),
  name: z.string().trim().min(1).max(100).default(DEFAULT_PLAYLIST_NAME),
});

export const queueRequestSchema = z.object({
  trackUris: z
    .array(trackUri)
    .min(1, "No tracks to add")
    .max(20, "At most 20 tracks can be queued at once"),
});

