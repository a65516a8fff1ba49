/**
 * Zod schemas for the Spotify Web API responses this app reads.
 *
 * Only the fields the app uses are declared; zod strips the rest. Anything
 * Spotify may omit for regional or local content is optional or nullable.
 */

import { z } from "zod";

export const spotifyImageSchema = z.object({
  url: z.string(),
  height: z.number().nullable().optional(),
  width: z.number().nullable().optional(),
});

export const spotifyArtistSimpleSchema = z.object({
  id: z.string().nullable().optional(),
  name: z.string(),
});

export const spotifyAlbumSimpleSchema = z.object({
  id: z.string().nullable().optional(),
  name: z.string(),
  images: z.array(spotifyImageSchema).default([]),
});

export const spotifyTrackSchema = z.object({
  id: z.string(),
  uri: z.string(),
  name: z.string(),
  artists: z.array(spotifyArtistSimpleSchema).default([]),
  album: spotifyAlbumSimpleSchema,
  external_urls: z.object({ spotify: z.string().optional() }).default({}),
  preview_url: z.string().nullable().optional(),
  popularity: z.number().optional(),
});

export const spotifyTopTracksSchema = z.object({
  items: z.array(spotifyTrackSchema),
});

export const spotifyRecommendationsSchema = z.object({
  // Unavailable tracks come back as null
  tracks: z.array(spotifyTrackSchema.nullable()),
});

export const spotifyUserProfileSchema = z.object({
  id: z.string(),
  display_name: z.string().nullable().optional(),
  email: z.string().nullable().optional(),
  // "premium", "free" or "open"; absent without the user-read-private scope
  product: z.string().optional(),
  country: z.string().optional(),
  images: z.array(spotifyImageSchema).optional(),
});

export const spotifyPlaylistSchema = z.object({
  id: z.string(),
  name: z.string(),
  external_urls: z.object({ spotify: z.string().optional() }).default({}),
});

export const spotifySnapshotSchema = z.object({
  snapshot_id: z.string(),
});

export const spotifyErrorBodySchema = z.object({
  error: z.object({
    status: z.number().optional(),
    message: z.string().optional(),
    reason: z.string().optional(),
  }),
});

export type SpotifyTrack = z.infer<typeof spotifyTrackSchema>;
export type SpotifyUserProfile = z.infer<typeof spotifyUserProfileSchema>;
export type SpotifyPlaylist = z.infer<typeof spotifyPlaylistSchema>;
