import { describe, it, expect, beforeAll, afterAll, afterEach } from "vitest";
import { http, HttpResponse, type JsonBodyType } from "msw";
import {
  spotifyServer,
  overrides,
  makeSpotifyTrack,
  spotifyUserProfile,
} from "../../test/mocks/spotify-api";
import {
  SPOTIFY_API_BASE_URL,
  addToQueue,
  addTracksToPlaylist,
  createPlaylist,
  getCurrentUser,
  getRecommendations,
  getTopTracks,
  isPremium,
  toTrackSummary,
} from "./spotify";
import { DataProcessingError, SpotifyApiError } from "./errors";

// ---------------------------------------------------------------------------
// MSW lifecycle
// ---------------------------------------------------------------------------

beforeAll(() => spotifyServer.listen({ onUnhandledRequest: "error" }));
afterEach(() => spotifyServer.resetHandlers());
afterAll(() => spotifyServer.close());

/** Record the URL of every request to `path` and answer with `body`. */
function captureGet(path: string, body: JsonBodyType) {
  const urls: URL[] = [];
  spotifyServer.use(
    http.get(`${SPOTIFY_API_BASE_URL}${path}`, ({ request }) => {
      urls.push(new URL(request.url));
      return HttpResponse.json(body);
    }),
  );
  return urls;
}

// ---------------------------------------------------------------------------
// getCurrentUser / isPremium
// ---------------------------------------------------------------------------

describe("getCurrentUser", () => {
  it("returns the validated profile", async () => {
    const profile = await getCurrentUser("tok");
    expect(profile.id).toBe("spotify_user_1");
    expect(profile.display_name).toBe("Test User");
    expect(profile.product).toBe("premium");
  });

  it("sends the bearer token", async () => {
    let auth: string | null = null;
    spotifyServer.use(
      http.get(`${SPOTIFY_API_BASE_URL}/me`, ({ request }) => {
        auth = request.headers.get("Authorization");
        return HttpResponse.json(spotifyUserProfile);
      }),
    );
    await getCurrentUser("my_token");
    expect(auth).toBe("Bearer my_token");
  });

  it("throws SpotifyApiError with Spotify's message on 401", async () => {
    spotifyServer.use(overrides.userProfileError());
    const err = await getCurrentUser("tok").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SpotifyApiError);
    expect(err).toMatchObject({ status: 401, endpoint: "/me", message: "The access token expired" });
    expect(err instanceof SpotifyApiError && err.isUnauthorized).toBe(true);
  });

  it("falls back to the HTTP status when the error body is not JSON", async () => {
    spotifyServer.use(
      http.get(`${SPOTIFY_API_BASE_URL}/me`, () => {
        return new HttpResponse("<html>Bad gateway</html>", { status: 502 });
      }),
    );
    await expect(getCurrentUser("tok")).rejects.toThrow("HTTP 502");
  });

  it("throws DataProcessingError when the body does not match the schema", async () => {
    spotifyServer.use(
      http.get(`${SPOTIFY_API_BASE_URL}/me`, () => HttpResponse.json({ display_name: "No id" })),
    );
    await expect(getCurrentUser("tok")).rejects.toBeInstanceOf(DataProcessingError);
  });

  it("wraps network failures without a status", async () => {
    spotifyServer.use(http.get(`${SPOTIFY_API_BASE_URL}/me`, () => HttpResponse.error()));
    const err = await getCurrentUser("tok").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SpotifyApiError);
    expect(err).toMatchObject({ status: undefined });
    expect(err instanceof Error && err.message.startsWith("Network error calling Spotify")).toBe(true);
  });
});

describe("isPremium", () => {
  it("is true only for the premium product", () => {
    expect(isPremium({ id: "u", product: "premium" })).toBe(true);
    expect(isPremium({ id: "u", product: "free" })).toBe(false);
    expect(isPremium({ id: "u" })).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Rate limiting
// ---------------------------------------------------------------------------

describe("429 handling", () => {
  it("retries after Retry-After and returns the eventual response", async () => {
    let calls = 0;
    spotifyServer.use(
      http.get(`${SPOTIFY_API_BASE_URL}/me`, () => {
        calls++;
        if (calls === 1) {
          return HttpResponse.json(
            { error: { status: 429, message: "API rate limit exceeded" } },
            { status: 429, headers: { "Retry-After": "0" } },
          );
        }
        return HttpResponse.json(spotifyUserProfile);
      }),
    );

    const profile = await getCurrentUser("tok");
    expect(profile.id).toBe("spotify_user_1");
    expect(calls).toBe(2);
  });

  it("gives up after two retries", async () => {
    let calls = 0;
    spotifyServer.use(
      http.get(`${SPOTIFY_API_BASE_URL}/me`, () => {
        calls++;
        return HttpResponse.json({}, { status: 429, headers: { "Retry-After": "0" } });
      }),
    );

    const err = await getCurrentUser("tok").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SpotifyApiError);
    expect(err).toMatchObject({ status: 429, message: "Spotify rate limit exceeded. Try again later." });
    expect(calls).toBe(3);
  });

  it("fails immediately when Retry-After exceeds 30 seconds", async () => {
    spotifyServer.use(overrides.rateLimited("/me", "120"));
    const started = Date.now();
    await expect(getCurrentUser("tok")).rejects.toMatchObject({ status: 429 });
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

// ---------------------------------------------------------------------------
// getTopTracks
// ---------------------------------------------------------------------------

describe("getTopTracks", () => {
  it("defaults to 10 short-term tracks", async () => {
    const urls = captureGet("/me/top/tracks", { items: [makeSpotifyTrack("a")] });
    const tracks = await getTopTracks("tok");

    expect(tracks.map((t) => t.id)).toEqual(["a"]);
    expect(urls[0].searchParams.get("limit")).toBe("10");
    expect(urls[0].searchParams.get("time_range")).toBe("short_term");
  });

  it("passes the time range and clamps the limit to 50", async () => {
    const urls = captureGet("/me/top/tracks", { items: [] });
    await getTopTracks("tok", { limit: 500, timeRange: "long_term" });

    expect(urls[0].searchParams.get("limit")).toBe("50");
    expect(urls[0].searchParams.get("time_range")).toBe("long_term");
  });
});

// ---------------------------------------------------------------------------
// getRecommendations
// ---------------------------------------------------------------------------

describe("getRecommendations", () => {
  it("returns [] without calling Spotify when there are no seeds", async () => {
    const urls = captureGet("/recommendations", { tracks: [] });
    expect(await getRecommendations("tok", { seedTrackIds: [] })).toEqual([]);
    expect(urls).toHaveLength(0);
  });

  it("sends at most five seeds, the market and the targets", async () => {
    const urls = captureGet("/recommendations", { tracks: [] });
    await getRecommendations("tok", {
      seedTrackIds: ["s1", "s2", "s3", "s4", "s5", "s6"],
      targets: { target_energy: 0.8, target_tempo: 120 },
    });

    const params = urls[0].searchParams;
    expect(params.get("seed_tracks")).toBe("s1,s2,s3,s4,s5");
    expect(params.get("limit")).toBe("20");
    expect(params.get("market")).toBe("from_token");
    expect(params.get("target_energy")).toBe("0.8");
    expect(params.get("target_tempo")).toBe("120");
  });

  it("drops unavailable (null) tracks", async () => {
    captureGet("/recommendations", { tracks: [makeSpotifyTrack("r1"), null, makeSpotifyTrack("r2")] });
    const tracks = await getRecommendations("tok", { seedTrackIds: ["s1"] });
    expect(tracks.map((t) => t.id)).toEqual(["r1", "r2"]);
  });
});

// ---------------------------------------------------------------------------
// Playlist and queue
// ---------------------------------------------------------------------------

describe("createPlaylist", () => {
  it("posts name, description and visibility for the user", async () => {
    let body: unknown;
    let userId: unknown;
    spotifyServer.use(
      http.post(`${SPOTIFY_API_BASE_URL}/users/:userId/playlists`, async ({ request, params }) => {
        body = await request.json();
        userId = params.userId;
        return HttpResponse.json({ id: "pl1", name: "Mix", external_urls: {} }, { status: 201 });
      }),
    );

    const playlist = await createPlaylist("tok", "spotify_user_1", {
      name: "Mix",
      description: "Made for you",
    });

    expect(userId).toBe("spotify_user_1");
    expect(body).toEqual({ name: "Mix", description: "Made for you", public: true });
    expect(playlist).toEqual({ id: "pl1", name: "Mix", external_urls: {} });
  });

  it("surfaces Spotify errors", async () => {
    spotifyServer.use(overrides.playlistError());
    await expect(
      createPlaylist("tok", "u", { name: "Mix", description: "" }),
    ).rejects.toMatchObject({ status: 403, message: "Insufficient client scope" });
  });
});

describe("addTracksToPlaylist", () => {
  it("posts the URIs and returns the snapshot id", async () => {
    let body: unknown;
    spotifyServer.use(
      http.post(`${SPOTIFY_API_BASE_URL}/playlists/:playlistId/tracks`, async ({ request }) => {
        body = await request.json();
        return HttpResponse.json({ snapshot_id: "snap" }, { status: 201 });
      }),
    );

    const snapshot = await addTracksToPlaylist("tok", "pl1", ["spotify:track:a"]);
    expect(snapshot).toBe("snap");
    expect(body).toEqual({ uris: ["spotify:track:a"] });
  });
});

describe("addToQueue", () => {
  it("passes the URI as a query parameter", async () => {
    let uri: string | null = null;
    spotifyServer.use(
      http.post(`${SPOTIFY_API_BASE_URL}/me/player/queue`, ({ request }) => {
        uri = new URL(request.url).searchParams.get("uri");
        return new HttpResponse(null, { status: 204 });
      }),
    );

    await addToQueue("tok", "spotify:track:abc");
    expect(uri).toBe("spotify:track:abc");
  });

  it("throws a 404 SpotifyApiError when no device is active", async () => {
    spotifyServer.use(overrides.queueNoDevice());
    await expect(addToQueue("tok", "spotify:track:abc")).rejects.toMatchObject({
      status: 404,
      endpoint: "/me/player/queue",
    });
  });
});

// ---------------------------------------------------------------------------
// toTrackSummary
// ---------------------------------------------------------------------------

describe("toTrackSummary", () => {
  it("maps a track and prefers the 300px cover", () => {
    const summary = toTrackSummary({
      id: "t1",
      uri: "spotify:track:t1",
      name: "Song",
      artists: [{ name: "A" }, { name: "B" }],
      album: {
        name: "Album",
        images: [
          { url: "https://example.com/640.jpg", width: 640, height: 640 },
          { url: "https://example.com/300.jpg", width: 300, height: 300 },
        ],
      },
      external_urls: { spotify: "https://open.spotify.com/track/t1" },
      preview_url: "https://example.com/preview.mp3",
      popularity: 72,
    });

    expect(summary).toEqual({
      id: "t1",
      uri: "spotify:track:t1",
      name: "Song",
      artists: "A, B",
      albumName: "Album",
      imageUrl: "https://example.com/300.jpg",
      externalUrl: "https://open.spotify.com/track/t1",
      previewUrl: "https://example.com/preview.mp3",
      popularity: 72,
    });
  });

  it("falls back to the first image, then to null", () => {
    const base = {
      id: "t1",
      uri: "spotify:track:t1",
      name: "Song",
      artists: [],
      external_urls: {},
    };

    const withBig = toTrackSummary({
      ...base,
      album: { name: "X", images: [{ url: "https://example.com/big.jpg", width: 640 }] },
    });
    expect(withBig.imageUrl).toBe("https://example.com/big.jpg");

    const bare = toTrackSummary({ ...base, album: { name: "X", images: [] } });
    expect(bare).toMatchObject({
      imageUrl: null,
      artists: "Unknown artist",
      externalUrl: null,
      previewUrl: null,
      popularity: null,
    });
  });
});
