import { describe, it, expect, vi, beforeEach, type MockInstance } from "vitest";
import { render, screen, fireEvent, waitFor } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import RecommendationPanel, { PREMIUM_REQUIRED_MESSAGE } from "../views/components/RecommendationPanel";
import type { TrackSummary } from "../shared/types";
import { NO_RECOMMENDATIONS, initRecommendations, renderTrackTile } from "./recommendations";

function track(id: string, overrides: Partial<TrackSummary> = {}): TrackSummary {
  return {
    id,
    uri: `spotify:track:${id}`,
    name: `Track ${id}`,
    artists: `Artist ${id}`,
    albumName: `Album ${id}`,
    imageUrl: `https://example.com/${id}.jpg`,
    externalUrl: `https://open.spotify.com/track/${id}`,
    previewUrl: null,
    popularity: 50,
    ...overrides,
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function mountPanel(isPremium: boolean): HTMLElement {
  render(<RecommendationPanel isPremium={isPremium} />);
  const root = document.getElementById("recommendations");
  if (!root) throw new Error("panel not rendered");
  return root;
}

function byId(id: string): HTMLElement {
  const element = document.getElementById(id);
  if (!element) throw new Error(`#${id} not rendered`);
  return element;
}

const playlistButton = () => screen.getByRole<HTMLButtonElement>("button", { name: "Add to playlist" });
const queueButton = () => screen.getByRole<HTMLButtonElement>("button", { name: "Add to queue" });

let fetchSpy: MockInstance<typeof fetch>;

beforeEach(() => {
  fetchSpy = vi.spyOn(globalThis, "fetch");
});

describe("renderTrackTile", () => {
  it("builds the same tile markup as the server view", () => {
    const tile = renderTrackTile(track("abc"));

    expect(tile.className).toBe("track-tile");
    expect(tile.dataset.trackUri).toBe("spotify:track:abc");
    expect(tile.querySelector("img")?.getAttribute("src")).toBe("https://example.com/abc.jpg");
    const link = tile.querySelector("a.track-name");
    expect(link?.textContent).toBe("Track abc");
    expect(link?.getAttribute("href")).toBe("https://open.spotify.com/track/abc");
    expect(tile.querySelector(".track-artists")?.textContent).toBe("Artist abc");
  });

  it("falls back to a placeholder cover and a plain title", () => {
    const tile = renderTrackTile(track("abc", { imageUrl: null, externalUrl: null }));

    expect(tile.querySelector("img")).toBeNull();
    expect(tile.querySelector(".track-cover-empty")).not.toBeNull();
    expect(tile.querySelector("span.track-name")?.textContent).toBe("Track abc");
  });
});

describe("initRecommendations", () => {
  it("renders the tiles and enables both buttons for Premium users", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ data: [track("a"), track("b")] }));
    const root = mountPanel(true);

    await initRecommendations(root);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0][0]).toBe("/api/recommendations");
    expect(root.querySelectorAll("#recommendations-list .track-tile")).toHaveLength(2);
    expect(byId("recommendations-status").textContent).toBe("");
    expect(playlistButton().disabled).toBe(false);
    expect(queueButton().disabled).toBe(false);
  });

  it("keeps the queue button disabled for non-Premium users", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ data: [track("a")] }));
    const root = mountPanel(false);

    await initRecommendations(root);
    fireEvent.click(queueButton());

    expect(playlistButton().disabled).toBe(false);
    expect(queueButton().disabled).toBe(true);
    expect(queueButton().title).toBe(PREMIUM_REQUIRED_MESSAGE);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("shows the empty message when there is nothing to recommend", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ data: [] }));
    const root = mountPanel(true);

    await initRecommendations(root);

    expect(byId("recommendations-status").textContent).toBe(NO_RECOMMENDATIONS);
    expect(playlistButton().disabled).toBe(true);
    expect(queueButton().disabled).toBe(true);
  });

  it("shows the provider error returned alongside an empty list", async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({ data: [], error: "Could not load recommendations from Spotify." }),
    );
    const root = mountPanel(true);

    await initRecommendations(root);

    expect(byId("recommendations-status").textContent).toBe("Could not load recommendations from Spotify.");
    expect(playlistButton().disabled).toBe(true);
  });

  it("offers a reconnect link alongside an empty list", async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({ data: [], error: "Spotify session expired", reauthenticate: "/spotify/login" }),
    );
    const root = mountPanel(true);

    await initRecommendations(root);

    const status = byId("recommendations-status");
    expect(status.textContent).toBe("Spotify session expired Reconnect Spotify");
    expect(status.querySelector("a")?.getAttribute("href")).toBe("/spotify/login");
  });

  it("offers a reconnect link when the Spotify session is gone", async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({ error: "Spotify session expired", reauthenticate: "/spotify/login" }, 401),
    );
    const root = mountPanel(true);

    await initRecommendations(root);

    const status = byId("recommendations-status");
    expect(status.textContent).toBe("Spotify session expired Reconnect Spotify");
    expect(status.querySelector("a")?.getAttribute("href")).toBe("/spotify/login");
    expect(queueButton().disabled).toBe(true);
  });

  it("creates a playlist from the loaded tracks", async () => {
    const user = userEvent.setup();
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ data: [track("a"), track("b")] }))
      .mockResolvedValueOnce(
        jsonResponse({ data: { id: "playlist_1", name: "Road Trip", url: "https://open.spotify.com/playlist/playlist_1" } }),
      );
    const root = mountPanel(true);
    await initRecommendations(root);

    const nameInput = screen.getByLabelText("Playlist name");
    await user.clear(nameInput);
    await user.type(nameInput, "Road Trip");
    await user.click(playlistButton());

    const actionStatus = byId("action-status");
    await waitFor(() => expect(actionStatus.textContent).toBe('Created playlist "Road Trip".'));
    expect(actionStatus.dataset.state).toBe("success");

    const [input, init] = fetchSpy.mock.calls[1];
    expect(input).toBe("/api/playlist");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      trackUris: ["spotify:track:a", "spotify:track:b"],
      name: "Road Trip",
    });
  });

  it("falls back to the default playlist name when the field is blank", async () => {
    const user = userEvent.setup();
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ data: [track("a")] }))
      .mockResolvedValueOnce(jsonResponse({ data: { id: "p", name: "Customify Recommendations", url: null } }));
    const root = mountPanel(true);
    await initRecommendations(root);

    await user.clear(screen.getByLabelText("Playlist name"));
    await user.click(playlistButton());

    await waitFor(() => expect(fetchSpy).toHaveBeenCalledTimes(2));
    const [, init] = fetchSpy.mock.calls[1];
    expect(JSON.parse(String(init?.body))).toEqual({
      trackUris: ["spotify:track:a"],
      name: "Customify Recommendations",
    });
  });

  it("queues the tracks for Premium users", async () => {
    const user = userEvent.setup();
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ data: [track("a"), track("b")] }))
      .mockResolvedValueOnce(jsonResponse({ data: { queued: 2 } }));
    const root = mountPanel(true);
    await initRecommendations(root);

    await user.click(queueButton());

    await waitFor(() => expect(byId("action-status").textContent).toBe("Added 2 tracks to your queue."));
    const [input, init] = fetchSpy.mock.calls[1];
    expect(input).toBe("/api/queue");
    expect(JSON.parse(String(init?.body))).toEqual({ trackUris: ["spotify:track:a", "spotify:track:b"] });
  });

  it("reports a failed action and re-enables the buttons", async () => {
    const user = userEvent.setup();
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ data: [track("a")] }))
      .mockResolvedValueOnce(jsonResponse({ error: "No active Spotify device" }, 404));
    const root = mountPanel(true);
    await initRecommendations(root);

    await user.click(queueButton());

    const actionStatus = byId("action-status");
    await waitFor(() => expect(actionStatus.textContent).toBe("No active Spotify device"));
    expect(actionStatus.dataset.state).toBe("error");
    expect(playlistButton().disabled).toBe(false);
    expect(queueButton().disabled).toBe(false);
  });

  it("disables both buttons while an action is in flight", async () => {
    const user = userEvent.setup();
    let respond: (res: Response) => void = () => {};
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ data: [track("a")] }))
      .mockReturnValueOnce(
        new Promise<Response>((resolve) => {
          respond = resolve;
        }),
      );
    const root = mountPanel(true);
    await initRecommendations(root);

    await user.click(playlistButton());

    expect(playlistButton().disabled).toBe(true);
    expect(queueButton().disabled).toBe(true);
    expect(byId("action-status").textContent).toBe("Working...");

    respond(jsonResponse({ data: { id: "p", name: "Mine", url: null } }));

    await waitFor(() => expect(playlistButton().disabled).toBe(false));
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });
});
