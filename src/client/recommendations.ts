/**
 * Recommendation panel on the profile page.
 *
 * Fetches `/api/recommendations` once, renders the tiles and wires the
 * "Add to playlist" and "Add to queue" buttons. Only one request is in
 * flight at a time; both buttons stay disabled while it runs. The queue
 * button is never enabled unless the panel is marked `data-premium="true"`.
 */

import type {
  ApiResponse,
  PlaylistResult,
  QueueResult,
  RecommendationsResponse,
  TrackSummary,
} from "../shared/types";
import { DEFAULT_PLAYLIST_NAME } from "../shared/validators/recommendations";
import { ApiRequestError, apiFetch } from "./lib/api";

export const NO_RECOMMENDATIONS = "No recommendations found. Try different settings.";

/** Same markup as the server-rendered `TrackTile`. */
export function renderTrackTile(track: TrackSummary): HTMLLIElement {
  const item = document.createElement("li");
  item.className = "track-tile";
  item.dataset.trackUri = track.uri;

  if (track.imageUrl) {
    const img = document.createElement("img");
    img.className = "track-cover";
    img.src = track.imageUrl;
    img.alt = track.albumName;
    img.width = 150;
    img.height = 150;
    item.append(img);
  } else {
    const placeholder = document.createElement("div");
    placeholder.className = "track-cover track-cover-empty";
    placeholder.setAttribute("aria-hidden", "true");
    item.append(placeholder);
  }

  const meta = document.createElement("div");
  meta.className = "track-meta";

  const name = document.createElement(track.externalUrl ? "a" : "span");
  name.className = "track-name";
  name.textContent = track.name;
  if (name instanceof HTMLAnchorElement && track.externalUrl) {
    name.href = track.externalUrl;
    name.target = "_blank";
    name.rel = "noreferrer";
  }

  const artists = document.createElement("span");
  artists.className = "track-artists";
  artists.textContent = track.artists;

  meta.append(name, artists);
  item.append(meta);
  return item;
}

function required<T extends Element>(root: ParentNode, selector: string, type: new () => T): T {
  const element = root.querySelector(selector);
  if (!(element instanceof type)) {
    throw new Error(`Recommendation panel is missing ${selector}`);
  }
  return element;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Something went wrong. Please try again.";
}

/**
 * Wire up the panel. Resolves once the initial recommendations have been
 * rendered (or the failure has been shown).
 */
export async function initRecommendations(root: HTMLElement): Promise<void> {
  const status = required(root, "#recommendations-status", HTMLElement);
  const list = required(root, "#recommendations-list", HTMLUListElement);
  const playlistButton = required(root, "#add-to-playlist", HTMLButtonElement);
  const queueButton = required(root, "#add-to-queue", HTMLButtonElement);
  const playlistName = required(root, "#playlist-name", HTMLInputElement);
  const actionStatus = required(root, "#action-status", HTMLElement);

  const isPremium = root.dataset.premium === "true";
  let tracks: TrackSummary[] = [];
  let busy = false;

  function updateButtons(): void {
    playlistButton.disabled = busy || tracks.length === 0;
    queueButton.disabled = busy || !isPremium || tracks.length === 0;
  }

  function showStatus(target: HTMLElement, message: string, reauthenticate?: string): void {
    target.textContent = message;
    if (reauthenticate) {
      const link = document.createElement("a");
      link.href = reauthenticate;
      link.textContent = "Reconnect Spotify";
      target.append(" ", link);
    }
  }

  /** Run one mutation at a time and report its outcome under the buttons. */
  async function runAction(action: () => Promise<string>): Promise<void> {
    if (busy) return;
    busy = true;
    updateButtons();
    actionStatus.textContent = "Working...";
    try {
      showStatus(actionStatus, await action());
      actionStatus.dataset.state = "success";
    } catch (err) {
      showStatus(actionStatus, errorMessage(err), err instanceof ApiRequestError ? err.reauthenticate : undefined);
      actionStatus.dataset.state = "error";
    } finally {
      busy = false;
      updateButtons();
    }
  }

  playlistButton.addEventListener("click", () => {
    void runAction(async () => {
      const res = await apiFetch<ApiResponse<PlaylistResult>>("/playlist", {
        method: "POST",
        body: JSON.stringify({
          trackUris: tracks.map((track) => track.uri),
          name: playlistName.value.trim() || DEFAULT_PLAYLIST_NAME,
        }),
      });
      return `Created playlist "${res.data.name}".`;
    });
  });

  queueButton.addEventListener("click", () => {
    if (!isPremium) return;
    void runAction(async () => {
      const res = await apiFetch<ApiResponse<QueueResult>>("/queue", {
        method: "POST",
        body: JSON.stringify({ trackUris: tracks.map((track) => track.uri) }),
      });
      return `Added ${res.data.queued} tracks to your queue.`;
    });
  });

  busy = true;
  updateButtons();
  try {
    const res = await apiFetch<RecommendationsResponse>("/recommendations");
    tracks = res.data;
    list.replaceChildren(...tracks.map(renderTrackTile));
    if (res.error) {
      showStatus(status, res.error, res.reauthenticate);
    } else if (tracks.length === 0) {
      status.textContent = NO_RECOMMENDATIONS;
    } else {
      status.textContent = "";
    }
  } catch (err) {
    showStatus(status, errorMessage(err), err instanceof ApiRequestError ? err.reauthenticate : undefined);
  } finally {
    busy = false;
    updateButtons();
  }
}
