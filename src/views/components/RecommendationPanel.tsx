import { DEFAULT_PLAYLIST_NAME } from "../../shared/validators/recommendations";

export const PREMIUM_REQUIRED_MESSAGE = "Adding to the queue requires Spotify Premium.";

/**
 * Empty recommendation panel. `src/client/recommendations.ts` fills the list
 * from `/api/recommendations` and wires both buttons; it never enables the
 * queue button when `data-premium` is "false".
 */
export default function RecommendationPanel({ isPremium }: { isPremium: boolean }) {
  return (
    <section id="recommendations" data-endpoint="/api/recommendations" data-premium={isPremium ? "true" : "false"}>
      <div className="section-heading">
        <h2>Recommended for you</h2>
        <a href="/customize">Customize</a>
      </div>
      <p id="recommendations-status" className="muted" role="status">
        Loading recommendations...
      </p>
      <ul id="recommendations-list" className="track-grid"></ul>

      <div className="actions">
        <label htmlFor="playlist-name">Playlist name</label>
        <input id="playlist-name" type="text" maxLength={100} defaultValue={DEFAULT_PLAYLIST_NAME} />
        <button id="add-to-playlist" type="button" className="button" disabled>
          Add to playlist
        </button>
        <button
          id="add-to-queue"
          type="button"
          className="button button-secondary"
          disabled
          title={isPremium ? undefined : PREMIUM_REQUIRED_MESSAGE}
        >
          Add to queue
        </button>
      </div>
      {!isPremium && <p className="muted">{PREMIUM_REQUIRED_MESSAGE}</p>}
      <p id="action-status" role="status"></p>
    </section>
  );
}
