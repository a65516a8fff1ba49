import type { TrackSummary } from "../../shared/types";

/**
 * Album cover, title and artists of one track. The browser script builds the
 * same markup for recommendations, so class names here are shared with
 * `src/client/recommendations.ts`.
 */
export default function TrackTile({ track }: { track: TrackSummary }) {
  return (
    <li className="track-tile" data-track-uri={track.uri}>
      {track.imageUrl ? (
        <img className="track-cover" src={track.imageUrl} alt={track.albumName} width={150} height={150} />
      ) : (
        <div className="track-cover track-cover-empty" aria-hidden="true" />
      )}
      <div className="track-meta">
        {track.externalUrl ? (
          <a className="track-name" href={track.externalUrl} target="_blank" rel="noreferrer">
            {track.name}
          </a>
        ) : (
          <span className="track-name">{track.name}</span>
        )}
        <span className="track-artists">{track.artists}</span>
      </div>
    </li>
  );
}
