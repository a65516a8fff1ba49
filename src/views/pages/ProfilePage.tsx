/**
 * Profile page. Three states: anonymous (login prompt only), signed in
 * without a Spotify link (connect button), and connected (account, top
 * tracks and the recommendation panel).
 */
import Layout from "../components/Layout";
import TrackTile from "../components/TrackTile";
import RecommendationPanel from "../components/RecommendationPanel";
import type { FlashMessage, SpotifyAccount, TrackSummary } from "../../shared/types";

export type ProfileState =
  | { kind: "anonymous" }
  | { kind: "not_connected" }
  | { kind: "connected"; account: SpotifyAccount; topTracks: TrackSummary[] };

export interface ProfilePageProps {
  userEmail: string | null;
  flash?: FlashMessage;
  state: ProfileState;
}

function ConnectPrompt() {
  return (
    <section className="card">
      <h2>Connect your Spotify account</h2>
      <p>We need read access to your top tracks to recommend new music.</p>
      <a className="button" href="/spotify/login">
        Connect Spotify
      </a>
    </section>
  );
}

function ConnectedProfile({ account, topTracks }: { account: SpotifyAccount; topTracks: TrackSummary[] }) {
  return (
    <>
      <section className="profile-header">
        <h1>{account.displayName}</h1>
        {account.isPremium ? (
          <span className="badge badge-premium">Premium</span>
        ) : (
          <span className="badge">Free</span>
        )}
      </section>

      <section>
        <h2>Your top tracks</h2>
        {topTracks.length === 0 ? (
          <p className="muted">Spotify has no top tracks for you yet. Listen to some music and come back.</p>
        ) : (
          <ul className="track-grid">
            {topTracks.map((track) => (
              <TrackTile key={track.id} track={track} />
            ))}
          </ul>
        )}
      </section>

      <RecommendationPanel isPremium={account.isPremium} />
    </>
  );
}

export default function ProfilePage({ userEmail, flash, state }: ProfilePageProps) {
  return (
    <Layout title="Profile" userEmail={userEmail} flash={flash}>
      {state.kind === "anonymous" && (
        <section className="card">
          <h1>Your profile</h1>
          <p>Log in to see your Spotify profile and recommendations.</p>
          <a className="button" href="/login">
            Log in
          </a>{" "}
          <a className="button button-secondary" href="/register">
            Register
          </a>
        </section>
      )}
      {state.kind === "not_connected" && <ConnectPrompt />}
      {state.kind === "connected" && <ConnectedProfile account={state.account} topTracks={state.topTracks} />}
    </Layout>
  );
}
