import Layout from "../components/Layout";
import type { FlashMessage } from "../../shared/types";

export interface HomePageProps {
  userEmail: string | null;
  /** Display name of the linked Spotify account, once connected in this session. */
  spotifyName?: string;
  flash?: FlashMessage;
}

export default function HomePage({ userEmail, spotifyName, flash }: HomePageProps) {
  return (
    <Layout title="Home" userEmail={userEmail} flash={flash}>
      <section className="hero">
        <h1>Discover music tuned to you</h1>
        <p>
          Customify reads your top tracks on Spotify and finds new ones with the mood, tempo and
          energy you ask for.
        </p>
        {userEmail && spotifyName && <p className="muted">Connected to Spotify as {spotifyName}.</p>}
        {userEmail ? (
          <div className="hero-actions">
            <a className="button" href="/profile">
              Go to your profile
            </a>
            <a className="button button-secondary" href="/customize">
              Customize recommendations
            </a>
          </div>
        ) : (
          <div className="hero-actions">
            <a className="button" href="/register">
              Create an account
            </a>
            <a className="button button-secondary" href="/login">
              Log in
            </a>
          </div>
        )}
      </section>
    </Layout>
  );
}
