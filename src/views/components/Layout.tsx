/**
 * Document shell shared by every server-rendered page: head, top navigation,
 * the one-shot flash banner and the browser script.
 */
import type { ReactNode } from "react";
import type { FlashMessage } from "../../shared/types";
import FlashBanner from "./FlashBanner";

export interface LayoutProps {
  title: string;
  /** Signed-in user's email; null for anonymous visitors. */
  userEmail: string | null;
  flash?: FlashMessage;
  children: ReactNode;
}

export default function Layout({ title, userEmail, flash, children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{`${title} · Customify`}</title>
        <link rel="stylesheet" href="/static/styles.css" />
      </head>
      <body>
        <header className="topbar">
          <a href="/" className="brand">
            Customify
          </a>
          <nav className="nav">
            <a href="/profile">Profile</a>
            {userEmail ? (
              <>
                <a href="/customize">Customize</a>
                <span className="nav-user">{userEmail}</span>
                <form method="post" action="/logout" className="inline-form">
                  <button type="submit" className="link-button">
                    Log out
                  </button>
                </form>
              </>
            ) : (
              <>
                <a href="/login">Log in</a>
                <a href="/register">Register</a>
              </>
            )}
          </nav>
        </header>
        {flash && <FlashBanner flash={flash} />}
        <main className="content">{children}</main>
        <script type="module" src="/static/app.js"></script>
      </body>
    </html>
  );
}
