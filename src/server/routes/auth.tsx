/**
 * Account routes
 *
 *   GET  /register - Registration form
 *   POST /register - Create an account and sign in
 *   GET  /login    - Login form
 *   POST /login    - Verify credentials and sign in
 *   POST /logout   - Unlink Spotify and destroy the session
 *
 * Login failures never reveal whether the email exists: unknown emails and
 * wrong passwords get the same message and status, and both pay for one
 * bcrypt comparison.
 */
import { Hono } from "hono";
import type { Env } from "../types";
import { createDb } from "../db";
import { createUser, deleteSpotifyConnection, findUserByEmail } from "../db/queries";
import { hashPassword, verifyPassword } from "../lib/password";
import { firstIssue, readForm } from "../lib/form";
import { renderPage } from "../lib/render";
import { clearSpotifySession, currentUserId, setFlash, takeFlash } from "../middleware/session";
import { loginSchema, registrationSchema } from "../../shared/validators/auth";
import LoginPage from "../../views/pages/LoginPage";
import RegisterPage from "../../views/pages/RegisterPage";

export const LOGGED_OUT_PATH = "/?logged_out=1";
export const INVALID_CREDENTIALS = "Invalid email or password";
export const REGISTRATION_FAILED = "Could not create an account with that email. Try logging in instead.";

const auth = new Hono<{ Bindings: Env }>();

auth.get("/register", (c) => {
  const session = c.get("session");
  if (currentUserId(session)) return c.redirect("/profile");
  return renderPage(c, <RegisterPage flash={takeFlash(session)} />);
});

auth.post("/register", async (c) => {
  const session = c.get("session");
  const form = await readForm(c);
  const parsed = registrationSchema.safeParse(form);

  if (!parsed.success) {
    return renderPage(c, <RegisterPage email={form.email} error={firstIssue(parsed.error)} />, 400);
  }

  const { email, password } = parsed.data;
  const db = createDb(c.env.DATABASE_URL);
  const created = await createUser(db, email, await hashPassword(password));

  if (!created) {
    c.get("logger").info("Registration rejected", { reason: "duplicate_email" });
    return renderPage(c, <RegisterPage email={email} error={REGISTRATION_FAILED} />, 400);
  }

  clearSpotifySession(session);
  session.set("userId", created.id);
  session.set("email", email);
  setFlash(session, "success", "Account created. Connect Spotify to get your recommendations.");
  c.get("logger").info("User registered", { user_id: created.id });

  return c.redirect("/profile");
});

auth.get("/login", (c) => {
  const session = c.get("session");
  if (currentUserId(session)) return c.redirect("/profile");
  return renderPage(c, <LoginPage flash={takeFlash(session)} />);
});

auth.post("/login", async (c) => {
  const session = c.get("session");
  const form = await readForm(c);
  const parsed = loginSchema.safeParse(form);

  if (!parsed.success) {
    return renderPage(c, <LoginPage email={form.email} error={firstIssue(parsed.error)} />, 400);
  }

  const { email, password } = parsed.data;
  const db = createDb(c.env.DATABASE_URL);
  const user = await findUserByEmail(db, email);
  const valid = await verifyPassword(password, user?.passwordHash);

  if (!user || !valid) {
    c.get("logger").warn("Login failed");
    return renderPage(c, <LoginPage email={email} error={INVALID_CREDENTIALS} />, 401);
  }

  // A different user may have been signed in on this browser
  clearSpotifySession(session);
  session.set("userId", user.id);
  session.set("email", user.email);
  setFlash(session, "success", "Welcome back!");
  c.get("logger").info("User logged in", { user_id: user.id });

  return c.redirect("/profile");
});

auth.post("/logout", async (c) => {
  const session = c.get("session");
  const userId = currentUserId(session);

  if (userId) {
    const db = createDb(c.env.DATABASE_URL);
    await deleteSpotifyConnection(db, userId);
    c.get("logger").info("User logged out", { user_id: userId });
  }

  // The session is gone, so the notice travels in the URL
  session.deleteSession();
  return c.redirect(LOGGED_OUT_PATH);
});

export default auth;
