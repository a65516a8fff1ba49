/**
 * Email/password form used by the login and registration pages.
 *
 * `data-validate` opts the form into the browser script's pattern checks;
 * each `.field-error[data-for]` slot receives that field's message.
 */

export interface AuthFormProps {
  mode: "login" | "register";
  email?: string;
  error?: string;
}

export default function AuthForm({ mode, email, error }: AuthFormProps) {
  const isRegister = mode === "register";

  return (
    <form method="post" action={isRegister ? "/register" : "/login"} className="card auth-form" data-validate={mode} noValidate>
      {error && (
        <p className="form-error" role="alert">
          {error}
        </p>
      )}
      <label htmlFor="email">Email</label>
      <input id="email" name="email" type="email" autoComplete="email" defaultValue={email ?? ""} required />
      <p className="field-error" data-for="email"></p>

      <label htmlFor="password">Password</label>
      <input
        id="password"
        name="password"
        type="password"
        autoComplete={isRegister ? "new-password" : "current-password"}
        required
      />
      <p className="field-error" data-for="password"></p>

      {isRegister && (
        <>
          <label htmlFor="confirmPassword">Confirm password</label>
          <input id="confirmPassword" name="confirmPassword" type="password" autoComplete="new-password" required />
          <p className="field-error" data-for="confirmPassword"></p>
        </>
      )}

      <button type="submit" className="button">
        {isRegister ? "Create account" : "Log in"}
      </button>
    </form>
  );
}
