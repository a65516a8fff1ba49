import Layout from "../components/Layout";
import AuthForm from "../components/AuthForm";
import type { FlashMessage } from "../../shared/types";

export interface LoginPageProps {
  flash?: FlashMessage;
  email?: string;
  error?: string;
}

export default function LoginPage({ flash, email, error }: LoginPageProps) {
  return (
    <Layout title="Log in" userEmail={null} flash={flash}>
      <h1>Log in</h1>
      <AuthForm mode="login" email={email} error={error} />
      <p className="muted">
        No account yet? <a href="/register">Register</a>
      </p>
    </Layout>
  );
}
