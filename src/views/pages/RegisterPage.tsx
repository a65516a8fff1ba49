import Layout from "../components/Layout";
import AuthForm from "../components/AuthForm";
import type { FlashMessage } from "../../shared/types";

export interface RegisterPageProps {
  flash?: FlashMessage;
  email?: string;
  error?: string;
}

export default function RegisterPage({ flash, email, error }: RegisterPageProps) {
  return (
    <Layout title="Register" userEmail={null} flash={flash}>
      <h1>Create an account</h1>
      <p className="muted">
        Passwords need 8 to 72 characters with at least one letter and one number.
      </p>
      <AuthForm mode="register" email={email} error={error} />
      <p className="muted">
        Already registered? <a href="/login">Log in</a>
      </p>
    </Layout>
  );
}
