import Layout from "../components/Layout";

export interface ErrorPageProps {
  status: number;
  message: string;
  /** Shown so users can quote it when reporting a problem. */
  errorId?: string;
}

export default function ErrorPage({ status, message, errorId }: ErrorPageProps) {
  return (
    <Layout title={status === 404 ? "Not found" : "Error"} userEmail={null}>
      <section className="card error-page">
        <h1>{status === 404 ? "Page not found" : "Something went wrong"}</h1>
        <p>{message}</p>
        {errorId && <p className="muted">Error id: {errorId}</p>}
        <a className="button" href="/">
          Back to home
        </a>
      </section>
    </Layout>
  );
}
