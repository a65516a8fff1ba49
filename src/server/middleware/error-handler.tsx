/**
 * Top-level error boundary and 404 handler.
 *
 * Unknown errors are logged with an error id and answered with a generic
 * 500: JSON under `/api/*`, the error page everywhere else. The id is
 * returned to the client so a report can be matched to the log entry.
 */

import type { Context, ErrorHandler, NotFoundHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ApiError } from "../../shared/types";
import ErrorPage from "../../views/pages/ErrorPage";
import { AppError, errorAttributes } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { renderPage } from "../lib/render";

function isApiRequest(c: Context): boolean {
  return new URL(c.req.url).pathname.startsWith("/api/");
}

export const handleError: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  const errorId = err instanceof AppError ? err.errorId : crypto.randomUUID();
  const log: Logger | undefined = c.get("logger");
  log?.error("Unhandled exception", {
    ...errorAttributes(err),
    "error.id": errorId,
    "http.method": c.req.method,
    "http.url": new URL(c.req.url).pathname,
  });

  if (isApiRequest(c)) {
    return c.json<ApiError>({ error: "Internal Server Error", errorId }, 500);
  }
  return renderPage(
    c,
    <ErrorPage status={500} message="An unexpected error occurred. Please try again." errorId={errorId} />,
    500,
  );
};

export const handleNotFound: NotFoundHandler = (c) => {
  if (isApiRequest(c)) {
    return c.json<ApiError>({ error: "Not found" }, 404);
  }
  return renderPage(c, <ErrorPage status={404} message="There is nothing at this address." />, 404);
};
