/**
 * Server-side rendering of the React page components.
 */

import type { Context } from "hono";
import type { ReactElement } from "react";
import { renderToString } from "react-dom/server";

export type PageStatus = 200 | 400 | 401 | 403 | 404 | 500;

export function renderPage(c: Context, page: ReactElement, status: PageStatus = 200) {
  return c.html(`<!DOCTYPE html>${renderToString(page)}`, status);
}
