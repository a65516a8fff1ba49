/**
 * Type-safe fetch wrapper for all browser → server API calls.
 *
 * Usage:
 *   const res = await apiFetch<RecommendationsResponse>("/recommendations");
 *   // res is typed as RecommendationsResponse
 *
 * All requests default to JSON content-type. Callers can override headers
 * or set method/body via the standard RequestInit parameter.
 */

import type { ApiError } from "../../shared/types";

const API_BASE = "/api";

/** A non-2xx answer. Carries the server's message and, for 401s, where to re-authenticate. */
export class ApiRequestError extends Error {
  readonly status: number;
  readonly reauthenticate: string | undefined;

  constructor(status: number, message: string, reauthenticate?: string) {
    super(message);
    this.name = "ApiRequestError";
    this.status = status;
    this.reauthenticate = reauthenticate;
  }
}

function isApiError(body: unknown): body is ApiError {
  return typeof body === "object" && body !== null && "error" in body && typeof body.error === "string";
}

/**
 * Prepends the API base path, sets JSON headers, and throws
 * `ApiRequestError` on non-2xx responses so callers can use simple
 * try/catch. The generic parameter T declares the expected response shape.
 */
export async function apiFetch<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`, {
    ...init,
    headers: {
      "Content-Type": "application/json",
      ...init?.headers,
    },
  });

  if (!res.ok) {
    const body: unknown = await res.json().catch(() => null);
    if (isApiError(body)) {
      throw new ApiRequestError(res.status, body.error, body.reauthenticate);
    }
    throw new ApiRequestError(res.status, `API error: ${res.status} ${res.statusText}`);
  }

  return res.json() as Promise<T>;
}
