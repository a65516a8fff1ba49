/**
 * Application error hierarchy.
 *
 * Every error the server raises on purpose is an `AppError`: it carries a
 * machine-readable code, a per-occurrence id that is echoed to the client
 * and written to the logs, and a context bag for structured logging.
 */

export type ErrorCode =
  | "APP_ERROR"
  | "SPOTIFY_API_ERROR"
  | "AUTH_ERROR"
  | "VALIDATION_ERROR"
  | "DATA_PROCESSING_ERROR";

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly errorId: string;
  readonly timestamp: string;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = "APP_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.errorId = crypto.randomUUID();
    this.timestamp = new Date().toISOString();
    this.context = context;
  }

  toJSON(): {
    errorId: string;
    timestamp: string;
    code: ErrorCode;
    message: string;
    context: Record<string, unknown>;
  } {
    return {
      errorId: this.errorId,
      timestamp: this.timestamp,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * A failed call to the Spotify Web API or Accounts service. `status` is
 * undefined for network failures and timeouts.
 */
export class SpotifyApiError extends AppError {
  readonly status: number | undefined;
  readonly endpoint: string;

  constructor(
    message: string,
    options: { status?: number; endpoint: string; context?: Record<string, unknown> },
  ) {
    super(message, "SPOTIFY_API_ERROR", {
      ...options.context,
      spotifyEndpoint: options.endpoint,
      status: options.status,
    });
    this.name = "SpotifyApiError";
    this.status = options.status;
    this.endpoint = options.endpoint;
  }

  /** 401 from the Web API: the access token was revoked or is invalid. */
  get isUnauthorized(): boolean {
    return this.status === 401;
  }
}

/** Missing or unusable credentials: no session, no Spotify connection, failed refresh. */
export class AuthenticationError extends AppError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "AUTH_ERROR", context);
    this.name = "AuthenticationError";
  }
}

/** Client input that failed schema validation. */
export class ValidationError extends AppError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/** A provider response that could not be turned into the records the views need. */
export class DataProcessingError extends AppError {
  constructor(message: string, dataType: string, context: Record<string, unknown> = {}) {
    super(message, "DATA_PROCESSING_ERROR", { ...context, dataType });
    this.name = "DataProcessingError";
  }
}

/** Flatten any thrown value into log attributes. */
export function errorAttributes(err: unknown): Record<string, unknown> {
  if (err instanceof AppError) {
    return {
      "error.id": err.errorId,
      "error.code": err.code,
      "error.message": err.message,
      ...err.context,
    };
  }
  if (err instanceof Error) {
    return { "error.message": err.message, "error.stack": err.stack };
  }
  return { "error.message": String(err) };
}

export const SPOTIFY_SESSION_EXPIRED = "Spotify session expired. Please reconnect your account.";

/**
 * The Spotify token cannot be used and the user must go through OAuth again:
 * either no account is linked or the refresh grant was refused.
 */
export class SpotifyAuthError extends AuthenticationError {
  readonly reason: "not_connected" | "refresh_failed";

  constructor(reason: "not_connected" | "refresh_failed", context: Record<string, unknown> = {}) {
    super(
      reason === "not_connected" ? "Spotify account not connected" : SPOTIFY_SESSION_EXPIRED,
      { ...context, reason },
    );
    this.name = "SpotifyAuthError";
    this.reason = reason;
  }
}
