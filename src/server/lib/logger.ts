/**
 * Per-request logger for Customify.
 *
 * The instrumentation middleware creates one `Logger` per request and calls
 * `flush()` once the response is ready. With `NEW_RELIC_LICENSE_KEY` set the
 * request's entries go to the New Relic Log API as a single batch; otherwise
 * they are printed.
 */

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  attributes: Record<string, unknown>;
}

export interface LoggerOptions {
  environment: string;
}

const NEW_RELIC_LOG_URL = "https://log-api.newrelic.com/log/v1";
const UPLOAD_TIMEOUT_MS = 5_000;

const CONSOLE_METHOD: Record<LogLevel, "log" | "warn" | "error"> = {
  INFO: "log",
  WARN: "warn",
  ERROR: "error",
};

export class Logger {
  private pending: LogEntry[] = [];
  private readonly environment: string;

  constructor({ environment }: LoggerOptions) {
    this.environment = environment;
  }

  info(message: string, attributes: Record<string, unknown> = {}): void {
    this.record("INFO", message, attributes);
  }

  warn(message: string, attributes: Record<string, unknown> = {}): void {
    this.record("WARN", message, attributes);
  }

  error(message: string, attributes: Record<string, unknown> = {}): void {
    this.record("ERROR", message, attributes);
  }

  /** Ship and clear the pending entries. Never rejects; upload problems go to stderr. */
  async flush(licenseKey?: string): Promise<void> {
    const entries = this.pending;
    if (entries.length === 0) return;
    this.pending = [];

    if (licenseKey) {
      await this.upload(entries, licenseKey);
    } else {
      for (const { level, message, attributes } of entries) {
        console[CONSOLE_METHOD[level]](`[${level}] ${message}`, attributes);
      }
    }
  }

  private record(level: LogLevel, message: string, attributes: Record<string, unknown>): void {
    this.pending.push({ timestamp: Date.now(), level, message, attributes });
  }

  private async upload(entries: LogEntry[], licenseKey: string): Promise<void> {
    const batch = [
      {
        common: {
          attributes: { logtype: "hono-node", service: "customify-web", environment: this.environment },
        },
        logs: entries,
      },
    ];

    try {
      const res = await fetch(NEW_RELIC_LOG_URL, {
        method: "POST",
        headers: { "Content-Type": "application/json", "Api-Key": licenseKey },
        body: JSON.stringify(batch),
        signal: AbortSignal.timeout(UPLOAD_TIMEOUT_MS),
      });
      if (!res.ok) {
        console.error(`[logger] New Relic rejected ${entries.length} log entries: HTTP ${res.status}`);
      }
    } catch (err) {
      console.error("[logger] Failed to flush logs to New Relic:", err);
    }
  }
}
