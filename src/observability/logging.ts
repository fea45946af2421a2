/**
 * Logging for signed URL generation.
 *
 * Context passed to a {@link ConsoleLogger} has key material, signatures and
 * signed URLs redacted before it is written.
 */

import type { HttpMethod } from "../types/common.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Context keys whose values never reach the output, compared lower-cased.
 */
const SENSITIVE_FIELDS = new Set([
  "privatekey",
  "private_key",
  "signingkey",
  "signature",
  "url",
  "secret",
]);

export const REDACTED = "[REDACTED]";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Copy of `context` with sensitive fields replaced, nested objects included.
 */
export function redactContext(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = REDACTED;
    } else if (isRecord(value)) {
      result[key] = redactContext(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Writes `[timestamp] [LEVEL] message {context}` lines to the console.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly baseContext: LogContext;

  constructor(minLevel: LogLevel = "info", baseContext: LogContext = {}) {
    this.minLevel = minLevel;
    this.baseContext = baseContext;
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write("trace", message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const merged = redactContext({ ...this.baseContext, ...context });
    const suffix = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : "";
    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${suffix}`;

    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else if (level === "info") {
      console.log(line);
    } else {
      console.debug(line);
    }
  }
}

/**
 * Discards everything.
 */
export class NoopLogger implements Logger {
  error(): void {}
  warn(): void {}
  info(): void {}
  debug(): void {}
  trace(): void {}
}

/**
 * Pick a logger from the logging flags of a configuration.
 */
export function createLogger(options: { enableLogging: boolean; logLevel: LogLevel }): Logger {
  return options.enableLogging ? new ConsoleLogger(options.logLevel) : new NoopLogger();
}

/**
 * What gets recorded about a generated URL. The URL and its signature are
 * not part of it.
 */
export interface SignedUrlEvent {
  bucket: string;
  object: string;
  method: HttpMethod;
  /** Absolute expiration, seconds since the epoch. */
  expires: number;
  unsignedQueryParams: string[];
}

export function logSignedUrlGenerated(logger: Logger, event: SignedUrlEvent): void {
  logger.debug("Generated signed URL", {
    bucket: event.bucket,
    object: event.object,
    method: event.method,
    expires: event.expires,
    unsignedQueryParams: event.unsignedQueryParams,
  });
}

/**
 * Record why a signing credential could not be resolved. Only the error code
 * is logged.
 */
export function logCredentialUnavailable(logger: Logger, error: { code: string }): void {
  logger.warn("Signing credential unavailable", { code: error.code });
}
