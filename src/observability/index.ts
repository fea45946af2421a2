export {
  ConsoleLogger,
  NoopLogger,
  REDACTED,
  createLogger,
  logCredentialUnavailable,
  logSignedUrlGenerated,
  redactContext,
} from "./logging.js";
export type { Logger, LogLevel, LogContext, SignedUrlEvent } from "./logging.js";
