/**
 * Storage Error Types
 *
 * Error hierarchy for signed URL generation and client configuration.
 */

/**
 * Base storage error class.
 */
export class StorageError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, options?: { retryable?: boolean }) {
    super(message);
    this.name = "StorageError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, StorageError.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Reasons a signing credential could not be resolved.
 */
export type SigningUnavailableReason =
  | "MissingIssuer"
  | "MissingKey"
  | "MalformedKey"
  | "ProviderFailed";

/**
 * No usable signing credential could be resolved.
 *
 * Never retryable: the same call cannot succeed without new credentials.
 */
export class SigningUnavailableError extends StorageError {
  public readonly reason: SigningUnavailableReason;

  constructor(message: string, reason: SigningUnavailableReason) {
    super(message, `SigningUnavailable.${reason}`);
    this.name = "SigningUnavailableError";
    this.reason = reason;
    Object.setPrototypeOf(this, SigningUnavailableError.prototype);
  }
}

/**
 * Reasons an argument was rejected.
 */
export type InvalidArgumentReason =
  | "InvalidMethod"
  | "InvalidExpiration"
  | "InvalidBucketName"
  | "InvalidObjectName"
  | "InvalidQuery";

/**
 * A caller-supplied argument is malformed.
 */
export class InvalidArgumentError extends StorageError {
  public readonly reason: InvalidArgumentReason;

  constructor(message: string, reason: InvalidArgumentReason) {
    super(message, `InvalidArgument.${reason}`);
    this.name = "InvalidArgumentError";
    this.reason = reason;
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Configuration error.
 */
export class ConfigurationError extends StorageError {
  constructor(
    message: string,
    code: "InvalidConfig" | "InvalidCredentials" = "InvalidConfig"
  ) {
    super(message, `Configuration.${code}`);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Type guard for any error raised by this package.
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Type guard for {@link SigningUnavailableError}.
 */
export function isSigningUnavailableError(error: unknown): error is SigningUnavailableError {
  return error instanceof SigningUnavailableError;
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
