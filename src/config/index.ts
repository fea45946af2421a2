/**
 * Storage Configuration Module
 */

import { ConfigurationError, InvalidArgumentError } from "../error/index.js";
import type { ServiceAccountKey } from "../credentials/schema.js";
import type { LogLevel } from "../observability/logging.js";

/**
 * Where the ambient signing credential comes from.
 */
export type StorageCredentials =
  | { type: "service_account"; keyFile: string }
  | { type: "service_account_json"; key: ServiceAccountKey }
  | { type: "signing_key"; clientEmail: string; privateKey: string }
  | { type: "none" };

/**
 * Storage client configuration.
 */
export interface StorageConfig {
  /** GCP project ID. */
  projectId?: string;
  /** Ambient credentials used when a call supplies none. */
  credentials?: StorageCredentials;
  /** Custom API endpoint (for emulators). */
  apiEndpoint?: string;
  /** Default signed URL lifetime in seconds. */
  defaultExpiresIn: number;
  /** Enable logging. */
  enableLogging: boolean;
  /** Minimum level logged when logging is enabled. */
  logLevel: LogLevel;
}

/**
 * Default signed URL host.
 */
export const DEFAULT_API_ENDPOINT = "https://storage.googleapis.com";

/**
 * Latest absolute expiration, in seconds since the epoch, that a `Date` can
 * still represent.
 */
export const MAX_EXPIRES_AT = 8_640_000_000_000;

/**
 * Whether `seconds` from now is a usable signed URL lifetime.
 */
export function isValidExpiresIn(seconds: number, nowMs: number = Date.now()): boolean {
  return (
    Number.isSafeInteger(seconds) &&
    seconds > 0 &&
    Math.floor(nowMs / 1000) + seconds <= MAX_EXPIRES_AT
  );
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<StorageConfig, "projectId" | "credentials"> = {
  defaultExpiresIn: 300,
  enableLogging: false,
  logLevel: "info",
};

/**
 * Storage configuration builder.
 */
export class StorageConfigBuilder {
  private config: Partial<StorageConfig> = {};

  /**
   * Set the GCP project ID.
   */
  projectId(projectId: string): this {
    this.config.projectId = projectId;
    return this;
  }

  /**
   * Set explicit credentials.
   */
  credentials(credentials: StorageCredentials): this {
    this.config.credentials = credentials;
    return this;
  }

  /**
   * Use service account key file.
   */
  serviceAccountKeyFile(keyFile: string): this {
    this.config.credentials = { type: "service_account", keyFile };
    return this;
  }

  /**
   * Use service account key JSON.
   */
  serviceAccountKey(key: ServiceAccountKey): this {
    this.config.credentials = { type: "service_account_json", key };
    return this;
  }

  /**
   * Use an issuer email and PEM private key directly.
   */
  signingKey(clientEmail: string, privateKey: string): this {
    this.config.credentials = { type: "signing_key", clientEmail, privateKey };
    return this;
  }

  /**
   * Set custom API endpoint (for emulators).
   */
  apiEndpoint(endpoint: string): this {
    this.config.apiEndpoint = endpoint;
    return this;
  }

  /**
   * Set the default signed URL lifetime in seconds.
   */
  defaultExpiresIn(seconds: number): this {
    this.config.defaultExpiresIn = seconds;
    return this;
  }

  /**
   * Enable logging.
   */
  enableLogging(enable: boolean = true): this {
    this.config.enableLogging = enable;
    return this;
  }

  /**
   * Set the minimum log level.
   */
  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(): this {
    const projectId =
      process.env.STORAGE_PROJECT ??
      process.env.GOOGLE_CLOUD_PROJECT ??
      process.env.GCLOUD_PROJECT;
    if (projectId) {
      this.config.projectId = projectId;
    }

    const credentialsFile = process.env.GOOGLE_APPLICATION_CREDENTIALS;
    if (credentialsFile) {
      this.config.credentials = { type: "service_account", keyFile: credentialsFile };
    }

    const emulatorHost = process.env.STORAGE_EMULATOR_HOST;
    if (emulatorHost) {
      this.config.apiEndpoint = emulatorHost.startsWith("http")
        ? emulatorHost
        : `http://${emulatorHost}`;
    }

    return this;
  }

  /**
   * Build the configuration.
   */
  build(): StorageConfig {
    const merged: StorageConfig = { ...DEFAULT_CONFIG, ...this.config };

    if (merged.apiEndpoint) {
      try {
        new URL(merged.apiEndpoint);
      } catch {
        throw new ConfigurationError(
          `Invalid API endpoint URL: ${merged.apiEndpoint}`,
          "InvalidConfig"
        );
      }
    }

    if (!isValidExpiresIn(merged.defaultExpiresIn)) {
      throw new ConfigurationError(
        `Default expiration must be a positive integer number of seconds, got ${merged.defaultExpiresIn}`,
        "InvalidConfig"
      );
    }

    return merged;
  }
}

/**
 * Create a new storage config builder.
 */
export function configBuilder(): StorageConfigBuilder {
  return new StorageConfigBuilder();
}

/**
 * Resolve the origin signed URLs point at.
 */
export function resolveEndpoint(config: Pick<StorageConfig, "apiEndpoint">): string {
  if (config.apiEndpoint) {
    return new URL(config.apiEndpoint).origin;
  }
  return DEFAULT_API_ENDPOINT;
}

/**
 * Validate bucket name according to GCS requirements.
 */
export function validateBucketName(bucket: string): void {
  if (!bucket) {
    throw new InvalidArgumentError("Bucket name cannot be empty", "InvalidBucketName");
  }

  // Dotted names may reach 222 characters, 63 per dot-separated component
  const maxLength = bucket.includes(".") ? 222 : 63;
  if (bucket.length < 3 || bucket.length > maxLength) {
    throw new InvalidArgumentError(
      `Bucket name must be 3-${maxLength} characters`,
      "InvalidBucketName"
    );
  }
  if (bucket.split(".").some((component) => component.length > 63)) {
    throw new InvalidArgumentError(
      "Each dot-separated bucket name component must be at most 63 characters",
      "InvalidBucketName"
    );
  }

  if (!/^[a-z0-9]/.test(bucket) || !/[a-z0-9]$/.test(bucket)) {
    throw new InvalidArgumentError(
      "Bucket name must start and end with alphanumeric character",
      "InvalidBucketName"
    );
  }

  if (!/^[a-z0-9._-]+$/.test(bucket)) {
    throw new InvalidArgumentError(
      "Bucket name can only contain lowercase letters, numbers, hyphens, underscores, and dots",
      "InvalidBucketName"
    );
  }

  if (bucket.includes("..")) {
    throw new InvalidArgumentError(
      "Bucket name cannot have consecutive dots",
      "InvalidBucketName"
    );
  }

  if (/^\d+\.\d+\.\d+\.\d+$/.test(bucket)) {
    throw new InvalidArgumentError(
      "Bucket name cannot be an IP address",
      "InvalidBucketName"
    );
  }
}

/**
 * Validate object name according to GCS requirements.
 */
export function validateObjectName(name: string): void {
  if (!name) {
    throw new InvalidArgumentError("Object name cannot be empty", "InvalidObjectName");
  }

  if (name.length > 1024) {
    throw new InvalidArgumentError(
      "Object name cannot exceed 1024 characters",
      "InvalidObjectName"
    );
  }

  if (name.includes("\0")) {
    throw new InvalidArgumentError(
      "Object name cannot contain null bytes",
      "InvalidObjectName"
    );
  }

  if (/[\r\n]/.test(name)) {
    throw new InvalidArgumentError(
      "Object name cannot contain carriage return or line feed",
      "InvalidObjectName"
    );
  }
}
