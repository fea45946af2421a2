/**
 * Storage Client
 *
 * Project-level entry point: holds configuration and the ambient signing
 * credentials, and hands out signed URLs.
 */

import {
  type StorageConfig,
  type StorageCredentials,
  type StorageConfigBuilder,
  configBuilder,
} from "../config/index.js";
import {
  type SigningCredentialsProvider,
  createCredentialsProvider,
} from "../credentials/index.js";
import type { ServiceAccountKey } from "../credentials/schema.js";
import { type Logger, type LogLevel, createLogger } from "../observability/logging.js";
import { SignedUrlBuilder, SigningKeyCache } from "../signing/index.js";
import type { SignedUrlOptions } from "../types/index.js";

/**
 * Storage client interface.
 */
export interface StorageClient {
  /** Project this client is connected to, if known. */
  projectId(): string | undefined;

  /** Get the configuration. */
  config(): StorageConfig;

  /** Signed URL builder bound to this client's credentials. */
  signing(): SignedUrlBuilder;

  /**
   * Sign a URL for one object. See {@link SignedUrlBuilder.signedUrl}.
   */
  signedUrl(bucket: string, path: string, options?: SignedUrlOptions): Promise<string>;
}

/**
 * Storage client implementation.
 */
export class StorageClientImpl implements StorageClient {
  private _config: StorageConfig;
  private _credentialsProvider: SigningCredentialsProvider;
  private _logger: Logger;
  private _keyCache?: SigningKeyCache;

  private _signingService?: SignedUrlBuilder;

  constructor(
    config: StorageConfig,
    credentialsProvider: SigningCredentialsProvider,
    logger: Logger,
    keyCache?: SigningKeyCache
  ) {
    this._config = config;
    this._credentialsProvider = credentialsProvider;
    this._logger = logger;
    this._keyCache = keyCache;
  }

  projectId(): string | undefined {
    return this._config.projectId;
  }

  config(): StorageConfig {
    return this._config;
  }

  signing(): SignedUrlBuilder {
    if (!this._signingService) {
      this._signingService = new SignedUrlBuilder(this._config, this._credentialsProvider, {
        keyCache: this._keyCache,
        logger: this._logger,
      });
    }
    return this._signingService;
  }

  signedUrl(bucket: string, path: string, options?: SignedUrlOptions): Promise<string> {
    return this.signing().signedUrl(bucket, path, options);
  }
}

/**
 * Storage client builder.
 */
export class StorageClientBuilder {
  private _config?: StorageConfig;
  private _configBuilder: StorageConfigBuilder = configBuilder();
  private _credentialsProvider?: SigningCredentialsProvider;
  private _logger?: Logger;
  private _keyCache?: SigningKeyCache;

  /**
   * Set the full configuration.
   */
  config(config: StorageConfig): this {
    this._config = config;
    return this;
  }

  /**
   * Set the GCP project ID.
   */
  projectId(projectId: string): this {
    this._configBuilder.projectId(projectId);
    return this;
  }

  /**
   * Set explicit credentials.
   */
  credentials(credentials: StorageCredentials): this {
    this._configBuilder.credentials(credentials);
    return this;
  }

  /**
   * Use service account key file.
   */
  serviceAccountKeyFile(keyFile: string): this {
    this._configBuilder.serviceAccountKeyFile(keyFile);
    return this;
  }

  /**
   * Use service account key JSON.
   */
  serviceAccountKey(key: ServiceAccountKey): this {
    this._configBuilder.serviceAccountKey(key);
    return this;
  }

  /**
   * Use an issuer email and PEM private key directly.
   */
  signingKey(clientEmail: string, privateKey: string): this {
    this._configBuilder.signingKey(clientEmail, privateKey);
    return this;
  }

  /**
   * Set custom API endpoint (for emulators).
   */
  apiEndpoint(endpoint: string): this {
    this._configBuilder.apiEndpoint(endpoint);
    return this;
  }

  /**
   * Set the default signed URL lifetime in seconds.
   */
  defaultExpiresIn(seconds: number): this {
    this._configBuilder.defaultExpiresIn(seconds);
    return this;
  }

  /**
   * Enable logging.
   */
  enableLogging(enable: boolean = true): this {
    this._configBuilder.enableLogging(enable);
    return this;
  }

  /**
   * Set the minimum log level.
   */
  logLevel(level: LogLevel): this {
    this._configBuilder.logLevel(level);
    return this;
  }

  /**
   * Use a custom source of ambient credentials instead of the configured one.
   */
  credentialsProvider(provider: SigningCredentialsProvider): this {
    this._credentialsProvider = provider;
    return this;
  }

  /**
   * Use a custom logger instead of the one implied by the logging flags.
   */
  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Use a dedicated parsed key cache instead of the shared one.
   */
  keyCache(cache: SigningKeyCache): this {
    this._keyCache = cache;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(): this {
    this._configBuilder.fromEnv();
    return this;
  }

  /**
   * Build the storage client.
   */
  build(): StorageClient {
    const config = this._config ?? this._configBuilder.build();

    const credentialsProvider =
      this._credentialsProvider ?? createCredentialsProvider(config.credentials);
    const logger = this._logger ?? createLogger(config);

    return new StorageClientImpl(config, credentialsProvider, logger, this._keyCache);
  }
}

/**
 * Create a new storage client builder.
 */
export function clientBuilder(): StorageClientBuilder {
  return new StorageClientBuilder();
}

/**
 * Create a storage client from environment variables.
 */
export function createClientFromEnv(): StorageClient {
  return clientBuilder().fromEnv().build();
}

/**
 * Create a storage client with explicit configuration.
 */
export function createClient(config: StorageConfig): StorageClient {
  return clientBuilder().config(config).build();
}
