/**
 * Cloud Storage Signed URL Module
 *
 * Type-safe generation of query-parameter signed URLs for Google Cloud
 * Storage objects: canonicalization, RSA-SHA256 signing and URL assembly.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { clientBuilder } from 'gcs-signed-url';
 *
 * const storage = clientBuilder().fromEnv().build();
 *
 * const url = await storage.signedUrl('my-todo-app', 'avatars/heidi/400x400.png', {
 *   method: 'PUT',
 *   contentType: 'image/png',
 *   expires: 300, // 5 minutes from now
 * });
 * ```
 *
 * @module gcs-signed-url
 */

// Client
export {
  StorageClientImpl,
  StorageClientBuilder,
  clientBuilder,
  createClient,
  createClientFromEnv,
} from "./client/index.js";
export type { StorageClient } from "./client/index.js";

// Configuration
export {
  StorageConfigBuilder,
  configBuilder,
  isValidExpiresIn,
  resolveEndpoint,
  validateBucketName,
  validateObjectName,
  DEFAULT_API_ENDPOINT,
  DEFAULT_CONFIG,
  MAX_EXPIRES_AT,
} from "./config/index.js";
export type { StorageConfig, StorageCredentials } from "./config/index.js";

// Credentials
export {
  NoCredentialsProvider,
  StaticCredentialsProvider,
  ServiceAccountKeyFileProvider,
  ServiceAccountKeySchema,
  createCredentialsProvider,
  parseServiceAccountKey,
} from "./credentials/index.js";
export type { SigningCredentialsProvider, ServiceAccountKey } from "./credentials/index.js";

// Errors
export {
  StorageError,
  SigningUnavailableError,
  InvalidArgumentError,
  ConfigurationError,
  isStorageError,
  isSigningUnavailableError,
} from "./error/index.js";
export type { SigningUnavailableReason, InvalidArgumentReason } from "./error/index.js";

// Observability
export {
  ConsoleLogger,
  NoopLogger,
  REDACTED,
  createLogger,
  logCredentialUnavailable,
  logSignedUrlGenerated,
  redactContext,
} from "./observability/index.js";
export type { Logger, LogLevel, LogContext, SignedUrlEvent } from "./observability/index.js";

// Signing
export {
  SignedUrlBuilder,
  SigningKeyCache,
  getSigningKeyCache,
  parseSigningKey,
  EXTENSION_HEADER_PREFIX,
  uriEncode,
  encodeResourcePath,
  shouldSignHeader,
  normalizeHeaderValue,
  collectExtensionHeaders,
  canonicalExtensionHeaders,
  buildCanonicalString,
  buildQueryString,
} from "./signing/index.js";
export type { SignedUrlBuilderOptions } from "./signing/index.js";

// Types
export { HttpMethod, parseHttpMethod, createSignUrlRequest } from "./types/index.js";
export type {
  HeaderValue,
  ServiceAccountCredentials,
  SigningCredential,
  SignableRequest,
  SignedUrl,
  SigningKeyInput,
  SignedUrlOptions,
  SignUrlRequest,
  SignDownloadUrlRequest,
  SignUploadUrlRequest,
} from "./types/index.js";
