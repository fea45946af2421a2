/**
 * Signing Service
 *
 * Query-parameter signed URL generation for Cloud Storage objects.
 */

import { createSign } from "node:crypto";
import {
  type StorageConfig,
  isValidExpiresIn,
  resolveEndpoint,
  validateBucketName,
  validateObjectName,
} from "../config/index.js";
import {
  InvalidArgumentError,
  SigningUnavailableError,
  errorMessage,
  isSigningUnavailableError,
} from "../error/index.js";
import type { SigningCredentialsProvider } from "../credentials/index.js";
import {
  type Logger,
  NoopLogger,
  logCredentialUnavailable,
  logSignedUrlGenerated,
} from "../observability/logging.js";
import {
  HttpMethod,
  createSignUrlRequest,
  parseHttpMethod,
  type ServiceAccountCredentials,
  type SignableRequest,
  type SignedUrl,
  type SignedUrlOptions,
  type SigningCredential,
  type SignDownloadUrlRequest,
  type SignUploadUrlRequest,
  type SignUrlRequest,
} from "../types/index.js";
import {
  buildCanonicalString,
  buildQueryString,
  canonicalExtensionHeaders,
  collectExtensionHeaders,
  encodeResourcePath,
} from "./canonical.js";
import { SigningKeyCache, getSigningKeyCache } from "./cache.js";
import { parseSigningKey } from "./keys.js";

export {
  EXTENSION_HEADER_PREFIX,
  uriEncode,
  encodeResourcePath,
  shouldSignHeader,
  normalizeHeaderValue,
  collectExtensionHeaders,
  canonicalExtensionHeaders,
  buildCanonicalString,
  buildQueryString,
} from "./canonical.js";
export { SigningKeyCache, getSigningKeyCache } from "./cache.js";
export { parseSigningKey } from "./keys.js";

/**
 * Optional collaborators of a {@link SignedUrlBuilder}.
 */
export interface SignedUrlBuilderOptions {
  /** Parsed key cache (default: the shared cache). */
  keyCache?: SigningKeyCache;
  /** Logger (default: no-op). */
  logger?: Logger;
}

/**
 * Builds signed URLs granting one HTTP operation on one object until an
 * expiration time, usable without any further authentication.
 *
 * `expires` is always relative: seconds from the moment of the call.
 *
 * @example
 * ```typescript
 * const builder = new SignedUrlBuilder(config, createCredentialsProvider(config.credentials));
 *
 * const url = await builder.signedUrl("my-todo-app", "avatars/heidi/400x400.png", {
 *   method: "PUT",
 *   contentType: "image/png",
 *   expires: 300,
 * });
 * ```
 */
export class SignedUrlBuilder {
  private config: Pick<StorageConfig, "apiEndpoint" | "defaultExpiresIn">;
  private credentialsProvider: SigningCredentialsProvider;
  private keyCache: SigningKeyCache;
  private logger: Logger;

  constructor(
    config: Pick<StorageConfig, "apiEndpoint" | "defaultExpiresIn">,
    credentialsProvider: SigningCredentialsProvider,
    options: SignedUrlBuilderOptions = {}
  ) {
    this.config = config;
    this.credentialsProvider = credentialsProvider;
    this.keyCache = options.keyCache ?? getSigningKeyCache();
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Sign a URL for `path` in `bucket` and return it.
   */
  async signedUrl(bucket: string, path: string, options: SignedUrlOptions = {}): Promise<string> {
    const signed = await this.generate(createSignUrlRequest(bucket, path, options));
    return signed.url;
  }

  /**
   * Sign a download URL.
   *
   * Response overrides travel as unsigned query parameters; the service only
   * applies them when the object has no value of its own.
   */
  async signDownloadUrl(request: SignDownloadUrlRequest): Promise<SignedUrl> {
    const query: Record<string, string> = {};

    if (request.responseContentType) {
      query["response-content-type"] = request.responseContentType;
    }
    if (request.responseContentDisposition) {
      query["response-content-disposition"] = request.responseContentDisposition;
    }

    return this.generate({
      bucket: request.bucket,
      object: request.object,
      method: HttpMethod.GET,
      expires: request.expires,
      issuer: request.issuer,
      clientEmail: request.clientEmail,
      signingKey: request.signingKey,
      privateKey: request.privateKey,
      query,
    });
  }

  /**
   * Sign an upload URL.
   */
  async signUploadUrl(request: SignUploadUrlRequest): Promise<SignedUrl> {
    return this.generate({
      bucket: request.bucket,
      object: request.object,
      method: HttpMethod.PUT,
      expires: request.expires,
      contentType: request.contentType,
      contentMd5: request.contentMd5,
      headers: request.headers,
      issuer: request.issuer,
      clientEmail: request.clientEmail,
      signingKey: request.signingKey,
      privateKey: request.privateKey,
    });
  }

  /**
   * Sign a URL and return it with its metadata.
   */
  async generate(request: SignUrlRequest): Promise<SignedUrl> {
    const credential = await this.resolveCredential(request);

    const method = parseHttpMethod(request.method ?? HttpMethod.GET);
    if (!method) {
      throw new InvalidArgumentError(
        `Unsupported method for signed URLs: ${request.method}`,
        "InvalidMethod"
      );
    }
    validateBucketName(request.bucket);
    validateObjectName(request.object);

    const now = Date.now();
    const expiresIn = request.expires ?? this.config.defaultExpiresIn;
    if (!isValidExpiresIn(expiresIn, now)) {
      throw new InvalidArgumentError(
        `Expiration must be a positive integer number of seconds, got ${expiresIn}`,
        "InvalidExpiration"
      );
    }
    const expires = Math.floor(now / 1000) + expiresIn;

    const signable: SignableRequest = {
      method,
      resourcePath: encodeResourcePath(request.bucket, request.object),
      expires,
      contentMd5: request.contentMd5,
      contentType: request.contentType,
      extensionHeaders: canonicalExtensionHeaders(request.headers),
      query: request.query ?? {},
    };

    const signature = this.sign(buildCanonicalString(signable), credential);
    const url = this.assembleUrl(signable, credential.issuer, signature);

    const requiredHeaders: Record<string, string> = {};
    if (request.contentType) {
      requiredHeaders["content-type"] = request.contentType;
    }
    if (request.contentMd5) {
      requiredHeaders["content-md5"] = request.contentMd5;
    }
    for (const [name, value] of collectExtensionHeaders(request.headers)) {
      requiredHeaders[name] = value;
    }

    logSignedUrlGenerated(this.logger, {
      bucket: request.bucket,
      object: request.object,
      method,
      expires,
      unsignedQueryParams: Object.keys(signable.query),
    });

    return {
      url,
      expiresAt: new Date(expires * 1000),
      method,
      requiredHeaders,
    };
  }

  /**
   * Resolve the issuer and private key for a call.
   *
   * Explicit key and issuer win; the ambient provider fills in whichever is
   * missing. Presence is checked before any key parsing.
   *
   * @throws {SigningUnavailableError}
   */
  async resolveCredential(
    options: Pick<SignedUrlOptions, "issuer" | "clientEmail" | "signingKey" | "privateKey">
  ): Promise<SigningCredential> {
    let issuer = options.issuer ?? options.clientEmail;
    let keyInput = options.signingKey ?? options.privateKey;

    try {
      if (issuer === undefined || keyInput === undefined) {
        const ambient = await this.fetchAmbientCredentials();
        issuer ??= ambient?.clientEmail;
        keyInput ??= ambient?.privateKey;
      }

      if (!issuer) {
        throw new SigningUnavailableError(
          "Signed URLs need a service account issuer: pass issuer/clientEmail or configure service account credentials",
          "MissingIssuer"
        );
      }
      if (keyInput === undefined || keyInput === "") {
        throw new SigningUnavailableError(
          "Signed URLs need a service account private key: pass signingKey/privateKey or configure service account credentials",
          "MissingKey"
        );
      }

      return { issuer, privateKey: parseSigningKey(keyInput, this.keyCache) };
    } catch (error) {
      if (isSigningUnavailableError(error)) {
        logCredentialUnavailable(this.logger, error);
      }
      throw error;
    }
  }

  private async fetchAmbientCredentials(): Promise<ServiceAccountCredentials | undefined> {
    try {
      return await this.credentialsProvider.getSigningCredentials();
    } catch (error) {
      throw new SigningUnavailableError(
        `Credentials provider failed: ${errorMessage(error)}`,
        "ProviderFailed"
      );
    }
  }

  /**
   * RSA-SHA256 (PKCS#1 v1.5) signature, base64 encoded.
   */
  private sign(canonicalString: string, credential: SigningCredential): string {
    const signer = createSign("RSA-SHA256");
    signer.update(canonicalString, "utf8");
    return signer.sign(credential.privateKey, "base64");
  }

  private assembleUrl(signable: SignableRequest, issuer: string, signature: string): string {
    const query = buildQueryString({
      GoogleAccessId: issuer,
      Expires: String(signable.expires),
      Signature: signature,
    });
    const extra = buildQueryString(signable.query);

    return `${resolveEndpoint(this.config)}${signable.resourcePath}?${query}${extra ? `&${extra}` : ""}`;
  }
}
