/**
 * Request types for signed URL generation.
 */

import type { KeyObject } from "node:crypto";
import type { HeaderValue } from "./common.js";

/**
 * Key material accepted at the API boundary: PEM text or a parsed key.
 */
export type SigningKeyInput = string | KeyObject;

/**
 * Options for a signed URL.
 */
export interface SignedUrlOptions {
  /** HTTP verb, case-insensitive. Default `GET`. */
  method?: string;
  /** Seconds from now until the URL expires. Default 300. */
  expires?: number;
  /** Content type the client must send. */
  contentType?: string;
  /** Base64 MD5 digest the client must send. */
  contentMd5?: string;
  /** Extension headers (`x-goog-*`) the client must send; others are ignored. */
  headers?: Record<string, HeaderValue>;
  /**
   * Extra query parameters. They are appended to the URL but NOT covered by
   * the signature, so anyone holding the URL can change them.
   */
  query?: Record<string, string>;
  /** Service account email. */
  issuer?: string;
  /** Alias of `issuer`. */
  clientEmail?: string;
  /** Service account private key. */
  signingKey?: SigningKeyInput;
  /** Alias of `signingKey`. */
  privateKey?: SigningKeyInput;
}

/**
 * Request to sign a URL.
 */
export interface SignUrlRequest extends SignedUrlOptions {
  /** Bucket name. */
  bucket: string;
  /** Object name. */
  object: string;
}

/**
 * Request to sign a download URL.
 */
export interface SignDownloadUrlRequest
  extends Pick<SignedUrlOptions, "expires" | "issuer" | "clientEmail" | "signingKey" | "privateKey"> {
  /** Bucket name. */
  bucket: string;
  /** Object name. */
  object: string;
  /** Response content type override. */
  responseContentType?: string;
  /** Response content disposition override. */
  responseContentDisposition?: string;
}

/**
 * Request to sign an upload URL.
 */
export interface SignUploadUrlRequest
  extends Pick<
    SignedUrlOptions,
    "expires" | "headers" | "issuer" | "clientEmail" | "signingKey" | "privateKey"
  > {
  /** Bucket name. */
  bucket: string;
  /** Object name. */
  object: string;
  /** Content type. */
  contentType?: string;
  /** Base64 MD5 digest of the content. */
  contentMd5?: string;
}

/**
 * Create a sign URL request.
 */
export function createSignUrlRequest(
  bucket: string,
  object: string,
  options: SignedUrlOptions = {}
): SignUrlRequest {
  return { ...options, bucket, object };
}
