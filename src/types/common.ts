/**
 * Common types for signed URL generation.
 */

import type { KeyObject } from "node:crypto";

/**
 * HTTP methods a signed URL may authorize.
 */
export enum HttpMethod {
  GET = "GET",
  HEAD = "HEAD",
  PUT = "PUT",
  POST = "POST",
  DELETE = "DELETE",
}

/**
 * Header value; repeated headers are given as an array.
 */
export type HeaderValue = string | string[];

/**
 * Service account identity and key, as yielded by a credentials provider.
 */
export interface ServiceAccountCredentials {
  /** Service account email, used as the signed URL issuer. */
  clientEmail: string;
  /** PEM (PKCS#8 or PKCS#1) encoded private key. */
  privateKey: string;
  /** Project the service account belongs to. */
  projectId?: string;
  /** Key identifier. */
  privateKeyId?: string;
}

/**
 * Resolved signing credential. Lives for a single call.
 */
export interface SigningCredential {
  /** Service account email. */
  issuer: string;
  /** Parsed RSA private key. */
  privateKey: KeyObject;
}

/**
 * Fields of a request that are bound into the signature.
 */
export interface SignableRequest {
  method: HttpMethod;
  /** `/bucket/escaped-object-path`. */
  resourcePath: string;
  /** Absolute expiration, Unix epoch seconds. */
  expires: number;
  contentMd5?: string;
  contentType?: string;
  /** Canonical extension header block, each line ending in `\n`. */
  extensionHeaders: string;
  /** Unsigned query parameters, appended to the URL only. */
  query: Record<string, string>;
}

/**
 * Signed URL with metadata.
 */
export interface SignedUrl {
  /** The signed URL. */
  url: string;
  /** Expiration time. */
  expiresAt: Date;
  /** HTTP method this URL is valid for. */
  method: HttpMethod;
  /** Headers the request made with this URL must carry. */
  requiredHeaders: Record<string, string>;
}

/**
 * Parse a method name into a {@link HttpMethod}, or undefined when it is not one.
 */
export function parseHttpMethod(value: string): HttpMethod | undefined {
  const normalized = value.trim().toUpperCase();
  return Object.values(HttpMethod).find((method) => method === normalized);
}
