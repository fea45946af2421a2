/**
 * Canonical request helpers for query-parameter signed URLs.
 *
 * Everything here is pure: the same inputs always produce the same bytes,
 * which is what the storage service recomputes when it verifies a signature.
 */

import { InvalidArgumentError } from "../error/index.js";
import type { HeaderValue, SignableRequest } from "../types/index.js";

/**
 * Only headers with this prefix take part in the signature.
 */
export const EXTENSION_HEADER_PREFIX = "x-goog-";

/**
 * Customer-supplied encryption key headers are sent but never signed.
 */
const EXCLUDED_HEADER_PREFIX = "x-goog-encryption-key";

/**
 * Percent-encode per RFC 3986, leaving only unreserved characters.
 *
 * @param encodeSlash - When false, `/` is kept as is
 * @throws {URIError} On lone surrogate code units
 */
export function uriEncode(value: string, encodeSlash: boolean = true): string {
  const encoded = encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return encodeSlash ? encoded : encoded.replace(/%2F/g, "/");
}

/**
 * Build `/bucket/object` with each object path segment escaped.
 */
export function encodeResourcePath(bucket: string, object: string): string {
  try {
    return `/${bucket}/${uriEncode(object, false)}`;
  } catch (error) {
    if (error instanceof URIError) {
      throw new InvalidArgumentError(
        "Object name contains characters that cannot be URL-escaped",
        "InvalidObjectName"
      );
    }
    throw error;
  }
}

/**
 * Whether a header name participates in the signature.
 */
export function shouldSignHeader(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.startsWith(EXTENSION_HEADER_PREFIX) && !lower.startsWith(EXCLUDED_HEADER_PREFIX);
}

/**
 * Trim a header value and fold every whitespace run into one space.
 */
export function normalizeHeaderValue(value: string): string {
  return value.trim().replace(/\s+/g, " ");
}

/**
 * Collect signable extension headers by lower-cased name.
 *
 * Names differing only in case are merged. Their values keep input order,
 * so for such names the block follows the order the caller listed them in;
 * the order of distinct names never matters.
 */
export function collectExtensionHeaders(
  headers: Record<string, HeaderValue> | undefined
): Map<string, string> {
  const collected = new Map<string, string[]>();

  for (const [name, value] of Object.entries(headers ?? {})) {
    if (!shouldSignHeader(name)) {
      continue;
    }
    const key = name.toLowerCase();
    const values = (Array.isArray(value) ? value : [value]).map(normalizeHeaderValue);
    collected.set(key, [...(collected.get(key) ?? []), ...values]);
  }

  const sortedNames = [...collected.keys()].sort(compareCodePoints);
  return new Map(sortedNames.map((name) => [name, (collected.get(name) ?? []).join(",")]));
}

/**
 * Canonical extension header block: one `name:value\n` line per header.
 */
export function canonicalExtensionHeaders(
  headers: Record<string, HeaderValue> | undefined
): string {
  let block = "";
  for (const [name, value] of collectExtensionHeaders(headers)) {
    block += `${name}:${value}\n`;
  }
  return block;
}

/**
 * The exact string that gets signed.
 */
export function buildCanonicalString(request: SignableRequest): string {
  return [
    request.method,
    request.contentMd5 ?? "",
    request.contentType ?? "",
    String(request.expires),
    `${request.extensionHeaders}${request.resourcePath}`,
  ].join("\n");
}

/**
 * Encode query parameters in insertion order.
 */
export function buildQueryString(params: Record<string, string>): string {
  try {
    return Object.entries(params)
      .map(([key, value]) => `${uriEncode(key)}=${uriEncode(value)}`)
      .join("&");
  } catch (error) {
    if (error instanceof URIError) {
      throw new InvalidArgumentError(
        "Query parameters contain characters that cannot be URL-escaped",
        "InvalidQuery"
      );
    }
    throw error;
  }
}

function compareCodePoints(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
