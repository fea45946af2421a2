/**
 * Parsed Signing Key Cache
 *
 * Parsing a PEM private key is the most expensive step of producing a signed
 * URL, so parsed keys are kept and reused across calls.
 */

import { createHash, type KeyObject } from "node:crypto";

/**
 * Default maximum number of cached keys.
 */
const DEFAULT_MAX_ENTRIES = 32;

/**
 * Cache of parsed private keys, keyed by a fingerprint of the key text.
 *
 * The raw PEM is not retained; entries are looked up by its SHA-256 digest.
 * Cached `KeyObject`s are immutable and may be shared by concurrent callers.
 * When full, the oldest entry is evicted.
 *
 * @example
 * ```typescript
 * const cache = new SigningKeyCache();
 *
 * let key = cache.get(pem);
 * if (!key) {
 *   key = createPrivateKey(pem);
 *   cache.set(pem, key);
 * }
 * ```
 */
export class SigningKeyCache {
  private cache: Map<string, KeyObject>;
  private maxEntries: number;

  /**
   * @param maxEntries - Upper bound on cached keys (default: 32)
   */
  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.cache = new Map();
    this.maxEntries = maxEntries;
  }

  private fingerprint(pem: string): string {
    return createHash("sha256").update(pem).digest("hex");
  }

  /**
   * Store a parsed key for the given key text.
   */
  set(pem: string, key: KeyObject): void {
    const id = this.fingerprint(pem);
    this.cache.delete(id);

    if (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(id, key);
  }

  /**
   * Look up the parsed key for the given key text.
   */
  get(pem: string): KeyObject | undefined {
    return this.cache.get(this.fingerprint(pem));
  }

  /**
   * @returns true if key was removed, false if not found
   */
  delete(pem: string): boolean {
    return this.cache.delete(this.fingerprint(pem));
  }

  has(pem: string): boolean {
    return this.cache.has(this.fingerprint(pem));
  }

  /**
   * Clear all entries from the cache.
   */
  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

const defaultCache = new SigningKeyCache();

/**
 * The cache shared by builders that are not given their own.
 */
export function getSigningKeyCache(): SigningKeyCache {
  return defaultCache;
}
