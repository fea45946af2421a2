/**
 * Conversion of caller-supplied key material into RSA private keys.
 */

import { createPrivateKey, KeyObject } from "node:crypto";
import { SigningUnavailableError, errorMessage } from "../error/index.js";
import type { SigningKeyInput } from "../types/index.js";
import type { SigningKeyCache } from "./cache.js";

/**
 * Parse key material into an RSA private `KeyObject`.
 *
 * Strings are PEM (PKCS#8 or PKCS#1); literal `\n` escape sequences, as
 * found in keys stored in environment variables, are turned into newlines.
 *
 * @throws {SigningUnavailableError} When the material is empty, malformed,
 *   public, or not RSA
 */
export function parseSigningKey(input: SigningKeyInput, cache?: SigningKeyCache): KeyObject {
  if (input instanceof KeyObject) {
    return assertRsaPrivateKey(input);
  }

  const pem = input.replace(/\\n/g, "\n").trim();
  if (!pem) {
    throw new SigningUnavailableError("Signing key is empty", "MissingKey");
  }

  const cached = cache?.get(pem);
  if (cached) {
    return cached;
  }

  let key: KeyObject;
  try {
    key = createPrivateKey(pem);
  } catch (error) {
    throw new SigningUnavailableError(
      `Signing key could not be parsed: ${errorMessage(error)}`,
      "MalformedKey"
    );
  }

  assertRsaPrivateKey(key);
  cache?.set(pem, key);
  return key;
}

function assertRsaPrivateKey(key: KeyObject): KeyObject {
  if (key.type !== "private") {
    throw new SigningUnavailableError(
      `Signing key must be a private key, got a ${key.type} key`,
      "MalformedKey"
    );
  }
  if (key.asymmetricKeyType !== "rsa") {
    throw new SigningUnavailableError(
      `Signing key must be an RSA key, got ${key.asymmetricKeyType ?? "unknown"}`,
      "MalformedKey"
    );
  }
  return key;
}
