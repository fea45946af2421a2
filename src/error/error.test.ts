/**
 * Tests for storage error types
 */

import { describe, it, expect } from "vitest";
import {
  StorageError,
  SigningUnavailableError,
  InvalidArgumentError,
  ConfigurationError,
  isStorageError,
  isSigningUnavailableError,
  errorMessage,
} from "./index.js";

describe("StorageError", () => {
  it("should carry code and default to not retryable", () => {
    const error = new StorageError("boom", "Custom");

    expect(error.message).toBe("boom");
    expect(error.code).toBe("Custom");
    expect(error.retryable).toBe(false);
    expect(error.name).toBe("StorageError");
    expect(error.toString()).toBe("StorageError [Custom]: boom");
  });
});

describe("SigningUnavailableError", () => {
  it("should prefix its code and keep the reason", () => {
    const error = new SigningUnavailableError("no key", "MissingKey");

    expect(error).toBeInstanceOf(SigningUnavailableError);
    expect(error).toBeInstanceOf(StorageError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("SigningUnavailable.MissingKey");
    expect(error.reason).toBe("MissingKey");
    expect(error.retryable).toBe(false);
    expect(error.toString()).toBe("SigningUnavailableError [SigningUnavailable.MissingKey]: no key");
  });
});

describe("InvalidArgumentError", () => {
  it("should prefix its code and keep the reason", () => {
    const error = new InvalidArgumentError("bad verb", "InvalidMethod");

    expect(error).toBeInstanceOf(StorageError);
    expect(error.name).toBe("InvalidArgumentError");
    expect(error.code).toBe("InvalidArgument.InvalidMethod");
    expect(error.reason).toBe("InvalidMethod");
  });
});

describe("ConfigurationError", () => {
  it("should default to InvalidConfig", () => {
    expect(new ConfigurationError("bad").code).toBe("Configuration.InvalidConfig");
    expect(new ConfigurationError("bad", "InvalidCredentials").code).toBe(
      "Configuration.InvalidCredentials"
    );
  });
});

describe("type guards", () => {
  it("should recognize package errors", () => {
    expect(isStorageError(new ConfigurationError("bad"))).toBe(true);
    expect(isStorageError(new Error("plain"))).toBe(false);
    expect(isStorageError("string")).toBe(false);
  });

  it("should recognize signing unavailability", () => {
    expect(isSigningUnavailableError(new SigningUnavailableError("x", "MissingIssuer"))).toBe(true);
    expect(isSigningUnavailableError(new InvalidArgumentError("x", "InvalidMethod"))).toBe(false);
  });
});

describe("errorMessage", () => {
  it("should read messages from errors and stringify anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
