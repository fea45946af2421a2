/**
 * Tests for canonical string building functions
 */

import { describe, it, expect } from "vitest";
import {
  uriEncode,
  encodeResourcePath,
  shouldSignHeader,
  normalizeHeaderValue,
  collectExtensionHeaders,
  canonicalExtensionHeaders,
  buildCanonicalString,
  buildQueryString,
} from "./canonical.js";
import { HttpMethod } from "../types/index.js";
import { InvalidArgumentError } from "../error/index.js";

describe("uriEncode", () => {
  it("should encode basic strings", () => {
    expect(uriEncode("hello world")).toBe("hello%20world");
    expect(uriEncode("foo/bar")).toBe("foo%2Fbar");
    expect(uriEncode("foo/bar", false)).toBe("foo/bar");
  });

  it("should encode characters encodeURIComponent leaves alone", () => {
    expect(uriEncode("hello!")).toBe("hello%21");
    expect(uriEncode("it's")).toBe("it%27s");
    expect(uriEncode("test()")).toBe("test%28%29");
    expect(uriEncode("wild*card")).toBe("wild%2Acard");
  });

  it("should not encode unreserved characters", () => {
    expect(uriEncode("AZaz09-_.~")).toBe("AZaz09-_.~");
  });

  it("should encode base64 signature characters", () => {
    expect(uriEncode("ab+c/d==")).toBe("ab%2Bc%2Fd%3D%3D");
  });

  it("should handle Unicode characters", () => {
    expect(uriEncode("café")).toBe("caf%C3%A9");
    expect(uriEncode("日本")).toBe("%E6%97%A5%E6%9C%AC");
  });
});

describe("encodeResourcePath", () => {
  it("should keep slashes between object path segments", () => {
    expect(encodeResourcePath("my-todo-app", "avatars/heidi/400x400.png")).toBe(
      "/my-todo-app/avatars/heidi/400x400.png"
    );
  });

  it("should escape reserved characters inside segments", () => {
    expect(encodeResourcePath("my-todo-app", "docs/a file(1).txt")).toBe(
      "/my-todo-app/docs/a%20file%281%29.txt"
    );
    expect(encodeResourcePath("b-1", "q?x=1&y#z")).toBe("/b-1/q%3Fx%3D1%26y%23z");
  });

  it("should reject names that cannot be escaped", () => {
    expect(() => encodeResourcePath("b-1", "bad\uD800name")).toThrow(InvalidArgumentError);
  });
});

describe("shouldSignHeader", () => {
  it("should accept extension headers in any case", () => {
    expect(shouldSignHeader("x-goog-acl")).toBe(true);
    expect(shouldSignHeader("X-Goog-Meta-Foo")).toBe(true);
  });

  it("should reject other headers", () => {
    expect(shouldSignHeader("content-type")).toBe(false);
    expect(shouldSignHeader("x-amz-meta-foo")).toBe(false);
    expect(shouldSignHeader("goog-acl")).toBe(false);
  });

  it("should reject encryption key headers", () => {
    expect(shouldSignHeader("x-goog-encryption-key")).toBe(false);
    expect(shouldSignHeader("x-goog-encryption-key-sha256")).toBe(false);
    expect(shouldSignHeader("x-goog-encryption-algorithm")).toBe(true);
  });
});

describe("normalizeHeaderValue", () => {
  it("should trim and collapse whitespace runs", () => {
    expect(normalizeHeaderValue("  bar   baz ")).toBe("bar baz");
    expect(normalizeHeaderValue("a\t\tb\nc")).toBe("a b c");
  });
});

describe("canonicalExtensionHeaders", () => {
  it("should return an empty block without headers", () => {
    expect(canonicalExtensionHeaders(undefined)).toBe("");
    expect(canonicalExtensionHeaders({})).toBe("");
  });

  it("should lower-case, filter and sort", () => {
    const block = canonicalExtensionHeaders({
      "X-Goog-Meta-Zeta": "last",
      "Content-Type": "text/plain",
      "x-goog-acl": "private",
      "X-Goog-Meta-Alpha": "first",
    });

    expect(block).toBe(
      "x-goog-acl:private\nx-goog-meta-alpha:first\nx-goog-meta-zeta:last\n"
    );
  });

  it("should be insensitive to name case and insertion order", () => {
    const a = canonicalExtensionHeaders({ "X-Goog-Meta-Foo": "bar", "x-goog-acl": "private" });
    const b = canonicalExtensionHeaders({ "x-goog-acl": "private", "x-goog-meta-foo": "bar" });

    expect(a).toBe(b);
    expect(a).toBe("x-goog-acl:private\nx-goog-meta-foo:bar\n");
  });

  it("should join multi-valued headers with commas", () => {
    expect(canonicalExtensionHeaders({ "x-goog-meta-foo": ["bar", " baz  qux "] })).toBe(
      "x-goog-meta-foo:bar,baz qux\n"
    );
  });

  it("should merge names that differ only in case", () => {
    expect(
      canonicalExtensionHeaders({ "X-Goog-Meta-Foo": "bar", "x-goog-meta-foo": "baz" })
    ).toBe("x-goog-meta-foo:bar,baz\n");
  });

  it("should keep caller order when merging names that differ only in case", () => {
    expect(
      canonicalExtensionHeaders({ "x-goog-meta-foo": "baz", "X-Goog-Meta-Foo": "bar" })
    ).toBe("x-goog-meta-foo:baz,bar\n");
  });

  it("should sort by code point rather than locale", () => {
    expect(
      canonicalExtensionHeaders({ "x-goog-meta-b": "2", "x-goog-meta-B2": "3", "x-goog-meta-_": "1" })
    ).toBe("x-goog-meta-_:1\nx-goog-meta-b:2\nx-goog-meta-b2:3\n");
  });

  it("should drop encryption key headers", () => {
    expect(
      canonicalExtensionHeaders({
        "x-goog-encryption-key": "test-secret",
        "x-goog-encryption-key-sha256": "test-digest",
        "x-goog-encryption-algorithm": "AES256",
      })
    ).toBe("x-goog-encryption-algorithm:AES256\n");
  });
});

describe("collectExtensionHeaders", () => {
  it("should map each signed name to its canonical value", () => {
    const headers = collectExtensionHeaders({ "X-Goog-Meta-Foo": "a  b", Accept: "*/*" });

    expect([...headers.entries()]).toEqual([["x-goog-meta-foo", "a b"]]);
  });
});

describe("buildCanonicalString", () => {
  it("should keep empty separators for absent content fields", () => {
    const canonical = buildCanonicalString({
      method: HttpMethod.GET,
      resourcePath: "/my-todo-app/avatars/heidi/400x400.png",
      expires: 1767225900,
      extensionHeaders: "",
      query: {},
    });

    expect(canonical).toBe("GET\n\n\n1767225900\n/my-todo-app/avatars/heidi/400x400.png");
  });

  it("should place every field at its position", () => {
    const canonical = buildCanonicalString({
      method: HttpMethod.PUT,
      resourcePath: "/b-1/o",
      expires: 42,
      contentMd5: "rL0Y20zC+Fzt72VPzMSk2A==",
      contentType: "text/plain",
      extensionHeaders: "x-goog-acl:private\n",
      query: { ignored: "yes" },
    });

    expect(canonical).toBe(
      "PUT\nrL0Y20zC+Fzt72VPzMSk2A==\ntext/plain\n42\nx-goog-acl:private\n/b-1/o"
    );
  });

  it("should never include query parameters", () => {
    const base = {
      method: HttpMethod.GET,
      resourcePath: "/b-1/o",
      expires: 1,
      extensionHeaders: "",
    };

    expect(buildCanonicalString({ ...base, query: { a: "1" } })).toBe(
      buildCanonicalString({ ...base, query: {} })
    );
  });
});

describe("buildQueryString", () => {
  it("should keep insertion order and encode names and values", () => {
    expect(buildQueryString({ b: "2", "a key": "x/y+z" })).toBe("b=2&a%20key=x%2Fy%2Bz");
  });

  it("should return an empty string for no parameters", () => {
    expect(buildQueryString({})).toBe("");
  });

  it("should reject names and values that cannot be escaped", () => {
    expect(() => buildQueryString({ x: "\uD800" })).toThrow(InvalidArgumentError);
    expect(() => buildQueryString({ "\uDC00": "1" })).toThrow(
      "Query parameters contain characters that cannot be URL-escaped"
    );
  });
});
