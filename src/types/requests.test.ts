import { describe, it, expect } from "vitest";
import { createSignUrlRequest } from "./requests.js";

describe("createSignUrlRequest", () => {
  it("should combine bucket and object with the signing options", () => {
    expect(
      createSignUrlRequest("my-todo-app", "avatars/heidi/400x400.png", {
        method: "PUT",
        contentType: "image/png",
        expires: 300,
      })
    ).toEqual({
      bucket: "my-todo-app",
      object: "avatars/heidi/400x400.png",
      method: "PUT",
      contentType: "image/png",
      expires: 300,
    });
  });

  it("should default to no options", () => {
    expect(createSignUrlRequest("my-todo-app", "a.txt")).toEqual({ bucket: "my-todo-app", object: "a.txt" });
  });
});
