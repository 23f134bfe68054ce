import { describe, it, expect } from "vitest";
import { resolveToken } from "./auth.js";

describe("resolveToken", () => {
  it("prefers GITHUB_TOKEN", () => {
    expect(resolveToken({ GITHUB_TOKEN: "test-primary", TOKEN: "test-fallback" })).toBe(
      "test-primary"
    );
  });

  it("falls back to TOKEN", () => {
    expect(resolveToken({ TOKEN: "test-fallback" })).toBe("test-fallback");
  });

  it("skips a blank GITHUB_TOKEN", () => {
    expect(resolveToken({ GITHUB_TOKEN: "   ", TOKEN: "test-fallback" })).toBe("test-fallback");
  });

  it("trims surrounding whitespace", () => {
    expect(resolveToken({ GITHUB_TOKEN: "  test-secret\n" })).toBe("test-secret");
  });

  it("returns undefined when neither variable is set", () => {
    expect(resolveToken({})).toBeUndefined();
  });
});
