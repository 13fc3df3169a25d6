import { describe, expect, it } from "vitest";
import {
  BUILT_IN_SECRET_PATTERNS,
  buildRedactionPatterns,
  redactSecrets,
  serializePayload,
  truncatePayload,
} from "../../index.js";

describe("redactSecrets", () => {
  it("redacts connection string passwords", () => {
    expect(
      redactSecrets("Server=db;Password=test-secret;Database=app", BUILT_IN_SECRET_PATTERNS),
    ).toBe("Server=db;Password=[REDACTED];Database=app");
  });

  it("redacts database URLs", () => {
    expect(redactSecrets("url postgres://u:p@host/db end", BUILT_IN_SECRET_PATTERNS)).toBe(
      "url [REDACTED] end",
    );
  });

  it("redacts bearer tokens", () => {
    expect(redactSecrets("Bearer abc.def", BUILT_IN_SECRET_PATTERNS)).toBe("[REDACTED]");
  });

  it("applies custom patterns after built-ins", () => {
    const patterns = buildRedactionPatterns(true, [
      { name: "ticket", pattern: /TICKET-\d+/g, replacement: "[TICKET]" },
    ]);
    expect(patterns).toHaveLength(BUILT_IN_SECRET_PATTERNS.length + 1);
    expect(redactSecrets("see TICKET-42", patterns)).toBe("see [TICKET]");
  });

  it("can skip built-ins", () => {
    expect(buildRedactionPatterns(false, [])).toEqual([]);
  });
});

describe("truncatePayload", () => {
  it("keeps short text", () => {
    expect(truncatePayload("abc", 3)).toBe("abc");
  });

  it("marks cut text", () => {
    expect(truncatePayload("abcdef", 3)).toBe("abc...[TRUNCATED]");
  });
});

describe("serializePayload", () => {
  it("returns null for undefined", () => {
    expect(serializePayload(undefined, [], 100)).toBeNull();
  });

  it("serializes, redacts and bounds", () => {
    expect(serializePayload({ token: "test-secret" }, BUILT_IN_SECRET_PATTERNS, 100)).toBe(
      '{"token":"[REDACTED]"}',
    );
    expect(serializePayload("abcdefghijklmnop", [], 10)).toBe('"abcdefghi...[TRUNCATED]');
  });

  it("describes values JSON cannot serialize", () => {
    const circular: { self?: unknown } = {};
    circular.self = circular;
    expect(serializePayload(circular, [], 1000)).toMatch(/^\[unserializable: /);
  });
});
