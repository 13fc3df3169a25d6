import { describe, expect, it } from "vitest";
import { DEFAULT_PURGE_BATCH_SIZE, DEFAULT_RETENTION, PACKAGE_NAME } from "../index.js";

describe("@faultline/audit", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@faultline/audit");
  });

  it("should keep one week of entries and purge in batches of 100 by default", () => {
    expect(DEFAULT_RETENTION).toEqual({ weeks: 1 });
    expect(DEFAULT_PURGE_BATCH_SIZE).toBe(100);
  });
});
