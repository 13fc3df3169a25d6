import { describe, expect, it } from "vitest";
import {
  AuditStoreError,
  type BaseErrorType,
  CatalogFileNotFoundError,
  CatalogParseError,
  type FaultlineError,
  FrameConfigurationError,
  InternalError,
  TreeDecodeError,
} from "../../index.js";

function categorize(error: FaultlineError): string {
  const tag: BaseErrorType = error._tag;
  switch (tag) {
    case "ValidationError":
      return "validation";
    case "NotFoundError":
      return "not_found";
    case "ExternalError":
      return "external";
    case "InternalError":
      return "internal";
    default: {
      const unreachable: never = tag;
      throw new Error(`Unhandled error tag: ${String(unreachable)}`);
    }
  }
}

describe("Exhaustive handling on the _tag discriminant", () => {
  it("routes every concrete error through its base tag", () => {
    expect(categorize(new CatalogParseError(undefined, "bad"))).toBe("validation");
    expect(categorize(new TreeDecodeError("bad", 0))).toBe("validation");
    expect(categorize(new FrameConfigurationError("blank name"))).toBe("validation");
    expect(categorize(new CatalogFileNotFoundError("/etc/errors.yaml"))).toBe("not_found");
    expect(categorize(new AuditStoreError("insert"))).toBe("external");
    expect(categorize(new InternalError({ code: "INTERNAL_ERROR", message: "bug" }))).toBe("internal");
  });

  it("serializes with the resolved catalog fields", () => {
    const json = new AuditStoreError("close", new Error("disk full")).toJSON();
    expect(json).toMatchObject({
      name: "AuditStoreError",
      _tag: "ExternalError",
      code: "AUDIT_STORE_FAILED",
      domain: "audit",
      message: "Audit store close failed: disk full",
      isExpected: false,
      metadata: { operation: "close" },
    });
  });
});
