/**
 * Concrete internal errors, one per catalog code that needs extra context.
 */

import { ExternalError } from "./bases/external-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

// ============================================================================
// CATALOG ERRORS
// ============================================================================

/**
 * Thrown when error definitions fail schema or uniqueness checks.
 */
export class CatalogValidationError extends ValidationError<"CATALOG_INVALID"> {
  constructor(issues: readonly ValidationIssue[], cause?: unknown) {
    super({
      code: "CATALOG_INVALID",
      message: `Invalid error catalog: ${issues.map((i) => formatIssue(i)).join("; ")}`,
      issues,
      cause,
    });
  }
}

/**
 * Thrown when a catalog file cannot be parsed as YAML.
 */
export class CatalogParseError extends ValidationError<"CATALOG_PARSE_FAILED"> {
  constructor(
    public readonly filePath: string | undefined,
    detail: string,
    public readonly line?: number,
    public readonly column?: number,
    cause?: unknown,
  ) {
    super({
      code: "CATALOG_PARSE_FAILED",
      message: `Failed to parse error catalog${filePath !== undefined ? ` ${filePath}` : ""}${formatLocation(line, column)}: ${detail}`,
      cause,
    });
  }
}

/**
 * Thrown when a catalog file does not exist.
 */
export class CatalogFileNotFoundError extends NotFoundError<"CATALOG_FILE_NOT_FOUND"> {
  constructor(public readonly filePath: string) {
    super({
      code: "CATALOG_FILE_NOT_FOUND",
      message: `Error catalog file not found: ${filePath}`,
      metadata: { filePath },
    });
  }
}

// ============================================================================
// PARAMETER ERRORS
// ============================================================================

/**
 * Thrown when runtime parameter rows fail validation.
 */
export class ParameterValidationError extends ValidationError<"PARAMETERS_INVALID"> {
  constructor(issues: readonly ValidationIssue[], cause?: unknown) {
    super({
      code: "PARAMETERS_INVALID",
      message: `Invalid parameters: ${issues.map((i) => formatIssue(i)).join("; ")}`,
      issues,
      cause,
    });
  }
}

// ============================================================================
// TREE ERRORS
// ============================================================================

/**
 * Thrown by strict decoding when text is not a well-formed structured error.
 */
export class TreeDecodeError extends ValidationError<"TREE_DECODE_FAILED"> {
  constructor(
    detail: string,
    public readonly position?: number,
  ) {
    super({
      code: "TREE_DECODE_FAILED",
      message: `Malformed structured error${position !== undefined ? ` at offset ${position}` : ""}: ${detail}`,
    });
  }
}

/**
 * Thrown when a captured failure snapshot does not match its schema.
 */
export class SnapshotValidationError extends ValidationError<"SNAPSHOT_INVALID"> {
  constructor(issues: readonly ValidationIssue[], cause?: unknown) {
    super({
      code: "SNAPSHOT_INVALID",
      message: `Invalid failure snapshot: ${issues.map((i) => formatIssue(i)).join("; ")}`,
      issues,
      cause,
    });
  }
}

// ============================================================================
// AUDIT ERRORS
// ============================================================================

/**
 * Thrown when the audit store fails an operation.
 */
export class AuditStoreError extends ExternalError<"AUDIT_STORE_FAILED"> {
  constructor(
    public readonly operation: string,
    cause?: unknown,
  ) {
    super({
      code: "AUDIT_STORE_FAILED",
      message: `Audit store ${operation} failed${cause instanceof Error ? `: ${cause.message}` : ""}`,
      metadata: { operation },
      cause,
    });
  }
}

// ============================================================================
// FRAME ERRORS
// ============================================================================

/**
 * Thrown when a frame is registered or run with invalid options.
 */
export class FrameConfigurationError extends ValidationError<"FRAME_INVALID"> {
  constructor(detail: string) {
    super({
      code: "FRAME_INVALID",
      message: `Invalid frame: ${detail}`,
    });
  }
}

function formatIssue(issue: ValidationIssue): string {
  return issue.path.length > 0 ? `${issue.path}: ${issue.message}` : issue.message;
}

function formatLocation(line: number | undefined, column: number | undefined): string {
  if (line === undefined) return "";
  return column !== undefined ? ` (line ${line}, column ${column})` : ` (line ${line})`;
}
