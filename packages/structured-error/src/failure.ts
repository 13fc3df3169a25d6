/**
 * Normalized view of a caught failure.
 */

import {
  DEFAULT_SEVERITY,
  DEFAULT_STATE,
  getErrorMessage,
  isHostFailure,
  isSignaledError,
  SnapshotValidationError,
} from "@faultline/errors";
import { z } from "zod";
import type { ChildNode } from "./tree.js";

export interface FailureState {
  readonly number: number;
  readonly message: string;
  /** Procedure that raised the failure; "" when unknown */
  readonly procedure: string;
  readonly line?: number | undefined;
  readonly severity: number;
  readonly state: number;
  /**
   * Nodes the frame gathered before cleanup, appended last on reentry and
   * user-defined failures.
   */
  readonly extra?: readonly ChildNode[] | undefined;
}

/** Number assigned to failures that carry none */
export const UNNUMBERED_FAILURE = 0;

export const FailureSnapshotSchema = z.object({
  number: z.number().int(),
  message: z.string(),
  procedure: z.string(),
  line: z.number().int().optional(),
  severity: z.number().int().min(0).max(25),
  state: z.number().int().min(0).max(255),
});

/**
 * Capture the failure state of a caught value before cleanup runs.
 *
 * Signal carriers map field by field. Other errors with a numeric `number`
 * (database drivers) contribute their `procName`/`procedure`,
 * `lineNumber`/`line`, `class`/`severity` and `state` when present.
 * Everything else is an unnumbered failure with its message.
 */
export function captureFailure(error: unknown): FailureState {
  if (isSignaledError(error) || isHostFailure(error)) {
    return Object.freeze({
      number: error.number,
      message: error.message,
      procedure: error.procedure ?? "",
      line: error.line,
      severity: error.severity,
      state: error.state,
    });
  }

  if (typeof error === "object" && error !== null && "number" in error && typeof error.number === "number") {
    return Object.freeze({
      number: error.number,
      message: getErrorMessage(error),
      procedure: readString(error, "procName") ?? readString(error, "procedure") ?? "",
      line: readNumber(error, "lineNumber") ?? readNumber(error, "line"),
      severity: readNumber(error, "class") ?? readNumber(error, "severity") ?? DEFAULT_SEVERITY,
      state: readNumber(error, "state") ?? DEFAULT_STATE,
    });
  }

  return Object.freeze({
    number: UNNUMBERED_FAILURE,
    message: getErrorMessage(error),
    procedure: "",
    severity: DEFAULT_SEVERITY,
    state: DEFAULT_STATE,
  });
}

/**
 * Validate a snapshot received as plain data, e.g. parsed JSON.
 *
 * @throws SnapshotValidationError
 */
export function parseFailureSnapshot(value: unknown): FailureState {
  const result = FailureSnapshotSchema.safeParse(value);
  if (!result.success) {
    throw new SnapshotValidationError(
      result.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
        code: i.code,
      })),
      result.error,
    );
  }
  return Object.freeze(result.data);
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}
