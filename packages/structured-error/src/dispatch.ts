/**
 * Failure dispatch: classify what a frame caught, compose the tree its
 * caller receives, record it and re-signal.
 */

import { type AuditEntryId, DEBUG_MODE, type FrameIdentity, isTruthyParameter } from "@faultline/core";
import { getErrorMessage, SignaledError, USER_DEFINED_ERROR_NUMBER } from "@faultline/errors";
import { DEADLOCK_NAME, INDEX_VIOLATION_NAME, UNKNOWN_SYSTEM_ERROR_NAME } from "./catalog.js";
import { encodeTree } from "./codec.js";
import { captureFailure, type FailureState } from "./failure.js";
import { buildErrorNode } from "./lookup.js";
import type { FrameRuntime } from "./runtime.js";
import { type ChildNode, createContextNode, type ErrorNode, withChildren } from "./tree.js";
import { fitTree } from "./truncate.js";
import { wrapMessage } from "./wrap.js";

// ============================================================================
// CLASSIFICATION
// ============================================================================

/** Host failure numbers with a dedicated catalog entry */
export const KNOWN_HOST_FAILURES: ReadonlyMap<number, string> = new Map([
  [2601, INDEX_VIOLATION_NAME],
  [2627, INDEX_VIOLATION_NAME],
  [1205, DEADLOCK_NAME],
]);

export type FailureClassification =
  /** Already re-signaled by the dispatcher in a deeper frame */
  | { readonly kind: "reentry" }
  /** Raised by a frame with a structured (or plain) message */
  | { readonly kind: "user-defined" }
  | { readonly kind: "known-host-failure"; readonly errorName: string }
  | { readonly kind: "unknown-host-failure"; readonly errorName: string };

/**
 * Classify a failure; the first matching rule wins.
 *
 * Reentry compares procedure names only.
 */
export function classifyFailure(failure: FailureState, handlerName: string): FailureClassification {
  if (failure.procedure === handlerName) {
    return { kind: "reentry" };
  }
  if (failure.number >= USER_DEFINED_ERROR_NUMBER) {
    return { kind: "user-defined" };
  }
  const known = KNOWN_HOST_FAILURES.get(failure.number);
  if (known !== undefined) {
    return { kind: "known-host-failure", errorName: known };
  }
  return { kind: "unknown-host-failure", errorName: UNKNOWN_SYSTEM_ERROR_NAME };
}

// ============================================================================
// COMPOSITION
// ============================================================================

export interface ComposedFailure {
  readonly classification: FailureClassification;
  readonly tree: ErrorNode;
  /** Encoding fitted to the runtime budget; the re-signaled message */
  readonly text: string;
  /** Encoding before any reduction; what the audit entry stores */
  readonly fullText: string;
}

/**
 * Build the tree a frame passes to its caller. Pure apart from reading
 * the runtime's snapshots.
 */
export function composeFailure(
  runtime: FrameRuntime,
  frame: FrameIdentity,
  failure: FailureState,
): ComposedFailure {
  const classification = classifyFailure(failure, runtime.handlerName);
  const { session } = runtime;
  let tree: ErrorNode;

  switch (classification.kind) {
    case "reentry":
      tree = appendExtra(
        wrapMessage(
          runtime,
          failure.message,
          undefined,
          createContextNode([
            ["CalledBy", frame.name],
            ["Line", failure.line],
            ["DB", session.database],
            ["SPID", session.sessionId],
          ]),
        ),
        failure.extra,
      );
      break;

    case "user-defined":
      tree = appendExtra(
        wrapMessage(
          runtime,
          failure.message,
          createContextNode([
            ["CalledBy", frame.name === failure.procedure ? undefined : frame.name],
            ["ThrownBy", knownProcedure(failure)],
            ["ThrownLine", failure.line],
            ["DB", session.database],
            ["SPID", session.sessionId],
          ]),
        ),
        failure.extra,
      );
      break;

    case "known-host-failure":
    case "unknown-host-failure": {
      const { errorName } = classification;
      const owner =
        runtime.catalog.find(frame.name, errorName) !== undefined ? frame.name : runtime.handlerName;
      tree = buildErrorNode(runtime, {
        procedureName: owner,
        errorName,
        tokens: {
          ErrorNumber: failure.number,
          ErrorMessage: failure.message,
          PROCID: frame.id,
          ThrownBy: knownProcedure(failure),
          ThrownLine: failure.line,
          ServerName: session.serverName,
          DB: session.database,
          SPID: session.sessionId,
        },
      }).node;
      break;
    }
  }

  return {
    classification,
    tree,
    text: fitTree(tree, { budget: runtime.budget }).text,
    fullText: encodeTree(tree),
  };
}

function knownProcedure(failure: FailureState): string | undefined {
  return failure.procedure.length > 0 ? failure.procedure : undefined;
}

function appendExtra(tree: ErrorNode, extra: readonly ChildNode[] | undefined): ErrorNode {
  if (extra === undefined || extra.length === 0) {
    return tree;
  }
  return withChildren(tree, [...tree.children, ...extra]);
}

// ============================================================================
// DISPATCH
// ============================================================================

export interface HandleFailureRequest {
  readonly frame: FrameIdentity;
  readonly auditId?: AuditEntryId | undefined;
  /** The caught value */
  readonly error?: unknown;
  /** State captured before cleanup; preferred over `error` */
  readonly snapshot?: FailureState | undefined;
  /** Appended after the snapshot's own extra nodes */
  readonly extra?: readonly ChildNode[] | undefined;
}

/**
 * Compose the failure, close the audit entry with it and re-signal.
 *
 * The re-signaled error has number 50000, the failure's severity, state
 * and line, and the handler name as procedure. Audit write failures are
 * logged and never replace the failure being propagated.
 */
export async function handleFailure(
  runtime: FrameRuntime,
  request: HandleFailureRequest,
): Promise<never> {
  const captured = request.snapshot ?? captureFailure(request.error);
  const failure =
    request.extra === undefined
      ? captured
      : { ...captured, extra: [...(captured.extra ?? []), ...request.extra] };
  const { frame } = request;

  if (isTruthyParameter(runtime.parameters.get(DEBUG_MODE))) {
    printDiagnostics(runtime, frame, failure);
  }

  const composed = composeFailure(runtime, frame, failure);

  if (request.auditId !== undefined) {
    try {
      await runtime.audit.fail(request.auditId, composed.fullText);
    } catch (auditError: unknown) {
      console.warn(
        `[error-handler] Failed to record failure on audit entry ${request.auditId}: ${getErrorMessage(auditError)}`,
      );
    }
  }

  throw new SignaledError(composed.text, {
    procedure: runtime.handlerName,
    line: failure.line,
    severity: failure.severity,
    state: failure.state,
    cause: request.error,
  });
}

function printDiagnostics(runtime: FrameRuntime, frame: FrameIdentity, failure: FailureState): void {
  const where = `${failure.procedure || "(unknown procedure)"}${failure.line !== undefined ? `[${failure.line}]` : ""}`;
  console.debug(`[error-handler] ${where}: ${failure.number}-${failure.message}`);
  console.debug(
    `[error-handler] frame=${frame.name} (${frame.id}) severity=${failure.severity} state=${failure.state} handler=${runtime.handlerName}`,
  );
}
