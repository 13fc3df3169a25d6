import type { AuditEntryId, FrameIdentity, TransactionContext } from "@faultline/core";
import { getErrorMessage, SignaledError } from "@faultline/errors";
import { handleFailure } from "./dispatch.js";
import { captureFailure } from "./failure.js";
import { formatError } from "./lookup.js";
import type { FrameRuntime } from "./runtime.js";
import {
  createTokenSet,
  findTokenIgnoreCase,
  LINE_TOKEN,
  PROCID_TOKEN,
  type TokenInput,
} from "./tokens.js";
import { enterTransaction, type TransactionGuard } from "./transaction.js";
import type { ChildNode } from "./tree.js";

export interface FrameOptions {
  readonly name: string;
  /** Selects the read or write audit toggle. Default: false. */
  readonly readOnly?: boolean;
  /** Recorded, redacted, on the audit entry */
  readonly input?: unknown;
  readonly transaction?: TransactionContext;
}

export interface RaiseOptions {
  readonly line?: number;
  readonly severity?: number;
  readonly state?: number;
  /** Nested errors or attachments to include under the raised error */
  readonly children?: readonly ChildNode[];
}

export interface FrameScope {
  readonly frame: FrameIdentity;
  readonly auditId: AuditEntryId | undefined;
  /** Encoded error text for one of this frame's catalog entries */
  format(errorName: string, tokens?: TokenInput, options?: RaiseOptions): string;
  /** Throw a signal for one of this frame's catalog entries */
  raise(errorName: string, tokens?: TokenInput, options?: RaiseOptions): never;
  /** Keep nodes to append to the error this frame re-signals, should it fail */
  attach(...nodes: readonly ChildNode[]): void;
}

/**
 * Run a body as a frame.
 *
 * The frame opens an audit entry (when enabled) and, given a transaction,
 * owns it only if none was active on entry. On success an owned transaction
 * commits and the entry closes with the body's result. On failure the
 * failure state is captured first, an owned and still active transaction
 * rolls back, then dispatch re-signals to the caller with any nodes the
 * body attached.
 */
export async function runFrame<T>(
  runtime: FrameRuntime,
  options: FrameOptions,
  body: (scope: FrameScope) => Promise<T> | T,
): Promise<T> {
  const frame = runtime.procedures.register(options.name);
  let auditId: AuditEntryId | undefined;
  let guard: TransactionGuard | undefined;
  const attached: ChildNode[] = [];

  const scope: FrameScope = {
    frame,
    get auditId() {
      return auditId;
    },
    format: (errorName, tokens, raiseOptions) =>
      formatError(runtime, {
        procedureName: frame.name,
        errorName,
        tokens: withFrameTokens(tokens, frame, raiseOptions?.line),
        ...(raiseOptions?.children !== undefined ? { children: raiseOptions.children } : {}),
      }),
    raise: (errorName, tokens, raiseOptions) => {
      throw new SignaledError(scope.format(errorName, tokens, raiseOptions), {
        procedure: frame.name,
        line: raiseOptions?.line,
        severity: raiseOptions?.severity,
        state: raiseOptions?.state,
      });
    },
    attach: (...nodes) => {
      attached.push(...nodes);
    },
  };

  try {
    auditId = await runtime.audit.begin(frame.name, options.readOnly ?? false, options.input);
    if (options.transaction !== undefined) {
      guard = await enterTransaction(options.transaction);
    }

    const result = await body(scope);

    await guard?.commit();
    await runtime.audit.end(auditId, result);
    return result;
  } catch (error: unknown) {
    const snapshot = captureFailure(error);
    if (guard !== undefined) {
      try {
        await guard.rollback();
      } catch (rollbackError: unknown) {
        console.warn(`[frame] Rollback failed in ${frame.name}: ${getErrorMessage(rollbackError)}`);
      }
    }
    return handleFailure(runtime, {
      frame,
      auditId,
      error,
      snapshot,
      ...(attached.length > 0 ? { extra: attached } : {}),
    });
  }
}

function withFrameTokens(
  tokens: TokenInput | undefined,
  frame: FrameIdentity,
  line: number | undefined,
): Map<string, string | null> {
  const set = createTokenSet(tokens);
  if (findTokenIgnoreCase(set, PROCID_TOKEN) === undefined) {
    set.set(PROCID_TOKEN, String(frame.id));
  }
  if (line !== undefined && findTokenIgnoreCase(set, LINE_TOKEN) === undefined) {
    set.set(LINE_TOKEN, String(line));
  }
  return set;
}
