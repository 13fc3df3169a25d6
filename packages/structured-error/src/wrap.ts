import { FALLBACK_OWNER, UNKNOWN_ERROR_NAME } from "@faultline/core";
import { tryDecodeTree } from "./codec.js";
import { buildErrorNode, type LookupContext } from "./lookup.js";
import { CHILD_MESSAGE_TOKEN } from "./tokens.js";
import { type ContextNode, type ErrorNode, withChildren } from "./tree.js";

/**
 * Turn a failure message into an error tree and add context around it.
 *
 * Text that decodes as a structured error is used as is. Anything else
 * becomes a leaf built from the fallback `UnknownError` definition with the
 * text bound to `ChildMessage`. `contextBefore` becomes the root's first
 * child and `contextAfter` its last.
 */
export function wrapMessage(
  context: LookupContext,
  raw: string,
  contextBefore?: ContextNode,
  contextAfter?: ContextNode,
): ErrorNode {
  const tree =
    tryDecodeTree(raw) ??
    buildErrorNode(context, {
      procedureName: FALLBACK_OWNER,
      errorName: UNKNOWN_ERROR_NAME,
      tokens: { [CHILD_MESSAGE_TOKEN]: raw },
    }).node;

  if (contextBefore === undefined && contextAfter === undefined) {
    return tree;
  }

  return withChildren(tree, [
    ...(contextBefore !== undefined ? [contextBefore] : []),
    ...tree.children,
    ...(contextAfter !== undefined ? [contextAfter] : []),
  ]);
}
