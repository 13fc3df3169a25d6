/**
 * Size-bounded encoding of error trees.
 *
 * Reductions remove the least important content first and never touch the
 * root's code, user message or source procedure.
 */

import { encodeTree } from "./codec.js";
import {
  type ChildNode,
  type ErrorNode,
  isAttachmentNode,
  isContextNode,
  isErrorNode,
  withChildren,
  withoutDeveloperMessage,
} from "./tree.js";

/** Largest message a signal may carry */
export const DEFAULT_MESSAGE_BUDGET = 2047;

export type ReductionStep =
  | "drop-attachment"
  | "drop-nested-grandchild"
  | "drop-nested-error"
  | "drop-context"
  | "drop-developer-message";

export interface Reduction {
  readonly step: ReductionStep;
  readonly node: ErrorNode;
}

export interface FitOptions {
  /** Maximum encoded length. Default: 2047. */
  readonly budget?: number;
  /** When false the encoding is returned whatever its length. Default: true. */
  readonly limited?: boolean;
}

export interface FitResult {
  readonly text: string;
  readonly node: ErrorNode;
  readonly steps: readonly ReductionStep[];
  /** True when the text is still over budget after every reduction */
  readonly oversized: boolean;
}

function lastIndexWhere<T>(items: readonly T[], predicate: (item: T) => boolean): number {
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (item !== undefined && predicate(item)) {
      return i;
    }
  }
  return -1;
}

function removeAt(items: readonly ChildNode[], index: number): ChildNode[] {
  return [...items.slice(0, index), ...items.slice(index + 1)];
}

/**
 * Apply the first applicable reduction, in priority order:
 * 1. the root's last attachment
 * 2. the last error inside the root's last nested error
 * 3. the root's last nested error
 * 4. the root's last context node
 * 5. the root's developer message
 *
 * Returns undefined when nothing is left to remove.
 */
export function reduceOnce(node: ErrorNode): Reduction | undefined {
  const { children } = node;

  const attachment = lastIndexWhere(children, isAttachmentNode);
  if (attachment !== -1) {
    return { step: "drop-attachment", node: withChildren(node, removeAt(children, attachment)) };
  }

  const nested = lastIndexWhere(children, isErrorNode);
  if (nested !== -1) {
    const child = children[nested];
    if (child !== undefined && isErrorNode(child)) {
      const grandchild = lastIndexWhere(child.children, isErrorNode);
      if (grandchild !== -1) {
        const reducedChild = withChildren(child, removeAt(child.children, grandchild));
        return {
          step: "drop-nested-grandchild",
          node: withChildren(node, children.map((c, i) => (i === nested ? reducedChild : c))),
        };
      }
    }
    return { step: "drop-nested-error", node: withChildren(node, removeAt(children, nested)) };
  }

  const context = lastIndexWhere(children, isContextNode);
  if (context !== -1) {
    return { step: "drop-context", node: withChildren(node, removeAt(children, context)) };
  }

  if (node.developerMessage !== undefined) {
    return { step: "drop-developer-message", node: withoutDeveloperMessage(node) };
  }

  return undefined;
}

/**
 * Encode a tree, reducing it until the text fits the budget. When every
 * reduction is spent the oversized text is returned.
 */
export function fitTree(node: ErrorNode, options?: FitOptions): FitResult {
  const budget = options?.budget ?? DEFAULT_MESSAGE_BUDGET;
  const limited = options?.limited ?? true;

  let current = node;
  let text = encodeTree(current);
  const steps: ReductionStep[] = [];

  while (limited && text.length > budget) {
    const reduction = reduceOnce(current);
    if (reduction === undefined) {
      break;
    }
    steps.push(reduction.step);
    current = reduction.node;
    text = encodeTree(current);
  }

  return { text, node: current, steps, oversized: text.length > budget };
}
