/**
 * Structured error tree model.
 *
 * Nodes are immutable values; every transformation returns a new node.
 */

/** `T` element: ordered attributes with context about the failure */
export interface ContextNode {
  readonly kind: "context";
  readonly attributes: ReadonlyMap<string, string>;
}

/**
 * Any element other than `E` or `T` met while decoding foreign text.
 * Kept as its source markup so it re-encodes unchanged.
 */
export interface AttachmentNode {
  readonly kind: "attachment";
  readonly name: string;
  readonly markup: string;
}

/** `E` element */
export interface ErrorNode {
  readonly kind: "error";
  readonly code: number;
  readonly userMessage: string;
  /** Present only when it differs from `userMessage` */
  readonly developerMessage?: string | undefined;
  readonly sourceProcedure: string;
  readonly sourceLine?: number | undefined;
  readonly children: readonly ChildNode[];
}

export type ChildNode = ContextNode | ErrorNode | AttachmentNode;

export interface ErrorNodeInit {
  readonly code: number;
  readonly userMessage: string;
  readonly developerMessage?: string | undefined;
  readonly sourceProcedure: string;
  readonly sourceLine?: number | undefined;
  readonly children?: readonly ChildNode[];
}

/**
 * Create an error node. A developer message equal to the user message is dropped.
 */
export function createErrorNode(init: ErrorNodeInit): ErrorNode {
  const developerMessage =
    init.developerMessage !== undefined && init.developerMessage !== init.userMessage
      ? init.developerMessage
      : undefined;

  return Object.freeze({
    kind: "error",
    code: init.code,
    userMessage: init.userMessage,
    ...(developerMessage !== undefined ? { developerMessage } : {}),
    sourceProcedure: init.sourceProcedure,
    ...(init.sourceLine !== undefined ? { sourceLine: init.sourceLine } : {}),
    children: Object.freeze([...(init.children ?? [])]),
  });
}

/**
 * Create a context node from ordered entries. Null and undefined values are
 * skipped. Returns undefined when nothing remains.
 */
export function createContextNode(
  entries:
    | readonly (readonly [string, string | number | null | undefined])[]
    | ReadonlyMap<string, string>,
): ContextNode | undefined {
  const attributes = new Map<string, string>();
  for (const [name, value] of entries) {
    if (value === null || value === undefined) {
      continue;
    }
    attributes.set(name, String(value));
  }
  if (attributes.size === 0) {
    return undefined;
  }
  return Object.freeze({ kind: "context", attributes });
}

export function createAttachmentNode(name: string, markup: string): AttachmentNode {
  return Object.freeze({ kind: "attachment", name, markup });
}

/** Replace the children of a node */
export function withChildren(node: ErrorNode, children: readonly ChildNode[]): ErrorNode {
  return Object.freeze({ ...node, children: Object.freeze([...children]) });
}

/** Remove the developer message of a node */
export function withoutDeveloperMessage(node: ErrorNode): ErrorNode {
  const { developerMessage: _dropped, ...rest } = node;
  return Object.freeze(rest);
}

export function isErrorNode(node: ChildNode): node is ErrorNode {
  return node.kind === "error";
}

export function isContextNode(node: ChildNode): node is ContextNode {
  return node.kind === "context";
}

export function isAttachmentNode(node: ChildNode): node is AttachmentNode {
  return node.kind === "attachment";
}
