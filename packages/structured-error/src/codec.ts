import { TreeDecodeError } from "@faultline/errors";
import {
  type ChildNode,
  createAttachmentNode,
  createContextNode,
  createErrorNode,
  type ErrorNode,
} from "./tree.js";
import { decodeName, encodeName, escapeAttribute, parseXml, type XmlElement } from "./xml.js";

// ============================================================================
// ENCODING
// ============================================================================

/**
 * Encode an error tree as wire text:
 * `<E N="code" M="user" D="dev" P="procedure" L="line">children</E>`.
 * Childless elements are self-closed.
 */
export function encodeTree(node: ErrorNode): string {
  let out = `<E N="${node.code}" M="${escapeAttribute(node.userMessage)}"`;
  if (node.developerMessage !== undefined) {
    out += ` D="${escapeAttribute(node.developerMessage)}"`;
  }
  out += ` P="${escapeAttribute(node.sourceProcedure)}"`;
  if (node.sourceLine !== undefined) {
    out += ` L="${node.sourceLine}"`;
  }

  if (node.children.length === 0) {
    return `${out}/>`;
  }
  return `${out}>${node.children.map(encodeChild).join("")}</E>`;
}

function encodeChild(child: ChildNode): string {
  switch (child.kind) {
    case "error":
      return encodeTree(child);
    case "context": {
      let out = "<T";
      for (const [name, value] of child.attributes) {
        out += ` ${encodeName(name)}="${escapeAttribute(value)}"`;
      }
      return `${out}/>`;
    }
    case "attachment":
      return child.markup;
  }
}

// ============================================================================
// DECODING
// ============================================================================

/** True when text, after leading whitespace, starts like markup */
export function looksLikeMarkup(text: string): boolean {
  return text.trimStart().startsWith("<");
}

/**
 * Decode wire text into an error tree.
 *
 * Whitespace-only text between elements is ignored. Elements other than
 * `E` and `T` become attachments holding their source markup.
 *
 * @throws TreeDecodeError
 */
export function decodeTree(text: string): ErrorNode {
  const root = parseXml(text);
  if (root.name !== "E") {
    throw new TreeDecodeError(`root element is '${root.name}', expected 'E'`, root.start);
  }
  return toErrorNode(root, text);
}

/**
 * Decode wire text, or return undefined when it is not a structured error.
 */
export function tryDecodeTree(text: string): ErrorNode | undefined {
  if (!looksLikeMarkup(text)) {
    return undefined;
  }
  try {
    return decodeTree(text);
  } catch (error: unknown) {
    if (error instanceof TreeDecodeError) {
      return undefined;
    }
    throw error;
  }
}

function toErrorNode(element: XmlElement, source: string): ErrorNode {
  const attrs = new Map(element.attributes);

  const code = parseInteger(attrs.get("N"), "N", element);
  if (code === undefined) {
    throw new TreeDecodeError("error element is missing attribute 'N'", element.start);
  }

  const children: ChildNode[] = [];
  for (const child of element.children) {
    if (child.type === "text") {
      if (child.value.trim().length > 0) {
        throw new TreeDecodeError("unexpected text inside error element", child.start);
      }
      continue;
    }
    if (child.name === "E") {
      children.push(toErrorNode(child, source));
    } else if (child.name === "T") {
      const context = createContextNode(
        child.attributes.map(([name, value]) => [decodeName(name), value] as const),
      );
      if (context !== undefined) {
        children.push(context);
      }
    } else {
      children.push(createAttachmentNode(child.name, source.slice(child.start, child.end)));
    }
  }

  return createErrorNode({
    code,
    userMessage: attrs.get("M") ?? "",
    developerMessage: attrs.get("D"),
    sourceProcedure: attrs.get("P") ?? "",
    sourceLine: parseInteger(attrs.get("L"), "L", element),
    children,
  });
}

function parseInteger(
  value: string | undefined,
  attribute: string,
  element: XmlElement,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new TreeDecodeError(
      `attribute '${attribute}' is not an integer: '${value}'`,
      element.start,
    );
  }
  return Number(trimmed);
}
