/**
 * Minimal XML reader and writer helpers for the structured error wire format.
 *
 * Covers elements, attributes, character data, CDATA sections, comments,
 * processing instructions and the predefined and numeric entities. DTDs and
 * namespaces are not interpreted.
 */

import { TreeDecodeError } from "@faultline/errors";

export interface XmlElement {
  readonly type: "element";
  readonly name: string;
  readonly attributes: readonly (readonly [string, string])[];
  readonly children: readonly XmlContent[];
  /** Offset of `<` in the source */
  readonly start: number;
  /** Offset just past the closing `>` */
  readonly end: number;
}

export interface XmlText {
  readonly type: "text";
  readonly value: string;
  readonly start: number;
}

export type XmlContent = XmlElement | XmlText;

// ============================================================================
// NAMES
// ============================================================================

function isNameStartChar(ch: string): boolean {
  const c = ch.charCodeAt(0);
  return (
    (c >= 0x41 && c <= 0x5a) || (c >= 0x61 && c <= 0x7a) || ch === "_" || ch === ":" || c >= 0xc0
  );
}

function isNameChar(ch: string): boolean {
  const c = ch.charCodeAt(0);
  return isNameStartChar(ch) || ch === "-" || ch === "." || (c >= 0x30 && c <= 0x39) || c === 0xb7;
}

const ESCAPED_NAME_CHAR = /_x([0-9A-Fa-f]{4})_/g;

/**
 * Encode an arbitrary string as an XML name. Characters not allowed at
 * their position become `_xHHHH_`; an underscore that would read as such
 * an escape is itself escaped.
 */
export function encodeName(name: string): string {
  let out = "";
  for (let i = 0; i < name.length; i++) {
    const ch = name.charAt(i);
    const valid = i === 0 ? isNameStartChar(ch) : isNameChar(ch);
    const looksEscaped = ch === "_" && /^_x[0-9A-Fa-f]{4}_/.test(name.slice(i));
    out += valid && !looksEscaped ? ch : `_x${ch.charCodeAt(0).toString(16).toUpperCase().padStart(4, "0")}_`;
  }
  return out;
}

/** Inverse of `encodeName` */
export function decodeName(name: string): string {
  return name.replace(ESCAPED_NAME_CHAR, (_match, hex: string) =>
    String.fromCharCode(Number.parseInt(hex, 16)),
  );
}

// ============================================================================
// ESCAPING
// ============================================================================

const ATTRIBUTE_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "\t": "&#x9;",
  "\n": "&#xA;",
  "\r": "&#xD;",
};

/** Escape a value for a double-quoted attribute */
export function escapeAttribute(value: string): string {
  return value.replace(/[&<>"\t\n\r]/g, (ch) => ATTRIBUTE_ESCAPES[ch] ?? ch);
}

const PREDEFINED_ENTITIES: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

function decodeEntities(raw: string, offset: number): string {
  return raw.replace(/&([^;&\s]*);?/g, (match, body: string, index: number) => {
    if (!match.endsWith(";")) {
      throw new TreeDecodeError("unterminated entity reference", offset + index);
    }
    const predefined = PREDEFINED_ENTITIES[body];
    if (predefined !== undefined) {
      return predefined;
    }
    const numeric = /^#(?:x([0-9A-Fa-f]+)|([0-9]+))$/.exec(body);
    if (numeric !== null) {
      const code = numeric[1] !== undefined ? Number.parseInt(numeric[1], 16) : Number(numeric[2]);
      if (code > 0x10ffff) {
        throw new TreeDecodeError(`invalid character reference '&${body};'`, offset + index);
      }
      return String.fromCodePoint(code);
    }
    throw new TreeDecodeError(`unknown entity '&${body};'`, offset + index);
  });
}

// ============================================================================
// READER
// ============================================================================

/** Deepest element nesting the reader accepts */
export const MAX_NESTING_DEPTH = 256;

class XmlReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  readDocument(): XmlElement {
    this.skipMisc();
    if (this.text.startsWith("<?xml", this.pos)) {
      this.skipPast("?>", "unterminated XML declaration");
      this.skipMisc();
    }
    if (this.text.charAt(this.pos) !== "<") {
      this.fail("expected root element");
    }
    const root = this.readElement(1);
    this.skipMisc();
    if (this.pos < this.text.length) {
      this.fail("unexpected content after root element");
    }
    return root;
  }

  private readElement(depth: number): XmlElement {
    if (depth > MAX_NESTING_DEPTH) {
      this.fail(`elements nested deeper than ${MAX_NESTING_DEPTH} levels`);
    }
    const start = this.pos;
    this.pos++; // <
    const name = this.readName();
    const attributes: [string, string][] = [];
    const seen = new Set<string>();

    for (;;) {
      const hadSpace = this.skipSpace();
      const ch = this.text.charAt(this.pos);
      if (ch === "/") {
        this.expect("/>");
        return { type: "element", name, attributes, children: [], start, end: this.pos };
      }
      if (ch === ">") {
        this.pos++;
        break;
      }
      if (ch === "") {
        this.fail(`unterminated start tag '${name}'`);
      }
      if (!hadSpace) {
        this.fail("expected whitespace before attribute");
      }
      const attrName = this.readName();
      if (seen.has(attrName)) {
        this.fail(`duplicate attribute '${attrName}'`);
      }
      seen.add(attrName);
      this.skipSpace();
      this.expect("=");
      this.skipSpace();
      attributes.push([attrName, this.readAttributeValue()]);
    }

    const children = this.readContent(name, depth);
    return { type: "element", name, attributes, children, start, end: this.pos };
  }

  private readContent(parent: string, depth: number): XmlContent[] {
    const children: XmlContent[] = [];
    for (;;) {
      if (this.pos >= this.text.length) {
        this.fail(`missing end tag for '${parent}'`);
      }
      if (this.text.startsWith("</", this.pos)) {
        this.pos += 2;
        const name = this.readName();
        if (name !== parent) {
          this.fail(`end tag '${name}' does not match '${parent}'`);
        }
        this.skipSpace();
        this.expect(">");
        return children;
      }
      if (this.text.startsWith("<!--", this.pos)) {
        this.skipPast("-->", "unterminated comment");
        continue;
      }
      if (this.text.startsWith("<![CDATA[", this.pos)) {
        const start = this.pos;
        const close = this.text.indexOf("]]>", this.pos + 9);
        if (close === -1) {
          this.fail("unterminated CDATA section");
        }
        children.push({ type: "text", value: this.text.slice(this.pos + 9, close), start });
        this.pos = close + 3;
        continue;
      }
      if (this.text.startsWith("<?", this.pos)) {
        this.skipPast("?>", "unterminated processing instruction");
        continue;
      }
      if (this.text.charAt(this.pos) === "<") {
        children.push(this.readElement(depth + 1));
        continue;
      }

      const start = this.pos;
      const next = this.text.indexOf("<", this.pos);
      const end = next === -1 ? this.text.length : next;
      children.push({
        type: "text",
        value: decodeEntities(this.text.slice(start, end), start),
        start,
      });
      this.pos = end;
    }
  }

  private readName(): string {
    const start = this.pos;
    if (!isNameStartChar(this.text.charAt(this.pos))) {
      this.fail("expected a name");
    }
    this.pos++;
    while (this.pos < this.text.length && isNameChar(this.text.charAt(this.pos))) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  private readAttributeValue(): string {
    const quote = this.text.charAt(this.pos);
    if (quote !== '"' && quote !== "'") {
      this.fail("expected quoted attribute value");
    }
    const start = this.pos + 1;
    const close = this.text.indexOf(quote, start);
    if (close === -1) {
      this.fail("unterminated attribute value");
    }
    const raw = this.text.slice(start, close);
    const lt = raw.indexOf("<");
    if (lt !== -1) {
      this.pos = start + lt;
      this.fail("'<' not allowed in attribute value");
    }
    this.pos = close + 1;
    // literal whitespace normalizes to spaces; escaped whitespace survives
    return decodeEntities(raw.replace(/\r\n?/g, "\n").replace(/[\t\n]/g, " "), start);
  }

  private skipSpace(): boolean {
    const start = this.pos;
    while (/[ \t\r\n]/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
    return this.pos > start;
  }

  private skipMisc(): void {
    for (;;) {
      this.skipSpace();
      if (this.text.startsWith("<!--", this.pos)) {
        this.skipPast("-->", "unterminated comment");
      } else if (this.text.startsWith("<?", this.pos) && !this.text.startsWith("<?xml", this.pos)) {
        this.skipPast("?>", "unterminated processing instruction");
      } else {
        return;
      }
    }
  }

  private skipPast(terminator: string, message: string): void {
    const index = this.text.indexOf(terminator, this.pos);
    if (index === -1) {
      this.fail(message);
    }
    this.pos = index + terminator.length;
  }

  private expect(literal: string): void {
    if (!this.text.startsWith(literal, this.pos)) {
      this.fail(`expected '${literal}'`);
    }
    this.pos += literal.length;
  }

  private fail(detail: string): never {
    throw new TreeDecodeError(detail, this.pos);
  }
}

/**
 * Parse a document with a single root element.
 *
 * @throws TreeDecodeError
 */
export function parseXml(text: string): XmlElement {
  return new XmlReader(text).readDocument();
}
