/**
 * Token sets and `#Name#` placeholder substitution.
 */

export type TokenValue = string | null;

/** Ordered, case-sensitive token map */
export type TokenSet = ReadonlyMap<string, TokenValue>;

/** Accepted token input: numbers are stringified, undefined entries dropped */
export type TokenInput =
  | Readonly<Record<string, string | number | null | undefined>>
  | Iterable<readonly [string, string | number | null | undefined]>;

export const CHILD_MESSAGE_TOKEN = "ChildMessage";
export const PROCEDURE_NAME_TOKEN = "ProcedureName";
export const ERROR_NAME_TOKEN = "ErrorName";
export const ERROR_ID_TOKEN = "ErrorId";

/** Reserved keys, matched ignoring case, never kept as context attributes */
export const PROCID_TOKEN = "PROCID";
export const LINE_TOKEN = "LINE";
export const LIMIT_LENGTH_TOKEN = "LimitLength";

/**
 * Build an ordered token set. Names are trimmed and empty names dropped;
 * a repeated name keeps its first position and its last value.
 */
export function createTokenSet(input?: TokenInput): Map<string, TokenValue> {
  const tokens = new Map<string, TokenValue>();
  if (input === undefined) {
    return tokens;
  }

  const entries = isIterable(input) ? input : Object.entries(input);
  for (const [rawName, value] of entries) {
    const name = rawName.trim();
    if (name.length === 0 || value === undefined) {
      continue;
    }
    tokens.set(name, typeof value === "number" ? String(value) : value);
  }
  return tokens;
}

function isIterable(
  input: TokenInput,
): input is Iterable<readonly [string, string | number | null | undefined]> {
  return Symbol.iterator in input;
}

/**
 * Replace `#Name#` placeholders in one left-to-right pass.
 *
 * - a non-empty name present in `tokens` is replaced by its value (null → "")
 * - `#ChildMessage#` without a token is replaced by `childMessage` or ""
 * - any other placeholder is left verbatim
 *
 * Substituted text is not rescanned.
 */
export function substitute(template: string, tokens: TokenSet, childMessage?: string): string {
  let out = "";
  let i = 0;

  while (i < template.length) {
    const open = template.indexOf("#", i);
    if (open === -1) {
      out += template.slice(i);
      break;
    }
    out += template.slice(i, open);

    const close = template.indexOf("#", open + 1);
    if (close === -1) {
      out += template.slice(open);
      break;
    }

    const name = template.slice(open + 1, close);
    if (name.length > 0 && tokens.has(name)) {
      out += tokens.get(name) ?? "";
      i = close + 1;
    } else if (name === CHILD_MESSAGE_TOKEN) {
      out += childMessage ?? "";
      i = close + 1;
    } else {
      // the closing '#' may open the next placeholder
      out += template.slice(open, close);
      i = close;
    }
  }

  return out;
}

/**
 * Find a token ignoring case. Returns the stored name and value.
 */
export function findTokenIgnoreCase(
  tokens: TokenSet,
  name: string,
): { readonly name: string; readonly value: TokenValue } | undefined {
  const wanted = name.toUpperCase();
  for (const [key, value] of tokens) {
    if (key.toUpperCase() === wanted) {
      return { name: key, value };
    }
  }
  return undefined;
}

/** Names removed from the context node of every error node */
export function isReservedToken(name: string): boolean {
  const upper = name.toUpperCase();
  return (
    upper === PROCID_TOKEN || upper === LINE_TOKEN || upper === LIMIT_LENGTH_TOKEN.toUpperCase()
  );
}
