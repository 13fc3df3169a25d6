/**
 * Secret redaction for audit payloads.
 *
 * Frame input is stored as JSON text; connection strings and credentials
 * passed as parameters must not reach the audit store verbatim.
 */

import type { RedactionPattern } from "./types.js";

export const DEFAULT_MAX_PAYLOAD_SIZE = 8000;

/**
 * Built-in patterns for credentials commonly passed to data-access frames.
 */
export const BUILT_IN_SECRET_PATTERNS: readonly RedactionPattern[] = [
  {
    name: "bearer_token",
    pattern: /Bearer\s+[\w\-._~+/]+=*/gi,
  },
  {
    name: "database_url",
    pattern: /(?:postgres(?:ql)?|mysql|mssql|sqlserver|mongodb(?:\+srv)?|redis):\/\/[^\s"']+/gi,
  },
  {
    name: "connection_string_password",
    pattern: /(?:password|pwd)\s*=\s*[^;"]+/gi,
    replacement: "Password=[REDACTED]",
  },
  {
    name: "json_secret_field",
    pattern: /"(password|passwd|secret|token|apiKey|api_key)"\s*:\s*"[^"]*"/gi,
    replacement: '"$1":"[REDACTED]"',
  },
];

const DEFAULT_REPLACEMENT = "[REDACTED]";

/**
 * Apply redaction patterns in order.
 */
export function redactSecrets(text: string, patterns: readonly RedactionPattern[]): string {
  let result = text;
  for (const { pattern, replacement } of patterns) {
    // fresh instance so a shared global regex never carries lastIndex
    const regex = new RegExp(pattern.source, pattern.flags);
    result = result.replace(regex, replacement ?? DEFAULT_REPLACEMENT);
  }
  return result;
}

/**
 * Cut text to `maxSize` characters, appending a marker when cut.
 */
export function truncatePayload(text: string, maxSize: number): string {
  if (text.length <= maxSize) {
    return text;
  }
  return `${text.slice(0, maxSize)}...[TRUNCATED]`;
}

/**
 * Serialize a payload for the audit store: JSON, redacted, then bounded.
 * `undefined` yields null so the stored column stays empty.
 */
export function serializePayload(
  payload: unknown,
  patterns: readonly RedactionPattern[],
  maxSize: number,
): string | null {
  if (payload === undefined) {
    return null;
  }

  let serialized: string;
  try {
    serialized = JSON.stringify(payload) ?? String(payload);
  } catch (error: unknown) {
    // circular structures and BigInt values
    serialized = `[unserializable: ${error instanceof Error ? error.message : String(error)}]`;
  }

  return truncatePayload(redactSecrets(serialized, patterns), maxSize);
}

/**
 * Combine built-in and custom patterns.
 */
export function buildRedactionPatterns(
  redactBuiltIns: boolean,
  customPatterns: readonly RedactionPattern[],
): readonly RedactionPattern[] {
  return [...(redactBuiltIns ? BUILT_IN_SECRET_PATTERNS : []), ...customPatterns];
}
