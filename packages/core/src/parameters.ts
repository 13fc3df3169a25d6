import { ParameterValidationError, type ValidationIssue } from "@faultline/errors";
import { z } from "zod";
import { DEFAULT_PARAMETERS, type ParameterRow, type ParameterSnapshot } from "./config-types.js";

export const ParameterRowSchema = z.object({
  name: z.string().min(1).max(255),
  value: z.string().nullable(),
  description: z.string().optional(),
});

const ParameterRowsSchema = z.array(ParameterRowSchema);

const TRUTHY_PATTERN = /^[yt1]/i;

/**
 * Truthy test for toggle parameters: the value starts with `y`, `t` or `1`,
 * ignoring case. Absent and null values are false.
 */
export function isTruthyParameter(value: string | null | undefined): boolean {
  return value !== undefined && value !== null && TRUTHY_PATTERN.test(value);
}

export interface CreateParameterSnapshotOptions {
  /** Merge `DEFAULT_PARAMETERS` under the given rows. Default: true. */
  readonly includeDefaults?: boolean;
}

/**
 * Builds a frozen parameter snapshot from rows or a name → value record.
 *
 * Rows are validated with zod; names must be unique ignoring case.
 * Given rows override defaults of the same name.
 *
 * @throws ParameterValidationError
 */
export function createParameterSnapshot(
  input: unknown = [],
  options?: CreateParameterSnapshotOptions,
): ParameterSnapshot {
  const result = ParameterRowsSchema.safeParse(toRowList(input));
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
      code: i.code,
    }));
    throw new ParameterValidationError(issues, result.error);
  }

  const byName = new Map<string, ParameterRow>();
  const issues: ValidationIssue[] = [];
  for (const row of result.data) {
    const key = row.name.toLowerCase();
    if (byName.has(key)) {
      issues.push({ path: "", message: `Duplicate parameter '${row.name}'`, code: "custom" });
      continue;
    }
    byName.set(key, Object.freeze({ ...row }));
  }
  if (issues.length > 0) {
    throw new ParameterValidationError(issues);
  }

  if (options?.includeDefaults !== false) {
    for (const row of DEFAULT_PARAMETERS) {
      const key = row.name.toLowerCase();
      if (!byName.has(key)) {
        byName.set(key, row);
      }
    }
  }

  const rows = Object.freeze([...byName.values()]);
  return Object.freeze({
    get: (name: string) => byName.get(name.toLowerCase())?.value ?? undefined,
    rows: () => rows,
  });
}

function toRowList(input: unknown): unknown {
  if (input === null || typeof input !== "object" || Array.isArray(input)) {
    return input;
  }
  return Object.entries(input).map(([name, value]) => ({ name, value }));
}
