import type { ErrorCatalog, ErrorDefinition } from "@faultline/core";
import { FALLBACK_OWNER, UNKNOWN_ERROR_NAME } from "@faultline/core";
import { CatalogValidationError, type ValidationIssue } from "@faultline/errors";
import { z } from "zod";
import { ErrorDefinitionSchema } from "./catalog-schema.js";

export const UNKNOWN_SYSTEM_ERROR_NAME = "UnknownSystemError";
export const INDEX_VIOLATION_NAME = "IndexViolation";
export const DEADLOCK_NAME = "Deadlock";

/** Frame that runs the audit purge */
export const MAINTENANCE_FRAME_NAME = "MaintenanceUpdates";
export const PURGE_UNSUPPORTED_NAME = "PurgeUnsupported";

/**
 * Definitions the dispatcher relies on. Present in every catalog unless
 * left out explicitly; a given definition with the same owner and name
 * replaces the builtin one.
 */
export const BUILTIN_ERROR_DEFINITIONS: readonly ErrorDefinition[] = Object.freeze([
  {
    errorId: 1000,
    ownerProcedure: FALLBACK_OWNER,
    errorName: UNKNOWN_ERROR_NAME,
    userMessageTemplate:
      'Unknown error message "#ErrorName#" for procedure "#ProcedureName#" is not defined in the error table. #ChildMessage#',
  },
  {
    errorId: 1001,
    ownerProcedure: FALLBACK_OWNER,
    errorName: UNKNOWN_SYSTEM_ERROR_NAME,
    userMessageTemplate: "Unknown system error on server #ServerName# from database #DB#. #ErrorMessage#",
  },
  {
    errorId: 1002,
    ownerProcedure: FALLBACK_OWNER,
    errorName: INDEX_VIOLATION_NAME,
    userMessageTemplate:
      "Unable to perform this operation because there is another record with the same name at the same location.",
    developerMessageTemplate: "#ErrorMessage#",
  },
  {
    errorId: 1003,
    ownerProcedure: FALLBACK_OWNER,
    errorName: DEADLOCK_NAME,
    userMessageTemplate: "System is currently busy, please try again later.",
    developerMessageTemplate: "Database deadlock error occurred. #ErrorMessage#",
  },
  {
    errorId: 1100,
    ownerProcedure: MAINTENANCE_FRAME_NAME,
    errorName: UNKNOWN_ERROR_NAME,
    userMessageTemplate:
      'Unknown error message "#ErrorName#" for procedure "#ProcedureName#" is not defined in the error table.',
  },
  {
    errorId: 1101,
    ownerProcedure: MAINTENANCE_FRAME_NAME,
    errorName: PURGE_UNSUPPORTED_NAME,
    userMessageTemplate: "The audit store does not support purging expired entries.",
  },
]);

export interface CreateErrorCatalogOptions {
  /** Merge `BUILTIN_ERROR_DEFINITIONS` under the given ones. Default: true. */
  readonly includeBuiltins?: boolean;
}

function definitionKey(ownerProcedure: string, errorName: string): string {
  return `${ownerProcedure}\u0000${errorName}`;
}

/**
 * Build an immutable catalog from definitions.
 *
 * Definitions are validated with zod. Error ids and `(owner, name)` pairs
 * must be unique across the resulting catalog.
 *
 * @throws CatalogValidationError
 */
export function createErrorCatalog(
  definitions: unknown = [],
  options?: CreateErrorCatalogOptions,
): ErrorCatalog {
  const parsed = z.array(ErrorDefinitionSchema).safeParse(definitions);
  if (!parsed.success) {
    throw new CatalogValidationError(
      parsed.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
        code: i.code,
      })),
      parsed.error,
    );
  }

  const given = new Set(parsed.data.map((d) => definitionKey(d.ownerProcedure, d.errorName)));
  const builtins =
    options?.includeBuiltins === false
      ? []
      : BUILTIN_ERROR_DEFINITIONS.filter(
          (d) => !given.has(definitionKey(d.ownerProcedure, d.errorName)),
        );

  const byKey = new Map<string, ErrorDefinition>();
  const ids = new Map<number, ErrorDefinition>();
  const issues: ValidationIssue[] = [];

  for (const definition of [...builtins, ...parsed.data]) {
    const key = definitionKey(definition.ownerProcedure, definition.errorName);
    const sameKey = byKey.get(key);
    if (sameKey !== undefined) {
      issues.push({
        path: "",
        message: `Duplicate error '${definition.errorName}' for procedure '${definition.ownerProcedure}'`,
        code: "custom",
      });
      continue;
    }
    const sameId = ids.get(definition.errorId);
    if (sameId !== undefined) {
      issues.push({
        path: "",
        message: `Error id ${definition.errorId} is used by both '${sameId.ownerProcedure}.${sameId.errorName}' and '${definition.ownerProcedure}.${definition.errorName}'`,
        code: "custom",
      });
      continue;
    }
    const frozen = Object.freeze({ ...definition });
    byKey.set(key, frozen);
    ids.set(frozen.errorId, frozen);
  }

  if (issues.length > 0) {
    throw new CatalogValidationError(issues);
  }

  const all = Object.freeze([...byKey.values()]);
  return Object.freeze({
    find: (ownerProcedure: string, errorName: string) =>
      byKey.get(definitionKey(ownerProcedure, errorName)),
    definitions: () => all,
  });
}
