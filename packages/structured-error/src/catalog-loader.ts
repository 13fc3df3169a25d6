/**
 * YAML error catalog loader.
 *
 * Pipeline: parse YAML, validate with zod, build an immutable catalog.
 *
 * ```yaml
 * errors:
 *   - errorId: 50001
 *     procedure: ArticleGet
 *     name: NotFound
 *     message: "The Article #EntityId# specified was not found"
 * ```
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import type { ErrorCatalog } from "@faultline/core";
import {
  CatalogFileNotFoundError,
  CatalogParseError,
  CatalogValidationError,
  wrapError,
} from "@faultline/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";

import { createErrorCatalog } from "./catalog.js";
import { CatalogFileSchema } from "./catalog-schema.js";

export interface ParseCatalogOptions {
  /** Overrides the file's `builtins` setting */
  readonly includeBuiltins?: boolean;
  /** Reported in parse errors */
  readonly filePath?: string;
}

export interface LoadCatalogOptions extends Omit<ParseCatalogOptions, "filePath"> {
  readonly encoding?: BufferEncoding;
}

/**
 * Parses a YAML string into an error catalog.
 *
 * @throws CatalogParseError when the text is not YAML
 * @throws CatalogValidationError when the content fails validation
 */
export function parseCatalogYaml(yamlString: string, options?: ParseCatalogOptions): ErrorCatalog {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlString);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new CatalogParseError(options?.filePath, error.message, pos?.line, pos?.col, error);
    }
    throw new CatalogParseError(options?.filePath, String(error));
  }

  // an empty document is an empty catalog
  const result = CatalogFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new CatalogValidationError(
      result.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
        code: i.code,
      })),
      result.error,
    );
  }

  return createErrorCatalog(result.data.errors, {
    includeBuiltins: options?.includeBuiltins ?? result.data.builtins ?? true,
  });
}

/**
 * Reads a YAML catalog file.
 *
 * @throws CatalogFileNotFoundError when the file does not exist
 */
export async function loadCatalog(
  filePath: string,
  options?: LoadCatalogOptions,
): Promise<ErrorCatalog> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, { encoding: options?.encoding ?? "utf-8" });
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new CatalogFileNotFoundError(absolutePath);
    }
    throw wrapError(error, `Reading catalog file ${absolutePath}`);
  }

  return parseCatalogYaml(content, {
    filePath: absolutePath,
    ...(options?.includeBuiltins !== undefined ? { includeBuiltins: options.includeBuiltins } : {}),
  });
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
