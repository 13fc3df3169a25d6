/**
 * Zod schemas for error definitions and catalog files.
 */

import type { ErrorDefinition } from "@faultline/core";
import { z } from "zod";

const NameSchema = z.string().trim().min(1).max(128);

export const ErrorDefinitionSchema = z.object({
  errorId: z.number().int(),
  ownerProcedure: NameSchema,
  errorName: NameSchema,
  userMessageTemplate: z.string(),
  developerMessageTemplate: z.string().optional(),
});

/**
 * One entry of a YAML catalog file. Uses the shorter `procedure`, `name`,
 * `message` and `developerMessage` keys.
 */
export const CatalogFileEntrySchema = z
  .object({
    errorId: z.number().int(),
    procedure: NameSchema,
    name: NameSchema,
    message: z.string(),
    developerMessage: z.string().nullish(),
  })
  .strict()
  .transform(
    (entry): ErrorDefinition => ({
      errorId: entry.errorId,
      ownerProcedure: entry.procedure,
      errorName: entry.name,
      userMessageTemplate: entry.message,
      ...(entry.developerMessage !== undefined && entry.developerMessage !== null
        ? { developerMessageTemplate: entry.developerMessage }
        : {}),
    }),
  );

export const CatalogFileSchema = z
  .object({
    /** Set to false to leave out the builtin definitions */
    builtins: z.boolean().optional(),
    errors: z.array(CatalogFileEntrySchema).default([]),
  })
  .strict();

export type CatalogFile = z.infer<typeof CatalogFileSchema>;
