/**
 * Catalog lookup and error node construction.
 */

import {
  type ErrorCatalog,
  FALLBACK_OWNER,
  isTruthyParameter,
  UNKNOWN_ERROR_NAME,
} from "@faultline/core";
import {
  createTokenSet,
  ERROR_ID_TOKEN,
  ERROR_NAME_TOKEN,
  findTokenIgnoreCase,
  isReservedToken,
  LIMIT_LENGTH_TOKEN,
  LINE_TOKEN,
  PROCEDURE_NAME_TOKEN,
  PROCID_TOKEN,
  substitute,
  type TokenInput,
  type TokenSet,
} from "./tokens.js";
import {
  type ChildNode,
  createContextNode,
  createErrorNode,
  type ErrorNode,
  isErrorNode,
} from "./tree.js";
import { fitTree } from "./truncate.js";

/** Code of the template used when even the fallback definition is missing */
export const BUILTIN_UNKNOWN_ERROR_CODE = 0;

export const BUILTIN_UNKNOWN_ERROR_TEMPLATE =
  'Unknown error message "#ErrorName#" for procedure "#ProcedureName#" is not defined in the error table. #ChildMessage#';

/** Resolves a numeric procedure id to its name */
export interface ProcedureResolver {
  resolve(id: number): string | undefined;
}

export interface LookupContext {
  readonly catalog: ErrorCatalog;
  readonly procedures?: ProcedureResolver;
  /** Maximum encoded length for `formatError`. Default: 2047. */
  readonly budget?: number;
}

export interface LookupResult {
  readonly code: number;
  readonly userMessage: string;
  /** Undefined when the definition has no developer template */
  readonly developerMessage: string | undefined;
  /** True when the exact definition was missing */
  readonly fallback: boolean;
}

export interface ErrorRequest {
  /** Owner the definition is looked up under */
  readonly procedureName: string;
  readonly errorName: string;
  readonly tokens?: TokenInput;
  /** Nested errors and attachments placed after the context node */
  readonly children?: readonly ChildNode[];
}

export interface BuiltError {
  readonly node: ErrorNode;
  /** False when a `LimitLength` token turned truncation off */
  readonly limited: boolean;
}

/**
 * Resolve a definition and substitute its templates.
 *
 * Order: exact `(procedureName, errorName)`, then the fallback owner's
 * `UnknownError`, then the builtin template with code 0. On fallback the
 * resolved code is added as the `ErrorId` token.
 */
export function lookupError(
  catalog: ErrorCatalog,
  procedureName: string,
  errorName: string,
  tokens: TokenInput = {},
  children: readonly ChildNode[] = [],
): LookupResult {
  const tokenSet = createTokenSet(tokens);
  if (!tokenSet.has(PROCEDURE_NAME_TOKEN)) tokenSet.set(PROCEDURE_NAME_TOKEN, procedureName);
  if (!tokenSet.has(ERROR_NAME_TOKEN)) tokenSet.set(ERROR_NAME_TOKEN, errorName);

  let definition = catalog.find(procedureName, errorName);
  const fallback = definition === undefined;
  if (definition === undefined) {
    definition = catalog.find(FALLBACK_OWNER, UNKNOWN_ERROR_NAME);
  }

  const code = definition?.errorId ?? BUILTIN_UNKNOWN_ERROR_CODE;
  const userTemplate = definition?.userMessageTemplate ?? BUILTIN_UNKNOWN_ERROR_TEMPLATE;
  const developerTemplate = definition?.developerMessageTemplate;
  if (fallback) {
    tokenSet.set(ERROR_ID_TOKEN, String(code));
  }

  const child = children.find(isErrorNode);
  const childUser = child?.userMessage;
  const childDeveloper = child?.developerMessage ?? childUser;

  return {
    code,
    userMessage: substitute(userTemplate, tokenSet, childUser),
    developerMessage:
      developerTemplate !== undefined
        ? substitute(developerTemplate, tokenSet, childDeveloper)
        : undefined,
    fallback,
  };
}

/**
 * Build an error node for a request.
 *
 * Reserved tokens are matched ignoring case and never become context:
 * `PROCID` names the source procedure through `context.procedures`,
 * `LINE` sets the source line and `LimitLength` (truthy test) controls
 * truncation. The remaining non-null tokens form the node's context node,
 * which comes before any given children.
 */
export function buildErrorNode(context: LookupContext, request: ErrorRequest): BuiltError {
  const tokens = createTokenSet(request.tokens);
  const children = request.children ?? [];

  const procId = findTokenIgnoreCase(tokens, PROCID_TOKEN);
  const line = findTokenIgnoreCase(tokens, LINE_TOKEN);
  const limitLength = findTokenIgnoreCase(tokens, LIMIT_LENGTH_TOKEN);

  const result = lookupError(
    context.catalog,
    request.procedureName,
    request.errorName,
    tokens,
    children,
  );

  const contextEntries = new Map(contextTokens(tokens));
  if (result.fallback) {
    contextEntries.set(ERROR_ID_TOKEN, String(result.code));
  }
  const contextNode = createContextNode(contextEntries);

  const node = createErrorNode({
    code: result.code,
    userMessage: result.userMessage,
    developerMessage: result.developerMessage,
    sourceProcedure: resolveProcedure(context, procId?.value) ?? request.procedureName,
    sourceLine: parseLine(line?.value),
    children: contextNode !== undefined ? [contextNode, ...children] : children,
  });

  return {
    node,
    limited: limitLength === undefined || isTruthyParameter(limitLength.value),
  };
}

/**
 * Build an error node and return its encoding, fitted to the budget unless
 * a `LimitLength` token turned that off.
 */
export function formatError(context: LookupContext, request: ErrorRequest): string {
  const { node, limited } = buildErrorNode(context, request);
  return fitTree(node, { budget: context.budget, limited }).text;
}

function* contextTokens(tokens: TokenSet): Iterable<[string, string]> {
  for (const [name, value] of tokens) {
    if (value !== null && !isReservedToken(name)) {
      yield [name, value];
    }
  }
}

function resolveProcedure(context: LookupContext, value: string | null | undefined): string | undefined {
  if (value === null || value === undefined || !/^-?\d+$/.test(value.trim())) {
    return undefined;
  }
  return context.procedures?.resolve(Number(value.trim()));
}

function parseLine(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined || !/^-?\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number(value.trim());
}
