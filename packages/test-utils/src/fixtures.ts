import type { Clock, ErrorDefinition, SessionInfo } from "@faultline/core";
import { createParameterSnapshot } from "@faultline/core";
import {
  createErrorCatalog,
  createFrameRuntime,
  type FrameRuntime,
  type FrameRuntimeConfig,
} from "@faultline/structured-error";
import { MockAuditStore } from "./audit-store.js";

export const TEST_SESSION: SessionInfo = Object.freeze({
  serverName: "test-server",
  database: "testdb",
  sessionId: 51,
});

export const TEST_NOW = new Date("2026-03-10T12:00:00.000Z");

/** A clock that always returns `at` */
export function fixedClock(at: Date = TEST_NOW): Clock {
  return { now: () => at };
}

/** Sample definitions for an article service */
export const ARTICLE_DEFINITIONS: readonly ErrorDefinition[] = Object.freeze([
  {
    errorId: 50001,
    ownerProcedure: "ArticleGet",
    errorName: "NotFound",
    userMessageTemplate: "The Article #EntityId# specified was not found",
  },
  {
    errorId: 50002,
    ownerProcedure: "ArticleDelete",
    errorName: "IsDeleted",
    userMessageTemplate: "The Article has been marked as deleted",
    developerMessageTemplate: "The Article #EntityId# has been marked as deleted",
  },
  {
    errorId: 50003,
    ownerProcedure: "ArticleDelete",
    errorName: "DeleteFailed",
    userMessageTemplate: "The Article could not be deleted. #ChildMessage#",
  },
  {
    errorId: 50004,
    ownerProcedure: "ArticleInsert",
    errorName: "IndexViolation",
    userMessageTemplate: "An article with this name already exists.",
    developerMessageTemplate: "#ErrorMessage#",
  },
]);

export interface TestRuntimeOptions extends Omit<FrameRuntimeConfig, "parameters" | "auditStore"> {
  /** Parameter rows over the seeded defaults */
  readonly parameters?: Readonly<Record<string, string>>;
  /** Default: `ARTICLE_DEFINITIONS` */
  readonly definitions?: readonly ErrorDefinition[];
}

export interface TestRuntime {
  readonly runtime: FrameRuntime;
  readonly store: MockAuditStore;
}

/**
 * Runtime with the article definitions, a mock audit store, a fixed
 * session and a fixed clock.
 */
export function createTestRuntime(options: TestRuntimeOptions = {}): TestRuntime {
  const { parameters, definitions, ...config } = options;
  const store = new MockAuditStore();
  const runtime = createFrameRuntime({
    catalog: createErrorCatalog(definitions ?? ARTICLE_DEFINITIONS),
    session: TEST_SESSION,
    clock: fixedClock(),
    ...config,
    parameters: createParameterSnapshot(parameters ?? {}),
    auditStore: store,
  });
  return { runtime, store };
}
