export const PACKAGE_NAME = "@faultline/test-utils" as const;

export { MockAuditStore } from "./audit-store.js";
export {
  ARTICLE_DEFINITIONS,
  createTestRuntime,
  fixedClock,
  TEST_NOW,
  TEST_SESSION,
  type TestRuntime,
  type TestRuntimeOptions,
} from "./fixtures.js";
export { FakeTransaction, type FakeTransactionOptions } from "./transaction.js";
export { rejectionOf } from "./signal.js";
