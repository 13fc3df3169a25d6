import { hostname } from "node:os";

import { AuditLog, type AuditRedactionConfig, InMemoryAuditStore } from "@faultline/audit";
import {
  type AuditStore,
  type Clock,
  createParameterSnapshot,
  type ErrorCatalog,
  FALLBACK_OWNER,
  type ParameterSnapshot,
  type SessionInfo,
  systemClock,
} from "@faultline/core";
import { createErrorCatalog } from "./catalog.js";
import { ProcedureRegistry } from "./registry.js";
import { DEFAULT_MESSAGE_BUDGET } from "./truncate.js";

/**
 * Everything a frame needs, resolved once and shared read-only by every
 * frame that uses it. Refreshing configuration means building a new runtime.
 */
export interface FrameRuntime {
  readonly catalog: ErrorCatalog;
  readonly parameters: ParameterSnapshot;
  readonly procedures: ProcedureRegistry;
  readonly auditStore: AuditStore;
  readonly audit: AuditLog;
  readonly session: SessionInfo;
  readonly clock: Clock;
  /** Procedure name re-signaled failures carry */
  readonly handlerName: string;
  readonly budget: number;
}

export interface FrameRuntimeConfig {
  /** Default: builtin definitions only */
  readonly catalog?: ErrorCatalog;
  /** Default: seeded parameters only */
  readonly parameters?: ParameterSnapshot;
  /** Default: a new in-memory store */
  readonly auditStore?: AuditStore;
  readonly procedures?: ProcedureRegistry;
  readonly session?: Partial<SessionInfo>;
  readonly clock?: Clock;
  readonly redaction?: AuditRedactionConfig;
  readonly handlerName?: string;
  readonly budget?: number;
}

export function createFrameRuntime(config: FrameRuntimeConfig = {}): FrameRuntime {
  const parameters = config.parameters ?? createParameterSnapshot();
  const auditStore = config.auditStore ?? new InMemoryAuditStore();
  const clock = config.clock ?? systemClock;

  return Object.freeze({
    catalog: config.catalog ?? createErrorCatalog(),
    parameters,
    procedures: config.procedures ?? new ProcedureRegistry(),
    auditStore,
    audit: new AuditLog({
      store: auditStore,
      parameters,
      clock,
      ...(config.redaction !== undefined ? { redaction: config.redaction } : {}),
    }),
    session: Object.freeze({
      serverName: config.session?.serverName ?? hostname(),
      database: config.session?.database ?? "default",
      sessionId: config.session?.sessionId ?? process.pid,
    }),
    clock,
    handlerName: config.handlerName ?? FALLBACK_OWNER,
    budget: config.budget ?? DEFAULT_MESSAGE_BUDGET,
  });
}
