import {
  AUDIT_READ_LOG,
  AUDIT_WRITE_LOG,
  type AuditEntryId,
  type AuditStore,
  type Clock,
  isTruthyParameter,
  type ParameterSnapshot,
  systemClock,
} from "@faultline/core";
import { AuditStoreError } from "@faultline/errors";
import { buildRedactionPatterns, DEFAULT_MAX_PAYLOAD_SIZE, serializePayload } from "./redaction.js";
import type { AuditLogConfig, RedactionPattern } from "./types.js";

/**
 * Audit-entry lifecycle for frames.
 *
 * `begin` opens an entry only when the applicable toggle parameter is
 * truthy; with no id, `end` and `fail` do nothing. An entry closes at most
 * once, through either `end` or `fail`.
 *
 * Store failures surface as `AuditStoreError`.
 */
export class AuditLog {
  private readonly store: AuditStore;
  private readonly parameters: ParameterSnapshot;
  private readonly clock: Clock;
  private readonly patterns: readonly RedactionPattern[];
  private readonly maxPayloadSize: number;

  constructor(config: AuditLogConfig) {
    this.store = config.store;
    this.parameters = config.parameters;
    this.clock = config.clock ?? systemClock;
    this.patterns = buildRedactionPatterns(
      config.redaction?.redactSecrets ?? true,
      config.redaction?.customPatterns ?? [],
    );
    this.maxPayloadSize = config.redaction?.maxPayloadSize ?? DEFAULT_MAX_PAYLOAD_SIZE;
  }

  /** Whether entries are recorded for frames of this kind */
  isEnabled(readOnly: boolean): boolean {
    return isTruthyParameter(this.parameters.get(readOnly ? AUDIT_READ_LOG : AUDIT_WRITE_LOG));
  }

  async begin(
    procedureName: string,
    readOnly: boolean,
    input?: unknown,
  ): Promise<AuditEntryId | undefined> {
    if (!this.isEnabled(readOnly)) {
      return undefined;
    }

    try {
      return await this.store.insert({
        procedureName,
        inputData: serializePayload(input, this.patterns, this.maxPayloadSize),
        startTime: this.clock.now(),
      });
    } catch (error: unknown) {
      throw new AuditStoreError("insert", error);
    }
  }

  /**
   * Close an entry normally. Returns whether this call closed it.
   */
  async end(id: AuditEntryId | undefined, output?: unknown): Promise<boolean> {
    if (id === undefined) {
      return false;
    }

    try {
      return await this.store.close(id, {
        endTime: this.clock.now(),
        outputData: serializePayload(output, this.patterns, this.maxPayloadSize),
      });
    } catch (error: unknown) {
      throw new AuditStoreError("close", error);
    }
  }

  /**
   * Close an entry with the encoded error tree. Returns whether this call closed it.
   */
  async fail(id: AuditEntryId | undefined, encodedTree: string): Promise<boolean> {
    if (id === undefined) {
      return false;
    }

    try {
      return await this.store.close(id, {
        endTime: this.clock.now(),
        errorMessage: encodedTree,
      });
    } catch (error: unknown) {
      throw new AuditStoreError("close", error);
    }
  }
}
