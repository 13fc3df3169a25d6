import type { AuditStore, Clock, ParameterSnapshot } from "@faultline/core";

/**
 * A named regex applied to serialized audit input.
 */
export interface RedactionPattern {
  readonly name: string;
  readonly pattern: RegExp;
  /** Defaults to "[REDACTED]" */
  readonly replacement?: string;
}

export interface AuditRedactionConfig {
  /** Apply `BUILT_IN_SECRET_PATTERNS`. Default: true. */
  readonly redactSecrets?: boolean;
  readonly customPatterns?: readonly RedactionPattern[];
  /** Serialized input and output are cut to this many characters. Default: 8000. */
  readonly maxPayloadSize?: number;
}

export interface AuditLogConfig {
  readonly store: AuditStore;
  readonly parameters: ParameterSnapshot;
  readonly clock?: Clock;
  readonly redaction?: AuditRedactionConfig;
}

/** Retention window for audit purges, counted back from UTC midnight */
export interface RetentionPeriod {
  readonly months?: number;
  readonly weeks?: number;
  readonly days?: number;
}
