/**
 * Runtime parameter contracts.
 *
 * Parameters are flat name → value rows with a free-text description.
 * Values are interpreted by the caller; the on/off toggles use
 * `isTruthyParameter`.
 */

// ---------------------------------------------------------------------------
// Parameter names
// ---------------------------------------------------------------------------

/** Enables audit entries for read-only frames */
export const AUDIT_READ_LOG = "AuditReadLog";

/** Enables audit entries for frames that modify state */
export const AUDIT_WRITE_LOG = "AuditWriteLog";

/** Enables diagnostic output from the failure dispatcher */
export const DEBUG_MODE = "DebugMode";

/** Retention period used by the audit purge frame */
export const PURGE_PERIOD = "PurgePeriod";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ParameterRow {
  readonly name: string;
  readonly value: string | null;
  readonly description?: string | undefined;
}

/**
 * Read-only view over parameter rows. Names are matched case-insensitively.
 */
export interface ParameterSnapshot {
  readonly get: (name: string) => string | undefined;
  readonly rows: () => readonly ParameterRow[];
}

/**
 * Rows present in every snapshot unless overridden.
 */
export const DEFAULT_PARAMETERS: readonly ParameterRow[] = [
  {
    name: AUDIT_READ_LOG,
    value: "false",
    description: "Controls audit entries for read-only frames.",
  },
  {
    name: AUDIT_WRITE_LOG,
    value: "false",
    description: "Controls audit entries for frames that create or update data.",
  },
  {
    name: DEBUG_MODE,
    value: "false",
    description: "Controls display of failure dispatch diagnostics.",
  },
  {
    name: PURGE_PERIOD,
    value: '<TimeSpan Month="0" Week="1" Day="0" />',
    description: "Defines how long audit entries are retained.",
  },
];
