/**
 * Frame, session and transaction contracts.
 */

/** A registered procedure: numeric id plus its name */
export interface FrameIdentity {
  readonly id: number;
  readonly name: string;
}

/** Ambient facts about the executing session, surfaced as context tokens */
export interface SessionInfo {
  /** Server name (`ServerName` token) */
  readonly serverName: string;
  /** Database or data-source name (`DB` token) */
  readonly database: string;
  /** Session id (`SPID` token) */
  readonly sessionId: number;
}

/**
 * A unit of work a frame may own. `isActive` reports whether a transaction
 * is currently open on the connection.
 */
export interface TransactionContext {
  readonly isActive: () => boolean;
  readonly begin: () => Promise<void>;
  readonly commit: () => Promise<void>;
  readonly rollback: () => Promise<void>;
}
