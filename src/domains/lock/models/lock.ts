/**
 * Lock domain types.
 */

export type ProcessEventKind = 'launch' | 'activate' | 'terminate';

/**
 * A process notification, validated at the boundary where it enters the
 * daemon (process watcher or control API). The coordinator only reads these.
 */
export interface ProcessEvent {
  readonly processId: number;
  readonly displayName: string;
  readonly kind: ProcessEventKind;
}

/**
 * Per-app lock state.
 *
 * IDLE → SUSPENDED → VERIFYING → RESOLVED_OK | RESOLVED_FAIL → IDLE
 */
export type LockState = 'IDLE' | 'SUSPENDED' | 'VERIFYING' | 'RESOLVED_OK' | 'RESOLVED_FAIL';

/** One interception in progress. At most one exists per appKey. */
export interface PendingVerification {
  readonly appKey: string;
  readonly processId: number;
  readonly startedAt: number;
  /** 1-based; grows with each wrong-credential retry in this session */
  readonly attempt: number;
}

/** What onEvent did with an event. */
export type LockDecision =
  | 'intercepted'
  /** process already exempted during the current grace window */
  | 'ignored_seen'
  | 'ignored_unprotected'
  | 'ignored_grace'
  /** coordinator is shutting down */
  | 'ignored_closed'
  /** this process already has a session */
  | 'dropped_pending_process'
  /** another process of the same app has a session */
  | 'dropped_pending_app'
  /** a terminate event ended a session for that process */
  | 'released'
  | 'exited';

export interface SessionSnapshot extends PendingVerification {
  state: LockState;
  displayName: string;
  maxAttempts: number;
}

export interface GraceSnapshot {
  appKey: string;
  verifiedAt: number;
  remainingMs: number;
}

export interface CoordinatorSnapshot {
  sessions: SessionSnapshot[];
  grace: GraceSnapshot[];
}
