import type { LockPolicy } from '../../policy/model/policy.js';
import type { PolicyStore } from '../../policy/service/policy-store.js';
import { matchAppKey } from '../../policy/matcher.js';
import type {
  CoordinatorSnapshot,
  LockDecision,
  LockState,
  PendingVerification,
  ProcessEvent,
} from '../models/lock.js';
import type { ActuatorResult, ProcessActuator } from './process-actuator.js';
import type { CredentialVerifier, VerifyOutcome, VerifyRequest } from './credential-verifier.js';
import { GraceTracker } from './grace-tracker.js';
import { createDeadline, deferred, type Deadline, type Deferred } from './deadline.js';
import { createLogger } from '../../../shared/logging/logger.js';
import { auditLog } from '../../../shared/logging/audit.js';
import { errorMessage } from '../../../shared/errors/index.js';

const log = createLogger('lock-coordinator');

type Interrupted = { kind: 'interrupted' };
type TimedOut = { kind: 'timeout' };
type SessionOutcome = VerifyOutcome | TimedOut | Interrupted;

type ActuatorAction = 'suspend' | 'restore' | 'terminate' | 'relaunch';

/** What the coordinator does next after a verifier outcome */
export type VerifyStep = 'stale' | 'vanished' | 'retry' | 'unlock' | 'deny';

interface Session {
  readonly appKey: string;
  readonly processId: number;
  readonly displayName: string;
  readonly startedAt: number;
  /** Captured at interception; a reload mid-flight does not change it */
  readonly policy: LockPolicy;
  attempt: number;
  state: LockState;
  readonly controller: AbortController;
  /** Settles when the session is ended from outside its own run loop */
  readonly interrupt: Deferred<Interrupted>;
  deadline?: Deadline;
}

interface SeenProcess {
  appKey: string;
  until: number;
}

export interface LockCoordinatorOptions {
  policyStore: PolicyStore;
  actuator: ProcessActuator;
  verifier: CredentialVerifier;
  /** Defaults to a tracker reading the grace length from the policy store */
  graceTracker?: GraceTracker;
  now?: () => number;
}

/**
 * Decides what happens to each observed process of a protected app.
 *
 * One session per app key; sessions for different keys run concurrently.
 * onEvent() is synchronous, so every decision and the suspend call it
 * issues happen in event arrival order. The verification wait runs as a
 * detached task whose results are checked against the live session before
 * they take effect.
 */
export class LockCoordinator {
  private readonly policyStore: PolicyStore;
  private readonly actuator: ProcessActuator;
  private readonly verifier: CredentialVerifier;
  private readonly graceTracker: GraceTracker;
  private readonly now: () => number;

  private readonly sessions = new Map<string, Session>();
  private readonly sessionsByPid = new Map<number, Session>();
  private readonly seen = new Map<number, SeenProcess>();
  private readonly inflight = new Set<Promise<void>>();
  private closed = false;

  constructor(options: LockCoordinatorOptions) {
    this.policyStore = options.policyStore;
    this.actuator = options.actuator;
    this.verifier = options.verifier;
    this.now = options.now ?? (() => Date.now());
    this.graceTracker =
      options.graceTracker ?? new GraceTracker(() => this.policyStore.current().gracePeriodMs);
  }

  /**
   * Entry point for the notification source. Never throws.
   */
  onEvent(event: ProcessEvent): LockDecision {
    if (this.closed) return 'ignored_closed';

    const now = this.now();
    if (event.kind === 'terminate') {
      return this.handleExit(event, now);
    }

    const seen = this.seen.get(event.processId);
    if (seen) {
      if (now < seen.until && this.graceTracker.isInGrace(seen.appKey, now)) {
        return 'ignored_seen';
      }
      this.seen.delete(event.processId);
    }

    if (this.sessionsByPid.has(event.processId)) {
      log.debug({ processId: event.processId }, 'process already has a session, dropping event');
      return 'dropped_pending_process';
    }

    const policy = this.policyStore.current();
    const appKey = matchAppKey(event.displayName, policy.keywords);
    if (appKey === null) return 'ignored_unprotected';

    const remaining = this.graceTracker.remainingMs(appKey, now);
    if (remaining > 0) {
      this.seen.set(event.processId, { appKey, until: now + remaining });
      log.debug({ appKey, processId: event.processId, remainingMs: remaining }, 'in grace, not intercepting');
      return 'ignored_grace';
    }

    const existing = this.sessions.get(appKey);
    if (existing) {
      const replaceable =
        existing.processId !== event.processId &&
        isWaiting(existing.state) &&
        !this.isAlive(existing.processId);
      if (!replaceable) {
        log.debug(
          { appKey, processId: event.processId, pendingProcessId: existing.processId },
          'verification already pending for app, dropping event'
        );
        return 'dropped_pending_app';
      }
      this.discard(existing, 'superseded');
    }

    this.begin(appKey, event, policy, now);
    return 'intercepted';
  }

  /**
   * Clear grace for one app, or for every app.
   * @returns number of grace windows closed
   */
  relock(appKey?: string): number {
    let cleared: number;
    if (appKey === undefined) {
      cleared = this.graceTracker.clearAll();
      this.seen.clear();
    } else {
      cleared = this.graceTracker.clear(appKey) ? 1 : 0;
      for (const [pid, entry] of this.seen) {
        if (entry.appKey === appKey) this.seen.delete(pid);
      }
    }
    auditLog('relock', appKey, { cleared, reason: 'manual' });
    return cleared;
  }

  getState(appKey: string): LockState {
    return this.sessions.get(appKey)?.state ?? 'IDLE';
  }

  getPending(appKey: string): PendingVerification | undefined {
    const session = this.sessions.get(appKey);
    if (!session) return undefined;
    const { processId, startedAt, attempt } = session;
    return { appKey, processId, startedAt, attempt };
  }

  snapshot(): CoordinatorSnapshot {
    return {
      sessions: [...this.sessions.values()].map((session) => ({
        appKey: session.appKey,
        processId: session.processId,
        displayName: session.displayName,
        startedAt: session.startedAt,
        attempt: session.attempt,
        maxAttempts: session.policy.maxAttempts,
        state: session.state,
      })),
      grace: this.graceTracker.list(this.now()),
    };
  }

  /** Resolves once no session task is running. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  /**
   * Stop accepting events and fail every waiting session closed, so no
   * process stays suspended after the daemon exits.
   */
  async shutdown(): Promise<void> {
    this.closed = true;

    const waiting = [...this.sessions.values()].filter((session) => isWaiting(session.state));
    const denials = waiting.map((session) => {
      session.interrupt.resolve({ kind: 'interrupted' });
      return this.resolveFail(session, 'shutdown');
    });

    await Promise.all(denials);
    await this.idle();
    log.info({ denied: waiting.length }, 'lock coordinator stopped');
  }

  // ---------------------------------------------------------------------------
  // Session lifecycle
  // ---------------------------------------------------------------------------

  private begin(appKey: string, event: ProcessEvent, policy: LockPolicy, now: number): void {
    const session: Session = {
      appKey,
      processId: event.processId,
      displayName: event.displayName,
      startedAt: now,
      policy,
      attempt: 1,
      state: 'SUSPENDED',
      controller: new AbortController(),
      interrupt: deferred<Interrupted>(),
    };
    this.sessions.set(appKey, session);
    this.sessionsByPid.set(session.processId, session);

    // Issued before anything else can run
    const suspended = this.callActuator('suspend', session, () => this.actuator.suspend(session.processId));

    auditLog('intercept', appKey, {
      processId: session.processId,
      displayName: session.displayName,
      kind: event.kind,
    });

    const task: Promise<void> = this.run(session, suspended)
      .catch((err) => this.recover(session, err))
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  private async run(session: Session, suspended: Promise<ActuatorResult>): Promise<void> {
    const first = await Promise.race([suspended, session.interrupt.promise]);
    if ('kind' in first || !this.isCurrent(session)) return;

    if (!this.isAlive(session.processId)) {
      this.discard(session, 'vanished');
      return;
    }

    session.state = 'VERIFYING';
    const deadline = createDeadline(session.policy.verifyTimeoutMs);
    session.deadline = deadline;

    for (;;) {
      const outcome: SessionOutcome = await Promise.race([
        this.askVerifier(session),
        deadline.expired,
        session.interrupt.promise,
      ]);

      const step = this.onVerifyResult(session, outcome);
      if (step === 'retry') continue;

      if (step === 'unlock') {
        await this.resolveOk(session);
      } else if (step === 'deny') {
        await this.resolveFail(session, describeOutcome(outcome));
      }
      return;
    }
  }

  /**
   * Map one outcome to the next step. Results for a session that is no
   * longer current are stale and change nothing.
   */
  private onVerifyResult(session: Session, outcome: SessionOutcome): VerifyStep {
    if (outcome.kind === 'interrupted' || !this.isCurrent(session)) {
      log.debug({ appKey: session.appKey, processId: session.processId }, 'discarding stale verification result');
      return 'stale';
    }

    if (!this.isAlive(session.processId)) {
      this.discard(session, 'vanished');
      return 'vanished';
    }

    switch (outcome.kind) {
      case 'success':
        return 'unlock';
      case 'failure':
        if (outcome.reason === 'wrong_credential' && session.attempt < session.policy.maxAttempts) {
          session.attempt++;
          log.info(
            { appKey: session.appKey, attempt: session.attempt, maxAttempts: session.policy.maxAttempts },
            'wrong credential, prompting again'
          );
          return 'retry';
        }
        return 'deny';
      case 'cancelled':
      case 'timeout':
        return 'deny';
    }
  }

  private async resolveOk(session: Session): Promise<void> {
    session.state = 'RESOLVED_OK';
    this.stopWaiting(session);
    const verifiedAt = this.now();

    let relaunched = false;
    const restored = await this.callActuator('restore', session, () => this.actuator.restore(session.processId));
    if (!restored.ok && !this.isAlive(session.processId)) {
      relaunched = (
        await this.callActuator('relaunch', session, () => this.actuator.relaunch(session.displayName))
      ).ok;
    }

    this.graceTracker.record(session.appKey, verifiedAt);
    auditLog('unlock', session.appKey, {
      processId: session.processId,
      attempt: session.attempt,
      ...(relaunched ? { relaunched } : {}),
    });
    this.finish(session);
  }

  private async resolveFail(session: Session, reason: string): Promise<void> {
    session.state = 'RESOLVED_FAIL';
    this.stopWaiting(session);

    await this.callActuator('terminate', session, () => this.actuator.terminate(session.processId));

    auditLog('deny', session.appKey, { processId: session.processId, attempt: session.attempt, reason });
    this.finish(session);
  }

  /** Drop a session without acting on its process. */
  private discard(session: Session, reason: 'vanished' | 'superseded'): void {
    session.interrupt.resolve({ kind: 'interrupted' });
    this.finish(session);
    auditLog(reason, session.appKey, { processId: session.processId, attempt: session.attempt });
  }

  private async recover(session: Session, err: unknown): Promise<void> {
    log.error({ err, appKey: session.appKey, processId: session.processId }, 'lock session failed');
    if (this.sessions.get(session.appKey) === session && session.state !== 'RESOLVED_FAIL') {
      await this.resolveFail(session, 'error');
    }
  }

  private handleExit(event: ProcessEvent, now: number): LockDecision {
    const seen = this.seen.get(event.processId);
    this.seen.delete(event.processId);

    const session = this.sessionsByPid.get(event.processId);
    let released = false;
    if (session && isWaiting(session.state)) {
      this.discard(session, 'vanished');
      released = true;
    }

    const policy = this.policyStore.current();
    const appKey = session?.appKey ?? seen?.appKey ?? matchAppKey(event.displayName, policy.keywords);
    if (appKey !== null && policy.relockOnExit && this.graceTracker.isInGrace(appKey, now)) {
      this.graceTracker.clear(appKey);
      auditLog('relock', appKey, { cleared: 1, reason: 'exit', processId: event.processId });
    }

    return released ? 'released' : 'exited';
  }

  private stopWaiting(session: Session): void {
    session.deadline?.cancel();
    session.controller.abort();
  }

  private finish(session: Session): void {
    this.stopWaiting(session);
    session.state = 'IDLE';
    if (this.sessions.get(session.appKey) === session) this.sessions.delete(session.appKey);
    if (this.sessionsByPid.get(session.processId) === session) this.sessionsByPid.delete(session.processId);
  }

  private isCurrent(session: Session): boolean {
    return (
      isWaiting(session.state) &&
      this.sessions.get(session.appKey) === session &&
      this.sessionsByPid.get(session.processId) === session
    );
  }

  // ---------------------------------------------------------------------------
  // Collaborator calls (never reject)
  // ---------------------------------------------------------------------------

  private askVerifier(session: Session): Promise<VerifyOutcome> {
    const maxAttempts = session.policy.maxAttempts;
    const request: VerifyRequest = {
      prompt: session.displayName,
      appKey: session.appKey,
      processId: session.processId,
      attempt: session.attempt,
      maxAttempts,
      remainingAttempts: maxAttempts - session.attempt + 1,
      signal: session.controller.signal,
    };

    let pending: Promise<VerifyOutcome>;
    try {
      pending = this.verifier.verify(request);
    } catch (err) {
      pending = Promise.reject(err);
    }

    return pending.then(
      (outcome) => {
        if (!this.isCurrent(session)) {
          log.debug({ appKey: session.appKey, outcome: outcome.kind }, 'late verification result ignored');
        }
        return outcome;
      },
      (err: unknown): VerifyOutcome => {
        log.error({ err, appKey: session.appKey }, 'credential verifier failed');
        return { kind: 'failure', reason: 'unavailable', message: errorMessage(err) };
      }
    );
  }

  private callActuator(
    action: ActuatorAction,
    session: Session,
    call: () => Promise<ActuatorResult>
  ): Promise<ActuatorResult> {
    let pending: Promise<ActuatorResult>;
    try {
      pending = call();
    } catch (err) {
      pending = Promise.reject(err);
    }

    return pending.then(
      (result) => {
        if (!result.ok) {
          log.warn({ action, appKey: session.appKey, processId: session.processId, error: result.error }, 'actuator call failed');
        }
        return result;
      },
      (err: unknown): ActuatorResult => {
        log.warn({ err, action, appKey: session.appKey, processId: session.processId }, 'actuator call threw');
        return { ok: false, error: errorMessage(err) };
      }
    );
  }

  private isAlive(processId: number): boolean {
    try {
      return this.actuator.isAlive(processId);
    } catch (err) {
      log.warn({ err, processId }, 'liveness check failed, assuming alive');
      return true;
    }
  }
}

function isWaiting(state: LockState): boolean {
  return state === 'SUSPENDED' || state === 'VERIFYING';
}

function describeOutcome(outcome: SessionOutcome): string {
  switch (outcome.kind) {
    case 'failure':
      return outcome.reason === 'wrong_credential' ? 'attempts_exhausted' : outcome.reason;
    default:
      return outcome.kind;
  }
}
