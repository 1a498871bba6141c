import { EMPTY_POLICY, type LockPolicy } from '../model/policy.js';
import { matchAppKey } from '../matcher.js';

export type PolicyListener = (policy: LockPolicy) => void;

/**
 * Holds the active LockPolicy snapshot.
 *
 * Readers take a reference with current() and keep using it; reload()
 * replaces the reference, so a reader never sees a half-updated policy.
 */
export class PolicyStore {
  private snapshot: LockPolicy;
  private listeners = new Set<PolicyListener>();

  constructor(initial: LockPolicy = EMPTY_POLICY) {
    this.snapshot = initial;
  }

  current(): LockPolicy {
    return this.snapshot;
  }

  reload(next: LockPolicy): void {
    this.snapshot = Object.isFrozen(next) ? next : Object.freeze({ ...next });
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }

  /** Keyword for a display name under the current snapshot. */
  match(displayName: string | null | undefined): string | null {
    return matchAppKey(displayName, this.snapshot.keywords);
  }

  onReload(listener: PolicyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
