import { describe, it, expect } from 'vitest';
import { PolicyStore } from './policy-store.js';
import { EMPTY_POLICY, type LockPolicy } from '../model/policy.js';

const CHAT_POLICY: LockPolicy = {
  keywords: ['chat-app'],
  gracePeriodMs: 30_000,
  maxAttempts: 3,
  verifyTimeoutMs: 60_000,
  relockOnExit: false,
};

describe('PolicyStore', () => {
  it('starts with nothing protected', () => {
    const store = new PolicyStore();

    expect(store.current()).toBe(EMPTY_POLICY);
    expect(store.match('Chat App')).toBeNull();
  });

  it('swaps the snapshot and freezes it', () => {
    const store = new PolicyStore();
    const before = store.current();

    store.reload(CHAT_POLICY);

    expect(store.current()).toEqual(CHAT_POLICY);
    expect(Object.isFrozen(store.current())).toBe(true);
    expect(before).toBe(EMPTY_POLICY);
    expect(store.match('Chat App Helper')).toBe('chat-app');
  });

  it('notifies listeners until they unsubscribe', () => {
    const store = new PolicyStore();
    const seen: (readonly string[])[] = [];
    const unsubscribe = store.onReload((policy) => seen.push(policy.keywords));

    store.reload(CHAT_POLICY);
    unsubscribe();
    store.reload(EMPTY_POLICY);

    expect(seen).toEqual([['chat-app']]);
  });
});
