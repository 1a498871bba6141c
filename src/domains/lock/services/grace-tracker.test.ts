import { describe, it, expect } from 'vitest';
import { GraceTracker } from './grace-tracker.js';

describe('GraceTracker', () => {
  it('is in grace strictly before the window ends', () => {
    const tracker = new GraceTracker(() => 30_000);
    tracker.record('chat-app', 2_000);

    expect(tracker.isInGrace('chat-app', 2_000)).toBe(true);
    expect(tracker.isInGrace('chat-app', 31_999)).toBe(true);
    expect(tracker.isInGrace('chat-app', 32_000)).toBe(false);
  });

  it('drops an entry once it is found expired', () => {
    const tracker = new GraceTracker(() => 1_000);
    tracker.record('notes', 0);

    expect(tracker.size).toBe(1);
    expect(tracker.isInGrace('notes', 5_000)).toBe(false);
    expect(tracker.size).toBe(0);
  });

  it('keeps keys independent', () => {
    const tracker = new GraceTracker(() => 10_000);
    tracker.record('chat-app', 0);
    tracker.record('notes', 8_000);

    expect(tracker.isInGrace('chat-app', 12_000)).toBe(false);
    expect(tracker.isInGrace('notes', 12_000)).toBe(true);
    expect(tracker.isInGrace('vault', 12_000)).toBe(false);
  });

  it('overwrites the verification time on record', () => {
    const tracker = new GraceTracker(() => 10_000);
    tracker.record('chat-app', 0);
    tracker.record('chat-app', 9_000);

    expect(tracker.remainingMs('chat-app', 10_000)).toBe(9_000);
  });

  it('reads the grace length at lookup time', () => {
    let graceMs = 30_000;
    const tracker = new GraceTracker(() => graceMs);
    tracker.record('chat-app', 0);

    graceMs = 5_000;
    expect(tracker.isInGrace('chat-app', 6_000)).toBe(false);
  });

  it('treats a zero grace period as never in grace', () => {
    const tracker = new GraceTracker(() => 0);
    tracker.record('chat-app', 100);

    expect(tracker.isInGrace('chat-app', 100)).toBe(false);
  });

  it('clears one key or all of them', () => {
    const tracker = new GraceTracker(() => 10_000);
    tracker.record('chat-app', 0);
    tracker.record('notes', 0);
    tracker.record('vault', 0);

    expect(tracker.clear('notes')).toBe(true);
    expect(tracker.clear('notes')).toBe(false);
    expect(tracker.clearAll()).toBe(2);
    expect(tracker.size).toBe(0);
  });

  it('lists only open windows', () => {
    const tracker = new GraceTracker(() => 10_000);
    tracker.record('chat-app', 0);
    tracker.record('notes', 6_000);

    expect(tracker.list(7_000)).toEqual([
      { appKey: 'chat-app', verifiedAt: 0, remainingMs: 3_000 },
      { appKey: 'notes', verifiedAt: 6_000, remainingMs: 9_000 },
    ]);
    expect(tracker.list(12_000)).toEqual([{ appKey: 'notes', verifiedAt: 6_000, remainingMs: 4_000 }]);
    expect(tracker.size).toBe(1);
  });
});
