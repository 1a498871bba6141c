import type { ProcessEvent } from '../../domains/lock/models/lock.js';
import type { ProcessLister, ProcessSample, ProcessWatcherStatus } from './types.js';
import { errorMessage } from '../../shared/errors/index.js';
import { createLogger } from '../../shared/logging/logger.js';

const log = createLogger('process-watcher');

export type ProcessEventSink = (event: ProcessEvent) => void;

const MIN_INTERVAL_MS = 100;

function normalizeSamples(list: ProcessSample[]): Map<number, string> {
  const out = new Map<number, string>();
  for (const sample of list) {
    if (!Number.isInteger(sample.pid) || sample.pid <= 0 || !sample.name) continue;
    out.set(sample.pid, sample.name);
  }
  return out;
}

/**
 * Polling notification source. Diffs successive process-table samples:
 * new pids become launch events, vanished pids terminate events, and a
 * change of foreground process an activate event.
 *
 * The first tick reports everything already running as launched, so apps
 * opened before the daemon started are locked too. Processes accepted by
 * `recheck` are offered again as activations on every later tick while
 * they keep running, so an open app is locked again once its grace ends.
 */
export class ProcessWatcher {
  private readonly lister: ProcessLister;
  private readonly onEvent: ProcessEventSink;
  private readonly recheck: ((name: string) => boolean) | undefined;
  private readonly now: () => number;
  private intervalMs: number;
  private timer: NodeJS.Timeout | undefined;
  private running = false;
  private known = new Map<number, string>();
  private foregroundPid: number | undefined;
  private lastTickAt: number | undefined;
  private lastError: string | undefined;

  constructor(options: {
    lister: ProcessLister;
    onEvent: ProcessEventSink;
    /** Names of running processes to re-offer on every tick */
    recheck?: (name: string) => boolean;
    intervalMs?: number;
    now?: () => number;
  }) {
    this.lister = options.lister;
    this.onEvent = options.onEvent;
    this.recheck = options.recheck;
    this.now = options.now ?? (() => Date.now());
    this.intervalMs = clampInterval(options.intervalMs ?? 300);
  }

  getStatus(): ProcessWatcherStatus {
    return {
      running: this.running,
      intervalMs: this.intervalMs,
      tracked: this.known.size,
      ...(this.lastTickAt !== undefined ? { lastTickAt: this.lastTickAt } : {}),
      ...(this.lastError !== undefined ? { lastError: this.lastError } : {}),
    };
  }

  start(intervalMs?: number): void {
    if (intervalMs !== undefined) this.setInterval(intervalMs);
    if (this.running) return;
    this.running = true;
    log.info({ intervalMs: this.intervalMs }, 'process watcher started');
    void this.tick().finally(() => this.schedule());
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    log.info('process watcher stopped');
  }

  /** Takes effect from the next scheduled tick. */
  setInterval(intervalMs: number): void {
    this.intervalMs = clampInterval(intervalMs);
  }

  async tick(): Promise<void> {
    if (!this.running) return;

    let current: Map<number, string>;
    try {
      current = normalizeSamples(await this.lister.list());
    } catch (err) {
      this.lastError = `list: ${errorMessage(err)}`;
      log.warn({ err }, 'failed to list processes');
      return;
    }
    this.lastTickAt = this.now();
    this.lastError = undefined;

    const launched = new Set<number>();
    for (const [pid, name] of this.known) {
      const next = current.get(pid);
      if (next === name) continue;
      // Gone, or the pid was reused by another program
      this.onEvent({ processId: pid, displayName: name, kind: 'terminate' });
    }
    for (const [pid, name] of current) {
      if (this.known.get(pid) === name) continue;
      launched.add(pid);
      this.onEvent({ processId: pid, displayName: name, kind: 'launch' });
    }
    if (this.recheck) {
      for (const [pid, name] of current) {
        if (launched.has(pid) || !this.recheck(name)) continue;
        this.onEvent({ processId: pid, displayName: name, kind: 'activate' });
      }
    }
    this.known = current;

    await this.checkForeground(launched);
  }

  private async checkForeground(launched: Set<number>): Promise<void> {
    if (!this.lister.foreground) return;

    let sample: ProcessSample | undefined;
    try {
      sample = await this.lister.foreground();
    } catch (err) {
      this.lastError = `foreground: ${errorMessage(err)}`;
      log.warn({ err }, 'failed to sample foreground process');
      return;
    }

    const pid = sample?.pid;
    if (pid === this.foregroundPid) return;
    this.foregroundPid = pid;
    if (sample && sample.name && !launched.has(sample.pid)) {
      this.onEvent({ processId: sample.pid, displayName: sample.name, kind: 'activate' });
    }
  }

  private schedule(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      void this.tick().finally(() => this.schedule());
    }, this.intervalMs);
  }
}

function clampInterval(ms: number): number {
  return Number.isFinite(ms) ? Math.max(MIN_INTERVAL_MS, ms) : MIN_INTERVAL_MS;
}
