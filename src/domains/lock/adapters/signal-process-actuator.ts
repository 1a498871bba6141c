import { spawn } from 'node:child_process';
import type { ActuatorResult, ProcessActuator } from '../services/process-actuator.js';
import { errorMessage, isErrnoException } from '../../../shared/errors/index.js';
import { createLogger } from '../../../shared/logging/logger.js';

const log = createLogger('signal-actuator');

export type KillFn = (pid: number, signal: NodeJS.Signals | 0) => void;
export type LaunchFn = (command: string, args: string[]) => Promise<void>;

export interface LaunchCommand {
  command: string;
  args: string[];
}

export interface SignalProcessActuatorOptions {
  kill?: KillFn;
  launch?: LaunchFn;
  platform?: NodeJS.Platform;
}

/** `open -a <name>` on macOS, the display name as a command elsewhere. */
export function launchCommandFor(displayName: string, platform: NodeJS.Platform): LaunchCommand {
  if (platform === 'darwin') {
    return { command: 'open', args: ['-a', displayName] };
  }
  return { command: displayName, args: [] };
}

function spawnDetached(command: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

/**
 * POSIX actuator: SIGSTOP freezes the process before it can draw, SIGCONT
 * resumes it, SIGKILL ends it. Signal 0 probes liveness.
 */
export class SignalProcessActuator implements ProcessActuator {
  private readonly kill: KillFn;
  private readonly launch: LaunchFn;
  private readonly platform: NodeJS.Platform;

  constructor(options: SignalProcessActuatorOptions = {}) {
    this.kill = options.kill ?? ((pid, signal) => {
      process.kill(pid, signal);
    });
    this.launch = options.launch ?? spawnDetached;
    this.platform = options.platform ?? process.platform;
  }

  async suspend(processId: number): Promise<ActuatorResult> {
    return this.signal(processId, 'SIGSTOP');
  }

  async restore(processId: number): Promise<ActuatorResult> {
    return this.signal(processId, 'SIGCONT');
  }

  async terminate(processId: number): Promise<ActuatorResult> {
    return this.signal(processId, 'SIGKILL');
  }

  async relaunch(displayName: string): Promise<ActuatorResult> {
    const { command, args } = launchCommandFor(displayName, this.platform);
    try {
      await this.launch(command, args);
      log.info({ displayName, command }, 'relaunched app');
      return { ok: true };
    } catch (err) {
      return { ok: false, error: `relaunch ${displayName}: ${errorMessage(err)}` };
    }
  }

  isAlive(processId: number): boolean {
    try {
      this.kill(processId, 0);
      return true;
    } catch (err) {
      // Exists but owned by someone else
      return isErrnoException(err) && err.code === 'EPERM';
    }
  }

  private signal(processId: number, signal: NodeJS.Signals): ActuatorResult {
    try {
      this.kill(processId, signal);
      log.debug({ processId, signal }, 'signal sent');
      return { ok: true };
    } catch (err) {
      const code = isErrnoException(err) ? err.code : undefined;
      return { ok: false, error: `${signal} ${processId}: ${code ?? errorMessage(err)}` };
    }
  }
}
