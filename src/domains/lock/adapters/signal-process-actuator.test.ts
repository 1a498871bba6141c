import { describe, it, expect, vi } from 'vitest';
import { SignalProcessActuator, launchCommandFor, type KillFn } from './signal-process-actuator.js';

function errno(code: string): Error {
  return Object.assign(new Error(`kill ${code}`), { code });
}

describe('SignalProcessActuator', () => {
  it('maps suspend, restore and terminate to signals', async () => {
    const kill = vi.fn<KillFn>();
    const actuator = new SignalProcessActuator({ kill });

    expect(await actuator.suspend(100)).toEqual({ ok: true });
    expect(await actuator.restore(100)).toEqual({ ok: true });
    expect(await actuator.terminate(100)).toEqual({ ok: true });

    expect(kill.mock.calls).toEqual([
      [100, 'SIGSTOP'],
      [100, 'SIGCONT'],
      [100, 'SIGKILL'],
    ]);
  });

  it('reports a missing process as a failed result', async () => {
    const actuator = new SignalProcessActuator({
      kill: () => {
        throw errno('ESRCH');
      },
    });

    expect(await actuator.terminate(100)).toEqual({ ok: false, error: 'SIGKILL 100: ESRCH' });
  });

  it('probes liveness with signal 0', () => {
    const kill = vi.fn<KillFn>((pid) => {
      if (pid === 101) throw errno('ESRCH');
      if (pid === 1) throw errno('EPERM');
    });
    const actuator = new SignalProcessActuator({ kill });

    expect(actuator.isAlive(100)).toBe(true);
    expect(actuator.isAlive(101)).toBe(false);
    expect(actuator.isAlive(1)).toBe(true);
    expect(kill).toHaveBeenCalledWith(100, 0);
  });

  it('relaunches through the platform launcher', async () => {
    const launch = vi.fn(async (_command: string, _args: string[]) => {});
    const actuator = new SignalProcessActuator({ launch, platform: 'darwin' });

    expect(await actuator.relaunch('Chat App')).toEqual({ ok: true });
    expect(launch).toHaveBeenCalledWith('open', ['-a', 'Chat App']);
  });

  it('reports a failed relaunch', async () => {
    const actuator = new SignalProcessActuator({
      launch: async () => {
        throw new Error('spawn chat-app ENOENT');
      },
      platform: 'linux',
    });

    expect(await actuator.relaunch('chat-app')).toEqual({
      ok: false,
      error: 'relaunch chat-app: spawn chat-app ENOENT',
    });
  });

  it('builds launch commands per platform', () => {
    expect(launchCommandFor('Notes', 'darwin')).toEqual({ command: 'open', args: ['-a', 'Notes'] });
    expect(launchCommandFor('notes', 'linux')).toEqual({ command: 'notes', args: [] });
  });
});
