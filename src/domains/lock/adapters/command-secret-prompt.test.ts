import { describe, it, expect, vi } from 'vitest';
import { CommandSecretPrompt, defaultPromptCommand, parseCommandLine, type RunCommandFn } from './command-secret-prompt.js';

function promptRequest() {
  return { title: 'Unlock Notes', message: 'Notes is locked.', signal: new AbortController().signal };
}

describe('CommandSecretPrompt', () => {
  it('returns stdout without the trailing newline on exit 0', async () => {
    const run = vi.fn<RunCommandFn>().mockResolvedValue({ exitCode: 0, stdout: ' test-secret \n' });
    const prompt = new CommandSecretPrompt('zenity', ['--password'], run);

    expect(await prompt.ask(promptRequest())).toEqual({ kind: 'entered', secret: ' test-secret ' });

    const [command, args, options] = run.mock.calls[0];
    expect(command).toBe('zenity');
    expect(args).toEqual(['--password']);
    expect(options.env.APPLOCK_PROMPT).toBe('Notes is locked.');
    expect(options.env.APPLOCK_PROMPT_TITLE).toBe('Unlock Notes');
  });

  it('treats a non-zero exit as dismissed', async () => {
    const run = vi.fn<RunCommandFn>().mockResolvedValue({ exitCode: 1, stdout: '' });
    const prompt = new CommandSecretPrompt('zenity', ['--password'], run);

    expect(await prompt.ask(promptRequest())).toEqual({ kind: 'dismissed' });
  });

  it('treats a killed dialog as dismissed', async () => {
    const run = vi.fn<RunCommandFn>().mockResolvedValue({ exitCode: null, stdout: '' });
    const prompt = new CommandSecretPrompt('zenity', [], run);

    expect(await prompt.ask(promptRequest())).toEqual({ kind: 'dismissed' });
  });

  it('passes the abort signal through', async () => {
    const controller = new AbortController();
    const run = vi.fn<RunCommandFn>().mockRejectedValue(new Error('The operation was aborted'));
    const prompt = new CommandSecretPrompt('zenity', [], run);
    controller.abort();

    await expect(prompt.ask({ ...promptRequest(), signal: controller.signal })).rejects.toThrow('aborted');
    expect(run.mock.calls[0][2].signal).toBe(controller.signal);
  });
});

describe('parseCommandLine', () => {
  it('splits on whitespace', () => {
    expect(parseCommandLine('  zenity --password   --title=Unlock ')).toEqual({
      command: 'zenity',
      args: ['--password', '--title=Unlock'],
    });
  });

  it('returns null for a blank line', () => {
    expect(parseCommandLine('   ')).toBeNull();
  });
});

describe('defaultPromptCommand', () => {
  it('uses osascript on macOS and zenity elsewhere', () => {
    expect(defaultPromptCommand('darwin').command).toBe('osascript');
    expect(defaultPromptCommand('linux').command).toBe('zenity');
  });

  it('shows the title and message in the zenity dialog', async () => {
    const run = vi.fn<RunCommandFn>().mockResolvedValue({ exitCode: 0, stdout: 'test-secret\n' });
    const { command, args } = defaultPromptCommand('linux');
    const prompt = new CommandSecretPrompt(command, args, run);

    await prompt.ask({
      title: 'Unlock Notes',
      message: 'Notes is locked. Enter your password to unlock it (2 attempts left).',
      signal: new AbortController().signal,
    });

    expect(run.mock.calls[0][1]).toEqual([
      '--entry',
      '--hide-text',
      '--title=Unlock Notes',
      '--text=Notes is locked. Enter your password to unlock it (2 attempts left).',
    ]);
  });
});
