import { execFile } from 'node:child_process';
import type { PromptResult, SecretPrompt, SecretPromptRequest } from './secret-prompt.js';

export interface CommandResult {
  /** null when the command was killed by a signal */
  exitCode: number | null;
  stdout: string;
}

export type RunCommandFn = (
  command: string,
  args: string[],
  options: { env: NodeJS.ProcessEnv; signal: AbortSignal }
) => Promise<CommandResult>;

function runCommand(
  command: string,
  args: string[],
  options: { env: NodeJS.ProcessEnv; signal: AbortSignal }
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    execFile(command, args, { env: options.env, signal: options.signal, encoding: 'utf8' }, (error, stdout) => {
      if (!error) {
        resolve({ exitCode: 0, stdout });
      } else if (options.signal.aborted) {
        reject(error);
      } else if (typeof error.code === 'number') {
        resolve({ exitCode: error.code, stdout });
      } else if (error.signal) {
        resolve({ exitCode: null, stdout });
      } else {
        reject(error);
      }
    });
  });
}

/** Fixed arguments, or arguments built from each request's title and message */
export type PromptArgs = string[] | ((request: SecretPromptRequest) => string[]);

/**
 * Runs an external dialog command (for example `zenity --password`).
 * The prompt text is passed in APPLOCK_PROMPT and APPLOCK_PROMPT_TITLE;
 * exit status 0 means the secret was entered on stdout. Only the one
 * trailing newline is removed, since spaces may belong to the password.
 */
export class CommandSecretPrompt implements SecretPrompt {
  private readonly run: RunCommandFn;

  constructor(
    private readonly command: string,
    private readonly args: PromptArgs = [],
    run?: RunCommandFn
  ) {
    this.run = run ?? runCommand;
  }

  async ask(request: SecretPromptRequest): Promise<PromptResult> {
    const args = typeof this.args === 'function' ? this.args(request) : this.args;
    const result = await this.run(this.command, args, {
      env: { ...process.env, APPLOCK_PROMPT: request.message, APPLOCK_PROMPT_TITLE: request.title },
      signal: request.signal,
    });

    if (result.exitCode !== 0) return { kind: 'dismissed' };
    return { kind: 'entered', secret: result.stdout.replace(/\r?\n$/, '') };
  }
}

/** Split a command line on whitespace; no quoting support. */
export function parseCommandLine(line: string): { command: string; args: string[] } | null {
  const [command, ...args] = line.trim().split(/\s+/).filter(Boolean);
  return command ? { command, args } : null;
}

/** Built-in dialog for the platform: an AppleScript password box on macOS, zenity elsewhere. */
export function defaultPromptCommand(platform: NodeJS.Platform): { command: string; args: PromptArgs } {
  if (platform === 'darwin') {
    return {
      command: 'osascript',
      args: [
        '-e',
        'display dialog (system attribute "APPLOCK_PROMPT") default answer "" with hidden answer ' +
          'with title (system attribute "APPLOCK_PROMPT_TITLE")',
        '-e',
        'text returned of result',
      ],
    };
  }
  return {
    command: 'zenity',
    args: (request) => ['--entry', '--hide-text', `--title=${request.title}`, `--text=${request.message}`],
  };
}
