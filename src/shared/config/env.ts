import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { parseCommandLine } from '../../domains/lock/adapters/command-secret-prompt.js';

/** Process-level settings. Lock policy itself lives in the config file. */
export interface DaemonConfig {
  configPath: string;
  port: number;
  host: string;
  apiKeys: string[];
  /** null → the platform's built-in dialog */
  promptCommand: { command: string; args: string[] } | null;
}

export const DEFAULT_PORT = 8765;
export const DEFAULT_HOST = '127.0.0.1';

export function defaultConfigPath(home: string = homedir()): string {
  return join(home, '.applock', 'config.json');
}

function argValue(argv: readonly string[], flag: string): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === flag) return argv[i + 1];
    if (arg.startsWith(`${flag}=`)) return arg.slice(flag.length + 1);
  }
  return undefined;
}

/**
 * Read daemon settings from the command line and environment.
 * `--config` wins over APPLOCK_CONFIG.
 */
export function loadDaemonConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  home: string = homedir()
): DaemonConfig {
  const configPath = argValue(argv, '--config') || env.APPLOCK_CONFIG || defaultConfigPath(home);
  const port = Number(env.APPLOCK_PORT);

  return {
    configPath: resolve(configPath),
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT,
    host: env.APPLOCK_HOST || DEFAULT_HOST,
    apiKeys: env.APPLOCK_API_KEYS?.split(',').map((key) => key.trim()).filter(Boolean) || [],
    promptCommand: env.APPLOCK_PROMPT_COMMAND ? parseCommandLine(env.APPLOCK_PROMPT_COMMAND) : null,
  };
}
