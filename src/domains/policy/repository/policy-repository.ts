import { readFile, writeFile, mkdir, access, rename } from 'node:fs/promises';
import { dirname } from 'node:path';
import { normalizeConfig, DEFAULT_CONFIG, type LockerConfig } from '../model/policy.js';
import { ConfigError, errorMessage, isErrnoException } from '../../../shared/errors/index.js';

export interface ConfigRepository {
  /**
   * Load and normalise the persisted config.
   * A missing file yields the defaults.
   * @throws ConfigError when the file exists but cannot be used
   */
  load(): Promise<LockerConfig>;
  save(config: LockerConfig): Promise<void>;
  exists(): Promise<boolean>;
}

/**
 * File-based config repository
 * Stores config as pretty-printed JSON at the given path.
 */
export class FileSystemPolicyRepository implements ConfigRepository {
  constructor(private readonly configPath: string) {}

  get path(): string {
    return this.configPath;
  }

  async load(): Promise<LockerConfig> {
    let content: string;
    try {
      content = await readFile(this.configPath, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return { ...DEFAULT_CONFIG, locked_apps: [] };
      }
      throw new ConfigError(this.configPath, errorMessage(err));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new ConfigError(this.configPath, `not valid JSON (${errorMessage(err)})`);
    }

    try {
      return normalizeConfig(parsed);
    } catch (err) {
      throw new ConfigError(this.configPath, errorMessage(err));
    }
  }

  async save(config: LockerConfig): Promise<void> {
    await mkdir(dirname(this.configPath), { recursive: true });

    // Readers see the old file or the new one, never a partial write
    const tmpPath = `${this.configPath}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(config, null, 2) + '\n', { encoding: 'utf8', mode: 0o600 });
    await rename(tmpPath, this.configPath);
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }
}
