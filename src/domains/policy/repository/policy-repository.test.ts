import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFile, mkdir, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { FileSystemPolicyRepository } from './policy-repository.js';
import { DEFAULT_CONFIG } from '../model/policy.js';
import { ConfigError } from '../../../shared/errors/index.js';

const TEMP_DIR = join(tmpdir(), 'applock-test-' + randomUUID());

describe('FileSystemPolicyRepository', () => {
  beforeAll(async () => {
    await mkdir(TEMP_DIR, { recursive: true });
  });

  afterAll(async () => {
    await rm(TEMP_DIR, { recursive: true, force: true });
  });

  it('returns defaults when the file is missing', async () => {
    const repo = new FileSystemPolicyRepository(join(TEMP_DIR, 'missing', 'config.json'));

    expect(await repo.exists()).toBe(false);
    expect(await repo.load()).toEqual(DEFAULT_CONFIG);
  });

  it('normalises keywords and durations on load', async () => {
    const path = join(TEMP_DIR, 'messy.json');
    await writeFile(path, JSON.stringify({
      locked_apps: ['Chat-App', ' notes ', 'chat-app'],
      grace_period: '60000ms',
      max_attempts: 2,
    }), 'utf8');

    const config = await new FileSystemPolicyRepository(path).load();

    expect(config.locked_apps).toEqual(['chat-app', 'notes']);
    expect(config.grace_period).toBe('1m');
    expect(config.max_attempts).toBe(2);
    expect(config.verify_timeout).toBe('1m');
  });

  it('round-trips load → save → load', async () => {
    const path = join(TEMP_DIR, 'roundtrip.json');
    await writeFile(path, JSON.stringify({
      locked_apps: ['Vault', 'chat-app'],
      grace_period: '90s',
      relock_on_exit: true,
    }), 'utf8');
    const repo = new FileSystemPolicyRepository(path);

    const first = await repo.load();
    await repo.save(first);
    const savedText = await readFile(path, 'utf8');
    const second = await repo.load();
    await repo.save(second);

    expect(second).toEqual(first);
    expect(await readFile(path, 'utf8')).toBe(savedText);
  });

  it('creates the parent directory on save', async () => {
    const path = join(TEMP_DIR, 'nested', 'dir', 'config.json');
    const repo = new FileSystemPolicyRepository(path);

    await repo.save({ ...DEFAULT_CONFIG, locked_apps: ['notes'] });

    expect(await repo.exists()).toBe(true);
    const data = JSON.parse(await readFile(path, 'utf8'));
    expect(data.locked_apps).toEqual(['notes']);
  });

  it('throws ConfigError for invalid JSON', async () => {
    const path = join(TEMP_DIR, 'broken.json');
    await writeFile(path, '{ "locked_apps": [', 'utf8');

    await expect(new FileSystemPolicyRepository(path).load()).rejects.toBeInstanceOf(ConfigError);
  });

  it('throws ConfigError for schema violations', async () => {
    const path = join(TEMP_DIR, 'wrong-shape.json');
    await writeFile(path, JSON.stringify({ locked_apps: [1, 2] }), 'utf8');

    await expect(new FileSystemPolicyRepository(path).load()).rejects.toThrow(/locked_apps/);
  });
});
