import { Value } from '@sinclair/typebox/value';
import type { ConfigRepository } from '../repository/policy-repository.js';
import {
  DEFAULT_CONFIG,
  GRACE_BOUNDS,
  INTERVAL_BOUNDS,
  MAX_ATTEMPTS_LIMIT,
  TIMEOUT_BOUNDS,
  PolicySettingsUpdateSchema,
  normalizeKeywords,
  toLockPolicy,
  type DurationBounds,
  type LockerConfig,
  type LockPolicy,
  type PolicyResponse,
  type PolicySettingsUpdate,
} from '../model/policy.js';
import type { PolicyStore } from './policy-store.js';
import { NotFoundError, ValidationError, errorMessage } from '../../../shared/errors/index.js';
import { formatDuration, parseDurationMs } from '../../../shared/utils/duration-parser.js';
import { hashPassword, passwordMatches } from '../../../shared/utils/password-hash.js';
import { createLogger } from '../../../shared/logging/logger.js';
import { auditLog } from '../../../shared/logging/audit.js';

const log = createLogger('policy-service');

const MIN_PASSWORD_LENGTH = 4;

export type ReloadResult =
  | { ok: true; policy: LockPolicy }
  | { ok: false; policy: LockPolicy; error: string };

/**
 * Owns the persisted config and keeps the PolicyStore in step with it.
 * Every successful mutation is saved first and then swapped into the store.
 */
export class PolicyService {
  private config: LockerConfig = { ...DEFAULT_CONFIG, locked_apps: [] };

  constructor(
    private readonly repository: ConfigRepository,
    private readonly store: PolicyStore
  ) {}

  /**
   * Re-read the config file into the store.
   * An unusable file leaves nothing protected and is reported, never thrown.
   */
  async reload(): Promise<ReloadResult> {
    try {
      const config = await this.repository.load();
      const policy = this.apply(config);
      log.info({ lockedApps: policy.keywords }, 'config reloaded');
      auditLog('policy_reload', undefined, { lockedApps: [...policy.keywords] });
      return { ok: true, policy };
    } catch (err) {
      const error = errorMessage(err);
      log.error({ err }, 'failed to load config, protecting nothing until it is fixed');
      const policy = this.apply({ ...DEFAULT_CONFIG, locked_apps: [] });
      return { ok: false, policy, error };
    }
  }

  getConfig(): PolicyResponse {
    return this.toResponse(this.config);
  }

  /** Currently configured process-table polling period. */
  checkIntervalMs(): number {
    return parseDurationMs(this.config.check_interval);
  }

  getPasswordHash(): string | null {
    return this.config.password_hash;
  }

  /**
   * Apply a partial settings change. Takes the request body as received
   * and validates it before anything is written.
   */
  async updateSettings(input: unknown): Promise<PolicyResponse> {
    const update = this.validateSettings(input);
    log.debug({ update }, 'updating settings');

    const current = await this.repository.load();
    const updated: LockerConfig = {
      ...current,
      ...(update.grace_period !== undefined
        ? { grace_period: this.normalizeDuration(update.grace_period, GRACE_BOUNDS) }
        : {}),
      ...(update.verify_timeout !== undefined
        ? { verify_timeout: this.normalizeDuration(update.verify_timeout, TIMEOUT_BOUNDS) }
        : {}),
      ...(update.check_interval !== undefined
        ? { check_interval: this.normalizeDuration(update.check_interval, INTERVAL_BOUNDS) }
        : {}),
      ...(update.max_attempts !== undefined ? { max_attempts: update.max_attempts } : {}),
      ...(update.relock_on_exit !== undefined ? { relock_on_exit: update.relock_on_exit } : {}),
    };

    await this.persist(updated, 'settings');
    return this.toResponse(updated);
  }

  async addApp(keyword: string): Promise<PolicyResponse> {
    const [normalized] = normalizeKeywords([keyword]);
    if (!normalized) {
      throw new ValidationError('app keyword must not be empty');
    }

    const current = await this.repository.load();
    if (current.locked_apps.includes(normalized)) {
      throw new ValidationError(`'${normalized}' is already in the lock list`);
    }

    const updated: LockerConfig = { ...current, locked_apps: [...current.locked_apps, normalized] };
    await this.persist(updated, 'add_app');
    return this.toResponse(updated);
  }

  async removeApp(keyword: string): Promise<PolicyResponse> {
    const normalized = keyword.trim().toLowerCase();
    const current = await this.repository.load();
    if (!current.locked_apps.includes(normalized)) {
      throw new NotFoundError('Locked app', normalized);
    }

    const updated: LockerConfig = {
      ...current,
      locked_apps: current.locked_apps.filter((app) => app !== normalized),
    };
    await this.persist(updated, 'remove_app');
    return this.toResponse(updated);
  }

  /**
   * Set or replace the unlock password.
   * When one is already set, `currentPassword` must match it.
   */
  async changePassword(currentPassword: string | undefined, nextPassword: string): Promise<void> {
    const current = await this.repository.load();

    if (current.password_hash !== null) {
      if (currentPassword === undefined || !passwordMatches(currentPassword, current.password_hash)) {
        throw new ValidationError('current password is incorrect');
      }
    }

    if (nextPassword.length < MIN_PASSWORD_LENGTH) {
      throw new ValidationError(`password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }

    await this.persist({ ...current, password_hash: hashPassword(nextPassword) }, 'password');
  }

  private async persist(config: LockerConfig, change: string): Promise<void> {
    await this.repository.save(config);
    const policy = this.apply(config);
    auditLog('policy_update', undefined, { change, lockedApps: [...policy.keywords] });
  }

  private apply(config: LockerConfig): LockPolicy {
    this.config = config;
    const policy = toLockPolicy(config);
    this.store.reload(policy);
    return policy;
  }

  private validateSettings(update: unknown): PolicySettingsUpdate {
    if (!Value.Check(PolicySettingsUpdateSchema, update)) {
      const first = Value.Errors(PolicySettingsUpdateSchema, update).First();
      const field = first?.path.replace(/^\//, '') || 'body';
      throw new ValidationError(`${field}: ${first?.message ?? 'invalid settings'}`);
    }

    if (update.max_attempts !== undefined && (update.max_attempts < 1 || update.max_attempts > MAX_ATTEMPTS_LIMIT)) {
      throw new ValidationError(`max_attempts must be an integer between 1 and ${MAX_ATTEMPTS_LIMIT}`);
    }

    if (update.grace_period !== undefined) this.normalizeDuration(update.grace_period, GRACE_BOUNDS);
    if (update.verify_timeout !== undefined) this.normalizeDuration(update.verify_timeout, TIMEOUT_BOUNDS);
    if (update.check_interval !== undefined) this.normalizeDuration(update.check_interval, INTERVAL_BOUNDS);
    return update;
  }

  private normalizeDuration(raw: string, bounds: DurationBounds): string {
    let ms: number;
    try {
      ms = parseDurationMs(raw, { defaultUnit: bounds.defaultUnit });
    } catch {
      throw new ValidationError(
        `${bounds.field} must be a duration like "500ms", "30s", "5m" or "1h"`
      );
    }

    if (ms < bounds.minMs || ms > bounds.maxMs) {
      throw new ValidationError(
        `${bounds.field} must be between ${formatDuration(bounds.minMs)} and ${formatDuration(bounds.maxMs)}`
      );
    }
    return formatDuration(ms);
  }

  private toResponse(config: LockerConfig): PolicyResponse {
    return {
      locked_apps: [...config.locked_apps],
      grace_period: config.grace_period,
      max_attempts: config.max_attempts,
      verify_timeout: config.verify_timeout,
      relock_on_exit: config.relock_on_exit,
      check_interval: config.check_interval,
      password_set: config.password_hash !== null,
    };
  }
}
