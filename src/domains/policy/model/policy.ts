/**
 * Lock policy types.
 * Runtime config persisted to ~/.applock/config.json
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { formatDuration, parseDurationMs, type DurationUnit } from '../../../shared/utils/duration-parser.js';

/** On-disk layout. Keys are snake_case, durations are strings like "30s". */
export const LockerConfigSchema = Type.Object({
  /** Keywords matched case-insensitively as substrings of process names, in priority order */
  locked_apps: Type.Array(Type.String()),

  /** How long a successful unlock exempts the app from interception */
  grace_period: Type.String(),

  /** Wrong-password attempts allowed per prompt session */
  max_attempts: Type.Integer({ minimum: 1 }),

  /** Hard deadline for one verification session */
  verify_timeout: Type.String(),

  /** Drop the grace window when the app's process exits */
  relock_on_exit: Type.Boolean(),

  /** Process-table polling period */
  check_interval: Type.String(),

  /** Hex SHA-256 of the unlock password, null when none is set */
  password_hash: Type.Union([Type.String({ pattern: '^[0-9a-f]{64}$' }), Type.Null()]),
});

export type LockerConfig = Static<typeof LockerConfigSchema>;

/** What may appear in the file; anything missing takes its default. */
export const PartialLockerConfigSchema = Type.Partial(LockerConfigSchema);

export const DEFAULT_CONFIG: LockerConfig = {
  locked_apps: [],
  grace_period: '30s',
  max_attempts: 3,
  verify_timeout: '1m',
  relock_on_exit: false,
  check_interval: '300ms',
  password_hash: null,
};

/**
 * Immutable snapshot the coordinator reads. Replaced wholesale on reload.
 */
export interface LockPolicy {
  readonly keywords: readonly string[];
  readonly gracePeriodMs: number;
  readonly maxAttempts: number;
  readonly verifyTimeoutMs: number;
  readonly relockOnExit: boolean;
}

/** Trim, lowercase and de-duplicate, keeping the first occurrence's position. */
export function normalizeKeywords(raw: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const entry of raw) {
    const keyword = entry.trim().toLowerCase();
    if (!keyword || seen.has(keyword)) continue;
    seen.add(keyword);
    out.push(keyword);
  }
  return out;
}

export interface DurationBounds {
  field: 'grace_period' | 'verify_timeout' | 'check_interval';
  minMs: number;
  maxMs: number;
  defaultUnit: DurationUnit;
}

export const GRACE_BOUNDS: DurationBounds = { field: 'grace_period', minMs: 0, maxMs: 24 * 3_600_000, defaultUnit: 's' };
export const TIMEOUT_BOUNDS: DurationBounds = { field: 'verify_timeout', minMs: 5_000, maxMs: 600_000, defaultUnit: 's' };
export const INTERVAL_BOUNDS: DurationBounds = { field: 'check_interval', minMs: 100, maxMs: 60_000, defaultUnit: 'ms' };

export const MAX_ATTEMPTS_LIMIT = 10;

function clampDuration(raw: string, bounds: DurationBounds): string {
  const ms = parseDurationMs(raw, { defaultUnit: bounds.defaultUnit });
  return formatDuration(Math.min(bounds.maxMs, Math.max(bounds.minMs, ms)));
}

/**
 * Validate a parsed file and merge it over the defaults.
 * Durations are re-formatted so that saving the result and loading it
 * again yields the same config. Values outside the settings bounds are
 * clamped to the nearest bound.
 * @throws Error describing the first schema violation or bad duration
 */
export function normalizeConfig(raw: unknown): LockerConfig {
  if (!Value.Check(PartialLockerConfigSchema, raw)) {
    const first = Value.Errors(PartialLockerConfigSchema, raw).First();
    const where = first?.path || '/';
    throw new Error(`${where}: ${first?.message ?? 'does not match config schema'}`);
  }

  const merged: LockerConfig = { ...DEFAULT_CONFIG, ...raw };
  return {
    locked_apps: normalizeKeywords(merged.locked_apps),
    grace_period: clampDuration(merged.grace_period, GRACE_BOUNDS),
    max_attempts: Math.min(MAX_ATTEMPTS_LIMIT, merged.max_attempts),
    verify_timeout: clampDuration(merged.verify_timeout, TIMEOUT_BOUNDS),
    relock_on_exit: merged.relock_on_exit,
    check_interval: clampDuration(merged.check_interval, INTERVAL_BOUNDS),
    password_hash: merged.password_hash,
  };
}

export function toLockPolicy(config: LockerConfig): LockPolicy {
  return Object.freeze({
    keywords: Object.freeze(normalizeKeywords(config.locked_apps)),
    gracePeriodMs: parseDurationMs(config.grace_period, { defaultUnit: 's' }),
    maxAttempts: Math.max(1, config.max_attempts),
    verifyTimeoutMs: parseDurationMs(config.verify_timeout, { defaultUnit: 's' }),
    relockOnExit: config.relock_on_exit,
  });
}

/** Policy used when no usable config exists: nothing is protected. */
export const EMPTY_POLICY: LockPolicy = toLockPolicy(DEFAULT_CONFIG);

/** Public view of the config (never exposes the password hash) */
export interface PolicyResponse {
  locked_apps: string[];
  grace_period: string;
  max_attempts: number;
  verify_timeout: string;
  relock_on_exit: boolean;
  check_interval: string;
  password_set: boolean;
}

/** Settings update request */
export interface PolicySettingsUpdate {
  grace_period?: string;
  max_attempts?: number;
  verify_timeout?: string;
  relock_on_exit?: boolean;
  check_interval?: string;
}

export const PolicySettingsUpdateSchema = Type.Object(
  {
    grace_period: Type.Optional(Type.String()),
    max_attempts: Type.Optional(Type.Integer()),
    verify_timeout: Type.Optional(Type.String()),
    relock_on_exit: Type.Optional(Type.Boolean()),
    check_interval: Type.Optional(Type.String()),
  },
  { additionalProperties: false }
);
