/**
 * Duration strings used by the config file: "500ms", "30s", "5m", "1h".
 * A bare number is read in the default unit (milliseconds unless given).
 */

export type DurationUnit = 'ms' | 's' | 'm' | 'h';

export type DurationMsParseOptions = {
  defaultUnit?: DurationUnit;
};

export class DurationParseError extends Error {
  constructor(raw: unknown, reason: string) {
    super(`invalid duration${reason ? ` (${reason})` : ''}: ${String(raw)}`);
    this.name = 'DurationParseError';
  }
}

const UNIT_MS: Record<DurationUnit, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse a duration string to milliseconds.
 */
export function parseDurationMs(raw: string, opts?: DurationMsParseOptions): number {
  if (typeof raw !== 'string') {
    throw new DurationParseError(raw, 'not a string');
  }
  const trimmed = raw.trim().toLowerCase();
  if (!trimmed) {
    throw new DurationParseError(raw, 'empty');
  }

  const m = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/.exec(trimmed);
  if (!m) {
    throw new DurationParseError(raw, '');
  }

  const value = Number(m[1]);
  const unit = toUnit(m[2]) ?? opts?.defaultUnit ?? 'ms';
  const ms = Math.round(value * UNIT_MS[unit]);
  if (!Number.isFinite(ms)) {
    throw new DurationParseError(raw, 'out of range');
  }
  return ms;
}

function toUnit(raw: string | undefined): DurationUnit | undefined {
  switch (raw) {
    case 'ms':
    case 's':
    case 'm':
    case 'h':
      return raw;
    default:
      return undefined;
  }
}

/**
 * Format milliseconds as the largest unit that divides it exactly,
 * so that parseDurationMs(formatDuration(x)) === x for integer x.
 */
export function formatDuration(ms: number): string {
  if (!Number.isInteger(ms) || ms < 0) {
    throw new RangeError(`Cannot format duration: ${ms}`);
  }
  if (ms === 0) return '0s';

  const units: DurationUnit[] = ['h', 'm', 's'];
  for (const unit of units) {
    if (ms % UNIT_MS[unit] === 0) {
      return `${ms / UNIT_MS[unit]}${unit}`;
    }
  }
  return `${ms}ms`;
}
