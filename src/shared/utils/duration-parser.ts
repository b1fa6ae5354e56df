/**
 * Duration parser for lock timing settings ("15m", "2s", "500ms").
 */

export type DurationUnit = 'ms' | 's' | 'm' | 'h' | 'd';

const UNIT_MS: Record<DurationUnit, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export type DurationParseOptions = {
  /** Unit applied to a bare number. Without it a bare number is rejected. */
  defaultUnit?: DurationUnit;
  minMs?: number;
  maxMs?: number;
};

function isDurationUnit(value: string): value is DurationUnit {
  return value in UNIT_MS;
}

/**
 * Parse a duration string to milliseconds.
 * Accepts: "500ms", "30s", "15m", "1h", "1d"
 */
export function parseDuration(raw: string, opts: DurationParseOptions = {}): number {
  if (typeof raw !== 'string') {
    throw new ParseError('invalid duration (not a string)');
  }
  const trimmed = raw.trim().toLowerCase();
  if (!trimmed) {
    throw new ParseError('invalid duration (empty)');
  }

  const m = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)?$/.exec(trimmed);
  if (!m) {
    throw new ParseError(`invalid duration: ${raw}`);
  }

  const unit = m[2] ?? opts.defaultUnit;
  if (unit === undefined || !isDurationUnit(unit)) {
    throw new ParseError(`duration needs a unit (ms, s, m, h, d): ${raw}`);
  }

  const ms = Math.round(Number(m[1]) * UNIT_MS[unit]);
  if (!Number.isFinite(ms)) {
    throw new ParseError(`invalid duration: ${raw}`);
  }
  if (opts.minMs !== undefined && ms < opts.minMs) {
    throw new ParseError(`duration too short: ${raw} (minimum ${formatDuration(opts.minMs)})`);
  }
  if (opts.maxMs !== undefined && ms > opts.maxMs) {
    throw new ParseError(`duration too long: ${raw} (maximum ${formatDuration(opts.maxMs)})`);
  }
  return ms;
}

/**
 * Format milliseconds using the largest unit that divides it exactly.
 */
export function formatDuration(ms: number): string {
  if (ms < 0) {
    throw new ParseError('Cannot format negative duration');
  }

  const units: DurationUnit[] = ['d', 'h', 'm', 's'];
  for (const unit of units) {
    const divisor = UNIT_MS[unit];
    if (ms >= divisor && ms % divisor === 0) {
      return `${ms / divisor}${unit}`;
    }
  }

  return `${ms}ms`;
}
