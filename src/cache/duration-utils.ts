import type { Duration } from './cache-interfaces.js';

const DURATION_MULTIPLIERS = {
  s: 1000,
  m: 60000,
  h: 3600000,
  d: 86400000,
  w: 604800000,
} as const;

type DurationUnit = keyof typeof DURATION_MULTIPLIERS;

const isDurationUnit = (value: string): value is DurationUnit => value in DURATION_MULTIPLIERS;

/**
 * Converts a human-readable duration to milliseconds
 * @param duration - Milliseconds, or a string such as '30s', '10m', '2h', '1d', '1w'
 * @throws Error when the format is not recognised
 *
 * @example
 * parseDuration('30s') // 30000
 * parseDuration('1d')  // 86400000
 */
export function parseDuration(duration: Duration): number {
  if (typeof duration === 'number') {
    return duration;
  }

  const match = duration.match(/^(\d+)([smhdw])$/);
  const unit = match?.[2];

  if (!match || unit === undefined || !isDurationUnit(unit)) {
    throw new Error(
      `Invalid duration format: "${duration}". ` +
      `Use formats like '30s', '10m', '2h', '1d', '1w' or a number in milliseconds.`
    );
  }

  return parseInt(match[1], 10) * DURATION_MULTIPLIERS[unit];
}

/** Non-negative milliseconds or a duration string */
export function isValidDuration(value: unknown): value is Duration {
  if (typeof value === 'number') {
    return value >= 0;
  }
  if (typeof value === 'string') {
    return /^\d+[smhdw]$/.test(value);
  }
  return false;
}
