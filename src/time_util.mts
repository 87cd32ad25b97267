import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(utc);

/** Source of monotonic time, in floating seconds. */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now() / 1000;

/**
 * Parses an ISO 8601 timestamp into a unix timestamp in seconds.
 *
 * Returns `undefined` when the string is not a valid date.
 */
export function parseTimestamp(value: string): number | undefined {
  const parsed = dayjs(value);
  return parsed.isValid() ? parsed.unix() : undefined;
}

export function formatTimestamp(unix: number): string {
  return dayjs.unix(unix).utc().format();
}
