import moment from 'moment-timezone';
import Config from '@/config';

const CANONICAL_FORMAT = 'YYYY-MM-DDTHH:mm:ss.SSSZ';

/**
 * Render an instant in the system's canonical time zone,
 * e.g. 2024-06-01T12:03:04.005+10:00 for Australia/Brisbane.
 */
export const formatTimestamp = (date: Date, timezone: string = Config.TIMEZONE): string => {
  return moment(date).tz(timezone).format(CANONICAL_FORMAT);
};

/**
 * Parse an ISO-8601 string. Values without an offset are read as
 * wall-clock time in the canonical zone. Returns null when unparseable.
 */
export const parseTimestamp = (input: string, timezone: string = Config.TIMEZONE): Date | null => {
  const parsed = moment.tz(input.trim(), moment.ISO_8601, true, timezone);
  return parsed.isValid() ? parsed.toDate() : null;
};

export const secondsSince = (date: Date, now: Date = new Date()): number => {
  return Math.floor((now.getTime() - date.getTime()) / 1000);
};
