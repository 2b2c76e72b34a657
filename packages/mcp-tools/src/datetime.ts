/**
 * Date handling for tool arguments and rendered output
 */

import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(customParseFormat);
dayjs.extend(utc);

/** Shown to the caller whenever a datetime argument is rejected */
export const DATETIME_EXAMPLE = '2025-08-14T14:00:00';

export const CANONICAL_DATETIME_FORMAT = 'YYYY-MM-DD[T]HH:mm:ss';

const ACCEPTED_FORMATS = ['YYYY-MM-DD[T]HH:mm:ss', 'YYYY-MM-DD HH:mm:ss', 'YYYY-MM-DD[T]HH:mm'];

/**
 * Parse a caller-supplied wall-clock time. Every `Z` is dropped first, then the accepted
 * formats are tried strictly in order. Returns the canonical form, or null.
 */
export function parseDateTimeArgument(value: string): string | null {
  const input = value.replace(/Z/g, '');
  for (const format of ACCEPTED_FORMATS) {
    const parsed = dayjs.utc(input, format, true);
    if (parsed.isValid()) {
      return parsed.format(CANONICAL_DATETIME_FORMAT);
    }
  }
  return null;
}

/**
 * Interpret a remote timestamp. Values with an offset are converted to UTC; naive values
 * keep their wall-clock time.
 */
function parseRemoteTimestamp(raw: string): dayjs.Dayjs | null {
  if (!raw) return null;
  const parsed = dayjs.utc(raw);
  return parsed.isValid() ? parsed : null;
}

/**
 * `YYYY-MM-DD HH:mm`, or the raw value when it cannot be parsed
 */
export function formatTimestamp(raw: string): string {
  const parsed = parseRemoteTimestamp(raw);
  return parsed ? parsed.format('YYYY-MM-DD HH:mm') : raw;
}

/**
 * Render a start/end pair. The end shows only its time when both fall on the same day.
 */
export function formatWindow(rawStart: string, rawEnd: string): string {
  const start = parseRemoteTimestamp(rawStart);
  const end = parseRemoteTimestamp(rawEnd);
  if (!start || !end) {
    return `${rawStart} - ${rawEnd}`;
  }

  const from = start.format('YYYY-MM-DD HH:mm');
  if (start.format('YYYY-MM-DD') === end.format('YYYY-MM-DD')) {
    return `${from} - ${end.format('HH:mm')}`;
  }
  return `${from} - ${end.format('YYYY-MM-DD HH:mm')}`;
}

/**
 * `[now, now + days]` as UTC instants with a `Z` suffix
 */
export function lookAheadWindow(now: Date, days: number): { start: string; end: string } {
  const start = dayjs.utc(now);
  return {
    start: start.format('YYYY-MM-DDTHH:mm:ss[Z]'),
    end: start.add(days, 'day').format('YYYY-MM-DDTHH:mm:ss[Z]'),
  };
}
