import type { JsonValue } from '../types/json.js';

/** Trailing zone offset of the time part: +05, +0530 or +05:30. */
const OFFSET = /([+-]\d{2}):?(\d{2})?$/;
const ISO_LIKE = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?)?/;

/**
 * Parse an upstream start time into an instant.
 * ISO-8601 with or without a trailing offset (naive values are read as UTC),
 * or epoch milliseconds. Anything else yields null.
 */
export function parseStartTime(value: JsonValue | undefined): Date | null {
  if (typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  if (typeof value !== 'string') return null;

  const raw = value.trim();
  if (!ISO_LIKE.test(raw)) return null;

  const normalized = raw.replace(' ', 'T').replace(/(\.\d{3})\d+/, '$1');
  const [day, clock = '00:00:00'] = normalized.split('T');

  let time = clock;
  if (OFFSET.test(time)) {
    time = time.replace(OFFSET, (_match, hours: string, minutes: string | undefined) => {
      return `${hours}:${minutes ?? '00'}`;
    });
  } else if (!/z$/i.test(time)) {
    time = `${time}Z`;
  }

  const date = new Date(`${day ?? ''}T${time}`);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Calendar date (YYYY-MM-DD) of an instant in the given IANA zone. */
export function dateStringInZone(date: Date, timezone: string): string {
  return new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(date);
}
