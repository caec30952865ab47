/**
 * Calendar and clock helpers (timezone aware)
 */

import { DateKey, TimeOfDay } from './types';

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Convert Date to YYYY-MM-DD in user's timezone
 */
export function toLocalDateString(date: Date, timezone: string): DateKey {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });

  return formatter.format(date);
}

/**
 * Convert Date to HH:mm in user's timezone
 */
export function toTimeOfDay(date: Date, timezone: string): TimeOfDay {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone: timezone,
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const hour = parts.find(p => p.type === 'hour')?.value ?? '00';
  const minute = parts.find(p => p.type === 'minute')?.value ?? '00';

  return `${hour.padStart(2, '0')}:${minute.padStart(2, '0')}`;
}

/**
 * "7:00" → "07:00". Returns undefined for anything that is not a clock time.
 */
export function normalizeTimeOfDay(value: string): TimeOfDay | undefined {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return undefined;

  return `${String(hours).padStart(2, '0')}:${match[2]}`;
}

export function isDateKey(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;

  const [, y, m, d] = match;
  const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));

  return (
    parsed.getUTCFullYear() === Number(y) &&
    parsed.getUTCMonth() === Number(m) - 1 &&
    parsed.getUTCDate() === Number(d)
  );
}
