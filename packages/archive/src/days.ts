import { InvalidDayError, InvalidTimestampError } from './errors';

export const MS_PER_DAY = 86_400_000;

// 9999-12-31T23:59:59.999Z, the last instant with a four-digit ISO year.
export const MAX_TIMESTAMP_MS = 253_402_300_799_999;

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_PATTERN = /^\d{4}-\d{2}$/;

export function isValidTimestampMs(ms: number): boolean {
  return Number.isSafeInteger(ms) && ms >= 0 && ms <= MAX_TIMESTAMP_MS;
}

export function assertTimestampMs(field: string, ms: number): number {
  if (!isValidTimestampMs(ms)) throw new InvalidTimestampError(field, ms);
  return ms;
}

/** UTC calendar day of an epoch-millisecond timestamp. */
export function dayOf(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function isDay(value: string): boolean {
  if (!DAY_PATTERN.test(value)) return false;
  const ms = Date.parse(`${value}T00:00:00Z`);
  return !Number.isNaN(ms) && dayOf(ms) === value;
}

export function assertDay(value: string): string {
  if (!isDay(value)) throw new InvalidDayError(value);
  return value;
}

export function isMonth(value: string): boolean {
  return MONTH_PATTERN.test(value) && isDay(`${value}-01`);
}

export function monthOf(day: string): string {
  return day.slice(0, 7);
}

/**
 * Calendar days touched by a window, inclusive on both ends and compared by
 * date component only: 23:50 on D to 00:10 on D+1 yields [D, D+1].
 */
export function enumerateDays(fromMs: number, toMs: number): string[] {
  const first = Math.floor(fromMs / MS_PER_DAY);
  const last = Math.floor(toMs / MS_PER_DAY);
  const days: string[] = [];
  for (let d = first; d <= last; d++) days.push(dayOf(d * MS_PER_DAY));
  return days;
}
