/**
 * Calendar-day arithmetic in an arbitrary IANA time zone
 */

import { addDays, format, parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { MINUTES_PER_DAY, formatTimeOfDay } from './time-of-day.js';

/** Local calendar date (`yyyy-MM-dd`) of an instant */
export function localDateOf(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, 'yyyy-MM-dd');
}

export function nextLocalDate(date: string): string {
  return format(addDays(parseISO(date), 1), 'yyyy-MM-dd');
}

const SEARCH_STEP_MS = 6 * 60 * 60 * 1000;

/**
 * Instant of a wall-clock time on a local date. 1440 minutes resolves to the
 * following midnight. A time skipped by a daylight-saving jump at the start of
 * the day resolves to the first instant that belongs to that date.
 */
export function instantAt(date: string, minutes: number, timeZone: string): Date {
  if (minutes >= MINUTES_PER_DAY) {
    return instantAt(nextLocalDate(date), minutes - MINUTES_PER_DAY, timeZone);
  }
  const candidate = fromZonedTime(`${date}T${formatTimeOfDay(minutes)}:00`, timeZone);
  if (localDateOf(candidate, timeZone) < date) {
    return firstInstantOf(date, candidate, timeZone);
  }
  return candidate;
}

/**
 * Earliest instant whose local date is `date`, searching forward from an
 * instant that still falls on an earlier date.
 */
function firstInstantOf(date: string, before: Date, timeZone: string): Date {
  let low = before.getTime();
  let high = low + SEARCH_STEP_MS;
  while (localDateOf(new Date(high), timeZone) < date) {
    low = high;
    high += SEARCH_STEP_MS;
  }

  // low is on an earlier date, high is on `date` or later
  while (high - low > 1) {
    const mid = Math.floor((low + high) / 2);
    if (localDateOf(new Date(mid), timeZone) < date) {
      low = mid;
    } else {
      high = mid;
    }
  }
  return new Date(high);
}

export function startOfLocalDay(date: string, timeZone: string): Date {
  return instantAt(date, 0, timeZone);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
