/**
 * Free-slot computation
 *
 * Turns a list of busy calendar intervals into the meeting windows that can be
 * proposed: buffered busy time is merged, subtracted from the query range,
 * split per local day, clipped to the daily window and filtered by length.
 */

import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import { assertValidDailyWindow, MINUTES_PER_DAY } from './time-of-day.js';
import { instantAt, isValidTimeZone, localDateOf, nextLocalDate, startOfLocalDay } from './zoned-day.js';
import type { DailyWindow, Interval, SlotQuery } from './types.js';

const MS_PER_MINUTE = 60 * 1000;

export const MAX_BUFFER_MINUTES = 120;

const IntervalSchema = z
  .object({
    start: z.date(),
    end: z.date(),
  })
  .refine((range) => range.start.getTime() < range.end.getTime(), {
    message: 'Query range start must be before its end',
  });

export const SlotQuerySchema = z.object({
  queryRange: IntervalSchema,
  dailyWindow: z.object({
    from: z.number().int().min(0).max(MINUTES_PER_DAY),
    to: z.number().int().min(0).max(MINUTES_PER_DAY),
  }),
  bufferMinutes: z.number().int().min(0).max(MAX_BUFFER_MINUTES),
  minDurationMinutes: z.number().min(0),
  timeZone: z.string().refine(isValidTimeZone, { message: 'Unknown time zone' }),
});

/**
 * Reject a malformed query before any computation happens
 */
export function validateSlotQuery(query: SlotQuery): void {
  const result = SlotQuerySchema.safeParse(query);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidInputError(`Invalid slot query: ${problems}`);
  }
  assertValidDailyWindow(query.dailyWindow);
}

export function computeFreeSlots(busy: readonly Interval[], query: SlotQuery): Interval[] {
  validateSlotQuery(query);

  const merged = mergeBusyIntervals(busy, query.queryRange, query.bufferMinutes);
  const candidates = subtractFromRange(query.queryRange, merged);
  const pieces = splitAtLocalMidnight(candidates, query.timeZone);
  const windowed = clipToDailyWindow(pieces, query.dailyWindow, query.timeZone);

  const minMs = query.minDurationMinutes * MS_PER_MINUTE;
  return windowed.filter((slot) => durationMs(slot) > 0 && durationMs(slot) >= minMs);
}

/**
 * Expand every busy interval by the buffer, clamp to the range and merge
 * overlapping or touching intervals into a minimal sorted disjoint set.
 */
export function mergeBusyIntervals(
  busy: readonly Interval[],
  range: Interval,
  bufferMinutes: number
): Interval[] {
  const bufferMs = bufferMinutes * MS_PER_MINUTE;
  const rangeStart = range.start.getTime();
  const rangeEnd = range.end.getTime();

  const expanded = busy
    .filter((b) => b.start.getTime() < b.end.getTime())
    .map((b) => ({
      start: Math.max(b.start.getTime() - bufferMs, rangeStart),
      end: Math.min(b.end.getTime() + bufferMs, rangeEnd),
    }))
    .filter((b) => b.start < b.end)
    .sort((a, b) => a.start - b.start);

  const merged: Array<{ start: number; end: number }> = [];
  for (const current of expanded) {
    const last = merged[merged.length - 1];
    if (last && current.start <= last.end) {
      last.end = Math.max(last.end, current.end);
    } else {
      merged.push({ ...current });
    }
  }

  return merged.map((b) => ({ start: new Date(b.start), end: new Date(b.end) }));
}

/**
 * Subtract sorted, disjoint busy intervals from a range with a single cursor walk
 */
export function subtractFromRange(range: Interval, mergedBusy: readonly Interval[]): Interval[] {
  const free: Interval[] = [];
  let cursor = range.start.getTime();

  for (const busy of mergedBusy) {
    if (cursor < busy.start.getTime()) {
      free.push({ start: new Date(cursor), end: new Date(busy.start.getTime()) });
    }
    cursor = Math.max(cursor, busy.end.getTime());
  }

  if (cursor < range.end.getTime()) {
    free.push({ start: new Date(cursor), end: new Date(range.end.getTime()) });
  }

  return free;
}

/**
 * Split intervals so that no piece crosses a local midnight
 */
export function splitAtLocalMidnight(intervals: readonly Interval[], timeZone: string): Interval[] {
  const pieces: Interval[] = [];

  for (const interval of intervals) {
    let cursor = interval.start;
    const end = interval.end;

    for (;;) {
      const midnight = startOfLocalDay(nextLocalDate(localDateOf(cursor, timeZone)), timeZone);
      // Each piece must move the cursor forward
      if (midnight.getTime() <= cursor.getTime() || midnight.getTime() >= end.getTime()) break;
      pieces.push({ start: cursor, end: midnight });
      cursor = midnight;
    }

    pieces.push({ start: cursor, end });
  }

  return pieces;
}

/**
 * Intersect day-local pieces with their day's window, discarding empty results
 */
export function clipToDailyWindow(
  pieces: readonly Interval[],
  window: DailyWindow,
  timeZone: string
): Interval[] {
  const clipped: Interval[] = [];

  for (const piece of pieces) {
    const day = localDateOf(piece.start, timeZone);
    const windowStart = instantAt(day, window.from, timeZone).getTime();
    const windowEnd = instantAt(day, window.to, timeZone).getTime();

    const start = Math.max(piece.start.getTime(), windowStart);
    const end = Math.min(piece.end.getTime(), windowEnd);
    if (start < end) {
      clipped.push({ start: new Date(start), end: new Date(end) });
    }
  }

  return clipped;
}

export function durationMs(interval: Interval): number {
  return interval.end.getTime() - interval.start.getTime();
}
