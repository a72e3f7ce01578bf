import { formatInTimeZone } from 'date-fns-tz';
import { durationMs } from './slot-finder.js';
import { localDateOf } from './zoned-day.js';
import type { Interval } from './types.js';

export interface SummaryOptions {
  timeZone: string;
  minDurationMinutes: number;
}

/**
 * Collapse touching same-day slots and format them as human-readable lines,
 * e.g. "Monday Mar 2: 10am–5pm".
 */
export function summarizeSlots(slots: readonly Interval[], options: SummaryOptions): string[] {
  const { timeZone } = options;
  const minMs = options.minDurationMinutes * 60 * 1000;

  const byDay = new Map<string, Interval[]>();
  for (const slot of slots) {
    const day = localDateOf(slot.start, timeZone);
    const daySlots = byDay.get(day) ?? [];
    daySlots.push(slot);
    byDay.set(day, daySlots);
  }

  const lines: string[] = [];
  for (const day of [...byDay.keys()].sort()) {
    const daySlots = [...(byDay.get(day) ?? [])].sort((a, b) => a.start.getTime() - b.start.getTime());

    const merged: Interval[] = [];
    for (const slot of daySlots) {
      const last = merged[merged.length - 1];
      if (last && slot.start.getTime() === last.end.getTime()) {
        merged[merged.length - 1] = { start: last.start, end: slot.end };
      } else {
        merged.push(slot);
      }
    }

    for (const slot of merged) {
      if (durationMs(slot) >= minMs && durationMs(slot) > 0) {
        lines.push(formatSlot(slot, timeZone));
      }
    }
  }

  return lines;
}

export function formatSlot(slot: Interval, timeZone: string): string {
  const startDay = formatInTimeZone(slot.start, timeZone, 'EEEE MMM d');
  const endDay = formatInTimeZone(slot.end, timeZone, 'EEEE MMM d');
  const start = formatClock(slot.start, timeZone);
  const end = formatClock(slot.end, timeZone);

  if (localDateOf(slot.start, timeZone) !== localDateOf(slot.end, timeZone)) {
    return `${startDay}: ${start}–${endDay}: ${end}`;
  }
  return `${startDay}: ${start}–${end}`;
}

function formatClock(instant: Date, timeZone: string): string {
  const onTheHour = formatInTimeZone(instant, timeZone, 'mm') === '00';
  return formatInTimeZone(instant, timeZone, onTheHour ? 'haaa' : 'h:mmaaa');
}
