import { InvalidInputError } from './errors.js';
import type { DailyWindow } from './types.js';

export const MINUTES_PER_DAY = 24 * 60;

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Parse `HH:MM` into minutes after midnight. `24:00` is accepted as end of day.
 */
export function parseTimeOfDay(text: string): number {
  const match = TIME_OF_DAY_PATTERN.exec(text.trim());
  if (!match) {
    throw new InvalidInputError(`Invalid time of day "${text}", expected HH:MM`);
  }

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (minutes > 59 || hours > 24 || (hours === 24 && minutes !== 0)) {
    throw new InvalidInputError(`Invalid time of day "${text}"`);
  }

  return hours * 60 + minutes;
}

export function formatTimeOfDay(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
}

/**
 * Parse `HH:MM-HH:MM` into a daily window
 */
export function parseDailyWindow(text: string): DailyWindow {
  const parts = text.split('-');
  if (parts.length !== 2) {
    throw new InvalidInputError(`Invalid daily window "${text}", expected HH:MM-HH:MM`);
  }

  const window = { from: parseTimeOfDay(parts[0]), to: parseTimeOfDay(parts[1]) };
  assertValidDailyWindow(window);
  return window;
}

export function assertValidDailyWindow(window: DailyWindow): void {
  const { from, to } = window;
  if (!Number.isInteger(from) || !Number.isInteger(to)) {
    throw new InvalidInputError('Daily window bounds must be whole minutes');
  }
  if (from < 0 || to > MINUTES_PER_DAY) {
    throw new InvalidInputError(
      `Daily window ${formatTimeOfDay(from)}-${formatTimeOfDay(to)} must lie within 00:00-24:00`
    );
  }
  if (from === to) {
    throw new InvalidInputError(`Daily window start and end are both ${formatTimeOfDay(from)}`);
  }
  if (from > to) {
    throw new InvalidInputError(
      `Daily window start ${formatTimeOfDay(from)} is after its end ${formatTimeOfDay(to)}`
    );
  }
}

export function formatDailyWindow(window: DailyWindow): string {
  return `${formatTimeOfDay(window.from)}-${formatTimeOfDay(window.to)}`;
}
