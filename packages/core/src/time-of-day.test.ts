import { describe, it, expect } from 'vitest';
import { formatDailyWindow, formatTimeOfDay, parseDailyWindow, parseTimeOfDay } from './time-of-day.js';
import { InvalidInputError } from './errors.js';

describe('parseTimeOfDay', () => {
  it('converts HH:MM to minutes after midnight', () => {
    expect(parseTimeOfDay('09:00')).toBe(540);
    expect(parseTimeOfDay('9:30')).toBe(570);
    expect(parseTimeOfDay('24:00')).toBe(1440);
  });

  it('rejects times that do not exist', () => {
    expect(() => parseTimeOfDay('24:30')).toThrow(InvalidInputError);
    expect(() => parseTimeOfDay('12:60')).toThrow(InvalidInputError);
    expect(() => parseTimeOfDay('noon')).toThrow('Invalid time of day "noon", expected HH:MM');
  });
});

describe('parseDailyWindow', () => {
  it('parses a range', () => {
    expect(parseDailyWindow('09:00-17:00')).toEqual({ from: 540, to: 1020 });
  });

  it('rejects an empty or inverted range', () => {
    expect(() => parseDailyWindow('10:00-10:00')).toThrow('Daily window start and end are both 10:00');
    expect(() => parseDailyWindow('17:00-09:00')).toThrow(InvalidInputError);
  });

  it('round-trips through its text form', () => {
    expect(formatDailyWindow(parseDailyWindow('08:30-24:00'))).toBe('08:30-24:00');
    expect(formatTimeOfDay(0)).toBe('00:00');
  });
});
