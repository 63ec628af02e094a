import { describe, expect, it } from 'vitest';
import {
  addDays,
  formatIsoInZone,
  formatLocal,
  parseScheduleTime,
  weekdayOf,
  zonedParts,
  zonedTimeToUtc,
} from '../../src/schedule/timezone.js';

const NY = 'America/New_York';

describe('formatIsoInZone', () => {
  it('writes the daylight-time offset', () => {
    expect(formatIsoInZone(new Date('2026-10-19T11:00:00Z'), NY)).toBe('2026-10-19T07:00:00-04:00');
  });

  it('writes the standard-time offset after the November change', () => {
    expect(formatIsoInZone(new Date('2026-11-02T12:00:00Z'), NY)).toBe('2026-11-02T07:00:00-05:00');
  });

  it('writes +00:00 for UTC', () => {
    expect(formatIsoInZone(new Date('2026-10-19T11:00:05Z'), 'UTC')).toBe('2026-10-19T11:00:05+00:00');
  });
});

describe('formatLocal', () => {
  it('renders minutes in the zone', () => {
    expect(formatLocal(new Date('2026-10-19T11:00:00Z'), NY)).toBe('2026-10-19 07:00');
  });
});

describe('parseScheduleTime', () => {
  it('honours an explicit offset', () => {
    expect(parseScheduleTime('2026-10-19T07:00:00+02:00', NY)?.toISOString()).toBe('2026-10-19T05:00:00.000Z');
  });

  it('reads a time without offset as wall time in the zone', () => {
    expect(parseScheduleTime('2026-10-19 07:00', NY)?.toISOString()).toBe('2026-10-19T11:00:00.000Z');
    expect(parseScheduleTime('2026-10-19T07:00', NY)?.toISOString()).toBe('2026-10-19T11:00:00.000Z');
  });

  it('reads a date alone as midnight in the zone', () => {
    expect(parseScheduleTime('2026-10-19', NY)?.toISOString()).toBe('2026-10-19T04:00:00.000Z');
  });

  it('accepts Z', () => {
    expect(parseScheduleTime('2026-10-19T07:00:00Z', NY)?.toISOString()).toBe('2026-10-19T07:00:00.000Z');
  });

  it('round-trips its own output', () => {
    const text = formatIsoInZone(new Date('2026-12-24T23:30:00Z'), NY);
    expect(parseScheduleTime(text, NY)?.toISOString()).toBe('2026-12-24T23:30:00.000Z');
  });

  it.each(['not a time', '2026-02-30T10:00', '2026-10-19T25:00', '', '19/10/2026 07:00'])(
    'returns null for %j',
    text => {
      expect(parseScheduleTime(text, NY)).toBeNull();
    }
  );
});

describe('zonedTimeToUtc', () => {
  it('moves a wall time skipped by spring-forward past the jump', () => {
    const result = zonedTimeToUtc({ year: 2026, month: 3, day: 8 }, { hour: 2, minute: 30, second: 0 }, NY);
    expect(result.toISOString()).toBe('2026-03-08T07:30:00.000Z');
    expect(formatIsoInZone(result, NY)).toBe('2026-03-08T03:30:00-04:00');
  });
});

describe('calendar helpers', () => {
  it('numbers weekdays from Monday', () => {
    expect(weekdayOf({ year: 2026, month: 10, day: 19 })).toBe(0);
    expect(weekdayOf({ year: 2026, month: 10, day: 25 })).toBe(6);
    expect(zonedParts(new Date('2026-10-25T14:00:00Z'), NY).weekday).toBe(6);
  });

  it('adds days across a month end', () => {
    expect(addDays({ year: 2026, month: 10, day: 30 }, 3)).toEqual({ year: 2026, month: 11, day: 2 });
  });
});
