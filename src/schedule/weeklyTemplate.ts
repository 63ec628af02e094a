import { getFastMode, getTimezone, getWeeklyTemplateSpec } from '../config/index.js';
import { zonedParts, type TimeOfDay } from './timezone.js';

export const DEFAULT_WEEKLY_SCHEDULE = '0:07:00,2:11:00,4:17:00,5:09:00,6:18:00';

/** Lead time of the single slot used in fast mode. */
export const FAST_MODE_LEAD_MINUTES = 5;

const DAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

export class WeeklyTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WeeklyTemplateError';
  }
}

function compareTimes(a: TimeOfDay, b: TimeOfDay): number {
  return (a.hour - b.hour) || (a.minute - b.minute) || (a.second - b.second);
}

export function formatTimeOfDay(time: TimeOfDay): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
}

/**
 * Recurring posting times: weekday (0 = Monday) to a sorted list of
 * times of day. Days without slots are skipped by the allocator.
 */
export class WeeklyTemplate {
  private readonly days: ReadonlyArray<readonly TimeOfDay[]>;

  constructor(slots: Partial<Record<number, TimeOfDay[]>>) {
    const days: TimeOfDay[][] = [];
    for (let weekday = 0; weekday < 7; weekday++) {
      const unique = new Map<string, TimeOfDay>();
      for (const time of slots[weekday] ?? []) {
        unique.set(formatTimeOfDay(time), time);
      }
      days.push([...unique.values()].sort(compareTimes));
    }
    this.days = days;
  }

  /**
   * Parse "day:HH:MM[:SS]" items separated by commas or whitespace,
   * e.g. "0:07:00,2:11:30".
   */
  static parse(spec: string): WeeklyTemplate {
    const slots: Record<number, TimeOfDay[]> = {};
    const items = spec.split(/[,\s]+/).filter(item => item.length > 0);

    for (const item of items) {
      const match = /^([0-6]):(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(item);
      if (!match) {
        throw new WeeklyTemplateError(`Invalid weekly schedule item "${item}" (expected day:HH:MM[:SS], day 0 = Monday)`);
      }
      const weekday = Number(match[1]);
      const time: TimeOfDay = {
        hour: Number(match[2]),
        minute: Number(match[3]),
        second: Number(match[4] ?? 0),
      };
      if (time.hour > 23 || time.minute > 59 || time.second > 59) {
        throw new WeeklyTemplateError(`Invalid time in weekly schedule item "${item}"`);
      }
      (slots[weekday] ??= []).push(time);
    }

    return new WeeklyTemplate(slots);
  }

  /**
   * Diagnostic template: today's weekday only, one slot `leadMinutes` ahead.
   */
  static fastMode(now: Date, timeZone: string, leadMinutes = FAST_MODE_LEAD_MINUTES): WeeklyTemplate {
    // Shortly before midnight the slot lands on tomorrow's weekday
    const ahead = zonedParts(new Date(now.getTime() + leadMinutes * 60000), timeZone);
    const time: TimeOfDay = { hour: ahead.hour, minute: ahead.minute, second: 0 };
    return new WeeklyTemplate({ [ahead.weekday]: [time] });
  }

  /** Template from WEEKLY_SCHEDULE, or the fast-mode collapse when FAST_MODE is on. */
  static fromConfig(now: Date = new Date()): WeeklyTemplate {
    if (getFastMode()) {
      return WeeklyTemplate.fastMode(now, getTimezone());
    }
    return WeeklyTemplate.parse(getWeeklyTemplateSpec() ?? DEFAULT_WEEKLY_SCHEDULE);
  }

  slotsFor(weekday: number): readonly TimeOfDay[] {
    return this.days[weekday] ?? [];
  }

  get isEmpty(): boolean {
    return this.days.every(day => day.length === 0);
  }

  get slotsPerWeek(): number {
    return this.days.reduce((sum, day) => sum + day.length, 0);
  }

  describe(): string {
    return this.days
      .map((times, weekday) => times.length > 0 ? `${DAY_NAMES[weekday]} ${times.map(formatTimeOfDay).join(' ')}` : '')
      .filter(Boolean)
      .join(', ');
  }
}
