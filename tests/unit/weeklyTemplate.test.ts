import { describe, expect, it } from 'vitest';
import { DEFAULT_WEEKLY_SCHEDULE, WeeklyTemplate, WeeklyTemplateError } from '../../src/schedule/weeklyTemplate.js';

describe('WeeklyTemplate.parse', () => {
  it('parses the default template', () => {
    const template = WeeklyTemplate.parse(DEFAULT_WEEKLY_SCHEDULE);
    expect(template.slotsPerWeek).toBe(5);
    expect(template.slotsFor(0)).toEqual([{ hour: 7, minute: 0, second: 0 }]);
    expect(template.slotsFor(1)).toEqual([]);
    expect(template.describe()).toBe('Mon 07:00:00, Wed 11:00:00, Fri 17:00:00, Sat 09:00:00, Sun 18:00:00');
  });

  it('sorts and dedupes times within a day', () => {
    const template = WeeklyTemplate.parse('3:18:00 3:9:30:15, 3:18:00');
    expect(template.slotsFor(3)).toEqual([
      { hour: 9, minute: 30, second: 15 },
      { hour: 18, minute: 0, second: 0 },
    ]);
  });

  it('treats an empty schedule string as an empty template', () => {
    const template = WeeklyTemplate.parse('  ');
    expect(template.isEmpty).toBe(true);
    expect(template.describe()).toBe('');
  });

  it.each(['7:10:00', 'mon:10:00', '1:24:00', '1:10:60', '1-10:00'])('rejects %j', item => {
    expect(() => WeeklyTemplate.parse(item)).toThrow(WeeklyTemplateError);
  });
});

describe('WeeklyTemplate.fastMode', () => {
  it('keeps one slot five minutes ahead on the current weekday', () => {
    // Monday 10:12:40 in New York
    const template = WeeklyTemplate.fastMode(new Date('2026-10-19T14:12:40Z'), 'America/New_York');
    expect(template.slotsPerWeek).toBe(1);
    expect(template.slotsFor(0)).toEqual([{ hour: 10, minute: 17, second: 0 }]);
  });

  it('rolls to the next weekday just before midnight', () => {
    // Sunday 23:58 in New York
    const template = WeeklyTemplate.fastMode(new Date('2026-10-26T03:58:00Z'), 'America/New_York');
    expect(template.slotsFor(6)).toEqual([]);
    expect(template.slotsFor(0)).toEqual([{ hour: 0, minute: 3, second: 0 }]);
  });
});
