import type { ScheduleEntry } from '../data/types/scheduleEntry.js';
import { AllocationError } from '../shared/errors.js';
import {
  addDays,
  civilDateOf,
  weekdayOf,
  zonedParts,
  zonedTimeToUtc,
  type CivilDate,
  type TimeOfDay,
} from './timezone.js';
import { entryTime, hasConflict } from './validation.js';
import type { WeeklyTemplate } from './weeklyTemplate.js';

export const ALLOCATION_HORIZON_DAYS = 14;

function isAfter(time: TimeOfDay, reference: TimeOfDay): boolean {
  return (time.hour - reference.hour || time.minute - reference.minute || time.second - reference.second) > 0;
}

/**
 * Picks the slot for a newly ingested image.
 *
 * With no resolvable times in the ledger the earliest free slot after now
 * wins (cold start). Otherwise the slot goes after the latest scheduled
 * entry (warm continuation), so publish order follows ingest order. Gaps
 * left behind are for the rebalancer to fill.
 */
export class SlotAllocator {
  constructor(
    private readonly template: WeeklyTemplate,
    private readonly timeZone: string,
    private readonly horizonDays: number = ALLOCATION_HORIZON_DAYS
  ) { }

  /**
   * @throws AllocationError when no slot fits within the horizon
   */
  nextSlot(entries: readonly ScheduleEntry[], now: Date): Date {
    const latest = this.latestTime(entries);

    // A queue that has fully drained into the past behaves like an empty one
    if (latest === null || latest.getTime() <= now.getTime()) {
      const slot = this.scanDays(civilDateOf(now, this.timeZone), 0, entries, now, latest);
      if (slot) return slot;
    } else {
      const slot = this.continueAfter(latest, entries, now);
      if (slot) return slot;
    }

    throw new AllocationError(
      `No available time slot found in the next ${this.horizonDays} days (template: ${this.template.describe() || 'empty'})`,
      this.horizonDays
    );
  }

  private continueAfter(latest: Date, entries: readonly ScheduleEntry[], now: Date): Date | null {
    const parts = zonedParts(latest, this.timeZone);
    const latestDay: CivilDate = { year: parts.year, month: parts.month, day: parts.day };

    for (const time of this.template.slotsFor(parts.weekday)) {
      if (!isAfter(time, parts)) continue;
      const candidate = this.accept(latestDay, time, entries, now, latest);
      if (candidate) return candidate;
    }

    return this.scanDays(latestDay, 1, entries, now, latest);
  }

  private scanDays(
    start: CivilDate,
    firstOffset: number,
    entries: readonly ScheduleEntry[],
    now: Date,
    latest: Date | null
  ): Date | null {
    const lastOffset = firstOffset + this.horizonDays - 1;
    for (let offset = firstOffset; offset <= lastOffset; offset++) {
      const day = addDays(start, offset);
      for (const time of this.template.slotsFor(weekdayOf(day))) {
        const candidate = this.accept(day, time, entries, now, latest);
        if (candidate) return candidate;
      }
    }
    return null;
  }

  private accept(
    day: CivilDate,
    time: TimeOfDay,
    entries: readonly ScheduleEntry[],
    now: Date,
    latest: Date | null
  ): Date | null {
    const candidate = zonedTimeToUtc(day, time, this.timeZone);
    if (candidate.getTime() <= now.getTime()) return null;
    if (latest && candidate.getTime() <= latest.getTime()) return null;
    if (hasConflict(entries, candidate, this.timeZone)) return null;
    return candidate;
  }

  private latestTime(entries: readonly ScheduleEntry[]): Date | null {
    let latest: Date | null = null;
    for (const entry of entries) {
      const time = entryTime(entry, this.timeZone);
      if (time && (!latest || time.getTime() > latest.getTime())) {
        latest = time;
      }
    }
    return latest;
  }
}
