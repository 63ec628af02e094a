/**
 * Gap rebalancing
 *
 * The allocator only ever appends after the latest entry, so cancellations
 * and reschedules leave empty template slots behind. The rebalancer pulls
 * the latest pending entries forward into the earliest of those gaps.
 *
 * A gap is a future template slot, before the latest pending entry, with no
 * entry (pending or processed) within the conflict window. Entries already
 * in processed.json are never moved. Moves only ever make an entry earlier,
 * so applying a rebalance and running it again finds no gaps.
 */

import type { ProcessedLedger, ScheduleLedger } from '../data/ledger.js';
import type { ScheduleEntry } from '../data/types/scheduleEntry.js';
import { rebalanceLogger } from '../logging/index.js';
import { addDays, civilDateOf, formatIsoInZone, weekdayOf, zonedTimeToUtc } from './timezone.js';
import { CONFLICT_WINDOW_MS, entryTime } from './validation.js';
import type { WeeklyTemplate } from './weeklyTemplate.js';

export const DEFAULT_REBALANCE_HORIZON_DAYS = 365;

export interface RebalanceChange {
  filename: string;
  oldTime: string;
  newTime: string;
}

export interface RebalanceResult {
  gapsFound: number;
  entriesMoved: number;
  changes: RebalanceChange[];
  dryRun: boolean;
  message: string;
}

export interface RebalancerDeps {
  scheduleLedger: ScheduleLedger;
  processedLedger: ProcessedLedger;
  template: WeeklyTemplate;
  timeZone: string;
  clock?: () => Date;
}

interface TimedEntry {
  entry: ScheduleEntry;
  time: Date;
}

export class Rebalancer {
  private readonly clock: () => Date;

  constructor(private readonly deps: RebalancerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Future template slots over the next `horizonDays` calendar days, ascending. */
  expectedSlots(now: Date, horizonDays: number): Date[] {
    const { template, timeZone } = this.deps;
    const today = civilDateOf(now, timeZone);
    const slots: Date[] = [];
    for (let offset = 0; offset < horizonDays; offset++) {
      const day = addDays(today, offset);
      for (const time of template.slotsFor(weekdayOf(day))) {
        const slot = zonedTimeToUtc(day, time, timeZone);
        if (slot.getTime() > now.getTime()) {
          slots.push(slot);
        }
      }
    }
    return slots.sort((a, b) => a.getTime() - b.getTime());
  }

  rebalance(horizonDays: number = DEFAULT_REBALANCE_HORIZON_DAYS, dryRun: boolean = true): RebalanceResult {
    const { scheduleLedger, processedLedger, timeZone } = this.deps;
    const now = this.clock();

    const entries = scheduleLedger.load();
    const processedNames = new Set(processedLedger.load().map(p => p.filename));

    const occupied: Date[] = [];
    const pending: TimedEntry[] = [];
    for (const entry of entries) {
      const time = entryTime(entry, timeZone);
      if (!time) {
        rebalanceLogger.warn({ filename: entry.filename, scheduledTime: entry.scheduledTime }, 'Entry has an unreadable time, leaving it in place');
        continue;
      }
      occupied.push(time);
      if (!processedNames.has(entry.filename)) {
        pending.push({ entry, time });
      }
    }
    pending.sort((a, b) => a.time.getTime() - b.time.getTime());

    const latestPending = pending.length > 0 ? pending[pending.length - 1].time : null;
    const gaps = latestPending ? this.findGaps(now, horizonDays, occupied, latestPending) : [];

    // Largest n such that the n-th earliest gap precedes the n-th latest pending entry
    let moveCount = 0;
    while (
      moveCount < gaps.length
      && moveCount < pending.length
      && gaps[moveCount].getTime() < pending[pending.length - 1 - moveCount].time.getTime()
    ) {
      moveCount++;
    }

    const toMove = pending.slice(pending.length - moveCount);
    const changes: RebalanceChange[] = toMove.map((item, index) => ({
      filename: item.entry.filename,
      oldTime: item.entry.scheduledTime,
      newTime: formatIsoInZone(gaps[index], timeZone),
    }));

    const result: RebalanceResult = {
      gapsFound: gaps.length,
      entriesMoved: changes.length,
      changes,
      dryRun,
      message: '',
    };

    // Every gap precedes the latest pending entry, so a gap always means a move
    if (changes.length === 0) {
      result.message = 'No gaps found in schedule';
    } else if (dryRun) {
      result.message = `Would move ${changes.length} post(s) to fill ${gaps.length} gap(s)`;
    } else {
      scheduleLedger.save(this.applyChanges(entries, changes));
      result.message = `Moved ${changes.length} post(s) to fill gaps`;
    }

    rebalanceLogger.info(
      { gapsFound: result.gapsFound, entriesMoved: result.entriesMoved, dryRun, horizonDays },
      result.message
    );
    return result;
  }

  private findGaps(now: Date, horizonDays: number, occupied: readonly Date[], before: Date): Date[] {
    const gaps: Date[] = [];
    for (const slot of this.expectedSlots(now, horizonDays)) {
      if (slot.getTime() >= before.getTime()) break;
      const taken = occupied.some(t => Math.abs(t.getTime() - slot.getTime()) < CONFLICT_WINDOW_MS);
      const tooClose = gaps.length > 0 && slot.getTime() - gaps[gaps.length - 1].getTime() < CONFLICT_WINDOW_MS;
      if (!taken && !tooClose) {
        gaps.push(slot);
      }
    }
    return gaps;
  }

  private applyChanges(entries: readonly ScheduleEntry[], changes: readonly RebalanceChange[]): ScheduleEntry[] {
    const { timeZone } = this.deps;
    const newTimes = new Map(changes.map(change => [change.filename, change.newTime]));
    const updated = entries.map(entry => {
      const newTime = newTimes.get(entry.filename);
      return newTime ? { ...entry, scheduledTime: newTime } : entry;
    });

    // Chronological, entries with unreadable times last
    const sortKey = (entry: ScheduleEntry): number => entryTime(entry, timeZone)?.getTime() ?? Number.POSITIVE_INFINITY;
    return updated
      .map((entry, index) => ({ entry, index, key: sortKey(entry) }))
      .sort((a, b) => (a.key - b.key) || (a.index - b.index))
      .map(item => item.entry);
  }
}
