import type { ScheduleLedger } from '../data/ledger.js';
import type { ScheduleEntry } from '../data/types/scheduleEntry.js';
import { createChildLogger } from '../logging/index.js';
import { ScheduleValidationError } from '../shared/errors.js';
import { formatIsoInZone } from './timezone.js';
import { assertNoConflict, requireFutureTime } from './validation.js';

const editLogger = createChildLogger('SCHEDULE_EDIT');

export interface ScheduleEditorDeps {
  scheduleLedger: ScheduleLedger;
  timeZone: string;
  clock?: () => Date;
}

/**
 * Operator edits to pending entries. Each method validates completely
 * before writing, so a rejected edit leaves schedule.json untouched.
 */
export class ScheduleEditor {
  private readonly clock: () => Date;

  constructor(private readonly deps: ScheduleEditorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  cancel(filename: string): ScheduleEntry {
    const entries = this.deps.scheduleLedger.load();
    const index = this.indexOf(entries, filename);
    const [removed] = entries.splice(index, 1);
    this.deps.scheduleLedger.save(entries);

    editLogger.info({ filename, scheduledTime: removed.scheduledTime }, 'Cancelled scheduled post');
    return removed;
  }

  /**
   * Move an entry to `newTime` (ISO-8601; without an offset it is read in
   * the configured zone).
   */
  reschedule(filename: string, newTime: string): ScheduleEntry {
    const { scheduleLedger, timeZone } = this.deps;
    const entries = scheduleLedger.load();
    const index = this.indexOf(entries, filename);

    const time = requireFutureTime(newTime, timeZone, this.clock(), filename);
    assertNoConflict(entries, time, timeZone, filename);

    const previous = entries[index];
    const updated: ScheduleEntry = { ...previous, scheduledTime: formatIsoInZone(time, timeZone) };
    entries[index] = updated;
    scheduleLedger.save(entries);

    editLogger.info(
      { filename, oldTime: previous.scheduledTime, newTime: updated.scheduledTime },
      'Rescheduled post'
    );
    return updated;
  }

  /** Set the caption, or remove it when `caption` is null or empty. */
  updateCaption(filename: string, caption: string | null): ScheduleEntry {
    const entries = this.deps.scheduleLedger.load();
    const index = this.indexOf(entries, filename);

    const { caption: _previous, ...rest } = entries[index];
    const updated: ScheduleEntry = caption ? { ...rest, caption } : rest;
    entries[index] = updated;
    this.deps.scheduleLedger.save(entries);

    editLogger.info({ filename, cleared: !caption }, caption ? 'Updated caption' : 'Cleared caption');
    return updated;
  }

  private indexOf(entries: readonly ScheduleEntry[], filename: string): number {
    const index = entries.findIndex(e => e.filename === filename);
    if (index === -1) {
      throw new ScheduleValidationError('not_found', `Entry not found: ${filename}`, filename);
    }
    return index;
  }
}
