import type { ProcessedLedger, ScheduleLedger } from '../data/ledger.js';
import type { ProcessedEntry, ScheduleEntry } from '../data/types/scheduleEntry.js';
import { ingestLogger } from '../logging/index.js';
import { ScheduleValidationError } from '../shared/errors.js';
import { SlotAllocator } from './slotAllocator.js';
import { formatIsoInZone, formatLocal } from './timezone.js';
import { findConflicts } from './validation.js';
import type { WeeklyTemplate } from './weeklyTemplate.js';

export type IngestResult =
  | { status: 'scheduled'; entry: ScheduleEntry }
  | { status: 'already_scheduled'; entry: ScheduleEntry }
  | { status: 'already_processed'; processed: ProcessedEntry };

export interface IngestCoordinatorDeps {
  scheduleLedger: ScheduleLedger;
  processedLedger: ProcessedLedger;
  template: WeeklyTemplate;
  timeZone: string;
  clock?: () => Date;
}

const MAX_ALLOCATION_ATTEMPTS = 2;

/**
 * Turns an accepted image into a ScheduleLedger entry.
 *
 * Re-presenting a known filename is reported, not treated as an error.
 */
export class IngestCoordinator {
  private readonly allocator: SlotAllocator;
  private readonly clock: () => Date;

  constructor(private readonly deps: IngestCoordinatorDeps) {
    this.allocator = new SlotAllocator(deps.template, deps.timeZone);
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * @throws AllocationError when the template has no slot within the horizon
   * @throws ScheduleValidationError (conflict) when a concurrent writer keeps taking the slot
   */
  schedule(filename: string, originalPath: string, caption?: string): IngestResult {
    const { scheduleLedger, processedLedger, timeZone } = this.deps;

    const processed = processedLedger.load().find(p => p.filename === filename);
    if (processed) {
      ingestLogger.info({ filename }, 'Already processed, skipping');
      return { status: 'already_processed', processed };
    }

    let entries = scheduleLedger.load();

    for (let attempt = 1; attempt <= MAX_ALLOCATION_ATTEMPTS; attempt++) {
      const existing = entries.find(e => e.filename === filename);
      if (existing) {
        ingestLogger.info({ filename, scheduledTime: existing.scheduledTime }, 'Already scheduled, skipping');
        return { status: 'already_scheduled', entry: existing };
      }

      const slot = this.allocator.nextSlot(entries, this.clock());

      // Another writer may have saved since our read
      const current = scheduleLedger.load();
      const duplicate = current.find(e => e.filename === filename);
      const conflicts = findConflicts(current, slot, timeZone);
      if (duplicate || conflicts.length > 0) {
        ingestLogger.warn(
          { filename, slot: formatIsoInZone(slot, timeZone), conflicts, attempt },
          'Schedule changed during allocation, re-reading ledger'
        );
        entries = current;
        continue;
      }

      const entry: ScheduleEntry = {
        filename,
        scheduledTime: formatIsoInZone(slot, timeZone),
        originalPath,
        ...(caption ? { caption } : {}),
      };
      scheduleLedger.save([...current, entry]);

      ingestLogger.info(
        { filename, scheduledTime: entry.scheduledTime, hasCaption: Boolean(caption) },
        `Scheduled ${filename} for ${formatLocal(slot, timeZone)}`
      );
      return { status: 'scheduled', entry };
    }

    const existing = entries.find(e => e.filename === filename);
    if (existing) {
      return { status: 'already_scheduled', entry: existing };
    }
    throw new ScheduleValidationError(
      'conflict',
      `Could not allocate a conflict-free slot for ${filename} after ${MAX_ALLOCATION_ATTEMPTS} attempts`,
      filename
    );
  }

  /** The slot a new ingest would get right now, without writing anything. */
  previewNextSlot(): Date {
    return this.allocator.nextSlot(this.deps.scheduleLedger.load(), this.clock());
  }
}
