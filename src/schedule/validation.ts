import type { ScheduleEntry } from '../data/types/scheduleEntry.js';
import { ScheduleValidationError } from '../shared/errors.js';
import { parseScheduleTime } from './timezone.js';

/** Minimum separation between any two scheduled entries. */
export const CONFLICT_WINDOW_MS = 60000;

export function entryTime(entry: ScheduleEntry, timeZone: string): Date | null {
  return parseScheduleTime(entry.scheduledTime, timeZone);
}

/**
 * Filenames whose scheduled time lies within the conflict window of
 * `candidate`. Entries with an unreadable time never conflict.
 */
export function findConflicts(
  entries: readonly ScheduleEntry[],
  candidate: Date,
  timeZone: string,
  excludeFilename?: string
): string[] {
  const conflicts: string[] = [];
  for (const entry of entries) {
    if (excludeFilename !== undefined && entry.filename === excludeFilename) continue;
    const time = entryTime(entry, timeZone);
    if (time && Math.abs(time.getTime() - candidate.getTime()) < CONFLICT_WINDOW_MS) {
      conflicts.push(entry.filename);
    }
  }
  return conflicts;
}

export function hasConflict(entries: readonly ScheduleEntry[], candidate: Date, timeZone: string): boolean {
  return findConflicts(entries, candidate, timeZone).length > 0;
}

/**
 * Parse `text` and require it to be strictly after `now`.
 *
 * @throws ScheduleValidationError with reason invalid_time or past_time
 */
export function requireFutureTime(text: string, timeZone: string, now: Date, filename?: string): Date {
  const time = parseScheduleTime(text, timeZone);
  if (!time) {
    throw new ScheduleValidationError('invalid_time', `Invalid time format: "${text}"`, filename);
  }
  if (time.getTime() <= now.getTime()) {
    const minutesAgo = Math.round((now.getTime() - time.getTime()) / 60000);
    throw new ScheduleValidationError('past_time', `Time is in the past (${minutesAgo} minutes ago)`, filename);
  }
  return time;
}

export function assertNoConflict(
  entries: readonly ScheduleEntry[],
  candidate: Date,
  timeZone: string,
  filename?: string
): void {
  const conflicts = findConflicts(entries, candidate, timeZone, filename);
  if (conflicts.length > 0) {
    throw new ScheduleValidationError(
      'conflict',
      `Time conflict with existing post(s): ${conflicts.join(', ')}`,
      filename
    );
  }
}
