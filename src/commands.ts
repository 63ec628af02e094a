/**
 * Operator commands behind the slotpost CLI. Each returns the lines to print
 * so the CLI stays a thin dispatcher.
 */

import { resolve, basename } from 'path';
import type { IAccountReader } from './clients/types.js';
import { ConfigError } from './config/index.js';
import type { ProcessedEntry, ScheduleEntry } from './data/types/scheduleEntry.js';
import { validateImageFile } from './publish/imageValidation.js';
import { readSidecarCaption } from './publish/caption.js';
import type { RebalanceResult } from './schedule/rebalance.js';
import { formatIsoInZone, formatLocal, parseScheduleTime } from './schedule/timezone.js';
import { WeeklyTemplateError } from './schedule/weeklyTemplate.js';
import { ScheduleValidationError } from './shared/errors.js';
import type { CoreServices } from './services.js';
import { formatTable } from './setup/display.js';
import type { IPublishPipeline } from './worker/scheduler.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type FailureKind = 'usage' | 'validation' | 'config' | 'unexpected';

export interface CliFailure {
  kind: FailureKind;
  exitCode: 1 | 2;
}

/**
 * Exit status for a failed command: 2 for configuration problems, 1 for
 * everything else. Usage and validation failures are the operator's to fix
 * and are printed rather than logged as fatal.
 */
export function classifyFailure(error: unknown): CliFailure {
  if (error instanceof UsageError) return { kind: 'usage', exitCode: 1 };
  if (error instanceof ScheduleValidationError) return { kind: 'validation', exitCode: 1 };
  if (error instanceof ConfigError || error instanceof WeeklyTemplateError) return { kind: 'config', exitCode: 2 };
  return { kind: 'unexpected', exitCode: 1 };
}

export type EntryStatus = 'published' | 'started' | 'due' | 'pending' | 'invalid';

export interface QueueRow {
  filename: string;
  time: string;
  status: EntryStatus;
  hasCaption: boolean;
}

const MAX_CHANGES_SHOWN = 10;
const MAX_CAPTION_SHOWN = 40;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

async function requireValidImage(filePath: string): Promise<void> {
  const validation = await validateImageFile(filePath);
  if (!validation.ok) {
    throw new ScheduleValidationError('invalid_image', `Image rejected: ${validation.reason ?? 'invalid image'}`, basename(filePath));
  }
}

export function queueRows(
  entries: readonly ScheduleEntry[],
  processed: readonly ProcessedEntry[],
  now: Date,
  timeZone: string,
  all: boolean
): QueueRow[] {
  const processedByName = new Map(processed.map(p => [p.filename, p]));

  const rows = entries.map(entry => {
    const time = parseScheduleTime(entry.scheduledTime, timeZone);
    const done = processedByName.get(entry.filename);
    let status: EntryStatus;
    if (done) {
      status = done.publishedUrl !== null ? 'published' : 'started';
    } else if (!time) {
      status = 'invalid';
    } else {
      status = time.getTime() <= now.getTime() ? 'due' : 'pending';
    }
    return {
      row: {
        filename: entry.filename,
        time: time ? formatLocal(time, timeZone) : entry.scheduledTime,
        status,
        hasCaption: Boolean(entry.caption),
      },
      sortKey: time?.getTime() ?? Number.POSITIVE_INFINITY,
    };
  });

  return rows
    .filter(({ row }) => all || (row.status !== 'published' && row.status !== 'started'))
    .sort((a, b) => (a.sortKey - b.sortKey) || a.row.filename.localeCompare(b.row.filename))
    .map(({ row }) => row);
}

export function listCommand(services: CoreServices, options: { all: boolean; now: Date }): string[] {
  const rows = queueRows(
    services.scheduleLedger.load(),
    services.processedLedger.load(),
    options.now,
    services.timeZone,
    options.all
  );
  if (rows.length === 0) {
    return [options.all ? 'Schedule is empty.' : 'No pending posts.'];
  }
  return [
    ...formatTable(
      ['TIME', 'STATUS', 'CAPTION', 'FILE'],
      rows.map(r => [r.time, r.status, r.hasCaption ? 'yes' : '', r.filename])
    ),
    '',
    `${rows.length} post(s) (${services.timeZone})`,
  ];
}

export async function scheduleCommand(services: CoreServices, path: string, caption?: string): Promise<string[]> {
  const filePath = resolve(path);
  await requireValidImage(filePath);

  const effectiveCaption = caption ?? readSidecarCaption(filePath) ?? undefined;
  const result = services.coordinator.schedule(basename(filePath), filePath, effectiveCaption);
  switch (result.status) {
    case 'scheduled': {
      const time = parseScheduleTime(result.entry.scheduledTime, services.timeZone);
      return [`Scheduled ${result.entry.filename} for ${time ? formatLocal(time, services.timeZone) : result.entry.scheduledTime}`];
    }
    case 'already_scheduled':
      return [`${result.entry.filename} is already scheduled for ${result.entry.scheduledTime}`];
    case 'already_processed':
      return [`${result.processed.filename} was already processed at ${result.processed.processedAt}`];
  }
}

export function cancelCommand(services: CoreServices, filename: string): string[] {
  const removed = services.editor.cancel(filename);
  return [`Cancelled ${removed.filename} (was ${removed.scheduledTime})`];
}

export function rescheduleCommand(services: CoreServices, filename: string, newTime: string): string[] {
  const updated = services.editor.reschedule(filename, newTime);
  return [`Rescheduled ${updated.filename} to ${updated.scheduledTime}`];
}

export function captionCommand(services: CoreServices, filename: string, caption: string | null): string[] {
  services.editor.updateCaption(filename, caption);
  return [caption ? `Updated caption for ${filename}` : `Cleared caption for ${filename}`];
}

export function formatRebalanceResult(result: RebalanceResult, timeZone: string): string[] {
  const lines = [
    `Gaps found:    ${result.gapsFound}`,
    `Posts to move: ${result.entriesMoved}`,
    `Mode:          ${result.dryRun ? 'DRY RUN' : 'APPLIED'}`,
    '',
    result.message,
  ];

  const local = (iso: string): string => {
    const time = parseScheduleTime(iso, timeZone);
    return time ? formatLocal(time, timeZone) : iso;
  };

  if (result.changes.length > 0) {
    lines.push('', 'Changes:');
    for (const change of result.changes.slice(0, MAX_CHANGES_SHOWN)) {
      lines.push(`  ${change.filename}`, `    ${local(change.oldTime)} -> ${local(change.newTime)}`);
    }
    if (result.changes.length > MAX_CHANGES_SHOWN) {
      lines.push(`  ... and ${result.changes.length - MAX_CHANGES_SHOWN} more`);
    }
  }
  if (result.dryRun && result.entriesMoved > 0) {
    lines.push('', 'Run with --apply to save these changes.');
  }
  return lines;
}

export function nextSlotCommand(services: CoreServices): string[] {
  const slot = services.coordinator.previewNextSlot();
  return [`Next slot: ${formatLocal(slot, services.timeZone)} (${services.timeZone})`];
}

/**
 * Publish one image right away, outside the queue. The result is recorded in
 * processed.json like a scheduled post, so the scheduler skips the file if it
 * is also queued, and posting the same filename twice is refused.
 */
export async function postCommand(
  services: CoreServices,
  pipeline: IPublishPipeline,
  path: string,
  options: { caption?: string; now: Date }
): Promise<string[]> {
  const filePath = resolve(path);
  const filename = basename(filePath);
  await requireValidImage(filePath);

  const previous = services.processedLedger.load().find(p => p.filename === filename);
  if (previous) {
    throw new ScheduleValidationError('duplicate', `${filename} was already processed at ${previous.processedAt}`, filename);
  }

  const entry: ScheduleEntry = {
    filename,
    scheduledTime: formatIsoInZone(options.now, services.timeZone),
    originalPath: filePath,
    ...(options.caption ? { caption: options.caption } : {}),
  };
  const result = await pipeline.publish(entry);
  services.processedLedger.append({
    filename,
    scheduledTime: entry.scheduledTime,
    publishedUrl: result.publishedUrl,
    processedAt: formatIsoInZone(result.completedAt, services.timeZone),
  });

  const lines = [`Published ${filename}: ${result.publishedUrl}`];
  const queued = services.scheduleLedger.load().find(e => e.filename === filename);
  if (queued) {
    lines.push(`${filename} is still queued for ${queued.scheduledTime}; the scheduler will skip it.`);
  }
  return lines;
}

export async function accountInfoCommand(reader: IAccountReader): Promise<string[]> {
  const info = await reader.getAccountInfo();
  const show = (value: string | number | undefined): string => (value === undefined ? '-' : String(value));
  return [
    `Account:     ${info.id}`,
    `Username:    ${info.username ? `@${info.username}` : '-'}`,
    `Name:        ${show(info.name)}`,
    `Followers:   ${show(info.followersCount)}`,
    `Media count: ${show(info.mediaCount)}`,
  ];
}

export async function recentMediaCommand(reader: IAccountReader, limit: number, timeZone: string): Promise<string[]> {
  const media = await reader.listRecentMedia(limit);
  if (media.length === 0) {
    return ['No media found.'];
  }
  return formatTable(
    ['POSTED', 'TYPE', 'CAPTION', 'URL'],
    media.map(item => {
      const posted = item.timestamp ? parseScheduleTime(item.timestamp, timeZone) : null;
      return [
        posted ? formatLocal(posted, timeZone) : (item.timestamp ?? ''),
        item.mediaType ?? '',
        truncate((item.caption ?? '').replace(/\s+/g, ' ').trim(), MAX_CAPTION_SHOWN),
        item.permalink ?? '',
      ];
    })
  );
}
