/**
 * Scheduler loop
 *
 * Wakes on every wall-clock minute, reloads both ledgers, and publishes each
 * due entry that is neither in processed.json nor already in flight in this
 * process. schedule.json is never modified here: processed.json alone
 * records that a post is done.
 */

import { existsSync } from 'fs';
import type { ProcessedLedger, ScheduleLedger } from '../data/ledger.js';
import type { ProcessedEntry, ScheduleEntry } from '../data/types/scheduleEntry.js';
import { formatDuration, schedulerLogger, serializeError } from '../logging/index.js';
import type { PublishResult } from '../publish/pipeline.js';
import { formatIsoInZone } from '../schedule/timezone.js';
import { entryTime } from '../schedule/validation.js';
import { DelayUtils } from './DelayUtils.js';
import { ProcessingLock } from './processingLock.js';

export interface IPublishPipeline {
  publish(entry: ScheduleEntry): Promise<PublishResult>;
}

export interface TickFailure {
  filename: string;
  reason: string;
  errorType: string;
}

export interface TickSummary {
  checked: number;
  due: number;
  published: string[];
  failed: TickFailure[];
  missingFiles: string[];
  invalidTimes: string[];
}

export interface SchedulerLoopDeps {
  scheduleLedger: ScheduleLedger;
  processedLedger: ProcessedLedger;
  pipeline: IPublishPipeline;
  timeZone: string;
  /** Treat every pending entry as due */
  fastMode?: boolean;
  clock?: () => Date;
  fileExists?: (path: string) => boolean;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  cooldownMs?: number;
  maxCycles?: number;
  shouldStop?: () => boolean;
}

export const DEFAULT_COOLDOWN_MS = 30000;

export class SchedulerLoop {
  private readonly lock = new ProcessingLock();
  private readonly clock: () => Date;
  private readonly fileExists: (path: string) => boolean;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly deps: SchedulerLoopDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.fileExists = deps.fileExists ?? existsSync;
    this.sleep = deps.sleep ?? ((ms, signal) => DelayUtils.sleep(ms, signal));
  }

  /** Filenames this process has started publishing and not yet seen in processed.json. */
  get inFlight(): string[] {
    return this.lock.snapshot();
  }

  async tick(now: Date = this.clock()): Promise<TickSummary> {
    const { scheduleLedger, processedLedger, timeZone, fastMode = false } = this.deps;

    const entries = scheduleLedger.load();
    const processedNames = new Set(processedLedger.load().map(p => p.filename));

    // Once processed.json lists a filename the lock has nothing left to guard
    for (const filename of this.lock.snapshot()) {
      if (processedNames.has(filename)) this.lock.release(filename);
    }

    const summary: TickSummary = {
      checked: entries.length,
      due: 0,
      published: [],
      failed: [],
      missingFiles: [],
      invalidTimes: [],
    };

    const due: Array<{ entry: ScheduleEntry; time: Date }> = [];
    for (const entry of entries) {
      if (processedNames.has(entry.filename) || this.lock.has(entry.filename)) continue;

      const time = entryTime(entry, timeZone);
      if (!time) {
        schedulerLogger.warn({ filename: entry.filename, scheduledTime: entry.scheduledTime }, 'Skipping entry with invalid scheduled time');
        summary.invalidTimes.push(entry.filename);
        continue;
      }
      if (fastMode || time.getTime() <= now.getTime()) {
        due.push({ entry, time });
      }
    }
    due.sort((a, b) => a.time.getTime() - b.time.getTime());
    summary.due = due.length;

    for (const { entry } of due) {
      if (!this.fileExists(entry.originalPath)) {
        schedulerLogger.warn({ filename: entry.filename, path: entry.originalPath }, 'Source file missing, skipping until it is restored or cancelled');
        summary.missingFiles.push(entry.filename);
        continue;
      }
      if (!this.lock.acquire(entry.filename)) continue;

      const outcome = await this.publishEntry(entry);
      if (outcome.ok) {
        summary.published.push(entry.filename);
      } else {
        summary.failed.push(outcome.failure);
      }
    }

    if (summary.due > 0) {
      schedulerLogger.info(
        {
          due: summary.due,
          published: summary.published.length,
          failed: summary.failed.length,
          missing: summary.missingFiles.length,
        },
        'Tick complete'
      );
    }
    return summary;
  }

  private async publishEntry(entry: ScheduleEntry): Promise<{ ok: true } | { ok: false; failure: TickFailure }> {
    const { filename } = entry;
    const startedAt = Date.now();
    schedulerLogger.info({ filename, scheduledTime: entry.scheduledTime }, 'Publishing');

    let result: PublishResult;
    try {
      result = await this.deps.pipeline.publish(entry);
    } catch (error) {
      this.lock.release(filename);
      const reason = error instanceof Error ? error.message : String(error);
      schedulerLogger.failed(filename, reason);
      return { ok: false, failure: { filename, reason, errorType: error instanceof Error ? error.name : 'Error' } };
    }

    const record: ProcessedEntry = {
      filename,
      scheduledTime: entry.scheduledTime,
      publishedUrl: result.publishedUrl,
      processedAt: formatIsoInZone(result.completedAt, this.deps.timeZone),
    };
    try {
      this.deps.processedLedger.append(record);
    } catch (error) {
      // The post is live: keep the lock so this process never posts it again
      schedulerLogger.error(
        { filename, publishedUrl: result.publishedUrl, error: serializeError(error) },
        'Published but could not record in processed ledger'
      );
    }

    schedulerLogger.published(filename, result.publishedUrl);
    schedulerLogger.debug({ filename, duration: formatDuration(Date.now() - startedAt) }, 'Publish finished');
    return { ok: true };
  }

  /**
   * Tick on every minute boundary until `signal` aborts, the stop check
   * fires or the cycle cap is reached. A tick that throws is logged and
   * followed by a cooldown; it never ends the loop.
   */
  async run(options: { signal?: AbortSignal } = {}): Promise<number> {
    const { signal } = options;
    const { maxCycles, shouldStop = () => false, cooldownMs = DEFAULT_COOLDOWN_MS } = this.deps;
    let cycles = 0;

    schedulerLogger.info({ fastMode: this.deps.fastMode ?? false, maxCycles }, 'Scheduler started');

    for (; ;) {
      if (signal?.aborted) {
        schedulerLogger.info('Shutdown requested - exiting scheduler loop');
        break;
      }
      if (shouldStop()) {
        schedulerLogger.info('Stop file detected - exiting scheduler loop');
        break;
      }

      let tickFailed = false;
      try {
        await this.tick();
      } catch (error) {
        tickFailed = true;
        schedulerLogger.error(
          { error: serializeError(error), cooldownMs },
          `Error in scheduler tick. Waiting ${formatDuration(cooldownMs)} before retrying.`
        );
      }

      cycles++;
      if (maxCycles !== undefined && cycles >= maxCycles) {
        schedulerLogger.info({ cycles, maxCycles }, 'Reached maximum cycles - stopping scheduler');
        break;
      }
      if (signal?.aborted) continue;

      await this.sleep(tickFailed ? cooldownMs : DelayUtils.msUntilNextMinute(this.clock()), signal);
    }

    return cycles;
  }
}
