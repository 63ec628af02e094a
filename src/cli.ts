#!/usr/bin/env node
/**
 * slotpost CLI
 *
 * Operator commands for the posting queue, plus the three long-running
 * roles (scheduler, watcher, mover).
 *
 * Usage:
 *   slotpost list [--all]
 *   slotpost schedule <path> [--caption <text>]
 *   slotpost cancel <filename>
 *   slotpost reschedule <filename> <time>
 *   slotpost caption <filename> <text> | --clear
 *   slotpost rebalance [--apply] [--days N]
 *   slotpost next-slot
 *   slotpost post <path> [--caption <text>]
 *   slotpost account-info | recent-media [--limit N]
 *   slotpost scheduler | watcher [dir] | mover [src] [dst]
 */

import './env/index.js';
import { parseArgs } from 'util';
import {
  getFastMode,
  getMoverPollMs,
  getOptionalArchiveDir,
  getOptionalWatchDir,
  getSchedulerCooldownMs,
} from './config/index.js';
import {
  UsageError,
  accountInfoCommand,
  cancelCommand,
  captionCommand,
  classifyFailure,
  formatRebalanceResult,
  listCommand,
  nextSlotCommand,
  postCommand,
  recentMediaCommand,
  rescheduleCommand,
  scheduleCommand,
} from './commands.js';
import { exitWithCode, flushLogger, logger } from './logging/index.js';
import { createAccountReader, createCoreServices, createPublishPipeline } from './services.js';
import { printError, printHeader, printStep } from './setup/display.js';
import { clearStopFile, getMaxCycles, shouldStop } from './worker/cycleControl.js';
import { acquireInstanceLock, type RoleName } from './worker/instanceLock.js';
import { ArchiveMover } from './worker/mover.js';
import { SchedulerLoop } from './worker/scheduler.js';
import { IngestWatcher } from './worker/watcher.js';

const cliLogger = logger.child({ component: 'CLI' });

function printHelp(): void {
  console.log(`
slotpost - publish a folder of images to Instagram on a weekly slot schedule

Usage:
  slotpost <command> [options]

Queue commands:
  list [--all]                       Show pending posts (--all includes published)
  schedule <path> [--caption <text>] Add an image to the queue
  cancel <filename>                  Remove a pending post
  reschedule <filename> <time>       Move a post (ISO-8601; no offset = configured zone)
  caption <filename> <text>          Set a post's caption
  caption <filename> --clear         Remove a post's caption
  rebalance [--apply] [--days N]     Pull trailing posts into empty slots (dry run by default)
  next-slot                          Show the slot the next image would get

Account commands:
  post <path> [--caption <text>]     Publish an image now, outside the queue
  account-info                       Show the business account
  recent-media [--limit N]           List recent posts (default 5)

Roles:
  scheduler                          Publish due posts every minute
  watcher [dir]                      Schedule images dropped into dir (default WATCH_DIR)
  mover [src] [dst]                  Archive published images (defaults WATCH_DIR, ARCHIVE_DIR)

Examples:
  slotpost schedule ./inbox/sunset.jpg --caption "Golden hour"
  slotpost reschedule sunset.jpg 2026-11-02T09:30
  slotpost rebalance --apply
`);
}

function requirePositional(positionals: string[], index: number, name: string): string {
  const value = positionals[index];
  if (!value) {
    throw new UsageError(`Missing <${name}>`);
  }
  return value;
}

function parsePositiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1 || String(value) !== raw.trim()) {
    throw new UsageError(`--${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function installShutdownSignals(role: RoleName): AbortController {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    cliLogger.info({ role, signal }, 'Shutdown signal received, finishing current work');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return controller;
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
}

async function runScheduler(): Promise<void> {
  const services = createCoreServices();
  const pipeline = createPublishPipeline();
  const lock = acquireInstanceLock('scheduler', services.dataDir);
  const controller = installShutdownSignals('scheduler');

  if (clearStopFile()) {
    cliLogger.info('Removed stop file left by a previous run');
  }

  try {
    const loop = new SchedulerLoop({
      scheduleLedger: services.scheduleLedger,
      processedLedger: services.processedLedger,
      pipeline,
      timeZone: services.timeZone,
      fastMode: getFastMode(),
      cooldownMs: getSchedulerCooldownMs(),
      maxCycles: getMaxCycles(),
      shouldStop,
    });
    printStep('active', 'Scheduler running', `${services.template.describe()} (${services.timeZone})`);
    await loop.run({ signal: controller.signal });
  } finally {
    lock.release();
  }
}

async function runWatcher(dirArg: string | undefined): Promise<void> {
  const watchDir = dirArg ?? getOptionalWatchDir();
  if (!watchDir) {
    throw new UsageError('watcher needs a directory (argument or WATCH_DIR)');
  }

  const services = createCoreServices();
  const lock = acquireInstanceLock('watcher', services.dataDir);
  const controller = installShutdownSignals('watcher');
  const watcher = new IngestWatcher({ watchDir, coordinator: services.coordinator });

  try {
    await watcher.start();
    printStep('active', 'Watching for images', watchDir);
    await waitForAbort(controller.signal);
  } finally {
    await watcher.stop();
    lock.release();
  }
}

async function runMover(srcArg: string | undefined, dstArg: string | undefined): Promise<void> {
  const watchDir = srcArg ?? getOptionalWatchDir();
  const archiveDir = dstArg ?? getOptionalArchiveDir();
  if (!watchDir || !archiveDir) {
    throw new UsageError('mover needs a source and an archive directory (arguments or WATCH_DIR/ARCHIVE_DIR)');
  }

  const services = createCoreServices();
  const lock = acquireInstanceLock('mover', services.dataDir);
  const controller = installShutdownSignals('mover');

  try {
    const mover = new ArchiveMover({
      processedLedger: services.processedLedger,
      watchDir,
      archiveDir,
      pollMs: getMoverPollMs(),
      cooldownMs: getSchedulerCooldownMs(),
    });
    printStep('active', 'Archiving published images', `${watchDir} -> ${archiveDir}`);
    await mover.run({ signal: controller.signal });
  } finally {
    lock.release();
  }
}

async function dispatch(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      all: { type: 'boolean', default: false },
      apply: { type: 'boolean', default: false },
      days: { type: 'string' },
      limit: { type: 'string', short: 'n' },
      caption: { type: 'string', short: 'c' },
      clear: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });

  const [command, ...args] = positionals;
  if (!command || values.help || command === 'help') {
    printHelp();
    return;
  }

  const print = (lines: string[]) => lines.forEach(line => console.log(line));

  switch (command) {
    case 'list':
      print(listCommand(createCoreServices(), { all: values.all ?? false, now: new Date() }));
      return;
    case 'schedule':
      print(await scheduleCommand(createCoreServices(), requirePositional(args, 0, 'path'), values.caption));
      return;
    case 'cancel':
      print(cancelCommand(createCoreServices(), requirePositional(args, 0, 'filename')));
      return;
    case 'reschedule':
      print(rescheduleCommand(
        createCoreServices(),
        requirePositional(args, 0, 'filename'),
        requirePositional(args, 1, 'time')
      ));
      return;
    case 'caption': {
      const filename = requirePositional(args, 0, 'filename');
      const text = values.clear ? null : requirePositional(args, 1, 'text');
      print(captionCommand(createCoreServices(), filename, text));
      return;
    }
    case 'rebalance': {
      const services = createCoreServices();
      const result = services.rebalancer.rebalance(parsePositiveInt('days', values.days), !values.apply);
      printHeader('Rebalance');
      print(formatRebalanceResult(result, services.timeZone));
      return;
    }
    case 'next-slot':
      print(nextSlotCommand(createCoreServices()));
      return;
    case 'post': {
      const path = requirePositional(args, 0, 'path');
      print(await postCommand(createCoreServices(), createPublishPipeline(), path, { caption: values.caption, now: new Date() }));
      return;
    }
    case 'account-info':
      printHeader('Instagram account');
      print(await accountInfoCommand(createAccountReader()));
      return;
    case 'recent-media': {
      const limit = parsePositiveInt('limit', values.limit) ?? 5;
      const services = createCoreServices();
      printHeader(`Recent media (up to ${limit})`);
      print(await recentMediaCommand(createAccountReader(), limit, services.timeZone));
      return;
    }
    case 'scheduler':
      await runScheduler();
      return;
    case 'watcher':
      await runWatcher(args[0]);
      return;
    case 'mover':
      await runMover(args[0], args[1]);
      return;
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

async function main(): Promise<void> {
  try {
    await dispatch(process.argv.slice(2));
    await flushLogger();
  } catch (error) {
    const failure = classifyFailure(error);
    const message = error instanceof Error ? error.message : String(error);
    if (failure.kind === 'usage' || failure.kind === 'validation') {
      printError(message, failure.kind === 'usage' ? 'Run "slotpost help" for usage.' : undefined);
      await flushLogger();
      process.exitCode = failure.exitCode;
      return;
    }
    exitWithCode(failure.exitCode, message, error instanceof Error ? error : undefined);
  }
}

void main();
