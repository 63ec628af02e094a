import type { FSWatcher } from 'chokidar';
import chokidar from 'chokidar';
import { readdirSync } from 'fs';
import { basename, extname, join, resolve } from 'path';
import { ingestLogger, serializeError } from '../logging/index.js';
import { readSidecarCaption } from '../publish/caption.js';
import { validateImageFile, type ImageValidationResult } from '../publish/imageValidation.js';
import type { IngestResult } from '../schedule/ingest.js';

export const SUPPORTED_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png']);

export function isSupportedImage(path: string): boolean {
  const name = basename(path);
  return !name.startsWith('.') && SUPPORTED_EXTENSIONS.has(extname(name).toLowerCase());
}

export interface IIngestCoordinator {
  schedule(filename: string, originalPath: string, caption?: string): IngestResult;
}

export type IngestOutcome =
  | IngestResult['status']
  | 'unsupported'
  | 'invalid'
  | 'error';

export interface IngestWatcherOptions {
  watchDir: string;
  coordinator: IIngestCoordinator;
  validate?: (path: string) => Promise<ImageValidationResult>;
  stabilityThresholdMs?: number;
}

/**
 * Feeds new images in a directory to the ingest coordinator. Existing files
 * are ingested first, in name order; after that chokidar reports additions.
 * Ingests run one at a time so slots are assigned in arrival order.
 */
export class IngestWatcher {
  private watcher?: FSWatcher | undefined;
  private queue: Promise<void> = Promise.resolve();
  private readonly watchDir: string;
  private readonly validate: (path: string) => Promise<ImageValidationResult>;

  constructor(private readonly options: IngestWatcherOptions) {
    this.watchDir = resolve(options.watchDir);
    this.validate = options.validate ?? validateImageFile;
  }

  async ingestFile(path: string): Promise<IngestOutcome> {
    const filePath = resolve(path);
    const filename = basename(filePath);
    if (!isSupportedImage(filePath)) {
      return 'unsupported';
    }

    try {
      const validation = await this.validate(filePath);
      if (!validation.ok) {
        ingestLogger.warn({ filename, reason: validation.reason }, 'Image failed validation, not scheduling');
        return 'invalid';
      }

      const caption = readSidecarCaption(filePath) ?? undefined;
      const result = this.options.coordinator.schedule(filename, filePath, caption);
      return result.status;
    } catch (error) {
      ingestLogger.error({ filename, error: serializeError(error) }, 'Failed to schedule image');
      return 'error';
    }
  }

  /** Queue `path` behind any ingest already running. */
  enqueue(path: string): Promise<IngestOutcome> {
    const run = this.queue.then(() => this.ingestFile(path));
    this.queue = run.then(() => undefined);
    return run;
  }

  async scanExisting(): Promise<IngestOutcome[]> {
    const names = readdirSync(this.watchDir)
      .filter(isSupportedImage)
      .sort((a, b) => a.localeCompare(b));
    ingestLogger.info({ watchDir: this.watchDir, count: names.length }, 'Scheduling existing files');

    const outcomes: IngestOutcome[] = [];
    for (const name of names) {
      outcomes.push(await this.enqueue(join(this.watchDir, name)));
    }
    return outcomes;
  }

  async start(): Promise<void> {
    if (this.watcher) {
      ingestLogger.debug('Already watching directory');
      return;
    }

    await this.scanExisting();

    this.watcher = chokidar.watch(this.watchDir, {
      ignored: /(^|[/\\])\../, // ignore dotfiles
      ignoreInitial: true,
      persistent: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold: this.options.stabilityThresholdMs ?? 2000,
        pollInterval: 100,
      },
    });

    this.watcher
      .on('add', (path) => void this.handleEvent('add', path))
      .on('change', (path) => void this.handleEvent('change', path))
      .on('error', (error) => ingestLogger.error({ error: serializeError(error) }, 'Watcher error'));

    ingestLogger.info({ watchDir: this.watchDir }, 'Watching for new images');
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = undefined;
      ingestLogger.info('Stopped directory watch');
    }
    await this.queue;
  }

  private async handleEvent(event: 'add' | 'change', path: string): Promise<void> {
    if (!isSupportedImage(path)) return;
    ingestLogger.debug({ event, path }, 'File change detected');
    const outcome = await this.enqueue(path);
    ingestLogger.debug({ event, path, outcome }, 'File handled');
  }
}
