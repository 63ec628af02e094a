import { copyFileSync, existsSync, mkdirSync, renameSync, unlinkSync } from 'fs';
import { basename, join } from 'path';
import type { ProcessedLedger } from '../data/ledger.js';
import { moverLogger, serializeError } from '../logging/index.js';
import { sidecarPathFor } from '../publish/caption.js';
import { DelayUtils } from './DelayUtils.js';

/**
 * rename(2), falling back to copy and unlink when the archive lives on
 * another filesystem.
 */
export function moveFile(source: string, destination: string): void {
  try {
    renameSync(source, destination);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
      copyFileSync(source, destination);
      unlinkSync(source);
      return;
    }
    throw error;
  }
}

export interface ArchiveMoverOptions {
  processedLedger: ProcessedLedger;
  watchDir: string;
  archiveDir: string;
  pollMs: number;
  cooldownMs?: number;
}

/**
 * Moves published images (and their caption files) out of the watch folder.
 */
export class ArchiveMover {
  private readonly moved = new Set<string>();

  constructor(private readonly options: ArchiveMoverOptions) { }

  /** Move every newly published file; returns the filenames moved. */
  sweep(): string[] {
    const { processedLedger, watchDir, archiveDir } = this.options;
    const movedNow: string[] = [];

    for (const entry of processedLedger.load()) {
      if (entry.publishedUrl === null || this.moved.has(entry.filename)) continue;

      const source = join(watchDir, entry.filename);
      if (!existsSync(source)) {
        this.moved.add(entry.filename);
        continue;
      }

      try {
        mkdirSync(archiveDir, { recursive: true });
        moveFile(source, join(archiveDir, entry.filename));

        const sidecar = sidecarPathFor(source);
        if (existsSync(sidecar)) {
          moveFile(sidecar, join(archiveDir, basename(sidecar)));
        }

        this.moved.add(entry.filename);
        movedNow.push(entry.filename);
        moverLogger.info({ filename: entry.filename, archiveDir }, 'Archived published file');
      } catch (error) {
        moverLogger.warn({ filename: entry.filename, error: serializeError(error) }, 'Failed to archive file, will retry');
      }
    }
    return movedNow;
  }

  async run(options: { signal?: AbortSignal } = {}): Promise<void> {
    const { signal } = options;
    const { pollMs, cooldownMs = 30000 } = this.options;
    moverLogger.info({ watchDir: this.options.watchDir, archiveDir: this.options.archiveDir, pollMs }, 'Archive mover started');

    while (!signal?.aborted) {
      try {
        this.sweep();
        await DelayUtils.sleep(pollMs, signal);
      } catch (error) {
        await DelayUtils.handleCriticalErrorDelay(error, cooldownMs, signal);
      }
    }
    moverLogger.info('Archive mover stopped');
  }
}
