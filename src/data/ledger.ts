/**
 * On-disk ledgers
 *
 * schedule.json holds the pending queue, processed.json the record of
 * completed publications. Both are whole JSON arrays: every mutation is a
 * load, an in-memory change and an atomic whole-file replace.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import writeFileAtomic from 'write-file-atomic';
import type { z } from 'zod';
import { ledgerLogger } from '../logging/index.js';
import { LedgerCorruptionError } from '../shared/errors.js';
import {
  processedDocumentSchema,
  scheduleDocumentSchema,
  type ProcessedEntry,
  type ScheduleEntry,
} from './types/scheduleEntry.js';

export const SCHEDULE_FILENAME = 'schedule.json';
export const PROCESSED_FILENAME = 'processed.json';

/**
 * A JSON array persisted as one document.
 *
 * Unreadable or wrongly shaped content reads as an empty list with a
 * warning. The next write first copies the bad document aside to
 * `<name>.corrupt-<timestamp>` so an empty list never silently replaces it.
 */
export class JsonLedger<T> {
  private corruption: LedgerCorruptionError | null = null;

  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T[], z.ZodTypeDef, unknown>,
    private readonly label: string
  ) { }

  read(): T[] {
    if (!existsSync(this.filePath)) {
      this.corruption = null;
      return [];
    }

    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      return this.markCorrupt(`could not be read: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (raw.trim() === '') {
      this.corruption = null;
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return this.markCorrupt(`is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return this.markCorrupt(`has an unexpected shape${where}: ${issue?.message ?? 'invalid document'}`);
    }

    this.corruption = null;
    return result.data;
  }

  write(entries: T[]): void {
    mkdirSync(dirname(this.filePath), { recursive: true });

    if (this.corruption && existsSync(this.filePath)) {
      const backupPath = `${this.filePath}.corrupt-${Date.now()}`;
      copyFileSync(this.filePath, backupPath);
      ledgerLogger.warn(
        { ledger: this.label, path: this.filePath, backupPath },
        `Replacing corrupt ${this.label} ledger; previous contents kept at ${backupPath}`
      );
    }

    writeFileAtomic.sync(this.filePath, `${JSON.stringify(entries, null, 2)}\n`, { encoding: 'utf8' });
    this.corruption = null;
  }

  /** The corruption seen on the last read, if any. */
  get lastCorruption(): LedgerCorruptionError | null {
    return this.corruption;
  }

  private markCorrupt(detail: string): T[] {
    this.corruption = new LedgerCorruptionError(`${this.label} ledger ${detail}`, this.filePath);
    ledgerLogger.warn(
      { ledger: this.label, path: this.filePath, detail },
      `${this.label} ledger is corrupt; treating it as empty`
    );
    return [];
  }
}

export class ScheduleLedger {
  private readonly store: JsonLedger<ScheduleEntry>;

  constructor(dataDir: string) {
    this.store = new JsonLedger(join(dataDir, SCHEDULE_FILENAME), scheduleDocumentSchema, 'schedule');
  }

  get filePath(): string {
    return this.store.filePath;
  }

  load(): ScheduleEntry[] {
    return this.store.read();
  }

  save(entries: ScheduleEntry[]): void {
    this.store.write(entries);
  }
}

export class ProcessedLedger {
  private readonly store: JsonLedger<ProcessedEntry>;

  constructor(dataDir: string) {
    this.store = new JsonLedger(join(dataDir, PROCESSED_FILENAME), processedDocumentSchema, 'processed');
  }

  get filePath(): string {
    return this.store.filePath;
  }

  load(): ProcessedEntry[] {
    return this.store.read();
  }

  append(entry: ProcessedEntry): void {
    const entries = this.store.read();
    entries.push(entry);
    this.store.write(entries);
  }

  /** Filenames with a confirmed publication. */
  publishedFilenames(): Set<string> {
    return new Set(this.load().filter(e => e.publishedUrl !== null).map(e => e.filename));
  }
}
