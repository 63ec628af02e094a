import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ProcessedLedger, ScheduleLedger } from '../../src/data/ledger.js';
import type { ScheduleEntry } from '../../src/data/types/scheduleEntry.js';
import { IngestCoordinator } from '../../src/schedule/ingest.js';
import { WeeklyTemplate } from '../../src/schedule/weeklyTemplate.js';
import { makeTempDir } from '../helpers/fixtures.js';

const NY = 'America/New_York';
// Sunday 2026-10-25 10:00 EDT
const NOW = new Date('2026-10-25T14:00:00Z');

/** A ledger that sees another writer claim a slot between its first and second read. */
class RacingScheduleLedger extends ScheduleLedger {
  private reads = 0;

  constructor(dataDir: string, private readonly intruder: ScheduleEntry) {
    super(dataDir);
  }

  override load(): ScheduleEntry[] {
    this.reads++;
    if (this.reads === 2) {
      super.save([...super.load(), this.intruder]);
    }
    return super.load();
  }
}

describe('IngestCoordinator', () => {
  let dir: string;
  let cleanup: () => void;
  let scheduleLedger: ScheduleLedger;
  let processedLedger: ProcessedLedger;
  let coordinator: IngestCoordinator;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
    scheduleLedger = new ScheduleLedger(dir);
    processedLedger = new ProcessedLedger(dir);
    coordinator = new IngestCoordinator({
      scheduleLedger,
      processedLedger,
      template: WeeklyTemplate.parse('0:07:00'),
      timeZone: NY,
      clock: () => NOW,
    });
  });

  afterEach(() => cleanup());

  it('schedules new files into consecutive slots', () => {
    const first = coordinator.schedule('a.jpg', '/inbox/a.jpg');
    const second = coordinator.schedule('b.jpg', '/inbox/b.jpg', 'Autumn light');

    expect(first).toEqual({
      status: 'scheduled',
      entry: { filename: 'a.jpg', scheduledTime: '2026-10-26T07:00:00-04:00', originalPath: '/inbox/a.jpg' },
    });
    expect(second).toEqual({
      status: 'scheduled',
      entry: {
        filename: 'b.jpg',
        scheduledTime: '2026-11-02T07:00:00-05:00',
        originalPath: '/inbox/b.jpg',
        caption: 'Autumn light',
      },
    });
    expect(scheduleLedger.load().map(e => e.filename)).toEqual(['a.jpg', 'b.jpg']);
  });

  it('reports a filename that is already scheduled', () => {
    coordinator.schedule('a.jpg', '/inbox/a.jpg');
    const again = coordinator.schedule('a.jpg', '/elsewhere/a.jpg');

    expect(again.status).toBe('already_scheduled');
    expect(scheduleLedger.load()).toHaveLength(1);
    expect(scheduleLedger.load()[0].originalPath).toBe('/inbox/a.jpg');
  });

  it('reports a filename that was already processed', () => {
    processedLedger.append({
      filename: 'a.jpg',
      scheduledTime: '2026-10-19T07:00:00-04:00',
      publishedUrl: null,
      processedAt: '2026-10-19T07:00:04-04:00',
    });

    const result = coordinator.schedule('a.jpg', '/inbox/a.jpg');

    expect(result.status).toBe('already_processed');
    expect(scheduleLedger.load()).toEqual([]);
  });

  it('re-allocates when another writer takes the slot', () => {
    const racing = new RacingScheduleLedger(dir, {
      filename: 'other.jpg',
      scheduledTime: '2026-10-26T07:00:00-04:00',
      originalPath: '/inbox/other.jpg',
    });
    const raced = new IngestCoordinator({
      scheduleLedger: racing,
      processedLedger,
      template: WeeklyTemplate.parse('0:07:00'),
      timeZone: NY,
      clock: () => NOW,
    });

    const result = raced.schedule('a.jpg', '/inbox/a.jpg');

    expect(result.status).toBe('scheduled');
    expect(scheduleLedger.load().map(e => [e.filename, e.scheduledTime])).toEqual([
      ['other.jpg', '2026-10-26T07:00:00-04:00'],
      ['a.jpg', '2026-11-02T07:00:00-05:00'],
    ]);
  });

  it('previews the next slot without writing', () => {
    expect(coordinator.previewNextSlot().toISOString()).toBe('2026-10-26T11:00:00.000Z');
    expect(scheduleLedger.load()).toEqual([]);
  });
});
