import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ProcessedLedger, ScheduleLedger } from '../../src/data/ledger.js';
import { Rebalancer } from '../../src/schedule/rebalance.js';
import { DEFAULT_WEEKLY_SCHEDULE, WeeklyTemplate } from '../../src/schedule/weeklyTemplate.js';
import { makeTempDir } from '../helpers/fixtures.js';

const NY = 'America/New_York';
// Sunday 2026-10-25 10:00 EDT
const NOW = new Date('2026-10-25T14:00:00Z');

function post(filename: string, scheduledTime: string) {
  return { filename, scheduledTime, originalPath: `/inbox/${filename}` };
}

describe('Rebalancer', () => {
  let cleanup: () => void;
  let scheduleLedger: ScheduleLedger;
  let processedLedger: ProcessedLedger;
  let rebalancer: Rebalancer;

  beforeEach(() => {
    const tmp = makeTempDir();
    cleanup = tmp.cleanup;
    scheduleLedger = new ScheduleLedger(tmp.dir);
    processedLedger = new ProcessedLedger(tmp.dir);
    rebalancer = new Rebalancer({
      scheduleLedger,
      processedLedger,
      template: WeeklyTemplate.parse(DEFAULT_WEEKLY_SCHEDULE),
      timeZone: NY,
      clock: () => NOW,
    });
  });

  afterEach(() => cleanup());

  it('lists template slots after now', () => {
    const slots = rebalancer.expectedSlots(NOW, 2).map(d => d.toISOString());
    expect(slots).toEqual(['2026-10-25T22:00:00.000Z', '2026-10-26T11:00:00.000Z']);
  });

  it('reports a schedule without gaps', () => {
    scheduleLedger.save([post('a.jpg', '2026-10-25T18:00:00-04:00'), post('b.jpg', '2026-10-26T07:00:00-04:00')]);
    const result = rebalancer.rebalance(30, true);
    expect(result).toEqual({
      gapsFound: 0,
      entriesMoved: 0,
      changes: [],
      dryRun: true,
      message: 'No gaps found in schedule',
    });
  });

  describe('with gaps', () => {
    beforeEach(() => {
      scheduleLedger.save([
        post('a.jpg', '2026-10-26T07:00:00-04:00'),
        post('b.jpg', '2026-10-30T17:00:00-04:00'),
        post('c.jpg', '2026-11-01T18:00:00-05:00'),
        post('d.jpg', '2026-11-02T07:00:00-05:00'),
      ]);
    });

    it('plans moves of the latest entries into the earliest gaps without writing', () => {
      const result = rebalancer.rebalance(30, true);

      expect(result.gapsFound).toBe(3);
      expect(result.changes).toEqual([
        { filename: 'c.jpg', oldTime: '2026-11-01T18:00:00-05:00', newTime: '2026-10-25T18:00:00-04:00' },
        { filename: 'd.jpg', oldTime: '2026-11-02T07:00:00-05:00', newTime: '2026-10-28T11:00:00-04:00' },
      ]);
      expect(result.message).toBe('Would move 2 post(s) to fill 3 gap(s)');
      expect(scheduleLedger.load().map(e => e.scheduledTime)).toContain('2026-11-02T07:00:00-05:00');
    });

    it('applies the moves in time order and finds nothing on a second run', () => {
      const applied = rebalancer.rebalance(30, false);
      expect(applied.message).toBe('Moved 2 post(s) to fill gaps');
      expect(scheduleLedger.load().map(e => [e.filename, e.scheduledTime])).toEqual([
        ['c.jpg', '2026-10-25T18:00:00-04:00'],
        ['a.jpg', '2026-10-26T07:00:00-04:00'],
        ['d.jpg', '2026-10-28T11:00:00-04:00'],
        ['b.jpg', '2026-10-30T17:00:00-04:00'],
      ]);

      const again = rebalancer.rebalance(30, false);
      expect(again.entriesMoved).toBe(0);
      expect(again.message).toBe('No gaps found in schedule');
    });
  });

  it('never moves or drops an entry that was already processed', () => {
    scheduleLedger.save([
      post('a.jpg', '2026-10-26T07:00:00-04:00'),
      post('done.jpg', '2026-11-02T07:00:00-05:00'),
    ]);
    processedLedger.append({
      filename: 'done.jpg',
      scheduledTime: '2026-11-02T07:00:00-05:00',
      publishedUrl: 'https://www.instagram.com/p/xyz/',
      processedAt: '2026-11-02T07:00:09-05:00',
    });

    const result = rebalancer.rebalance(30, false);

    expect(result.changes).toEqual([
      { filename: 'a.jpg', oldTime: '2026-10-26T07:00:00-04:00', newTime: '2026-10-25T18:00:00-04:00' },
    ]);
    expect(scheduleLedger.load()).toEqual([
      post('a.jpg', '2026-10-25T18:00:00-04:00'),
      post('done.jpg', '2026-11-02T07:00:00-05:00'),
    ]);
  });
});
