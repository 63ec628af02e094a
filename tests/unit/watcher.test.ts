import { writeFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { IngestResult } from '../../src/schedule/ingest.js';
import { IngestWatcher, isSupportedImage } from '../../src/worker/watcher.js';
import { makeTempDir } from '../helpers/fixtures.js';

function fakeCoordinator() {
  return {
    schedule: vi.fn((filename: string, originalPath: string, _caption?: string): IngestResult => ({
      status: 'scheduled',
      entry: { filename, scheduledTime: '2026-10-26T07:00:00-04:00', originalPath },
    })),
  };
}

const accept = async () => ({ ok: true });

describe('isSupportedImage', () => {
  it.each([
    ['photo.jpg', true],
    ['photo.JPEG', true],
    ['photo.png', true],
    ['.photo.jpg', false],
    ['photo.gif', false],
    ['photo.txt', false],
  ])('%s -> %s', (name, expected) => {
    expect(isSupportedImage(`/inbox/${name}`)).toBe(expected);
  });
});

describe('IngestWatcher', () => {
  let dir: string;
  let cleanup: () => void;
  let coordinator: ReturnType<typeof fakeCoordinator>;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
    coordinator = fakeCoordinator();
  });

  afterEach(() => cleanup());

  it('schedules existing images in name order with sidecar captions', async () => {
    for (const name of ['b.jpg', 'a.png', 'c.jpeg', 'notes.txt', '.hidden.jpg']) {
      writeFileSync(join(dir, name), 'x');
    }
    writeFileSync(join(dir, 'b.txt'), 'Caption for b\n');
    const watcher = new IngestWatcher({ watchDir: dir, coordinator, validate: accept });

    const outcomes = await watcher.scanExisting();

    expect(outcomes).toEqual(['scheduled', 'scheduled', 'scheduled']);
    expect(coordinator.schedule.mock.calls).toEqual([
      ['a.png', join(dir, 'a.png'), undefined],
      ['b.jpg', join(dir, 'b.jpg'), 'Caption for b'],
      ['c.jpeg', join(dir, 'c.jpeg'), undefined],
    ]);
  });

  it('does not schedule an image that fails validation', async () => {
    const watcher = new IngestWatcher({
      watchDir: dir,
      coordinator,
      validate: async () => ({ ok: false, reason: 'Image too small: 100x100 (min 320x320)' }),
    });

    await expect(watcher.ingestFile(join(dir, 'tiny.jpg'))).resolves.toBe('invalid');
    expect(coordinator.schedule).not.toHaveBeenCalled();
  });

  it('ignores unsupported files', async () => {
    const watcher = new IngestWatcher({ watchDir: dir, coordinator, validate: accept });
    await expect(watcher.ingestFile(join(dir, 'clip.mov'))).resolves.toBe('unsupported');
  });

  it('reports a coordinator failure as an error outcome', async () => {
    coordinator.schedule.mockImplementation(() => {
      throw new Error('No available time slot found');
    });
    const watcher = new IngestWatcher({ watchDir: dir, coordinator, validate: accept });

    await expect(watcher.ingestFile(join(dir, 'a.jpg'))).resolves.toBe('error');
  });

  it('runs queued ingests one at a time in arrival order', async () => {
    const slowFirst = async (path: string) => {
      if (path.endsWith('first.jpg')) {
        await new Promise(resolve => setTimeout(resolve, 30));
      }
      return { ok: true };
    };
    const watcher = new IngestWatcher({ watchDir: dir, coordinator, validate: slowFirst });

    await Promise.all([watcher.enqueue(join(dir, 'first.jpg')), watcher.enqueue(join(dir, 'second.jpg'))]);

    expect(coordinator.schedule.mock.calls.map(([filename]) => filename)).toEqual(['first.jpg', 'second.jpg']);
  });

  it('picks up images added after start', async () => {
    const watcher = new IngestWatcher({ watchDir: dir, coordinator, validate: accept, stabilityThresholdMs: 50 });
    await watcher.start();
    try {
      writeFileSync(join(dir, 'new.jpg'), 'x');
      await vi.waitFor(() => {
        expect(coordinator.schedule).toHaveBeenCalledWith('new.jpg', join(dir, 'new.jpg'), undefined);
      }, { timeout: 5000, interval: 50 });
    } finally {
      await watcher.stop();
    }
  });
});
