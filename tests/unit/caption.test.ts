import { writeFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseIptcCaption, resolveCaption, sidecarPathFor } from '../../src/publish/caption.js';
import { makeTempDir } from '../helpers/fixtures.js';

function dataset(record: number, tag: number, text: string): Buffer {
  const body = Buffer.from(text, 'utf8');
  const header = Buffer.from([0x1c, record, tag, 0, 0]);
  header.writeUInt16BE(body.length, 3);
  return Buffer.concat([header, body]);
}

describe('parseIptcCaption', () => {
  it('finds the caption dataset after other datasets', () => {
    const block = Buffer.concat([
      dataset(2, 5, 'Object name'),
      dataset(2, 120, 'Fog over the bridge'),
      dataset(2, 25, 'keyword'),
    ]);
    expect(parseIptcCaption(block)).toBe('Fog over the bridge');
  });

  it('decodes UTF-8', () => {
    expect(parseIptcCaption(dataset(2, 120, 'Café ☕'))).toBe('Café ☕');
  });

  it('finds the caption inside a Photoshop resource wrapper', () => {
    const wrapped = Buffer.concat([Buffer.from('Photoshop 3.0\x008BIM\x04\x04\x00\x00', 'latin1'), dataset(2, 120, 'Wrapped')]);
    expect(parseIptcCaption(wrapped)).toBe('Wrapped');
  });

  it('returns null without a caption or with a blank one', () => {
    expect(parseIptcCaption(dataset(2, 5, 'Only a title'))).toBeNull();
    expect(parseIptcCaption(dataset(2, 120, '   '))).toBeNull();
    expect(parseIptcCaption(Buffer.alloc(0))).toBeNull();
  });
});

describe('resolveCaption', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => cleanup());

  it('puts the sidecar next to the image', () => {
    expect(sidecarPathFor('/photos/trip/sunset.final.jpg')).toBe('/photos/trip/sunset.final.txt');
  });

  it('prefers the embedded caption', async () => {
    const image = join(dir, 'a.jpg');
    writeFileSync(join(dir, 'a.txt'), 'Sidecar');
    await expect(resolveCaption(image, 'Entry', async () => 'Embedded')).resolves.toEqual({
      text: 'Embedded',
      source: 'embedded',
    });
  });

  it('falls back to the sidecar when metadata cannot be read', async () => {
    const image = join(dir, 'a.jpg');
    writeFileSync(join(dir, 'a.txt'), '  Sidecar text\n');
    const unreadable = async (): Promise<string | null> => {
      throw new Error('Input file is missing');
    };
    await expect(resolveCaption(image, 'Entry', unreadable)).resolves.toEqual({ text: 'Sidecar text', source: 'sidecar' });
  });

  it('uses the entry caption, then nothing', async () => {
    const image = join(dir, 'b.jpg');
    const none = async () => null;
    await expect(resolveCaption(image, 'Entry', none)).resolves.toEqual({ text: 'Entry', source: 'entry' });
    await expect(resolveCaption(image, undefined, none)).resolves.toEqual({ text: '', source: 'none' });
  });
});
