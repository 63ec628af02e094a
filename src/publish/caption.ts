import { existsSync, readFileSync } from 'fs';
import { basename, dirname, extname, join } from 'path';
import sharp from 'sharp';
import { publishLogger } from '../logging/index.js';

const IPTC_TAG_MARKER = 0x1c;
const IPTC_APPLICATION_RECORD = 2;
const IPTC_CAPTION_DATASET = 120;

export type CaptionSource = 'embedded' | 'sidecar' | 'entry' | 'none';

export interface ResolvedCaption {
  text: string;
  source: CaptionSource;
}

/**
 * Pull the Caption/Abstract (2:120) dataset out of an IPTC block. Works on a
 * bare IIM stream and on one wrapped in Photoshop image resources.
 */
export function parseIptcCaption(block: Buffer): string | null {
  for (let i = 0; i + 5 <= block.length; i++) {
    if (
      block[i] !== IPTC_TAG_MARKER
      || block[i + 1] !== IPTC_APPLICATION_RECORD
      || block[i + 2] !== IPTC_CAPTION_DATASET
    ) {
      continue;
    }
    const length = block.readUInt16BE(i + 3);
    // Extended-length datasets are not used for captions
    if (length & 0x8000) return null;
    const start = i + 5;
    const text = block.subarray(start, Math.min(start + length, block.length)).toString('utf8').trim();
    return text.length > 0 ? text : null;
  }
  return null;
}

export async function readEmbeddedCaption(imagePath: string): Promise<string | null> {
  const metadata = await sharp(imagePath).metadata();
  return metadata.iptc ? parseIptcCaption(metadata.iptc) : null;
}

export function sidecarPathFor(imagePath: string): string {
  return join(dirname(imagePath), `${basename(imagePath, extname(imagePath))}.txt`);
}

export function readSidecarCaption(imagePath: string): string | null {
  const sidecar = sidecarPathFor(imagePath);
  if (!existsSync(sidecar)) return null;
  try {
    const text = readFileSync(sidecar, 'utf8').trim();
    return text.length > 0 ? text : null;
  } catch (error) {
    publishLogger.warn({ sidecar, error: error instanceof Error ? error.message : String(error) }, 'Failed to read caption file');
    return null;
  }
}

/**
 * Caption precedence: embedded IPTC caption, sidecar .txt, the entry's
 * own caption, then empty.
 */
export async function resolveCaption(
  imagePath: string,
  entryCaption: string | undefined,
  readEmbedded: (path: string) => Promise<string | null> = readEmbeddedCaption
): Promise<ResolvedCaption> {
  try {
    const embedded = await readEmbedded(imagePath);
    if (embedded) return { text: embedded, source: 'embedded' };
  } catch (error) {
    publishLogger.debug({ imagePath, error: error instanceof Error ? error.message : String(error) }, 'No embedded caption');
  }

  const sidecar = readSidecarCaption(imagePath);
  if (sidecar) return { text: sidecar, source: 'sidecar' };

  if (entryCaption) return { text: entryCaption, source: 'entry' };

  return { text: '', source: 'none' };
}
