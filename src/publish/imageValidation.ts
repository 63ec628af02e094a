import { existsSync, statSync } from 'fs';
import sharp from 'sharp';

// Instagram content publishing limits for single images
export const MIN_DIMENSION = 320;
export const MAX_DIMENSION = 1440;
export const MAX_FILE_SIZE_MB = 8;
export const MAX_FILE_SIZE_BYTES = MAX_FILE_SIZE_MB * 1024 * 1024;
export const MIN_ASPECT_RATIO = 0.8;
export const MAX_ASPECT_RATIO = 1.91;

const SUPPORTED_FORMATS = new Set(['jpeg', 'png']);

export interface ImageValidationResult {
  ok: boolean;
  reason?: string;
}

export interface ImageProperties {
  sizeBytes: number;
  width: number;
  height: number;
  format: string | undefined;
}

export interface ImageInfo extends ImageProperties {
  path: string;
  exists: boolean;
  sizeMb: number;
  aspectRatio: number;
  valid: boolean;
  error?: string;
}

export function checkImageProperties(props: ImageProperties): ImageValidationResult {
  const { sizeBytes, width, height, format } = props;

  if (sizeBytes > MAX_FILE_SIZE_BYTES) {
    return { ok: false, reason: `File too large: ${(sizeBytes / (1024 * 1024)).toFixed(2)}MB (max ${MAX_FILE_SIZE_MB}MB)` };
  }
  if (width < MIN_DIMENSION || height < MIN_DIMENSION) {
    return { ok: false, reason: `Image too small: ${width}x${height} (min ${MIN_DIMENSION}x${MIN_DIMENSION})` };
  }
  if (width > MAX_DIMENSION || height > MAX_DIMENSION) {
    return { ok: false, reason: `Image too large: ${width}x${height} (max ${MAX_DIMENSION}x${MAX_DIMENSION})` };
  }

  const aspectRatio = width / height;
  if (aspectRatio < MIN_ASPECT_RATIO) {
    return { ok: false, reason: `Aspect ratio too portrait: ${aspectRatio.toFixed(2)} (min ${MIN_ASPECT_RATIO})` };
  }
  if (aspectRatio > MAX_ASPECT_RATIO) {
    return { ok: false, reason: `Aspect ratio too landscape: ${aspectRatio.toFixed(2)} (max ${MAX_ASPECT_RATIO})` };
  }
  if (!format || !SUPPORTED_FORMATS.has(format)) {
    return { ok: false, reason: `Unsupported format: ${format ?? 'unknown'} (use JPEG or PNG)` };
  }
  return { ok: true };
}

async function readProperties(imagePath: string): Promise<ImageProperties> {
  const { size } = statSync(imagePath);
  const metadata = await sharp(imagePath).metadata();
  return {
    sizeBytes: size,
    width: metadata.width ?? 0,
    height: metadata.height ?? 0,
    format: metadata.format,
  };
}

export async function validateImageFile(imagePath: string): Promise<ImageValidationResult> {
  if (!existsSync(imagePath)) {
    return { ok: false, reason: `File not found: ${imagePath}` };
  }
  try {
    return checkImageProperties(await readProperties(imagePath));
  } catch (error) {
    return { ok: false, reason: `Invalid image file: ${error instanceof Error ? error.message : String(error)}` };
  }
}

export async function getImageInfo(imagePath: string): Promise<ImageInfo> {
  const empty: ImageInfo = {
    path: imagePath,
    exists: existsSync(imagePath),
    sizeBytes: 0,
    sizeMb: 0,
    width: 0,
    height: 0,
    aspectRatio: 0,
    format: undefined,
    valid: false,
  };
  if (!empty.exists) {
    return { ...empty, error: 'File not found' };
  }

  try {
    const props = await readProperties(imagePath);
    const check = checkImageProperties(props);
    return {
      ...empty,
      ...props,
      sizeMb: props.sizeBytes / (1024 * 1024),
      aspectRatio: props.height > 0 ? props.width / props.height : 0,
      valid: check.ok,
      ...(check.reason ? { error: check.reason } : {}),
    };
  } catch (error) {
    return { ...empty, error: error instanceof Error ? error.message : String(error) };
  }
}
