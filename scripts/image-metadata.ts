import sharp from 'sharp';
import { log } from './logger';
import { DimensionLookup } from './types';

// sharp format name -> reported format
const SUPPORTED_FORMATS: Readonly<Record<string, string>> = {
  bmp: 'BMP',
  gif: 'GIF',
  jpeg: 'JPEG',
  png: 'PNG',
  webp: 'WEBP',
};

/**
 * Decode the header of an image payload. Anything sharp cannot read, or reads
 * as a non-raster format (svg, tiff, heif...), is unsupported.
 */
export async function readImageDimensions(
  payload: Buffer,
  contentType: string | null = null,
): Promise<DimensionLookup> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(payload).metadata();
  } catch (error) {
    log('DEBUG', `Unable to decode image payload (${contentType ?? 'unknown content type'})`, error);
    return { ok: false, contentType };
  }

  const format = metadata.format ? SUPPORTED_FORMATS[metadata.format] : undefined;
  if (!format || !metadata.width || !metadata.height) {
    return { ok: false, contentType };
  }
  return { ok: true, width: metadata.width, height: metadata.height, format };
}

// Wallpapers are decoded from memory, so the download is capped
export const MAX_IMAGE_BYTES = 100 * 1024 * 1024;

export async function fetchImageDimensions(url: string, requestTimeout = 10000): Promise<DimensionLookup> {
  const response = await fetch(url, { signal: AbortSignal.timeout(requestTimeout) });
  const contentType = response.headers.get('content-type');

  const declaredLength = Number(response.headers.get('content-length') ?? 0);
  if (declaredLength > MAX_IMAGE_BYTES) {
    await response.body?.cancel();
    throw new Error(`Image at ${url} is ${declaredLength} bytes, more than the ${MAX_IMAGE_BYTES} byte limit`);
  }

  const payload = Buffer.from(await response.arrayBuffer());
  if (payload.length > MAX_IMAGE_BYTES) {
    throw new Error(`Image at ${url} is ${payload.length} bytes, more than the ${MAX_IMAGE_BYTES} byte limit`);
  }
  return readImageDimensions(payload, contentType);
}
