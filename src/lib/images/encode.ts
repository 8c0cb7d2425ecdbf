/**
 * Image encoding
 *
 * Images reach the model as base64 PNG, whatever form the caller holds them
 * in. Nothing is written to disk.
 */
import sharp from 'sharp';
import { debug } from '../utils/debug';

/**
 * Uncompressed pixels, row-major, `channels` bytes per pixel
 */
export interface RawBitmap {
  data: Uint8Array;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
}

/**
 * A raw bitmap, or the bytes of an image file (PNG, JPEG, WebP, GIF, TIFF, ...)
 */
export type ImageInput = RawBitmap | Uint8Array;

export const PNG_MIME_TYPE: 'image/png' = 'image/png';

export function isRawBitmap(image: ImageInput): image is RawBitmap {
  return !(image instanceof Uint8Array);
}

/**
 * Re-serialise an image as PNG bytes. Errors from the imaging library
 * (corrupt input, unsupported format, wrong buffer size) propagate as thrown.
 */
export async function encodePng(image: ImageInput): Promise<Buffer> {
  const pipeline = isRawBitmap(image)
    ? sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: image.channels },
      })
    : sharp(image);
  const png = await pipeline.png().toBuffer();
  debug('image', 'Encoded %d-byte PNG', png.length);
  return png;
}

/**
 * Base64 of the image re-encoded as PNG
 */
export async function imageToBase64(image: ImageInput): Promise<string> {
  const png = await encodePng(image);
  return png.toString('base64');
}

export function toDataUrl(base64: string, mimeType: string = PNG_MIME_TYPE): string {
  return `data:${mimeType};base64,${base64}`;
}
