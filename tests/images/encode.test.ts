import { describe, expect, test } from 'vitest';
import sharp from 'sharp';
import { encodePng, imageToBase64, isRawBitmap, toDataUrl } from '../../src/lib/images/encode';
import { BLUE, RED } from '../helpers/bitmaps';

// Base64 of the PNG signature bytes
const PNG_PREFIX = 'iVBORw0KGgo';

describe('Image encoder', () => {
  test('encodes a raw bitmap as base64 PNG', async () => {
    const encoded = await imageToBase64(RED);
    expect(encoded.startsWith(PNG_PREFIX)).toBe(true);
  });

  test('same pixels give the same string', async () => {
    expect(await imageToBase64(RED)).toBe(await imageToBase64(RED));
    expect(await imageToBase64(RED)).not.toBe(await imageToBase64(BLUE));
  });

  test('keeps dimensions and pixels', async () => {
    const png = await encodePng(BLUE);
    const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
    expect(info.width).toBe(1);
    expect(info.height).toBe(1);
    expect([...data.subarray(0, 3)]).toEqual([0, 0, 255]);
  });

  test('re-encodes image file bytes', async () => {
    const jpeg = await sharp({
      create: { width: 2, height: 2, channels: 3, background: { r: 10, g: 20, b: 30 } },
    })
      .jpeg()
      .toBuffer();
    const encoded = await imageToBase64(jpeg);
    expect(encoded.startsWith(PNG_PREFIX)).toBe(true);
    const meta = await sharp(Buffer.from(encoded, 'base64')).metadata();
    expect(meta.format).toBe('png');
    expect(meta.width).toBe(2);
  });

  test('errors from the imaging library propagate', async () => {
    await expect(imageToBase64(Uint8Array.from([1, 2, 3, 4]))).rejects.toThrow(/unsupported image format/);
  });

  test('tells bitmaps from encoded bytes', () => {
    expect(isRawBitmap(RED)).toBe(true);
    expect(isRawBitmap(new Uint8Array(4))).toBe(false);
  });

  test('builds a data URL', () => {
    expect(toDataUrl('AAAA')).toBe('data:image/png;base64,AAAA');
  });
});
