/**
 * Image files for generated, source and mask images. Any format sharp decodes is
 * accepted; images are written as PNG.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import sharp from 'sharp';
import { PersistenceFormatError } from '../errors.js';
import type { Image } from '../types.js';

export const IMAGE_EXTENSION = '.png';

export async function writeImage(path: string, image: Image): Promise<void> {
  const expected = image.width * image.height * image.channels;
  if (image.data.length !== expected) {
    throw new Error(
      `Image data has ${image.data.length} bytes, expected ${expected} for ${image.width}x${image.height}x${image.channels}`,
    );
  }
  await mkdir(dirname(path), { recursive: true });
  const { width, height, channels } = image;
  await sharp(image.data, { raw: { width, height, channels } }).png().toFile(path);
}

/**
 * Decode an image into 8-bit greyscale or RGB pixels. Alpha is dropped;
 * single-band sources stay greyscale.
 */
export async function readImage(path: string): Promise<Image> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    const image = sharp(path);
    const { channels } = await image.metadata();
    const greyscale = channels === 1 || channels === 2;
    decoded = await image
      .removeAlpha()
      .toColourspace(greyscale ? 'b-w' : 'srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (e) {
    throw new PersistenceFormatError(path, 'Invalid image file', { cause: e });
  }
  const { data, info } = decoded;
  if (info.channels !== 1 && info.channels !== 3) {
    throw new PersistenceFormatError(
      path,
      `Unsupported image with ${info.channels} channels, expected greyscale or RGB`,
    );
  }
  return {
    width: info.width,
    height: info.height,
    channels: info.channels,
    data: Uint8Array.from(data),
  };
}
