/**
 * Binary PNM writer for decoded frames
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { encode } from '@msgpack/msgpack';
import { createLogger } from '../utils/logger.js';
import type { Frame, ImageBuffer } from '../models/frame.js';

const logger = createLogger('frame-writer');

/**
 * File extension for a frame's image plane
 */
export function imageExtension(frame: Frame): 'pgm' | 'ppm' {
  return frame.image.channels === 1 ? 'pgm' : 'ppm';
}

/**
 * Encode an image as binary PGM (P5) or PPM (P6). Alpha is dropped.
 */
export function encodePnm(image: ImageBuffer): Buffer {
  const { width, height, channels, data } = image;
  const magic = channels === 1 ? 'P5' : 'P6';
  const header = Buffer.from(`${magic}\n${width} ${height}\n255\n`, 'ascii');

  if (channels !== 4) {
    return Buffer.concat([header, data]);
  }

  const pixels = Buffer.alloc(width * height * 3);
  for (let src = 0, dst = 0; dst < pixels.length; src += 4, dst += 3) {
    pixels[dst] = data[src];
    pixels[dst + 1] = data[src + 1];
    pixels[dst + 2] = data[src + 2];
  }
  return Buffer.concat([header, pixels]);
}

/**
 * Path of the depth sidecar written next to an image
 */
export function depthPath(imagePath: string): string {
  return `${imagePath}.depth.msgpack`;
}

/**
 * Write a frame's image, and its depth plane when present.
 * Returns the number of bytes written.
 */
export async function writeFrame(frame: Frame, path: string): Promise<number> {
  try {
    await mkdir(dirname(path), { recursive: true });

    const image = encodePnm(frame.image);
    await writeFile(path, image);
    let sizeBytes = image.length;

    if (frame.depth) {
      const { width, height, data } = frame.depth;
      const depth = encode({
        width,
        height,
        capturedAt: frame.capturedAt,
        data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
      });
      await writeFile(depthPath(path), depth);
      sizeBytes += depth.length;
    }

    logger.debug({ path, size: sizeBytes }, 'Frame written to file');

    return sizeBytes;
  } catch (error) {
    logger.error({ error, path }, 'Failed to write frame');
    throw error;
  }
}
