/**
 * Frame <-> EncodedMessage conversion
 */

import { deflateSync, inflateSync } from 'zlib';
import { DecodeMismatchError } from '../errors.js';
import type {
  DepthMap,
  EncodedDepth,
  EncodedImage,
  EncodedMessage,
  Frame,
  FrameShape,
  ImageBuffer,
  ImageEncoding
} from '../models/frame.js';

const BYTES_PER_DEPTH_SAMPLE = Float32Array.BYTES_PER_ELEMENT;

const HOST_IS_LITTLE_ENDIAN = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

export interface FrameCodecOptions {
  imageEncoding?: ImageEncoding;
  deflateLevel?: number;        // zlib level 1-9
}

/**
 * Reverse byte order of each 4-byte word in place
 */
function swap32(bytes: Uint8Array): Uint8Array {
  for (let i = 0; i + 3 < bytes.length; i += 4) {
    const a = bytes[i];
    const b = bytes[i + 1];
    bytes[i] = bytes[i + 3];
    bytes[i + 1] = bytes[i + 2];
    bytes[i + 2] = b;
    bytes[i + 3] = a;
  }
  return bytes;
}

function toPlainBytes(buffer: Buffer): Uint8Array {
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

/**
 * Lossless codec for image and depth planes.
 *
 * Depth always travels as raw little-endian float32 so it round-trips
 * bit for bit, NaN payloads included.
 */
export class FrameCodec {
  readonly imageEncoding: ImageEncoding;
  private deflateLevel: number;

  constructor(options: FrameCodecOptions = {}) {
    this.imageEncoding = options.imageEncoding ?? 'raw';
    this.deflateLevel = options.deflateLevel ?? 1;
  }

  encode(frame: Frame, streamId: string): EncodedMessage {
    const image = this.encodeImage(frame.image);

    if (!frame.depth) {
      return { streamId, capturedAt: frame.capturedAt, image };
    }

    return {
      streamId,
      capturedAt: frame.capturedAt,
      image,
      depth: this.encodeDepth(frame.depth)
    };
  }

  /**
   * Rebuild a frame. Throws DecodeMismatchError when the payload does not
   * agree with its declared dimensions or with the expected session shape.
   */
  decode(message: EncodedMessage, expected?: FrameShape): Frame {
    const { streamId } = message;

    if (expected) {
      const { width, height, channels } = message.image;
      if (width !== expected.width || height !== expected.height || channels !== expected.channels) {
        throw new DecodeMismatchError(
          streamId,
          `expected ${expected.width}x${expected.height}x${expected.channels}, got ${width}x${height}x${channels}`
        );
      }
    }

    const image = this.decodeImage(streamId, message.image);

    if (!message.depth) {
      return { capturedAt: message.capturedAt, image };
    }

    if (message.depth.width !== image.width || message.depth.height !== image.height) {
      throw new DecodeMismatchError(
        streamId,
        `depth ${message.depth.width}x${message.depth.height} does not match image ${image.width}x${image.height}`
      );
    }

    return {
      capturedAt: message.capturedAt,
      image,
      depth: this.decodeDepth(streamId, message.depth)
    };
  }

  private encodeImage(image: ImageBuffer): EncodedImage {
    const data = this.imageEncoding === 'deflate'
      ? toPlainBytes(deflateSync(image.data, { level: this.deflateLevel }))
      : image.data;

    return {
      encoding: this.imageEncoding,
      width: image.width,
      height: image.height,
      channels: image.channels,
      data
    };
  }

  private decodeImage(streamId: string, encoded: EncodedImage): ImageBuffer {
    let data: Uint8Array;

    if (encoded.encoding === 'deflate') {
      try {
        data = toPlainBytes(inflateSync(encoded.data));
      } catch {
        throw new DecodeMismatchError(streamId, 'deflate payload is corrupt');
      }
    } else {
      data = encoded.data;
    }

    const expectedBytes = encoded.width * encoded.height * encoded.channels;
    if (data.byteLength !== expectedBytes) {
      throw new DecodeMismatchError(
        streamId,
        `image payload is ${data.byteLength} bytes, expected ${expectedBytes}`
      );
    }

    return {
      width: encoded.width,
      height: encoded.height,
      channels: encoded.channels,
      data
    };
  }

  private encodeDepth(depth: DepthMap): EncodedDepth {
    const bytes = new Uint8Array(depth.data.buffer, depth.data.byteOffset, depth.data.byteLength).slice();
    return {
      width: depth.width,
      height: depth.height,
      data: HOST_IS_LITTLE_ENDIAN ? bytes : swap32(bytes)
    };
  }

  private decodeDepth(streamId: string, encoded: EncodedDepth): DepthMap {
    const samples = encoded.width * encoded.height;
    if (encoded.data.byteLength !== samples * BYTES_PER_DEPTH_SAMPLE) {
      throw new DecodeMismatchError(
        streamId,
        `depth payload is ${encoded.data.byteLength} bytes, expected ${samples * BYTES_PER_DEPTH_SAMPLE}`
      );
    }

    // Copy so the float view is aligned and owned by the frame
    const bytes = encoded.data.slice();
    if (!HOST_IS_LITTLE_ENDIAN) swap32(bytes);

    return {
      width: encoded.width,
      height: encoded.height,
      data: new Float32Array(bytes.buffer, bytes.byteOffset, samples)
    };
  }
}
