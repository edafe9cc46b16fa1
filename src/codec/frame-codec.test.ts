import { describe, it, expect } from 'vitest';
import { FrameCodec } from './frame-codec.js';
import { packMessages, unpackMessages } from './wire.js';
import { DecodeMismatchError } from '../errors.js';
import type { EncodedMessage, Frame } from '../models/frame.js';

function makeFrame(width: number, height: number, withDepth: boolean): Frame {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < data.length; i++) {
    data[i] = (i * 7) % 256;
  }

  const frame: Frame = {
    capturedAt: 1700000000.125,
    image: { width, height, channels: 3, data }
  };

  return withDepth ? { ...frame, depth: { width, height, data: makeDepth(width * height) } } : frame;
}

function makeDepth(samples: number): Float32Array {
  const depth = new Float32Array(samples);
  for (let i = 0; i < depth.length; i++) {
    depth[i] = 0.5 + i / 100;
  }
  depth[0] = NaN;
  depth[1] = Infinity;
  depth[2] = -0;
  return depth;
}

function bytesOf(values: Float32Array): Uint8Array {
  return new Uint8Array(values.buffer, values.byteOffset, values.byteLength);
}

describe('FrameCodec', () => {
  it.each(['raw', 'deflate'] as const)('round-trips image and depth exactly with %s encoding', (imageEncoding) => {
    const codec = new FrameCodec({ imageEncoding });
    const frame = makeFrame(16, 9, true);

    const message = codec.encode(frame, 'ego_view');
    const decoded = codec.decode(unpackMessages(packMessages([message]))[0]);

    expect(decoded.capturedAt).toBe(frame.capturedAt);
    expect(decoded.image.width).toBe(16);
    expect(decoded.image.height).toBe(9);
    expect(decoded.image.channels).toBe(3);
    expect(Buffer.from(decoded.image.data).equals(Buffer.from(frame.image.data))).toBe(true);

    expect(decoded.depth?.width).toBe(16);
    expect(decoded.depth?.height).toBe(9);
    const depthBytes = decoded.depth ? bytesOf(decoded.depth.data) : new Uint8Array();
    expect(Buffer.from(depthBytes).equals(Buffer.from(bytesOf(makeDepth(16 * 9))))).toBe(true);
  });

  it('omits depth when the frame has none', () => {
    const codec = new FrameCodec();
    const message = codec.encode(makeFrame(4, 4, false), 'head');

    expect(message.depth).toBeUndefined();
    expect(codec.decode(message).depth).toBeUndefined();
  });

  it('labels the message with its stream and timestamp', () => {
    const message = new FrameCodec().encode(makeFrame(4, 2, false), 'head');

    expect(message.streamId).toBe('head');
    expect(message.capturedAt).toBe(1700000000.125);
    expect(message.image.encoding).toBe('raw');
  });

  it('shrinks a uniform image with deflate', () => {
    const codec = new FrameCodec({ imageEncoding: 'deflate' });
    const frame: Frame = {
      capturedAt: 1,
      image: { width: 64, height: 64, channels: 1, data: new Uint8Array(64 * 64).fill(200) }
    };

    const message = codec.encode(frame, 'mono');

    expect(message.image.data.byteLength).toBeLessThan(64 * 64);
    expect(codec.decode(message).image.data.every(v => v === 200)).toBe(true);
  });

  it('rejects an image payload shorter than its dimensions', () => {
    const codec = new FrameCodec();
    const message = codec.encode(makeFrame(4, 4, false), 'ego_view');
    const truncated: EncodedMessage = {
      ...message,
      image: { ...message.image, data: message.image.data.subarray(0, 10) }
    };

    expect(() => codec.decode(truncated)).toThrow(DecodeMismatchError);
    expect(() => codec.decode(truncated)).toThrow('ego_view: image payload is 10 bytes, expected 48');
  });

  it('rejects depth whose dimensions differ from the image', () => {
    const codec = new FrameCodec();
    const message = codec.encode(makeFrame(4, 4, true), 'ego_view');
    const skewed: EncodedMessage = {
      ...message,
      depth: { width: 2, height: 8, data: new Uint8Array(64) }
    };

    expect(() => codec.decode(skewed)).toThrow('ego_view: depth 2x8 does not match image 4x4');
  });

  it('rejects a frame that differs from the expected session shape', () => {
    const codec = new FrameCodec();
    const message = codec.encode(makeFrame(4, 4, false), 'ego_view');

    expect(() => codec.decode(message, { width: 8, height: 4, channels: 3 }))
      .toThrow('ego_view: expected 8x4x3, got 4x4x3');
  });

  it('rejects a corrupt deflate payload', () => {
    const codec = new FrameCodec({ imageEncoding: 'deflate' });
    const message = codec.encode(makeFrame(4, 4, false), 'ego_view');
    const corrupt: EncodedMessage = {
      ...message,
      image: { ...message.image, data: new Uint8Array([1, 2, 3, 4]) }
    };

    expect(() => codec.decode(corrupt)).toThrow('ego_view: deflate payload is corrupt');
  });
});
