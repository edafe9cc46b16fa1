/**
 * Wire packet schema and MessagePack packing
 *
 * One packet carries one or more streams. Streams are demultiplexed by name:
 * every image has a timestamp under the same key, every depth plane an image.
 */

import { z } from 'zod';
import { encode, decode } from '@msgpack/msgpack';
import { WirePacketError } from '../errors.js';
import type { EncodedMessage } from '../models/frame.js';

export const WIRE_VERSION = 1;

const Dimension = z.number().int().positive();

/** Stream names end up in file names, so they are restricted to a safe set */
const STREAM_ID_PATTERN = /^[\w-]+$/;

export const StreamIdSchema = z.string()
  .regex(STREAM_ID_PATTERN, 'letters, digits, _ and - only')
  .refine(streamId => streamId !== '__proto__', 'reserved name');

export const EncodedImageSchema = z.object({
  encoding: z.enum(['raw', 'deflate']),
  width: Dimension,
  height: Dimension,
  channels: z.union([z.literal(1), z.literal(3), z.literal(4)]),
  data: z.instanceof(Uint8Array)
});

export const EncodedDepthSchema = z.object({
  width: Dimension,
  height: Dimension,
  data: z.instanceof(Uint8Array)
});

export const WirePacketSchema = z.object({
  v: z.literal(WIRE_VERSION),
  timestamps: z.record(StreamIdSchema, z.number().finite()),
  images: z.record(StreamIdSchema, EncodedImageSchema),
  depths: z.record(StreamIdSchema, EncodedDepthSchema).optional()
});

export type WirePacket = z.infer<typeof WirePacketSchema>;

function isMessageList(value: EncodedMessage | readonly EncodedMessage[]): value is readonly EncodedMessage[] {
  return Array.isArray(value);
}

/**
 * Pack one or more messages into a single binary packet
 */
export function packMessages(input: EncodedMessage | readonly EncodedMessage[]): Uint8Array {
  const messages = isMessageList(input) ? input : [input];
  if (messages.length === 0) {
    throw new WirePacketError('Cannot pack an empty message list');
  }

  const seen = new Set<string>();
  const timestamps: Array<[string, number]> = [];
  const images: Array<[string, EncodedMessage['image']]> = [];
  const depths: Array<[string, NonNullable<EncodedMessage['depth']>]> = [];

  for (const message of messages) {
    if (seen.has(message.streamId)) {
      throw new WirePacketError(`Duplicate stream in packet: ${message.streamId}`);
    }
    seen.add(message.streamId);
    timestamps.push([message.streamId, message.capturedAt]);
    images.push([message.streamId, message.image]);
    if (message.depth) {
      depths.push([message.streamId, message.depth]);
    }
  }

  const packet: WirePacket = {
    v: WIRE_VERSION,
    timestamps: Object.fromEntries(timestamps),
    images: Object.fromEntries(images)
  };
  if (depths.length > 0) {
    packet.depths = Object.fromEntries(depths);
  }

  return encode(packet, { ignoreUndefined: true });
}

/**
 * Unpack and validate a binary packet
 */
export function unpackMessages(bytes: Uint8Array): EncodedMessage[] {
  let raw: unknown;
  try {
    raw = decode(bytes);
  } catch (error) {
    throw new WirePacketError('Malformed MessagePack payload', { cause: error });
  }
  return parsePacket(raw);
}

/**
 * Validate a decoded packet and split it into per-stream messages
 */
export function parsePacket(raw: unknown): EncodedMessage[] {
  const parsed = WirePacketSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new WirePacketError(`Invalid packet: ${issues}`);
  }

  // Own keys only: a name like `constructor` must not resolve through the prototype
  const images = new Map(Object.entries(parsed.data.images));
  const timestamps = new Map(Object.entries(parsed.data.timestamps));
  const depths = new Map(Object.entries(parsed.data.depths ?? {}));

  for (const streamId of depths.keys()) {
    if (!images.has(streamId)) {
      throw new WirePacketError(`Depth without image for stream: ${streamId}`);
    }
  }

  return [...images].map(([streamId, image]) => {
    const capturedAt = timestamps.get(streamId);
    if (capturedAt === undefined) {
      throw new WirePacketError(`Missing timestamp for stream: ${streamId}`);
    }
    const depth = depths.get(streamId);
    return depth ? { streamId, capturedAt, image, depth } : { streamId, capturedAt, image };
  });
}
