/**
 * Frame and stream data models
 */

/**
 * Seconds since the Unix epoch, fractional
 */
export type EpochSeconds = number;

export type ChannelCount = 1 | 3 | 4;

/**
 * Interleaved 8-bit pixel buffer, row major
 */
export interface ImageBuffer {
  readonly width: number;
  readonly height: number;
  readonly channels: ChannelCount;
  readonly data: Uint8Array;
}

/**
 * Per-pixel distance in metres, same dimensions as the paired image
 */
export interface DepthMap {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;
}

/**
 * One acquisition from a frame source
 */
export interface Frame {
  readonly capturedAt: EpochSeconds;
  readonly image: ImageBuffer;
  readonly depth?: DepthMap;
}

export interface FrameShape {
  width: number;
  height: number;
  channels: ChannelCount;
}

export type ImageEncoding = 'raw' | 'deflate';

export interface EncodedImage {
  readonly encoding: ImageEncoding;
  readonly width: number;
  readonly height: number;
  readonly channels: ChannelCount;
  readonly data: Uint8Array;
}

export interface EncodedDepth {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;     // float32, little-endian
}

/**
 * Transmissible form of a frame, keyed by stream name
 */
export interface EncodedMessage {
  readonly streamId: string;
  readonly capturedAt: EpochSeconds;
  readonly image: EncodedImage;
  readonly depth?: EncodedDepth;
}

export const RESOLUTION_CLASSES = ['vga', '720p', '1080p', '2k'] as const;

export type ResolutionClass = (typeof RESOLUTION_CLASSES)[number];

export const RESOLUTIONS: Record<ResolutionClass, { width: number; height: number }> = {
  vga: { width: 672, height: 376 },
  '720p': { width: 1280, height: 720 },
  '1080p': { width: 1920, height: 1080 },
  '2k': { width: 2208, height: 1242 }
};

/**
 * Endpoint settings, fixed for the lifetime of a session
 */
export interface StreamEndpointConfig {
  readonly host: string;
  readonly port: number;
  readonly resolution: ResolutionClass;
  readonly fps: number;
  readonly depth: boolean;
  readonly deviceSelector?: number;
}

export function epochSeconds(): EpochSeconds {
  return Date.now() / 1000;
}
