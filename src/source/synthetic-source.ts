/**
 * Test-pattern frame source
 */

import { createLogger } from '../utils/logger.js';
import { DeviceError, StartupError } from '../errors.js';
import { FramePacer, type FrameSource, type FrameSourceInfo } from './frame-source.js';
import {
  epochSeconds,
  RESOLUTIONS,
  type ChannelCount,
  type DepthMap,
  type EpochSeconds,
  type Frame,
  type StreamEndpointConfig
} from '../models/frame.js';

const logger = createLogger('synthetic-source');

export interface SyntheticSourceOptions {
  /** Override the resolution class dimensions */
  size?: { width: number; height: number };
  channels?: ChannelCount;
  /** Every Nth grab misses (returns null) */
  missEvery?: number;
  /** Grabs after this many fail with a DeviceError */
  failAfter?: number;
  /** Skip frame-rate pacing */
  unpaced?: boolean;
  clock?: () => EpochSeconds;
}

/**
 * Produces a scrolling gradient, and a left-to-right depth ramp when depth
 * is enabled. The device selector seeds the pattern so several instances
 * are distinguishable.
 */
export class SyntheticFrameSource implements FrameSource {
  readonly kind = 'synthetic';
  private config: StreamEndpointConfig | null = null;
  private pacer: FramePacer | null = null;
  private width = 0;
  private height = 0;
  private grabs = 0;
  private closed = false;
  private depthTemplate: Float32Array | null = null;
  private readonly options: SyntheticSourceOptions;
  private readonly clock: () => EpochSeconds;

  constructor(options: SyntheticSourceOptions = {}) {
    this.options = options;
    this.clock = options.clock ?? epochSeconds;
  }

  async open(config: StreamEndpointConfig): Promise<FrameSourceInfo> {
    if (this.closed) {
      throw new StartupError('frame-source', 'synthetic source was closed');
    }
    if (this.config) {
      throw new StartupError('frame-source', 'synthetic source is already open');
    }
    if (!(config.fps > 0)) {
      throw new StartupError('frame-source', `unsupported frame rate ${config.fps}`);
    }

    const size = this.options.size ?? RESOLUTIONS[config.resolution];
    this.width = size.width;
    this.height = size.height;
    this.config = config;
    this.pacer = this.options.unpaced ? null : new FramePacer(config.fps);

    if (config.depth) {
      this.depthTemplate = new Float32Array(this.width * this.height);
      for (let y = 0; y < this.height; y++) {
        for (let x = 0; x < this.width; x++) {
          this.depthTemplate[y * this.width + x] = 0.5 + (4.5 * x) / this.width;
        }
      }
    }

    const info: FrameSourceInfo = {
      model: 'Synthetic',
      serial: config.deviceSelector,
      width: this.width,
      height: this.height,
      fps: config.fps,
      depth: config.depth
    };

    logger.info(info, 'Synthetic source opened');

    return info;
  }

  async grab(): Promise<Frame | null> {
    const config = this.config;
    if (!config || this.closed) {
      throw new DeviceError('Synthetic source is not open');
    }

    const { missEvery, failAfter } = this.options;
    if (failAfter !== undefined && this.grabs >= failAfter) {
      throw new DeviceError(`Synthetic source failed after ${failAfter} frames`);
    }

    await this.pacer?.wait();
    this.grabs++;

    if (missEvery !== undefined && this.grabs % missEvery === 0) {
      return null;
    }

    const capturedAt = this.clock();
    const channels = this.options.channels ?? 3;
    const image = this.renderPattern(channels, this.grabs, config.deviceSelector ?? 0);

    if (!this.depthTemplate) {
      return { capturedAt, image };
    }

    const depth: DepthMap = {
      width: this.width,
      height: this.height,
      data: this.depthTemplate.slice()
    };
    return { capturedAt, image, depth };
  }

  private renderPattern(channels: ChannelCount, frameIndex: number, seed: number) {
    const { width, height } = this;
    const data = new Uint8Array(width * height * channels);
    const offset = frameIndex * 4;

    let i = 0;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const r = (x + offset) & 0xff;
        if (channels === 1) {
          data[i++] = r;
          continue;
        }
        data[i++] = r;
        data[i++] = (y + offset) & 0xff;
        data[i++] = (seed * 37) & 0xff;
        if (channels === 4) data[i++] = 0xff;
      }
    }

    return { width, height, channels, data };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.depthTemplate = null;
    this.pacer?.reset();
    logger.info({ frames: this.grabs }, 'Synthetic source closed');
  }
}
