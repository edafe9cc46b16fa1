/**
 * Frame source that plays back a recording
 */

import { createLogger } from '../utils/logger.js';
import { DeviceError, SourceExhaustedError, StartupError } from '../errors.js';
import { FrameCodec } from '../codec/frame-codec.js';
import { assertRecordingReadable, readRecording } from '../storage/recording.js';
import { FramePacer, type FrameSource, type FrameSourceInfo } from './frame-source.js';
import {
  epochSeconds,
  type EncodedMessage,
  type EpochSeconds,
  type Frame,
  type StreamEndpointConfig
} from '../models/frame.js';

const logger = createLogger('replay-source');

export interface ReplaySourceOptions {
  path: string;
  /** Stream to play back; defaults to the first stream in the recording */
  streamId?: string;
  loop?: boolean;
  unpaced?: boolean;
  clock?: () => EpochSeconds;
}

/**
 * Replays frames at the session frame rate. Capture times are restamped
 * with the current clock so latency reflects the live pipeline.
 */
export class ReplayFrameSource implements FrameSource {
  readonly kind = 'replay';
  private packets: AsyncGenerator<EncodedMessage[]> | null = null;
  private buffered: EncodedMessage | null = null;
  private streamId: string | null;
  private pacer: FramePacer | null = null;
  private codec = new FrameCodec();
  private closed = false;
  private readonly clock: () => EpochSeconds;

  // Statistics
  private stats = {
    played: 0,
    loops: 0,
    skipped: 0
  };

  constructor(private options: ReplaySourceOptions) {
    this.streamId = options.streamId ?? null;
    this.clock = options.clock ?? epochSeconds;
  }

  async open(config: StreamEndpointConfig): Promise<FrameSourceInfo> {
    if (this.closed) {
      throw new StartupError('frame-source', 'replay source was closed');
    }
    if (this.packets) {
      throw new StartupError('frame-source', 'replay source is already open');
    }
    if (!(config.fps > 0)) {
      throw new StartupError('frame-source', `unsupported frame rate ${config.fps}`);
    }

    await assertRecordingReadable(this.options.path);
    this.packets = readRecording(this.options.path);

    let first: EncodedMessage | null;
    try {
      first = await this.nextMessage();
    } catch (error) {
      await this.releasePackets();
      const reason = error instanceof Error ? error.message : String(error);
      throw new StartupError('frame-source', `cannot read ${this.options.path} (${reason})`, { cause: error });
    }

    if (!first) {
      await this.releasePackets();
      const target = this.streamId === null ? 'any stream' : `stream ${this.streamId}`;
      throw new StartupError('frame-source', `${this.options.path} has no frames for ${target}`);
    }

    this.buffered = first;
    this.pacer = this.options.unpaced ? null : new FramePacer(config.fps);

    const info: FrameSourceInfo = {
      model: 'Replay',
      width: first.image.width,
      height: first.image.height,
      fps: config.fps,
      depth: first.depth !== undefined
    };

    logger.info({ ...info, path: this.options.path, stream: first.streamId }, 'Replay source opened');

    return info;
  }

  async grab(): Promise<Frame | null> {
    if (!this.packets || this.closed) {
      throw new DeviceError('Replay source is not open');
    }

    await this.pacer?.wait();

    let message = this.buffered;
    this.buffered = null;

    if (!message) {
      try {
        message = await this.nextMessage();
      } catch (error) {
        throw new DeviceError(`Recording ${this.options.path} is unreadable`, { cause: error });
      }
    }

    if (!message && this.options.loop) {
      await this.releasePackets();
      this.packets = readRecording(this.options.path);
      this.stats.loops++;
      message = await this.nextMessage();
    }

    if (!message) {
      throw new SourceExhaustedError(`Recording ${this.options.path} has no more frames`);
    }

    const frame = this.codec.decode(message);
    this.stats.played++;

    return { ...frame, capturedAt: this.clock() };
  }

  /**
   * Next message for the selected stream, or null at the end of the file
   */
  private async nextMessage(): Promise<EncodedMessage | null> {
    if (!this.packets) return null;

    for (;;) {
      const result = await this.packets.next();
      if (result.done) return null;

      const messages = result.value;
      if (this.streamId === null && messages.length > 0) {
        this.streamId = messages[0].streamId;
      }

      const match = messages.find((m) => m.streamId === this.streamId);
      if (match) return match;
      this.stats.skipped++;
    }
  }

  private async releasePackets(): Promise<void> {
    const packets = this.packets;
    this.packets = null;
    if (packets) {
      await packets.return(undefined);
    }
  }

  getStats() {
    return { ...this.stats };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.buffered = null;
    await this.releasePackets();
    logger.info({ path: this.options.path, ...this.stats }, 'Replay source closed');
  }
}
