/**
 * Frame sinks: where decoded frames end up
 */

import { createLogger, type Logger } from '../utils/logger.js';
import { join } from 'path';
import { imageExtension, writeFrame } from '../storage/frame-writer.js';
import type { Frame } from '../models/frame.js';

/**
 * Per-frame annotation shown alongside a rendered frame
 */
export interface FrameOverlay {
  streamId: string;
  label: string;
  fps: number;
  latencyMs?: number;
}

export interface Sink {
  render(frame: Frame, overlay: FrameOverlay): void;
  persist(frame: Frame, path: string): Promise<void>;
}

/**
 * Default sink. Renders a one-line textual preview through the logger and
 * persists frames as PNM files.
 */
export class LogSink implements Sink {
  private logger: Logger;

  constructor(module = 'preview') {
    this.logger = createLogger(module);
  }

  render(frame: Frame, overlay: FrameOverlay): void {
    this.logger.debug({
      stream: overlay.label,
      size: `${frame.image.width}x${frame.image.height}x${frame.image.channels}`,
      depth: frame.depth !== undefined,
      fps: overlay.fps.toFixed(1),
      latency: overlay.latencyMs === undefined ? undefined : `${overlay.latencyMs.toFixed(0)}ms`
    }, 'Frame');
  }

  async persist(frame: Frame, path: string): Promise<void> {
    await writeFrame(frame, path);
  }
}

/**
 * Writes every rendered frame into a directory as
 * `<stream>_<NNNNNN>.<ext>`.
 */
export class FrameFileSink implements Sink {
  private counters = new Map<string, number>();
  private pending: Promise<void> = Promise.resolve();
  private failure: unknown = null;

  constructor(readonly directory: string) {}

  render(frame: Frame, overlay: FrameOverlay): void {
    const path = join(this.directory, this.nextFileName(frame, overlay.streamId));
    this.pending = this.pending
      .then(() => this.persist(frame, path))
      .catch((error: unknown) => {
        this.failure ??= error;
      });
  }

  async persist(frame: Frame, path: string): Promise<void> {
    await writeFrame(frame, path);
  }

  /**
   * File name for the next frame of a stream
   */
  nextFileName(frame: Frame, streamId: string): string {
    const count = this.counters.get(streamId) ?? 0;
    this.counters.set(streamId, count + 1);
    return frameFileName(streamId, count, imageExtension(frame));
  }

  /**
   * Wait for rendered frames to reach disk; rethrows the first write error
   */
  async flush(): Promise<void> {
    await this.pending;
    if (this.failure !== null) {
      const failure = this.failure;
      this.failure = null;
      throw failure;
    }
  }
}

export function frameFileName(streamId: string, index: number, extension: string): string {
  return `${streamId}_${String(index).padStart(6, '0')}.${extension}`;
}

/**
 * Label shown for well-known camera streams
 */
export function streamLabel(streamId: string): string {
  switch (streamId) {
    case 'ego_view':
      return 'ego_view (ZED)';
    case 'head':
      return 'head (RealSense)';
    default:
      return streamId;
  }
}
