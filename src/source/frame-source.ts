/**
 * Frame source contract and acquisition pacing
 */

import { setTimeout as sleep } from 'timers/promises';
import type { Frame, StreamEndpointConfig } from '../models/frame.js';

export interface FrameSourceInfo {
  model: string;
  serial?: number;
  width: number;
  height: number;
  fps: number;
  depth: boolean;
}

/**
 * A sensor device, or anything that produces frames like one.
 *
 * `open` throws StartupError. `grab` resolves null for a missed frame and
 * throws DeviceError when the device can no longer produce frames.
 * `close` is idempotent.
 */
export interface FrameSource {
  readonly kind: string;
  open(config: StreamEndpointConfig): Promise<FrameSourceInfo>;
  grab(): Promise<Frame | null>;
  close(): Promise<void>;
}

/**
 * Holds acquisition to the target frame rate. Blocks for at most one frame
 * interval; when the caller falls behind the schedule restarts instead of
 * bursting to catch up.
 */
export class FramePacer {
  private readonly intervalMs: number;
  private nextDue: number | null = null;

  constructor(fps: number, private now: () => number = () => performance.now()) {
    this.intervalMs = 1000 / fps;
  }

  async wait(): Promise<void> {
    const now = this.now();

    if (this.nextDue === null || now - this.nextDue > this.intervalMs) {
      this.nextDue = now + this.intervalMs;
      return;
    }

    const delay = this.nextDue - now;
    this.nextDue += this.intervalMs;

    if (delay > 0) {
      await sleep(delay);
    }
  }

  reset(): void {
    this.nextDue = null;
  }
}
