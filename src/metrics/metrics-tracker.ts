/**
 * Rolling FPS and latency instrumentation
 */

import { env } from '../config/env.js';
import { MetricsWindow } from './metrics-window.js';
import type { EpochSeconds } from '../models/frame.js';

export interface LatencySummary {
  lastMs: number;
  meanMs: number;
  maxMs: number;
}

export interface MetricsSnapshot {
  fps: number;
  frames: number;
  misses: number;
  timeouts: number;
  drops: number;
  latency: Record<string, LatencySummary>;
}

interface StreamLatency {
  window: MetricsWindow;
  last: number;
}

/**
 * Tracks arrivals and per-stream latency.
 *
 * Latency compares the producer's capture clock with the local clock and
 * is only meaningful when the two hosts are synchronised; skew is not
 * corrected.
 */
export class MetricsTracker {
  private intervals: MetricsWindow;
  private lastArrival: EpochSeconds | null = null;
  private arrivals = 0;
  private latencies = new Map<string, StreamLatency>();

  private counters = {
    misses: 0,
    timeouts: 0,
    drops: 0
  };

  constructor(private windowSize: number = env.FPS_WINDOW_SIZE) {
    this.intervals = new MetricsWindow(windowSize);
  }

  recordArrival(now: EpochSeconds): void {
    if (this.lastArrival !== null) {
      this.intervals.push(Math.max(0, now - this.lastArrival));
    }
    this.lastArrival = now;
    this.arrivals++;
  }

  /**
   * Reciprocal of the mean inter-arrival time; 0 until two arrivals
   */
  currentFps(): number {
    if (this.arrivals < 2) return 0;
    const mean = this.intervals.mean();
    return mean > 0 ? 1 / mean : 0;
  }

  latency(capturedAt: EpochSeconds, now: EpochSeconds): number {
    return now - capturedAt;
  }

  /**
   * Record a latency sample for a stream and return it in seconds
   */
  recordLatency(streamId: string, capturedAt: EpochSeconds, now: EpochSeconds): number {
    const value = this.latency(capturedAt, now);

    let entry = this.latencies.get(streamId);
    if (!entry) {
      entry = { window: new MetricsWindow(this.windowSize), last: value };
      this.latencies.set(streamId, entry);
    }
    entry.window.push(value);
    entry.last = value;

    return value;
  }

  recordMiss(): void {
    this.counters.misses++;
  }

  recordTimeout(): void {
    this.counters.timeouts++;
  }

  recordDrop(): void {
    this.counters.drops++;
  }

  get frames(): number {
    return this.arrivals;
  }

  snapshot(): MetricsSnapshot {
    const latency: Record<string, LatencySummary> = {};
    for (const [streamId, entry] of this.latencies) {
      latency[streamId] = {
        lastMs: entry.last * 1000,
        meanMs: entry.window.mean() * 1000,
        maxMs: entry.window.max() * 1000
      };
    }

    return {
      fps: this.currentFps(),
      frames: this.arrivals,
      ...this.counters,
      latency
    };
  }
}
