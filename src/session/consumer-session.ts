/**
 * Consumer: receive, decode, measure, render
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import { env } from '../config/env.js';
import { StreamSession, type StreamSessionOptions } from './stream-session.js';
import { DecodeMismatchError } from '../errors.js';
import { FrameCodec } from '../codec/frame-codec.js';
import { MetricsTracker } from '../metrics/metrics-tracker.js';
import { frameFileName, LogSink, streamLabel, type Sink } from '../sink/sink.js';
import { imageExtension } from '../storage/frame-writer.js';
import type { FrameSubscriber } from '../transport/subscriber.js';
import { epochSeconds, type EpochSeconds, type Frame } from '../models/frame.js';

export interface ConsumerSessionOptions extends StreamSessionOptions {
  subscriber: FrameSubscriber;
  sink?: Sink;
  codec?: FrameCodec;
  metrics?: MetricsTracker;
  timeoutMs?: number;
  saveDir?: string;
  /** Start with saving enabled */
  save?: boolean;
  clock?: () => EpochSeconds;
}

export class ConsumerSession extends StreamSession {
  readonly saveDir: string;
  readonly metrics: MetricsTracker;
  private readonly subscriber: FrameSubscriber;
  private readonly sink: Sink;
  private readonly codec: FrameCodec;
  private readonly timeoutMs: number;
  private readonly clock: () => EpochSeconds;
  private readonly saveOnStart: boolean;
  private saving = false;
  private saved = new Map<string, number>();

  constructor(options: ConsumerSessionOptions) {
    super('consumer', options);
    this.subscriber = options.subscriber;
    this.sink = options.sink ?? new LogSink();
    this.codec = options.codec ?? new FrameCodec();
    this.metrics = options.metrics ?? new MetricsTracker();
    this.timeoutMs = options.timeoutMs ?? env.RECEIVE_TIMEOUT_MS;
    this.saveDir = options.saveDir ?? './captured_frames';
    this.saveOnStart = options.save ?? false;
    this.clock = options.clock ?? epochSeconds;
  }

  get isSaving(): boolean {
    return this.saving;
  }

  /**
   * Toggle persistence of received frames. Enabling creates the output
   * directory.
   */
  async setSaving(enabled: boolean): Promise<void> {
    if (enabled) {
      await mkdir(this.saveDir, { recursive: true });
    }
    if (this.saving !== enabled) {
      this.saving = enabled;
      this.logger.info({ saving: enabled, directory: this.saveDir }, enabled ? 'Saving frames' : 'Saving stopped');
    }
  }

  /**
   * Frames written so far, per stream
   */
  savedCounts(): Record<string, number> {
    return Object.fromEntries(this.saved);
  }

  protected async acquire(): Promise<void> {
    if (this.saveOnStart) {
      await this.setSaving(true);
    }

    const subscriber = this.subscriber;
    subscriber.connect();
    this.register('subscriber', () => subscriber.close());

    this.logger.info({ url: subscriber.url, timeoutMs: this.timeoutMs }, 'Waiting for frames');
  }

  protected async iterate(): Promise<void> {
    const result = await this.subscriber.receive(this.timeoutMs);

    if (result.status === 'timeout') {
      if (this.stopRequested) return;
      this.metrics.recordTimeout();
      this.logger.warn({ timeoutMs: this.timeoutMs, url: this.subscriber.url }, 'Waiting for frames');
      return;
    }

    this.metrics.recordArrival(result.receivedAt);

    for (const message of result.messages) {
      const { streamId } = message;

      let frame: Frame;
      try {
        frame = this.codec.decode(message);
      } catch (error) {
        if (!(error instanceof DecodeMismatchError)) throw error;
        this.metrics.recordDrop();
        this.logger.warn({ stream: streamId, reason: error.message }, 'Dropping undecodable frame');
        continue;
      }

      const latencyMs = this.metrics.recordLatency(streamId, frame.capturedAt, this.clock()) * 1000;

      this.sink.render(frame, {
        streamId,
        label: streamLabel(streamId),
        fps: this.metrics.currentFps(),
        latencyMs
      });

      if (this.saving) {
        const index = this.saved.get(streamId) ?? 0;
        const path = join(this.saveDir, frameFileName(streamId, index, imageExtension(frame)));
        await this.sink.persist(frame, path);
        this.saved.set(streamId, index + 1);
      }

      this.emit('frame', { streamId, frame, latencyMs });
    }
  }

  protected onStopRequested(): void {
    this.subscriber.wake();
  }

  protected report(): void {
    const snapshot = this.metrics.snapshot();
    const latency: Record<string, string> = {};
    for (const [streamId, summary] of Object.entries(snapshot.latency)) {
      latency[streamId] = `${summary.lastMs.toFixed(0)}ms (avg ${summary.meanMs.toFixed(0)}ms)`;
    }

    this.logger.info({
      fps: snapshot.fps.toFixed(1),
      frames: snapshot.frames,
      timeouts: snapshot.timeouts,
      drops: snapshot.drops,
      latency,
      saved: this.saving ? this.savedCounts() : undefined,
      subscriber: this.subscriber.getStats()
    }, 'Consumer statistics');
  }

  protected frameCount(): number {
    return this.metrics.frames;
  }
}
