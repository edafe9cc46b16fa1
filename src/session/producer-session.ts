/**
 * Producer: acquire, encode, publish
 */

import { StreamSession, type StreamSessionOptions } from './stream-session.js';
import { FrameCodec } from '../codec/frame-codec.js';
import { MetricsTracker } from '../metrics/metrics-tracker.js';
import { streamLabel, type Sink } from '../sink/sink.js';
import type { FramePublisher } from '../transport/publisher.js';
import type { RecordingWriter } from '../storage/recording.js';
import type { FrameSource } from '../source/frame-source.js';
import { epochSeconds, type EpochSeconds, type StreamEndpointConfig } from '../models/frame.js';

export interface ProducerSessionOptions extends StreamSessionOptions {
  source: FrameSource;
  config: StreamEndpointConfig;
  streamId?: string;
  codec?: FrameCodec;
  /** Omit to run without publishing */
  publisher?: FramePublisher;
  recorder?: RecordingWriter;
  /** Local preview */
  preview?: Sink;
  metrics?: MetricsTracker;
  clock?: () => EpochSeconds;
}

export class ProducerSession extends StreamSession {
  readonly streamId: string;
  private readonly source: FrameSource;
  private readonly config: StreamEndpointConfig;
  private readonly codec: FrameCodec;
  private readonly publisher: FramePublisher | undefined;
  private readonly recorder: RecordingWriter | undefined;
  private readonly preview: Sink | undefined;
  private readonly clock: () => EpochSeconds;
  readonly metrics: MetricsTracker;

  constructor(options: ProducerSessionOptions) {
    super('producer', options);
    this.source = options.source;
    this.config = options.config;
    this.streamId = options.streamId ?? 'ego_view';
    this.codec = options.codec ?? new FrameCodec();
    this.publisher = options.publisher;
    this.recorder = options.recorder;
    this.preview = options.preview;
    this.metrics = options.metrics ?? new MetricsTracker();
    this.clock = options.clock ?? epochSeconds;
  }

  protected async acquire(): Promise<void> {
    const source = this.source;
    const info = await source.open(this.config);
    this.register('frame-source', () => source.close());

    const publisher = this.publisher;
    if (publisher) {
      const address = await publisher.bind();
      this.register('publisher', () => publisher.close());
      this.logger.info({ host: address.address, port: address.port }, 'Publishing frames');
    } else {
      this.logger.info('Publishing disabled');
    }

    const recorder = this.recorder;
    if (recorder) {
      await recorder.open();
      this.register('recording', () => recorder.close());
    }

    this.logger.info({
      stream: this.streamId,
      source: this.source.kind,
      model: info.model,
      resolution: `${info.width}x${info.height}`,
      fps: info.fps,
      depth: info.depth,
      encoding: this.codec.imageEncoding
    }, 'Streaming started');
  }

  protected async iterate(): Promise<void> {
    const frame = await this.source.grab();

    if (!frame) {
      this.metrics.recordMiss();
      this.logger.warn({ misses: this.metrics.snapshot().misses }, 'Frame grab missed');
      return;
    }

    this.metrics.recordArrival(this.clock());

    const message = this.codec.encode(frame, this.streamId);
    this.publisher?.publish(message);
    this.recorder?.write(message);

    this.preview?.render(frame, {
      streamId: this.streamId,
      label: streamLabel(this.streamId),
      fps: this.metrics.currentFps()
    });

    this.emit('frame', { streamId: this.streamId, frame });
  }

  protected report(): void {
    const { fps, frames, misses } = this.metrics.snapshot();

    this.logger.info({
      fps: fps.toFixed(1),
      frames,
      misses,
      publisher: this.publisher?.getStats(),
      recording: this.recorder?.getStats()
    }, 'Producer statistics');
  }

  protected frameCount(): number {
    return this.metrics.frames;
  }
}
