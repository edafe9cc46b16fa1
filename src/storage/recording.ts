/**
 * Frame recordings: a file of concatenated MessagePack wire packets
 */

import { createReadStream, createWriteStream, type WriteStream } from 'fs';
import { mkdir, stat } from 'fs/promises';
import { once } from 'events';
import { dirname } from 'path';
import { decodeMultiStream } from '@msgpack/msgpack';
import { createLogger } from '../utils/logger.js';
import { StartupError } from '../errors.js';
import { packMessages, parsePacket } from '../codec/wire.js';
import type { EncodedMessage } from '../models/frame.js';

const logger = createLogger('recording');

export interface RecordingWriterOptions {
  /** Buffered bytes at which the writer starts dropping packets */
  highWaterMark?: number;
}

/**
 * Append-only writer for the producer's save-to-file output.
 *
 * While the file stream is over its high-water mark, new packets are
 * dropped until it drains; a slow disk never grows the buffer.
 */
export class RecordingWriter {
  private stream: WriteStream | null = null;
  private closing: Promise<void> | null = null;
  private failed = false;
  private draining = false;
  private readonly highWaterMark: number | undefined;

  // Statistics
  private stats = {
    packets: 0,
    bytes: 0,
    dropped: 0
  };

  constructor(readonly path: string, options: RecordingWriterOptions = {}) {
    this.highWaterMark = options.highWaterMark;
  }

  /**
   * True while packets are being dropped for a backed-up file stream
   */
  get congested(): boolean {
    return this.draining;
  }

  /**
   * Create the file. Failure is a StartupError.
   */
  async open(): Promise<void> {
    if (this.stream) return;

    try {
      await mkdir(dirname(this.path), { recursive: true });
      const stream = createWriteStream(this.path, { flags: 'w', highWaterMark: this.highWaterMark });
      await once(stream, 'open');
      this.stream = stream;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StartupError('recording', `cannot write ${this.path} (${reason})`, { cause: error });
    }

    this.stream.on('error', (error) => {
      this.failed = true;
      logger.error({ error, path: this.path }, 'Recording write failed');
    });

    this.stream.on('drain', () => {
      this.draining = false;
      logger.debug({ path: this.path, dropped: this.stats.dropped }, 'Recording caught up');
    });

    logger.info({ path: this.path }, 'Recording to file');
  }

  write(messages: EncodedMessage | readonly EncodedMessage[]): void {
    if (!this.stream || this.failed) return;

    if (this.draining) {
      this.stats.dropped++;
      return;
    }

    const packet = packMessages(messages);
    this.stats.packets++;
    this.stats.bytes += packet.byteLength;

    if (!this.stream.write(packet)) {
      this.draining = true;
      logger.debug({ path: this.path }, 'Recording behind, dropping packets until drained');
    }
  }

  getStats() {
    return { ...this.stats };
  }

  /**
   * Flush and close the file. Safe to call repeatedly.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.release();
    }
    return this.closing;
  }

  private async release(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;

    if (!stream.destroyed) {
      stream.end();
      await once(stream, 'close');
    }

    logger.info({ path: this.path, ...this.stats }, 'Recording saved');
  }
}

/**
 * Read packets back from a recording, one message list per packet
 */
export async function* readRecording(path: string): AsyncGenerator<EncodedMessage[]> {
  const stream = createReadStream(path);
  try {
    for await (const item of decodeMultiStream(stream)) {
      yield parsePacket(item);
    }
  } finally {
    stream.destroy();
  }
}

/**
 * Fail fast when a recording cannot be read
 */
export async function assertRecordingReadable(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new Error('not a file');
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StartupError('recording', `cannot read ${path} (${reason})`, { cause: error });
  }
}
