/**
 * WebSocket frame subscriber with conflate-on-receive
 */

import { EventEmitter } from 'events';
import { WebSocket, type RawData } from 'ws';
import { env } from '../config/env.js';
import { createLogger } from '../utils/logger.js';
import { SessionClosedError, SessionStateError, StartupError } from '../errors.js';
import { unpackMessages } from '../codec/wire.js';
import { epochSeconds, type EncodedMessage, type EpochSeconds } from '../models/frame.js';

const logger = createLogger('subscriber');

export interface SubscriberOptions {
  host: string;
  port: number;
  reconnectIntervalMs?: number;
  compression?: boolean;
  maxPayloadBytes?: number;
}

export type ReceiveResult =
  | { status: 'message'; messages: EncodedMessage[]; receivedAt: EpochSeconds }
  | { status: 'timeout' };

export type SubscriberEvents = {
  'connected': [];
  'disconnected': [];
  'closed': [];
};

export interface SubscriberStats {
  received: number;
  delivered: number;
  conflated: number;
  stale: number;
  invalid: number;
  reconnects: number;
  connected: boolean;
}

interface Delivery {
  messages: EncodedMessage[];
  receivedAt: EpochSeconds;
}

interface Waiter {
  resolve: (result: ReceiveResult) => void;
  timer: NodeJS.Timeout;
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

/**
 * Latest-only frame subscriber.
 *
 * Holds a single pending packet: anything that arrives before the caller
 * drains the slot replaces what was there. Per stream, packets older than
 * one already accepted on the current connection are discarded, so delivery
 * never goes back in time while connected.
 * An absent publisher is not an error; the socket reconnects until closed.
 */
export class FrameSubscriber extends EventEmitter<SubscriberEvents> {
  readonly url: string;
  private readonly port: number;
  private ws: WebSocket | null = null;
  private latest: Delivery | null = null;
  private waiter: Waiter | null = null;
  private lastCapturedAt: Map<string, EpochSeconds> = new Map();
  private reconnectTimer: NodeJS.Timeout | null = null;
  private started = false;
  private stopped = false;
  private connected = false;
  private closing: Promise<void> | null = null;
  private readonly reconnectIntervalMs: number;
  private readonly compression: boolean;
  private readonly maxPayloadBytes: number;

  // Statistics
  private stats = {
    received: 0,
    delivered: 0,
    conflated: 0,
    stale: 0,
    invalid: 0,
    reconnects: 0
  };

  constructor(options: SubscriberOptions) {
    super();
    this.url = `ws://${options.host}:${options.port}`;
    this.port = options.port;
    this.reconnectIntervalMs = options.reconnectIntervalMs ?? env.RECONNECT_INTERVAL_MS;
    this.compression = options.compression ?? env.WS_COMPRESSION;
    this.maxPayloadBytes = options.maxPayloadBytes ?? env.MAX_PAYLOAD_MB * 1024 * 1024;
  }

  /**
   * Start connecting. Only a malformed address fails; a missing publisher
   * is retried in the background.
   */
  connect(): void {
    if (this.stopped) {
      throw new SessionClosedError('subscriber');
    }
    if (this.started) return;

    let parsed: URL;
    try {
      parsed = new URL(this.url);
    } catch (error) {
      throw new StartupError('subscriber', `invalid address ${this.url}`, { cause: error });
    }
    if (!parsed.hostname || !Number.isInteger(this.port) || this.port < 1 || this.port > 65535) {
      throw new StartupError('subscriber', `invalid address ${this.url}`);
    }

    this.started = true;
    logger.info({ url: this.url }, 'Connecting to publisher');
    this.openSocket();
  }

  isConnected(): boolean {
    return this.connected;
  }

  private openSocket(): void {
    const ws = new WebSocket(this.url, {
      perMessageDeflate: this.compression,
      maxPayload: this.maxPayloadBytes
    });
    this.ws = ws;

    ws.on('open', () => {
      // A new connection may be a restarted publisher with its own clock
      this.lastCapturedAt.clear();
      this.connected = true;
      logger.info({ url: this.url }, 'Connected to publisher');
      this.emit('connected');
    });

    ws.on('message', (data, isBinary) => {
      this.handlePacket(data, isBinary);
    });

    ws.on('error', (error) => {
      // Refused connections land here before 'close'
      logger.debug({ url: this.url, error: error.message }, 'Subscriber socket error');
    });

    ws.on('close', () => {
      const wasConnected = this.connected;
      this.connected = false;
      if (this.ws === ws) this.ws = null;

      if (wasConnected) {
        logger.warn({ url: this.url }, 'Disconnected from publisher');
        this.emit('disconnected');
      }

      if (!this.stopped) {
        this.scheduleReconnect();
      }
    });
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.stopped) return;
      this.stats.reconnects++;
      this.openSocket();
    }, this.reconnectIntervalMs);
  }

  private handlePacket(data: RawData, isBinary: boolean): void {
    if (!isBinary) {
      this.stats.invalid++;
      logger.warn('Ignoring text message from publisher');
      return;
    }

    let messages: EncodedMessage[];
    try {
      messages = unpackMessages(toBytes(data));
    } catch (error) {
      this.stats.invalid++;
      logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Dropping invalid packet');
      return;
    }

    const fresh = messages.filter(message => {
      const last = this.lastCapturedAt.get(message.streamId);
      return last === undefined || message.capturedAt >= last;
    });

    this.stats.stale += messages.length - fresh.length;
    if (fresh.length === 0) {
      logger.debug('Dropping packet older than the last accepted frame');
      return;
    }

    for (const message of fresh) {
      this.lastCapturedAt.set(message.streamId, message.capturedAt);
    }

    this.stats.received++;
    const delivery: Delivery = { messages: fresh, receivedAt: epochSeconds() };

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      this.stats.delivered++;
      waiter.resolve({ status: 'message', ...delivery });
      return;
    }

    if (this.latest) {
      this.stats.conflated++;
    }
    this.latest = delivery;
  }

  /**
   * Take the freshest packet, waiting up to `timeoutMs` for one to arrive.
   * Never retries; a timeout is a normal outcome.
   */
  receive(timeoutMs: number = env.RECEIVE_TIMEOUT_MS): Promise<ReceiveResult> {
    if (this.stopped) {
      return Promise.reject(new SessionClosedError('subscriber'));
    }
    if (this.waiter) {
      return Promise.reject(new SessionStateError('A receive is already pending'));
    }

    const latest = this.latest;
    if (latest) {
      this.latest = null;
      this.stats.delivered++;
      return Promise.resolve<ReceiveResult>({ status: 'message', ...latest });
    }

    return new Promise<ReceiveResult>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ status: 'timeout' });
      }, timeoutMs);
      this.waiter = { resolve, timer };
    });
  }

  /**
   * End a pending receive early with a timeout result
   */
  wake(): void {
    const waiter = this.waiter;
    if (!waiter) return;
    this.waiter = null;
    clearTimeout(waiter.timer);
    waiter.resolve({ status: 'timeout' });
  }

  getStats(): SubscriberStats {
    return {
      ...this.stats,
      connected: this.connected
    };
  }

  /**
   * Stop reconnecting and close the socket. Safe to call repeatedly.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.stopped = true;
      this.closing = this.release();
    }
    return this.closing;
  }

  private async release(): Promise<void> {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    this.wake();
    this.latest = null;

    const ws = this.ws;
    if (ws && ws.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        ws.once('close', () => resolve());
        if (ws.readyState === WebSocket.CONNECTING) {
          ws.terminate();
        } else {
          ws.close(1000, 'Subscriber closing');
          setTimeout(() => ws.terminate(), 1000).unref();
        }
      });
    }

    logger.info(this.stats, 'Subscriber closed');
    this.emit('closed');
  }
}
