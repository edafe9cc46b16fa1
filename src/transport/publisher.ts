/**
 * WebSocket frame publisher with conflate-on-publish
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { AddressInfo } from 'net';
import type { IncomingMessage } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { env } from '../config/env.js';
import { createLogger } from '../utils/logger.js';
import { StartupError } from '../errors.js';
import { packMessages } from '../codec/wire.js';
import type { EncodedMessage } from '../models/frame.js';

const logger = createLogger('publisher');

export interface PublisherOptions {
  host?: string;
  port?: number;
  /** Packets allowed in flight per subscriber before conflation kicks in (1-3) */
  highWaterMark?: number;
  compression?: boolean;
  maxPayloadBytes?: number;
  /** Grace period for subscribers to acknowledge close before termination */
  closeTimeoutMs?: number;
}

/**
 * Publisher events
 */
export type PublisherEvents = {
  'subscriber-connected': [id: string];
  'subscriber-disconnected': [id: string];
  'closed': [];
};

/**
 * Connected subscriber
 */
interface Peer {
  id: string;
  ws: WebSocket;
  address: string | undefined;
  connectedAt: number;
  inFlight: number;
  pending: Uint8Array | null;
  sent: number;
  dropped: number;
}

export interface PublisherStats {
  published: number;
  sent: number;
  dropped: number;
  connectedSubscribers: number;
}

/**
 * One-to-many frame publisher.
 *
 * Each subscriber gets at most `highWaterMark` packets queued on its socket
 * plus one pending slot. A newer packet overwrites the pending one, so a
 * slow subscriber always receives the freshest frame next.
 */
export class FramePublisher extends EventEmitter<PublisherEvents> {
  private wss: WebSocketServer | null = null;
  private peers: Map<string, Peer> = new Map();
  private bound: AddressInfo | null = null;
  private closing: Promise<void> | null = null;
  private readonly options: Required<PublisherOptions>;

  // Statistics
  private stats = {
    published: 0,
    sent: 0,
    dropped: 0
  };

  constructor(options: PublisherOptions = {}) {
    super();
    this.options = {
      host: options.host ?? env.HOST,
      port: options.port ?? env.PORT,
      highWaterMark: options.highWaterMark ?? env.PUBLISH_HIGH_WATER_MARK,
      compression: options.compression ?? env.WS_COMPRESSION,
      maxPayloadBytes: options.maxPayloadBytes ?? env.MAX_PAYLOAD_MB * 1024 * 1024,
      closeTimeoutMs: options.closeTimeoutMs ?? 1000
    };

    if (this.options.highWaterMark < 1) {
      throw new RangeError('highWaterMark must be at least 1');
    }
  }

  /**
   * Bind the server. Resolves with the bound address; a bind failure is a
   * StartupError.
   */
  async bind(): Promise<AddressInfo> {
    if (this.closing) {
      throw new StartupError('publisher', 'cannot bind after close');
    }
    if (this.bound) {
      return this.bound;
    }

    const { host, port, compression, maxPayloadBytes } = this.options;

    const wss = new WebSocketServer({
      host,
      port,
      perMessageDeflate: compression ? {
        zlibDeflateOptions: {
          level: 1 // Frames are large; favour speed
        },
        threshold: 1024
      } : false,
      maxPayload: maxPayloadBytes
    });

    try {
      this.bound = await new Promise<AddressInfo>((resolve, reject) => {
        wss.once('error', reject);
        wss.once('listening', () => {
          wss.off('error', reject);
          const address = wss.address();
          if (typeof address === 'string') {
            reject(new Error(`unexpected pipe address ${address}`));
            return;
          }
          resolve(address);
        });
      });
    } catch (error) {
      wss.close();
      const reason = error instanceof Error ? error.message : String(error);
      throw new StartupError('publisher', `failed to bind ${host}:${port} (${reason})`, { cause: error });
    }

    this.wss = wss;
    this.setupEventHandlers(wss);

    logger.info({
      host: this.bound.address,
      port: this.bound.port,
      highWaterMark: this.options.highWaterMark,
      compression
    }, 'Publisher bound');

    return this.bound;
  }

  /**
   * Bound address, or null when not bound
   */
  address(): AddressInfo | null {
    return this.bound;
  }

  private setupEventHandlers(wss: WebSocketServer): void {
    wss.on('connection', (ws, request) => {
      this.handleConnection(ws, request);
    });

    wss.on('error', (error) => {
      logger.error({ error }, 'Publisher server error');
    });
  }

  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const peer: Peer = {
      id: randomUUID(),
      ws,
      address: request.socket.remoteAddress,
      connectedAt: Date.now(),
      inFlight: 0,
      pending: null,
      sent: 0,
      dropped: 0
    };

    this.peers.set(peer.id, peer);

    logger.info({
      subscriber: peer.id,
      ip: peer.address,
      totalSubscribers: this.peers.size
    }, 'Subscriber connected');

    ws.on('close', () => {
      this.handleDisconnect(peer);
    });

    ws.on('error', (error) => {
      logger.warn({ subscriber: peer.id, error }, 'Subscriber socket error');
    });

    // Inbound data is not part of the protocol
    ws.on('message', () => {
      logger.debug({ subscriber: peer.id }, 'Ignoring inbound message');
    });

    this.emit('subscriber-connected', peer.id);
  }

  private handleDisconnect(peer: Peer): void {
    this.peers.delete(peer.id);

    logger.info({
      subscriber: peer.id,
      sent: peer.sent,
      dropped: peer.dropped,
      duration: `${((Date.now() - peer.connectedAt) / 1000).toFixed(1)}s`,
      totalSubscribers: this.peers.size
    }, 'Subscriber disconnected');

    this.emit('subscriber-disconnected', peer.id);
  }

  /**
   * Publish one packet to every subscriber. Never blocks and never throws;
   * with no server bound the packet is counted as dropped.
   */
  publish(message: EncodedMessage | readonly EncodedMessage[]): void {
    this.stats.published++;

    if (!this.wss || this.closing) {
      this.stats.dropped++;
      logger.debug('Publish without bound transport, frame dropped');
      return;
    }

    let packet: Uint8Array;
    try {
      packet = packMessages(message);
    } catch (error) {
      this.stats.dropped++;
      logger.warn({ error }, 'Failed to pack frame, dropped');
      return;
    }

    for (const peer of this.peers.values()) {
      this.deliver(peer, packet);
    }
  }

  private deliver(peer: Peer, packet: Uint8Array): void {
    // A peer that is still connecting or already closing misses this frame
    if (peer.ws.readyState !== WebSocket.OPEN) {
      peer.dropped++;
      this.stats.dropped++;
      return;
    }

    if (peer.inFlight < this.options.highWaterMark) {
      this.send(peer, packet);
      return;
    }

    if (peer.pending) {
      peer.dropped++;
      this.stats.dropped++;
    }
    peer.pending = packet;
  }

  private send(peer: Peer, packet: Uint8Array): void {
    peer.inFlight++;
    peer.sent++;
    this.stats.sent++;

    peer.ws.send(packet, { binary: true }, (error) => {
      peer.inFlight--;

      if (error) {
        logger.debug({ subscriber: peer.id, error }, 'Send failed');
        if (peer.pending) {
          peer.dropped++;
          this.stats.dropped++;
          peer.pending = null;
        }
        return;
      }

      const next = peer.pending;
      if (next && peer.inFlight < this.options.highWaterMark && peer.ws.readyState === WebSocket.OPEN) {
        peer.pending = null;
        this.send(peer, next);
      }
    });
  }

  getStats(): PublisherStats {
    return {
      ...this.stats,
      connectedSubscribers: this.peers.size
    };
  }

  /**
   * Flush pending packets, close subscribers and release the port.
   * Safe to call repeatedly; the release happens once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.release();
    }
    return this.closing;
  }

  private async release(): Promise<void> {
    const wss = this.wss;
    if (!wss) {
      this.emit('closed');
      return;
    }

    logger.info({ subscribers: this.peers.size }, 'Closing publisher');

    for (const peer of this.peers.values()) {
      const { ws } = peer;
      if (peer.pending && ws.readyState === WebSocket.OPEN) {
        ws.send(peer.pending, { binary: true });
        peer.pending = null;
      }
      ws.close(1000, 'Publisher shutting down');
      setTimeout(() => ws.terminate(), this.options.closeTimeoutMs).unref();
    }

    await new Promise<void>((resolve, reject) => {
      wss.close((error) => {
        if (error) {
          logger.error({ error }, 'Error closing publisher');
          reject(error);
        } else {
          resolve();
        }
      });
    });

    this.wss = null;
    this.bound = null;
    logger.info(this.stats, 'Publisher closed');
    this.emit('closed');
  }
}
