/**
 * Session lifecycle shared by producer and consumer
 */

import { EventEmitter } from 'events';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { env } from '../config/env.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { isFatal, SessionClosedError, SessionStateError } from '../errors.js';
import type { Frame } from '../models/frame.js';

export type SessionState = 'idle' | 'streaming' | 'stopping' | 'closed';

export type StopReason = 'stop-command' | 'interrupt' | 'duration' | 'fatal';

export interface FrameEvent {
  streamId: string;
  frame: Frame;
  latencyMs?: number;
}

export type SessionEvents = {
  'state': [state: SessionState, previous: SessionState];
  'frame': [event: FrameEvent];
};

export interface SessionSummary {
  reason: StopReason;
  /** Resource names, in release order */
  released: string[];
  frames: number;
  /** The error that ended a fatal session */
  error?: unknown;
}

export interface StreamSessionOptions {
  /** Stop after this long streaming */
  durationMs?: number;
  reportIntervalMs?: number;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

interface Resource {
  name: string;
  release: () => Promise<void> | void;
}

/**
 * Runs `acquire` once, then `iterate` until stopped, then releases every
 * registered resource exactly once in reverse order.
 *
 * Stop requests and the run duration are checked between iterations, never
 * during one.
 */
export abstract class StreamSession extends EventEmitter<SessionEvents> {
  protected readonly logger: Logger;
  private current: SessionState = 'idle';
  private starting = false;
  private stopRequest: StopReason | null = null;
  private resources: Resource[] = [];
  private readonly durationMs: number | undefined;
  private readonly reportIntervalMs: number;
  protected readonly now: () => number;

  constructor(module: string, options: StreamSessionOptions = {}) {
    super();
    this.logger = createLogger(module);
    this.durationMs = options.durationMs;
    this.reportIntervalMs = options.reportIntervalMs ?? env.REPORT_INTERVAL_MS;
    this.now = options.now ?? (() => performance.now());
  }

  get state(): SessionState {
    return this.current;
  }

  /** Open resources, registering each one as it is acquired */
  protected abstract acquire(): Promise<void>;

  /**
   * One loop iteration. DeviceError ends the session; anything else is
   * logged and the loop continues.
   */
  protected abstract iterate(): Promise<void>;

  /** Periodic status line */
  protected abstract report(): void;

  /** Frames processed so far */
  protected abstract frameCount(): number;

  /** Called once when a stop is first requested */
  protected onStopRequested(): void {}

  protected get stopRequested(): boolean {
    return this.stopRequest !== null;
  }

  /**
   * Track a resource for release on stop
   */
  protected register(name: string, release: () => Promise<void> | void): void {
    this.resources.push({ name, release });
  }

  async run(): Promise<SessionSummary> {
    if (this.current !== 'idle' || this.starting) {
      throw new SessionStateError(`Session cannot run from state ${this.starting ? 'starting' : this.current}`);
    }
    this.starting = true;

    try {
      await this.acquire();
    } catch (error) {
      this.logger.error({ error }, 'Session startup failed');
      const released = await this.releaseAll();
      this.transition('closed');
      this.logger.info({ released }, 'Released resources after failed startup');
      throw error;
    }

    this.transition('streaming');

    const { reason, error } = await this.loop();

    this.transition('stopping');
    const released = await this.releaseAll();
    this.transition('closed');

    const summary: SessionSummary = { reason, released, frames: this.frameCount() };
    if (error !== undefined) summary.error = error;

    this.logger.info({ reason, released, frames: summary.frames }, 'Session stopped');

    return summary;
  }

  /**
   * Request a stop. The first reason wins; later calls are ignored.
   */
  stop(reason: StopReason = 'stop-command'): void {
    if (this.stopRequest !== null || this.current === 'closed') return;
    this.stopRequest = reason;
    this.logger.info({ reason, state: this.current }, 'Stop requested');
    this.onStopRequested();
  }

  private async loop(): Promise<{ reason: StopReason; error?: unknown }> {
    const startedAt = this.now();
    let lastReport = startedAt;

    for (;;) {
      if (this.stopRequest !== null) {
        return { reason: this.stopRequest };
      }
      if (this.durationMs !== undefined && this.now() - startedAt >= this.durationMs) {
        return { reason: 'duration' };
      }

      try {
        await this.iterate();
      } catch (error) {
        if (isFatal(error) || error instanceof SessionClosedError) {
          this.logger.error({ error }, 'Fatal error, stopping session');
          return { reason: 'fatal', error };
        }
        this.logger.warn({ error }, 'Iteration failed');
      }

      const now = this.now();
      if (now - lastReport >= this.reportIntervalMs) {
        lastReport = now;
        this.report();
      }

      // Sockets and timers only make progress between iterations
      await yieldToEventLoop();
    }
  }

  private async releaseAll(): Promise<string[]> {
    const released: string[] = [];

    while (this.resources.length > 0) {
      const resource = this.resources.pop();
      if (!resource) break;

      try {
        await resource.release();
        released.push(resource.name);
        this.logger.debug({ resource: resource.name }, 'Released');
      } catch (error) {
        this.logger.error({ error, resource: resource.name }, 'Failed to release resource');
      }
    }

    return released;
  }

  private transition(next: SessionState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    this.starting = false;
    this.emit('state', next, previous);
  }
}
