#!/usr/bin/env node
/**
 * Frame Relay Producer - Main Entry Point
 */

import { validateConfig, describeConfig } from './config/env.js';
import { parseProducerArgs, PRODUCER_USAGE, type ProducerCliOptions } from './config/cli.js';
import { logger, createLogger } from './utils/logger.js';
import { FrameCodec } from './codec/frame-codec.js';
import { FramePublisher } from './transport/publisher.js';
import { RecordingWriter } from './storage/recording.js';
import { SyntheticFrameSource } from './source/synthetic-source.js';
import { ReplayFrameSource } from './source/replay-source.js';
import { LogSink } from './sink/sink.js';
import { ProducerSession } from './session/producer-session.js';
import type { FrameSource } from './source/frame-source.js';

const appLogger = createLogger('app');

/**
 * Application instance
 */
class ProducerApp {
  private session: ProducerSession | null = null;

  constructor(private options: ProducerCliOptions) {}

  /**
   * Initialize application
   */
  initialize(): void {
    validateConfig();
    appLogger.info(describeConfig(), 'Configuration');

    const { endpoint, source, replayPath, loop, encoding, display, savePath, durationMs, streamId } = this.options;

    const frameSource: FrameSource = source === 'replay' && replayPath !== undefined
      ? new ReplayFrameSource({ path: replayPath, loop, streamId })
      : new SyntheticFrameSource();

    // Port 0 runs without publishing
    const publisher = endpoint.port === 0
      ? undefined
      : new FramePublisher({ host: endpoint.host, port: endpoint.port });

    this.session = new ProducerSession({
      source: frameSource,
      config: endpoint,
      streamId,
      codec: new FrameCodec({ imageEncoding: encoding }),
      publisher,
      recorder: savePath === undefined ? undefined : new RecordingWriter(savePath),
      preview: display ? new LogSink('preview') : undefined,
      durationMs
    });

    appLogger.info({ source, stream: streamId, port: endpoint.port }, 'All components initialized');
  }

  /**
   * Run until stopped; resolves with the process exit code
   */
  async start(): Promise<number> {
    const session = this.session;
    if (!session) {
      throw new Error('ProducerApp.start() called before initialize()');
    }

    this.setupShutdownHandlers(session);

    appLogger.info('Starting frame producer');
    const summary = await session.run();

    appLogger.info({
      reason: summary.reason,
      frames: summary.frames,
      released: summary.released.join(', ')
    }, 'Producer stopped');

    return summary.reason === 'fatal' ? 1 : 0;
  }

  /**
   * Setup graceful shutdown handlers
   */
  private setupShutdownHandlers(session: ProducerSession): void {
    const shutdown = (signal: string) => {
      appLogger.info({ signal }, 'Received shutdown signal');
      session.stop('interrupt');
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    // Handle uncaught errors
    process.on('uncaughtException', (error) => {
      appLogger.fatal({ error }, 'Uncaught exception');
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      appLogger.fatal({ reason }, 'Unhandled rejection');
      process.exit(1);
    });
  }
}

/**
 * Main entry point
 */
async function main() {
  try {
    const options = parseProducerArgs(process.argv.slice(2));
    if (options.help) {
      process.stdout.write(`${PRODUCER_USAGE}\n`);
      return;
    }

    const app = new ProducerApp(options);
    app.initialize();
    process.exitCode = await app.start();
  } catch (error) {
    logger.fatal({ error }, 'Failed to start producer');
    process.exit(1);
  }
}

// Start application
void main();
