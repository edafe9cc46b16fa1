#!/usr/bin/env node
/**
 * Frame Relay Consumer - Main Entry Point
 */

import { emitKeypressEvents } from 'readline';
import { validateConfig, describeConfig } from './config/env.js';
import { parseConsumerArgs, CONSUMER_USAGE, type ConsumerCliOptions } from './config/cli.js';
import { logger, createLogger } from './utils/logger.js';
import { FrameSubscriber } from './transport/subscriber.js';
import { ConsumerSession } from './session/consumer-session.js';

const appLogger = createLogger('app');

interface Keypress {
  name?: string;
  ctrl?: boolean;
}

/**
 * Application instance
 */
class ConsumerApp {
  private session: ConsumerSession | null = null;

  constructor(private options: ConsumerCliOptions) {}

  /**
   * Initialize application
   */
  initialize(): void {
    validateConfig();
    appLogger.info(describeConfig(), 'Configuration');

    const { host, port, save, saveDir, timeoutMs } = this.options;

    this.session = new ConsumerSession({
      subscriber: new FrameSubscriber({ host, port }),
      timeoutMs,
      saveDir,
      save
    });

    appLogger.info({ address: `${host}:${port}`, saveDir, timeoutMs }, 'All components initialized');
  }

  /**
   * Run until stopped; resolves with the process exit code
   */
  async start(): Promise<number> {
    const session = this.session;
    if (!session) {
      throw new Error('ConsumerApp.start() called before initialize()');
    }

    this.setupShutdownHandlers(session);
    const restoreInput = this.setupKeyboard(session);

    try {
      appLogger.info('Starting frame consumer');
      const summary = await session.run();

      appLogger.info({
        reason: summary.reason,
        frames: summary.frames,
        saved: session.savedCounts(),
        released: summary.released.join(', ')
      }, 'Consumer stopped');

      return summary.reason === 'fatal' ? 1 : 0;
    } finally {
      restoreInput();
    }
  }

  /**
   * `s` toggles saving, `q` or Esc quits. Raw mode swallows Ctrl+C, so it
   * is mapped back to an interrupt.
   */
  private setupKeyboard(session: ConsumerSession): () => void {
    const input = process.stdin;
    if (!input.isTTY) {
      return () => {};
    }

    emitKeypressEvents(input);
    input.setRawMode(true);
    input.resume();

    const onKeypress = (_text: string | undefined, key: Keypress | undefined) => {
      if (!key) return;

      if (key.ctrl && key.name === 'c') {
        session.stop('interrupt');
      } else if (key.name === 'q' || key.name === 'escape') {
        session.stop('stop-command');
      } else if (key.name === 's') {
        session.setSaving(!session.isSaving).catch((error: unknown) => {
          appLogger.error({ error, directory: session.saveDir }, 'Failed to toggle saving');
        });
      }
    };

    input.on('keypress', onKeypress);
    appLogger.info('Press s to toggle saving, q or Esc to quit');

    return () => {
      input.off('keypress', onKeypress);
      input.setRawMode(false);
      input.pause();
    };
  }

  /**
   * Setup graceful shutdown handlers
   */
  private setupShutdownHandlers(session: ConsumerSession): void {
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
    const options = parseConsumerArgs(process.argv.slice(2));
    if (options.help) {
      process.stdout.write(`${CONSUMER_USAGE}\n`);
      return;
    }

    const app = new ConsumerApp(options);
    app.initialize();
    process.exitCode = await app.start();
  } catch (error) {
    logger.fatal({ error }, 'Failed to start consumer');
    process.exit(1);
  }
}

// Start application
void main();
