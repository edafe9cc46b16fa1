/**
 * Command-line options for the producer and consumer
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { env, type Env } from './env.js';
import { ConfigError } from '../errors.js';
import { StreamIdSchema } from '../codec/wire.js';
import { RESOLUTION_CLASSES, type ImageEncoding, type StreamEndpointConfig } from '../models/frame.js';

export const PRODUCER_USAGE = `Usage: frame-relay-producer [options]

  --resolution <vga|720p|1080p|2k>  Capture resolution (default 720p)
  --fps <n>                         Target frame rate (default 30)
  --depth                           Capture and send depth
  --serial <n>                      Device selector
  --host <address>                  Bind address (default FRAME_RELAY_HOST or 0.0.0.0)
  --port <n>                        Bind port, 0 disables publishing (default 5556)
  --stream <name>                   Stream name (default ego_view)
  --source <synthetic|replay>       Frame source (default synthetic)
  --replay <path>                   Recording to play back with --source replay
  --loop                            Restart the recording when it ends
  --encoding <raw|deflate>          Image encoding (default raw)
  --display                         Log a preview line per frame
  --save <path>                     Record published frames to a file
  --duration <seconds>              Stop after this long
  -h, --help                        Show this help`;

export const CONSUMER_USAGE = `Usage: frame-relay-consumer [options]

  --ip <address>      Producer address (default 127.0.0.1)
  --port <n>          Producer port (default 5556)
  --save              Save received frames from the start
  --save-dir <path>   Output directory (default ./captured_frames)
  --timeout <ms>      Receive timeout (default 5000)
  -h, --help          Show this help

Keys: s toggles saving, q or Esc quits.`;

const portSchema = z.coerce.number().int().min(0).max(65535);

const producerSchema = z.object({
  resolution: z.enum(RESOLUTION_CLASSES),
  fps: z.coerce.number().int().min(1).max(120),
  depth: z.boolean(),
  serial: z.coerce.number().int().nonnegative().optional(),
  host: z.string().min(1),
  port: portSchema,
  stream: StreamIdSchema,
  source: z.enum(['synthetic', 'replay']),
  replay: z.string().min(1).optional(),
  loop: z.boolean(),
  encoding: z.enum(['raw', 'deflate']),
  display: z.boolean(),
  save: z.string().min(1).optional(),
  duration: z.coerce.number().positive().optional()
}).superRefine((value, ctx) => {
  if (value.source === 'replay' && value.replay === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['replay'], message: 'required with --source replay' });
  }
});

const consumerSchema = z.object({
  ip: z.string().min(1),
  port: portSchema.refine(port => port > 0, 'must be between 1 and 65535'),
  save: z.boolean(),
  saveDir: z.string().min(1),
  timeout: z.coerce.number().int().positive()
});

export interface ProducerCliOptions {
  help: boolean;
  endpoint: StreamEndpointConfig;
  streamId: string;
  source: 'synthetic' | 'replay';
  replayPath?: string;
  loop: boolean;
  encoding: ImageEncoding;
  display: boolean;
  savePath?: string;
  durationMs?: number;
}

export interface ConsumerCliOptions {
  help: boolean;
  host: string;
  port: number;
  save: boolean;
  saveDir: string;
  timeoutMs: number;
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const flag = issue.path.map(part => String(part).replace(/[A-Z]/g, c => `-${c.toLowerCase()}`)).join('.');
    return flag ? `--${flag}: ${issue.message}` : issue.message;
  });
}

function parseFlags<T>(run: () => T): T {
  try {
    return run();
  } catch (error) {
    throw new ConfigError([error instanceof Error ? error.message : String(error)]);
  }
}

export function parseProducerArgs(argv: string[], defaults: Env = env): ProducerCliOptions {
  const { values } = parseFlags(() => parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      resolution: { type: 'string', default: '720p' },
      fps: { type: 'string', default: '30' },
      depth: { type: 'boolean', default: false },
      serial: { type: 'string' },
      host: { type: 'string', default: defaults.HOST },
      port: { type: 'string', default: String(defaults.PORT) },
      stream: { type: 'string', default: 'ego_view' },
      source: { type: 'string', default: 'synthetic' },
      replay: { type: 'string' },
      loop: { type: 'boolean', default: false },
      encoding: { type: 'string', default: 'raw' },
      display: { type: 'boolean', default: false },
      save: { type: 'string' },
      duration: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false }
    }
  }));

  const parsed = producerSchema.safeParse(values);
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }

  const options = parsed.data;
  return {
    help: values.help === true,
    endpoint: {
      host: options.host,
      port: options.port,
      resolution: options.resolution,
      fps: options.fps,
      depth: options.depth,
      deviceSelector: options.serial
    },
    streamId: options.stream,
    source: options.source,
    replayPath: options.replay,
    loop: options.loop,
    encoding: options.encoding,
    display: options.display,
    savePath: options.save,
    durationMs: options.duration === undefined ? undefined : options.duration * 1000
  };
}

export function parseConsumerArgs(argv: string[], defaults: Env = env): ConsumerCliOptions {
  const { values } = parseFlags(() => parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      ip: { type: 'string', default: '127.0.0.1' },
      port: { type: 'string', default: String(defaults.PORT) },
      save: { type: 'boolean', default: false },
      'save-dir': { type: 'string', default: './captured_frames' },
      timeout: { type: 'string', default: String(defaults.RECEIVE_TIMEOUT_MS) },
      help: { type: 'boolean', short: 'h', default: false }
    }
  }));

  const parsed = consumerSchema.safeParse({
    ip: values.ip,
    port: values.port,
    save: values.save,
    saveDir: values['save-dir'],
    timeout: values.timeout
  });
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }

  return {
    help: values.help === true,
    host: parsed.data.ip,
    port: parsed.data.port,
    save: parsed.data.save,
    saveDir: parsed.data.saveDir,
    timeoutMs: parsed.data.timeout
  };
}
