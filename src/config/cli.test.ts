import { describe, it, expect } from 'vitest';
import { parseConsumerArgs, parseProducerArgs } from './cli.js';
import { env, validateConfig, type Env } from './env.js';
import { ConfigError } from '../errors.js';

const DEFAULTS: Env = { ...env, HOST: '0.0.0.0', PORT: 5556, RECEIVE_TIMEOUT_MS: 5000 };

function problems(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseProducerArgs', () => {
  it('applies defaults', () => {
    expect(parseProducerArgs([], DEFAULTS)).toEqual({
      help: false,
      endpoint: { host: '0.0.0.0', port: 5556, resolution: '720p', fps: 30, depth: false, deviceSelector: undefined },
      streamId: 'ego_view',
      source: 'synthetic',
      replayPath: undefined,
      loop: false,
      encoding: 'raw',
      display: false,
      savePath: undefined,
      durationMs: undefined
    });
  });

  it('reads every flag', () => {
    const options = parseProducerArgs([
      '--resolution', 'vga',
      '--fps', '15',
      '--depth',
      '--serial', '3',
      '--port', '0',
      '--stream', 'head',
      '--encoding', 'deflate',
      '--save', 'out/run.msgpack',
      '--duration', '2.5',
      '--display'
    ], DEFAULTS);

    expect(options.endpoint).toEqual({
      host: '0.0.0.0',
      port: 0,
      resolution: 'vga',
      fps: 15,
      depth: true,
      deviceSelector: 3
    });
    expect(options).toMatchObject({
      streamId: 'head',
      encoding: 'deflate',
      savePath: 'out/run.msgpack',
      durationMs: 2500,
      display: true
    });
  });

  it('requires a recording for replay', () => {
    expect(problems(() => parseProducerArgs(['--source', 'replay'], DEFAULTS))).toEqual([
      '--replay: required with --source replay'
    ]);
  });

  it('reports every invalid value', () => {
    const found = problems(() => parseProducerArgs(['--fps', '0', '--port', '70000'], DEFAULTS));

    expect(found).toHaveLength(2);
    expect(found[0]).toMatch(/^--fps: /);
    expect(found[1]).toMatch(/^--port: /);
  });

  it('rejects unknown flags', () => {
    expect(() => parseProducerArgs(['--bogus'], DEFAULTS)).toThrow(ConfigError);
  });
});

describe('parseConsumerArgs', () => {
  it('applies defaults', () => {
    expect(parseConsumerArgs([], DEFAULTS)).toEqual({
      help: false,
      host: '127.0.0.1',
      port: 5556,
      save: false,
      saveDir: './captured_frames',
      timeoutMs: 5000
    });
  });

  it('reads every flag', () => {
    expect(parseConsumerArgs(
      ['--ip', '10.0.0.5', '--port', '6000', '--save', '--save-dir', 'frames', '--timeout', '250', '-h'],
      DEFAULTS
    )).toEqual({
      help: true,
      host: '10.0.0.5',
      port: 6000,
      save: true,
      saveDir: 'frames',
      timeoutMs: 250
    });
  });

  it('rejects port 0', () => {
    expect(problems(() => parseConsumerArgs(['--port', '0'], DEFAULTS))).toEqual([
      '--port: must be between 1 and 65535'
    ]);
  });

  it('rejects a non-numeric timeout', () => {
    expect(problems(() => parseConsumerArgs(['--timeout', 'soon'], DEFAULTS))[0]).toMatch(/^--timeout: /);
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(() => validateConfig(DEFAULTS)).not.toThrow();
  });

  it('collects every problem', () => {
    const found = problems(() => validateConfig({
      ...DEFAULTS,
      PUBLISH_HIGH_WATER_MARK: 5,
      FPS_WINDOW_SIZE: 1
    }));

    expect(found).toEqual([
      'PUBLISH_HIGH_WATER_MARK must be 1, 2 or 3.',
      'FPS_WINDOW_SIZE must be an integer of at least 2.'
    ]);
  });
});
