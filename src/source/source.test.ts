import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FramePacer } from './frame-source.js';
import { SyntheticFrameSource } from './synthetic-source.js';
import { ReplayFrameSource } from './replay-source.js';
import { RecordingWriter } from '../storage/recording.js';
import { FrameCodec } from '../codec/frame-codec.js';
import { DeviceError, SourceExhaustedError, StartupError } from '../errors.js';
import type { Frame, StreamEndpointConfig } from '../models/frame.js';

const CONFIG: StreamEndpointConfig = {
  host: '127.0.0.1',
  port: 0,
  resolution: 'vga',
  fps: 30,
  depth: false
};

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (cleanups.length > 0) {
    const cleanup = cleanups.pop();
    if (cleanup) await cleanup();
  }
});

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'frame-relay-'));
  cleanups.push(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

function grayFrame(capturedAt: number, fill: number): Frame {
  return {
    capturedAt,
    image: { width: 2, height: 2, channels: 1, data: new Uint8Array(4).fill(fill) }
  };
}

describe('FramePacer', () => {
  it('does not wait on the first call or when far behind', async () => {
    let t = 0;
    const pacer = new FramePacer(10, () => t);

    await pacer.wait();
    t = 500;
    const started = performance.now();
    await pacer.wait();

    expect(performance.now() - started).toBeLessThan(50);
  });

  it('sleeps until the next frame is due', async () => {
    const pacer = new FramePacer(20);

    await pacer.wait();
    const started = performance.now();
    await pacer.wait();

    expect(performance.now() - started).toBeGreaterThanOrEqual(40);
  });
});

describe('SyntheticFrameSource', () => {
  it('reports the resolution class dimensions', async () => {
    const source = new SyntheticFrameSource({ unpaced: true });

    const info = await source.open({ ...CONFIG, resolution: '720p', deviceSelector: 7 });
    await source.close();

    expect(info).toEqual({ model: 'Synthetic', serial: 7, width: 1280, height: 720, fps: 30, depth: false });
  });

  it('produces frames with a depth ramp', async () => {
    const source = new SyntheticFrameSource({ size: { width: 10, height: 2 }, unpaced: true, clock: () => 42 });
    await source.open({ ...CONFIG, depth: true });

    const frame = await source.grab();
    await source.close();

    expect(frame?.capturedAt).toBe(42);
    expect(frame?.image).toMatchObject({ width: 10, height: 2, channels: 3 });
    expect(frame?.image.data.length).toBe(60);
    expect(frame?.depth?.data[0]).toBeCloseTo(0.5, 6);
    expect(frame?.depth?.data[5]).toBeCloseTo(2.75, 6);
  });

  it('rejects a second open', async () => {
    const source = new SyntheticFrameSource({ unpaced: true });
    await source.open(CONFIG);

    await expect(source.open(CONFIG)).rejects.toBeInstanceOf(StartupError);
    await source.close();
  });

  it('fails to grab before open and after close', async () => {
    const source = new SyntheticFrameSource({ unpaced: true });

    await expect(source.grab()).rejects.toBeInstanceOf(DeviceError);
    await source.open(CONFIG);
    await source.close();
    await source.close();
    await expect(source.grab()).rejects.toBeInstanceOf(DeviceError);
  });
});

describe('ReplayFrameSource', () => {
  async function record(path: string, frames: Frame[], streamId = 'ego_view'): Promise<void> {
    const codec = new FrameCodec();
    const writer = new RecordingWriter(path);
    await writer.open();
    for (const frame of frames) {
      writer.write(codec.encode(frame, streamId));
    }
    await writer.close();
  }

  it('plays a recording back in order, then reports exhaustion', async () => {
    const path = join(await tempDir(), 'session.msgpack');
    await record(path, [grayFrame(1, 10), grayFrame(2, 20)]);

    const source = new ReplayFrameSource({ path, unpaced: true, clock: () => 99 });
    const info = await source.open(CONFIG);

    expect(info).toEqual({ model: 'Replay', width: 2, height: 2, fps: 30, depth: false });

    const first = await source.grab();
    const second = await source.grab();
    expect(first?.capturedAt).toBe(99);
    expect(Array.from(first?.image.data ?? [])).toEqual([10, 10, 10, 10]);
    expect(Array.from(second?.image.data ?? [])).toEqual([20, 20, 20, 20]);

    await expect(source.grab()).rejects.toBeInstanceOf(SourceExhaustedError);
    await source.close();
  });

  it('loops when asked to', async () => {
    const path = join(await tempDir(), 'loop.msgpack');
    await record(path, [grayFrame(1, 10), grayFrame(2, 20)]);

    const source = new ReplayFrameSource({ path, unpaced: true, loop: true });
    await source.open(CONFIG);

    const fills: number[] = [];
    for (let i = 0; i < 5; i++) {
      const frame = await source.grab();
      fills.push(frame?.image.data[0] ?? -1);
    }
    await source.close();

    expect(fills).toEqual([10, 20, 10, 20, 10]);
    expect(source.getStats()).toEqual({ played: 5, loops: 2, skipped: 0 });
  });

  it('skips packets without the selected stream', async () => {
    const path = join(await tempDir(), 'mixed.msgpack');
    const codec = new FrameCodec();
    const writer = new RecordingWriter(path);
    await writer.open();
    writer.write(codec.encode(grayFrame(1, 10), 'ego_view'));
    writer.write(codec.encode(grayFrame(2, 20), 'head'));
    await writer.close();

    const source = new ReplayFrameSource({ path, streamId: 'head', unpaced: true });
    await source.open(CONFIG);
    const frame = await source.grab();
    await source.close();

    expect(frame?.image.data[0]).toBe(20);
    expect(source.getStats().skipped).toBe(1);
  });

  it('fails startup on a missing file', async () => {
    const source = new ReplayFrameSource({ path: join(await tempDir(), 'absent.msgpack') });

    await expect(source.open(CONFIG)).rejects.toBeInstanceOf(StartupError);
  });

  it('fails startup on a recording without frames', async () => {
    const path = join(await tempDir(), 'empty.msgpack');
    await writeFile(path, new Uint8Array(0));

    const source = new ReplayFrameSource({ path });

    await expect(source.open(CONFIG)).rejects.toThrow('has no frames for any stream');
  });
});
