import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { decode } from '@msgpack/msgpack';
import { depthPath, encodePnm, imageExtension, writeFrame } from './frame-writer.js';
import { readRecording, RecordingWriter } from './recording.js';
import { FrameFileSink, frameFileName } from '../sink/sink.js';
import { StartupError } from '../errors.js';
import type { EncodedMessage, Frame } from '../models/frame.js';

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

function message(streamId: string, capturedAt: number, fill: number): EncodedMessage {
  return {
    streamId,
    capturedAt,
    image: { encoding: 'raw', width: 1, height: 2, channels: 1, data: new Uint8Array([fill, fill]) }
  };
}

describe('encodePnm', () => {
  it('writes a binary PPM header and pixels', () => {
    const pnm = encodePnm({ width: 1, height: 1, channels: 3, data: new Uint8Array([1, 2, 3]) });

    expect(pnm.toString('latin1')).toBe('P6\n1 1\n255\n\x01\x02\x03');
  });

  it('drops the alpha channel', () => {
    const pnm = encodePnm({ width: 2, height: 1, channels: 4, data: new Uint8Array([1, 2, 3, 255, 4, 5, 6, 255]) });

    expect(Array.from(pnm.subarray(11))).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('picks the extension from the channel count', () => {
    const gray: Frame = { capturedAt: 0, image: { width: 1, height: 1, channels: 1, data: new Uint8Array(1) } };
    const color: Frame = { capturedAt: 0, image: { width: 1, height: 1, channels: 3, data: new Uint8Array(3) } };

    expect(imageExtension(gray)).toBe('pgm');
    expect(imageExtension(color)).toBe('ppm');
  });
});

describe('writeFrame', () => {
  it('writes the depth plane to a sidecar file', async () => {
    const path = join(await tempDir(), 'nested', 'frame.pgm');
    const frame: Frame = {
      capturedAt: 12.5,
      image: { width: 2, height: 1, channels: 1, data: new Uint8Array([7, 8]) },
      depth: { width: 2, height: 1, data: new Float32Array([1.5, 3]) }
    };

    await writeFrame(frame, path);

    const sidecar = decode(await readFile(depthPath(path)));
    expect(sidecar).toMatchObject({ width: 2, height: 1, capturedAt: 12.5 });
    expect(Array.from(await readFile(path))).toEqual([...Buffer.from('P5\n2 1\n255\n', 'ascii'), 7, 8]);
  });
});

describe('RecordingWriter', () => {
  it('appends packets that read back in order', async () => {
    const path = join(await tempDir(), 'recording.msgpack');
    const writer = new RecordingWriter(path);
    await writer.open();

    writer.write(message('ego_view', 1, 10));
    writer.write([message('ego_view', 2, 20), message('head', 2, 30)]);
    await writer.close();
    await writer.close();

    const packets: EncodedMessage[][] = [];
    for await (const packet of readRecording(path)) {
      packets.push(packet);
    }

    expect(writer.getStats().packets).toBe(2);
    expect(packets.map(p => p.map(m => `${m.streamId}@${m.capturedAt}`))).toEqual([
      ['ego_view@1'],
      ['ego_view@2', 'head@2']
    ]);
    expect(Array.from(packets[1][1].image.data)).toEqual([30, 30]);
  });

  it('drops packets while the file stream is backed up', async () => {
    const path = join(await tempDir(), 'slow.msgpack');
    const writer = new RecordingWriter(path, { highWaterMark: 8 });
    await writer.open();

    writer.write(message('ego_view', 1, 10));
    writer.write(message('ego_view', 2, 20));
    writer.write(message('ego_view', 3, 30));

    expect(writer.congested).toBe(true);
    expect(writer.getStats()).toMatchObject({ packets: 1, dropped: 2 });

    await vi.waitFor(() => {
      expect(writer.congested).toBe(false);
    });
    writer.write(message('ego_view', 4, 40));
    await writer.close();

    const stamps: number[] = [];
    for await (const packet of readRecording(path)) {
      stamps.push(...packet.map(m => m.capturedAt));
    }
    expect(stamps).toEqual([1, 4]);
    expect(writer.getStats()).toMatchObject({ packets: 2, dropped: 2 });
  });

  it('fails to open under a file', async () => {
    const dir = await tempDir();
    const blocker = join(dir, 'blocker');
    const writer = new RecordingWriter(blocker);
    await writer.open();
    await writer.close();

    await expect(new RecordingWriter(join(blocker, 'child.msgpack')).open()).rejects.toBeInstanceOf(StartupError);
  });
});

describe('FrameFileSink', () => {
  it('numbers rendered frames per stream', async () => {
    const dir = await tempDir();
    const sink = new FrameFileSink(dir);
    const frame: Frame = { capturedAt: 0, image: { width: 1, height: 1, channels: 1, data: new Uint8Array([5]) } };

    sink.render(frame, { streamId: 'head', label: 'head', fps: 0 });
    sink.render(frame, { streamId: 'head', label: 'head', fps: 0 });
    await sink.flush();

    const second = await readFile(join(dir, 'head_000001.pgm'));
    expect(Array.from(second.subarray(-1))).toEqual([5]);
  });

  it('formats file names with six digits', () => {
    expect(frameFileName('ego_view', 42, 'ppm')).toBe('ego_view_000042.ppm');
  });
});
