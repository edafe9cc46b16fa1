/**
 * Export a producer recording to PNM image files
 *
 * Usage: tsx scripts/export-recording.ts <recording> [outputDir]
 *        tsx scripts/export-recording.ts --list <recording>
 */

import { FrameCodec } from '../src/codec/frame-codec.js';
import { DecodeMismatchError } from '../src/errors.js';
import { assertRecordingReadable, readRecording } from '../src/storage/recording.js';
import { FrameFileSink } from '../src/sink/sink.js';

interface StreamSummary {
  frames: number;
  width: number;
  height: number;
  channels: number;
  depth: boolean;
  first: number;
  last: number;
}

/**
 * Per-stream contents of a recording
 */
async function summarize(path: string): Promise<Map<string, StreamSummary>> {
  const streams = new Map<string, StreamSummary>();

  for await (const packet of readRecording(path)) {
    for (const message of packet) {
      const entry = streams.get(message.streamId);
      if (entry) {
        entry.frames++;
        entry.last = message.capturedAt;
        continue;
      }
      streams.set(message.streamId, {
        frames: 1,
        width: message.image.width,
        height: message.image.height,
        channels: message.image.channels,
        depth: message.depth !== undefined,
        first: message.capturedAt,
        last: message.capturedAt
      });
    }
  }

  return streams;
}

async function listRecording(path: string): Promise<void> {
  const streams = await summarize(path);

  console.log(`\nStreams in ${path}:\n`);
  for (const [streamId, s] of streams) {
    const seconds = s.last - s.first;
    console.log(`Stream: ${streamId}`);
    console.log(`  Frames: ${s.frames}`);
    console.log(`  Size: ${s.width}x${s.height}x${s.channels}${s.depth ? ' + depth' : ''}`);
    console.log(`  Duration: ${seconds.toFixed(2)}s`);
    console.log(`  Started: ${new Date(s.first * 1000).toISOString()}`);
    console.log('');
  }
}

/**
 * Decode every frame and write it through a file sink
 */
async function exportRecording(path: string, outputDir: string): Promise<void> {
  console.log(`Exporting ${path} to ${outputDir}...`);

  const codec = new FrameCodec();
  const sink = new FrameFileSink(outputDir);
  let exported = 0;
  let skipped = 0;

  for await (const packet of readRecording(path)) {
    for (const message of packet) {
      try {
        const frame = codec.decode(message);
        sink.render(frame, { streamId: message.streamId, label: message.streamId, fps: 0 });
        exported++;
      } catch (error) {
        if (!(error instanceof DecodeMismatchError)) throw error;
        console.warn(`  Skipping frame: ${error.message}`);
        skipped++;
      }
    }
    await sink.flush();
  }

  console.log(`✓ Exported ${exported} frames to ${outputDir}`);
  if (skipped > 0) {
    console.log(`  Skipped: ${skipped}`);
  }
}

// CLI
const args = process.argv.slice(2);

try {
  if (args[0] === '--list' && args[1] !== undefined) {
    await assertRecordingReadable(args[1]);
    await listRecording(args[1]);
  } else if (args.length > 0 && !args[0].startsWith('--')) {
    await assertRecordingReadable(args[0]);
    await exportRecording(args[0], args[1] ?? './data/exports');
  } else {
    console.log('Usage: tsx scripts/export-recording.ts <recording> [outputDir]');
    console.log('       tsx scripts/export-recording.ts --list <recording>');
    process.exitCode = 1;
  }
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
