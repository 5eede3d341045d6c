import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { Transcoder } from './transcoder.js';
import { JobCancelledError, TranscodeFailedError } from '../jobs/errors.js';
import {
  commandResult,
  createFakeMediaTools,
  createRecordingRunner,
  makeTempDir,
  removeTempDir,
} from '../__tests__/helpers/fakes.js';
import type { AudioFormat } from '../config/env.js';
import type { CommandRunner } from './command.js';

function transcoderWith(runCommand: CommandRunner, format: AudioFormat = 'mp3'): Transcoder {
  return new Transcoder({
    runCommand,
    ffmpegPath: 'ffmpeg',
    ffprobePath: 'ffprobe',
    format,
    timeoutMs: 600_000,
  });
}

async function exists(filePath: string): Promise<boolean> {
  return access(filePath).then(() => true, () => false);
}

describe('Transcoder.transcode', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('encodes to mp3 and removes the raw file', async () => {
    const input = path.join(dir, 'source.webm');
    await writeFile(input, 'raw');
    const tools = createFakeMediaTools();

    const result = await transcoderWith(tools.runner).transcode(input, path.join(dir, 'entry1'));

    const output = path.join(dir, 'entry1.mp3');
    expect(result).toEqual({ filePath: output, mimeType: 'audio/mpeg', fallback: false });
    expect(tools.calls[0].args).toEqual([
      '-loglevel', 'error', '-i', input, '-vn',
      '-acodec', 'libmp3lame', '-q:a', '2', '-ar', '44100', '-ac', '2',
      '-y', output,
    ]);
    expect(await exists(input)).toBe(false);
    expect(await exists(output)).toBe(true);
  });

  it('encodes to m4a when configured', async () => {
    const input = path.join(dir, 'source.webm');
    await writeFile(input, 'raw');
    const tools = createFakeMediaTools();

    const result = await transcoderWith(tools.runner, 'm4a').transcode(input, path.join(dir, 'entry1'));

    expect(result).toEqual({ filePath: path.join(dir, 'entry1.m4a'), mimeType: 'audio/mp4', fallback: false });
    expect(tools.calls[0].args).toContain('aac');
  });

  it('falls back to a playable original when encoding fails', async () => {
    const input = path.join(dir, 'source.m4a');
    await writeFile(input, 'raw');
    const tools = createFakeMediaTools({ encode: 'fail' });

    const result = await transcoderWith(tools.runner).transcode(input, path.join(dir, 'entry1'));

    expect(result).toEqual({
      filePath: input,
      mimeType: 'audio/mp4',
      fallback: true,
      warning: "Encoding failed (ffmpeg exited with code 1: Unknown encoder 'libmp3lame'); publishing the original m4a file",
    });
    expect(await exists(input)).toBe(true);
  });

  it('fails when the original is not playable audio', async () => {
    const input = path.join(dir, 'source.webm');
    await writeFile(input, 'raw');
    const tools = createFakeMediaTools({ encode: 'fail' });

    await expect(transcoderWith(tools.runner).transcode(input, path.join(dir, 'entry1'))).rejects.toThrow(
      new TranscodeFailedError("ffmpeg exited with code 1: Unknown encoder 'libmp3lame'")
    );
  });

  it('does not fall back after a timeout', async () => {
    const input = path.join(dir, 'source.mp3');
    await writeFile(input, 'raw');
    const tools = createFakeMediaTools({ encode: 'timeout' });

    const error = await transcoderWith(tools.runner)
      .transcode(input, path.join(dir, 'entry1'))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscodeFailedError);
    expect(error).toMatchObject({ timedOut: true, message: 'Encoding timed out after 600s' });
  });

  it('treats an empty output file as a failure and removes it', async () => {
    const input = path.join(dir, 'source.webm');
    await writeFile(input, 'raw');
    const output = path.join(dir, 'entry1.mp3');
    const { runner } = createRecordingRunner(async () => {
      await writeFile(output, '');
      return commandResult();
    });

    await expect(transcoderWith(runner).transcode(input, path.join(dir, 'entry1'))).rejects.toThrow(
      'ffmpeg produced an empty file'
    );
    expect(await exists(output)).toBe(false);
  });

  it('treats a missing output file as a failure', async () => {
    const input = path.join(dir, 'source.webm');
    await writeFile(input, 'raw');
    const { runner } = createRecordingRunner(() => commandResult());

    await expect(transcoderWith(runner).transcode(input, path.join(dir, 'entry1'))).rejects.toThrow(
      'ffmpeg produced no output file'
    );
  });

  it('reports cancellation', async () => {
    const input = path.join(dir, 'source.mp3');
    await writeFile(input, 'raw');
    const { runner } = createRecordingRunner(() => commandResult({ exitCode: null, aborted: true }));

    await expect(transcoderWith(runner).transcode(input, path.join(dir, 'entry1'))).rejects.toBeInstanceOf(
      JobCancelledError
    );
  });
});

describe('Transcoder.probeDuration', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rounds the reported duration', async () => {
    const tools = createFakeMediaTools({ probeSeconds: '61.6' });
    expect(await transcoderWith(tools.runner).probeDuration('/data/a.mp3')).toBe(62);
    expect(tools.calls[0].command).toBe('ffprobe');
  });

  it('returns undefined when ffprobe cannot tell', async () => {
    const tools = createFakeMediaTools({ probeSeconds: 'N/A' });
    expect(await transcoderWith(tools.runner).probeDuration('/data/a.mp3')).toBeUndefined();
  });

  it('returns undefined when ffprobe fails', async () => {
    const { runner } = createRecordingRunner(() => commandResult({ exitCode: 1, stderr: 'Invalid data' }));
    expect(await transcoderWith(runner).probeDuration('/data/a.mp3')).toBeUndefined();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
