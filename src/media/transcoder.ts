/**
 * Audio transcoding with ffmpeg
 *
 * Every artifact is normalised to the configured canonical format. When the
 * encoder fails but the raw file is already a playable audio container, the
 * raw file is kept as the artifact and a warning is returned instead.
 */

import { rm, stat, unlink } from 'node:fs/promises';
import * as path from 'node:path';
import { describeCommandFailure, type CommandRunner } from './command.js';
import { CANONICAL_MIME, playableAudioMime } from './organization.js';
import { JobCancelledError, TranscodeFailedError } from '../jobs/errors.js';
import type { AudioFormat } from '../config/env.js';
import type { TranscodeResult } from './types.js';

export interface TranscoderOptions {
  runCommand: CommandRunner;
  ffmpegPath: string;
  ffprobePath: string;
  format: AudioFormat;
  timeoutMs: number;
}

const FFPROBE_TIMEOUT_MS = 15_000;

/**
 * Encoder arguments per canonical format
 */
const CODEC_ARGS: Record<AudioFormat, string[]> = {
  // VBR q2, ~190 kbps
  mp3: ['-acodec', 'libmp3lame', '-q:a', '2', '-ar', '44100', '-ac', '2'],
  m4a: ['-c:a', 'aac', '-b:a', '192k', '-movflags', '+faststart'],
};

export class Transcoder {
  constructor(private readonly options: TranscoderOptions) {}

  get format(): AudioFormat {
    return this.options.format;
  }

  /**
   * Encode `inputPath` to `${outputBase}.${format}`
   *
   * @throws TranscodeFailedError when encoding fails and no fallback applies
   * @throws JobCancelledError when the signal aborts the encoder
   */
  async transcode(
    inputPath: string,
    outputBase: string,
    opts: { signal?: AbortSignal } = {}
  ): Promise<TranscodeResult> {
    const { format } = this.options;
    const outputPath = `${outputBase}.${format}`;

    const result = await this.options.runCommand(
      this.options.ffmpegPath,
      ['-loglevel', 'error', '-i', inputPath, '-vn', ...CODEC_ARGS[format], '-y', outputPath],
      { timeoutMs: this.options.timeoutMs, signal: opts.signal }
    );

    if (result.aborted) {
      await rm(outputPath, { force: true });
      throw new JobCancelledError();
    }

    if (result.timedOut) {
      await rm(outputPath, { force: true });
      throw new TranscodeFailedError(
        `Encoding timed out after ${Math.round(this.options.timeoutMs / 1000)}s`,
        { timedOut: true }
      );
    }

    const failure = result.exitCode !== 0
      ? describeCommandFailure('ffmpeg', result)
      : await this.checkOutput(outputPath);

    if (!failure) {
      if (path.resolve(inputPath) !== path.resolve(outputPath)) {
        await unlink(inputPath);
      }
      return { filePath: outputPath, mimeType: CANONICAL_MIME[format], fallback: false };
    }

    await rm(outputPath, { force: true });
    return this.fallback(inputPath, failure);
  }

  /**
   * Duration of an audio file in whole seconds, or undefined when ffprobe
   * cannot tell
   */
  async probeDuration(filePath: string): Promise<number | undefined> {
    const result = await this.options.runCommand(
      this.options.ffprobePath,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
      { timeoutMs: FFPROBE_TIMEOUT_MS }
    );

    if (result.exitCode !== 0) {
      console.warn(JSON.stringify({
        event: 'probe_failed',
        filePath,
        error: describeCommandFailure('ffprobe', result),
        timestamp: new Date().toISOString(),
      }));
      return undefined;
    }

    const seconds = parseFloat(result.stdout.trim());
    return Number.isFinite(seconds) && seconds > 0 ? Math.round(seconds) : undefined;
  }

  /**
   * Reason the encoder output is unusable, or null when it is fine
   */
  private async checkOutput(outputPath: string): Promise<string | null> {
    try {
      const stats = await stat(outputPath);
      return stats.size > 0 ? null : 'ffmpeg produced an empty file';
    } catch {
      return 'ffmpeg produced no output file';
    }
  }

  private fallback(inputPath: string, failure: string): TranscodeResult {
    const mimeType = playableAudioMime(inputPath);

    if (!mimeType) {
      throw new TranscodeFailedError(failure);
    }

    const warning = `Encoding failed (${failure}); publishing the original ${path.extname(inputPath).slice(1)} file`;
    console.warn(JSON.stringify({
      event: 'transcode_fallback',
      inputPath,
      failure,
      timestamp: new Date().toISOString(),
    }));

    return { filePath: inputPath, mimeType, fallback: true, warning };
  }
}
