/**
 * Narrow subprocess seam used by the acquirer and transcoder
 *
 * Commands never reject on a non-zero exit: the result carries the exit code,
 * captured output and whether the run was cut short, and callers decide what
 * a failure means for them.
 */

import { spawn } from 'node:child_process';

export interface CommandOptions {
  /** Kill the process after this many milliseconds */
  timeoutMs: number;
  /** Abort signal for cancellation; kills the process when aborted */
  signal?: AbortSignal;
  /** Called for every complete stdout line as it arrives */
  onStdoutLine?: (line: string) => void;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  /** Set when the binary could not be started at all */
  spawnError?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>;

/** Keep the tail of stderr only, ffmpeg can be very chatty */
const MAX_STDERR_CHARS = 8000;

/**
 * Run a command with a timeout and optional cancellation
 */
export const spawnCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let lineBuffer = '';
    let timedOut = false;
    let aborted = false;
    let settled = false;

    if (options.signal?.aborted) {
      resolve({ exitCode: null, stdout, stderr, timedOut, aborted: true });
      return;
    }

    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs);

    const onAbort = (): void => {
      aborted = true;
      child.kill('SIGKILL');
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    // 'error' and 'close' can both fire for one child
    const finish = (result: Omit<CommandResult, 'stdout' | 'stderr' | 'timedOut' | 'aborted'>): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      if (lineBuffer && options.onStdoutLine) {
        options.onStdoutLine(lineBuffer);
      }
      resolve({ ...result, stdout, stderr, timedOut, aborted });
    };

    // Stream decoding keeps multi-byte characters split across reads intact
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (text: string) => {
      stdout += text;

      if (options.onStdoutLine) {
        lineBuffer += text;
        const lines = lineBuffer.split(/\r?\n/);
        lineBuffer = lines.pop() ?? '';
        for (const line of lines) {
          options.onStdoutLine(line);
        }
      }
    });

    child.stderr.on('data', (text: string) => {
      stderr = (stderr + text).slice(-MAX_STDERR_CHARS);
    });

    child.on('close', (code) => {
      finish({ exitCode: code });
    });

    child.on('error', (error) => {
      finish({ exitCode: null, spawnError: error.message });
    });
  });
};

/**
 * One-line reason for a failed command, for job error messages
 */
export function describeCommandFailure(name: string, result: CommandResult): string {
  if (result.spawnError) {
    return `Failed to start ${name}: ${result.spawnError}`;
  }
  if (result.timedOut) {
    return `${name} timed out`;
  }
  const lastLine = result.stderr.trim().split('\n').pop()?.trim();
  return lastLine
    ? `${name} exited with code ${result.exitCode}: ${lastLine}`
    : `${name} exited with code ${result.exitCode}`;
}
