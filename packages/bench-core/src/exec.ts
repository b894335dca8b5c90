import { spawn } from 'node:child_process';
import { CommandError, CommandTimeoutError } from './errors.js';
import type { ExecOptions, ExecResult } from './types.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 900_000;

/** Grace period between SIGTERM and SIGKILL for a timed out command */
const KILL_GRACE_MS = 5_000;

/**
 * Run a command to completion, capturing its output.
 *
 * Rejects with CommandError on a non-zero exit or spawn failure and with
 * CommandTimeoutError when the timeout elapses.
 */
export async function runCommand(
  cmd: string,
  args: string[],
  options: ExecOptions
): Promise<ExecResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const startTime = performance.now();

  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    // A chunk may end mid-character
    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');

    proc.stdout.on('data', (data: string) => {
      stdout += data;
    });

    proc.stderr.on('data', (data: string) => {
      stderr += data;
    });

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill('SIGTERM');
      killTimer = setTimeout(() => proc.kill('SIGKILL'), KILL_GRACE_MS);
      killTimer.unref();
    }, timeoutMs);

    const failure = (exitCode: number | null) => ({
      cmd: [cmd, ...args],
      cwd: options.cwd,
      exitCode,
      stdout,
      stderr,
    });

    proc.on('close', (code) => {
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      if (settled) return;
      settled = true;

      if (timedOut) {
        reject(new CommandTimeoutError(failure(code), timeoutMs));
        return;
      }
      if (code !== 0) {
        reject(new CommandError(failure(code)));
        return;
      }

      resolve({
        exitCode: 0,
        stdout,
        stderr,
        durationMs: performance.now() - startTime,
      });
    });

    proc.on('error', (err) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      stderr += `${stderr ? '\n' : ''}${err.message}`;
      reject(new CommandError(failure(null)));
    });
  });
}
