import { mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { BuildError, runCommand, wrapPhaseError } from '@gitbench/core';
import type { CommandExecutor } from '@gitbench/core';
import { exists, removeDir } from './fs.js';

const BUILD_TIMEOUT_MS = 3_600_000;

export interface BuildBinaryOptions {
  /** Source checkout to build from */
  sourceDir: string;
  /** Build output directory, unique per checkout */
  targetDir: string;
  binaryName: string;
  /** Override the build command; defaults to a release cargo build */
  command?: string[];
}

export function expectedBinaryPath(targetDir: string, binaryName: string): string {
  const file = process.platform === 'win32' ? `${binaryName}.exe` : binaryName;
  return join(targetDir, 'release', file);
}

/**
 * Build the tool from a checkout and return the binary path. The binary
 * lands at a deterministic location under `targetDir`.
 */
export async function buildBinary(
  options: BuildBinaryOptions,
  exec: CommandExecutor = runCommand
): Promise<string> {
  const { sourceDir, targetDir, binaryName } = options;
  const [cmd, ...args] = options.command ?? ['cargo', 'build', '--release', '--bin', binaryName];
  if (!cmd) {
    throw new BuildError('Build command is empty');
  }

  await mkdir(targetDir, { recursive: true });

  try {
    await exec(cmd, args, {
      cwd: sourceDir,
      env: { ...process.env, CARGO_TARGET_DIR: targetDir },
      timeoutMs: BUILD_TIMEOUT_MS,
    });
  } catch (err) {
    throw wrapPhaseError(err, (message, opts) => new BuildError(message, opts), `Build failed in ${sourceDir}`);
  }

  const binary = expectedBinaryPath(targetDir, binaryName);
  if (!(await exists(binary))) {
    throw new BuildError(`Expected binary not found: ${binary}`);
  }
  return binary;
}

export interface WorktreeOptions {
  /** Repository the worktree is borrowed from */
  repoRoot: string;
  ref: string;
  dir: string;
  /** Remote and branch fetched before adding; null skips the fetch */
  fetch?: [remote: string, branch: string] | null;
}

/**
 * Check out `ref` into a detached worktree for the duration of `fn`. The
 * worktree is removed on every exit path; a failed removal is reported as a
 * warning and never replaces the body's own error.
 */
export async function withWorktree<T>(
  options: WorktreeOptions,
  fn: (dir: string) => Promise<T>,
  exec: CommandExecutor = runCommand
): Promise<T> {
  const { repoRoot, ref, dir } = options;
  const fetch = options.fetch === undefined ? ['origin', 'main'] : options.fetch;
  const ambient = { cwd: repoRoot, env: process.env };

  await mkdir(dirname(dir), { recursive: true });
  await removeDir(dir);

  if (fetch) {
    await exec('git', ['fetch', '--quiet', ...fetch], ambient);
  }
  await exec('git', ['worktree', 'add', '--detach', dir, ref], ambient);

  try {
    return await fn(dir);
  } finally {
    try {
      await exec('git', ['worktree', 'remove', '--force', dir], ambient);
    } catch (err) {
      console.warn(`warning: failed to remove worktree ${dir}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
