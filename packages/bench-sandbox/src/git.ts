import { constants } from 'node:fs';
import { access, realpath } from 'node:fs/promises';
import { basename, delimiter, join } from 'node:path';
import { runCommand, SetupError } from '@gitbench/core';
import type { CommandExecutor } from '@gitbench/core';

const PREFERRED_GIT_PATHS = [
  '/usr/bin/git',
  '/opt/homebrew/bin/git',
  '/usr/local/bin/git',
  '/bin/git',
];

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export interface ResolveGitOptions {
  /** Absolute paths tried before the PATH lookup */
  candidates?: string[];
  /** PATH string to search when no candidate matches */
  searchPath?: string;
  /** Name of the tool under test; a git that resolves to it is a wrapper */
  toolBinaryName?: string;
}

/**
 * Find the unmodified system git the hooks-only variants dispatch to
 */
export async function resolveSystemGit(options: ResolveGitOptions = {}): Promise<string> {
  const candidates = options.candidates ?? PREFERRED_GIT_PATHS;

  for (const candidate of candidates) {
    if (await isExecutable(candidate)) {
      return realpath(candidate);
    }
  }

  const gitName = process.platform === 'win32' ? 'git.exe' : 'git';
  const searchPath = options.searchPath ?? process.env.PATH ?? '';

  for (const dir of searchPath.split(delimiter).filter(Boolean)) {
    const candidate = join(dir, gitName);
    if (!(await isExecutable(candidate))) continue;

    const resolved = await realpath(candidate);
    const toolName = options.toolBinaryName?.toLowerCase();
    if (toolName && basename(resolved).toLowerCase().includes(toolName)) {
      throw new SetupError(
        `Resolved git points to a ${options.toolBinaryName} wrapper, not the real git binary: ${resolved}. ` +
          'Install git or pass a clean PATH.'
      );
    }
    return resolved;
  }

  throw new SetupError('Unable to resolve system git from PATH.');
}

/**
 * Trimmed stdout of a git command run with the ambient environment
 */
export async function gitOutput(
  repoDir: string,
  args: string[],
  exec: CommandExecutor = runCommand
): Promise<string> {
  const result = await exec('git', args, { cwd: repoDir, timeoutMs: 120_000 });
  return result.stdout.trim();
}
