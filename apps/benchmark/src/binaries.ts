import { join, resolve } from 'node:path';
import { SetupError, runCommand } from '@gitbench/core';
import type { CommandExecutor } from '@gitbench/core';
import { buildBinary, exists, gitOutput, withWorktree } from '@gitbench/sandbox';
import type { CommonConfig } from './types.js';

export interface PreparedBinaries {
  currentBinary: string;
  baselineBinary: string;
  /** Commit the baseline binary was built from */
  mainSha: string;
}

export const EXTERNAL_BINARY_SHA = 'unknown (external binary)';

async function existingBinary(path: string, which: string): Promise<string> {
  const absolute = resolve(path);
  if (!(await exists(absolute))) {
    throw new SetupError(`${which} binary not found: ${absolute}`);
  }
  return absolute;
}

/**
 * Reuse the given binaries or build them: the current one from the checkout,
 * the baseline one from a temporary worktree at `mainRef`
 */
export async function prepareBinaries(
  config: Pick<CommonConfig, 'repoRoot' | 'workRoot' | 'binaryName' | 'mainRef' | 'currentBin' | 'mainBin'>,
  exec: CommandExecutor = runCommand
): Promise<PreparedBinaries> {
  const { repoRoot, workRoot, binaryName, mainRef } = config;
  const buildDir = join(workRoot, 'build');
  const targetsDir = join(buildDir, 'targets');

  let currentBinary: string;
  if (config.currentBin !== undefined) {
    currentBinary = await existingBinary(config.currentBin, 'Current');
  } else {
    console.log('Building current branch binary...');
    currentBinary = await buildBinary(
      { sourceDir: repoRoot, targetDir: join(targetsDir, 'current'), binaryName },
      exec
    );
  }

  if (config.mainBin !== undefined) {
    return {
      currentBinary,
      baselineBinary: await existingBinary(config.mainBin, 'Main'),
      mainSha: EXTERNAL_BINARY_SHA,
    };
  }

  console.log(`Preparing main worktree at ${mainRef}...`);
  return withWorktree(
    { repoRoot, ref: mainRef, dir: join(buildDir, 'main-worktree') },
    async (worktree) => {
      console.log('Building main branch binary...');
      const baselineBinary = await buildBinary(
        { sourceDir: worktree, targetDir: join(targetsDir, 'main'), binaryName },
        exec
      );
      const mainSha = await gitOutput(worktree, ['rev-parse', 'HEAD'], exec);
      return { currentBinary, baselineBinary, mainSha };
    },
    exec
  );
}
