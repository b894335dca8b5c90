import { mkdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CommandExecutor, ExecOptions, ExecResult } from '@gitbench/core';
import type { ScenarioContext } from '../types.js';

export interface ContextCall {
  via: 'git' | 'tool' | 'init';
  args: string[];
  cwd: string;
}

function ok(stdout = ''): ExecResult {
  return { exitCode: 0, stdout, stderr: '', durationMs: 1 };
}

/**
 * Scenario context that records commands instead of running them. `answer`
 * supplies stdout for git commands that need one.
 */
export function createFakeContext(answer: (args: string[]) => string = () => ''): {
  ctx: ScenarioContext;
  calls: ContextCall[];
} {
  const calls: ContextCall[] = [];
  const ctx: ScenarioContext = {
    runGit: async (args, cwd) => {
      calls.push({ via: 'git', args, cwd });
      return ok(answer(args));
    },
    runVariantBinary: async (args, cwd) => {
      calls.push({ via: 'tool', args, cwd });
      return ok();
    },
    initRepo: async (repoDir) => {
      await mkdir(repoDir, { recursive: true });
      calls.push({ via: 'init', args: [], cwd: repoDir });
    },
    checkpoint: async (repoDir, files) => {
      if (files.length === 0) return;
      calls.push({ via: 'tool', args: ['checkpoint', 'mock_ai', ...files], cwd: repoDir });
    },
  };
  return { ctx, calls };
}

/** Commands as `git <args>` / `tool <args>` strings */
export function commandLines(calls: readonly ContextCall[]): string[] {
  return calls.filter((c) => c.via !== 'init').map((c) => `${c.via} ${c.args.join(' ')}`);
}

export interface ExecCall {
  cmd: string;
  args: string[];
  options: ExecOptions;
}

async function hooksPathIn(configPath: string): Promise<string | undefined> {
  try {
    return /hooksPath = (.+)/.exec(await readFile(configPath, 'utf-8'))?.[1];
  } catch {
    return undefined;
  }
}

/**
 * Executor stand-in for sandboxes: records every call and answers hooks-path
 * queries from the repository's `.git/config`, then the sandbox's global config
 */
export function createFakeExecutor(): { exec: CommandExecutor; calls: ExecCall[] } {
  const calls: ExecCall[] = [];
  const exec: CommandExecutor = async (cmd, args, options) => {
    calls.push({ cmd, args, options });
    const query = args.join(' ');
    if (query === 'config --global --get core.hooksPath' || query === 'config --get core.hooksPath') {
      const global = options.env?.GIT_CONFIG_GLOBAL;
      const local = query === 'config --get core.hooksPath' ? await hooksPathIn(join(options.cwd, '.git', 'config')) : undefined;
      return ok(local ?? (global ? await hooksPathIn(global) : undefined) ?? '');
    }
    return ok();
  };
  return { exec, calls };
}
