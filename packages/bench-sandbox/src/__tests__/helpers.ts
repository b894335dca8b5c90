import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CommandExecutor, ExecOptions } from '@gitbench/core';

export interface RecordedCall {
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
 * Executor stand-in that records every call and answers hooks-path queries
 * the way git resolves them: `--global` reads the sandbox's global config,
 * a plain query prefers the repository's own `.git/config`
 */
export function createFakeExecutor(): { exec: CommandExecutor; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];

  const exec: CommandExecutor = async (cmd, args, options) => {
    calls.push({ cmd, args, options });
    let stdout = '';
    const query = args.join(' ');
    if (query === 'config --global --get core.hooksPath' || query === 'config --get core.hooksPath') {
      const global = options.env?.GIT_CONFIG_GLOBAL;
      const local = query === 'config --get core.hooksPath' ? await hooksPathIn(join(options.cwd, '.git', 'config')) : undefined;
      const value = local ?? (global ? await hooksPathIn(global) : undefined);
      stdout = value ? `${value}\n` : '';
    }
    return { exitCode: 0, stdout, stderr: '', durationMs: 1 };
  };

  return { exec, calls };
}
