import { mkdir, realpath, writeFile } from 'node:fs/promises';
import { delimiter, isAbsolute, join, resolve } from 'node:path';
import {
  CommandError,
  DEFAULT_COMMAND_TIMEOUT_MS,
  runCommand,
  SandboxError,
} from '@gitbench/core';
import type { CommandExecutor, ExecResult, Variant } from '@gitbench/core';
import { createLinkOrCopy, errorCode, exists, removeDir } from './fs.js';
import { diffHookSurface, installManagedHooks } from './hooks.js';
import { installsHooks, installsWrapper } from './variants.js';

export interface GitIdentity {
  name: string;
  email: string;
}

export const DEFAULT_GIT_IDENTITY: GitIdentity = {
  name: 'Benchmark Bot',
  email: 'benchmark@bench.local',
};

export interface VariantSandboxOptions {
  variant: Variant;
  /** Directory owned by this sandbox; created if missing */
  root: string;
  /** Unmodified git used by hooks-only variants */
  systemGit: string;
  /** Per-command upper bound */
  timeoutMs?: number;
  /** Extra variables layered over the ambient environment */
  env?: Record<string, string>;
  identity?: GitIdentity;
  /** Environment the sandbox starts from (default: process.env, copied) */
  baseEnv?: NodeJS.ProcessEnv;
  exec?: CommandExecutor;
}

export interface SandboxPaths {
  root: string;
  homeDir: string;
  binDir: string;
  hooksDir: string;
  gitConfig: string;
  /** Where the wrapper binary shadows git on PATH */
  gitWrapper: string;
}

export function getSandboxPaths(root: string): SandboxPaths {
  const homeDir = join(root, 'home');
  const binDir = join(root, 'bin');
  return {
    root,
    homeDir,
    binDir,
    hooksDir: join(root, 'hooks'),
    gitConfig: join(homeDir, '.gitconfig'),
    gitWrapper: join(binDir, process.platform === 'win32' ? 'git.exe' : 'git'),
  };
}

/**
 * Variables that silence the tool's own debug output, derived from its
 * binary name (`git-ai` -> `GIT_AI_DEBUG`, `GIT_AI_DEBUG_PERFORMANCE`)
 */
export function toolDebugEnv(binaryName: string): Record<string, string> {
  const prefix = binaryName.toUpperCase().replace(/[^A-Z0-9]+/g, '_');
  return {
    [`${prefix}_DEBUG`]: '0',
    [`${prefix}_DEBUG_PERFORMANCE`]: '0',
  };
}

function renderGitConfig(identity: GitIdentity, hooksDir: string | null): string {
  const lines = [
    '[user]',
    `\tname = ${identity.name}`,
    `\temail = ${identity.email}`,
    '[init]',
    '\tdefaultBranch = main',
  ];
  if (hooksDir !== null) {
    lines.push('[core]', `\thooksPath = ${hooksDir}`);
  }
  return `${lines.join('\n')}\n`;
}

async function canonicalPath(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return resolve(path);
    }
    throw err;
  }
}

/**
 * Isolated runtime for one variant: private home, a bin directory prepended
 * to PATH and, for hook modes, a private hooks directory wired in through
 * the sandbox's global git config.
 */
export class VariantSandbox {
  readonly variant: Variant;
  readonly paths: SandboxPaths;
  readonly systemGit: string;
  readonly env: NodeJS.ProcessEnv;

  private readonly timeoutMs: number;
  private readonly exec: CommandExecutor;
  private readonly identity: GitIdentity;

  private constructor(options: VariantSandboxOptions) {
    this.variant = options.variant;
    this.paths = getSandboxPaths(options.root);
    this.systemGit = options.systemGit;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.exec = options.exec ?? runCommand;
    this.identity = options.identity ?? DEFAULT_GIT_IDENTITY;

    const base = options.baseEnv ?? process.env;
    this.env = {
      ...base,
      ...options.env,
      HOME: this.paths.homeDir,
      GIT_CONFIG_GLOBAL: this.paths.gitConfig,
      GIT_CONFIG_NOSYSTEM: '1',
      GIT_TERMINAL_PROMPT: '0',
      PATH: `${this.paths.binDir}${delimiter}${base.PATH ?? ''}`,
    };
  }

  /**
   * Build the sandbox directories and, for hook modes, verify the wiring.
   * A wiring mismatch is fatal.
   */
  static async create(options: VariantSandboxOptions): Promise<VariantSandbox> {
    const sandbox = new VariantSandbox(options);
    await sandbox.install();
    return sandbox;
  }

  get usesWrapper(): boolean {
    return installsWrapper(this.variant.mode);
  }

  get usesHooks(): boolean {
    return installsHooks(this.variant.mode);
  }

  /** Binary `runGit` dispatches to */
  get gitBinary(): string {
    return this.usesWrapper ? this.paths.gitWrapper : this.systemGit;
  }

  private async install(): Promise<void> {
    const { homeDir, binDir, hooksDir, gitConfig, gitWrapper } = this.paths;
    await mkdir(homeDir, { recursive: true });
    await mkdir(binDir, { recursive: true });

    if (this.usesWrapper) {
      await createLinkOrCopy(this.variant.binary, gitWrapper);
    }

    if (this.usesHooks) {
      await mkdir(hooksDir, { recursive: true });
      await installManagedHooks(this.variant.binary, hooksDir);
    }

    await writeFile(gitConfig, renderGitConfig(this.identity, this.usesHooks ? hooksDir : null), 'utf-8');

    if (this.usesHooks) {
      await this.verifyHooks();
    }
  }

  /**
   * Assert the sandboxed git reports the private hooks directory and that
   * it holds exactly the managed hook set. Given a repository, the check
   * reads the effective value inside it, so a repo-local override fails.
   */
  async verifyHooks(repoDir?: string): Promise<void> {
    const { hooksDir, root } = this.paths;
    const cwd = repoDir ?? root;
    const scope = repoDir === undefined ? ['--global'] : [];
    const reported = await this.readConfig([...scope, '--get', 'core.hooksPath'], cwd);
    const where = repoDir === undefined ? '' : `\nrepo=${repoDir}`;

    if (!reported) {
      throw new SandboxError(
        `Expected core.hooksPath to be configured for variant ${this.variant.key}, found empty${where}`
      );
    }

    const actual = await canonicalPath(isAbsolute(reported) ? reported : join(cwd, reported));
    const expected = await canonicalPath(hooksDir);
    if (actual !== expected) {
      throw new SandboxError(
        `Hooks path mismatch for variant ${this.variant.key}\nexpected=${expected}\nactual=${actual}${where}`
      );
    }

    if (!(await exists(hooksDir))) {
      throw new SandboxError(`Managed hooks dir missing: ${hooksDir}`);
    }

    const { missing, extras } = await diffHookSurface(hooksDir);
    if (missing.length > 0 || extras.length > 0) {
      throw new SandboxError(
        'Unexpected managed hook surface in private hooks dir\n' +
          `missing=${missing.join(',')}\nextras=${extras.join(',')}\npath=${hooksDir}`
      );
    }
  }

  /**
   * Trimmed value of a `git config` query; an unset key (exit 1) reads as empty
   */
  private async readConfig(args: string[], cwd: string): Promise<string> {
    try {
      const result = await this.runGit(['config', ...args], cwd);
      return result.stdout.trim();
    } catch (err) {
      if (err instanceof CommandError && err.kind === 'command' && err.failure.exitCode === 1) {
        return '';
      }
      throw err;
    }
  }

  /**
   * Run git as the variant sees it: the wrapper for wrapper modes, the
   * system git for hooks-only
   */
  async runGit(args: string[], cwd: string): Promise<ExecResult> {
    return this.exec(this.gitBinary, args, { cwd, env: this.env, timeoutMs: this.timeoutMs });
  }

  /**
   * Run the variant binary directly, whatever the mode
   */
  async runVariantBinary(args: string[], cwd: string): Promise<ExecResult> {
    return this.exec(this.variant.binary, args, { cwd, env: this.env, timeoutMs: this.timeoutMs });
  }

  /** Create an empty repository with the unmodified git */
  async initRepo(repoDir: string): Promise<void> {
    await mkdir(repoDir, { recursive: true });
    await this.exec(this.systemGit, ['init', '-q', '-b', 'main'], {
      cwd: repoDir,
      env: this.env,
      timeoutMs: this.timeoutMs,
    });
  }

  /**
   * Record the given files as edited by an AI agent
   */
  async checkpoint(repoDir: string, files: readonly string[]): Promise<void> {
    if (files.length === 0) return;
    await this.runVariantBinary(['checkpoint', 'mock_ai', ...files], repoDir);
  }

  /**
   * Remove every file this sandbox created
   */
  async dispose(): Promise<void> {
    await removeDir(this.paths.root);
  }
}
