import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { createLinkOrCopy } from './fs.js';

/**
 * Hooks a hook-mode variant installs. Each entry is the variant binary
 * itself, which works out which hook it is from the name it was run as.
 */
export const MANAGED_HOOK_NAMES = [
  'pre-commit',
  'prepare-commit-msg',
  'post-commit',
  'pre-rebase',
  'post-checkout',
  'post-merge',
  'pre-push',
  'post-rewrite',
  'reference-transaction',
] as const;

export type ManagedHookName = (typeof MANAGED_HOOK_NAMES)[number];

export async function installManagedHooks(binary: string, hooksDir: string): Promise<void> {
  for (const hook of MANAGED_HOOK_NAMES) {
    await createLinkOrCopy(binary, join(hooksDir, hook));
  }
}

export interface HookSurfaceDiff {
  missing: string[];
  extras: string[];
}

/**
 * Compare the visible entries of a hooks directory with the managed set
 */
export async function diffHookSurface(hooksDir: string): Promise<HookSurfaceDiff> {
  const installed = new Set(
    (await readdir(hooksDir)).filter((name) => !name.startsWith('.'))
  );
  const expected = new Set<string>(MANAGED_HOOK_NAMES);

  return {
    missing: [...expected].filter((name) => !installed.has(name)).sort(),
    extras: [...installed].filter((name) => !expected.has(name)).sort(),
  };
}
