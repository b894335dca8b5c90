// Variant registry
export {
  createVariant,
  createModeVariants,
  installsHooks,
  installsWrapper,
} from './variants.js';
export type { ModeVariantBinaries } from './variants.js';

// Sandbox
export { VariantSandbox, getSandboxPaths, toolDebugEnv, DEFAULT_GIT_IDENTITY } from './sandbox.js';
export type { VariantSandboxOptions, SandboxPaths, GitIdentity } from './sandbox.js';
export { MANAGED_HOOK_NAMES, installManagedHooks, diffHookSurface } from './hooks.js';
export type { ManagedHookName, HookSurfaceDiff } from './hooks.js';

// Filesystem
export {
  exists,
  removeDir,
  copyTemplate,
  createLinkOrCopy,
  isTransientLockFile,
  errorCode,
} from './fs.js';

// Git and build collaborators
export { resolveSystemGit, gitOutput } from './git.js';
export type { ResolveGitOptions } from './git.js';
export { buildBinary, expectedBinaryPath, withWorktree } from './build.js';
export type { BuildBinaryOptions, WorktreeOptions } from './build.js';
