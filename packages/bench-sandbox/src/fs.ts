import {
  access,
  chmod,
  copyFile,
  lstat,
  mkdir,
  readdir,
  readlink,
  rm,
  stat,
  symlink,
  unlink,
} from 'node:fs/promises';
import { dirname, join } from 'node:path';

/**
 * errno code of a filesystem error, if it carries one
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Lock files git leaves behind mid-operation; copying them would make the
 * next command in the copy refuse to run
 */
export function isTransientLockFile(name: string): boolean {
  return name.endsWith('.lock');
}

/**
 * Recursively copy a template repository, skipping transient lock files.
 * Symlinks are recreated rather than followed.
 */
export async function copyTemplate(src: string, dst: string): Promise<void> {
  await mkdir(dst, { recursive: true });
  const entries = await readdir(src, { withFileTypes: true });

  for (const entry of entries) {
    if (isTransientLockFile(entry.name)) continue;

    const srcPath = join(src, entry.name);
    const dstPath = join(dst, entry.name);

    if (entry.isDirectory()) {
      await copyTemplate(srcPath, dstPath);
    } else if (entry.isSymbolicLink()) {
      await symlink(await readlink(srcPath), dstPath);
    } else {
      await copyFile(srcPath, dstPath);
    }
  }
}

async function removeEntry(path: string): Promise<void> {
  try {
    const info = await lstat(path);
    if (info.isDirectory()) {
      await rm(path, { recursive: true, force: true });
    } else {
      await unlink(path);
    }
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      throw err;
    }
  }
}

/**
 * Point `linkPath` at `target`, replacing whatever is there. Falls back to a
 * full copy where symlinks are not permitted.
 */
export async function createLinkOrCopy(target: string, linkPath: string): Promise<'symlink' | 'copy'> {
  await removeEntry(linkPath);
  await mkdir(dirname(linkPath), { recursive: true });

  try {
    await symlink(target, linkPath);
    return 'symlink';
  } catch (err) {
    const code = errorCode(err);
    if (code !== 'EPERM' && code !== 'EACCES' && code !== 'ENOTSUP' && code !== 'EINVAL') {
      throw err;
    }
  }

  await copyFile(target, linkPath);
  const { mode } = await stat(target);
  await chmod(linkPath, mode);
  return 'copy';
}
