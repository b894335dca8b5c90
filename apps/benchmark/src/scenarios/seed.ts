import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { SetupError } from '@gitbench/core';
import type { ScenarioContext } from '../types.js';

const SEED_MULTIPLIER = 1315423911n;
const LINE_MULTIPLIER = 2654435761n;
const MASK_32 = 0xffffffffn;

export const BASIC_FILE_COUNT = 24;
export const BASIC_FILE_LINES = 70;
export const STRUCTURED_FILE_LINES = 80;

/**
 * Deterministic 32-bit payload for one line of a seed file
 */
export function seedPayload(seed: number, line: number): number {
  return Number((BigInt(seed) * SEED_MULTIPLIER + BigInt(line) * LINE_MULTIPLIER) & MASK_32);
}

/**
 * Content of a seed file: `lines` newline-terminated lines, numbered from 1
 */
export function seedFileContent(seed: number, lines: number): string {
  let content = '';
  for (let i = 1; i <= lines; i++) {
    const payload = seedPayload(seed, i).toString(16).padStart(8, '0');
    content += `seed=${String(seed).padStart(8, '0')} line=${String(i).padStart(4, '0')} payload=${payload}\n`;
  }
  return content;
}

export async function writeSeedFile(path: string, seed: number, lines: number): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, seedFileContent(seed, lines), 'utf-8');
}

export async function appendLine(path: string, line: string): Promise<void> {
  await appendFile(path, `${line}\n`, 'utf-8');
}

export function basicFiles(count = BASIC_FILE_COUNT): string[] {
  return Array.from({ length: count }, (_, i) => `bench/basic/file_${String(i).padStart(3, '0')}.txt`);
}

export interface StructuredGroups {
  main: string[];
  feature: string[];
  side: string[];
}

export function structuredGroups(): StructuredGroups {
  const group = (name: string, count: number) =>
    Array.from({ length: count }, (_, i) => `bench/${name}/${name}_${String(i).padStart(2, '0')}.txt`);
  return {
    main: group('main', 8),
    feature: group('feature', 10),
    side: group('side', 6),
  };
}

/**
 * Entry `index` of a file list, wrapping around its length
 */
export function fileAt(files: readonly string[], index: number): string {
  const file = files[index % files.length];
  if (file === undefined) {
    throw new SetupError(`No file at index ${index} of an empty file list`);
  }
  return file;
}

async function commitAll(ctx: ScenarioContext, repoDir: string, message: string): Promise<void> {
  await ctx.runGit(['add', '-A'], repoDir);
  await ctx.runGit(['commit', '-q', '-m', message], repoDir);
}

/**
 * Fresh repository with `fileCount` seed files in a single commit
 */
export async function seedBasicRepo(
  ctx: ScenarioContext,
  repoDir: string,
  fileCount = BASIC_FILE_COUNT
): Promise<string[]> {
  await ctx.initRepo(repoDir);
  const files = basicFiles(fileCount);
  for (const [i, rel] of files.entries()) {
    await writeSeedFile(join(repoDir, rel), 1000 + i, BASIC_FILE_LINES);
  }
  await commitAll(ctx, repoDir, 'seed basic');
  return files;
}

/**
 * Fresh repository with the main, feature and side file groups in a single
 * commit; seeds run consecutively from 2000 across the groups
 */
export async function seedStructuredRepo(ctx: ScenarioContext, repoDir: string): Promise<StructuredGroups> {
  await ctx.initRepo(repoDir);
  const groups = structuredGroups();
  let seed = 2000;
  for (const rel of [...groups.main, ...groups.feature, ...groups.side]) {
    await writeSeedFile(join(repoDir, rel), seed, STRUCTURED_FILE_LINES);
    seed += 1;
  }
  await commitAll(ctx, repoDir, 'seed structured');
  return groups;
}

async function appendMarker(repoDir: string, files: readonly string[], marker: string): Promise<void> {
  for (const rel of files) {
    await appendLine(join(repoDir, rel), marker);
  }
}

/**
 * Commit an edit attributed to an AI agent
 */
export async function createAiCommit(
  ctx: ScenarioContext,
  repoDir: string,
  files: readonly string[],
  marker: string,
  message: string
): Promise<void> {
  await appendMarker(repoDir, files, marker);
  await ctx.checkpoint(repoDir, files);
  await commitAll(ctx, repoDir, message);
}

export async function createPlainCommit(
  ctx: ScenarioContext,
  repoDir: string,
  files: readonly string[],
  marker: string,
  message: string
): Promise<void> {
  await appendMarker(repoDir, files, marker);
  await commitAll(ctx, repoDir, message);
}
