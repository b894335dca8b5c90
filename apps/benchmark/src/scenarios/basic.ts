import { join } from 'node:path';
import { MeasurementError } from '@gitbench/core';
import type { Scenario } from '../types.js';
import {
  appendLine,
  basicFiles,
  createAiCommit,
  createPlainCommit,
  fileAt,
  seedBasicRepo,
  writeSeedFile,
} from './seed.js';

async function appendEach(
  repoDir: string,
  files: readonly string[],
  line: (idx: number) => string
): Promise<void> {
  for (const [idx, rel] of files.entries()) {
    await appendLine(join(repoDir, rel), line(idx));
  }
}

export const commitHuman: Scenario = {
  key: 'commit_human',
  description: 'Human-only add/commit on modified tracked files',
  complexity: 'basic',
  setup: async (ctx, templateDir) => {
    await seedBasicRepo(ctx, templateDir);
  },
  prepare: async (_ctx, repoDir, repetition) => {
    await appendEach(repoDir, basicFiles(6), (idx) => `human-change run=${repetition} idx=${idx}`);
  },
  measure: async (ctx, repoDir, repetition) => {
    await ctx.runGit(['add', '-A'], repoDir);
    await ctx.runGit(['commit', '-q', '-m', `bench human run ${repetition}`], repoDir);
  },
};

export const checkpointCommitAi: Scenario = {
  key: 'checkpoint_commit_ai',
  description: 'AI checkpoint + commit flow',
  complexity: 'basic',
  setup: async (ctx, templateDir) => {
    await seedBasicRepo(ctx, templateDir);
  },
  prepare: async (_ctx, repoDir, repetition) => {
    await appendEach(repoDir, basicFiles(5), (idx) => `ai-change run=${repetition} idx=${idx}`);
  },
  measure: async (ctx, repoDir, repetition) => {
    await ctx.checkpoint(repoDir, basicFiles(5));
    await ctx.runGit(['add', '-A'], repoDir);
    await ctx.runGit(['commit', '-q', '-m', `bench ai commit run ${repetition}`], repoDir);
  },
};

export const resetMixedHead6: Scenario = {
  key: 'reset_mixed_head6',
  description: 'Reset mixed with pending worktree edits',
  complexity: 'basic',
  setup: async (ctx, templateDir) => {
    const files = await seedBasicRepo(ctx, templateDir);
    for (let i = 0; i < 12; i++) {
      await createAiCommit(ctx, templateDir, [fileAt(files, i)], `history-ai-${i}`, `history ai commit ${i}`);
    }
  },
  prepare: async (_ctx, repoDir, repetition) => {
    await appendEach(repoDir, basicFiles(5), (idx) => `pending-reset-${repetition}-${idx}`);
  },
  measure: async (ctx, repoDir) => {
    await ctx.runGit(['reset', '--mixed', 'HEAD~6'], repoDir);
  },
};

const STASH_TRACKED = basicFiles(9).slice(4);

export const stashRoundtrip: Scenario = {
  key: 'stash_roundtrip',
  description: 'stash push -u + pop on AI-touched and untracked files',
  complexity: 'basic',
  setup: async (ctx, templateDir) => {
    const files = await seedBasicRepo(ctx, templateDir);
    await createAiCommit(ctx, templateDir, files.slice(0, 3), 'seed-ai-stash', 'seed ai for stash');
  },
  prepare: async (_ctx, repoDir, repetition) => {
    await appendEach(repoDir, STASH_TRACKED, (idx) => `stash-tracked-${repetition}-${idx}`);
    await writeSeedFile(join(repoDir, 'bench', `untracked_${repetition}.txt`), 7000 + repetition, 20);
  },
  measure: async (ctx, repoDir, repetition) => {
    await ctx.checkpoint(repoDir, STASH_TRACKED.slice(0, 3));
    await ctx.runGit(['stash', 'push', '-u', '-m', `bench stash ${repetition}`], repoDir);
    await ctx.runGit(['stash', 'pop'], repoDir);
  },
};

const CHERRY_TAGS = ['bench-cherry-0', 'bench-cherry-1', 'bench-cherry-2'];

export const cherryPickThree: Scenario = {
  key: 'cherry_pick_three',
  description: 'Cherry-pick three AI commits onto diverged main',
  complexity: 'basic',
  setup: async (ctx, templateDir) => {
    const files = await seedBasicRepo(ctx, templateDir);
    await ctx.runGit(['checkout', '-q', '-b', 'feature'], templateDir);
    for (const [i, tag] of CHERRY_TAGS.entries()) {
      await createAiCommit(ctx, templateDir, [fileAt(files, i)], `feature-cherry-${i}`, `feature cherry commit ${i}`);
      await ctx.runGit(['tag', tag, 'HEAD'], templateDir);
    }
    await createPlainCommit(ctx, templateDir, [fileAt(files, 10)], 'feature-extra', 'feature extra commit');
    await ctx.runGit(['checkout', '-q', 'main'], templateDir);
    await createPlainCommit(ctx, templateDir, [fileAt(files, 20)], 'main-diverge', 'main diverge commit');
  },
  measure: async (ctx, repoDir) => {
    const commits: string[] = [];
    for (const tag of CHERRY_TAGS) {
      const { stdout } = await ctx.runGit(['rev-parse', tag], repoDir);
      const sha = stdout.trim();
      if (sha) commits.push(sha);
    }
    if (commits.length !== CHERRY_TAGS.length) {
      throw new MeasurementError(`Expected exactly ${CHERRY_TAGS.length} feature commits to cherry-pick, found ${commits.length}`);
    }
    await ctx.runGit(['cherry-pick', ...commits], repoDir);
  },
};

export const BASIC_SCENARIOS: readonly Scenario[] = [
  commitHuman,
  checkpointCommitAi,
  resetMixedHead6,
  stashRoundtrip,
  cherryPickThree,
];
