import type { Scenario } from '../types.js';
import { createAiCommit, createPlainCommit, fileAt, seedStructuredRepo } from './seed.js';

export const rebaseLinear: Scenario = {
  key: 'rebase_linear',
  description: 'Linear feature branch rebase onto updated main',
  complexity: 'complex',
  setup: async (ctx, dir) => {
    const { main, feature } = await seedStructuredRepo(ctx, dir);
    for (let i = 0; i < 4; i++) {
      await createPlainCommit(ctx, dir, [fileAt(main, i)], `main-pre-feature-${i}`, `main pre feature ${i}`);
    }

    await ctx.runGit(['checkout', '-q', '-b', 'feature', 'main~3'], dir);
    for (let i = 0; i < 8; i++) {
      await createAiCommit(ctx, dir, [fileAt(feature, i)], `feature-linear-${i}`, `feature linear ${i}`);
    }

    await ctx.runGit(['checkout', '-q', 'main'], dir);
    for (let i = 0; i < 6; i++) {
      await createPlainCommit(ctx, dir, [fileAt(main, i + 4)], `main-after-feature-${i}`, `main after feature ${i}`);
    }
    await ctx.runGit(['checkout', '-q', 'feature'], dir);
  },
  measure: async (ctx, repoDir) => {
    await ctx.runGit(['rebase', 'main'], repoDir);
  },
};

export const rebaseRebaseMerges: Scenario = {
  key: 'rebase_rebase_merges',
  description: 'Rebase-merges on branch with merge commit',
  complexity: 'complex',
  setup: async (ctx, dir) => {
    const { main, feature, side } = await seedStructuredRepo(ctx, dir);
    for (let i = 0; i < 5; i++) {
      await createPlainCommit(ctx, dir, [fileAt(main, i)], `main-start-${i}`, `main start ${i}`);
    }

    await ctx.runGit(['checkout', '-q', '-b', 'feature', 'main~2'], dir);
    for (let i = 0; i < 6; i++) {
      await createAiCommit(ctx, dir, [fileAt(feature, i)], `feature-rm-${i}`, `feature rm ${i}`);
    }

    await ctx.runGit(['checkout', '-q', '-b', 'side', 'feature~3'], dir);
    for (let i = 0; i < 4; i++) {
      await createAiCommit(ctx, dir, [fileAt(side, i)], `side-rm-${i}`, `side rm ${i}`);
    }

    await ctx.runGit(['checkout', '-q', 'feature'], dir);
    await ctx.runGit(['merge', '--no-ff', '-q', '-m', 'merge side', 'side'], dir);
    for (let i = 0; i < 2; i++) {
      await createAiCommit(ctx, dir, [fileAt(feature, i + 6)], `feature-post-merge-${i}`, `feature post merge ${i}`);
    }

    await ctx.runGit(['checkout', '-q', 'main'], dir);
    for (let i = 0; i < 4; i++) {
      await createPlainCommit(ctx, dir, [fileAt(main, i + 5)], `main-upstream-${i}`, `main upstream ${i}`);
    }
    await ctx.runGit(['checkout', '-q', 'feature'], dir);
  },
  measure: async (ctx, repoDir) => {
    await ctx.runGit(['rebase', '--rebase-merges', 'main'], repoDir);
  },
};

export const squashMergeCommit: Scenario = {
  key: 'squash_merge_commit',
  description: 'merge --squash + commit from feature branch',
  complexity: 'complex',
  setup: async (ctx, dir) => {
    const { main, feature } = await seedStructuredRepo(ctx, dir);
    await ctx.runGit(['checkout', '-q', '-b', 'feature'], dir);
    for (let i = 0; i < 10; i++) {
      await createAiCommit(ctx, dir, [fileAt(feature, i)], `squash-feature-${i}`, `squash feature ${i}`);
    }

    await ctx.runGit(['checkout', '-q', 'main'], dir);
    for (let i = 0; i < 4; i++) {
      await createPlainCommit(ctx, dir, [fileAt(main, i)], `squash-main-${i}`, `squash main ${i}`);
    }
  },
  measure: async (ctx, repoDir, repetition) => {
    await ctx.runGit(['merge', '--squash', 'feature'], repoDir);
    await ctx.runGit(['commit', '-q', '-m', `squash merge run ${repetition}`], repoDir);
  },
};

export const COMPLEX_SCENARIOS: readonly Scenario[] = [rebaseLinear, rebaseRebaseMerges, squashMergeCommit];
