import type { RunResult } from '@gitbench/core';
import { createModeVariants } from '@gitbench/sandbox';
import type { ReportContext } from '../report.js';
import type { SampleSet } from '../types.js';

export const VARIANTS = createModeVariants({ baselineBinary: '/bin/main-tool', currentBinary: '/bin/current-tool' });
export const VARIANT_KEYS = VARIANTS.map((v) => v.key);

function runs(scenario: string, complexity: 'basic' | 'complex', variant: string, durations: number[]): RunResult[] {
  return durations.map((durationMs, i) => ({ scenario, complexity, variant, repetition: i + 1, durationMs }));
}

/**
 * s1: medians 10 / 11 / 12 / 15 (main, wrapper, hooks, both).
 * s2: zero baseline for main_wrapper; 20 / 22 / 30 for the current modes.
 */
export function sampleSet(): SampleSet {
  return {
    results: [
      ...runs('s1', 'basic', 'main_wrapper', [10, 10]),
      ...runs('s1', 'basic', 'current_wrapper', [10, 12]),
      ...runs('s1', 'basic', 'current_hooks', [11, 13]),
      ...runs('s1', 'basic', 'current_both', [14, 16]),
      ...runs('s2', 'complex', 'main_wrapper', [0]),
      ...runs('s2', 'complex', 'current_wrapper', [20]),
      ...runs('s2', 'complex', 'current_hooks', [22]),
      ...runs('s2', 'complex', 'current_both', [30]),
    ],
    expected: VARIANT_KEYS.flatMap((variant) => [
      { scenario: 's1', variant, repetitions: 2 },
      { scenario: 's2', variant, repetitions: 1 },
    ]),
    scenarios: [
      { key: 's1', complexity: 'basic', description: 'first scenario' },
      { key: 's2', complexity: 'complex', description: 'second scenario' },
    ],
  };
}

export function reportContext(): ReportContext {
  return {
    title: 'git-ai Mode Benchmark Report',
    metadata: {
      timestampUtc: '2026-01-19T13:45:01Z',
      repoRoot: '/checkout',
      branch: 'feature/speed',
      branchSha: 'abc123',
      mainRef: 'origin/main',
      mainSha: 'def456',
      systemGit: '/usr/bin/git',
      settings: { iterations_basic: 2, iterations_complex: 1 },
    },
    variants: VARIANTS,
    enforced: true,
    rerunCommand: 'npm run bench -- run --iterations-basic 2',
  };
}
