import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BenchmarkInterruptedError, MeasurementError, SandboxError, SetupError } from '@gitbench/core';
import { createVariant, exists } from '@gitbench/sandbox';
import { MatrixRunner } from '../runner.js';
import type { MatrixRunnerOptions } from '../runner.js';
import type { Scenario } from '../types.js';
import { createFakeExecutor } from './fakes.js';

describe('MatrixRunner', () => {
  let workRoot: string;
  let clock: number;
  let events: string[];

  const variants = [
    createVariant('wrap', 'wrap', '/opt/tool', 'wrapper'),
    createVariant('hook', 'hook', '/opt/tool', 'hooks'),
  ];

  function toyScenario(key: string, complexity: 'basic' | 'complex', overrides: Partial<Scenario> = {}): Scenario {
    return {
      key,
      description: `${key} scenario`,
      complexity,
      setup: async (_ctx, templateDir) => {
        await mkdir(join(templateDir, '.git'), { recursive: true });
        await writeFile(join(templateDir, 'tracked.txt'), 'base\n');
        await writeFile(join(templateDir, '.git', 'index.lock'), '');
        events.push(`setup ${key}`);
      },
      prepare: async (_ctx, repoDir, repetition) => {
        const dirty = await exists(join(repoDir, 'dirty'));
        const locked = await exists(join(repoDir, '.git', 'index.lock'));
        events.push(`prepare ${key} ${repetition} dirty=${dirty} locked=${locked}`);
      },
      measure: async (_ctx, repoDir, repetition) => {
        await writeFile(join(repoDir, 'dirty'), '');
        clock += 5 * repetition;
        events.push(`measure ${key} ${repetition}`);
      },
      ...overrides,
    };
  }

  function createRunner(overrides: Partial<MatrixRunnerOptions> = {}) {
    const fake = createFakeExecutor();
    const runner = new MatrixRunner({
      scenarios: [toyScenario('alpha', 'basic'), toyScenario('beta', 'complex')],
      variants,
      workRoot,
      systemGit: '/usr/bin/git',
      iterations: { basic: 2, complex: 1 },
      exec: fake.exec,
      now: () => clock,
      ...overrides,
    });
    return { runner, ...fake };
  }

  beforeEach(async () => {
    workRoot = await mkdtemp(join(os.tmpdir(), 'bench-runner-'));
    clock = 0;
    events = [];
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workRoot, { recursive: true, force: true });
  });

  it('runs scenarios, then variants, then repetitions in order', async () => {
    const { runner } = createRunner();

    const { results } = await runner.collect();

    expect(results.map((r) => `${r.scenario}/${r.variant}/${r.repetition}`)).toEqual([
      'alpha/wrap/1',
      'alpha/wrap/2',
      'alpha/hook/1',
      'alpha/hook/2',
      'beta/wrap/1',
      'beta/hook/1',
    ]);
    expect(results.map((r) => r.complexity)).toEqual(['basic', 'basic', 'basic', 'basic', 'complex', 'complex']);
  });

  it('times only the measure step', async () => {
    const { runner } = createRunner();

    const { results } = await runner.collect();

    expect(results.map((r) => r.durationMs)).toEqual([5, 10, 5, 10, 5, 5]);
  });

  it('gives every repetition a fresh copy without lock files', async () => {
    const { runner } = createRunner();

    await runner.collect();

    expect(events.filter((e) => e.startsWith('prepare'))).toEqual([
      'prepare alpha 1 dirty=false locked=false',
      'prepare alpha 2 dirty=false locked=false',
      'prepare alpha 1 dirty=false locked=false',
      'prepare alpha 2 dirty=false locked=false',
      'prepare beta 1 dirty=false locked=false',
      'prepare beta 1 dirty=false locked=false',
    ]);
    expect(events.filter((e) => e.startsWith('setup'))).toEqual([
      'setup alpha',
      'setup alpha',
      'setup beta',
      'setup beta',
    ]);
  });

  it('reports the expected matrix and the scenarios it covered', async () => {
    const { runner } = createRunner();

    const { expected, scenarios } = await runner.collect();

    expect(expected).toEqual([
      { scenario: 'alpha', variant: 'wrap', repetitions: 2 },
      { scenario: 'alpha', variant: 'hook', repetitions: 2 },
      { scenario: 'beta', variant: 'wrap', repetitions: 1 },
      { scenario: 'beta', variant: 'hook', repetitions: 1 },
    ]);
    expect(scenarios).toEqual([
      { key: 'alpha', complexity: 'basic', description: 'alpha scenario' },
      { key: 'beta', complexity: 'complex', description: 'beta scenario' },
    ]);
  });

  it('re-verifies hooks before every hook-mode repetition', async () => {
    const { runner, calls } = createRunner({ scenarios: [toyScenario('alpha', 'basic')] });

    await runner.collect();

    const global = calls.filter((c) => c.args.join(' ') === 'config --global --get core.hooksPath');
    const perRepo = calls.filter((c) => c.args.join(' ') === 'config --get core.hooksPath');
    expect(global).toHaveLength(1);
    expect(perRepo.map((c) => c.options.cwd)).toEqual([
      join(workRoot, 'runs', 'alpha', 'hook', 'run_01', 'repo'),
      join(workRoot, 'runs', 'alpha', 'hook', 'run_02', 'repo'),
    ]);
  });

  it('fails a hook-mode repetition whose repository overrides the hooks path', async () => {
    const overriding = toyScenario('alpha', 'basic', {
      setup: async (_ctx, templateDir) => {
        await mkdir(join(templateDir, '.git'), { recursive: true });
        await writeFile(join(templateDir, '.git', 'config'), '[core]\n\thooksPath = /elsewhere\n');
      },
    });
    const { runner } = createRunner({ scenarios: [overriding] });

    const run = runner.collect();
    await expect(run).rejects.toBeInstanceOf(SandboxError);
    await expect(run).rejects.toThrow('Hooks path mismatch for variant hook');
    expect(events.filter((e) => e.startsWith('measure'))).toEqual(['measure alpha 1', 'measure alpha 2']);
  });

  it('removes run directories and sandboxes unless artifacts are kept', async () => {
    const { runner } = createRunner();
    await runner.collect();

    expect(await exists(join(workRoot, 'runs', 'alpha', 'wrap', 'run_01'))).toBe(false);
    expect(await exists(join(workRoot, 'templates', 'alpha', 'wrap'))).toBe(false);

    const keeping = createRunner({ keepArtifacts: true }).runner;
    await keeping.collect();

    expect(await exists(join(workRoot, 'runs', 'alpha', 'wrap', 'run_02', 'repo', 'dirty'))).toBe(true);
    expect(await exists(join(workRoot, 'templates', 'alpha', 'hook', 'repo-template', 'tracked.txt'))).toBe(true);
  });

  it('wraps measurement failures with their context', async () => {
    const failing = toyScenario('alpha', 'basic', {
      measure: async () => {
        throw new Error('rebase exploded');
      },
    });
    const { runner } = createRunner({ scenarios: [failing] });

    const run = runner.collect();
    await expect(run).rejects.toBeInstanceOf(MeasurementError);
    await expect(run).rejects.toThrow('Measurement failed: scenario=alpha variant=wrap run=1\nrebase exploded');
  });

  it('wraps setup failures and still removes the sandbox', async () => {
    const failing = toyScenario('alpha', 'basic', {
      setup: async () => {
        throw new Error('init failed');
      },
    });
    const { runner } = createRunner({ scenarios: [failing] });

    await expect(runner.collect()).rejects.toBeInstanceOf(SetupError);
    expect(await exists(join(workRoot, 'templates', 'alpha', 'wrap'))).toBe(false);
  });

  it('reports a measurement cut short by an interrupt as an interruption', async () => {
    const controller = new AbortController();
    const killed = toyScenario('alpha', 'basic', {
      measure: async () => {
        controller.abort();
        throw new Error('killed by signal');
      },
    });
    const { runner } = createRunner({ scenarios: [killed] });

    const run = runner.collect(controller.signal);
    await expect(run).rejects.toBeInstanceOf(BenchmarkInterruptedError);
    await expect(run).rejects.toThrow('Benchmark interrupted during: Measurement failed: scenario=alpha variant=wrap run=1');
  });

  it('does not start anything once interrupted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { runner } = createRunner();

    await expect(runner.collect(controller.signal)).rejects.toBeInstanceOf(BenchmarkInterruptedError);
    expect(events).toEqual([]);
  });

  it('finishes the current repetition and stops before the next', async () => {
    const controller = new AbortController();
    const interrupting = toyScenario('alpha', 'basic', {
      measure: async (_ctx, _repoDir, repetition) => {
        events.push(`measure alpha ${repetition}`);
        controller.abort();
      },
    });
    const { runner } = createRunner({ scenarios: [interrupting] });

    await expect(runner.collect(controller.signal)).rejects.toBeInstanceOf(BenchmarkInterruptedError);
    expect(events.filter((e) => e.startsWith('measure'))).toEqual(['measure alpha 1']);
  });
});
