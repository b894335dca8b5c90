import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { performance } from 'node:perf_hooks';
import {
  BenchmarkInterruptedError,
  MeasurementError,
  SetupError,
  repetitionDirName,
  wrapPhaseError,
} from '@gitbench/core';
import type { CommandExecutor, Complexity, ExpectedCell, RunResult, Variant } from '@gitbench/core';
import { VariantSandbox, copyTemplate, removeDir } from '@gitbench/sandbox';
import type { SampleSet, SampleSource, Scenario } from './types.js';

export interface MatrixRunnerOptions {
  scenarios: readonly Scenario[];
  variants: readonly Variant[];
  workRoot: string;
  /** Unmodified git used by hooks-only variants */
  systemGit: string;
  iterations: Record<Complexity, number>;
  keepArtifacts?: boolean;
  timeoutMs?: number;
  verbose?: boolean;
  /** Extra variables for every sandbox */
  env?: Record<string, string>;
  exec?: CommandExecutor;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

export function throwIfInterrupted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new BenchmarkInterruptedError();
  }
}

/**
 * Runs every scenario against every variant, strictly in order. Each
 * (scenario, variant) pair builds its template once; every repetition gets a
 * fresh copy and only the scenario's `measure` step is timed.
 */
export class MatrixRunner implements SampleSource {
  readonly name = 'matrix';
  private readonly options: MatrixRunnerOptions;
  private readonly now: () => number;

  constructor(options: MatrixRunnerOptions) {
    this.options = options;
    this.now = options.now ?? (() => performance.now());
  }

  get templatesRoot(): string {
    return join(this.options.workRoot, 'templates');
  }

  get runsRoot(): string {
    return join(this.options.workRoot, 'runs');
  }

  describe(): string {
    const { scenarios, variants, iterations } = this.options;
    return (
      `${scenarios.length} scenario(s) x ${variants.length} variant(s), ` +
      `iterations basic=${iterations.basic} complex=${iterations.complex}`
    );
  }

  expectedCells(): ExpectedCell[] {
    const { scenarios, variants, iterations } = this.options;
    return scenarios.flatMap((scenario) =>
      variants.map((variant) => ({
        scenario: scenario.key,
        variant: variant.key,
        repetitions: iterations[scenario.complexity],
      }))
    );
  }

  async collect(signal?: AbortSignal): Promise<SampleSet> {
    await mkdir(this.templatesRoot, { recursive: true });
    await mkdir(this.runsRoot, { recursive: true });

    const results: RunResult[] = [];
    for (const scenario of this.options.scenarios) {
      for (const variant of this.options.variants) {
        throwIfInterrupted(signal);
        results.push(...(await this.runCell(scenario, variant, signal)));
      }
    }

    const scenarios = this.options.scenarios.map(({ key, complexity, description }) => ({
      key,
      complexity,
      description,
    }));
    return { results, expected: this.expectedCells(), scenarios };
  }

  private async runCell(scenario: Scenario, variant: Variant, signal: AbortSignal | undefined): Promise<RunResult[]> {
    const { keepArtifacts = false, verbose = false } = this.options;
    const repetitions = this.options.iterations[scenario.complexity];
    const cellRoot = join(this.templatesRoot, scenario.key, variant.key);
    const templateDir = join(cellRoot, 'repo-template');
    const label = `scenario=${scenario.key} variant=${variant.key}`;

    await removeDir(cellRoot);
    console.log(`[setup] ${label}`);

    const sandbox = await VariantSandbox.create({
      variant,
      root: cellRoot,
      systemGit: this.options.systemGit,
      ...(this.options.timeoutMs !== undefined ? { timeoutMs: this.options.timeoutMs } : {}),
      ...(this.options.env !== undefined ? { env: this.options.env } : {}),
      ...(this.options.exec !== undefined ? { exec: this.options.exec } : {}),
    });

    const results: RunResult[] = [];
    try {
      try {
        await scenario.setup(sandbox, templateDir);
      } catch (err) {
        throw wrapPhaseError(err, (message, opts) => new SetupError(message, opts), `Setup failed: ${label}`, signal);
      }

      for (let repetition = 1; repetition <= repetitions; repetition++) {
        throwIfInterrupted(signal);

        const runDir = join(this.runsRoot, scenario.key, variant.key, repetitionDirName('run', repetition));
        const repoDir = join(runDir, 'repo');
        await removeDir(runDir);
        await copyTemplate(templateDir, repoDir);

        if (sandbox.usesHooks) {
          await sandbox.verifyHooks(repoDir);
        }

        if (scenario.prepare) {
          try {
            await scenario.prepare(sandbox, repoDir, repetition);
          } catch (err) {
            throw wrapPhaseError(
              err,
              (message, opts) => new SetupError(message, opts),
              `Prepare failed: ${label} run=${repetition}`,
              signal
            );
          }
        }

        const start = this.now();
        try {
          await scenario.measure(sandbox, repoDir, repetition);
        } catch (err) {
          throw wrapPhaseError(
            err,
            (message, opts) => new MeasurementError(message, opts),
            `Measurement failed: ${label} run=${repetition}`,
            signal
          );
        }
        const durationMs = this.now() - start;

        results.push({
          scenario: scenario.key,
          complexity: scenario.complexity,
          variant: variant.key,
          repetition,
          durationMs,
        });
        console.log(`[run] ${label} run=${repetition}/${repetitions} duration_ms=${durationMs.toFixed(3)}`);
        if (verbose) {
          console.log(`  repo: ${repoDir}`);
        }

        if (!keepArtifacts) {
          await removeDir(runDir);
        }
      }
    } finally {
      if (!keepArtifacts) {
        await sandbox.dispose();
      }
    }

    return results;
  }
}
