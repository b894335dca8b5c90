import { mkdir, readFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { z } from 'zod';
import { MeasurementError, SetupError, repetitionDirName, runCommand, wrapPhaseError } from '@gitbench/core';
import type { CommandExecutor, ExpectedCell, RunDetails, RunResult, Variant } from '@gitbench/core';
import { VariantSandbox, errorCode, removeDir } from '@gitbench/sandbox';
import { throwIfInterrupted } from './runner.js';
import type { SampleSet, SampleSource, ScenarioInfo } from './types.js';

export const RESULTS_TSV_COLUMNS = ['scenario', 'status', 'duration_s', 'saved_logs', 'head_note'] as const;

export const EXTERNAL_SCRIPT_TIMEOUT_MS = 14_400_000;
const SEED_CLONE_TIMEOUT_MS = 3_600_000;

const resultRowSchema = z.object({
  scenario: z.string().trim(),
  status: z.string().trim(),
  duration_s: z.coerce
    .number({ invalid_type_error: 'duration_s must be a number' })
    .finite()
    .nonnegative('duration_s must be non-negative'),
  saved_logs: z.coerce
    .number({ invalid_type_error: 'saved_logs must be a number' })
    .finite()
    .transform((value) => Math.trunc(value)),
  head_note: z.string().trim(),
});

export interface ScriptResultRow extends RunDetails {
  scenario: string;
  durationMs: number;
}

/**
 * Parse the tab-separated results table an external scenario script writes.
 * Rows without a scenario name are skipped; a table with no rows is an error.
 */
export function parseResultsTsv(content: string, source = 'results.tsv'): ScriptResultRow[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const [headerLine, ...body] = lines;
  if (headerLine === undefined) {
    throw new MeasurementError(`No scenario rows parsed from ${source}`);
  }

  const header = headerLine.split('\t').map((name) => name.trim());
  for (const required of ['scenario', 'duration_s']) {
    if (!header.includes(required)) {
      throw new MeasurementError(`Missing column "${required}" in ${source}`);
    }
  }

  const rows: ScriptResultRow[] = [];
  const seen = new Set<string>();
  for (const [index, line] of body.entries()) {
    const cells = line.split('\t');
    const record: Record<string, string> = {};
    for (const column of RESULTS_TSV_COLUMNS) {
      const position = header.indexOf(column);
      record[column] = position >= 0 ? (cells[position] ?? '') : '';
    }

    const parsed = resultRowSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new MeasurementError(`Invalid row ${index + 2} in ${source}: ${issues}`);
    }

    const row = parsed.data;
    if (!row.scenario) continue;
    if (seen.has(row.scenario)) {
      throw new MeasurementError(`Duplicate scenario "${row.scenario}" in ${source}`);
    }
    seen.add(row.scenario);

    rows.push({
      scenario: row.scenario,
      status: row.status,
      durationMs: row.duration_s * 1000,
      savedLogs: row.saved_logs,
      headNote: row.head_note,
    });
  }

  if (rows.length === 0) {
    throw new MeasurementError(`No scenario rows parsed from ${source}`);
  }
  return rows;
}

export async function readResultsTsv(path: string): Promise<ScriptResultRow[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      throw new MeasurementError(`Missing results TSV: ${path}`, { cause: err });
    }
    throw err;
  }
  return parseResultsTsv(content, path);
}

export interface ExternalScriptSourceOptions {
  scriptPath: string;
  scriptArgs?: readonly string[];
  variants: readonly Variant[];
  repetitions: number;
  workRoot: string;
  /** Working directory for the script */
  repoRoot: string;
  systemGit: string;
  /** Used to name the `--<binaryName>-bin` argument */
  binaryName: string;
  keepArtifacts?: boolean;
  /** Bound for the sandbox's own commands */
  timeoutMs?: number;
  /** Bound for one script run */
  scriptTimeoutMs?: number;
  /** Local seed clone passed to every run as `--repo-url` */
  seedRepo?: string;
  env?: Record<string, string>;
  exec?: CommandExecutor;
}

export interface SeedRepo {
  path: string;
  /** Commit the clone checked out */
  head: string;
}

/**
 * Shallow-clone the seed repository once with the unmodified git, so every
 * variant and repetition starts from the same snapshot
 */
export async function cloneSeedRepo(
  options: { repoUrl: string; dir: string; systemGit: string },
  exec: CommandExecutor = runCommand
): Promise<SeedRepo> {
  const { repoUrl, dir, systemGit } = options;
  await mkdir(dirname(dir), { recursive: true });
  await removeDir(dir);

  try {
    await exec(systemGit, ['clone', '--depth', '1', repoUrl, dir], {
      cwd: dirname(dir),
      env: process.env,
      timeoutMs: SEED_CLONE_TIMEOUT_MS,
    });
  } catch (err) {
    throw wrapPhaseError(err, (message, opts) => new SetupError(message, opts), `Failed to clone seed repo ${repoUrl}`);
  }

  const result = await exec(systemGit, ['rev-parse', 'HEAD'], { cwd: dir, env: process.env });
  return { path: dir, head: result.stdout.trim() };
}

/**
 * Sample source that delegates timing to a shell script. Each variant and
 * repetition gets a fresh sandbox; the script reports one duration per
 * scenario in `results.tsv` under the work root it is given.
 */
export class ExternalScriptSource implements SampleSource {
  readonly name = 'script';
  private readonly options: ExternalScriptSourceOptions;

  constructor(options: ExternalScriptSourceOptions) {
    this.options = options;
  }

  describe(): string {
    const { scriptPath, variants, repetitions } = this.options;
    return `${scriptPath} x ${variants.length} variant(s), repetitions=${repetitions}`;
  }

  async collect(signal?: AbortSignal): Promise<SampleSet> {
    const { variants, repetitions } = this.options;
    const results: RunResult[] = [];
    let scenarioKeys: string[] | undefined;

    for (const variant of variants) {
      for (let repetition = 1; repetition <= repetitions; repetition++) {
        throwIfInterrupted(signal);
        const rows = await this.runOnce(variant, repetition, signal);

        const keys = rows.map((row) => row.scenario).sort();
        if (scenarioKeys === undefined) {
          scenarioKeys = keys;
        } else if (keys.join('\n') !== scenarioKeys.join('\n')) {
          throw new MeasurementError(
            `Scenario set changed for variant=${variant.key} repetition=${repetition}: ` +
              `expected [${scenarioKeys.join(', ')}], got [${keys.join(', ')}]`
          );
        }

        for (const row of rows) {
          results.push({
            scenario: row.scenario,
            complexity: 'complex',
            variant: variant.key,
            repetition,
            durationMs: row.durationMs,
            details: { status: row.status, savedLogs: row.savedLogs, headNote: row.headNote },
          });
          console.log(
            `[variant-result] variant=${variant.key} rep=${repetition} scenario=${row.scenario} ` +
              `status=${row.status} duration_s=${(row.durationMs / 1000).toFixed(3)}`
          );
        }
      }
    }

    const expected: ExpectedCell[] = (scenarioKeys ?? []).flatMap((scenario) =>
      variants.map((variant) => ({ scenario, variant: variant.key, repetitions }))
    );
    const scenarios: ScenarioInfo[] = (scenarioKeys ?? []).map((key) => ({
      key,
      complexity: 'complex',
      description: `reported by ${basename(this.options.scriptPath)}`,
    }));
    return { results, expected, scenarios };
  }

  private async runOnce(
    variant: Variant,
    repetition: number,
    signal: AbortSignal | undefined
  ): Promise<ScriptResultRow[]> {
    const { scriptPath, scriptArgs = [], workRoot, repoRoot, systemGit, binaryName, keepArtifacts = false } =
      this.options;
    const repRoot = join(workRoot, 'runs', variant.key, repetitionDirName('rep', repetition));
    const benchRoot = join(repRoot, 'benchmark');

    await removeDir(repRoot);
    await mkdir(repRoot, { recursive: true });

    const sandbox = await VariantSandbox.create({
      variant,
      root: join(repRoot, 'runtime'),
      systemGit,
      ...(this.options.timeoutMs !== undefined ? { timeoutMs: this.options.timeoutMs } : {}),
      ...(this.options.env !== undefined ? { env: this.options.env } : {}),
      ...(this.options.exec !== undefined ? { exec: this.options.exec } : {}),
    });

    console.log(`[variant-run] variant=${variant.key} repetition=${repetition}/${this.options.repetitions}`);

    const exec = this.options.exec ?? runCommand;
    const args = [
      scriptPath,
      ...(this.options.seedRepo !== undefined ? ['--repo-url', this.options.seedRepo] : []),
      ...scriptArgs,
      '--work-root',
      benchRoot,
      '--git-bin',
      sandbox.gitBinary,
      `--${binaryName}-bin`,
      variant.binary,
    ];
    try {
      await exec('bash', args, {
        cwd: repoRoot,
        env: sandbox.env,
        timeoutMs: this.options.scriptTimeoutMs ?? EXTERNAL_SCRIPT_TIMEOUT_MS,
      });
    } catch (err) {
      throw wrapPhaseError(
        err,
        (message, opts) => new MeasurementError(message, opts),
        `Scenario script failed: variant=${variant.key} repetition=${repetition}`,
        signal
      );
    }

    const rows = await readResultsTsv(join(benchRoot, 'results.tsv'));

    if (!keepArtifacts) {
      await removeDir(join(benchRoot, 'repo'));
    }
    return rows;
  }
}
