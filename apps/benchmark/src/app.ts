import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import { BenchmarkError, nowIsoUtc } from '@gitbench/core';
import type { Variant } from '@gitbench/core';
import { createModeVariants, gitOutput, resolveSystemGit, toolDebugEnv } from '@gitbench/sandbox';
import { prepareBinaries } from './binaries.js';
import {
  DEFAULT_BINARY_NAME,
  DEFAULT_MAIN_REF,
  DEFAULT_SCRIPT_TIMEOUT_SECONDS,
  DEFAULT_TIMEOUT_SECONDS,
  parseBenchmarkConfig,
  parseScriptConfig,
} from './config.js';
import { ExternalScriptSource, cloneSeedRepo } from './external.js';
import { runPipeline } from './pipeline.js';
import type { PipelineOutcome } from './pipeline.js';
import type { RunMetadata } from './report.js';
import { MatrixRunner } from './runner.js';
import { SCENARIOS, selectScenarios } from './scenarios/index.js';
import type { BenchmarkConfig, CommonConfig, SampleSource, ScriptConfig } from './types.js';

export const INTERRUPTED_EXIT_CODE = 130;
export const FATAL_EXIT_CODE = 1;

/**
 * Process exit status for an error that escaped a command
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof BenchmarkError && err.kind === 'interrupted') {
    return INTERRUPTED_EXIT_CODE;
  }
  return FATAL_EXIT_CODE;
}

/**
 * Quote an argument for a POSIX shell when it holds anything beyond plain
 * path and flag characters
 */
export function shellQuote(arg: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Options shared by both families, skipping the ones left at their default
 */
function commonRerunArgs(config: CommonConfig): string[] {
  const args = ['--work-root', config.workRoot, '--repo-root', config.repoRoot];
  if (config.mainRef !== DEFAULT_MAIN_REF) args.push('--main-ref', config.mainRef);
  if (config.currentBin !== undefined) args.push('--current-bin', config.currentBin);
  if (config.mainBin !== undefined) args.push('--main-bin', config.mainBin);
  if (config.binaryName !== DEFAULT_BINARY_NAME) args.push('--binary-name', config.binaryName);
  if (config.timeoutMs !== DEFAULT_TIMEOUT_SECONDS * 1000) args.push('--timeout', String(config.timeoutMs / 1000));
  if (config.keepArtifacts) args.push('--keep-artifacts');
  return args;
}

function rerunCommand(familyArgs: string[], config: CommonConfig): string {
  const args = [...familyArgs, ...commonRerunArgs(config)];
  if (config.enforceMargin) args.push('--enforce-margin');
  return ['npm run bench --', ...args.map(shellQuote)].join(' ');
}

export function buildRunRerunCommand(config: BenchmarkConfig): string {
  const args = [
    'run',
    '--iterations-basic',
    String(config.iterationsBasic),
    '--iterations-complex',
    String(config.iterationsComplex),
    '--margin-pct',
    config.marginPct.toFixed(1),
    '--margin-baseline',
    config.marginBaseline,
  ];
  if (config.scenarios.length > 0) args.push('--scenarios', config.scenarios.join(','));
  return rerunCommand(args, config);
}

export function buildScriptRerunCommand(config: ScriptConfig): string {
  const args = [
    'script',
    config.scriptPath,
    '--repetitions',
    String(config.repetitions),
    '--margin-pct',
    config.marginPct.toFixed(1),
    '--margin-baseline',
    config.marginBaseline,
  ];
  if (config.repoUrl !== undefined) args.push('--repo-url', config.repoUrl);
  if (config.scriptTimeoutMs !== DEFAULT_SCRIPT_TIMEOUT_SECONDS * 1000) {
    args.push('--script-timeout', String(config.scriptTimeoutMs / 1000));
  }
  args.push(...config.scriptArgs.map((arg) => `--script-arg=${arg}`));
  return rerunCommand(args, config);
}

/**
 * Map commander's option names onto the config schema and fill in a temp
 * work root
 */
async function normalizeOptions(options: Record<string, unknown>): Promise<Record<string, unknown>> {
  const { workRoot, timeout, ...rest } = options;
  return {
    ...rest,
    timeoutSeconds: timeout,
    workRoot:
      typeof workRoot === 'string' && workRoot.length > 0
        ? workRoot
        : await mkdtemp(join(os.tmpdir(), 'git-mode-bench-')),
  };
}

/**
 * Abort signal tripped by SIGINT or SIGTERM. Work already running
 * finishes; nothing new starts.
 */
function onInterrupt(): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const handler = (name: NodeJS.Signals) => {
    console.warn(`\nReceived ${name}, stopping after the current repetition...`);
    controller.abort();
  };
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return {
    signal: controller.signal,
    release: () => {
      process.off('SIGINT', handler);
      process.off('SIGTERM', handler);
    },
  };
}

async function collectMetadata(
  config: CommonConfig,
  systemGit: string,
  mainSha: string,
  settings: RunMetadata['settings']
): Promise<RunMetadata> {
  return {
    timestampUtc: nowIsoUtc(),
    repoRoot: config.repoRoot,
    branch: await gitOutput(config.repoRoot, ['rev-parse', '--abbrev-ref', 'HEAD']),
    branchSha: await gitOutput(config.repoRoot, ['rev-parse', 'HEAD']),
    mainRef: config.mainRef,
    mainSha,
    systemGit,
    settings,
  };
}

function printConfiguration(config: CommonConfig, variants: readonly Variant[], lines: string[]): void {
  console.log('Git Mode Benchmark');
  console.log('==================\n');
  console.log('Configuration:');
  console.log(`  Work root: ${config.workRoot}`);
  for (const line of lines) {
    console.log(`  ${line}`);
  }
  console.log(
    `  Margin: ${config.marginPct.toFixed(1)}% vs ${config.marginBaseline}` +
      (config.enforceMargin ? ' (enforced)' : ' (advisory)')
  );
  if (config.verbose) {
    for (const variant of variants) {
      console.log(`  Variant ${variant.key}: ${variant.label} [${variant.mode}] ${variant.binary}`);
    }
  }
  console.log('');
}

/**
 * Print the completion banner and return the exit status the gate asks for
 */
export function reportOutcome({ analysis, artifacts }: PipelineOutcome, marginPct: number): number {
  const { gate } = analysis;
  console.log('');
  console.log('Benchmark complete');
  console.log(`- Report: ${artifacts.reportPath}`);
  console.log(`- JSON:   ${artifacts.jsonPath}`);
  console.log(`- CSV:    ${artifacts.csvPath}`);
  console.log(`- Margin checks: ${gate.total - gate.failed.length}/${gate.total} passing`);

  if (gate.failed.length > 0) {
    console.log('');
    console.log(gate.enforced ? 'Margin enforcement failed:' : 'Margin checks failing (advisory):');
    for (const check of gate.failed) {
      console.log(
        `  - ${check.scenario} / ${check.variant}: ${check.slowdownPct.toFixed(3)}% > ${marginPct.toFixed(1)}%`
      );
    }
  }
  return gate.exitCode;
}

interface FamilyPlan {
  source: SampleSource;
  settings: RunMetadata['settings'];
  rerunCommand: string;
}

async function runFamily(
  config: CommonConfig,
  plan: (variants: Variant[], systemGit: string) => Promise<FamilyPlan>
): Promise<number> {
  const systemGit = await resolveSystemGit({ toolBinaryName: config.binaryName });
  const binaries = await prepareBinaries(config);
  const variants = createModeVariants(binaries);
  const { source, settings, rerunCommand } = await plan(variants, systemGit);

  printConfiguration(
    config,
    variants,
    Object.entries(settings).map(([name, value]) => `${name}: ${value}`)
  );
  const metadata = await collectMetadata(config, systemGit, binaries.mainSha, settings);

  const interrupt = onInterrupt();
  try {
    const outcome = await runPipeline(source, {
      variantKeys: variants.map((v) => v.key),
      marginBaseline: config.marginBaseline,
      marginPct: config.marginPct,
      enforce: config.enforceMargin,
      workRoot: config.workRoot,
      signal: interrupt.signal,
      report: {
        title: `${config.binaryName} Mode Benchmark Report`,
        metadata,
        variants,
        enforced: config.enforceMargin,
        rerunCommand,
      },
    });
    return reportOutcome(outcome, config.marginPct);
  } finally {
    interrupt.release();
  }
}

export async function runMatrixCommand(config: BenchmarkConfig): Promise<number> {
  const scenarios = selectScenarios(config.scenarios);
  return runFamily(config, async (variants, systemGit) => ({
    source: new MatrixRunner({
      scenarios,
      variants,
      workRoot: config.workRoot,
      systemGit,
      iterations: { basic: config.iterationsBasic, complex: config.iterationsComplex },
      keepArtifacts: config.keepArtifacts,
      timeoutMs: config.timeoutMs,
      verbose: config.verbose,
      env: toolDebugEnv(config.binaryName),
    }),
    settings: {
      iterations_basic: config.iterationsBasic,
      iterations_complex: config.iterationsComplex,
      scenarios: scenarios.map((s) => s.key).join(','),
    },
    rerunCommand: buildRunRerunCommand(config),
  }));
}

export async function runScriptCommand(config: ScriptConfig): Promise<number> {
  return runFamily(config, async (variants, systemGit) => {
    let seedRepo: string | undefined;
    const seedSettings: RunMetadata['settings'] = {};
    if (config.repoUrl !== undefined) {
      console.log('Cloning seed repo snapshot...');
      const seed = await cloneSeedRepo({ repoUrl: config.repoUrl, dir: join(config.workRoot, 'seed-repo'), systemGit });
      seedRepo = seed.path;
      seedSettings.repo_url = config.repoUrl;
      seedSettings.seed_repo_head = seed.head;
    }

    return {
      source: new ExternalScriptSource({
        scriptPath: config.scriptPath,
        scriptArgs: config.scriptArgs,
        variants,
        repetitions: config.repetitions,
        workRoot: config.workRoot,
        repoRoot: config.repoRoot,
        systemGit,
        binaryName: config.binaryName,
        keepArtifacts: config.keepArtifacts,
        timeoutMs: config.timeoutMs,
        scriptTimeoutMs: config.scriptTimeoutMs,
        ...(seedRepo !== undefined ? { seedRepo } : {}),
        env: toolDebugEnv(config.binaryName),
      }),
      settings: {
        script: config.scriptPath,
        script_args: config.scriptArgs.join(' '),
        repetitions: config.repetitions,
        ...seedSettings,
      },
      rerunCommand: buildScriptRerunCommand(config),
    };
  });
}

/**
 * Run a command body, printing fatal errors and setting the exit status
 */
async function guarded(body: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (err) {
    console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = exitCodeFor(err);
  }
}

function addCommonOptions(command: Command): Command {
  return command
    .option('--work-root <dir>', 'Working directory for builds, runs and artifacts (default: a temp dir)')
    .option('--repo-root <dir>', 'Checkout of the tool under test (default: current directory)')
    .option('--main-ref <ref>', 'Git ref the baseline binary is built from', DEFAULT_MAIN_REF)
    .option('--current-bin <path>', 'Use an existing current binary instead of building one')
    .option('--main-bin <path>', 'Use an existing baseline binary instead of building one')
    .option('--binary-name <name>', 'Name of the tool binary', DEFAULT_BINARY_NAME)
    .option('--keep-artifacts', 'Keep template and run repositories under the work root', false)
    .option('--margin-pct <pct>', 'Maximum allowed slowdown relative to --margin-baseline', '25')
    .option('--margin-baseline <variant>', 'Baseline variant for margin checks (current_wrapper | main_wrapper)', 'current_wrapper')
    .option('--enforce-margin', 'Exit with status 2 when a margin check fails', false)
    .option('--timeout <seconds>', 'Upper bound for every spawned git or tool command', String(DEFAULT_TIMEOUT_SECONDS))
    .option('-v, --verbose', 'Verbose output', false);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('git-mode-bench')
    .description('Benchmark git workflows across tool execution modes and gate regressions')
    .version('0.1.0');

  addCommonOptions(
    program
      .command('run', { isDefault: true })
      .description('Run the scenario matrix in process')
      .option('--iterations-basic <n>', 'Repetitions per basic scenario per variant', '3')
      .option('--iterations-complex <n>', 'Repetitions per complex scenario per variant', '3')
      .option('--scenarios <keys>', 'Comma-separated scenario keys (default: all)')
  ).action(async (options: Record<string, unknown>) => {
    await guarded(async () => runMatrixCommand(parseBenchmarkConfig(await normalizeOptions(options))));
  });

  addCommonOptions(
    program
      .command('script <path>')
      .description('Time an external scenario script that writes results.tsv')
      .option('--repetitions <n>', 'Script runs per variant', '3')
      .option('--script-arg <arg...>', 'Extra argument passed to the script (repeatable)')
      .option('--repo-url <url>', 'Repository cloned once and passed to every script run as --repo-url')
      .option('--script-timeout <seconds>', 'Upper bound for one script run', String(DEFAULT_SCRIPT_TIMEOUT_SECONDS))
  ).action(async (scriptPath: string, options: Record<string, unknown>) => {
    await guarded(async () => {
      const { scriptArg, scriptTimeout, ...rest } = await normalizeOptions(options);
      return runScriptCommand(
        parseScriptConfig({ ...rest, scriptPath, scriptArgs: scriptArg, scriptTimeoutSeconds: scriptTimeout })
      );
    });
  });

  program
    .command('scenarios')
    .description('List the scenario registry')
    .action(() => {
      console.log('Scenarios:\n');
      for (const scenario of SCENARIOS) {
        console.log(`${scenario.key.padEnd(24)} ${scenario.complexity.padEnd(8)} ${scenario.description}`);
      }
    });

  return program;
}
