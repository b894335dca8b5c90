import type { Complexity, ExpectedCell, RunResult } from '@gitbench/core';
import type { VariantSandbox } from '@gitbench/sandbox';

export type MarginBaseline = 'current_wrapper' | 'main_wrapper';

/**
 * Options shared by every benchmark family
 */
export interface CommonConfig {
  /** Root for templates, runs, builds and artifacts */
  workRoot: string;
  /** Checkout of the tool under test */
  repoRoot: string;
  /** Prebuilt binary for the current checkout; built when absent */
  currentBin?: string;
  /** Prebuilt baseline binary; built from `mainRef` when absent */
  mainBin?: string;
  mainRef: string;
  binaryName: string;
  keepArtifacts: boolean;
  /** Allowed slowdown against `marginBaseline`, in percent */
  marginPct: number;
  marginBaseline: MarginBaseline;
  enforceMargin: boolean;
  /** Per-command upper bound */
  timeoutMs: number;
  verbose: boolean;
}

export interface BenchmarkConfig extends CommonConfig {
  iterationsBasic: number;
  iterationsComplex: number;
  /** Scenario keys to run; empty runs the whole registry */
  scenarios: string[];
}

export interface ScriptConfig extends CommonConfig {
  /** Shell script that writes `results.tsv` under its `--work-root` */
  scriptPath: string;
  scriptArgs: string[];
  repetitions: number;
  /** Upper bound for one script run; `timeoutMs` bounds the sandbox's own commands */
  scriptTimeoutMs: number;
  /** Repository cloned once and handed to every script run as `--repo-url` */
  repoUrl?: string;
}

/**
 * What a scenario can do with the sandbox it runs in
 */
export type ScenarioContext = Pick<VariantSandbox, 'runGit' | 'runVariantBinary' | 'initRepo' | 'checkpoint'>;

export type ScenarioStep = (ctx: ScenarioContext, repoDir: string, repetition: number) => Promise<void>;

export interface Scenario {
  key: string;
  description: string;
  complexity: Complexity;
  /** Build the template repository once per variant */
  setup: (ctx: ScenarioContext, templateDir: string) => Promise<void>;
  /** Untimed edits made to the fresh copy before the clock starts */
  prepare?: ScenarioStep;
  /** The timed operation */
  measure: ScenarioStep;
}

export interface ScenarioInfo {
  key: string;
  complexity: Complexity;
  description: string;
}

/**
 * Samples plus the matrix they are expected to fill
 */
export interface SampleSet {
  results: RunResult[];
  expected: ExpectedCell[];
  /** Scenarios the samples cover, in report order */
  scenarios: ScenarioInfo[];
}

/**
 * Anything that produces timed samples for the analysis pipeline
 */
export interface SampleSource {
  readonly name: string;
  describe(): string;
  collect(signal?: AbortSignal): Promise<SampleSet>;
}
