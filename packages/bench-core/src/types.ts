/**
 * How a variant's binary is wired into the sandboxed git client
 */
export type VariantMode = 'wrapper' | 'hooks' | 'both';

export const VARIANT_MODES: readonly VariantMode[] = ['wrapper', 'hooks', 'both'];

/**
 * One execution configuration of the tool under comparison
 */
export interface Variant {
  /** Stable short name used as a key in results */
  readonly key: string;
  /** Human readable label for reports */
  readonly label: string;
  /** Absolute path to the tool binary */
  readonly binary: string;
  readonly mode: VariantMode;
}

/**
 * Scenario complexity class, only used to pick the repetition count
 */
export type Complexity = 'basic' | 'complex';

/**
 * Result of executing a command
 */
export interface ExecResult {
  /** Exit code */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Execution time in milliseconds */
  durationMs: number;
}

export interface ExecOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  /** Upper bound for the command; exceeding it is fatal */
  timeoutMs?: number;
}

/**
 * Spawns a command and resolves with its captured output, rejecting on a
 * non-zero exit or a timeout
 */
export type CommandExecutor = (
  cmd: string,
  args: string[],
  options: ExecOptions
) => Promise<ExecResult>;

/**
 * Auxiliary counters reported by out-of-process scenario scripts
 */
export interface RunDetails {
  status: string;
  savedLogs: number;
  headNote: string;
}

/**
 * One timed sample
 */
export interface RunResult {
  readonly scenario: string;
  readonly complexity: Complexity;
  readonly variant: string;
  /** 1-based repetition index */
  readonly repetition: number;
  readonly durationMs: number;
  readonly details?: RunDetails;
}

/**
 * Aggregated samples for one (scenario, variant) pair
 */
export interface ScenarioVariantSummary {
  /** Samples in execution order */
  runsMs: number[];
  medianMs: number;
  meanMs: number;
  minMs: number;
  maxMs: number;
  stdevMs: number;
}

/** scenario key -> variant key -> summary */
export type RunSummary = Record<string, Record<string, ScenarioVariantSummary>>;

/** scenario key -> variant key -> slowdown percentage */
export type Slowdowns = Record<string, Record<string, number>>;

export interface MarginCheckResult {
  scenario: string;
  variant: string;
  baselineMs: number;
  medianMs: number;
  allowedMs: number;
  slowdownPct: number;
  passed: boolean;
}

/**
 * Cross-scenario geometric-mean comparison for one variant
 */
export interface AggregateRatio {
  variant: string;
  ratio: number;
  slowdownPct: number;
  /** Scenarios that contributed a ratio */
  scenarioCount: number;
}

export interface GateDecision {
  passed: boolean;
  enforced: boolean;
  total: number;
  failed: MarginCheckResult[];
  /** Process exit status the gate asks for */
  exitCode: number;
}

/**
 * A (scenario, variant) cell that must carry exactly `repetitions` samples
 */
export interface ExpectedCell {
  scenario: string;
  variant: string;
  repetitions: number;
}
