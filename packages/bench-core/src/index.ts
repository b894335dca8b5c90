// Types
export type {
  VariantMode,
  Variant,
  Complexity,
  ExecResult,
  ExecOptions,
  CommandExecutor,
  RunDetails,
  RunResult,
  ScenarioVariantSummary,
  RunSummary,
  Slowdowns,
  MarginCheckResult,
  AggregateRatio,
  GateDecision,
  ExpectedCell,
} from './types.js';
export { VARIANT_MODES } from './types.js';

// Errors
export {
  BenchmarkError,
  CommandError,
  CommandTimeoutError,
  SetupError,
  SandboxError,
  MeasurementError,
  AggregationError,
  BuildError,
  ConfigError,
  BenchmarkInterruptedError,
  wrapPhaseError,
} from './errors.js';
export type { BenchmarkErrorKind, CommandFailure } from './errors.js';

// Process execution
export { runCommand, DEFAULT_COMMAND_TIMEOUT_MS } from './exec.js';

// Statistics
export {
  median,
  mean,
  stdev,
  calculateStats,
  summarizeRuns,
  assertCompleteMatrix,
  baselineMedian,
  slowdownPct,
  computeSlowdowns,
  geometricMean,
  computeAggregateRatios,
} from './stats.js';

// Regression gate
export { computeMarginChecks, evaluateGate, GATE_FAILURE_EXIT_CODE } from './gate.js';
export type { MarginCheckOptions } from './gate.js';

// Utilities
export { roundTo, formatRunStamp, nowIsoUtc, repetitionDirName } from './utils.js';
