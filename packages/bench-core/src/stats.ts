import { AggregationError } from './errors.js';
import type {
  AggregateRatio,
  ExpectedCell,
  RunResult,
  RunSummary,
  ScenarioVariantSummary,
  Slowdowns,
} from './types.js';

function sortedCopy(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

function requireSamples(values: readonly number[], what: string): void {
  if (values.length === 0) {
    throw new AggregationError(`Cannot calculate ${what} of an empty sample set`);
  }
}

/**
 * Median of the samples; an even count averages the two middle values
 */
export function median(values: readonly number[]): number {
  requireSamples(values, 'median');
  const sorted = sortedCopy(values);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

export function mean(values: readonly number[]): number {
  requireSamples(values, 'mean');
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population standard deviation, zero below two samples
 */
export function stdev(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Calculate summary statistics from an array of durations
 */
export function calculateStats(values: readonly number[]): ScenarioVariantSummary {
  requireSamples(values, 'stats');
  const sorted = sortedCopy(values);

  return {
    runsMs: [...values],
    medianMs: median(sorted),
    meanMs: mean(sorted),
    minMs: sorted[0] ?? 0,
    maxMs: sorted[sorted.length - 1] ?? 0,
    stdevMs: stdev(sorted),
  };
}

/**
 * Group samples by scenario and variant and summarize each group.
 * Groups keep the order in which samples were first seen.
 */
export function summarizeRuns(results: readonly RunResult[]): RunSummary {
  const grouped = new Map<string, Map<string, number[]>>();

  for (const result of results) {
    const byVariant = grouped.get(result.scenario) ?? new Map<string, number[]>();
    const samples = byVariant.get(result.variant) ?? [];
    samples.push(result.durationMs);
    byVariant.set(result.variant, samples);
    grouped.set(result.scenario, byVariant);
  }

  const summary: RunSummary = {};
  for (const [scenario, byVariant] of grouped) {
    const scenarioSummary: Record<string, ScenarioVariantSummary> = {};
    for (const [variant, samples] of byVariant) {
      scenarioSummary[variant] = calculateStats(samples);
    }
    summary[scenario] = scenarioSummary;
  }

  return summary;
}

/**
 * Verify every expected cell carries exactly its configured number of
 * samples, with no repeated repetition index and no unexpected cells
 */
export function assertCompleteMatrix(
  results: readonly RunResult[],
  expected: readonly ExpectedCell[]
): void {
  const cellKey = (scenario: string, variant: string) => `${scenario}\u0000${variant}`;
  const seen = new Map<string, Set<number>>();
  const counts = new Map<string, number>();

  for (const result of results) {
    const key = cellKey(result.scenario, result.variant);
    const repetitions = seen.get(key) ?? new Set<number>();
    if (repetitions.has(result.repetition)) {
      throw new AggregationError(
        `Duplicate sample: scenario=${result.scenario} variant=${result.variant} repetition=${result.repetition}`
      );
    }
    repetitions.add(result.repetition);
    seen.set(key, repetitions);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const expectedKeys = new Set<string>();
  for (const cell of expected) {
    const key = cellKey(cell.scenario, cell.variant);
    expectedKeys.add(key);
    const actual = counts.get(key) ?? 0;
    if (actual !== cell.repetitions) {
      throw new AggregationError(
        `Expected ${cell.repetitions} samples for scenario=${cell.scenario} variant=${cell.variant}, found ${actual}`
      );
    }
  }

  for (const result of results) {
    if (!expectedKeys.has(cellKey(result.scenario, result.variant))) {
      throw new AggregationError(
        `Unexpected sample: scenario=${result.scenario} variant=${result.variant}`
      );
    }
  }
}

/**
 * Positive baseline median for a scenario, or undefined when the baseline
 * is missing or not strictly positive
 */
export function baselineMedian(
  byVariant: Record<string, ScenarioVariantSummary>,
  baselineKey: string
): number | undefined {
  const baseline = byVariant[baselineKey];
  if (!baseline || !(baseline.medianMs > 0)) {
    return undefined;
  }
  return baseline.medianMs;
}

export function slowdownPct(medianMs: number, baselineMs: number): number {
  return ((medianMs - baselineMs) / baselineMs) * 100;
}

/**
 * Percentage slowdown of each variant's median against the baseline,
 * per scenario. Scenarios without a positive baseline are left out.
 */
export function computeSlowdowns(summary: RunSummary, baselineKey: string): Slowdowns {
  const slowdowns: Slowdowns = {};

  for (const [scenario, byVariant] of Object.entries(summary)) {
    const baseline = baselineMedian(byVariant, baselineKey);
    if (baseline === undefined) continue;

    const row: Record<string, number> = {};
    for (const [variant, stats] of Object.entries(byVariant)) {
      if (variant === baselineKey) continue;
      row[variant] = slowdownPct(stats.medianMs, baseline);
    }
    slowdowns[scenario] = row;
  }

  return slowdowns;
}

/**
 * Geometric mean of strictly positive values; 1 for an empty list
 */
export function geometricMean(values: readonly number[]): number {
  if (values.length === 0) {
    return 1;
  }
  let logSum = 0;
  for (const value of values) {
    if (!(value > 0)) {
      throw new AggregationError(`Geometric mean requires positive values, got ${value}`);
    }
    logSum += Math.log(value);
  }
  return Math.exp(logSum / values.length);
}

/**
 * Cross-scenario comparison: geometric mean of per-scenario
 * (variant median / baseline median) ratios for each variant
 */
export function computeAggregateRatios(
  summary: RunSummary,
  baselineKey: string,
  variants: readonly string[]
): AggregateRatio[] {
  return variants
    .filter((variant) => variant !== baselineKey)
    .map((variant) => {
      const ratios: number[] = [];
      for (const byVariant of Object.values(summary)) {
        const baseline = baselineMedian(byVariant, baselineKey);
        const stats = byVariant[variant];
        if (baseline === undefined || !stats || !(stats.medianMs > 0)) continue;
        ratios.push(stats.medianMs / baseline);
      }
      const ratio = geometricMean(ratios);
      return {
        variant,
        ratio,
        slowdownPct: (ratio - 1) * 100,
        scenarioCount: ratios.length,
      };
    });
}
