import {
  ConfigError,
  assertCompleteMatrix,
  computeAggregateRatios,
  computeMarginChecks,
  computeSlowdowns,
  evaluateGate,
  summarizeRuns,
} from '@gitbench/core';
import type { AggregateRatio, GateDecision, MarginCheckResult, RunSummary, Slowdowns } from '@gitbench/core';
import { writeArtifacts } from './report.js';
import type { ArtifactPaths, ReportContext } from './report.js';
import type { SampleSet, SampleSource } from './types.js';

/** Baseline for slowdown columns and aggregate ratios */
export const COMPARISON_BASELINE = 'main_wrapper';

/** Variants the regression gate checks */
export const GATED_VARIANTS: readonly string[] = ['current_hooks', 'current_both'];

export interface AnalysisOptions {
  /** Every registered variant key, in display order */
  variantKeys: readonly string[];
  marginBaseline: string;
  marginPct: number;
  enforce: boolean;
  comparisonBaseline?: string;
  gatedVariants?: readonly string[];
}

export interface BenchmarkAnalysis {
  summary: RunSummary;
  comparisonBaseline: string;
  slowdowns: Slowdowns;
  aggregates: AggregateRatio[];
  marginChecks: MarginCheckResult[];
  gate: GateDecision;
}

/**
 * Check the sample matrix is complete, then derive every statistic the
 * reports and the gate need
 */
export function analyzeSamples(samples: SampleSet, options: AnalysisOptions): BenchmarkAnalysis {
  const comparisonBaseline = options.comparisonBaseline ?? COMPARISON_BASELINE;
  for (const key of [options.marginBaseline, comparisonBaseline]) {
    if (!options.variantKeys.includes(key)) {
      throw new ConfigError(
        `Baseline ${key} is not a registered variant (available: ${options.variantKeys.join(', ')})`
      );
    }
  }

  assertCompleteMatrix(samples.results, samples.expected);

  const summary = summarizeRuns(samples.results);
  const marginChecks = computeMarginChecks(summary, {
    baselineKey: options.marginBaseline,
    marginPct: options.marginPct,
    variants: options.gatedVariants ?? GATED_VARIANTS,
  });

  return {
    summary,
    comparisonBaseline,
    slowdowns: computeSlowdowns(summary, comparisonBaseline),
    aggregates: computeAggregateRatios(summary, comparisonBaseline, options.variantKeys),
    marginChecks,
    gate: evaluateGate(marginChecks, { enforce: options.enforce }),
  };
}

export interface PipelineOptions extends AnalysisOptions {
  workRoot: string;
  report: ReportContext;
  signal?: AbortSignal;
}

export interface PipelineOutcome {
  samples: SampleSet;
  analysis: BenchmarkAnalysis;
  artifacts: ArtifactPaths;
}

/**
 * Collect samples, analyze them and write the artifact set
 */
export async function runPipeline(source: SampleSource, options: PipelineOptions): Promise<PipelineOutcome> {
  console.log(`Collecting samples (${source.name}): ${source.describe()}`);
  const samples = await source.collect(options.signal);
  const analysis = analyzeSamples(samples, options);
  const artifacts = await writeArtifacts(options.workRoot, {
    ...options.report,
    scenarios: samples.scenarios,
    results: samples.results,
    analysis,
    marginPct: options.marginPct,
    marginBaseline: options.marginBaseline,
  });
  return { samples, analysis, artifacts };
}
