import { ConfigError } from './errors.js';
import { baselineMedian, slowdownPct } from './stats.js';
import type { GateDecision, MarginCheckResult, RunSummary } from './types.js';

/** Exit status for an enforced gate failure, distinct from fatal errors (1) */
export const GATE_FAILURE_EXIT_CODE = 2;

export interface MarginCheckOptions {
  baselineKey: string;
  marginPct: number;
  /** Variants checked against the baseline; the baseline itself is skipped */
  variants: readonly string[];
}

/**
 * Compare each checked variant's median against baseline × (1 + margin/100).
 * Only scenarios with a strictly positive baseline median produce checks.
 */
export function computeMarginChecks(
  summary: RunSummary,
  options: MarginCheckOptions
): MarginCheckResult[] {
  const { baselineKey, marginPct, variants } = options;
  if (!Number.isFinite(marginPct) || marginPct < 0) {
    throw new ConfigError(`Margin must be a non-negative number, got ${marginPct}`);
  }

  const multiplier = 1 + marginPct / 100;
  const checks: MarginCheckResult[] = [];

  for (const [scenario, byVariant] of Object.entries(summary)) {
    const baseline = baselineMedian(byVariant, baselineKey);
    if (baseline === undefined) continue;

    const allowed = baseline * multiplier;
    for (const variant of variants) {
      if (variant === baselineKey) continue;
      const stats = byVariant[variant];
      if (!stats) continue;

      checks.push({
        scenario,
        variant,
        baselineMs: baseline,
        medianMs: stats.medianMs,
        allowedMs: allowed,
        slowdownPct: slowdownPct(stats.medianMs, baseline),
        passed: stats.medianMs <= allowed,
      });
    }
  }

  return checks;
}

/**
 * Overall verdict. A failing gate only asks for a non-zero exit when
 * enforcement was requested.
 */
export function evaluateGate(
  checks: readonly MarginCheckResult[],
  options: { enforce: boolean }
): GateDecision {
  const failed = checks.filter((check) => !check.passed);
  const passed = failed.length === 0;

  return {
    passed,
    enforced: options.enforce,
    total: checks.length,
    failed,
    exitCode: options.enforce && !passed ? GATE_FAILURE_EXIT_CODE : 0,
  };
}
