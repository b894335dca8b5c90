import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { formatRunStamp, roundTo } from '@gitbench/core';
import type { RunResult, Variant } from '@gitbench/core';
import type { BenchmarkAnalysis } from './pipeline.js';
import type { ScenarioInfo } from './types.js';

export interface RunMetadata {
  timestampUtc: string;
  repoRoot: string;
  branch: string;
  branchSha: string;
  mainRef: string;
  mainSha: string;
  systemGit: string;
  /** Family-specific settings, e.g. iteration counts or the script path */
  settings: Record<string, string | number | boolean>;
}

/**
 * Everything a report shows that the analysis does not carry
 */
export interface ReportContext {
  title: string;
  metadata: RunMetadata;
  variants: readonly Variant[];
  enforced: boolean;
  /** Shell command that reproduces the run */
  rerunCommand: string;
}

export interface ReportInput extends ReportContext {
  scenarios: readonly ScenarioInfo[];
  results: readonly RunResult[];
  analysis: BenchmarkAnalysis;
  marginPct: number;
  marginBaseline: string;
}

export interface ArtifactPaths {
  dir: string;
  csvPath: string;
  jsonPath: string;
  reportPath: string;
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderRawCsv(results: readonly RunResult[]): string {
  const withDetails = results.some((result) => result.details !== undefined);
  const header = ['scenario', 'complexity', 'variant', 'run_index', 'duration_ms'];
  if (withDetails) header.push('status', 'saved_logs', 'head_note');

  const rows = results.map((result) => {
    const fields: Array<string | number> = [
      result.scenario,
      result.complexity,
      result.variant,
      result.repetition,
      result.durationMs.toFixed(3),
    ];
    if (withDetails) {
      const { details } = result;
      fields.push(details?.status ?? '', details?.savedLogs ?? '', details?.headNote ?? '');
    }
    return fields.map(csvField).join(',');
  });

  return [header.join(','), ...rows].join('\n') + '\n';
}

export function renderSummaryJson(input: ReportInput): string {
  const { metadata, analysis } = input;

  const summary: Record<string, Record<string, object>> = {};
  for (const [scenario, byVariant] of Object.entries(analysis.summary)) {
    const row: Record<string, object> = {};
    for (const [variant, stats] of Object.entries(byVariant)) {
      row[variant] = {
        runs_ms: stats.runsMs.map((v) => roundTo(v)),
        median_ms: roundTo(stats.medianMs),
        mean_ms: roundTo(stats.meanMs),
        min_ms: roundTo(stats.minMs),
        max_ms: roundTo(stats.maxMs),
        stdev_ms: roundTo(stats.stdevMs),
      };
    }
    summary[scenario] = row;
  }

  const slowdowns: Record<string, Record<string, number>> = {};
  for (const [scenario, byVariant] of Object.entries(analysis.slowdowns)) {
    slowdowns[scenario] = Object.fromEntries(
      Object.entries(byVariant).map(([variant, pct]) => [variant, roundTo(pct)])
    );
  }

  const document = {
    metadata: {
      timestamp_utc: metadata.timestampUtc,
      repo_root: metadata.repoRoot,
      branch: metadata.branch,
      branch_sha: metadata.branchSha,
      main_ref: metadata.mainRef,
      main_sha: metadata.mainSha,
      real_git: metadata.systemGit,
      ...metadata.settings,
      margin_pct: input.marginPct,
      margin_baseline: input.marginBaseline,
      variants: Object.fromEntries(input.variants.map((v) => [v.key, v.binary])),
    },
    summary,
    slowdowns_baseline: analysis.comparisonBaseline,
    slowdowns_pct: slowdowns,
    aggregate: analysis.aggregates.map((agg) => ({
      variant: agg.variant,
      ratio: roundTo(agg.ratio, 4),
      slowdown_pct: roundTo(agg.slowdownPct),
      scenario_count: agg.scenarioCount,
    })),
    margin_checks: analysis.marginChecks.map((check) => ({
      scenario: check.scenario,
      variant: check.variant,
      baseline_ms: roundTo(check.baselineMs),
      median_ms: roundTo(check.medianMs),
      allowed_ms: roundTo(check.allowedMs),
      slowdown_pct: roundTo(check.slowdownPct),
      passed: check.passed,
    })),
    gate: {
      passed: analysis.gate.passed,
      enforced: analysis.gate.enforced,
      total: analysis.gate.total,
      failed: analysis.gate.failed.length,
      exit_code: analysis.gate.exitCode,
    },
  };

  return `${JSON.stringify(document, null, 2)}\n`;
}

function labelOf(variants: readonly Variant[], key: string): string {
  return variants.find((v) => v.key === key)?.label ?? key;
}

function tableRow(cells: readonly string[]): string {
  return `| ${cells.join(' | ')} |`;
}

export function renderMarkdownReport(input: ReportInput): string {
  const { metadata, variants, scenarios, analysis } = input;
  const baselineKey = analysis.comparisonBaseline;
  const baselineLabel = labelOf(variants, baselineKey);
  const compared = variants.filter((v) => v.key !== baselineKey);
  const lines: string[] = [];

  lines.push(`# ${input.title}`, '');

  lines.push('## Run Metadata', '');
  lines.push(`- Timestamp (UTC): \`${metadata.timestampUtc}\``);
  lines.push(`- Repo: \`${metadata.repoRoot}\``);
  lines.push(`- Branch: \`${metadata.branch}\``);
  lines.push(`- Branch SHA: \`${metadata.branchSha}\``);
  lines.push(`- Main Ref: \`${metadata.mainRef}\``);
  lines.push(`- Main SHA: \`${metadata.mainSha}\``);
  lines.push(`- Real git: \`${metadata.systemGit}\``);
  for (const [name, value] of Object.entries(metadata.settings)) {
    lines.push(`- ${name}: \`${value}\``);
  }
  lines.push('');

  lines.push('## Variants', '');
  for (const variant of variants) {
    lines.push(`- \`${variant.key}\`: ${variant.label} (\`${variant.binary}\`)`);
  }
  lines.push('');

  lines.push('## Scenario Matrix', '');
  for (const scenario of scenarios) {
    lines.push(`- \`${scenario.key}\` (${scenario.complexity}): ${scenario.description}`);
  }
  lines.push('');

  lines.push('## Exact Timings (ms)', '');
  lines.push(tableRow(['Scenario', ...variants.map((v) => `${v.label} runs`)]));
  lines.push(tableRow(['---', ...variants.map(() => '---:')]));
  for (const scenario of scenarios) {
    const byVariant = analysis.summary[scenario.key] ?? {};
    lines.push(
      tableRow([
        scenario.key,
        ...variants.map((v) => byVariant[v.key]?.runsMs.map((ms) => ms.toFixed(3)).join(', ') ?? 'n/a'),
      ])
    );
  }
  lines.push('');

  lines.push(`## Median Summary (ms) and Slowdown vs ${baselineLabel}`, '');
  lines.push(tableRow(['Scenario', ...variants.map((v) => v.label), ...compared.map((v) => `${v.key} Δ%`)]));
  lines.push(tableRow(['---', ...variants.map(() => '---:'), ...compared.map(() => '---:')]));
  for (const scenario of scenarios) {
    const byVariant = analysis.summary[scenario.key] ?? {};
    const slowdowns = analysis.slowdowns[scenario.key];
    lines.push(
      tableRow([
        scenario.key,
        ...variants.map((v) => byVariant[v.key]?.medianMs.toFixed(3) ?? 'n/a'),
        ...compared.map((v) => {
          const pct = slowdowns?.[v.key];
          return pct === undefined ? 'n/a' : `${pct.toFixed(3)}%`;
        }),
      ])
    );
  }
  lines.push('');

  lines.push('## Aggregate Comparison', '');
  lines.push(`| Variant | Geometric Mean Ratio vs ${baselineLabel} | Geometric Mean Slowdown | Scenarios |`);
  lines.push('|---|---:|---:|---:|');
  for (const agg of analysis.aggregates) {
    lines.push(
      tableRow([agg.variant, `${agg.ratio.toFixed(4)}x`, `${agg.slowdownPct.toFixed(3)}%`, String(agg.scenarioCount)])
    );
  }
  lines.push('');

  lines.push('## Margin Check', '');
  lines.push(
    `- Required margin: checked modes must be <= \`${input.marginPct.toFixed(1)}%\` slower than ` +
      `\`${input.marginBaseline.replace(/_/g, ' ')}\``
  );
  lines.push(`- Enforcement: ${input.enforced ? 'enabled' : 'advisory'}`, '');
  lines.push('| Scenario | Variant | Baseline (ms) | Variant Median (ms) | Allowed Max (ms) | Slowdown | Status |');
  lines.push('|---|---|---:|---:|---:|---:|---|');
  const sortedChecks = [...analysis.marginChecks].sort(
    (a, b) => a.scenario.localeCompare(b.scenario) || a.variant.localeCompare(b.variant)
  );
  for (const check of sortedChecks) {
    lines.push(
      tableRow([
        check.scenario,
        check.variant,
        check.baselineMs.toFixed(3),
        check.medianMs.toFixed(3),
        check.allowedMs.toFixed(3),
        `${check.slowdownPct.toFixed(3)}%`,
        check.passed ? 'PASS' : 'FAIL',
      ])
    );
  }
  const { total, failed } = analysis.gate;
  lines.push('', `- Overall: \`${total - failed.length}/${total}\` checks passing`, '');

  lines.push('## Re-run', '');
  lines.push('```bash', input.rerunCommand, '```');

  return `${lines.join('\n')}\n`;
}

/**
 * Write raw CSV, JSON summary and Markdown report into a fresh
 * `artifacts/<stamp>` directory under the work root
 */
export async function writeArtifacts(
  workRoot: string,
  input: ReportInput,
  date: Date = new Date()
): Promise<ArtifactPaths> {
  const dir = join(workRoot, 'artifacts', formatRunStamp(date));
  await mkdir(dir, { recursive: true });

  const paths: ArtifactPaths = {
    dir,
    csvPath: join(dir, 'raw_results.csv'),
    jsonPath: join(dir, 'summary.json'),
    reportPath: join(dir, 'report.md'),
  };

  await writeFile(paths.csvPath, renderRawCsv(input.results), 'utf-8');
  await writeFile(paths.jsonPath, renderSummaryJson(input), 'utf-8');
  await writeFile(paths.reportPath, renderMarkdownReport(input), 'utf-8');

  return paths;
}
