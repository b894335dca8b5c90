import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { RunResult } from '@gitbench/core';
import { analyzeSamples } from '../pipeline.js';
import { renderMarkdownReport, renderRawCsv, renderSummaryJson, writeArtifacts } from '../report.js';
import type { ReportInput } from '../report.js';
import { VARIANT_KEYS, reportContext, sampleSet } from './samples.js';

function reportInput(): ReportInput {
  const samples = sampleSet();
  return {
    ...reportContext(),
    scenarios: samples.scenarios,
    results: samples.results,
    analysis: analyzeSamples(samples, {
      variantKeys: VARIANT_KEYS,
      marginBaseline: 'current_wrapper',
      marginPct: 25,
      enforce: true,
    }),
    marginPct: 25,
    marginBaseline: 'current_wrapper',
  };
}

describe('renderRawCsv', () => {
  it('writes one row per sample in collection order', () => {
    const lines = renderRawCsv(sampleSet().results).split('\n');

    expect(lines[0]).toBe('scenario,complexity,variant,run_index,duration_ms');
    expect(lines[1]).toBe('s1,basic,main_wrapper,1,10.000');
    expect(lines[4]).toBe('s1,basic,current_wrapper,2,12.000');
    expect(lines[9]).toBe('s2,complex,main_wrapper,1,0.000');
    expect(lines).toHaveLength(14);
    expect(lines[13]).toBe('');
  });

  it('adds the script counters when samples carry details and quotes odd fields', () => {
    const results: RunResult[] = [
      {
        scenario: 'merge,squash',
        complexity: 'complex',
        variant: 'current_hooks',
        repetition: 1,
        durationMs: 1234.5,
        details: { status: 'ok', savedLogs: 7, headNote: 'note "a"' },
      },
      { scenario: 'plain', complexity: 'basic', variant: 'main_wrapper', repetition: 1, durationMs: 1 },
    ];

    expect(renderRawCsv(results)).toBe(
      'scenario,complexity,variant,run_index,duration_ms,status,saved_logs,head_note\n' +
        '"merge,squash",complex,current_hooks,1,1234.500,ok,7,"note ""a"""\n' +
        'plain,basic,main_wrapper,1,1.000,,,\n'
    );
  });
});

describe('renderSummaryJson', () => {
  it('serializes metadata, statistics and the gate', () => {
    const doc = JSON.parse(renderSummaryJson(reportInput()));

    expect(doc.metadata).toMatchObject({
      timestamp_utc: '2026-01-19T13:45:01Z',
      real_git: '/usr/bin/git',
      iterations_basic: 2,
      iterations_complex: 1,
      margin_pct: 25,
      margin_baseline: 'current_wrapper',
    });
    expect(doc.metadata.variants).toEqual({
      main_wrapper: '/bin/main-tool',
      current_wrapper: '/bin/current-tool',
      current_hooks: '/bin/current-tool',
      current_both: '/bin/current-tool',
    });
    expect(doc.summary.s1.current_hooks).toEqual({
      runs_ms: [11, 13],
      median_ms: 12,
      mean_ms: 12,
      min_ms: 11,
      max_ms: 13,
      stdev_ms: 1,
    });
    expect(doc.slowdowns_baseline).toBe('main_wrapper');
    expect(doc.slowdowns_pct).toEqual({ s1: { current_wrapper: 10, current_hooks: 20, current_both: 50 } });
    expect(doc.aggregate[1]).toEqual({ variant: 'current_hooks', ratio: 1.2, slowdown_pct: 20, scenario_count: 1 });
    expect(doc.margin_checks[1]).toEqual({
      scenario: 's1',
      variant: 'current_both',
      baseline_ms: 11,
      median_ms: 15,
      allowed_ms: 13.75,
      slowdown_pct: 36.364,
      passed: false,
    });
    expect(doc.gate).toEqual({ passed: false, enforced: true, total: 4, failed: 2, exit_code: 2 });
  });
});

describe('renderMarkdownReport', () => {
  const lines = () => renderMarkdownReport(reportInput()).split('\n');

  it('lists metadata and settings', () => {
    const md = lines();
    expect(md[0]).toBe('# git-ai Mode Benchmark Report');
    expect(md).toContain('- Branch: `feature/speed`');
    expect(md).toContain('- iterations_basic: `2`');
    expect(md).toContain('- `current_both`: current(wrapper+hooks) (`/bin/current-tool`)');
  });

  it('renders timings and medians, with n/a where no slowdown exists', () => {
    const md = lines();
    expect(md).toContain('| s1 | 10.000, 10.000 | 10.000, 12.000 | 11.000, 13.000 | 14.000, 16.000 |');
    expect(md).toContain('## Median Summary (ms) and Slowdown vs main(wrapper)');
    expect(md).toContain(
      '| Scenario | main(wrapper) | current(wrapper) | current(hooks) | current(wrapper+hooks) | ' +
        'current_wrapper Δ% | current_hooks Δ% | current_both Δ% |'
    );
    expect(md).toContain('| s1 | 10.000 | 11.000 | 12.000 | 15.000 | 10.000% | 20.000% | 50.000% |');
    expect(md).toContain('| s2 | 0.000 | 20.000 | 22.000 | 30.000 | n/a | n/a | n/a |');
  });

  it('renders the aggregate comparison', () => {
    const md = lines();
    expect(md).toContain('| Variant | Geometric Mean Ratio vs main(wrapper) | Geometric Mean Slowdown | Scenarios |');
    expect(md).toContain('| current_both | 1.5000x | 50.000% | 1 |');
  });

  it('renders the margin table sorted by scenario and variant', () => {
    const md = lines();
    const start = md.indexOf('## Margin Check');
    expect(md.slice(start + 2, start + 4)).toEqual([
      '- Required margin: checked modes must be <= `25.0%` slower than `current wrapper`',
      '- Enforcement: enabled',
    ]);
    const tableStart = md.indexOf('|---|---|---:|---:|---:|---:|---|');
    expect(md.slice(tableStart + 1, tableStart + 5)).toEqual([
      '| s1 | current_both | 11.000 | 15.000 | 13.750 | 36.364% | FAIL |',
      '| s1 | current_hooks | 11.000 | 12.000 | 13.750 | 9.091% | PASS |',
      '| s2 | current_both | 20.000 | 30.000 | 25.000 | 50.000% | FAIL |',
      '| s2 | current_hooks | 20.000 | 22.000 | 25.000 | 10.000% | PASS |',
    ]);
    expect(md).toContain('- Overall: `2/4` checks passing');
  });

  it('ends with the re-run command', () => {
    expect(lines().slice(-6, -1)).toEqual([
      '## Re-run',
      '',
      '```bash',
      'npm run bench -- run --iterations-basic 2',
      '```',
    ]);
  });
});

describe('writeArtifacts', () => {
  let workRoot: string;

  beforeEach(async () => {
    workRoot = await mkdtemp(join(os.tmpdir(), 'bench-report-'));
  });

  afterEach(async () => {
    await rm(workRoot, { recursive: true, force: true });
  });

  it('writes the three artifacts into a stamped directory', async () => {
    const input = reportInput();
    const paths = await writeArtifacts(workRoot, input, new Date(2026, 0, 19, 13, 45, 1));

    expect(paths.dir).toBe(join(workRoot, 'artifacts', '20260119-134501'));
    expect(paths.csvPath).toBe(join(paths.dir, 'raw_results.csv'));
    expect(await readFile(paths.csvPath, 'utf-8')).toBe(renderRawCsv(input.results));
    expect(await readFile(paths.jsonPath, 'utf-8')).toBe(renderSummaryJson(input));
    expect(await readFile(paths.reportPath, 'utf-8')).toBe(renderMarkdownReport(input));
  });
});
