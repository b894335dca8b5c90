import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@gitbench/core';
import type { BenchmarkConfig, ScriptConfig } from './types.js';

export const DEFAULT_MAIN_REF = 'origin/main';
export const DEFAULT_BINARY_NAME = 'git-ai';
export const DEFAULT_TIMEOUT_SECONDS = 900;
export const DEFAULT_SCRIPT_TIMEOUT_SECONDS = 14_400;

const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be a positive integer`);

const optionalPath = z
  .string()
  .min(1)
  .optional()
  .transform((value) => (value === undefined ? undefined : resolve(value)));

const commonSchema = z.object({
  workRoot: z.string().min(1).transform((value) => resolve(value)),
  repoRoot: z.string().min(1).default(() => process.cwd()).transform((value) => resolve(value)),
  currentBin: optionalPath,
  mainBin: optionalPath,
  mainRef: z.string().min(1).default(DEFAULT_MAIN_REF),
  binaryName: z
    .string()
    .regex(/^[A-Za-z0-9_.-]+$/, 'binaryName must be a plain file name')
    .default(DEFAULT_BINARY_NAME),
  keepArtifacts: z.boolean().default(false),
  marginPct: z.coerce
    .number({ invalid_type_error: 'marginPct must be a number' })
    .finite('marginPct must be finite')
    .nonnegative('marginPct must be non-negative')
    .default(25),
  marginBaseline: z.enum(['current_wrapper', 'main_wrapper']).default('current_wrapper'),
  enforceMargin: z.boolean().default(false),
  timeoutSeconds: positiveInt('timeout').default(DEFAULT_TIMEOUT_SECONDS),
  verbose: z.boolean().default(false),
});

const benchmarkSchema = commonSchema.extend({
  iterationsBasic: positiveInt('iterationsBasic').default(3),
  iterationsComplex: positiveInt('iterationsComplex').default(3),
  scenarios: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0)
    ),
});

const scriptSchema = commonSchema.extend({
  scriptPath: z.string().min(1).transform((value) => resolve(value)),
  scriptArgs: z.array(z.string()).default([]),
  repetitions: positiveInt('repetitions').default(3),
  scriptTimeoutSeconds: positiveInt('scriptTimeout').default(DEFAULT_SCRIPT_TIMEOUT_SECONDS),
  repoUrl: z.string().min(1).optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Validate raw CLI options for the in-process scenario matrix
 */
export function parseBenchmarkConfig(input: unknown): BenchmarkConfig {
  const { timeoutSeconds, currentBin, mainBin, ...rest } = parseWith(benchmarkSchema, input);
  return {
    ...rest,
    ...(currentBin !== undefined ? { currentBin } : {}),
    ...(mainBin !== undefined ? { mainBin } : {}),
    timeoutMs: timeoutSeconds * 1000,
  };
}

/**
 * Validate raw CLI options for the external-script family
 */
export function parseScriptConfig(input: unknown): ScriptConfig {
  const { timeoutSeconds, scriptTimeoutSeconds, currentBin, mainBin, repoUrl, ...rest } = parseWith(
    scriptSchema,
    input
  );
  return {
    ...rest,
    ...(currentBin !== undefined ? { currentBin } : {}),
    ...(mainBin !== undefined ? { mainBin } : {}),
    ...(repoUrl !== undefined ? { repoUrl } : {}),
    timeoutMs: timeoutSeconds * 1000,
    scriptTimeoutMs: scriptTimeoutSeconds * 1000,
  };
}
