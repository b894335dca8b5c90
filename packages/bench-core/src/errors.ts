export type BenchmarkErrorKind =
  | 'command'
  | 'timeout'
  | 'setup'
  | 'sandbox'
  | 'measurement'
  | 'aggregation'
  | 'build'
  | 'config'
  | 'interrupted';

/**
 * Base class for every fatal benchmark failure
 */
export class BenchmarkError extends Error {
  readonly kind: BenchmarkErrorKind;

  constructor(kind: BenchmarkErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export interface CommandFailure {
  cmd: string[];
  cwd: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

function describeFailure(headline: string, failure: CommandFailure): string {
  return [
    headline,
    `cmd: ${failure.cmd.join(' ')}`,
    `cwd: ${failure.cwd}`,
    `exit: ${failure.exitCode ?? 'none'}`,
    `stdout:\n${failure.stdout}`,
    `stderr:\n${failure.stderr}`,
  ].join('\n');
}

/**
 * A spawned command exited non-zero or could not be started
 */
export class CommandError extends BenchmarkError {
  readonly failure: CommandFailure;

  constructor(failure: CommandFailure, kind: 'command' | 'timeout' = 'command', headline = 'Command failed') {
    super(kind, describeFailure(headline, failure));
    this.failure = failure;
  }
}

/**
 * A spawned command exceeded its timeout and was killed
 */
export class CommandTimeoutError extends CommandError {
  readonly timeoutMs: number;

  constructor(failure: CommandFailure, timeoutMs: number) {
    super(failure, 'timeout', `Command timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class SetupError extends BenchmarkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('setup', message, options);
  }
}

export class SandboxError extends BenchmarkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('sandbox', message, options);
  }
}

export class MeasurementError extends BenchmarkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('measurement', message, options);
  }
}

export class AggregationError extends BenchmarkError {
  constructor(message: string) {
    super('aggregation', message);
  }
}

export class BuildError extends BenchmarkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('build', message, options);
  }
}

export class ConfigError extends BenchmarkError {
  constructor(message: string) {
    super('config', message);
  }
}

export class BenchmarkInterruptedError extends BenchmarkError {
  constructor(message = 'Benchmark interrupted', options?: { cause?: unknown }) {
    super('interrupted', message, options);
  }
}

/**
 * Wrap a failure from a scenario phase, keeping the command details in the
 * message so nothing is lost when only the message is printed. Once `signal`
 * has fired, any failure is reported as the interrupt: a terminal Ctrl-C also
 * reaches the child process, which then dies mid-command.
 */
export function wrapPhaseError(
  err: unknown,
  create: (message: string, options: { cause: unknown }) => BenchmarkError,
  context: string,
  signal?: AbortSignal
): BenchmarkError {
  if (err instanceof BenchmarkError && err.kind === 'interrupted') {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  if (signal?.aborted) {
    return new BenchmarkInterruptedError(`Benchmark interrupted during: ${context}`, { cause: err });
  }
  return create(`${context}\n${detail}`, { cause: err });
}
