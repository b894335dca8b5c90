import { describe, expect, it } from 'vitest';
import { BenchmarkInterruptedError, MeasurementError, wrapPhaseError } from '../errors.js';

const measurement = (message: string, options: { cause: unknown }) => new MeasurementError(message, options);

describe('wrapPhaseError', () => {
  it('prefixes the phase context to the failure', () => {
    const cause = new Error('rebase exploded');
    const wrapped = wrapPhaseError(cause, measurement, 'Measurement failed: scenario=a variant=b run=1');

    expect(wrapped).toBeInstanceOf(MeasurementError);
    expect(wrapped.message).toBe('Measurement failed: scenario=a variant=b run=1\nrebase exploded');
    expect(wrapped.cause).toBe(cause);
  });

  it('reports a failure after an abort as the interrupt', () => {
    const controller = new AbortController();
    controller.abort();
    const cause = new Error('killed by signal');

    const wrapped = wrapPhaseError(cause, measurement, 'Measurement failed: run=2', controller.signal);

    expect(wrapped).toBeInstanceOf(BenchmarkInterruptedError);
    expect(wrapped.kind).toBe('interrupted');
    expect(wrapped.message).toBe('Benchmark interrupted during: Measurement failed: run=2');
    expect(wrapped.cause).toBe(cause);
  });

  it('passes an interrupt through unchanged', () => {
    const interrupt = new BenchmarkInterruptedError();

    expect(wrapPhaseError(interrupt, measurement, 'Setup failed')).toBe(interrupt);
  });
});
