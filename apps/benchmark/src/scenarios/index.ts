import { ConfigError } from '@gitbench/core';
import type { Scenario } from '../types.js';
import { BASIC_SCENARIOS } from './basic.js';
import { COMPLEX_SCENARIOS } from './complex.js';

export const SCENARIOS: readonly Scenario[] = [...BASIC_SCENARIOS, ...COMPLEX_SCENARIOS];

/**
 * Registry entries for the given keys, in registry order. No keys selects
 * every scenario.
 */
export function selectScenarios(keys: readonly string[] = []): Scenario[] {
  if (keys.length === 0) {
    return [...SCENARIOS];
  }

  const known = new Set(SCENARIOS.map((s) => s.key));
  const unknown = keys.filter((key) => !known.has(key));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown scenario(s): ${unknown.join(', ')} (available: ${[...known].join(', ')})`
    );
  }

  const wanted = new Set(keys);
  return SCENARIOS.filter((s) => wanted.has(s.key));
}

export { BASIC_SCENARIOS, COMPLEX_SCENARIOS };
export * from './seed.js';
