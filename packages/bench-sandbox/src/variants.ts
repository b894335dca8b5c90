import { ConfigError, VARIANT_MODES } from '@gitbench/core';
import type { Variant, VariantMode } from '@gitbench/core';

/**
 * Create an immutable variant descriptor
 */
export function createVariant(key: string, label: string, binary: string, mode: VariantMode): Variant {
  if (!/^[A-Za-z0-9_.-]+$/.test(key)) {
    throw new ConfigError(`Invalid variant key: ${JSON.stringify(key)}`);
  }
  if (!VARIANT_MODES.includes(mode)) {
    throw new ConfigError(`Unknown variant mode: ${mode}`);
  }
  return Object.freeze({ key, label, binary, mode });
}

export interface ModeVariantBinaries {
  /** Binary built from the baseline ref, only compared in wrapper mode */
  baselineBinary: string;
  /** Binary under test, compared in every mode */
  currentBinary: string;
}

/**
 * The standard comparison matrix: baseline wrapper against the current
 * binary as wrapper, as hooks, and as both
 */
export function createModeVariants(binaries: ModeVariantBinaries): Variant[] {
  return [
    createVariant('main_wrapper', 'main(wrapper)', binaries.baselineBinary, 'wrapper'),
    createVariant('current_wrapper', 'current(wrapper)', binaries.currentBinary, 'wrapper'),
    createVariant('current_hooks', 'current(hooks)', binaries.currentBinary, 'hooks'),
    createVariant('current_both', 'current(wrapper+hooks)', binaries.currentBinary, 'both'),
  ];
}

export function installsHooks(mode: VariantMode): boolean {
  return mode === 'hooks' || mode === 'both';
}

export function installsWrapper(mode: VariantMode): boolean {
  return mode === 'wrapper' || mode === 'both';
}
