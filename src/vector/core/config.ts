/**
 * Configuration defaults for containers.
 */

import type {
  ContractMode,
  DynamicArrayConfig,
  ResolvedDynamicArrayConfig,
} from '../../types/vector.ts';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Readonly<{ contracts: ContractMode }> = Object.freeze({
  contracts: 'assert',
});

/**
 * Apply defaults to a container configuration.
 */
export function resolveConfig<T>(config: DynamicArrayConfig<T>): ResolvedDynamicArrayConfig<T> {
  return Object.freeze({
    traits: config.traits,
    contracts: config.contracts ?? DEFAULT_CONFIG.contracts,
  });
}
