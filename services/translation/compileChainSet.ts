import type { ChainSet, Network } from '../../types';
import { compileChainNetwork } from './ChainNetworkCompiler';
import { extendWithResources, type ResourceExtensionOptions } from './ResourceExtension';

export interface CompileChainSetOptions extends ResourceExtensionOptions {
  /**
   * Force the resource pool on or off. When unset the pool is added only if
   * the chain set carries resource parameters.
   */
  withResources?: boolean;
}

/** compile, then extend when resources are requested */
export function compileChainSet(chainSet: ChainSet, options: CompileChainSetOptions = {}): Network {
  const { chains, parameters } = chainSet;
  const base = compileChainNetwork(chains, parameters);

  const withResources = options.withResources ?? parameters.resourceParameters !== undefined;
  if (!withResources) return base;

  return extendWithResources(base, chains, parameters.resourceParameters, {
    defaultInitialUnits: options.defaultInitialUnits,
  });
}
