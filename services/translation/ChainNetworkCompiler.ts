/**
 * services/translation/ChainNetworkCompiler.ts
 *
 * Compiles chain definitions into the base translation network: one place
 * per chain position, one shared place per product, and one elongation
 * transition per monomer. The resource pool is added separately by
 * ResourceExtension.
 */

import type { Chain, Network, Place, SimulationParameters, Transition } from '../../types';
import { InvalidChainError, InvalidParametersError } from './errors';
import { chainLength, positionPlaceName, productPlaceName, stepTransitionName } from './naming';

const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;

/**
 * Checks the parameters the compiler and its callers rely on.
 * Resource parameters are checked by the extension, not here.
 */
function validateSimulationParameters(params: SimulationParameters): void {
  if (!isNonNegativeInteger(params.initialMarkingPerChain)) {
    throw new InvalidParametersError(
      `initial chain marking must be a non-negative integer, got ${params.initialMarkingPerChain}`,
      { field: 'initialMarkingPerChain', value: params.initialMarkingPerChain },
    );
  }
  if (!isNonNegativeInteger(params.targetOutput)) {
    throw new InvalidParametersError(
      `target output must be a non-negative integer, got ${params.targetOutput}`,
      { field: 'targetOutput', value: params.targetOutput },
    );
  }
  if (params.excessFactor !== undefined) {
    const f = params.excessFactor;
    if (typeof f !== 'number' || !Number.isFinite(f) || f <= 0) {
      throw new InvalidParametersError(`excess factor must be a positive number, got ${f}`, {
        field: 'excessFactor',
        value: f,
      });
    }
  }
}

function validateChains(chains: readonly Chain[]): void {
  const seen = new Set<string>();
  chains.forEach((chain, index) => {
    if (typeof chain.name !== 'string' || chain.name.trim() === '') {
      throw new InvalidChainError(`Chain at index ${index} has a blank name`, { index });
    }
    if (seen.has(chain.name)) {
      throw new InvalidChainError(`Duplicate chain name "${chain.name}"`, { chain: chain.name });
    }
    seen.add(chain.name);

    if (typeof chain.productName !== 'string' || chain.productName.trim() === '') {
      throw new InvalidChainError(`Chain "${chain.name}" has a blank product name`, { chain: chain.name });
    }
    if (chainLength(chain.sequence) === 0) {
      throw new InvalidChainError(`Chain "${chain.name}" has an empty sequence`, { chain: chain.name });
    }
  });
}

/**
 * Builds the base network for `chains`.
 *
 * For a chain of length L the network gets places p_<c>_0 .. p_<c>_{L-1},
 * transitions t_<c>_t1 .. t_<c>_tL, and the terminal transition feeds the
 * product place. Chains with the same product share one product place.
 *
 * @throws InvalidChainError | InvalidParametersError
 */
export function compileChainNetwork(chains: readonly Chain[], params: SimulationParameters): Network {
  validateSimulationParameters(params);
  validateChains(chains);

  const places: Record<string, Place> = {};
  const transitions: Record<string, Transition> = {};
  const productPlaces = new Set<string>();

  const addPlace = (name: string, initialMarking: number, owner: string) => {
    if (Object.hasOwn(places, name)) {
      throw new InvalidChainError(`Place name "${name}" generated for ${owner} is already in use`, {
        place: name,
      });
    }
    places[name] = { name, initialMarking };
  };

  // Products first: a chain position named like a product must collide, not merge.
  for (const chain of chains) {
    const name = productPlaceName(chain.productName);
    if (productPlaces.has(name)) continue;
    addPlace(name, 0, `product "${chain.productName}"`);
    productPlaces.add(name);
  }

  for (const chain of chains) {
    const length = chainLength(chain.sequence);
    const owner = `chain "${chain.name}"`;

    for (let position = 0; position < length; position++) {
      addPlace(
        positionPlaceName(chain.name, position),
        position === 0 ? params.initialMarkingPerChain : 0,
        owner,
      );
    }

    for (let step = 1; step <= length; step++) {
      const name = stepTransitionName(chain.name, step);
      const target = step === length
        ? productPlaceName(chain.productName)
        : positionPlaceName(chain.name, step);
      transitions[name] = {
        name,
        consume: { [positionPlaceName(chain.name, step - 1)]: 1 },
        produce: { [target]: 1 },
      };
    }
  }

  return { places, transitions };
}
