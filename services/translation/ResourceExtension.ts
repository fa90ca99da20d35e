/**
 * services/translation/ResourceExtension.ts
 *
 * Couples compiled chains through one shared pool of translation machines.
 * Each chain's first step takes a unit from the pool and its last step
 * returns it; steps in between never touch the pool.
 */

import type { ArcWeights, Chain, Network, ResourceParameters, Transition } from '../../types';
import { RESOURCE_PLACE_NAME } from '../../constants';
import { InvalidResourceError, MissingTransitionError } from './errors';
import { chainPlaceNames, firstStepName, lastStepName, productPlaceName } from './naming';

export interface ResourceExtensionOptions {
  /** Units seeded when the call carries no resource parameters. */
  defaultInitialUnits?: number;
}

const addWeight = (weights: ArcWeights, place: string, amount: number): ArcWeights => ({
  ...weights,
  [place]: (weights[place] ?? 0) + amount,
});

function resolveResourceParameters(
  resourceParams: ResourceParameters | undefined,
  options: ResourceExtensionOptions,
): { initialUnits: number; placeName: string } {
  const initialUnits = resourceParams?.initialUnits ?? options.defaultInitialUnits;
  if (initialUnits === undefined) {
    throw new InvalidResourceError(
      'No resource units given and no default configured; pass initialUnits or defaultInitialUnits',
    );
  }
  if (!Number.isSafeInteger(initialUnits) || initialUnits < 0) {
    throw new InvalidResourceError(`initial resource units must be a non-negative integer, got ${initialUnits}`, {
      initialUnits,
    });
  }

  const placeName = resourceParams?.placeName ?? RESOURCE_PLACE_NAME;
  if (placeName.trim() === '') {
    throw new InvalidResourceError('Resource place name is blank');
  }
  return { initialUnits, placeName };
}

/**
 * Returns a copy of `network` with the resource pool added.
 *
 * The input is not modified. Only the first and last transition of each
 * chain are replaced; every other transition is carried over as-is.
 * Applying this twice is additive: the pool arcs get weight 2.
 *
 * @throws MissingTransitionError when a chain's first or last step is absent
 * @throws InvalidResourceError for negative, missing or clashing resource settings, or when the
 *   resource place already exists and a transition outside the given chains' boundaries uses it
 */
export function extendWithResources(
  network: Network,
  chains: readonly Chain[],
  resourceParams?: ResourceParameters,
  options: ResourceExtensionOptions = {},
): Network {
  const { initialUnits, placeName } = resolveResourceParameters(resourceParams, options);

  // Locate everything before touching anything.
  const targets = chains.map((chain) => {
    const first = firstStepName(chain.name);
    const last = lastStepName(chain.name, chain.sequence);
    if (!Object.hasOwn(network.transitions, first)) throw new MissingTransitionError(first, chain.name);
    if (!Object.hasOwn(network.transitions, last)) throw new MissingTransitionError(last, chain.name);
    return { first, last };
  });

  for (const chain of chains) {
    if (placeName === productPlaceName(chain.productName) || chainPlaceNames(chain.name, chain.sequence).includes(placeName)) {
      throw new InvalidResourceError(`Resource place "${placeName}" clashes with a place of chain "${chain.name}"`, {
        placeName,
        chain: chain.name,
      });
    }
  }

  if (Object.hasOwn(network.places, placeName)) {
    // An existing place may only be a pool already wired to these chains' boundary steps.
    const boundaries = new Set(targets.flatMap(({ first, last }) => [first, last]));
    const foreign = Object.entries(network.transitions).find(
      ([name, t]) => !boundaries.has(name) && (Object.hasOwn(t.consume, placeName) || Object.hasOwn(t.produce, placeName)),
    );
    if (foreign) {
      throw new InvalidResourceError(
        `Resource place "${placeName}" already exists and is used by transition "${foreign[0]}"`,
        { placeName, transition: foreign[0] },
      );
    }
    console.warn(
      `[ResourceExtension] "${placeName}" already present; re-seeding with ${initialUnits} units and adding arcs on top of existing ones`,
    );
  }

  const transitions: Record<string, Transition> = { ...network.transitions };
  for (const { first, last } of targets) {
    const start = transitions[first];
    transitions[first] = { ...start, consume: addWeight(start.consume, placeName, 1) };
    const end = transitions[last];
    transitions[last] = { ...end, produce: addWeight(end.produce, placeName, 1) };
  }

  return {
    places: { ...network.places, [placeName]: { name: placeName, initialMarking: initialUnits } },
    transitions,
  };
}
