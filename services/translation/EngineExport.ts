import type { EngineNetwork, Network } from '../../types';

/**
 * Converts a compiled network to the form the simulation engine takes:
 * place name -> initial marking, transition name -> arcs.
 * Arc maps are copied so the engine can never write back into the network.
 */
export function toEngineNetwork(network: Network): EngineNetwork {
  const places: EngineNetwork['places'] = {};
  for (const place of Object.values(network.places)) {
    places[place.name] = place.initialMarking;
  }

  const transitions: EngineNetwork['transitions'] = {};
  for (const t of Object.values(network.transitions)) {
    transitions[t.name] = { consume: { ...t.consume }, produce: { ...t.produce } };
  }

  return { places, transitions };
}

/** Column names of the engine's per-step marking table, in place order. */
export function networkColumns(network: Network): string[] {
  return Object.keys(network.places);
}
