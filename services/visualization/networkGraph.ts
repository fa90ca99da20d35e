/**
 * Place/transition graph of a compiled network.
 *
 * Places and transitions become nodes of a bipartite graph; every arc
 * becomes a directed edge weighted by its arc weight (place -> transition
 * for consumption, transition -> place for production). The element list
 * feeds a viewer directly; the headless core answers structural questions.
 */

import cytoscape from 'cytoscape';
import type { Network } from '../../types';

export type NetworkNodeKind = 'place' | 'transition';

interface NetworkGraphOptions {
  /** Prefix node ids so place and transition names can never clash. Defaults to true. */
  prefixIds?: boolean;
}

export const placeNodeId = (name: string): string => `place:${name}`;
export const transitionNodeId = (name: string): string => `transition:${name}`;

export function buildNetworkElements(
  network: Network,
  options: NetworkGraphOptions = {},
): cytoscape.ElementDefinition[] {
  const prefix = options.prefixIds ?? true;
  const pid = prefix ? placeNodeId : (n: string) => n;
  const tid = prefix ? transitionNodeId : (n: string) => n;

  const elements: cytoscape.ElementDefinition[] = [];

  for (const place of Object.values(network.places)) {
    elements.push({
      group: 'nodes',
      data: { id: pid(place.name), label: place.name, kind: 'place', marking: place.initialMarking },
    });
  }

  for (const t of Object.values(network.transitions)) {
    elements.push({ group: 'nodes', data: { id: tid(t.name), label: t.name, kind: 'transition' } });

    for (const [place, weight] of Object.entries(t.consume)) {
      elements.push({
        group: 'edges',
        data: { id: `${pid(place)}->${tid(t.name)}`, source: pid(place), target: tid(t.name), weight, arc: 'consume' },
      });
    }
    for (const [place, weight] of Object.entries(t.produce)) {
      elements.push({
        group: 'edges',
        data: { id: `${tid(t.name)}->${pid(place)}`, source: tid(t.name), target: pid(place), weight, arc: 'produce' },
      });
    }
  }

  return elements;
}

/**
 * Headless Cytoscape core over the network. Callers own the instance and
 * should `destroy()` it when done.
 * Arcs to places missing from the network cannot be represented; run the
 * linter first if the network is not known to be consistent.
 */
export function createNetworkGraph(network: Network): cytoscape.Core {
  return cytoscape({ headless: true, styleEnabled: false, elements: buildNetworkElements(network) });
}

/** Names of the transitions with an arc to or from `placeName`. */
export function transitionsTouching(network: Network, placeName: string): string[] {
  const cy = createNetworkGraph(network);
  try {
    const node = cy.getElementById(placeNodeId(placeName));
    if (node.empty()) return [];
    return node
      .neighborhood()
      .nodes()
      .map((n) => String(n.data('label')))
      .sort();
  } finally {
    cy.destroy();
  }
}

/**
 * Places that can ever hold a token, ignoring counts: a place is markable
 * when it starts marked or some transition whose inputs are all markable
 * produces into it.
 */
export function findMarkablePlaces(network: Network): Set<string> {
  const cy = createNetworkGraph(network);
  try {
    const markable = new Set<string>(
      Object.values(network.places)
        .filter((p) => p.initialMarking > 0)
        .map((p) => p.name),
    );
    const fired = new Set<string>();

    let changed = true;
    while (changed) {
      changed = false;
      cy.nodes('[kind = "transition"]').forEach((t) => {
        if (fired.has(t.id())) return;
        const inputs = t.incomers('node');
        if (!inputs.every((p) => markable.has(String(p.data('label'))))) return;
        fired.add(t.id());
        t.outgoers('node').forEach((p) => {
          markable.add(String(p.data('label')));
        });
        changed = true;
      });
    }
    return markable;
  } finally {
    cy.destroy();
  }
}
