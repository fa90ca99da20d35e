/**
 * Network Linter - Structural checks for compiled translation networks
 *
 * Catches inconsistencies before a network is handed to the simulation
 * engine: dangling arcs, bad weights or markings, resource arcs in the
 * middle of a chain, and products that can never be made.
 */

import type { Chain, Network, ValidationSeverity } from '../types';
import { RESOURCE_PLACE_NAME, STANDARD_AMINO_ACIDS } from '../constants';
import { firstStepName, lastStepName, monomersOf, productPlaceName } from './translation/naming';
import { findMarkablePlaces, transitionsTouching } from './visualization/networkGraph';

// ============================================================================
// Types
// ============================================================================

export interface LintDiagnostic {
  severity: ValidationSeverity;
  code: string;
  message: string;
  suggestion?: string;
  location?: LintLocation;
}

export interface LintLocation {
  type: 'place' | 'transition' | 'chain' | 'network';
  name?: string;
}

export interface LintResult {
  diagnostics: LintDiagnostic[];
  summary: {
    errors: number;
    warnings: number;
    info: number;
  };
}

export interface NetworkLinterOptions {
  checkArcs?: boolean;
  checkMarkings?: boolean;
  checkResourceArcs?: boolean;
  checkReachability?: boolean;
  checkMonomers?: boolean;
  resourcePlaceName?: string;
}

const DEFAULT_OPTIONS: Required<NetworkLinterOptions> = {
  checkArcs: true,
  checkMarkings: true,
  checkResourceArcs: true,
  checkReachability: true,
  checkMonomers: true,
  resourcePlaceName: RESOURCE_PLACE_NAME,
};

const isPositiveInteger = (n: number) => Number.isSafeInteger(n) && n > 0;
const isNonNegativeInteger = (n: number) => Number.isSafeInteger(n) && n >= 0;

// ============================================================================
// Checks
// ============================================================================

function checkArcs(network: Network): LintDiagnostic[] {
  const diagnostics: LintDiagnostic[] = [];

  for (const t of Object.values(network.transitions)) {
    const arcs: Array<[string, number, 'consume' | 'produce']> = [
      ...Object.entries(t.consume).map(([p, w]): [string, number, 'consume'] => [p, w, 'consume']),
      ...Object.entries(t.produce).map(([p, w]): [string, number, 'produce'] => [p, w, 'produce']),
    ];

    for (const [place, weight, side] of arcs) {
      if (!Object.hasOwn(network.places, place)) {
        diagnostics.push({
          severity: 'error',
          code: 'DANGLING_ARC',
          message: `Transition '${t.name}' ${side === 'consume' ? 'consumes from' : 'produces into'} unknown place '${place}'`,
          location: { type: 'transition', name: t.name },
        });
      }
      if (!isPositiveInteger(weight)) {
        diagnostics.push({
          severity: 'error',
          code: 'NON_POSITIVE_WEIGHT',
          message: `Transition '${t.name}' has ${side} weight ${weight} on '${place}'`,
          suggestion: 'Arc weights must be positive integers',
          location: { type: 'transition', name: t.name },
        });
      }
    }
  }

  if (Object.keys(network.transitions).length === 0) {
    diagnostics.push({
      severity: 'warning',
      code: 'EMPTY_NETWORK',
      message: 'Network has no transitions',
      location: { type: 'network' },
    });
  }

  return diagnostics;
}

function checkMarkings(network: Network): LintDiagnostic[] {
  return Object.values(network.places)
    .filter((p) => !isNonNegativeInteger(p.initialMarking))
    .map((p) => ({
      severity: 'error' as const,
      code: 'INVALID_MARKING',
      message: `Place '${p.name}' has initial marking ${p.initialMarking}`,
      suggestion: 'Markings must be non-negative integers',
      location: { type: 'place' as const, name: p.name },
    }));
}

const hasDanglingArcs = (network: Network): boolean =>
  Object.values(network.transitions).some((t) =>
    [...Object.keys(t.consume), ...Object.keys(t.produce)].some((p) => !Object.hasOwn(network.places, p)),
  );

function checkResourceArcs(
  network: Network,
  chains: readonly Chain[],
  resourcePlace: string,
  graphSafe: boolean,
): LintDiagnostic[] {
  if (!Object.hasOwn(network.places, resourcePlace)) return [];
  const diagnostics: LintDiagnostic[] = [];

  const boundaries = new Set<string>();
  for (const chain of chains) {
    boundaries.add(firstStepName(chain.name));
    boundaries.add(lastStepName(chain.name, chain.sequence));
  }

  const touching = graphSafe ? transitionsTouching(network, resourcePlace) : [];
  for (const name of touching) {
    if (!boundaries.has(name)) {
      diagnostics.push({
        severity: 'error',
        code: 'RESOURCE_MID_CHAIN',
        message: `Transition '${name}' uses '${resourcePlace}' but is not the first or last step of a chain`,
        location: { type: 'transition', name },
      });
    }
  }

  for (const chain of chains) {
    const first = network.transitions[firstStepName(chain.name)];
    const last = network.transitions[lastStepName(chain.name, chain.sequence)];
    if (!first || !last) continue;

    const taken = first.consume[resourcePlace] ?? 0;
    const returned = last.produce[resourcePlace] ?? 0;
    if (taken !== returned) {
      diagnostics.push({
        severity: 'warning',
        code: 'RESOURCE_UNBALANCED',
        message: `Chain '${chain.name}' takes ${taken} and returns ${returned} unit(s) of '${resourcePlace}'`,
        suggestion: 'Apply the resource extension exactly once per chain set',
        location: { type: 'chain', name: chain.name },
      });
    }
  }

  return diagnostics;
}

function checkReachability(network: Network, chains: readonly Chain[] | undefined): LintDiagnostic[] {
  let targets: string[];
  if (chains) {
    targets = [...new Set(chains.map((c) => productPlaceName(c.productName)))];
  } else {
    // Without chain definitions, treat places nothing consumes as outputs.
    const consumed = new Set(Object.values(network.transitions).flatMap((t) => Object.keys(t.consume)));
    targets = Object.keys(network.places).filter((p) => !consumed.has(p));
  }

  const markable = findMarkablePlaces(network);
  return targets
    .filter((p) => Object.hasOwn(network.places, p) && !markable.has(p))
    .map((p) => ({
      severity: 'warning' as const,
      code: 'UNREACHABLE_PRODUCT',
      message: `Place '${p}' can never receive a token from the initial marking`,
      suggestion: 'Seed the chain supply (and the resource pool, if extended) with at least one token',
      location: { type: 'place' as const, name: p },
    }));
}

function checkMonomers(chains: readonly Chain[]): LintDiagnostic[] {
  const diagnostics: LintDiagnostic[] = [];
  for (const chain of chains) {
    const unknown = [...new Set(monomersOf(chain.sequence).filter((m) => !STANDARD_AMINO_ACIDS.has(m)))];
    if (unknown.length > 0) {
      diagnostics.push({
        severity: 'info',
        code: 'UNKNOWN_MONOMER',
        message: `Chain '${chain.name}' contains non-standard symbols: ${unknown.join(', ')}`,
        location: { type: 'chain', name: chain.name },
      });
    }
  }
  return diagnostics;
}

// ============================================================================
// Main Linter Function
// ============================================================================

/**
 * Lints a compiled network. Chain-specific checks (resource placement,
 * product reachability by product name, monomer alphabet) need `chains`.
 */
export function lintNetwork(
  network: Network,
  chains?: readonly Chain[],
  options: NetworkLinterOptions = {},
): LintResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const diagnostics: LintDiagnostic[] = [];

  if (opts.checkArcs) {
    diagnostics.push(...checkArcs(network));
  }

  if (opts.checkMarkings) {
    diagnostics.push(...checkMarkings(network));
  }

  // The graph cannot hold arcs to missing places; graph checks wait until every arc resolves.
  const dangling = hasDanglingArcs(network);

  if (opts.checkResourceArcs && chains) {
    diagnostics.push(...checkResourceArcs(network, chains, opts.resourcePlaceName, !dangling));
  }

  if (opts.checkReachability && !dangling) {
    diagnostics.push(...checkReachability(network, chains));
  }

  if (opts.checkMonomers && chains) {
    diagnostics.push(...checkMonomers(chains));
  }

  const summary = {
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
    info: diagnostics.filter((d) => d.severity === 'info').length,
  };

  return { diagnostics, summary };
}

export function formatLintResults(result: LintResult): string {
  const lines: string[] = [];

  const formatDiagnostic = (d: LintDiagnostic): string => {
    const loc = d.location?.name ? `[${d.location.type}: ${d.location.name}] ` : '';
    let line = `  ${d.code} ${loc}${d.message}`;
    if (d.suggestion) {
      line += `\n    → ${d.suggestion}`;
    }
    return line;
  };

  const sections: Array<[ValidationSeverity, string]> = [
    ['error', 'Errors'],
    ['warning', 'Warnings'],
    ['info', 'Info'],
  ];
  for (const [severity, title] of sections) {
    const group = result.diagnostics.filter((d) => d.severity === severity);
    if (group.length === 0) continue;
    lines.push(`${title} (${group.length}):`);
    group.forEach((d) => lines.push(formatDiagnostic(d)));
    lines.push('');
  }

  if (result.diagnostics.length === 0) {
    lines.push('No issues found');
  } else {
    lines.push(`Summary: ${result.summary.errors} errors, ${result.summary.warnings} warnings, ${result.summary.info} info`);
  }

  return lines.join('\n');
}
