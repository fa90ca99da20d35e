/**
 * Naming contract for compiled translation networks.
 *
 * Downstream consumers (the resource extension, the simulation engine's
 * per-step tables, sweep analysis) locate places and transitions by these
 * names only, so they must stay stable:
 *
 *   p_<chain>_<i>     copies of <chain> at position i (0 = untranslated supply)
 *   t_<chain>_t<i>    elongation step i, 1-based
 *   p_<product>       free product molecules
 */

import type { ChainSequence } from '../../types';

export function positionPlaceName(chainName: string, position: number): string {
  return `p_${chainName}_${position}`;
}

export function stepTransitionName(chainName: string, step: number): string {
  return `t_${chainName}_t${step}`;
}

export function productPlaceName(productName: string): string {
  return `p_${productName}`;
}

export function firstStepName(chainName: string): string {
  return stepTransitionName(chainName, 1);
}

export function lastStepName(chainName: string, sequence: ChainSequence): string {
  return stepTransitionName(chainName, chainLength(sequence));
}

/** Splits a sequence into its monomer symbols. */
export function monomersOf(sequence: ChainSequence): readonly string[] {
  return typeof sequence === 'string' ? Array.from(sequence) : sequence;
}

export function chainLength(sequence: ChainSequence): number {
  return monomersOf(sequence).length;
}

/** Position places of one chain, p_<chain>_0 .. p_<chain>_{L-1}. */
export function chainPlaceNames(chainName: string, sequence: ChainSequence): string[] {
  return Array.from({ length: chainLength(sequence) }, (_, i) => positionPlaceName(chainName, i));
}
