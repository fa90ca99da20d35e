/**
 * services/experiments/sweepPlanner.ts
 *
 * Expands a base chain set over a grid of ribosome counts, target outputs
 * and chain markings. Each case carries the key the aggregation side
 * groups runs by, `(resourceUnits, excessFactor)`, and a step budget large
 * enough for every chain copy to finish translating.
 */

import type { ChainSet } from '../../types';
import { RUN_KEY_FACTOR_DIGITS } from '../../constants';
import { InvalidParametersError } from '../translation/errors';
import { chainLength } from '../translation/naming';

/**
 * 'aminoacids': targetOutput / initialMarking (substrate excess per chain copy)
 * 'chains':     initialMarking / targetOutput (chain copies per wanted protein)
 */
export type ExcessBasis = 'aminoacids' | 'chains';

export interface SweepGrid {
  resourceUnits: number[];
  targetOutputs?: number[];
  chainMarkings?: number[];
  /** Identical runs per grid point; stochastic engines need several. */
  repetitions?: number;
  excessBasis?: ExcessBasis;
}

export interface RunKey {
  resourceUnits: number;
  excessFactor: number;
}

export interface SweepCase {
  runId: string;
  key: RunKey;
  repetition: number;
  chainSet: ChainSet;
  stepBudget: number;
}

// Run ids and engine output names may append suffixes after the key.
const RUN_KEY_PATTERN = /^(\d+)_ribosomes_(\d+(?:\.\d+)?)_excess(?:_|$)/;

export function formatRunKey(key: RunKey): string {
  return `${key.resourceUnits}_ribosomes_${key.excessFactor.toFixed(RUN_KEY_FACTOR_DIGITS)}_excess`;
}

/** Reads the key back from a run key or run id; null when the text does not start with one. */
export function parseRunKey(text: string): RunKey | null {
  const match = RUN_KEY_PATTERN.exec(text);
  if (!match) return null;
  return { resourceUnits: Number(match[1]), excessFactor: Number(match[2]) };
}

export function computeExcessFactor(initialMarking: number, targetOutput: number, basis: ExcessBasis): number {
  const [numerator, denominator] = basis === 'aminoacids'
    ? [targetOutput, initialMarking]
    : [initialMarking, targetOutput];
  return denominator === 0 ? 0 : numerator / denominator;
}

/** Steps needed for `initialMarking` copies of the longest chain, plus one chain of slack. */
export function computeStepBudget(chainSet: ChainSet): number {
  const longest = Math.max(0, ...chainSet.chains.map((c) => chainLength(c.sequence)));
  return longest * (chainSet.parameters.initialMarkingPerChain + 1);
}

function checkGridValues(name: string, values: number[]): void {
  for (const v of values) {
    if (!Number.isSafeInteger(v) || v < 0) {
      throw new InvalidParametersError(`Sweep ${name} must be non-negative integers, got ${v}`, { field: name, value: v });
    }
  }
}

/**
 * Cartesian product of the grid over `base`, ordered by resource units,
 * then chain marking, then target output, then repetition. Axes left out
 * of the grid keep the base value.
 */
export function planSweep(base: ChainSet, grid: SweepGrid): SweepCase[] {
  const targetOutputs = grid.targetOutputs ?? [base.parameters.targetOutput];
  const chainMarkings = grid.chainMarkings ?? [base.parameters.initialMarkingPerChain];
  const repetitions = grid.repetitions ?? 1;
  const basis = grid.excessBasis ?? 'aminoacids';

  checkGridValues('resourceUnits', grid.resourceUnits);
  checkGridValues('targetOutputs', targetOutputs);
  checkGridValues('chainMarkings', chainMarkings);
  if (!Number.isSafeInteger(repetitions) || repetitions < 1) {
    throw new InvalidParametersError(`Sweep repetitions must be a positive integer, got ${repetitions}`);
  }

  const cases: SweepCase[] = [];
  for (const resourceUnits of grid.resourceUnits) {
    for (const initialMarkingPerChain of chainMarkings) {
      for (const targetOutput of targetOutputs) {
        const excessFactor = computeExcessFactor(initialMarkingPerChain, targetOutput, basis);
        const chainSet: ChainSet = {
          chains: base.chains,
          parameters: {
            ...base.parameters,
            initialMarkingPerChain,
            targetOutput,
            resourceParameters: { ...base.parameters.resourceParameters, initialUnits: resourceUnits },
          },
        };
        // A zero factor is not a valid informational ratio; leave it unset.
        if (excessFactor > 0) chainSet.parameters.excessFactor = excessFactor;
        else delete chainSet.parameters.excessFactor;

        const key = { resourceUnits, excessFactor };
        const stepBudget = computeStepBudget(chainSet);
        for (let repetition = 0; repetition < repetitions; repetition++) {
          cases.push({
            runId: `${formatRunKey(key)}_m${initialMarkingPerChain}_g${targetOutput}_r${repetition}`,
            key,
            repetition,
            chainSet,
            stepBudget,
          });
        }
      }
    }
  }
  return cases;
}
