/**
 * services/experiments/sweepRunner.ts
 *
 * Drives a planned sweep: compiles every case and hands the network to the
 * simulation engine. A case that fails to compile or simulate is logged and
 * recorded, and the rest of the sweep carries on. Cancellation is the
 * caller's: `checkCancelled` throws to stop everything.
 */

import type { EngineNetwork } from '../../types';
import { compileChainSet, type CompileChainSetOptions } from '../translation/compileChainSet';
import { toEngineNetwork } from '../translation/EngineExport';
import { InvalidParametersError } from '../translation/errors';
import type { RunKey, SweepCase } from './sweepPlanner';

export interface SimulationRun {
  runId: string;
  stepBudget: number;
}

/** The external engine: takes a network and a step budget, returns whatever it records. */
export interface SimulationEngine<R> {
  simulate(network: EngineNetwork, run: SimulationRun): Promise<R>;
}

export interface SweepProgress {
  completed: number;
  total: number;
  runId: string;
}

export interface SweepRunnerOptions {
  /** Cases in flight at once. */
  concurrency?: number;
  compile?: CompileChainSetOptions;
  checkCancelled?: () => void;
  onProgress?: (progress: SweepProgress) => void;
}

export interface SweepOutcome<R> {
  runId: string;
  key: RunKey;
  result: R;
  durationMs: number;
}

export interface SweepFailure {
  runId: string;
  key: RunKey;
  stage: 'compile' | 'simulate';
  error: Error;
}

export interface SweepSummary<R> {
  succeeded: SweepOutcome<R>[];
  failed: SweepFailure[];
}

const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

export async function runSweep<R>(
  cases: readonly SweepCase[],
  engine: SimulationEngine<R>,
  options: SweepRunnerOptions = {},
): Promise<SweepSummary<R>> {
  const requested = options.concurrency ?? 1;
  if (!Number.isFinite(requested)) {
    throw new InvalidParametersError(`Sweep concurrency must be a finite number, got ${requested}`);
  }
  const concurrency = Math.max(1, Math.floor(requested));
  const checkCancelled = options.checkCancelled ?? (() => {});
  const summary: SweepSummary<R> = { succeeded: [], failed: [] };

  let next = 0;
  let completed = 0;

  const runCase = async (sweepCase: SweepCase): Promise<void> => {
    const { runId, key, stepBudget } = sweepCase;

    let network: EngineNetwork;
    try {
      network = toEngineNetwork(compileChainSet(sweepCase.chainSet, options.compile));
    } catch (e) {
      const error = toError(e);
      console.warn(`[SweepRunner] Skipping ${runId}: compile failed: ${error.message}`);
      summary.failed.push({ runId, key, stage: 'compile', error });
      return;
    }

    const started = Date.now();
    try {
      const result = await engine.simulate(network, { runId, stepBudget });
      summary.succeeded.push({ runId, key, result, durationMs: Date.now() - started });
    } catch (e) {
      const error = toError(e);
      console.warn(`[SweepRunner] ${runId} failed in simulation: ${error.message}`);
      summary.failed.push({ runId, key, stage: 'simulate', error });
    }
  };

  const worker = async (): Promise<void> => {
    while (next < cases.length) {
      checkCancelled();
      const sweepCase = cases[next++];
      await runCase(sweepCase);
      completed++;
      options.onProgress?.({ completed, total: cases.length, runId: sweepCase.runId });
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, cases.length) }, () => worker()));

  if (summary.failed.length > 0) {
    console.warn(`[SweepRunner] ${summary.failed.length}/${cases.length} case(s) failed`);
  }
  return summary;
}
