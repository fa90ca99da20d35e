import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { planSweep, type SweepCase } from '../../services/experiments/sweepPlanner';
import { runSweep, type SimulationEngine, type SimulationRun } from '../../services/experiments/sweepRunner';
import { InvalidParametersError } from '../../services/translation/errors';
import type { ChainSet, EngineNetwork } from '../../types';

const base: ChainSet = {
    chains: [{ name: 'chainA', sequence: 'MKTWL', productName: 'proteinX' }],
    parameters: { initialMarkingPerChain: 2, targetOutput: 2, resourceParameters: { initialUnits: 1 } },
};

// Reports the seeded ribosome count, the way a real engine would report a column.
const ribosomeEngine = (): SimulationEngine<number> & { calls: SimulationRun[] } => {
    const calls: SimulationRun[] = [];
    return {
        calls,
        simulate: async (network: EngineNetwork, run: SimulationRun) => {
            calls.push(run);
            return network.places.p_free_ribosomes;
        },
    };
};

describe('runSweep', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('compiles each case and hands it to the engine', async () => {
        const cases = planSweep(base, { resourceUnits: [1, 3] });
        const engine = ribosomeEngine();

        const summary = await runSweep(cases, engine);

        expect(summary.failed).toEqual([]);
        expect(summary.succeeded.map((s) => s.result)).toEqual([1, 3]);
        expect(summary.succeeded.map((s) => s.key)).toEqual([
            { resourceUnits: 1, excessFactor: 1 },
            { resourceUnits: 3, excessFactor: 1 },
        ]);
        expect(engine.calls).toEqual([
            { runId: '1_ribosomes_1.00_excess_m2_g2_r0', stepBudget: 15 },
            { runId: '3_ribosomes_1.00_excess_m2_g2_r0', stepBudget: 15 },
        ]);
        expect(vi.mocked(console.warn)).not.toHaveBeenCalled();
    });

    it('records a simulation failure and carries on', async () => {
        const cases = planSweep(base, { resourceUnits: [1, 3, 5] });
        const engine: SimulationEngine<string> = {
            simulate: async (_network, run) => {
                if (run.runId.startsWith('3_')) throw new Error('engine crashed');
                return run.runId;
            },
        };

        const summary = await runSweep(cases, engine);

        expect(summary.succeeded.map((s) => s.result)).toEqual([
            '1_ribosomes_1.00_excess_m2_g2_r0',
            '5_ribosomes_1.00_excess_m2_g2_r0',
        ]);
        expect(summary.failed).toHaveLength(1);
        expect(summary.failed[0].stage).toBe('simulate');
        expect(summary.failed[0].error.message).toBe('engine crashed');
        expect(vi.mocked(console.warn)).toHaveBeenCalledWith('[SweepRunner] 3_ribosomes_1.00_excess_m2_g2_r0 failed in simulation: engine crashed');
    });

    it('records a compile failure without calling the engine', async () => {
        const bad: SweepCase = {
            runId: 'bad',
            key: { resourceUnits: 1, excessFactor: 0 },
            repetition: 0,
            chainSet: { ...base, parameters: { ...base.parameters, initialMarkingPerChain: -1 } },
            stepBudget: 0,
        };
        const engine = ribosomeEngine();

        const summary = await runSweep([bad], engine);

        expect(engine.calls).toEqual([]);
        expect(summary.failed).toHaveLength(1);
        expect(summary.failed[0].stage).toBe('compile');
        expect(summary.failed[0].error).toBeInstanceOf(InvalidParametersError);
    });

    it('wraps non-Error rejections', async () => {
        const engine: SimulationEngine<number> = {
            simulate: () => Promise.reject('out of memory'),
        };

        const summary = await runSweep(planSweep(base, { resourceUnits: [1] }), engine);

        expect(summary.failed[0].error).toBeInstanceOf(Error);
        expect(summary.failed[0].error.message).toBe('out of memory');
    });

    it('reports progress after every case', async () => {
        const onProgress = vi.fn();
        const cases = planSweep(base, { resourceUnits: [1, 2] });

        await runSweep(cases, ribosomeEngine(), { onProgress });

        expect(onProgress.mock.calls).toEqual([
            [{ completed: 1, total: 2, runId: '1_ribosomes_1.00_excess_m2_g2_r0' }],
            [{ completed: 2, total: 2, runId: '2_ribosomes_1.00_excess_m2_g2_r0' }],
        ]);
    });

    it('stops when cancelled', async () => {
        let checks = 0;
        const checkCancelled = () => {
            if (checks++ >= 1) throw new Error('cancelled');
        };
        const engine = ribosomeEngine();

        await expect(
            runSweep(planSweep(base, { resourceUnits: [1, 2, 3] }), engine, { checkCancelled }),
        ).rejects.toThrow('cancelled');
        expect(engine.calls).toHaveLength(1);
    });

    it('keeps at most `concurrency` cases in flight', async () => {
        let inFlight = 0;
        let peak = 0;
        const engine: SimulationEngine<null> = {
            simulate: async () => {
                inFlight++;
                peak = Math.max(peak, inFlight);
                await new Promise((resolve) => setTimeout(resolve, 5));
                inFlight--;
                return null;
            },
        };

        const summary = await runSweep(planSweep(base, { resourceUnits: [1, 2, 3, 4] }), engine, { concurrency: 2 });

        expect(summary.succeeded).toHaveLength(4);
        expect(peak).toBe(2);
    });

    it('rejects a concurrency that is not a finite number', async () => {
        const engine = ribosomeEngine();

        await expect(runSweep(planSweep(base, { resourceUnits: [1, 2] }), engine, { concurrency: NaN })).rejects.toThrow(
            InvalidParametersError,
        );
        expect(engine.calls).toEqual([]);
    });

    it('passes compile options through', async () => {
        const engine = ribosomeEngine();
        const summary = await runSweep(planSweep(base, { resourceUnits: [4] }), engine, {
            compile: { withResources: false },
        });

        expect(summary.succeeded[0].result).toBeUndefined();
    });
});
