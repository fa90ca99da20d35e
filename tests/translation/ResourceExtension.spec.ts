import { describe, it, expect, vi, afterEach } from 'vitest';
import { compileChainNetwork } from '../../services/translation/ChainNetworkCompiler';
import { extendWithResources } from '../../services/translation/ResourceExtension';
import { InvalidResourceError, MissingTransitionError } from '../../services/translation/errors';
import { DEFAULT_INITIAL_RIBOSOMES, RESOURCE_PLACE_NAME } from '../../constants';
import type { Chain, Network } from '../../types';

const chainA: Chain = { name: 'chainA', sequence: 'MKTWL', productName: 'proteinX' };
const chainB: Chain = { name: 'chainB', sequence: 'MGS', productName: 'proteinY' };

const compile = (chains: Chain[], marking = 2): Network =>
    compileChainNetwork(chains, { initialMarkingPerChain: marking, targetOutput: 2 });

describe('extendWithResources', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('adds the free ribosome pool seeded with the given units', () => {
        const extended = extendWithResources(compile([chainA]), [chainA], { initialUnits: 3 });

        expect(extended.places.p_free_ribosomes).toEqual({ name: 'p_free_ribosomes', initialMarking: 3 });
        expect(Object.keys(extended.places)).toHaveLength(6 + 1);
        expect(RESOURCE_PLACE_NAME).toBe('p_free_ribosomes');
    });

    it('makes the first step take a ribosome and the last step return it', () => {
        const extended = extendWithResources(compile([chainA]), [chainA], { initialUnits: 3 });

        expect(extended.transitions.t_chainA_t1.consume).toEqual({ p_chainA_0: 1, p_free_ribosomes: 1 });
        expect(extended.transitions.t_chainA_t1.produce).toEqual({ p_chainA_1: 1 });
        expect(extended.transitions.t_chainA_t5.consume).toEqual({ p_chainA_4: 1 });
        expect(extended.transitions.t_chainA_t5.produce).toEqual({ p_proteinX: 1, p_free_ribosomes: 1 });
    });

    it('leaves the intermediate steps untouched', () => {
        const base = compile([chainA]);
        const extended = extendWithResources(base, [chainA], { initialUnits: 3 });

        for (const name of ['t_chainA_t2', 't_chainA_t3', 't_chainA_t4']) {
            expect(extended.transitions[name]).toBe(base.transitions[name]);
        }
        expect(Object.keys(extended.transitions)).toEqual(Object.keys(base.transitions));
    });

    it('changes exactly two transitions per chain', () => {
        const base = compile([chainA, chainB]);
        const extended = extendWithResources(base, [chainA, chainB], { initialUnits: 1 });

        const changed = Object.keys(base.transitions).filter(
            (name) => JSON.stringify(base.transitions[name]) !== JSON.stringify(extended.transitions[name]),
        );
        expect(changed).toEqual(['t_chainA_t1', 't_chainA_t5', 't_chainB_t1', 't_chainB_t3']);
        expect(Object.keys(extended.places).length - Object.keys(base.places).length).toBe(1);
    });

    it('does not modify the input network', () => {
        const base = compile([chainA]);
        const before = JSON.stringify(base);

        extendWithResources(base, [chainA], { initialUnits: 3 });

        expect(JSON.stringify(base)).toBe(before);
    });

    it('puts both arcs on the only step of a one-monomer chain', () => {
        const solo: Chain = { name: 'solo', sequence: 'M', productName: 'tiny' };
        const extended = extendWithResources(compile([solo]), [solo], { initialUnits: 1 });

        expect(extended.transitions.t_solo_t1).toEqual({
            name: 't_solo_t1',
            consume: { p_solo_0: 1, p_free_ribosomes: 1 },
            produce: { p_tiny: 1, p_free_ribosomes: 1 },
        });
    });

    it('adds weights on re-application instead of overwriting', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const once = extendWithResources(compile([chainA]), [chainA], { initialUnits: 3 });
        const twice = extendWithResources(once, [chainA], { initialUnits: 5 });

        expect(twice.transitions.t_chainA_t1.consume.p_free_ribosomes).toBe(2);
        expect(twice.transitions.t_chainA_t5.produce.p_free_ribosomes).toBe(2);
        expect(twice.places.p_free_ribosomes.initialMarking).toBe(5);
        expect(Object.keys(twice.places)).toEqual(Object.keys(once.places));
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('honours a custom resource place name', () => {
        const extended = extendWithResources(compile([chainA]), [chainA], { initialUnits: 4, placeName: 'p_pool' });

        expect(extended.places.p_pool.initialMarking).toBe(4);
        expect(extended.transitions.t_chainA_t1.consume).toEqual({ p_chainA_0: 1, p_pool: 1 });
        expect(extended.places.p_free_ribosomes).toBeUndefined();
    });

    describe('resource defaults', () => {
        it('uses the configured default when no parameters are given', () => {
            const extended = extendWithResources(compile([chainA]), [chainA], undefined, {
                defaultInitialUnits: DEFAULT_INITIAL_RIBOSOMES,
            });
            expect(extended.places.p_free_ribosomes.initialMarking).toBe(50);
        });

        it('prefers explicit units over the default', () => {
            const extended = extendWithResources(compile([chainA]), [chainA], { initialUnits: 0 }, {
                defaultInitialUnits: 9,
            });
            expect(extended.places.p_free_ribosomes.initialMarking).toBe(0);
        });

        it('fails when there are neither parameters nor a default', () => {
            expect(() => extendWithResources(compile([chainA]), [chainA])).toThrow(InvalidResourceError);
        });
    });

    describe('invalid input', () => {
        it('rejects negative units', () => {
            expect(() => extendWithResources(compile([chainA]), [chainA], { initialUnits: -1 })).toThrow(
                InvalidResourceError,
            );
        });

        it('rejects fractional units', () => {
            expect(() => extendWithResources(compile([chainA]), [chainA], { initialUnits: 2.5 })).toThrow(
                InvalidResourceError,
            );
        });

        it('rejects a resource place name owned by a chain', () => {
            const base = compile([chainA]);
            expect(() => extendWithResources(base, [chainA], { initialUnits: 1, placeName: 'p_chainA_2' })).toThrow(
                InvalidResourceError,
            );
            expect(() => extendWithResources(base, [chainA], { initialUnits: 1, placeName: 'p_proteinX' })).toThrow(
                InvalidResourceError,
            );
        });

        it('rejects an existing place that another chain produces into', () => {
            const a: Chain = { name: 'a', sequence: 'MK', productName: 'P' };
            const b: Chain = { name: 'b', sequence: 'MG', productName: 'free_ribosomes' };
            const base = compile([a, b]);
            const before = JSON.stringify(base);

            try {
                extendWithResources(base, [a], { initialUnits: 7 });
                expect.unreachable();
            } catch (e) {
                expect(e).toBeInstanceOf(InvalidResourceError);
                if (e instanceof InvalidResourceError) {
                    expect(e.message).toBe('Resource place "p_free_ribosomes" already exists and is used by transition "t_b_t2"');
                }
            }
            expect(JSON.stringify(base)).toBe(before);
        });

        it('fails with MissingTransitionError for a chain the network does not contain', () => {
            const ghost: Chain = { name: 'ghost', sequence: 'MK', productName: 'proteinX' };

            expect(() => extendWithResources(compile([chainA]), [ghost], { initialUnits: 1 })).toThrow(
                MissingTransitionError,
            );
        });

        it('names the missing last step when the chain length does not match', () => {
            const longer: Chain = { ...chainA, sequence: 'MKTWLV' };

            try {
                extendWithResources(compile([chainA]), [longer], { initialUnits: 1 });
                expect.unreachable();
            } catch (e) {
                expect(e).toBeInstanceOf(MissingTransitionError);
                if (e instanceof MissingTransitionError) {
                    expect(e.transitionName).toBe('t_chainA_t6');
                    expect(e.code).toBe('MISSING_TRANSITION');
                }
            }
        });

        it('changes nothing when one of several chains is missing', () => {
            const base = compile([chainA]);
            const before = JSON.stringify(base);
            const ghost: Chain = { name: 'ghost', sequence: 'MK', productName: 'proteinX' };

            expect(() => extendWithResources(base, [chainA, ghost], { initialUnits: 1 })).toThrow(MissingTransitionError);
            expect(JSON.stringify(base)).toBe(before);
        });
    });
});
