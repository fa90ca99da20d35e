/**
 * chainSetLoader.ts — Reads chain-set documents
 *
 * A chain-set document is the nested JSON configuration experiments are
 * described in:
 *
 *   {
 *     "chains": [{ "name": "chainA", "sequence": "MALW...", "product_name": "preinsulin" }],
 *     "simulation_parameters": {
 *       "initial_chains_marking": 2,
 *       "max_protein_output_goal": 2,
 *       "excess_aminoacids_factor": 1,
 *       "ribosome_parameters": { "initial_ribosomes": 2 }
 *     }
 *   }
 *
 * Older inputs name the product `polipeptide_name`; both keys are read.
 *
 * Usage:
 *   const chainSet = await loadChainSetFile('tests/fixtures/preinsulin.json');
 *   const network = compileChainSet(chainSet);
 */

import { readFile } from 'node:fs/promises';
import type { Chain, ChainSet, RawChainSet, ResourceParameters, SimulationParameters } from '../types';
import {
  InvalidChainError,
  InvalidParametersError,
  InvalidResourceError,
} from './translation/errors';

// ── Guards ─────────────────────────────────────────────────────────

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((v) => typeof v === 'string');

function readNumber(
  source: JsonObject,
  key: string,
  fail: (message: string) => Error,
): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw fail(`"${key}" must be a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

// ── Sections ───────────────────────────────────────────────────────

function parseChain(raw: unknown, index: number): Chain {
  if (!isObject(raw)) {
    throw new InvalidChainError(`chains[${index}] must be an object`, { index });
  }

  const { name, sequence } = raw;
  if (typeof name !== 'string') {
    throw new InvalidChainError(`chains[${index}].name must be a string`, { index });
  }
  if (typeof sequence !== 'string' && !isStringArray(sequence)) {
    throw new InvalidChainError(`chains[${index}].sequence must be a string or an array of symbols`, {
      index,
      chain: name,
    });
  }

  const productName = raw.product_name ?? raw.polipeptide_name;
  if (typeof productName !== 'string') {
    throw new InvalidChainError(`chains[${index}] needs a string product_name`, { index, chain: name });
  }

  return { name, sequence, productName };
}

function parseResourceParameters(raw: unknown): ResourceParameters | undefined {
  if (raw === undefined) return undefined;
  if (!isObject(raw)) {
    throw new InvalidResourceError('ribosome_parameters must be an object');
  }
  const initialUnits = readNumber(raw, 'initial_ribosomes', (m) => new InvalidResourceError(m));
  if (initialUnits === undefined) {
    throw new InvalidResourceError('ribosome_parameters.initial_ribosomes is required');
  }
  return { initialUnits };
}

function parseSimulationParameters(raw: unknown): SimulationParameters {
  if (!isObject(raw)) {
    throw new InvalidParametersError('simulation_parameters must be an object');
  }
  const fail = (message: string) => new InvalidParametersError(message);

  const initialMarkingPerChain = readNumber(raw, 'initial_chains_marking', fail);
  if (initialMarkingPerChain === undefined) {
    throw new InvalidParametersError('simulation_parameters.initial_chains_marking is required');
  }

  const params: SimulationParameters = {
    initialMarkingPerChain,
    targetOutput: readNumber(raw, 'max_protein_output_goal', fail) ?? 0,
  };
  const excessFactor = readNumber(raw, 'excess_aminoacids_factor', fail);
  if (excessFactor !== undefined) params.excessFactor = excessFactor;
  const resourceParameters = parseResourceParameters(raw.ribosome_parameters);
  if (resourceParameters) params.resourceParameters = resourceParameters;
  return params;
}

// ── Public API ─────────────────────────────────────────────────────

/**
 * Converts a parsed chain-set document into compiler inputs.
 * Only the document's shape is checked here; value ranges are checked by
 * the compiler and the resource extension.
 */
export function parseChainSet(raw: unknown): ChainSet {
  if (!isObject(raw)) {
    throw new InvalidParametersError('Chain set must be a JSON object');
  }
  if (!Array.isArray(raw.chains)) {
    throw new InvalidChainError('Chain set needs a "chains" array');
  }
  return {
    chains: raw.chains.map(parseChain),
    parameters: parseSimulationParameters(raw.simulation_parameters),
  };
}

/** Builds the document form of a chain set (inverse of parseChainSet). */
export function toRawChainSet(chainSet: ChainSet): RawChainSet {
  const { parameters } = chainSet;
  const raw: RawChainSet = {
    chains: chainSet.chains.map((c) => ({
      name: c.name,
      sequence: typeof c.sequence === 'string' ? c.sequence : [...c.sequence],
      product_name: c.productName,
    })),
    simulation_parameters: {
      initial_chains_marking: parameters.initialMarkingPerChain,
      max_protein_output_goal: parameters.targetOutput,
    },
  };
  if (parameters.excessFactor !== undefined) {
    raw.simulation_parameters.excess_aminoacids_factor = parameters.excessFactor;
  }
  if (parameters.resourceParameters) {
    raw.simulation_parameters.ribosome_parameters = {
      initial_ribosomes: parameters.resourceParameters.initialUnits,
    };
  }
  return raw;
}

/**
 * Reads and parses a chain-set JSON file.
 * @throws InvalidParametersError when the file is not valid JSON
 */
export async function loadChainSetFile(filePath: string): Promise<ChainSet> {
  const text = await readFile(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new InvalidParametersError(
      `Could not parse chain set ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
      { filePath },
    );
  }
  return parseChainSet(raw);
}
