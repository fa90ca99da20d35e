// ============================================================================
// Chain inputs
// ============================================================================

/** Monomer symbols in translation order. A string is read one character per monomer. */
export type ChainSequence = string | readonly string[];

export interface Chain {
  name: string;
  sequence: ChainSequence;
  productName: string;
}

export interface ResourceParameters {
  initialUnits: number;
  /** Overrides the resource place name (defaults to `p_free_ribosomes`). */
  placeName?: string;
}

export interface SimulationParameters {
  initialMarkingPerChain: number;
  /** Informational: used by sweep drivers to size step budgets. */
  targetOutput: number;
  /** Informational ratio carried through to run keys. */
  excessFactor?: number;
  resourceParameters?: ResourceParameters;
}

export interface ChainSet {
  chains: Chain[];
  parameters: SimulationParameters;
}

// ============================================================================
// Compiled network
// ============================================================================

export type ArcWeights = Record<string, number>;

export interface Place {
  name: string;
  initialMarking: number;
}

export interface Transition {
  name: string;
  consume: ArcWeights;
  produce: ArcWeights;
}

export interface Network {
  places: Record<string, Place>;
  transitions: Record<string, Transition>;
}

/** Wire form handed to the simulation engine. */
export interface EngineNetwork {
  places: Record<string, number>;
  transitions: Record<string, { consume: ArcWeights; produce: ArcWeights }>;
}

// ============================================================================
// Raw chain-set document (as read from JSON)
// ============================================================================

export interface RawChain {
  name: string;
  sequence: string | string[];
  product_name?: string;
  polipeptide_name?: string;
}

export interface RawSimulationParameters {
  initial_chains_marking: number;
  max_protein_output_goal?: number;
  excess_aminoacids_factor?: number;
  ribosome_parameters?: {
    initial_ribosomes: number;
  };
}

export interface RawChainSet {
  chains: RawChain[];
  simulation_parameters: RawSimulationParameters;
}

// ============================================================================
// Diagnostics
// ============================================================================

export type ValidationSeverity = 'error' | 'warning' | 'info';
