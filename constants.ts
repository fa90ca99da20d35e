// Shared resource pool
export const RESOURCE_PLACE_NAME = 'p_free_ribosomes';

// Fallback ribosome count used by the early single-chain experiments.
// Never applied implicitly: callers pass it as `defaultInitialUnits` when they want it.
export const DEFAULT_INITIAL_RIBOSOMES = 50;

// Single-letter codes of the 20 standard amino acids
export const STANDARD_AMINO_ACIDS: ReadonlySet<string> = new Set([
  'A', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'K', 'L',
  'M', 'N', 'P', 'Q', 'R', 'S', 'T', 'V', 'W', 'Y',
]);

// Decimal places kept for the excess factor in sweep run keys
export const RUN_KEY_FACTOR_DIGITS = 2;
