/**
 * Error taxonomy for network compilation.
 *
 * Every error is raised synchronously before a network is returned, so a
 * caller never sees a partially built network. Tests and sweep drivers
 * branch on `error.code` rather than on message text.
 */

export type CompilationErrorCode =
  | 'INVALID_CHAIN'
  | 'INVALID_PARAMETERS'
  | 'MISSING_TRANSITION'
  | 'INVALID_RESOURCE';

export class NetworkCompilationError extends Error {
  readonly code: CompilationErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: CompilationErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'NetworkCompilationError';
    this.code = code;
    if (details) this.details = details;
  }
}

/** Malformed chain input: empty sequence, blank or duplicate name, name collision. */
export class InvalidChainError extends NetworkCompilationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CHAIN', message, details);
    this.name = 'InvalidChainError';
  }
}

export class InvalidParametersError extends NetworkCompilationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_PARAMETERS', message, details);
    this.name = 'InvalidParametersError';
  }
}

/** The extension was applied to a network that does not follow the compiler's naming. */
export class MissingTransitionError extends NetworkCompilationError {
  readonly transitionName: string;

  constructor(transitionName: string, chainName: string) {
    super(
      'MISSING_TRANSITION',
      `Transition "${transitionName}" for chain "${chainName}" is not in the network`,
      { transitionName, chainName },
    );
    this.name = 'MissingTransitionError';
    this.transitionName = transitionName;
  }
}

export class InvalidResourceError extends NetworkCompilationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_RESOURCE', message, details);
    this.name = 'InvalidResourceError';
  }
}

export function isNetworkCompilationError(error: unknown): error is NetworkCompilationError {
  return error instanceof NetworkCompilationError;
}
