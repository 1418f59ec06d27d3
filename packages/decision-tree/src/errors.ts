// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

export type DecisionTreeErrorCode =
  | 'EMPTY_SAMPLE'
  | 'NO_ATTRIBUTES'
  | 'DID_NOT_CONVERGE'
  | 'INVALID_OPTION'
  | 'UNKNOWN_ATTRIBUTE';

/** Base class for every precondition failure raised by the library. */
export class DecisionTreeError extends Error {
  constructor(
    public readonly code: DecisionTreeErrorCode,
    message: string,
    public readonly context: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = 'DecisionTreeError';
  }
}

/** A metric, partition count or selection was asked for on zero examples. */
export class EmptySampleError extends DecisionTreeError {
  constructor(public readonly operation: string) {
    super('EMPTY_SAMPLE', `${operation} requires a non-empty sample`, { operation });
    this.name = 'EmptySampleError';
  }
}

/** Best-attribute selection over an empty candidate list. */
export class NoAttributesError extends DecisionTreeError {
  constructor() {
    super('NO_ATTRIBUTES', 'Cannot pick a best attribute from an empty candidate list');
    this.name = 'NoAttributesError';
  }
}

export type ConvergenceFailure = 'no-progress' | 'max-depth' | 'attributes-exhausted';

/**
 * Induction stopped before every leaf became pure.
 * `positive` / `negative` describe the partition that could not be resolved.
 */
export class TreeDidNotConvergeError extends DecisionTreeError {
  constructor(
    public readonly reason: ConvergenceFailure,
    public readonly depth: number,
    public readonly positive: number,
    public readonly negative: number,
  ) {
    super(
      'DID_NOT_CONVERGE',
      `Tree did not converge (${reason}) at depth ${depth}: ` +
        `partition still holds ${positive} positive and ${negative} negative examples`,
      { reason, depth, positive, negative },
    );
    this.name = 'TreeDidNotConvergeError';
  }
}

export class InvalidOptionError extends DecisionTreeError {
  constructor(
    public readonly option: string,
    public readonly value: unknown,
  ) {
    super('INVALID_OPTION', `Invalid value for option ${option}: ${String(value)}`, {
      option,
      value,
    });
    this.name = 'InvalidOptionError';
  }
}

/** A test generator was asked for an attribute it has no rule for. */
export class UnknownAttributeError extends DecisionTreeError {
  constructor(public readonly attribute: PropertyKey) {
    super('UNKNOWN_ATTRIBUTE', `No attribute test defined for ${String(attribute)}`, {
      attribute: String(attribute),
    });
    this.name = 'UnknownAttributeError';
  }
}

export function isDecisionTreeError(error: unknown): error is DecisionTreeError {
  return error instanceof DecisionTreeError;
}
