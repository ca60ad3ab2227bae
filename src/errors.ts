// Error taxonomy
//
// CircuitError: the circuit description is wrong. Fatal for the whole run.
// TraceError: one scenario's trace is malformed. That scenario becomes
// inconclusive and the others are still evaluated.

export enum CircuitErrorType {
  DUPLICATE_SIGNAL = 'DUPLICATE_SIGNAL',
  UNKNOWN_REGISTER = 'UNKNOWN_REGISTER',
  UNKNOWN_SIGNAL = 'UNKNOWN_SIGNAL',
  INVALID_WIDTH = 'INVALID_WIDTH',
  INVALID_RESET_VALUE = 'INVALID_RESET_VALUE',
  INVALID_VALUE = 'INVALID_VALUE',
  INVALID_DESCRIPTION = 'INVALID_DESCRIPTION',
}

export class CircuitError extends Error {
  constructor(
    public readonly type: CircuitErrorType,
    message: string
  ) {
    super(message);
    this.name = 'CircuitError';
  }
}

export enum TraceErrorType {
  SEGMENT_LENGTH_MISMATCH = 'SEGMENT_LENGTH_MISMATCH',
  SIGNAL_SET_MISMATCH = 'SIGNAL_SET_MISMATCH',
  INVALID_BIT_STRING = 'INVALID_BIT_STRING',
  CYCLE_COUNT_MISMATCH = 'CYCLE_COUNT_MISMATCH',
  INVALID_TRACE = 'INVALID_TRACE',
  BRANCH_LIMIT = 'BRANCH_LIMIT',
}

export class TraceError extends Error {
  constructor(
    public readonly type: TraceErrorType,
    message: string
  ) {
    super(message);
    this.name = 'TraceError';
  }
}

export class ExpressionError extends Error {
  constructor(message: string, public line: number, public column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'ExpressionError';
  }
}
