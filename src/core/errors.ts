/**
 * Error classes raised by the graph core.
 *
 * Corpus problems (broken references, cycles, duplicate ids) are reported as
 * diagnostics, not thrown. These errors are for caller mistakes: asking for a
 * node that does not exist, an unconfirmed destructive mutation, an undo
 * target that is not in the log, or an invalid configuration.
 */

export type ErrorCode =
  | 'DUPLICATE_ID'
  | 'NOT_FOUND'
  | 'UNKNOWN_NODE_ID'
  | 'CONFIRMATION_REQUIRED'
  | 'INVALID_MUTATION_SEQUENCE'
  | 'INVALID_MUTATION'
  | 'CONFIG_ERROR';

/**
 * Base class for every error thrown by tracegraph.
 */
export class TraceGraphError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'TraceGraphError';
  }
}

export class DuplicateIdError extends TraceGraphError {
  constructor(public readonly nodeId: string) {
    super(`Node already exists: ${nodeId}`, 'DUPLICATE_ID');
    this.name = 'DuplicateIdError';
  }
}

export class NotFoundError extends TraceGraphError {
  constructor(public readonly nodeId: string) {
    super(`Node not found: ${nodeId}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class UnknownNodeIdError extends TraceGraphError {
  constructor(public readonly nodeId: string) {
    super(`Unknown node id: ${nodeId}`, 'UNKNOWN_NODE_ID');
    this.name = 'UnknownNodeIdError';
  }
}

export class ConfirmationRequiredError extends TraceGraphError {
  constructor(public readonly operation: string) {
    super(
      `${operation} is destructive; pass { confirm: true } to proceed`,
      'CONFIRMATION_REQUIRED'
    );
    this.name = 'ConfirmationRequiredError';
  }
}

export class InvalidMutationSequenceError extends TraceGraphError {
  constructor(public readonly seq: number) {
    super(`No mutation with sequence number ${seq} in the log`, 'INVALID_MUTATION_SEQUENCE');
    this.name = 'InvalidMutationSequenceError';
  }
}

export class InvalidMutationError extends TraceGraphError {
  constructor(message: string) {
    super(message, 'INVALID_MUTATION');
    this.name = 'InvalidMutationError';
  }
}

export class ConfigError extends TraceGraphError {
  constructor(
    message: string,
    public readonly configPath: string | null = null
  ) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}
