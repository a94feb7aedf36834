/**
 * Error taxonomy for the coordination core.
 *
 * Expected outcomes of a store write (denial, conflict, invalid input) are
 * returned as values; these classes give them a stable `code` so callers can
 * switch on it without instanceof chains.
 */

export type CoordinationErrorCode =
  | 'AUTHORIZATION'
  | 'CONFLICT'
  | 'VALIDATION'
  | 'TRANSIENT_COLLABORATOR'
  | 'FATAL_STORE'
  | 'CHANNEL_CLOSED'
  | 'CHANNEL_SEALED';

export abstract class CoordinationError extends Error {
  abstract readonly code: CoordinationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The actor lacks the (resource, operation) grant. A policy violation, not a
 * malformed request.
 */
export class AuthorizationError extends CoordinationError {
  readonly code = 'AUTHORIZATION' as const;

  constructor(
    readonly actor: string,
    readonly resource: string,
    readonly operation: string,
    reason?: string
  ) {
    super(reason ?? `Actor '${actor}' lacks authority: ${resource}:${operation}`);
  }
}

/**
 * Optimistic write lost a race. Re-read and retry.
 */
export class ConflictError extends CoordinationError {
  readonly code = 'CONFLICT' as const;

  constructor(
    message: string,
    readonly target?: string
  ) {
    super(message);
  }
}

export class ValidationError extends CoordinationError {
  readonly code = 'VALIDATION' as const;

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

/**
 * Reasoning call timed out or failed in a way worth retrying.
 */
export class TransientCollaboratorError extends CoordinationError {
  readonly code = 'TRANSIENT_COLLABORATOR' as const;
}

/**
 * The backing store is unusable. Workers must stop rather than act on an
 * unknown state.
 */
export class FatalStoreError extends CoordinationError {
  readonly code = 'FATAL_STORE' as const;
}

export class ChannelClosedError extends CoordinationError {
  readonly code = 'CHANNEL_CLOSED' as const;
}

export class ChannelSealedError extends CoordinationError {
  readonly code = 'CHANNEL_SEALED' as const;
}

export function isCoordinationError(error: unknown): error is CoordinationError {
  return error instanceof CoordinationError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
