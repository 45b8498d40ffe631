/**
 * Session Error Types
 *
 * Typed error classes for contract violations in the session core.
 * Soft failures (bad selection index, unparsable response, unimplemented
 * population strategy) are logged instead and never reach these types.
 */

/**
 * Session error codes for classification.
 */
export type SessionErrorCode =
  | 'PRECONDITION_VIOLATION'
  | 'CONFIGURATION_OVERRUN'
  | 'INDEX_OUT_OF_RANGE';

/**
 * Base session error class.
 */
export class SessionError extends Error {
  constructor(
    message: string,
    public readonly code: SessionErrorCode
  ) {
    super(message);
    this.name = 'SessionError';
  }
}

/**
 * An operation ran before its collaborators were bound.
 * Call SessionController.initialize() first.
 */
export class PreconditionError extends SessionError {
  constructor(
    public readonly operation: string,
    public readonly missing: string
  ) {
    super(`Cannot ${operation}: no ${missing} bound. Call initialize() first.`, 'PRECONDITION_VIOLATION');
    this.name = 'PreconditionError';
  }
}

/**
 * More unique training selections requested than items available.
 */
export class ConfigurationOverrunError extends SessionError {
  constructor(
    public readonly requested: number,
    public readonly available: number
  ) {
    super(
      `Requested ${String(requested)} unique training selections but only ${String(available)} selectable items are available`,
      'CONFIGURATION_OVERRUN'
    );
    this.name = 'ConfigurationOverrunError';
  }
}

/**
 * Registry lookup outside [0, count).
 */
export class IndexOutOfRangeError extends SessionError {
  constructor(
    public readonly index: number,
    public readonly count: number
  ) {
    super(`Index ${String(index)} out of range [0, ${String(count)})`, 'INDEX_OUT_OF_RANGE');
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * Extract a log-friendly message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
