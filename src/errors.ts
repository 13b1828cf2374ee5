/**
 * Errors raised by the engine
 */

/**
 * An error caused by a problem in the dialog definition or during
 * the execution of a turn
 */
export class FlowError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FlowError';
  }

  /**
   * Error message including the class of the cause error, if any
   */
  get detailedMessage(): string {
    const cause = this.cause;
    if (cause instanceof Error && !(cause instanceof FlowError)) {
      return `caused by ${cause.name}: ${this.message}`;
    }
    return this.message;
  }
}

/**
 * A structural error found while building a dialog tree
 * (unknown, reused or duplicate subtree, missing or duplicate label)
 */
export class TreeError extends FlowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TreeError';
  }
}

/**
 * A stored snapshot whose state variables do not validate
 */
export class InvalidStateError extends FlowError {
  constructor(
    message: string,
    readonly dialogId: string,
    readonly version: number
  ) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

/**
 * Human readable description of any thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
