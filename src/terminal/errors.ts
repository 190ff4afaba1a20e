/**
 * Terminal I/O Errors
 */

export type TerminalOperation = 'read' | 'write' | 'mode';

/**
 * Failure of the terminal I/O service. Editing itself never fails; this is
 * the only error kind that reaches the main loop.
 */
export class TerminalIoError extends Error {
  readonly operation: TerminalOperation;

  constructor(operation: TerminalOperation, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalIoError';
    this.operation = operation;
  }
}

export function isTerminalIoError(error: unknown): error is TerminalIoError {
  return error instanceof TerminalIoError;
}
