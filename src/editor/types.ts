/**
 * Editor Types
 *
 * Mode and Action are closed unions; every switch over them ends in
 * assertNever so a new variant fails to compile until it is handled.
 */

export type Mode = 'normal' | 'insert';

export type Action =
  | { type: 'moveUp' }
  | { type: 'moveDown' }
  | { type: 'moveLeft' }
  | { type: 'moveRight' }
  | { type: 'newLine' }
  | { type: 'backspace' }
  | { type: 'modeToNormal' }
  | { type: 'modeToInsert' }
  | { type: 'addChar'; char: string }
  | { type: 'tab' }
  | { type: 'deleteChar' }
  | { type: 'exit' };

export interface CursorPosition {
  /** Slot index on the current line */
  cx: number;
  /** Row */
  cy: number;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
