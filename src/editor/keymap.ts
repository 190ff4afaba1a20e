/**
 * Keymap
 *
 * Translates a key event into an Action under the current mode.
 * Pure: no editor state other than the mode is consulted.
 */

import type { KeyEvent } from '../terminal/input.ts';
import { assertNever, type Action, type Mode } from './types.ts';

export interface KeymapOptions {
  /** Require Alt for the 'i' mode switch in normal mode */
  modeSwitchRequiresAlt: boolean;
}

const DEFAULT_OPTIONS: KeymapOptions = {
  modeSwitchRequiresAlt: false,
};

// Mode-independent keys
const ARROWS = new Map<string, Action>([
  ['UP', { type: 'moveUp' }],
  ['DOWN', { type: 'moveDown' }],
  ['LEFT', { type: 'moveLeft' }],
  ['RIGHT', { type: 'moveRight' }],
]);

function isAltI(key: KeyEvent): boolean {
  return key.alt && key.char === 'i';
}

/**
 * A printable character typed without Ctrl or Alt.
 */
function printableChar(key: KeyEvent): string | null {
  if (key.ctrl || key.alt || key.meta || key.char === undefined) return null;
  return key.char;
}

function translateNormal(key: KeyEvent, options: KeymapOptions): Action | null {
  if (isAltI(key)) return { type: 'modeToInsert' };
  if (key.key === 'DELETE') return { type: 'deleteChar' };

  switch (printableChar(key)) {
    case 'q':
      return { type: 'exit' };
    case 'i':
      return options.modeSwitchRequiresAlt ? null : { type: 'modeToInsert' };
    case 'd':
      return { type: 'deleteChar' };
    default:
      return null;
  }
}

function translateInsert(key: KeyEvent): Action | null {
  if (isAltI(key)) return { type: 'modeToNormal' };

  switch (key.key) {
    case 'ESCAPE':
      return { type: 'modeToNormal' };
    case 'BACKSPACE':
      return { type: 'backspace' };
    case 'ENTER':
      return { type: 'newLine' };
    case 'TAB':
      return { type: 'tab' };
  }

  const char = printableChar(key);
  return char === null ? null : { type: 'addChar', char };
}

/**
 * Map a key to an action, or null when the key means nothing in this mode.
 */
export function translateKey(
  mode: Mode,
  key: KeyEvent,
  options: KeymapOptions = DEFAULT_OPTIONS
): Action | null {
  const arrow = ARROWS.get(key.key);
  if (arrow) return arrow;

  switch (mode) {
    case 'normal':
      return translateNormal(key, options);
    case 'insert':
      return translateInsert(key);
    default:
      return assertNever(mode);
  }
}
