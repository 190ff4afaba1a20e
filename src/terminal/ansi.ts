/**
 * ANSI Escape Code Constants
 *
 * Low-level escape sequences for terminal control.
 */

// Control characters
export const ESC = '\x1b';
export const CSI = `${ESC}[`;  // Control Sequence Introducer

export type CursorShape = 'block' | 'default';

// Cursor control
export const CURSOR = {
  show: `${CSI}?25h`,
  // Position: row and col are 1-indexed
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
  // Cursor shapes (DECSCUSR)
  shape: {
    default: `${CSI}0 q`,
    block: `${CSI}2 q`,
  },
};

// Screen control
export const SCREEN = {
  clear: `${CSI}2J`,
  home: `${CSI}H`,
  // Alternate screen buffer (for fullscreen apps)
  enterAlt: `${CSI}?1049h`,
  exitAlt: `${CSI}?1049l`,
};

/**
 * Move to a 0-indexed column and row.
 */
export function cursorTo(x: number, y: number): string {
  return CURSOR.moveTo(y + 1, x + 1);
}

export function cursorShape(shape: CursorShape): string {
  return shape === 'block' ? CURSOR.shape.block : CURSOR.shape.default;
}
