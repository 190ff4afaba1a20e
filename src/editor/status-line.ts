/**
 * Status Line
 *
 * Bottom row showing the mode and cursor position.
 */

import type { TerminalIO } from '../terminal/terminal.ts';
import type { CursorPosition, Mode } from './types.ts';

export interface StatusLineColors {
  foreground: string;
  background: string;
}

/**
 * e.g. "INSERT [2, 0]". `cursor.cx` is the screen column, not the slot index.
 */
export function formatStatus(mode: Mode, cursor: CursorPosition): string {
  return `${mode.toUpperCase()} [${cursor.cx}, ${cursor.cy}]`;
}

/**
 * Paint the status line across the full width of `row`.
 */
export function renderStatusLine(
  terminal: TerminalIO,
  row: number,
  width: number,
  text: string,
  colors: StatusLineColors
): void {
  if (width <= 0) return;

  const content = text.length > width ? text.slice(0, width) : text.padEnd(width);
  terminal.moveTo(0, row);
  terminal.write(content, { fg: colors.foreground, bg: colors.background, bold: true });
}
