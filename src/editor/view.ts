/**
 * Editor View
 *
 * Full clear-and-repaint of the buffer and status line. Rows below the
 * screen and columns past its right edge are clipped; there is no scrolling.
 */

import { displayColumn, expandLine } from '../core/char-width.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import type { Size, TerminalIO } from '../terminal/terminal.ts';
import { formatStatus, renderStatusLine, type StatusLineColors } from './status-line.ts';
import type { CursorPosition, Mode } from './types.ts';

export interface ViewState {
  buffer: TextBuffer;
  mode: Mode;
  cursor: CursorPosition;
  size: Size;
}

export interface ViewOptions {
  tabSize: number;
  statusLine: StatusLineColors;
}

export function render(terminal: TerminalIO, state: ViewState, options: ViewOptions): void {
  const { buffer, mode, cursor, size } = state;
  const textRows = Math.max(size.height - 1, 0);

  terminal.clear();

  const visibleRows = Math.min(buffer.lineCount(), textRows);
  for (let y = 0; y < visibleRows; y++) {
    const text = expandLine(buffer.getLine(y), options.tabSize).slice(0, size.width);
    if (text.length === 0) continue;
    terminal.moveTo(0, y);
    terminal.write(text);
  }

  // Screen column: a tab counts its full width.
  const column = displayColumn(buffer.getLine(cursor.cy), cursor.cx, options.tabSize);
  const status = formatStatus(mode, { cx: column, cy: cursor.cy });
  renderStatusLine(terminal, textRows, size.width, status, options.statusLine);

  terminal.setCursorShape(mode === 'normal' ? 'block' : 'default');

  terminal.moveTo(
    clamp(column, 0, size.width - 1),
    clamp(cursor.cy, 0, textRows - 1)
  );
  terminal.flush();
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}
