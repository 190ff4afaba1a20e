/**
 * Slot Width Utilities
 *
 * Display width of buffer slots in terminal cells. Every slot occupies one
 * column except a tab, which expands to the configured tab size.
 */

import { isEmptySlot, type Slot } from './text-buffer.ts';

export const TAB = '\t';

/**
 * Get display width of a single slot in terminal cells.
 */
export function getSlotWidth(slot: Slot, tabSize: number): number {
  if (slot === TAB) return tabSize;
  return 1;
}

/**
 * Terminal column of slot index `x` on a line.
 * Sums the widths of the slots before it; positions past the end count as 1.
 */
export function displayColumn(line: readonly Slot[], x: number, tabSize: number): number {
  let column = 0;
  for (let i = 0; i < x; i++) {
    const slot = line[i];
    column += slot === undefined ? 1 : getSlotWidth(slot, tabSize);
  }
  return column;
}

/**
 * Expand a line into the text painted on screen.
 * Tabs become `tabSize` spaces; padding becomes a single space.
 */
export function expandLine(line: readonly Slot[], tabSize: number): string {
  let text = '';
  for (const slot of line) {
    if (isEmptySlot(slot)) {
      text += ' ';
    } else if (slot === TAB) {
      text += ' '.repeat(tabSize);
    } else {
      text += slot;
    }
  }
  return text;
}
