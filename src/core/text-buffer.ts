/**
 * Text Buffer
 *
 * Document content as an ordered list of lines, each an ordered list of
 * slots. Every operation is total: writes grow the buffer as needed and
 * out-of-range removals are ignored.
 */

// ============================================
// Slots
// ============================================

/**
 * Padding written when a character is inserted past the end of a line.
 * Never produced by user input, so the view can tell it apart from content.
 */
export const EMPTY_SLOT: unique symbol = Symbol('empty-slot');

export type EmptySlot = typeof EMPTY_SLOT;

/** A single storage cell: one character, or padding. */
export type Slot = string | EmptySlot;

export type Line = Slot[];

/** Line breaks are structural and never stored as content. */
export const LINE_BREAK = '\n';

export function isEmptySlot(slot: Slot | undefined): slot is EmptySlot {
  return slot === EMPTY_SLOT;
}

// ============================================
// TextBuffer Class
// ============================================

export class TextBuffer {
  private lines: Line[];

  constructor(content?: string) {
    this.lines = content === undefined
      ? [[]]
      : content.split(LINE_BREAK).map((text) => Array.from(text));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Editing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Insert `char` at column `x` of row `y`, shifting the rest of the row right.
   * Missing rows are appended and short rows padded with EMPTY_SLOT first.
   */
  insert(x: number, y: number, char: string): void {
    if (char === LINE_BREAK) return;

    this.ensureLine(y);
    const line = this.lines[y]!;
    while (line.length < x) {
      line.push(EMPTY_SLOT);
    }
    line.splice(x, 0, char);
  }

  /**
   * Remove the slot at column `x` of row `y`. No-op if there is none.
   */
  remove(x: number, y: number): void {
    const line = this.lines[y];
    if (!line || x < 0 || x >= line.length) return;
    line.splice(x, 1);
  }

  /**
   * Append empty lines until row `y` exists. Existing rows are untouched.
   */
  ensureLine(y: number): void {
    while (this.lines.length <= y) {
      this.lines.push([]);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────

  lineCount(): number {
    return this.lines.length;
  }

  hasLine(y: number): boolean {
    return y >= 0 && y < this.lines.length;
  }

  /**
   * Number of slots on row `y`, or 0 if the row does not exist.
   */
  lineLength(y: number): number {
    return this.lines[y]?.length ?? 0;
  }

  /**
   * Slot at `(x, y)`, or undefined when out of range.
   */
  charAt(x: number, y: number): Slot | undefined {
    if (x < 0) return undefined;
    return this.lines[y]?.[x];
  }

  /**
   * Copy of row `y`. Empty for a missing row.
   */
  getLine(y: number): readonly Slot[] {
    return [...(this.lines[y] ?? [])];
  }

  /**
   * Row `y` as plain text, padding shown as spaces.
   */
  lineText(y: number): string {
    return (this.lines[y] ?? []).map((slot) => (isEmptySlot(slot) ? ' ' : slot)).join('');
  }

  toString(): string {
    return this.lines.map((_, y) => this.lineText(y)).join(LINE_BREAK);
  }
}
