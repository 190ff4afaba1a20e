/**
 * Raw Terminal Input Parser
 *
 * Parses raw-mode stdin data into key events.
 */

import { ESC } from './ansi.ts';

export interface KeyEvent {
  key: string;        // Key name (e.g., 'A', 'ENTER', 'UP', 'F1')
  char?: string;      // Original character if printable
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
}

type KeyCallback = (event: KeyEvent) => void;

export const DEFAULT_ESCAPE_TIMEOUT = 50;

// Special key mappings for escape sequences (without the leading ESC)
const ESCAPE_SEQUENCES: Record<string, string> = {
  // Arrow keys
  '[A': 'UP',
  '[B': 'DOWN',
  '[C': 'RIGHT',
  '[D': 'LEFT',
  'OA': 'UP',
  'OB': 'DOWN',
  'OC': 'RIGHT',
  'OD': 'LEFT',
  // Home/End
  '[H': 'HOME',
  '[F': 'END',
  'OH': 'HOME',
  'OF': 'END',
  '[1~': 'HOME',
  '[4~': 'END',
  '[7~': 'HOME',
  '[8~': 'END',
  // Insert/Delete
  '[2~': 'INSERT',
  '[3~': 'DELETE',
  // Page Up/Down
  '[5~': 'PAGEUP',
  '[6~': 'PAGEDOWN',
  // Function keys
  'OP': 'F1',
  'OQ': 'F2',
  'OR': 'F3',
  'OS': 'F4',
  '[15~': 'F5',
  '[17~': 'F6',
  '[18~': 'F7',
  '[19~': 'F8',
  '[20~': 'F9',
  '[21~': 'F10',
  '[23~': 'F11',
  '[24~': 'F12',
};

// Final byte of xterm modified cursor keys (ESC [ 1 ; <mod> <final>)
const MODIFIED_FINALS: Record<string, string> = {
  A: 'UP',
  B: 'DOWN',
  C: 'RIGHT',
  D: 'LEFT',
  H: 'HOME',
  F: 'END',
};

const MODIFIED_KEY = /^\x1b\[1;(\d+)([ABCDHF])/;

// Any complete CSI (parameters, intermediates, final byte) or SS3 sequence
const CSI_SEQUENCE = /^\x1b\[[0-?]*[ -\/]*[@-~]/;
const SS3_SEQUENCE = /^\x1bO./;

export function keyEvent(key: string, modifiers: Partial<Omit<KeyEvent, 'key'>> = {}): KeyEvent {
  return {
    key,
    ctrl: false,
    alt: false,
    shift: false,
    meta: false,
    ...modifiers,
  };
}

export class InputParser {
  private keyCallbacks: Set<KeyCallback> = new Set();
  private buffer: string = '';
  private escapeTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly escapeTimeout: number = DEFAULT_ESCAPE_TIMEOUT) {}

  /**
   * Register key event callback
   */
  onKey(callback: KeyCallback): () => void {
    this.keyCallbacks.add(callback);
    return () => this.keyCallbacks.delete(callback);
  }

  /**
   * Process raw input data
   */
  feed(data: string): void {
    this.buffer += data;
    this.parseBuffer();
  }

  /**
   * Drop pending input and timers
   */
  dispose(): void {
    this.clearEscapeTimer();
    this.buffer = '';
  }

  private clearEscapeTimer(): void {
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }
  }

  /**
   * Parse the input buffer
   */
  private parseBuffer(): void {
    while (this.buffer.length > 0) {
      this.clearEscapeTimer();

      const consumed = this.tryParse();
      if (consumed === 0) {
        // Couldn't parse anything yet - might be incomplete escape sequence
        if (this.buffer.startsWith(ESC) && this.buffer.length < 10) {
          this.escapeTimer = setTimeout(() => {
            this.escapeTimer = null;
            // Timeout - treat as plain ESC key
            if (this.buffer.startsWith(ESC)) {
              this.buffer = this.buffer.slice(1);
              this.emitKey(keyEvent('ESCAPE'));
              this.parseBuffer();
            }
          }, this.escapeTimeout);
          return;
        }
        // Unknown sequence - skip one character
        this.buffer = this.buffer.slice(1);
      } else {
        this.buffer = this.buffer.slice(consumed);
      }
    }
  }

  /**
   * Try to parse the current buffer
   * Returns number of characters consumed
   */
  private tryParse(): number {
    const firstChar = this.buffer[0];
    if (firstChar === undefined) return 0;
    const firstCode = firstChar.charCodeAt(0);

    if (firstChar === ESC) {
      return this.parseEscape();
    }

    // Control characters
    if (firstCode < 32) {
      const event = parseControlChar(firstCode);
      if (event) {
        this.emitKey(event);
      }
      return 1;
    }

    // DEL (backspace on most terminals)
    if (firstCode === 127) {
      this.emitKey(keyEvent('BACKSPACE'));
      return 1;
    }

    // Regular printable character, including surrogate pairs
    const char = String.fromCodePoint(this.buffer.codePointAt(0) ?? firstCode);
    this.emitKey(printableKey(char));
    return char.length;
  }

  /**
   * Parse a sequence starting with ESC. Returns 0 while incomplete.
   */
  private parseEscape(): number {
    if (this.buffer.length === 1) {
      return 0;  // Wait for potential sequence
    }

    const modified = MODIFIED_KEY.exec(this.buffer);
    if (modified) {
      const bits = parseInt(modified[1]!, 10) - 1;
      this.emitKey(keyEvent(MODIFIED_FINALS[modified[2]!]!, {
        shift: (bits & 1) !== 0,
        alt: (bits & 2) !== 0,
        ctrl: (bits & 4) !== 0,
      }));
      return modified[0].length;
    }

    for (const [seq, key] of Object.entries(ESCAPE_SEQUENCES)) {
      if (this.buffer.startsWith(ESC + seq)) {
        this.emitKey(keyEvent(key));
        return 1 + seq.length;
      }
    }

    // Complete but unmapped (e.g. Shift+Tab, focus reports): drop it
    const unknown = CSI_SEQUENCE.exec(this.buffer) ?? SS3_SEQUENCE.exec(this.buffer);
    if (unknown) {
      return unknown[0].length;
    }

    const nextChar = this.buffer[1]!;
    const nextCode = nextChar.charCodeAt(0);

    // Alt+key (ESC followed by key); '[' and 'O' start sequences
    if (nextChar !== '[' && nextChar !== 'O' && nextCode >= 32 && nextCode < 127) {
      this.emitKey({ ...printableKey(nextChar), alt: true });
      return 2;
    }

    // ESC ESC: the first one is a plain Escape
    if (nextChar === ESC) {
      this.emitKey(keyEvent('ESCAPE'));
      return 1;
    }

    return 0;
  }

  /**
   * Emit key event
   */
  private emitKey(event: KeyEvent): void {
    for (const callback of this.keyCallbacks) {
      callback(event);
    }
  }
}

function printableKey(char: string): KeyEvent {
  return keyEvent(char.toUpperCase(), {
    char,
    shift: char !== char.toLowerCase() && char.toLowerCase() !== char.toUpperCase(),
  });
}

/**
 * Parse control character
 */
function parseControlChar(code: number): KeyEvent | null {
  switch (code) {
    case 8:  // Ctrl+H or Backspace
      return keyEvent('BACKSPACE');
    case 9:
      return keyEvent('TAB');
    case 10: // Line feed (Enter on Unix)
    case 13: // Carriage return (Enter)
      return keyEvent('ENTER');
    case 0:
      return keyEvent('@', { ctrl: true });
    default:
      // Ctrl+letter
      if (code >= 1 && code <= 26) {
        return keyEvent(String.fromCharCode(64 + code), { ctrl: true });
      }
      return null;
  }
}
