/**
 * Editor
 *
 * Modal edit state machine. Owns the cursor, the mode and the cached
 * terminal size; turns terminal events into actions and applies them to the
 * text buffer. Every action is total: out-of-range moves and edits are no-ops.
 */

import { TAB } from '../core/char-width.ts';
import { TextBuffer } from '../core/text-buffer.ts';
import { Settings } from '../config/settings.ts';
import { debugLog } from '../debug.ts';
import type { Size, TerminalEvent, TerminalIO } from '../terminal/terminal.ts';
import { translateKey } from './keymap.ts';
import { assertNever, type Action, type CursorPosition, type Mode } from './types.ts';
import { render } from './view.ts';

export interface EditorOptions {
  terminal: TerminalIO;
  settings?: Settings;
  buffer?: TextBuffer;
}

export class Editor {
  private readonly terminal: TerminalIO;
  private readonly settings: Settings;
  private readonly buffer: TextBuffer;

  private cx = 0;
  private cy = 0;
  private mode: Mode = 'normal';
  private size: Size;
  private running = false;

  constructor(options: EditorOptions) {
    this.terminal = options.terminal;
    this.settings = options.settings ?? new Settings();
    this.buffer = options.buffer ?? new TextBuffer();
    this.size = this.terminal.size();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────────────

  getBuffer(): TextBuffer {
    return this.buffer;
  }

  getMode(): Mode {
    return this.mode;
  }

  getCursor(): CursorPosition {
    return { cx: this.cx, cy: this.cy };
  }

  getSize(): Size {
    return { ...this.size };
  }

  isRunning(): boolean {
    return this.running;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Translation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Translate a terminal event under the current mode.
   * Resize events refresh the cached size and produce no action.
   */
  handleEvent(event: TerminalEvent): Action | null {
    switch (event.type) {
      case 'key':
        return translateKey(this.mode, event.key, {
          modeSwitchRequiresAlt: this.settings.get('editor.modeSwitchRequiresAlt'),
        });
      case 'resize':
        this.size = { width: event.width, height: event.height };
        debugLog(`[Editor] Resized to ${event.width}x${event.height}`);
        return null;
      default:
        return assertNever(event);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Application
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Apply an action to the buffer and cursor.
   * Returns false once the action ends the session.
   */
  apply(action: Action): boolean {
    switch (action.type) {
      case 'moveUp':
        this.cy = Math.max(this.cy - 1, 0);
        this.cx = Math.min(this.cx, this.buffer.lineLength(this.cy));
        break;

      case 'moveDown':
        if (this.buffer.hasLine(this.cy + 1)) {
          this.cx = this.buffer.lineLength(this.cy + 1);
          this.cy += 1;
        }
        break;

      case 'moveLeft':
        if (this.cx > 0 && this.buffer.charAt(this.cx - 1, this.cy) !== undefined) {
          this.cx -= 1;
        }
        break;

      case 'moveRight':
        if (this.buffer.charAt(this.cx + 1, this.cy) !== undefined) {
          this.cx += 1;
        }
        break;

      case 'newLine':
        // The rest of the current row stays where it is.
        this.cy += 1;
        this.cx = 0;
        this.buffer.ensureLine(this.cy);
        break;

      case 'backspace':
        if (this.cx > 0) {
          this.buffer.remove(this.cx - 1, this.cy);
          this.cx -= 1;
        } else {
          // No join with the previous row.
          this.cy = Math.max(this.cy - 1, 0);
        }
        break;

      case 'modeToNormal':
        this.mode = 'normal';
        break;

      case 'modeToInsert':
        this.mode = 'insert';
        break;

      case 'addChar':
        this.buffer.insert(this.cx, this.cy, action.char);
        this.cx += 1;
        break;

      case 'tab':
        this.buffer.insert(this.cx, this.cy, TAB);
        this.cx += 1;
        break;

      case 'deleteChar':
        this.buffer.remove(this.cx, this.cy);
        break;

      case 'exit':
        this.running = false;
        return false;

      default:
        return assertNever(action);
    }

    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  draw(): void {
    render(
      this.terminal,
      {
        buffer: this.buffer,
        mode: this.mode,
        cursor: this.getCursor(),
        size: this.size,
      },
      {
        tabSize: this.settings.get('editor.tabSize'),
        statusLine: {
          foreground: this.settings.get('statusLine.foreground'),
          background: this.settings.get('statusLine.background'),
        },
      }
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Main Loop
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Read, translate, apply and repaint until an exit action.
   * Terminal failures propagate to the caller.
   */
  async run(): Promise<void> {
    this.running = true;
    this.draw();

    while (this.running) {
      const event = await this.terminal.readEvent();
      const action = this.handleEvent(event);
      if (event.type === 'resize') {
        this.draw();
      }
      if (!action) continue;

      debugLog(`[Editor] ${action.type} at [${this.cx}, ${this.cy}] in ${this.mode}`);
      if (!this.apply(action)) break;
      this.draw();
    }

    debugLog('[Editor] Main loop finished');
  }
}
