/**
 * Terminal I/O Service
 *
 * The editor talks to the terminal only through TerminalIO. NodeTerminal
 * implements it over raw-mode stdin and an ANSI stdout; tests use an
 * in-process fake.
 */

import { CURSOR, SCREEN, cursorShape, cursorTo, type CursorShape } from './ansi.ts';
import { resetColor } from './colors.ts';
import { styled, type StyleOptions } from './styles.ts';
import { InputParser, DEFAULT_ESCAPE_TIMEOUT, type KeyEvent } from './input.ts';
import { TerminalIoError } from './errors.ts';
import { debugLog } from '../debug.ts';

// ============================================
// Types
// ============================================

export interface Size {
  width: number;
  height: number;
}

export type TerminalEvent =
  | { type: 'key'; key: KeyEvent }
  | { type: 'resize'; width: number; height: number };

export interface TerminalIO {
  /** Enter raw input mode and the alternate screen. */
  enter(): void;
  /** Restore the terminal. Safe to call more than once. */
  leave(): void;
  /** Resolve with the next input event. Rejects with TerminalIoError. */
  readEvent(): Promise<TerminalEvent>;
  /** Move the cursor to a 0-indexed column and row. */
  moveTo(x: number, y: number): void;
  /** Write text at the cursor. */
  write(text: string, style?: StyleOptions): void;
  setCursorShape(shape: CursorShape): void;
  size(): Size;
  clear(): void;
  /** Send everything written since the last flush. */
  flush(): void;
}

export const FALLBACK_SIZE: Readonly<Size> = { width: 80, height: 24 };

export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput extends NodeJS.WritableStream {
  columns?: number;
  rows?: number;
}

export interface NodeTerminalOptions {
  input?: TerminalInput;
  output?: TerminalOutput;
  /** ms to wait before treating a lone ESC as the Escape key */
  escapeTimeout?: number;
}

type StreamListener = Parameters<NodeJS.EventEmitter['on']>[1];

interface PendingRead {
  resolve: (event: TerminalEvent) => void;
  reject: (error: TerminalIoError) => void;
}

// ============================================
// NodeTerminal Class
// ============================================

export class NodeTerminal implements TerminalIO {
  private readonly input: TerminalInput;
  private readonly output: TerminalOutput;
  private readonly parser: InputParser;
  private queue: TerminalEvent[] = [];
  private waiting: PendingRead | null = null;
  private failure: TerminalIoError | null = null;
  private pendingOutput = '';
  private active = false;
  private detachers: Array<() => void> = [];

  constructor(options: NodeTerminalOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.parser = new InputParser(options.escapeTimeout ?? DEFAULT_ESCAPE_TIMEOUT);
    this.parser.onKey((key) => this.push({ type: 'key', key }));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  enter(): void {
    if (this.active) return;

    if (this.input.isTTY && this.input.setRawMode) {
      try {
        this.input.setRawMode(true);
      } catch (error) {
        throw new TerminalIoError('mode', `Failed to enable raw mode: ${error}`, { cause: error });
      }
    }

    this.listen(this.input, 'data', (chunk: Buffer | string) => {
      this.parser.feed(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    });
    this.listen(this.input, 'end', () => this.fail(new TerminalIoError('read', 'Input stream ended')));
    this.listen(this.input, 'error', (error: Error) => {
      this.fail(new TerminalIoError('read', `Input stream error: ${error.message}`, { cause: error }));
    });
    this.listen(this.output, 'error', (error: Error) => {
      this.fail(new TerminalIoError('write', `Output stream error: ${error.message}`, { cause: error }));
    });
    this.listen(this.output, 'resize', () => {
      const { width, height } = this.size();
      this.push({ type: 'resize', width, height });
    });

    this.input.setEncoding('utf8');
    this.input.resume();
    this.active = true;

    this.send(SCREEN.enterAlt + SCREEN.clear + SCREEN.home);
    debugLog('[Terminal] Entered raw mode and alternate screen');
  }

  leave(): void {
    if (!this.active) return;
    this.active = false;

    for (const detach of this.detachers) {
      detach();
    }
    this.detachers = [];
    this.parser.dispose();
    this.pendingOutput = '';

    try {
      this.output.write(CURSOR.shape.default + CURSOR.show + resetColor() + SCREEN.exitAlt);
    } catch (error) {
      debugLog(`[Terminal] Failed to restore screen: ${error}`);
    }

    if (this.input.isTTY && this.input.setRawMode) {
      try {
        this.input.setRawMode(false);
      } catch (error) {
        debugLog(`[Terminal] Failed to disable raw mode: ${error}`);
      }
    }
    this.input.pause();

    this.fail(new TerminalIoError('read', 'Terminal closed'));
    debugLog('[Terminal] Restored terminal');
  }

  isActive(): boolean {
    return this.active;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input
  // ─────────────────────────────────────────────────────────────────────────

  readEvent(): Promise<TerminalEvent> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.waiting) {
      return Promise.reject(new TerminalIoError('read', 'A read is already pending'));
    }
    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  private push(event: TerminalEvent): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting.resolve(event);
    } else {
      this.queue.push(event);
    }
  }

  private fail(error: TerminalIoError): void {
    if (!this.failure) {
      this.failure = error;
    }
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting.reject(this.failure);
    }
  }

  private listen(emitter: NodeJS.EventEmitter, event: string, handler: StreamListener): void {
    emitter.on(event, handler);
    this.detachers.push(() => emitter.off(event, handler));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Output
  // ─────────────────────────────────────────────────────────────────────────

  moveTo(x: number, y: number): void {
    this.pendingOutput += cursorTo(x, y);
  }

  write(text: string, style?: StyleOptions): void {
    this.pendingOutput += style ? styled(text, style) : text;
  }

  setCursorShape(shape: CursorShape): void {
    this.pendingOutput += cursorShape(shape);
  }

  clear(): void {
    this.pendingOutput += SCREEN.clear;
  }

  flush(): void {
    if (!this.pendingOutput) return;
    const data = this.pendingOutput;
    this.pendingOutput = '';
    this.send(data);
  }

  size(): Size {
    const width = this.output.columns;
    const height = this.output.rows;
    if (!width || !height) {
      return { ...FALLBACK_SIZE };
    }
    return { width, height };
  }

  private send(data: string): void {
    if (this.failure?.operation === 'write') {
      throw this.failure;
    }
    try {
      this.output.write(data);
    } catch (error) {
      const failure = new TerminalIoError('write', `Failed to write output: ${error}`, { cause: error });
      this.fail(failure);
      throw failure;
    }
  }
}

// ============================================
// Scoped Acquisition
// ============================================

/**
 * Run `body` with the terminal in raw mode and the alternate screen,
 * restoring it however `body` ends, including when `enter()` itself fails
 * part way through.
 */
export async function withTerminal<T>(terminal: TerminalIO, body: () => Promise<T>): Promise<T> {
  try {
    terminal.enter();
    return await body();
  } finally {
    terminal.leave();
  }
}
