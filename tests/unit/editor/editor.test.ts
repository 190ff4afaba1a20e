/**
 * Editor Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { Editor } from '../../../src/editor/editor.ts';
import { TextBuffer } from '../../../src/core/text-buffer.ts';
import { Settings } from '../../../src/config/settings.ts';
import { TerminalIoError } from '../../../src/terminal/errors.ts';
import type { Action } from '../../../src/editor/types.ts';
import { FakeTerminal, char, key, resize } from '../../helpers/fake-terminal.ts';

// ============================================
// Test Setup
// ============================================

function createEditor(content?: string, settings?: Settings): { editor: Editor; terminal: FakeTerminal } {
  const terminal = new FakeTerminal();
  const editor = new Editor({
    terminal,
    settings,
    buffer: content === undefined ? undefined : new TextBuffer(content),
  });
  return { editor, terminal };
}

function applyAll(editor: Editor, actions: Action[]): void {
  for (const action of actions) {
    editor.apply(action);
  }
}

const typeText = (text: string): Action[] =>
  Array.from(text, (c): Action => ({ type: 'addChar', char: c }));

// ============================================
// Tests
// ============================================

describe('Editor', () => {
  let editor: Editor;

  beforeEach(() => {
    ({ editor } = createEditor());
  });

  test('starts in normal mode at the origin of one empty line', () => {
    expect(editor.getMode()).toBe('normal');
    expect(editor.getCursor()).toEqual({ cx: 0, cy: 0 });
    expect(editor.getBuffer().lineCount()).toBe(1);
    expect(editor.getSize()).toEqual({ width: 40, height: 10 });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Typing
  // ─────────────────────────────────────────────────────────────────────────

  describe('typing', () => {
    beforeEach(() => {
      applyAll(editor, [{ type: 'modeToInsert' }, ...typeText('hi')]);
    });

    test('adds characters and advances the cursor', () => {
      expect(editor.getMode()).toBe('insert');
      expect(editor.getBuffer().getLine(0)).toEqual(['h', 'i']);
      expect(editor.getCursor()).toEqual({ cx: 2, cy: 0 });
    });

    test('newLine moves to the start of the next row without touching this one', () => {
      editor.apply({ type: 'newLine' });
      expect(editor.getCursor()).toEqual({ cx: 0, cy: 1 });
      expect(editor.getBuffer().lineCount()).toBe(2);
      expect(editor.getBuffer().lineLength(1)).toBe(0);
      expect(editor.getBuffer().lineText(0)).toBe('hi');
    });

    test('backspace at column 0 moves up without joining rows', () => {
      editor.apply({ type: 'newLine' });
      editor.apply({ type: 'backspace' });
      expect(editor.getCursor()).toEqual({ cx: 0, cy: 0 });
      expect(editor.getBuffer().toString()).toBe('hi\n');
    });

    test('backspace removes the character before the cursor', () => {
      editor.apply({ type: 'backspace' });
      expect(editor.getBuffer().lineText(0)).toBe('h');
      expect(editor.getCursor()).toEqual({ cx: 1, cy: 0 });
    });

    test('backspace at the origin stays put', () => {
      applyAll(editor, [{ type: 'backspace' }, { type: 'backspace' }, { type: 'backspace' }]);
      expect(editor.getCursor()).toEqual({ cx: 0, cy: 0 });
      expect(editor.getBuffer().lineLength(0)).toBe(0);
    });

    test('tab stores a single tab slot', () => {
      editor.apply({ type: 'tab' });
      expect(editor.getBuffer().getLine(0)).toEqual(['h', 'i', '\t']);
      expect(editor.getCursor()).toEqual({ cx: 3, cy: 0 });
    });

    test('deleteChar past the end of the line changes nothing', () => {
      editor.apply({ type: 'deleteChar' });
      expect(editor.getBuffer().toString()).toBe('hi');
      expect(editor.getCursor()).toEqual({ cx: 2, cy: 0 });
    });

    test('mode switches have no other effect', () => {
      editor.apply({ type: 'modeToNormal' });
      expect(editor.getMode()).toBe('normal');
      expect(editor.getCursor()).toEqual({ cx: 2, cy: 0 });
      expect(editor.getBuffer().toString()).toBe('hi');
    });
  });

  test('newLine in the middle of a row does not split it', () => {
    ({ editor } = createEditor('abc'));
    applyAll(editor, [{ type: 'moveRight' }, { type: 'newLine' }]);
    expect(editor.getCursor()).toEqual({ cx: 0, cy: 1 });
    expect(editor.getBuffer().toString()).toBe('abc\n');
  });

  test('newLine onto an existing row reuses it', () => {
    ({ editor } = createEditor('a\nb'));
    editor.apply({ type: 'newLine' });
    expect(editor.getCursor()).toEqual({ cx: 0, cy: 1 });
    expect(editor.getBuffer().toString()).toBe('a\nb');
  });

  test('deleteChar removes the character under the cursor', () => {
    ({ editor } = createEditor('abc'));
    applyAll(editor, [{ type: 'moveRight' }, { type: 'deleteChar' }]);
    expect(editor.getBuffer().lineText(0)).toBe('ac');
    expect(editor.getCursor()).toEqual({ cx: 1, cy: 0 });
  });

  test('deleteChar on a row far past the content is a no-op', () => {
    ({ editor } = createEditor('abc'));
    applyAll(editor, [{ type: 'newLine' }, { type: 'newLine' }, { type: 'deleteChar' }]);
    expect(editor.getBuffer().toString()).toBe('abc\n\n');
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Navigation
  // ─────────────────────────────────────────────────────────────────────────

  describe('navigation', () => {
    test('moveRight stops on the last character', () => {
      ({ editor } = createEditor('abc'));
      editor.apply({ type: 'moveRight' });
      editor.apply({ type: 'moveRight' });
      expect(editor.getCursor().cx).toBe(2);
      for (let i = 0; i < 5; i++) {
        editor.apply({ type: 'moveRight' });
        expect(editor.getCursor().cx).toBe(2);
      }
    });

    test('moveRight on an empty row does nothing', () => {
      editor.apply({ type: 'moveRight' });
      expect(editor.getCursor()).toEqual({ cx: 0, cy: 0 });
    });

    test('moveLeft saturates at column 0', () => {
      ({ editor } = createEditor('abc'));
      applyAll(editor, [{ type: 'moveRight' }, { type: 'moveRight' }]);
      applyAll(editor, [{ type: 'moveLeft' }, { type: 'moveLeft' }, { type: 'moveLeft' }]);
      expect(editor.getCursor()).toEqual({ cx: 0, cy: 0 });
    });

    test('moveDown jumps to the end of the next row', () => {
      ({ editor } = createEditor('ab\nwxyz'));
      editor.apply({ type: 'moveDown' });
      expect(editor.getCursor()).toEqual({ cx: 4, cy: 1 });
    });

    test('moveDown on the last row does nothing', () => {
      ({ editor } = createEditor('ab\nwxyz'));
      applyAll(editor, [{ type: 'moveDown' }, { type: 'moveDown' }]);
      expect(editor.getCursor()).toEqual({ cx: 4, cy: 1 });
    });

    test('moveUp clamps the column to the shorter row', () => {
      ({ editor } = createEditor('ab\nwxyz'));
      applyAll(editor, [{ type: 'moveDown' }, { type: 'moveUp' }]);
      expect(editor.getCursor()).toEqual({ cx: 2, cy: 0 });
    });

    test('moveUp keeps the column when the row above is long enough', () => {
      ({ editor } = createEditor('abcdef\nxy'));
      applyAll(editor, [{ type: 'moveDown' }, { type: 'moveUp' }]);
      expect(editor.getCursor()).toEqual({ cx: 2, cy: 0 });
    });

    test('moveUp on the first row keeps the row', () => {
      ({ editor } = createEditor('abc'));
      applyAll(editor, [{ type: 'moveRight' }, { type: 'moveUp' }]);
      expect(editor.getCursor()).toEqual({ cx: 1, cy: 0 });
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Events
  // ─────────────────────────────────────────────────────────────────────────

  describe('handleEvent', () => {
    test('translates keys under the current mode', () => {
      expect(editor.handleEvent(char('i'))).toEqual({ type: 'modeToInsert' });
      editor.apply({ type: 'modeToInsert' });
      expect(editor.handleEvent(char('i'))).toEqual({ type: 'addChar', char: 'i' });
    });

    test('resize updates the cached size and yields no action', () => {
      expect(editor.handleEvent(resize(100, 30))).toBeNull();
      expect(editor.getSize()).toEqual({ width: 100, height: 30 });
    });

    test('honours editor.modeSwitchRequiresAlt', () => {
      const settings = new Settings({ 'editor.modeSwitchRequiresAlt': true });
      ({ editor } = createEditor(undefined, settings));
      expect(editor.handleEvent(char('i'))).toBeNull();
      expect(editor.handleEvent(char('i', { alt: true }))).toEqual({ type: 'modeToInsert' });
    });

    test('exit ends the session', () => {
      expect(editor.apply({ type: 'exit' })).toBe(false);
      expect(editor.isRunning()).toBe(false);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Main Loop
  // ─────────────────────────────────────────────────────────────────────────

  describe('run', () => {
    test('processes events until q and repaints after each action', async () => {
      const terminal = new FakeTerminal([
        char('i'),
        char('h'),
        char('i'),
        key('ESCAPE'),
        char('x'),
        char('q'),
        char('z'),
      ]);
      const session = new Editor({ terminal });

      await session.run();

      expect(session.getBuffer().toString()).toBe('hi');
      expect(session.getCursor()).toEqual({ cx: 2, cy: 0 });
      expect(session.getMode()).toBe('normal');
      // initial draw + i, h, i, Escape; 'x' maps to nothing and q exits
      expect(terminal.calls.filter((call) => call.op === 'clear')).toHaveLength(5);
      expect(terminal.events).toEqual([char('z')]);
    });

    test('repaints on resize', async () => {
      const terminal = new FakeTerminal([resize(20, 5), char('q')]);
      const session = new Editor({ terminal });

      await session.run();

      expect(terminal.frameWrites()).toContainEqual({
        x: 0,
        y: 4,
        text: 'NORMAL [0, 0]'.padEnd(20),
      });
    });

    test('propagates terminal read failures', async () => {
      const terminal = new FakeTerminal([char('i')]);
      const session = new Editor({ terminal });

      await expect(session.run()).rejects.toBeInstanceOf(TerminalIoError);
      expect(session.getMode()).toBe('insert');
    });
  });
});
