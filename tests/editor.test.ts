import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { byteOffset } from '../core/buffer/byte-offset';
import { pos } from '../core/cursor/position';
import { type Selection, createCursor } from '../core/cursor/selection';
import { Editor } from '../core/document/editor';
import { ConfigError, FileAccessError, InvariantError } from '../core/errors';
import { logger } from '../core/logger';

function sel(anchor: [number, number], cursor: [number, number]): Selection {
  return { anchor: pos(...anchor), cursor: pos(...cursor) };
}

function cursorAt(row: number, col: number): Selection {
  return createCursor(pos(row, col));
}

function editorWith(text: string, selections: Selection[] = [cursorAt(0, 0)]): Editor {
  const editor = new Editor();
  editor.insertTextAtCursors(text);
  editor.setSelections(selections);
  return editor;
}

const DIGITS = '012\n456\n890\n';

describe('Editor', () => {
  describe('construction', () => {
    test('starts empty with one cursor', () => {
      const editor = new Editor();
      expect(editor.getAllText()).toBe('');
      expect(editor.lineCount()).toBe(1);
      expect(editor.selections).toEqual([cursorAt(0, 0)]);
      expect(editor.tokens).toEqual([{ pos: { row: 0, col: 0 }, kind: 'Text', text: '' }]);
      expect(editor.filename).toBe('');
      expect(editor.languageId).toBe('plaintext');
    });

    test('invalid configuration is rejected', () => {
      expect(() => new Editor({ formatters: { '.ts': { command: 'fmt' } } })).toThrow(ConfigError);
    });

    test('a configured log level stays with its editor', () => {
      const plain = new Editor();
      const configured = new Editor({ logLevel: 'error' });
      expect(configured.logger.level).toBe('error');
      expect(configured.logger).not.toBe(logger);
      expect(plain.logger).toBe(logger);
      expect(logger.level).not.toBe('error');
    });
  });

  describe('queries', () => {
    test('getLine includes the trailing newline', () => {
      const editor = editorWith('012\n345\n456\n\n');
      expect(editor.lineCount()).toBe(5);
      expect(editor.getLine(0)).toBe('012\n');
      expect(editor.getLine(3)).toBe('\n');
      expect(editor.getLine(4)).toBe('');
    });

    test('getLine out of range throws', () => {
      expect(() => editorWith('a').getLine(1)).toThrow(InvariantError);
    });

    test('coordinate conversion', () => {
      const editor = editorWith(DIGITS);
      expect(editor.toPos(byteOffset(12))).toEqual(pos(3, 0));
      expect(editor.toPos(byteOffset(5))).toEqual(pos(1, 1));
      expect(editor.toIndexPos(pos(2, 1))).toBe(9);
    });

    test('selections are copies', () => {
      const editor = editorWith(DIGITS, [cursorAt(1, 1)]);
      editor.selections[0].cursor.col = 3;
      editor.getPrimarySelection().anchor.row = 2;
      expect(editor.selections).toEqual([cursorAt(1, 1)]);
    });

    test('getSelectionsText returns each selection in set order', () => {
      const editor = editorWith('hello world', [sel([0, 11], [0, 6]), sel([0, 0], [0, 5])]);
      expect(editor.getSelectionsText()).toEqual(['world', 'hello']);
    });

    test('getSelectionsText handles multi-byte text', () => {
      const editor = editorWith('héllo', [sel([0, 1], [0, 3])]);
      expect(editor.getSelectionsText()).toEqual(['é']);
    });
  });

  describe('appendSelection', () => {
    test('selections touching at the cursor merge on append', () => {
      const editor = editorWith(DIGITS, [sel([0, 2], [0, 3])]);
      editor.appendSelection(sel([1, 0], [0, 3]));
      expect(editor.selections).toEqual([sel([0, 2], [1, 0])]);
    });

    test('a separate selection is added after the others', () => {
      const editor = editorWith(DIGITS, [cursorAt(1, 1)]);
      editor.appendSelection(sel([0, 0], [0, 2]));
      expect(editor.selections).toEqual([cursorAt(1, 1), sel([0, 0], [0, 2])]);
      expect(editor.getPrimarySelection()).toEqual(cursorAt(1, 1));
    });
  });

  describe('insertTextAtCursors', () => {
    test('advances a single cursor', () => {
      const editor = new Editor();
      editor.insertTextAtCursors('hello');
      expect(editor.getAllText()).toBe('hello');
      expect(editor.selections).toEqual([cursorAt(0, 5)]);
    });

    test('shifts cursors that lie after the insertion', () => {
      const editor = new Editor();
      editor.insertTextAtCursors('hello');
      editor.appendSelection(cursorAt(0, 0));
      editor.insertTextAtCursors(', world!');
      expect(editor.getAllText()).toBe(', world!hello, world!');
      expect(editor.selections).toEqual([cursorAt(0, 21), cursorAt(0, 8)]);

      editor.appendSelection(sel([0, 12], [0, 15]));
      editor.appendSelection(sel([0, 19], [0, 17]));
      editor.insertTextAtCursors('abc');
      expect(editor.getAllText()).toBe(', world!abchello, abcwoabcrld!abc');
      expect(editor.selections).toEqual([
        cursorAt(0, 33),
        cursorAt(0, 11),
        sel([0, 15], [0, 21]),
        sel([0, 28], [0, 26]),
      ]);
    });

    test('each newline moves the cursor one row down', () => {
      const editor = new Editor();
      editor.insertTextAtCursors('\n');
      expect(editor.selections).toEqual([cursorAt(1, 0)]);
      editor.insertTextAtCursors('\n');
      expect(editor.selections).toEqual([cursorAt(2, 0)]);
      editor.insertTextAtCursors('a\n');
      expect(editor.selections).toEqual([cursorAt(3, 0)]);
      editor.insertTextAtCursors('\n\n\n');
      expect(editor.selections).toEqual([cursorAt(6, 0)]);
      expect(editor.getAllText()).toBe('\n\na\n\n\n\n');
      expect(editor.lineCount()).toBe(7);
    });

    test('later rows take the column shift too', () => {
      const editor = editorWith('a\nb', [cursorAt(0, 0), cursorAt(1, 0)]);
      editor.insertTextAtCursors('x');
      expect(editor.getAllText()).toBe('xa\nbx');
      expect(editor.selections).toEqual([cursorAt(0, 1), cursorAt(1, 2)]);
    });

    test('a newline sends later cursors to the inserted line end', () => {
      const editor = editorWith('ab cd', [cursorAt(0, 1), cursorAt(0, 4)]);
      editor.insertTextAtCursors('\n');
      expect(editor.getAllText()).toBe('a\n\nb cd');
      expect(editor.selections).toEqual([cursorAt(1, 0), cursorAt(2, 0)]);
    });

    test('multi-line text sets later columns to its last line length', () => {
      const editor = editorWith('ab cd', [cursorAt(0, 1), cursorAt(0, 4)]);
      editor.insertTextAtCursors('X\nY');
      expect(editor.getAllText()).toBe('aX\nYX\nYb cd');
      expect(editor.selections).toEqual([cursorAt(1, 1), cursorAt(2, 1)]);
    });

    test('backward selection shifts both edges', () => {
      const editor = editorWith('abcd', [sel([0, 3], [0, 1])]);
      editor.insertTextAtCursors('Z');
      expect(editor.getAllText()).toBe('aZbcd');
      expect(editor.selections).toEqual([sel([0, 4], [0, 2])]);
    });

    test('forward selection grows to cover the insertion', () => {
      const editor = editorWith('abcd', [sel([0, 1], [0, 3])]);
      editor.insertTextAtCursors('ZZ');
      expect(editor.getAllText()).toBe('abcZZd');
      expect(editor.selections).toEqual([sel([0, 1], [0, 5])]);
    });

    test('a virtual column inserts at the end of the buffer', () => {
      const editor = editorWith('abc', [cursorAt(0, 4)]);
      editor.insertTextAtCursors('!');
      expect(editor.getAllText()).toBe('abc!');
    });

    test('empty text changes nothing', () => {
      const editor = editorWith('abc', [cursorAt(0, 1)]);
      editor.insertTextAtCursors('');
      expect(editor.getAllText()).toBe('abc');
      expect(editor.selections).toEqual([cursorAt(0, 1)]);
    });

    test('rebuilds the line index and tokens', () => {
      const editor = editorWith('a\nb');
      expect(editor.lineCount()).toBe(2);
      expect(editor.tokens).toEqual([{ pos: { row: 0, col: 0 }, kind: 'Text', text: 'a\nb' }]);
    });
  });

  describe('deleteCharacterBeforeCursors', () => {
    test('cursor at the start of the buffer is a no-op', () => {
      const editor = editorWith(DIGITS, [cursorAt(0, 0)]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe(DIGITS);
      expect(editor.selections).toEqual([cursorAt(0, 0)]);
    });

    test('cursor at the end removes the last newline', () => {
      const editor = editorWith(DIGITS, [cursorAt(3, 0)]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('012\n456\n890');
      expect(editor.selections).toEqual([cursorAt(2, 3)]);
      expect(editor.lineCount()).toBe(3);
    });

    test('deletes the byte before a cursor', () => {
      const editor = editorWith(DIGITS, [cursorAt(0, 1)]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('12\n456\n890\n');
      expect(editor.selections).toEqual([cursorAt(0, 0)]);
    });

    test('two cursors each move back by what was removed before them', () => {
      const editor = editorWith(DIGITS, [cursorAt(0, 3), cursorAt(2, 0)]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('01\n456890\n');
      expect(editor.selections).toEqual([cursorAt(0, 2), cursorAt(1, 3)]);
    });

    test('adjacent cursors collapse into one', () => {
      const editor = editorWith(DIGITS, [cursorAt(0, 1), cursorAt(0, 2)]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('2\n456\n890\n');
      expect(editor.selections).toEqual([cursorAt(0, 0)]);
    });

    test('repeated deletes at the start of the buffer', () => {
      const editor = editorWith(DIGITS, [cursorAt(0, 1), cursorAt(0, 3)]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('1\n456\n890\n');
      expect(editor.selections).toEqual([cursorAt(0, 0), cursorAt(0, 1)]);

      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('\n456\n890\n');
      expect(editor.selections).toEqual([cursorAt(0, 0)]);
    });

    test('keeps set order, whatever the file order', () => {
      const editor = editorWith(DIGITS, [cursorAt(1, 2), cursorAt(0, 3), cursorAt(0, 2)]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('0\n46\n890\n');
      expect(editor.selections).toEqual([cursorAt(1, 1), cursorAt(0, 1)]);
    });

    test('forward selection shrinks from its cursor', () => {
      const editor = editorWith(DIGITS, [sel([0, 2], [1, 3])]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('012\n45\n890\n');
      expect(editor.selections).toEqual([sel([0, 2], [1, 2])]);
    });

    test('one-byte selection collapses to a cursor', () => {
      const editor = editorWith(DIGITS, [sel([0, 2], [0, 3])]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('01\n456\n890\n');
      expect(editor.selections).toEqual([cursorAt(0, 2)]);
    });

    test('several selections on separate rows', () => {
      const editor = editorWith(DIGITS, [sel([0, 2], [0, 3]), sel([1, 1], [1, 3]), sel([2, 0], [2, 1])]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('01\n45\n90\n');
      expect(editor.selections).toEqual([cursorAt(0, 2), sel([1, 1], [1, 2]), cursorAt(2, 0)]);
    });

    test('cursors on the same byte delete once', () => {
      const editor = editorWith('abc', [cursorAt(0, 3), cursorAt(0, 4)]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('ab');
      expect(editor.selections).toEqual([cursorAt(0, 2)]);
    });

    test('touching selections left after a delete are not merged', () => {
      const editor = editorWith('0123', [sel([0, 0], [0, 2]), cursorAt(0, 3)]);
      editor.deleteCharacterBeforeCursors();
      expect(editor.getAllText()).toBe('03');
      expect(editor.selections).toEqual([sel([0, 0], [0, 1]), cursorAt(0, 1)]);
    });
  });

  describe('deleteToStartOfLine', () => {
    test('deletes back to the row start', () => {
      const editor = editorWith(DIGITS, [cursorAt(1, 2)]);
      editor.deleteToStartOfLine();
      expect(editor.getAllText()).toBe('012\n6\n890\n');
      expect(editor.selections).toEqual([cursorAt(1, 0)]);
    });

    test('at a row start deletes the newline before it', () => {
      const editor = editorWith(DIGITS, [cursorAt(1, 0)]);
      editor.deleteToStartOfLine();
      expect(editor.getAllText()).toBe('012456\n890\n');
      expect(editor.selections).toEqual([cursorAt(0, 3)]);
    });

    test('at the start of the buffer is a no-op', () => {
      const editor = editorWith(DIGITS, [cursorAt(0, 0)]);
      editor.deleteToStartOfLine();
      expect(editor.getAllText()).toBe(DIGITS);
      expect(editor.selections).toEqual([cursorAt(0, 0)]);
    });

    test('cursors on different rows', () => {
      const editor = editorWith(DIGITS, [cursorAt(0, 2), cursorAt(2, 1)]);
      editor.deleteToStartOfLine();
      expect(editor.getAllText()).toBe('2\n456\n90\n');
      expect(editor.selections).toEqual([cursorAt(0, 0), cursorAt(2, 0)]);
    });

    test('cursors on the same row become one', () => {
      const editor = editorWith(DIGITS, [cursorAt(1, 1), cursorAt(1, 3)]);
      editor.deleteToStartOfLine();
      expect(editor.getAllText()).toBe('012\n\n890\n');
      expect(editor.selections).toEqual([cursorAt(1, 0)]);
    });

    test('a selection collapses to its cursor', () => {
      const editor = editorWith(DIGITS, [sel([0, 0], [1, 2])]);
      editor.deleteToStartOfLine();
      expect(editor.getAllText()).toBe('012\n6\n890\n');
      expect(editor.selections).toEqual([cursorAt(1, 0)]);
    });

    test('a virtual column stops at the row end', () => {
      const editor = editorWith('ab\ncd', [cursorAt(0, 7)]);
      editor.deleteToStartOfLine();
      expect(editor.getAllText()).toBe('\ncd');
      expect(editor.selections).toEqual([cursorAt(0, 0)]);
    });
  });

  describe('word selection', () => {
    // columns:    0123456789012
    const WORDS = 'foo bar   baz';

    test.each([
      ['at the start of a word', 4, sel([0, 4], [0, 7])],
      ['inside a word', 5, sel([0, 5], [0, 7])],
      ['at the end of a word', 3, sel([0, 4], [0, 7])],
      ['at the end of a word before long whitespace', 7, sel([0, 10], [0, 13])],
      ['in whitespace right before a word', 9, sel([0, 10], [0, 13])],
      ['in long whitespace', 8, sel([0, 8], [0, 10])],
    ])('selectNextWord %s', (_name, col, expected) => {
      const editor = editorWith(WORDS, [cursorAt(0, col)]);
      editor.selectNextWord();
      expect(editor.selections).toEqual([expected]);
    });

    test('selectNextWord at the row end keeps the cursor', () => {
      const editor = editorWith(WORDS, [cursorAt(0, 13)]);
      editor.selectNextWord();
      expect(editor.selections).toEqual([cursorAt(0, 13)]);
    });

    test('selectNextWord over trailing whitespace selects it', () => {
      const editor = editorWith('end  \nnext', [cursorAt(0, 4)]);
      editor.selectNextWord();
      expect(editor.selections).toEqual([sel([0, 4], [0, 5])]);
    });

    test('selectNextWord stops at punctuation', () => {
      const editor = editorWith('foo.bar', [cursorAt(0, 0)]);
      editor.selectNextWord();
      expect(editor.getSelectionsText()).toEqual(['foo']);
    });

    test.each([
      ['at the start of a word', 4, sel([0, 4], [0, 0])],
      ['inside a word', 6, sel([0, 6], [0, 4])],
      ['in whitespace after a word', 9, sel([0, 9], [0, 4])],
      ['at the end of the row', 13, sel([0, 13], [0, 10])],
    ])('selectPreviousWord %s', (_name, col, expected) => {
      const editor = editorWith(WORDS, [cursorAt(0, col)]);
      editor.selectPreviousWord();
      expect(editor.selections).toEqual([expected]);
    });

    test('selectPreviousWord at column 0 keeps the cursor', () => {
      const editor = editorWith(WORDS, [cursorAt(0, 0)]);
      editor.selectPreviousWord();
      expect(editor.selections).toEqual([cursorAt(0, 0)]);
    });

    test('applies at every cursor and merges what overlaps', () => {
      const editor = editorWith('alpha beta\ngamma', [cursorAt(1, 0), cursorAt(0, 6), cursorAt(0, 8)]);
      editor.selectNextWord();
      expect(editor.selections).toEqual([sel([1, 0], [1, 5]), sel([0, 6], [0, 10])]);
      expect(editor.getSelectionsText()).toEqual(['gamma', 'beta']);
    });
  });

  describe('movement', () => {
    test('moves every cursor', () => {
      const editor = editorWith(DIGITS, [cursorAt(0, 1), cursorAt(1, 1)]);
      editor.moveRight();
      expect(editor.selections).toEqual([cursorAt(0, 2), cursorAt(1, 2)]);
      editor.moveDown();
      expect(editor.selections).toEqual([cursorAt(1, 2), cursorAt(2, 2)]);
      editor.moveLeft();
      editor.moveUp();
      expect(editor.selections).toEqual([cursorAt(0, 1), cursorAt(1, 1)]);
    });

    test('line start and end', () => {
      const editor = editorWith(DIGITS, [cursorAt(1, 1)]);
      editor.moveToEndOfLine();
      expect(editor.selections).toEqual([cursorAt(1, 3)]);
      editor.moveToStartOfLine();
      expect(editor.selections).toEqual([cursorAt(1, 0)]);
    });

    test('right reaches the last empty row', () => {
      const editor = editorWith(DIGITS, [cursorAt(2, 3)]);
      editor.moveRight();
      expect(editor.selections).toEqual([cursorAt(3, 0)]);
      editor.moveRight();
      expect(editor.selections).toEqual([cursorAt(3, 1)]);
    });

    test('flips selections around their anchor', () => {
      const editor = editorWith(DIGITS, [sel([0, 0], [0, 2])]);
      editor.moveCursorBeforeAnchor();
      expect(editor.selections).toEqual([sel([0, 2], [0, 0])]);
      editor.moveCursorAfterAnchor();
      expect(editor.selections).toEqual([sel([0, 0], [0, 2])]);
    });

    test('colliding cursors stay separate', () => {
      const editor = editorWith(DIGITS, [cursorAt(1, 0), cursorAt(0, 3)]);
      editor.moveLeft();
      expect(editor.selections).toEqual([cursorAt(0, 3), cursorAt(0, 2)]);
      editor.moveToStartOfLine();
      expect(editor.selections).toEqual([cursorAt(0, 0), cursorAt(0, 0)]);
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'editor-test-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test('open, edit and save', () => {
      const path = join(dir, 'main.ts');
      writeFileSync(path, 'one\ntwo\n');

      const editor = new Editor();
      editor.openFile(path);
      expect(editor.getAllText()).toBe('one\ntwo\n');
      expect(editor.lineCount()).toBe(3);
      expect(editor.filename).toBe(path);
      expect(editor.languageId).toBe('typescript');
      expect(editor.selections).toEqual([cursorAt(0, 0)]);

      editor.insertTextAtCursors('// ');
      editor.saveFile();
      expect(readFileSync(path, 'utf-8')).toBe('// one\ntwo\n');
    });

    test('opening resets the selections', () => {
      const path = join(dir, 'notes.txt');
      writeFileSync(path, 'x');
      const editor = editorWith(DIGITS, [cursorAt(2, 1), cursorAt(1, 1)]);
      editor.openFile(path);
      expect(editor.selections).toEqual([cursorAt(0, 0)]);
    });

    test('a failed open leaves the editor untouched', () => {
      const editor = editorWith('keep me');
      expect(() => editor.openFile(join(dir, 'missing.txt'))).toThrow(FileAccessError);
      expect(editor.getAllText()).toBe('keep me');
      expect(editor.filename).toBe('');
    });

    test('an empty path opens a scratch buffer', () => {
      const path = join(dir, 'a.txt');
      writeFileSync(path, 'abc\n');
      const editor = new Editor();
      editor.openFile(path);
      editor.openFile('');
      expect(editor.getAllText()).toBe('');
      expect(editor.lineCount()).toBe(1);
      expect(editor.filename).toBe('');
      expect(editor.languageId).toBe('plaintext');
    });

    test('saving without a file does nothing', () => {
      const editor = editorWith('unsaved');
      expect(() => editor.saveFile()).not.toThrow();
    });

    test('a failed save reports the path', () => {
      const sub = join(dir, 'sub');
      mkdirSync(sub);
      const path = join(sub, 'gone.txt');
      writeFileSync(path, 'data');

      const editor = new Editor();
      editor.openFile(path);
      rmSync(sub, { recursive: true });

      try {
        editor.saveFile();
        expect.unreachable('saveFile should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(FileAccessError);
        if (err instanceof FileAccessError) {
          expect(err.path).toBe(path);
          expect(err.operation).toBe('write');
        }
      }
    });

    test('syntax tokenizing follows the file language', () => {
      const path = join(dir, 'main.ts');
      writeFileSync(path, 'let x = 1;');
      const editor = new Editor({ syntaxTokenizing: true });
      editor.openFile(path);
      expect(editor.tokens[0]).toEqual({ pos: { row: 0, col: 0 }, kind: 'Keyword', text: 'let' });
      expect(editor.tokens.map((t) => t.text).join('')).toBe('let x = 1;');
    });

    test('plain tokenizing by default', () => {
      const path = join(dir, 'main.ts');
      writeFileSync(path, 'let x = 1;');
      const editor = new Editor();
      editor.openFile(path);
      expect(editor.tokens).toEqual([{ pos: { row: 0, col: 0 }, kind: 'Text', text: 'let x = 1;' }]);
    });
  });
});
