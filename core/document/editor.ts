/**
 * Editor: a byte buffer with a line index, a set of non-overlapping
 * selections and the batch edits that apply at every cursor at once.
 *
 * Every public mutation runs to completion before returning: mutate the
 * buffer, rebuild the line index, re-tokenize, then update selections.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { type ByteOffset, byteOffset } from '../buffer/byte-offset';
import { toIndexPos, toPos } from '../buffer/coordinates';
import { LineIndex } from '../buffer/line-index';
import { TextBuffer, decodeText, encodeText } from '../buffer/text-buffer';
import { type EditorConfig, type EditorConfigInput, resolveConfig } from '../config';
import { CursorManager } from '../cursor/cursor-manager';
import { type WordSpan, nextWordSpan, previousWordSpan } from '../cursor/word-boundary';
import { type CoordinatePos, comesBefore } from '../cursor/position';
import {
  type Selection,
  createCursor,
  isCursor,
  selectionComesBefore,
  selectionEquals,
} from '../cursor/selection';
import { FileAccessError, FormatError, invariant } from '../errors';
import { type FormatResult, FormatterRegistry } from '../formatter/formatter';
import type { Logger } from 'winston';
import { editorLogger } from '../logger';
import { tokenizerForLanguage } from '../tokenizer/lezer-tokenizer';
import { PlainTextTokenizer, type Token, type Tokenizer } from '../tokenizer/token';
import { detectLanguage, fileExtension } from './language';

const NEWLINE = 0x0a;

/** Byte range [from, to) of the buffer. */
interface ByteSpan {
  from: number;
  to: number;
}

function copySelection(sel: Selection): Selection {
  return { anchor: { ...sel.anchor }, cursor: { ...sel.cursor } };
}

export class Editor {
  readonly config: EditorConfig;
  readonly formatters: FormatterRegistry;
  readonly logger: Logger;

  private buffer = new TextBuffer();
  private lines = new LineIndex();
  private cursors: CursorManager;
  private tokenizer: Tokenizer = new PlainTextTokenizer();
  private _tokens: Token[] = [];
  private _filename = '';
  private _languageId = 'plaintext';

  constructor(config: EditorConfigInput = {}) {
    this.config = resolveConfig(config);
    this.logger = editorLogger(this.config.logLevel);
    this.formatters = FormatterRegistry.fromConfig(this.config.formatters, this.logger);
    this.cursors = new CursorManager({
      lineCount: () => this.lineCount(),
      rowLength: (row) => this.rowLength(row),
    });
    this.refresh();
  }

  // ── File I/O ────────────────────────────────────────────────

  /**
   * Replace the buffer with the contents of `path`. An empty path resets to
   * an empty scratch buffer. On a read failure nothing changes.
   */
  openFile(path: string): void {
    if (path === '') {
      this.buffer.clear();
      this.setFilename('');
      this.cursors.reset({ row: 0, col: 0 });
      this.refresh();
      return;
    }

    let content: Uint8Array;
    try {
      content = readFileSync(path);
    } catch (err) {
      this.logger.warn(`failed to open ${path}`);
      throw new FileAccessError('read', path, err);
    }

    this.buffer.setBytes(content);
    this.setFilename(path);
    this.cursors.reset({ row: 0, col: 0 });
    this.refresh();
    this.logger.debug(`opened ${path} (${content.length} bytes, ${this.lineCount()} lines)`);
  }

  /** Write the buffer back to the file it was opened from. No-op without a file. */
  saveFile(): void {
    if (this._filename === '') return;
    try {
      writeFileSync(this._filename, this.buffer.bytes());
    } catch (err) {
      this.logger.warn(`failed to save ${this._filename}`);
      throw new FileAccessError('write', this._filename, err);
    }
    this.logger.debug(`saved ${this._filename} (${this.buffer.length} bytes)`);
  }

  get filename(): string {
    return this._filename;
  }

  get languageId(): string {
    return this._languageId;
  }

  // ── Queries ─────────────────────────────────────────────────

  /** Text of `row`, including its trailing newline if it has one. */
  getLine(row: number): string {
    invariant(row >= 0 && row < this.lines.lineCount, `Row ${row} out of range [0, ${this.lines.lineCount})`);
    const start = this.lines.getLineStart(row);
    const end = row + 1 < this.lines.lineCount ? this.lines.getLineStart(row + 1) : this.buffer.length;
    return decodeText(this.buffer.slice(start, end));
  }

  getAllText(): string {
    return this.buffer.getText();
  }

  lineCount(): number {
    return this.lines.lineCount;
  }

  /** Byte length of `row` without its newline. */
  rowLength(row: number): number {
    const start = this.lines.getLineStart(row);
    if (row + 1 < this.lines.lineCount) return this.lines.getLineStart(row + 1) - start - 1;
    return this.buffer.length - start;
  }

  getPrimarySelection(): Selection {
    return copySelection(this.cursors.primary);
  }

  get selections(): Selection[] {
    return this.cursors.selections.map(copySelection);
  }

  get tokens(): readonly Token[] {
    return this._tokens;
  }

  toPos(offset: ByteOffset): CoordinatePos {
    return toPos(this.lines, this.buffer.length, offset);
  }

  toIndexPos(p: CoordinatePos): ByteOffset {
    return toIndexPos(this.buffer.bytes(), p);
  }

  /** Text covered by each selection, in set order. Cursors give ''. */
  getSelectionsText(): string[] {
    const bytes = this.buffer.bytes();
    return this.cursors.selections.map((sel) => {
      const [from, to] = comesBefore(sel.cursor, sel.anchor) ? [sel.cursor, sel.anchor] : [sel.anchor, sel.cursor];
      return decodeText(this.buffer.slice(toIndexPos(bytes, from), toIndexPos(bytes, to)));
    });
  }

  // ── Selections ──────────────────────────────────────────────

  /** Add a selection, merging it with every selection it overlaps or touches. */
  appendSelection(selection: Selection): void {
    this.cursors.appendSelection(selection);
  }

  /** Replace the whole set. Overlapping input is merged as by `appendSelection`. */
  setSelections(selections: readonly Selection[]): void {
    this.cursors.replaceSelections(selections);
  }

  // ── Editing ─────────────────────────────────────────────────

  /**
   * Insert `text` at every cursor, in set order. After each insertion every
   * selection that comes after the inserting one moves down by the number of
   * inserted newlines. Its column becomes the length of the text's last line
   * when the text has a newline, otherwise it grows by the text's length.
   * The rule applies to whole rows, not only to the row of the insertion.
   * The inserting selection moves its cursor the same way. A backward
   * selection moves its anchor as well.
   */
  insertTextAtCursors(text: string): void {
    const inserted = encodeText(text);
    if (inserted.length === 0) return;

    let newlines = 0;
    let lastNewline = -1;
    for (let i = 0; i < inserted.length; i++) {
      if (inserted[i] === NEWLINE) {
        newlines++;
        lastNewline = i;
      }
    }
    const shift = (p: CoordinatePos): CoordinatePos => ({
      row: p.row + newlines,
      col: newlines > 0 ? inserted.length - lastNewline - 1 : p.col + inserted.length,
    });

    for (let i = 0; i < this.cursors.count; i++) {
      const sel = this.cursors.at(i);
      this.buffer.insert(toIndexPos(this.buffer.bytes(), sel.cursor), inserted);

      for (let j = 0; j < this.cursors.count; j++) {
        if (j === i) continue;
        const other = this.cursors.at(j);
        if (selectionEquals(sel, other)) continue;
        if (selectionComesBefore(sel, other)) {
          this.cursors.replaceAt(j, { anchor: shift(other.anchor), cursor: shift(other.cursor) });
        }
      }

      if (isCursor(sel)) {
        this.cursors.replaceAt(i, createCursor(shift(sel.cursor)));
      } else if (comesBefore(sel.cursor, sel.anchor)) {
        this.cursors.replaceAt(i, { anchor: shift(sel.anchor), cursor: shift(sel.cursor) });
      } else {
        this.cursors.replaceAt(i, { anchor: sel.anchor, cursor: shift(sel.cursor) });
      }
    }

    invariant(!this.cursors.hasOverlappingSelections(), 'Selections overlap after insert');
    this.refresh();
  }

  /**
   * Delete the byte before every cursor. Cursors sharing an offset delete
   * once. Each selection moves back by the number of bytes removed at or
   * before its cursor.
   */
  deleteCharacterBeforeCursors(): void {
    const oldBytes = this.buffer.slice(0, this.buffer.length);
    const sels = this.cursors.selections.map(copySelection);
    const cursorOffsets = sels.map((sel) => toIndexPos(oldBytes, sel.cursor));

    const descending = [...new Set<number>(cursorOffsets)].sort((a, b) => b - a);
    for (const offset of descending) {
      if (offset > 0) this.buffer.removeAt(offset - 1);
    }
    this.refresh();

    // movement = 1 + number of cursors strictly before this one.
    const ascending = [...cursorOffsets].sort((a, b) => a - b);
    const back = (offset: number, by: number): CoordinatePos => this.toPos(byteOffset(Math.max(0, offset - by)));

    sels.forEach((sel, i) => {
      const cursorOffset = cursorOffsets[i];
      const movement = 1 + countBelow(ascending, cursorOffset);

      if (isCursor(sel)) {
        this.cursors.replaceAt(i, createCursor(back(cursorOffset, movement)));
        return;
      }

      const anchorOffset = toIndexPos(oldBytes, sel.anchor);
      if (comesBefore(sel.cursor, sel.anchor)) {
        this.cursors.replaceAt(i, { anchor: back(anchorOffset, movement), cursor: back(cursorOffset, movement) });
        return;
      }

      const cursor = back(cursorOffset, movement);
      const anchor = movement === 1 ? sel.anchor : back(anchorOffset, movement - 1);
      this.cursors.replaceAt(i, comesBefore(cursor, anchor) ? createCursor(cursor) : { anchor, cursor });
    });

    this.cursors.removeDuplicateSelections();
  }

  /**
   * Delete from each cursor back to the start of its row. A cursor already
   * at a row start deletes the newline before it instead. Ranges of cursors
   * on the same row are joined, so each byte goes once. Selections collapse
   * to their new cursors; cursors that meet become one.
   */
  deleteToStartOfLine(): void {
    const ranges: ByteSpan[] = [];
    for (const { cursor } of this.cursors.selections) {
      const lineStart = this.lines.getLineStart(cursor.row);
      const to = lineStart + Math.min(cursor.col, this.rowLength(cursor.row));
      if (to > lineStart) ranges.push({ from: lineStart, to });
      else if (to > 0) ranges.push({ from: to - 1, to });
      else ranges.push({ from: 0, to: 0 });
    }

    const merged = joinRanges(ranges);
    for (let i = merged.length - 1; i >= 0; i--) {
      this.buffer.removeRange(merged[i].from, merged[i].to);
    }
    this.refresh();

    ranges.forEach((range, i) => {
      this.cursors.replaceAt(i, createCursor(this.toPos(byteOffset(offsetAfterRemoval(merged, range.from)))));
    });
    this.cursors.removeDuplicateSelections();
  }

  /**
   * Replace the selections with the span `nextWordSpan` finds from each
   * cursor on its row. Cursors at a row end keep their selection.
   */
  selectNextWord(): void {
    this.selectWordSpans(nextWordSpan);
  }

  /** Like `selectNextWord`, selecting back towards the previous word start. */
  selectPreviousWord(): void {
    this.selectWordSpans(previousWordSpan);
  }

  /**
   * Replace the buffer with the output of the formatter registered for the
   * file's extension. Selections collapse to one cursor at the primary
   * cursor's old offset, clamped to the new length.
   */
  format(): FormatResult {
    const extension = fileExtension(this._filename);
    const formatter = this.formatters.get(extension);
    if (!formatter) {
      return { ok: false, error: new FormatError(`no formatter registered for extension '${extension}'`) };
    }

    const primaryOffset = this.toIndexPos(this.cursors.primary.cursor);
    const result = formatter.format(this.getAllText());
    if (!result.ok) {
      this.logger.warn(`formatting ${this._filename} failed: ${result.error.message}`);
      return result;
    }

    this.buffer.setBytes(encodeText(result.text));
    this.refresh();
    this.cursors.reset(this.toPos(byteOffset(Math.min(primaryOffset, this.buffer.length))));
    this.logger.debug(`formatted ${this._filename}`);
    return result;
  }

  // ── Movement ────────────────────────────────────────────────
  // Each collapses every selection to its cursor first. Cursors that land
  // on the same position are not merged.

  moveLeft(): void {
    this.cursors.move('left');
  }

  moveRight(): void {
    this.cursors.move('right');
  }

  moveUp(): void {
    this.cursors.move('up');
  }

  moveDown(): void {
    this.cursors.move('down');
  }

  moveToStartOfLine(): void {
    this.cursors.move('lineStart');
  }

  moveToEndOfLine(): void {
    this.cursors.move('lineEnd');
  }

  moveCursorBeforeAnchor(): void {
    this.cursors.moveCursorBeforeAnchor();
  }

  moveCursorAfterAnchor(): void {
    this.cursors.moveCursorAfterAnchor();
  }

  // ── Internals ───────────────────────────────────────────────

  private setFilename(path: string): void {
    this._filename = path;
    this._languageId = path === '' ? 'plaintext' : detectLanguage(path);
    this.tokenizer = this.config.syntaxTokenizing
      ? tokenizerForLanguage(this._languageId)
      : new PlainTextTokenizer();
  }

  private selectWordSpans(find: (line: Uint8Array, col: number) => WordSpan | null): void {
    const next = this.cursors.selections.map((sel) => {
      const { row } = sel.cursor;
      const start = this.lines.getLineStart(row);
      const span = find(this.buffer.slice(start, start + this.rowLength(row)), sel.cursor.col);
      if (!span) return sel;
      return { anchor: { row, col: span.anchor }, cursor: { row, col: span.cursor } };
    });
    this.cursors.replaceSelections(next);
  }

  private refresh(): void {
    this.lines.rebuild(this.buffer.bytes());
    this._tokens = this.tokenizer.tokenize(this.buffer.bytes());
  }
}

/** Sort ranges by start and join the ones that overlap or touch. */
function joinRanges(ranges: readonly ByteSpan[]): ByteSpan[] {
  const sorted = [...ranges].filter((r) => r.to > r.from).sort((a, b) => a.from - b.from);
  const joined: ByteSpan[] = [];
  for (const range of sorted) {
    const last = joined[joined.length - 1];
    if (last && range.from <= last.to) last.to = Math.max(last.to, range.to);
    else joined.push({ ...range });
  }
  return joined;
}

/** Where old offset `offset` lands once the sorted `removed` ranges are gone. */
function offsetAfterRemoval(removed: readonly ByteSpan[], offset: number): number {
  let shift = 0;
  for (const range of removed) {
    if (offset >= range.to) shift += range.to - range.from;
    else if (offset > range.from) return range.from - shift;
    else break;
  }
  return offset - shift;
}

/** Number of elements of the ascending array `sorted` that are below `value`. */
function countBelow(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
