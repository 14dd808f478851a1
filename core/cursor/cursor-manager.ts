/**
 * Multi-selection management: the selection set, overlap merging and
 * cursor movement.
 *
 * Selections are kept pairwise non-overlapping by every operation that adds
 * one. Order is insertion order, not file order; index 0 is the primary
 * selection used for cursor display.
 */

import type { CoordinatePos } from './position';
import {
  type Selection,
  createCursor,
  flipSelection,
  initialSelection,
  mergeSelections,
  selectionEquals,
  selectionsOverlap,
} from './selection';
import { comesAfter, comesBefore } from './position';
import { invariant } from '../errors';

/** Row geometry needed to move cursors. Lengths are in bytes, without the newline. */
export interface LineMetrics {
  lineCount(): number;
  rowLength(row: number): number;
}

export type CursorDirection =
  | 'left' | 'right' | 'up' | 'down'
  | 'lineStart' | 'lineEnd';

export class CursorManager {
  private _selections: Selection[];
  private lines: LineMetrics;

  constructor(lines: LineMetrics) {
    this.lines = lines;
    this._selections = [initialSelection()];
  }

  get primary(): Selection {
    invariant(this._selections.length > 0, 'Selection set is empty');
    return this._selections[0];
  }

  get selections(): readonly Selection[] {
    return this._selections;
  }

  get count(): number {
    return this._selections.length;
  }

  at(index: number): Selection {
    invariant(index >= 0 && index < this._selections.length, `Selection index ${index} out of range`);
    return this._selections[index];
  }

  /**
   * Overwrite one selection in place. Used by batch edits, which restore the
   * non-overlap invariant themselves.
   */
  replaceAt(index: number, selection: Selection): void {
    invariant(index >= 0 && index < this._selections.length, `Selection index ${index} out of range`);
    this._selections[index] = selection;
  }

  /**
   * Add a selection, merging it with any selection it overlaps. A merge can
   * make the merged selection overlap an earlier one, so scanning restarts
   * until no pair overlaps.
   */
  appendSelection(selection: Selection): void {
    this._selections.push({ anchor: { ...selection.anchor }, cursor: { ...selection.cursor } });

    let outer = 0;
    outer: while (outer < this._selections.length) {
      const before = this._selections[outer];
      for (let inner = outer + 1; inner < this._selections.length; inner++) {
        const after = this._selections[inner];
        if (selectionsOverlap(before, after)) {
          this._selections[outer] = mergeSelections(before, after);
          this.swapRemove(inner);
          continue outer;
        }
      }
      outer++;
    }

    invariant(!this.hasOverlappingSelections(), 'Selections overlap after append');
  }

  /** Reset the set to `selections`, merged as if appended one at a time. */
  replaceSelections(selections: readonly Selection[]): void {
    invariant(selections.length > 0, 'At least one selection is required');
    this._selections = [];
    for (const selection of selections) {
      this.appendSelection(selection);
    }
  }

  /** Reset to a single cursor. */
  reset(p: CoordinatePos): void {
    this._selections = [createCursor(p)];
  }

  hasOverlappingSelections(): boolean {
    for (let i = 0; i < this._selections.length - 1; i++) {
      for (let j = i + 1; j < this._selections.length; j++) {
        if (selectionsOverlap(this._selections[i], this._selections[j])) return true;
      }
    }
    return false;
  }

  /**
   * Drop selections that cover the same text as an earlier one. Only exact
   * (direction-insensitive) duplicates are removed; touching selections stay.
   */
  removeDuplicateSelections(): void {
    for (let i = 0; i < this._selections.length - 1; i++) {
      let j = i + 1;
      while (j < this._selections.length) {
        if (selectionEquals(this._selections[i], this._selections[j])) {
          // Re-check index j: swapRemove moved the last selection there.
          this.swapRemove(j);
          continue;
        }
        j++;
      }
    }
  }

  /**
   * Collapse every selection to its cursor and move it one step.
   * Cursors that end up on the same spot are not merged.
   */
  move(direction: CursorDirection): void {
    this._selections = this._selections.map((sel) => createCursor(this.moveCursor(sel.cursor, direction)));
  }

  /** Flip selections so the cursor is the earlier edge. */
  moveCursorBeforeAnchor(): void {
    this._selections = this._selections.map((sel) => (comesBefore(sel.cursor, sel.anchor) ? sel : flipSelection(sel)));
  }

  /** Flip selections so the cursor is the later edge. */
  moveCursorAfterAnchor(): void {
    this._selections = this._selections.map((sel) => (comesAfter(sel.cursor, sel.anchor) ? sel : flipSelection(sel)));
  }

  private moveCursor(cursor: CoordinatePos, direction: CursorDirection): CoordinatePos {
    let { row, col } = cursor;
    const lastRow = this.lines.lineCount() - 1;

    switch (direction) {
      case 'left': {
        col = Math.min(col, this.lines.rowLength(row));
        if (col === 0 && row > 0) {
          row--;
          col = this.lines.rowLength(row);
        } else {
          col = Math.max(0, col - 1);
        }
        break;
      }

      case 'right': {
        col++;
        if (col > this.lines.rowLength(row) && row < lastRow) {
          row++;
          col = 0;
        } else {
          col = Math.min(col, this.maxColumn(row));
        }
        break;
      }

      case 'up':
        if (row > 0) {
          row--;
          col = Math.min(col, this.maxColumn(row));
        }
        break;

      case 'down':
        if (row < lastRow) {
          row++;
          col = Math.min(col, this.maxColumn(row));
        }
        break;

      case 'lineStart':
        if (col === 0 && row > 0) {
          row--;
          col = this.lines.rowLength(row);
        } else {
          col = 0;
        }
        break;

      case 'lineEnd': {
        const len = this.lines.rowLength(row);
        if (col === len && row < lastRow) {
          row++;
          col = 0;
        } else {
          col = len;
        }
        break;
      }
    }

    return { row, col };
  }

  /** The last row allows one virtual column past its end: "after end of buffer". */
  private maxColumn(row: number): number {
    const len = this.lines.rowLength(row);
    return row === this.lines.lineCount() - 1 ? len + 1 : len;
  }

  private swapRemove(index: number): void {
    const last = this._selections.pop();
    if (last !== undefined && index < this._selections.length) {
      this._selections[index] = last;
    }
  }
}
