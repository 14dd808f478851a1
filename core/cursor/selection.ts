/**
 * Directional selection: an anchor (fixed edge) and a cursor (active edge).
 *
 * Selection equality ignores direction; strict equality doesn't. A selection
 * whose anchor equals its cursor is a cursor.
 */

import { type CoordinatePos, ORIGIN, comesAfter, comesBefore, posEquals } from './position';
import {
  type Range,
  containsRange,
  isRangeEmpty,
  rangeAfter,
  rangeBefore,
  rangeEquals,
  rangesOverlap,
} from './range';
import { invariant } from '../errors';

export interface Selection {
  anchor: CoordinatePos;
  cursor: CoordinatePos;
}

/** Zero-width selection at a position. */
export function createCursor(p: CoordinatePos): Selection {
  return { anchor: { ...p }, cursor: { ...p } };
}

export function initialSelection(): Selection {
  return createCursor(ORIGIN);
}

export function isCursor(sel: Selection): boolean {
  return isRangeEmpty(toRange(sel));
}

/** Range from the anchor to the cursor. */
export function toRange(sel: Selection): Range {
  return { from: sel.anchor, to: sel.cursor };
}

export function selectionEquals(a: Selection, b: Selection): boolean {
  return rangeEquals(toRange(a), toRange(b));
}

export function strictSelectionEquals(a: Selection, b: Selection): boolean {
  return posEquals(a.anchor, b.anchor) && posEquals(a.cursor, b.cursor);
}

export function selectionsOverlap(a: Selection, b: Selection): boolean {
  return rangesOverlap(toRange(a), toRange(b));
}

/** True if `a` ends before `b` starts. Asserts they don't overlap. */
export function selectionComesBefore(a: Selection, b: Selection): boolean {
  invariant(!selectionsOverlap(a, b), 'Cannot order overlapping selections');
  return comesBefore(rangeAfter(toRange(a)), rangeBefore(toRange(b)));
}

/** Swap anchor and cursor. */
export function flipSelection(sel: Selection): Selection {
  return { anchor: sel.cursor, cursor: sel.anchor };
}

/**
 * Merge two overlapping selections. `a` is dominant: the result keeps its
 * direction and only reaches out to `b`'s far edge. Asserts that they overlap.
 */
export function mergeSelections(a: Selection, b: Selection): Selection {
  invariant(selectionsOverlap(a, b), 'Cannot merge selections that do not overlap');

  const rangeA = toRange(a);
  const rangeB = toRange(b);

  if (containsRange(rangeA, rangeB)) return a;
  if (containsRange(rangeB, rangeA)) return b;

  const bBefore = rangeBefore(rangeB);
  const bAfter = rangeAfter(rangeB);

  // A cursor not contained by b sits on one of b's edges.
  if (isCursor(a)) {
    if (comesBefore(a.anchor, bBefore)) return { anchor: a.anchor, cursor: bAfter };
    return { anchor: bBefore, cursor: a.cursor };
  }

  // Anchor before cursor.
  if (comesBefore(a.anchor, a.cursor)) {
    if (comesAfter(a.anchor, bBefore)) return { anchor: bBefore, cursor: a.cursor };
    return { anchor: a.anchor, cursor: bAfter };
  }

  // Cursor before anchor.
  if (comesAfter(a.cursor, bBefore)) return { anchor: a.anchor, cursor: bBefore };
  return { anchor: bAfter, cursor: a.cursor };
}
