/**
 * Unordered pair of positions with edge-inclusive containment and overlap.
 *
 * Ranges that merely touch (one's edge equals the other's edge) overlap.
 * Selection merging relies on this.
 */

import { type CoordinatePos, comesAfter, comesBefore, posEquals } from './position';

export interface Range {
  from: CoordinatePos;
  to: CoordinatePos;
}

/** Whichever position comes earlier in the text. */
export function rangeBefore(range: Range): CoordinatePos {
  return comesBefore(range.from, range.to) ? range.from : range.to;
}

/** Whichever position comes later in the text. */
export function rangeAfter(range: Range): CoordinatePos {
  return comesBefore(range.from, range.to) ? range.to : range.from;
}

/** Same area of text, regardless of which end is `from`. */
export function rangeEquals(a: Range, b: Range): boolean {
  return posEquals(rangeBefore(a), rangeBefore(b)) && posEquals(rangeAfter(a), rangeAfter(b));
}

/** Same `from` and same `to`. */
export function strictRangeEquals(a: Range, b: Range): boolean {
  return posEquals(a.from, b.from) && posEquals(a.to, b.to);
}

export function isRangeEmpty(range: Range): boolean {
  return posEquals(range.from, range.to);
}

/**
 * True if `p` lies inside the range or on one of its edges: {0,0} is
 * contained by the range {0,0}..{0,1}.
 */
export function containsPos(range: Range, p: CoordinatePos): boolean {
  if (comesBefore(rangeBefore(range), p) && comesAfter(rangeAfter(range), p)) return true;
  return posEquals(range.from, p) || posEquals(range.to, p);
}

/** True if both edges of `inner` are contained by `outer`. Equal ranges contain each other. */
export function containsRange(outer: Range, inner: Range): boolean {
  return containsPos(outer, inner.from) && containsPos(outer, inner.to);
}

export function rangesOverlap(a: Range, b: Range): boolean {
  // A range strictly inside the other has no edge on it, so check containment first.
  if (containsRange(a, b) || containsRange(b, a)) return true;
  return containsPos(a, b.from) || containsPos(a, b.to);
}
