/**
 * Row/column position in the buffer. `col` is a byte offset from the start
 * of the row and may run past the row's length (a virtual column).
 */

export interface CoordinatePos {
  row: number;
  col: number;
}

export const ORIGIN: Readonly<CoordinatePos> = Object.freeze({ row: 0, col: 0 });

export function pos(row: number, col: number): CoordinatePos {
  return { row, col };
}

/**
 * Compare two positions. Returns negative if a < b, 0 if equal, positive if a > b.
 */
export function comparePositions(a: CoordinatePos, b: CoordinatePos): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function posEquals(a: CoordinatePos, b: CoordinatePos): boolean {
  return a.row === b.row && a.col === b.col;
}

export function comesBefore(a: CoordinatePos, b: CoordinatePos): boolean {
  return comparePositions(a, b) < 0;
}

export function comesAfter(a: CoordinatePos, b: CoordinatePos): boolean {
  return comparePositions(a, b) > 0;
}
