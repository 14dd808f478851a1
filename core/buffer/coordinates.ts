/**
 * Conversion between absolute byte offsets and row/column positions.
 */

import { type ByteOffset, byteOffset } from './byte-offset';
import type { LineIndex } from './line-index';
import type { CoordinatePos } from '../cursor/position';
import { invariant } from '../errors';

const NEWLINE = 0x0a;

function countNewlines(bytes: Uint8Array): number {
  let count = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === NEWLINE) count++;
  }
  return count;
}

/**
 * Convert a row/column position to a byte offset by walking `bytes`.
 *
 * On the last row the result is clamped to the buffer length, so a virtual
 * column past the end of the buffer maps to the end of the buffer.
 */
export function toIndexPos(bytes: Uint8Array, p: CoordinatePos): ByteOffset {
  const rows = countNewlines(bytes) + 1;
  invariant(p.row < rows, `Row ${p.row} out of range [0, ${rows})`);
  const isLastRow = p.row === rows - 1;

  if (p.row === 0) {
    if (isLastRow) return byteOffset(Math.min(p.col, bytes.length));
    invariant(p.col <= bytes.length, `Column ${p.col} runs past the end of the buffer`);
    return byteOffset(p.col);
  }

  let row = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] !== NEWLINE) continue;
    row++;
    if (row === p.row) {
      const offset = i + p.col + 1;
      if (isLastRow) return byteOffset(Math.min(offset, bytes.length));
      invariant(offset <= bytes.length, `Position ${p.row}:${p.col} runs past the end of the buffer`);
      return byteOffset(offset);
    }
  }

  return byteOffset(bytes.length);
}

/**
 * Convert a byte offset to a row/column position using the line index.
 * The offset equal to the buffer length is valid.
 */
export function toPos(lineIndex: LineIndex, length: number, offset: ByteOffset): CoordinatePos {
  invariant(offset <= length, `Offset ${offset} past end of buffer (${length})`);
  const row = lineIndex.getLineForOffset(offset);
  return { row, col: offset - lineIndex.getLineStart(row) };
}
