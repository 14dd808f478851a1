/**
 * Absolute byte offset into the editor buffer.
 *
 * Branded so offsets can't be mixed up with row/column numbers. Valid offsets
 * run from 0 to the buffer length inclusive; the offset equal to the length
 * denotes "end of buffer".
 */

import { invariant } from '../errors';

declare const brand: unique symbol;

export type ByteOffset = number & { readonly [brand]: 'ByteOffset' };

/** Create a ByteOffset from a number. Asserts it's a non-negative integer. */
export function byteOffset(value: number): ByteOffset {
  invariant(Number.isInteger(value) && value >= 0, `Invalid byte offset: ${value}`);
  return value as ByteOffset;
}

export function offsetComesBefore(a: ByteOffset, b: ByteOffset): boolean {
  return a < b;
}

export function offsetComesAfter(a: ByteOffset, b: ByteOffset): boolean {
  return a > b;
}

/** Sort comparator, ascending. */
export function compareOffsets(a: ByteOffset, b: ByteOffset): number {
  return a - b;
}
