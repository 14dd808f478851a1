/**
 * Line-start-offset index, rebuilt from the buffer after every mutation.
 *
 * Maps row numbers to the byte offset where each row begins. A row starts
 * immediately after a newline byte, so an empty buffer and a buffer ending in
 * `\n` both have a final, empty row.
 */

import { type ByteOffset, byteOffset } from './byte-offset';
import { invariant } from '../errors';

const NEWLINE = 0x0a;

export class LineIndex {
  /**
   * Line start offsets. lineStarts[i] = byte offset of the start of row i.
   * lineStarts[0] is always 0.
   */
  private lineStarts: ByteOffset[];

  constructor() {
    this.lineStarts = [byteOffset(0)];
  }

  /** Total number of rows. Always at least 1. */
  get lineCount(): number {
    return this.lineStarts.length;
  }

  /** Get the byte offset of the start of a row. */
  getLineStart(row: number): ByteOffset {
    invariant(row >= 0 && row < this.lineStarts.length, `Row ${row} out of range [0, ${this.lineStarts.length})`);
    return this.lineStarts[row];
  }

  /** Row containing `offset`: the number of rows starting at or before it, less one. */
  getLineForOffset(offset: ByteOffset): number {
    let startsAtOrBefore = 0;
    let past = this.lineStarts.length;
    while (startsAtOrBefore < past) {
      const mid = (startsAtOrBefore + past) >>> 1;
      if (this.lineStarts[mid] > offset) past = mid;
      else startsAtOrBefore = mid + 1;
    }
    return Math.max(0, startsAtOrBefore - 1);
  }

  /** Recompute every row start from `bytes`. */
  rebuild(bytes: Uint8Array): void {
    this.lineStarts = [byteOffset(0)];
    for (let i = 0; i < bytes.length; i++) {
      if (bytes[i] === NEWLINE) {
        this.lineStarts.push(byteOffset(i + 1));
      }
    }
  }

  /** Starts at 0 and strictly increases. */
  isWellFormed(): boolean {
    if (this.lineStarts.length === 0 || this.lineStarts[0] !== 0) return false;
    for (let i = 1; i < this.lineStarts.length; i++) {
      if (this.lineStarts[i] <= this.lineStarts[i - 1]) return false;
    }
    return true;
  }

  getLineStarts(): readonly ByteOffset[] {
    return this.lineStarts;
  }
}
