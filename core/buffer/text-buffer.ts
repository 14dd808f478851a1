/**
 * Raw byte storage for the editor's file contents.
 *
 * A growable Uint8Array with spare capacity at the end. Strings are stored
 * as UTF-8; every offset is a byte offset.
 */

import { invariant } from '../errors';

const MIN_CAPACITY = 64;

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

export class TextBuffer {
  private data: Uint8Array;
  private _length: number;

  constructor(initialContent: string | Uint8Array = '') {
    const bytes = typeof initialContent === 'string' ? encodeText(initialContent) : initialContent;
    this.data = new Uint8Array(Math.max(MIN_CAPACITY, bytes.length));
    this.data.set(bytes);
    this._length = bytes.length;
  }

  /** Number of bytes in the buffer. */
  get length(): number {
    return this._length;
  }

  /** Read-only view of the current contents. Invalidated by the next mutation. */
  bytes(): Uint8Array {
    return this.data.subarray(0, this._length);
  }

  byteAt(index: number): number {
    invariant(index >= 0 && index < this._length, `Byte index ${index} out of range [0, ${this._length})`);
    return this.data[index];
  }

  /** Copy of the bytes in [start, end). */
  slice(start: number, end: number): Uint8Array {
    invariant(start >= 0 && start <= end && end <= this._length, `Invalid slice [${start}, ${end})`);
    return this.data.slice(start, end);
  }

  /** Full contents decoded as UTF-8. */
  getText(): string {
    return decodeText(this.bytes());
  }

  /**
   * Insert text at the given byte offset.
   * @returns The number of bytes inserted.
   */
  insert(offset: number, content: string | Uint8Array): number {
    invariant(offset >= 0 && offset <= this._length, `Insert offset ${offset} out of range [0, ${this._length}]`);
    const bytes = typeof content === 'string' ? encodeText(content) : content;
    if (bytes.length === 0) return 0;

    this.ensureCapacity(this._length + bytes.length);
    this.data.copyWithin(offset + bytes.length, offset, this._length);
    this.data.set(bytes, offset);
    this._length += bytes.length;
    return bytes.length;
  }

  /**
   * Remove the single byte at `index`.
   * @returns The removed byte.
   */
  removeAt(index: number): number {
    const removed = this.byteAt(index);
    this.data.copyWithin(index, index + 1, this._length);
    this._length--;
    return removed;
  }

  /** Remove the bytes in [start, end). */
  removeRange(start: number, end: number): void {
    invariant(start >= 0 && start <= end && end <= this._length, `Invalid range [${start}, ${end})`);
    this.data.copyWithin(start, end, this._length);
    this._length -= end - start;
  }

  /** Replace the whole contents. */
  setBytes(bytes: Uint8Array): void {
    this.data = new Uint8Array(Math.max(MIN_CAPACITY, bytes.length));
    this.data.set(bytes);
    this._length = bytes.length;
  }

  clear(): void {
    this._length = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.data.length) return;
    let capacity = this.data.length;
    while (capacity < required) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.bytes());
    this.data = grown;
  }
}
