/**
 * Byte offset of every UTF-16 index of `decodeText(bytes)`.
 *
 * Follows the WHATWG UTF-8 decoder that TextDecoder implements: a leading
 * byte order mark decodes to nothing, every maximal invalid subsequence
 * decodes to one U+FFFD and a four-byte sequence decodes to a surrogate
 * pair. Both halves of a pair map to the sequence's first byte. The extra
 * last entry is `bytes.length`.
 */
export function utf16ByteOffsets(bytes: Uint8Array): Uint32Array {
  const offsets: number[] = [];
  let i = 0;
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) i = 3;

  let needed = 0;
  let seen = 0;
  let lower = 0x80;
  let upper = 0xbf;
  let start = 0;

  while (i < bytes.length) {
    const byte = bytes[i];

    if (needed === 0) {
      if (byte <= 0x7f) {
        offsets.push(i);
      } else if (byte >= 0xc2 && byte <= 0xdf) {
        needed = 1;
      } else if (byte >= 0xe0 && byte <= 0xef) {
        if (byte === 0xe0) lower = 0xa0;
        if (byte === 0xed) upper = 0x9f;
        needed = 2;
      } else if (byte >= 0xf0 && byte <= 0xf4) {
        if (byte === 0xf0) lower = 0x90;
        if (byte === 0xf4) upper = 0x8f;
        needed = 3;
      } else {
        offsets.push(i);
      }
      start = i;
      i++;
      continue;
    }

    if (byte < lower || byte > upper) {
      // Truncated sequence: one replacement, then read this byte afresh.
      offsets.push(start);
      needed = 0;
      seen = 0;
      lower = 0x80;
      upper = 0xbf;
      continue;
    }

    lower = 0x80;
    upper = 0xbf;
    seen++;
    i++;
    if (seen === needed) {
      offsets.push(start);
      if (needed === 3) offsets.push(start);
      needed = 0;
      seen = 0;
    }
  }
  if (needed !== 0) offsets.push(start);

  offsets.push(bytes.length);
  return Uint32Array.from(offsets);
}
