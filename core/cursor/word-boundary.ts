/**
 * Word boundaries within one row of UTF-8 bytes.
 *
 * A word is a run of bytes of the same class: word bytes (ASCII letters,
 * digits, underscore and every non-ASCII byte) or punctuation. Whitespace
 * separates words. Columns are byte columns.
 */

enum ByteClass {
  Word,
  Whitespace,
  Punctuation,
}

function classify(byte: number): ByteClass {
  if (byte === 32 || byte === 9 || byte === 13 || byte === 10) return ByteClass.Whitespace;
  if (byte >= 0x80) return ByteClass.Word;
  if (byte >= 48 && byte <= 57) return ByteClass.Word;  // 0-9
  if (byte >= 65 && byte <= 90) return ByteClass.Word;  // A-Z
  if (byte >= 97 && byte <= 122) return ByteClass.Word; // a-z
  if (byte === 95) return ByteClass.Word;               // _
  return ByteClass.Punctuation;
}

function isSpace(byte: number): boolean {
  return classify(byte) === ByteClass.Whitespace;
}

/** End (exclusive) of the run that contains `from`. */
function findRunEnd(line: Uint8Array, from: number): number {
  const cls = classify(line[from]);
  let end = from + 1;
  while (end < line.length && classify(line[end]) === cls) end++;
  return end;
}

/** Start of the run that contains `at`. */
function findRunStart(line: Uint8Array, at: number): number {
  const cls = classify(line[at]);
  let start = at;
  while (start > 0 && classify(line[start - 1]) === cls) start--;
  return start;
}

export interface WordSpan {
  anchor: number;
  cursor: number;
}

/**
 * Span selected by "select next word" from `col`:
 * - on a word: from `col` to the end of that word
 * - at the end of a word, or one space before the next: the whole next word
 * - inside a longer stretch of whitespace: from `col` to the next word
 * - whitespace up to the end of the row: from `col` to the row end
 *
 * Returns null at the end of the row.
 */
export function nextWordSpan(line: Uint8Array, col: number): WordSpan | null {
  if (col >= line.length) return null;
  if (!isSpace(line[col])) return { anchor: col, cursor: findRunEnd(line, col) };

  let next = col;
  while (next < line.length && isSpace(line[next])) next++;
  if (next === line.length) return { anchor: col, cursor: next };

  const atWordEnd = col > 0 && !isSpace(line[col - 1]);
  if (atWordEnd || next - col === 1) return { anchor: next, cursor: findRunEnd(line, next) };
  return { anchor: col, cursor: next };
}

/**
 * Span selected by "select previous word" from `col`: from `col` back to
 * the start of the word it is in, or of the nearest word before it when
 * `col` is at a word start or in whitespace. Returns null at column 0.
 */
export function previousWordSpan(line: Uint8Array, col: number): WordSpan | null {
  const from = Math.min(col, line.length);
  if (from === 0) return null;

  let end = from;
  while (end > 0 && isSpace(line[end - 1])) end--;
  if (end === 0) return { anchor: from, cursor: 0 };
  return { anchor: from, cursor: findRunStart(line, end - 1) };
}
