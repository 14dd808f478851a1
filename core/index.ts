/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Buffer
export { TextBuffer, encodeText, decodeText } from './buffer/text-buffer';
export { LineIndex } from './buffer/line-index';
export {
  type ByteOffset, byteOffset,
  offsetComesBefore, offsetComesAfter, compareOffsets,
} from './buffer/byte-offset';
export { toIndexPos, toPos } from './buffer/coordinates';

// Cursor
export {
  type CoordinatePos, ORIGIN, pos, comparePositions, posEquals, comesBefore, comesAfter,
} from './cursor/position';
export {
  type Range, rangeBefore, rangeAfter, rangeEquals, strictRangeEquals, isRangeEmpty,
  containsPos, containsRange, rangesOverlap,
} from './cursor/range';
export {
  type Selection, createCursor, initialSelection, isCursor, toRange,
  selectionEquals, strictSelectionEquals, selectionsOverlap, selectionComesBefore,
  flipSelection, mergeSelections,
} from './cursor/selection';
export { CursorManager, type CursorDirection, type LineMetrics } from './cursor/cursor-manager';
export { type WordSpan, nextWordSpan, previousWordSpan } from './cursor/word-boundary';

// Document
export { Editor } from './document/editor';
export { detectLanguage, fileExtension } from './document/language';

// Tokenizer
export { type Token, type TokenKind, type Tokenizer, PlainTextTokenizer } from './tokenizer/token';
export { LezerTokenizer, tokenizerForLanguage } from './tokenizer/lezer-tokenizer';
export { grammarFor, supportedLanguages } from './tokenizer/grammars';

// Formatter
export { type Formatter, type FormatResult, FormatterRegistry } from './formatter/formatter';
export { ProcessFormatter } from './formatter/process-formatter';

// Commands
export { CommandRegistry, type CommandHandler, type CommandContext } from './commands/registry';
export { createCommandRegistry } from './commands';
export { registerEditingCommands } from './commands/editing';
export { registerNavigationCommands } from './commands/navigation';
export { type Clipboard, MemoryClipboard, registerClipboardCommands } from './commands/clipboard';
export { registerMulticursorCommands } from './commands/multicursor';

// Ambient
export {
  type EditorConfig, type EditorConfigInput, type FormatterCommand,
  editorConfigSchema, DEFAULT_CONFIG, resolveConfig,
} from './config';
export { logger, editorLogger, type LogLevel } from './logger';
export { InvariantError, FileAccessError, FormatError, ConfigError, invariant } from './errors';
