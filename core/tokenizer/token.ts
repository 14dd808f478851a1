/**
 * Tokens produced for the whole buffer after every edit.
 */

import { decodeText } from '../buffer/text-buffer';
import { type CoordinatePos, ORIGIN } from '../cursor/position';

export type TokenKind =
  | 'Text'
  | 'Whitespace'
  | 'Keyword'
  | 'String'
  | 'Comment'
  | 'Number'
  | 'Variable'
  | 'Definition'
  | 'Function'
  | 'Type'
  | 'Property'
  | 'Operator'
  | 'Punctuation'
  | 'Regexp'
  | 'Literal'
  | 'Invalid';

export interface Token {
  /** Start of the token. `col` is in bytes. */
  pos: CoordinatePos;
  kind: TokenKind;
  text: string;
}

export interface Tokenizer {
  /** Tokens for the whole buffer, given as its UTF-8 bytes. */
  tokenize(bytes: Uint8Array): Token[];
}

/** One `Text` token covering the whole buffer. */
export class PlainTextTokenizer implements Tokenizer {
  tokenize(bytes: Uint8Array): Token[] {
    return [{ pos: { ...ORIGIN }, kind: 'Text', text: decodeText(bytes) }];
  }
}
