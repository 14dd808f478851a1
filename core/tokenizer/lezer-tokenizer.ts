/**
 * Syntax tokenizer backed by a Lezer grammar.
 *
 * Highlighted spans come from `highlightTree`; the text between them is split
 * into `Whitespace` and `Text` tokens, so the token texts concatenate back to
 * the decoded input. Positions are row/byte-column coordinates.
 */

import type { Parser } from '@lezer/common';
import { highlightTree, tagHighlighter, tags } from '@lezer/highlight';
import { decodeText } from '../buffer/text-buffer';
import { utf16ByteOffsets } from '../buffer/utf16-offsets';
import type { CoordinatePos } from '../cursor/position';
import { grammarFor } from './grammars';
import { PlainTextTokenizer, type Token, type TokenKind, type Tokenizer } from './token';

const NEWLINE = 0x0a;

const highlighter = tagHighlighter([
  { tag: tags.keyword, class: 'Keyword' },
  { tag: tags.self, class: 'Keyword' },
  { tag: tags.null, class: 'Keyword' },
  { tag: tags.string, class: 'String' },
  { tag: tags.character, class: 'String' },
  { tag: tags.comment, class: 'Comment' },
  { tag: tags.number, class: 'Number' },
  { tag: tags.bool, class: 'Literal' },
  { tag: tags.atom, class: 'Literal' },
  { tag: tags.literal, class: 'Literal' },
  { tag: tags.variableName, class: 'Variable' },
  { tag: tags.definition(tags.variableName), class: 'Definition' },
  { tag: tags.function(tags.variableName), class: 'Function' },
  { tag: tags.definition(tags.function(tags.variableName)), class: 'Function' },
  { tag: tags.typeName, class: 'Type' },
  { tag: tags.className, class: 'Type' },
  { tag: tags.propertyName, class: 'Property' },
  { tag: tags.operator, class: 'Operator' },
  { tag: tags.punctuation, class: 'Punctuation' },
  { tag: tags.regexp, class: 'Regexp' },
  { tag: tags.invalid, class: 'Invalid' },
]);

const HIGHLIGHT_KINDS: ReadonlySet<string> = new Set<TokenKind>([
  'Keyword', 'String', 'Comment', 'Number', 'Literal', 'Variable', 'Definition',
  'Function', 'Type', 'Property', 'Operator', 'Punctuation', 'Regexp', 'Invalid',
]);

function isTokenKind(value: string): value is TokenKind {
  return HIGHLIGHT_KINDS.has(value);
}

interface Span {
  from: number;
  to: number;
  kind: TokenKind;
}

export class LezerTokenizer implements Tokenizer {
  constructor(private parser: Parser) {}

  tokenize(bytes: Uint8Array): Token[] {
    const text = decodeText(bytes);
    if (text.length === 0) return [{ pos: { row: 0, col: 0 }, kind: 'Text', text: '' }];

    const spans: Span[] = [];
    highlightTree(this.parser.parse(text), highlighter, (from, to, classes) => {
      const kind = classes.split(' ')[0];
      if (isTokenKind(kind)) spans.push({ from, to, kind });
    });
    spans.sort((a, b) => a.from - b.from);

    // Columns come from the buffer's bytes, not from re-encoding the text,
    // so replacement characters keep the columns of the bytes they stand for.
    const byteAt = utf16ByteOffsets(bytes);
    let row = 0;
    let col = 0;
    let walked = 0;
    const positionOf = (index: number): CoordinatePos => {
      for (const target = byteAt[index]; walked < target; walked++) {
        if (bytes[walked] === NEWLINE) {
          row++;
          col = 0;
        } else {
          col++;
        }
      }
      return { row, col };
    };

    const tokens: Token[] = [];
    const emit = (kind: TokenKind, from: number, to: number) => {
      tokens.push({ pos: positionOf(from), kind, text: text.slice(from, to) });
    };
    const fillGap = (from: number, to: number) => {
      for (const match of text.slice(from, to).matchAll(/\s+|\S+/g)) {
        const start = from + (match.index ?? 0);
        emit(/^\s/.test(match[0]) ? 'Whitespace' : 'Text', start, start + match[0].length);
      }
    };

    let last = 0;
    for (const span of spans) {
      if (span.from < last) continue;
      if (span.from > last) fillGap(last, span.from);
      emit(span.kind, span.from, span.to);
      last = span.to;
    }
    if (last < text.length) fillGap(last, text.length);

    return tokens;
  }
}

/** Syntax tokenizer for languages with a bundled grammar, plain text otherwise. */
export function tokenizerForLanguage(languageId: string): Tokenizer {
  const parser = grammarFor(languageId);
  return parser ? new LezerTokenizer(parser) : new PlainTextTokenizer();
}
