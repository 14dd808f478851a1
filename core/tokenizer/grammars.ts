import type { Parser } from '@lezer/common';
import { parser as jsParser } from '@lezer/javascript';

const grammars = new Map<string, Parser>([
  ['typescript', jsParser.configure({ dialect: 'ts jsx' })],
  ['javascript', jsParser.configure({ dialect: 'jsx' })],
]);

/** Lezer parser for a language id, if one is bundled. */
export function grammarFor(languageId: string): Parser | undefined {
  return grammars.get(languageId);
}

export function supportedLanguages(): string[] {
  return [...grammars.keys()];
}
