/**
 * Editor configuration: schema, defaults and validation.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

const formatterCommandSchema = z.object({
  /** Executable to run. Receives the buffer on stdin, writes the result to stdout. */
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
});

export const editorConfigSchema = z.object({
  /**
   * Use the language-aware tokenizer for files whose language has a grammar.
   * When off, the whole buffer is a single Text token.
   */
  syntaxTokenizing: z.boolean().default(false),
  /** Formatters keyed by file extension without the dot, e.g. `ts`. */
  formatters: z.record(z.string().regex(/^[^.]/, 'extension must not start with a dot'), formatterCommandSchema)
    .default({}),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
});

export type FormatterCommand = z.infer<typeof formatterCommandSchema>;
export type EditorConfig = z.infer<typeof editorConfigSchema>;
export type EditorConfigInput = z.input<typeof editorConfigSchema>;

export const DEFAULT_CONFIG: EditorConfig = editorConfigSchema.parse({});

/**
 * Validate user-supplied configuration and fill in defaults.
 * Throws a ConfigError listing every issue found.
 */
export function resolveConfig(input: EditorConfigInput = {}): EditorConfig {
  const result = editorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    );
  }
  return result.data;
}
