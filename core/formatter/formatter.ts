/**
 * Pluggable text-to-text formatters, keyed by file extension.
 */

import type { Logger } from 'winston';
import type { FormatterCommand } from '../config';
import { FormatError } from '../errors';
import { ProcessFormatter } from './process-formatter';

export type FormatResult =
  | { ok: true; text: string }
  | { ok: false; error: FormatError };

export interface Formatter {
  format(input: string): FormatResult;
}

export class FormatterRegistry {
  private formatters: Map<string, Formatter> = new Map();

  /** `extension` is given without the leading dot. */
  register(extension: string, formatter: Formatter): void {
    this.formatters.set(extension.toLowerCase(), formatter);
  }

  get(extension: string): Formatter | undefined {
    return this.formatters.get(extension.toLowerCase());
  }

  has(extension: string): boolean {
    return this.formatters.has(extension.toLowerCase());
  }

  extensions(): string[] {
    return [...this.formatters.keys()];
  }

  static fromConfig(formatters: Record<string, FormatterCommand>, log?: Logger): FormatterRegistry {
    const registry = new FormatterRegistry();
    for (const [extension, { command, args }] of Object.entries(formatters)) {
      registry.register(extension, new ProcessFormatter(command, args, log));
    }
    return registry;
  }
}
