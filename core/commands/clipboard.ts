/**
 * Copy command and the clipboard it writes to. Hosts with a system
 * clipboard pass their own `Clipboard`; the default keeps entries in memory.
 */

import type { CommandRegistry } from './registry';

/** One entry per selection, in set order. */
export interface Clipboard {
  write(entries: readonly string[]): void;
  read(): readonly string[];
}

export class MemoryClipboard implements Clipboard {
  private entries: readonly string[] = [];

  write(entries: readonly string[]): void {
    this.entries = [...entries];
  }

  read(): readonly string[] {
    return this.entries;
  }

  /** Entries joined the way a plain-text clipboard would hold them. */
  text(): string {
    return this.entries.join('\n');
  }
}

export function registerClipboardCommands(registry: CommandRegistry, clipboard: Clipboard): void {
  registry.register('editor.action.copy', (ctx) => {
    clipboard.write(ctx.editor.getSelectionsText());
  });
}
