/**
 * Host-facing entry point to the editor: each `editor.action.*` ID runs one
 * Editor operation against the editor in the context. Handlers that take
 * arguments parse them with the zod schemas in ./args.
 */

import type { Editor } from '../document/editor';

/** Arguments arrive untyped from the host; handlers that take any validate them. */
export type CommandHandler = (ctx: CommandContext, args?: unknown) => void;

export interface CommandContext {
  editor: Editor;
}

export class CommandRegistry {
  private commands: Map<string, CommandHandler> = new Map();

  register(id: string, handler: CommandHandler): void {
    this.commands.set(id, handler);
  }

  /** Run a command. Returns false when no command has that ID. */
  execute(id: string, ctx: CommandContext, args?: unknown): boolean {
    const handler = this.commands.get(id);
    if (!handler) return false;
    handler(ctx, args);
    return true;
  }

  has(id: string): boolean {
    return this.commands.has(id);
  }

  getAll(): string[] {
    return [...this.commands.keys()];
  }
}
