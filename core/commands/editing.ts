/**
 * Editing commands: type at every cursor, delete left, delete to line start.
 */

import { typeArgs } from './args';
import type { CommandRegistry } from './registry';

export function registerEditingCommands(registry: CommandRegistry): void {
  registry.register('editor.action.type', (ctx, args) => {
    const { text } = typeArgs.parse(args);
    ctx.editor.insertTextAtCursors(text);
  });

  registry.register('editor.action.deleteLeft', (ctx) => {
    ctx.editor.deleteCharacterBeforeCursors();
  });

  registry.register('editor.action.deleteToLineStart', (ctx) => {
    ctx.editor.deleteToStartOfLine();
  });
}
