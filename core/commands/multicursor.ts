/**
 * Multi-cursor commands: add a cursor or a selection to the set, and turn
 * every cursor into a word selection.
 */

import { createCursor } from '../cursor/selection';
import { positionArgs, selectionArgs } from './args';
import type { CommandRegistry } from './registry';

export function registerMulticursorCommands(registry: CommandRegistry): void {
  registry.register('editor.action.addCursorAtPosition', (ctx, args) => {
    ctx.editor.appendSelection(createCursor(positionArgs.parse(args)));
  });

  registry.register('editor.action.addSelection', (ctx, args) => {
    ctx.editor.appendSelection(selectionArgs.parse(args));
  });

  registry.register('editor.action.selectNextWord', (ctx) => {
    ctx.editor.selectNextWord();
  });

  registry.register('editor.action.selectPreviousWord', (ctx) => {
    ctx.editor.selectPreviousWord();
  });
}
