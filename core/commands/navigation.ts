/**
 * Navigation commands: move by character and line, flip selections.
 */

import type { CommandRegistry } from './registry';

export function registerNavigationCommands(registry: CommandRegistry): void {
  registry.register('editor.action.moveCursorLeft', (ctx) => {
    ctx.editor.moveLeft();
  });

  registry.register('editor.action.moveCursorRight', (ctx) => {
    ctx.editor.moveRight();
  });

  registry.register('editor.action.moveCursorUp', (ctx) => {
    ctx.editor.moveUp();
  });

  registry.register('editor.action.moveCursorDown', (ctx) => {
    ctx.editor.moveDown();
  });

  // Home / End
  registry.register('editor.action.moveCursorToLineStart', (ctx) => {
    ctx.editor.moveToStartOfLine();
  });

  registry.register('editor.action.moveCursorToLineEnd', (ctx) => {
    ctx.editor.moveToEndOfLine();
  });

  registry.register('editor.action.cursorBeforeAnchor', (ctx) => {
    ctx.editor.moveCursorBeforeAnchor();
  });

  registry.register('editor.action.cursorAfterAnchor', (ctx) => {
    ctx.editor.moveCursorAfterAnchor();
  });
}
