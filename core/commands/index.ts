import { type Clipboard, MemoryClipboard, registerClipboardCommands } from './clipboard';
import { registerEditingCommands } from './editing';
import { registerMulticursorCommands } from './multicursor';
import { registerNavigationCommands } from './navigation';
import { CommandRegistry } from './registry';

/** Registry with every built-in command group registered. */
export function createCommandRegistry(clipboard: Clipboard = new MemoryClipboard()): CommandRegistry {
  const registry = new CommandRegistry();
  registerEditingCommands(registry);
  registerNavigationCommands(registry);
  registerMulticursorCommands(registry);
  registerClipboardCommands(registry, clipboard);
  return registry;
}
