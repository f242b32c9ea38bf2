/**
 * Keyboard input handling hook for the Marquee TUI.
 *
 * Provides a unified interface for handling keyboard shortcuts throughout
 * the application. Supports arrow keys, vim-style navigation, and action keys.
 *
 * @module ui/hooks/useKeyboard
 */

import { useInput, type Key } from 'ink';

/**
 * Standard key names that can be used in handlers.
 *
 * Arrow keys: 'up', 'down', 'left', 'right'
 * Vim-style: 'j' (down), 'k' (up), 'h' (left), 'l' (right)
 * Actions: 'q' (quit), 'b' (back), 'enter', 'escape', 'tab', '/' (search)
 */
export type KeyName =
  // Arrow keys
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  // Vim-style navigation
  | 'j'
  | 'k'
  | 'h'
  | 'l'
  // Action keys
  | 'q'
  | 'b'
  | 'enter'
  | 'escape'
  | 'backspace'
  | 'tab'
  | '/';

/**
 * Handler map for keyboard shortcuts.
 * Keys are key names, values are handler functions.
 */
export type KeyboardHandlers = Partial<Record<KeyName, () => void>>;

/**
 * Options for the useKeyboard hook.
 */
export interface UseKeyboardOptions {
  /**
   * Map of key names to handler functions.
   * Handlers are called when the corresponding key is pressed.
   */
  handlers: KeyboardHandlers;

  /**
   * Whether keyboard input is enabled.
   * Set to false while a text input owns the keyboard.
   * @default true
   */
  enabled?: boolean;
}

/**
 * The parts of Ink's key descriptor the dispatcher reads
 */
export type KeyFlags = Pick<
  Key,
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'return'
  | 'escape'
  | 'tab'
  | 'backspace'
  | 'delete'
>;

/**
 * Routes one key press to its handler.
 */
export function dispatchKey(handlers: KeyboardHandlers, input: string, key: KeyFlags): void {
  // Handle special keys first
  if (key.upArrow) {
    handlers.up?.();
    return;
  }

  if (key.downArrow) {
    handlers.down?.();
    return;
  }

  if (key.leftArrow) {
    handlers.left?.();
    return;
  }

  if (key.rightArrow) {
    handlers.right?.();
    return;
  }

  if (key.return) {
    handlers.enter?.();
    return;
  }

  if (key.escape) {
    handlers.escape?.();
    return;
  }

  if (key.tab) {
    handlers.tab?.();
    return;
  }

  if (key.backspace || key.delete) {
    handlers.backspace?.();
    return;
  }

  // Map input character to handler
  switch (input.toLowerCase()) {
    // Vim-style navigation
    case 'j':
      handlers.j?.();
      break;
    case 'k':
      handlers.k?.();
      break;
    case 'h':
      handlers.h?.();
      break;
    case 'l':
      handlers.l?.();
      break;

    // Action keys
    case 'q':
      handlers.q?.();
      break;
    case 'b':
      handlers.b?.();
      break;
    case '/':
      handlers['/']?.();
      break;
  }
}

/**
 * Hook for handling keyboard input in the Marquee TUI.
 *
 * Wraps Ink's useInput hook and routes key presses to the appropriate
 * handlers based on the provided handler map.
 *
 * @example
 * ```tsx
 * useKeyboard({
 *   handlers: {
 *     up: () => selectPrev(),
 *     down: () => selectNext(),
 *     k: () => selectPrev(),  // vim-style
 *     j: () => selectNext(),  // vim-style
 *     enter: () => openDetails(),
 *     q: () => quit(),
 *   },
 *   enabled: !searchFocused,
 * });
 * ```
 */
export function useKeyboard({ handlers, enabled = true }: UseKeyboardOptions): void {
  useInput(
    (input: string, key: Key) => {
      dispatchKey(handlers, input, key);
    },
    { isActive: enabled }
  );
}

export default useKeyboard;
