/**
 * Key names delivered by the input source.
 *
 * These match terminal-kit's key event names, so keys coming off the
 * terminal can be compared directly. Printable keys are the character itself.
 */
export type Key = string;

export const KEY_ENTER = 'ENTER';
export const KEY_BACKSPACE = 'BACKSPACE';
export const KEY_DELETE = 'DELETE';
export const KEY_ESCAPE = 'ESCAPE';

/**
 * Keys that pop back to the parent menu
 */
export function isBackKey(key: Key): boolean {
  return key === KEY_BACKSPACE || key === KEY_DELETE;
}
