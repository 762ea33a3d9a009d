/**
 * Terminal cleanup
 *
 * Restores the terminal when the menu exits, boots, or the user
 * interrupts it.
 */

import termKit from 'terminal-kit';

const term = termKit.terminal;

/**
 * Fully reset the terminal to a clean state:
 * - Releasing input grabbing
 * - Exiting fullscreen/alternate screen buffer
 * - Resetting styles
 * - Resetting raw mode
 * - Showing cursor
 */
export function cleanupTerminal(): void {
  // Release input grabbing
  term.grabInput(false);

  // Exit fullscreen (alternate screen buffer)
  term.fullscreen(false);

  // Reset terminal styles
  term.styleReset();

  // Explicitly reset raw mode if it was set
  if (process.stdin.isTTY && process.stdin.setRawMode) {
    process.stdin.setRawMode(false);
  }

  // Show cursor even if terminal-kit methods didn't complete
  process.stdout.write('\x1b[?25h');
}

/**
 * Cleanup for Ctrl-C: restore the terminal and leave the process
 */
export function exitTerminal(): never {
  cleanupTerminal();
  process.stdout.write('\n');
  process.exit(130);
}
