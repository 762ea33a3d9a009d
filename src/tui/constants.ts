/**
 * Shared constants for the terminal front end and menu labels
 */

// ============================================================================
// ANSI Escape Codes
// ============================================================================

export const RESET = '\x1b[0m';

// Text styles
export const BOLD = '\x1b[1m';
export const NORMAL_INTENSITY = '\x1b[22m';
export const DIM = '\x1b[2m';

// Basic colors
export const RED = '\x1b[31m';
export const GREEN = '\x1b[32m';
export const BLUE = '\x1b[34m';
export const WHITE = '\x1b[37m';

// ============================================================================
// Layout
// ============================================================================

/** Top-left corner of the menu box (1-based terminal coordinates) */
export const MENU_X = 5;
export const MENU_Y = 10;
export const MENU_WIDTH = 46;
/** Box height in rows, borders included; bottom border sits above the autoboot line */
export const MENU_HEIGHT = 12;

/** Title shown at the top of the box */
export const BRAND = 'Loader Menu';
