// Menu box geometry (1-based terminal rows)

import { MENU_HEIGHT, MENU_Y } from './constants.js';

export interface MenuBox {
  top: number;
  bottom: number;
  /** Row of the first entry */
  firstRow: number;
}

/**
 * Rows of the box for a menu of `lineCount` lines. The height is fixed
 * and only grows for menus that would not fit.
 */
export function menuBox(lineCount: number): MenuBox {
  const height = Math.max(MENU_HEIGHT, lineCount + 2);
  return {
    top: MENU_Y,
    bottom: MENU_Y + height - 1,
    firstRow: MENU_Y + 1,
  };
}
