// Label styling helpers

import { BOLD, GREEN, NORMAL_INTENSITY, RED, WHITE } from '../tui/constants.js';

/**
 * Marks the part of a label that is also its hotkey
 */
export function highlight(text: string): string {
  return `${BOLD}${text}${NORMAL_INTENSITY}`;
}

/**
 * Appends a colored On/off state to a toggle label
 */
export function onOff(label: string, value: boolean): string {
  return value ? `${label}${GREEN}On${WHITE}` : `${label}${RED}off${WHITE}`;
}
