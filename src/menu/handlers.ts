// Entry handlers, one per entry type
//
// A handler gets the menu being processed and the selected entry. Returning
// false closes the current menu level; anything else (including nothing)
// keeps it open and the engine redraws it.

import type { CarouselStore } from './carousel.js';
import { MenuDefinitionError } from './errors.js';
import { resolve } from './lazy.js';
import type { EntryType, MenuDefinition, MenuEntry } from './types.js';

export type HandlerResult = boolean | undefined;

/**
 * What handlers may touch besides the entry itself
 */
export interface HandlerContext {
  carousels: CarouselStore;
  /** Runs a child menu until it exits */
  openSubmenu(menu: MenuDefinition): Promise<void>;
}

export type EntryHandler<E extends MenuEntry> = (
  context: HandlerContext,
  menu: MenuDefinition,
  entry: E,
) => HandlerResult | Promise<HandlerResult>;

export type EntryHandlers = {
  [T in EntryType]: EntryHandler<Extract<MenuEntry, { type: T }>>;
};

export const defaultHandlers: EntryHandlers = {
  action: (_context, _menu, entry) => {
    entry.run();
    return undefined;
  },

  carousel: (context, _menu, entry) => {
    const choices = resolve(entry.items);
    if (choices.length > 0) {
      const index = context.carousels.advance(entry.carouselId, choices.length);
      entry.run(index, choices[index - 1], choices);
    }
    return undefined;
  },

  submenu: async (context, _menu, entry) => {
    await context.openSubmenu(entry.submenu);
    return undefined;
  },

  return: (_context, _menu, entry) => {
    entry.run?.();
    return false;
  },

  // Separators have no aliases, so nothing should ever select one
  separator: () => undefined,
};

/**
 * Runs the handler registered for the entry's type
 */
export async function dispatchEntry(
  handlers: EntryHandlers,
  context: HandlerContext,
  menu: MenuDefinition,
  entry: MenuEntry,
): Promise<HandlerResult> {
  switch (entry.type) {
    case 'action':
      return handlers.action(context, menu, entry);
    case 'carousel':
      return handlers.carousel(context, menu, entry);
    case 'submenu':
      return handlers.submenu(context, menu, entry);
    case 'return':
      return handlers.return(context, menu, entry);
    case 'separator':
      return handlers.separator(context, menu, entry);
    default: {
      const unknown: never = entry;
      throw new MenuDefinitionError(`No handler for menu entry ${JSON.stringify(unknown)}`);
    }
  }
}
