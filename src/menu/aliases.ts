// Visible entries and the alias table built from them on each draw

import type { CarouselStore } from './carousel.js';
import type { Key } from './keys.js';
import { resolve } from './lazy.js';
import type { AliasTable, MenuDefinition, MenuEntry, VisibleEntry } from './types.js';

/**
 * One screen line of a laid-out menu
 */
export interface MenuLine {
  text: string;
  selectable: boolean;
}

export interface MenuLayout {
  lines: MenuLine[];
  aliases: AliasTable;
  /** Keys claimed by more than one entry; the first claim was kept */
  duplicates: Key[];
}

function isVisible(entry: MenuEntry): boolean {
  return entry.visible === undefined || entry.visible();
}

/**
 * Resolves the label an entry shows right now
 */
export function entryLabel(entry: MenuEntry, carousels: CarouselStore): string {
  switch (entry.type) {
    case 'carousel': {
      const choices = resolve(entry.items);
      const index = carousels.get(entry.carouselId);
      const choice = choices[index - 1];
      if (choice === undefined) {
        return entry.emptyLabel;
      }
      return entry.label(index, choice, choices);
    }
    case 'separator':
      return entry.label ? resolve(entry.label) : '';
    default:
      return resolve(entry.label);
  }
}

/**
 * Entries of a menu that are visible right now, with their labels
 */
export function visibleEntries(menu: MenuDefinition, carousels: CarouselStore): VisibleEntry[] {
  return resolve(menu.entries)
    .filter(isVisible)
    .map((entry) => ({ entry, label: entryLabel(entry, carousels) }));
}

/**
 * Numbers the selectable entries and builds their alias table.
 *
 * Every selectable entry answers to its position number and to its own
 * aliases. When two entries claim the same key, the first one keeps it.
 */
export function layoutMenu(entries: readonly VisibleEntry[]): MenuLayout {
  const aliases = new Map<Key, MenuEntry>();
  const duplicates: Key[] = [];
  const lines: MenuLine[] = [];

  const claim = (key: Key, entry: MenuEntry): void => {
    if (aliases.has(key)) {
      duplicates.push(key);
      return;
    }
    aliases.set(key, entry);
  };

  let number = 0;
  for (const { entry, label } of entries) {
    if (entry.type === 'separator') {
      lines.push({ text: label, selectable: false });
      continue;
    }

    number++;
    lines.push({ text: `${number}. ${label}`, selectable: true });
    claim(String(number), entry);
    for (const key of entry.aliases ?? []) {
      claim(key, entry);
    }
  }

  return { lines, aliases, duplicates };
}
