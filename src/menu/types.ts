// Menu data model and the collaborators the menu engine drives

import type { Key } from './keys.js';
import type { Lazy } from './lazy.js';

// ============================================================================
// Menu entries
// ============================================================================

/**
 * Fields shared by every entry
 */
interface EntryBase {
  /** Entry is drawn and aliased only while this returns true (default: always) */
  visible?: () => boolean;
}

/**
 * Runs an effect; the menu stays open afterwards
 */
export interface ActionEntry extends EntryBase {
  type: 'action';
  label: Lazy<string>;
  /** Label used when the root menu is shown in its single-user order */
  alternateLabel?: Lazy<string>;
  aliases?: readonly Key[];
  run: () => void;
}

export type CarouselLabel = (index: number, choice: string, choices: readonly string[]) => string;
export type CarouselEffect = (index: number, choice: string, choices: readonly string[]) => void;

/**
 * Rotates through a list of choices, one step per selection
 */
export interface CarouselEntry extends EntryBase {
  type: 'carousel';
  carouselId: string;
  items: Lazy<readonly string[]>;
  label: CarouselLabel;
  /** Shown instead of `label` while there are no choices */
  emptyLabel: string;
  aliases?: readonly Key[];
  run: CarouselEffect;
}

/**
 * Opens a nested menu; returns here when the child menu exits
 */
export interface SubmenuEntry extends EntryBase {
  type: 'submenu';
  label: Lazy<string>;
  submenu: MenuDefinition;
  aliases?: readonly Key[];
}

/**
 * Closes the current menu level, optionally running an effect first
 */
export interface ReturnEntry extends EntryBase {
  type: 'return';
  label: Lazy<string>;
  aliases?: readonly Key[];
  run?: () => void;
}

/**
 * Non-selectable line; never numbered or aliased
 */
export interface SeparatorEntry extends EntryBase {
  type: 'separator';
  label?: Lazy<string>;
}

export type MenuEntry = ActionEntry | CarouselEntry | SubmenuEntry | ReturnEntry | SeparatorEntry;

export type EntryType = MenuEntry['type'];

/**
 * A menu: a fixed entry list, or a producer for menus whose order can change
 */
export interface MenuDefinition {
  name: string;
  entries: Lazy<readonly MenuEntry[]>;
}

/**
 * An entry as it appears in one draw, label already resolved
 */
export interface VisibleEntry {
  entry: MenuEntry;
  label: string;
}

/**
 * Input key -> entry it selects, valid for a single draw
 */
export type AliasTable = ReadonlyMap<Key, MenuEntry>;

// ============================================================================
// Collaborators
// ============================================================================

export interface InputSource {
  /** True when a key is waiting to be read without blocking */
  hasPendingKey(): boolean;
  /** Waits for the next key */
  readKey(): Promise<Key>;
}

export interface RenderService {
  /** Draws the entries and returns the aliases that select them */
  render(entries: readonly VisibleEntry[]): AliasTable;
  clearScreen(): void;
  setCursor(x: number, y: number): void;
  resetCursor(): void;
  write(text: string): void;
}

export interface BootControl {
  /** Boots the selected kernel; control never comes back */
  boot(): never;
  reboot(): never;
  setSingleUser(value?: boolean): void;
  setSafeMode(value?: boolean): void;
  setVerbose(value?: boolean): void;
  setACPI(value?: boolean): void;
  setDefaults(): void;
  isSingleUserBoot(): boolean;
  isSafeMode(): boolean;
  isVerbose(): boolean;
  isACPIEnabled(): boolean;
  isSystem386(): boolean;
  isZFSBoot(): boolean;
  bootenvList(): string[];
  kernelList(): string[];
  bootenvDefault(): string | undefined;
}

export interface ConfigStore {
  reload(): void;
  selectKernel(name: string): void;
}

export interface Environment {
  getEnv(name: string): string | undefined;
  setEnv(name: string, value: string): void;
  unsetEnv(name: string): void;
}
