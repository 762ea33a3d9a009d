// Menu engine: draw -> wait for a key -> dispatch -> redraw or leave
//
// process() calls itself (through the submenu handler) for nested menus,
// so the call stack mirrors the menu path. A level ends on Backspace/Delete
// (anywhere but the root) or when a handler returns false.

import { noopLogger, type DebugLogger } from '../log.js';
import { visibleEntries } from './aliases.js';
import { AutobootTimer, type Clock } from './autoboot.js';
import type { CarouselStore } from './carousel.js';
import { defaultHandlers, dispatchEntry, type EntryHandlers, type HandlerContext } from './handlers.js';
import { isBackKey, KEY_ENTER, type Key } from './keys.js';
import type {
  AliasTable,
  BootControl,
  Environment,
  InputSource,
  MenuDefinition,
  RenderService,
} from './types.js';

export interface MenuEngineOptions {
  /** Default menu; Backspace never leaves it */
  root: MenuDefinition;
  input: InputSource;
  renderer: RenderService;
  boot: BootControl;
  carousels: CarouselStore;
  /** Read for the autoboot settings */
  env: Environment;
  clock?: Clock;
  /** Replaces the built-in handler for the given entry types */
  handlers?: Partial<EntryHandlers>;
  onDebugLog?: DebugLogger;
}

export class MenuEngine {
  private drawnMenu: MenuDefinition | null = null;
  private aliasTable: AliasTable = new Map();
  private readonly handlers: EntryHandlers;
  private readonly context: HandlerContext;
  private readonly log: DebugLogger;

  constructor(private readonly options: MenuEngineOptions) {
    this.handlers = { ...defaultHandlers, ...options.handlers };
    this.context = {
      carousels: options.carousels,
      openSubmenu: (menu) => this.process(menu),
    };
    this.log = options.onDebugLog ?? noopLogger;
  }

  /**
   * Clears the screen and draws the menu's visible entries
   */
  draw(menu: MenuDefinition): void {
    const { renderer, carousels } = this.options;

    renderer.clearScreen();
    renderer.resetCursor();
    this.aliasTable = renderer.render(visibleEntries(menu, carousels));
    this.drawnMenu = menu;
    this.log({ type: 'menu', text: `Drew ${menu.name}`, details: { aliases: [...this.aliasTable.keys()] } });
  }

  /**
   * Handles keys for one menu level until it exits.
   *
   * @param initialKey - Key already pressed (e.g. the one that stopped autoboot),
   *   handled before reading any input
   */
  async process(menu: MenuDefinition, initialKey?: Key): Promise<void> {
    const { input, boot, root } = this.options;

    if (this.drawnMenu !== menu) {
      this.draw(menu);
    }

    let pendingKey = initialKey;
    while (true) {
      const key = pendingKey ?? (await input.readKey());
      pendingKey = undefined;

      if (isBackKey(key) && menu !== root) {
        this.log({ type: 'menu', text: `Leaving ${menu.name}` });
        return;
      }
      if (key === KEY_ENTER) {
        boot.boot();
      }

      const entry = this.aliasTable.get(key);
      if (entry === undefined) {
        continue;
      }

      this.log({ type: 'input', text: `Key ${key} selected ${entry.type} entry in ${menu.name}` });
      const result = await dispatchEntry(this.handlers, this.context, menu, entry);
      if (result === false) {
        this.log({ type: 'menu', text: `Closing ${menu.name}` });
        return;
      }

      // Labels and visibility may have changed
      this.draw(menu);
    }
  }

  /**
   * Draws the root menu, runs autoboot, then hands control to the menu
   */
  async run(): Promise<void> {
    const { root, input, renderer, boot, env, clock } = this.options;

    this.draw(root);
    const autoboot = await new AutobootTimer({
      env,
      input,
      renderer,
      boot,
      clock,
      onDebugLog: this.log,
    }).run();

    await this.process(root, autoboot.state === 'cancelled' ? autoboot.key : undefined);
    this.drawnMenu = null;

    renderer.resetCursor();
    renderer.write('Exiting menu!\n');
    this.log({ type: 'system', text: 'Exiting menu' });
  }
}
