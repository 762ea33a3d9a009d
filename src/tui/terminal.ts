/**
 * terminal-kit front end for the menu engine
 *
 * TerminalRenderer draws the menu box and TerminalInput queues key events,
 * so the engine can poll for keys during autoboot and await them otherwise.
 */

import termKit from 'terminal-kit';
import type { Terminal } from 'terminal-kit';
import { noopLogger, type DebugLogger } from '../log.js';
import { layoutMenu } from '../menu/aliases.js';
import type { Key } from '../menu/keys.js';
import type { AliasTable, InputSource, RenderService, VisibleEntry } from '../menu/types.js';
import { BRAND, DIM, MENU_WIDTH, MENU_X, RESET } from './constants.js';
import { menuBox, type MenuBox } from './layout.js';
import { exitTerminal } from './terminal-cleanup.js';

/**
 * Box drawing characters for borders
 */
const BOX_CHARS = {
  topLeft: '\u2554', // ╔
  topRight: '\u2557', // ╗
  bottomLeft: '\u255A', // ╚
  bottomRight: '\u255D', // ╝
  horizontal: '\u2550', // ═
  vertical: '\u2551', // ║
};

/** Where the cursor rests between draws */
const DEFAULT_CURSOR = { x: 1, y: 25 };

export function createTerminal(): Terminal {
  const term = termKit.terminal;
  term.fullscreen(true);
  term.hideCursor();
  return term;
}

export class TerminalRenderer implements RenderService {
  constructor(
    private readonly term: Terminal,
    private readonly log: DebugLogger = noopLogger,
  ) {}

  render(entries: readonly VisibleEntry[]): AliasTable {
    const layout = layoutMenu(entries);
    if (layout.duplicates.length > 0) {
      this.log({
        type: 'menu',
        text: 'Duplicate aliases, first entry kept',
        details: { keys: layout.duplicates },
      });
    }

    const box = menuBox(layout.lines.length);
    this.drawBox(box);
    layout.lines.forEach((line, idx) => {
      this.term.moveTo(MENU_X + 2, box.firstRow + idx);
      process.stdout.write(line.selectable ? line.text : `${DIM}${line.text}${RESET}`);
    });

    return layout.aliases;
  }

  clearScreen(): void {
    this.term.clear();
  }

  setCursor(x: number, y: number): void {
    // terminal-kit coordinates start at 1
    this.term.moveTo(Math.max(1, x), Math.max(1, y));
  }

  resetCursor(): void {
    this.term.moveTo(DEFAULT_CURSOR.x, DEFAULT_CURSOR.y);
  }

  write(text: string): void {
    process.stdout.write(text);
  }

  private drawBox(box: MenuBox): void {
    const inner = MENU_WIDTH - 2;
    const title = ` ${BRAND} `;
    const left = Math.floor((inner - title.length) / 2);
    const top =
      BOX_CHARS.topLeft +
      BOX_CHARS.horizontal.repeat(left) +
      title +
      BOX_CHARS.horizontal.repeat(inner - left - title.length) +
      BOX_CHARS.topRight;

    this.term.moveTo(MENU_X, box.top);
    process.stdout.write(top);
    for (let row = box.top + 1; row < box.bottom; row++) {
      this.term.moveTo(MENU_X, row);
      process.stdout.write(BOX_CHARS.vertical);
      this.term.moveTo(MENU_X + MENU_WIDTH - 1, row);
      process.stdout.write(BOX_CHARS.vertical);
    }
    this.term.moveTo(MENU_X, box.bottom);
    process.stdout.write(BOX_CHARS.bottomLeft + BOX_CHARS.horizontal.repeat(inner) + BOX_CHARS.bottomRight);
  }
}

export class TerminalInput implements InputSource {
  private readonly queue: Key[] = [];
  private waiter: ((key: Key) => void) | null = null;

  constructor(private readonly term: Terminal) {
    term.grabInput(true);
    term.on('key', (name: string) => {
      // Exit on quit keys
      if (name === 'CTRL_C') {
        this.close();
        exitTerminal();
      } else {
        this.push(name);
      }
    });
  }

  hasPendingKey(): boolean {
    return this.queue.length > 0;
  }

  readKey(): Promise<Key> {
    const next = this.queue.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    this.term.removeAllListeners('key');
    this.term.grabInput(false);
  }

  private push(key: Key): void {
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(key);
      return;
    }
    this.queue.push(key);
  }
}
