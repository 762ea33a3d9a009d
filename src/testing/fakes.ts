// In-process stand-ins for the terminal and the clock, used by the tests

import type { LoaderCommand } from '../loader/core.js';
import { layoutMenu, type MenuLine } from '../menu/aliases.js';
import type { Clock } from '../menu/autoboot.js';
import type { Key } from '../menu/keys.js';
import type { AliasTable, InputSource, RenderService, VisibleEntry } from '../menu/types.js';

/**
 * Thrown by the test perform callback so a boot or reboot unwinds the
 * engine instead of ending the process
 */
export class LoaderHalt extends Error {
  constructor(
    readonly command: LoaderCommand,
    readonly vars: Record<string, string>,
  ) {
    super(`loader ${command}`);
    this.name = 'LoaderHalt';
  }
}

export function haltOnCommand(command: LoaderCommand, vars: Record<string, string>): never {
  throw new LoaderHalt(command, vars);
}

/**
 * Clock that only moves when the code under test sleeps
 */
export class FakeClock implements Clock {
  time = 0;

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.time += ms;
  }
}

export interface ScriptedKey {
  key: Key;
  /** Clock time (ms) at which the key becomes pending; immediately if omitted */
  at?: number;
}

/**
 * Replays a fixed list of keys. Reading past the end rejects, which ends
 * a test that forgot to leave the menu instead of hanging it.
 */
export class ScriptedInput implements InputSource {
  private readonly keys: ScriptedKey[];
  readKeyCalls = 0;

  constructor(
    keys: Array<Key | ScriptedKey>,
    private readonly clock: FakeClock = new FakeClock(),
  ) {
    this.keys = keys.map((key) => (typeof key === 'string' ? { key } : key));
  }

  get remaining(): number {
    return this.keys.length;
  }

  hasPendingKey(): boolean {
    const next = this.keys[0];
    return next !== undefined && (next.at === undefined || next.at <= this.clock.now());
  }

  async readKey(): Promise<Key> {
    this.readKeyCalls++;
    const next = this.keys.shift();
    if (next === undefined) {
      throw new Error('No more scripted input');
    }
    // Blocking read: time passes until the key arrives
    if (next.at !== undefined && next.at > this.clock.now()) {
      this.clock.time = next.at;
    }
    return next.key;
  }
}

/**
 * Records what would have been drawn
 */
export class RecordingRenderer implements RenderService {
  /** Lines of every menu drawn, oldest first */
  readonly frames: MenuLine[][] = [];
  readonly writes: string[] = [];
  readonly cursor: Array<{ x: number; y: number }> = [];
  clears = 0;

  render(entries: readonly VisibleEntry[]): AliasTable {
    const layout = layoutMenu(entries);
    this.frames.push(layout.lines);
    return layout.aliases;
  }

  clearScreen(): void {
    this.clears++;
  }

  setCursor(x: number, y: number): void {
    this.cursor.push({ x, y });
  }

  resetCursor(): void {}

  write(text: string): void {
    this.writes.push(text);
  }

  /** Text of the most recent frame */
  lastFrame(): string[] {
    return (this.frames[this.frames.length - 1] ?? []).map((line) => line.text);
  }
}
