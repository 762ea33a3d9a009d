// Autoboot countdown shown before the menu takes input
//
// The countdown polls for a key between short sleeps, so the remaining
// time keeps redrawing while nobody touches the keyboard. A key other than
// Enter stops it and becomes the menu's first input.

import { z } from 'zod';
import { noopLogger, type DebugLogger } from '../log.js';
import { KEY_ENTER, type Key } from './keys.js';
import type { BootControl, Environment, InputSource, RenderService } from './types.js';

export const DEFAULT_AUTOBOOT_DELAY = 10;

/** Poll interval while counting down */
export const AUTOBOOT_TICK_MS = 50;

export const DEFAULT_TIMEOUT_X = 5;
/** Row of the countdown line; the menu box ends above it */
export const DEFAULT_TIMEOUT_Y = 22;

const MESSAGE_WIDTH = 80;

const DelaySchema = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/)
  .transform(Number);

const CoordinateSchema = z.coerce.number().int().nonnegative();

export type AutobootDelay =
  | { kind: 'disabled' }
  | { kind: 'immediate' }
  | { kind: 'countdown'; seconds: number };

export type AutobootResult =
  | { state: 'disabled' }
  | { state: 'cancelled'; key: Key };

/**
 * Time source for the countdown
 */
export interface Clock {
  /** Milliseconds */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Interprets the `autoboot_delay` loader variable.
 * "NO" turns autoboot off, -1 boots straight away, anything unparsable
 * falls back to the default delay.
 */
export function parseAutobootDelay(raw: string | undefined): AutobootDelay {
  if (raw !== undefined && raw.trim().toLowerCase() === 'no') {
    return { kind: 'disabled' };
  }

  const parsed = DelaySchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: 'countdown', seconds: DEFAULT_AUTOBOOT_DELAY };
  }
  if (parsed.data === -1) {
    return { kind: 'immediate' };
  }
  return { kind: 'countdown', seconds: parsed.data };
}

export function autobootMessage(remaining: number): string {
  return `Autoboot in ${remaining} seconds, hit [Enter] to boot or any other key to stop     `;
}

export interface AutobootTimerOptions {
  env: Environment;
  input: InputSource;
  renderer: RenderService;
  boot: BootControl;
  clock?: Clock;
  onDebugLog?: DebugLogger;
}

export class AutobootTimer {
  private readonly clock: Clock;
  private readonly log: DebugLogger;

  constructor(private readonly options: AutobootTimerOptions) {
    this.clock = options.clock ?? systemClock;
    this.log = options.onDebugLog ?? noopLogger;
  }

  /**
   * Runs the countdown. Resolves only when autoboot is off or the user
   * stopped it; every other outcome boots.
   */
  async run(): Promise<AutobootResult> {
    const { env, input, renderer, boot } = this.options;
    const delay = parseAutobootDelay(env.getEnv('autoboot_delay'));

    if (delay.kind === 'disabled') {
      this.log({ type: 'autoboot', text: 'Autoboot disabled' });
      return { state: 'disabled' };
    }
    if (delay.kind === 'immediate') {
      this.log({ type: 'autoboot', text: 'Autoboot delay is -1, booting immediately' });
      return boot.boot();
    }

    const x = this.coordinate('loader_menu_timeout_x', DEFAULT_TIMEOUT_X);
    const y = this.coordinate('loader_menu_timeout_y', DEFAULT_TIMEOUT_Y);
    const deadline = this.clock.now() + delay.seconds * 1000;
    this.log({ type: 'autoboot', text: `Autoboot countdown started (${delay.seconds}s)` });

    let remaining: number;
    do {
      remaining = Math.ceil((deadline - this.clock.now()) / 1000);
      renderer.setCursor(x, y);
      renderer.write(autobootMessage(remaining));
      renderer.resetCursor();

      if (input.hasPendingKey()) {
        const key = await input.readKey();
        if (key === KEY_ENTER) {
          break;
        }

        // Erase the countdown line
        renderer.setCursor(0, y);
        renderer.write(' '.repeat(MESSAGE_WIDTH));
        renderer.resetCursor();
        this.log({ type: 'autoboot', text: 'Autoboot cancelled', details: { key, remaining } });
        return { state: 'cancelled', key };
      }

      await this.clock.sleep(AUTOBOOT_TICK_MS);
    } while (remaining > 0);

    this.log({ type: 'autoboot', text: 'Autoboot expired, booting' });
    return boot.boot();
  }

  private coordinate(name: string, fallback: number): number {
    const parsed = CoordinateSchema.safeParse(this.options.env.getEnv(name));
    return parsed.success ? parsed.data : fallback;
  }
}
