import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LoaderCore } from '../loader/core.js';
import { LoaderEnvironment } from '../loader/environment.js';
import { FakeClock, haltOnCommand, RecordingRenderer, ScriptedInput, type ScriptedKey } from '../testing/fakes.js';
import { GREEN, RED, WHITE } from '../tui/constants.js';
import { autobootMessage } from './autoboot.js';
import { CarouselStore } from './carousel.js';
import { MenuEngine, type MenuEngineOptions } from './engine.js';
import { KEY_BACKSPACE, KEY_DELETE, KEY_ENTER, type Key } from './keys.js';
import { computed, fixed } from './lazy.js';
import { onOff } from './style.js';
import type { MenuDefinition, MenuEntry } from './types.js';

describe('MenuEngine', () => {
  let clock: FakeClock;
  let renderer: RecordingRenderer;
  let carousels: CarouselStore;
  let input: ScriptedInput;

  beforeEach(() => {
    clock = new FakeClock();
    renderer = new RecordingRenderer();
    carousels = new CarouselStore();
  });

  function createEngine(
    root: MenuDefinition,
    keys: Array<Key | ScriptedKey>,
    vars: Record<string, string> = { autoboot_delay: 'NO' },
    overrides: Partial<MenuEngineOptions> = {},
  ): MenuEngine {
    const env = new LoaderEnvironment(vars);
    input = new ScriptedInput(keys, clock);
    return new MenuEngine({
      root,
      input,
      renderer,
      boot: new LoaderCore(env, haltOnCommand),
      carousels,
      env,
      clock,
      ...overrides,
    });
  }

  function menuOf(name: string, entries: MenuEntry[]): MenuDefinition {
    return { name, entries: fixed(entries) };
  }

  const quit: MenuEntry = { type: 'return', label: fixed('Quit'), aliases: ['q'] };

  it('should toggle a flag, redraw it, then close on a return entry', async () => {
    let flag = false;
    const menu = menuOf('flags', [
      {
        type: 'action',
        label: computed(() => onOff('Flag: ', flag)),
        aliases: ['a'],
        run: () => {
          flag = !flag;
        },
      },
      quit,
    ]);
    const engine = createEngine(menu, ['a', 'q']);

    await engine.process(menu);

    expect(flag).toBe(true);
    expect(renderer.frames).toHaveLength(2);
    expect(renderer.frames[0][0].text).toBe(`1. Flag: ${RED}off${WHITE}`);
    expect(renderer.frames[1][0].text).toBe(`1. Flag: ${GREEN}On${WHITE}`);
    expect(input.remaining).toBe(0);
  });

  it('should not leave the root menu on Backspace or Delete', async () => {
    const root = menuOf('welcome', [quit]);
    const engine = createEngine(root, [KEY_BACKSPACE, KEY_DELETE, 'q']);

    await engine.process(root);

    expect(input.readKeyCalls).toBe(3);
    expect(renderer.frames).toHaveLength(1);
  });

  it('should ignore keys that select nothing', async () => {
    const root = menuOf('welcome', [quit]);
    const engine = createEngine(root, ['z', '9', 'q']);

    await engine.process(root);

    expect(input.readKeyCalls).toBe(3);
    expect(renderer.frames).toHaveLength(1);
  });

  it('should select entries by their position number', async () => {
    const run = vi.fn();
    const root = menuOf('welcome', [{ type: 'action', label: fixed('Go'), aliases: ['g'], run }, quit]);
    const engine = createEngine(root, ['1', '2']);

    await engine.process(root);

    expect(run).toHaveBeenCalledOnce();
    expect(input.remaining).toBe(0);
  });

  it('should come back from a submenu on Backspace with the parent redrawn', async () => {
    const childRun = vi.fn();
    const child = menuOf('options', [{ type: 'action', label: fixed('Child'), aliases: ['c'], run: childRun }]);
    const root = menuOf('welcome', [
      {
        type: 'carousel',
        carouselId: 'kernel',
        items: fixed(['kernel', 'kernel.old']),
        label: (index, choice) => `Kernel: ${choice} (${index})`,
        emptyLabel: 'Kernel: ',
        aliases: ['k'],
        run: vi.fn(),
      },
      { type: 'submenu', label: fixed('Options'), submenu: child, aliases: ['o'] },
      quit,
    ]);
    carousels.set('be_active', 3);
    const engine = createEngine(root, ['k', 'o', 'c', KEY_BACKSPACE, 'q']);

    await engine.process(root);

    expect(childRun).toHaveBeenCalledOnce();
    expect(carousels.get('kernel')).toBe(2);
    expect(carousels.get('be_active')).toBe(3);
    // root, root after k, child, child after c, root again
    expect(renderer.frames.map((frame) => frame[0].text)).toEqual([
      '1. Kernel: kernel (1)',
      '1. Kernel: kernel.old (2)',
      '1. Child',
      '1. Child',
      '1. Kernel: kernel.old (2)',
    ]);
  });

  it('should leave a submenu on Delete too', async () => {
    const child = menuOf('options', [{ type: 'separator', label: fixed('Nothing here') }]);
    const root = menuOf('welcome', [{ type: 'submenu', label: fixed('Options'), submenu: child, aliases: ['o'] }, quit]);
    const engine = createEngine(root, ['o', KEY_DELETE, 'q']);

    await engine.process(root);

    expect(renderer.frames).toHaveLength(3);
    expect(renderer.frames[1]).toEqual([{ text: 'Nothing here', selectable: false }]);
  });

  it('should boot on Enter', async () => {
    const root = menuOf('welcome', [quit]);
    const engine = createEngine(root, [KEY_ENTER, 'q']);

    await expect(engine.process(root)).rejects.toMatchObject({ command: 'boot' });
    expect(input.remaining).toBe(1);
  });

  it('should handle the initial key without reading input', async () => {
    const root = menuOf('welcome', [quit]);
    const engine = createEngine(root, []);

    await engine.process(root, 'q');

    expect(input.readKeyCalls).toBe(0);
  });

  it('should not redraw a menu that is already on screen', async () => {
    const root = menuOf('welcome', [quit]);
    const engine = createEngine(root, []);

    engine.draw(root);
    await engine.process(root, 'q');

    expect(renderer.frames).toHaveLength(1);
    expect(renderer.clears).toBe(1);
  });

  it('should give a duplicated alias to the first entry that claims it', async () => {
    const first = vi.fn();
    const second = vi.fn();
    const root = menuOf('welcome', [
      { type: 'action', label: fixed('First'), aliases: ['s'], run: first },
      { type: 'action', label: fixed('Second'), aliases: ['s'], run: second },
      quit,
    ]);
    const engine = createEngine(root, ['s', 'q']);

    await engine.process(root);

    expect(first).toHaveBeenCalledOnce();
    expect(second).not.toHaveBeenCalled();
  });

  it('should leave hidden entries out of the alias table', async () => {
    const hiddenRun = vi.fn();
    const root = menuOf('welcome', [
      { type: 'action', label: fixed('Hidden'), aliases: ['h'], run: hiddenRun, visible: () => false },
      quit,
    ]);
    const engine = createEngine(root, ['h', 'q']);

    await engine.process(root);

    expect(hiddenRun).not.toHaveBeenCalled();
    expect(renderer.lastFrame()).toEqual(['1. Quit']);
  });

  it('should use handler overrides', async () => {
    const run = vi.fn();
    const root = menuOf('welcome', [{ type: 'action', label: fixed('Close'), aliases: ['c'], run }]);
    const engine = createEngine(root, ['c'], undefined, { handlers: { action: () => false } });

    await engine.process(root);

    expect(run).not.toHaveBeenCalled();
    expect(input.remaining).toBe(0);
  });

  describe('run', () => {
    it('should feed the key that stopped autoboot to the menu', async () => {
      const root = menuOf('welcome', [quit]);
      const engine = createEngine(root, [{ key: 'q', at: 2000 }], { autoboot_delay: '5' });

      await engine.run();

      expect(input.readKeyCalls).toBe(1);
      expect(renderer.writes[0]).toBe(autobootMessage(5));
      expect(renderer.writes[renderer.writes.length - 1]).toBe('Exiting menu!\n');
    });

    it('should wait for input when autoboot is disabled', async () => {
      const root = menuOf('welcome', [quit]);
      const engine = createEngine(root, ['q'], { autoboot_delay: 'NO' });

      await engine.run();

      expect(input.readKeyCalls).toBe(1);
      expect(renderer.writes).toEqual(['Exiting menu!\n']);
      expect(renderer.frames).toHaveLength(1);
    });

    it('should boot when autoboot expires', async () => {
      const root = menuOf('welcome', [quit]);
      const engine = createEngine(root, [], { autoboot_delay: '1' });

      await expect(engine.run()).rejects.toMatchObject({ command: 'boot' });
      expect(renderer.frames).toHaveLength(1);
    });
  });
});
