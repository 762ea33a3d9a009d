// Loader menu tree
// welcome (root) -> boot options, boot environments

import { BLUE, GREEN, RESET } from '../tui/constants.js';
import type { CarouselStore } from './carousel.js';
import { KEY_ESCAPE } from './keys.js';
import { computed, fixed } from './lazy.js';
import { Memo } from './memo.js';
import { highlight, onOff } from './style.js';
import type {
  BootControl,
  ConfigStore,
  Environment,
  MenuDefinition,
  MenuEntry,
} from './types.js';

export interface MenuModelDeps {
  boot: BootControl;
  config: ConfigStore;
  env: Environment;
  carousels: CarouselStore;
}

const BACK_TO_MAIN = `Back to main menu${highlight(' [Backspace]')}`;

/**
 * Single-user order of the root menu: the first two entries trade places
 * and switch to their alternate labels, so the [Enter] hint follows the
 * single-user entry.
 */
export function swapForSingleUser(entries: readonly MenuEntry[]): MenuEntry[] {
  const swapped = entries.map(withAlternateLabel);
  if (swapped.length >= 2) {
    [swapped[0], swapped[1]] = [swapped[1], swapped[0]];
  }
  return swapped;
}

function withAlternateLabel(entry: MenuEntry, index: number): MenuEntry {
  if (index > 1 || entry.type !== 'action' || entry.alternateLabel === undefined) {
    return entry;
  }
  return { ...entry, label: entry.alternateLabel };
}

export class MenuModel {
  readonly welcome: MenuDefinition;
  readonly bootOptions: MenuDefinition;
  readonly bootEnvironments: MenuDefinition;

  private readonly welcomeEntries: readonly MenuEntry[];
  private readonly singleUserEntries = new Memo<readonly MenuEntry[]>();

  constructor(private readonly deps: MenuModelDeps) {
    this.bootOptions = { name: 'boot_options', entries: fixed(this.createBootOptionsEntries()) };
    this.bootEnvironments = {
      name: 'boot_environments',
      entries: fixed(this.createBootEnvironmentEntries()),
    };
    this.welcomeEntries = this.createWelcomeEntries();
    this.welcome = { name: 'welcome', entries: computed(() => this.rootEntries()) };
  }

  /**
   * Entries of the root menu in their current order.
   * The single-user order is built once and reused on every redraw.
   */
  rootEntries(): readonly MenuEntry[] {
    if (!this.deps.boot.isSingleUserBoot()) {
      return this.welcomeEntries;
    }
    return this.singleUserEntries.get(() => swapForSingleUser(this.welcomeEntries));
  }

  /** Forces the single-user order to be rebuilt on next use */
  invalidateRootEntries(): void {
    this.singleUserEntries.clear();
  }

  private selectBootenv(name: string): void {
    const { env, config } = this.deps;
    env.setEnv('vfs.root.mountfrom', name);
    env.setEnv('currdev', `${name}:`);
    config.reload();
    // The new environment's loader.conf may change what the root shows
    this.invalidateRootEntries();
  }

  private createWelcomeEntries(): MenuEntry[] {
    const { boot, config, env } = this.deps;

    return [
      {
        type: 'action',
        label: fixed(`${highlight('B')}oot Multi user ${highlight('[Enter]')}`),
        alternateLabel: fixed(`${highlight('B')}oot Multi user`),
        aliases: ['b', 'B'],
        run: () => {
          boot.setSingleUser(false);
          boot.boot();
        },
      },
      {
        type: 'action',
        label: fixed(`Boot ${highlight('S')}ingle user`),
        alternateLabel: fixed(`Boot ${highlight('S')}ingle user ${highlight('[Enter]')}`),
        aliases: ['s', 'S'],
        run: () => {
          boot.setSingleUser(true);
          boot.boot();
        },
      },
      {
        type: 'return',
        label: fixed(`${highlight('Esc')}ape to loader prompt`),
        aliases: [KEY_ESCAPE],
        run: () => {
          env.setEnv('autoboot_delay', 'NO');
        },
      },
      {
        type: 'action',
        label: fixed(`${highlight('R')}eboot`),
        aliases: ['r', 'R'],
        run: () => {
          boot.reboot();
        },
      },
      { type: 'separator' },
      { type: 'separator', label: fixed('Options:') },
      {
        type: 'carousel',
        carouselId: 'kernel',
        items: computed(() => boot.kernelList()),
        label: (index, choice, choices) => {
          const isDefault = index === 1;
          const name = isDefault ? `default/${GREEN}${choice}${RESET}` : `${BLUE}${choice}${RESET}`;
          return `${highlight('K')}ernel: ${name} (${index} of ${choices.length})`;
        },
        emptyLabel: 'Kernel: ',
        aliases: ['k', 'K'],
        run: (_index, choice) => {
          config.selectKernel(choice);
        },
      },
      {
        type: 'submenu',
        label: fixed(`Boot ${highlight('O')}ptions`),
        submenu: this.bootOptions,
        aliases: ['o', 'O'],
      },
      {
        type: 'submenu',
        label: fixed(`Boot ${highlight('E')}nvironments`),
        submenu: this.bootEnvironments,
        aliases: ['e', 'E'],
        visible: () => boot.isZFSBoot() && boot.bootenvList().length > 1,
      },
    ];
  }

  private createBootOptionsEntries(): MenuEntry[] {
    const { boot } = this.deps;

    return [
      { type: 'return', label: fixed(BACK_TO_MAIN) },
      {
        type: 'action',
        label: fixed(`Load System ${highlight('D')}efaults`),
        aliases: ['d', 'D'],
        run: () => boot.setDefaults(),
      },
      { type: 'separator' },
      { type: 'separator', label: fixed('Boot Options:') },
      {
        type: 'action',
        label: computed(() => onOff(`${highlight('A')}CPI       :`, boot.isACPIEnabled())),
        aliases: ['a', 'A'],
        visible: () => boot.isSystem386(),
        run: () => boot.setACPI(),
      },
      {
        type: 'action',
        label: computed(() => onOff(`Safe ${highlight('M')}ode  :`, boot.isSafeMode())),
        aliases: ['m', 'M'],
        run: () => boot.setSafeMode(),
      },
      {
        type: 'action',
        label: computed(() => onOff(`${highlight('S')}ingle user:`, boot.isSingleUserBoot())),
        aliases: ['s', 'S'],
        run: () => boot.setSingleUser(),
      },
      {
        type: 'action',
        label: computed(() => onOff(`${highlight('V')}erbose    :`, boot.isVerbose())),
        aliases: ['v', 'V'],
        run: () => boot.setVerbose(),
      },
    ];
  }

  private createBootEnvironmentEntries(): MenuEntry[] {
    const { boot, carousels } = this.deps;

    return [
      { type: 'return', label: fixed(BACK_TO_MAIN) },
      {
        type: 'carousel',
        carouselId: 'be_active',
        items: computed(() => boot.bootenvList()),
        label: (index, choice, choices) => {
          const color = index === 1 ? GREEN : BLUE;
          return `${highlight('A')}ctive: ${color}${choice}${RESET} (${index} of ${choices.length})`;
        },
        emptyLabel: 'Active: ',
        aliases: ['a', 'A'],
        run: (_index, choice) => {
          this.selectBootenv(choice);
        },
      },
      {
        type: 'action',
        label: computed(() => `${highlight('b')}ootfs: ${boot.bootenvDefault() ?? ''}`),
        aliases: ['b', 'B'],
        run: () => {
          // Back to the default boot environment
          carousels.reset('be_active');
          const bootenv = boot.bootenvDefault();
          if (bootenv !== undefined) {
            this.selectBootenv(bootenv);
          }
        },
      },
    ];
  }
}
