// Boot control: boot flags, kernel and boot environment lists, boot/reboot
//
// Flags are stored as loader variables so that whatever is set when the
// user boots is exactly what gets handed over.

import { noopLogger, type DebugLogger } from '../log.js';
import type { BootControl } from '../menu/types.js';
import type { LoaderEnvironment } from './environment.js';

export type LoaderCommand = 'boot' | 'reboot';

/**
 * Carries out a boot or reboot with the final environment. Never returns.
 */
export type PerformCommand = (command: LoaderCommand, env: Record<string, string>) => never;

const DEFAULT_KERNEL = 'kernel';

/** Variables set while safe mode is on, unset when it is turned off */
const SAFE_MODE_VARS: Record<string, string> = {
  'kern.smp.disabled': '1',
  'hw.ata.ata_dma': '0',
  'hw.ata.atapi_dma': '0',
  'hw.ata.wc': '0',
  'hw.eisa_slots': '0',
  'kern.eventtimer.periodic': '1',
  'kern.geom.part.check_integrity': '0',
};

function isYes(value: string | undefined): boolean {
  return value !== undefined && value.toLowerCase() === 'yes';
}

export class LoaderCore implements BootControl {
  private kernels: string[] | null = null;

  constructor(
    private readonly env: LoaderEnvironment,
    private readonly perform: PerformCommand,
    private readonly log: DebugLogger = noopLogger,
  ) {}

  boot(): never {
    this.log({ type: 'loader', text: 'Booting', details: { kernel: this.env.getEnv('kernel') } });
    return this.perform('boot', this.env.snapshot());
  }

  reboot(): never {
    this.log({ type: 'loader', text: 'Rebooting' });
    return this.perform('reboot', this.env.snapshot());
  }

  // ==========================================================================
  // Flags (called without a value, a setter flips the current state)
  // ==========================================================================

  isSingleUserBoot(): boolean {
    return isYes(this.env.getEnv('boot_single'));
  }

  setSingleUser(value: boolean = !this.isSingleUserBoot()): void {
    this.setYesFlag('boot_single', value);
  }

  isVerbose(): boolean {
    return isYes(this.env.getEnv('boot_verbose'));
  }

  setVerbose(value: boolean = !this.isVerbose()): void {
    this.setYesFlag('boot_verbose', value);
  }

  isSafeMode(): boolean {
    return this.env.getEnv('kern.smp.disabled') === '1';
  }

  setSafeMode(value: boolean = !this.isSafeMode()): void {
    for (const [name, setting] of Object.entries(SAFE_MODE_VARS)) {
      if (value) {
        this.env.setEnv(name, setting);
      } else {
        this.env.unsetEnv(name);
      }
    }
    this.log({ type: 'loader', text: `Safe mode ${value ? 'on' : 'off'}` });
  }

  isACPIEnabled(): boolean {
    return this.env.getEnv('hint.acpi.0.disabled') !== '1';
  }

  setACPI(value: boolean = !this.isACPIEnabled()): void {
    this.env.setEnv('acpi_load', value ? 'YES' : 'NO');
    this.env.setEnv('hint.acpi.0.disabled', value ? '0' : '1');
    this.log({ type: 'loader', text: `ACPI ${value ? 'on' : 'off'}` });
  }

  setDefaults(): void {
    if (this.isSystem386()) {
      this.setACPI(true);
    }
    this.setSafeMode(false);
    this.setSingleUser(false);
    this.setVerbose(false);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  isSystem386(): boolean {
    return this.env.getEnv('machine_arch') === 'i386';
  }

  isZFSBoot(): boolean {
    return this.env.getEnv('currdev')?.startsWith('zfs:') ?? false;
  }

  bootenvDefault(): string | undefined {
    return this.env.getEnv('zfs_be_active');
  }

  /**
   * Boot environments, the active one first
   */
  bootenvList(): string[] {
    const count = Number(this.env.getEnv('bootenvs_count'));
    if (!Number.isInteger(count) || count <= 0) {
      return [];
    }

    const bootenvs: string[] = [];
    const current = this.bootenvDefault();
    if (current !== undefined) {
      bootenvs.push(current);
    }
    for (let i = 0; i < count; i++) {
      const name = this.env.getEnv(`bootenvs[${i}]`);
      if (name !== undefined && !bootenvs.includes(name)) {
        bootenvs.push(name);
      }
    }
    return bootenvs;
  }

  /**
   * Bootable kernels, the configured default first.
   * Read once: selecting a kernel rewrites `kernel`, and the carousel
   * positions depend on the order staying put.
   */
  kernelList(): string[] {
    if (this.kernels !== null) {
      return this.kernels;
    }

    const defaultKernel = this.env.getEnv('kernel') ?? DEFAULT_KERNEL;
    const kernels = [defaultKernel];
    for (const name of (this.env.getEnv('kernels') ?? '').split(/[;, ]+/)) {
      if (name !== '' && !kernels.includes(name)) {
        kernels.push(name);
      }
    }
    this.kernels = kernels;
    return kernels;
  }

  private setYesFlag(name: string, value: boolean): void {
    if (value) {
      this.env.setEnv(name, 'YES');
    } else {
      this.env.unsetEnv(name);
    }
    this.log({ type: 'loader', text: `${name} ${value ? 'set' : 'cleared'}` });
  }
}
