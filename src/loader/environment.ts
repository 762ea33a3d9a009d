// Loader variables for the current boot session

import type { Environment } from '../menu/types.js';

/**
 * In-memory loader environment.
 * Boot flags, the kernel selection and the boot device all live here, and
 * the full set is what gets handed over when booting.
 */
export class LoaderEnvironment implements Environment {
  private readonly vars = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.vars.set(name, value);
    }
  }

  getEnv(name: string): string | undefined {
    return this.vars.get(name);
  }

  setEnv(name: string, value: string): void {
    this.vars.set(name, value);
  }

  unsetEnv(name: string): void {
    this.vars.delete(name);
  }

  /**
   * Copy of every variable, sorted by name
   */
  snapshot(): Record<string, string> {
    return Object.fromEntries([...this.vars.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }
}
