// loader.conf reading and kernel selection

import * as fs from 'node:fs';
import { noopLogger, type DebugLogger } from '../log.js';
import type { ConfigStore, Environment } from '../menu/types.js';

/** name="value", name=value, optionally followed by a comment */
const SETTING_PATTERN = /^([A-Za-z0-9_.[\]-]+)\s*=\s*(?:"([^"]*)"|([^\s#"]*))\s*(?:#.*)?$/;

export interface LoaderConfParseResult {
  settings: Array<[name: string, value: string]>;
  /** 1-based line numbers that could not be read */
  invalidLines: number[];
}

/**
 * Parses loader.conf text.
 * Blank lines and # comments are skipped; unreadable lines are reported
 * and otherwise ignored.
 */
export function parseLoaderConf(text: string): LoaderConfParseResult {
  const settings: Array<[string, string]> = [];
  const invalidLines: number[] = [];

  text.split(/\r?\n/).forEach((rawLine, idx) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }

    const match = SETTING_PATTERN.exec(line);
    if (!match) {
      invalidLines.push(idx + 1);
      return;
    }
    settings.push([match[1], match[2] ?? match[3]]);
  });

  return { settings, invalidLines };
}

export class LoaderConfig implements ConfigStore {
  /** Kernel picked in the menu; outlives reloads */
  private selectedKernel: string | null = null;

  /**
   * @param overrides - Variables that win over loader.conf on every reload
   *   (the command line's --set)
   */
  constructor(
    private readonly env: Environment,
    private readonly confPath: string,
    private readonly log: DebugLogger = noopLogger,
    private readonly overrides: Readonly<Record<string, string>> = {},
  ) {}

  /**
   * Re-reads loader.conf into the environment, then re-applies the
   * overrides and the selected kernel. A missing file leaves the
   * environment as it is.
   */
  reload(): void {
    if (fs.existsSync(this.confPath)) {
      const { settings, invalidLines } = parseLoaderConf(fs.readFileSync(this.confPath, 'utf-8'));
      for (const [name, value] of settings) {
        this.env.setEnv(name, value);
      }

      this.log({
        type: 'config',
        text: `Loaded ${settings.length} setting(s) from ${this.confPath}`,
        details: invalidLines.length > 0 ? { invalidLines } : undefined,
      });
    } else {
      this.log({ type: 'config', text: `No configuration at ${this.confPath}` });
    }

    for (const [name, value] of Object.entries(this.overrides)) {
      this.env.setEnv(name, value);
    }
    if (this.selectedKernel !== null) {
      this.env.setEnv('kernel', this.selectedKernel);
    }
  }

  selectKernel(name: string): void {
    this.selectedKernel = name;
    this.env.setEnv('kernel', name);
    this.log({ type: 'config', text: `Selected kernel ${name}` });
  }
}
