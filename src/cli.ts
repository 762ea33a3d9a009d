// Command-line options and the loader environment they produce

import { z } from 'zod';
import { LoaderConfig } from './loader/config.js';
import type { LoaderCommand } from './loader/core.js';
import { LoaderEnvironment } from './loader/environment.js';
import type { DebugLogger } from './log.js';

export const DEFAULT_CONF_PATH = './loader.conf';

const SET_PATTERN = /^[^=\s]+=.*$/;

const OptionsSchema = z.object({
  help: z.boolean(),
  version: z.boolean(),
  conf: z.string().min(1, '--conf needs a path'),
  delay: z.string().min(1, '--delay needs a value').optional(),
  set: z.array(z.string().regex(SET_PATTERN, '--set expects name=value')),
  singleUser: z.boolean(),
});

interface RawOptions {
  help: boolean;
  version: boolean;
  conf: string;
  delay?: string;
  set: string[];
  singleUser: boolean;
}

export interface CliOptions {
  help: boolean;
  version: boolean;
  confPath: string;
  delay?: string;
  /** Variables from --set, applied after loader.conf */
  set: Record<string, string>;
  singleUser: boolean;
}

/**
 * Parses command-line arguments (without node and script path)
 *
 * @throws Error describing every invalid or unknown option
 */
export function parseArgs(args: string[]): CliOptions {
  const raw: RawOptions = {
    help: false,
    version: false,
    conf: DEFAULT_CONF_PATH,
    set: [],
    singleUser: false,
  };
  const unknown: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        raw.help = true;
        break;
      case '-v':
      case '--version':
        raw.version = true;
        break;
      case '--conf':
        raw.conf = args[++i] ?? '';
        break;
      case '--delay':
        raw.delay = args[++i] ?? '';
        break;
      case '--set':
        raw.set.push(args[++i] ?? '');
        break;
      case '--single-user':
        raw.singleUser = true;
        break;
      default:
        unknown.push(arg);
    }
  }

  if (unknown.length > 0) {
    throw new Error(`Unknown option(s): ${unknown.join(' ')}`);
  }

  const parsed = OptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  const { conf, delay, set, ...flags } = parsed.data;
  return {
    ...flags,
    confPath: conf,
    delay,
    set: Object.fromEntries(
      set.map((assignment) => {
        const eq = assignment.indexOf('=');
        return [assignment.slice(0, eq), assignment.slice(eq + 1)];
      }),
    ),
  };
}

/**
 * Variables every session starts with, before loader.conf
 */
export function defaultEnvironment(): Record<string, string> {
  return {
    kernel: 'kernel',
    currdev: 'disk0p2:',
    machine_arch: process.arch === 'ia32' ? 'i386' : 'amd64',
  };
}

/**
 * Builds the session environment: defaults, then loader.conf, then
 * command-line overrides
 */
export function loadEnvironment(
  options: CliOptions,
  log: DebugLogger,
): { env: LoaderEnvironment; config: LoaderConfig } {
  const env = new LoaderEnvironment(defaultEnvironment());
  const config = new LoaderConfig(env, options.confPath, log, options.set);
  config.reload();

  if (options.delay !== undefined) {
    env.setEnv('autoboot_delay', options.delay);
  }
  if (options.singleUser) {
    env.setEnv('boot_single', 'YES');
  }

  return { env, config };
}

/**
 * What gets printed when the menu hands over to the kernel
 */
export function formatBootSummary(command: LoaderCommand, vars: Record<string, string>): string {
  if (command === 'reboot') {
    return 'Rebooting...\n';
  }

  const lines = [`Booting ${vars.kernel ?? 'kernel'}...`];
  for (const [name, value] of Object.entries(vars)) {
    lines.push(`  ${name}=${value}`);
  }
  return `${lines.join('\n')}\n`;
}

export const HELP_TEXT = `
loader-menu - Interactive boot loader menu

  Shows the boot menu with an autoboot countdown. Pick boot options,
  kernels and boot environments with single keys; Enter boots.

USAGE
  loader-menu [options]

OPTIONS
  -h, --help          Show this help message
  -v, --version       Show version number
  --conf <path>       loader.conf to read (default: ${DEFAULT_CONF_PATH})
  --delay <value>     Autoboot delay in seconds, -1 to boot at once, NO to disable
  --set <name=value>  Set a loader variable (repeatable)
  --single-user       Start with single user boot selected

EXAMPLES
  loader-menu                       Menu with a 10 second autoboot
  loader-menu --delay NO            Menu without autoboot
  loader-menu --set kernels=kernel.old --single-user
`;
