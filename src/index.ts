#!/usr/bin/env node

// Main entry point for the loader menu
// Builds the loader environment, wires the terminal front end to the menu
// engine and runs it until the user boots, reboots or escapes.

import fs from 'node:fs';
import { formatBootSummary, HELP_TEXT, loadEnvironment, parseArgs } from './cli.js';
import { LoaderCore, type LoaderCommand } from './loader/core.js';
import { createFileLogger, startDebugLog } from './log.js';
import { CarouselStore } from './menu/carousel.js';
import { MenuEngine } from './menu/engine.js';
import { MenuModel } from './menu/model.js';
import { createTerminal, TerminalInput, TerminalRenderer } from './tui/terminal.js';
import { cleanupTerminal } from './tui/terminal-cleanup.js';

/**
 * Get package.json version
 */
function getVersion(): string {
  const pkgPath = new URL('../package.json', import.meta.url);
  const pkg: { version: string } = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  return pkg.version;
}

/**
 * Main application entry point
 * Creates and wires together all components of the loader menu
 */
async function main(): Promise<void> {
  // Track input for cleanup
  let input: TerminalInput | null = null;

  /**
   * Restores the terminal, prints what is being booted and leaves
   */
  function performCommand(command: LoaderCommand, vars: Record<string, string>): never {
    input?.close();
    cleanupTerminal();
    process.stdout.write(formatBootSummary(command, vars));
    process.exit(0);
  }

  try {
    const options = parseArgs(process.argv.slice(2));

    // Handle --help flag (early exit)
    if (options.help) {
      console.log(HELP_TEXT);
      process.exit(0);
    }

    // Handle --version flag (early exit)
    if (options.version) {
      console.log(getVersion());
      process.exit(0);
    }

    startDebugLog();
    const log = createFileLogger();
    log({ type: 'system', text: 'Starting loader menu', details: { conf: options.confPath } });

    const { env, config } = loadEnvironment(options, log);
    const boot = new LoaderCore(env, performCommand, log);
    const carousels = new CarouselStore();
    const model = new MenuModel({ boot, config, env, carousels });

    const term = createTerminal();
    input = new TerminalInput(term);
    const renderer = new TerminalRenderer(term, log);

    const engine = new MenuEngine({
      root: model.welcome,
      input,
      renderer,
      boot,
      carousels,
      env,
      onDebugLog: log,
    });
    await engine.run();

    // Escaped to the loader prompt
    input.close();
    cleanupTerminal();
    process.exit(0);
  } catch (error) {
    // Handle errors: restore terminal, output error, exit with code 1
    if (input) {
      input.close();
      cleanupTerminal();
    }

    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  }
}

// Self-executing entry point
void main();
