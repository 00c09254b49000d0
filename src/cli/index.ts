#!/usr/bin/env node
/**
 * stackterm CLI Entry Point
 *
 * Sets up Commander.js with global options and registers the subcommands.
 * Running `stackterm` with no command starts the interactive session.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createStartCommand } from './commands/start.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

const VERSION = process.env.CLI_VERSION ?? '0.0.0';

// Create the root program
const program = new Command();

program
  .name('stackterm')
  .description('Buffer-stack terminal screen with minibuffer prompts and completion')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('--log-file <path>', 'Append session debug logs to this file')

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('stackterm')}                              Start an interactive session
  ${chalk.cyan('stackterm start notes.txt')}              Start with a file open
  ${chalk.cyan('stackterm config list')}                  Show all configuration
  ${chalk.cyan('stackterm config set input.cancel_key escape')}  Change a setting
`);

/**
 * Hooks run before an error is printed. A running session registers one to
 * restore the terminal.
 */
const cleanups = new Set<() => void>();

function runCleanups(): void {
  for (const fn of cleanups) {
    fn();
  }
  cleanups.clear();
}

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
    onCleanup: (fn: () => void) => {
      cleanups.add(fn);
      return () => {
        cleanups.delete(fn);
      };
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    logFile: opts.logFile,
  };
}

program.addCommand(createStartCommand(() => createContext(getGlobalOptions())), { isDefault: true });
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: stackterm --help  to see available commands`
  );
});

async function main() {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json, cleanup: runCleanups };
  };

  // Errors that escape every try/catch still restore the terminal first
  const globalHandler = (error: unknown) => createGlobalErrorHandler(getErrorOptions())(error);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
