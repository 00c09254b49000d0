/**
 * Config Command
 *
 *   stackterm config get <key>           one value, or every value in a section
 *   stackterm config set <key> <value>   check against the schema, then store
 *   stackterm config list                all values, grouped as TOML sections
 *   stackterm config path                location of config.toml
 *   stackterm config reset --force       rewrite the commented template
 *
 * `set` checks the value against the schema the session loads with, so
 * `set input.cancel_key ctrl+g` or `set colors.flash.bg red` fails here.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigValue, setConfigValue, listConfig, resetConfig } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import type { CommandContext } from '../types.js';
import { ConfigError, formatError, getExitCode } from '../../errors/index.js';

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Show or change ~/.stackterm/config.toml');

  configCmd
    .command('get <key>')
    .description('Print a value or a section (e.g. input.cancel_key, colors.flash)')
    .action((key: string) => {
      const ctx = getContext();
      run(ctx, () => getAction(ctx, key));
    });

  configCmd
    .command('set <key> <value>')
    .description('Store a value (e.g. prompt.completion_rows 8, colors.flash.bg bgRed)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      run(ctx, () => setAction(ctx, key, value));
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List every value')
    .action(() => {
      const ctx = getContext();
      run(ctx, () => listAction(ctx));
    });

  configCmd
    .command('path')
    .description('Print the config file location')
    .action(() => {
      const ctx = getContext();
      const path = getConfigPath();
      print(ctx, { path }, [path]);
    });

  configCmd
    .command('reset')
    .description('Replace the config file with the defaults')
    .option('-f, --force', 'Skip the confirmation')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();
      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow(`This replaces ${getConfigPath()} with the defaults.`));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }
      run(ctx, () => {
        resetConfig();
        print(ctx, { reset: true }, [`${chalk.green('✓')} Configuration reset to defaults`]);
      });
    });

  return configCmd;
}

function getAction(ctx: CommandContext, key: string): void {
  const value = getConfigValue(key);
  if (value === undefined) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  if (isSection(value)) {
    const entries = flatten(value);
    print(ctx, { key, value }, entries.map(([name, leaf]) => `${name} = ${toToml(leaf)}`));
    return;
  }
  print(ctx, { key, value }, [typeof value === 'string' ? value : toToml(value)]);
}

function setAction(ctx: CommandContext, key: string, value: string): void {
  setConfigValue(key, value);
  const stored = getConfigValue(key);
  print(ctx, { key, value: stored }, [`${chalk.green('✓')} ${key} = ${toToml(stored)}`]);
}

/**
 * Text output mirrors the file: a `[section]` header, then `name = value`.
 */
function listAction(ctx: CommandContext): void {
  const entries = listConfig();
  if (ctx.options.json) {
    print(ctx, Object.fromEntries(entries), []);
    return;
  }

  let section: string | null = null;
  for (const [key, value] of entries) {
    const dot = key.lastIndexOf('.');
    const header = key.slice(0, dot);
    if (header !== section) {
      if (section !== null) ctx.log('');
      ctx.log(`[${header}]`);
      section = header;
    }
    ctx.log(`${key.slice(dot + 1)} = ${toToml(value)}`);
  }
  ctx.log('');
  ctx.log(chalk.dim(`# ${getConfigPath()}`));
}

/**
 * Run an action; config and validation failures set the exit code and are
 * printed instead of thrown.
 */
function run(ctx: CommandContext, action: () => void): void {
  try {
    action();
  } catch (error) {
    console.error(formatError(error, { json: ctx.options.json, verbose: ctx.options.verbose }));
    process.exitCode = getExitCode(error);
  }
}

function print(ctx: CommandContext, json: unknown, lines: string[]): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(json));
    return;
  }
  for (const line of lines) ctx.log(line);
}

type Section = { [key: string]: unknown };

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flatten(section: Section, prefix = ''): Array<[string, unknown]> {
  return Object.entries(section).flatMap(([key, value]): Array<[string, unknown]> => {
    const name = prefix ? `${prefix}.${key}` : key;
    return isSection(value) ? flatten(value, name) : [[name, value]];
  });
}

/** A value as it would be written in config.toml. */
function toToml(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}
