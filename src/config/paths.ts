/**
 * Centralized Path Definitions
 *
 * Single source of truth for stackterm's directory paths. The directory
 * defaults to ~/.stackterm and moves with STACKTERM_HOME.
 *
 * Directory structure:
 * ~/.stackterm/
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

/**
 * Get the stackterm directory path
 * @returns Absolute path to ~/.stackterm, or STACKTERM_HOME when set
 */
export function getStacktermDir(): string {
  return getEnv('STACKTERM_HOME') ?? join(homedir(), '.stackterm');
}

/**
 * Get the config file path
 * @returns Absolute path to the TOML config file
 */
export function getConfigPath(): string {
  return join(getStacktermDir(), 'config.toml');
}
