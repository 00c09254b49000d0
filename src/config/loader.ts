/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.stackterm)
 * 2. Load config.toml if it exists
 * 3. Validate with the Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import type { ZodError } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, getStacktermDir } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return isPlainObject(value);
}

/**
 * Ensure the config directory exists
 */
function ensureStacktermDir(): void {
  const dir = getStacktermDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Deep merge two objects, with source values overriding target
 * This handles nested objects properly (unlike Object.assign or spread)
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Read and parse config.toml as raw TOML.
 */
function readConfigFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: stackterm config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureStacktermDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  // Validate against the partial schema (allows missing fields)
  const validationResult = PartialConfigSchema.safeParse(readConfigFile(configPath));
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error)}`,
      'Run: stackterm config reset --force  to restore defaults'
    );
  }

  return ConfigSchema.parse(deepMerge(DEFAULT_CONFIG, validationResult.data));
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('input.cancel_key') => 'C-g'
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined || lastPart === '' || parts.some((part) => part === '')) {
    throw new ConfigError(`Invalid config key: '${key}'`, 'Run: stackterm config list  to see available keys');
  }

  const configPath = getConfigPath();
  ensureStacktermDir();

  const config: TOML.JsonMap = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  const partial = PartialConfigSchema.safeParse(config);
  const merged = partial.success ? ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data)) : partial;
  if (!merged.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(merged.error)}`,
      'Run: stackterm config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Delete the config file and write a fresh template.
 */
export function resetConfig(): void {
  const configPath = getConfigPath();
  if (fs.existsSync(configPath)) {
    fs.unlinkSync(configPath);
  }
  loadConfig(true);
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['input.cancel_key', 'C-g']
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
