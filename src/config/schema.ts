/**
 * Configuration Schema
 *
 * Defines the shape of ~/.stackterm/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 *
 * Every section is strict, so a misspelled key is reported instead of
 * being silently ignored.
 */

import {
  backgroundColorNames,
  foregroundColorNames,
  type BackgroundColorName,
  type ForegroundColorName,
} from 'chalk';
import { z } from 'zod';
import { isKeystroke } from '../tui/keys.js';

const FOREGROUND = new Set<string>(foregroundColorNames);
const BACKGROUND = new Set<string>(backgroundColorNames);

/**
 * Input loop settings
 */
export const InputConfigSchema = z
  .object({
    poll_timeout_ms: z
      .number()
      .int()
      .min(10)
      .max(10000)
      .describe('How long one keystroke poll waits before reporting no event (10-10000)'),
    cancel_key: z
      .string()
      .refine(isKeystroke, { message: 'Expected a keystroke such as "C-g", "escape" or "q"' })
      .describe('Keystroke that cancels prompts and modal dialogs, e.g. "C-g" or "escape"'),
  })
  .strict();

/**
 * Prompt settings
 */
export const PromptConfigSchema = z
  .object({
    completion_rows: z
      .number()
      .int()
      .min(1)
      .max(50)
      .describe('Height of the completion list shown under prompts (1-50)'),
  })
  .strict();

/**
 * Terminal output settings
 */
export const ScreenConfigSchema = z
  .object({
    alternate_screen: z.boolean().describe('Draw on the alternate screen buffer'),
    synchronized_output: z.boolean().describe('Wrap each update in synchronized-output markers'),
  })
  .strict();

/**
 * One semantic color: chalk foreground and background names plus bold
 */
export const ColorSpecSchema = z
  .object({
    fg: z
      .custom<ForegroundColorName>((value) => typeof value === 'string' && FOREGROUND.has(value), {
        message: 'Expected a chalk foreground color such as "cyan" or "blueBright"',
      })
      .optional(),
    bg: z
      .custom<BackgroundColorName>((value) => typeof value === 'string' && BACKGROUND.has(value), {
        message: 'Expected a chalk background color such as "bgCyan"',
      })
      .optional(),
    bold: z.boolean().optional(),
  })
  .strict();

export const ColorsConfigSchema = z
  .object({
    none: ColorSpecSchema,
    status: ColorSpecSchema,
    flash: ColorSpecSchema,
    prompt: ColorSpecSchema,
    completion: ColorSpecSchema,
    completionPrefix: ColorSpecSchema,
    directory: ColorSpecSchema,
    selected: ColorSpecSchema,
  })
  .strict();

/**
 * Shell-out settings
 */
export const ShellConfigSchema = z
  .object({
    command: z.string().optional().describe('Command run by "!" without asking'),
  })
  .strict();

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z
  .object({
    input: InputConfigSchema,
    prompt: PromptConfigSchema,
    screen: ScreenConfigSchema,
    colors: ColorsConfigSchema,
    shell: ShellConfigSchema,
  })
  .strict();

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
