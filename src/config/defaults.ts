/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import { DEFAULT_PALETTE } from '../tui/colormap.js';
import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  input: {
    poll_timeout_ms: 1000,
    cancel_key: 'C-g',
  },

  prompt: {
    completion_rows: 10,
  },

  screen: {
    alternate_screen: true,
    synchronized_output: true,
  },

  colors: DEFAULT_PALETTE,

  // No default command: "!" asks for one
  shell: {},
};

/**
 * Config file template (TOML format)
 * Written to ~/.stackterm/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# stackterm configuration
# Location: ~/.stackterm/config.toml (or $STACKTERM_HOME/config.toml)

# Input loop
[input]
poll_timeout_ms = ${DEFAULT_CONFIG.input.poll_timeout_ms}
cancel_key = "${DEFAULT_CONFIG.input.cancel_key}"   # e.g. "C-g", "escape", "C-c"

# Prompts
[prompt]
completion_rows = ${DEFAULT_CONFIG.prompt.completion_rows}

# Terminal output
[screen]
alternate_screen = ${DEFAULT_CONFIG.screen.alternate_screen}
synchronized_output = ${DEFAULT_CONFIG.screen.synchronized_output}

# Colors use chalk names: fg = "cyan", bg = "bgBlue", bold = true
# Semantic names: none, status, flash, prompt, completion,
# completionPrefix, directory, selected
# [colors.status]
# fg = "black"
# bg = "bgCyan"

# Shell-out
[shell]
# command = "htop"
`;
