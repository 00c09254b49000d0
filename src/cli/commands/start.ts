/**
 * Start Command
 *
 * Runs the interactive session: a home buffer, any files named on the
 * command line, and the global key bindings from keymap.ts.
 *
 *   stackterm                    # Home buffer only
 *   stackterm notes.txt todo.md  # Open files as buffers
 *   stackterm --log-file /tmp/stackterm.log
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import { FileBuffers } from '../file-buffers.js';
import { createGlobalKeymap } from '../keymap.js';
import { loadConfig } from '../../config/loader.js';
import { getEnv } from '../../config/env.js';
import { CLIError } from '../../errors/index.js';
import { Colormap } from '../../tui/colormap.js';
import { createShellProcessRunner } from '../../tui/process-runner.js';
import { createAnsiTerminal } from '../../tui/terminal.js';
import { ScreenSession } from '../../tui/screen-session.js';
import { TextView } from '../../tui/views/index.js';
import { createFileLogger, silentLogger, type Logger } from '../../utils/logger.js';

const HOME_TEXT = `Welcome to stackterm.

Press ? for key bindings, o to open a file, q to quit.`;

export function createStartCommand(getContext: () => CommandContext): Command {
  return new Command('start')
    .description('Start an interactive session (default command)')
    .argument('[files...]', 'Files to open as buffers')
    .action(async (files: string[]) => {
      const ctx = getContext();
      await runStart(ctx, files);
    });
}

async function runStart(ctx: CommandContext, files: string[]): Promise<void> {
  if (ctx.options.json) {
    throw new CLIError('The interactive session has no JSON output', 'Run without --json');
  }

  const config = loadConfig();
  const opened = files.map((file) => {
    const path = resolve(file);
    try {
      return { path, content: readFileSync(path, 'utf-8') };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CLIError(`Cannot open ${file}: ${message}`);
    }
  });

  const logFile = ctx.options.logFile ?? getEnv('STACKTERM_LOG_FILE');
  const logger: Logger = logFile ? createFileLogger(logFile) : silentLogger;
  ctx.debug(logFile ? `Logging to ${logFile}` : 'Session logging disabled');

  const terminal = createAnsiTerminal({
    colormap: new Colormap(config.colors),
    useAlternateScreen: config.screen.alternate_screen,
    useSynchronizedOutput: config.screen.synchronized_output,
  });

  const home = new TextView(HOME_TEXT, { name: 'home', killable: false });
  const session = new ScreenSession({
    terminal,
    cancelKey: config.input.cancel_key,
    pollTimeoutMs: config.input.poll_timeout_ms,
    completionRows: config.prompt.completion_rows,
    homeView: (view) => view === home,
    processRunner: createShellProcessRunner({ shell: getEnv('SHELL') }),
    logger,
  });
  const fileBuffers = new FileBuffers(session);

  let quit = false;
  const keymap = createGlobalKeymap(session, {
    shellCommand: config.shell.command,
    shell: getEnv('SHELL'),
    files: fileBuffers,
    onQuit: () => {
      quit = true;
    },
  });

  terminal.on('resize', ({ rows, cols }) => {
    logger.debug?.(`terminal resized to ${rows}x${cols}`);
    session.completelyRedrawScreen().catch((error: unknown) => {
      logger.warn(`redraw after resize failed: ${error instanceof Error ? error.message : String(error)}`);
    });
  });

  const unregister = ctx.onCleanup(() => terminal.stop());
  try {
    terminal.start();
    session.spawn('home', home);
    for (const { path, content } of opened) {
      fileBuffers.open(path, content);
    }
    await session.runInputLoop({ onKey: keymap, until: () => quit });
  } finally {
    session.close();
    terminal.stop();
    unregister();
  }
}
