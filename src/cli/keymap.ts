/**
 * Global Key Bindings
 *
 * Keys the interactive session handles before the focused buffer sees them:
 *
 *   n / p   next / previous buffer
 *   x       kill the current buffer (if it allows)
 *   o       open files (prompt with filename completion)
 *   :       jump to a buffer by title
 *   !       run a shell command
 *   l       buffer list
 *   ?       help
 *   q       quit, after confirmation
 *   C-c     quit at once
 */

import { FileBuffers } from './file-buffers.js';
import type { Keystroke } from '../tui/keys.js';
import type { ScreenSession } from '../tui/screen-session.js';
import type { Completion } from '../tui/types.js';
import { BufferListView, TextView } from '../tui/views/index.js';

export const HELP_TEXT = `stackterm key bindings

  n        next buffer
  p        previous buffer
  x        kill the current buffer
  o        open files (tab completes, ~name expands, empty answer browses)
  :        jump to a buffer by title
  !        run a shell command
  l        list buffers (enter raises, d kills)
  ?        this help
  q        quit
  C-c      quit without asking

In prompts: tab completes, C-g cancels, C-a/C-e/C-k/C-u/C-w edit.
In text buffers: j/k scroll, space/pageup/pagedown page.`;

export interface GlobalKeymapOptions {
  /** Command run by "!" without asking */
  shellCommand?: string;
  /** Shell started when the "!" prompt is left empty */
  shell: string;
  /** Called once the user confirms quitting */
  onQuit: () => void;
  /** Open files, shared with files opened at startup */
  files?: FileBuffers;
}

/**
 * Build the global key handler for ScreenSession.runInputLoop().
 *
 * @returns A handler resolving to true when it consumed the keystroke
 */
export function createGlobalKeymap(
  session: ScreenSession,
  options: GlobalKeymapOptions
): (key: Keystroke) => Promise<boolean> {
  const files = options.files ?? new FileBuffers(session);
  const bindings: Record<string, () => Promise<void> | void> = {
    n: () => session.rollBuffers(),
    p: () => session.rollBuffersBackwards(),
    x: () => killCurrent(session),
    o: () => openFiles(session, files),
    ':': () => jumpToBuffer(session),
    '!': () => runShell(session, options),
    l: () => {
      session.spawnUnlessExists('buffer list', {}, () => new BufferListView(session.stack));
    },
    '?': () => {
      session.spawnUnlessExists('help', {}, () => new TextView(HELP_TEXT, { name: 'help' }));
    },
    q: async () => {
      if (await session.askYesOrNo('Really quit? (y/n) ')) options.onQuit();
    },
    'C-c': () => options.onQuit(),
  };

  return async (key) => {
    const binding = bindings[key];
    if (!binding) return false;
    await binding();
    return true;
  };
}

async function killCurrent(session: ScreenSession): Promise<void> {
  const buffer = session.focusBuf;
  if (buffer && !session.killBufferSafely(buffer)) {
    await session.flash(`${buffer.title} can't be killed`);
  }
}

async function openFiles(session: ScreenSession, files: FileBuffers): Promise<void> {
  const paths = await session.askForFilenames('filename', 'Open: ');
  let opened = 0;

  for (const path of paths) {
    try {
      files.open(path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await session.flash(`Can't open ${path}: ${message}`);
      continue;
    }
    opened++;
  }

  if (opened > 1) {
    await session.flash(`Opened ${opened} files`);
  }
}

async function jumpToBuffer(session: ScreenSession): Promise<void> {
  const titles = (text: string): Completion[] =>
    session
      .buffers()
      .map((buffer) => buffer.title)
      .filter((title) => title.startsWith(text))
      .sort()
      .map((title): Completion => [title, title]);

  const title = await session.ask('buffer', 'Buffer: ', null, titles);
  if (!title) return;

  const buffer = session.get(title);
  if (buffer) {
    session.raiseToFront(buffer);
  } else {
    await session.flash(`No buffer named ${title}`);
  }
}

async function runShell(session: ScreenSession, options: GlobalKeymapOptions): Promise<void> {
  const command = options.shellCommand ?? (await session.ask('shell', 'Shell command: '));
  if (command === null) return;
  await session.shellOut(command.trim() === '' ? options.shell : command);
}
