/**
 * TUI Module
 *
 * A buffer-stack screen: full-screen buffers stacked like windows, a
 * minibuffer of status lines and flash messages at the bottom, and blocking
 * prompts with tab completion.
 *
 * Architecture:
 * - TerminalSurface / AnsiTerminal: the character grid and keystroke source
 * - Buffer: one view's region, with a status line
 * - BufferStack: ordering, focus and kill rules
 * - Minibuffer: status slots and the flash line
 * - Compositor: paints the top buffer and the minibuffer under the terminal lock
 * - PromptController: ask / askGetch / askYesOrNo / askForFilenames
 * - ScreenSession: ties them together and runs the input loop
 */

// Types
export {
  COLOR_NAMES,
  type ColorName,
  type WriteOptions,
  type View,
  type ModalView,
  type SpawnOptions,
  type DrawOptions,
  type Completion,
  type CompletionProvider,
} from './types.js';

// Keys & locking
export { KEY, keystrokeFromKeypress, isPrintable, parseAcceptSet, type Keystroke } from './keys.js';
export { Mutex, type Release } from './mutex.js';

// Terminal
export {
  ANSI,
  AnsiTerminal,
  createAnsiTerminal,
  type TerminalSurface,
  type TerminalInput,
  type TerminalOutput,
  type AnsiTerminalOptions,
  type AnsiTerminalEvents,
} from './terminal.js';
export { Colormap, DEFAULT_PALETTE, type ColorSpec, type Palette } from './colormap.js';

// Screen
export { Buffer, type BufferOptions } from './buffer.js';
export { BufferStack, type BufferStackOptions } from './buffer-stack.js';
export { Minibuffer } from './minibuffer.js';
export { Compositor } from './compositor.js';

// Prompts & completion
export { TextField, commonPrefix, type TextFieldActivation, type TextFieldOptions } from './text-field.js';
export { PromptController, COMPLETIONS_TITLE, type ModalRunner, type PromptControllerOptions } from './prompts.js';
export {
  createFilenameCompleter,
  completeFilename,
  completePathPrefix,
  expandHome,
  completionPrefixLength,
  type FilenameCompleterOptions,
} from './filename-completion.js';

// OS seams
export { nodeFileSystem, type FileSystem, type DirectoryEntry } from './filesystem.js';
export { SystemAccountDirectory, parsePasswd, type AccountDirectory } from './accounts.js';
export { createShellProcessRunner, type ProcessRunner, type ShellProcessRunnerOptions } from './process-runner.js';

// Session
export { ScreenSession, type ScreenSessionOptions, type InputLoopOptions } from './screen-session.js';

// Views
export * from './views/index.js';
