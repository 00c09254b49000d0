/**
 * stackterm - Library Entry Point
 *
 * The CLI (`stackterm`) is one application of the screen layer; this module
 * exports that layer for programs that want their own buffers and key
 * bindings.
 *
 * @example
 * ```typescript
 * import { ScreenSession, TextView, createAnsiTerminal } from 'stackterm';
 *
 * const terminal = createAnsiTerminal();
 * terminal.start();
 * const session = new ScreenSession({ terminal });
 * session.spawn('home', new TextView(['Hello', 'world']));
 *
 * let done = false;
 * await session.runInputLoop({
 *   onKey: async (key) => {
 *     if (key !== 'q') return false;
 *     done = (await session.askYesOrNo('Quit? ')) === true;
 *     return true;
 *   },
 *   until: () => done,
 * });
 * session.close();
 * terminal.stop();
 * ```
 *
 * @packageDocumentation
 */

export * from './tui/index.js';

export {
  CLIError,
  ConfigError,
  ValidationError,
  ContractViolationError,
  BufferNotOnStackError,
  DuplicateBufferError,
  InvalidTitleError,
  PromptActiveError,
} from './errors/index.js';

export type { Logger } from './utils/logger.js';
export { consoleLogger, silentLogger, createFileLogger } from './utils/logger.js';

export type { Config, PartialConfig } from './config/index.js';
export { loadConfig, DEFAULT_CONFIG } from './config/index.js';
