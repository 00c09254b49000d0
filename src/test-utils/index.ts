/**
 * Test Utilities Module
 *
 * In-process stand-ins for the terminal, the views and the OS seams.
 *
 * @example
 * ```typescript
 * import { FakeTerminal, RecordingView } from '../../test-utils/index.js';
 *
 * const terminal = new FakeTerminal({ rows: 10, cols: 40, keys: ['y'] });
 * const session = new ScreenSession({ terminal });
 * session.spawn('home', new RecordingView('home'));
 * ```
 */

export { FakeTerminal, type Cell, type FakeTerminalOptions } from './fake-terminal.js';
export { RecordingView, FakeModalView, type RecordingViewOptions } from './fake-views.js';
export { MemoryFileSystem, FakeAccounts, FakeProcessRunner } from './fake-os.js';
