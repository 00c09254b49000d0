/**
 * Screen Session
 *
 * The one object an application holds to drive the screen: it owns the
 * buffer stack, the minibuffer, the compositor and the prompt controller,
 * all sharing a single terminal and a single terminal lock.
 *
 * @example
 * ```typescript
 * const terminal = createAnsiTerminal();
 * terminal.start();
 * const session = new ScreenSession({ terminal });
 *
 * session.spawn('home', new TextView('Welcome'));
 * await session.drawScreen();
 *
 * const name = await session.ask('search', 'Search for: ');
 * const sure = await session.askYesOrNo('Really quit? ');
 * ```
 */

import { SystemAccountDirectory, type AccountDirectory } from './accounts.js';
import type { Buffer } from './buffer.js';
import { BufferStack } from './buffer-stack.js';
import { Compositor } from './compositor.js';
import { nodeFileSystem, type FileSystem } from './filesystem.js';
import { KEY, type Keystroke } from './keys.js';
import { Minibuffer } from './minibuffer.js';
import { Mutex } from './mutex.js';
import { createShellProcessRunner, type ProcessRunner } from './process-runner.js';
import { PromptController, type ModalRunner } from './prompts.js';
import type { TerminalSurface } from './terminal.js';
import type { CompletionProvider, DrawOptions, ModalView, SpawnOptions, View } from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ScreenSessionOptions {
  terminal: TerminalSurface;
  /** Keystroke that ends modal loops and prompts (default: C-g) */
  cancelKey?: Keystroke;
  /** How long each input poll waits before reporting no event (default: 1000) */
  pollTimeoutMs?: number;
  /** Height of the completion list shown under prompts (default: 10) */
  completionRows?: number;
  /** Matches the permanent home view, which never blocks killAllBuffersSafely() */
  homeView?: (view: View) => boolean;
  fileSystem?: FileSystem;
  accounts?: AccountDirectory;
  processRunner?: ProcessRunner;
  logger?: Logger;
}

export interface InputLoopOptions {
  /**
   * Sees every keystroke first. Return true when it was handled; otherwise
   * it is routed to the focused buffer.
   */
  onKey?: (key: Keystroke) => boolean | Promise<boolean>;
  /** Checked before each poll; the loop ends once it returns true */
  until: () => boolean;
}

export class ScreenSession implements ModalRunner {
  readonly terminal: TerminalSurface;
  readonly stack: BufferStack;
  readonly minibuffer: Minibuffer;
  readonly compositor: Compositor;
  readonly prompts: PromptController;

  private cancelKey: Keystroke;
  private pollTimeoutMs: number;
  private processRunner: ProcessRunner;
  private logger: Logger;
  private closed: boolean = false;

  constructor(options: ScreenSessionOptions) {
    this.terminal = options.terminal;
    this.cancelKey = options.cancelKey ?? KEY.CANCEL;
    this.pollTimeoutMs = options.pollTimeoutMs ?? 1000;
    this.processRunner = options.processRunner ?? createShellProcessRunner();
    this.logger = options.logger ?? silentLogger;

    this.stack = new BufferStack(this.terminal, { logger: this.logger, homeView: options.homeView });
    this.minibuffer = new Minibuffer();
    this.compositor = new Compositor(this.terminal, this.stack, this.minibuffer, new Mutex());
    this.prompts = new PromptController({
      terminal: this.terminal,
      stack: this.stack,
      minibuffer: this.minibuffer,
      compositor: this.compositor,
      modals: this,
      fileSystem: options.fileSystem ?? nodeFileSystem,
      accounts: options.accounts ?? new SystemAccountDirectory(),
      cancelKey: this.cancelKey,
      pollTimeoutMs: this.pollTimeoutMs,
      completionRows: options.completionRows,
      logger: this.logger,
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ==========================================================================
  // Buffers
  // ==========================================================================

  get focusBuf(): Buffer | null {
    return this.stack.focusBuf;
  }

  /** Buffers in stack order, bottom first. */
  buffers(): Buffer[] {
    return this.stack.list();
  }

  get(title: string): Buffer | undefined {
    return this.stack.get(title);
  }

  exists(title: string): boolean {
    return this.stack.exists(title);
  }

  spawn(title: string, view: View, options?: SpawnOptions): Buffer {
    return this.stack.spawn(title, view, options);
  }

  spawnUnlessExists(title: string, options: SpawnOptions, provider: () => View): Buffer {
    return this.stack.spawnUnlessExists(title, options, provider);
  }

  /**
   * Spawn a modal view and run its input loop until it reports done or the
   * cancel key is pressed. The buffer is killed either way.
   *
   * @returns The view's value at exit
   */
  async spawnModal<T>(title: string, view: ModalView<T>, options?: SpawnOptions): Promise<T> {
    const buffer = this.stack.spawn(title, view, options);
    try {
      await this.drawScreen();

      while (!view.done()) {
        const key = await this.terminal.nextKey(this.pollTimeoutMs);
        if (key === null) continue;
        if (key === this.cancelKey) break;

        await view.handleInput(key);
        await this.drawScreen();
        this.minibuffer.eraseFlash();
      }
    } finally {
      if (this.stack.list().includes(buffer)) {
        this.stack.killBuffer(buffer);
      }
    }

    return view.value();
  }

  raiseToFront(buffer: Buffer): void {
    this.stack.raiseToFront(buffer);
  }

  focusOn(buffer: Buffer): void {
    this.stack.focusOn(buffer);
  }

  rollBuffers(): void {
    this.stack.rollBuffers();
  }

  rollBuffersBackwards(): void {
    this.stack.rollBuffersBackwards();
  }

  killBuffer(buffer: Buffer): void {
    this.stack.killBuffer(buffer);
  }

  killBufferSafely(buffer: Buffer): boolean {
    return this.stack.killBufferSafely(buffer);
  }

  killAllBuffers(): void {
    this.stack.killAllBuffers();
  }

  killAllBuffersSafely(): boolean {
    return this.stack.killAllBuffersSafely();
  }

  // ==========================================================================
  // Minibuffer
  // ==========================================================================

  /**
   * Show a status line. A new line changes the layout and repaints the whole
   * screen; updating an existing handle repaints only the minibuffer.
   *
   * @returns The line's handle, for later updates and clear()
   */
  async say(text: string, handle?: number): Promise<number> {
    const result = this.minibuffer.say(text, handle);
    if (result.allocated) {
      await this.drawScreen({ refresh: true });
    } else {
      await this.compositor.drawMinibuffer({ refresh: true });
    }
    return result.handle;
  }

  /**
   * Show a status line for as long as `fn` runs.
   */
  async sayWhile<T>(text: string, fn: (handle: number) => T | Promise<T>): Promise<T> {
    const handle = await this.say(text);
    try {
      return await fn(handle);
    } finally {
      await this.clear(handle);
    }
  }

  async clear(handle: number): Promise<void> {
    this.minibuffer.clear(handle);
    await this.drawScreen({ refresh: true });
  }

  async flash(text: string): Promise<void> {
    this.minibuffer.setFlash(text);
    await this.drawScreen({ refresh: true });
  }

  /** Drop the flash; the next compositor pass leaves it out. */
  eraseFlash(): void {
    this.minibuffer.eraseFlash();
  }

  // ==========================================================================
  // Prompts
  // ==========================================================================

  ask(
    domain: string,
    question: string,
    defaultValue?: string | null,
    completer?: CompletionProvider | null
  ): Promise<string | null> {
    return this.prompts.ask(domain, question, defaultValue, completer);
  }

  askForFilenames(domain: string, question: string, defaultValue?: string | null): Promise<string[]> {
    return this.prompts.askForFilenames(domain, question, defaultValue);
  }

  askGetch(question: string, accept?: string | readonly Keystroke[]): Promise<Keystroke | null> {
    return this.prompts.askGetch(question, accept);
  }

  askYesOrNo(question: string): Promise<boolean | null> {
    return this.prompts.askYesOrNo(question);
  }

  // ==========================================================================
  // Screen & input
  // ==========================================================================

  drawScreen(options?: DrawOptions): Promise<void> {
    return this.compositor.drawScreen(options);
  }

  /**
   * Clear the terminal and repaint the top buffer, the minibuffer and any
   * open text prompt.
   */
  async completelyRedrawScreen(): Promise<void> {
    await this.compositor.completelyRedrawScreen();
    await this.prompts.redrawPrompt();
  }

  /**
   * Route a keystroke to the focused buffer.
   *
   * @returns false when no buffer has focus
   */
  handleInput(key: Keystroke): Promise<boolean> {
    return this.stack.handleInput(key);
  }

  /**
   * The foreground loop: poll, dispatch, repaint. Ends when `until` says so,
   * when the stack runs empty or when the session is closed.
   */
  async runInputLoop(options: InputLoopOptions): Promise<void> {
    await this.drawScreen();

    while (!this.closed && !options.until() && this.stack.length > 0) {
      const key = await this.terminal.nextKey(this.pollTimeoutMs);
      if (key === null) continue;

      this.minibuffer.eraseFlash();
      const handled = (await options.onKey?.(key)) ?? false;
      if (!handled) {
        await this.handleInput(key);
      }
      if (!this.closed) {
        await this.drawScreen();
      }
    }
  }

  /**
   * Hand the terminal to a shell command and take it back afterwards. The
   * exit status is not interpreted.
   *
   * @returns The command's exit code (null when killed by a signal)
   */
  async shellOut(command: string): Promise<number | null> {
    const release = await this.compositor.lock.acquire();
    let code: number | null = null;
    this.compositor.setShelled(true);
    try {
      this.terminal.suspend();
      code = await this.processRunner.run(command);
    } finally {
      this.terminal.resume();
      this.terminal.setCursorVisible(false);
      this.compositor.setShelled(false);
      release();
    }

    this.logger.debug?.(`shell command "${command}" exited with ${code === null ? 'a signal' : code}`);
    await this.completelyRedrawScreen();
    return code;
  }

  /**
   * Kill every buffer and stop the input loop. The terminal itself belongs
   * to the caller.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stack.killAllBuffers();
    this.logger.debug?.('session closed');
  }
}
