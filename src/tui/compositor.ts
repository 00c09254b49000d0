/**
 * Screen Compositor
 *
 * Turns the buffer stack and the minibuffer into terminal output. Every pass
 * runs under the terminal lock; callers that already hold it pass
 * `lockHeld: true`.
 *
 * Only the topmost buffer is painted. It is resized to the rows the
 * minibuffer leaves free, so the minibuffer's line count drives layout.
 */

import type { BufferStack } from './buffer-stack.js';
import type { Minibuffer } from './minibuffer.js';
import { Mutex } from './mutex.js';
import type { TerminalSurface } from './terminal.js';
import type { DrawOptions } from './types.js';

export class Compositor {
  readonly lock: Mutex;
  private terminal: TerminalSurface;
  private stack: BufferStack;
  private minibuffer: Minibuffer;
  private _shelled: boolean = false;

  constructor(terminal: TerminalSurface, stack: BufferStack, minibuffer: Minibuffer, lock: Mutex = new Mutex()) {
    this.terminal = terminal;
    this.stack = stack;
    this.minibuffer = minibuffer;
    this.lock = lock;
  }

  /** While set, compositor passes are skipped. */
  get shelled(): boolean {
    return this._shelled;
  }

  setShelled(shelled: boolean): void {
    this._shelled = shelled;
  }

  async drawScreen(options: DrawOptions = {}): Promise<void> {
    if (this._shelled) return;

    const release = options.lockHeld ? null : await this.lock.acquire();
    try {
      const top = this.stack.top();
      if (top) {
        top.resize(this.terminal.rows - this.minibuffer.lineCount(), this.terminal.cols);
        if (this.stack.dirty) {
          top.draw();
        } else {
          top.redraw();
        }
      }

      if (!options.skipMinibuffer) {
        this.paintMinibuffer();
      }

      this.stack.markClean();
      this.terminal.flush();
      if (options.refresh) this.terminal.refresh();
    } finally {
      release?.();
    }
  }

  /**
   * Repaint the minibuffer region only.
   */
  async drawMinibuffer(options: Pick<DrawOptions, 'refresh' | 'lockHeld'> = {}): Promise<void> {
    if (this._shelled) return;

    const release = options.lockHeld ? null : await this.lock.acquire();
    try {
      this.paintMinibuffer();
      this.terminal.flush();
      if (options.refresh) this.terminal.refresh();
    } finally {
      release?.();
    }
  }

  /**
   * Clear the physical screen and repaint everything, e.g. after another
   * process had the terminal.
   */
  async completelyRedrawScreen(): Promise<void> {
    if (this._shelled) return;

    await this.lock.runExclusive(async () => {
      this.stack.markDirty();
      this.terminal.clear();
      await this.drawScreen({ lockHeld: true });
    });
  }

  /**
   * Run direct terminal mutations (cursor moves, raw writes) under the lock.
   */
  withTerminal<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.lock.runExclusive(fn);
  }

  /**
   * Paint the minibuffer lines from the top of its region down. With a
   * prompt active, the bottom row is left to the text field.
   */
  private paintMinibuffer(): void {
    const { rows, cols } = this.terminal;
    const firstRow = rows - this.minibuffer.lineCount();
    const hasFlash = this.minibuffer.flash !== null;

    this.minibuffer.render().forEach((line, i) => {
      this.terminal.setColor(hasFlash && i === 0 ? 'flash' : 'none');
      this.terminal.writeAt(firstRow + i, 0, line.slice(0, cols).padEnd(cols, ' '));
    });
    this.terminal.stage();
  }
}
