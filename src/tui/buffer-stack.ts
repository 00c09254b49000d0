/**
 * Buffer Stack & Focus Manager
 *
 * An ordered collection of Buffers (oldest first, last = topmost = visible)
 * with a title index and a single focused Buffer.
 *
 * Invariants:
 * - `buffers` and `byTitle` always hold the same set of Buffers
 * - At most one Buffer holds a given title
 * - `focusBuf` is null or a member of the stack, and is the only focused one
 */

import { Buffer } from './buffer.js';
import type { TerminalSurface } from './terminal.js';
import type { Keystroke } from './keys.js';
import type { SpawnOptions, View } from './types.js';
import {
  BufferNotOnStackError,
  DuplicateBufferError,
  InvalidTitleError,
} from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface BufferStackOptions {
  logger?: Logger;
  /**
   * Matches the application's permanent home view. Such views may report
   * themselves unkillable, yet they never block killAllBuffersSafely().
   */
  homeView?: (view: View) => boolean;
}

export class BufferStack {
  private terminal: TerminalSurface;
  private logger: Logger;
  private homeView: (view: View) => boolean;

  private buffers: Buffer[] = [];
  private byTitle = new Map<string, Buffer>();
  private _focusBuf: Buffer | null = null;
  private _dirty: boolean = true;

  constructor(terminal: TerminalSurface, options: BufferStackOptions = {}) {
    this.terminal = terminal;
    this.logger = options.logger ?? silentLogger;
    this.homeView = options.homeView ?? (() => false);
  }

  get focusBuf(): Buffer | null {
    return this._focusBuf;
  }

  /** Whether the stack changed since the last full compositor pass. */
  get dirty(): boolean {
    return this._dirty;
  }

  markDirty(): void {
    this._dirty = true;
  }

  markClean(): void {
    this._dirty = false;
  }

  get length(): number {
    return this.buffers.length;
  }

  /** The visible buffer, if any. */
  top(): Buffer | undefined {
    return this.buffers[this.buffers.length - 1];
  }

  /** Buffers in stack order, bottom first. */
  list(): Buffer[] {
    return [...this.buffers];
  }

  /** [title, buffer] pairs in insertion order of their titles. */
  entries(): Array<[string, Buffer]> {
    return [...this.byTitle.entries()];
  }

  exists(title: string): boolean {
    return this.byTitle.has(title);
  }

  get(title: string): Buffer | undefined {
    return this.byTitle.get(title);
  }

  /**
   * Index a buffer under a title. Used by spawn(); direct callers must pick
   * an unused title.
   */
  register(title: unknown, buffer: Buffer): void {
    if (typeof title !== 'string') {
      throw new InvalidTitleError(title);
    }
    if (this.byTitle.has(title)) {
      throw new DuplicateBufferError(title);
    }
    this.byTitle.set(title, buffer);
  }

  focusOn(buffer: Buffer): void {
    this.assertMember(buffer);
    if (buffer === this._focusBuf) return;

    this._focusBuf?.blur();
    this._focusBuf = buffer;
    buffer.focus();
  }

  /**
   * Make a buffer topmost and focus it. When the current top is pinned with
   * forceToTop, the buffer goes just below it instead and focus is left
   * alone.
   */
  raiseToFront(buffer: Buffer): void {
    this.assertMember(buffer);

    this.buffers.splice(this.buffers.indexOf(buffer), 1);
    const top = this.top();
    if (top && top.forceToTop) {
      this.buffers.splice(this.buffers.length - 1, 0, buffer);
    } else {
      this.buffers.push(buffer);
      this.focusOn(buffer);
    }
    this._dirty = true;
  }

  /**
   * Cycle forward: the bottom buffer comes to the top.
   *
   * Rolling clears the top buffer's forceToTop flag, so a human can still
   * move buffers around while code keeps popping things up programmatically.
   */
  rollBuffers(): void {
    const top = this.top();
    const bottom = this.buffers[0];
    if (!top || !bottom) return;

    top.forceToTop = false;
    this.raiseToFront(bottom);
  }

  /**
   * Cycle backward: the buffer just under the top comes to the top.
   */
  rollBuffersBackwards(): void {
    const top = this.top();
    const below = this.buffers[this.buffers.length - 2];
    if (!top || !below) return;

    top.forceToTop = false;
    this.raiseToFront(below);
  }

  /**
   * Create a buffer for `view` and put it on the stack.
   *
   * Title collisions get " <2>", " <3>", ... appended; the realized title is
   * the one stored. The new buffer enters at the bottom and is raised unless
   * `hidden` is set, in which case it only takes focus when nothing has it.
   */
  spawn(title: string, view: View, options: SpawnOptions = {}): Buffer {
    if (typeof title !== 'string') {
      throw new InvalidTitleError(title);
    }

    let realTitle = title;
    for (let n = 2; this.byTitle.has(realTitle); n++) {
      realTitle = `${title} <${n}>`;
    }

    const width = options.width ?? this.terminal.cols;
    const height = options.height ?? this.terminal.rows - 1;

    const buffer = new Buffer(this.terminal, view, width, height, {
      title: realTitle,
      forceToTop: options.forceToTop ?? false,
    });
    view.attach(buffer);
    this.register(realTitle, buffer);
    this.buffers.unshift(buffer);

    if (options.hidden) {
      if (!this._focusBuf) this.focusOn(buffer);
    } else {
      this.raiseToFront(buffer);
    }

    this.logger.debug?.(`spawned buffer "${realTitle}" (${view.name}, ${width}x${height})`);
    return buffer;
  }

  /**
   * Return the buffer titled `title`, raising it unless `hidden`. When no
   * such buffer exists, `provider` builds the view (only then) and it is
   * spawned.
   */
  spawnUnlessExists(title: string, options: SpawnOptions, provider: () => View): Buffer {
    const existing = this.byTitle.get(title);
    if (existing) {
      if (!options.hidden) this.raiseToFront(existing);
      return existing;
    }
    return this.spawn(title, provider(), options);
  }

  /**
   * Remove a buffer after running its view's cleanup hook. If buffers
   * remain, the new top is raised and focused.
   *
   * Killing the last buffer leaves the stack empty; keeping a permanent home
   * buffer alive is up to the caller's killable() policy.
   */
  killBuffer(buffer: Buffer): void {
    this.assertMember(buffer);

    buffer.view.cleanup();
    this.buffers.splice(this.buffers.indexOf(buffer), 1);
    this.byTitle.delete(buffer.title);
    if (this._focusBuf === buffer) {
      this._focusBuf = null;
    }

    const top = this.top();
    if (top) {
      this.raiseToFront(top);
    } else {
      this._dirty = true;
    }

    this.logger.debug?.(`killed buffer "${buffer.title}"`);
  }

  /**
   * Kill a buffer only if its view agrees.
   *
   * @returns true when the buffer was killed
   */
  killBufferSafely(buffer: Buffer): boolean {
    if (!buffer.view.killable()) return false;
    this.killBuffer(buffer);
    return true;
  }

  killAllBuffers(): void {
    for (let bottom = this.buffers[0]; bottom; bottom = this.buffers[0]) {
      this.killBuffer(bottom);
    }
  }

  /**
   * Kill buffers top-down while each view agrees. Stops at the first
   * unkillable one; the home view never blocks.
   *
   * @returns true when the stack was emptied
   */
  killAllBuffersSafely(): boolean {
    for (let top = this.top(); top; top = this.top()) {
      if (!this.homeView(top.view) && !top.view.killable()) {
        this.logger.debug?.(`kill-all stopped at "${top.title}"`);
        return false;
      }
      this.killBuffer(top);
    }
    return true;
  }

  /**
   * Route a keystroke to the focused buffer's view.
   */
  async handleInput(key: Keystroke): Promise<boolean> {
    if (!this._focusBuf) return false;
    await this._focusBuf.view.handleInput(key);
    return true;
  }

  private assertMember(buffer: Buffer): void {
    if (!this.buffers.includes(buffer)) {
      throw new BufferNotOnStackError(buffer.title);
    }
  }
}
