/**
 * Buffer
 *
 * Pairs a View with its on-screen geometry and presentation state, and owns
 * the redraw/commit protocol for that region. The bottom row of every buffer
 * is its status line; views paint into the `contentHeight` rows above it.
 */

import type { TerminalSurface } from './terminal.js';
import type { View, WriteOptions } from './types.js';

export interface BufferOptions {
  title?: string;
  forceToTop?: boolean;
}

export class Buffer {
  readonly view: View;
  readonly title: string;
  /** Always 0 while buffers are full-screen */
  readonly x: number = 0;
  readonly y: number = 0;
  forceToTop: boolean;

  private terminal: TerminalSurface;
  private _width: number;
  private _height: number;
  private _dirty: boolean = true;
  private _focused: boolean = false;

  constructor(
    terminal: TerminalSurface,
    view: View,
    width: number,
    height: number,
    options: BufferOptions = {}
  ) {
    this.terminal = terminal;
    this.view = view;
    this._width = Math.max(0, width);
    this._height = Math.max(1, height);
    this.title = options.title ?? '';
    this.forceToTop = options.forceToTop ?? false;
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  get contentHeight(): number {
    return this._height - 1;
  }

  get contentWidth(): number {
    return this._width;
  }

  get dirty(): boolean {
    return this._dirty;
  }

  get focused(): boolean {
    return this._focused;
  }

  markDirty(): void {
    this._dirty = true;
  }

  /**
   * Adopt new geometry. No-op when nothing changed.
   */
  resize(rows: number, cols: number): void {
    if (rows === this._height && cols === this._width) return;
    this._width = Math.max(0, cols);
    this._height = Math.max(1, rows);
    this._dirty = true;
    this.view.resize(rows, cols);
  }

  /**
   * Full draw when dirty; otherwise only the status line is repainted.
   */
  redraw(): void {
    if (this._dirty) {
      this.draw();
    } else {
      this.drawStatus();
      this.commit();
    }
  }

  draw(): void {
    this.view.draw();
    this.drawStatus();
    this.commit();
  }

  /**
   * Clear the dirty flag and mark the region for output. Nothing reaches
   * the terminal until the compositor flushes.
   */
  commit(): void {
    this._dirty = false;
    this.terminal.stage();
  }

  /**
   * Paint one line of text. Writes starting outside the buffer are dropped;
   * text is cut at the right edge, and the rest of the row is blanked unless
   * `noFill` is set.
   */
  write(row: number, col: number, text: string | null, options: WriteOptions = {}): void {
    if (col >= this._width || row >= this._height || row < 0 || col < 0) return;

    const s = text ?? '';
    const maxLength = this._width - col;
    this.terminal.setColor(options.color ?? 'none', options.highlight ?? false);
    this.terminal.writeAt(this.y + row, this.x + col, s.slice(0, maxLength));

    if (s.length < maxLength && !options.noFill) {
      this.terminal.writeAt(this.y + row, this.x + col + s.length, ' '.repeat(maxLength - s.length));
    }
  }

  drawStatus(): void {
    this.write(this._height - 1, 0, ` [${this.view.name}] ${this.title}   ${this.view.status()}`, {
      color: 'status',
    });
  }

  focus(): void {
    this._focused = true;
    this._dirty = true;
    this.view.focus();
  }

  blur(): void {
    this._focused = false;
    this._dirty = true;
    this.view.blur();
  }
}
