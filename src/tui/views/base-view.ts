/**
 * Base View
 *
 * Default no-op lifecycle hooks for concrete views. Subclasses supply a
 * name and draw(); everything else is optional.
 */

import type { Buffer } from '../buffer.js';
import type { Keystroke } from '../keys.js';
import type { View, WriteOptions } from '../types.js';

export abstract class BaseView implements View {
  abstract readonly name: string;
  protected buffer: Buffer | null = null;

  attach(buffer: Buffer): void {
    this.buffer = buffer;
  }

  status(): string {
    return '';
  }

  abstract draw(): void;

  resize(_rows: number, _cols: number): void {}

  focus(): void {}

  blur(): void {}

  handleInput(_key: Keystroke): void | Promise<void> {}

  cleanup(): void {}

  killable(): boolean {
    return true;
  }

  /** Rows available to the view (the status line excluded). */
  protected get contentHeight(): number {
    return this.buffer?.contentHeight ?? 0;
  }

  protected get contentWidth(): number {
    return this.buffer?.contentWidth ?? 0;
  }

  protected write(row: number, col: number, text: string | null, options?: WriteOptions): void {
    this.buffer?.write(row, col, text, options);
  }

  /** Blank every content row from `fromRow` down. */
  protected clearRows(fromRow: number): void {
    for (let row = fromRow; row < this.contentHeight; row++) {
      this.write(row, 0, '');
    }
  }
}
