/**
 * Buffer List View
 *
 * Lists the stack's buffers, topmost first. `enter` raises the selected
 * buffer, `d` kills it if its view allows.
 */

import type { Buffer } from '../buffer.js';
import type { BufferStack } from '../buffer-stack.js';
import { KEY, type Keystroke } from '../keys.js';
import { BaseView } from './base-view.js';

export class BufferListView extends BaseView {
  readonly name = 'buffer-list';
  private stack: BufferStack;
  private cursor: number = 0;

  constructor(stack: BufferStack) {
    super();
    this.stack = stack;
  }

  status(): string {
    return `${this.stack.length} buffers`;
  }

  /** Buffers in display order, topmost first. */
  entries(): Buffer[] {
    return this.stack.list().reverse();
  }

  get selected(): Buffer | undefined {
    return this.entries()[this.cursor];
  }

  focus(): void {
    this.cursor = Math.min(this.cursor, Math.max(0, this.stack.length - 1));
  }

  draw(): void {
    const entries = this.entries();
    for (let row = 0; row < this.contentHeight; row++) {
      const entry = entries[row];
      if (!entry) {
        this.write(row, 0, '');
        continue;
      }
      const self = entry === this.buffer ? '*' : ' ';
      this.write(row, 0, `${self} ${entry.title.padEnd(24)} [${entry.view.name}]`, {
        highlight: row === this.cursor,
      });
    }
  }

  handleInput(key: Keystroke): void {
    switch (key) {
      case KEY.DOWN:
      case 'j':
        this.cursor = Math.min(this.cursor + 1, Math.max(0, this.stack.length - 1));
        break;
      case KEY.UP:
      case 'k':
        this.cursor = Math.max(0, this.cursor - 1);
        break;
      case KEY.ENTER: {
        const target = this.selected;
        if (target) this.stack.raiseToFront(target);
        break;
      }
      case 'd': {
        const target = this.selected;
        if (target && target !== this.buffer) this.stack.killBufferSafely(target);
        this.focus();
        break;
      }
    }
    this.buffer?.markDirty();
  }
}
