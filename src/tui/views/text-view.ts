/**
 * Text View
 *
 * Read-only scrollable text. Used for help screens and file previews.
 */

import { KEY, type Keystroke } from '../keys.js';
import { BaseView } from './base-view.js';

export interface TextViewOptions {
  /** Kind name for the status line (default: "text") */
  name?: string;
  /** Whether safe kills may remove the view (default: true) */
  killable?: boolean;
}

const TAB_WIDTH = 8;

/**
 * Make a line of file text safe to paint: tabs expand to the next stop and
 * control characters show in caret notation (`^[`, `^?`).
 */
export function toDisplayLine(line: string): string {
  let out = '';
  for (const ch of line) {
    const code = ch.charCodeAt(0);
    if (ch === '\t') {
      out += ' '.repeat(TAB_WIDTH - (out.length % TAB_WIDTH));
    } else if (code < 0x20) {
      out += '^' + String.fromCharCode(code + 0x40);
    } else if (code === 0x7f) {
      out += '^?';
    } else if (code >= 0x80 && code < 0xa0) {
      out += '?';
    } else {
      out += ch;
    }
  }
  return out;
}

function toDisplayLines(text: string | string[]): string[] {
  return (typeof text === 'string' ? text.split(/\r?\n/) : text).map(toDisplayLine);
}

export class TextView extends BaseView {
  readonly name: string;
  private lines: string[];
  private top: number = 0;
  private canKill: boolean;

  constructor(text: string | string[], options: TextViewOptions = {}) {
    super();
    this.lines = toDisplayLines(text);
    this.name = options.name ?? 'text';
    this.canKill = options.killable ?? true;
  }

  status(): string {
    if (this.lines.length === 0) return '';
    const last = Math.min(this.lines.length, this.top + Math.max(1, this.contentHeight));
    return `lines ${this.top + 1}-${last} of ${this.lines.length}`;
  }

  setText(text: string | string[]): void {
    this.lines = toDisplayLines(text);
    this.top = 0;
    this.buffer?.markDirty();
  }

  get topLine(): number {
    return this.top;
  }

  draw(): void {
    const height = this.contentHeight;
    for (let row = 0; row < height; row++) {
      this.write(row, 0, this.lines[this.top + row] ?? '');
    }
  }

  handleInput(key: Keystroke): void {
    const page = Math.max(1, this.contentHeight - 1);
    switch (key) {
      case KEY.DOWN:
      case 'j':
        this.scrollTo(this.top + 1);
        break;
      case KEY.UP:
      case 'k':
        this.scrollTo(this.top - 1);
        break;
      case KEY.PAGE_DOWN:
      case KEY.SPACE:
        this.scrollTo(this.top + page);
        break;
      case KEY.PAGE_UP:
        this.scrollTo(this.top - page);
        break;
      case KEY.HOME:
        this.scrollTo(0);
        break;
      case KEY.END:
        this.scrollTo(this.lines.length);
        break;
    }
  }

  killable(): boolean {
    return this.canKill;
  }

  private scrollTo(line: number): void {
    const maxTop = Math.max(0, this.lines.length - this.contentHeight);
    const next = Math.min(Math.max(0, line), maxTop);
    if (next !== this.top) {
      this.top = next;
      this.buffer?.markDirty();
    }
  }
}
