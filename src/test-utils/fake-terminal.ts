/**
 * In-memory TerminalSurface for tests.
 *
 * Writes land on a character grid with a parallel color grid. Keystrokes
 * come from a script; a `null` entry is a poll timeout. Once the script is
 * used up, polls report timeouts until `maxIdlePolls` is exceeded and then
 * throw, so a loop that never terminates fails the test instead of hanging.
 */

import type { Keystroke } from '../tui/keys.js';
import type { TerminalSurface } from '../tui/terminal.js';
import type { ColorName } from '../tui/types.js';

export interface FakeTerminalOptions {
  rows?: number;
  cols?: number;
  keys?: Array<Keystroke | null>;
  maxIdlePolls?: number;
}

export interface Cell {
  char: string;
  color: ColorName;
  highlight: boolean;
}

export class FakeTerminal implements TerminalSurface {
  rows: number;
  cols: number;
  cursor = { row: 0, col: 0 };
  cursorVisible: boolean = false;

  stageCount: number = 0;
  flushCount: number = 0;
  refreshCount: number = 0;
  clearCount: number = 0;
  suspended: boolean = false;
  /** Every poll, in order: the keystroke delivered or null */
  polls: Array<Keystroke | null> = [];

  private cells: Cell[][] = [];
  private color: ColorName = 'none';
  private highlight: boolean = false;
  private keys: Array<Keystroke | null>;
  private maxIdlePolls: number;
  private idlePolls: number = 0;

  constructor(options: FakeTerminalOptions = {}) {
    this.rows = options.rows ?? 24;
    this.cols = options.cols ?? 80;
    this.keys = [...(options.keys ?? [])];
    this.maxIdlePolls = options.maxIdlePolls ?? 3;
    this.resetGrid();
  }

  /** Append keystrokes to the script. */
  pushKeys(...keys: Array<Keystroke | null>): void {
    this.keys.push(...keys);
  }

  get pendingKeys(): number {
    return this.keys.length;
  }

  /** Change the geometry; the grid is cleared. */
  resize(rows: number, cols: number): void {
    this.rows = rows;
    this.cols = cols;
    this.resetGrid();
  }

  /** One grid row as a string. */
  line(row: number): string {
    return (this.cells[row] ?? []).map((cell) => cell.char).join('');
  }

  /** All grid rows with trailing spaces removed. */
  screen(): string[] {
    return this.cells.map((_, row) => this.line(row).trimEnd());
  }

  cell(row: number, col: number): Cell | undefined {
    return this.cells[row]?.[col];
  }

  moveCursor(row: number, col: number): void {
    this.cursor = { row, col };
  }

  setCursorVisible(visible: boolean): void {
    this.cursorVisible = visible;
  }

  setColor(color: ColorName, highlight: boolean = false): void {
    this.color = color;
    this.highlight = highlight;
  }

  writeAt(row: number, col: number, text: string): void {
    const cells = this.cells[row];
    if (!cells) return;
    for (let i = 0; i < text.length; i++) {
      const cell = cells[col + i];
      if (!cell) break;
      cell.char = text.charAt(i);
      cell.color = this.color;
      cell.highlight = this.highlight;
    }
  }

  clear(): void {
    this.clearCount++;
    this.resetGrid();
  }

  stage(): void {
    this.stageCount++;
  }

  flush(): void {
    this.flushCount++;
  }

  refresh(): void {
    this.refreshCount++;
  }

  nextKey(_timeoutMs: number): Promise<Keystroke | null> {
    if (this.keys.length > 0) {
      const key = this.keys.shift() ?? null;
      this.polls.push(key);
      return Promise.resolve(key);
    }

    this.idlePolls++;
    if (this.idlePolls > this.maxIdlePolls) {
      return Promise.reject(new Error('FakeTerminal: keystroke script exhausted'));
    }
    this.polls.push(null);
    return Promise.resolve(null);
  }

  suspend(): void {
    this.suspended = true;
  }

  resume(): void {
    this.suspended = false;
  }

  private resetGrid(): void {
    this.cells = Array.from({ length: this.rows }, () =>
      Array.from({ length: this.cols }, (): Cell => ({ char: ' ', color: 'none', highlight: false }))
    );
  }
}
