/**
 * Text Field
 *
 * The single-line input used by prompts. One TextField exists per semantic
 * domain ("filename", "search", ...) and is reused across prompts, so each
 * domain keeps its own last answer and completion provider.
 *
 * The field paints itself on the bottom terminal row: the question, then the
 * editable text. handleInput() reports whether the prompt should keep going;
 * accept and cancel keystrokes end it.
 *
 * Completion:
 * - `tab` runs the provider. One candidate replaces the text; several extend
 *   the text to their common prefix and raise `newCompletions`
 * - `tab` again with the same candidates cycles through them and raises
 *   `rollCompletions`
 * - Editing while candidates are shown re-runs the provider
 */

import { KEY, isPrintable, type Keystroke } from './keys.js';
import type { TerminalSurface } from './terminal.js';
import type { Completion, CompletionProvider } from './types.js';

export interface TextFieldActivation {
  question: string;
  defaultValue?: string | null;
  completer?: CompletionProvider | null;
}

export interface TextFieldOptions {
  /** Keystroke that abandons the prompt (default: C-g) */
  cancelKey?: Keystroke;
}

export class TextField {
  private terminal: TerminalSurface;
  private cancelKey: Keystroke;

  private question: string = '';
  private _text: string = '';
  private cursor: number = 0;
  private offset: number = 0;
  private _active: boolean = false;
  private cancelled: boolean = false;
  private completer: CompletionProvider | null = null;

  private _completions: Completion[] = [];
  private _completionIndex: number = -1;
  /** Text the current candidates were computed (or cycled) for */
  private completedFor: string | null = null;

  private _newCompletions: boolean = false;
  private _rollCompletions: boolean = false;
  private _clearedCompletions: boolean = false;

  constructor(terminal: TerminalSurface, options: TextFieldOptions = {}) {
    this.terminal = terminal;
    this.cancelKey = options.cancelKey ?? KEY.CANCEL;
  }

  get active(): boolean {
    return this._active;
  }

  get text(): string {
    return this._text;
  }

  /** The answer: the text, or null when the prompt was cancelled. */
  get value(): string | null {
    return this.cancelled ? null : this._text;
  }

  get completions(): readonly Completion[] {
    return this._completions;
  }

  /** Index of the cycled-to candidate, or -1 before the first cycle. */
  get completionIndex(): number {
    return this._completionIndex;
  }

  /** The last keystroke produced a fresh candidate list. */
  get newCompletions(): boolean {
    return this._newCompletions;
  }

  /** The last keystroke cycled the existing candidates. */
  get rollCompletions(): boolean {
    return this._rollCompletions;
  }

  /** The last keystroke made the shown candidates obsolete without replacement. */
  get clearedCompletions(): boolean {
    return this._clearedCompletions;
  }

  /** Terminal row the field occupies. */
  get row(): number {
    return Math.max(0, this.terminal.rows - 1);
  }

  activate({ question, defaultValue, completer }: TextFieldActivation): void {
    this.question = question;
    this._text = defaultValue ?? '';
    this.cursor = this._text.length;
    this.offset = 0;
    this.completer = completer ?? null;
    this.cancelled = false;
    this.resetCompletions();
    this._active = true;
    this.draw();
  }

  deactivate(): void {
    this._active = false;
    this.resetCompletions();
  }

  /**
   * Apply one keystroke.
   *
   * @returns false when the keystroke ends the prompt (accept or cancel)
   */
  handleInput(key: Keystroke): boolean {
    this._newCompletions = false;
    this._rollCompletions = false;
    this._clearedCompletions = false;

    if (key === KEY.ENTER) {
      return false;
    }
    if (key === this.cancelKey) {
      this.cancelled = true;
      return false;
    }

    if (key === KEY.TAB) {
      this.complete();
    } else {
      const before = this._text;
      this.edit(key);
      if (this._text !== before && this._completions.length > 0) {
        this.refreshCompletions();
      }
    }

    this.draw();
    return true;
  }

  /**
   * Paint the question and the visible part of the text.
   */
  draw(): void {
    const cols = this.terminal.cols;
    const question = this.question.slice(0, cols);
    const available = Math.max(1, cols - question.length);

    // Scroll horizontally so the cursor stays inside the field
    if (this.cursor < this.offset) {
      this.offset = this.cursor;
    } else if (this.cursor - this.offset > available - 1) {
      this.offset = this.cursor - (available - 1);
    }

    const visible = this._text.slice(this.offset, this.offset + available);

    this.terminal.setColor('prompt');
    this.terminal.writeAt(this.row, 0, question);
    this.terminal.setColor('none');
    this.terminal.writeAt(this.row, question.length, visible.padEnd(available, ' ').slice(0, available));
  }

  positionCursor(): void {
    const col = Math.min(this.question.length + this.cursor - this.offset, this.terminal.cols - 1);
    this.terminal.moveCursor(this.row, Math.max(0, col));
    this.terminal.setCursorVisible(true);
  }

  private edit(key: Keystroke): void {
    const text = this._text;
    switch (key) {
      case KEY.LEFT:
      case 'C-b':
        this.cursor = Math.max(0, this.cursor - 1);
        return;
      case KEY.RIGHT:
      case 'C-f':
        this.cursor = Math.min(text.length, this.cursor + 1);
        return;
      case KEY.HOME:
      case 'C-a':
        this.cursor = 0;
        return;
      case KEY.END:
      case 'C-e':
        this.cursor = text.length;
        return;
      case KEY.BACKSPACE:
      case 'C-h':
        if (this.cursor > 0) {
          this._text = text.slice(0, this.cursor - 1) + text.slice(this.cursor);
          this.cursor--;
        }
        return;
      case KEY.DELETE:
      case 'C-d':
        this._text = text.slice(0, this.cursor) + text.slice(this.cursor + 1);
        return;
      case 'C-k':
        this._text = text.slice(0, this.cursor);
        return;
      case 'C-u':
        this._text = text.slice(this.cursor);
        this.cursor = 0;
        return;
      case 'C-w': {
        const start = previousWordStart(text, this.cursor);
        this._text = text.slice(0, start) + text.slice(this.cursor);
        this.cursor = start;
        return;
      }
      default:
        if (isPrintable(key)) {
          this._text = text.slice(0, this.cursor) + key + text.slice(this.cursor);
          this.cursor++;
        }
    }
  }

  private complete(): void {
    // Same candidates, same text: cycle instead of recomputing
    if (this._completions.length > 1 && this.completedFor === this._text) {
      this._completionIndex = (this._completionIndex + 1) % this._completions.length;
      const selected = this._completions[this._completionIndex];
      if (selected) this.setText(selected[0]);
      this.completedFor = this._text;
      this._rollCompletions = true;
      return;
    }

    const hadCompletions = this._completions.length > 0;
    const candidates = this.completer?.(this._text) ?? [];
    const [only] = candidates;

    if (candidates.length === 1 && only) {
      this.setText(only[0]);
      this.resetCompletions();
      this._clearedCompletions = hadCompletions;
      return;
    }

    if (candidates.length === 0) {
      this.resetCompletions();
      this._clearedCompletions = hadCompletions;
      return;
    }

    const prefix = commonPrefix(candidates.map(([full]) => full));
    if (prefix.length > this._text.length) {
      this.setText(prefix);
    }
    this._completions = candidates;
    this._completionIndex = -1;
    this.completedFor = this._text;
    this._newCompletions = true;
  }

  /**
   * Re-run the provider after an edit made the shown candidates stale.
   */
  private refreshCompletions(): void {
    const candidates = this.completer?.(this._text) ?? [];
    if (candidates.length === 0) {
      this.resetCompletions();
      this._clearedCompletions = true;
      return;
    }
    this._completions = candidates;
    this._completionIndex = -1;
    this.completedFor = this._text;
    this._newCompletions = true;
  }

  private setText(text: string): void {
    this._text = text;
    this.cursor = text.length;
  }

  private resetCompletions(): void {
    this._completions = [];
    this._completionIndex = -1;
    this.completedFor = null;
  }
}

/**
 * Longest prefix shared by every string.
 */
export function commonPrefix(values: readonly string[]): string {
  const [first, ...rest] = values;
  if (first === undefined) return '';

  let length = first.length;
  for (const value of rest) {
    let i = 0;
    while (i < length && i < value.length && value[i] === first[i]) i++;
    length = i;
  }
  return first.slice(0, length);
}

function previousWordStart(text: string, cursor: number): number {
  let i = cursor;
  while (i > 0 && text[i - 1] === ' ') i--;
  while (i > 0 && text[i - 1] !== ' ') i--;
  return i;
}
