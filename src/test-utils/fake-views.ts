/**
 * Views that record how the screen layer drives them.
 */

import type { Keystroke } from '../tui/keys.js';
import type { ModalView } from '../tui/types.js';
import { BaseView } from '../tui/views/base-view.js';

export interface RecordingViewOptions {
  killable?: boolean;
  /** Painted on content row 0 (default: the view name) */
  text?: string;
  status?: string;
}

export class RecordingView extends BaseView {
  readonly name: string;
  /** Lifecycle calls in order: "draw", "resize 20x80", "focus", "blur" */
  calls: string[] = [];
  inputs: Keystroke[] = [];
  cleanupCount: number = 0;
  canKill: boolean;
  private text: string;
  private statusText: string;

  constructor(name: string = 'fake', options: RecordingViewOptions = {}) {
    super();
    this.name = name;
    this.canKill = options.killable ?? true;
    this.text = options.text ?? name;
    this.statusText = options.status ?? '';
  }

  status(): string {
    return this.statusText;
  }

  draw(): void {
    this.calls.push('draw');
    this.write(0, 0, this.text);
  }

  resize(rows: number, cols: number): void {
    this.calls.push(`resize ${rows}x${cols}`);
  }

  focus(): void {
    this.calls.push('focus');
  }

  blur(): void {
    this.calls.push('blur');
  }

  handleInput(key: Keystroke): void {
    this.inputs.push(key);
  }

  cleanup(): void {
    this.cleanupCount++;
  }

  killable(): boolean {
    return this.canKill;
  }
}

/**
 * A modal view that finishes on `finishKey` and then yields `result`;
 * before that its value is null.
 */
export class FakeModalView<T> extends RecordingView implements ModalView<T | null> {
  private finishKey: Keystroke;
  private result: T;
  private finished: boolean = false;

  constructor(finishKey: Keystroke, result: T) {
    super('modal');
    this.finishKey = finishKey;
    this.result = result;
  }

  handleInput(key: Keystroke): void {
    super.handleInput(key);
    if (key === this.finishKey) this.finished = true;
  }

  done(): boolean {
    return this.finished;
  }

  value(): T | null {
    return this.finished ? this.result : null;
  }
}
