/**
 * Screen Layer Types
 *
 * Core type definitions shared by the buffer stack, the minibuffer and the
 * prompt loops:
 * - The View capability interface hosted by every Buffer
 * - Semantic color names resolved by the Colormap
 * - Option shapes for spawning buffers and compositor passes
 */

import type { Keystroke } from './keys.js';
import type { Buffer } from './buffer.js';

/**
 * Semantic colors. Views and the compositor never name concrete terminal
 * colors; the Colormap resolves these from configuration.
 */
export const COLOR_NAMES = [
  'none',
  'status',
  'flash',
  'prompt',
  'completion',
  'completionPrefix',
  'directory',
  'selected',
] as const;

export type ColorName = (typeof COLOR_NAMES)[number];

/**
 * Options for a single bounded write into a Buffer.
 */
export interface WriteOptions {
  /** Semantic color (default: 'none') */
  color?: ColorName;
  /** Render with reverse video */
  highlight?: boolean;
  /** Don't pad the rest of the row with spaces */
  noFill?: boolean;
}

/**
 * A drawable, focusable, input-consuming unit hosted inside a Buffer.
 *
 * The buffer calls `attach` once on spawn so the view can paint through
 * `buffer.write()`. All other hooks are driven by the buffer stack and the
 * compositor.
 */
export interface View {
  /** Short kind name shown in the status line, e.g. "file-browser" */
  readonly name: string;
  /** Free-form status text shown after the title */
  status(): string;
  attach(buffer: Buffer): void;
  draw(): void;
  resize(rows: number, cols: number): void;
  focus(): void;
  blur(): void;
  handleInput(key: Keystroke): void | Promise<void>;
  /** Release resources; called exactly once when the buffer is killed */
  cleanup(): void;
  /** Whether a "safe" kill may remove this view */
  killable(): boolean;
}

/**
 * A view hosted by a modal loop. The loop runs until `done()` reports true,
 * then returns `value()`.
 */
export interface ModalView<T> extends View {
  done(): boolean;
  value(): T;
}

/**
 * Options accepted by BufferStack.spawn().
 */
export interface SpawnOptions {
  /** Width in columns (default: screen columns) */
  width?: number;
  /** Height in rows, status line included (default: screen rows - 1) */
  height?: number;
  /** Insert without raising; focus only if nothing has focus */
  hidden?: boolean;
  /** Keep this buffer above normally raised buffers until a roll */
  forceToTop?: boolean;
}

/**
 * Options for a compositor pass.
 */
export interface DrawOptions {
  /** Force an immediate hardware refresh after the batched flush */
  refresh?: boolean;
  /** Leave the minibuffer region untouched */
  skipMinibuffer?: boolean;
  /** The caller already holds the terminal lock */
  lockHeld?: boolean;
}

/**
 * A completion candidate: the full value that replaces the input text, and
 * the short label shown in the completion list.
 */
export type Completion = readonly [full: string, label: string];

/**
 * Produces ranked completion candidates for the current input text.
 */
export type CompletionProvider = (text: string) => Completion[];
