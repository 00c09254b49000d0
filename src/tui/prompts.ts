/**
 * Prompt Controller
 *
 * Question-and-answer sessions on the bottom terminal row. At most one
 * prompt runs at a time; each is a blocking loop that polls the terminal
 * until an accepting or cancelling keystroke arrives.
 *
 * While a text prompt has candidates to show, a `<completions>` buffer is
 * spawned above it and replaced whenever the candidate list changes.
 */

import type { AccountDirectory } from './accounts.js';
import type { Buffer } from './buffer.js';
import type { BufferStack } from './buffer-stack.js';
import type { Compositor } from './compositor.js';
import {
  completionPrefixLength,
  createFilenameCompleter,
  expandHome,
} from './filename-completion.js';
import type { FileSystem } from './filesystem.js';
import { KEY, parseAcceptSet, type Keystroke } from './keys.js';
import type { Minibuffer } from './minibuffer.js';
import type { TerminalSurface } from './terminal.js';
import { TextField } from './text-field.js';
import type { CompletionProvider, ModalView, SpawnOptions } from './types.js';
import { CompletionView } from './views/completion-view.js';
import { FileBrowserView } from './views/file-browser-view.js';
import { PromptActiveError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const COMPLETIONS_TITLE = '<completions>';

/**
 * Runs a modal view to completion. Provided by the session, which owns the
 * modal loop.
 */
export interface ModalRunner {
  spawnModal<T>(title: string, view: ModalView<T>, options?: SpawnOptions): Promise<T>;
}

export interface PromptControllerOptions {
  terminal: TerminalSurface;
  stack: BufferStack;
  minibuffer: Minibuffer;
  compositor: Compositor;
  modals: ModalRunner;
  fileSystem: FileSystem;
  accounts: AccountDirectory;
  cancelKey?: Keystroke;
  pollTimeoutMs?: number;
  /** Height of the completion list buffer */
  completionRows?: number;
  logger?: Logger;
}

export class PromptController {
  private terminal: TerminalSurface;
  private stack: BufferStack;
  private minibuffer: Minibuffer;
  private compositor: Compositor;
  private modals: ModalRunner;
  private fileSystem: FileSystem;
  private accounts: AccountDirectory;
  private cancelKey: Keystroke;
  private pollTimeoutMs: number;
  private completionRows: number;
  private logger: Logger;

  private fields = new Map<string, TextField>();
  private activeField: TextField | null = null;
  private _asking: boolean = false;

  constructor(options: PromptControllerOptions) {
    this.terminal = options.terminal;
    this.stack = options.stack;
    this.minibuffer = options.minibuffer;
    this.compositor = options.compositor;
    this.modals = options.modals;
    this.fileSystem = options.fileSystem;
    this.accounts = options.accounts;
    this.cancelKey = options.cancelKey ?? KEY.CANCEL;
    this.pollTimeoutMs = options.pollTimeoutMs ?? 1000;
    this.completionRows = options.completionRows ?? 10;
    this.logger = options.logger ?? silentLogger;
  }

  /** Whether a prompt is running. */
  get asking(): boolean {
    return this._asking;
  }

  /**
   * The reusable text field for a domain, created on first use.
   */
  field(domain: string): TextField {
    let field = this.fields.get(domain);
    if (!field) {
      field = new TextField(this.terminal, { cancelKey: this.cancelKey });
      this.fields.set(domain, field);
    }
    return field;
  }

  /**
   * Ask for a line of text.
   *
   * @param domain - Which text field to use ("filename", "search", ...)
   * @returns The answer, or null when cancelled
   */
  async ask(
    domain: string,
    question: string,
    defaultValue: string | null = null,
    completer: CompletionProvider | null = null
  ): Promise<string | null> {
    this.begin(question);
    const field = this.field(domain);
    const completion: { buffer: Buffer | null; view: CompletionView | null } = { buffer: null, view: null };

    try {
      this.minibuffer.setPromptActive(true);
      await this.compositor.withTerminal(async () => {
        field.activate({ question, defaultValue, completer });
        this.activeField = field;
        this.stack.markDirty();
        await this.compositor.drawScreen({ skipMinibuffer: true, lockHeld: true });
        field.positionCursor();
        this.terminal.refresh();
      });

      for (;;) {
        const key = await this.terminal.nextKey(this.pollTimeoutMs);
        if (key === null) continue;
        if (!field.handleInput(key)) break;

        await this.compositor.withTerminal(async () => {
          if (field.newCompletions) {
            if (completion.buffer) this.stack.killBuffer(completion.buffer);
            completion.view = new CompletionView(
              field.completions.map(([, label]) => label),
              {
                header: `Possible completions for "${field.text}": `,
                prefixLength: completionPrefixLength(field.text),
              }
            );
            completion.buffer = this.stack.spawn(COMPLETIONS_TITLE, completion.view, {
              height: this.completionRows,
            });
            await this.compositor.drawScreen({ skipMinibuffer: true, lockHeld: true });
          } else if (field.rollCompletions && completion.view) {
            completion.view.roll();
            await this.compositor.drawScreen({ skipMinibuffer: true, lockHeld: true });
          } else if (field.clearedCompletions && completion.buffer) {
            this.stack.killBuffer(completion.buffer);
            completion.buffer = null;
            completion.view = null;
            await this.compositor.drawScreen({ skipMinibuffer: true, lockHeld: true });
          }
          field.positionCursor();
          this.terminal.refresh();
        });
      }
    } finally {
      this.activeField = null;
      field.deactivate();
      if (completion.buffer) this.stack.killBuffer(completion.buffer);
      this.minibuffer.setPromptActive(false);
      this.stack.markDirty();
      this._asking = false;
    }

    await this.compositor.withTerminal(async () => {
      this.terminal.setCursorVisible(false);
      await this.compositor.drawScreen({ lockHeld: true });
    });

    this.logger.debug?.(`prompt "${question}" ${field.value === null ? 'cancelled' : 'answered'}`);
    return field.value;
  }

  /**
   * Paint the open text prompt again, e.g. after the screen was cleared.
   * Does nothing when no text prompt is open.
   */
  async redrawPrompt(): Promise<void> {
    const field = this.activeField;
    if (!field) return;

    await this.compositor.withTerminal(() => {
      field.draw();
      field.positionCursor();
      this.terminal.refresh();
    });
  }

  /**
   * Ask for one or more paths. An empty answer or a directory opens a file
   * browser there and returns what it selects.
   *
   * @returns The chosen paths in order; empty when cancelled
   */
  async askForFilenames(domain: string, question: string, defaultValue: string | null = null): Promise<string[]> {
    const completer = createFilenameCompleter({ fileSystem: this.fileSystem, accounts: this.accounts });
    const answer = await this.ask(domain, question, defaultValue, completer);
    if (answer === null) return [];

    if (answer === '') {
      return this.modals.spawnModal('file browser', new FileBrowserView({ fileSystem: this.fileSystem }));
    }

    const path = expandHome(answer, this.accounts);
    if (this.fileSystem.isDirectory(path)) {
      return this.modals.spawnModal('file browser', new FileBrowserView({ dir: path, fileSystem: this.fileSystem }));
    }
    return [path];
  }

  /**
   * Flash a question and wait for a single keystroke.
   *
   * @param accept - Keystrokes that answer; anything else is ignored. When
   *   omitted, any keystroke answers.
   * @returns The keystroke, or null when cancelled
   */
  async askGetch(question: string, accept?: string | readonly Keystroke[]): Promise<Keystroke | null> {
    this.begin(question);
    const accepted = accept === undefined ? null : parseAcceptSet(accept);
    let answer: Keystroke | null = null;

    try {
      this.minibuffer.setFlash(question);
      await this.compositor.withTerminal(async () => {
        await this.compositor.drawScreen({ lockHeld: true });
        const row = this.terminal.rows - this.minibuffer.lineCount();
        this.terminal.setCursorVisible(true);
        this.terminal.moveCursor(row, Math.min(question.length, this.terminal.cols - 1));
        this.terminal.refresh();
      });

      // Nothing repaints over the question while waiting
      this.compositor.setShelled(true);
      for (;;) {
        const key = await this.terminal.nextKey(this.pollTimeoutMs);
        if (key === null) continue;
        if (key === this.cancelKey) break;
        if (accepted === null || accepted.has(key)) {
          answer = key;
          break;
        }
      }
    } finally {
      this.compositor.setShelled(false);
      this.minibuffer.eraseFlash();
      this._asking = false;
    }

    await this.compositor.withTerminal(async () => {
      this.terminal.setCursorVisible(false);
      await this.compositor.drawScreen({ lockHeld: true });
    });
    return answer;
  }

  /**
   * @returns true for y/Y, false for n/N, null when cancelled
   */
  async askYesOrNo(question: string): Promise<boolean | null> {
    const answer = await this.askGetch(question, 'ynYN');
    if (answer === null) return null;
    return answer === 'y' || answer === 'Y';
  }

  private begin(question: string): void {
    if (this._asking) {
      throw new PromptActiveError(question);
    }
    this._asking = true;
    this.logger.debug?.(`prompt "${question}" started`);
  }
}
