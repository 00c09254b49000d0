/**
 * Terminal Surface
 *
 * The character-grid primitive the screen layer paints through. The
 * `TerminalSurface` interface is all the core depends on; `AnsiTerminal` is
 * the default implementation over stdin/stdout using ANSI escape sequences.
 *
 * Output follows a two-stage protocol:
 * - Writes land in a draft buffer
 * - `stage()` marks the draft for output (a buffer commit)
 * - `flush()` emits everything staged in one batched write, wrapped in
 *   synchronized-output markers so the terminal repaints once
 *
 * Key ANSI sequences:
 * - CSI n;m H  (CUP) - Cursor position to row n, column m
 * - CSI 2J     (ED2) - Erase entire screen
 * - CSI ?25h/l - Show/hide cursor
 * - CSI ?1049h/l - Alternate screen buffer
 * - CSI ?2026h/l - Synchronized output (prevents flickering)
 */

import { EventEmitter } from 'node:events';
import * as readline from 'node:readline';
import type { Key } from 'node:readline';
import { Colormap } from './colormap.js';
import { keystrokeFromKeypress, type Keystroke } from './keys.js';
import type { ColorName } from './types.js';

/**
 * ANSI escape sequence constants.
 */
export const ANSI = {
  ESC: '\x1b',
  CSI: '\x1b[',

  // Cursor positioning (1-indexed)
  cursorTo: (row: number, col: number = 1): string => `\x1b[${row};${col}H`,
  SHOW_CURSOR: '\x1b[?25h',
  HIDE_CURSOR: '\x1b[?25l',

  // Erase operations
  CLEAR_SCREEN: '\x1b[2J',

  // Synchronized output (DEC mode 2026)
  BEGIN_SYNC: '\x1b[?2026h',
  END_SYNC: '\x1b[?2026l',

  // Alternate screen buffer (like vim/less use)
  ENTER_ALT_SCREEN: '\x1b[?1049h',
  EXIT_ALT_SCREEN: '\x1b[?1049l',

  RESET: '\x1b[0m',
} as const;

/**
 * The character grid consumed by the screen layer. Rows and columns are
 * 0-indexed.
 */
export interface TerminalSurface {
  readonly rows: number;
  readonly cols: number;
  moveCursor(row: number, col: number): void;
  setCursorVisible(visible: boolean): void;
  /** Select the color used by subsequent writes */
  setColor(color: ColorName, highlight?: boolean): void;
  /** Paint text on one row; the caller keeps it within bounds */
  writeAt(row: number, col: number, text: string): void;
  /** Erase the whole physical screen */
  clear(): void;
  /** Mark everything drawn since the last stage for output */
  stage(): void;
  /** Emit staged output in one batched update */
  flush(): void;
  /** Stage and flush immediately */
  refresh(): void;
  /** Next keystroke, or null once `timeoutMs` passes without one */
  nextKey(timeoutMs: number): Promise<Keystroke | null>;
  /** Hand the terminal to another process */
  suspend(): void;
  /** Reclaim the terminal after suspend() */
  resume(): void;
}

/** Output stream shape; process.stdout satisfies it. */
export type TerminalOutput = NodeJS.WritableStream & {
  rows?: number;
  columns?: number;
  isTTY?: boolean;
};

/** Input stream shape; process.stdin satisfies it. */
export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface AnsiTerminalOptions {
  /** stdout stream (default: process.stdout) */
  stdout?: TerminalOutput;
  /** stdin stream (default: process.stdin) */
  stdin?: TerminalInput;
  /** Color resolution (default: DEFAULT_PALETTE) */
  colormap?: Colormap;
  /** Use alternate screen buffer (default: true) */
  useAlternateScreen?: boolean;
  /** Enable synchronized output to prevent flickering (default: true) */
  useSynchronizedOutput?: boolean;
}

export interface AnsiTerminalEvents {
  resize: [{ rows: number; cols: number }];
}

/**
 * TerminalSurface over ANSI escape sequences.
 *
 * Input arrives as readline 'keypress' events and is queued until a
 * `nextKey()` call picks it up, so keystrokes typed while the screen is busy
 * are never lost.
 */
export class AnsiTerminal extends EventEmitter<AnsiTerminalEvents> implements TerminalSurface {
  private stdout: TerminalOutput;
  private stdin: TerminalInput;
  private colormap: Colormap;
  private useAlternateScreen: boolean;
  private useSynchronizedOutput: boolean;

  private draft: string[] = [];
  private staged: string[] = [];
  private color: ColorName = 'none';
  private highlight: boolean = false;
  private cursorRow: number = 0;
  private cursorCol: number = 0;

  private keyQueue: Keystroke[] = [];
  private pendingKey: {
    resolve: (key: Keystroke | null) => void;
    timer: NodeJS.Timeout;
  } | null = null;

  private wasRaw: boolean = false;
  private started: boolean = false;
  private keypressHandler: ((str: string | undefined, key: Key | undefined) => void) | null = null;
  private resizeHandler: (() => void) | null = null;

  constructor(options: AnsiTerminalOptions = {}) {
    super();
    this.stdout = options.stdout ?? process.stdout;
    this.stdin = options.stdin ?? process.stdin;
    this.colormap = options.colormap ?? new Colormap();
    this.useAlternateScreen = options.useAlternateScreen ?? true;
    this.useSynchronizedOutput = options.useSynchronizedOutput ?? true;
  }

  get rows(): number {
    return this.stdout.rows || 24; // || catches both undefined and 0
  }

  get cols(): number {
    return this.stdout.columns || 80;
  }

  /**
   * Take over the terminal: raw mode, keypress decoding, alternate screen,
   * hidden cursor.
   */
  start(): void {
    if (this.started) return;

    readline.emitKeypressEvents(this.stdin);
    this.keypressHandler = (str, key) => {
      const keystroke = keystrokeFromKeypress(str, key);
      if (keystroke !== null) {
        this.pushKey(keystroke);
      }
    };
    this.stdin.on('keypress', this.keypressHandler);

    this.resizeHandler = () => {
      this.emit('resize', { rows: this.rows, cols: this.cols });
    };
    this.stdout.on('resize', this.resizeHandler);

    this.enterProgramMode();
    this.started = true;
  }

  /**
   * Restore the terminal to the state start() found it in.
   */
  stop(): void {
    if (!this.started) return;

    if (this.keypressHandler) {
      this.stdin.off('keypress', this.keypressHandler);
      this.keypressHandler = null;
    }
    if (this.resizeHandler) {
      this.stdout.off('resize', this.resizeHandler);
      this.resizeHandler = null;
    }
    if (this.pendingKey) {
      clearTimeout(this.pendingKey.timer);
      this.pendingKey.resolve(null);
      this.pendingKey = null;
    }

    this.leaveProgramMode();
    // A resumed stdin keeps the process alive
    this.stdin.pause();
    this.started = false;
  }

  moveCursor(row: number, col: number): void {
    this.cursorRow = row;
    this.cursorCol = col;
    this.draft.push(ANSI.cursorTo(row + 1, col + 1));
  }

  setCursorVisible(visible: boolean): void {
    this.draft.push(visible ? ANSI.SHOW_CURSOR : ANSI.HIDE_CURSOR);
  }

  setColor(color: ColorName, highlight: boolean = false): void {
    this.color = color;
    this.highlight = highlight;
  }

  writeAt(row: number, col: number, text: string): void {
    this.draft.push(ANSI.cursorTo(row + 1, col + 1), this.colormap.paint(text, this.color, this.highlight));
  }

  clear(): void {
    this.draft.push(ANSI.CLEAR_SCREEN);
  }

  stage(): void {
    if (this.draft.length === 0) return;
    this.staged.push(...this.draft);
    this.draft = [];
  }

  flush(): void {
    if (this.staged.length === 0) return;

    // Leave the hardware cursor where the last moveCursor() put it
    const body = this.staged.join('') + ANSI.RESET + ANSI.cursorTo(this.cursorRow + 1, this.cursorCol + 1);
    this.staged = [];

    this.write(this.useSynchronizedOutput ? ANSI.BEGIN_SYNC + body + ANSI.END_SYNC : body);
  }

  refresh(): void {
    this.stage();
    this.flush();
  }

  nextKey(timeoutMs: number): Promise<Keystroke | null> {
    const queued = this.keyQueue.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }

    // A previous poll that is still waiting yields to this one
    if (this.pendingKey) {
      clearTimeout(this.pendingKey.timer);
      this.pendingKey.resolve(null);
      this.pendingKey = null;
    }

    return new Promise<Keystroke | null>((resolve) => {
      const timer = setTimeout(() => {
        this.pendingKey = null;
        resolve(null);
      }, timeoutMs);
      this.pendingKey = { resolve, timer };
    });
  }

  suspend(): void {
    this.leaveProgramMode();
    this.stdin.pause();
  }

  resume(): void {
    this.stdin.resume();
    this.enterProgramMode();
  }

  /**
   * Deliver a keystroke to the waiting poll, or queue it.
   */
  private pushKey(key: Keystroke): void {
    if (this.pendingKey) {
      const { resolve, timer } = this.pendingKey;
      clearTimeout(timer);
      this.pendingKey = null;
      resolve(key);
      return;
    }
    this.keyQueue.push(key);
  }

  private enterProgramMode(): void {
    this.wasRaw = this.stdin.isRaw ?? false;
    if (this.stdin.isTTY && this.stdin.setRawMode) {
      this.stdin.setRawMode(true);
    }
    this.stdin.resume();

    if (this.useAlternateScreen) {
      this.write(ANSI.ENTER_ALT_SCREEN);
    }
    this.write(ANSI.HIDE_CURSOR);
  }

  private leaveProgramMode(): void {
    this.write(ANSI.RESET + ANSI.SHOW_CURSOR);
    if (this.useAlternateScreen) {
      this.write(ANSI.EXIT_ALT_SCREEN);
    }

    if (this.stdin.isTTY && this.stdin.setRawMode) {
      this.stdin.setRawMode(this.wasRaw);
    }
  }

  /**
   * Write output to stdout.
   */
  private write(data: string): void {
    try {
      this.stdout.write(data);
    } catch (error: unknown) {
      // EPIPE is expected when stdout is piped to a closed consumer (e.g., | head)
      if (!(error instanceof Error && 'code' in error && error.code === 'EPIPE')) {
        throw error;
      }
    }
  }
}

/**
 * Create a pre-configured ANSI terminal.
 */
export function createAnsiTerminal(options?: AnsiTerminalOptions): AnsiTerminal {
  return new AnsiTerminal(options);
}
