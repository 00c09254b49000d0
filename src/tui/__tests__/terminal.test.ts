/**
 * ANSI Terminal Tests
 *
 * Output batching, program-mode escapes and keystroke delivery over mock
 * streams.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { Chalk } from 'chalk';
import { ANSI, AnsiTerminal } from '../terminal.js';
import { Colormap } from '../colormap.js';

// Mock writable stream for capturing output
class MockWritableStream extends Writable {
  chunks: string[] = [];
  rows: number = 24;
  columns: number = 80;
  isTTY: boolean = true;

  _write(chunk: Buffer, _encoding: string, callback: () => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  getOutput(): string {
    return this.chunks.join('');
  }

  clear(): void {
    this.chunks = [];
  }
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('AnsiTerminal', () => {
  let stdout: MockWritableStream;
  let stdin: PassThrough;
  let terminal: AnsiTerminal;

  beforeEach(() => {
    stdout = new MockWritableStream();
    stdin = new PassThrough();
    terminal = new AnsiTerminal({
      stdout,
      stdin,
      colormap: new Colormap({}, new Chalk({ level: 0 })),
      useSynchronizedOutput: false, // Disable for easier testing
    });
  });

  afterEach(() => {
    terminal.stop();
  });

  describe('ANSI constants', () => {
    it('generates 1-indexed cursor positioning', () => {
      expect(ANSI.cursorTo(5, 10)).toBe('\x1b[5;10H');
      expect(ANSI.cursorTo(1)).toBe('\x1b[1;1H');
    });
  });

  describe('geometry', () => {
    it('reads rows and columns from stdout', () => {
      stdout.rows = 30;
      stdout.columns = 100;

      expect(terminal.rows).toBe(30);
      expect(terminal.cols).toBe(100);
    });

    it('falls back to 24x80 when stdout reports nothing', () => {
      stdout.rows = 0;
      stdout.columns = 0;

      expect(terminal.rows).toBe(24);
      expect(terminal.cols).toBe(80);
    });
  });

  describe('program mode', () => {
    it('enters the alternate screen and hides the cursor on start', () => {
      terminal.start();

      expect(stdout.getOutput()).toBe(ANSI.ENTER_ALT_SCREEN + ANSI.HIDE_CURSOR);
    });

    it('restores the screen on stop', () => {
      terminal.start();
      stdout.clear();
      terminal.stop();

      expect(stdout.getOutput()).toBe(ANSI.RESET + ANSI.SHOW_CURSOR + ANSI.EXIT_ALT_SCREEN);
    });

    it('pauses stdin on stop so the process can exit', () => {
      terminal.start();
      expect(stdin.isPaused()).toBe(false);

      terminal.stop();

      expect(stdin.isPaused()).toBe(true);
    });

    it('skips the alternate screen when disabled', () => {
      const plain = new AnsiTerminal({ stdout, stdin, useAlternateScreen: false });
      plain.start();
      plain.stop();

      expect(stdout.getOutput()).toBe(ANSI.HIDE_CURSOR + ANSI.RESET + ANSI.SHOW_CURSOR);
    });

    it('leaves and re-enters program mode around suspend', () => {
      terminal.start();
      stdout.clear();

      terminal.suspend();
      expect(stdout.getOutput()).toBe(ANSI.RESET + ANSI.SHOW_CURSOR + ANSI.EXIT_ALT_SCREEN);

      stdout.clear();
      terminal.resume();
      expect(stdout.getOutput()).toBe(ANSI.ENTER_ALT_SCREEN + ANSI.HIDE_CURSOR);
    });
  });

  describe('output batching', () => {
    it('writes nothing until staged output is flushed', () => {
      terminal.writeAt(2, 4, 'hi');
      terminal.flush();
      expect(stdout.getOutput()).toBe('');

      terminal.stage();
      terminal.flush();
      expect(stdout.getOutput()).toBe(ANSI.cursorTo(3, 5) + 'hi' + ANSI.RESET + ANSI.cursorTo(1, 1));
    });

    it('leaves the hardware cursor where moveCursor put it', () => {
      terminal.writeAt(0, 0, 'x');
      terminal.moveCursor(5, 7);
      terminal.refresh();

      expect(stdout.getOutput()).toBe(
        ANSI.cursorTo(1, 1) + 'x' + ANSI.cursorTo(6, 8) + ANSI.RESET + ANSI.cursorTo(6, 8)
      );
    });

    it('emits each staged batch once', () => {
      terminal.writeAt(0, 0, 'x');
      terminal.refresh();
      stdout.clear();

      terminal.flush();
      expect(stdout.getOutput()).toBe('');
    });

    it('wraps batches in synchronized-output markers when enabled', () => {
      const synced = new AnsiTerminal({ stdout, stdin, colormap: new Colormap({}, new Chalk({ level: 0 })) });
      synced.writeAt(0, 0, 'x');
      synced.refresh();

      expect(stdout.getOutput()).toBe(
        ANSI.BEGIN_SYNC + ANSI.cursorTo(1, 1) + 'x' + ANSI.RESET + ANSI.cursorTo(1, 1) + ANSI.END_SYNC
      );
    });

    it('queues screen clears and cursor visibility with the draft', () => {
      terminal.clear();
      terminal.setCursorVisible(true);
      terminal.refresh();

      expect(stdout.getOutput()).toBe(ANSI.CLEAR_SCREEN + ANSI.SHOW_CURSOR + ANSI.RESET + ANSI.cursorTo(1, 1));
    });
  });

  describe('input', () => {
    it('queues keystrokes that arrive between polls', async () => {
      terminal.start();
      stdin.write('ab');
      await tick();

      await expect(terminal.nextKey(1000)).resolves.toBe('a');
      await expect(terminal.nextKey(1000)).resolves.toBe('b');
    });

    it('delivers a keystroke to a waiting poll', async () => {
      terminal.start();
      const pending = terminal.nextKey(1000);
      stdin.write('\r');

      await expect(pending).resolves.toBe('enter');
    });

    it('decodes control chords', async () => {
      terminal.start();
      stdin.write('\x07');
      await tick();

      await expect(terminal.nextKey(1000)).resolves.toBe('C-g');
    });

    it('reports no event after the timeout', async () => {
      terminal.start();

      await expect(terminal.nextKey(5)).resolves.toBeNull();
    });

    it('resolves a waiting poll with null on stop', async () => {
      terminal.start();
      const pending = terminal.nextKey(10_000);
      terminal.stop();

      await expect(pending).resolves.toBeNull();
    });
  });

  it('emits resize with the new geometry', () => {
    const events: Array<{ rows: number; cols: number }> = [];
    terminal.on('resize', (size) => events.push(size));
    terminal.start();

    stdout.rows = 40;
    stdout.columns = 120;
    stdout.emit('resize');

    expect(events).toEqual([{ rows: 40, cols: 120 }]);
  });
});
