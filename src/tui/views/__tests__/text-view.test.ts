/**
 * Text View Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Buffer } from '../../buffer.js';
import { BufferStack } from '../../buffer-stack.js';
import { TextView, toDisplayLine } from '../text-view.js';
import { FakeTerminal } from '../../../test-utils/index.js';

const TEN_LINES = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`);

describe('TextView', () => {
  let terminal: FakeTerminal;
  let view: TextView;
  let buffer: Buffer;

  beforeEach(() => {
    // 5-row buffer: 4 content rows and a status line
    terminal = new FakeTerminal({ rows: 6, cols: 30 });
    view = new TextView(TEN_LINES);
    buffer = new BufferStack(terminal).spawn('doc', view);
  });

  it('shows the visible range in the status', () => {
    expect(view.status()).toBe('lines 1-4 of 10');
  });

  it('draws the lines from the top line down', () => {
    view.handleInput('j');
    buffer.draw();

    expect(terminal.screen().slice(0, 5)).toEqual([
      'line 2',
      'line 3',
      'line 4',
      'line 5',
      ' [text] doc   lines 2-5 of 10',
    ]);
  });

  it('scrolls by line, page and to either end', () => {
    view.handleInput(' ');
    expect(view.topLine).toBe(3);

    view.handleInput('pageup');
    expect(view.topLine).toBe(0);

    view.handleInput('end');
    expect(view.topLine).toBe(6);
    expect(view.status()).toBe('lines 7-10 of 10');

    view.handleInput('j');
    expect(view.topLine).toBe(6);

    view.handleInput('k');
    expect(view.topLine).toBe(5);

    view.handleInput('home');
    expect(view.topLine).toBe(0);
  });

  it('marks the buffer dirty only when it scrolls', () => {
    buffer.commit();
    view.handleInput('k');
    expect(buffer.dirty).toBe(false);

    view.handleInput('down');
    expect(buffer.dirty).toBe(true);
  });

  it('blanks rows past the end of short text', () => {
    view.setText('only\ntwo');
    terminal.writeAt(2, 0, 'stale');
    buffer.draw();

    expect(terminal.screen().slice(0, 4)).toEqual(['only', 'two', '', '']);
    expect(view.status()).toBe('lines 1-2 of 2');
  });

  it('resets to the top on setText', () => {
    view.handleInput('end');
    view.setText(TEN_LINES);

    expect(view.topLine).toBe(0);
  });

  it('is killable unless told otherwise', () => {
    expect(view.killable()).toBe(true);
    expect(new TextView('home', { killable: false }).killable()).toBe(false);
  });

  it('names itself after the option', () => {
    expect(new TextView('x', { name: 'help' }).name).toBe('help');
    expect(view.name).toBe('text');
  });
});

describe('toDisplayLine', () => {
  it('expands tabs to the next multiple of eight', () => {
    expect(toDisplayLine('a\tb')).toBe('a       b');
    expect(toDisplayLine('\tx')).toBe('        x');
    expect(toDisplayLine('12345678\ty')).toBe('12345678        y');
  });

  it('shows control characters in caret notation', () => {
    expect(toDisplayLine('\x1b[31mred')).toBe('^[[31mred');
    expect(toDisplayLine('bell\x07')).toBe('bell^G');
    expect(toDisplayLine('del\x7f')).toBe('del^?');
    expect(toDisplayLine('csi\x9b')).toBe('csi?');
  });

  it('leaves ordinary text alone', () => {
    expect(toDisplayLine('plain text: é')).toBe('plain text: é');
  });
});

describe('TextView file text', () => {
  it('paints tabs, escapes and CRLF endings as plain cells', () => {
    const terminal = new FakeTerminal({ rows: 4, cols: 20 });
    const buffer = new BufferStack(terminal).spawn('file', new TextView('k\tv\r\n\x1b[2Jx'));

    buffer.draw();

    expect(terminal.screen().slice(0, 2)).toEqual(['k       v', '^[[2Jx']);
  });
});
