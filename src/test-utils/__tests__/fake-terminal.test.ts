/**
 * FakeTerminal Tests
 */

import { describe, it, expect } from 'vitest';
import { FakeTerminal } from '../fake-terminal.js';

describe('FakeTerminal', () => {
  it('writes text with the current color and clips at the right edge', () => {
    const terminal = new FakeTerminal({ rows: 2, cols: 6 });

    terminal.setColor('directory', true);
    terminal.writeAt(1, 3, 'abcdef');

    expect(terminal.line(1)).toBe('   abc');
    expect(terminal.cell(1, 3)).toEqual({ char: 'a', color: 'directory', highlight: true });
    expect(terminal.screen()).toEqual(['', '   abc']);
  });

  it('ignores writes below the last row', () => {
    const terminal = new FakeTerminal({ rows: 1, cols: 4 });

    terminal.writeAt(3, 0, 'nope');

    expect(terminal.screen()).toEqual(['']);
  });

  it('replays the key script and then reports timeouts', async () => {
    const terminal = new FakeTerminal({ keys: ['a', null, 'enter'], maxIdlePolls: 1 });

    expect(await terminal.nextKey(10)).toBe('a');
    expect(await terminal.nextKey(10)).toBeNull();
    expect(await terminal.nextKey(10)).toBe('enter');
    expect(await terminal.nextKey(10)).toBeNull();
    await expect(terminal.nextKey(10)).rejects.toThrow('keystroke script exhausted');
    expect(terminal.polls).toEqual(['a', null, 'enter', null]);
  });

  it('clears the grid on resize', () => {
    const terminal = new FakeTerminal({ rows: 2, cols: 4 });
    terminal.writeAt(0, 0, 'text');

    terminal.resize(3, 5);

    expect(terminal.screen()).toEqual(['', '', '']);
    expect(terminal.line(0)).toBe('     ');
  });

  it('tracks suspend and resume', () => {
    const terminal = new FakeTerminal();

    terminal.suspend();
    expect(terminal.suspended).toBe(true);
    terminal.resume();
    expect(terminal.suspended).toBe(false);
  });
});
