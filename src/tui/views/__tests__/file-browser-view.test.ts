/**
 * File Browser View Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Buffer } from '../../buffer.js';
import { BufferStack } from '../../buffer-stack.js';
import { FileBrowserView } from '../file-browser-view.js';
import { FakeTerminal, MemoryFileSystem } from '../../../test-utils/index.js';

const fileSystem = new MemoryFileSystem({
  '/': ['data/'],
  '/data': ['b.txt', 'a.txt', 'sub/'],
  '/data/sub': ['c.txt'],
});

function press(view: FileBrowserView, keys: string[]): void {
  for (const key of keys) view.handleInput(key);
}

describe('FileBrowserView', () => {
  let terminal: FakeTerminal;
  let view: FileBrowserView;
  let buffer: Buffer;

  beforeEach(() => {
    terminal = new FakeTerminal({ rows: 8, cols: 30 });
    view = new FileBrowserView({ dir: '/data', fileSystem });
    buffer = new BufferStack(terminal).spawn('browse', view);
  });

  it('lists the parent, then directories, then files', () => {
    buffer.draw();

    expect(terminal.screen().slice(0, 6)).toEqual([
      'Directory: /data',
      '  ../',
      '  sub/',
      '  a.txt',
      '  b.txt',
      '',
    ]);
    expect(terminal.cell(1, 0)?.highlight).toBe(true);
    expect(terminal.cell(2, 2)?.color).toBe('directory');
    expect(terminal.cell(3, 2)?.color).toBe('none');
  });

  it('descends into a directory and accepts a file', () => {
    press(view, ['j', 'enter']);
    expect(view.directory).toBe('/data/sub');
    expect(view.done()).toBe(false);

    press(view, ['j', 'enter']);
    expect(view.done()).toBe(true);
    expect(view.value()).toEqual(['/data/sub/c.txt']);
  });

  it('goes up with .. and stops offering it at the root', () => {
    press(view, ['enter']);

    expect(view.directory).toBe('/');
    expect(view.current).toEqual({ name: 'data', isDirectory: true });
  });

  it('goes up with u and backspace', () => {
    press(view, ['j', 'enter', 'u']);
    expect(view.directory).toBe('/data');

    press(view, ['backspace']);
    expect(view.directory).toBe('/');
  });

  it('returns marked files in marking order', () => {
    press(view, ['j', 'j', 'j', ' ']);
    expect(view.status()).toBe('1 marked');

    press(view, ['k', ' ']);
    expect(view.status()).toBe('2 marked');

    buffer.draw();
    expect(terminal.line(3).trimEnd()).toBe('* a.txt');
    expect(terminal.line(4).trimEnd()).toBe('* b.txt');

    press(view, ['enter']);
    expect(view.value()).toEqual(['/data/b.txt', '/data/a.txt']);
  });

  it('toggles a mark off again', () => {
    press(view, ['j', 'j', ' ', 'k', ' ']);

    expect(view.status()).toBe('/data');
  });

  it('does not mark directories', () => {
    press(view, ['j', ' ']);

    expect(view.status()).toBe('/data');
    expect(view.current?.name).toBe('sub');
  });

  it('finishes empty on q', () => {
    expect(view.value()).toEqual([]);

    press(view, ['q']);

    expect(view.done()).toBe(true);
    expect(view.value()).toEqual([]);
  });

  it('clamps movement to the listing', () => {
    press(view, ['k', 'pagedown']);
    expect(view.current?.name).toBe('b.txt');

    press(view, ['pageup']);
    expect(view.current?.name).toBe('..');
  });
});
