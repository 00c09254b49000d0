/**
 * Buffer List View Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Buffer } from '../../buffer.js';
import { BufferStack } from '../../buffer-stack.js';
import { BufferListView } from '../buffer-list-view.js';
import { FakeTerminal, RecordingView } from '../../../test-utils/index.js';

describe('BufferListView', () => {
  let terminal: FakeTerminal;
  let stack: BufferStack;
  let view: BufferListView;
  let listBuffer: Buffer;

  beforeEach(() => {
    terminal = new FakeTerminal({ rows: 8, cols: 40 });
    stack = new BufferStack(terminal);
    stack.spawn('notes', new RecordingView('fake'));
    stack.spawn('pinned', new RecordingView('fake', { killable: false }));
    view = new BufferListView(stack);
    listBuffer = stack.spawn('buffers', view);
  });

  it('lists buffers topmost first and marks its own row', () => {
    listBuffer.draw();

    expect(terminal.screen().slice(0, 4)).toEqual([
      '* buffers' + ' '.repeat(18) + '[buffer-list]',
      '  pinned' + ' '.repeat(19) + '[fake]',
      '  notes' + ' '.repeat(20) + '[fake]',
      '',
    ]);
    expect(terminal.cell(0, 0)?.highlight).toBe(true);
    expect(view.status()).toBe('3 buffers');
  });

  it('raises the selected buffer on enter', () => {
    view.handleInput('j');
    view.handleInput('j');
    view.handleInput('enter');

    expect(stack.top()?.title).toBe('notes');
    expect(stack.focusBuf?.title).toBe('notes');
  });

  it('kills the selected buffer on d', () => {
    view.handleInput('j');
    view.handleInput('j');
    view.handleInput('d');

    expect(stack.exists('notes')).toBe(false);
    expect(view.selected?.title).toBe('pinned');
  });

  it('leaves unkillable buffers and itself alone', () => {
    view.handleInput('d');
    expect(stack.exists('buffers')).toBe(true);

    view.handleInput('j');
    view.handleInput('d');
    expect(stack.exists('pinned')).toBe(true);
  });

  it('keeps the cursor within the list', () => {
    view.handleInput('k');
    expect(view.selected?.title).toBe('buffers');

    for (let i = 0; i < 5; i++) view.handleInput('down');
    expect(view.selected?.title).toBe('notes');
  });
});
