/**
 * Global Keymap Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createGlobalKeymap } from '../keymap.js';
import { ScreenSession } from '../../tui/screen-session.js';
import { FakeProcessRunner, FakeTerminal, RecordingView } from '../../test-utils/index.js';

function setup(keys: Array<string | null> = [], shellCommand?: string) {
  const terminal = new FakeTerminal({ rows: 10, cols: 40, keys });
  const runner = new FakeProcessRunner(0);
  const session = new ScreenSession({ terminal, processRunner: runner });
  const onQuit = vi.fn();
  const keymap = createGlobalKeymap(session, { shell: '/bin/sh', shellCommand, onQuit });
  return { terminal, runner, session, onQuit, keymap };
}

function titles(session: ScreenSession): string[] {
  return session.buffers().map((buffer) => buffer.title);
}

describe('createGlobalKeymap', () => {
  it('leaves unbound keys to the focused buffer', async () => {
    const { keymap } = setup();

    expect(await keymap('z')).toBe(false);
  });

  it('rolls forward with n and backward with p', async () => {
    const { session, keymap } = setup();
    session.spawn('a', new RecordingView('a'));
    session.spawn('b', new RecordingView('b'));
    session.spawn('c', new RecordingView('c'));

    expect(await keymap('n')).toBe(true);
    expect(titles(session)).toEqual(['b', 'c', 'a']);

    await keymap('p');
    expect(titles(session)).toEqual(['b', 'a', 'c']);
    expect(session.focusBuf?.title).toBe('c');
  });

  describe('x', () => {
    it('kills the focused buffer', async () => {
      const { session, keymap } = setup();
      session.spawn('a', new RecordingView('a'));
      session.spawn('b', new RecordingView('b'));

      await keymap('x');

      expect(titles(session)).toEqual(['a']);
    });

    it('flashes when the buffer refuses', async () => {
      const { session, keymap } = setup();
      session.spawn('home', new RecordingView('home', { killable: false }));

      await keymap('x');

      expect(titles(session)).toEqual(['home']);
      expect(session.minibuffer.flash).toBe("home can't be killed");
    });
  });

  it('opens the buffer list and help only once each', async () => {
    const { session, keymap } = setup();
    session.spawn('home', new RecordingView('home'));

    await keymap('l');
    await keymap('?');
    await keymap('l');

    expect([...titles(session)].sort()).toEqual(['buffer list', 'help', 'home']);
  });

  describe(':', () => {
    it('raises the named buffer', async () => {
      const { session, keymap } = setup(['a', 'enter']);
      session.spawn('a', new RecordingView('a'));
      session.spawn('b', new RecordingView('b'));

      await keymap(':');

      expect(session.focusBuf?.title).toBe('a');
    });

    it('flashes for an unknown title', async () => {
      const { session, keymap } = setup(['z', 'enter']);
      session.spawn('a', new RecordingView('a'));

      await keymap(':');

      expect(session.focusBuf?.title).toBe('a');
      expect(session.minibuffer.flash).toBe('No buffer named z');
    });
  });

  describe('!', () => {
    it('runs the configured command without asking', async () => {
      const { session, runner, terminal, keymap } = setup([], 'make test');
      session.spawn('home', new RecordingView('home'));

      await keymap('!');

      expect(runner.commands).toEqual(['make test']);
      expect(terminal.polls).toEqual([]);
    });

    it('runs the typed command', async () => {
      const { session, runner, keymap } = setup(['l', 's', 'enter']);
      session.spawn('home', new RecordingView('home'));

      await keymap('!');

      expect(runner.commands).toEqual(['ls']);
    });

    it('starts the shell for an empty answer', async () => {
      const { session, runner, keymap } = setup(['enter']);
      session.spawn('home', new RecordingView('home'));

      await keymap('!');

      expect(runner.commands).toEqual(['/bin/sh']);
    });

    it('does nothing when cancelled', async () => {
      const { session, runner, keymap } = setup(['C-g']);
      session.spawn('home', new RecordingView('home'));

      await keymap('!');

      expect(runner.commands).toEqual([]);
    });
  });

  describe('quitting', () => {
    it('quits after y', async () => {
      const { session, onQuit, keymap } = setup(['y']);
      session.spawn('home', new RecordingView('home'));

      await keymap('q');

      expect(onQuit).toHaveBeenCalledTimes(1);
    });

    it('stays after n', async () => {
      const { session, onQuit, keymap } = setup(['n']);
      session.spawn('home', new RecordingView('home'));

      await keymap('q');

      expect(onQuit).not.toHaveBeenCalled();
    });

    it('quits at once on C-c', async () => {
      const { onQuit, keymap } = setup();

      await keymap('C-c');

      expect(onQuit).toHaveBeenCalledTimes(1);
    });
  });

  describe('o', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'stackterm-open-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('opens the named file in a text buffer', async () => {
      const path = join(dir, 'notes.txt');
      writeFileSync(path, 'first line\nsecond line\n');
      const { session, keymap } = setup([...path.split(''), 'enter']);
      session.spawn('home', new RecordingView('home'));

      await keymap('o');

      expect(session.focusBuf?.title).toBe('notes.txt');
      expect(session.focusBuf?.view.name).toBe('file');
    });

    it('keeps files with the same name apart', async () => {
      mkdirSync(join(dir, 'a'));
      mkdirSync(join(dir, 'b'));
      const first = join(dir, 'a', 'notes.txt');
      const second = join(dir, 'b', 'notes.txt');
      writeFileSync(first, 'ALPHA\n');
      writeFileSync(second, 'BRAVO\n');
      const { session, terminal, keymap } = setup([
        ...first.split(''),
        'enter',
        ...second.split(''),
        'enter',
        ...first.split(''),
        'enter',
      ]);
      session.spawn('home', new RecordingView('home'));

      await keymap('o');
      await keymap('o');
      expect(titles(session)).toEqual(['home', 'notes.txt', 'notes.txt <2>']);
      await session.drawScreen();
      expect(terminal.line(0).trimEnd()).toBe('BRAVO');

      await keymap('o');
      expect(titles(session)).toEqual(['home', 'notes.txt <2>', 'notes.txt']);
      await session.drawScreen();
      expect(terminal.line(0).trimEnd()).toBe('ALPHA');
    });

    it('flashes when the file cannot be read', async () => {
      const path = join(dir, 'missing.txt');
      const { session, keymap } = setup([...path.split(''), 'enter']);
      session.spawn('home', new RecordingView('home'));

      await keymap('o');

      expect(titles(session)).toEqual(['home']);
      expect(session.minibuffer.flash?.startsWith(`Can't open ${path}: `)).toBe(true);
    });
  });
});
