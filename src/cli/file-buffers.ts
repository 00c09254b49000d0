/**
 * File Buffers
 *
 * Tracks which buffer shows which file, keyed by absolute path. Titles are
 * the file's basename; two files with the same name get the stack's
 * " <2>" suffix.
 */

import { readFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import type { Buffer } from '../tui/buffer.js';
import type { ScreenSession } from '../tui/screen-session.js';
import { TextView } from '../tui/views/index.js';

export class FileBuffers {
  private session: ScreenSession;
  private byPath = new Map<string, Buffer>();

  constructor(session: ScreenSession) {
    this.session = session;
  }

  /**
   * Show `path`, raising its buffer if the file is already open.
   *
   * @param content - File text; read from disk when omitted
   * @throws When the file cannot be read
   */
  open(path: string, content?: string): Buffer {
    const absolute = resolve(path);
    const existing = this.byPath.get(absolute);
    if (existing && this.session.buffers().includes(existing)) {
      this.session.raiseToFront(existing);
      return existing;
    }

    const text = content ?? readFileSync(absolute, 'utf-8');
    const buffer = this.session.spawn(basename(absolute), new TextView(text, { name: 'file' }));
    this.byPath.set(absolute, buffer);
    return buffer;
  }
}
