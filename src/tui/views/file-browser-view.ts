/**
 * File Browser View
 *
 * A modal directory browser. `enter` descends into directories and accepts
 * a file; `space` marks files so several can be returned at once, in the
 * order they were marked.
 *
 * Keys:
 * - down/j/C-n, up/k/C-p, pagedown, pageup: move
 * - enter: open directory / accept
 * - space: toggle mark on a file
 * - u, backspace: parent directory
 * - q: finish with nothing selected
 */

import { dirname, join, parse, resolve } from 'node:path';
import { nodeFileSystem, type DirectoryEntry, type FileSystem } from '../filesystem.js';
import { KEY, type Keystroke } from '../keys.js';
import type { ModalView } from '../types.js';
import { BaseView } from './base-view.js';

export interface FileBrowserViewOptions {
  /** Directory to start in (default: the working directory) */
  dir?: string;
  fileSystem?: FileSystem;
}

const PARENT: DirectoryEntry = { name: '..', isDirectory: true };

export class FileBrowserView extends BaseView implements ModalView<string[]> {
  readonly name = 'file-browser';
  private fileSystem: FileSystem;
  private dir: string;
  private entries: DirectoryEntry[] = [];
  private cursor: number = 0;
  private topRow: number = 0;
  private marked: string[] = [];
  private finished: boolean = false;
  private result: string[] = [];

  constructor(options: FileBrowserViewOptions = {}) {
    super();
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.dir = resolve(options.dir ?? '.');
    this.load();
  }

  get directory(): string {
    return this.dir;
  }

  /** Entry under the cursor. */
  get current(): DirectoryEntry | undefined {
    return this.entries[this.cursor];
  }

  status(): string {
    return this.marked.length > 0 ? `${this.marked.length} marked` : this.dir;
  }

  done(): boolean {
    return this.finished;
  }

  value(): string[] {
    return this.result;
  }

  draw(): void {
    this.write(0, 0, `Directory: ${this.dir}`);

    const visible = Math.max(0, this.contentHeight - 1);
    for (let row = 0; row < visible; row++) {
      const index = this.topRow + row;
      const entry = this.entries[index];
      if (!entry) {
        this.write(row + 1, 0, '');
        continue;
      }
      const mark = this.marked.includes(join(this.dir, entry.name)) ? '*' : ' ';
      const suffix = entry.isDirectory ? '/' : '';
      this.write(row + 1, 0, `${mark} ${entry.name}${suffix}`, {
        color: entry.isDirectory ? 'directory' : 'none',
        highlight: index === this.cursor,
      });
    }
  }

  handleInput(key: Keystroke): void {
    const page = Math.max(1, this.contentHeight - 2);
    switch (key) {
      case KEY.DOWN:
      case 'j':
      case 'C-n':
        this.move(1);
        break;
      case KEY.UP:
      case 'k':
      case 'C-p':
        this.move(-1);
        break;
      case KEY.PAGE_DOWN:
        this.move(page);
        break;
      case KEY.PAGE_UP:
        this.move(-page);
        break;
      case KEY.ENTER:
        this.activate();
        break;
      case KEY.SPACE:
        this.toggleMark();
        break;
      case 'u':
      case KEY.BACKSPACE:
        this.changeDirectory(dirname(this.dir));
        break;
      case 'q':
        this.finish([]);
        break;
    }
  }

  private activate(): void {
    const entry = this.current;
    if (!entry) return;

    if (entry.isDirectory) {
      this.changeDirectory(entry === PARENT ? dirname(this.dir) : join(this.dir, entry.name));
      return;
    }
    this.finish(this.marked.length > 0 ? [...this.marked] : [join(this.dir, entry.name)]);
  }

  private toggleMark(): void {
    const entry = this.current;
    if (!entry || entry.isDirectory) return;

    const path = join(this.dir, entry.name);
    const at = this.marked.indexOf(path);
    if (at === -1) {
      this.marked.push(path);
    } else {
      this.marked.splice(at, 1);
    }
    this.move(1);
    this.buffer?.markDirty();
  }

  private changeDirectory(dir: string): void {
    if (dir === this.dir) return;
    this.dir = dir;
    this.load();
    this.buffer?.markDirty();
  }

  private move(delta: number): void {
    const last = Math.max(0, this.entries.length - 1);
    const next = Math.min(Math.max(0, this.cursor + delta), last);
    if (next === this.cursor) return;

    this.cursor = next;
    const visible = Math.max(1, this.contentHeight - 1);
    if (this.cursor < this.topRow) {
      this.topRow = this.cursor;
    } else if (this.cursor >= this.topRow + visible) {
      this.topRow = this.cursor - visible + 1;
    }
    this.buffer?.markDirty();
  }

  private finish(result: string[]): void {
    this.result = result;
    this.finished = true;
  }

  /**
   * Directories first, then files, each alphabetically; ".." leads unless
   * this is the filesystem root.
   */
  private load(): void {
    const listed = [...this.fileSystem.listEntries(this.dir)].sort((a, b) => {
      if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });
    this.entries = parse(this.dir).root === this.dir ? listed : [PARENT, ...listed];
    this.cursor = 0;
    this.topRow = 0;
  }
}
