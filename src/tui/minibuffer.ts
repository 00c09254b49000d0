/**
 * Minibuffer Composer
 *
 * Assembles the variable-height status region at the bottom of the screen
 * from three independent sources:
 * - A transient flashed message
 * - The active prompt's reserved row
 * - Persistent status lines addressed by stable integer handles
 *
 * Handles index a sparse slot table. Clearing a slot leaves a hole so that
 * other open handles keep their meaning; only holes at the tail are trimmed,
 * which lets the next new handle reuse the freed positions.
 *
 * Every method runs to completion without yielding, so a compositor pass
 * always reads a consistent snapshot.
 */

export class Minibuffer {
  private flashText: string | null = null;
  private _promptActive: boolean = false;
  private slots = new Map<number, string>();
  /** One past the highest handle that still holds text */
  private nextHandle: number = 0;

  /**
   * Store a status line.
   *
   * @param text - The line to show
   * @param handle - Existing handle to overwrite; omit to allocate one
   * @returns The handle and whether it was newly allocated
   */
  say(text: string, handle?: number): { handle: number; allocated: boolean } {
    const allocated = handle === undefined;
    const id = handle ?? this.nextHandle;
    this.slots.set(id, text);
    this.nextHandle = Math.max(this.nextHandle, id + 1);
    return { handle: id, allocated };
  }

  /**
   * Empty a status slot. When it was the highest live handle, trailing
   * empty slots are released as well.
   */
  clear(handle: number): void {
    this.slots.delete(handle);
    if (handle !== this.nextHandle - 1) return;

    while (this.nextHandle > 0 && !this.slots.has(this.nextHandle - 1)) {
      this.nextHandle--;
    }
  }

  get flash(): string | null {
    return this.flashText;
  }

  setFlash(text: string): void {
    this.flashText = text;
  }

  eraseFlash(): void {
    this.flashText = null;
  }

  get promptActive(): boolean {
    return this._promptActive;
  }

  setPromptActive(active: boolean): void {
    this._promptActive = active;
  }

  /**
   * The slot table from handle 0 up to the highest live handle, with null
   * for holes.
   */
  snapshot(): Array<string | null> {
    const result: Array<string | null> = [];
    for (let i = 0; i < this.nextHandle; i++) {
      result.push(this.slots.get(i) ?? null);
    }
    return result;
  }

  /** Status lines in handle order, holes skipped. */
  statusLines(): string[] {
    return this.snapshot().filter((line): line is string => line !== null);
  }

  /**
   * Rows the minibuffer occupies: flash + prompt + live status lines, and
   * never fewer than one.
   */
  lineCount(): number {
    return Math.max(
      1,
      (this.flashText !== null ? 1 : 0) + (this._promptActive ? 1 : 0) + this.slots.size
    );
  }

  /**
   * Lines painted by the compositor, top to bottom: the flash, then status
   * lines in handle order. The prompt row (bottom) belongs to the active
   * text field and is not included. When nothing would show and no prompt
   * is active, a single blank line keeps the region one row tall.
   */
  render(): string[] {
    const lines: string[] = [];
    if (this.flashText !== null) lines.push(this.flashText);
    lines.push(...this.statusLines());
    if (lines.length === 0 && !this._promptActive) lines.push('');
    return lines;
  }
}
