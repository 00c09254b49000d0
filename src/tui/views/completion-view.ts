/**
 * Completion View
 *
 * Lists completion candidates in columns under a header line. The part of
 * each label the user already typed is painted in `completionPrefix`;
 * `roll()` moves the selection to the next candidate, following the text
 * field as it cycles.
 */

import { BaseView } from './base-view.js';

export interface CompletionViewOptions {
  /** First line of the view */
  header?: string;
  /** Characters at the start of each label the user already typed */
  prefixLength?: number;
}

const COLUMN_GAP = 2;

export class CompletionView extends BaseView {
  readonly name = 'completions';
  private labels: string[];
  private header: string;
  private prefixLength: number;
  private selected: number = -1;
  private topRow: number = 0;

  constructor(labels: readonly string[], options: CompletionViewOptions = {}) {
    super();
    this.labels = [...labels];
    this.header = options.header ?? '';
    this.prefixLength = options.prefixLength ?? 0;
  }

  /** Index of the highlighted candidate, or -1 before the first roll. */
  get selection(): number {
    return this.selected;
  }

  status(): string {
    return `${this.labels.length} candidates`;
  }

  roll(): void {
    if (this.labels.length === 0) return;
    this.selected = (this.selected + 1) % this.labels.length;

    const { perRow } = this.layout();
    const selectedRow = Math.floor(this.selected / perRow);
    const visibleRows = Math.max(1, this.contentHeight - 1);
    if (selectedRow < this.topRow) {
      this.topRow = selectedRow;
    } else if (selectedRow >= this.topRow + visibleRows) {
      this.topRow = selectedRow - visibleRows + 1;
    }
    this.buffer?.markDirty();
  }

  draw(): void {
    this.write(0, 0, this.header);

    const { columnWidth, perRow } = this.layout();
    for (let row = 1; row < this.contentHeight; row++) {
      this.write(row, 0, '');
      const first = (this.topRow + row - 1) * perRow;
      for (let column = 0; column < perRow; column++) {
        const index = first + column;
        const label = this.labels[index];
        if (label === undefined) break;
        this.drawLabel(row, column * columnWidth, label, index === this.selected);
      }
    }
  }

  private drawLabel(row: number, col: number, label: string, highlight: boolean): void {
    const split = Math.min(this.prefixLength, label.length);
    this.write(row, col, label.slice(0, split), { color: 'completionPrefix', highlight, noFill: true });
    this.write(row, col + split, label.slice(split), { color: 'completion', highlight, noFill: true });
  }

  private layout(): { columnWidth: number; perRow: number } {
    const longest = this.labels.reduce((max, label) => Math.max(max, label.length), 0);
    const columnWidth = longest + COLUMN_GAP;
    return { columnWidth, perRow: Math.max(1, Math.floor(this.contentWidth / columnWidth)) };
  }
}
