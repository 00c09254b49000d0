/**
 * Colormap
 *
 * Resolves semantic color names to chalk styles. The palette comes from the
 * `[colors]` config section; anything missing falls back to DEFAULT_PALETTE.
 */

import {
  Chalk,
  type ChalkInstance,
  type ForegroundColorName,
  type BackgroundColorName,
} from 'chalk';
import { COLOR_NAMES, type ColorName } from './types.js';

/**
 * One palette entry.
 */
export interface ColorSpec {
  fg?: ForegroundColorName;
  bg?: BackgroundColorName;
  bold?: boolean;
}

export type Palette = Record<ColorName, ColorSpec>;

export const DEFAULT_PALETTE: Palette = {
  none: {},
  status: { fg: 'black', bg: 'bgCyan' },
  flash: { fg: 'yellow', bold: true },
  prompt: { fg: 'white', bold: true },
  completion: { fg: 'white' },
  completionPrefix: { fg: 'green', bold: true },
  directory: { fg: 'blue', bold: true },
  selected: { fg: 'black', bg: 'bgYellow' },
};

export class Colormap {
  private styles = new Map<ColorName, ChalkInstance>();

  /**
   * @param palette - Overrides merged over DEFAULT_PALETTE
   * @param base - Chalk instance to derive styles from (tests pass level 0)
   */
  constructor(palette: Partial<Palette> = {}, base: ChalkInstance = new Chalk()) {
    for (const name of COLOR_NAMES) {
      const entry = palette[name] ?? DEFAULT_PALETTE[name];
      let style = base;
      if (entry.fg) style = style[entry.fg];
      if (entry.bg) style = style[entry.bg];
      if (entry.bold) style = style.bold;
      this.styles.set(name, style);
    }
  }

  colorFor(color: ColorName, highlight: boolean = false): ChalkInstance {
    const style = this.styles.get(color) ?? this.styles.get('none');
    if (!style) {
      throw new Error(`Colormap has no style for ${color}`);
    }
    return highlight ? style.inverse : style;
  }

  /**
   * Apply a color to text. Empty text stays empty so no stray escape
   * sequences end up in the output.
   */
  paint(text: string, color: ColorName, highlight: boolean = false): string {
    if (text === '') return '';
    return this.colorFor(color, highlight)(text);
  }
}
