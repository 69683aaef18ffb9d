/**
 * Text measurement
 *
 * Glyph shaping is not part of the core. Layout only needs advance widths
 * and line heights, which a TextMeasurer supplies.
 */

import type { FontSpec } from '../realize/flow.js';

export interface TextMeasurer {
  /** Advance width of `text` in points */
  width(text: string, font: FontSpec): number;
  /** Height of a line set in `font` */
  lineHeight(font: FontSpec): number;
}

/**
 * Every character is half an em wide, every line one em high
 */
export class MonospaceMeasurer implements TextMeasurer {
  width(text: string, font: FontSpec): number {
    return [...text].length * font.size * 0.5;
  }

  lineHeight(font: FontSpec): number {
    return font.size;
  }
}
