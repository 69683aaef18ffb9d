/**
 * Region composer tests
 */

import { describe, it, expect } from 'vitest';
import { LayoutOverflowWarning } from '../diag.js';
import type { FlowItem, FontSpec } from '../realize/flow.js';
import { collect } from './chunks.js';
import { Composer } from './compose.js';
import type { Frame } from './frame.js';
import { MonospaceMeasurer } from './measure.js';

const font: FontSpec = { size: 10, weight: 400, style: 'normal', fill: 'black' };
const footnotes = { separator: true, clearance: 8, gap: 4 };

function par(text: string, inline: FlowItem[][] = [], size = 10): FlowItem {
  return {
    type: 'par',
    inlines: [{ type: 'text', text, font: { ...font, size } }, ...inline.map(entry => ({ type: 'footnote' as const, entry }))],
    leading: 4,
    indent: 0,
    font: { ...font, size },
  };
}

const gap: FlowItem = { type: 'v', spacing: { type: 'abs', amount: 10 }, weak: true };

function block(children: FlowItem[], options: { height?: number; sticky?: boolean } = {}): FlowItem {
  return {
    type: 'block',
    children,
    breakable: false,
    height: options.height ?? null,
    inset: 0,
    indent: 0,
    sticky: options.sticky ?? false,
  };
}

function texts(frame: Frame): string[] {
  const found: string[] = [];
  for (const { item } of frame.walk()) {
    if (item.type === 'text') found.push(item.text);
  }
  return found;
}

function compose(items: FlowItem[], height: number): { regions: Frame[]; warnings: LayoutOverflowWarning[] } {
  const warnings: LayoutOverflowWarning[] = [];
  const cx = { measurer: new MonospaceMeasurer(), warn: (warning: LayoutOverflowWarning) => warnings.push(warning) };
  const composer = new Composer(collect(items, 100, cx), { width: 100, height }, footnotes, cx);
  const regions: Frame[] = [];
  do {
    regions.push(composer.next());
  } while (!composer.done);
  return { regions, warnings };
}

describe('Composer', () => {
  it('should fill regions greedily', () => {
    const { regions } = compose([par('A'), gap, par('B'), gap, par('C')], 30);

    expect(regions.map(texts)).toEqual([['A', 'B'], ['C']]);
  });

  it('should move a sticky frame on with the frame after it', () => {
    const items = [par('A'), gap, block([par('H')], { sticky: true }), gap, par('B')];

    const { regions } = compose(items, 30);

    expect(regions.map(texts)).toEqual([['A'], ['H', 'B']]);
  });

  it('should move an unbreakable block to the next region as a whole', () => {
    const items = [par('A'), gap, block([par('X'), gap, par('Y')])];

    const { regions } = compose(items, 30);

    expect(regions.map(texts)).toEqual([['A'], ['X', 'Y']]);
  });

  it('should warn when a frame is taller than the region', () => {
    const { regions, warnings } = compose([block([par('X')], { height: 50 })], 30);

    expect(regions).toHaveLength(1);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toBeInstanceOf(LayoutOverflowWarning);
  });

  it('should keep a footnote in the region of its marker', () => {
    const items = [par('First'), gap, par('Second', [[par('n', [], 8)]])];

    const { regions } = compose(items, 30);

    expect(regions.map(texts)).toEqual([['First'], ['Second', 'n']]);
  });

  it('should place footnotes at the bottom below a separator', () => {
    const { regions } = compose([par('Second', [[par('n', [], 8)]])], 30);

    const placed = [...regions[0].walk()].map(({ item, y }) => [item.type, y]);

    expect(placed).toEqual([
      ['text', 0],
      ['shape', 14],
      ['text', 22],
    ]);
  });
});
