/**
 * Paragraph line breaking tests
 */

import { describe, it, expect } from 'vitest';
import type { FlowItem, FontSpec, InlineItem } from '../realize/flow.js';
import type { Frame } from './frame.js';
import { layoutParagraph } from './inline.js';
import { MonospaceMeasurer } from './measure.js';

const font: FontSpec = { size: 10, weight: 400, style: 'normal', fill: 'black' };
const cx = { measurer: new MonospaceMeasurer(), warn: () => undefined };

type Paragraph = Extract<FlowItem, { type: 'par' }>;

function par(inlines: InlineItem[], indent = 0): Paragraph {
  return { type: 'par', inlines, leading: 4, indent, font };
}

function text(value: string, size = 10): InlineItem {
  return { type: 'text', text: value, font: { ...font, size } };
}

function runs(frame: Frame): [string, number, number][] {
  const found: [string, number, number][] = [];
  for (const { item, x, y } of frame.walk()) {
    if (item.type === 'text') found.push([item.text, x, y]);
  }
  return found;
}

describe('layoutParagraph', () => {
  it('should break greedily at spaces', () => {
    const lines = layoutParagraph(par([text('aaa bbb ccc')]), 50, cx);

    expect(lines.map(line => runs(line.frame))).toEqual([[['aaa bbb', 0, 0]], [['ccc', 0, 0]]]);
    expect(lines[0].frame.width).toBe(50);
    expect(lines[0].frame.height).toBe(10);
  });

  it('should indent only the first line', () => {
    const lines = layoutParagraph(par([text('aaa bbb ccc')], 20), 50, cx);

    expect(lines.map(line => runs(line.frame))).toEqual([[['aaa', 20, 0]], [['bbb ccc', 0, 0]]]);
  });

  it('should keep words wider than the line on a line of their own', () => {
    const lines = layoutParagraph(par([text('a abcdefghijkl b')]), 30, cx);

    expect(lines.map(line => line.frame.text())).toEqual(['a', 'abcdefghijkl', 'b']);
  });

  it('should drop spaces at the start of a line', () => {
    const lines = layoutParagraph(par([text('  ab')]), 50, cx);

    expect(runs(lines[0].frame)).toEqual([['ab', 0, 0]]);
  });

  it('should break at forced line breaks', () => {
    const lines = layoutParagraph(par([text('a'), { type: 'linebreak' }, text('b')]), 50, cx);

    expect(lines.map(line => line.frame.text())).toEqual(['a', 'b']);
  });

  it('should not open an empty line after a trailing break', () => {
    const lines = layoutParagraph(par([text('a'), { type: 'linebreak' }]), 50, cx);

    expect(lines).toHaveLength(1);
  });

  it('should bottom-align runs of different sizes', () => {
    const lines = layoutParagraph(par([text('a'), text('B', 20)]), 50, cx);

    expect(lines[0].frame.height).toBe(20);
    expect(runs(lines[0].frame)).toEqual([
      ['a', 0, 10],
      ['B', 5, 0],
    ]);
  });

  it('should carry footnotes of the line that holds the marker', () => {
    const entry: FlowItem[] = [par([text('note', 8)])];

    const lines = layoutParagraph(par([text('aaa bbb'), { type: 'footnote', entry }, text(' ccc')]), 40, cx);

    expect(lines.map(line => line.frame.text())).toEqual(['aaa bbb', 'ccc']);
    expect(lines[0].footnotes).toEqual([entry]);
    expect(lines[1].footnotes).toEqual([]);
  });
});
