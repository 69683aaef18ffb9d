/**
 * Fixed-point driver tests - full documents on small pages
 *
 * Pages are 200x100 with 20pt margins, leaving a 160x60 body. Text is
 * measured monospaced: 5pt per character and 10pt per line at size 10.
 */

import { describe, it, expect } from 'vitest';
import {
  CompileAbortedError,
  ConvergenceError,
  IntrospectionMiss,
  LayoutOverflowWarning,
  StyleError,
} from '../diag.js';
import { type ContentLike, makeElement, makeMetadata, toContent } from '../content/content.js';
import type { Page } from '../layout/frame.js';
import { context } from '../realize/context.js';
import { kindSelector } from '../selector/selector.js';
import { type StyleEntry, set } from '../style/styles.js';
import { compile } from './compile.js';

const small = set('page', { width: 200, height: 100, margin: 20 });

function run(content: ContentLike, styles: StyleEntry[] = small, maxPasses?: number) {
  return compile(toContent(content), { styles, maxPasses, now: new Date(Date.UTC(2024, 0, 15)) });
}

function lines(page: Page): string[] {
  const found: string[] = [];
  for (const { item } of page.frame.walk()) {
    if (item.type === 'text') found.push(item.text);
  }
  return found;
}

function positionOf(page: Page, text: string): [number, number] | null {
  for (const { item, x, y } of page.frame.walk()) {
    if (item.type === 'text' && item.text === text) return [x, y];
  }
  return null;
}

function paragraphs(...texts: string[]): ContentLike[] {
  return texts.flatMap((text, i) => (i === 0 ? [text] : [makeElement('parbreak'), text]));
}

const parbreak = makeElement('parbreak');

describe('compile', () => {
  it('should lay out a paragraph at the top left of the body', () => {
    const doc = run('Hello world');

    expect(doc.pages).toHaveLength(1);
    expect(lines(doc.pages[0])).toEqual(['Hello world']);
    expect(positionOf(doc.pages[0], 'Hello world')).toEqual([20, 20]);
    expect(doc.passes).toBe(1);
  });

  it('should move paragraphs that do not fit to the next page', () => {
    const doc = run(paragraphs('P1', 'P2', 'P3', 'P4'));

    expect(doc.pages.map(lines)).toEqual([['P1', 'P2', 'P3'], ['P4']]);
  });

  it('should collapse consecutive weak page breaks', () => {
    const weak = makeElement('pagebreak', { weak: true });

    const doc = run(['A', weak, weak, 'B', weak]);

    expect(doc.pages.map(lines)).toEqual([['A'], ['B']]);
  });

  it('should keep empty pages between strong page breaks', () => {
    const doc = run(['A', makeElement('pagebreak'), makeElement('pagebreak'), 'B']);

    expect(doc.pages.map(lines)).toEqual([['A'], [], ['B']]);
  });

  it('should insert a blank page to reach an odd page', () => {
    const doc = run(['A', makeElement('pagebreak', { to: 'odd' }), 'B']);

    expect(doc.pages.map(lines)).toEqual([['A'], [], ['B']]);
  });

  it('should move an unbreakable block to the next page as a whole', () => {
    const doc = run([...paragraphs('First', 'Second'), makeElement('block', { body: 'X', height: 40 })]);

    expect(doc.pages.map(lines)).toEqual([['First', 'Second'], ['X']]);
    expect(doc.warnings).toEqual([]);
  });

  it('should warn about content taller than the page body', () => {
    const doc = run(makeElement('block', { body: 'X', height: 100 }));

    expect(doc.pages).toHaveLength(1);
    expect(doc.warnings).toHaveLength(1);
    expect(doc.warnings[0]).toBeInstanceOf(LayoutOverflowWarning);
  });

  it('should fill columns left to right', () => {
    const styles = [...small, ...set('page', { columns: 2, gutter: 10 })];

    const doc = run(paragraphs('P1', 'P2', 'P3', 'P4', 'P5', 'P6', 'P7'), styles);

    expect(doc.pages.map(lines)).toEqual([['P1', 'P2', 'P3', 'P4', 'P5', 'P6'], ['P7']]);
    expect(positionOf(doc.pages[0], 'P4')).toEqual([105, 20]);
  });

  it('should defer a float to the first page with room for it', () => {
    const float = makeElement('place', { body: makeElement('rect', { height: 50 }), float: true });

    const doc = run(['First', parbreak, 'Second', float, 'Third']);

    const shapes = doc.pages.map(page => [...page.frame.walk()].filter(({ item }) => item.type === 'shape'));
    expect(doc.pages.map(lines)).toEqual([['First', 'Second', 'Third'], []]);
    expect(shapes[0]).toEqual([]);
    expect(shapes[1].map(({ x, y }) => [x, y])).toEqual([[20, 20]]);
  });

  it('should keep a footnote on the page of its marker', () => {
    const note = makeElement('footnote', { body: 'Note' });

    const doc = run(['First', parbreak, 'Second', parbreak, 'Third', note, parbreak, 'Fourth']);

    expect(doc.pages.map(lines)).toEqual([
      ['First', 'Second'],
      ['Third', '1', 'Fourth', '1 Note'],
    ]);
  });

  it('should number pages in the default footer', () => {
    const styles = [...small, ...set('page', { numbering: '1' })];

    const doc = run(['A', makeElement('pagebreak'), 'B'], styles);

    expect(doc.pages.map(lines)).toEqual([
      ['A', '1'],
      ['B', '2'],
    ]);
    expect(positionOf(doc.pages[1], '2')).toEqual([20, 85]);
  });

  it('should collapse weak fractional spacing', () => {
    const v = (fr: number, weak: boolean) => makeElement('v', { amount: { fr }, weak });

    const doc = run(['A', v(1, true), v(2, true), 'B', v(1, false), 'C']);

    expect(positionOf(doc.pages[0], 'B')).toEqual([20, 50]);
    expect(positionOf(doc.pages[0], 'C')).toEqual([20, 70]);
  });

  it('should resolve outlines, heading numbers and references', () => {
    const tall = set('page', { width: 200, height: 400, margin: 20 });
    const content = [
      makeElement('outline'),
      makeElement('heading', { body: 'Intro', numbering: '1.' }, { label: 'intro' }),
      'See ',
      makeElement('ref', { target: 'intro' }),
    ];

    const doc = run(content, tall);

    expect(lines(doc.pages[0])).toEqual(['Contents', '1. Intro 1', '1. Intro', 'See ', 'Section 1.']);
    expect(doc.passes).toBeGreaterThan(1);
  });

  it('should converge in one pass when seeded with its own result', () => {
    const content = toContent([
      makeElement('heading', { body: 'Intro', numbering: '1.' }, { label: 'intro' }),
      'See ',
      makeElement('ref', { target: 'intro' }),
    ]);
    const first = compile(content, { styles: small });

    const second = compile(content, { styles: small, seed: first.introspector });

    expect(second.passes).toBe(1);
    expect(second.introspector.fingerprint).toBe(first.introspector.fingerprint);
  });

  it('should report references to missing labels', () => {
    expect(() => run(['See ', makeElement('ref', { target: 'nowhere' })])).toThrow(IntrospectionMiss);
  });

  it('should give up on documents that never settle', () => {
    const growing = context(api => {
      const count = api.query(kindSelector('metadata')).length;
      return Array.from({ length: count + 1 }, () => makeMetadata(null));
    });

    expect(() => run(growing, small, 3)).toThrow(ConvergenceError);
  });

  it('should stop when aborted', () => {
    const controller = new AbortController();
    controller.abort();

    let caught: unknown = null;
    try {
      compile(toContent('x'), { signal: controller.signal });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CompileAbortedError);
    expect(caught instanceof CompileAbortedError ? caught.completedPasses : -1).toBe(0);
  });

  it('should validate document styles up front', () => {
    expect(() => run('x', set('text', { size: 'big' }))).toThrow(StyleError);
  });

  it('should answer measurements and the date from context', () => {
    const probe = context(api => {
      const { width, height } = api.measure('abcd');
      return `${width}x${height} ${api.today().year}`;
    });

    const doc = run(probe);

    expect(lines(doc.pages[0])).toEqual(['20x10 2024']);
  });
});
