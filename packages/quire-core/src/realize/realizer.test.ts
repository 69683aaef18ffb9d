/**
 * Realizer tests - style scoping, show rules and recursion
 */

import { describe, it, expect } from 'vitest';
import { RecursionError, StyleError } from '../diag.js';
import {
  type Content,
  makeElement,
  makeSequence,
  makeStyled,
  makeText,
  nodeKind,
  toContent,
} from '../content/content.js';
import { Engine } from '../engine/engine.js';
import { Introspector } from '../introspect/introspector.js';
import { MonospaceMeasurer } from '../layout/measure.js';
import { standardRegistry } from '../library/index.js';
import { kindSelector, textSelector } from '../selector/selector.js';
import { StyleArena } from '../style/chain.js';
import { set, show, showSet } from '../style/styles.js';
import { ContextMemo } from './context.js';
import type { FlowItem, FontSpec } from './flow.js';
import { Realizer } from './realizer.js';

function realize(content: Content): FlowItem[] {
  const engine = new Engine({
    registry: standardRegistry(),
    measurer: new MonospaceMeasurer(),
    now: new Date(0),
    memo: new ContextMemo(),
    introspector: Introspector.empty(),
  });
  return new Realizer(engine).document(content, new StyleArena().root());
}

function texts(items: readonly FlowItem[]): string[] {
  const found: string[] = [];
  for (const item of items) {
    if (item.type === 'par') {
      for (const inline of item.inlines) {
        if (inline.type === 'text') found.push(inline.text);
      }
    } else if (item.type === 'block' || item.type === 'placed') {
      found.push(...texts(item.children));
    }
  }
  return found;
}

function fonts(items: readonly FlowItem[]): FontSpec[] {
  const found: FontSpec[] = [];
  for (const item of items) {
    if (item.type === 'par') {
      for (const inline of item.inlines) {
        if (inline.type === 'text') found.push(inline.font);
      }
    } else if (item.type === 'block' || item.type === 'placed') {
      found.push(...fonts(item.children));
    }
  }
  return found;
}

describe('Realizer', () => {
  it('should group inline text into one paragraph between weak spacing', () => {
    const items = realize(toContent(['Hello ', makeElement('strong', { body: 'world' })]));

    expect(items.map(item => item.type)).toEqual(['v', 'par', 'v']);
    expect(fonts(items).map(font => font.weight)).toEqual([400, 700]);
  });

  it('should split paragraphs at parbreaks', () => {
    const items = realize(toContent(['one', makeElement('parbreak'), 'two']));

    expect(texts(items)).toEqual(['one', 'two']);
    expect(items.filter(item => item.type === 'par')).toHaveLength(2);
  });

  it('should scope set rules to their subtree', () => {
    const content = toContent([
      makeStyled(makeElement('list', { children: ['a'] }), set('list', { marker: '-' })),
      makeElement('list', { children: ['b'] }),
    ]);

    expect(texts(realize(content))).toEqual(['- a', '• b']);
  });

  it('should let the nearest show rule win', () => {
    const content = makeStyled(makeElement('heading', { body: 'Title' }), [
      show(kindSelector('heading'), () => 'outer'),
      show(kindSelector('heading'), () => 'inner'),
    ]);

    expect(texts(realize(content))).toEqual(['inner']);
  });

  it('should let an inner show rule win only inside its scope', () => {
    const content = makeStyled(
      toContent([
        makeStyled(makeElement('heading', { body: 'A' }), [show(kindSelector('heading'), () => 'inner')]),
        makeElement('heading', { body: 'B' }),
      ]),
      [show(kindSelector('heading'), () => 'outer')]
    );

    expect(texts(realize(content))).toEqual(['inner', 'outer']);
  });

  it('should let the nearest show-set rule win', () => {
    const content = makeStyled(
      toContent([
        makeStyled(makeElement('emph', { body: 'x' }), [showSet(kindSelector('emph'), set('text', { size: 30 }))]),
        makeElement('emph', { body: 'y' }),
      ]),
      [showSet(kindSelector('emph'), set('text', { size: 20 }))]
    );

    const items = realize(content);

    expect(texts(items)).toEqual(['x', 'y']);
    expect(fonts(items).map(font => font.size)).toEqual([30, 20]);
  });

  it('should size headings by level', () => {
    const content = toContent([
      makeElement('heading', { body: 'One' }),
      makeElement('heading', { body: 'Two', level: 2 }),
      makeElement('heading', { body: 'Four', level: 4 }),
    ]);

    expect(fonts(realize(content)).map(font => [font.size, font.weight])).toEqual([
      [14, 700],
      [12, 700],
      [11, 700],
    ]);
  });

  it('should let show-set rules override the heading look', () => {
    const content = makeStyled(makeElement('heading', { body: 'H' }), [
      showSet(kindSelector('heading'), set('text', { size: 20 })),
    ]);

    expect(fonts(realize(content))).toEqual([{ size: 20, weight: 700, style: 'normal', fill: 'black' }]);
  });

  it('should leave heading styles out of a replaced heading', () => {
    const content = makeStyled(makeElement('heading', { body: 'H' }), [show(kindSelector('heading'), () => 'plain')]);

    expect(fonts(realize(content))).toEqual([{ size: 10, weight: 400, style: 'normal', fill: 'black' }]);
  });

  it('should apply show-set rules before the look', () => {
    const content = makeStyled(makeElement('emph', { body: 'x' }), [
      showSet(kindSelector('emph'), set('text', { size: 20 })),
    ]);

    expect(fonts(realize(content))).toEqual([{ size: 20, weight: 400, style: 'italic', fill: 'black' }]);
  });

  it('should let a rule wrap the element it matched', () => {
    const content = makeStyled(makeElement('strong', { body: 'x' }), [
      show(kindSelector('strong'), it => makeElement('emph', { body: it })),
    ]);

    expect(fonts(realize(content))).toEqual([{ size: 10, weight: 700, style: 'italic', fill: 'black' }]);
  });

  it('should report a rule that keeps matching its own output', () => {
    const content = makeStyled(makeElement('strong', { body: 'x' }), [
      show(kindSelector('strong'), it => makeElement('strong', { body: it })),
    ]);

    expect(() => realize(content)).toThrow(RecursionError);
  });

  it('should replace text matches in place', () => {
    const content = makeStyled(makeText('a foo b'), [show(textSelector('foo'), () => 'bar')]);

    expect(texts(realize(content))).toEqual(['a bar b']);
  });

  it('should match text rules across adjacent text runs', () => {
    const content = makeStyled(makeSequence([makeText('fo'), makeText('o bar')]), [
      show(textSelector('foo'), () => 'X'),
    ]);

    expect(texts(realize(content))).toEqual(['X bar']);
  });

  it('should reject page configuration inside containers', () => {
    const content = makeElement('block', { body: makeStyled(makeText('x'), set('page', { width: 100 })) });

    expect(() => realize(content)).toThrow(StyleError);
  });

  it('should reject unknown properties in set rules', () => {
    const content = makeStyled(makeText('x'), set('text', { colour: 'red' }));

    expect(() => realize(content)).toThrow(StyleError);
  });

  it('should start a page run for top-level page set rules', () => {
    const content = toContent(['a', makeStyled(makeText('b'), set('page', { width: 300 })), 'c']);

    const breaks = realize(content).filter(item => item.type === 'pagebreak');

    expect(breaks.map(item => (item.type === 'pagebreak' ? item.page?.width : null))).toEqual([300, 595]);
  });

  it('should tag located elements and their counter steps', () => {
    const items = realize(makeElement('heading', { body: 'Title' }));

    const tags = items.flatMap(item => (item.type === 'tag' ? [`${item.tag.kind}:${nodeKind(item.tag.element)}`] : []));

    expect(tags).toEqual(['start:counter.update', 'end:counter.update', 'start:heading', 'end:heading']);
  });
});
