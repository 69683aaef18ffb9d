/**
 * Frame builder walk tests
 */

import { describe, it, expect } from 'vitest';
import { makeElement, toContent } from './content/content.js';
import { compile } from './engine/compile.js';
import { counterSet, counterUpdate } from './introspect/counter.js';
import { Location } from './introspect/location.js';
import { Frame } from './layout/frame.js';
import { type Anchor, type FrameBuilder, type PageInfo, emitDocument } from './output.js';
import type { FontSpec } from './realize/flow.js';
import { set } from './style/styles.js';

const font: FontSpec = { size: 10, weight: 400, style: 'normal', fill: 'black' };

class RecordingBuilder implements FrameBuilder {
  readonly calls: string[] = [];

  startPage(page: PageInfo): void {
    this.calls.push(`page ${page.number} ${page.width}x${page.height} ${page.label ?? '-'}`);
  }
  endPage(): void {
    this.calls.push('/page');
  }
  startGroup(x: number, y: number, width: number, height: number): void {
    this.calls.push(`group ${x},${y} ${width}x${height}`);
  }
  endGroup(): void {
    this.calls.push('/group');
  }
  text(x: number, y: number, text: string): void {
    this.calls.push(`text ${x},${y} ${text}`);
  }
  shape(x: number, y: number): void {
    this.calls.push(`shape ${x},${y}`);
  }
  image(x: number, y: number, width: number, height: number, src: string): void {
    this.calls.push(`image ${x},${y} ${src}`);
  }
  anchor(x: number, y: number, anchor: Anchor): void {
    this.calls.push(`${anchor.kind} ${anchor.element} ${anchor.location} ${anchor.label ?? '-'}`);
  }
  end(): void {
    this.calls.push('end');
  }
}

describe('emitDocument', () => {
  it('should report items in order with groups nested', () => {
    const inner = new Frame(50, 10);
    inner.push({ type: 'text', x: 0, y: 0, text: 'Hi', width: 10, font });
    const frame = new Frame(100, 200);
    const heading = makeElement('heading', { body: 'Hi' }, { label: 'top' });
    frame.push({ type: 'tag', x: 0, y: 0, tag: { kind: 'start', location: new Location('k1'), element: heading } });
    frame.pushFrame(5, 6, inner);
    frame.push({ type: 'image', x: 1, y: 2, width: 3, height: 4, src: 'a.png' });
    const builder = new RecordingBuilder();

    emitDocument({ pages: [{ frame, number: 1, numbering: null }] }, builder);

    expect(builder.calls).toEqual([
      'page 1 100x200 -',
      'start heading k1 top',
      'group 5,6 50x10',
      'text 0,0 Hi',
      '/group',
      'image 1,2 a.png',
      '/page',
      'end',
    ]);
  });

  it('should label pages with their numbering', () => {
    const builder = new RecordingBuilder();
    const pages = [1, 2].map(number => ({ frame: new Frame(10, 10), number, numbering: 'i' }));

    emitDocument({ pages }, builder);

    expect(builder.calls).toEqual(['page 1 10x10 i', '/page', 'page 2 10x10 ii', '/page', 'end']);
  });

  it('should label pages with the page counter the footer shows', () => {
    const content = toContent([counterUpdate('page', counterSet(10)), 'A', makeElement('pagebreak'), 'B']);
    const doc = compile(content, { styles: set('page', { width: 200, height: 100, margin: 20, numbering: '1' }) });
    const builder = new RecordingBuilder();

    emitDocument(doc, builder);

    expect(builder.calls.filter(call => call.startsWith('page '))).toEqual([
      'page 1 200x100 10',
      'page 2 200x100 11',
    ]);
  });
});
