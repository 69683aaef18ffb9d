/**
 * XML backend tests
 */

import { describe, it, expect } from 'vitest';
import { Frame, Location, compile, emitDocument, makeElement, makeText, set } from 'quire-core';
import type { FontSpec } from 'quire-core';
import { XmlBackend } from './xml.js';

const font: FontSpec = { size: 10, weight: 400, style: 'normal', fill: 'black' };

describe('XmlBackend', () => {
  it('should dump a compiled page', () => {
    const doc = compile(makeText('Hello world'), { styles: set('page', { width: 200, height: 100, margin: 20 }) });
    const backend = new XmlBackend({ anchors: false });

    emitDocument(doc, backend);

    expect(backend.getOutput()).toBe(
      [
        '<?xml version="1.0"?>',
        '<document>',
        '<page number="1" width="200" height="100">',
        '<group x="20" y="20" width="160" height="60">',
        '<group x="0" y="0" width="160" height="10">',
        '<text x="0" y="0" width="55" size="10" weight="400" style="normal" fill="black">Hello world</text>',
        '</group>',
        '</group>',
        '</page>',
        '</document>',
        '',
      ].join('\n')
    );
  });

  it('should write anchors before the next drawn item and escape text', () => {
    const frame = new Frame(100, 50);
    const heading = makeElement('heading', { body: 'x' }, { label: 'top' });
    frame.push({ type: 'tag', x: 0, y: 0, tag: { kind: 'start', location: new Location('k1'), element: heading } });
    frame.push({ type: 'text', x: 5, y: 6, text: 'a < b & "c"', width: 10, font });
    frame.push({ type: 'tag', x: 5, y: 16, tag: { kind: 'end', location: new Location('k1'), element: heading } });
    const backend = new XmlBackend({ indent: 2 });

    emitDocument({ pages: [{ frame, number: 1, numbering: 'i' }] }, backend);

    expect(backend.getOutput()).toBe(
      [
        '<?xml version="1.0"?>',
        '<document>',
        '  <page number="1" width="100" height="50" label="i">',
        '    <anchor kind="start" element="heading" location="k1" label="top" x="0" y="0"/>',
        '    <text x="5" y="6" width="10" size="10" weight="400" style="normal" fill="black">a &lt; b &amp; &quot;c&quot;</text>',
        '    <anchor kind="end" element="heading" location="k1" label="top" x="5" y="16"/>',
        '  </page>',
        '</document>',
        '',
      ].join('\n')
    );
  });

  it('should write shapes and images', () => {
    const frame = new Frame(100, 50);
    frame.push({ type: 'shape', x: 0, y: 12.5, shape: { kind: 'line', width: 100 / 3, stroke: 0.5 } });
    frame.push({ type: 'shape', x: 1, y: 2, shape: { kind: 'rect', width: 20, height: 10, fill: null } });
    frame.push({ type: 'image', x: 3, y: 4, width: 5, height: 6, src: 'logo.png' });
    const backend = new XmlBackend();

    emitDocument({ pages: [{ frame, number: 2, numbering: null }] }, backend);

    expect(backend.getOutput().split('\n').slice(3, 6)).toEqual([
      '<line x="0" y="12.5" width="33.33" stroke="0.5"/>',
      '<rect x="1" y="2" width="20" height="10"/>',
      '<image x="3" y="4" width="5" height="6" src="logo.png"/>',
    ]);
  });
});
