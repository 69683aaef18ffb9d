/**
 * Text backend tests
 */

import { describe, it, expect } from 'vitest';
import { Frame, Location, compile, emitDocument, makeElement, makeText, set } from 'quire-core';
import { TextBackend } from './text.js';
import { XmlBackend } from './xml.js';
import { createBackend } from './index.js';

describe('TextBackend', () => {
  it('should dump a compiled page indented by nesting', () => {
    const doc = compile(makeText('Hello world'), { styles: set('page', { width: 200, height: 100, margin: 20 }) });
    const backend = new TextBackend({ anchors: false });

    emitDocument(doc, backend);

    expect(backend.getOutput()).toBe(
      [
        'page 1 200x100',
        '  group 20,20 160x60',
        '    group 0,0 160x10',
        '      text 0,0 "Hello world" w=55 10/400/normal/black',
        '',
      ].join('\n')
    );
  });

  it('should write anchors with their labels', () => {
    const frame = new Frame(100, 50);
    const figure = makeElement('figure', { body: 'x' }, { label: 'fig' });
    frame.push({ type: 'tag', x: 1, y: 2, tag: { kind: 'start', location: new Location('k9'), element: figure } });
    frame.push({ type: 'shape', x: 0, y: 0, shape: { kind: 'rect', width: 20, height: 10, fill: 'red' } });
    const backend = new TextBackend();

    emitDocument({ pages: [{ frame, number: 3, numbering: '1' }] }, backend);

    expect(backend.getOutput()).toBe(
      ['page 3 100x50 [3]', '  start figure <fig> 1,2 k9', '  rect 0,0 20x10 fill=red', ''].join('\n')
    );
  });

  it('should write nothing for an empty document', () => {
    const backend = new TextBackend();

    emitDocument({ pages: [] }, backend);

    expect(backend.getOutput()).toBe('');
  });
});

describe('createBackend', () => {
  it('should create backends by name', () => {
    expect(createBackend('xml')).toBeInstanceOf(XmlBackend);
    expect(createBackend('text').getOutput?.()).toBe('');
    expect(createBackend('xml').getOutput?.()).toBe('<?xml version="1.0"?>\n<document>\n');
  });
});
