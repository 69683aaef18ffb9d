/**
 * Render tests
 */

import { describe, it, expect } from 'vitest';
import { parseDocument, parseStylesheet } from './document-loader.js';
import { render } from './render.js';

const PAGE = '{ "set": "page", "properties": { "width": 200, "height": 100, "margin": 20 } }';

describe('render', () => {
  it('should compile a document and dump it as text', () => {
    const document = parseDocument(`{ "styles": [${PAGE}], "content": "Hello world" }`);

    const result = render(document, { backend: 'text', anchors: false });

    expect(result.output).toBe(
      [
        'page 1 200x100',
        '  group 20,20 160x60',
        '    group 0,0 160x10',
        '      text 0,0 "Hello world" w=55 10/400/normal/black',
        '',
      ].join('\n')
    );
    expect(result.pages).toBe(1);
    expect(result.passes).toBe(1);
    expect(result.warnings).toEqual([]);
  });

  it('should default to the XML backend', () => {
    const document = parseDocument(`{ "styles": [${PAGE}], "content": "Hi" }`);

    const { output } = render(document, { anchors: false });

    expect(output.split('\n').slice(0, 3)).toEqual([
      '<?xml version="1.0"?>',
      '<document>',
      '<page number="1" width="200" height="100">',
    ]);
  });

  it('should let document styles override stylesheet styles', () => {
    const styles = parseStylesheet(`[${PAGE}, { "set": "text", "properties": { "size": 12 } }]`);
    const document = parseDocument('{ "styles": [{ "set": "text", "properties": { "size": 20 } }], "content": "hi" }');

    const { output } = render(document, { backend: 'text', anchors: false, styles });

    expect(output.split('\n').slice(2)).toEqual(['    group 0,0 160x20', '      text 0,0 "hi" w=20 20/400/normal/black', '']);
  });

  it('should apply wrap rules from JSON', () => {
    const document = parseDocument(
      `{ "styles": [${PAGE}, { "show": { "kind": "strong" }, "wrap": "emph" }],
         "content": { "element": "strong", "fields": { "body": "hi" } } }`
    );

    const { output } = render(document, { backend: 'text', anchors: false });

    expect(output.split('\n')[3]).toBe('      text 0,0 "hi" w=10 10/700/italic/black');
  });
});
