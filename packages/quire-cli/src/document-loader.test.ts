/**
 * JSON loader tests
 */

import { describe, it, expect } from 'vitest';
import { kindSelector, labelSelector } from 'quire-core';
import { DocumentLoadError, parseDocument, parseStylesheet } from './document-loader.js';

describe('parseDocument', () => {
  it('should read bare content as text', () => {
    const { content, styles } = parseDocument('"Hello world"');

    expect(content).toMatchObject({ type: 'text', text: 'Hello world' });
    expect(styles).toEqual([]);
  });

  it('should merge adjacent strings of a sequence', () => {
    const { content } = parseDocument('["a", "b", null]');

    expect(content).toMatchObject({ type: 'text', text: 'ab' });
  });

  it('should read elements with fields and labels', () => {
    const { content } = parseDocument(
      '{ "element": "heading", "fields": { "body": "Intro", "level": 2 }, "label": "intro" }'
    );

    expect(content).toMatchObject({ type: 'element', kind: 'heading', label: 'intro' });
    expect(content.type === 'element' && content.fields).toEqual({ body: 'Intro', level: 2 });
  });

  it('should keep element children in order', () => {
    const { content } = parseDocument('["a", { "element": "parbreak" }, "b"]');

    expect(content.type).toBe('sequence');
    expect(content.type === 'sequence' && content.children.map(child => child.type)).toEqual([
      'text',
      'element',
      'text',
    ]);
  });

  it('should read selector-valued fields', () => {
    const { content } = parseDocument(
      '{ "element": "outline", "fields": { "target": { "selector": { "or": [{ "kind": "figure" }, { "label": "a" }] } } } }'
    );

    expect(content.type === 'element' && content.fields['target']).toEqual({
      type: 'or',
      selectors: [kindSelector('figure'), labelSelector('a')],
    });
  });

  it('should read nested content and dictionaries in fields', () => {
    const { content } = parseDocument(
      '{ "element": "list", "fields": { "children": ["one", { "element": "strong", "fields": { "body": "two" } }] } }'
    );
    const children = content.type === 'element' ? content.fields['children'] : null;

    expect(Array.isArray(children) && children.length).toBe(2);
    expect(Array.isArray(children) && children[1]).toMatchObject({ type: 'element', kind: 'strong' });
  });

  it('should read metadata markers', () => {
    const { content } = parseDocument('{ "metadata": { "draft": true }, "label": "m" }');

    expect(content).toMatchObject({ type: 'metadata', value: { draft: true }, label: 'm' });
  });

  it('should read documents with styles', () => {
    const { styles } = parseDocument(
      '{ "styles": [{ "set": "text", "properties": { "size": 12, "fill": "red" } }], "content": "x" }'
    );

    expect(styles.map(entry => entry.type === 'set' && [entry.kind, entry.key, entry.value])).toEqual([
      ['text', 'size', 12],
      ['text', 'fill', 'red'],
    ]);
  });

  it('should read styled content', () => {
    const { content } = parseDocument(
      '{ "styled": "x", "styles": [{ "show": { "kind": "strong" }, "replace": "y" }] }'
    );

    expect(content.type).toBe('styled');
    expect(content.type === 'styled' && content.entries[0]).toMatchObject({
      type: 'show',
      selector: kindSelector('strong'),
      transform: { type: 'content', content: { type: 'text', text: 'y' } },
    });
  });

  it('should report malformed JSON', () => {
    expect(() => parseDocument('{', 'doc.json')).toThrow(DocumentLoadError);
    expect(() => parseDocument('{', 'doc.json')).toThrow(/^doc\.json: invalid JSON/);
  });

  it('should report content that fits no schema', () => {
    expect(() => parseDocument('{ "element": 5 }', 'doc.json')).toThrow('doc.json: not a valid document');
    expect(() => parseDocument('42')).toThrow(DocumentLoadError);
  });

  it('should refuse dictionaries that use reserved keys', () => {
    expect(() => parseDocument('{ "element": "box", "fields": { "body": { "element": 3 } } }')).toThrow(
      DocumentLoadError
    );
  });

  it('should list schema violations as hints', () => {
    let caught: unknown = null;

    try {
      parseDocument('{ "content": "x", "styles": 3 }');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DocumentLoadError);
    expect(caught instanceof DocumentLoadError && caught.hints.length).toBeGreaterThan(0);
  });
});

describe('parseStylesheet', () => {
  it('should accept a bare array and a styles object alike', () => {
    const bare = parseStylesheet('[{ "set": "par", "properties": { "leading": 4 } }]');
    const wrapped = parseStylesheet('{ "styles": [{ "set": "par", "properties": { "leading": 4 } }] }');

    expect(bare).toHaveLength(1);
    expect(wrapped).toHaveLength(1);
    expect(wrapped[0]).toMatchObject({ type: 'set', kind: 'par', key: 'leading', value: 4 });
  });

  it('should build show-set rules', () => {
    const [entry] = parseStylesheet(
      '[{ "show": { "kind": "heading", "where": { "level": 1 } }, "with": [{ "set": "text", "properties": { "size": 20 } }] }]'
    );

    expect(entry).toMatchObject({
      type: 'show',
      selector: { type: 'where', kind: 'heading', fields: { level: 1 } },
      transform: { type: 'set', entries: [{ kind: 'text', key: 'size', value: 20 }] },
    });
  });

  it('should build wrap rules as function transforms', () => {
    const [entry] = parseStylesheet('[{ "show": null, "wrap": "emph" }]');

    expect(entry).toMatchObject({ type: 'show', selector: null, transform: { type: 'func' } });
  });

  it('should build range selectors with inclusive defaults', () => {
    const [entry] = parseStylesheet(
      '[{ "show": { "after": { "kind": "heading" }, "start": { "label": "a" } }, "replace": null }]'
    );

    expect(entry).toMatchObject({
      selector: { type: 'after', selector: kindSelector('heading'), start: labelSelector('a'), inclusive: true },
    });
  });

  it('should report invalid regular expressions', () => {
    expect(() => parseStylesheet('[{ "show": { "regex": "(" }, "replace": "x" }]', 'style.json')).toThrow(
      'style.json: not a valid stylesheet'
    );
  });
});
