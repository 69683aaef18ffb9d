/**
 * Introspector tests over hand-built pages
 */

import { describe, it, expect } from 'vitest';
import { IntrospectionMiss } from '../diag.js';
import { type ElementNode, makeElement } from '../content/content.js';
import { Frame, type Page } from '../layout/frame.js';
import { standardRegistry } from '../library/index.js';
import { afterSelector, beforeSelector, kindSelector, labelSelector } from '../selector/selector.js';
import { counterSet, counterStep, counterUpdate } from './counter.js';
import { Location } from './location.js';
import { stateSet, stateUpdate, stateUpdateWith } from './state.js';
import { Introspector } from './introspector.js';

function place(frame: Frame, element: ElementNode, key: string, y = 0): Location {
  const location = new Location(key);
  frame.push({ type: 'tag', x: 0, y, tag: { kind: 'start', location, element } });
  frame.push({ type: 'tag', x: 0, y, tag: { kind: 'end', location, element } });
  return location;
}

function page(number: number, frame: Frame): Page {
  return { frame, number, numbering: null };
}

describe('Introspector', () => {
  const first = new Frame(100, 100);
  const second = new Frame(100, 100);
  place(first, counterUpdate('heading', counterStep(1)), 'c1');
  const h1 = place(first, makeElement('heading', { body: 'One' }), 'h1', 10);
  place(first, counterUpdate('heading', counterStep(1)), 'c2');
  const h2 = place(first, makeElement('heading', { body: 'Two' }, { label: 'mid' }), 'h2', 40);
  place(second, counterUpdate('heading', counterStep(1)), 'c3');
  const h3 = place(second, makeElement('heading', { body: 'Three' }), 'h3', 5);
  const introspector = new Introspector([page(1, first), page(2, second)], standardRegistry());

  const keys = (list: { location: Location }[]): string[] => list.map(entry => entry.location.key);

  it('should query located elements in document order', () => {
    expect(keys(introspector.query(kindSelector('heading')))).toEqual(['h1', 'h2', 'h3']);
  });

  it('should cut queries before a label, inclusive by default', () => {
    const heading = kindSelector('heading');
    const mid = labelSelector('mid');

    expect(keys(introspector.query(beforeSelector(heading, mid)))).toEqual(['h1', 'h2']);
    expect(keys(introspector.query(beforeSelector(heading, mid, false)))).toEqual(['h1']);
    expect(keys(introspector.query(afterSelector(heading, mid)))).toEqual(['h2', 'h3']);
    expect(keys(introspector.query(afterSelector(heading, mid, false)))).toEqual(['h3']);
  });

  it('should fold counter updates strictly before a location', () => {
    const counter = introspector.counter('heading');

    expect(counter.at(h1)).toEqual([1]);
    expect(counter.at(h3)).toEqual([3]);
    expect(counter.at(new Location('c1'))).toEqual([0]);
    expect(counter.final()).toEqual([3]);
  });

  it('should answer unknown locations with the initial value', () => {
    expect(introspector.counter('heading').at(new Location('nowhere'))).toEqual([0]);
    expect(introspector.counter('figure').final()).toEqual([0]);
  });

  it('should report pages and positions', () => {
    expect(introspector.page(h2)).toBe(1);
    expect(introspector.page(h3)).toBe(2);
    expect(introspector.position(h2)).toEqual({ page: 1, x: 0, y: 40 });
    expect(introspector.ordinal(h3)).toBe(3);
    expect(introspector.compare(h1, h2)).toBeLessThan(0);
  });

  it('should find unique labels and report missing ones', () => {
    expect(introspector.queryLabel('mid').location.key).toBe('h2');
    expect(() => introspector.queryLabel('missing')).toThrow(IntrospectionMiss);
  });

  it('should report labels that occur more than once', () => {
    const frame = new Frame(10, 10);
    place(frame, makeElement('heading', { body: 'a' }, { label: 'twice' }), 'a');
    place(frame, makeElement('heading', { body: 'b' }, { label: 'twice' }), 'b');

    const doubled = new Introspector([page(1, frame)], standardRegistry());

    expect(() => doubled.queryLabel('twice')).toThrow('label `<twice>` occurs multiple times in the document');
  });

  it('should fold state with the declared initial value', () => {
    const frame = new Frame(10, 10);
    place(frame, stateUpdate('total', stateSet(5), 0), 's1');
    const middle = place(frame, makeElement('heading', { body: 'x' }), 'mark');
    place(frame, stateUpdate('total', stateUpdateWith(value => (typeof value === 'number' ? value * 2 : value)), 0), 's2');

    const withState = new Introspector([page(1, frame)], standardRegistry());

    expect(withState.state('total').at(new Location('s1'))).toBe(0);
    expect(withState.state('total').at(middle)).toBe(5);
    expect(withState.state('total').final()).toBe(10);
    expect(withState.state('missing', 'none').final()).toBe('none');
  });

  it('should list locations that moved between layouts', () => {
    const moved = new Frame(100, 100);
    place(moved, counterUpdate('heading', counterStep(1)), 'c1');
    place(moved, makeElement('heading', { body: 'One' }), 'h1', 20);
    const other = new Introspector([page(1, moved)], standardRegistry());

    expect(other.diff(new Introspector([page(1, moved)], standardRegistry()))).toEqual([]);
    expect(other.diff(introspector)).toEqual(['loc(h1)', 'loc(c2)', 'loc(h2)', 'loc(c3)', 'loc(h3)']);
  });

  it('should give the empty introspector no answers', () => {
    const empty = Introspector.empty();

    expect(empty.query(kindSelector('heading'))).toEqual([]);
    expect(empty.pageCount).toBe(0);
    expect(empty.counter('page').at(new Location('x'))).toEqual([0]);
  });

  it('should apply set actions', () => {
    const frame = new Frame(10, 10);
    place(frame, counterUpdate('figure', counterSet([4, 2])), 'set');

    const withSet = new Introspector([page(1, frame)], standardRegistry());

    expect(withSet.counter('figure').final()).toEqual([4, 2]);
  });
});
