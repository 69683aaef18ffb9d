/**
 * Style chain tests - scoping, lookup and interning
 */

import { describe, it, expect } from 'vitest';
import { StyleArena } from './chain.js';
import { set, setIf, show } from './styles.js';
import { kindSelector } from '../selector/selector.js';

describe('StyleChain', () => {
  it('should return undefined for properties nobody set', () => {
    const chain = new StyleArena().root();

    expect(chain.get('text', 'size')).toBeUndefined();
    expect(chain.depth).toBe(0);
  });

  it('should let the nearest set rule win', () => {
    const root = new StyleArena().root();
    const outer = root.pushAll(set('text', { size: 12 }));
    const inner = outer.pushAll(set('text', { size: 14 }));

    expect(inner.get('text', 'size')).toBe(14);
    expect(outer.get('text', 'size')).toBe(12);
    expect(inner.depth).toBe(2);
  });

  it('should leave the parent chain untouched when pushing', () => {
    const root = new StyleArena().root();
    const parent = root.pushAll(set('par', { leading: 2 }));
    parent.pushAll(set('par', { leading: 8 }));

    expect(parent.get('par', 'leading')).toBe(2);
  });

  it('should intern identical pushes to the same chain id', () => {
    const arena = new StyleArena();
    const [entry] = set('text', { weight: 700 });

    const first = arena.root().push(entry);
    const second = arena.root().push(entry);

    expect(first.id).toBe(second.id);
    expect(arena.size).toBe(1);
  });

  it('should list entries pushed since an ancestor, leaf first', () => {
    const root = new StyleArena().root();
    const base = root.pushAll(set('text', { size: 9 }));
    const added = [...set('text', { weight: 700 }), ...set('par', { spacing: 4 })];
    const leaf = base.pushAll(added);

    const since = [...leaf.entriesSince(base)];

    expect(since).toEqual([added[1], added[0]]);
    expect(leaf.extends(base)).toBe(true);
    expect(base.extends(leaf)).toBe(false);
  });

  it('should yield show rules nearest first', () => {
    const root = new StyleArena().root();
    const outer = show(kindSelector('heading'), () => 'outer');
    const inner = show(kindSelector('heading'), () => 'inner');
    const chain = root.push(outer).pushAll(set('text', { size: 8 })).push(inner);

    expect([...chain.showRules()]).toEqual([inner, outer]);
  });

  it('should produce no entries for a false setIf condition', () => {
    expect(setIf(false, 'text', { size: 20 })).toEqual([]);
    expect(setIf(true, 'text', { size: 20 })).toHaveLength(1);
  });
});
