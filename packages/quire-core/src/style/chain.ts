/**
 * Style Chain - persistent, scoped stack of style entries
 *
 * Chains live in an arena of (entry, parent index) links. Pushing an entry
 * appends one link and never copies; links are interned by (parent, entry)
 * so that the same nesting of rules yields the same chain id in every pass.
 * Lookups walk from the leaf towards the root; the nearest entry wins.
 *
 * Scoping is structural: the realizer pushes entries for a subtree and simply
 * drops the child chain when the recursion returns.
 */

import type { FieldValue } from '../content/value.js';
import type { PropertyEntry, ShowEntry, StyleEntry } from './styles.js';

const ROOT = -1;

interface Link {
  entry: StyleEntry;
  parent: number;
  depth: number;
}

export class StyleArena {
  private links: Link[] = [];
  private interned = new Map<string, number>();

  /**
   * The empty chain
   */
  root(): StyleChain {
    return new StyleChain(this, ROOT);
  }

  /**
   * Append `entry` below `parent`, reusing an identical link
   */
  push(parent: number, entry: StyleEntry): number {
    const key = `${parent}:${entry.id}`;
    const existing = this.interned.get(key);
    if (existing !== undefined) return existing;
    const depth = parent === ROOT ? 1 : this.link(parent).depth + 1;
    const index = this.links.length;
    this.links.push({ entry, parent, depth });
    this.interned.set(key, index);
    return index;
  }

  link(index: number): Link {
    const link = this.links[index];
    if (!link) {
      throw new Error(`style arena has no link ${index}`);
    }
    return link;
  }

  get size(): number {
    return this.links.length;
  }
}

/**
 * A position in the arena. Cheap to copy, never mutated.
 */
export class StyleChain {
  constructor(
    readonly arena: StyleArena,
    readonly index: number
  ) {}

  /**
   * Identity of this chain within its arena
   */
  get id(): number {
    return this.index;
  }

  get depth(): number {
    return this.index === ROOT ? 0 : this.arena.link(this.index).depth;
  }

  push(entry: StyleEntry): StyleChain {
    return new StyleChain(this.arena, this.arena.push(this.index, entry));
  }

  pushAll(entries: readonly StyleEntry[]): StyleChain {
    let chain: StyleChain = this;
    for (const entry of entries) {
      chain = chain.push(entry);
    }
    return chain;
  }

  /**
   * Entries from the leaf to the root
   */
  *entries(): Generator<StyleEntry> {
    let index = this.index;
    while (index !== ROOT) {
      const link = this.arena.link(index);
      yield link.entry;
      index = link.parent;
    }
  }

  /**
   * Entries pushed on top of `ancestor`, leaf first
   */
  *entriesSince(ancestor: StyleChain): Generator<StyleEntry> {
    let index = this.index;
    while (index !== ROOT && index !== ancestor.index) {
      const link = this.arena.link(index);
      yield link.entry;
      index = link.parent;
    }
  }

  /**
   * Nearest property entry for (kind, key)
   */
  find(kind: string, key: string): PropertyEntry | null {
    for (const entry of this.entries()) {
      if (entry.type === 'set' && entry.kind === kind && entry.key === key) {
        return entry;
      }
    }
    return null;
  }

  /**
   * Nearest value set for (kind, key), or undefined when nothing is set
   */
  get(kind: string, key: string): FieldValue | undefined {
    return this.find(kind, key)?.value;
  }

  /**
   * Show entries, nearest first
   */
  *showRules(): Generator<ShowEntry> {
    for (const entry of this.entries()) {
      if (entry.type === 'show') yield entry;
    }
  }

  /**
   * Whether this chain extends `ancestor`
   */
  extends(ancestor: StyleChain): boolean {
    if (ancestor.arena !== this.arena) return false;
    let index = this.index;
    while (index !== ROOT) {
      if (index === ancestor.index) return true;
      index = this.arena.link(index).parent;
    }
    return ancestor.index === ROOT;
  }
}
