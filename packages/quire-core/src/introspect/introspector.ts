/**
 * Introspector - index over the laid-out document
 *
 * Built once per pass by walking the finished pages in order. Answers
 * queries, counter and state folds, and page/position lookups for located
 * elements. Immutable once built; the fixed-point driver hands each pass
 * the introspector of the previous one.
 */

import { IntrospectionMiss } from '../diag.js';
import { type Label, type LocatableNode, serializeContent } from '../content/content.js';
import type { ElementRegistry } from '../content/elements.js';
import type { FieldValue } from '../content/value.js';
import { type Page, serializePage } from '../layout/frame.js';
import { matchNode } from '../selector/matcher.js';
import type { Selector } from '../selector/selector.js';
import {
  type CounterAction,
  type CounterValue,
  INITIAL_COUNTER,
  applyCounterAction,
  parseCounterAction,
} from './counter.js';
import type { Location } from './location.js';
import { type StateAction, applyStateAction, parseStateAction } from './state.js';

export interface Position {
  page: number;
  x: number;
  y: number;
}

export interface LocatedElement {
  location: Location;
  element: LocatableNode;
  position: Position;
  /** Document order */
  index: number;
}

interface CounterEntry {
  index: number;
  action: CounterAction;
  element: LocatableNode;
}

interface StateEntry {
  index: number;
  action: StateAction;
  init: FieldValue;
}

export interface CounterView {
  /** Fold of the updates strictly before `location` */
  at(location: Location): CounterValue;
  /** Fold of all updates */
  final(): CounterValue;
}

export interface StateView {
  at(location: Location): FieldValue;
  final(): FieldValue;
}

const LABEL_HINT = 'use `query()` or a show rule';

export class Introspector {
  private readonly located: LocatedElement[] = [];
  private readonly byKey = new Map<string, LocatedElement>();
  private readonly labels = new Map<Label, LocatedElement[]>();
  private readonly counters = new Map<string, CounterEntry[]>();
  private readonly states = new Map<string, StateEntry[]>();
  readonly fingerprint: string;

  constructor(
    readonly pages: readonly Page[],
    private readonly registry: ElementRegistry | null
  ) {
    for (const page of pages) {
      for (const { item, x, y } of page.frame.walk()) {
        if (item.type !== 'tag' || item.tag.kind !== 'start') continue;
        const entry: LocatedElement = {
          location: item.tag.location,
          element: item.tag.element,
          position: { page: page.number, x, y },
          index: this.located.length,
        };
        if (this.byKey.has(entry.location.key)) continue;
        this.located.push(entry);
        this.byKey.set(entry.location.key, entry);
        this.record(entry);
      }
    }
    this.fingerprint = pages.map(serializePage).join('\n');
  }

  /**
   * Placeholder answers before the first layout exists
   */
  static empty(): Introspector {
    return new Introspector([], null);
  }

  private record(entry: LocatedElement): void {
    const element = entry.element;
    if (element.label !== null) {
      const list = this.labels.get(element.label) ?? [];
      list.push(entry);
      this.labels.set(element.label, list);
    }
    if (element.type !== 'element') return;
    const key = element.fields['key'];
    if (typeof key !== 'string') return;
    if (element.kind === 'counter.update') {
      const action = parseCounterAction(element.fields['action'] ?? null);
      if (action) pushTo(this.counters, key, { index: entry.index, action, element });
    } else if (element.kind === 'state.update') {
      const action = parseStateAction(element.fields['action'] ?? null);
      if (action) pushTo(this.states, key, { index: entry.index, action, init: element.fields['init'] ?? null });
    }
  }

  get pageCount(): number {
    return this.pages.length;
  }

  all(): readonly LocatedElement[] {
    return this.located;
  }

  /**
   * Located elements matching `selector`, in document order
   */
  query(selector: Selector): LocatedElement[] {
    switch (selector.type) {
      case 'before': {
        const list = this.query(selector.selector);
        const end = this.query(selector.end)[0];
        if (!end) return list;
        return list.filter(entry => entry.index < end.index || (selector.inclusive && entry.index === end.index));
      }
      case 'after': {
        const list = this.query(selector.selector);
        const start = this.query(selector.start)[0];
        if (!start) return list;
        return list.filter(entry => entry.index > start.index || (selector.inclusive && entry.index === start.index));
      }
      case 'or': {
        const seen = new Set<number>();
        const merged: LocatedElement[] = [];
        for (const branch of selector.selectors) {
          for (const entry of this.query(branch)) {
            if (!seen.has(entry.index)) {
              seen.add(entry.index);
              merged.push(entry);
            }
          }
        }
        return merged.sort((a, b) => a.index - b.index);
      }
      case 'and': {
        const [first, ...rest] = selector.selectors;
        if (!first) return [];
        let list = this.query(first);
        for (const branch of rest) {
          const keep = new Set(this.query(branch).map(entry => entry.index));
          list = list.filter(entry => keep.has(entry.index));
        }
        return list;
      }
      default: {
        const registry = this.registry;
        if (!registry) return [];
        return this.located.filter(entry =>
          matchNode(entry.element, selector, { registry, chain: null, location: entry.location }) !== null
        );
      }
    }
  }

  /**
   * The unique element carrying `label`
   */
  queryLabel(label: Label): LocatedElement {
    const list = this.labels.get(label) ?? [];
    if (list.length === 0) {
      throw new IntrospectionMiss(`label \`<${label}>\` does not exist in the document`, null, [LABEL_HINT]);
    }
    if (list.length > 1) {
      throw new IntrospectionMiss(`label \`<${label}>\` occurs multiple times in the document`, null, [LABEL_HINT]);
    }
    return list[0];
  }

  locate(location: Location): LocatedElement {
    const entry = this.byKey.get(location.key);
    if (!entry) {
      throw new IntrospectionMiss(`${location.toString()} does not exist in the document`);
    }
    return entry;
  }

  has(location: Location): boolean {
    return this.byKey.has(location.key);
  }

  /**
   * Document order of two locations; unknown locations sort last
   */
  compare(a: Location, b: Location): number {
    return this.indexOf(a) - this.indexOf(b);
  }

  private indexOf(location: Location): number {
    return this.byKey.get(location.key)?.index ?? Number.MAX_SAFE_INTEGER;
  }

  page(location: Location): number {
    return this.byKey.get(location.key)?.position.page ?? 1;
  }

  position(location: Location): Position {
    return this.byKey.get(location.key)?.position ?? { page: 1, x: 0, y: 0 };
  }

  pageNumbering(location: Location): FieldValue {
    const page = this.pages[this.page(location) - 1];
    return page ? page.numbering : null;
  }

  /**
   * 1-based position among located elements of the same kind
   */
  ordinal(location: Location): number {
    const entry = this.byKey.get(location.key);
    if (!entry) return 1;
    const kind = kindName(entry.element);
    return this.located.filter(other => other.index <= entry.index && kindName(other.element) === kind).length;
  }

  counter(key: string): CounterView {
    return {
      at: location => (this.byKey.has(location.key) ? this.foldCounter(key, this.indexOf(location)) : INITIAL_COUNTER),
      final: () => this.foldCounter(key, Number.MAX_SAFE_INTEGER),
    };
  }

  /**
   * Value of a counter after everything on `page` and the pages before it,
   * which is what a footer shows; null when no update reached that far
   */
  counterAfterPage(key: string, page: number): CounterValue | null {
    let limit = 0;
    while (limit < this.located.length && this.located[limit].position.page <= page) limit++;
    const log = this.counters.get(key) ?? [];
    if (!log.some(entry => entry.index < limit)) return null;
    return this.foldCounter(key, limit);
  }

  private foldCounter(key: string, limit: number): CounterValue {
    let value = INITIAL_COUNTER;
    for (const entry of this.counters.get(key) ?? []) {
      if (entry.index >= limit) break;
      value = applyCounterAction(value, entry.action, entry.element.span);
    }
    return value;
  }

  /**
   * State view; without `init` the first update's declared initial value is used
   */
  state(key: string, init?: FieldValue): StateView {
    const log = this.states.get(key) ?? [];
    const initial = init !== undefined ? init : (log[0]?.init ?? null);
    const fold = (limit: number): FieldValue => {
      let value = initial;
      for (const entry of log) {
        if (entry.index >= limit) break;
        value = applyStateAction(value, entry.action);
      }
      return value;
    };
    return {
      at: location => (this.byKey.has(location.key) ? fold(this.indexOf(location)) : initial),
      final: () => fold(Number.MAX_SAFE_INTEGER),
    };
  }

  /**
   * Locations whose element, page or position differ from `other`
   */
  diff(other: Introspector, limit = 10): string[] {
    const changed: string[] = [];
    const describe = (entry: LocatedElement | undefined): string =>
      entry
        ? `${serializeContent(entry.element, true)}@${entry.position.page}:${entry.position.x},${entry.position.y}`
        : '';
    const keys = new Set([...this.byKey.keys(), ...other.byKey.keys()]);
    for (const key of keys) {
      if (describe(this.byKey.get(key)) !== describe(other.byKey.get(key))) {
        changed.push(`loc(${key})`);
        if (changed.length >= limit) break;
      }
    }
    return changed;
  }
}

function kindName(element: LocatableNode): string {
  return element.type === 'metadata' ? 'metadata' : element.kind;
}

function pushTo<T>(map: Map<string, T[]>, key: string, entry: T): void {
  const list = map.get(key);
  if (list) {
    list.push(entry);
  } else {
    map.set(key, [entry]);
  }
}
