/**
 * Realizer - rewrites content into flow primitives
 *
 * Styled wrappers push their entries for the subtree. Elements and text are
 * matched against the show rules in scope, nearest first; show-set rules
 * add properties, the first matching transform replaces the node, and a
 * node no transform claims is drawn with its kind's look.
 *
 * A transform may match the content it just produced once more (so that
 * `it => emph(it)` style rules work); a further self-match is a
 * RecursionError. Content is recognized as produced by a rule through its
 * node id: every node created while the rule ran has an id at or above the
 * watermark taken before the call.
 */

import { RecursionError, StyleError } from '../diag.js';
import {
  type Content,
  type LocatableNode,
  type StyledNode,
  type TextNode,
  makeElement,
  makeStyled,
  makeText,
  nodeKind,
  nodeWatermark,
  toContent,
} from '../content/content.js';
import { type ElementKind, fieldResolver, resolveField, resolveProperty } from '../content/elements.js';
import { type FieldValue, hashValue } from '../content/value.js';
import type { Engine } from '../engine/engine.js';
import { counterStep } from '../introspect/counter.js';
import type { Introspector } from '../introspect/introspector.js';
import type { Location } from '../introspect/location.js';
import { type Match, findTextMatches, matchNode, validateSelector } from '../selector/matcher.js';
import { describeSelector } from '../selector/selector.js';
import type { StyleChain } from '../style/chain.js';
import type { PropertyEntry, ShowEntry } from '../style/styles.js';
import { FlowBuilder, type FlowItem, type FontSpec, type ParProps } from './flow.js';
import type { LookContext } from './look.js';
import { resolvePageConfig } from './page-config.js';

/** Nested show rule applications before mutual recursion is an error */
const MAX_SHOW_DEPTH = 64;

/** First application plus one re-match of its own output */
const MAX_SELF_MATCHES = 2;

interface Application {
  ruleId: number;
  watermark: number;
  depth: number;
  /** Literal content predates the rule; any nested match is a self-match */
  literal: boolean;
}

interface RealizeState {
  readonly applications: readonly Application[];
  /** `${nodeId}:${ruleId}` pairs that must not be applied again */
  readonly guard: ReadonlySet<string>;
  /** Nodes already tagged in an enclosing realization, with their location */
  readonly located: ReadonlyMap<number, Location>;
  readonly container: boolean;
  readonly showDepth: number;
}

const ROOT_STATE: RealizeState = {
  applications: [],
  guard: new Set(),
  located: new Map(),
  container: false,
  showDepth: 0,
};

const EMPTY_MATCH: Match = { captures: {} };

function guardKey(nodeId: number, rule: ShowEntry): string {
  return `${nodeId}:${rule.id}`;
}

export class Realizer {
  constructor(private engine: Engine) {}

  /**
   * Realize the document body
   */
  document(content: Content, chain: StyleChain): FlowItem[] {
    const builder = this.builder();
    this.realize(content, chain, builder, ROOT_STATE);
    return builder.finish();
  }

  /**
   * Realize content as the body of a container (header, footer, measured fragment)
   */
  container(content: Content, chain: StyleChain): FlowItem[] {
    const builder = this.builder();
    this.realize(content, chain, builder, { ...ROOT_STATE, container: true });
    return builder.finish();
  }

  private builder(): FlowBuilder {
    return new FlowBuilder(chain => this.parProps(chain));
  }

  private parProps(chain: StyleChain): ParProps {
    const get = (key: string, fallback: number): number => {
      const value = resolveProperty(this.engine.registry, 'par', key, chain);
      return typeof value === 'number' ? value : fallback;
    };
    return { leading: get('leading', 4), spacing: get('spacing', 10), indent: get('first-line-indent', 0) };
  }

  font(chain: StyleChain): FontSpec {
    const get = (key: string): FieldValue => resolveProperty(this.engine.registry, 'text', key, chain);
    const size = get('size');
    const weight = get('weight');
    const fill = get('fill');
    return {
      size: typeof size === 'number' ? size : 10,
      weight: typeof weight === 'number' ? weight : 400,
      style: get('style') === 'italic' ? 'italic' : 'normal',
      fill: typeof fill === 'string' ? fill : 'black',
    };
  }

  private realize(content: Content, chain: StyleChain, builder: FlowBuilder, st: RealizeState): void {
    switch (content.type) {
      case 'sequence':
        for (const child of joinTextRuns(content.children, chain)) {
          this.realize(child, chain, builder, st);
        }
        return;
      case 'styled':
        this.styled(content, chain, builder, st);
        return;
      case 'text':
        this.text(content, chain, builder, st, 0);
        return;
      case 'element':
      case 'metadata':
        this.element(content, chain, builder, st);
        return;
    }
  }

  /**
   * Validate a set rule property and check where it is used
   */
  private checkSet(entry: PropertyEntry, st: RealizeState): void {
    this.engine.registry.checkProperty(entry);
    if (entry.kind === 'page' && st.container) {
      throw new StyleError('page configuration is not allowed inside of containers', entry.span, [
        'move the `set page` rule to the top level of the document',
      ]);
    }
  }

  private styled(node: StyledNode, chain: StyleChain, builder: FlowBuilder, st: RealizeState): void {
    let current = chain;
    const entries = node.entries;
    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      if (entry.type === 'set') {
        this.checkSet(entry, st);
        current = current.push(entry);
        continue;
      }
      if (entry.selector) {
        validateSelector(entry.selector, this.engine.registry, 'show', entry.span);
        current = current.push(entry);
        continue;
      }
      // A show rule without selector transforms everything after it
      if (entry.transform.type === 'set') {
        for (const property of entry.transform.entries) this.checkSet(property, st);
        current = current.pushAll(entry.transform.entries);
        continue;
      }
      const rest = i + 1 < entries.length ? makeStyled(node.child, entries.slice(i + 1), node.span) : node.child;
      const output =
        entry.transform.type === 'func' ? toContent(entry.transform.func(rest, EMPTY_MATCH)) : entry.transform.content;
      this.pageScope(chain, current, builder, st, () => this.realize(output, current, builder, st));
      return;
    }
    this.pageScope(chain, current, builder, st, () => this.realize(node.child, current, builder, st));
  }

  /**
   * Page set rules at the top level start a new page run with the new
   * setup, and restore the outer setup after the scope
   */
  private pageScope(
    outer: StyleChain,
    inner: StyleChain,
    builder: FlowBuilder,
    st: RealizeState,
    body: () => void
  ): void {
    if (st.container || !setsPage(inner, outer)) {
      body();
      return;
    }
    const registry = this.engine.registry;
    builder.block({ type: 'pagebreak', weak: true, to: null, page: resolvePageConfig(registry, inner) });
    body();
    builder.block({ type: 'pagebreak', weak: true, to: null, page: resolvePageConfig(registry, outer) });
  }

  private text(node: TextNode, chain: StyleChain, builder: FlowBuilder, st: RealizeState, startAt: number): void {
    const rules = [...chain.showRules()];
    for (let k = startAt; k < rules.length; k++) {
      const rule = rules[k];
      const selector = rule.selector;
      if (!selector || (selector.type !== 'text' && selector.type !== 'regex')) continue;
      if (rule.transform.type === 'set' || st.guard.has(guardKey(node.id, rule))) continue;
      const matches = findTextMatches(node.text, selector);
      if (matches.length === 0) continue;

      if (process.env.DEBUG_REALIZE) {
        console.error(`DEBUG_REALIZE: ${describeSelector(selector)} matched ${matches.length} time(s) in ${JSON.stringify(node.text)}`);
      }
      let pos = 0;
      for (const { start, end, match } of matches) {
        if (start > pos) {
          this.text(makeText(node.text.slice(pos, start), node.span), chain, builder, st, k + 1);
        }
        const segment = makeText(node.text.slice(start, end), node.span);
        this.apply(rule, segment, segment, match, chain, builder, st);
        pos = end;
      }
      if (pos < node.text.length) {
        this.text(makeText(node.text.slice(pos), node.span), chain, builder, st, k + 1);
      }
      return;
    }
    builder.text(node.text, this.font(chain), chain);
  }

  private element(node: LocatableNode, chain: StyleChain, builder: FlowBuilder, st: RealizeState): void {
    const registry = this.engine.registry;
    const kind = registry.kindOf(node);
    if (node.type === 'element') registry.checkElement(node);

    // Show-set rules apply before any transform is chosen. Layers are
    // matched against the incoming chain and pushed outermost first, so the
    // nearest rule wins.
    const layers: (readonly PropertyEntry[])[] = [];
    for (const rule of chain.showRules()) {
      if (rule.transform.type !== 'set' || !rule.selector || st.guard.has(guardKey(node.id, rule))) continue;
      if (!matchNode(node, rule.selector, { registry, chain })) continue;
      for (const property of rule.transform.entries) this.checkSet(property, st);
      layers.push(rule.transform.entries);
    }
    let current = pushLayers(chain, layers);

    let chosen: { rule: ShowEntry; match: Match } | null = null;
    for (const rule of current.showRules()) {
      if (rule.transform.type === 'set' || !rule.selector || st.guard.has(guardKey(node.id, rule))) continue;
      const match = matchNode(node, rule.selector, { registry, chain: current });
      if (match) {
        chosen = { rule, match };
        break;
      }
    }

    // The kind's own styles go with its look, below every show-set rule
    if (!chosen && kind.styles && node.type === 'element') {
      current = pushLayers(chain, [...layers, kind.styles(node, fieldResolver(registry, node, chain))]);
    }

    const materialized = this.materialize(node, kind, current);
    const known = st.located.get(node.id) ?? null;
    const tagged = known === null && (kind.locatable === true || node.label !== null);

    if (kind.display === 'block') builder.parbreak();

    let location = known;
    let inner = st;
    if (tagged) {
      if (kind.counter && node.type === 'element') {
        const counter = kind.counter(node, fieldResolver(registry, node, current));
        if (counter) this.counterStep(counter.key, counter.level, builder);
      }
      location = this.engine.locator.locate(hashValue(node, true));
      builder.tag({ kind: 'start', location, element: materialized });
    }
    if (location) {
      const located = new Map(st.located);
      located.set(node.id, location);
      located.set(materialized.id, location);
      inner = { ...st, located };
    }

    const body = chosen;
    this.pageScope(chain, current, builder, inner, () => {
      if (body) {
        this.apply(body.rule, node, materialized, body.match, current, builder, inner);
      } else {
        this.look(kind, materialized, location, current, builder, inner);
      }
    });

    if (tagged && location) {
      builder.tag({ kind: 'end', location, element: materialized });
    }
    if (kind.display === 'block') builder.parbreak();
  }

  /**
   * The element with every settable field resolved
   */
  private materialize(node: LocatableNode, kind: ElementKind, chain: StyleChain): LocatableNode {
    if (node.type === 'metadata') return node;
    const fields: { [key: string]: FieldValue } = {};
    for (const key of Object.keys(kind.params)) {
      fields[key] = resolveField(this.engine.registry, node, key, chain);
    }
    return makeElement(node.kind, fields, { label: node.label, span: node.span });
  }

  /**
   * Tag pair of an implicit counter step, placed before the element's start tag
   */
  private counterStep(key: string, level: number, builder: FlowBuilder): void {
    const step = makeElement('counter.update', { key, action: counterStep(level) });
    const location = this.engine.locator.locate(hashValue(step, true));
    builder.tag({ kind: 'start', location, element: step });
    builder.tag({ kind: 'end', location, element: step });
  }

  /**
   * Apply a show transform to `node`; `it` is what the transform receives
   */
  private apply(
    rule: ShowEntry,
    node: Content,
    it: Content,
    match: Match,
    chain: StyleChain,
    builder: FlowBuilder,
    st: RealizeState
  ): void {
    const previous = findLast(st.applications, app => app.ruleId === rule.id);
    const selfMatch = previous !== null && (previous.literal || node.id >= previous.watermark);
    const depth = selfMatch && previous ? previous.depth + 1 : 1;
    const selector = rule.selector ? describeSelector(rule.selector) : 'everything';
    if (depth > MAX_SELF_MATCHES) {
      throw new RecursionError(`show rule for \`${selector}\` keeps matching its own output`, rule.span, rule.id);
    }
    if (st.showDepth >= MAX_SHOW_DEPTH) {
      throw new RecursionError(`maximum show rule depth of ${MAX_SHOW_DEPTH} exceeded`, rule.span, rule.id);
    }

    const watermark = nodeWatermark();
    let output: Content;
    switch (rule.transform.type) {
      case 'func':
        output = toContent(rule.transform.func(it, match));
        break;
      case 'content':
        output = rule.transform.content;
        break;
      case 'set':
        throw new StyleError('show-set rules have no output', rule.span);
    }
    if (process.env.DEBUG_REALIZE) {
      console.error(`DEBUG_REALIZE: show#${rule.id} ${selector} applied to ${nodeKind(node)}#${node.id} (depth ${depth})`);
    }

    const guard = new Set(st.guard);
    guard.add(guardKey(node.id, rule));
    guard.add(guardKey(it.id, rule));
    this.realize(output, chain, builder, {
      ...st,
      guard,
      applications: [
        ...st.applications,
        { ruleId: rule.id, watermark, depth, literal: rule.transform.type === 'content' },
      ],
      showDepth: st.showDepth + 1,
    });
  }

  private look(
    kind: ElementKind,
    element: LocatableNode,
    location: Location | null,
    chain: StyleChain,
    builder: FlowBuilder,
    st: RealizeState
  ): void {
    if (element.type === 'metadata' || !kind.look) return;
    const output = kind.look(element, this.lookContext(chain, location, builder, st));
    if (output) this.realize(output, chain, builder, st);
  }

  private lookContext(chain: StyleChain, location: Location | null, builder: FlowBuilder, st: RealizeState): LookContext {
    const engine = this.engine;
    return {
      engine,
      chain,
      location,
      container: st.container,
      builder,
      font: (at = chain) => this.font(at),
      get: (kind, key) => resolveProperty(engine.registry, kind, key, chain),
      realize: (content, at = chain) => this.realize(content, at, builder, st),
      realizeBlock: (content, at = chain) => {
        const inner = this.builder();
        this.realize(content, at, inner, { ...st, container: true });
        return inner.finish();
      },
      locationOf: node => st.located.get(node.id) ?? null,
      pageConfig: fields => resolvePageConfig(engine.registry, chain, fields),
      introspect: <T>(read: (introspector: Introspector) => T): T => engine.introspect(read),
    };
  }
}

/**
 * Push property layers given nearest first, so that the first one wins
 */
function pushLayers(chain: StyleChain, layers: readonly (readonly PropertyEntry[])[]): StyleChain {
  let current = chain;
  for (let i = layers.length - 1; i >= 0; i--) {
    current = current.pushAll(layers[i]);
  }
  return current;
}

/**
 * Merge adjacent text siblings when a text or regex rule is in scope, so
 * that matches may span runs
 */
function joinTextRuns(children: readonly Content[], chain: StyleChain): readonly Content[] {
  if (!hasTextRules(chain)) return children;
  const joined: Content[] = [];
  let run: TextNode[] = [];
  const flush = () => {
    if (run.length === 1) {
      joined.push(run[0]);
    } else if (run.length > 1) {
      joined.push(makeText(run.map(part => part.text).join(''), run[0].span));
    }
    run = [];
  };
  for (const child of children) {
    if (child.type === 'text') {
      run.push(child);
      continue;
    }
    flush();
    joined.push(child);
  }
  flush();
  return joined;
}

function hasTextRules(chain: StyleChain): boolean {
  for (const rule of chain.showRules()) {
    const type = rule.selector?.type;
    if ((type === 'text' || type === 'regex') && rule.transform.type !== 'set') return true;
  }
  return false;
}

function setsPage(inner: StyleChain, outer: StyleChain): boolean {
  for (const entry of inner.entriesSince(outer)) {
    if (entry.type === 'set' && entry.kind === 'page') return true;
  }
  return false;
}

function findLast<T>(list: readonly T[], predicate: (item: T) => boolean): T | null {
  for (let i = list.length - 1; i >= 0; i--) {
    if (predicate(list[i])) return list[i];
  }
  return null;
}
