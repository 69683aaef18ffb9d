/**
 * Context - deferred content that reads the introspector
 *
 * A `context` element holds a function that receives a ContextApi. Every
 * introspector read goes through a probe that can be replayed against a
 * later introspector; the produced content is memoized by (location, chain,
 * function) and reused while every probe still yields the same answer.
 */

import { IntrospectionMiss, StyleError } from '../diag.js';
import {
  type Content,
  type ContentLike,
  type ElementNode,
  type Label,
  emptyContent,
  makeElement,
  serializeContent,
  toContent,
} from '../content/content.js';
import { resolveProperty } from '../content/elements.js';
import { type FieldValue, FuncValue, serializeValue } from '../content/value.js';
import type { Engine } from '../engine/engine.js';
import type { CounterValue } from '../introspect/counter.js';
import type { Introspector, LocatedElement, Position } from '../introspect/introspector.js';
import type { Location } from '../introspect/location.js';
import { validateSelector } from '../selector/matcher.js';
import { type Selector, labelSelector } from '../selector/selector.js';
import type { StyleChain } from '../style/chain.js';
import { applyNumbering } from './numbering.js';

export class ContextFunc extends FuncValue {
  readonly role = 'context';

  constructor(readonly call: (api: ContextApi) => ContentLike) {
    super();
  }

  get identity(): object {
    return this.call;
  }
}

/**
 * A `context` element running `call`
 */
export function context(call: (api: ContextApi) => ContentLike): ElementNode {
  return makeElement('context', { func: new ContextFunc(call) });
}

export type Target = Location | Label;

export interface CounterApi {
  /** Value at the context's own location */
  get(): CounterValue;
  at(target: Target): CounterValue;
  final(): CounterValue;
  /** Format the value at `target` (default: here) */
  display(numbering?: FieldValue, target?: Target): string;
}

export interface StateApi {
  get(): FieldValue;
  at(target: Target): FieldValue;
  final(): FieldValue;
}

export interface DateParts {
  year: number;
  month: number;
  day: number;
}

export interface ContextApi {
  here(): Location;
  /** Style property in effect at the context element */
  get(kind: string, key: string): FieldValue;
  counter(key: string): CounterApi;
  state(key: string, init?: FieldValue): StateApi;
  query(target: Selector | Label): LocatedElement[];
  locate(target: Selector | Label): Location;
  page(target?: Target): number;
  pageNumbering(target?: Target): FieldValue;
  position(target?: Target): Position;
  measure(content: ContentLike, width?: number): { width: number; height: number };
  today(): DateParts;
}

/**
 * Replays one read against an introspector
 */
interface Probe {
  probe: (introspector: Introspector) => string;
  result: string;
}

interface MemoEntry {
  probes: Probe[];
  content: Content;
}

/**
 * Memoized context output, shared by all passes of one compilation
 */
export class ContextMemo {
  private entries = new Map<string, MemoEntry>();

  lookup(key: string, engine: Engine): Content | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    for (const { probe, result } of entry.probes) {
      if (engine.introspect(introspector => probe(introspector)) !== result) return null;
    }
    return entry.content;
  }

  store(key: string, probes: Probe[], content: Content): void {
    this.entries.set(key, { probes, content });
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Evaluate a context element. Introspection misses are delayed: they yield
 * empty content and are reported only if they survive to the last pass.
 */
export function evaluateContext(
  element: ElementNode,
  location: Location,
  chain: StyleChain,
  engine: Engine
): Content {
  const func = element.fields['func'];
  if (!(func instanceof ContextFunc)) {
    throw new StyleError('context element has no function', element.span);
  }
  const key = `${location.key}|${chain.id}|${serializeValue(func)}`;
  const cached = engine.memo.lookup(key, engine);
  if (cached) return cached;

  const recorder = new ContextRecorder(engine, location, chain);
  let content: Content;
  try {
    content = toContent(func.call(recorder));
  } catch (error) {
    if (error instanceof IntrospectionMiss) {
      if (process.env.DEBUG_REALIZE) {
        console.error(`DEBUG_REALIZE: delayed introspection miss at ${location.toString()}: ${error.message}`);
      }
      engine.delayed.push(error);
      return emptyContent();
    }
    throw error;
  }
  if (recorder.cacheable) {
    engine.memo.store(key, recorder.probes, content);
  }
  return content;
}

function serializeLocated(list: readonly LocatedElement[]): string {
  return list
    .map(entry => `${entry.location.key}/${serializeContent(entry.element, true)}@${serializePosition(entry.position)}`)
    .join(';');
}

function serializePosition(position: Position): string {
  return `${position.page}:${position.x},${position.y}`;
}

function missAware(read: (introspector: Introspector) => string): (introspector: Introspector) => string {
  return introspector => {
    try {
      return read(introspector);
    } catch (error) {
      if (error instanceof IntrospectionMiss) return `!miss:${error.message}`;
      throw error;
    }
  };
}

class ContextRecorder implements ContextApi {
  readonly probes: Probe[] = [];
  cacheable = true;

  constructor(
    private engine: Engine,
    private location: Location,
    private chain: StyleChain
  ) {}

  /**
   * Run a read against the current introspector and remember how to replay it
   */
  private read<T>(run: (introspector: Introspector) => T, serialize: (value: T) => string): T {
    const value = this.engine.introspect(run);
    this.probes.push({ probe: missAware(introspector => serialize(run(introspector))), result: serialize(value) });
    return value;
  }

  private resolve(target: Target | undefined, introspector: Introspector): Location {
    if (target === undefined) return this.location;
    if (typeof target === 'string') return introspector.queryLabel(target).location;
    return target;
  }

  here(): Location {
    return this.location;
  }

  get(kind: string, key: string): FieldValue {
    return resolveProperty(this.engine.registry, kind, key, this.chain);
  }

  counter(key: string): CounterApi {
    const numbers = (value: CounterValue) => value.join('.');
    return {
      get: () => this.read(i => i.counter(key).at(this.location), numbers),
      at: target => this.read(i => i.counter(key).at(this.resolve(target, i)), numbers),
      final: () => this.read(i => i.counter(key).final(), numbers),
      display: (numbering = '1', target) => {
        const value = this.read(i => i.counter(key).at(this.resolve(target, i)), numbers);
        return applyNumbering(numbering, value);
      },
    };
  }

  state(key: string, init?: FieldValue): StateApi {
    const text = (value: FieldValue) => serializeValue(value, true);
    return {
      get: () => this.read(i => i.state(key, init).at(this.location), text),
      at: target => this.read(i => i.state(key, init).at(this.resolve(target, i)), text),
      final: () => this.read(i => i.state(key, init).final(), text),
    };
  }

  query(target: Selector | Label): LocatedElement[] {
    const selector = typeof target === 'string' ? labelSelector(target) : target;
    validateSelector(selector, this.engine.registry, 'query');
    return this.read(i => i.query(selector), serializeLocated);
  }

  locate(target: Selector | Label): Location {
    if (typeof target === 'string') {
      return this.read(i => i.queryLabel(target).location, location => location.key);
    }
    validateSelector(target, this.engine.registry, 'query');
    return this.read(
      i => {
        const found = i.query(target);
        if (found.length !== 1) {
          throw new IntrospectionMiss(
            `selector matches ${found.length === 0 ? 'no element' : 'multiple elements'}`,
            null,
            ['use `query()` or a show rule']
          );
        }
        return found[0].location;
      },
      location => location.key
    );
  }

  page(target?: Target): number {
    return this.read(i => i.page(this.resolve(target, i)), String);
  }

  pageNumbering(target?: Target): FieldValue {
    return this.read(i => i.pageNumbering(this.resolve(target, i)), value => serializeValue(value));
  }

  position(target?: Target): Position {
    return this.read(i => i.position(this.resolve(target, i)), serializePosition);
  }

  measure(content: ContentLike, width?: number): { width: number; height: number } {
    const result = this.engine.measure(toContent(content), this.chain, width);
    if (result.introspected) this.cacheable = false;
    return { width: result.width, height: result.height };
  }

  today(): DateParts {
    const now = this.engine.now;
    return { year: now.getUTCFullYear(), month: now.getUTCMonth() + 1, day: now.getUTCDate() };
  }
}
