/**
 * Engine - state of one realization and layout pass
 *
 * Holds what a pass needs besides the content: the registry, the measurer,
 * the introspector of the previous pass, a fresh locator, and the memo
 * shared across passes. Collects delayed introspection misses and layout
 * warnings of the pass.
 */

import type { IntrospectionMiss, LayoutOverflowWarning } from '../diag.js';
import type { Content } from '../content/content.js';
import type { ElementRegistry } from '../content/elements.js';
import { hashValue } from '../content/value.js';
import type { Introspector } from '../introspect/introspector.js';
import { Locator } from '../introspect/location.js';
import { collect, stack } from '../layout/chunks.js';
import type { Page } from '../layout/frame.js';
import type { TextMeasurer } from '../layout/measure.js';
import { layoutPages } from '../layout/pages.js';
import { ContextMemo } from '../realize/context.js';
import { resolvePageConfig } from '../realize/page-config.js';
import { Realizer } from '../realize/realizer.js';
import type { StyleChain } from '../style/chain.js';

export interface EngineOptions {
  registry: ElementRegistry;
  measurer: TextMeasurer;
  now: Date;
  memo: ContextMemo;
  introspector: Introspector;
}

export interface Measurement {
  width: number;
  height: number;
  /** The measured content read the introspector */
  introspected: boolean;
}

export class Engine {
  readonly registry: ElementRegistry;
  readonly measurer: TextMeasurer;
  readonly now: Date;
  readonly memo: ContextMemo;
  readonly introspector: Introspector;
  readonly locator = new Locator();
  readonly delayed: IntrospectionMiss[] = [];
  readonly warnings: LayoutOverflowWarning[] = [];
  /** Introspector reads during this pass */
  introspections = 0;

  constructor(options: EngineOptions) {
    this.registry = options.registry;
    this.measurer = options.measurer;
    this.now = options.now;
    this.memo = options.memo;
    this.introspector = options.introspector;
  }

  introspect<T>(read: (introspector: Introspector) => T): T {
    this.introspections++;
    return read(this.introspector);
  }

  warn(warning: LayoutOverflowWarning): void {
    if (process.env.DEBUG_LAYOUT) {
      console.error(`DEBUG_LAYOUT: warning: ${warning.message}`);
    }
    this.warnings.push(warning);
  }

  /**
   * Realize and lay out the document
   */
  run(content: Content, chain: StyleChain): Page[] {
    const realizer = new Realizer(this);
    const items = realizer.document(content, chain);
    if (process.env.DEBUG_REALIZE) {
      console.error(`DEBUG_REALIZE: document realized into ${items.length} flow item(s)`);
    }
    return layoutPages(items, resolvePageConfig(this.registry, chain), {
      measurer: this.measurer,
      warn: warning => this.warn(warning),
      realizeContainer: (marginal, at) => realizer.container(marginal, at),
      locate: element => this.locator.locate(hashValue(element, true)),
    });
  }

  /**
   * Size of content realized and laid out on its own. Nothing it places is
   * located in this pass.
   */
  measure(content: Content, chain: StyleChain, width?: number): Measurement {
    const nested = new Engine({
      registry: this.registry,
      measurer: this.measurer,
      now: this.now,
      memo: new ContextMemo(),
      introspector: this.introspector,
    });
    const items = new Realizer(nested).container(content, chain);
    const region = width ?? Number.POSITIVE_INFINITY;
    const { frame } = stack(
      collect(items, region, { measurer: this.measurer, warn: warning => nested.warn(warning) }),
      region
    );
    this.introspections += nested.introspections;
    this.delayed.push(...nested.delayed);
    return { width: width ?? frame.contentWidth(), height: frame.height, introspected: nested.introspections > 0 };
  }
}

