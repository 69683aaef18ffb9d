/**
 * Fixed-point driver
 *
 * Realization reads the introspector of the previous pass; layout produces
 * the introspector for the next one. Passes repeat until the document no
 * longer changes, or until a pass did not introspect at all.
 */

import { CompileAbortedError, ConvergenceError, type LayoutOverflowWarning } from '../diag.js';
import type { Content } from '../content/content.js';
import type { ElementRegistry } from '../content/elements.js';
import { Introspector } from '../introspect/introspector.js';
import type { Page } from '../layout/frame.js';
import { MonospaceMeasurer, type TextMeasurer } from '../layout/measure.js';
import { standardRegistry } from '../library/index.js';
import { ContextMemo } from '../realize/context.js';
import { validateSelector } from '../selector/matcher.js';
import { StyleArena } from '../style/chain.js';
import type { StyleEntry } from '../style/styles.js';
import { Engine } from './engine.js';

export const DEFAULT_MAX_PASSES = 5;

export interface CompileOptions {
  /** Entries in effect for the whole document */
  styles?: readonly StyleEntry[];
  registry?: ElementRegistry;
  measurer?: TextMeasurer;
  maxPasses?: number;
  /** Date `today()` answers with; sampled once when omitted */
  now?: Date;
  /** Introspector the first pass reads */
  seed?: Introspector;
  signal?: AbortSignal;
}

export interface CompiledDocument {
  pages: Page[];
  introspector: Introspector;
  warnings: LayoutOverflowWarning[];
  passes: number;
}

export function compile(content: Content, options: CompileOptions = {}): CompiledDocument {
  const registry = options.registry ?? standardRegistry();
  const measurer = options.measurer ?? new MonospaceMeasurer();
  const maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;
  const now = options.now ?? new Date();
  const chain = new StyleArena().root().pushAll(options.styles ?? []);
  for (const entry of options.styles ?? []) {
    if (entry.type === 'set') {
      registry.checkProperty(entry);
      continue;
    }
    if (entry.selector) validateSelector(entry.selector, registry, 'show', entry.span);
    if (entry.transform.type === 'set') entry.transform.entries.forEach(property => registry.checkProperty(property));
  }
  const memo = new ContextMemo();

  let introspector = options.seed ?? Introspector.empty();
  for (let pass = 1; ; pass++) {
    if (options.signal?.aborted) {
      throw new CompileAbortedError(pass - 1);
    }
    const engine = new Engine({ registry, measurer, now, memo, introspector });
    const pages = engine.run(content, chain);
    const next = new Introspector(pages, registry);
    const stable = next.fingerprint === introspector.fingerprint || engine.introspections === 0;

    if (process.env.DEBUG_PASSES) {
      console.error(
        `DEBUG_PASSES: pass ${pass}: ${pages.length} page(s), ${engine.introspections} introspection(s), ` +
          `${memo.size} memoized context(s), ${stable ? 'stable' : 'changed'}`
      );
    }

    if (stable) {
      const [miss] = engine.delayed;
      if (miss) throw miss;
      return { pages, introspector: next, warnings: engine.warnings, passes: pass };
    }
    if (pass >= maxPasses) {
      throw new ConvergenceError(maxPasses, next.diff(introspector));
    }
    introspector = next;
  }
}
