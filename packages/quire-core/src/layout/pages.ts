/**
 * Page layout - splits the flow into page runs and fills their columns
 *
 * A run is the flow between two page breaks, laid out with one page
 * configuration. Weak breaks do nothing on a page that has no content yet,
 * apart from switching the configuration.
 */

import { type Content, type ElementNode, makeElement } from '../content/content.js';
import { counterStep } from '../introspect/counter.js';
import type { Location } from '../introspect/location.js';
import { context } from '../realize/context.js';
import type { FlowItem, PageConfig } from '../realize/flow.js';
import type { StyleChain } from '../style/chain.js';
import { type LayoutContext, collect, stack } from './chunks.js';
import { Composer } from './compose.js';
import { Frame, type Page } from './frame.js';

export interface PageLayoutContext extends LayoutContext {
  /** Realize a header or footer */
  realizeContainer(content: Content, chain: StyleChain): FlowItem[];
  /** Location for a synthetic element placed by the layout */
  locate(element: ElementNode): Location;
}

interface Run {
  config: PageConfig;
  items: FlowItem[];
  to: 'odd' | 'even' | null;
  /** Started by a weak break */
  weak: boolean;
}

/**
 * Footer used when pages are numbered and no footer is given
 */
const PAGE_NUMBER_FOOTER = context(api => api.counter('page').display(api.get('page', 'numbering')));

function hasContent(items: readonly FlowItem[]): boolean {
  return items.some(item => item.type !== 'tag' && !(item.type === 'v' && item.weak));
}

export function splitRuns(items: readonly FlowItem[], initial: PageConfig): Run[] {
  const runs: Run[] = [];
  let current: Run = { config: initial, items: [], to: null, weak: true };
  for (const item of items) {
    if (item.type !== 'pagebreak') {
      current.items.push(item);
      continue;
    }
    if (item.weak && !hasContent(current.items)) {
      if (item.page) current.config = item.page;
      if (item.to) current.to = item.to;
      continue;
    }
    runs.push(current);
    current = { config: item.page ?? current.config, items: [], to: item.to, weak: item.weak };
  }
  const previous = runs[runs.length - 1];
  if (previous && current.weak && !hasContent(current.items)) {
    previous.items.push(...current.items);
  } else {
    runs.push(current);
  }
  return runs;
}

export function layoutPages(items: readonly FlowItem[], initial: PageConfig, cx: PageLayoutContext): Page[] {
  const pages: Page[] = [];
  for (const run of splitRuns(items, initial)) {
    const config = run.config;
    const parity = run.to === 'odd' ? 1 : run.to === 'even' ? 0 : null;
    if (parity !== null && (pages.length + 1) % 2 !== parity) {
      pages.push(makePage(pages.length + 1, config, [], cx));
    }

    const { margin, columns, gutter } = config;
    const bodyWidth = Math.max(0, config.width - margin.left - margin.right);
    const bodyHeight = Math.max(0, config.height - margin.top - margin.bottom);
    const columnWidth = (bodyWidth - gutter * (columns - 1)) / columns;
    const chunks = collect(run.items, columnWidth, cx);
    const composer = new Composer(chunks, { width: columnWidth, height: bodyHeight }, config.footnotes, cx);
    do {
      const regions: Frame[] = [];
      for (let i = 0; i < columns && (i === 0 || !composer.done); i++) {
        regions.push(composer.next());
      }
      pages.push(makePage(pages.length + 1, config, regions, cx));
    } while (!composer.done);
  }
  if (process.env.DEBUG_LAYOUT) {
    console.error(`DEBUG_LAYOUT: laid out ${pages.length} page(s)`);
  }
  return pages;
}

function makePage(number: number, config: PageConfig, regions: readonly Frame[], cx: PageLayoutContext): Page {
  const { margin } = config;
  const frame = new Frame(config.width, config.height);
  const bodyWidth = Math.max(0, config.width - margin.left - margin.right);
  const columnWidth = (bodyWidth - config.gutter * (config.columns - 1)) / config.columns;

  const step = makeElement('counter.update', { key: 'page', action: counterStep(1) });
  const location = cx.locate(step);
  frame.push({ type: 'tag', x: 0, y: 0, tag: { kind: 'start', location, element: step } });
  frame.push({ type: 'tag', x: 0, y: 0, tag: { kind: 'end', location, element: step } });

  const header = config.header;
  if (header) {
    const marginal = layoutMarginal(header, bodyWidth, config, cx);
    frame.pushFrame(margin.left, margin.top * 0.5 - marginal.height / 2, marginal);
  }
  regions.forEach((region, i) => {
    frame.pushFrame(margin.left + i * (columnWidth + config.gutter), margin.top, region);
  });
  const footer = config.footer ?? (config.numbering !== null ? PAGE_NUMBER_FOOTER : null);
  if (footer) {
    const marginal = layoutMarginal(footer, bodyWidth, config, cx);
    frame.pushFrame(margin.left, config.height - margin.bottom * 0.5 - marginal.height / 2, marginal);
  }
  return { frame, number, numbering: config.numbering };
}

function layoutMarginal(content: Content, width: number, config: PageConfig, cx: PageLayoutContext): Frame {
  const items = cx.realizeContainer(content, config.chain);
  return stack(collect(items, width, cx), width).frame;
}
