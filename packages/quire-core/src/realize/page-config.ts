/**
 * Page setup resolution from `page` properties
 */

import { StyleError } from '../diag.js';
import { type ElementRegistry, resolveProperty } from '../content/elements.js';
import { type FieldValue, isDict } from '../content/value.js';
import type { StyleChain } from '../style/chain.js';
import type { Margins, PageConfig } from './flow.js';
import { asContent } from './look.js';

export function resolvePageConfig(
  registry: ElementRegistry,
  chain: StyleChain,
  explicit: { readonly [key: string]: FieldValue } = {}
): PageConfig {
  const get = (key: string): FieldValue => (key in explicit ? explicit[key] : resolveProperty(registry, 'page', key, chain));
  const number = (value: FieldValue, fallback: number): number => (typeof value === 'number' ? value : fallback);
  const entry = (key: string): FieldValue => resolveProperty(registry, 'footnote.entry', key, chain);

  const columns = number(get('columns'), 1);
  if (!Number.isInteger(columns) || columns < 1) {
    throw new StyleError(`page columns must be a positive integer, found ${columns}`);
  }
  const header = get('header');
  const footer = get('footer');
  const separator = entry('separator');
  return {
    width: number(get('width'), 595),
    height: number(get('height'), 842),
    margin: margins(get('margin')),
    columns,
    gutter: number(get('gutter'), 12),
    header: header === null ? null : asContent(header),
    footer: footer === null ? null : asContent(footer),
    numbering: get('numbering'),
    footnotes: {
      separator: typeof separator === 'boolean' ? separator : true,
      clearance: number(entry('clearance'), 8),
      gap: number(entry('gap'), 4),
    },
    chain,
  };
}

/**
 * A number for all sides, or a dictionary of `top`, `right`, `bottom`,
 * `left`, `x`, `y` and `rest`; specific keys win over `x`/`y` over `rest`
 */
export function margins(value: FieldValue): Margins {
  if (typeof value === 'number') {
    return { top: value, right: value, bottom: value, left: value };
  }
  if (!isDict(value)) {
    return { top: 72, right: 72, bottom: 72, left: 72 };
  }
  const side = (...keys: string[]): number => {
    for (const key of keys) {
      const found = value[key];
      if (typeof found === 'number') return found;
    }
    return 72;
  };
  return {
    top: side('top', 'y', 'rest'),
    right: side('right', 'x', 'rest'),
    bottom: side('bottom', 'y', 'rest'),
    left: side('left', 'x', 'rest'),
  };
}

export function isMargin(value: FieldValue): boolean {
  if (typeof value === 'number') return value >= 0;
  if (!isDict(value)) return false;
  const allowed = new Set(['top', 'right', 'bottom', 'left', 'x', 'y', 'rest']);
  return Object.entries(value).every(([key, side]) => allowed.has(key) && typeof side === 'number' && side >= 0);
}
