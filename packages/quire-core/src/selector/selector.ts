/**
 * Selectors - predicates over content nodes
 *
 * Used by show rules (to pick what to transform) and by queries (to pick
 * located elements out of the introspector).
 */

import type { Label } from '../content/content.js';
import { type FieldDict, type FieldValue, isDict, isFieldArray, serializeValue } from '../content/value.js';
import type { Location } from '../introspect/location.js';

export type Selector =
  | { readonly type: 'kind'; readonly kind: string }
  | { readonly type: 'where'; readonly kind: string; readonly fields: FieldDict }
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'regex'; readonly regex: RegExp }
  | { readonly type: 'label'; readonly label: Label }
  | { readonly type: 'location'; readonly location: Location }
  | { readonly type: 'or'; readonly selectors: readonly Selector[] }
  | { readonly type: 'and'; readonly selectors: readonly Selector[] }
  | { readonly type: 'before'; readonly selector: Selector; readonly end: Selector; readonly inclusive: boolean }
  | { readonly type: 'after'; readonly selector: Selector; readonly start: Selector; readonly inclusive: boolean };

export type SelectorType = Selector['type'];

export function kindSelector(kind: string): Selector {
  return { type: 'kind', kind };
}

/**
 * Elements of a kind whose resolved fields equal the given ones
 */
export function whereSelector(kind: string, fields: FieldDict): Selector {
  return { type: 'where', kind, fields };
}

export function textSelector(text: string): Selector {
  return { type: 'text', text };
}

export function regexSelector(regex: RegExp): Selector {
  return { type: 'regex', regex };
}

export function labelSelector(label: Label): Selector {
  return { type: 'label', label };
}

export function locationSelector(location: Location): Selector {
  return { type: 'location', location };
}

export function orSelector(...selectors: Selector[]): Selector {
  return { type: 'or', selectors };
}

export function andSelector(...selectors: Selector[]): Selector {
  return { type: 'and', selectors };
}

/**
 * Matches of `selector` up to the first match of `end`.
 * `inclusive` decides whether the boundary element itself is kept.
 */
export function beforeSelector(selector: Selector, end: Selector, inclusive = true): Selector {
  return { type: 'before', selector, end, inclusive };
}

/**
 * Matches of `selector` from the first match of `start` on
 */
export function afterSelector(selector: Selector, start: Selector, inclusive = true): Selector {
  return { type: 'after', selector, start, inclusive };
}

const SELECTOR_TYPES: ReadonlySet<string> = new Set([
  'kind', 'where', 'text', 'regex', 'label', 'location', 'or', 'and', 'before', 'after',
]);

/**
 * Recover a selector stored in an element field
 */
export function isSelector(value: FieldValue | undefined): value is Selector {
  if (!isDict(value)) return false;
  const type = value['type'];
  return typeof type === 'string' && SELECTOR_TYPES.has(type);
}

export function asSelectorList(value: FieldValue | undefined): Selector[] {
  if (isSelector(value)) return [value];
  if (isFieldArray(value)) return value.filter(isSelector);
  return [];
}

/**
 * Human-readable form, also used as a stable key
 */
export function describeSelector(selector: Selector): string {
  switch (selector.type) {
    case 'kind':
      return selector.kind;
    case 'where':
      return `${selector.kind}.where(${serializeValue(selector.fields)})`;
    case 'text':
      return JSON.stringify(selector.text);
    case 'regex':
      return `regex(${selector.regex.source})`;
    case 'label':
      return `<${selector.label}>`;
    case 'location':
      return selector.location.toString();
    case 'or':
      return `or(${selector.selectors.map(describeSelector).join(', ')})`;
    case 'and':
      return `and(${selector.selectors.map(describeSelector).join(', ')})`;
    case 'before':
      return `${describeSelector(selector.selector)}.before(${describeSelector(selector.end)}, inclusive: ${selector.inclusive})`;
    case 'after':
      return `${describeSelector(selector.selector)}.after(${describeSelector(selector.start)}, inclusive: ${selector.inclusive})`;
  }
}
