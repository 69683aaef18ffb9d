/**
 * Style entries - set rules and show rules
 *
 * A set rule assigns a default to an optional parameter of an element kind.
 * A show rule pairs a selector with a transform. Entries are inert data
 * here; validation happens when the realizer pushes them onto a chain.
 */

import type { Span } from '../diag.js';
import type { Content, ContentLike } from '../content/content.js';
import { type FieldValue, serializeValue } from '../content/value.js';
import type { Match } from '../selector/matcher.js';
import { type Selector, describeSelector } from '../selector/selector.js';

/**
 * A single (kind, key) → value assignment
 */
export interface PropertyEntry {
  readonly type: 'set';
  readonly id: number;
  readonly kind: string;
  readonly key: string;
  readonly value: FieldValue;
  readonly span: Span | null;
}

/**
 * Show rule body called with the matched node
 */
export type ShowFunc = (it: Content, match: Match) => ContentLike;

export type ShowTransform =
  | { readonly type: 'func'; readonly func: ShowFunc }
  | { readonly type: 'content'; readonly content: Content }
  | { readonly type: 'set'; readonly entries: readonly PropertyEntry[] };

export interface ShowEntry {
  readonly type: 'show';
  readonly id: number;
  /** `null` matches every element (a "show everything" rule) */
  readonly selector: Selector | null;
  readonly transform: ShowTransform;
  readonly span: Span | null;
}

export type StyleEntry = PropertyEntry | ShowEntry;

let nextEntryId = 1;

/**
 * Set rule: one entry per property, in argument order
 */
export function set(
  kind: string,
  properties: { readonly [key: string]: FieldValue },
  span: Span | null = null
): PropertyEntry[] {
  return Object.entries(properties).map(([key, value]) => ({
    type: 'set' as const,
    id: nextEntryId++,
    kind,
    key,
    value,
    span,
  }));
}

/**
 * Conditional set rule; contributes nothing when the condition is false
 */
export function setIf(
  condition: boolean,
  kind: string,
  properties: { readonly [key: string]: FieldValue },
  span: Span | null = null
): PropertyEntry[] {
  return condition ? set(kind, properties, span) : [];
}

/**
 * Show rule with a function transform
 */
export function show(selector: Selector | null, func: ShowFunc, span: Span | null = null): ShowEntry {
  return { type: 'show', id: nextEntryId++, selector, transform: { type: 'func', func }, span };
}

/**
 * Show rule replacing matches with literal content
 */
export function showContent(selector: Selector | null, content: Content, span: Span | null = null): ShowEntry {
  return { type: 'show', id: nextEntryId++, selector, transform: { type: 'content', content }, span };
}

/**
 * Show-set rule: matches get the properties applied to their subtree
 */
export function showSet(
  selector: Selector | null,
  entries: readonly PropertyEntry[],
  span: Span | null = null
): ShowEntry {
  return { type: 'show', id: nextEntryId++, selector, transform: { type: 'set', entries: [...entries] }, span };
}

/**
 * Stable description of an entry for structural hashing and messages.
 * Loose descriptions leave out rule ids.
 */
export function describeEntry(entry: StyleEntry, loose = false): string {
  if (entry.type === 'set') {
    return `set ${entry.kind}.${entry.key}=${serializeValue(entry.value, loose)}`;
  }
  const selector = entry.selector ? describeSelector(entry.selector) : 'everything';
  return loose ? `show ${selector}` : `show#${entry.id} ${selector}`;
}
