/**
 * Looks - the default realization of an element kind
 *
 * A look either returns content, which the realizer realizes in the
 * element's place with the element's styles, or writes flow primitives
 * straight into the builder and returns null.
 */

import type { Content, ElementNode } from '../content/content.js';
import { makeText } from '../content/content.js';
import { type FieldValue, isContent } from '../content/value.js';
import type { Engine } from '../engine/engine.js';
import type { Introspector } from '../introspect/introspector.js';
import type { Location } from '../introspect/location.js';
import type { StyleChain } from '../style/chain.js';
import type { FlowBuilder, FlowItem, FontSpec, PageConfig } from './flow.js';

export interface LookContext {
  readonly engine: Engine;
  readonly chain: StyleChain;
  /** Location of the element, when it is locatable */
  readonly location: Location | null;
  /** Inside a block, box, float, footnote, header or footer */
  readonly container: boolean;
  readonly builder: FlowBuilder;
  font(chain?: StyleChain): FontSpec;
  /** Settable property in effect */
  get(kind: string, key: string): FieldValue;
  /** Realize into the current flow */
  realize(content: Content, chain?: StyleChain): void;
  /** Realize into a separate flow, as a container */
  realizeBlock(content: Content, chain?: StyleChain): FlowItem[];
  /** Location of an enclosing element being realized */
  locationOf(node: Content): Location | null;
  /** Page setup from the chain, overridden by `fields` */
  pageConfig(fields?: { readonly [key: string]: FieldValue }): PageConfig;
  introspect<T>(read: (introspector: Introspector) => T): T;
}

export type Look = (element: ElementNode, cx: LookContext) => Content | null;

// Field accessors for materialized elements, whose fields are all present

export function numberField(element: ElementNode, key: string, fallback = 0): number {
  const value = element.fields[key];
  return typeof value === 'number' ? value : fallback;
}

export function optionalNumber(element: ElementNode, key: string): number | null {
  const value = element.fields[key];
  return typeof value === 'number' ? value : null;
}

export function stringField(element: ElementNode, key: string, fallback = ''): string {
  const value = element.fields[key];
  return typeof value === 'string' ? value : fallback;
}

export function boolField(element: ElementNode, key: string, fallback = false): boolean {
  const value = element.fields[key];
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Content field; strings become text, anything else nothing
 */
export function contentField(element: ElementNode, key: string): Content | null {
  return asContent(element.fields[key]);
}

export function asContent(value: FieldValue | undefined): Content | null {
  if (isContent(value)) return value;
  if (typeof value === 'string') return makeText(value);
  return null;
}
