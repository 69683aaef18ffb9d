/**
 * Element kinds and the element registry
 *
 * The set of element kinds is closed per compilation: the standard library
 * registers the built-in kinds, callers may register their own kinds with a
 * generic field map. Only optional parameters may be set by set rules.
 */

import type { Span } from '../diag.js';
import { StyleError, SelectorError } from '../diag.js';
import type { Look } from '../realize/look.js';
import type { StyleChain } from '../style/chain.js';
import type { PropertyEntry } from '../style/styles.js';
import type { ElementNode, LocatableNode } from './content.js';
import { type FieldValue, describeValue, isContent } from './value.js';

/**
 * Declaration of one element parameter
 */
export interface ParamSpec {
  /** Required parameters must be given on the element and cannot be set */
  required?: boolean;
  /** Value used when neither the element nor a set rule provides one */
  default?: FieldValue;
  /** Type check applied to explicit fields and set rule values */
  check?: (value: FieldValue) => boolean;
  /** What `check` accepts, for error messages */
  expected?: string;
}

/**
 * How tags of an element are placed relative to paragraphs
 * - inline: the element lives inside paragraphs
 * - block: the element ends the current paragraph
 * - neutral: follows whatever surrounds it (metadata, counter updates)
 */
export type Display = 'inline' | 'block' | 'neutral';

/**
 * Implicit counter step emitted right before an element's start tag
 */
export interface ImplicitCounter {
  key: string;
  level: number;
}

export interface ElementKind {
  name: string;
  params: { readonly [key: string]: ParamSpec };
  display: Display;
  /** Whether every instance gets a location (not just labelled ones) */
  locatable?: boolean;
  /** Content realized for this kind counts as inside a container */
  container?: boolean;
  /** Counter stepped by every instance, resolved against its fields */
  counter?: (element: ElementNode, fields: FieldResolver) => ImplicitCounter | null;
  /**
   * Built-in properties for the subtree drawn by the look, below every
   * show-set rule. Return the same entries for the same fields so chains
   * intern.
   */
  styles?: (element: ElementNode, fields: FieldResolver) => readonly PropertyEntry[];
  /** Default look; missing means the element draws nothing */
  look?: Look;
}

/**
 * Reads resolved fields: explicit field > nearest set rule > default
 */
export interface FieldResolver {
  get(key: string): FieldValue;
}

export class ElementRegistry {
  private kinds = new Map<string, ElementKind>();

  define(kind: ElementKind): this {
    if (process.env.DEBUG_RULES) {
      console.error(`DEBUG_RULES: ${this.kinds.has(kind.name) ? 'Replaced' : 'Defined'} element kind ${kind.name}`);
    }
    this.kinds.set(kind.name, kind);
    return this;
  }

  get(name: string): ElementKind | null {
    return this.kinds.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.kinds.has(name);
  }

  /**
   * Look up a kind used by a selector
   */
  selectable(name: string, span: Span | null = null): ElementKind {
    const kind = this.kinds.get(name);
    if (!kind) {
      throw new SelectorError(`unknown element kind \`${name}\``, span, [
        `known kinds: ${[...this.kinds.keys()].sort().join(', ')}`,
      ]);
    }
    return kind;
  }

  /**
   * Look up the kind of a node that is being realized
   */
  kindOf(node: LocatableNode): ElementKind {
    const name = node.type === 'metadata' ? 'metadata' : node.kind;
    const kind = this.kinds.get(name);
    if (!kind) {
      throw new StyleError(`unknown element kind \`${name}\``, node.span);
    }
    return kind;
  }

  names(): string[] {
    return [...this.kinds.keys()];
  }

  /**
   * Validate one set rule property
   */
  checkProperty(entry: PropertyEntry): void {
    const kind = this.kinds.get(entry.kind);
    if (!kind) {
      throw new StyleError(`cannot set properties of unknown element kind \`${entry.kind}\``, entry.span);
    }
    const param = kind.params[entry.key];
    if (!param) {
      throw new StyleError(`element \`${entry.kind}\` has no parameter \`${entry.key}\``, entry.span);
    }
    if (param.required) {
      throw new StyleError(
        `cannot set required parameter \`${entry.key}\` of \`${entry.kind}\``,
        entry.span,
        ['only optional parameters can be set with a set rule']
      );
    }
    checkValue(kind, entry.key, param, entry.value, entry.span);
  }

  /**
   * Validate the explicit fields of an element
   */
  checkElement(node: ElementNode): void {
    const kind = this.kindOf(node);
    for (const [key, value] of Object.entries(node.fields)) {
      const param = kind.params[key];
      if (!param) {
        throw new StyleError(`element \`${kind.name}\` has no parameter \`${key}\``, node.span);
      }
      checkValue(kind, key, param, value, node.span);
    }
    for (const [key, param] of Object.entries(kind.params)) {
      if (param.required && !(key in node.fields)) {
        throw new StyleError(`missing required parameter \`${key}\` of \`${kind.name}\``, node.span);
      }
    }
  }
}

function checkValue(kind: ElementKind, key: string, param: ParamSpec, value: FieldValue, span: Span | null): void {
  if (param.check && !param.check(value)) {
    throw new StyleError(
      `expected ${param.expected ?? 'a valid value'} for \`${kind.name}.${key}\`, found ${describeValue(value)}`,
      span
    );
  }
}

/**
 * Resolve a field of an element against a chain
 */
export function resolveField(
  registry: ElementRegistry,
  node: LocatableNode,
  key: string,
  chain: StyleChain
): FieldValue {
  if (node.type === 'element' && key in node.fields) {
    return node.fields[key];
  }
  const kindName = node.type === 'metadata' ? 'metadata' : node.kind;
  return resolveProperty(registry, kindName, key, chain);
}

/**
 * Resolve a settable property with no element at hand (text size, page width)
 */
export function resolveProperty(registry: ElementRegistry, kindName: string, key: string, chain: StyleChain): FieldValue {
  const value = chain.get(kindName, key);
  if (value !== undefined) return value;
  const param = registry.get(kindName)?.params[key];
  return param?.default ?? null;
}

export function fieldResolver(registry: ElementRegistry, node: LocatableNode, chain: StyleChain): FieldResolver {
  return { get: key => resolveField(registry, node, key, chain) };
}

// Common parameter checks

export const isNumber = (value: FieldValue): boolean => typeof value === 'number' && Number.isFinite(value);
export const isNonNegative = (value: FieldValue): boolean =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0;
export const isBool = (value: FieldValue): boolean => typeof value === 'boolean';
export const isStr = (value: FieldValue): boolean => typeof value === 'string';
export const isContentValue = (value: FieldValue): boolean => isContent(value) || typeof value === 'string';
export const orNone = (check: (value: FieldValue) => boolean) => (value: FieldValue): boolean =>
  value === null || check(value);
export const oneOf = (...options: string[]) => (value: FieldValue): boolean =>
  typeof value === 'string' && options.includes(value);
