/**
 * Selector Matcher - evaluates selectors against content nodes
 *
 * Show rules match nodes while they are realized; field filters compare
 * against resolved fields (explicit field > set rule > kind default).
 * Queries match located elements, whose fields are already resolved.
 * Before/After need document order and are evaluated by the introspector.
 */

import type { Span } from '../diag.js';
import { SelectorError } from '../diag.js';
import { type Content, isLocatableNode, nodeLabel } from '../content/content.js';
import { type ElementRegistry, resolveField } from '../content/elements.js';
import { type FieldDict, type FieldValue, valueEquals } from '../content/value.js';
import type { Location } from '../introspect/location.js';
import type { StyleChain } from '../style/chain.js';
import { type Selector, describeSelector } from './selector.js';

/**
 * Result of a successful match
 * - where: the compared fields
 * - text/regex: `text` and regex `groups`
 * - and: captures of every branch merged
 */
export interface Match {
  readonly captures: FieldDict;
}

export interface MatchEnv {
  registry: ElementRegistry;
  /** Chain used to resolve fields; null for materialized elements */
  chain: StyleChain | null;
  /** Location of the node, when it has one */
  location?: Location | null;
}

const EMPTY: Match = { captures: {} };

export function matchNode(node: Content, selector: Selector, env: MatchEnv): Match | null {
  switch (selector.type) {
    case 'kind':
      return kindOf(node) === selector.kind ? EMPTY : null;

    case 'where': {
      if (kindOf(node) !== selector.kind || !isLocatableNode(node)) return null;
      const captures: { [key: string]: FieldValue } = {};
      for (const [key, expected] of Object.entries(selector.fields)) {
        const actual = fieldOf(node, key, env);
        if (!valueEquals(actual, expected)) return null;
        captures[key] = actual;
      }
      return { captures };
    }

    case 'text':
      if (node.type !== 'text' || selector.text.length === 0) return null;
      return node.text.includes(selector.text) ? { captures: { text: selector.text } } : null;

    case 'regex': {
      if (node.type !== 'text') return null;
      const found = selector.regex.exec(node.text);
      selector.regex.lastIndex = 0;
      return found ? { captures: regexCaptures(found) } : null;
    }

    case 'label':
      return nodeLabel(node) === selector.label ? EMPTY : null;

    case 'location':
      return env.location && env.location.equals(selector.location) ? EMPTY : null;

    case 'or':
      for (const branch of selector.selectors) {
        const match = matchNode(node, branch, env);
        if (match) return match;
      }
      return null;

    case 'and': {
      let captures: FieldDict = {};
      for (const branch of selector.selectors) {
        const match = matchNode(node, branch, env);
        if (!match) return null;
        captures = { ...captures, ...match.captures };
      }
      return { captures };
    }

    case 'before':
    case 'after':
      throw new SelectorError(`\`${describeSelector(selector)}\` can only be evaluated by a query`);
  }
}

function kindOf(node: Content): string | null {
  if (node.type === 'element') return node.kind;
  if (node.type === 'metadata') return 'metadata';
  return null;
}

function fieldOf(node: Content, key: string, env: MatchEnv): FieldValue {
  if (node.type === 'metadata') {
    return key === 'value' ? node.value : null;
  }
  if (node.type !== 'element') return null;
  if (env.chain) {
    return resolveField(env.registry, node, key, env.chain);
  }
  if (key in node.fields) return node.fields[key];
  return env.registry.get(node.kind)?.params[key]?.default ?? null;
}

function regexCaptures(found: RegExpMatchArray): FieldDict {
  return {
    text: found[0],
    groups: found.slice(1).map(group => group ?? null),
  };
}

/**
 * A match of a text or regex selector inside one text run
 */
export interface TextMatch {
  start: number;
  end: number;
  match: Match;
}

/**
 * Non-overlapping matches of a text/regex selector, left to right
 */
export function findTextMatches(text: string, selector: Selector): TextMatch[] {
  const found: TextMatch[] = [];
  if (selector.type === 'text') {
    if (selector.text.length === 0) return found;
    let from = 0;
    for (;;) {
      const start = text.indexOf(selector.text, from);
      if (start < 0) break;
      const end = start + selector.text.length;
      found.push({ start, end, match: { captures: { text: selector.text } } });
      from = end;
    }
    return found;
  }
  if (selector.type === 'regex') {
    const flags = selector.regex.flags.includes('g') ? selector.regex.flags : selector.regex.flags + 'g';
    const regex = new RegExp(selector.regex.source, flags);
    for (const hit of text.matchAll(regex)) {
      if (hit[0].length === 0 || hit.index === undefined) continue;
      found.push({ start: hit.index, end: hit.index + hit[0].length, match: { captures: regexCaptures(hit) } });
    }
  }
  return found;
}

export type SelectorUse = 'show' | 'query';

/**
 * Reject selectors that cannot be evaluated in the given position
 */
export function validateSelector(
  selector: Selector,
  registry: ElementRegistry,
  use: SelectorUse,
  span: Span | null = null
): void {
  const fail = (message: string, hints: string[] = []): never => {
    throw new SelectorError(message, span, hints);
  };

  const visit = (current: Selector, labelled: boolean): void => {
    switch (current.type) {
      case 'kind':
      case 'where': {
        const kind = registry.selectable(current.kind, span);
        if (use === 'query' && !kind.locatable && !labelled) {
          fail(`cannot query \`${current.kind}\`: elements of this kind have no location`, [
            'only locatable elements or labelled elements can be queried',
          ]);
        }
        if (current.type === 'where') {
          for (const key of Object.keys(current.fields)) {
            if (current.kind !== 'metadata' && !(key in kind.params)) {
              fail(`element \`${current.kind}\` has no field \`${key}\``);
            }
          }
        }
        return;
      }
      case 'text':
        if (use === 'query') fail('text selectors cannot be used in a query');
        if (current.text.length === 0) fail('text selector is empty');
        return;
      case 'regex':
        if (use === 'query') fail('regex selectors cannot be used in a query');
        current.regex.lastIndex = 0;
        if (current.regex.test('')) {
          current.regex.lastIndex = 0;
          fail(`regex \`${current.regex.source}\` matches the empty string`);
        }
        return;
      case 'label':
        return;
      case 'location':
        if (use === 'show') fail('location selectors can only be used in a query');
        return;
      case 'or':
        for (const branch of current.selectors) visit(branch, labelled);
        return;
      case 'and': {
        const hasLabel = current.selectors.some(branch => branch.type === 'label');
        for (const branch of current.selectors) visit(branch, labelled || hasLabel);
        return;
      }
      case 'before':
      case 'after':
        if (use === 'show') {
          fail(`\`${current.type}\` selectors can only be used in a query`, [
            'use a context expression with query() instead',
          ]);
        }
        visit(current.selector, labelled);
        visit(current.type === 'before' ? current.end : current.start, labelled);
        return;
    }
  };

  visit(selector, false);
}
