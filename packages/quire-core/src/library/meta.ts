/**
 * Introspection kinds: counter and state updates, context, metadata
 */

import { StyleError } from '../diag.js';
import { type ElementKind, isStr } from '../content/elements.js';
import { isCounterAction } from '../introspect/counter.js';
import { isStateAction } from '../introspect/state.js';
import { ContextFunc, evaluateContext } from '../realize/context.js';

export const counterUpdateKind: ElementKind = {
  name: 'counter.update',
  display: 'neutral',
  locatable: true,
  params: {
    key: { required: true, check: isStr, expected: 'a counter key' },
    action: { required: true, check: isCounterAction, expected: 'a counter action' },
  },
};

export const stateUpdateKind: ElementKind = {
  name: 'state.update',
  display: 'neutral',
  locatable: true,
  params: {
    key: { required: true, check: isStr, expected: 'a state key' },
    init: { default: null },
    action: { required: true, check: isStateAction, expected: 'a state action' },
  },
};

export const contextKind: ElementKind = {
  name: 'context',
  display: 'neutral',
  locatable: true,
  params: {
    func: { required: true, check: value => value instanceof ContextFunc, expected: 'a context function' },
  },
  look: (element, cx) => {
    if (!cx.location) {
      throw new StyleError('context element was not located', element.span);
    }
    return evaluateContext(element, cx.location, cx.chain, cx.engine);
  },
};

/**
 * Metadata nodes carry their value outside of fields; the kind exists so
 * that selectors and the registry know about it
 */
export const metadataKind: ElementKind = {
  name: 'metadata',
  display: 'neutral',
  locatable: true,
  params: {
    value: { default: null },
  },
};
