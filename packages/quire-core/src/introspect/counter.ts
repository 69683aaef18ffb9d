/**
 * Counters - keyed logs of set/step/update operations
 *
 * Updates are ordinary `counter.update` elements in the content stream. The
 * introspector collects their tags in document order; a counter's value at a
 * location is the fold of every update strictly before it.
 */

import type { Span } from '../diag.js';
import { StyleError } from '../diag.js';
import { type ElementNode, makeElement } from '../content/content.js';
import { type FieldDict, type FieldValue, FuncValue, isDict, isFieldArray } from '../content/value.js';

export type CounterValue = readonly number[];

export const INITIAL_COUNTER: CounterValue = [0];

/**
 * Update callback: receives the current levels, returns the new ones
 */
export class CounterUpdateFunc extends FuncValue {
  readonly role = 'counter-update';

  constructor(readonly call: (...values: number[]) => number | readonly number[]) {
    super();
  }

  get identity(): object {
    return this.call;
  }
}

export type CounterAction =
  | { type: 'step'; level: number }
  | { type: 'set'; value: CounterValue }
  | { type: 'update'; func: CounterUpdateFunc };

export function counterStep(level = 1): FieldDict {
  return { type: 'step', level };
}

export function counterSet(value: number | readonly number[]): FieldDict {
  return { type: 'set', value: typeof value === 'number' ? [value] : [...value] };
}

export function counterUpdateWith(call: (...values: number[]) => number | readonly number[]): FieldDict {
  return { type: 'update', func: new CounterUpdateFunc(call) };
}

/**
 * A `counter.update` element for `key`
 */
export function counterUpdate(key: string, action: FieldDict, span: Span | null = null): ElementNode {
  return makeElement('counter.update', { key, action }, { span });
}

/**
 * Read an action stored in a field; null when the value is not one
 */
export function parseCounterAction(value: FieldValue): CounterAction | null {
  if (!isDict(value)) return null;
  switch (value['type']) {
    case 'step': {
      const level = value['level'] ?? 1;
      return typeof level === 'number' && Number.isInteger(level) && level >= 1 ? { type: 'step', level } : null;
    }
    case 'set': {
      const numbers = toNumbers(value['value']);
      return numbers ? { type: 'set', value: numbers } : null;
    }
    case 'update': {
      const func = value['func'];
      return func instanceof CounterUpdateFunc ? { type: 'update', func } : null;
    }
    default:
      return null;
  }
}

export function isCounterAction(value: FieldValue): boolean {
  return parseCounterAction(value) !== null;
}

function toNumbers(value: FieldValue | undefined): number[] | null {
  if (typeof value === 'number') return [value];
  if (!isFieldArray(value)) return null;
  const numbers: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number') return null;
    numbers.push(item);
  }
  return numbers;
}

/**
 * Apply one update to a counter value
 */
export function applyCounterAction(current: CounterValue, action: CounterAction, span: Span | null = null): CounterValue {
  switch (action.type) {
    case 'step': {
      const next = current.slice(0, action.level);
      while (next.length < action.level) next.push(0);
      next[action.level - 1] += 1;
      return next;
    }
    case 'set':
      return [...action.value];
    case 'update': {
      const result = action.func.call(...current);
      const numbers = typeof result === 'number' ? [result] : [...result];
      if (numbers.some(n => !Number.isFinite(n))) {
        throw new StyleError('counter update function returned a value that is not a number', span);
      }
      return numbers;
    }
  }
}
