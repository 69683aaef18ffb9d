/**
 * State - keyed logs of set/update operations on arbitrary values
 */

import type { Span } from '../diag.js';
import { type ElementNode, makeElement } from '../content/content.js';
import { type FieldDict, type FieldValue, FuncValue, isDict } from '../content/value.js';

export class StateUpdateFunc extends FuncValue {
  readonly role = 'state-update';

  constructor(readonly call: (value: FieldValue) => FieldValue) {
    super();
  }

  get identity(): object {
    return this.call;
  }
}

export type StateAction = { type: 'set'; value: FieldValue } | { type: 'update'; func: StateUpdateFunc };

export function stateSet(value: FieldValue): FieldDict {
  return { type: 'set', value };
}

export function stateUpdateWith(call: (value: FieldValue) => FieldValue): FieldDict {
  return { type: 'update', func: new StateUpdateFunc(call) };
}

/**
 * A `state.update` element; `init` is used by readers that give no initial value
 */
export function stateUpdate(
  key: string,
  action: FieldDict,
  init: FieldValue = null,
  span: Span | null = null
): ElementNode {
  return makeElement('state.update', { key, action, init }, { span });
}

export function parseStateAction(value: FieldValue): StateAction | null {
  if (!isDict(value)) return null;
  if (value['type'] === 'set' && 'value' in value) {
    return { type: 'set', value: value['value'] };
  }
  const func = value['func'];
  if (value['type'] === 'update' && func instanceof StateUpdateFunc) {
    return { type: 'update', func };
  }
  return null;
}

export function isStateAction(value: FieldValue): boolean {
  return parseStateAction(value) !== null;
}

export function applyStateAction(current: FieldValue, action: StateAction): FieldValue {
  return action.type === 'set' ? action.value : action.func.call(current);
}
