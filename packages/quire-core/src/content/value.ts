/**
 * Field values and structural identity
 *
 * Field values are what element fields, style properties and state hold.
 * Two values are equal when their canonical serialization is equal;
 * functions compare by identity, everything else structurally.
 */

import type { Content } from './content.js';
import type { Location } from '../introspect/location.js';

export type Scalar = null | boolean | number | string;

/**
 * A function stored in a field. Each role (numbering, counter update,
 * state update, context body) subclasses this with its own call signature,
 * so a field can be narrowed with `instanceof` before it is called.
 * Identity is the wrapped function, not the wrapper.
 */
export abstract class FuncValue {
  abstract readonly role: string;
  abstract readonly identity: object;
}

/**
 * Numbering callback: receives the counter values, returns the label
 */
export class NumberingFunc extends FuncValue {
  readonly role = 'numbering';

  constructor(readonly call: (...numbers: number[]) => string) {
    super();
  }

  get identity(): object {
    return this.call;
  }
}

export interface FieldDict {
  readonly [key: string]: FieldValue;
}

export type FieldValue =
  | Scalar
  | Content
  | FuncValue
  | RegExp
  | Location
  | readonly FieldValue[]
  | FieldDict;

/**
 * Registry of objects that are content nodes.
 * Filled by the factories in content.ts; lets us tell a node apart from a
 * plain dictionary without a brand property.
 */
export const contentNodes = new WeakSet<object>();

export function isContent(value: unknown): value is Content {
  return typeof value === 'object' && value !== null && contentNodes.has(value);
}

export function isFieldArray(value: FieldValue | undefined): value is readonly FieldValue[] {
  return Array.isArray(value);
}

export function isDict(value: FieldValue | undefined): value is FieldDict {
  return (
    typeof value === 'object' &&
    value !== null &&
    !isFieldArray(value) &&
    !isContent(value) &&
    !(value instanceof FuncValue) &&
    !(value instanceof RegExp) &&
    !isLocationLike(value)
  );
}

function isLocationLike(value: object): value is Location {
  return 'key' in value && 'isLocation' in value;
}

const functionIds = new WeakMap<object, number>();
let nextFunctionId = 1;

function functionId(fn: object): number {
  let id = functionIds.get(fn);
  if (id === undefined) {
    id = nextFunctionId++;
    functionIds.set(fn, id);
  }
  return id;
}

/**
 * Content serializers are installed by content.ts to avoid an import cycle
 * at module evaluation time.
 */
let contentSerializer: (node: Content, loose: boolean) => string = () => '?';

export function installContentSerializer(serializer: (node: Content, loose: boolean) => string): void {
  contentSerializer = serializer;
}

/**
 * Canonical string form of a value; node ids never appear in it.
 *
 * In loose mode functions serialize by role only. Locations and document
 * fingerprints use it, since closures are recreated in every pass.
 */
export function serializeValue(value: FieldValue | undefined, loose = false): string {
  if (value === undefined) return 'undefined';
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(4);
  }
  if (value instanceof FuncValue) {
    return loose ? `fn:${value.role}` : `fn:${value.role}#${functionId(value.identity)}`;
  }
  if (value instanceof RegExp) {
    return `re/${value.source}/${value.flags}`;
  }
  if (isContent(value)) {
    return contentSerializer(value, loose);
  }
  if (isFieldArray(value)) {
    return `[${value.map(item => serializeValue(item, loose)).join(',')}]`;
  }
  if (isLocationLike(value)) {
    return `loc(${value.key})`;
  }
  const keys = Object.keys(value).sort();
  return `{${keys.map(key => `${key}:${serializeValue(value[key], loose)}`).join(',')}}`;
}

/**
 * 53-bit FNV-1a style hash, rendered base 36
 */
export function hashString(text: string): string {
  let h1 = 0x811c9dc5;
  let h2 = 0x01000193;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 0x01000193);
    h2 = Math.imul(h2 ^ ch, 0x5bd1e995);
  }
  const hi = (h2 >>> 0) & 0x1fffff;
  const lo = h1 >>> 0;
  return (hi * 0x100000000 + lo).toString(36);
}

export function hashValue(value: FieldValue | undefined, loose = false): string {
  return hashString(serializeValue(value, loose));
}

export function valueEquals(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  if (a === b) return true;
  return serializeValue(a) === serializeValue(b);
}

/**
 * Describe a value for error messages
 */
export function describeValue(value: FieldValue | undefined): string {
  if (value === undefined) return 'nothing';
  if (value === null) return 'none';
  if (value instanceof FuncValue) return 'function';
  if (value instanceof RegExp) return 'regex';
  if (isContent(value)) return 'content';
  if (isFieldArray(value)) return 'array';
  if (typeof value === 'object') return 'dictionary';
  return typeof value;
}
