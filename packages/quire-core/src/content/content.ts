/**
 * Content Model
 *
 * The content tree is produced once by an external parser/evaluator and is
 * never mutated. Nodes are shared freely between passes and between parents.
 *
 * Every node gets a numeric identity from a monotonic counter at creation.
 * The realizer relies on that ordering: a node created after a show rule
 * started running was produced by that rule.
 */

import type { Span } from '../diag.js';
import { StyleError } from '../diag.js';
import type { StyleEntry } from '../style/styles.js';
import { describeEntry } from '../style/styles.js';
import {
  type FieldValue,
  contentNodes,
  installContentSerializer,
  isContent,
  isFieldArray,
  serializeValue,
} from './value.js';

export type Label = string;

interface NodeBase {
  readonly id: number;
  readonly span: Span | null;
}

export interface SequenceNode extends NodeBase {
  readonly type: 'sequence';
  readonly children: readonly Content[];
}

/**
 * Content with style entries applied to it (the result of `set` and `show`
 * rules written in front of it)
 */
export interface StyledNode extends NodeBase {
  readonly type: 'styled';
  readonly child: Content;
  readonly entries: readonly StyleEntry[];
}

export interface ElementNode extends NodeBase {
  readonly type: 'element';
  readonly kind: string;
  readonly fields: { readonly [key: string]: FieldValue };
  readonly label: Label | null;
}

export interface TextNode extends NodeBase {
  readonly type: 'text';
  readonly text: string;
}

/**
 * Invisible marker carrying a value, found again through queries
 */
export interface MetadataNode extends NodeBase {
  readonly type: 'metadata';
  readonly value: FieldValue;
  readonly label: Label | null;
}

export type Content = SequenceNode | StyledNode | ElementNode | TextNode | MetadataNode;

/**
 * Nodes that can be matched by kind and carry a label
 */
export type LocatableNode = ElementNode | MetadataNode;

/**
 * What show rule functions and context bodies may return.
 * Joined into content by toContent(): `null` elides, strings and adjacent
 * text concatenate, arrays flatten.
 */
export type ContentLike = Content | string | null | undefined | readonly ContentLike[];

let nextNodeId = 1;

/**
 * The id the next created node will receive
 */
export function nodeWatermark(): number {
  return nextNodeId;
}

function register<T extends Content>(node: T): T {
  contentNodes.add(node);
  return node;
}

export function makeText(text: string, span: Span | null = null): TextNode {
  return register({ type: 'text', id: nextNodeId++, span, text });
}

export function makeSequence(children: readonly Content[], span: Span | null = null): SequenceNode {
  return register({ type: 'sequence', id: nextNodeId++, span, children: [...children] });
}

export function makeStyled(
  child: Content,
  entries: readonly StyleEntry[],
  span: Span | null = null
): StyledNode {
  return register({ type: 'styled', id: nextNodeId++, span, child, entries: [...entries] });
}

export interface ElementOptions {
  label?: Label | null;
  span?: Span | null;
}

export function makeElement(
  kind: string,
  fields: { readonly [key: string]: FieldValue } = {},
  options: ElementOptions = {}
): ElementNode {
  return register({
    type: 'element',
    id: nextNodeId++,
    span: options.span ?? null,
    kind,
    fields: { ...fields },
    label: options.label ?? null,
  });
}

export function makeMetadata(value: FieldValue, label: Label | null = null, span: Span | null = null): MetadataNode {
  return register({ type: 'metadata', id: nextNodeId++, span, value, label });
}

/**
 * Attach a label to an element or metadata marker
 */
export function withLabel(node: Content, label: Label): LocatableNode {
  switch (node.type) {
    case 'element':
      return makeElement(node.kind, node.fields, { label, span: node.span });
    case 'metadata':
      return makeMetadata(node.value, label, node.span);
    default:
      throw new StyleError(`labels can only be attached to elements, not to ${node.type} content`, node.span);
  }
}

/**
 * Copy an element with some fields replaced
 */
export function withFields(node: ElementNode, fields: { readonly [key: string]: FieldValue }): ElementNode {
  return makeElement(node.kind, { ...node.fields, ...fields }, { label: node.label, span: node.span });
}

export function isLocatableNode(node: Content): node is LocatableNode {
  return node.type === 'element' || node.type === 'metadata';
}

/**
 * Kind name used for matching; `text`, `sequence` and `styled` for the
 * structural node types
 */
export function nodeKind(node: Content): string {
  switch (node.type) {
    case 'element':
      return node.kind;
    case 'metadata':
      return 'metadata';
    default:
      return node.type;
  }
}

export function nodeLabel(node: Content): Label | null {
  return isLocatableNode(node) ? node.label : null;
}

/**
 * Join content-like values into one content node
 */
export function toContent(like: ContentLike): Content {
  if (isContent(like)) return like;
  const parts: Content[] = [];
  let pendingText: string | null = null;

  const flushText = () => {
    if (pendingText !== null) {
      parts.push(makeText(pendingText));
      pendingText = null;
    }
  };

  const visit = (item: ContentLike) => {
    if (item === null || item === undefined) return;
    if (typeof item === 'string') {
      pendingText = (pendingText ?? '') + item;
      return;
    }
    if (isContent(item)) {
      if (item.type === 'text') {
        pendingText = (pendingText ?? '') + item.text;
        return;
      }
      flushText();
      parts.push(item);
      return;
    }
    for (const child of item) visit(child);
  };

  visit(like);
  flushText();
  if (parts.length === 1) return parts[0];
  return makeSequence(parts);
}

/**
 * Join two pieces of content; `none` elides
 */
export function joinContent(a: ContentLike, b: ContentLike): Content {
  return toContent([a, b]);
}

export function emptyContent(): Content {
  return makeSequence([]);
}

export function isEmptyContent(node: Content): boolean {
  switch (node.type) {
    case 'sequence':
      return node.children.every(isEmptyContent);
    case 'styled':
      return isEmptyContent(node.child);
    case 'text':
      return node.text.length === 0;
    default:
      return false;
  }
}

/**
 * Flatten all text in a content tree, including text nested in element
 * fields, in document order
 */
export function plainText(node: Content): string {
  switch (node.type) {
    case 'text':
      return node.text;
    case 'sequence':
      return node.children.map(plainText).join('');
    case 'styled':
      return plainText(node.child);
    case 'metadata':
      return '';
    case 'element': {
      if (node.kind === 'linebreak' || node.kind === 'parbreak') return ' ';
      let text = '';
      for (const value of Object.values(node.fields)) {
        text += plainTextOfValue(value);
      }
      return text;
    }
  }
}

function plainTextOfValue(value: FieldValue): string {
  if (isContent(value)) return plainText(value);
  if (isFieldArray(value)) return value.map(plainTextOfValue).join('');
  return '';
}

const serialized = new WeakMap<Content, string>();
const serializedLoose = new WeakMap<Content, string>();

/**
 * Structural serialization of a node (ids excluded)
 */
export function serializeContent(node: Content, loose = false): string {
  const cache = loose ? serializedLoose : serialized;
  const cached = cache.get(node);
  if (cached !== undefined) return cached;
  let text: string;
  switch (node.type) {
    case 'text':
      text = `t(${JSON.stringify(node.text)})`;
      break;
    case 'sequence':
      text = `s(${node.children.map(child => serializeContent(child, loose)).join(',')})`;
      break;
    case 'styled':
      text = `y(${node.entries.map(entry => describeEntry(entry, loose)).join(';')}|${serializeContent(node.child, loose)})`;
      break;
    case 'metadata':
      text = `m<${node.label ?? ''}>(${serializeValue(node.value, loose)})`;
      break;
    case 'element':
      text = `e:${node.kind}<${node.label ?? ''}>${serializeValue(node.fields, loose)}`;
      break;
  }
  cache.set(node, text);
  return text;
}

installContentSerializer(serializeContent);
