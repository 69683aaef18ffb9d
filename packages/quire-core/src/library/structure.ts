/**
 * Structural kinds: headings, lists, figures, footnotes, outline, references
 */

import { StyleError } from '../diag.js';
import {
  type Content,
  type ElementNode,
  makeElement,
  makeStyled,
  toContent,
} from '../content/content.js';
import {
  type ElementKind,
  isBool,
  isContentValue,
  isNonNegative,
  isStr,
  oneOf,
  orNone,
} from '../content/elements.js';
import { type FieldValue, isContent, isFieldArray } from '../content/value.js';
import type { Location } from '../introspect/location.js';
import { type ContextApi, context } from '../realize/context.js';
import { type LookContext, asContent, boolField, contentField, numberField, optionalNumber, stringField } from '../realize/look.js';
import { applyNumbering, isNumbering } from '../realize/numbering.js';
import { isSelector, kindSelector, labelSelector } from '../selector/selector.js';
import { set } from '../style/styles.js';

const HEADING_STYLES = [14, 12, 11].map(size => set('text', { size, weight: 700 }));

const isPositiveInt = (value: FieldValue): boolean => typeof value === 'number' && Number.isInteger(value) && value >= 1;

export const heading: ElementKind = {
  name: 'heading',
  display: 'block',
  locatable: true,
  params: {
    body: { required: true, check: isContentValue, expected: 'content' },
    level: { default: 1, check: isPositiveInt, expected: 'a positive integer' },
    numbering: { default: null, check: orNone(isNumbering), expected: 'a numbering pattern or function' },
    outlined: { default: true, check: isBool, expected: 'a boolean' },
    supplement: { default: 'Section', check: orNone(isContentValue), expected: 'content or none' },
  },
  counter: (_element, fields) => {
    const level = fields.get('level');
    return { key: 'heading', level: typeof level === 'number' ? level : 1 };
  },
  styles: (_element, fields) => {
    const level = fields.get('level');
    const index = typeof level === 'number' ? Math.min(level, HEADING_STYLES.length) - 1 : 0;
    return HEADING_STYLES[index];
  },
  look: (element, cx) => {
    const numbering = element.fields['numbering'] ?? null;
    const location = cx.location;
    let prefix: string | null = null;
    if (numbering !== null && location) {
      const value = cx.introspect(introspector => introspector.counter('heading').at(location));
      prefix = `${applyNumbering(numbering, value)} `;
    }
    const body = toContent([prefix, contentField(element, 'body')]);
    return makeElement('block', { body, breakable: false, sticky: true, above: 14, below: 8 });
  },
};

export const list: ElementKind = {
  name: 'list',
  display: 'block',
  params: {
    children: {
      required: true,
      check: value => isFieldArray(value) && value.every(isContentValue),
      expected: 'an array of content',
    },
    marker: { default: '•', check: isContentValue, expected: 'content' },
    indent: { default: 0, check: isNonNegative, expected: 'a length' },
    spacing: { default: null, check: orNone(isNonNegative), expected: 'a length or none' },
  },
  look: (element, cx) => {
    const parSpacing = cx.get('par', 'spacing');
    const spacing = optionalNumber(element, 'spacing') ?? (typeof parSpacing === 'number' ? parSpacing : 10);
    const marker = contentField(element, 'marker');
    const children = element.fields['children'];
    if (!isFieldArray(children)) return null;
    for (const child of children) {
      const item = toContent([marker, ' ', asContent(child)]);
      cx.builder.block({ type: 'v', spacing: { type: 'abs', amount: spacing }, weak: true });
      cx.builder.block({
        type: 'block',
        children: cx.realizeBlock(item),
        breakable: true,
        height: null,
        inset: 0,
        indent: numberField(element, 'indent'),
        sticky: false,
      });
      cx.builder.block({ type: 'v', spacing: { type: 'abs', amount: spacing }, weak: true });
    }
    return null;
  },
};

export const figure: ElementKind = {
  name: 'figure',
  display: 'block',
  locatable: true,
  params: {
    body: { required: true, check: isContentValue, expected: 'content' },
    caption: { default: null, check: orNone(isContentValue), expected: 'content or none' },
    kind: { default: 'image', check: isStr, expected: 'a string' },
    supplement: { default: 'Figure', check: orNone(isContentValue), expected: 'content or none' },
    numbering: { default: '1', check: orNone(isNumbering), expected: 'a numbering pattern or function' },
    placement: { default: null, check: orNone(oneOf('auto', 'top', 'bottom')), expected: '"auto", "top", "bottom" or none' },
  },
  counter: (_element, fields) => {
    const kind = fields.get('kind');
    return { key: `figure:${typeof kind === 'string' ? kind : 'image'}`, level: 1 };
  },
  look: (element, cx) => {
    const caption = contentField(element, 'caption');
    const numbering = element.fields['numbering'] ?? null;
    const location = cx.location;
    let label: Content | null = null;
    if (caption) {
      let number: string | null = null;
      if (numbering !== null && location) {
        const key = `figure:${stringField(element, 'kind', 'image')}`;
        number = applyNumbering(numbering, cx.introspect(introspector => introspector.counter(key).at(location)));
      }
      const supplement = contentField(element, 'supplement');
      label = toContent([supplement, number !== null ? ` ${number}` : null, ': ', caption]);
    }
    const body = toContent([contentField(element, 'body'), makeElement('parbreak'), label]);
    const inner = makeElement('block', { body, breakable: false });
    const placement = element.fields['placement'] ?? null;
    if (placement === null) return inner;
    return makeElement('place', { body: inner, placement, float: true });
  },
};

export const footnote: ElementKind = {
  name: 'footnote',
  display: 'inline',
  locatable: true,
  params: {
    body: { required: true, check: isContentValue, expected: 'content' },
    numbering: { default: '1', check: isNumbering, expected: 'a numbering pattern or function' },
  },
  counter: () => ({ key: 'footnote', level: 1 }),
  look: (element, cx) => {
    const marker = footnoteNumber(element, cx.location, cx.introspect);
    cx.builder.text(marker, cx.font(), cx.chain);
    const entry = makeElement('footnote.entry', { note: element });
    cx.builder.inline({ type: 'footnote', entry: cx.realizeBlock(entry) }, cx.chain, cx.font());
    return null;
  },
};

function footnoteNumber(
  note: ElementNode,
  location: Location | null,
  introspect: LookContext['introspect']
): string {
  if (!location) return '';
  const value = introspect(introspector => introspector.counter('footnote').at(location));
  return applyNumbering(note.fields['numbering'] ?? '1', value);
}

export const footnoteEntry: ElementKind = {
  name: 'footnote.entry',
  display: 'block',
  params: {
    note: { required: true, check: isContent, expected: 'a footnote' },
    separator: { default: true, check: isBool, expected: 'a boolean' },
    clearance: { default: 8, check: isNonNegative, expected: 'a length' },
    gap: { default: 4, check: isNonNegative, expected: 'a length' },
    indent: { default: 0, check: isNonNegative, expected: 'a length' },
    size: { default: 8, check: isNonNegative, expected: 'a size in points' },
  },
  look: (element, cx) => {
    const note = element.fields['note'];
    if (!isContent(note) || note.type !== 'element') {
      throw new StyleError('footnote entry needs a footnote', element.span);
    }
    const number = footnoteNumber(note, cx.locationOf(note), cx.introspect);
    const body = makeStyled(
      toContent([number, ' ', contentField(note, 'body')]),
      set('text', { size: numberField(element, 'size', 8) })
    );
    cx.builder.block({
      type: 'block',
      children: cx.realizeBlock(body),
      breakable: true,
      height: null,
      inset: 0,
      indent: numberField(element, 'indent'),
      sticky: false,
    });
    return null;
  },
};

/**
 * Counter key and numbering used to refer to an element
 */
function referenceNumber(api: ContextApi, element: ElementNode, location: Location): string | null {
  const numbering = element.fields['numbering'] ?? null;
  if (numbering === null) return null;
  let key: string;
  switch (element.kind) {
    case 'heading':
      key = 'heading';
      break;
    case 'figure':
      key = `figure:${stringField(element, 'kind', 'image')}`;
      break;
    case 'footnote':
      key = 'footnote';
      break;
    default:
      return null;
  }
  return applyNumbering(numbering, api.counter(key).at(location));
}

export const ref: ElementKind = {
  name: 'ref',
  display: 'inline',
  params: {
    target: { required: true, check: isStr, expected: 'a label' },
    supplement: { default: null, check: orNone(isContentValue), expected: 'content or none' },
  },
  look: element => {
    const target = stringField(element, 'target');
    const own = contentField(element, 'supplement');
    return context(api => {
      const location = api.locate(target);
      const [found] = api.query(labelSelector(target));
      const referenced = found?.element;
      if (!referenced || referenced.type !== 'element') {
        throw new StyleError(`cannot reference \`<${target}>\`: it is not an element`, element.span);
      }
      const number = referenceNumber(api, referenced, location);
      if (number === null) {
        throw new StyleError(`cannot reference ${referenced.kind} \`<${target}>\` without numbering`, element.span, [
          'set a numbering on the referenced element',
        ]);
      }
      const supplement = own ?? asContent(referenced.fields['supplement']);
      return supplement ? [supplement, ` ${number}`] : number;
    });
  },
};

export const outline: ElementKind = {
  name: 'outline',
  display: 'block',
  params: {
    title: { default: 'Contents', check: orNone(isContentValue), expected: 'content or none' },
    target: { default: kindSelector('heading'), check: isSelector, expected: 'a selector' },
    depth: { default: null, check: orNone(isPositiveInt), expected: 'a positive integer or none' },
    indent: { default: 10, check: isNonNegative, expected: 'a length' },
  },
  look: element => {
    const target = element.fields['target'];
    const selector = isSelector(target) ? target : kindSelector('heading');
    const depth = optionalNumber(element, 'depth');
    const indent = numberField(element, 'indent', 10);
    const title = contentField(element, 'title');
    const titleBlock = title
      ? makeElement('block', {
          body: makeStyled(title, set('text', { size: 14, weight: 700 })),
          breakable: false,
          sticky: true,
        })
      : null;
    const entries = context(api =>
      api.query(selector).flatMap(({ element: entry, location }) => {
        if (entry.type !== 'element' || !boolField(entry, 'outlined', true)) return [];
        const level = numberField(entry, 'level', 1);
        if (depth !== null && level > depth) return [];
        const number = referenceNumber(api, entry, location);
        const body = toContent([
          number !== null ? `${number} ` : null,
          contentField(entry, 'body'),
          ` ${api.page(location)}`,
        ]);
        return [makeElement('par', { body, 'first-line-indent': (level - 1) * indent })];
      })
    );
    return toContent([titleBlock, entries]);
  },
};
