/**
 * Layout kinds: blocks, boxes, shapes, spacing, breaks, placement, pages
 */

import { StyleError } from '../diag.js';
import { emptyContent, makeStyled } from '../content/content.js';
import {
  type ElementKind,
  isBool,
  isContentValue,
  isNonNegative,
  isStr,
  oneOf,
  orNone,
} from '../content/elements.js';
import { type FieldValue, isDict } from '../content/value.js';
import type { FlowItem, Placement, Spacing } from '../realize/flow.js';
import {
  boolField,
  contentField,
  numberField,
  optionalNumber,
  stringField,
} from '../realize/look.js';
import { isMargin } from '../realize/page-config.js';
import { isNumbering } from '../realize/numbering.js';
import { set } from '../style/styles.js';

function fraction(value: FieldValue): number | null {
  if (!isDict(value)) return null;
  const fr = value['fr'];
  return typeof fr === 'number' && fr >= 0 ? fr : null;
}

const isSpacing = (value: FieldValue): boolean => typeof value === 'number' || fraction(value) !== null;

function spacingOf(value: FieldValue): Spacing {
  const fr = fraction(value);
  if (fr !== null) return { type: 'fr', fr };
  return { type: 'abs', amount: typeof value === 'number' ? value : 0 };
}

function weakSpace(amount: number): FlowItem {
  return { type: 'v', spacing: { type: 'abs', amount }, weak: true };
}

export const block: ElementKind = {
  name: 'block',
  display: 'block',
  params: {
    body: { default: null, check: orNone(isContentValue), expected: 'content or none' },
    breakable: { default: true, check: isBool, expected: 'a boolean' },
    above: { default: null, check: orNone(isNonNegative), expected: 'a length or none' },
    below: { default: null, check: orNone(isNonNegative), expected: 'a length or none' },
    height: { default: null, check: orNone(isNonNegative), expected: 'a length or none' },
    inset: { default: 0, check: isNonNegative, expected: 'a length' },
    sticky: { default: false, check: isBool, expected: 'a boolean' },
  },
  look: (element, cx) => {
    const spacing = cx.get('par', 'spacing');
    const fallback = typeof spacing === 'number' ? spacing : 10;
    const body = contentField(element, 'body');
    const height = optionalNumber(element, 'height');
    cx.builder.block(weakSpace(optionalNumber(element, 'above') ?? fallback));
    cx.builder.block({
      type: 'block',
      children: body ? cx.realizeBlock(body) : [],
      breakable: boolField(element, 'breakable', true) && height === null,
      height,
      inset: numberField(element, 'inset'),
      indent: 0,
      sticky: boolField(element, 'sticky'),
    });
    cx.builder.block(weakSpace(optionalNumber(element, 'below') ?? fallback));
    return null;
  },
};

export const box: ElementKind = {
  name: 'box',
  display: 'inline',
  params: {
    body: { default: null, check: orNone(isContentValue), expected: 'content or none' },
    width: { default: null, check: orNone(isNonNegative), expected: 'a length or none' },
    height: { default: null, check: orNone(isNonNegative), expected: 'a length or none' },
  },
  look: (element, cx) => {
    const body = contentField(element, 'body');
    cx.builder.inline(
      {
        type: 'box',
        width: optionalNumber(element, 'width'),
        height: optionalNumber(element, 'height'),
        children: body ? cx.realizeBlock(body) : [],
      },
      cx.chain,
      cx.font()
    );
    return null;
  },
};

export const rect: ElementKind = {
  name: 'rect',
  display: 'block',
  params: {
    width: { default: null, check: orNone(isNonNegative), expected: 'a length or none' },
    height: { default: 10, check: isNonNegative, expected: 'a length' },
    fill: { default: 'black', check: orNone(isStr), expected: 'a color name or none' },
  },
  look: (element, cx) => {
    const fill = element.fields['fill'];
    cx.builder.block({
      type: 'shape',
      shape: {
        kind: 'rect',
        width: optionalNumber(element, 'width'),
        height: numberField(element, 'height', 10),
        fill: typeof fill === 'string' ? fill : null,
      },
    });
    return null;
  },
};

export const image: ElementKind = {
  name: 'image',
  display: 'block',
  params: {
    src: { required: true, check: isStr, expected: 'a path' },
    width: { default: null, check: orNone(isNonNegative), expected: 'a length or none' },
    height: { default: null, check: orNone(isNonNegative), expected: 'a length or none' },
  },
  look: (element, cx) => {
    const width = optionalNumber(element, 'width') ?? 50;
    cx.builder.block({
      type: 'image',
      src: stringField(element, 'src'),
      width,
      height: optionalNumber(element, 'height') ?? width,
    });
    return null;
  },
};

export const v: ElementKind = {
  name: 'v',
  display: 'block',
  params: {
    amount: { required: true, check: isSpacing, expected: 'a length or a fraction' },
    weak: { default: false, check: isBool, expected: 'a boolean' },
  },
  look: (element, cx) => {
    cx.builder.block({
      type: 'v',
      spacing: spacingOf(element.fields['amount'] ?? 0),
      weak: boolField(element, 'weak'),
    });
    return null;
  },
};

export const pagebreak: ElementKind = {
  name: 'pagebreak',
  display: 'block',
  params: {
    weak: { default: false, check: isBool, expected: 'a boolean' },
    to: { default: null, check: orNone(oneOf('odd', 'even')), expected: '"odd", "even" or none' },
  },
  look: (element, cx) => {
    if (cx.container) {
      throw new StyleError('pagebreaks are not allowed inside of containers', element.span);
    }
    const to = element.fields['to'];
    cx.builder.block({
      type: 'pagebreak',
      weak: boolField(element, 'weak'),
      to: to === 'odd' || to === 'even' ? to : null,
      page: null,
    });
    return null;
  },
};

export const colbreak: ElementKind = {
  name: 'colbreak',
  display: 'block',
  params: {
    weak: { default: false, check: isBool, expected: 'a boolean' },
  },
  look: (element, cx) => {
    cx.builder.block({ type: 'colbreak', weak: boolField(element, 'weak') });
    return null;
  },
};

export const place: ElementKind = {
  name: 'place',
  display: 'block',
  params: {
    body: { required: true, check: isContentValue, expected: 'content' },
    placement: { default: 'auto', check: oneOf('auto', 'top', 'bottom'), expected: '"auto", "top" or "bottom"' },
    float: { default: false, check: isBool, expected: 'a boolean' },
    clearance: { default: 10, check: isNonNegative, expected: 'a length' },
  },
  look: (element, cx) => {
    const body = contentField(element, 'body');
    const placement = stringField(element, 'placement', 'auto');
    cx.builder.block({
      type: 'placed',
      children: body ? cx.realizeBlock(body) : [],
      placement: toPlacement(placement),
      float: boolField(element, 'float'),
      clearance: numberField(element, 'clearance', 10),
    });
    return null;
  },
};

function toPlacement(value: string): Placement {
  return value === 'top' || value === 'bottom' ? value : 'auto';
}

const PAGE_KEYS = ['width', 'height', 'margin', 'columns', 'gutter', 'header', 'footer', 'numbering'];

export const page: ElementKind = {
  name: 'page',
  display: 'block',
  params: {
    body: { default: null, check: orNone(isContentValue), expected: 'content or none' },
    width: { default: 595, check: isNonNegative, expected: 'a length' },
    height: { default: 842, check: isNonNegative, expected: 'a length' },
    margin: { default: 72, check: isMargin, expected: 'a length or a dictionary of sides' },
    columns: {
      default: 1,
      check: value => typeof value === 'number' && Number.isInteger(value) && value >= 1,
      expected: 'a positive integer',
    },
    gutter: { default: 12, check: isNonNegative, expected: 'a length' },
    header: { default: null, check: orNone(isContentValue), expected: 'content or none' },
    footer: { default: null, check: orNone(isContentValue), expected: 'content or none' },
    numbering: { default: null, check: orNone(isNumbering), expected: 'a numbering pattern or function' },
  },
  look: (element, cx) => {
    if (cx.container) {
      throw new StyleError('page configuration is not allowed inside of containers', element.span);
    }
    const fields: { [key: string]: FieldValue } = {};
    for (const key of PAGE_KEYS) {
      fields[key] = element.fields[key] ?? null;
    }
    // The realizer starts a page run for top-level page properties
    return makeStyled(contentField(element, 'body') ?? emptyContent(), set('page', fields), element.span);
  },
};
