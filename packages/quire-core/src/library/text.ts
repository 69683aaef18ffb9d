/**
 * Text and paragraph kinds
 */

import { makeStyled } from '../content/content.js';
import {
  type ElementKind,
  isContentValue,
  isNonNegative,
  isNumber,
  oneOf,
} from '../content/elements.js';
import { set } from '../style/styles.js';
import { contentField, numberField, stringField } from '../realize/look.js';

/**
 * `text` is mostly a target for set rules; as an element it styles its body
 */
export const text: ElementKind = {
  name: 'text',
  display: 'inline',
  params: {
    body: { required: true, check: isContentValue, expected: 'content' },
    size: { default: 10, check: isNonNegative, expected: 'a size in points' },
    weight: { default: 400, check: isNumber, expected: 'a font weight' },
    style: { default: 'normal', check: oneOf('normal', 'italic'), expected: '"normal" or "italic"' },
    fill: { default: 'black', check: value => typeof value === 'string', expected: 'a color name' },
  },
  look: element => {
    const body = contentField(element, 'body');
    if (!body) return null;
    return makeStyled(
      body,
      set('text', {
        size: numberField(element, 'size', 10),
        weight: numberField(element, 'weight', 400),
        style: stringField(element, 'style', 'normal'),
        fill: stringField(element, 'fill', 'black'),
      })
    );
  },
};

export const strong: ElementKind = {
  name: 'strong',
  display: 'inline',
  params: {
    body: { required: true, check: isContentValue, expected: 'content' },
    delta: { default: 300, check: isNumber, expected: 'a weight difference' },
  },
  look: (element, cx) => {
    const body = contentField(element, 'body');
    if (!body) return null;
    const weight = cx.font().weight + numberField(element, 'delta', 300);
    return makeStyled(body, set('text', { weight }));
  },
};

export const emph: ElementKind = {
  name: 'emph',
  display: 'inline',
  params: {
    body: { required: true, check: isContentValue, expected: 'content' },
  },
  look: (element, cx) => {
    const body = contentField(element, 'body');
    if (!body) return null;
    const style = cx.font().style === 'italic' ? 'normal' : 'italic';
    return makeStyled(body, set('text', { style }));
  },
};

export const linebreak: ElementKind = {
  name: 'linebreak',
  display: 'inline',
  params: {},
  look: (_element, cx) => {
    cx.builder.inline({ type: 'linebreak' }, cx.chain, cx.font());
    return null;
  },
};

/**
 * Ends the current paragraph; the realizer does that for every block kind
 */
export const parbreak: ElementKind = {
  name: 'parbreak',
  display: 'block',
  params: {},
};

export const par: ElementKind = {
  name: 'par',
  display: 'block',
  params: {
    body: { required: true, check: isContentValue, expected: 'content' },
    leading: { default: 4, check: isNonNegative, expected: 'a length' },
    spacing: { default: 10, check: isNonNegative, expected: 'a length' },
    'first-line-indent': { default: 0, check: isNonNegative, expected: 'a length' },
  },
  look: element => {
    const body = contentField(element, 'body');
    if (!body) return null;
    return makeStyled(
      body,
      set('par', {
        leading: numberField(element, 'leading', 4),
        spacing: numberField(element, 'spacing', 10),
        'first-line-indent': numberField(element, 'first-line-indent', 0),
      })
    );
  },
};
