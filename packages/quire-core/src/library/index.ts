/**
 * Standard library - the built-in element kinds
 */

import { ElementRegistry } from '../content/elements.js';
import { block, box, colbreak, image, page, pagebreak, place, rect, v } from './layout.js';
import { contextKind, counterUpdateKind, metadataKind, stateUpdateKind } from './meta.js';
import { figure, footnote, footnoteEntry, heading, list, outline, ref } from './structure.js';
import { emph, linebreak, par, parbreak, strong, text } from './text.js';

export const STANDARD_KINDS = [
  text,
  strong,
  emph,
  linebreak,
  parbreak,
  par,
  block,
  box,
  rect,
  image,
  v,
  pagebreak,
  colbreak,
  place,
  page,
  heading,
  list,
  figure,
  footnote,
  footnoteEntry,
  outline,
  ref,
  counterUpdateKind,
  stateUpdateKind,
  contextKind,
  metadataKind,
];

/**
 * A registry with every built-in kind; callers may define more on it
 */
export function standardRegistry(): ElementRegistry {
  const registry = new ElementRegistry();
  for (const kind of STANDARD_KINDS) registry.define(kind);
  return registry;
}
