/**
 * Flow primitives - the output of realization and the input of layout
 *
 * The realizer never measures anything. It emits paragraphs of inline runs,
 * blocks, spacing, breaks, shapes, placed content and tags; the layout
 * engine turns those into frames.
 */

import type { Content, LocatableNode } from '../content/content.js';
import type { FieldValue } from '../content/value.js';
import type { Location } from '../introspect/location.js';
import type { StyleChain } from '../style/chain.js';

export interface FontSpec {
  size: number;
  /** 400 regular, 700 bold */
  weight: number;
  style: 'normal' | 'italic';
  fill: string;
}

export type Spacing = { type: 'abs'; amount: number } | { type: 'fr'; fr: number };

/**
 * Start or end marker of a located element
 */
export interface Tag {
  kind: 'start' | 'end';
  location: Location;
  /** The element with all settable fields resolved */
  element: LocatableNode;
}

export type Shape =
  | { kind: 'rect'; width: number | null; height: number; fill: string | null }
  | { kind: 'line'; width: number; stroke: number };

export type InlineItem =
  | { type: 'text'; text: string; font: FontSpec }
  | { type: 'tag'; tag: Tag }
  | { type: 'linebreak' }
  | { type: 'box'; width: number | null; height: number | null; children: FlowItem[] }
  | { type: 'footnote'; entry: FlowItem[] };

export type Placement = 'auto' | 'top' | 'bottom';

export type FlowItem =
  | { type: 'par'; inlines: InlineItem[]; leading: number; indent: number; font: FontSpec }
  | {
      type: 'block';
      children: FlowItem[];
      breakable: boolean;
      height: number | null;
      inset: number;
      indent: number;
      sticky: boolean;
    }
  | { type: 'v'; spacing: Spacing; weak: boolean }
  | { type: 'shape'; shape: Shape }
  | { type: 'image'; src: string; width: number; height: number }
  | { type: 'colbreak'; weak: boolean }
  | { type: 'pagebreak'; weak: boolean; to: 'odd' | 'even' | null; page: PageConfig | null }
  | { type: 'placed'; children: FlowItem[]; placement: Placement; float: boolean; clearance: number }
  | { type: 'tag'; tag: Tag };

export interface Margins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface FootnoteConfig {
  separator: boolean;
  clearance: number;
  gap: number;
}

/**
 * Page setup in effect for a run of pages
 */
export interface PageConfig {
  width: number;
  height: number;
  margin: Margins;
  columns: number;
  gutter: number;
  header: Content | null;
  footer: Content | null;
  numbering: FieldValue;
  footnotes: FootnoteConfig;
  /** Chain the header and footer are realized with */
  chain: StyleChain;
}

export interface ParProps {
  leading: number;
  spacing: number;
  indent: number;
}

/**
 * Accumulates flow items, grouping adjacent inline items into paragraphs
 */
export class FlowBuilder {
  private items: FlowItem[] = [];
  private inlines: InlineItem[] | null = null;
  private par: { props: ParProps; font: FontSpec } | null = null;

  constructor(private parProps: (chain: StyleChain) => ParProps) {}

  /**
   * Whether a paragraph is open
   */
  get inParagraph(): boolean {
    return this.inlines !== null;
  }

  text(text: string, font: FontSpec, chain: StyleChain): void {
    if (text.length === 0) return;
    const inlines = this.open(chain, font);
    const last = inlines[inlines.length - 1];
    if (last && last.type === 'text' && sameFont(last.font, font)) {
      inlines[inlines.length - 1] = { type: 'text', text: last.text + text, font };
    } else {
      inlines.push({ type: 'text', text, font });
    }
  }

  inline(item: InlineItem, chain: StyleChain, font: FontSpec): void {
    this.open(chain, font).push(item);
  }

  /**
   * Tags follow whatever surrounds them
   */
  tag(tag: Tag): void {
    if (this.inlines) {
      this.inlines.push({ type: 'tag', tag });
    } else {
      this.items.push({ type: 'tag', tag });
    }
  }

  /**
   * Block-level item; ends the current paragraph
   */
  block(item: FlowItem): void {
    this.parbreak();
    this.items.push(item);
  }

  parbreak(): void {
    const inlines = this.inlines;
    const par = this.par;
    this.inlines = null;
    this.par = null;
    if (!inlines || !par) return;

    if (!inlines.some(isVisibleInline)) {
      for (const item of inlines) {
        if (item.type === 'tag') this.items.push(item);
      }
      return;
    }
    const spacing: FlowItem = { type: 'v', spacing: { type: 'abs', amount: par.props.spacing }, weak: true };
    this.items.push(spacing);
    this.items.push({
      type: 'par',
      inlines,
      leading: par.props.leading,
      indent: par.props.indent,
      font: par.font,
    });
    this.items.push({ ...spacing });
  }

  finish(): FlowItem[] {
    this.parbreak();
    const items = this.items;
    this.items = [];
    return items;
  }

  private open(chain: StyleChain, font: FontSpec): InlineItem[] {
    if (!this.inlines) {
      this.inlines = [];
      this.par = { props: this.parProps(chain), font };
    }
    return this.inlines;
  }
}

function isVisibleInline(item: InlineItem): boolean {
  switch (item.type) {
    case 'text':
      return item.text.trim().length > 0;
    case 'tag':
      return false;
    default:
      return true;
  }
}

export function sameFont(a: FontSpec, b: FontSpec): boolean {
  return a.size === b.size && a.weight === b.weight && a.style === b.style && a.fill === b.fill;
}
