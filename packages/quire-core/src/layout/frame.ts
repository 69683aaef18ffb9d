/**
 * Frames - positioned drawable primitives
 *
 * Coordinates are relative to the frame's top-left corner, in points.
 * Item order is document order: the introspector walks items in order.
 */

import { serializeContent } from '../content/content.js';
import { type FieldValue, serializeValue } from '../content/value.js';
import type { FontSpec, Tag } from '../realize/flow.js';

export type DrawnShape =
  | { kind: 'rect'; width: number; height: number; fill: string | null }
  | { kind: 'line'; width: number; stroke: number };

export type FrameItem =
  | { type: 'text'; x: number; y: number; text: string; width: number; font: FontSpec }
  | { type: 'group'; x: number; y: number; frame: Frame }
  | { type: 'shape'; x: number; y: number; shape: DrawnShape }
  | { type: 'image'; x: number; y: number; width: number; height: number; src: string }
  | { type: 'tag'; x: number; y: number; tag: Tag };

/**
 * Item with its position resolved against the outermost frame
 */
export interface PlacedItem {
  item: FrameItem;
  x: number;
  y: number;
}

export class Frame {
  readonly items: FrameItem[] = [];

  constructor(
    public width: number,
    public height: number
  ) {}

  push(item: FrameItem): void {
    this.items.push(item);
  }

  /**
   * Nest `frame` at (x, y); empty frames are dropped
   */
  pushFrame(x: number, y: number, frame: Frame): void {
    if (frame.items.length === 0) return;
    this.items.push({ type: 'group', x, y, frame });
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * All leaf items in order, with absolute positions
   */
  *walk(originX = 0, originY = 0): Generator<PlacedItem> {
    for (const item of this.items) {
      if (item.type === 'group') {
        yield* item.frame.walk(originX + item.x, originY + item.y);
      } else {
        yield { item, x: originX + item.x, y: originY + item.y };
      }
    }
  }

  /**
   * Concatenated text of all text items
   */
  text(): string {
    const parts: string[] = [];
    for (const { item } of this.walk()) {
      if (item.type === 'text') parts.push(item.text);
    }
    return parts.join(' ');
  }

  /**
   * Right edge of the rightmost drawn item
   */
  contentWidth(): number {
    let right = 0;
    for (const { item, x } of this.walk()) {
      switch (item.type) {
        case 'text':
        case 'image':
          right = Math.max(right, x + item.width);
          break;
        case 'shape':
          right = Math.max(right, x + item.shape.width);
          break;
        default:
          break;
      }
    }
    return right;
  }

  serialize(): string {
    const parts = this.items.map(item => {
      const at = `${num(item.x)},${num(item.y)}`;
      switch (item.type) {
        case 'text':
          return `t@${at}${JSON.stringify(item.text)}/${num(item.font.size)}/${item.font.weight}/${item.font.style}/${item.font.fill}`;
        case 'group':
          return `g@${at}${item.frame.serialize()}`;
        case 'shape':
          return item.shape.kind === 'rect'
            ? `r@${at}${num(item.shape.width)}x${num(item.shape.height)}/${item.shape.fill ?? ''}`
            : `l@${at}${num(item.shape.width)}/${num(item.shape.stroke)}`;
        case 'image':
          return `i@${at}${num(item.width)}x${num(item.height)}/${item.src}`;
        case 'tag':
          return `${item.tag.kind}@${at}${item.tag.location.key}/${serializeContent(item.tag.element, true)}`;
      }
    });
    return `[${num(this.width)}x${num(this.height)}|${parts.join(';')}]`;
  }
}

function num(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}

/**
 * A finished page
 */
export interface Page {
  frame: Frame;
  /** Physical page number, starting at 1 */
  number: number;
  /** Numbering of the page configuration that produced it */
  numbering: FieldValue;
}

export function serializePage(page: Page): string {
  return `${page.number}:${serializeValue(page.numbering, true)}:${page.frame.serialize()}`;
}
