/**
 * XML dump of laid-out frames
 *
 * One <page> per page, one <group> per nested frame, and an empty element
 * for every text run, shape, image and anchor. Anchors are held back until
 * the next drawn item so that they sit next to the content they mark.
 */

import type { Anchor, DrawnShape, FontSpec, FrameBuilder, PageInfo } from 'quire-core';
import { escapeXml, formatNumber } from './format.js';

export interface XmlBackendOptions {
  /** Spaces per nesting level; 0 writes a flat dump */
  indent?: number;
  /** Write start/end anchors of located elements */
  anchors?: boolean;
}

type Attributes = ReadonlyArray<readonly [string, string | number | null]>;

export class XmlBackend implements FrameBuilder {
  private output = '';
  private depth = 0;
  private pendingAnchors: { x: number; y: number; anchor: Anchor }[] = [];
  private readonly indentWidth: number;
  private readonly anchors: boolean;

  constructor(options: XmlBackendOptions = {}) {
    this.indentWidth = options.indent ?? 0;
    this.anchors = options.anchors ?? true;
    this.output += '<?xml version="1.0"?>\n';
    this.output += '<document>\n';
    this.depth++;
  }

  startPage(page: PageInfo): void {
    this.open('page', [
      ['number', page.number],
      ['width', page.width],
      ['height', page.height],
      ['label', page.label],
    ]);
  }

  endPage(): void {
    this.close('page');
  }

  startGroup(x: number, y: number, width: number, height: number): void {
    this.flushPendingAnchors();
    this.open('group', [
      ['x', x],
      ['y', y],
      ['width', width],
      ['height', height],
    ]);
  }

  endGroup(): void {
    this.close('group');
  }

  text(x: number, y: number, text: string, width: number, font: FontSpec): void {
    this.flushPendingAnchors();
    const attributes = this.attributes([
      ['x', x],
      ['y', y],
      ['width', width],
      ['size', font.size],
      ['weight', font.weight],
      ['style', font.style],
      ['fill', font.fill],
    ]);
    this.line(`<text${attributes}>${escapeXml(text)}</text>`);
  }

  shape(x: number, y: number, shape: DrawnShape): void {
    this.flushPendingAnchors();
    if (shape.kind === 'rect') {
      this.empty('rect', [
        ['x', x],
        ['y', y],
        ['width', shape.width],
        ['height', shape.height],
        ['fill', shape.fill],
      ]);
    } else {
      this.empty('line', [
        ['x', x],
        ['y', y],
        ['width', shape.width],
        ['stroke', shape.stroke],
      ]);
    }
  }

  image(x: number, y: number, width: number, height: number, src: string): void {
    this.flushPendingAnchors();
    this.empty('image', [
      ['x', x],
      ['y', y],
      ['width', width],
      ['height', height],
      ['src', src],
    ]);
  }

  anchor(x: number, y: number, anchor: Anchor): void {
    if (!this.anchors) return;
    this.pendingAnchors.push({ x, y, anchor });
  }

  /**
   * Finish output
   */
  end(): void {
    this.flushPendingAnchors();
    this.depth--;
    this.output += '</document>\n';
  }

  getOutput(): string {
    return this.output;
  }

  private flushPendingAnchors(): void {
    const pending = this.pendingAnchors;
    this.pendingAnchors = [];
    for (const { x, y, anchor } of pending) {
      this.empty('anchor', [
        ['kind', anchor.kind],
        ['element', anchor.element],
        ['location', anchor.location],
        ['label', anchor.label],
        ['x', x],
        ['y', y],
      ]);
    }
  }

  private open(name: string, attributes: Attributes): void {
    this.line(`<${name}${this.attributes(attributes)}>`);
    this.depth++;
  }

  private close(name: string): void {
    this.flushPendingAnchors();
    this.depth--;
    this.line(`</${name}>`);
  }

  private empty(name: string, attributes: Attributes): void {
    this.line(`<${name}${this.attributes(attributes)}/>`);
  }

  private line(text: string): void {
    this.output += ' '.repeat(this.depth * this.indentWidth) + text + '\n';
  }

  // Attributes without a value are left out
  private attributes(attributes: Attributes): string {
    let out = '';
    for (const [key, value] of attributes) {
      if (value === null) continue;
      const text = typeof value === 'number' ? formatNumber(value) : value;
      out += ` ${key}="${escapeXml(text)}"`;
    }
    return out;
  }
}
