/**
 * Plain text dump of laid-out frames, one item per line, indented by
 * nesting depth
 */

import type { Anchor, DrawnShape, FontSpec, FrameBuilder, PageInfo } from 'quire-core';
import { formatNumber } from './format.js';

export interface TextBackendOptions {
  /** Write start/end anchors of located elements */
  anchors?: boolean;
}

export class TextBackend implements FrameBuilder {
  private lines: string[] = [];
  private depth = 0;
  private readonly anchors: boolean;

  constructor(options: TextBackendOptions = {}) {
    this.anchors = options.anchors ?? true;
  }

  startPage(page: PageInfo): void {
    const label = page.label !== null ? ` [${page.label}]` : '';
    this.write(`page ${page.number} ${size(page.width, page.height)}${label}`);
    this.depth++;
  }

  endPage(): void {
    this.depth--;
  }

  startGroup(x: number, y: number, width: number, height: number): void {
    this.write(`group ${at(x, y)} ${size(width, height)}`);
    this.depth++;
  }

  endGroup(): void {
    this.depth--;
  }

  text(x: number, y: number, text: string, width: number, font: FontSpec): void {
    const face = `${formatNumber(font.size)}/${font.weight}/${font.style}/${font.fill}`;
    this.write(`text ${at(x, y)} ${JSON.stringify(text)} w=${formatNumber(width)} ${face}`);
  }

  shape(x: number, y: number, shape: DrawnShape): void {
    if (shape.kind === 'rect') {
      this.write(`rect ${at(x, y)} ${size(shape.width, shape.height)} fill=${shape.fill ?? 'none'}`);
    } else {
      this.write(`line ${at(x, y)} w=${formatNumber(shape.width)} stroke=${formatNumber(shape.stroke)}`);
    }
  }

  image(x: number, y: number, width: number, height: number, src: string): void {
    this.write(`image ${at(x, y)} ${size(width, height)} ${src}`);
  }

  anchor(x: number, y: number, anchor: Anchor): void {
    if (!this.anchors) return;
    const label = anchor.label !== null ? ` <${anchor.label}>` : '';
    this.write(`${anchor.kind} ${anchor.element}${label} ${at(x, y)} ${anchor.location}`);
  }

  end(): void {
    this.depth = 0;
  }

  getOutput(): string {
    return this.lines.length > 0 ? this.lines.join('\n') + '\n' : '';
  }

  private write(line: string): void {
    this.lines.push('  '.repeat(this.depth) + line);
  }
}

function at(x: number, y: number): string {
  return `${formatNumber(x)},${formatNumber(y)}`;
}

function size(width: number, height: number): string {
  return `${formatNumber(width)}x${formatNumber(height)}`;
}
