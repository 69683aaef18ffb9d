/**
 * Frame builder interface - exporter abstraction
 *
 * The core never writes files. emitDocument walks the finished pages in
 * order and reports every item to a FrameBuilder; backends turn those calls
 * into an output format.
 */

import type { Label } from './content/content.js';
import type { CompiledDocument } from './engine/compile.js';
import { Introspector } from './introspect/introspector.js';
import type { DrawnShape, Frame } from './layout/frame.js';
import type { FontSpec } from './realize/flow.js';
import { applyNumbering } from './realize/numbering.js';

export interface PageInfo {
  number: number;
  width: number;
  height: number;
  /**
   * Page counter formatted with the page numbering, if any. Pages the page
   * counter never reached use their physical number.
   */
  label: string | null;
}

/**
 * Start or end of a located element
 */
export interface Anchor {
  kind: 'start' | 'end';
  location: string;
  element: string;
  label: Label | null;
}

export interface FrameBuilder {
  startPage(page: PageInfo): void;
  endPage(): void;

  /**
   * Nested frame; coordinates inside are relative to it
   */
  startGroup(x: number, y: number, width: number, height: number): void;
  endGroup(): void;

  text(x: number, y: number, text: string, width: number, font: FontSpec): void;
  shape(x: number, y: number, shape: DrawnShape): void;
  image(x: number, y: number, width: number, height: number, src: string): void;
  anchor(x: number, y: number, anchor: Anchor): void;

  /**
   * Finish output
   */
  end(): void;

  /**
   * Get the generated output (for backends that buffer output)
   */
  getOutput?(): string;
}

export function emitDocument(
  doc: Pick<CompiledDocument, 'pages'> & Partial<Pick<CompiledDocument, 'introspector'>>,
  builder: FrameBuilder
): void {
  const introspector = doc.introspector ?? new Introspector(doc.pages, null);
  for (const page of doc.pages) {
    const counter = introspector.counterAfterPage('page', page.number) ?? [page.number];
    builder.startPage({
      number: page.number,
      width: page.frame.width,
      height: page.frame.height,
      label: page.numbering !== null ? applyNumbering(page.numbering, counter) : null,
    });
    emitFrame(page.frame, builder);
    builder.endPage();
  }
  builder.end();
}

function emitFrame(frame: Frame, builder: FrameBuilder): void {
  for (const item of frame.items) {
    switch (item.type) {
      case 'text':
        builder.text(item.x, item.y, item.text, item.width, item.font);
        break;
      case 'group':
        builder.startGroup(item.x, item.y, item.frame.width, item.frame.height);
        emitFrame(item.frame, builder);
        builder.endGroup();
        break;
      case 'shape':
        builder.shape(item.x, item.y, item.shape);
        break;
      case 'image':
        builder.image(item.x, item.y, item.width, item.height, item.src);
        break;
      case 'tag': {
        const element = item.tag.element;
        builder.anchor(item.x, item.y, {
          kind: item.tag.kind,
          location: item.tag.location.key,
          element: element.type === 'metadata' ? 'metadata' : element.kind,
          label: element.label,
        });
        break;
      }
    }
  }
}
