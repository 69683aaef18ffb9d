/**
 * Chunks - flow items measured for a given width
 *
 * Paragraphs become one frame per line, breakable blocks dissolve into
 * their children and unbreakable blocks are stacked into a single frame.
 * Regions are then filled chunk by chunk.
 */

import type { LayoutOverflowWarning } from '../diag.js';
import type { FlowItem, Placement, Tag } from '../realize/flow.js';
import { FlowColumn } from './column.js';
import { Frame } from './frame.js';
import { layoutParagraph } from './inline.js';
import type { TextMeasurer } from './measure.js';

export interface FrameChunk {
  type: 'frame';
  frame: Frame;
  dx: number;
  /** Entries of footnotes whose markers sit in this frame */
  footnotes: FlowItem[][];
  /** Keep in the region of the following frame */
  sticky: boolean;
}

export interface FloatChunk {
  type: 'float';
  frame: Frame;
  dx: number;
  footnotes: FlowItem[][];
  placement: Placement;
  clearance: number;
}

export type Chunk =
  | FrameChunk
  | FloatChunk
  | { type: 'space'; amount: number; weak: boolean }
  | { type: 'fr'; fr: number; weak: boolean }
  | { type: 'tag'; tag: Tag }
  | { type: 'colbreak'; weak: boolean }
  | { type: 'overlay'; frame: Frame; dx: number; placement: Placement };

export interface LayoutContext {
  readonly measurer: TextMeasurer;
  warn(warning: LayoutOverflowWarning): void;
}

export function collect(items: readonly FlowItem[], width: number, cx: LayoutContext, dx = 0): Chunk[] {
  const chunks: Chunk[] = [];
  for (const item of items) {
    switch (item.type) {
      case 'par':
        layoutParagraph(item, width, cx).forEach((line, i) => {
          if (i > 0) chunks.push({ type: 'space', amount: item.leading, weak: true });
          chunks.push({ type: 'frame', frame: line.frame, dx, footnotes: line.footnotes, sticky: false });
        });
        break;
      case 'block': {
        const inner = Math.max(0, width - item.indent - 2 * item.inset);
        if (item.breakable) {
          if (item.inset > 0) chunks.push({ type: 'space', amount: item.inset, weak: false });
          const children = collect(item.children, inner, cx, dx + item.indent + item.inset);
          if (item.sticky) markLastSticky(children);
          chunks.push(...children);
          if (item.inset > 0) chunks.push({ type: 'space', amount: item.inset, weak: false });
          break;
        }
        const { frame, footnotes } = stack(collect(item.children, inner, cx), inner);
        const outer = (Number.isFinite(inner) ? inner : frame.width) + 2 * item.inset;
        const block = new Frame(outer, item.height ?? frame.height + 2 * item.inset);
        block.pushFrame(item.inset, item.inset, frame);
        chunks.push({ type: 'frame', frame: block, dx: dx + item.indent, footnotes, sticky: item.sticky });
        break;
      }
      case 'v':
        chunks.push(
          item.spacing.type === 'fr'
            ? { type: 'fr', fr: item.spacing.fr, weak: item.weak }
            : { type: 'space', amount: item.spacing.amount, weak: item.weak }
        );
        break;
      case 'shape': {
        const shape = item.shape;
        const frame =
          shape.kind === 'rect'
            ? new Frame(shape.width ?? finite(width), shape.height)
            : new Frame(shape.width, shape.stroke);
        frame.push({
          type: 'shape',
          x: 0,
          y: 0,
          shape: shape.kind === 'rect' ? { ...shape, width: frame.width } : shape,
        });
        chunks.push({ type: 'frame', frame, dx, footnotes: [], sticky: false });
        break;
      }
      case 'image': {
        const frame = new Frame(item.width, item.height);
        frame.push({ type: 'image', x: 0, y: 0, width: item.width, height: item.height, src: item.src });
        chunks.push({ type: 'frame', frame, dx, footnotes: [], sticky: false });
        break;
      }
      case 'colbreak':
        chunks.push({ type: 'colbreak', weak: item.weak });
        break;
      case 'pagebreak':
        // Page runs are split before collecting; containers reject breaks
        break;
      case 'placed': {
        const { frame, footnotes } = stack(collect(item.children, width, cx), width);
        chunks.push(
          item.float
            ? { type: 'float', frame, dx, footnotes, placement: item.placement, clearance: item.clearance }
            : { type: 'overlay', frame, dx, placement: item.placement }
        );
        break;
      }
      case 'tag':
        chunks.push({ type: 'tag', tag: item.tag });
        break;
    }
  }
  return chunks;
}

function finite(width: number): number {
  return Number.isFinite(width) ? width : 0;
}

function markLastSticky(chunks: Chunk[]): void {
  for (let i = chunks.length - 1; i >= 0; i--) {
    const chunk = chunks[i];
    if (chunk.type === 'frame') {
      chunks[i] = { ...chunk, sticky: true };
      return;
    }
  }
}

/**
 * Stack chunks into one frame of unbounded height. Floats stay in the flow;
 * footnotes are handed to the caller.
 */
export function stack(chunks: readonly Chunk[], width: number): { frame: Frame; footnotes: FlowItem[][] } {
  const column = new FlowColumn();
  const footnotes: FlowItem[][] = [];
  for (const chunk of chunks) {
    switch (chunk.type) {
      case 'frame':
      case 'float':
        column.frame(chunk.frame, chunk.dx);
        footnotes.push(...chunk.footnotes);
        break;
      case 'space':
        if (chunk.weak) {
          column.weak(chunk.amount);
        } else {
          column.strong(chunk.amount);
        }
        break;
      case 'fr':
        column.fr(chunk.fr, chunk.weak);
        break;
      case 'tag':
        column.tag(chunk.tag);
        break;
      case 'overlay':
        column.overlay(chunk.frame, chunk.dx, chunk.placement);
        break;
      case 'colbreak':
        break;
    }
  }
  const frame = new Frame(finite(width), 0);
  const overlays = column.finish(frame, 0, 0, null);
  frame.height = column.height;
  if (!Number.isFinite(width)) frame.width = frame.contentWidth();
  for (const overlay of overlays) {
    const y =
      overlay.placement === 'top' ? 0 : overlay.placement === 'bottom' ? frame.height - overlay.frame.height : overlay.at;
    frame.pushFrame(overlay.dx, y, overlay.frame);
  }
  return { frame, footnotes };
}
