/**
 * Inline layout - greedy line breaking of paragraphs
 */

import type { FlowItem, FontSpec, InlineItem, Tag } from '../realize/flow.js';
import { sameFont } from '../realize/flow.js';
import { type LayoutContext, collect, stack } from './chunks.js';
import { EPSILON } from './column.js';
import { Frame } from './frame.js';

export interface Line {
  frame: Frame;
  footnotes: FlowItem[][];
}

type Piece =
  | { type: 'word'; text: string; font: FontSpec; width: number }
  | { type: 'space'; font: FontSpec; width: number }
  | { type: 'tag'; tag: Tag }
  | { type: 'box'; frame: Frame; footnotes: FlowItem[][] }
  | { type: 'footnote'; entry: FlowItem[] }
  | { type: 'break' };

type Paragraph = Extract<FlowItem, { type: 'par' }>;

function pieceWidth(piece: Piece): number {
  switch (piece.type) {
    case 'word':
    case 'space':
      return piece.width;
    case 'box':
      return piece.frame.width;
    default:
      return 0;
  }
}

function toPieces(inlines: readonly InlineItem[], width: number, cx: LayoutContext): Piece[] {
  const pieces: Piece[] = [];
  for (const item of inlines) {
    switch (item.type) {
      case 'text':
        for (const part of item.text.split(/(\s+)/)) {
          if (part.length === 0) continue;
          if (/^\s+$/.test(part)) {
            pieces.push({ type: 'space', font: item.font, width: cx.measurer.width(' ', item.font) });
          } else {
            pieces.push({ type: 'word', text: part, font: item.font, width: cx.measurer.width(part, item.font) });
          }
        }
        break;
      case 'tag':
        pieces.push({ type: 'tag', tag: item.tag });
        break;
      case 'linebreak':
        pieces.push({ type: 'break' });
        break;
      case 'footnote':
        pieces.push({ type: 'footnote', entry: item.entry });
        break;
      case 'box': {
        const inner = item.width ?? width;
        const { frame, footnotes } = stack(collect(item.children, inner, cx), inner);
        const box = new Frame(item.width ?? frame.contentWidth(), item.height ?? frame.height);
        box.pushFrame(0, 0, frame);
        pieces.push({ type: 'box', frame: box, footnotes });
        break;
      }
    }
  }
  return pieces;
}

interface Run {
  x: number;
  text: string;
  width: number;
  font: FontSpec;
}

type Placed =
  | { type: 'text'; run: Run }
  | { type: 'tag'; x: number; tag: Tag }
  | { type: 'box'; x: number; frame: Frame };

class LineState {
  x: number;
  visible = false;
  readonly footnotes: FlowItem[][] = [];
  private placed: Placed[] = [];
  private run: Run | null = null;

  constructor(indent: number) {
    this.x = indent;
  }

  get isEmpty(): boolean {
    return this.placed.length === 0 && this.run === null && this.footnotes.length === 0;
  }

  space(piece: Extract<Piece, { type: 'space' }>): void {
    if (this.run && sameFont(this.run.font, piece.font)) {
      this.run.text += ' ';
      this.run.width += piece.width;
    } else {
      this.flush();
    }
    this.x += piece.width;
  }

  place(piece: Piece): void {
    switch (piece.type) {
      case 'word':
        if (this.run && sameFont(this.run.font, piece.font)) {
          this.run.text += piece.text;
          this.run.width += piece.width;
        } else {
          this.flush();
          this.run = { x: this.x, text: piece.text, width: piece.width, font: piece.font };
        }
        this.x += piece.width;
        this.visible = true;
        break;
      case 'tag':
        this.flush();
        this.placed.push({ type: 'tag', x: this.x, tag: piece.tag });
        break;
      case 'box':
        this.flush();
        this.placed.push({ type: 'box', x: this.x, frame: piece.frame });
        this.footnotes.push(...piece.footnotes);
        this.x += piece.frame.width;
        this.visible = true;
        break;
      case 'footnote':
        this.footnotes.push(piece.entry);
        break;
      case 'space':
      case 'break':
        break;
    }
  }

  tags(): Tag[] {
    const tags: Tag[] = [];
    for (const item of this.placed) {
      if (item.type === 'tag') tags.push(item.tag);
    }
    return tags;
  }

  private flush(): void {
    if (this.run) {
      this.placed.push({ type: 'text', run: this.run });
      this.run = null;
    }
  }

  /**
   * Bottom-align everything on a line as high as its tallest item
   */
  finish(width: number, par: Paragraph, cx: LayoutContext): Line {
    this.flush();
    const heightOf = (item: Placed): number => {
      switch (item.type) {
        case 'text':
          return cx.measurer.lineHeight(item.run.font);
        case 'box':
          return item.frame.height;
        case 'tag':
          return 0;
      }
    };
    let height = 0;
    for (const item of this.placed) height = Math.max(height, heightOf(item));
    if (!this.visible) height = cx.measurer.lineHeight(par.font);

    const frame = new Frame(Number.isFinite(width) ? width : this.x, height);
    for (const item of this.placed) {
      const y = height - heightOf(item);
      switch (item.type) {
        case 'text':
          frame.push({
            type: 'text',
            x: item.run.x,
            y,
            text: item.run.text,
            width: item.run.width,
            font: item.run.font,
          });
          break;
        case 'tag':
          frame.push({ type: 'tag', x: item.x, y: 0, tag: item.tag });
          break;
        case 'box':
          frame.pushFrame(item.x, y, item.frame);
          break;
      }
    }
    return { frame, footnotes: this.footnotes };
  }
}

/**
 * Break a paragraph into lines of at most `width`. Words that are wider
 * than a line get a line of their own.
 */
export function layoutParagraph(par: Paragraph, width: number, cx: LayoutContext): Line[] {
  const pieces = toPieces(par.inlines, width, cx);
  const lines: Line[] = [];
  let line = new LineState(par.indent);
  let pending: Extract<Piece, { type: 'space' }> | null = null;

  let i = 0;
  while (i < pieces.length) {
    const piece = pieces[i];
    if (piece.type === 'space') {
      if (line.visible) pending = piece;
      i++;
      continue;
    }
    if (piece.type === 'break') {
      lines.push(line.finish(width, par, cx));
      line = new LineState(0);
      pending = null;
      i++;
      continue;
    }

    // Pieces not separated by a space stay on one line
    let end = i;
    let unit = 0;
    while (end < pieces.length) {
      const next = pieces[end];
      if (next.type === 'space' || next.type === 'break') break;
      unit += pieceWidth(next);
      end++;
    }
    const gap = pending ? pending.width : 0;
    if (line.visible && line.x + gap + unit > width + EPSILON) {
      lines.push(line.finish(width, par, cx));
      line = new LineState(0);
      pending = null;
    }
    if (pending) {
      line.space(pending);
      pending = null;
    }
    for (let k = i; k < end; k++) line.place(pieces[k]);
    i = end;
  }
  const last = lines[lines.length - 1];
  if (line.visible || !last) {
    lines.push(line.finish(width, par, cx));
  } else if (!line.isEmpty) {
    // Trailing tags and notes join the last line instead of opening one
    for (const tag of line.tags()) last.frame.push({ type: 'tag', x: last.frame.width, y: 0, tag });
    last.footnotes.push(...line.footnotes);
  }
  if (process.env.DEBUG_LAYOUT) {
    console.error(`DEBUG_LAYOUT: paragraph of ${pieces.length} piece(s) broken into ${lines.length} line(s)`);
  }
  return lines;
}
