/**
 * Region composer - fills regions of one page run with chunks
 *
 * Each region is filled greedily. Footnote entries go to the bottom of the
 * region holding their marker; when the first line of an entry does not
 * fit, the region is filled again up to the chunk before the marker so
 * that the marker moves on together with its note.
 */

import { LayoutOverflowWarning } from '../diag.js';
import type { FlowItem, FootnoteConfig, Placement, Tag } from '../realize/flow.js';
import { type Chunk, type FloatChunk, type FrameChunk, type LayoutContext, collect } from './chunks.js';
import { EPSILON, FlowColumn, type Overlay } from './column.js';
import { Frame } from './frame.js';

const MAX_FOOTNOTE_RETRIES = 32;

/** Stroke of the footnote separator line */
const SEPARATOR_STROKE = 0.5;

export interface Region {
  width: number;
  height: number;
}

/**
 * One line of a footnote entry
 */
interface NoteLine {
  frame: Frame;
  dx: number;
  /** Spacing above the line within its entry */
  before: number;
  /** First line of an entry */
  first: boolean;
  tags: Tag[];
}

interface PlacedFloat {
  frame: Frame;
  dx: number;
  clearance: number;
}

interface Attempt {
  pos: number;
  deferred: FloatChunk[];
  spill: NoteLine[];
  column: FlowColumn;
  top: PlacedFloat[];
  bottom: PlacedFloat[];
  notes: NoteLine[];
  notesHeight: number;
  /** Index of a chunk whose footnote did not fit */
  miss: number | null;
  warnings: LayoutOverflowWarning[];
}

export class Composer {
  private chunks: Chunk[];
  private pos = 0;
  private deferred: FloatChunk[] = [];
  private spill: NoteLine[] = [];
  private noteCache = new Map<FlowItem[], NoteLine[]>();

  constructor(
    chunks: readonly Chunk[],
    private region: Region,
    private footnotes: FootnoteConfig,
    private cx: LayoutContext
  ) {
    // Floats too tall for any region go in-flow at the end of the run
    const kept: Chunk[] = [];
    const oversized: FrameChunk[] = [];
    for (const chunk of chunks) {
      if (chunk.type === 'float' && chunk.frame.height + chunk.clearance > region.height + EPSILON) {
        cx.warn(new LayoutOverflowWarning('floating content is taller than the region and was placed in the flow'));
        oversized.push({ type: 'frame', frame: chunk.frame, dx: chunk.dx, footnotes: chunk.footnotes, sticky: false });
      } else {
        kept.push(chunk);
      }
    }
    this.chunks = [...kept, ...oversized];
  }

  get done(): boolean {
    return this.pos >= this.chunks.length && this.deferred.length === 0 && this.spill.length === 0;
  }

  /**
   * Fill the next region
   */
  next(): Frame {
    let attempt = this.attempt(this.chunks.length);
    for (let retry = 0; attempt.miss !== null && retry < MAX_FOOTNOTE_RETRIES; retry++) {
      if (process.env.DEBUG_LAYOUT) {
        console.error(`DEBUG_LAYOUT: footnote of chunk ${attempt.miss} does not fit, refilling region`);
      }
      attempt = this.attempt(attempt.miss);
    }
    for (const warning of attempt.warnings) this.cx.warn(warning);
    this.pos = attempt.pos;
    this.deferred = attempt.deferred;
    this.spill = attempt.spill;
    return this.build(attempt);
  }

  private noteLines(entry: FlowItem[]): NoteLine[] {
    const cached = this.noteCache.get(entry);
    if (cached) return cached;
    const lines: NoteLine[] = [];
    let before = 0;
    let tags: Tag[] = [];
    const nested: FlowItem[][] = [];
    for (const chunk of collect(entry, this.region.width, this.cx)) {
      switch (chunk.type) {
        case 'space':
          before = chunk.weak ? Math.max(before, chunk.amount) : before + chunk.amount;
          break;
        case 'tag':
          tags.push(chunk.tag);
          break;
        case 'frame':
        case 'float':
        case 'overlay':
          lines.push({ frame: chunk.frame, dx: chunk.dx, before: lines.length === 0 ? 0 : before, first: lines.length === 0, tags });
          if (chunk.type !== 'overlay') nested.push(...chunk.footnotes);
          before = 0;
          tags = [];
          break;
        default:
          break;
      }
    }
    const last = lines[lines.length - 1];
    if (last) {
      last.tags.push(...tags);
    } else if (tags.length > 0) {
      lines.push({ frame: new Frame(this.region.width, 0), dx: 0, before: 0, first: true, tags });
    }
    for (const inner of nested) lines.push(...this.noteLines(inner));
    this.noteCache.set(entry, lines);
    return lines;
  }

  private attempt(limit: number): Attempt {
    const { height } = this.region;
    const config = this.footnotes;
    const column = new FlowColumn();
    const top: PlacedFloat[] = [];
    const bottom: PlacedFloat[] = [];
    const deferred: FloatChunk[] = [];
    const notes: NoteLine[] = [];
    const spill: NoteLine[] = [];
    const warnings: LayoutOverflowWarning[] = [];
    let floatsHeight = 0;
    let notesHeight = 0;

    const available = (): number => height - floatsHeight - notesHeight;
    const noteCost = (line: NoteLine, count: number): number =>
      (count === 0 ? config.clearance : line.first ? config.gap : line.before) + line.frame.height;
    const addNote = (line: NoteLine): void => {
      notesHeight += noteCost(line, notes.length);
      notes.push(line);
    };
    const placeFloat = (chunk: FloatChunk, placement: Placement): void => {
      const placed = { frame: chunk.frame, dx: chunk.dx, clearance: chunk.clearance };
      if (placement === 'bottom') {
        bottom.push(placed);
      } else {
        top.push(placed);
      }
      floatsHeight += chunk.frame.height + chunk.clearance;
    };
    // Lines after the first of an entry fill what is left, the rest spills
    const addEntries = (entries: readonly FlowItem[][], forced: boolean): void => {
      for (const entry of entries) {
        for (const line of this.noteLines(entry)) {
          const fits = column.height + noteCost(line, notes.length) <= available() + EPSILON;
          if (spill.length === 0 && (fits || (forced && line.first))) {
            addNote(line);
          } else {
            spill.push(line);
          }
        }
      }
    };

    for (const chunk of this.deferred) {
      const need = chunk.frame.height + chunk.clearance;
      if (deferred.length === 0 && floatsHeight + need <= height + EPSILON) {
        placeFloat(chunk, chunk.placement === 'bottom' ? 'bottom' : 'top');
        addEntries(chunk.footnotes, false);
      } else {
        deferred.push(chunk);
      }
    }
    for (const line of this.spill) {
      const fits = noteCost(line, notes.length) <= available() + EPSILON;
      if (spill.length === 0 && (fits || notes.length === 0)) {
        addNote(line);
      } else {
        spill.push(line);
      }
    }

    let pos = this.pos;
    let miss: number | null = null;
    scan: while (pos < limit) {
      const chunk = this.chunks[pos];
      switch (chunk.type) {
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
          pos++;
          if (chunk.weak && column.isEmpty) continue;
          break scan;
        case 'float': {
          const need = chunk.frame.height + chunk.clearance;
          const placement =
            chunk.placement === 'auto' ? (column.height < available() / 2 ? 'top' : 'bottom') : chunk.placement;
          if (deferred.length === 0 && column.fits(need, available())) {
            placeFloat(chunk, placement);
            addEntries(chunk.footnotes, false);
          } else {
            deferred.push(chunk);
          }
          break;
        }
        case 'frame': {
          if (column.isEmpty) {
            if (!column.fits(chunk.frame.height, available())) {
              warnings.push(new LayoutOverflowWarning('content does not fit into the region and overflows it'));
            }
            column.frame(chunk.frame, chunk.dx);
            addEntries(chunk.footnotes, true);
            break;
          }
          if (!column.fits(chunk.frame.height + this.stickyNeed(pos, limit), available())) break scan;
          if (!this.notesFit(chunk, column, notes.length, available())) {
            miss = pos;
            break scan;
          }
          column.frame(chunk.frame, chunk.dx);
          addEntries(chunk.footnotes, true);
          break;
        }
      }
      pos++;
    }
    return { pos, deferred, spill, column, top, bottom, notes, notesHeight, miss, warnings };
  }

  /**
   * Room the first lines of a frame's footnotes need
   */
  private notesFit(chunk: FrameChunk, column: FlowColumn, count: number, available: number): boolean {
    let need = 0;
    let placed = count;
    for (const entry of chunk.footnotes) {
      const [first] = this.noteLines(entry);
      if (!first) continue;
      need += (placed === 0 ? this.footnotes.clearance : this.footnotes.gap) + first.frame.height;
      placed++;
    }
    return need === 0 || column.fits(chunk.frame.height + need, available);
  }

  /**
   * Extra room a sticky frame needs for the frame after it
   */
  private stickyNeed(index: number, limit: number): number {
    const chunk = this.chunks[index];
    if (chunk.type !== 'frame' || !chunk.sticky) return 0;
    let between = 0;
    for (let i = index + 1; i < this.chunks.length; i++) {
      const next = this.chunks[i];
      if (next.type === 'space') {
        between += next.amount;
      } else if (next.type === 'frame') {
        return i < limit ? between + next.frame.height : Number.POSITIVE_INFINITY;
      } else if (next.type === 'colbreak') {
        return 0;
      }
    }
    return 0;
  }

  private build(attempt: Attempt): Frame {
    const { width, height } = this.region;
    const frame = new Frame(width, height);
    let y = 0;
    for (const float of attempt.top) {
      frame.pushFrame(float.dx, y, float.frame);
      y += float.frame.height + float.clearance;
    }
    const bottomHeight = attempt.bottom.reduce((sum, float) => sum + float.frame.height + float.clearance, 0);
    const flowHeight = height - y - bottomHeight - attempt.notesHeight;
    const overlays = attempt.column.finish(frame, 0, y, flowHeight);

    let by = height - attempt.notesHeight - bottomHeight;
    for (const float of attempt.bottom) {
      by += float.clearance;
      frame.pushFrame(float.dx, by, float.frame);
      by += float.frame.height;
    }

    if (attempt.notes.length > 0) {
      let ny = height - attempt.notesHeight;
      if (this.footnotes.separator) {
        frame.push({ type: 'shape', x: 0, y: ny, shape: { kind: 'line', width: width / 3, stroke: SEPARATOR_STROKE } });
      }
      attempt.notes.forEach((line, i) => {
        ny += i === 0 ? this.footnotes.clearance : line.first ? this.footnotes.gap : line.before;
        for (const tag of line.tags) frame.push({ type: 'tag', x: line.dx, y: ny, tag });
        frame.pushFrame(line.dx, ny, line.frame);
        ny += line.frame.height;
      });
    }

    this.placeOverlays(frame, overlays, y);
    if (process.env.DEBUG_LAYOUT) {
      console.error(
        `DEBUG_LAYOUT: region filled up to chunk ${attempt.pos}/${this.chunks.length}` +
          ` (${attempt.top.length + attempt.bottom.length} float(s), ${attempt.notes.length} footnote line(s))`
      );
    }
    return frame;
  }

  private placeOverlays(frame: Frame, overlays: readonly Overlay[], flowTop: number): void {
    for (const overlay of overlays) {
      const y =
        overlay.placement === 'top'
          ? 0
          : overlay.placement === 'bottom'
            ? frame.height - overlay.frame.height
            : flowTop + overlay.at;
      frame.pushFrame(overlay.dx, y, overlay.frame);
    }
  }
}
