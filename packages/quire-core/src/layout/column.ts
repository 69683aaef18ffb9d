/**
 * Vertical flow of one region or container
 *
 * Collects frames, spacing, tags and overlays top to bottom. Weak spacing
 * collapses to the largest amount of a run, is dropped before the first
 * frame and after fractional spacing, and is trimmed at the end. Weak
 * fractional spacing collapses to the largest fraction of a run and gives
 * way to strong fractional spacing.
 */

import type { Placement, Tag } from '../realize/flow.js';
import type { Frame } from './frame.js';

type ColumnEntry =
  | { type: 'frame'; frame: Frame; dx: number }
  | { type: 'space'; amount: number; weak: boolean }
  | { type: 'fr'; fr: number; weak: boolean }
  | { type: 'tag'; tag: Tag }
  | { type: 'overlay'; frame: Frame; dx: number; placement: Placement; at: number };

export interface Overlay {
  frame: Frame;
  dx: number;
  placement: Placement;
  /** Flow offset where the overlay was inserted */
  at: number;
}

export const EPSILON = 1e-6;

export class FlowColumn {
  private entries: ColumnEntry[] = [];
  private frames = 0;
  private used = 0;

  get isEmpty(): boolean {
    return this.frames === 0;
  }

  /**
   * Height including pending weak spacing
   */
  get height(): number {
    return this.used;
  }

  fits(height: number, available: number): boolean {
    return this.used + height <= available + EPSILON;
  }

  weak(amount: number): void {
    if (this.frames === 0) return;
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry.type === 'tag' || entry.type === 'overlay') continue;
      if (entry.type === 'space' && !entry.weak) continue;
      if (entry.type === 'fr') return;
      if (entry.type === 'space') {
        if (amount > entry.amount) {
          this.used += amount - entry.amount;
          entry.amount = amount;
        }
        return;
      }
      break;
    }
    this.entries.push({ type: 'space', amount, weak: true });
    this.used += amount;
  }

  strong(amount: number): void {
    this.entries.push({ type: 'space', amount, weak: false });
    this.used += amount;
  }

  fr(fr: number, weak = false): void {
    if (weak) {
      if (this.frames === 0) return;
      const previous = this.lastSpacing();
      if (previous?.type === 'fr') {
        if (previous.weak) previous.fr = Math.max(previous.fr, fr);
        return;
      }
    }
    this.dropWeak(false);
    this.entries.push({ type: 'fr', fr, weak });
  }

  /**
   * Nearest entry that is not a tag or an overlay
   */
  private lastSpacing(): ColumnEntry | null {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry.type !== 'tag' && entry.type !== 'overlay') return entry;
    }
    return null;
  }

  tag(tag: Tag): void {
    this.entries.push({ type: 'tag', tag });
  }

  frame(frame: Frame, dx: number): void {
    this.entries.push({ type: 'frame', frame, dx });
    this.frames++;
    this.used += frame.height;
  }

  overlay(frame: Frame, dx: number, placement: Placement): void {
    this.entries.push({ type: 'overlay', frame, dx, placement, at: this.used });
  }

  /**
   * Remove weak spacing back to the last frame or strong fraction; at the
   * end of the flow strong spacing stops the search
   */
  private dropWeak(trailing: boolean): void {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry.type === 'tag' || entry.type === 'overlay') continue;
      if (entry.type === 'fr') {
        if (!entry.weak) break;
        this.entries.splice(i, 1);
        continue;
      }
      if (entry.type !== 'space') break;
      if (!entry.weak) {
        if (trailing) break;
        continue;
      }
      this.used -= entry.amount;
      this.entries.splice(i, 1);
    }
  }

  /**
   * Position everything into `target` starting at (x, y). Fractional
   * spacing shares what is left of `available`. Returns the overlays, which
   * the caller places last.
   */
  finish(target: Frame, x: number, y: number, available: number | null): Overlay[] {
    this.dropWeak(true);
    let frTotal = 0;
    for (const entry of this.entries) {
      if (entry.type === 'fr') frTotal += entry.fr;
    }
    const extra = available !== null && Number.isFinite(available) ? Math.max(0, available - this.used) : 0;
    const overlays: Overlay[] = [];
    let cursor = y;
    for (const entry of this.entries) {
      switch (entry.type) {
        case 'frame':
          target.pushFrame(x + entry.dx, cursor, entry.frame);
          cursor += entry.frame.height;
          break;
        case 'space':
          cursor += entry.amount;
          break;
        case 'fr':
          if (frTotal > 0) cursor += (extra * entry.fr) / frTotal;
          break;
        case 'tag':
          target.push({ type: 'tag', x, y: cursor, tag: entry.tag });
          break;
        case 'overlay':
          overlays.push({ frame: entry.frame, dx: entry.dx, placement: entry.placement, at: cursor - y });
          break;
      }
    }
    this.used = cursor - y;
    return overlays;
  }
}
