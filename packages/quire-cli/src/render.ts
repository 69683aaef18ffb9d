/**
 * Compile a loaded document and dump its frames through a backend
 */

import { type BackendName, createBackend } from 'quire-backend-fot';
import { type LayoutOverflowWarning, type StyleEntry, compile, emitDocument } from 'quire-core';
import type { LoadedDocument } from './document-loader.js';

export interface RenderOptions {
  backend?: BackendName;
  /** Stylesheet entries applied outside the document's own styles */
  styles?: readonly StyleEntry[];
  maxPasses?: number;
  now?: Date;
  indent?: number;
  anchors?: boolean;
  signal?: AbortSignal;
}

export interface RenderResult {
  output: string;
  warnings: LayoutOverflowWarning[];
  passes: number;
  pages: number;
}

export function render(document: LoadedDocument, options: RenderOptions = {}): RenderResult {
  const compiled = compile(document.content, {
    styles: [...(options.styles ?? []), ...document.styles],
    maxPasses: options.maxPasses,
    now: options.now,
    signal: options.signal,
  });
  const backend = createBackend(options.backend ?? 'xml', { indent: options.indent, anchors: options.anchors });
  emitDocument(compiled, backend);
  return {
    output: backend.getOutput?.() ?? '',
    warnings: compiled.warnings,
    passes: compiled.passes,
    pages: compiled.pages.length,
  };
}
