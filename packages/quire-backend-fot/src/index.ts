/**
 * Frame dump backends for Quire - XML and plain text renderings of the
 * laid-out page frames, for debugging and comparing layouts
 */

import type { FrameBuilder } from 'quire-core';
import { TextBackend } from './text.js';
import { XmlBackend } from './xml.js';

export { XmlBackend } from './xml.js';
export type { XmlBackendOptions } from './xml.js';
export { TextBackend } from './text.js';
export type { TextBackendOptions } from './text.js';
export { escapeXml, formatNumber } from './format.js';

export const BACKENDS = ['xml', 'text'] as const;

export type BackendName = (typeof BACKENDS)[number];

export interface BackendOptions {
  indent?: number;
  anchors?: boolean;
}

/**
 * Create a dump backend by name
 */
export function createBackend(name: BackendName, options: BackendOptions = {}): FrameBuilder {
  switch (name) {
    case 'xml':
      return new XmlBackend(options);
    case 'text':
      return new TextBackend({ anchors: options.anchors });
  }
}
