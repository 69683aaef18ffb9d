/**
 * Quire CLI library surface - JSON loading and rendering
 */

export { DocumentLoadError, loadDocument, loadStylesheet, parseDocument, parseStylesheet } from './document-loader.js';
export type { LoadedDocument } from './document-loader.js';
export { render } from './render.js';
export type { RenderOptions, RenderResult } from './render.js';
