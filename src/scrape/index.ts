/**
 * Scrape Module
 *
 * HTML parsing and per-page extractors.
 */

// Main classes
export { ScrapeDocument, parseHtml } from './document.js';
export type { ParseOptions, AttributeFilter } from './document.js';
export { ScrapeElement, ScrapeText } from './element.js';
export type { ScrapeNode } from './element.js';

// Extractors
export { extractTables, parseTable, extractLinks, classifyLink, resolveUrl } from './extractors.js';
export { extractColors, scanColors } from './colors.js';
export { extractImages, imageTypeOf } from './images.js';
