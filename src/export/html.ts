import type { ScrapeDocument } from '../scrape/document.js';

/**
 * Downloadable HTML: the prettified page followed by a trailing newline
 */
export function htmlExport(doc: ScrapeDocument): string {
  return `${doc.prettify()}\n`;
}
