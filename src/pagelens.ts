/**
 * High-level entry points: fetch once, parse once, extract.
 */

import { fetchPage } from './core/fetcher.js';
import { extractColors } from './scrape/colors.js';
import { parseHtml, type ScrapeDocument } from './scrape/document.js';
import { extractLinks, extractTables } from './scrape/extractors.js';
import { extractImages } from './scrape/images.js';
import type { AnalyzeOptions, AnalyzerOptions, PageAnalysis, TableRecord } from './types/index.js';
import { resolveLogger } from './utils/logger.js';

/**
 * Fetch a page and parse it with its own URL as the base
 */
export async function loadPage(url: string, options: AnalyzerOptions = {}): Promise<ScrapeDocument> {
  const page = await fetchPage(url, options);
  return parseHtml(page.body, { baseUrl: url });
}

/**
 * Every table on the page, in document order
 *
 * @example
 * ```typescript
 * const tables = await scrapeTables('https://example.com/stats');
 * console.log(tables[0].rows);
 * ```
 */
export async function scrapeTables(url: string, options: AnalyzerOptions = {}): Promise<TableRecord[]> {
  return extractTables(await loadPage(url, options), options);
}

/**
 * The page's markup, re-indented one node per line
 */
export async function getRawHtml(url: string, options: AnalyzerOptions = {}): Promise<string> {
  return (await loadPage(url, options)).prettify();
}

/**
 * One fetch, then tables, links, colors and images from the same document
 */
export async function analyzePage(url: string, options: AnalyzeOptions = {}): Promise<PageAnalysis> {
  const logger = resolveLogger(options.logger);
  const doc = await loadPage(url, options);

  const tables = extractTables(doc, options);
  const links = extractLinks(doc, url, options);
  const colors = await extractColors(doc, url, options);
  const images = await extractImages(doc, url, options);

  logger.info(
    `Analyzed ${url}: ${tables.length} tables, ${links.length} links, ${colors.length} colors, ${images.length} images`
  );

  return { url, tables, links, colors, images };
}
