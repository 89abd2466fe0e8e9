/**
 * Color extraction from <style> blocks, inline styles and linked stylesheets
 */

import { fetchText } from '../core/fetcher.js';
import type { ColorFormat, ColorRecord, ColorSource, ExtractorOptions } from '../types/index.js';
import { resolveLogger } from '../utils/logger.js';
import type { ScrapeDocument } from './document.js';
import { resolveUrl } from './extractors.js';

// Scan order within one source text: every hex, then every rgb, then every rgba
const COLOR_PATTERNS: ReadonlyArray<readonly [ColorFormat, RegExp]> = [
  ['hex', /#(?:[0-9a-fA-F]{3}){1,2}\b/g],
  ['rgb', /rgb\(\s*\d+\s*,\s*\d+\s*,\s*\d+\s*\)/g],
  ['rgba', /rgba\(\s*\d+\s*,\s*\d+\s*,\s*\d+\s*,\s*(?:0|1|0?\.\d+|1\.0+)\s*\)/g],
];

/**
 * All color literals in a CSS text, in scan order, duplicates included
 */
export function scanColors(text: string, source: ColorSource): ColorRecord[] {
  const found: ColorRecord[] = [];
  for (const [format, pattern] of COLOR_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      found.push({ color: match[0], format, source });
    }
  }
  return found;
}

/**
 * Collect unique colors, keyed by (color, format); the first source seen wins.
 *
 * Linked stylesheets are fetched one after the other; an unreachable one is skipped.
 */
export async function extractColors(
  doc: ScrapeDocument,
  baseUrl: string,
  options: ExtractorOptions = {}
): Promise<ColorRecord[]> {
  const logger = resolveLogger(options.logger);
  const colors: ColorRecord[] = [];
  const seen = new Set<string>();

  const add = (records: ColorRecord[]) => {
    for (const record of records) {
      const key = `${record.format}:${record.color}`;
      if (seen.has(key)) continue;
      seen.add(key);
      colors.push(record);
    }
  };

  for (const style of doc.elements('style')) {
    add(scanColors(style.innerHtml(), 'CSS'));
  }

  for (const element of doc.select('[style]')) {
    add(scanColors(element.attr('style') ?? '', 'Inline'));
  }

  for (const link of doc.select('link[rel~="stylesheet"][href]')) {
    const href = link.attr('href') ?? '';
    const url = resolveUrl(href, baseUrl);
    if (url === null) {
      options.onSkip?.({ extractor: 'colors', target: href, reason: 'Unresolvable URL' });
      continue;
    }

    const [ok, err, css] = await fetchText(url);
    if (!ok) {
      options.onSkip?.({ extractor: 'colors', target: url, reason: err.message });
      continue;
    }
    add(scanColors(css, 'External CSS'));
  }

  logger.debug(`colors: ${colors.length} unique`);
  return colors;
}
