/**
 * SEO Analyzer
 *
 * On-page signals only: metadata, headings, alt coverage, link mix,
 * structured data and text density.
 */

import { fetchPage } from '../core/fetcher.js';
import { ParseError } from '../core/errors.js';
import { parseHtml, type ScrapeDocument } from '../scrape/document.js';
import type { AnalyzerOptions, ExtractorOptions, HeadingLevel, SeoMetrics } from '../types/index.js';
import { resolveLogger } from '../utils/logger.js';
import { tryFnSync } from '../utils/try-fn.js';
import { round2 } from '../utils/units.js';

const HEADING_LEVELS: readonly HeadingLevel[] = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

/**
 * Visible text length as a percentage of the serialized HTML length, 2 decimals
 */
export function textHtmlRatio(textLength: number, htmlLength: number): number {
  if (htmlLength === 0) return 0;
  return round2((textLength / htmlLength) * 100);
}

/**
 * Length in characters (code points), so an emoji counts once
 */
export function charCount(text: string): number {
  return text.length - (text.match(/[\uD800-\uDBFF][\uDC00-\uDFFF]/g)?.length ?? 0);
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function collectMetaTags(doc: ScrapeDocument): Record<string, string> {
  const metaTags: Record<string, string> = {};
  for (const meta of doc.elements('meta')) {
    const key = meta.attr('name') ?? meta.attr('property');
    if (key === undefined) continue;
    metaTags[key] = meta.attr('content') ?? '';
  }
  return metaTags;
}

function collectHeadings(doc: ScrapeDocument): Record<HeadingLevel, string[]> {
  const headings: Record<HeadingLevel, string[]> = { h1: [], h2: [], h3: [], h4: [], h5: [], h6: [] };
  for (const level of HEADING_LEVELS) {
    headings[level] = doc.elements(level).map((heading) => heading.text().trim());
  }
  return headings;
}

function collectStructuredData(doc: ScrapeDocument, options: ExtractorOptions): unknown[] {
  const blocks: unknown[] = [];
  doc.elements('script', { type: 'application/ld+json' }).forEach((script, index) => {
    const [ok, err, data] = tryFnSync((): unknown => JSON.parse(script.innerHtml()));
    if (!ok) {
      const reason = new ParseError(`Invalid JSON-LD: ${err.message}`, { format: 'json' }).message;
      options.onSkip?.({ extractor: 'seo', target: `json-ld #${index + 1}`, reason });
      return;
    }
    blocks.push(data);
  });
  return blocks;
}

/**
 * Compute SEO signals from an already parsed page
 */
export function collectSeoMetrics(doc: ScrapeDocument, pageUrl: string, options: ExtractorOptions = {}): SeoMetrics {
  const metaTags = collectMetaTags(doc);

  let withAlt = 0;
  let withoutAlt = 0;
  for (const img of doc.elements('img')) {
    if (img.attr('alt')?.trim()) withAlt++;
    else withoutAlt++;
  }

  let internal = 0;
  let external = 0;
  let nofollow = 0;
  for (const anchor of doc.elements('a', { href: true })) {
    const href = anchor.attr('href') ?? '';
    if (/^https?:\/\//.test(href) && !href.includes(pageUrl)) external++;
    else internal++;

    const rel = (anchor.attr('rel') ?? '').toLowerCase().split(/\s+/);
    if (rel.includes('nofollow')) nofollow++;
  }

  const visibleText = doc.visibleText();

  return {
    title: doc.title() ?? null,
    metaTags,
    headings: collectHeadings(doc),
    images: { withAlt, withoutAlt },
    links: { internal, external, nofollow },
    structuredData: collectStructuredData(doc, options),
    canonicalUrl: doc.selectFirst('link[rel="canonical"]')?.attr('href') ?? null,
    robotsMeta: metaTags['robots'] ?? null,
    viewport: metaTags['viewport'] ?? null,
    language: doc.selectFirst('html')?.attr('lang') ?? null,
    textHtmlRatio: textHtmlRatio(charCount(visibleText), charCount(doc.html())),
    wordCount: countWords(visibleText),
  };
}

/**
 * Fetch and parse the page, then collect its SEO signals
 *
 * @example
 * ```typescript
 * const seo = await analyzeSeo('https://example.com');
 * console.log(seo.title, seo.headings.h1, seo.robotsMeta);
 * ```
 */
export async function analyzeSeo(url: string, options: AnalyzerOptions = {}): Promise<SeoMetrics> {
  const logger = resolveLogger(options.logger);
  const page = await fetchPage(url, options);
  const doc = parseHtml(page.body, { baseUrl: url });

  const metrics = collectSeoMetrics(doc, url, options);
  logger.debug(`seo: ${metrics.wordCount} words, ${metrics.structuredData.length} JSON-LD blocks`);
  return metrics;
}
