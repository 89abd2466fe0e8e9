/**
 * Performance Analyzer
 *
 * Response timing, page weight and a per-category resource inventory.
 * Resource sizes come from HEAD requests; a resource that cannot be sized counts as 0.
 */

import { fetchContentLength, fetchPage } from '../core/fetcher.js';
import { resolveUrl } from '../scrape/extractors.js';
import { parseHtml, type ScrapeDocument } from '../scrape/document.js';
import type { AnalyzerOptions, PerformanceMetrics, ResourceCategory } from '../types/index.js';
import { resolveLogger } from '../utils/logger.js';
import { bytesToKb, round2 } from '../utils/units.js';

interface ResourceRef {
  category: ResourceCategory;
  /** src/href as written, absent when the element has none */
  ref?: string;
}

const RESOURCE_SELECTORS: ReadonlyArray<readonly [ResourceCategory, string, string]> = [
  ['scripts', 'script[src]', 'src'],
  ['stylesheets', 'link[rel~="stylesheet"]', 'href'],
  ['images', 'img', 'src'],
];

function emptyTotals(): Record<ResourceCategory, number> {
  return { scripts: 0, stylesheets: 0, images: 0 };
}

/**
 * Resources referenced by the page, grouped scripts, stylesheets, images
 */
export function collectResources(doc: ScrapeDocument): ResourceRef[] {
  const refs: ResourceRef[] = [];
  for (const [category, selector, attribute] of RESOURCE_SELECTORS) {
    for (const element of doc.select(selector)) {
      const ref = element.attr(attribute)?.trim();
      refs.push(ref ? { category, ref } : { category });
    }
  }
  return refs;
}

/**
 * Fetch the page once more and measure it
 *
 * @example
 * ```typescript
 * const perf = await analyzePerformance('https://example.com');
 * console.log(perf.responseTime, perf.totalPageWeight);
 * ```
 */
export async function analyzePerformance(url: string, options: AnalyzerOptions = {}): Promise<PerformanceMetrics> {
  const logger = resolveLogger(options.logger);
  const page = await fetchPage(url, options);
  const doc = parseHtml(page.body, { baseUrl: url });

  const counts = emptyTotals();
  const sizes = emptyTotals();

  for (const { category, ref } of collectResources(doc)) {
    counts[category]++;
    if (!ref || ref.startsWith('data:')) continue;

    const resourceUrl = resolveUrl(ref, url);
    if (resourceUrl === null) {
      options.onSkip?.({ extractor: 'performance', target: ref, reason: 'Unresolvable URL' });
      continue;
    }

    const [ok, err, length] = await fetchContentLength(resourceUrl);
    if (!ok) {
      options.onSkip?.({ extractor: 'performance', target: resourceUrl, reason: err.message });
      continue;
    }
    sizes[category] += bytesToKb(length);
  }

  const pageSize = bytesToKb(page.byteLength);
  const resourceTotal = sizes.scripts + sizes.stylesheets + sizes.images;
  const totalResources = counts.scripts + counts.stylesheets + counts.images;

  logger.debug(`performance: ${totalResources} resources, ${round2(resourceTotal)} KB`);

  return {
    responseTime: round2(page.elapsed / 1000),
    pageSize: round2(pageSize),
    statusCode: page.status,
    contentType: page.header('content-type') ?? null,
    encoding: page.encoding,
    compression: page.header('content-encoding') ?? null,
    cacheControl: page.header('cache-control') ?? null,
    server: page.header('server') ?? null,
    resourceCounts: counts,
    resourceSizes: {
      scripts: round2(sizes.scripts),
      stylesheets: round2(sizes.stylesheets),
      images: round2(sizes.images),
    },
    totalResources,
    totalPageWeight: round2(pageSize + resourceTotal),
    headers: page.headers,
  };
}
