/**
 * pagelens
 *
 * Fetch a single webpage and extract its tables, links, colors, images,
 * performance and SEO metrics.
 */

// High-level entry points
export { scrapeTables, getRawHtml, analyzePage, loadPage } from './pagelens.js';
export { analyzePerformance, collectResources } from './analysis/performance.js';
export { analyzeSeo, collectSeoMetrics, textHtmlRatio, countWords, charCount } from './analysis/seo.js';

// Fetching
export { fetchPage, fetchText, fetchBytes, fetchContentLength } from './core/fetcher.js';
export { PageResponse } from './core/response.js';

// Parsing & extraction
export * from './scrape/index.js';

// Export formats
export { tableToCsv, recordsToCsv, escapeCsvField, htmlExport } from './export/index.js';

// Utilities
export { validateUrl, assertValidUrl, formatExportName } from './utils/url.js';
export { tryFn, tryFnSync } from './utils/try-fn.js';
export type { TryResult } from './utils/try-fn.js';
export { getLogger, setLogger } from './utils/logger.js';
export { consoleLogger, silentLogger, createLevelLogger } from './types/logger.js';

// Errors
export {
  PagelensError,
  NetworkError,
  HttpError,
  TimeoutError,
  ValidationError,
  ParseError,
} from './core/errors.js';

// Constants
export {
  DEFAULT_USER_AGENT,
  PAGE_FETCH_DELAY_MS,
  PAGE_FETCH_TIMEOUT_MS,
  RESOURCE_FETCH_TIMEOUT_MS,
  RESOURCE_HEAD_TIMEOUT_MS,
} from './constants.js';

// Types
export type * from './types/index.js';
