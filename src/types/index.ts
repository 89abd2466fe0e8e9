/**
 * pagelens record types
 *
 * Every record is a plain readonly value object scoped to one extraction call.
 */

import type { Logger } from './logger.js';

export type { Logger, LogLevel } from './logger.js';

// === Fetch ===

/**
 * Outcome of the primary page GET
 */
export interface FetchResult {
  /** URL that was requested */
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  /** Response headers, keys lower-cased */
  readonly headers: Readonly<Record<string, string>>;
  /** Decoded body */
  readonly body: string;
  readonly bytes: Uint8Array;
  readonly byteLength: number;
  /** Charset declared by Content-Type, null when the server did not declare one */
  readonly encoding: string | null;
  /** Request start to body fully read, in milliseconds */
  readonly elapsed: number;
  /** Case-insensitive header lookup */
  header(name: string): string | undefined;
}

// === Tables ===

export interface TableRecord {
  /** Rectangular grid of cell text; the first row may be a header */
  readonly rows: string[][];
  /** First row came from <thead> or is made only of <th> cells */
  readonly hasHeader: boolean;
  readonly caption?: string;
}

// === Links ===

export type LinkType = 'internal' | 'external' | 'anchor' | 'email' | 'phone';

export interface LinkRecord {
  /** Fully resolved against the page URL */
  readonly url: string;
  readonly text: string;
  readonly type: LinkType;
}

// === Colors ===

export type ColorFormat = 'hex' | 'rgb' | 'rgba';
export type ColorSource = 'CSS' | 'Inline' | 'External CSS';

export interface ColorRecord {
  /** Literal exactly as matched */
  readonly color: string;
  readonly format: ColorFormat;
  readonly source: ColorSource;
}

// === Images ===

/**
 * Declared integer, probed pixel count, raw declared value ("50%") or "Not specified"
 */
export type ImageDimension = number | string;

export interface ImageRecord {
  readonly src: string;
  readonly alt: string;
  readonly title: string;
  readonly width: ImageDimension;
  readonly height: ImageDimension;
  /** Lower-cased extension, "data:image" or "unknown" */
  readonly type: string;
}

// === Performance ===

export type ResourceCategory = 'scripts' | 'stylesheets' | 'images';

export interface PerformanceMetrics {
  /** Seconds, 2 decimals */
  readonly responseTime: number;
  /** KB, 2 decimals */
  readonly pageSize: number;
  readonly statusCode: number;
  readonly contentType: string | null;
  readonly encoding: string | null;
  readonly compression: string | null;
  readonly cacheControl: string | null;
  readonly server: string | null;
  readonly resourceCounts: Readonly<Record<ResourceCategory, number>>;
  /** KB per category, 2 decimals */
  readonly resourceSizes: Readonly<Record<ResourceCategory, number>>;
  readonly totalResources: number;
  /** pageSize + all resource sizes, KB */
  readonly totalPageWeight: number;
  readonly headers: Readonly<Record<string, string>>;
}

// === SEO ===

export type HeadingLevel = 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6';

export interface SeoMetrics {
  readonly title: string | null;
  readonly metaTags: Readonly<Record<string, string>>;
  readonly headings: Readonly<Record<HeadingLevel, string[]>>;
  readonly images: { readonly withAlt: number; readonly withoutAlt: number };
  readonly links: { readonly internal: number; readonly external: number; readonly nofollow: number };
  readonly structuredData: unknown[];
  readonly canonicalUrl: string | null;
  readonly robotsMeta: string | null;
  readonly viewport: string | null;
  readonly language: string | null;
  /** Visible text length / serialized HTML length, percentage with 2 decimals */
  readonly textHtmlRatio: number;
  readonly wordCount: number;
}

// === Skips ===

export type ExtractorName = 'tables' | 'links' | 'colors' | 'images' | 'performance' | 'seo';

/**
 * One item an extractor gave up on (malformed table, unreachable stylesheet, ...)
 */
export interface SkippedItem {
  readonly extractor: ExtractorName;
  /** URL or short description of the item */
  readonly target: string;
  readonly reason: string;
}

// === Options ===

/**
 * Waits before the primary page fetch. The duration is fixed; only the clock is swappable.
 */
export type DelayFunction = (ms: number) => Promise<void>;

export interface FetchOptions {
  logger?: Logger;
  delay?: DelayFunction;
}

export interface ExtractorOptions {
  logger?: Logger;
  /** Called once per skipped item, in the order items are skipped */
  onSkip?: (item: SkippedItem) => void;
}

export interface ImageExtractionOptions extends ExtractorOptions {
  /**
   * Fetch images with no declared width to read their real size
   * @default true
   */
  probeDimensions?: boolean;
}

/**
 * Options for calls that fetch the page themselves and then extract from it
 */
export interface AnalyzerOptions extends FetchOptions, ExtractorOptions {}

export interface AnalyzeOptions extends AnalyzerOptions, ImageExtractionOptions {}

// === Combined ===

export interface PageAnalysis {
  readonly url: string;
  readonly tables: TableRecord[];
  readonly links: LinkRecord[];
  readonly colors: ColorRecord[];
  readonly images: ImageRecord[];
}
