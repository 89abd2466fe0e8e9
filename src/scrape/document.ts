/**
 * ScrapeDocument - read-only parsed page shared by every extractor
 *
 * Wraps a cheerio tree; parsing never throws on malformed markup.
 */

import { load, type CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { isTag, isText } from 'domhandler';
import { ScrapeElement, collapseWhitespace, wrapNodes, wrapSelection, type ScrapeNode } from './element.js';
import { prettify } from './pretty.js';

export interface ParseOptions {
  /** Base URL for resolving relative references */
  baseUrl?: string;
}

/**
 * Attribute filter for elements(): `true` means "attribute present", a string means "equals"
 */
export type AttributeFilter = Record<string, string | true>;

const HIDDEN_ELEMENTS = new Set(['script', 'style', 'noscript', 'template']);

export class ScrapeDocument {
  private $: CheerioAPI;
  private options: ParseOptions;

  /**
   * @internal Use ScrapeDocument.load() or parseHtml() instead
   */
  constructor($: CheerioAPI, options?: ParseOptions) {
    this.$ = $;
    this.options = options || {};
  }

  /**
   * Parse an HTML string, best effort
   */
  static load(html: string, options?: ParseOptions): ScrapeDocument {
    return new ScrapeDocument(load(html), options);
  }

  // === Query Methods ===

  /**
   * Elements by tag name in document order, optionally filtered by attributes
   *
   * @example
   * ```typescript
   * doc.elements('a', { href: true });
   * doc.elements('script', { type: 'application/ld+json' });
   * ```
   */
  elements(tagName: string, filter?: AttributeFilter): ScrapeElement[] {
    const all = this.select(tagName.toLowerCase());
    if (!filter) return all;

    const conditions = Object.entries(filter);
    return all.filter((el) =>
      conditions.every(([name, expected]) =>
        expected === true ? el.hasAttr(name) : el.attr(name) === expected
      )
    );
  }

  /**
   * All elements matching a CSS selector
   */
  select(selector: string): ScrapeElement[] {
    return wrapSelection(this.$(selector), this.$);
  }

  /**
   * First element matching a CSS selector
   */
  selectFirst(selector: string): ScrapeElement | undefined {
    return this.select(selector)[0];
  }

  /**
   * Count elements matching selector
   */
  count(selector: string): number {
    return this.$(selector).length;
  }

  /**
   * Top-level nodes of the document
   */
  root(): ScrapeNode[] {
    return wrapNodes(this.$.root().contents().toArray(), this.$);
  }

  // === Text ===

  /**
   * Get page title
   */
  title(): string | undefined {
    const title = this.$('title').first().text().trim();
    return title || undefined;
  }

  /**
   * Body text without script/style/noscript/template content, whitespace collapsed
   */
  visibleText(): string {
    const body = this.$('body').get(0);
    const start: AnyNode[] = body ? [body] : this.$.root().contents().toArray();
    const parts: string[] = [];
    collectText(start, parts);
    return collapseWhitespace(parts.join(' '));
  }

  // === Serialization ===

  /**
   * Get the full HTML of the document
   */
  html(): string {
    return this.$.html();
  }

  /**
   * Indented one-node-per-line rendering for display and HTML export
   */
  prettify(): string {
    return prettify(this.$.root().contents().toArray());
  }

  // === Raw Access ===

  /**
   * Get the base URL for this document
   */
  get baseUrl(): string | undefined {
    return this.options.baseUrl;
  }
}

function collectText(nodes: AnyNode[], parts: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      parts.push(node.data);
    } else if (isTag(node) && !HIDDEN_ELEMENTS.has(node.name.toLowerCase())) {
      collectText(node.children, parts);
    }
  }
}

/**
 * Create a ScrapeDocument from an HTML string
 *
 * @example
 * ```typescript
 * const doc = parseHtml('<html><body><h1>Hello</h1></body></html>');
 * doc.select('h1')[0].text(); // 'Hello'
 * ```
 */
export function parseHtml(html: string, options?: ParseOptions): ScrapeDocument {
  return ScrapeDocument.load(html, options);
}
