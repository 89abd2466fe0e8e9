/**
 * Built-in Extractors
 *
 * Pure functions over a parsed ScrapeDocument: tables and links.
 * Colors and images live in their own modules because they reach the network.
 */

import { NO_LINK_TEXT } from '../constants.js';
import { ParseError } from '../core/errors.js';
import type { ExtractorOptions, LinkRecord, LinkType, TableRecord } from '../types/index.js';
import { resolveLogger } from '../utils/logger.js';
import { tryFnSync } from '../utils/try-fn.js';
import { ScrapeDocument } from './document.js';
import type { ScrapeElement } from './element.js';

// Browsers cap spans; a hostile colspan="100000" must not allocate a huge grid
const MAX_COLSPAN = 1000;
const MAX_ROWSPAN = 65534;

/**
 * Resolve a URL against a base URL; null when it cannot be resolved
 */
export function resolveUrl(url: string, baseUrl: string): string | null {
  try {
    return new URL(url.trim(), baseUrl).href;
  } catch {
    return null;
  }
}

// === Tables ===

/**
 * Extract every <table> as a rectangular grid, in document order.
 *
 * Each table is re-parsed from its own HTML so one broken table cannot
 * disturb the others; tables that yield no cells are skipped.
 */
export function extractTables(doc: ScrapeDocument, options: ExtractorOptions = {}): TableRecord[] {
  const logger = resolveLogger(options.logger);
  const tables: TableRecord[] = [];

  doc.elements('table').forEach((element, index) => {
    const [ok, err, table] = tryFnSync(() => parseTable(element.outerHtml()));
    if (!ok) {
      options.onSkip?.({ extractor: 'tables', target: `table #${index + 1}`, reason: err.message });
      return;
    }
    tables.push(cleanTable(table));
  });

  logger.debug(`tables: ${tables.length} extracted`);
  return tables;
}

/**
 * Parse one table's own HTML as a standalone document
 */
export function parseTable(html: string): TableRecord {
  const mini = ScrapeDocument.load(html);
  const table = mini.selectFirst('table');
  if (!table) {
    throw new ParseError('No <table> element found', { format: 'html' });
  }

  const ownRows = table.find('tr').filter((tr) => ownedBy(tr, table));
  const grid: string[][] = [];
  const carried: Array<{ text: string; remaining: number } | undefined> = [];
  let headerRow: ScrapeElement | undefined;

  for (const tr of ownRows) {
    const row: string[] = [];
    let col = 0;

    const fillCarried = () => {
      let pending = carried[col];
      while (pending && pending.remaining > 0) {
        row[col] = pending.text;
        pending.remaining--;
        col++;
        pending = carried[col];
      }
    };

    for (const cell of cellsOf(tr)) {
      fillCarried();
      const colspan = parseSpan(cell.attr('colspan'), MAX_COLSPAN);
      const rowspan = parseSpan(cell.attr('rowspan'), MAX_ROWSPAN);
      const text = cell.normalizedText();

      for (let i = 0; i < colspan; i++) {
        row[col] = text;
        carried[col] = rowspan > 1 ? { text, remaining: rowspan - 1 } : undefined;
        col++;
      }
    }

    // Spans still pending past this row's last cell land at their own columns;
    // the gaps before them are padded with '' below
    for (; col < carried.length; col++) {
      const pending = carried[col];
      if (pending && pending.remaining > 0) {
        row[col] = pending.text;
        pending.remaining--;
      }
    }

    if (row.length > 0) {
      if (grid.length === 0) headerRow = tr;
      grid.push(row);
    }
  }

  if (grid.length === 0 || !headerRow) {
    throw new ParseError('Table has no cells', { format: 'html' });
  }

  const width = grid.reduce((max, row) => Math.max(max, row.length), 0);
  const rows = grid.map((row) => Array.from({ length: width }, (_, i) => row[i] ?? ''));

  const captionEl = table.find('caption').find((caption) => ownedBy(caption, table));
  const caption = captionEl?.normalizedText();

  return {
    rows,
    hasHeader: isHeaderRow(headerRow, table),
    ...(caption ? { caption } : {}),
  };
}

/**
 * Embedded line breaks become single spaces
 */
function cleanTable(table: TableRecord): TableRecord {
  return {
    ...table,
    rows: table.rows.map((row) => row.map((cell) => cell.replace(/\r/g, ' ').replace(/\n/g, ' '))),
  };
}

function ownedBy(element: ScrapeElement, table: ScrapeElement): boolean {
  return element.closest('table')?.is(table) ?? false;
}

function cellsOf(tr: ScrapeElement): ScrapeElement[] {
  const cells: ScrapeElement[] = [];
  for (const child of tr.children()) {
    if (child.kind === 'element' && (child.tagName === 'td' || child.tagName === 'th')) {
      cells.push(child);
    }
  }
  return cells;
}

function isHeaderRow(tr: ScrapeElement, table: ScrapeElement): boolean {
  const thead = tr.closest('thead');
  if (thead && ownedBy(thead, table)) return true;

  const cells = cellsOf(tr);
  return cells.length > 0 && cells.every((cell) => cell.tagName === 'th');
}

function parseSpan(value: string | undefined, max: number): number {
  const span = Number.parseInt(value ?? '', 10);
  if (Number.isNaN(span) || span < 1) return 1;
  return Math.min(span, max);
}

// === Links ===

/**
 * Classify a link by its raw href, then by the resolved URL
 */
export function classifyLink(href: string, resolved: string, baseUrl: string): LinkType {
  const raw = href.trim();
  if (raw.startsWith('#')) return 'anchor';
  if (raw.startsWith('mailto:')) return 'email';
  if (raw.startsWith('tel:')) return 'phone';
  return resolved.includes(baseUrl) ? 'internal' : 'external';
}

/**
 * Extract all hyperlinks, resolved and deduplicated by URL (first occurrence wins)
 */
export function extractLinks(doc: ScrapeDocument, baseUrl: string, options: ExtractorOptions = {}): LinkRecord[] {
  const logger = resolveLogger(options.logger);
  const links: LinkRecord[] = [];
  const seen = new Set<string>();

  for (const anchor of doc.elements('a', { href: true })) {
    const href = anchor.attr('href') ?? '';
    const url = resolveUrl(href, baseUrl);

    if (url === null) {
      options.onSkip?.({ extractor: 'links', target: href, reason: 'Unresolvable URL' });
      continue;
    }
    if (seen.has(url)) continue;
    seen.add(url);

    links.push({
      url,
      text: anchor.normalizedText() || NO_LINK_TEXT,
      type: classifyLink(href, url, baseUrl),
    });
  }

  logger.debug(`links: ${links.length} unique`);
  return links;
}
