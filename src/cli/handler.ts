import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import ora, { type Ora } from 'ora';
import { analyzePerformance } from '../analysis/performance.js';
import { analyzeSeo } from '../analysis/seo.js';
import { PagelensError } from '../core/errors.js';
import { htmlExport } from '../export/html.js';
import { recordsToCsv, tableToCsv } from '../export/csv.js';
import { loadPage } from '../pagelens.js';
import { extractColors } from '../scrape/colors.js';
import { extractLinks, extractTables } from '../scrape/extractors.js';
import { extractImages } from '../scrape/images.js';
import type {
  DelayFunction,
  PerformanceMetrics,
  SeoMetrics,
  SkippedItem,
  TableRecord,
} from '../types/index.js';
import { consoleLogger, createLevelLogger, type Logger } from '../types/logger.js';
import colors from '../utils/colors.js';
import { getLogger } from '../utils/logger.js';
import { assertValidUrl, formatExportName, hostSlug } from '../utils/url.js';

export const COMMANDS = ['tables', 'html', 'links', 'colors', 'images', 'perf', 'seo'] as const;
export type CliCommand = (typeof COMMANDS)[number];

export interface CliOptions {
  /** Directory to write exports into */
  out?: string;
  /** Print machine-readable JSON instead of the formatted view */
  json?: boolean;
  /** Debug logging plus a report of skipped items */
  verbose?: boolean;
  /** images: measure images without a declared width (default true) */
  probe?: boolean;
}

/**
 * Where the handler writes; tests swap it for a collector
 */
export interface CliIO {
  print(text: string): void;
  spinner: boolean;
  delay?: DelayFunction;
}

export interface CommandReport {
  skipped: SkippedItem[];
  /** Paths written under --out */
  files: string[];
}

const defaultIO: CliIO = {
  print: (text) => console.log(text),
  spinner: true,
};

const SPINNER_TEXT: Record<CliCommand, string> = {
  tables: 'Scraping tables',
  html: 'Fetching HTML',
  links: 'Collecting links',
  colors: 'Collecting colors',
  images: 'Collecting images',
  perf: 'Measuring performance',
  seo: 'Analyzing SEO',
};

interface Rendered {
  /** Formatted view */
  text: string;
  /** Value printed by --json */
  data: unknown;
  /** File name to contents, written under --out */
  exports: Array<readonly [string, string]>;
  summary: string;
}

/**
 * Run one CLI command against a URL
 */
export async function handleCommand(
  command: CliCommand,
  url: string,
  options: CliOptions = {},
  io: CliIO = defaultIO
): Promise<CommandReport> {
  assertValidUrl(url);

  const logger: Logger = options.verbose ? createLevelLogger(consoleLogger, 'debug') : getLogger();
  const skipped: SkippedItem[] = [];
  const shared = {
    logger,
    onSkip: (item: SkippedItem) => skipped.push(item),
    ...(io.delay ? { delay: io.delay } : {}),
  };

  const spinner: Ora | null = io.spinner
    ? ora({ text: `${colors.bold(SPINNER_TEXT[command])} ${colors.cyan(url)}`, color: 'cyan', spinner: 'dots' }).start()
    : null;

  let rendered: Rendered;
  try {
    rendered = await run(command, url, options, shared);
  } catch (error) {
    spinner?.fail(colors.red(`${SPINNER_TEXT[command]} failed`));
    throw error;
  }
  spinner?.succeed(rendered.summary);

  io.print(options.json ? JSON.stringify(rendered.data, null, 2) : rendered.text);

  const files: string[] = [];
  if (options.out) {
    await mkdir(options.out, { recursive: true });
    for (const [name, contents] of rendered.exports) {
      const path = join(options.out, name);
      await writeFile(path, contents, 'utf-8');
      files.push(path);
      if (!options.json) io.print(colors.green(`✓ Saved ${path}`));
    }
  }

  if (options.verbose && !options.json) {
    io.print(colors.gray(`${skipped.length} item(s) skipped`));
    for (const item of skipped) {
      io.print(colors.gray(`  ${item.extractor}: ${item.target} (${item.reason})`));
    }
  }

  return { skipped, files };
}

async function run(
  command: CliCommand,
  url: string,
  options: CliOptions,
  shared: { logger: Logger; onSkip: (item: SkippedItem) => void; delay?: DelayFunction }
): Promise<Rendered> {
  const slug = hostSlug(url);

  switch (command) {
    case 'tables': {
      const tables = extractTables(await loadPage(url, shared), shared);
      return {
        text: tables.length === 0 ? colors.yellow('No tables found on the webpage!') : tables.map(renderTable).join('\n\n'),
        data: tables,
        exports: tables.map((table, i) => [`${formatExportName(url, i)}.csv`, tableToCsv(table)] as const),
        summary: `Found ${tables.length} table(s)`,
      };
    }
    case 'html': {
      const doc = await loadPage(url, shared);
      const html = htmlExport(doc);
      return {
        text: html.trimEnd(),
        data: { url, html },
        exports: [[`${formatExportName(url, 0)}.html`, html]],
        summary: `Fetched ${html.length} characters`,
      };
    }
    case 'links': {
      const links = extractLinks(await loadPage(url, shared), url, shared);
      return {
        text: formatRows(links.map((link) => [colors.cyan(link.type), link.url, colors.gray(link.text)])),
        data: links,
        exports: [[`${slug}_links.csv`, recordsToCsv(links, ['url', 'text', 'type'])]],
        summary: `Found ${links.length} link(s)`,
      };
    }
    case 'colors': {
      const found = await extractColors(await loadPage(url, shared), url, shared);
      return {
        text: formatRows(found.map((color) => [color.color, color.format, colors.gray(color.source)])),
        data: found,
        exports: [[`${slug}_colors.csv`, recordsToCsv(found, ['color', 'format', 'source'])]],
        summary: `Found ${found.length} color(s)`,
      };
    }
    case 'images': {
      const images = await extractImages(await loadPage(url, shared), url, {
        ...shared,
        probeDimensions: options.probe ?? true,
      });
      return {
        text: formatRows(
          images.map((image) => [image.type, `${image.width}x${image.height}`, image.src, colors.gray(image.alt)])
        ),
        data: images,
        exports: [[`${slug}_images.csv`, recordsToCsv(images, ['src', 'alt', 'title', 'width', 'height', 'type'])]],
        summary: `Found ${images.length} image(s)`,
      };
    }
    case 'perf': {
      const metrics = await analyzePerformance(url, shared);
      return {
        text: renderPerformance(metrics),
        data: metrics,
        exports: [[`${slug}_perf.json`, `${JSON.stringify(metrics, null, 2)}\n`]],
        summary: `Response ${metrics.statusCode} in ${metrics.responseTime}s`,
      };
    }
    case 'seo': {
      const metrics = await analyzeSeo(url, shared);
      return {
        text: renderSeo(metrics),
        data: metrics,
        exports: [[`${slug}_seo.json`, `${JSON.stringify(metrics, null, 2)}\n`]],
        summary: `Analyzed ${metrics.wordCount} words`,
      };
    }
  }
}

// === Rendering ===

/**
 * Left-aligned columns separated by two spaces. Widths ignore ANSI codes.
 */
export function formatRows(rows: string[][]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, visibleLength(cell));
    });
  }
  return rows
    .map((row) =>
      row
        .map((cell, i) => (i === row.length - 1 ? cell : cell + ' '.repeat((widths[i] ?? 0) - visibleLength(cell))))
        .join('  ')
    )
    .join('\n');
}

function visibleLength(text: string): number {
  return text.replace(/\x1b\[\d+m/g, '').length;
}

function renderTable(table: TableRecord, index: number): string {
  const width = table.rows[0]?.length ?? 0;
  const title = colors.bold(`Table ${index + 1}`) + colors.gray(` (${table.rows.length}x${width})`);
  const caption = table.caption ? `\n${colors.gray(table.caption)}` : '';
  const rows = table.rows.map((row, i) => (i === 0 && table.hasHeader ? row.map((cell) => colors.bold(cell)) : row));
  return `${title}${caption}\n${formatRows(rows)}`;
}

function orDash(value: string | null): string {
  return value ?? colors.gray('-');
}

function renderPerformance(m: PerformanceMetrics): string {
  return formatRows([
    ['Status', String(m.statusCode)],
    ['Response time', `${m.responseTime} s`],
    ['Page size', `${m.pageSize} KB`],
    ['Content-Type', orDash(m.contentType)],
    ['Encoding', orDash(m.encoding)],
    ['Compression', orDash(m.compression)],
    ['Cache-Control', orDash(m.cacheControl)],
    ['Server', orDash(m.server)],
    ['Scripts', `${m.resourceCounts.scripts} (${m.resourceSizes.scripts} KB)`],
    ['Stylesheets', `${m.resourceCounts.stylesheets} (${m.resourceSizes.stylesheets} KB)`],
    ['Images', `${m.resourceCounts.images} (${m.resourceSizes.images} KB)`],
    ['Total resources', String(m.totalResources)],
    ['Total weight', `${m.totalPageWeight} KB`],
  ]);
}

function renderSeo(m: SeoMetrics): string {
  const headingCounts = (['h1', 'h2', 'h3', 'h4', 'h5', 'h6'] as const)
    .map((level) => `${level}:${m.headings[level].length}`)
    .join(' ');
  return formatRows([
    ['Title', orDash(m.title)],
    ['Description', orDash(m.metaTags['description'] ?? null)],
    ['Canonical', orDash(m.canonicalUrl)],
    ['Robots', orDash(m.robotsMeta)],
    ['Viewport', orDash(m.viewport)],
    ['Language', orDash(m.language)],
    ['Headings', headingCounts],
    ['Images', `${m.images.withAlt} with alt, ${m.images.withoutAlt} without`],
    ['Links', `${m.links.internal} internal, ${m.links.external} external, ${m.links.nofollow} nofollow`],
    ['Structured data', `${m.structuredData.length} block(s)`],
    ['Text/HTML ratio', `${m.textHtmlRatio}%`],
    ['Words', String(m.wordCount)],
  ]);
}

/**
 * Message plus suggestions, for the top-level error handler
 */
export function formatError(error: unknown): string {
  if (error instanceof PagelensError) {
    const lines = [colors.red(`✖ ${error.message}`)];
    for (const suggestion of error.suggestions) {
      lines.push(colors.gray(`  → ${suggestion}`));
    }
    return lines.join('\n');
  }
  return colors.red(`✖ ${error instanceof Error ? error.message : String(error)}`);
}
