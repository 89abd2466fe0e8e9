import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockAgent } from 'undici';
import { analyzePage, analyzeSeo, getRawHtml, scrapeTables } from '../../src/index.js';
import { installGlobalMock, uninstallGlobalMock, mockPage } from '../../src/testing/index.js';

const url = 'https://example.com/';

const reportHtml = `<html><head><meta name="robots" content="noindex"><title>Report</title>
<link rel="stylesheet" href="/main.css"></head>
<body style="color: #333">
<table><tr><th>Year</th><th>Total</th></tr><tr><td>2023</td><td>10</td></tr><tr><td>2024</td><td>12</td></tr></table>
<a href="/one">One</a><a href="https://example.com/two">Two</a>
<a href="https://elsewhere.org/" rel="nofollow">Elsewhere</a>
<img src="/chart.png" width="640" height="480" alt="Chart">
</body></html>`;

describe('Single page end to end', () => {
  let mock: MockAgent;
  const delay = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    mock = installGlobalMock();
    delay.mockClear();
  });

  afterEach(async () => {
    uninstallGlobalMock();
    await mock.close();
  });

  it('should find one 3x2 table, the link mix and the robots directive', async () => {
    mockPage(mock, url, reportHtml, { times: 2 });

    const tables = await scrapeTables(url, { delay });
    const seo = await analyzeSeo(url, { delay });

    expect(tables).toHaveLength(1);
    expect(tables[0]?.rows).toEqual([
      ['Year', 'Total'],
      ['2023', '10'],
      ['2024', '12'],
    ]);
    expect(seo.links).toEqual({ internal: 2, external: 1, nofollow: 1 });
    expect(seo.robotsMeta).toBe('noindex');
    expect(delay).toHaveBeenCalledTimes(2);
    expect(delay).toHaveBeenCalledWith(1000);
  });

  it('should extract everything from a single fetch', async () => {
    mockPage(mock, url, reportHtml);
    mockPage(mock, 'https://example.com/main.css', 'h1 { color: #abcdef; }', {
      headers: { 'content-type': 'text/css' },
    });

    const analysis = await analyzePage(url, { delay });

    expect(delay).toHaveBeenCalledTimes(1);
    expect(analysis.url).toBe(url);
    expect(analysis.tables).toHaveLength(1);
    expect(analysis.links).toEqual([
      { url: 'https://example.com/one', text: 'One', type: 'internal' },
      { url: 'https://example.com/two', text: 'Two', type: 'internal' },
      { url: 'https://elsewhere.org/', text: 'Elsewhere', type: 'external' },
    ]);
    expect(analysis.colors).toEqual([
      { color: '#333', format: 'hex', source: 'Inline' },
      { color: '#abcdef', format: 'hex', source: 'External CSS' },
    ]);
    expect(analysis.images).toEqual([
      {
        src: 'https://example.com/chart.png',
        alt: 'Chart',
        title: 'No title',
        width: 640,
        height: 480,
        type: 'png',
      },
    ]);
  });

  it('should return the page re-indented', async () => {
    mockPage(mock, url, '<p>Hi</p>');

    expect(await getRawHtml(url, { delay })).toBe(
      ['<html>', ' <head>', ' </head>', ' <body>', '  <p>', '   Hi', '  </p>', ' </body>', '</html>'].join('\n')
    );
  });
});
